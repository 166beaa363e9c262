// src/runtime/builtins.ts
//
// Root library: the global functions and type names every script sees.
// Installed into an engine's root scope before the prelude runs.
//
//   println/print          output through HostServices
//   assert*                test helpers raising AssertionFailedException
//   typeOf                 class of a value
//   launch/flow            tasks and cold streams (see concurrency.ts)
//   delay/yield            suspension points
//   List/Map/Set           constructors (also usable with `is`)

import type { Scope } from "../core/scope";
import { ExecutionError, QuillRuntimeError } from "../diagnostics/scriptErrors";
import "./builtinMethods";
import { ClassObj, InstanceObj } from "./classes";
import { DeferredObj, FlowObj } from "./concurrency";
import { NativeFunction } from "./functions";
import type { Args, NativeCall, NativeImpl } from "./interop";
import { arg, defineMethod, describe, expectCallable, expectNumber, illegalArgument, iterableItems, receiver } from "./natives";
import { Types, classOf, isInstanceOf, registerObjectKind } from "./types";
import { ListObj, MapEntryObj, MapObj, Obj, SetObj, VOID } from "./values";
import type { Value } from "./values";

/* =========================================================
   Constructors of built-in kinds
   ========================================================= */

function newMap(args: Args): MapObj {
  const m = new MapObj();
  for (const v of args.positional) {
    if (!(v instanceof MapEntryObj)) throw illegalArgument(`Map(): expected key => value entries, got ${describe(v)}`);
    m.set(v.key, v.value);
  }
  for (const [k, v] of args.named) m.set(k, v);
  return m;
}

export const builtinConstructors: ReadonlyMap<ClassObj, NativeImpl> = new Map<ClassObj, NativeImpl>([
  [Types.List, (args) => new ListObj([...args.positional])],
  [Types.Set, (args) => new SetObj(args.positional)],
  [Types.Map, (args) => newMap(args)],
]);

/* =========================================================
   Flow collector receiver
   ========================================================= */

/** `this` of a flow producer: exposes `emit`. */
export class FlowCollectorObj extends Obj {
  public readonly typeName = "FlowCollector";

  constructor(public readonly emit: (v: Value) => Promise<void>) {
    super();
  }
}

const FlowCollectorClass = new ClassObj("FlowCollector", [Types.Object], "builtin");
registerObjectKind("FlowCollector", FlowCollectorClass);
defineMethod(FlowCollectorClass, "emit", async (args, call) => {
  const self = receiver(call, (v: Value): v is FlowCollectorObj => v instanceof FlowCollectorObj, "FlowCollector");
  await self.emit(arg(args, 0, "value"));
  return VOID;
});

/* =========================================================
   Assertions
   ========================================================= */

function assertionFailed(message: string): QuillRuntimeError {
  return new QuillRuntimeError("AssertionFailedException", message);
}

async function assertThrows(args: Args, call: NativeCall): Promise<Value> {
  const expected = args.positional.length > 1 ? arg(args, 0, "type") : null;
  const fn = expectCallable(arg(args, expected ? 1 : 0, "block"), "assertThrows");

  let caught: InstanceObj | null = null;
  try {
    await call.interp.callPositional(fn, [], call.range);
  } catch (e) {
    if (e instanceof ExecutionError) caught = e.errorObject;
    else if (e instanceof QuillRuntimeError) caught = call.interp.makeException(e.code, e.message);
    else throw e;
  }

  if (!caught) throw assertionFailed("expected an exception, but none was thrown");
  if (expected instanceof ClassObj && !isInstanceOf(caught, expected)) {
    throw assertionFailed(`expected ${expected.name}, got ${caught.cls.name}`);
  }
  return caught;
}

/* =========================================================
   Install
   ========================================================= */

export function installBuiltins(root: Scope): void {
  const fn = (name: string, impl: NativeImpl): void => {
    root.define(name, new NativeFunction(name, impl));
  };

  for (const [name, cls] of Object.entries(Types)) root.define(name, cls);

  fn("print", async (args, call) => {
    const parts: string[] = [];
    for (const v of args.positional) parts.push(await call.interp.stringify(v));
    call.interp.host.write(parts.join(" "));
    return VOID;
  });

  fn("println", async (args, call) => {
    const parts: string[] = [];
    for (const v of args.positional) parts.push(await call.interp.stringify(v));
    call.interp.host.print(parts.join(" "));
    return VOID;
  });

  fn("typeOf", (args) => classOf(arg(args, 0, "value")));

  fn("listOf", (args) => new ListObj([...args.positional]));
  fn("setOf", (args) => new SetObj(args.positional));
  fn("mapOf", (args) => newMap(args));
  fn("listFrom", (args) => new ListObj([...iterableItems(arg(args, 0, "values"), "listFrom")]));

  fn("assert", async (args, call) => {
    const cond = arg(args, 0, "condition");
    if (cond === true) return VOID;
    const message = args.positional.length > 1 ? await call.interp.stringify(arg(args, 1, "message")) : "assertion failed";
    throw assertionFailed(message);
  });

  fn("assertEquals", async (args, call) => {
    const expected = arg(args, 0, "expected");
    const actual = arg(args, 1, "actual");
    if (await call.interp.equals(expected, actual)) return VOID;
    throw assertionFailed(`expected ${await call.interp.stringify(expected)} but got ${await call.interp.stringify(actual)}`);
  });

  fn("assertNotEquals", async (args, call) => {
    const a = arg(args, 0, "unexpected");
    const b = arg(args, 1, "actual");
    if (!(await call.interp.equals(a, b))) return VOID;
    throw assertionFailed(`did not expect ${await call.interp.stringify(b)}`);
  });

  fn("assertThrows", assertThrows);

  fn("launch", (args, call) => {
    const block = expectCallable(arg(args, 0, "block"), "launch");
    return new DeferredObj(call.interp.callPositional(block, [], call.range));
  });

  fn("flow", (args, call) => {
    const producer = expectCallable(arg(args, 0, "producer"), "flow");
    return new FlowObj(async (emit) => {
      await call.interp.callWithReceiver(producer, new FlowCollectorObj(emit), [], call.range);
    });
  });

  fn("delay", async (args, call) => {
    const ms = expectNumber(arg(args, 0, "millis"), "delay");
    await call.interp.sleep(Math.max(0, ms));
    call.interp.checkCancelled();
    return VOID;
  });

  fn("yield", async (_args, call) => {
    await call.interp.host.yield();
    call.interp.checkCancelled();
    return VOID;
  });
}
