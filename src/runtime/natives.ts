// src/runtime/natives.ts
//
// Helpers for writing native functions and methods: argument access, type
// expectations (raising IllegalArgumentException with the offending kind) and
// member registration on built-in class descriptors.

import { QuillRuntimeError } from "../diagnostics/scriptErrors";
import type { ClassObj } from "./classes";
import { CallableObj } from "./functions";
import type { Args, NativeCall, NativeImpl } from "./interop";
import { CharObj, ListObj, MapObj, RangeObj, SetObj } from "./values";
import type { Value } from "./values";

export function describe(v: Value): string {
  if (v === null) return "null";
  switch (typeof v) {
    case "boolean":
      return "Bool";
    case "bigint":
      return "Int";
    case "number":
      return "Real";
    case "string":
      return "String";
    default:
      return v.typeName;
  }
}

export function illegalArgument(message: string): QuillRuntimeError {
  return new QuillRuntimeError("IllegalArgumentException", message);
}

/* =========================================================
   Arguments
   ========================================================= */

/** Positional argument `i`, or the named one, or the fallback. */
export function arg(args: Args, i: number, name?: string, fallback?: Value): Value {
  if (i < args.positional.length) return args.positional[i];
  if (name !== undefined) {
    const named = args.named.get(name);
    if (named !== undefined) return named;
  }
  if (fallback !== undefined) return fallback;
  throw illegalArgument(`missing argument ${name ? `'${name}'` : `#${i + 1}`}`);
}

export function expectInt(v: Value, what: string): bigint {
  if (typeof v === "bigint") return v;
  throw illegalArgument(`${what}: expected Int, got ${describe(v)}`);
}

export function expectNumber(v: Value, what: string): number {
  if (typeof v === "bigint" || typeof v === "number") return Number(v);
  throw illegalArgument(`${what}: expected a number, got ${describe(v)}`);
}

export function expectString(v: Value, what: string): string {
  if (typeof v === "string") return v;
  throw illegalArgument(`${what}: expected String, got ${describe(v)}`);
}

export function expectCallable(v: Value, what: string): CallableObj {
  if (v instanceof CallableObj) return v;
  throw illegalArgument(`${what}: expected a function, got ${describe(v)}`);
}

export function expectList(v: Value, what: string): ListObj {
  if (v instanceof ListObj) return v;
  throw illegalArgument(`${what}: expected List, got ${describe(v)}`);
}

/** Items of any finite iterable built-in value. */
export function iterableItems(v: Value, what: string): Value[] {
  if (v instanceof ListObj) return v.items;
  if (v instanceof SetObj) return v.values();
  if (v instanceof MapObj) return v.entries();
  if (v instanceof RangeObj && v.isIterable) return [...v.iterate()];
  if (typeof v === "string") return [...v].map((c) => new CharObj(c));
  throw illegalArgument(`${what}: ${describe(v)} is not iterable`);
}

/** Converts an index (negative counts from the end) and checks bounds. */
export function checkIndex(i: bigint, size: number): number {
  const n = Number(i);
  const idx = n < 0 ? size + n : n;
  if (idx < 0 || idx >= size) {
    throw new QuillRuntimeError("IndexOutOfBoundsException", `index ${n} out of bounds for size ${size}`);
  }
  return idx;
}

/* =========================================================
   Receivers
   ========================================================= */

export function receiver<T extends Value>(call: NativeCall, guard: (v: Value) => v is T, kind: string): T {
  const self = call.thisObj;
  if (guard(self)) return self;
  throw illegalArgument(`expected a ${kind} receiver, got ${describe(self)}`);
}

/* =========================================================
   Registration
   ========================================================= */

export function defineMethod(cls: ClassObj, name: string, impl: NativeImpl): void {
  cls.members.set(name, { kind: "native", name, visibility: "public", declaringClass: cls, impl, property: false });
}

export function defineProperty(cls: ClassObj, name: string, impl: NativeImpl): void {
  cls.members.set(name, { kind: "native", name, visibility: "public", declaringClass: cls, impl, property: true });
}
