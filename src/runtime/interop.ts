// src/runtime/interop.ts
//
// The narrow surface native code sees of the running interpreter. Native
// functions, built-in methods, the codec and host modules talk to the
// evaluator only through these types, which keeps the runtime free of an
// import cycle back into src/core/evaluator.ts.

import type { Range } from "../core/ast";
import type { Scope } from "../core/scope";
import type { Logger } from "../utils/logger";
import type { ClassObj, InstanceObj } from "./classes";
import type { ArithmeticOperator } from "./operators";
import type { Value } from "./values";

/* =========================================================
   Host services
   ========================================================= */

export type HostServices = {
  /** One line of program output. */
  print: (line: string) => void;
  /** Output without a trailing newline. */
  write: (text: string) => void;
  /** Resolves after `ms`, or as soon as `signal` aborts; an abort must not leave a timer behind. */
  sleep: (ms: number, signal?: AbortSignal) => Promise<void>;
  /** Gives other tasks a chance to run. */
  yield: () => Promise<void>;
};

export function defaultHostServices(): HostServices {
  return {
    print: (line) => {
      process.stdout.write(`${line}\n`);
    },
    write: (text) => {
      process.stdout.write(text);
    },
    sleep: (ms, signal) =>
      new Promise((resolve) => {
        if (signal?.aborted) {
          resolve();
          return;
        }
        const onAbort = (): void => {
          clearTimeout(timer);
          resolve();
        };
        const timer = setTimeout(() => {
          signal?.removeEventListener("abort", onAbort);
          resolve();
        }, ms);
        signal?.addEventListener("abort", onAbort, { once: true });
      }),
    yield: () => new Promise((resolve) => setImmediate(resolve)),
  };
}

/* =========================================================
   Arguments
   ========================================================= */

export type Args = {
  positional: Value[];
  named: Map<string, Value>;
};

export function positional(values: Value[]): Args {
  return { positional: values, named: new Map() };
}

/* =========================================================
   Interpreter surface
   ========================================================= */

export interface Interpreter {
  readonly host: HostServices;
  readonly logger: Logger;
  readonly rootScope: Scope;

  /** Calls any callable value (function, class, bound method, string formatter). */
  call(callee: Value, args: Args, range?: Range): Promise<Value>;
  callPositional(callee: Value, args: Value[], range?: Range): Promise<Value>;
  /** Calls a lambda with `receiver` as `this` (flow producers, scoped builders). */
  callWithReceiver(callee: Value, receiver: Value, args: Value[], range?: Range): Promise<Value>;

  getMember(target: Value, name: string, range?: Range): Promise<Value>;
  invokeMethod(target: Value, name: string, args: Value[], range?: Range): Promise<Value>;
  hasMethod(target: Value, name: string): boolean;

  /** Constructs an instance; built-in kinds (List, Map, Set) return their own values. */
  instantiate(cls: ClassObj, args: Args, range?: Range): Promise<Value>;

  stringify(v: Value): Promise<string>;
  equals(a: Value, b: Value): Promise<boolean>;
  compare(a: Value, b: Value, range?: Range): Promise<number>;
  /** `a op b` including user operator overloads. */
  arithmetic(op: ArithmeticOperator, a: Value, b: Value, range?: Range): Promise<Value>;

  /** Materializes a root exception class instance. */
  makeException(className: string, message: string): InstanceObj;

  /** Throws CancelledError when the running execution was aborted. */
  checkCancelled(): void;
  /** host.sleep, cut short when the execution is aborted. */
  sleep(ms: number): Promise<void>;
}

export type NativeCall = {
  interp: Interpreter;
  /** Receiver for methods; null for free functions. */
  thisObj: Value;
  scope: Scope;
  range: Range;
};

export type NativeImpl = (args: Args, call: NativeCall) => Promise<Value> | Value;
