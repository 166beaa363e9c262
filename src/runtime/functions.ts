// src/runtime/functions.ts
//
// Callable values. User functions and lambdas keep their declaration node and
// the scope they were created in; calling one is the evaluator's job. Native
// functions wrap a TypeScript implementation.

import type { FunctionDeclaration, LambdaExpression } from "../core/ast";
import type { Scope } from "../core/scope";
import type { ClassObj } from "./classes";
import type { NativeImpl } from "./interop";
import { Obj } from "./values";
import type { Value } from "./values";

export abstract class CallableObj extends Obj {
  public readonly typeName = "Function";
  public abstract readonly name: string;
}

export class FunctionObj extends CallableObj {
  constructor(
    public readonly name: string,
    public readonly decl: FunctionDeclaration | LambdaExpression,
    public readonly closure: Scope,
    /** Set for methods: the class whose body declared the function. */
    public readonly declaringClass: ClassObj | null = null,
    /** Trailing lambdas answer to the called function's name: `return@forEach`. */
    private readonly implicitLabel: string | null = null,
  ) {
    super();
  }

  public get isLambda(): boolean {
    return this.decl.kind === "LambdaExpression";
  }

  /** Label that `return@label` uses to leave this function. */
  public get label(): string | null {
    return this.decl.kind === "LambdaExpression" ? (this.decl.label ?? this.implicitLabel) : this.name;
  }

  public get poolable(): boolean {
    return this.decl.poolable;
  }
}

export class NativeFunction extends CallableObj {
  constructor(
    public readonly name: string,
    public readonly impl: NativeImpl,
  ) {
    super();
  }
}

/** `obj.method` read without calling it: remembers the receiver. */
export class BoundMethod extends CallableObj {
  constructor(
    public readonly receiver: Value,
    public readonly fn: CallableObj,
  ) {
    super();
  }

  public get name(): string {
    return this.fn.name;
  }

  public equalsValue(other: Value): boolean {
    return other instanceof BoundMethod && other.fn === this.fn && other.receiver === this.receiver;
  }
}

export function native(name: string, impl: NativeImpl): NativeFunction {
  return new NativeFunction(name, impl);
}
