// src/core/evaluator.ts
//
// Quill Evaluator (tree-walking interpreter)
// ------------------------------------------
// Executes a parsed Quill AST (see src/core/ast.ts) against a Scope. There is
// no compilation step below the tree: every node evaluates to a value.
//
// Everything here is async. Natives may suspend (timers, I/O, explicit
// yields) and the host event loop resumes them, so one process can multiplex
// many running scripts.
//
// Control flow:
//   break / continue / return   travel as signal exceptions, caught by the
//                               nearest loop or call whose label matches
//   throw                       ExecutionError carrying the exception instance
//   natives                     throw QuillRuntimeError; the innermost node
//                               being evaluated turns it into an exception
//                               instance with that node's position
//
// Cancellation: the AbortSignal of the running execution is checked before
// every statement, loop iteration and call. CancelledError is invisible to
// script try/catch; `finally` bodies and pooled frame release still run.

import type {
  AssignmentExpression,
  AssignmentOperator,
  BinaryExpression,
  BinaryOperator,
  BlockExpression,
  CallArgument,
  CallExpression,
  CastExpression,
  CatchClause,
  DoWhileExpression,
  Expression,
  ForInExpression,
  FunctionDeclaration,
  IfExpression,
  ImportDeclaration,
  IndexExpression,
  LambdaExpression,
  ListLiteral,
  LogicalExpression,
  MemberExpression,
  Parameter,
  Program,
  Range,
  RangeExpression,
  TryExpression,
  TypeCheckExpression,
  UnaryExpression,
  UpdateExpression,
  VariableDeclaration,
  WhenCondition,
  WhenExpression,
  WhileExpression,
} from "./ast";
import { UNKNOWN_RANGE } from "./ast";
import { Scope } from "./scope";
import type { Binding, ScopeOptions } from "./scope";
import type { ScopePool } from "./scopePool";
import { construct, declareClass, declareEnum } from "./declarations";

import {
  CancelledError,
  ExecutionError,
  ImportError,
  QuillRuntimeError,
  toSourcePosition,
} from "../diagnostics/scriptErrors";
import type { ExceptionClassName, SourcePosition } from "../diagnostics/scriptErrors";
import { bindImport } from "../modules/provider";
import type { ImportProvider } from "../modules/provider";
import { builtinConstructors } from "../runtime/builtins";
import { ClassObj, EnumEntryObj, InstanceObj, QualifiedView } from "../runtime/classes";
import type { DelegateAccessKind, Member, PropertyMember } from "../runtime/classes";
import { FlowObj } from "../runtime/concurrency";
import { formatTemplate, isExceptionClass, stringify } from "../runtime/format";
import { BoundMethod, CallableObj, FunctionObj, NativeFunction, native } from "../runtime/functions";
import { positional } from "../runtime/interop";
import type { Args, HostServices, Interpreter, NativeCall } from "../runtime/interop";
import { checkIndex, describe, illegalArgument, iterableItems } from "../runtime/natives";
import {
  ASSIGN_OPERATOR_METHODS,
  OPERATOR_METHODS,
  arithmetic as builtinArithmetic,
  bitNot,
  bitwise,
  compareOrThrow,
  containsBuiltin,
  isArithmetic,
  isBitwise,
  negate,
} from "../runtime/operators";
import type { ArithmeticOperator } from "../runtime/operators";
import { classOf, isInstanceOf } from "../runtime/types";
import { CharObj, ListObj, MapEntryObj, MapObj, RangeObj, SetObj, VOID, valuesEqual } from "../runtime/values";
import type { Value } from "../runtime/values";
import type { Logger } from "../utils/logger";

/* =========================================================
   Signals
   ========================================================= */

export class BreakSignal extends Error {
  constructor(
    public readonly label: string | null,
    public readonly value: Value,
  ) {
    super("break");
  }
}

export class ContinueSignal extends Error {
  constructor(public readonly label: string | null) {
    super("continue");
  }
}

export class ReturnSignal extends Error {
  constructor(
    public readonly label: string | null,
    public readonly value: Value,
  ) {
    super("return");
  }
}

/* =========================================================
   Context
   ========================================================= */

export type EvalContext = {
  rootScope: Scope;
  host: HostServices;
  logger: Logger;
  /** null: every call allocates a fresh frame. */
  pool: ScopePool | null;
  modules: ImportProvider | null;
  signal?: AbortSignal;
};

type Reference = {
  get: () => Promise<Value>;
  set: (v: Value) => Promise<void>;
};

const COMPOUND_OPERATORS: Readonly<Record<Exclude<AssignmentOperator, "=">, ArithmeticOperator>> = {
  "+=": "+",
  "-=": "-",
  "*=": "*",
  "/=": "/",
  "%=": "%",
};

function rt(code: ExceptionClassName, message: string): QuillRuntimeError {
  return new QuillRuntimeError(code, message);
}

function assertNeverNode(node: never): never {
  throw new Error(`Unhandled node kind: ${JSON.stringify(node)}`);
}

function labelMatches(signalLabel: string | null, label: string | null): boolean {
  return signalLabel === null || signalLabel === label;
}

function reasonText(reason: unknown): string | undefined {
  if (typeof reason === "string") return reason;
  if (reason instanceof Error) return reason.message;
  return undefined;
}

export function canAccess(visibility: Member["visibility"], owner: ClassObj, context: ClassObj | null): boolean {
  switch (visibility) {
    case "public":
      return true;
    case "private":
      return context === owner;
    case "protected":
      return context !== null && context.isSubclassOf(owner);
  }
}

/* =========================================================
   Evaluator
   ========================================================= */

export class Evaluator implements Interpreter {
  public readonly host: HostServices;
  public readonly logger: Logger;
  public readonly rootScope: Scope;

  private readonly pool: ScopePool | null;
  private readonly modules: ImportProvider | null;
  private readonly signal: AbortSignal | undefined;
  private finallyDepth = 0;

  constructor(ctx: EvalContext) {
    this.host = ctx.host;
    this.logger = ctx.logger;
    this.rootScope = ctx.rootScope;
    this.pool = ctx.pool;
    this.modules = ctx.modules;
    this.signal = ctx.signal;
  }

  /* =========================================================
     Program / statements
     ========================================================= */

  /** Runs top-level statements directly in `scope`; a top-level `return` ends the program. */
  public async evaluateProgram(program: Program, scope: Scope): Promise<Value> {
    let last: Value = VOID;
    try {
      for (const node of program.body) last = await this.evaluateStatement(node, scope);
    } catch (e) {
      if (e instanceof ReturnSignal && e.label === null) return e.value;
      if (e instanceof BreakSignal || e instanceof ContinueSignal) {
        throw this.materialize(rt("IllegalStateException", `${e.message} outside of a loop`), program.range, scope);
      }
      if (e instanceof ReturnSignal) {
        throw this.materialize(rt("IllegalStateException", `no enclosing function labeled '${e.label}'`), program.range, scope);
      }
      throw e;
    }
    return last;
  }

  public async evaluateStatement(node: Expression, scope: Scope): Promise<Value> {
    this.checkCancelled();
    return this.evaluate(node, scope);
  }

  public async evaluate(node: Expression, scope: Scope): Promise<Value> {
    try {
      return await this.dispatch(node, scope);
    } catch (e) {
      if (e instanceof QuillRuntimeError) throw this.materialize(e, node.range, scope);
      throw e;
    }
  }

  private async dispatch(node: Expression, scope: Scope): Promise<Value> {
    switch (node.kind) {
      case "BlockExpression":
        return this.evalBlock(node, scope);

      case "IntLiteral":
      case "RealLiteral":
      case "StringLiteral":
      case "BooleanLiteral":
        return node.value;
      case "CharLiteral":
        return new CharObj(node.value);
      case "NullLiteral":
        return null;
      case "VoidLiteral":
        return VOID;
      case "ListLiteral":
        return this.evalList(node, scope);

      case "Identifier":
        return this.readName(node.name, scope);
      case "ThisExpression": {
        const frame = scope.receiverFrame();
        if (!frame) throw rt("IllegalStateException", "'this' is not available here");
        return frame.thisObj;
      }
      case "MemberExpression":
        return this.evalMember(node, scope);
      case "IndexExpression":
        return this.evalIndex(node, scope);
      case "CallExpression":
        return this.evalCall(node, scope);

      case "UnaryExpression":
        return this.evalUnary(node, scope);
      case "UpdateExpression":
        return this.evalUpdate(node, scope);
      case "BinaryExpression":
        return this.evalBinary(node, scope);
      case "LogicalExpression":
        return this.evalLogical(node, scope);
      case "RangeExpression":
        return this.evalRange(node, scope);
      case "TypeCheckExpression":
        return this.evalTypeCheck(node, scope);
      case "CastExpression":
        return this.evalCast(node, scope);
      case "AssignmentExpression":
        return this.evalAssignment(node, scope);
      case "PairExpression":
        return new MapEntryObj(await this.evaluate(node.key, scope), await this.evaluate(node.value, scope));

      case "LambdaExpression":
        return this.makeLambda(node, scope, null);

      case "IfExpression":
        return this.evalIf(node, scope);
      case "WhenExpression":
        return this.evalWhen(node, scope);
      case "WhileExpression":
        return this.evalWhile(node, scope);
      case "DoWhileExpression":
        return this.evalDoWhile(node, scope);
      case "ForInExpression":
        return this.evalForIn(node, scope);
      case "BreakExpression":
        throw new BreakSignal(node.label, node.value ? await this.evaluate(node.value, scope) : VOID);
      case "ContinueExpression":
        throw new ContinueSignal(node.label);
      case "ReturnExpression":
        throw new ReturnSignal(node.label, node.value ? await this.evaluate(node.value, scope) : VOID);
      case "ThrowExpression":
        throw await this.raise(await this.evaluate(node.value, scope), node.range, scope);
      case "TryExpression":
        return this.evalTry(node, scope);

      case "VariableDeclaration":
        return this.declareVariable(node, scope);
      case "FunctionDeclaration":
        return this.declareFunction(node, scope);
      case "ClassDeclaration":
        await declareClass(this, node, scope);
        return VOID;
      case "EnumDeclaration":
        await declareEnum(this, node, scope);
        return VOID;
      case "ImportDeclaration":
        return this.evalImport(node, scope);

      default:
        return assertNeverNode(node);
    }
  }

  public async evalBlock(node: BlockExpression, scope: Scope): Promise<Value> {
    return this.evalStatements(node.body, new Scope(scope));
  }

  public async evalStatements(body: Expression[], scope: Scope): Promise<Value> {
    let last: Value = VOID;
    for (const node of body) last = await this.evaluateStatement(node, scope);
    return last;
  }

  /** A body whose frame is already fresh (call, iteration): no extra block scope. */
  public async evalBody(body: Expression, scope: Scope): Promise<Value> {
    return body.kind === "BlockExpression" ? this.evalStatements(body.body, scope) : this.evaluate(body, scope);
  }

  /* =========================================================
     Names
     ========================================================= */

  public async readName(name: string, scope: Scope): Promise<Value> {
    for (let s: Scope | null = scope; s; s = s.parent) {
      const b = s.bindings.get(name);
      if (b) return this.readBinding(b, s);
      if (s.receiver && this.hasMemberNamed(s.thisObj, name)) return this.memberOf(s.thisObj, name, scope);
    }
    const imported = scope.lookupImported(name);
    if (imported) return this.readBinding(imported, scope);
    throw rt("SymbolNotFoundException", `symbol '${name}' is not defined`);
  }

  private async assignName(name: string, value: Value, scope: Scope): Promise<void> {
    for (let s: Scope | null = scope; s; s = s.parent) {
      const b = s.bindings.get(name);
      if (b) return this.writeBinding(b, value, s);
      if (s.receiver && this.hasMemberNamed(s.thisObj, name)) return this.setMember(s.thisObj, name, value, scope);
    }
    const imported = scope.lookupImported(name);
    if (imported) return this.writeBinding(imported, value, scope);
    throw rt("SymbolNotFoundException", `symbol '${name}' is not defined`);
  }

  private async readBinding(b: Binding, scope: Scope): Promise<Value> {
    if (b.delegate === null) return b.value;
    const thisRef = scope.receiverFrame()?.thisObj ?? null;
    return this.delegateRead(b.delegate, b.delegateAccess ?? "Val", thisRef, b.name);
  }

  private async writeBinding(b: Binding, value: Value, scope: Scope): Promise<void> {
    if (b.delegate !== null) {
      if (b.delegateAccess !== "Var") throw rt("IllegalAssignmentException", `val '${b.name}' cannot be reassigned`);
      const thisRef = scope.receiverFrame()?.thisObj ?? null;
      await this.delegateWrite(b.delegate, thisRef, b.name, value);
      return;
    }
    if (!b.mutable) throw rt("IllegalAssignmentException", `val '${b.name}' cannot be reassigned`);
    b.value = value;
  }

  private hasMemberNamed(target: Value, name: string): boolean {
    if (target instanceof InstanceObj) return target.cls.findMember(name) !== null;
    if (target instanceof QualifiedView) return target.instance.cls.findMember(name, target.cls) !== null;
    return classOf(target).findMember(name) !== null;
  }

  /* =========================================================
     Delegation
     ========================================================= */

  /** Runs the optional `bind(name, access, thisRef)` hook; a non-null result replaces the delegate. */
  public async bindDelegate(delegate: Value, name: string, access: DelegateAccessKind, thisRef: Value): Promise<Value> {
    if (!this.hasMethod(delegate, "bind")) return delegate;
    const replaced = await this.invokeMethod(delegate, "bind", [name, this.accessValue(access), thisRef]);
    return replaced === null || replaced === VOID ? delegate : replaced;
  }

  private accessValue(access: DelegateAccessKind): Value {
    const enumCls = this.rootScope.getLocal("DelegateAccess")?.value;
    if (enumCls instanceof ClassObj) {
      const entry = enumCls.enumEntries.find((e) => e.name === access);
      if (entry) return entry;
    }
    return access;
  }

  private async delegateRead(delegate: Value, access: DelegateAccessKind, thisRef: Value, name: string): Promise<Value> {
    if (this.hasMethod(delegate, "getValue")) return this.invokeMethod(delegate, "getValue", [thisRef, name]);
    if (access === "Callable" && this.hasMethod(delegate, "invoke")) {
      return native(name, (args) => this.invokeMethod(delegate, "invoke", [thisRef, name, ...args.positional]));
    }
    throw illegalArgument(`delegate of '${name}' has no getValue`);
  }

  private async delegateWrite(delegate: Value, thisRef: Value, name: string, value: Value): Promise<void> {
    if (!this.hasMethod(delegate, "setValue")) throw illegalArgument(`delegate of '${name}' has no setValue`);
    await this.invokeMethod(delegate, "setValue", [thisRef, name, value]);
  }

  /* =========================================================
     Members
     ========================================================= */

  private checkAccess(m: Member, scope: Scope): void {
    if (canAccess(m.visibility, m.declaringClass, scope.classContext)) return;
    throw rt("IllegalAccessException", `${m.visibility} member '${m.name}' of ${m.declaringClass.name} is not accessible here`);
  }

  private staticBinding(cls: ClassObj, name: string, scope: Scope): Binding | null {
    const b = cls.statics?.getLocal(name) ?? null;
    if (b && !canAccess(b.visibility, cls, scope.classContext)) {
      throw rt("IllegalAccessException", `${b.visibility} member '${name}' of ${cls.name} is not accessible here`);
    }
    return b;
  }

  private nativeCall(thisObj: Value, scope: Scope, range: Range): NativeCall {
    return { interp: this, thisObj, scope, range };
  }

  public async memberOf(target: Value, name: string, scope: Scope, range: Range = UNKNOWN_RANGE): Promise<Value> {
    if (target instanceof InstanceObj) return this.instanceMember(target, target.cls, name, scope, range);
    if (target instanceof QualifiedView) return this.instanceMember(target.instance, target.cls, name, scope, range);
    if (target instanceof ClassObj) {
      const b = this.staticBinding(target, name, scope);
      if (b) return this.readBinding(b, scope);
    }

    const m = classOf(target).findMember(name);
    if (m && m.kind === "native") {
      if (m.property) return m.impl(positional([]), this.nativeCall(target, scope, range));
      return new BoundMethod(target, native(name, m.impl));
    }
    if (target === null) throw rt("NullReferenceException", `cannot read '${name}' of null`);
    throw rt("SymbolNotFoundException", `${describe(target)} has no member '${name}'`);
  }

  private async instanceMember(inst: InstanceObj, start: ClassObj, name: string, scope: Scope, range: Range): Promise<Value> {
    const m = inst.cls.findMember(name, start);
    if (!m) throw rt("SymbolNotFoundException", `${inst.cls.name} has no member '${name}'`);
    this.checkAccess(m, scope);

    switch (m.kind) {
      case "field":
        return inst.fields.get(name) ?? null;
      case "property":
        return this.readProperty(inst, m);
      case "delegated":
        return this.delegateRead(inst.delegates.get(name) ?? null, m.access, inst, name);
      case "method":
        if (!m.fn) throw rt("NotImplementedException", `${m.declaringClass.name}.${name} is abstract`);
        return new BoundMethod(inst, m.fn);
      case "native":
        if (m.property) return m.impl(positional([]), this.nativeCall(inst, scope, range));
        return new BoundMethod(inst, native(name, m.impl));
    }
  }

  public async setMember(target: Value, name: string, value: Value, scope: Scope): Promise<void> {
    if (target instanceof InstanceObj || target instanceof QualifiedView) {
      const inst = target instanceof QualifiedView ? target.instance : target;
      const m = inst.cls.findMember(name, target.cls);
      if (!m) throw rt("SymbolNotFoundException", `${inst.cls.name} has no member '${name}'`);
      this.checkAccess(m, scope);

      switch (m.kind) {
        case "field":
          if (!m.mutable) throw rt("IllegalAssignmentException", `val '${name}' cannot be reassigned`);
          if (m.setterVisibility && !canAccess(m.setterVisibility, m.declaringClass, scope.classContext)) {
            throw rt("IllegalAccessException", `setter of '${name}' is ${m.setterVisibility}`);
          }
          inst.fields.set(name, value);
          return;
        case "property":
          return this.writeProperty(inst, m, value, scope);
        case "delegated":
          if (m.access !== "Var") throw rt("IllegalAssignmentException", `val '${name}' cannot be reassigned`);
          return this.delegateWrite(inst.delegates.get(name) ?? null, inst, name, value);
        default:
          throw rt("IllegalAssignmentException", `'${name}' of ${inst.cls.name} is not assignable`);
      }
    }

    if (target instanceof ClassObj) {
      const b = this.staticBinding(target, name, scope);
      if (b) return this.writeBinding(b, value, scope);
      throw rt("SymbolNotFoundException", `${target.name} has no static member '${name}'`);
    }
    if (target === null) throw rt("NullReferenceException", `cannot assign '${name}' of null`);
    throw illegalArgument(`cannot assign member '${name}' of ${describe(target)}`);
  }

  /* ---------------- properties ---------------- */

  private accessorFrame(inst: InstanceObj, m: PropertyMember): Scope {
    const frame = new Scope(m.declaringClass.statics ?? this.rootScope, { thisObj: inst, classContext: m.declaringClass });
    if (m.hasBacking) frame.define("field", inst.fields.get(m.name) ?? null, { mutable: true });
    return frame;
  }

  private async runAccessor(body: Expression, frame: Scope): Promise<Value> {
    try {
      return await this.evalBody(body, frame);
    } catch (e) {
      if (e instanceof ReturnSignal && e.label === null) return e.value;
      throw e;
    }
  }

  private async readProperty(inst: InstanceObj, m: PropertyMember): Promise<Value> {
    const getter = m.decl.getter;
    if (!getter) return inst.fields.get(m.name) ?? null;
    return this.runAccessor(getter.body, this.accessorFrame(inst, m));
  }

  private async writeProperty(inst: InstanceObj, m: PropertyMember, value: Value, scope: Scope): Promise<void> {
    if (!m.mutable) throw rt("IllegalAssignmentException", `val '${m.name}' cannot be reassigned`);
    if (m.setterVisibility && !canAccess(m.setterVisibility, m.declaringClass, scope.classContext)) {
      throw rt("IllegalAccessException", `setter of '${m.name}' is ${m.setterVisibility}`);
    }

    const setter = m.decl.setter;
    if (!setter) {
      if (!m.hasBacking) throw rt("IllegalAssignmentException", `property '${m.name}' has no setter`);
      inst.fields.set(m.name, value);
      return;
    }

    const frame = this.accessorFrame(inst, m);
    frame.define(setter.param ?? "value", value);
    await this.runAccessor(setter.body, frame);
    const backing = frame.getLocal("field");
    if (m.hasBacking && backing) inst.fields.set(m.name, backing.value);
  }

  /* =========================================================
     Calls
     ========================================================= */

  private makeLambda(node: LambdaExpression, scope: Scope, implicitLabel: string | null): FunctionObj {
    return new FunctionObj("lambda", node, scope, null, implicitLabel);
  }

  public async evalArguments(
    list: CallArgument[],
    trailing: LambdaExpression | null,
    scope: Scope,
    implicitLabel: string | null = null,
  ): Promise<Args> {
    const out: Args = { positional: [], named: new Map() };
    for (const a of list) {
      switch (a.kind) {
        case "positional":
          out.positional.push(await this.evaluate(a.value, scope));
          break;
        case "named":
          if (out.named.has(a.name)) throw illegalArgument(`argument '${a.name}' is passed twice`);
          out.named.set(a.name, await this.evaluate(a.value, scope));
          break;
        case "spread": {
          const v = await this.evaluate(a.value, scope);
          if (v instanceof MapObj) {
            for (const e of v.entries()) {
              if (typeof e.key !== "string") throw illegalArgument("spread map keys must be strings");
              out.named.set(e.key, e.value);
            }
          } else {
            out.positional.push(...iterableItems(v, "spread argument"));
          }
          break;
        }
      }
    }
    if (trailing) out.positional.push(this.makeLambda(trailing, scope, implicitLabel));
    return out;
  }

  private async evalCall(node: CallExpression, scope: Scope): Promise<Value> {
    const callee = node.callee;

    if (callee.kind === "MemberExpression") {
      const target = await this.evaluate(callee.object, scope);
      if (target === null && callee.nullSafe) return null;
      const args = await this.evalArguments(node.args, node.trailingLambda, scope, callee.name);
      return this.invokeMember(target, callee.name, args, scope, node.range);
    }

    const fn = await this.evaluate(callee, scope);
    if (fn === null && node.nullSafe) return null;
    const label = callee.kind === "Identifier" ? callee.name : null;
    const args = await this.evalArguments(node.args, node.trailingLambda, scope, label);
    return this.callValue(fn, args, scope, node.range);
  }

  public async invokeMember(target: Value, name: string, args: Args, scope: Scope, range: Range): Promise<Value> {
    if (target instanceof InstanceObj || target instanceof QualifiedView) {
      const inst = target instanceof QualifiedView ? target.instance : target;
      const m = inst.cls.findMember(name, target.cls);
      if (!m) throw rt("SymbolNotFoundException", `${inst.cls.name} has no method '${name}'`);
      this.checkAccess(m, scope);

      if (m.kind === "method") {
        if (!m.fn) throw rt("NotImplementedException", `${m.declaringClass.name}.${name} is abstract`);
        if (m.fn instanceof FunctionObj) return this.callFunction(m.fn, args, inst, range);
        return this.callValue(new BoundMethod(inst, m.fn), args, scope, range);
      }
      if (m.kind === "native" && !m.property) return this.callNative(m.impl, args, inst, scope, range);
      return this.callValue(await this.instanceMember(inst, target.cls, name, scope, range), args, scope, range);
    }

    if (target instanceof ClassObj) {
      const b = this.staticBinding(target, name, scope);
      if (b) return this.callValue(await this.readBinding(b, scope), args, scope, range);
    }

    const m = classOf(target).findMember(name);
    if (m && m.kind === "native") {
      if (!m.property) return this.callNative(m.impl, args, target, scope, range);
      return this.callValue(await m.impl(positional([]), this.nativeCall(target, scope, range)), args, scope, range);
    }
    if (target === null) throw rt("NullReferenceException", `cannot call '${name}' on null`);
    throw rt("SymbolNotFoundException", `${describe(target)} has no method '${name}'`);
  }

  private async callNative(impl: NativeFunction["impl"], args: Args, thisObj: Value, scope: Scope, range: Range): Promise<Value> {
    this.checkCancelled();
    return impl(args, this.nativeCall(thisObj, scope, range));
  }

  public async callValue(callee: Value, args: Args, scope: Scope, range: Range): Promise<Value> {
    if (callee instanceof FunctionObj) return this.callFunction(callee, args, undefined, range);
    if (callee instanceof NativeFunction) return this.callNative(callee.impl, args, null, scope, range);
    if (callee instanceof BoundMethod) {
      const fn = callee.fn;
      if (fn instanceof FunctionObj) return this.callFunction(fn, args, callee.receiver, range);
      if (fn instanceof NativeFunction) return this.callNative(fn.impl, args, callee.receiver, scope, range);
      return this.callValue(fn, args, scope, range);
    }
    if (callee instanceof ClassObj) return this.instantiate(callee, args, range);
    if (typeof callee === "string") return formatTemplate(callee, args.positional, this);
    if ((callee instanceof InstanceObj || callee instanceof QualifiedView) && this.hasMethod(callee, "invoke")) {
      return this.invokeMember(callee, "invoke", args, scope, range);
    }
    throw illegalArgument(`${describe(callee)} is not callable`);
  }

  /**
   * Calls a user function or lambda. `receiver` makes the frame a receiver
   * frame (`this`); methods also run with their class as visibility context.
   */
  public async callFunction(fn: FunctionObj, args: Args, receiver: Value | undefined, range: Range): Promise<Value> {
    this.checkCancelled();
    const body: Expression | null = fn.decl.body;
    if (body === null) throw rt("NotImplementedException", `function '${fn.name}' has no body`);

    const options: ScopeOptions = {};
    if (receiver !== undefined) options.thisObj = receiver;
    if (fn.declaringClass) options.classContext = fn.declaringClass;

    const pool = fn.poolable ? this.pool : null;
    const frame = pool ? pool.borrow(fn.closure, options) : new Scope(fn.closure, options);
    try {
      await this.bindArguments(fn, frame, args);
      return await this.evalBody(body, frame);
    } catch (e) {
      if (e instanceof ReturnSignal && labelMatches(e.label, fn.label)) return e.value;
      if (e instanceof QuillRuntimeError) throw this.materialize(e, range, frame);
      throw e;
    } finally {
      if (pool) pool.release(frame);
    }
  }

  private async bindArguments(fn: FunctionObj, frame: Scope, args: Args): Promise<void> {
    frame.args = args.positional;
    const decl = fn.decl;
    if (decl.kind === "LambdaExpression" && decl.params === null) {
      if (args.named.size > 0) throw illegalArgument("a lambda without parameters takes no named arguments");
      if (args.positional.length > 0) frame.define("it", args.positional[0]);
      return;
    }
    const params = decl.kind === "LambdaExpression" ? (decl.params ?? []) : decl.params;
    await this.bindParameters(params, args, frame, fn.name);
  }

  /** Binds arguments to declared parameters in `frame`; defaults see earlier parameters. */
  public async bindParameters(params: Parameter[], args: Args, frame: Scope, what: string): Promise<void> {
    const given = args.positional;
    const named = new Map(args.named);
    let next = 0;

    for (let i = 0; i < params.length; i++) {
      const p = params[i];

      if (p.variadic) {
        const tail = params.slice(i + 1).filter((q) => !named.has(q.name)).length;
        const end = Math.max(next, given.length - tail);
        frame.define(p.name, new ListObj(given.slice(next, end)));
        next = end;
        continue;
      }

      let value: Value;
      const byName = named.get(p.name);
      if (next < given.length) {
        if (byName !== undefined) throw illegalArgument(`argument '${p.name}' of ${what} is passed twice`);
        value = given[next++];
      } else if (byName !== undefined) {
        named.delete(p.name);
        value = byName;
      } else if (p.defaultValue) {
        value = await this.evaluate(p.defaultValue, frame);
      } else {
        throw illegalArgument(`missing argument '${p.name}' for ${what}`);
      }
      frame.define(p.name, value);
    }

    if (next < given.length) {
      throw illegalArgument(`too many arguments for ${what}: expected ${params.length}, got ${given.length}`);
    }
    for (const name of named.keys()) throw illegalArgument(`${what} has no parameter '${name}'`);
  }

  /* =========================================================
     Literals / access
     ========================================================= */

  private async evalList(node: ListLiteral, scope: Scope): Promise<Value> {
    const items: Value[] = [];
    for (const el of node.elements) {
      const v = await this.evaluate(el.value, scope);
      if (el.spread) items.push(...iterableItems(v, "spread element"));
      else items.push(v);
    }
    return new ListObj(items);
  }

  private async evalMember(node: MemberExpression, scope: Scope): Promise<Value> {
    const target = await this.evaluate(node.object, scope);
    if (target === null && node.nullSafe) return null;
    return this.memberOf(target, node.name, scope, node.range);
  }

  private async evalIndex(node: IndexExpression, scope: Scope): Promise<Value> {
    const target = await this.evaluate(node.object, scope);
    if (target === null && node.nullSafe) return null;
    const indices: Value[] = [];
    for (const i of node.indices) indices.push(await this.evaluate(i, scope));
    return this.getIndex(target, indices, scope, node.range);
  }

  private async getIndex(target: Value, indices: Value[], scope: Scope, range: Range): Promise<Value> {
    if (target instanceof InstanceObj || target instanceof QualifiedView) {
      return this.invokeMember(target, "getAt", positional(indices), scope, range);
    }
    if (indices.length !== 1) throw illegalArgument(`${describe(target)} takes exactly one index`);
    const index = indices[0];

    if (target instanceof ListObj) {
      if (index instanceof RangeObj) {
        const [lo, hi] = sliceBounds(index, target.items.length);
        return new ListObj(target.items.slice(lo, hi));
      }
      if (typeof index === "bigint") return target.items[checkIndex(index, target.items.length)];
    }
    if (typeof target === "string") {
      const chars = [...target];
      if (index instanceof RangeObj) {
        const [lo, hi] = sliceBounds(index, chars.length);
        return chars.slice(lo, hi).join("");
      }
      if (typeof index === "bigint") return new CharObj(chars[checkIndex(index, chars.length)]);
    }
    if (target instanceof MapObj) return target.get(index) ?? null;
    if (target === null) throw rt("NullReferenceException", "cannot index null");
    throw illegalArgument(`${describe(target)} cannot be indexed by ${describe(index)}`);
  }

  private async setIndex(target: Value, indices: Value[], value: Value, scope: Scope, range: Range): Promise<void> {
    if (target instanceof InstanceObj || target instanceof QualifiedView) {
      await this.invokeMember(target, "putAt", positional([...indices, value]), scope, range);
      return;
    }
    if (indices.length !== 1) throw illegalArgument(`${describe(target)} takes exactly one index`);
    const index = indices[0];

    if (target instanceof ListObj && typeof index === "bigint") {
      target.items[checkIndex(index, target.items.length)] = value;
      return;
    }
    if (target instanceof MapObj) {
      target.set(index, value);
      return;
    }
    if (target === null) throw rt("NullReferenceException", "cannot index null");
    throw illegalArgument(`${describe(target)} does not support indexed assignment`);
  }

  /* =========================================================
     Operators
     ========================================================= */

  private condition(v: Value, what: string): boolean {
    if (typeof v === "boolean") return v;
    throw illegalArgument(`${what} condition must be Bool, got ${describe(v)}`);
  }

  private async evalUnary(node: UnaryExpression, scope: Scope): Promise<Value> {
    const v = await this.evaluate(node.operand, scope);
    switch (node.operator) {
      case "-":
        if ((v instanceof InstanceObj || v instanceof QualifiedView) && this.hasMethod(v, "negate")) {
          return this.invokeMethod(v, "negate", [], node.range);
        }
        return negate(v);
      case "+":
        if (typeof v === "bigint" || typeof v === "number") return v;
        throw illegalArgument(`operator '+' is not defined for ${describe(v)}`);
      case "!":
        return !this.condition(v, "'!'");
      case "~":
        return bitNot(v);
    }
  }

  private async evalBinary(node: BinaryExpression, scope: Scope): Promise<Value> {
    const a = await this.evaluate(node.left, scope);
    const b = await this.evaluate(node.right, scope);
    return this.binary(node.operator, a, b, node.range);
  }

  public async binary(op: BinaryOperator, a: Value, b: Value, range: Range): Promise<Value> {
    switch (op) {
      case "==":
        return this.equals(a, b);
      case "!=":
        return !(await this.equals(a, b));
      case "===":
        return a === b;
      case "!==":
        return a !== b;
      case "<":
        return (await this.compare(a, b, range)) < 0;
      case "<=":
        return (await this.compare(a, b, range)) <= 0;
      case ">":
        return (await this.compare(a, b, range)) > 0;
      case ">=":
        return (await this.compare(a, b, range)) >= 0;
      case "<=>":
        return BigInt(await this.compare(a, b, range));
      case "in":
        return this.contains(b, a, range);
      case "!in":
        return !(await this.contains(b, a, range));
      default:
        if (isBitwise(op)) return bitwise(op, a, b);
        if (isArithmetic(op)) return this.arithmetic(op, a, b, range);
        throw illegalArgument(`unknown operator '${op}'`);
    }
  }

  private async contains(container: Value, item: Value, range: Range): Promise<boolean> {
    if ((container instanceof InstanceObj || container instanceof QualifiedView) && this.hasMethod(container, "contains")) {
      return (await this.invokeMethod(container, "contains", [item], range)) === true;
    }
    const r = containsBuiltin(container, item);
    if (r === null) throw illegalArgument(`operator 'in' is not defined for ${describe(container)}`);
    return r;
  }

  private async evalLogical(node: LogicalExpression, scope: Scope): Promise<Value> {
    const left = await this.evaluate(node.left, scope);
    switch (node.operator) {
      case "&&":
        if (!this.condition(left, "'&&'")) return false;
        return this.condition(await this.evaluate(node.right, scope), "'&&'");
      case "||":
        if (this.condition(left, "'||'")) return true;
        return this.condition(await this.evaluate(node.right, scope), "'||'");
      case "?:":
        return left !== null ? left : this.evaluate(node.right, scope);
    }
  }

  private async evalRange(node: RangeExpression, scope: Scope): Promise<Value> {
    const start = node.start ? await this.evaluate(node.start, scope) : null;
    const end = node.end ? await this.evaluate(node.end, scope) : null;
    for (const bound of [start, end]) {
      if (bound !== null && typeof bound !== "bigint" && typeof bound !== "number" && !(bound instanceof CharObj)) {
        throw illegalArgument(`range bounds must be numbers or chars, got ${describe(bound)}`);
      }
    }
    return new RangeObj(start, end, node.inclusive);
  }

  private expectClass(v: Value): ClassObj {
    if (v instanceof ClassObj) return v;
    if (v instanceof InstanceObj && v.cls.kind === "object") return v.cls;
    throw illegalArgument(`${describe(v)} is not a class`);
  }

  private async evalTypeCheck(node: TypeCheckExpression, scope: Scope): Promise<Value> {
    const v = await this.evaluate(node.value, scope);
    const cls = this.expectClass(await this.evaluate(node.type, scope));
    return isInstanceOf(v, cls) !== node.negated;
  }

  private async evalCast(node: CastExpression, scope: Scope): Promise<Value> {
    const v = await this.evaluate(node.value, scope);
    const cls = this.expectClass(await this.evaluate(node.type, scope));
    if (!isInstanceOf(v, cls)) {
      if (node.safe) return null;
      throw rt("ClassCastException", `${describe(v)} cannot be cast to ${cls.name}`);
    }
    const inst = v instanceof QualifiedView ? v.instance : v;
    if (inst instanceof InstanceObj && !cls.isBuiltin && cls !== inst.cls) return new QualifiedView(inst, cls);
    return inst;
  }

  /* =========================================================
     Assignment
     ========================================================= */

  private async reference(target: Expression, scope: Scope): Promise<Reference> {
    switch (target.kind) {
      case "Identifier": {
        const name = target.name;
        return {
          get: () => this.readName(name, scope),
          set: (v) => this.assignName(name, v, scope),
        };
      }
      case "MemberExpression": {
        const name = target.name;
        const range = target.range;
        const obj = await this.evaluate(target.object, scope);
        if (obj === null && target.nullSafe) return { get: async () => null, set: async () => undefined };
        return {
          get: () => this.memberOf(obj, name, scope, range),
          set: (v) => this.setMember(obj, name, v, scope),
        };
      }
      case "IndexExpression": {
        const range = target.range;
        const obj = await this.evaluate(target.object, scope);
        if (obj === null && target.nullSafe) return { get: async () => null, set: async () => undefined };
        const indices: Value[] = [];
        for (const i of target.indices) indices.push(await this.evaluate(i, scope));
        return {
          get: () => this.getIndex(obj, indices, scope, range),
          set: (v) => this.setIndex(obj, indices, v, scope, range),
        };
      }
      default:
        throw illegalArgument(`cannot assign to ${target.kind}`);
    }
  }

  private async evalAssignment(node: AssignmentExpression, scope: Scope): Promise<Value> {
    const ref = await this.reference(node.target, scope);

    if (node.operator === "=") {
      const v = await this.evaluate(node.value, scope);
      await ref.set(v);
      return v;
    }

    const op = COMPOUND_OPERATORS[node.operator];
    const current = await ref.get();
    const rhs = await this.evaluate(node.value, scope);

    if ((current instanceof InstanceObj || current instanceof QualifiedView) && this.hasMethod(current, ASSIGN_OPERATOR_METHODS[op])) {
      await this.invokeMethod(current, ASSIGN_OPERATOR_METHODS[op], [rhs], node.range);
      return current;
    }
    if (op === "+" && current instanceof ListObj) {
      if (rhs instanceof ListObj) current.items.push(...rhs.items);
      else current.items.push(rhs);
      return current;
    }
    if (op === "+" && current instanceof SetObj) {
      for (const v of rhs instanceof SetObj || rhs instanceof ListObj ? iterableItems(rhs, "+=") : [rhs]) current.add(v);
      return current;
    }

    const next = await this.arithmetic(op, current, rhs, node.range);
    await ref.set(next);
    return next;
  }

  private async evalUpdate(node: UpdateExpression, scope: Scope): Promise<Value> {
    const ref = await this.reference(node.target, scope);
    const old = await ref.get();
    const next = await this.arithmetic(node.operator === "++" ? "+" : "-", old, 1n, node.range);
    await ref.set(next);
    return node.prefix ? next : old;
  }

  /* =========================================================
     Control flow
     ========================================================= */

  private async evalIf(node: IfExpression, scope: Scope): Promise<Value> {
    if (this.condition(await this.evaluate(node.test, scope), "if")) return this.evaluate(node.consequent, scope);
    return node.alternate ? this.evaluate(node.alternate, scope) : VOID;
  }

  private async evalWhen(node: WhenExpression, scope: Scope): Promise<Value> {
    const hasSubject = node.subject !== null;
    const subject = node.subject ? await this.evaluate(node.subject, scope) : null;

    for (const branch of node.branches) {
      for (const cond of branch.conditions) {
        if (await this.matchWhen(cond, hasSubject, subject, scope)) return this.evaluate(branch.body, scope);
      }
    }
    return node.elseBranch ? this.evaluate(node.elseBranch, scope) : VOID;
  }

  private async matchWhen(cond: WhenCondition, hasSubject: boolean, subject: Value, scope: Scope): Promise<boolean> {
    switch (cond.kind) {
      case "value": {
        const v = await this.evaluate(cond.value, scope);
        return hasSubject ? this.equals(subject, v) : this.condition(v, "when");
      }
      case "in": {
        if (!hasSubject) throw illegalArgument("'in' conditions need a when subject");
        const container = await this.evaluate(cond.value, scope);
        return (await this.contains(container, subject, cond.value.range)) !== cond.negated;
      }
      case "is": {
        if (!hasSubject) throw illegalArgument("'is' conditions need a when subject");
        const cls = this.expectClass(await this.evaluate(cond.type, scope));
        return isInstanceOf(subject, cls) !== cond.negated;
      }
    }
  }

  // Loop result: break value, else the `else` result, else the last
  // iteration's value, else void.

  private async evalWhile(node: WhileExpression, scope: Scope): Promise<Value> {
    let last: Value = VOID;
    try {
      for (;;) {
        this.checkCancelled();
        if (!this.condition(await this.evaluate(node.test, scope), "while")) break;
        const iteration = new Scope(scope);
        try {
          last = await this.evalBody(node.body, iteration);
        } catch (e) {
          if (e instanceof ContinueSignal && labelMatches(e.label, node.label)) continue;
          throw e;
        }
      }
    } catch (e) {
      if (e instanceof BreakSignal && labelMatches(e.label, node.label)) return e.value;
      throw e;
    }
    return node.elseBody ? this.evaluate(node.elseBody, scope) : last;
  }

  private async evalDoWhile(node: DoWhileExpression, scope: Scope): Promise<Value> {
    let last: Value = VOID;
    try {
      for (;;) {
        this.checkCancelled();
        const iteration = new Scope(scope);
        try {
          last = await this.evalBody(node.body, iteration);
        } catch (e) {
          if (!(e instanceof ContinueSignal && labelMatches(e.label, node.label))) throw e;
        }
        if (!this.condition(await this.evaluate(node.test, iteration), "do-while")) break;
      }
    } catch (e) {
      if (e instanceof BreakSignal && labelMatches(e.label, node.label)) return e.value;
      throw e;
    }
    return node.elseBody ? this.evaluate(node.elseBody, scope) : last;
  }

  private async evalForIn(node: ForInExpression, scope: Scope): Promise<Value> {
    const iterable = await this.evaluate(node.iterable, scope);
    let last: Value = VOID;
    try {
      await this.iterate(iterable, async (item) => {
        this.checkCancelled();
        const iteration = new Scope(scope);
        iteration.define(node.variable, item);
        try {
          last = await this.evalBody(node.body, iteration);
        } catch (e) {
          if (e instanceof ContinueSignal && labelMatches(e.label, node.label)) return;
          throw e;
        }
      });
    } catch (e) {
      if (e instanceof BreakSignal && labelMatches(e.label, node.label)) return e.value;
      throw e;
    }
    return node.elseBody ? this.evaluate(node.elseBody, scope) : last;
  }

  /** Feeds each element of `v` to `each`, in order; flows are collected. */
  public async iterate(v: Value, each: (item: Value) => Promise<void>): Promise<void> {
    if (v instanceof ListObj) {
      for (let i = 0; i < v.items.length; i++) await each(v.items[i]);
      return;
    }
    if (v instanceof RangeObj) {
      if (!v.isIterable) throw illegalArgument(`cannot iterate over ${describe(v)} ${await this.stringify(v)}`);
      for (const x of v.iterate()) await each(x);
      return;
    }
    if (v instanceof FlowObj) {
      await v.collect(each);
      return;
    }
    if (v instanceof InstanceObj || v instanceof QualifiedView) {
      if (!this.hasMethod(v, "iterator")) throw illegalArgument(`${describe(v)} is not iterable`);
      const it = await this.invokeMethod(v, "iterator", []);
      while ((await this.invokeMethod(it, "hasNext", [])) === true) await each(await this.invokeMethod(it, "next", []));
      return;
    }
    for (const item of iterableItems(v, "for")) await each(item);
  }

  private async evalTry(node: TryExpression, scope: Scope): Promise<Value> {
    try {
      return await this.evalBlock(node.body, scope);
    } catch (e) {
      const thrown = this.catchable(e, node.range, scope);
      if (!thrown) throw e;
      const clause = await this.findCatch(node.catches, thrown.errorObject, scope);
      if (!clause) throw thrown;
      const handler = new Scope(scope);
      handler.define(clause.name ?? "it", thrown.errorObject);
      return await this.evalStatements(clause.body.body, handler);
    } finally {
      if (node.finalizer) {
        this.finallyDepth++;
        try {
          await this.evalBlock(node.finalizer, scope);
        } finally {
          this.finallyDepth--;
        }
      }
    }
  }

  private catchable(e: unknown, range: Range, scope: Scope): ExecutionError | null {
    if (e instanceof ExecutionError) return e;
    if (e instanceof QuillRuntimeError) return this.materialize(e, range, scope);
    return null;
  }

  private async findCatch(clauses: CatchClause[], exc: InstanceObj, scope: Scope): Promise<CatchClause | null> {
    for (const clause of clauses) {
      if (clause.types.length === 0) return clause;
      for (const t of clause.types) {
        if (isInstanceOf(exc, this.expectClass(await this.evaluate(t, scope)))) return clause;
      }
    }
    return null;
  }

  /* =========================================================
     Exceptions
     ========================================================= */

  private position(scope: Scope, range: Range): SourcePosition {
    return toSourcePosition(scope.fileName, range.start);
  }

  public makeException(className: string, message: string): InstanceObj {
    const cls = this.rootScope.getLocal(className)?.value;
    if (!(cls instanceof ClassObj)) throw new Error(`exception class ${className} is not installed`);
    const inst = new InstanceObj(cls);
    inst.fields.set("message", message);
    return inst;
  }

  public materialize(e: QuillRuntimeError, range: Range, scope: Scope): ExecutionError {
    const inst = this.makeException(e.code, e.message);
    return new ExecutionError(inst, e.code, e.message, this.position(scope, e.range ?? range));
  }

  /** The ExecutionError for `throw v`. */
  private async raise(v: Value, range: Range, scope: Scope): Promise<ExecutionError> {
    let inst: InstanceObj;
    if (typeof v === "string") {
      inst = this.makeException("Exception", v);
    } else if (v instanceof InstanceObj && isExceptionClass(v.cls, this)) {
      inst = v;
    } else if (v instanceof ClassObj && isExceptionClass(v, this)) {
      inst = await construct(this, v, positional([]), range);
    } else {
      throw illegalArgument(`only exceptions can be thrown, got ${describe(v)}`);
    }
    const message = inst.fields.get("message") ?? null;
    const detail = message === null ? "" : await this.stringify(message);
    return new ExecutionError(inst, inst.cls.name, detail, this.position(scope, range));
  }

  /* =========================================================
     Declarations
     ========================================================= */

  public async declareVariable(node: VariableDeclaration, scope: Scope): Promise<Value> {
    if (node.getter || node.setter) throw illegalArgument(`accessors of '${node.name}' need an enclosing class`);
    const options = { mutable: node.mutable, visibility: node.modifiers.visibility, transient: node.transient };

    if (node.delegate) {
      const access: DelegateAccessKind = node.mutable ? "Var" : "Val";
      const thisRef = scope.receiverFrame()?.thisObj ?? null;
      const delegate = await this.bindDelegate(await this.evaluate(node.delegate, scope), node.name, access, thisRef);
      scope.define(node.name, null, { ...options, delegate, delegateAccess: access });
      return VOID;
    }

    const value = node.initializer ? await this.evaluate(node.initializer, scope) : null;
    scope.define(node.name, value, options);
    return VOID;
  }

  public async declareFunction(node: FunctionDeclaration, scope: Scope): Promise<Value> {
    const visibility = node.modifiers.visibility;
    if (node.delegate) {
      const thisRef = scope.receiverFrame()?.thisObj ?? null;
      const delegate = await this.bindDelegate(await this.evaluate(node.delegate, scope), node.name, "Callable", thisRef);
      scope.define(node.name, null, { visibility, delegate, delegateAccess: "Callable" });
      return VOID;
    }
    scope.define(node.name, new FunctionObj(node.name, node, scope), { visibility });
    return VOID;
  }

  private async evalImport(node: ImportDeclaration, scope: Scope): Promise<Value> {
    const pos = this.position(scope, node.range);
    if (!this.modules) throw new ImportError(pos, node.packageName, `no module registry to import '${node.packageName}' from`);
    const module = await this.modules.importModule(node.packageName, pos, scope);
    bindImport(scope, module, node.symbols, this.modules.security, pos);
    return VOID;
  }

  /* =========================================================
     Interpreter surface (natives, codec, host modules)
     ========================================================= */

  public call(callee: Value, args: Args, range?: Range): Promise<Value> {
    return this.callValue(callee, args, this.rootScope, range ?? UNKNOWN_RANGE);
  }

  public callPositional(callee: Value, args: Value[], range?: Range): Promise<Value> {
    return this.call(callee, positional(args), range);
  }

  public callWithReceiver(callee: Value, receiver: Value, args: Value[], range?: Range): Promise<Value> {
    if (callee instanceof FunctionObj) return this.callFunction(callee, positional(args), receiver, range ?? UNKNOWN_RANGE);
    return this.callPositional(callee, args, range);
  }

  public getMember(target: Value, name: string, range?: Range): Promise<Value> {
    return this.memberOf(target, name, this.rootScope, range);
  }

  public invokeMethod(target: Value, name: string, args: Value[], range?: Range): Promise<Value> {
    return this.invokeMember(target, name, positional(args), this.rootScope, range ?? UNKNOWN_RANGE);
  }

  public hasMethod(target: Value, name: string): boolean {
    if (target instanceof InstanceObj || target instanceof QualifiedView) {
      const inst = target instanceof QualifiedView ? target.instance : target;
      const m = inst.cls.findMember(name, target.cls);
      if (!m) return false;
      return (
        (m.kind === "method" && m.fn !== null) ||
        (m.kind === "native" && !m.property) ||
        (m.kind === "delegated" && m.access === "Callable")
      );
    }
    if (target instanceof ClassObj && target.statics?.getLocal(name)?.value instanceof CallableObj) return true;
    const m = classOf(target).findMember(name);
    return m !== null && m.kind === "native" && !m.property;
  }

  public async instantiate(cls: ClassObj, args: Args, range?: Range): Promise<Value> {
    if (cls.isBuiltin) {
      const ctor = builtinConstructors.get(cls);
      if (!ctor) throw illegalArgument(`${cls.name} cannot be instantiated`);
      return ctor(args, this.nativeCall(null, this.rootScope, range ?? UNKNOWN_RANGE));
    }
    return construct(this, cls, args, range ?? UNKNOWN_RANGE);
  }

  public stringify(v: Value): Promise<string> {
    return stringify(v, this);
  }

  public async equals(a: Value, b: Value): Promise<boolean> {
    const x = a instanceof QualifiedView ? a.instance : a;
    if (x instanceof InstanceObj && x.cls.hasUserMethod("equals")) {
      return (await this.invokeMethod(x, "equals", [b])) === true;
    }
    return valuesEqual(x, b instanceof QualifiedView ? b.instance : b);
  }

  public async compare(a: Value, b: Value, range?: Range): Promise<number> {
    const x = a instanceof QualifiedView ? a.instance : a;
    if (x instanceof InstanceObj && x.cls.hasUserMethod("compareTo")) {
      const r = await this.invokeMethod(x, "compareTo", [b], range);
      if (typeof r === "bigint") return r < 0n ? -1 : r > 0n ? 1 : 0;
      if (typeof r === "number") return Math.sign(r);
      throw illegalArgument(`${x.cls.name}.compareTo must return a number, got ${describe(r)}`);
    }
    return compareOrThrow(a, b);
  }

  public async arithmetic(op: ArithmeticOperator, a: Value, b: Value, range?: Range): Promise<Value> {
    const method = OPERATOR_METHODS[op];
    if ((a instanceof InstanceObj || a instanceof QualifiedView) && this.hasMethod(a, method)) {
      return this.invokeMethod(a, method, [b], range);
    }
    if (op === "+" && typeof a === "string") return a + (await this.stringify(b));
    return builtinArithmetic(op, a, b);
  }

  public checkCancelled(): void {
    const signal = this.signal;
    if (this.finallyDepth === 0 && signal?.aborted) throw new CancelledError(reasonText(signal.reason));
  }

  public async sleep(ms: number): Promise<void> {
    const signal = this.signal;
    if (!signal) return this.host.sleep(ms);
    let wake = (): void => undefined;
    const aborted = new Promise<void>((resolve) => {
      wake = resolve;
      signal.addEventListener("abort", wake, { once: true });
    });
    try {
      await Promise.race([this.host.sleep(ms, signal), aborted]);
    } finally {
      signal.removeEventListener("abort", wake);
    }
  }

  /** Enum entry by name, for the codec. */
  public enumEntry(cls: ClassObj, name: string): EnumEntryObj | null {
    return cls.enumEntries.find((e) => e.name === name) ?? null;
  }
}

/** [from, to) indices of `range` over a sequence of `size` elements. */
function sliceBounds(range: RangeObj, size: number): [number, number] {
  const num = (v: Value, fallback: number): number => {
    if (v === null) return fallback;
    if (typeof v === "bigint") return Number(v);
    throw illegalArgument(`slice bounds must be Int, got ${describe(v)}`);
  };
  const lo = num(range.start, 0);
  const hi = range.end === null ? size : num(range.end, size) + (range.inclusive ? 1 : 0);
  if (lo < 0 || hi > size || lo > hi) {
    throw new QuillRuntimeError("IndexOutOfBoundsException", `slice ${lo}..<${hi} out of bounds for size ${size}`);
  }
  return [lo, hi];
}
