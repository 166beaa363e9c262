// src/core/scope.ts
//
// Quill Scopes (execution frames)
// -------------------------------
// A scope is one lexical binding frame. Frames form a parent chain used for
// name resolution and closures: a child references its parent but never owns
// or copies it, so a closure that mutates an enclosing `var` mutates the one
// binding every other reader sees.
//
// Frame kinds are distinguished by flags rather than subclasses:
//   - receiver frames carry `thisObj` (method and constructor bodies)
//   - `classContext` names the class whose private/protected members the code
//     running in the frame may touch
//   - ModuleScope additionally owns the package name and its import list
//
// Invariant: the parent chain is acyclic. Constructing or re-parenting a frame
// onto a chain that already contains it throws ScopeCycleError.

import type { Visibility } from "./ast";
import type { Value } from "../runtime/values";
import type { ClassObj, DelegateAccessKind } from "../runtime/classes";
import { QuillRuntimeError, ScopeCycleError } from "../diagnostics/scriptErrors";

/* =========================================================
   Bindings
   ========================================================= */

export type Binding = {
  name: string;
  value: Value;
  mutable: boolean;
  visibility: Visibility;
  transient: boolean;
  /** `val x by d`: reads and writes forward to this delegate object. */
  delegate: Value | null;
  delegateAccess: DelegateAccessKind | null;
  declaringClass: ClassObj | null;
};

export type BindingOptions = {
  mutable?: boolean;
  visibility?: Visibility;
  transient?: boolean;
  delegate?: Value | null;
  delegateAccess?: DelegateAccessKind | null;
  declaringClass?: ClassObj | null;
};

export type ImportedScope = {
  scope: ModuleScope;
  /** null: every public binding of the module. */
  symbols: ReadonlySet<string> | null;
};

export type ScopeOptions = {
  args?: Value[];
  /** Marks a receiver frame. */
  thisObj?: Value;
  classContext?: ClassObj | null;
  fileName?: string;
};

let nextFrameId = 1;

/** Strictly increasing across the process; every borrow gets a fresh id. */
export function allocateFrameId(): number {
  return nextFrameId++;
}

/* =========================================================
   Scope
   ========================================================= */

export class Scope {
  public parent: Scope | null = null;
  public readonly bindings = new Map<string, Binding>();
  public args: Value[] = [];
  public thisObj: Value = null;
  public receiver = false;
  public classContext: ClassObj | null = null;
  public fileName = "<eval>";
  public readonly imports: ImportedScope[] = [];
  public frameId = 0;

  constructor(parent: Scope | null, options: ScopeOptions = {}) {
    this.attach(parent, options);
  }

  /** (Re)initializes the frame for a new parent; used by the pool. */
  public attach(parent: Scope | null, options: ScopeOptions = {}): void {
    if (parent && (parent === this || parent.hasAncestor(this))) {
      throw new ScopeCycleError(this.frameId);
    }

    this.parent = parent;
    this.args = options.args ?? [];
    this.receiver = options.thisObj !== undefined;
    this.thisObj = options.thisObj ?? null;
    this.classContext = options.classContext !== undefined ? options.classContext : (parent?.classContext ?? null);
    this.fileName = options.fileName ?? parent?.fileName ?? "<eval>";
    this.frameId = allocateFrameId();
  }

  /** Drops every binding and link so the frame holds no references. */
  public clear(): void {
    this.bindings.clear();
    this.imports.length = 0;
    this.args = [];
    this.thisObj = null;
    this.receiver = false;
    this.classContext = null;
    this.parent = null;
  }

  public hasAncestor(candidate: Scope): boolean {
    for (let s = this.parent; s; s = s.parent) {
      if (s === candidate) return true;
    }
    return false;
  }

  /* =========================================================
     Definition / lookup
     ========================================================= */

  public define(name: string, value: Value, options: BindingOptions = {}): Binding {
    if (this.bindings.has(name)) {
      throw new QuillRuntimeError("IllegalArgumentException", `'${name}' is already defined in this scope`);
    }
    return this.put(name, value, options);
  }

  /** Like define, but replaces an existing local binding. */
  public put(name: string, value: Value, options: BindingOptions = {}): Binding {
    const binding: Binding = {
      name,
      value,
      mutable: options.mutable ?? false,
      visibility: options.visibility ?? "public",
      transient: options.transient ?? false,
      delegate: options.delegate ?? null,
      delegateAccess: options.delegateAccess ?? null,
      declaringClass: options.declaringClass ?? null,
    };
    this.bindings.set(name, binding);
    return binding;
  }

  public getLocal(name: string): Binding | null {
    return this.bindings.get(name) ?? null;
  }

  /** Parent chain first, then imported module scopes (transitively). */
  public lookup(name: string): Binding | null {
    for (let s: Scope | null = this; s; s = s.parent) {
      const b = s.bindings.get(name);
      if (b) return b;
    }
    return this.lookupImported(name);
  }

  public lookupImported(name: string, visited: Set<Scope> = new Set()): Binding | null {
    for (let s: Scope | null = this; s; s = s.parent) {
      for (const imp of s.imports) {
        if (visited.has(imp.scope)) continue;
        visited.add(imp.scope);
        if (imp.symbols && !imp.symbols.has(name)) continue;

        const b = imp.scope.getLocal(name);
        if (b && b.visibility === "public") return b;
        if (imp.symbols) continue;

        const nested = imp.scope.lookupImported(name, visited);
        if (nested) return nested;
      }
    }
    return null;
  }

  /** Nearest receiver frame, if any. */
  public receiverFrame(): Scope | null {
    for (let s: Scope | null = this; s; s = s.parent) {
      if (s.receiver) return s;
    }
    return null;
  }

  public moduleScope(): ModuleScope | null {
    for (let s: Scope | null = this; s; s = s.parent) {
      if (s instanceof ModuleScope) return s;
    }
    return null;
  }

  public root(): Scope {
    let s: Scope = this;
    while (s.parent) s = s.parent;
    return s;
  }

  public depth(): number {
    let n = 0;
    for (let s = this.parent; s; s = s.parent) n++;
    return n;
  }
}

/* =========================================================
   Module scope
   ========================================================= */

export class ModuleScope extends Scope {
  /** Packages whose builds led here, this one last; empty once built. */
  public buildChain: readonly string[] = [];

  constructor(
    public readonly packageName: string,
    root: Scope,
  ) {
    super(root, { fileName: packageName });
  }

  /** Public bindings, in definition order. */
  public exportedNames(): string[] {
    return [...this.bindings.values()].filter((b) => b.visibility === "public").map((b) => b.name);
  }
}
