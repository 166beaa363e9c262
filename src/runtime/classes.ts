// src/runtime/classes.ts
//
// Quill class model
// -----------------
// ClassObj is the immutable (after declaration) descriptor of a class: its
// bases, its linearization, constructor parameters and the members its own
// body declares. Instances hold a reference to the descriptor and a field
// table; member lookup walks the linearization in order and the first class
// declaring the name wins.
//
// Linearization is C3: the class, then the merge of each base's own
// linearization with the explicit base list, picking at each step the first
// head that appears in no other list's tail.
//
// Built-in kinds (Int, String, List, ...) are also ClassObj descriptors, with
// native members only, so `typeOf`, `is` and member lookup treat them
// uniformly.

import type {
  ClassDeclaration,
  EnumDeclaration,
  FunctionDeclaration,
  Parameter,
  VariableDeclaration,
  Visibility,
} from "../core/ast";
import type { Scope } from "../core/scope";
import type { CallableObj } from "./functions";
import type { NativeImpl } from "./interop";
import { Obj, keyOf, valuesEqual } from "./values";
import type { Value } from "./values";

/* =========================================================
   Members
   ========================================================= */

type MemberBase = {
  name: string;
  visibility: Visibility;
  declaringClass: ClassObj;
};

/** Stored per instance: constructor fields and body `val`/`var`. */
export type FieldMember = MemberBase & {
  kind: "field";
  mutable: boolean;
  transient: boolean;
  /** null for constructor-header fields. */
  decl: VariableDeclaration | null;
  setterVisibility: Visibility | null;
};

export type MethodMember = MemberBase & {
  kind: "method";
  /** null when abstract. */
  fn: CallableObj | null;
  decl: FunctionDeclaration | null;
  isOverride: boolean;
};

/** `val x get() = ...`, `var y get() ... set(v) ...`; may keep a backing slot. */
export type PropertyMember = MemberBase & {
  kind: "property";
  decl: VariableDeclaration;
  mutable: boolean;
  setterVisibility: Visibility | null;
  hasBacking: boolean;
  transient: boolean;
};

export type DelegateAccessKind = "Val" | "Var" | "Callable";

/** `val x by d`, `var x by d`, `fun f by d`: the delegate is stored per instance. */
export type DelegatedMember = MemberBase & {
  kind: "delegated";
  decl: VariableDeclaration | FunctionDeclaration;
  access: DelegateAccessKind;
};

export type NativeMember = MemberBase & {
  kind: "native";
  impl: NativeImpl;
  /** Read as a property (`list.size`) rather than called. */
  property: boolean;
};

export type Member = FieldMember | MethodMember | PropertyMember | DelegatedMember | NativeMember;

/** Methods every class may define without `override`. */
export const IMPLICIT_OVERRIDES: ReadonlySet<string> = new Set(["toString", "equals", "compareTo", "contains", "hashCode"]);

/* =========================================================
   Class descriptor
   ========================================================= */

export type ClassKind = "class" | "object" | "enum" | "builtin";

export class ClassObj extends Obj {
  public readonly typeName = "Class";

  public readonly bases: ClassObj[];
  public readonly mro: ClassObj[];
  public readonly members = new Map<string, Member>();
  public readonly constructorParams: Parameter[];
  /** Static members, nested classes, enum entries, object singletons. */
  public statics: Scope | null = null;
  public readonly enumEntries: EnumEntryObj[] = [];
  /** Singleton for `object` declarations, set once constructed. */
  public singleton: InstanceObj | null = null;

  constructor(
    public readonly name: string,
    bases: ClassObj[],
    public readonly kind: ClassKind,
    public readonly decl: ClassDeclaration | EnumDeclaration | null = null,
    /** Scope the declaration was evaluated in; bodies close over it. */
    public readonly declScope: Scope | null = null,
  ) {
    super();
    this.bases = bases;
    this.mro = linearize(this, bases);
    this.constructorParams = decl && decl.kind === "ClassDeclaration" ? (decl.constructorParams ?? []) : [];
  }

  public get isBuiltin(): boolean {
    return this.kind === "builtin";
  }

  public isSubclassOf(other: ClassObj): boolean {
    return this.mro.includes(other);
  }

  /** First member named `name` along the linearization, starting at `from`. */
  public findMember(name: string, from?: ClassObj): Member | null {
    const start = from ? this.mro.indexOf(from) : 0;
    if (start < 0) return null;
    for (let i = start; i < this.mro.length; i++) {
      const m = this.mro[i].members.get(name);
      if (m) return m;
    }
    return null;
  }

  /** True when a user-declared (non-native) member overrides `name`. */
  public hasUserMethod(name: string): boolean {
    const m = this.findMember(name);
    return !!m && m.kind === "method" && m.fn !== null;
  }

  public abstractMembers(): string[] {
    const out: string[] = [];
    const seen = new Set<string>();
    for (const c of this.mro) {
      for (const m of c.members.values()) {
        if (seen.has(m.name)) continue;
        seen.add(m.name);
        if (m.kind === "method" && m.fn === null) out.push(m.name);
      }
    }
    return out;
  }

  /**
   * Field names stored by the codec: non-transient constructor parameters of
   * this class first, then every other non-transient stored field, bases
   * before derived classes, each in declaration order.
   */
  public serialLayout(): { ctor: string[]; body: string[] } {
    const ctor = this.constructorParams.filter((p) => !p.transient && !p.variadic).map((p) => p.name);
    const seen = new Set<string>(this.constructorParams.map((p) => p.name));
    const body: string[] = [];

    for (const c of [...this.mro].reverse()) {
      for (const m of c.members.values()) {
        if (seen.has(m.name)) continue;
        const stored = (m.kind === "field" && !m.transient) || (m.kind === "property" && m.hasBacking && !m.transient);
        if (!stored) continue;
        seen.add(m.name);
        body.push(m.name);
      }
    }
    return { ctor, body };
  }

  public keyOf(): string {
    return `C${this.name}#${super.keyOf()}`;
  }
}

/* =========================================================
   Instances
   ========================================================= */

export class InstanceObj extends Obj {
  public readonly fields = new Map<string, Value>();
  /** Per-instance delegate objects of delegated members. */
  public readonly delegates = new Map<string, Value>();

  constructor(public readonly cls: ClassObj) {
    super();
  }

  public get typeName(): string {
    return this.cls.name;
  }

  /** Fields compared by structural equality: declared, non-transient. */
  public comparableFields(): [string, Value][] {
    const out: [string, Value][] = [];
    for (const [name, value] of this.fields) {
      const m = this.cls.findMember(name);
      if (m && (m.kind === "field" || m.kind === "property") && m.transient) continue;
      out.push([name, value]);
    }
    return out;
  }

  public keyOf(): string {
    if (this.cls.hasUserMethod("equals")) return super.keyOf();
    return `I${this.cls.name}#${this.cls.keyOf()}(${this.comparableFields()
      .map(([k, v]) => `${k}=${keyOf(v)}`)
      .join(",")})`;
  }

  public equalsValue(other: Value): boolean {
    if (other === this) return true;
    if (!(other instanceof InstanceObj) || other.cls !== this.cls) return false;
    const mine = this.comparableFields();
    const theirs = new Map(other.comparableFields());
    if (mine.length !== theirs.size) return false;
    return mine.every(([k, v]) => {
      const o = theirs.get(k);
      return o !== undefined && valuesEqual(v, o);
    });
  }
}

export class EnumEntryObj extends Obj {
  constructor(
    public readonly cls: ClassObj,
    public readonly name: string,
    public readonly ordinal: number,
  ) {
    super();
  }

  public get typeName(): string {
    return this.cls.name;
  }
}

/** `obj as C`: member lookup on the instance starts at C. */
export class QualifiedView extends Obj {
  constructor(
    public readonly instance: InstanceObj,
    public readonly cls: ClassObj,
  ) {
    super();
  }

  public get typeName(): string {
    return this.cls.name;
  }

  public equalsValue(other: Value): boolean {
    return other instanceof QualifiedView ? other.instance === this.instance : other === this.instance;
  }
}

/* =========================================================
   C3 linearization
   ========================================================= */

export class LinearizationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "LinearizationError";
  }
}

export function linearize(cls: ClassObj, bases: ClassObj[]): ClassObj[] {
  for (let i = 0; i < bases.length; i++) {
    if (bases.indexOf(bases[i]) !== i) {
      throw new LinearizationError(`class ${cls.name} lists base ${bases[i].name} more than once`);
    }
  }

  const sequences: ClassObj[][] = [...bases.map((b) => [...b.mro]), [...bases]].filter((s) => s.length > 0);
  const result: ClassObj[] = [cls];

  while (sequences.length > 0) {
    let head: ClassObj | null = null;
    for (const seq of sequences) {
      const candidate = seq[0];
      const inTail = sequences.some((s) => s.indexOf(candidate) > 0);
      if (!inTail) {
        head = candidate;
        break;
      }
    }

    if (!head) {
      const heads = sequences.map((s) => s[0].name).join(", ");
      throw new LinearizationError(`inconsistent base order for class ${cls.name}: cannot order ${heads}`);
    }

    result.push(head);
    const chosen = head;
    for (const seq of sequences) {
      if (seq[0] === chosen) seq.shift();
    }
    for (let i = sequences.length - 1; i >= 0; i--) {
      if (sequences[i].length === 0) sequences.splice(i, 1);
    }
  }

  return result;
}
