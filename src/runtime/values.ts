// src/runtime/values.ts
//
// Quill runtime values
// --------------------
// A value is one of:
//
//   null                      the null literal
//   boolean                   Bool
//   bigint                    Int (64-bit two's complement, wraps on overflow)
//   number                    Real
//   string                    String
//   Obj                       everything else (Void, Char, collections,
//                             functions, classes, instances, ...)
//
// Primitive kinds map straight onto JS primitives so that the evaluator's hot
// paths (arithmetic, comparisons, string concatenation) need no boxing.
//
// Maps and sets index their contents by `keyOf(value)`: equal values produce
// the same key string. Mutable containers are keyed by content at insertion
// time, like every other key.

export type Value = null | boolean | bigint | number | string | Obj;

/* =========================================================
   Base object
   ========================================================= */

let nextIdentity = 1;
const identities = new WeakMap<Obj, number>();

export function identityOf(o: Obj): number {
  let id = identities.get(o);
  if (id === undefined) {
    id = nextIdentity++;
    identities.set(o, id);
  }
  return id;
}

export abstract class Obj {
  /** Runtime kind name, also the name of the value's class. */
  public abstract readonly typeName: string;

  public keyOf(): string {
    return `#${identityOf(this)}`;
  }

  /** Structural equality for built-in kinds; identity by default. */
  public equalsValue(other: Value): boolean {
    return other === this;
  }
}

/* =========================================================
   Void / Char
   ========================================================= */

export class VoidObj extends Obj {
  public readonly typeName = "Void";

  public keyOf(): string {
    return "v";
  }
}

export const VOID = new VoidObj();

export class CharObj extends Obj {
  public readonly typeName = "Char";

  constructor(public readonly value: string) {
    super();
  }

  public keyOf(): string {
    return `c${this.value}`;
  }

  public equalsValue(other: Value): boolean {
    return other instanceof CharObj && other.value === this.value;
  }

  public get code(): number {
    return this.value.codePointAt(0) ?? 0;
  }
}

/* =========================================================
   Collections
   ========================================================= */

export class ListObj extends Obj {
  public readonly typeName = "List";

  constructor(public readonly items: Value[] = []) {
    super();
  }

  public keyOf(): string {
    return `L[${this.items.map(keyOf).join(",")}]`;
  }

  public equalsValue(other: Value): boolean {
    if (!(other instanceof ListObj)) return false;
    if (other === this) return true;
    if (other.items.length !== this.items.length) return false;
    return this.items.every((v, i) => valuesEqual(v, other.items[i]));
  }
}

export class MapEntryObj extends Obj {
  public readonly typeName = "MapEntry";

  constructor(
    public readonly key: Value,
    public readonly value: Value,
  ) {
    super();
  }

  public keyOf(): string {
    return `E(${keyOf(this.key)}=${keyOf(this.value)})`;
  }

  public equalsValue(other: Value): boolean {
    return other instanceof MapEntryObj && valuesEqual(this.key, other.key) && valuesEqual(this.value, other.value);
  }
}

export class MapObj extends Obj {
  public readonly typeName = "Map";
  private readonly slots = new Map<string, MapEntryObj>();

  public get size(): number {
    return this.slots.size;
  }

  public get(key: Value): Value | undefined {
    return this.slots.get(keyOf(key))?.value;
  }

  public has(key: Value): boolean {
    return this.slots.has(keyOf(key));
  }

  public set(key: Value, value: Value): void {
    this.slots.set(keyOf(key), new MapEntryObj(key, value));
  }

  public delete(key: Value): Value | undefined {
    const k = keyOf(key);
    const prev = this.slots.get(k);
    this.slots.delete(k);
    return prev?.value;
  }

  public clear(): void {
    this.slots.clear();
  }

  public entries(): MapEntryObj[] {
    return [...this.slots.values()];
  }

  public keys(): Value[] {
    return this.entries().map((e) => e.key);
  }

  public values(): Value[] {
    return this.entries().map((e) => e.value);
  }

  public equalsValue(other: Value): boolean {
    if (!(other instanceof MapObj)) return false;
    if (other === this) return true;
    if (other.size !== this.size) return false;
    for (const e of this.entries()) {
      if (!other.has(e.key)) return false;
      const v = other.get(e.key);
      if (v === undefined || !valuesEqual(e.value, v)) return false;
    }
    return true;
  }
}

export class SetObj extends Obj {
  public readonly typeName = "Set";
  private readonly slots = new Map<string, Value>();

  constructor(items: Iterable<Value> = []) {
    super();
    for (const v of items) this.add(v);
  }

  public get size(): number {
    return this.slots.size;
  }

  public add(v: Value): boolean {
    const k = keyOf(v);
    if (this.slots.has(k)) return false;
    this.slots.set(k, v);
    return true;
  }

  public has(v: Value): boolean {
    return this.slots.has(keyOf(v));
  }

  public delete(v: Value): boolean {
    return this.slots.delete(keyOf(v));
  }

  public clear(): void {
    this.slots.clear();
  }

  public values(): Value[] {
    return [...this.slots.values()];
  }

  public equalsValue(other: Value): boolean {
    if (!(other instanceof SetObj)) return false;
    if (other.size !== this.size) return false;
    return this.values().every((v) => other.has(v));
  }
}

/* =========================================================
   Range
   ========================================================= */

/** `a..b` or `a..<b`; bounds are Int or Char, either may be open (null). */
export class RangeObj extends Obj {
  public readonly typeName = "Range";

  constructor(
    public readonly start: Value,
    public readonly end: Value,
    public readonly inclusive: boolean,
  ) {
    super();
  }

  public get isOpen(): boolean {
    return this.start === null || this.end === null;
  }

  public keyOf(): string {
    return `R(${keyOf(this.start)}${this.inclusive ? ".." : "..<"}${keyOf(this.end)})`;
  }

  public equalsValue(other: Value): boolean {
    return (
      other instanceof RangeObj &&
      other.inclusive === this.inclusive &&
      valuesEqual(this.start, other.start) &&
      valuesEqual(this.end, other.end)
    );
  }

  public contains(v: Value): boolean {
    if (typeof v === "bigint" || typeof v === "number") {
      const lo = numericBound(this.start);
      const hi = numericBound(this.end);
      if (lo === undefined || hi === undefined) return false;
      if (lo !== null && v < lo) return false;
      if (hi !== null && (this.inclusive ? v > hi : v >= hi)) return false;
      return true;
    }
    if (v instanceof CharObj && (this.start === null || this.start instanceof CharObj) && (this.end === null || this.end instanceof CharObj)) {
      const c = v.code;
      if (this.start instanceof CharObj && c < this.start.code) return false;
      if (this.end instanceof CharObj && (this.inclusive ? c > this.end.code : c >= this.end.code)) return false;
      return true;
    }
    return false;
  }

  /** Values of a closed Int or Char range, in order. */
  public *iterate(): Generator<Value> {
    if (typeof this.start === "bigint" && typeof this.end === "bigint") {
      const last = this.inclusive ? this.end : this.end - 1n;
      for (let i = this.start; i <= last; i++) yield i;
      return;
    }
    if (this.start instanceof CharObj && this.end instanceof CharObj) {
      const last = this.inclusive ? this.end.code : this.end.code - 1;
      for (let c = this.start.code; c <= last; c++) yield new CharObj(String.fromCodePoint(c));
    }
  }

  public get isIterable(): boolean {
    return (
      (typeof this.start === "bigint" && typeof this.end === "bigint") ||
      (this.start instanceof CharObj && this.end instanceof CharObj)
    );
  }
}

/** null: open bound; undefined: not numeric. */
function numericBound(v: Value): bigint | number | null | undefined {
  if (v === null) return null;
  if (typeof v === "bigint" || typeof v === "number") return v;
  return undefined;
}

/* =========================================================
   Keys / equality
   ========================================================= */

export function keyOf(v: Value): string {
  if (v === null) return "n";
  switch (typeof v) {
    case "boolean":
      return v ? "b1" : "b0";
    case "bigint":
      return `i${v}`;
    case "number":
      return Number.isInteger(v) && Number.isSafeInteger(v) ? `i${v}` : `r${v}`;
    case "string":
      return `s${v}`;
    default:
      return v.keyOf();
  }
}

/** Structural equality without user `equals` overloads (see evaluator for those). */
export function valuesEqual(a: Value, b: Value): boolean {
  if (a === b) return true;
  if (a === null || b === null) return false;
  if ((typeof a === "bigint" || typeof a === "number") && (typeof b === "bigint" || typeof b === "number")) {
    if (typeof a === typeof b) return a === b;
    return Number(a) === Number(b);
  }
  if (a instanceof Obj) return a.equalsValue(b);
  return false;
}

/* =========================================================
   Guards
   ========================================================= */

export function isInt(v: Value): v is bigint {
  return typeof v === "bigint";
}

export function isReal(v: Value): v is number {
  return typeof v === "number";
}

export function toInt64(v: bigint): bigint {
  return BigInt.asIntN(64, v);
}
