// src/runtime/operators.ts
//
// Operators over built-in kinds. User classes overload operators by declaring
// methods with the names in OPERATOR_METHODS; the evaluator tries those first
// and falls back to the functions here.
//
// Int arithmetic wraps to 64 bits. Mixing Int and Real yields Real. Integer
// division truncates toward zero; Int division or remainder by zero raises
// ArithmeticException.

import type { BinaryOperator } from "../core/ast";
import { QuillRuntimeError } from "../diagnostics/scriptErrors";
import { EnumEntryObj } from "./classes";
import { CharObj, ListObj, MapObj, RangeObj, SetObj, keyOf, toInt64, valuesEqual } from "./values";
import type { Value } from "./values";

export type ArithmeticOperator = "+" | "-" | "*" | "/" | "%";

export const OPERATOR_METHODS: Readonly<Record<ArithmeticOperator, string>> = {
  "+": "plus",
  "-": "minus",
  "*": "mul",
  "/": "div",
  "%": "mod",
};

export const ASSIGN_OPERATOR_METHODS: Readonly<Record<ArithmeticOperator, string>> = {
  "+": "plusAssign",
  "-": "minusAssign",
  "*": "mulAssign",
  "/": "divAssign",
  "%": "modAssign",
};

function kindName(v: Value): string {
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

function unsupported(op: string, a: Value, b?: Value): QuillRuntimeError {
  const operands = b === undefined ? kindName(a) : `${kindName(a)} and ${kindName(b)}`;
  return new QuillRuntimeError("IllegalArgumentException", `operator '${op}' is not defined for ${operands}`);
}

/* =========================================================
   Arithmetic
   ========================================================= */

export function arithmetic(op: ArithmeticOperator, a: Value, b: Value): Value {
  if (typeof a === "bigint" && typeof b === "bigint") return intArithmetic(op, a, b);

  if ((typeof a === "bigint" || typeof a === "number") && (typeof b === "bigint" || typeof b === "number")) {
    const x = Number(a);
    const y = Number(b);
    switch (op) {
      case "+":
        return x + y;
      case "-":
        return x - y;
      case "*":
        return x * y;
      case "/":
        return x / y;
      case "%":
        return x % y;
    }
  }

  if (typeof a === "string" && op === "*" && typeof b === "bigint") {
    if (b < 0n) throw new QuillRuntimeError("IllegalArgumentException", "negative repeat count");
    return a.repeat(Number(b));
  }

  if (a instanceof CharObj) {
    if (typeof b === "bigint" && (op === "+" || op === "-")) {
      const code = op === "+" ? a.code + Number(b) : a.code - Number(b);
      return new CharObj(String.fromCodePoint(code));
    }
    if (b instanceof CharObj && op === "-") return BigInt(a.code - b.code);
  }

  if (a instanceof ListObj) {
    if (op === "+") return b instanceof ListObj ? new ListObj([...a.items, ...b.items]) : new ListObj([...a.items, b]);
    if (op === "-") {
      const drop = b instanceof ListObj ? b.items : [b];
      return new ListObj(a.items.filter((x) => !drop.some((d) => valuesEqual(x, d))));
    }
  }

  if (a instanceof SetObj) {
    if (op === "+") return new SetObj([...a.values(), ...(b instanceof SetObj || b instanceof ListObj ? iterableValues(b) : [b])]);
    if (op === "-") {
      const drop = new SetObj(b instanceof SetObj || b instanceof ListObj ? iterableValues(b) : [b]);
      return new SetObj(a.values().filter((x) => !drop.has(x)));
    }
  }

  throw unsupported(op, a, b);
}

function iterableValues(v: SetObj | ListObj): Value[] {
  return v instanceof SetObj ? v.values() : v.items;
}

function intArithmetic(op: ArithmeticOperator, a: bigint, b: bigint): bigint {
  switch (op) {
    case "+":
      return toInt64(a + b);
    case "-":
      return toInt64(a - b);
    case "*":
      return toInt64(a * b);
    case "/":
      if (b === 0n) throw new QuillRuntimeError("ArithmeticException", "division by zero");
      return toInt64(a / b);
    case "%":
      if (b === 0n) throw new QuillRuntimeError("ArithmeticException", "division by zero");
      return a % b;
  }
}

export function negate(a: Value): Value {
  if (typeof a === "bigint") return toInt64(-a);
  if (typeof a === "number") return -a;
  throw unsupported("-", a);
}

/* =========================================================
   Bitwise
   ========================================================= */

export type BitwiseOperator = "&" | "|" | "^" | "<<" | ">>";

export function bitwise(op: BitwiseOperator, a: Value, b: Value): Value {
  if (typeof a === "boolean" && typeof b === "boolean") {
    if (op === "&") return a && b;
    if (op === "|") return a || b;
    if (op === "^") return a !== b;
  }
  if (typeof a !== "bigint" || typeof b !== "bigint") throw unsupported(op, a, b);
  switch (op) {
    case "&":
      return a & b;
    case "|":
      return a | b;
    case "^":
      return a ^ b;
    case "<<":
      return toInt64(a << BigInt.asUintN(6, b));
    case ">>":
      return a >> BigInt.asUintN(6, b);
  }
}

export function bitNot(a: Value): Value {
  if (typeof a === "bigint") return ~a;
  throw unsupported("~", a);
}

export function isBitwise(op: BinaryOperator): op is BitwiseOperator {
  return op === "&" || op === "|" || op === "^" || op === "<<" || op === ">>";
}

export function isArithmetic(op: BinaryOperator): op is ArithmeticOperator {
  return op === "+" || op === "-" || op === "*" || op === "/" || op === "%";
}

/* =========================================================
   Comparison / membership
   ========================================================= */

/** Ordering of built-in kinds; null when the pair has none. */
export function compareBuiltin(a: Value, b: Value): number | null {
  if ((typeof a === "bigint" || typeof a === "number") && (typeof b === "bigint" || typeof b === "number")) {
    if (typeof a === "bigint" && typeof b === "bigint") return a < b ? -1 : a > b ? 1 : 0;
    const x = Number(a);
    const y = Number(b);
    return x < y ? -1 : x > y ? 1 : 0;
  }
  if (typeof a === "string" && typeof b === "string") return a < b ? -1 : a > b ? 1 : 0;
  if (a instanceof CharObj && b instanceof CharObj) return Math.sign(a.code - b.code);
  if (typeof a === "boolean" && typeof b === "boolean") return Number(a) - Number(b);
  if (a instanceof EnumEntryObj && b instanceof EnumEntryObj && a.cls === b.cls) return Math.sign(a.ordinal - b.ordinal);
  if (a instanceof ListObj && b instanceof ListObj) {
    const n = Math.min(a.items.length, b.items.length);
    for (let i = 0; i < n; i++) {
      const c = compareBuiltin(a.items[i], b.items[i]);
      if (c === null) return null;
      if (c !== 0) return c;
    }
    return Math.sign(a.items.length - b.items.length);
  }
  return null;
}

export function compareOrThrow(a: Value, b: Value): number {
  const c = compareBuiltin(a, b);
  if (c === null) throw unsupported("<=>", a, b);
  return c;
}

/** `needle in haystack` for built-in containers; null when not a container. */
export function containsBuiltin(haystack: Value, needle: Value): boolean | null {
  if (haystack instanceof ListObj) return haystack.items.some((x) => valuesEqual(x, needle));
  if (haystack instanceof SetObj) return haystack.has(needle);
  if (haystack instanceof MapObj) return haystack.has(needle);
  if (haystack instanceof RangeObj) return haystack.contains(needle);
  if (typeof haystack === "string") {
    if (typeof needle === "string") return haystack.includes(needle);
    if (needle instanceof CharObj) return haystack.includes(needle.value);
  }
  return null;
}

export function hashOf(v: Value): bigint {
  const key = keyOf(v);
  let h = 0n;
  for (let i = 0; i < key.length; i++) h = toInt64(h * 31n + BigInt(key.charCodeAt(i)));
  return h;
}
