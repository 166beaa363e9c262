// src/runtime/format.ts
//
// Text form of values (`toString`, string concatenation, println).
//
//   Int 3        -> 3          Real 3.0   -> 3.0
//   List         -> [1, a, 2.5]          (strings are not quoted)
//   Map          -> {k=v, k2=v2}
//   Set          -> Set(1, 2)
//   Range        -> 1..5 / 1..<5
//   instance     -> Point(x=1, y=2)      (public, non-transient fields)
//   exception    -> IllegalArgumentException: message
//
// Calling a string formats it: "%s=%d"(k, v), "%.2f"(x), "100%%"().

import { ClassObj, EnumEntryObj, InstanceObj, QualifiedView } from "./classes";
import { CallableObj } from "./functions";
import type { Interpreter } from "./interop";
import { describe, illegalArgument } from "./natives";
import { CharObj, ListObj, MapEntryObj, MapObj, RangeObj, SetObj, VoidObj } from "./values";
import type { Value } from "./values";

export function formatReal(n: number): string {
  if (Number.isNaN(n)) return "NaN";
  if (!Number.isFinite(n)) return n > 0 ? "Infinity" : "-Infinity";
  if (Number.isInteger(n) && Math.abs(n) < 1e21) return `${n}.0`;
  return String(n);
}

/** Text of values that need no user code; null for instances and views. */
export function formatSimple(v: Value): string | null {
  if (v === null) return "null";
  switch (typeof v) {
    case "boolean":
      return v ? "true" : "false";
    case "bigint":
      return v.toString();
    case "number":
      return formatReal(v);
    case "string":
      return v;
    default:
      break;
  }
  if (v instanceof VoidObj) return "void";
  if (v instanceof CharObj) return v.value;
  if (v instanceof EnumEntryObj) return v.name;
  if (v instanceof ClassObj) return v.name;
  if (v instanceof CallableObj) return `fun ${v.name}`;
  if (v instanceof RangeObj) {
    const a = v.start === null ? "" : formatSimple(v.start);
    const b = v.end === null ? "" : formatSimple(v.end);
    return `${a}${v.inclusive ? ".." : "..<"}${b}`;
  }
  if (v instanceof InstanceObj || v instanceof QualifiedView) return null;
  if (v instanceof ListObj || v instanceof MapObj || v instanceof SetObj || v instanceof MapEntryObj) return null;
  return v.typeName;
}

export function isExceptionClass(cls: ClassObj, interp: Interpreter): boolean {
  return cls.mro.some((c) => c.name === "Exception" && c.declScope === interp.rootScope);
}

export async function stringify(v: Value, interp: Interpreter): Promise<string> {
  const simple = formatSimple(v);
  if (simple !== null) return simple;

  if (v instanceof ListObj) {
    const parts: string[] = [];
    for (const item of v.items) parts.push(await stringify(item, interp));
    return `[${parts.join(", ")}]`;
  }
  if (v instanceof SetObj) {
    const parts: string[] = [];
    for (const item of v.values()) parts.push(await stringify(item, interp));
    return `Set(${parts.join(", ")})`;
  }
  if (v instanceof MapObj) {
    const parts: string[] = [];
    for (const e of v.entries()) parts.push(`${await stringify(e.key, interp)}=${await stringify(e.value, interp)}`);
    return `{${parts.join(", ")}}`;
  }
  if (v instanceof MapEntryObj) {
    return `${await stringify(v.key, interp)}=${await stringify(v.value, interp)}`;
  }
  if (v instanceof QualifiedView) return stringify(v.instance, interp);
  if (v instanceof InstanceObj) return stringifyInstance(v, interp);
  return String(v);
}

async function stringifyInstance(inst: InstanceObj, interp: Interpreter): Promise<string> {
  if (inst.cls.hasUserMethod("toString")) {
    const out = await interp.invokeMethod(inst, "toString", []);
    return typeof out === "string" ? out : stringify(out, interp);
  }

  if (isExceptionClass(inst.cls, interp)) {
    const message = inst.fields.get("message") ?? null;
    return message === null ? inst.cls.name : `${inst.cls.name}: ${await stringify(message, interp)}`;
  }

  if (inst.cls.kind === "object") return inst.cls.name;

  const parts: string[] = [];
  for (const [name, value] of inst.comparableFields()) {
    const m = inst.cls.findMember(name);
    if (m && m.visibility !== "public") continue;
    parts.push(`${name}=${await stringify(value, interp)}`);
  }
  return `${inst.cls.name}(${parts.join(", ")})`;
}

/* =========================================================
   Templates
   ========================================================= */

const DIRECTIVE = /%(?:\.(\d+))?([sdf%])/g;

/** `%s` any value, `%d` Int, `%f` / `%.Nf` number, `%%` a literal percent. */
export async function formatTemplate(template: string, args: Value[], interp: Interpreter): Promise<string> {
  let out = "";
  let last = 0;
  let next = 0;

  for (const m of template.matchAll(DIRECTIVE)) {
    const at = m.index ?? 0;
    out += template.slice(last, at);
    last = at + m[0].length;

    const kind = m[2];
    if (kind === "%") {
      out += "%";
      continue;
    }
    if (next >= args.length) throw illegalArgument(`format "${template}" needs more than ${args.length} argument(s)`);
    const v = args[next++];

    if (kind === "s") {
      out += await stringify(v, interp);
    } else if (kind === "d") {
      if (typeof v !== "bigint") throw illegalArgument(`%d expects Int, got ${describe(v)}`);
      out += v.toString();
    } else {
      if (typeof v !== "bigint" && typeof v !== "number") throw illegalArgument(`%f expects a number, got ${describe(v)}`);
      out += Number(v).toFixed(m[1] === undefined ? 6 : Number(m[1]));
    }
  }
  return out + template.slice(last);
}
