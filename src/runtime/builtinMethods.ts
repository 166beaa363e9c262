// src/runtime/builtinMethods.ts
//
// Members of the built-in kinds: the small set of methods and properties
// programs and tests need (sizes, collection editing, higher-order helpers,
// string case and slicing, conversions). Installed once, at module load.

import { QuillRuntimeError } from "../diagnostics/scriptErrors";
import { ClassObj, EnumEntryObj } from "./classes";
import { DeferredObj, FlowObj } from "./concurrency";
import { formatReal } from "./format";
import { CallableObj } from "./functions";
import type { NativeCall } from "./interop";
import {
  arg,
  checkIndex,
  defineMethod,
  defineProperty,
  expectCallable,
  expectInt,
  expectString,
  illegalArgument,
  iterableItems,
  receiver,
} from "./natives";
import { hashOf } from "./operators";
import { Types, registerObjectKind } from "./types";
import { CharObj, ListObj, MapEntryObj, MapObj, RangeObj, SetObj, valuesEqual } from "./values";
import type { Value } from "./values";

const isList = (v: Value): v is ListObj => v instanceof ListObj;
const isMap = (v: Value): v is MapObj => v instanceof MapObj;
const isSet = (v: Value): v is SetObj => v instanceof SetObj;
const isRange = (v: Value): v is RangeObj => v instanceof RangeObj;
const isEntry = (v: Value): v is MapEntryObj => v instanceof MapEntryObj;
const isChar = (v: Value): v is CharObj => v instanceof CharObj;
const isString = (v: Value): v is string => typeof v === "string";
const isInt = (v: Value): v is bigint => typeof v === "bigint";
const isReal = (v: Value): v is number => typeof v === "number";
const isClass = (v: Value): v is ClassObj => v instanceof ClassObj;
const isEnumEntry = (v: Value): v is EnumEntryObj => v instanceof EnumEntryObj;
const isDeferred = (v: Value): v is DeferredObj => v instanceof DeferredObj;
const isFlow = (v: Value): v is FlowObj => v instanceof FlowObj;
const isCallable = (v: Value): v is CallableObj => v instanceof CallableObj;

/* =========================================================
   Object (every value)
   ========================================================= */

defineMethod(Types.Object, "toString", (_args, call) => call.interp.stringify(call.thisObj));
defineMethod(Types.Object, "equals", (args, call) => call.interp.equals(call.thisObj, arg(args, 0, "other")));
defineMethod(Types.Object, "hashCode", (_args, call) => hashOf(call.thisObj));

/* =========================================================
   Numbers
   ========================================================= */

defineMethod(Types.Int, "toReal", (_a, call) => Number(receiver(call, isInt, "Int")));
defineMethod(Types.Int, "toInt", (_a, call) => receiver(call, isInt, "Int"));
defineMethod(Types.Int, "toChar", (_a, call) => new CharObj(String.fromCodePoint(Number(receiver(call, isInt, "Int")))));
defineMethod(Types.Int, "abs", (_a, call) => {
  const n = receiver(call, isInt, "Int");
  return n < 0n ? BigInt.asIntN(64, -n) : n;
});
defineMethod(Types.Int, "pow", (args, call) => {
  const n = receiver(call, isInt, "Int");
  const e = expectInt(arg(args, 0, "exponent"), "pow");
  if (e < 0n) throw illegalArgument("pow: negative exponent");
  return BigInt.asIntN(64, n ** e);
});

defineMethod(Types.Real, "toInt", (_a, call) => {
  const n = receiver(call, isReal, "Real");
  if (!Number.isFinite(n)) throw new QuillRuntimeError("ArithmeticException", `cannot convert ${formatReal(n)} to Int`);
  return BigInt.asIntN(64, BigInt(Math.trunc(n)));
});
defineMethod(Types.Real, "toReal", (_a, call) => receiver(call, isReal, "Real"));
defineMethod(Types.Real, "abs", (_a, call) => Math.abs(receiver(call, isReal, "Real")));
defineMethod(Types.Real, "floor", (_a, call) => Math.floor(receiver(call, isReal, "Real")));
defineMethod(Types.Real, "ceil", (_a, call) => Math.ceil(receiver(call, isReal, "Real")));
defineMethod(Types.Real, "round", (_a, call) => Math.round(receiver(call, isReal, "Real")));
defineProperty(Types.Real, "isNaN", (_a, call) => Number.isNaN(receiver(call, isReal, "Real")));

/* =========================================================
   String / Char
   ========================================================= */

defineProperty(Types.String, "size", (_a, call) => BigInt(receiver(call, isString, "String").length));
defineProperty(Types.String, "length", (_a, call) => BigInt(receiver(call, isString, "String").length));
defineMethod(Types.String, "isEmpty", (_a, call) => receiver(call, isString, "String").length === 0);
defineMethod(Types.String, "upper", (_a, call) => receiver(call, isString, "String").toUpperCase());
defineMethod(Types.String, "lower", (_a, call) => receiver(call, isString, "String").toLowerCase());
defineMethod(Types.String, "trim", (_a, call) => receiver(call, isString, "String").trim());
defineMethod(Types.String, "reversed", (_a, call) => [...receiver(call, isString, "String")].reverse().join(""));
defineMethod(Types.String, "startsWith", (args, call) =>
  receiver(call, isString, "String").startsWith(expectString(arg(args, 0, "prefix"), "startsWith")),
);
defineMethod(Types.String, "endsWith", (args, call) =>
  receiver(call, isString, "String").endsWith(expectString(arg(args, 0, "suffix"), "endsWith")),
);
defineMethod(Types.String, "contains", (args, call) => {
  const s = receiver(call, isString, "String");
  const needle = arg(args, 0, "value");
  return s.includes(needle instanceof CharObj ? needle.value : expectString(needle, "contains"));
});
defineMethod(Types.String, "indexOf", (args, call) => {
  const s = receiver(call, isString, "String");
  const needle = arg(args, 0, "value");
  return BigInt(s.indexOf(needle instanceof CharObj ? needle.value : expectString(needle, "indexOf")));
});
defineMethod(Types.String, "substring", (args, call) => {
  const s = receiver(call, isString, "String");
  const from = Number(expectInt(arg(args, 0, "start"), "substring"));
  const to = args.positional.length > 1 ? Number(expectInt(arg(args, 1, "end"), "substring")) : s.length;
  if (from < 0 || to > s.length || from > to) {
    throw new QuillRuntimeError("IndexOutOfBoundsException", `substring(${from}, ${to}) out of bounds for length ${s.length}`);
  }
  return s.substring(from, to);
});
defineMethod(Types.String, "split", (args, call) => {
  const s = receiver(call, isString, "String");
  return new ListObj(s.split(expectString(arg(args, 0, "separator"), "split")));
});
defineMethod(Types.String, "replace", (args, call) => {
  const s = receiver(call, isString, "String");
  return s.split(expectString(arg(args, 0, "old"), "replace")).join(expectString(arg(args, 1, "new"), "replace"));
});
defineMethod(Types.String, "toInt", (_a, call) => {
  const s = receiver(call, isString, "String").trim().replace(/_/g, "");
  if (!/^[+-]?\d+$/.test(s)) throw illegalArgument(`'${s}' is not an Int`);
  return BigInt.asIntN(64, BigInt(s));
});
defineMethod(Types.String, "toReal", (_a, call) => {
  const s = receiver(call, isString, "String").trim();
  const n = Number(s);
  if (s === "" || Number.isNaN(n)) throw illegalArgument(`'${s}' is not a Real`);
  return n;
});
defineMethod(Types.String, "chars", (_a, call) => new ListObj([...receiver(call, isString, "String")].map((c) => new CharObj(c))));

defineProperty(Types.Char, "code", (_a, call) => BigInt(receiver(call, isChar, "Char").code));
defineMethod(Types.Char, "isDigit", (_a, call) => /^\p{Nd}$/u.test(receiver(call, isChar, "Char").value));
defineMethod(Types.Char, "isLetter", (_a, call) => /^\p{L}$/u.test(receiver(call, isChar, "Char").value));
defineMethod(Types.Char, "isWhitespace", (_a, call) => /^\s$/u.test(receiver(call, isChar, "Char").value));
defineMethod(Types.Char, "upper", (_a, call) => new CharObj(receiver(call, isChar, "Char").value.toUpperCase()));
defineMethod(Types.Char, "lower", (_a, call) => new CharObj(receiver(call, isChar, "Char").value.toLowerCase()));

/* =========================================================
   Higher-order helpers shared by List, Set, Range
   ========================================================= */

function items(call: NativeCall): Value[] {
  return iterableItems(call.thisObj, "receiver");
}

function defineIterableHelpers(cls: ClassObj): void {
  defineMethod(cls, "forEach", async (args, call) => {
    const fn = expectCallable(arg(args, 0, "action"), "forEach");
    for (const v of items(call)) await call.interp.callPositional(fn, [v], call.range);
    return null;
  });
  defineMethod(cls, "map", async (args, call) => {
    const fn = expectCallable(arg(args, 0, "transform"), "map");
    const out: Value[] = [];
    for (const v of items(call)) out.push(await call.interp.callPositional(fn, [v], call.range));
    return new ListObj(out);
  });
  defineMethod(cls, "filter", async (args, call) => {
    const fn = expectCallable(arg(args, 0, "predicate"), "filter");
    const out: Value[] = [];
    for (const v of items(call)) if ((await call.interp.callPositional(fn, [v], call.range)) === true) out.push(v);
    return new ListObj(out);
  });
  defineMethod(cls, "any", async (args, call) => {
    const fn = expectCallable(arg(args, 0, "predicate"), "any");
    for (const v of items(call)) if ((await call.interp.callPositional(fn, [v], call.range)) === true) return true;
    return false;
  });
  defineMethod(cls, "all", async (args, call) => {
    const fn = expectCallable(arg(args, 0, "predicate"), "all");
    for (const v of items(call)) if ((await call.interp.callPositional(fn, [v], call.range)) !== true) return false;
    return true;
  });
  defineMethod(cls, "fold", async (args, call) => {
    let acc = arg(args, 0, "initial");
    const fn = expectCallable(arg(args, 1, "operation"), "fold");
    for (const v of items(call)) acc = await call.interp.callPositional(fn, [acc, v], call.range);
    return acc;
  });
  defineMethod(cls, "sum", async (_a, call) => {
    let acc: Value = 0n;
    for (const v of items(call)) acc = await call.interp.arithmetic("+", acc, v, call.range);
    return acc;
  });
  defineMethod(cls, "joinToString", async (args, call) => {
    const sep = expectString(arg(args, 0, "separator", ", "), "joinToString");
    const transform = args.positional.length > 1 ? expectCallable(arg(args, 1, "transform"), "joinToString") : null;
    const parts: string[] = [];
    for (const v of items(call)) {
      const shown = transform ? await call.interp.callPositional(transform, [v], call.range) : v;
      parts.push(await call.interp.stringify(shown));
    }
    return parts.join(sep);
  });
  defineMethod(cls, "toList", (_a, call) => new ListObj([...items(call)]));
  defineMethod(cls, "toSet", (_a, call) => new SetObj(items(call)));
  defineMethod(cls, "sorted", async (_a, call) => new ListObj(await sortValues([...items(call)], call, null)));
  defineMethod(cls, "sortedBy", async (args, call) => {
    const fn = expectCallable(arg(args, 0, "selector"), "sortedBy");
    return new ListObj(await sortValues([...items(call)], call, fn));
  });
}

async function sortValues(values: Value[], call: NativeCall, selector: CallableObj | null): Promise<Value[]> {
  const keyed: { key: Value; value: Value }[] = [];
  for (const value of values) {
    keyed.push({ key: selector ? await call.interp.callPositional(selector, [value], call.range) : value, value });
  }
  // insertion sort keeps the comparison awaitable and the order stable
  for (let i = 1; i < keyed.length; i++) {
    const cur = keyed[i];
    let j = i - 1;
    while (j >= 0 && (await call.interp.compare(keyed[j].key, cur.key, call.range)) > 0) {
      keyed[j + 1] = keyed[j];
      j--;
    }
    keyed[j + 1] = cur;
  }
  return keyed.map((k) => k.value);
}

/* =========================================================
   List
   ========================================================= */

defineIterableHelpers(Types.List);
defineProperty(Types.List, "size", (_a, call) => BigInt(receiver(call, isList, "List").items.length));
defineProperty(Types.List, "first", (_a, call) => {
  const l = receiver(call, isList, "List");
  return l.items[checkIndex(0n, l.items.length)];
});
defineProperty(Types.List, "last", (_a, call) => {
  const l = receiver(call, isList, "List");
  return l.items[checkIndex(-1n, l.items.length)];
});
defineMethod(Types.List, "isEmpty", (_a, call) => receiver(call, isList, "List").items.length === 0);
defineMethod(Types.List, "add", (args, call) => {
  const l = receiver(call, isList, "List");
  l.items.push(...args.positional);
  return null;
});
defineMethod(Types.List, "addAll", (args, call) => {
  const l = receiver(call, isList, "List");
  l.items.push(...iterableItems(arg(args, 0, "values"), "addAll"));
  return null;
});
defineMethod(Types.List, "insertAt", (args, call) => {
  const l = receiver(call, isList, "List");
  const i = Number(expectInt(arg(args, 0, "index"), "insertAt"));
  if (i < 0 || i > l.items.length) {
    throw new QuillRuntimeError("IndexOutOfBoundsException", `index ${i} out of bounds for size ${l.items.length}`);
  }
  l.items.splice(i, 0, arg(args, 1, "value"));
  return null;
});
defineMethod(Types.List, "removeAt", (args, call) => {
  const l = receiver(call, isList, "List");
  const i = checkIndex(expectInt(arg(args, 0, "index"), "removeAt"), l.items.length);
  return l.items.splice(i, 1)[0];
});
defineMethod(Types.List, "remove", (args, call) => {
  const l = receiver(call, isList, "List");
  const v = arg(args, 0, "value");
  const i = l.items.findIndex((x) => valuesEqual(x, v));
  if (i < 0) return false;
  l.items.splice(i, 1);
  return true;
});
defineMethod(Types.List, "clear", (_a, call) => {
  receiver(call, isList, "List").items.length = 0;
  return null;
});
defineMethod(Types.List, "indexOf", (args, call) => {
  const v = arg(args, 0, "value");
  return BigInt(receiver(call, isList, "List").items.findIndex((x) => valuesEqual(x, v)));
});
defineMethod(Types.List, "contains", (args, call) => {
  const v = arg(args, 0, "value");
  return receiver(call, isList, "List").items.some((x) => valuesEqual(x, v));
});
defineMethod(Types.List, "reversed", (_a, call) => new ListObj([...receiver(call, isList, "List").items].reverse()));
defineMethod(Types.List, "take", (args, call) =>
  new ListObj(receiver(call, isList, "List").items.slice(0, Math.max(0, Number(expectInt(arg(args, 0, "n"), "take"))))),
);
defineMethod(Types.List, "drop", (args, call) =>
  new ListObj(receiver(call, isList, "List").items.slice(Math.max(0, Number(expectInt(arg(args, 0, "n"), "drop"))))),
);

/* =========================================================
   Set
   ========================================================= */

defineIterableHelpers(Types.Set);
defineProperty(Types.Set, "size", (_a, call) => BigInt(receiver(call, isSet, "Set").size));
defineMethod(Types.Set, "isEmpty", (_a, call) => receiver(call, isSet, "Set").size === 0);
defineMethod(Types.Set, "add", (args, call) => receiver(call, isSet, "Set").add(arg(args, 0, "value")));
defineMethod(Types.Set, "remove", (args, call) => receiver(call, isSet, "Set").delete(arg(args, 0, "value")));
defineMethod(Types.Set, "contains", (args, call) => receiver(call, isSet, "Set").has(arg(args, 0, "value")));
defineMethod(Types.Set, "clear", (_a, call) => {
  receiver(call, isSet, "Set").clear();
  return null;
});

/* =========================================================
   Map / MapEntry
   ========================================================= */

defineIterableHelpers(Types.Map);
defineProperty(Types.Map, "size", (_a, call) => BigInt(receiver(call, isMap, "Map").size));
defineProperty(Types.Map, "keys", (_a, call) => new ListObj(receiver(call, isMap, "Map").keys()));
defineProperty(Types.Map, "values", (_a, call) => new ListObj(receiver(call, isMap, "Map").values()));
defineProperty(Types.Map, "entries", (_a, call) => new ListObj(receiver(call, isMap, "Map").entries()));
defineMethod(Types.Map, "isEmpty", (_a, call) => receiver(call, isMap, "Map").size === 0);
defineMethod(Types.Map, "get", (args, call) => receiver(call, isMap, "Map").get(arg(args, 0, "key")) ?? null);
defineMethod(Types.Map, "getOrElse", async (args, call) => {
  const m = receiver(call, isMap, "Map");
  const key = arg(args, 0, "key");
  if (m.has(key)) return m.get(key) ?? null;
  return call.interp.callPositional(expectCallable(arg(args, 1, "default"), "getOrElse"), [], call.range);
});
defineMethod(Types.Map, "put", (args, call) => {
  const m = receiver(call, isMap, "Map");
  const prev = m.get(arg(args, 0, "key")) ?? null;
  m.set(arg(args, 0, "key"), arg(args, 1, "value"));
  return prev;
});
defineMethod(Types.Map, "containsKey", (args, call) => receiver(call, isMap, "Map").has(arg(args, 0, "key")));
defineMethod(Types.Map, "remove", (args, call) => receiver(call, isMap, "Map").delete(arg(args, 0, "key")) ?? null);
defineMethod(Types.Map, "clear", (_a, call) => {
  receiver(call, isMap, "Map").clear();
  return null;
});

defineProperty(Types.MapEntry, "key", (_a, call) => receiver(call, isEntry, "MapEntry").key);
defineProperty(Types.MapEntry, "value", (_a, call) => receiver(call, isEntry, "MapEntry").value);

/* =========================================================
   Range
   ========================================================= */

defineIterableHelpers(Types.Range);
defineProperty(Types.Range, "start", (_a, call) => receiver(call, isRange, "Range").start);
defineProperty(Types.Range, "end", (_a, call) => receiver(call, isRange, "Range").end);
defineProperty(Types.Range, "isEndInclusive", (_a, call) => receiver(call, isRange, "Range").inclusive);
defineProperty(Types.Range, "isOpen", (_a, call) => receiver(call, isRange, "Range").isOpen);
defineProperty(Types.Range, "size", (_a, call) => BigInt(iterableItems(receiver(call, isRange, "Range"), "size").length));
defineMethod(Types.Range, "contains", (args, call) => receiver(call, isRange, "Range").contains(arg(args, 0, "value")));

/* =========================================================
   Class / Enum / Function
   ========================================================= */

defineProperty(Types.Class, "className", (_a, call) => receiver(call, isClass, "Class").name);
defineProperty(Types.Function, "name", (_a, call) => receiver(call, isCallable, "Function").name);

defineProperty(Types.Enum, "name", (_a, call) => receiver(call, isEnumEntry, "enum entry").name);
defineProperty(Types.Enum, "ordinal", (_a, call) => BigInt(receiver(call, isEnumEntry, "enum entry").ordinal));

/* =========================================================
   Deferred / Flow
   ========================================================= */

registerObjectKind("Deferred", Types.Deferred);
registerObjectKind("Flow", Types.Flow);

defineMethod(Types.Deferred, "await", (_a, call) => receiver(call, isDeferred, "Deferred").await());
defineProperty(Types.Deferred, "isCompleted", (_a, call) => receiver(call, isDeferred, "Deferred").isCompleted);
defineProperty(Types.Deferred, "isActive", (_a, call) => receiver(call, isDeferred, "Deferred").isActive);

defineMethod(Types.Flow, "collect", async (args, call) => {
  const fn = expectCallable(arg(args, 0, "collector"), "collect");
  await receiver(call, isFlow, "Flow").collect(async (v) => {
    await call.interp.callPositional(fn, [v], call.range);
  });
  return null;
});
defineMethod(Types.Flow, "toList", async (_a, call) => new ListObj(await receiver(call, isFlow, "Flow").toArray()));
