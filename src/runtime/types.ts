// src/runtime/types.ts
//
// Descriptors of the built-in kinds. They are shared by every engine in the
// process; their member tables hold natives only (see builtinMethods.ts) and
// are filled once at module load.

import { ClassObj, EnumEntryObj, InstanceObj, QualifiedView } from "./classes";
import { CallableObj } from "./functions";
import { CharObj, ListObj, MapEntryObj, MapObj, RangeObj, SetObj, VoidObj } from "./values";
import type { Value } from "./values";

export const ObjectClass = new ClassObj("Object", [], "builtin");

function builtin(name: string): ClassObj {
  return new ClassObj(name, [ObjectClass], "builtin");
}

export const Types = {
  Object: ObjectClass,
  Null: builtin("Null"),
  Void: builtin("Void"),
  Bool: builtin("Bool"),
  Int: builtin("Int"),
  Real: builtin("Real"),
  String: builtin("String"),
  Char: builtin("Char"),
  List: builtin("List"),
  Map: builtin("Map"),
  Set: builtin("Set"),
  Range: builtin("Range"),
  MapEntry: builtin("MapEntry"),
  Function: builtin("Function"),
  Class: builtin("Class"),
  Enum: builtin("Enum"),
  Deferred: builtin("Deferred"),
  Flow: builtin("Flow"),
} as const;

/** Extra descriptors registered by other runtime modules (Deferred, Flow). */
const objectKinds = new Map<string, ClassObj>();

export function registerObjectKind(typeName: string, cls: ClassObj): void {
  objectKinds.set(typeName, cls);
}

/** The class a value belongs to. */
export function classOf(v: Value): ClassObj {
  if (v === null) return Types.Null;
  switch (typeof v) {
    case "boolean":
      return Types.Bool;
    case "bigint":
      return Types.Int;
    case "number":
      return Types.Real;
    case "string":
      return Types.String;
    default:
      break;
  }
  if (v instanceof InstanceObj) return v.cls;
  if (v instanceof QualifiedView) return v.cls;
  if (v instanceof EnumEntryObj) return v.cls;
  if (v instanceof VoidObj) return Types.Void;
  if (v instanceof CharObj) return Types.Char;
  if (v instanceof ListObj) return Types.List;
  if (v instanceof MapObj) return Types.Map;
  if (v instanceof SetObj) return Types.Set;
  if (v instanceof RangeObj) return Types.Range;
  if (v instanceof MapEntryObj) return Types.MapEntry;
  if (v instanceof CallableObj) return Types.Function;
  if (v instanceof ClassObj) return Types.Class;
  return objectKinds.get(v.typeName) ?? ObjectClass;
}

/** `v is cls` */
export function isInstanceOf(v: Value, cls: ClassObj): boolean {
  if (v === null) return cls === Types.Null;
  if (cls === ObjectClass) return true;
  if (v instanceof QualifiedView) return v.instance.cls.isSubclassOf(cls);
  return classOf(v).isSubclassOf(cls);
}
