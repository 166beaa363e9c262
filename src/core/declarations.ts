// src/core/declarations.ts
//
// Class, object and enum declarations, and instance construction.
//
// Declaring a class resolves its bases, computes the C3 linearization, and
// records the members its own body declares. Statics (static members, nested
// classes) live in a scope owned by the class whose parent is the declaring
// scope, so method bodies close over them.
//
// Construction initializes every class of the linearization at most once:
// a class binds its constructor parameters, initializes each base with the
// arguments of its base call (bases first, left to right), then stores its
// own constructor fields and runs its body initializers and `init` blocks
// in source order.

import type { ClassDeclaration, EnumDeclaration, Parameter, Range } from "./ast";
import { Scope } from "./scope";
import type { Evaluator } from "./evaluator";

import { QuillRuntimeError, ScriptError, toSourcePosition } from "../diagnostics/scriptErrors";
import { ClassObj, EnumEntryObj, IMPLICIT_OVERRIDES, InstanceObj, LinearizationError } from "../runtime/classes";
import type { Member } from "../runtime/classes";
import { FunctionObj, native } from "../runtime/functions";
import { positional } from "../runtime/interop";
import type { Args } from "../runtime/interop";
import { arg, expectString, illegalArgument } from "../runtime/natives";
import { ObjectClass, Types } from "../runtime/types";
import { ListObj } from "../runtime/values";

/* =========================================================
   Classes
   ========================================================= */

async function resolveBases(ev: Evaluator, node: ClassDeclaration, scope: Scope): Promise<ClassObj[]> {
  const bases: ClassObj[] = [];
  for (const spec of node.bases) {
    const v = await ev.evaluate(spec.type, scope);
    const where = toSourcePosition(scope.fileName, spec.range.start);
    if (!(v instanceof ClassObj)) throw new ScriptError(where, `base of ${node.name} is not a class`);
    if ((v.isBuiltin && v !== ObjectClass) || v.kind === "enum" || v.kind === "object") {
      throw new ScriptError(where, `${node.name} cannot inherit from ${v.name}`);
    }
    bases.push(v);
  }
  return bases.length > 0 ? bases : [ObjectClass];
}

/** Nearest member `name` among the ancestors of `cls` (not `cls` itself). */
function inherited(cls: ClassObj, name: string): Member | null {
  for (const c of cls.mro.slice(1)) {
    const m = c.members.get(name);
    if (m) return m;
  }
  return null;
}

/** Every script-declared member `name` among the ancestors of `cls`, nearest first. */
function declaredAbove(cls: ClassObj, name: string): Member[] {
  const found: Member[] = [];
  for (const c of cls.mro.slice(1)) {
    const m = c.members.get(name);
    if (m && m.kind !== "native" && m.declaringClass === c) found.push(m);
  }
  return found;
}

function isStoredField(m: Member | null): boolean {
  return m !== null && (m.kind === "field" || (m.kind === "property" && m.hasBacking));
}

export async function declareClass(ev: Evaluator, node: ClassDeclaration, scope: Scope): Promise<ClassObj> {
  const at = (r: Range) => toSourcePosition(scope.fileName, r.start);
  const bases = await resolveBases(ev, node, scope);

  let cls: ClassObj;
  try {
    cls = new ClassObj(node.name, bases, node.isObject ? "object" : "class", node, scope);
  } catch (e) {
    if (e instanceof LinearizationError) throw new ScriptError(at(node.nameRange), e.message);
    throw e;
  }

  const statics = new Scope(scope, { classContext: cls });
  cls.statics = statics;
  const visibility = node.modifiers.visibility;
  if (!node.isObject) scope.define(node.name, cls, { visibility });

  const add = (m: Member, range: Range): void => {
    if (cls.members.has(m.name)) throw new ScriptError(at(range), `${node.name} declares '${m.name}' twice`);
    cls.members.set(m.name, m);
  };

  for (const p of node.constructorParams ?? []) {
    if (p.fieldKind === null && isStoredField(inherited(cls, p.name))) continue;
    add(
      {
        kind: "field",
        name: p.name,
        visibility: p.visibility,
        declaringClass: cls,
        mutable: p.fieldKind !== "val",
        transient: p.transient,
        decl: null,
        setterVisibility: null,
      },
      p.range,
    );
  }

  const overrides = new Map<string, { isOverride: boolean; range: Range }>();

  for (const m of node.members) {
    if (m.kind === "VariableDeclaration" && !m.modifiers.isStatic) {
      const base = { name: m.name, visibility: m.modifiers.visibility, declaringClass: cls };
      if (m.delegate) {
        add({ ...base, kind: "delegated", decl: m, access: m.mutable ? "Var" : "Val" }, m.nameRange);
      } else if (m.getter || m.setter) {
        add(
          {
            ...base,
            kind: "property",
            decl: m,
            mutable: m.mutable,
            setterVisibility: m.setterVisibility,
            hasBacking: m.initializer !== null || m.getter === null,
            transient: m.transient,
          },
          m.nameRange,
        );
      } else {
        add(
          { ...base, kind: "field", mutable: m.mutable, transient: m.transient, decl: m, setterVisibility: m.setterVisibility },
          m.nameRange,
        );
      }
      overrides.set(m.name, { isOverride: m.modifiers.isOverride, range: m.nameRange });
    } else if (m.kind === "FunctionDeclaration" && !m.modifiers.isStatic) {
      const base = { name: m.name, visibility: m.modifiers.visibility, declaringClass: cls };
      if (m.delegate) {
        add({ ...base, kind: "delegated", decl: m, access: "Callable" }, m.nameRange);
      } else {
        const fn = m.body === null ? null : new FunctionObj(m.name, m, statics, cls);
        add({ ...base, kind: "method", fn, decl: m, isOverride: m.modifiers.isOverride }, m.nameRange);
      }
      overrides.set(m.name, { isOverride: m.modifiers.isOverride, range: m.nameRange });
    }
  }

  for (const [name, { isOverride, range }] of overrides) {
    if (IMPLICIT_OVERRIDES.has(name)) continue;
    const declared = declaredAbove(cls, name);
    if (declared.length > 0 && !isOverride) {
      const names = declared.map((m) => `${m.declaringClass.name}.${name}`).join(", ");
      throw new ScriptError(at(range), `'${name}' hides ${names}; mark it override`);
    }
    if (declared.length === 0 && isOverride) {
      throw new ScriptError(at(range), `'${name}' overrides nothing in the bases of ${node.name}`);
    }
  }

  // static functions first so static initializers can call any of them
  for (const m of node.members) {
    if (m.kind === "FunctionDeclaration" && m.modifiers.isStatic) await ev.declareFunction(m, statics);
  }
  for (const m of node.members) {
    if (m.kind === "VariableDeclaration" && m.modifiers.isStatic) await ev.declareVariable(m, statics);
    else if (m.kind === "ClassDeclaration") await declareClass(ev, m, statics);
    else if (m.kind === "EnumDeclaration") await declareEnum(ev, m, statics);
  }

  if (node.isObject) {
    const singleton = new InstanceObj(cls);
    await initialize(ev, singleton, cls, positional([]), new Set());
    cls.singleton = singleton;
    scope.define(node.name, singleton, { visibility });
  }
  return cls;
}

/* =========================================================
   Enums
   ========================================================= */

export async function declareEnum(_ev: Evaluator, node: EnumDeclaration, scope: Scope): Promise<ClassObj> {
  const cls = new ClassObj(node.name, [Types.Enum], "enum", node, scope);
  const statics = new Scope(scope, { classContext: cls });
  cls.statics = statics;

  node.entries.forEach((e, i) => {
    if (statics.getLocal(e.name)) {
      throw new ScriptError(toSourcePosition(scope.fileName, e.range.start), `enum ${node.name} declares '${e.name}' twice`);
    }
    const entry = new EnumEntryObj(cls, e.name, i);
    cls.enumEntries.push(entry);
    statics.define(e.name, entry);
  });

  statics.define("entries", new ListObj([...cls.enumEntries]));
  statics.define(
    "valueOf",
    native("valueOf", (args) => {
      const name = expectString(arg(args, 0, "name"), `${cls.name}.valueOf`);
      const entry = cls.enumEntries.find((e) => e.name === name);
      if (!entry) throw illegalArgument(`${cls.name} has no entry '${name}'`);
      return entry;
    }),
  );

  scope.define(node.name, cls, { visibility: node.modifiers.visibility });
  return cls;
}

/* =========================================================
   Construction
   ========================================================= */

export async function construct(ev: Evaluator, cls: ClassObj, args: Args, _range: Range): Promise<InstanceObj> {
  if (cls.kind === "enum") throw new QuillRuntimeError("IllegalOperationException", `enum ${cls.name} cannot be instantiated`);
  if (cls.kind === "object") throw new QuillRuntimeError("IllegalOperationException", `object ${cls.name} is a singleton`);
  if (cls.isBuiltin) throw illegalArgument(`${cls.name} cannot be instantiated`);

  if (cls.decl?.kind === "ClassDeclaration" && cls.decl.modifiers.isAbstract) {
    throw new QuillRuntimeError("IllegalStateException", `abstract class ${cls.name} cannot be instantiated`);
  }
  const missing = cls.abstractMembers();
  if (missing.length > 0) {
    throw new QuillRuntimeError("IllegalStateException", `${cls.name} does not implement ${missing.join(", ")}`);
  }

  const inst = new InstanceObj(cls);
  await initialize(ev, inst, cls, args, new Set());
  return inst;
}

async function initialize(ev: Evaluator, inst: InstanceObj, c: ClassObj, args: Args, done: Set<ClassObj>): Promise<void> {
  done.add(c);
  const decl = c.decl;
  if (!decl || decl.kind !== "ClassDeclaration") return;

  const frame = new Scope(c.statics ?? c.declScope ?? ev.rootScope, { thisObj: inst, classContext: c });
  const params: Parameter[] = decl.constructorParams ?? [];
  await ev.bindParameters(params, args, frame, c.name);

  for (let i = 0; i < c.bases.length; i++) {
    const base = c.bases[i];
    if (done.has(base) || base.isBuiltin) continue;
    const call = decl.bases[i]?.args ?? null;
    const baseArgs = call ? await ev.evalArguments(call, null, frame) : positional([]);
    await initialize(ev, inst, base, baseArgs, done);
  }

  for (const p of params) {
    const m = c.members.get(p.name);
    if (m && m.kind === "field" && m.decl === null) inst.fields.set(p.name, frame.getLocal(p.name)?.value ?? null);
  }

  for (const m of decl.members) {
    switch (m.kind) {
      case "VariableDeclaration": {
        if (m.modifiers.isStatic) break;
        if (m.delegate) {
          const d = await ev.evaluate(m.delegate, frame);
          inst.delegates.set(m.name, await ev.bindDelegate(d, m.name, m.mutable ? "Var" : "Val", inst));
          break;
        }
        const member = c.members.get(m.name);
        if (member && member.kind === "property" && !member.hasBacking) break;
        inst.fields.set(m.name, m.initializer ? await ev.evaluate(m.initializer, frame) : null);
        break;
      }
      case "FunctionDeclaration":
        if (!m.modifiers.isStatic && m.delegate) {
          const d = await ev.evaluate(m.delegate, frame);
          inst.delegates.set(m.name, await ev.bindDelegate(d, m.name, "Callable", inst));
        }
        break;
      case "InitBlock":
        await ev.evalBlock(m.body, frame);
        break;
      default:
        break;
    }
  }
}
