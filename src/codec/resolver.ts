// src/codec/resolver.ts
//
// Class-name resolution for decoding. Encoded instances carry only a simple
// class name; the decoder asks each stage in turn and the first hit wins, so
// a class declared closer to the decode scope shadows one further out:
//
//   1. direct bindings of the decode scope
//   2. the scope chain, receiver class members and statics included
//   3. the nearest module scope, its own imports and its ancestors
//   4. globals: the root scope, then every loaded module by package name
//   5. a dotted name walked segment by segment (`Outer.Inner`)

import type { Scope } from "../core/scope";
import type { ModuleRegistry } from "../modules/registry";
import { ClassObj, InstanceObj } from "../runtime/classes";
import type { Value } from "../runtime/values";

export type ResolveStage = {
  name: string;
  resolve: (className: string, scope: Scope) => ClassObj | null;
};

function asClass(v: Value | undefined): ClassObj | null {
  return v instanceof ClassObj ? v : null;
}

function staticClass(cls: ClassObj, name: string): ClassObj | null {
  for (const c of cls.mro) {
    const found = asClass(c.statics?.getLocal(name)?.value);
    if (found) return found;
  }
  return null;
}

export function resolutionStages(registry: ModuleRegistry | null): ResolveStage[] {
  return [
    {
      name: "direct",
      resolve: (n, scope) => asClass(scope.getLocal(n)?.value),
    },
    {
      name: "chain",
      resolve: (n, scope) => {
        for (let s: Scope | null = scope; s; s = s.parent) {
          const local = asClass(s.getLocal(n)?.value);
          if (local) return local;
          if (s.classContext) {
            const nested = staticClass(s.classContext, n);
            if (nested) return nested;
          }
          if (s.receiver && s.thisObj instanceof InstanceObj) {
            const nested = staticClass(s.thisObj.cls, n);
            if (nested) return nested;
          }
        }
        return null;
      },
    },
    {
      name: "module",
      resolve: (n, scope) => {
        const mod = scope.moduleScope();
        return mod ? asClass(mod.lookup(n)?.value) : asClass(scope.lookupImported(n)?.value);
      },
    },
    {
      name: "globals",
      resolve: (n, scope) => {
        const root = asClass(scope.root().getLocal(n)?.value);
        if (root) return root;
        for (const mod of registry?.loadedModules() ?? []) {
          const b = mod.getLocal(n);
          if (b && b.visibility === "public") {
            const cls = asClass(b.value);
            if (cls) return cls;
          }
        }
        return null;
      },
    },
    {
      name: "qualified",
      resolve: (n, scope) => {
        const parts = n.split(".");
        if (parts.length < 2) return null;
        let cls = asClass(scope.lookup(parts[0])?.value);
        for (const part of parts.slice(1)) {
          if (!cls) return null;
          cls = staticClass(cls, part);
        }
        return cls;
      },
    },
  ];
}

export class ClassResolver {
  private readonly stages: ResolveStage[];
  private readonly cache = new Map<string, ClassObj | null>();

  constructor(
    private readonly scope: Scope,
    registry: ModuleRegistry | null,
  ) {
    this.stages = resolutionStages(registry);
  }

  /** Cached per decode call; the scope does not change while decoding. */
  public resolve(className: string): ClassObj | null {
    const cached = this.cache.get(className);
    if (cached !== undefined) return cached;
    let found: ClassObj | null = null;
    for (const stage of this.stages) {
      found = stage.resolve(className, this.scope);
      if (found) break;
    }
    this.cache.set(className, found);
    return found;
  }
}
