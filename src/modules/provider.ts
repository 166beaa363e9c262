// src/modules/provider.ts
//
// What the evaluator needs from a module registry, and how an `import`
// statement links a built module into the importing scope.

import type { ModuleScope, Scope } from "../core/scope";
import { ImportError } from "../diagnostics/scriptErrors";
import type { SourcePosition } from "../diagnostics/scriptErrors";
import type { SecurityManager } from "./security";

export interface ImportProvider {
  readonly security: SecurityManager;
  /**
   * Builds the package on first use; later calls return the same scope.
   * `from` is the importing scope, used to reject cyclic imports.
   */
  importModule(packageName: string, pos?: SourcePosition, from?: Scope): Promise<ModuleScope>;
}

/**
 * Adds `module` to the imports of `target`.
 *
 * `symbols` null imports every public binding. A name already provided by
 * another module imported into the same scope is a conflict.
 */
export function bindImport(
  target: Scope,
  module: ModuleScope,
  symbols: string[] | null,
  security: SecurityManager,
  pos: SourcePosition,
): void {
  const name = module.packageName;

  if (symbols) {
    for (const s of symbols) {
      if (!security.canImportSymbol(name, s)) {
        throw new ImportError(pos, name, `import of '${s}' from '${name}' is not allowed`);
      }
      const b = module.getLocal(s);
      if (!b || b.visibility !== "public") {
        throw new ImportError(pos, name, `package '${name}' has no public symbol '${s}'`);
      }
    }
  }

  const incoming = symbols ?? module.exportedNames();
  for (const imp of target.imports) {
    if (imp.scope === module) continue;
    for (const s of incoming) {
      if (imp.symbols && !imp.symbols.has(s)) continue;
      const other = imp.scope.getLocal(s);
      if (other && other.visibility === "public") {
        throw new ImportError(pos, name, `'${s}' from '${name}' conflicts with '${s}' from '${imp.scope.packageName}'`);
      }
    }
  }

  const existing = target.imports.find((imp) => imp.scope === module);
  if (existing) {
    if (existing.symbols === null) return;
    const merged = symbols === null ? null : new Set([...existing.symbols, ...symbols]);
    existing.symbols = merged;
    return;
  }
  target.imports.push({ scope: module, symbols: symbols ? new Set(symbols) : null });
}
