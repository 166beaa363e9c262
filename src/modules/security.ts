// src/modules/security.ts
//
// Import security. A SecurityManager decides whether a package, or one named
// symbol of it, may be imported. The compiler asks it for every `import` of a
// script before anything runs; the registry asks again when the import
// executes, so a script compiled without a registry is still checked.
//
// Package patterns: an exact name (`quill.io.fs`) or a prefix ending in `.*`
// (`quill.io.*` matches `quill.io.fs` and `quill.io.process`, not `quill.io`).

export interface SecurityManager {
  canImportModule(packageName: string): boolean;
  canImportSymbol(packageName: string, symbol: string): boolean;
}

export function matchesPackage(pattern: string, packageName: string): boolean {
  if (pattern.endsWith(".*")) return packageName.startsWith(pattern.slice(0, -1));
  return pattern === packageName;
}

export function allowAll(): SecurityManager {
  return {
    canImportModule: () => true,
    canImportSymbol: () => true,
  };
}

/** Only the listed packages; `symbols` further narrows what each may export. */
export function allowList(packages: string[], symbols: Record<string, string[]> = {}): SecurityManager {
  return {
    canImportModule: (name) => packages.some((p) => matchesPackage(p, name)),
    canImportSymbol: (name, symbol) => {
      if (!packages.some((p) => matchesPackage(p, name))) return false;
      const allowed = symbols[name];
      return allowed === undefined || allowed.includes(symbol);
    },
  };
}

/** Everything except the listed packages and the listed symbols. */
export function denyList(packages: string[], symbols: Record<string, string[]> = {}): SecurityManager {
  return {
    canImportModule: (name) => !packages.some((p) => matchesPackage(p, name)),
    canImportSymbol: (name, symbol) => {
      if (packages.some((p) => matchesPackage(p, name))) return false;
      return !(symbols[name] ?? []).includes(symbol);
    },
  };
}
