// src/utils/paths.ts
//
// Path helpers shared by the fs module, its access policy, the config loader
// and the runner.
//
// Exports:
//   - resolveUserPath()
//   - tryResolveWorkspaceRoot()
//   - isWithin()

import * as fs from "fs";
import * as os from "os";
import * as path from "path";

export type ResolvePathEnv = {
  cwd: string;
  homeDir?: string;
};

export const WORKSPACE_MARKERS = ["quill.config.json", "package.json", ".git"] as const;

/**
 * Resolve a script-provided path into an absolute filesystem path.
 * Supports relative paths (from cwd), absolute paths and "~" home expansion.
 */
export function resolveUserPath(userPath: string, env: ResolvePathEnv): string {
  const p = userPath.trim();
  if (!p) return env.cwd;

  if (p === "~" || p.startsWith("~/")) {
    const home = env.homeDir ?? os.homedir();
    return path.resolve(home, p.slice(1).replace(/^\//, ""));
  }

  if (path.isAbsolute(p)) return path.normalize(p);
  return path.resolve(env.cwd, p);
}

/**
 * Walks upwards from `startPath` until a directory holds one of the
 * workspace markers. Returns null at the filesystem root.
 */
export async function tryResolveWorkspaceRoot(startPath: string): Promise<string | null> {
  let current = path.resolve(startPath);

  const st = await statOrNull(current);
  if (st?.isFile()) current = path.dirname(current);

  for (;;) {
    for (const m of WORKSPACE_MARKERS) {
      if (await exists(path.join(current, m))) return current;
    }

    const parent = path.dirname(current);
    if (parent === current) return null;
    current = parent;
  }
}

/** True when `target` is `root` or lies below it. Both must be absolute. */
export function isWithin(root: string, target: string): boolean {
  const rel = path.relative(path.resolve(root), path.resolve(target));
  return rel === "" || (!rel.startsWith("..") && !path.isAbsolute(rel));
}

/* =========================================================
   Internal
   ========================================================= */

async function statOrNull(p: string): Promise<fs.Stats | null> {
  try {
    return await fs.promises.stat(p);
  } catch (e) {
    if (isMissing(e)) return null;
    throw e;
  }
}

async function exists(p: string): Promise<boolean> {
  return (await statOrNull(p)) !== null;
}

export function isMissing(e: unknown): boolean {
  return e instanceof Error && "code" in e && (e.code === "ENOENT" || e.code === "ENOTDIR");
}
