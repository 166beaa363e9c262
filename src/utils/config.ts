// src/utils/config.ts
//
// quill.config.json
// -----------------
// Found at the workspace root (see tryResolveWorkspaceRoot). Every key is
// optional:
//
//   {
//     "logLevel": "info",          // silent | error | warn | info | debug | trace
//     "usePool": true,             // frame pooling for closure-free functions
//     "allowProcess": false,       // quill.io.process permitted at all
//     "fsRoots": ["./data"],       // quill.io.fs confined to these dirs; [] = no limit
//     "modulePaths": ["./lib"]     // *.quill files here are registered as packages
//   }
//
// Relative directories resolve against the directory holding the file.

import * as fs from "fs/promises";
import * as path from "path";

import { ConfigError } from "../diagnostics/scriptErrors";
import { isLogLevel } from "./logger";
import type { LogLevel } from "./logger";
import { isMissing, tryResolveWorkspaceRoot } from "./paths";

export const CONFIG_FILE = "quill.config.json";

export type QuillConfig = {
  logLevel: LogLevel;
  usePool: boolean;
  allowProcess: boolean;
  fsRoots: string[];
  modulePaths: string[];
  /** Absolute path of the file the values came from; null for defaults. */
  source: string | null;
};

export const DEFAULT_CONFIG: Readonly<QuillConfig> = Object.freeze({
  logLevel: "warn",
  usePool: true,
  allowProcess: false,
  fsRoots: [],
  modulePaths: [],
  source: null,
});

/**
 * Loads the config of the workspace containing `startDir`. No workspace or no
 * config file: the defaults.
 */
export async function loadConfig(startDir: string): Promise<QuillConfig> {
  const root = await tryResolveWorkspaceRoot(startDir);
  if (root === null) return { ...DEFAULT_CONFIG };

  const file = path.join(root, CONFIG_FILE);
  let text: string;
  try {
    text = await fs.readFile(file, "utf8");
  } catch (e) {
    if (isMissing(e)) return { ...DEFAULT_CONFIG };
    throw e;
  }
  return parseConfig(text, file);
}

/** Validates the JSON text of a config file located at `file`. */
export function parseConfig(text: string, file: string): QuillConfig {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (e) {
    throw new ConfigError("<file>", `${file} is not valid JSON: ${e instanceof Error ? e.message : String(e)}`);
  }
  if (!isRecord(raw)) throw new ConfigError("<file>", `${file} must contain a JSON object`);

  const dir = path.dirname(file);
  const known = new Set(["logLevel", "usePool", "allowProcess", "fsRoots", "modulePaths"]);
  for (const key of Object.keys(raw)) {
    if (!known.has(key)) throw new ConfigError(key, "unknown key");
  }

  return {
    logLevel: readLogLevel(raw.logLevel),
    usePool: readBool(raw, "usePool", DEFAULT_CONFIG.usePool),
    allowProcess: readBool(raw, "allowProcess", DEFAULT_CONFIG.allowProcess),
    fsRoots: readDirs(raw, "fsRoots", dir),
    modulePaths: readDirs(raw, "modulePaths", dir),
    source: file,
  };
}

/* =========================================================
   Field readers
   ========================================================= */

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

function readLogLevel(v: unknown): LogLevel {
  if (v === undefined) return DEFAULT_CONFIG.logLevel;
  if (isLogLevel(v)) return v;
  throw new ConfigError("logLevel", `expected one of silent, error, warn, info, debug, trace; got ${JSON.stringify(v)}`);
}

function readBool(raw: Record<string, unknown>, key: string, fallback: boolean): boolean {
  const v = raw[key];
  if (v === undefined) return fallback;
  if (typeof v === "boolean") return v;
  throw new ConfigError(key, `expected a boolean, got ${JSON.stringify(v)}`);
}

function readDirs(raw: Record<string, unknown>, key: string, baseDir: string): string[] {
  const v = raw[key];
  if (v === undefined) return [];
  if (!Array.isArray(v)) throw new ConfigError(key, "expected an array of directory paths");
  return v.map((item, i) => {
    if (typeof item !== "string" || item.trim() === "") {
      throw new ConfigError(`${key}[${i}]`, `expected a non-empty string, got ${JSON.stringify(item)}`);
    }
    return path.resolve(baseDir, item);
  });
}
