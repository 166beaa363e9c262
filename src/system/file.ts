// src/system/file.ts
//
// quill.io.fs: text files and directories.
//
//   readText(path)            writeText(path, text)     appendText(path, text)
//   exists(path)              isFile(path)              isDirectory(path)
//   list(dir)                 mkdirs(dir)               delete(path)
//   copy(from, to)            move(from, to)            size(path)
//
// Paths are resolved against the module's cwd ("~" expands to home). Every
// operation asks the FsAccessPolicy first. All text is UTF-8. I/O failures
// raise IllegalStateException with the OS message.

import type { Stats } from "fs";
import * as fs from "fs/promises";
import * as path from "path";

import type { ModuleScope } from "../core/scope";
import { QuillRuntimeError } from "../diagnostics/scriptErrors";
import type { ModuleBuilder } from "../modules/registry";
import { NativeFunction } from "../runtime/functions";
import type { Args, NativeImpl } from "../runtime/interop";
import { arg, expectString } from "../runtime/natives";
import { ListObj, VOID } from "../runtime/values";
import type { Logger } from "../utils/logger";
import { silentLogger } from "../utils/logger";
import { isMissing, resolveUserPath } from "../utils/paths";
import { FsAccessPolicy } from "./policy";
import type { FsAccessOp } from "./policy";

export const FS_PACKAGE = "quill.io.fs";

export type FileModuleOptions = {
  policy?: FsAccessPolicy;
  cwd?: string;
  homeDir?: string;
  logger?: Logger;
};

export function fileModule(options: FileModuleOptions = {}): ModuleBuilder {
  const policy = options.policy ?? FsAccessPolicy.permitAll();
  const logger = options.logger ?? silentLogger();
  const env = { cwd: options.cwd ?? process.cwd(), homeDir: options.homeDir };

  const resolve = (v: Args, i: number, name: string, fn: string): string =>
    resolveUserPath(expectString(arg(v, i, name), `${FS_PACKAGE}.${fn}`), env);

  const guard = (op: FsAccessOp): void => {
    policy.require(op);
    logger.debug("fs", op);
  };

  const functions: Record<string, NativeImpl> = {
    readText: async (args) => {
      const p = resolve(args, 0, "path", "readText");
      guard({ kind: "OpenRead", path: p });
      return io(p, () => fs.readFile(p, "utf8"));
    },

    writeText: async (args) => {
      const p = resolve(args, 0, "path", "writeText");
      const text = expectString(arg(args, 1, "text"), `${FS_PACKAGE}.writeText`);
      if (!(await pathExists(p))) guard({ kind: "CreateFile", path: p });
      guard({ kind: "OpenWrite", path: p });
      await io(p, () => fs.writeFile(p, text, "utf8"));
      return VOID;
    },

    appendText: async (args) => {
      const p = resolve(args, 0, "path", "appendText");
      const text = expectString(arg(args, 1, "text"), `${FS_PACKAGE}.appendText`);
      if (!(await pathExists(p))) guard({ kind: "CreateFile", path: p });
      guard({ kind: "OpenAppend", path: p });
      await io(p, () => fs.appendFile(p, text, "utf8"));
      return VOID;
    },

    exists: async (args) => {
      const p = resolve(args, 0, "path", "exists");
      guard({ kind: "OpenRead", path: p });
      return pathExists(p);
    },

    isFile: async (args) => {
      const p = resolve(args, 0, "path", "isFile");
      guard({ kind: "OpenRead", path: p });
      return (await statOrNull(p))?.isFile() ?? false;
    },

    isDirectory: async (args) => {
      const p = resolve(args, 0, "path", "isDirectory");
      guard({ kind: "OpenRead", path: p });
      return (await statOrNull(p))?.isDirectory() ?? false;
    },

    list: async (args) => {
      const p = resolve(args, 0, "dir", "list");
      guard({ kind: "ListDir", path: p });
      const names = await io(p, () => fs.readdir(p));
      return new ListObj(names.sort());
    },

    mkdirs: async (args) => {
      const p = resolve(args, 0, "dir", "mkdirs");
      guard({ kind: "CreateFile", path: p });
      await io(p, () => fs.mkdir(p, { recursive: true }));
      return VOID;
    },

    delete: async (args) => {
      const p = resolve(args, 0, "path", "delete");
      guard({ kind: "Delete", path: p });
      if (!(await pathExists(p))) return false;
      await io(p, () => fs.rm(p, { recursive: true }));
      return true;
    },

    copy: async (args) => {
      const from = resolve(args, 0, "from", "copy");
      const to = resolve(args, 1, "to", "copy");
      guard({ kind: "OpenRead", path: from });
      if (!(await pathExists(to))) guard({ kind: "CreateFile", path: to });
      guard({ kind: "OpenWrite", path: to });
      await io(from, async () => {
        await fs.mkdir(path.dirname(to), { recursive: true });
        await fs.copyFile(from, to);
      });
      return VOID;
    },

    move: async (args) => {
      const from = resolve(args, 0, "from", "move");
      const to = resolve(args, 1, "to", "move");
      guard({ kind: "Rename", from, to });
      await io(from, async () => {
        await fs.mkdir(path.dirname(to), { recursive: true });
        await fs.rename(from, to);
      });
      return VOID;
    },

    size: async (args) => {
      const p = resolve(args, 0, "path", "size");
      guard({ kind: "OpenRead", path: p });
      const st = await io(p, () => fs.stat(p));
      return BigInt(st.size);
    },
  };

  return (scope: ModuleScope) => defineFunctions(scope, functions);
}

export function defineFunctions(scope: ModuleScope, functions: Record<string, NativeImpl>): void {
  for (const [name, impl] of Object.entries(functions)) scope.define(name, new NativeFunction(name, impl));
}

/* =========================================================
   FS helpers
   ========================================================= */

async function io<T>(target: string, op: () => Promise<T>): Promise<T> {
  try {
    return await op();
  } catch (e) {
    if (e instanceof QuillRuntimeError) throw e;
    const message = e instanceof Error ? e.message : String(e);
    throw new QuillRuntimeError("IllegalStateException", `${target}: ${message}`);
  }
}

async function statOrNull(p: string): Promise<Stats | null> {
  try {
    return await fs.stat(p);
  } catch (e) {
    if (isMissing(e)) return null;
    throw new QuillRuntimeError("IllegalStateException", `${p}: ${e instanceof Error ? e.message : String(e)}`);
  }
}

async function pathExists(p: string): Promise<boolean> {
  return (await statOrNull(p)) !== null;
}
