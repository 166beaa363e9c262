// src/system/process.ts
//
// quill.io.process: run external programs.
//
//   execute(cmd, args = [])   spawn `cmd` directly with an argument list
//   shell(command)            run one command line through the system shell
//
// Both resolve to a map {exitCode, stdout, stderr}; a non-zero exit is a
// result, not an error. A program that cannot be started raises
// IllegalStateException. The ProcessAccessPolicy is asked first (default
// policy of the engine: deny all).

import { spawn } from "child_process";

import { QuillRuntimeError } from "../diagnostics/scriptErrors";
import type { ModuleBuilder } from "../modules/registry";
import type { NativeImpl } from "../runtime/interop";
import { arg, expectList, expectString } from "../runtime/natives";
import { ListObj, MapObj } from "../runtime/values";
import type { Logger } from "../utils/logger";
import { silentLogger } from "../utils/logger";
import { defineFunctions } from "./file";
import { ProcessAccessPolicy } from "./policy";

export const PROCESS_PACKAGE = "quill.io.process";

export type ProcessModuleOptions = {
  policy?: ProcessAccessPolicy;
  cwd?: string;
  logger?: Logger;
};

export type ProcessResult = {
  exitCode: number;
  stdout: string;
  stderr: string;
};

export function processModule(options: ProcessModuleOptions = {}): ModuleBuilder {
  const policy = options.policy ?? ProcessAccessPolicy.denyAll();
  const logger = options.logger ?? silentLogger();
  const cwd = options.cwd ?? process.cwd();

  const functions: Record<string, NativeImpl> = {
    execute: async (args) => {
      const command = expectString(arg(args, 0, "cmd"), `${PROCESS_PACKAGE}.execute`);
      const list = expectList(arg(args, 1, "args", new ListObj([])), `${PROCESS_PACKAGE}.execute`);
      const argv = list.items.map((a) => expectString(a, `${PROCESS_PACKAGE}.execute args`));

      policy.require({ kind: "Execute", command, args: argv });
      logger.debug("execute", { command, args: argv });
      return toMap(await run(command, argv, { cwd, shell: false }));
    },

    shell: async (args) => {
      const command = expectString(arg(args, 0, "command"), `${PROCESS_PACKAGE}.shell`);

      policy.require({ kind: "Shell", command });
      logger.debug("shell", { command });
      return toMap(await run(command, [], { cwd, shell: true }));
    },
  };

  return (scope) => defineFunctions(scope, functions);
}

function toMap(r: ProcessResult): MapObj {
  const m = new MapObj();
  m.set("exitCode", BigInt(r.exitCode));
  m.set("stdout", r.stdout);
  m.set("stderr", r.stderr);
  return m;
}

/* =========================================================
   Spawn
   ========================================================= */

export function run(command: string, args: string[], opts: { cwd: string; shell: boolean }): Promise<ProcessResult> {
  return new Promise((resolve, reject) => {
    const child = spawn(command, args, { cwd: opts.cwd, shell: opts.shell, stdio: ["ignore", "pipe", "pipe"] });

    const out: Buffer[] = [];
    const err: Buffer[] = [];
    child.stdout.on("data", (chunk: Buffer) => out.push(chunk));
    child.stderr.on("data", (chunk: Buffer) => err.push(chunk));

    child.on("error", (e) => {
      reject(new QuillRuntimeError("IllegalStateException", `cannot start '${command}': ${e.message}`));
    });
    child.on("close", (code, signal) => {
      resolve({
        exitCode: code ?? (signal ? 128 : 1),
        stdout: Buffer.concat(out).toString("utf8"),
        stderr: Buffer.concat(err).toString("utf8"),
      });
    });
  });
}
