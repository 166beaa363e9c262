// src/runner/run.ts
//
// Quill Runner
// ------------
// Runs Quill source end-to-end and reports everything in one result:
//
// 1) compile()  -> strict parse; on failure, a lenient pass collects every
//                  lexer/parser diagnostic
// 2) engine     -> executes the program with output captured
//
// Usable from the CLI, from tests (captured stdout/stderr) and from embedders.
//
// Exports:
//   - runSource(source, options): Promise<RunResult>
//   - runFile(path, options): Promise<RunResult>
//   - engineOptionsFromConfig(config, options)
//   - loadModuleSources(dirs)

import * as fs from "fs/promises";
import * as path from "path";

import { compileLenient } from "../core/compiler";
import type { Script } from "../core/compiler";
import { Engine } from "../core/engine";
import type { EngineOptions } from "../core/engine";
import { fromParseErrors, fromScriptError, sortDiagnostics, toDiagnostic } from "../diagnostics/errors";
import type { Diagnostic } from "../diagnostics/errors";
import { ScriptError } from "../diagnostics/scriptErrors";
import type { Value } from "../runtime/values";
import { FsAccessPolicy, ProcessAccessPolicy } from "../system/policy";
import { DEFAULT_CONFIG, loadConfig } from "../utils/config";
import type { QuillConfig } from "../utils/config";
import { createLogger } from "../utils/logger";

/* =========================================================
   Public types
   ========================================================= */

export type RunOptions = {
  fileName?: string; // for diagnostics
  cwd?: string; // default: process.cwd()

  // Effective config; runFile loads quill.config.json when this is absent.
  config?: QuillConfig;

  // Passed to the engine; explicit values win over the config.
  engine?: EngineOptions;

  // Also forward program output as it is produced (CLI).
  echo?: { out: (text: string) => void; err: (text: string) => void };

  signal?: AbortSignal;
};

export type RunResult = {
  ok: boolean;
  // 0 ok, 1 uncaught exception or cancellation, 2 compile or import error
  exitCode: number;

  stdout: string;
  stderr: string;

  diagnostics: Diagnostic[];

  // Value of the last top-level statement, and its display string
  value?: Value;
  valueText?: string;

  timings: {
    compileMs: number;
    execMs: number;
    totalMs: number;
  };
};

/* =========================================================
   Runner
   ========================================================= */

export async function runSource(source: string, options: RunOptions = {}): Promise<RunResult> {
  const started = nowMs();
  const fileName = options.fileName ?? "<eval>";
  const config = options.config ?? DEFAULT_CONFIG;

  const stdoutBuf: string[] = [];
  const stderrBuf: string[] = [];
  const out = (s: string): void => {
    stdoutBuf.push(s);
    options.echo?.out(s);
  };
  const err = (s: string): void => {
    stderrBuf.push(s);
    options.echo?.err(s);
  };

  const engineOptions = engineOptionsFromConfig(config, { ...options.engine, cwd: options.cwd ?? options.engine?.cwd });
  const engine = new Engine({
    ...engineOptions,
    fileName,
    host: { ...engineOptions.host, print: (line) => out(`${line}\n`), write: out },
  });
  const log = engine.logger.child("run");

  const finish = (fields: Pick<RunResult, "ok" | "exitCode" | "diagnostics" | "value" | "valueText">, compileMs: number, execMs: number): RunResult => ({
    ...fields,
    stdout: stdoutBuf.join(""),
    stderr: stderrBuf.join(""),
    diagnostics: sortDiagnostics(fields.diagnostics),
    timings: { compileMs, execMs, totalMs: nowMs() - started },
  });

  // --- COMPILE ---
  const c0 = nowMs();
  let script: Script;
  try {
    await engine.ready();
    const modules = await loadModuleSources(config.modulePaths);
    if (modules.length > 0) await engine.modules.registerSources(modules);
    script = engine.compile(source, fileName);
  } catch (e) {
    const compileMs = nowMs() - c0;
    if (!(e instanceof ScriptError)) throw e;

    const lenient = e.stage === "declaration" || e.pos.file !== fileName ? [] : compileLenient(source, fileName).diagnostics;
    const diagnostics = lenient.length > 0 ? fromParseErrors(lenient, fileName) : [fromScriptError(e)];
    err(`${e.message}\n`);
    log.debug("compile failed", { fileName, errors: diagnostics.length });
    return finish({ ok: false, exitCode: 2, diagnostics }, compileMs, 0);
  }
  const compileMs = nowMs() - c0;

  // --- EXECUTION ---
  const e0 = nowMs();
  try {
    const value = await engine.execute(script, undefined, { signal: options.signal });
    const valueText = await engine.evaluator(options.signal).stringify(value);
    return finish({ ok: true, exitCode: 0, diagnostics: [], value, valueText }, compileMs, nowMs() - e0);
  } catch (e) {
    const execMs = nowMs() - e0;
    const diagnostic = toDiagnostic(e);
    if (!diagnostic) throw e;

    err(`${e instanceof Error ? e.message : String(e)}\n`);
    const exitCode = e instanceof ScriptError ? 2 : 1;
    return finish({ ok: false, exitCode, diagnostics: [diagnostic] }, compileMs, execMs);
  } finally {
    log.debug("run finished", { fileName, pool: engine.poolStats() });
  }
}

export async function runFile(filePath: string, options: RunOptions = {}): Promise<RunResult> {
  const abs = path.resolve(options.cwd ?? process.cwd(), filePath);
  const source = await fs.readFile(abs, "utf8");
  const config = options.config ?? (await loadConfig(path.dirname(abs)));

  return runSource(source, {
    ...options,
    config,
    fileName: options.fileName ?? abs,
    cwd: options.cwd ?? path.dirname(abs),
  });
}

/* =========================================================
   Config -> engine
   ========================================================= */

export function engineOptionsFromConfig(config: QuillConfig, explicit: EngineOptions = {}): EngineOptions {
  return {
    ...explicit,
    logger: explicit.logger ?? createLogger({ name: "quill", level: config.logLevel }),
    usePool: explicit.usePool ?? config.usePool,
    fsPolicy: explicit.fsPolicy ?? FsAccessPolicy.roots(config.fsRoots),
    processPolicy: explicit.processPolicy ?? (config.allowProcess ? ProcessAccessPolicy.permitAll() : ProcessAccessPolicy.denyAll()),
  };
}

/** Every `*.quill` file directly inside `dirs`, sorted by path. */
export async function loadModuleSources(dirs: string[]): Promise<{ text: string; fileName: string }[]> {
  const files: string[] = [];
  for (const dir of dirs) {
    const names = await fs.readdir(dir);
    for (const n of names) {
      if (n.endsWith(".quill")) files.push(path.join(dir, n));
    }
  }
  files.sort();

  const out: { text: string; fileName: string }[] = [];
  for (const f of files) out.push({ text: await fs.readFile(f, "utf8"), fileName: f });
  return out;
}

/* =========================================================
   Helpers
   ========================================================= */

function nowMs(): number {
  return performance.now();
}
