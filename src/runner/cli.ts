// src/runner/cli.ts
//
// Command line front end, kept apart from the bin entry so it can be driven
// with any argv.
//
//   quill <file.quill>          run a file (config from its workspace)
//   quill -e "<code>"           run inline code
//
// Flags:
//   --log-level <level>         override the config's logLevel
//   --no-pool                   disable frame pooling
//   --allow-process             permit quill.io.process
//   --print-value               print the value of the last statement
//   --json                      print the RunResult as JSON instead of program output

import * as path from "path";

import { formatDiagnostic } from "../diagnostics/errors";
import { DEFAULT_CONFIG, loadConfig } from "../utils/config";
import type { QuillConfig } from "../utils/config";
import { isLogLevel, safeStringify } from "../utils/logger";
import type { LogLevel } from "../utils/logger";
import { runFile, runSource } from "./run";
import type { RunResult } from "./run";

export type CliArgs =
  | { kind: "file"; file: string; flags: CliFlags }
  | { kind: "eval"; code: string; flags: CliFlags }
  | { kind: "help" }
  | { kind: "error"; message: string };

export type CliFlags = {
  logLevel?: LogLevel;
  noPool: boolean;
  allowProcess: boolean;
  printValue: boolean;
  json: boolean;
};

export type CliIO = {
  out: (text: string) => void;
  err: (text: string) => void;
  cwd: string;
};

export const USAGE = `Usage:
  quill <file.quill> [flags]
  quill -e "<code>" [flags]

Flags:
  --log-level <level>   silent | error | warn | info | debug | trace
  --no-pool             disable frame pooling
  --allow-process       permit quill.io.process
  --print-value         print the value of the last statement
  --json                print the run result as JSON
`;

export function parseCliArgs(argv: string[]): CliArgs {
  const flags: CliFlags = { noPool: false, allowProcess: false, printValue: false, json: false };
  let file: string | null = null;
  let code: string | null = null;

  for (let i = 0; i < argv.length; i++) {
    const a = argv[i];
    switch (a) {
      case "-h":
      case "--help":
        return { kind: "help" };
      case "-e":
      case "--eval": {
        const next = argv[++i];
        if (next === undefined) return { kind: "error", message: `${a} needs an argument` };
        code = next;
        break;
      }
      case "--log-level": {
        const next = argv[++i];
        if (!isLogLevel(next)) return { kind: "error", message: `--log-level: unknown level '${next ?? ""}'` };
        flags.logLevel = next;
        break;
      }
      case "--no-pool":
        flags.noPool = true;
        break;
      case "--allow-process":
        flags.allowProcess = true;
        break;
      case "--print-value":
        flags.printValue = true;
        break;
      case "--json":
        flags.json = true;
        break;
      default:
        if (a.startsWith("-")) return { kind: "error", message: `unknown flag '${a}'` };
        if (file !== null) return { kind: "error", message: `unexpected argument '${a}'` };
        file = a;
    }
  }

  if (code !== null && file !== null) return { kind: "error", message: "give either a file or -e, not both" };
  if (code !== null) return { kind: "eval", code, flags };
  if (file !== null) return { kind: "file", file, flags };
  return { kind: "help" };
}

function applyFlags(config: QuillConfig, flags: CliFlags): QuillConfig {
  return {
    ...config,
    logLevel: flags.logLevel ?? config.logLevel,
    usePool: flags.noPool ? false : config.usePool,
    allowProcess: flags.allowProcess || config.allowProcess,
  };
}

/** Runs the CLI; resolves to the process exit code. */
export async function runCli(argv: string[], io: CliIO): Promise<number> {
  const args = parseCliArgs(argv);
  if (args.kind === "help") {
    io.out(USAGE);
    return 0;
  }
  if (args.kind === "error") {
    io.err(`quill: ${args.message}\n${USAGE}`);
    return 64;
  }

  const flags = args.flags;
  const echo = flags.json ? undefined : { out: io.out, err: io.err };
  let result: RunResult;
  if (args.kind === "file") {
    const file = path.resolve(io.cwd, args.file);
    const config = applyFlags(await loadConfig(path.dirname(file)), flags);
    result = await runFile(file, { config, echo });
  } else {
    const config = applyFlags({ ...DEFAULT_CONFIG }, flags);
    result = await runSource(args.code, { cwd: io.cwd, config, echo, fileName: "<command line>" });
  }

  if (flags.json) {
    const { value: _value, ...rest } = result;
    io.out(`${safeStringify({ ...rest, diagnostics: rest.diagnostics.map(formatDiagnostic) })}\n`);
    return result.exitCode;
  }

  if (flags.printValue && result.valueText !== undefined) io.out(`${result.valueText}\n`);
  return result.exitCode;
}
