#!/usr/bin/env node
// src/cli.ts
//
// `quill` bin entry. See src/runner/cli.ts for the arguments.

import { runCli } from "./runner/cli";

runCli(process.argv.slice(2), {
  out: (text) => process.stdout.write(text),
  err: (text) => process.stderr.write(text),
  cwd: process.cwd(),
}).then(
  (code) => {
    process.exitCode = code;
  },
  (e: unknown) => {
    process.stderr.write(`quill: ${e instanceof Error ? e.message : String(e)}\n`);
    process.exitCode = 1;
  },
);
