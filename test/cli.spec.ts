// test/cli.spec.ts

import { describe, expect, it } from "vitest";

import { USAGE, parseCliArgs, runCli } from "../src/runner/cli";

function io(): { out: string[]; err: string[]; io: { out: (t: string) => void; err: (t: string) => void; cwd: string } } {
  const out: string[] = [];
  const err: string[] = [];
  return {
    out,
    err,
    io: {
      out: (t) => {
        out.push(t);
      },
      err: (t) => {
        err.push(t);
      },
      cwd: process.cwd(),
    },
  };
}

describe("parseCliArgs", () => {
  it("reads inline code and flags", () => {
    expect(parseCliArgs(["-e", "1 + 1", "--print-value", "--log-level", "silent"])).toEqual({
      kind: "eval",
      code: "1 + 1",
      flags: { logLevel: "silent", noPool: false, allowProcess: false, printValue: true, json: false },
    });
  });

  it("reads a file argument", () => {
    expect(parseCliArgs(["main.quill", "--no-pool"])).toEqual({
      kind: "file",
      file: "main.quill",
      flags: { noPool: true, allowProcess: false, printValue: false, json: false },
    });
  });

  it("reports usage errors", () => {
    expect(parseCliArgs(["--bogus"])).toEqual({ kind: "error", message: "unknown flag '--bogus'" });
    expect(parseCliArgs(["-e"])).toEqual({ kind: "error", message: "-e needs an argument" });
    expect(parseCliArgs(["--log-level", "loud"])).toEqual({ kind: "error", message: "--log-level: unknown level 'loud'" });
    expect(parseCliArgs(["a.quill", "-e", "1"])).toEqual({ kind: "error", message: "give either a file or -e, not both" });
  });

  it("shows help without arguments", () => {
    expect(parseCliArgs([])).toEqual({ kind: "help" });
  });
});

describe("runCli", () => {
  it("prints usage for --help", async () => {
    const t = io();
    expect(await runCli(["--help"], t.io)).toBe(0);
    expect(t.out).toEqual([USAGE]);
  });

  it("exits with 64 on a usage error", async () => {
    const t = io();
    expect(await runCli(["--nope"], t.io)).toBe(64);
    expect(t.err).toEqual([`quill: unknown flag '--nope'\n${USAGE}`]);
  });

  it("runs inline code and prints its value", async () => {
    const t = io();
    expect(await runCli(["-e", 'println("hi")\n20 + 22', "--print-value", "--log-level", "silent"], t.io)).toBe(0);
    expect(t.out).toEqual(["hi\n", "42\n"]);
  });

  it("returns the run's exit code", async () => {
    const t = io();
    expect(await runCli(["-e", "val = 1", "--log-level", "silent"], t.io)).toBe(2);
    expect(t.err).toEqual(["<command line>:1:5: expected a name after 'val'\n"]);
  });

  it("prints the result as JSON", async () => {
    const t = io();
    expect(await runCli(["-e", 'print("x")', "--json", "--log-level", "silent"], t.io)).toBe(0);
    expect(t.out).toHaveLength(1);
    const parsed: unknown = JSON.parse(t.out[0]);
    expect(parsed).toMatchObject({ ok: true, exitCode: 0, stdout: "x", stderr: "", valueText: "void", diagnostics: [] });
  });
});
