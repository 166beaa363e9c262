// test/runner.spec.ts

import * as fs from "fs/promises";
import * as os from "os";
import * as path from "path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { runFile, runSource } from "../src/runner/run";
import { DEFAULT_CONFIG } from "../src/utils/config";
import { lines } from "./helpers";

const quiet = { ...DEFAULT_CONFIG, logLevel: "silent" as const };

describe("runSource", () => {
  it("captures output and the last value", async () => {
    const result = await runSource('println("hi")\nprint("no newline")\n1 + 1', { config: quiet });
    expect(result.ok).toBe(true);
    expect(result.exitCode).toBe(0);
    expect(result.stdout).toBe("hi\nno newline");
    expect(result.stderr).toBe("");
    expect(result.value).toBe(2n);
    expect(result.valueText).toBe("2");
    expect(result.diagnostics).toEqual([]);
  });

  it("exits with 1 on an uncaught exception", async () => {
    const result = await runSource('println("before")\nthrow IllegalStateException("nope")', { fileName: "t.quill", config: quiet });
    expect(result.ok).toBe(false);
    expect(result.exitCode).toBe(1);
    expect(result.stdout).toBe("before\n");
    expect(result.stderr).toBe("t.quill:2:1: IllegalStateException: nope\n");
    expect(result.diagnostics).toHaveLength(1);
    expect(result.diagnostics[0]).toMatchObject({ code: "EXEC_ERROR", message: "IllegalStateException: nope", file: "t.quill" });
  });

  it("exits with 2 and lists every syntax error", async () => {
    const result = await runSource("val a = )\nval b = ]", { fileName: "bad.quill", config: quiet });
    expect(result.exitCode).toBe(2);
    expect(result.stderr).toBe("bad.quill:1:9: unexpected ')'\n");
    expect(result.diagnostics.map((d) => [d.code, d.range.start.line])).toEqual([
      ["PARSE_ERROR", 0],
      ["PARSE_ERROR", 1],
    ]);
  });

  it("fails on a call the process policy denies", async () => {
    const result = await runSource('import quill.io.process\nexecute("ls")', { fileName: "p.quill", config: quiet });
    expect(result.exitCode).toBe(1);
    expect(result.diagnostics[0].message).toBe("IllegalOperationException: process access denied: Execute");
  });

  it("forwards output to the echo sinks as it is produced", async () => {
    const seen: string[] = [];
    await runSource('println("a")\nprintln("b")', { config: quiet, echo: { out: (t) => seen.push(t), err: (t) => seen.push(`!${t}`) } });
    expect(seen).toEqual(["a\n", "b\n"]);
  });
});

describe("runFile", () => {
  let dir = "";

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "quill-run-"));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it("loads the workspace config and its module paths", async () => {
    await fs.mkdir(path.join(dir, "lib"));
    await fs.writeFile(path.join(dir, "quill.config.json"), JSON.stringify({ logLevel: "silent", modulePaths: ["lib"] }), "utf8");
    await fs.writeFile(path.join(dir, "lib", "util.quill"), lines("package app.util", "fun twice(x) = x * 2"), "utf8");
    await fs.writeFile(path.join(dir, "main.quill"), lines("import app.util", "println(twice(21))"), "utf8");

    const result = await runFile(path.join(dir, "main.quill"));
    expect(result.exitCode).toBe(0);
    expect(result.stdout).toBe("42\n");
  });

  it("resolves fs paths against the script directory", async () => {
    await fs.writeFile(path.join(dir, "package.json"), "{}", "utf8");
    await fs.writeFile(path.join(dir, "data.txt"), "payload", "utf8");
    await fs.writeFile(path.join(dir, "read.quill"), lines("import quill.io.fs", 'readText("data.txt")'), "utf8");

    const result = await runFile("read.quill", { cwd: dir, config: quiet });
    expect(result.valueText).toBe("payload");
  });
});
