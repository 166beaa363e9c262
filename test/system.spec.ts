// test/system.spec.ts

import * as fs from "fs/promises";
import * as os from "os";
import * as path from "path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { ExecutionError, QuillRuntimeError } from "../src/diagnostics/scriptErrors";
import { FsAccessPolicy, ProcessAccessPolicy } from "../src/system/policy";
import { evalText, lines, rejection, testEngine } from "./helpers";

describe("FsAccessPolicy", () => {
  it("denies everything under denyAll", () => {
    expect(FsAccessPolicy.denyAll().check({ kind: "OpenRead", path: "/x" })).toEqual({
      allowed: false,
      reason: "filesystem access denied: OpenRead",
    });
  });

  it("confines every touched path to the roots", () => {
    const policy = FsAccessPolicy.roots(["/data"]);
    expect(policy.check({ kind: "OpenRead", path: "/data/a.txt" })).toEqual({ allowed: true });
    expect(policy.check({ kind: "OpenRead", path: "/etc/hosts" })).toEqual({
      allowed: false,
      reason: "OpenRead outside the allowed directories: /etc/hosts",
    });
    expect(policy.check({ kind: "Rename", from: "/data/a.txt", to: "/tmp/a.txt" })).toEqual({
      allowed: false,
      reason: "Rename outside the allowed directories: /tmp/a.txt",
    });
  });

  it("treats an empty root list as no limit", () => {
    expect(FsAccessPolicy.roots([]).check({ kind: "Delete", path: "/anything" })).toEqual({ allowed: true });
  });

  it("allows only reads and listings when read-only", () => {
    const policy = FsAccessPolicy.readOnly();
    expect(policy.check({ kind: "ListDir", path: "/d" }).allowed).toBe(true);
    expect(policy.check({ kind: "OpenWrite", path: "/d/f" })).toEqual({ allowed: false, reason: "filesystem is read-only: OpenWrite" });
  });

  it("raises IllegalOperationException from require", () => {
    let caught: unknown = null;
    try {
      FsAccessPolicy.denyAll().require({ kind: "Delete", path: "/x" });
    } catch (e) {
      caught = e;
    }
    expect(caught).toBeInstanceOf(QuillRuntimeError);
    if (!(caught instanceof QuillRuntimeError)) return;
    expect(caught.code).toBe("IllegalOperationException");
    expect(caught.message).toBe("filesystem access denied: Delete");
  });
});

describe("ProcessAccessPolicy", () => {
  it("allows only the listed commands and never a shell", () => {
    const policy = ProcessAccessPolicy.allowCommands(["echo"]);
    expect(policy.check({ kind: "Execute", command: "echo", args: ["hi"] })).toEqual({ allowed: true });
    expect(policy.check({ kind: "Execute", command: "ls", args: [] })).toEqual({ allowed: false, reason: "command not allowed: ls" });
    expect(policy.check({ kind: "Shell", command: "echo hi" })).toEqual({ allowed: false, reason: "shell access denied" });
  });

  it("is closed by default in an engine", async () => {
    const { engine } = await testEngine();
    const e = await rejection(engine.eval('import quill.io.process\nexecute("echo", listOf("hi"))'));
    expect(e).toBeInstanceOf(ExecutionError);
    if (!(e instanceof ExecutionError)) return;
    expect(e.className).toBe("IllegalOperationException");
    expect(e.detail).toBe("process access denied: Execute");
  });
});

describe("quill.io.fs", () => {
  let dir = "";

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "quill-fs-"));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it("reads, writes and lists files relative to the engine cwd", async () => {
    const { text } = await evalText(
      lines(
        "import quill.io.fs",
        'mkdirs("notes/sub")',
        'writeText("notes/a.txt", "hello")',
        'appendText("notes/a.txt", " world")',
        'copy("notes/a.txt", "notes/b.txt")',
        'listOf(readText("notes/a.txt"), exists("notes/b.txt"), isDirectory("notes/sub"), isFile("notes/sub"), list("notes"), size("notes/a.txt"))',
      ),
      { cwd: dir },
    );
    expect(text).toBe("[hello world, true, true, false, [a.txt, b.txt, sub], 11]");
    expect(await fs.readFile(path.join(dir, "notes", "b.txt"), "utf8")).toBe("hello world");
  });

  it("moves and deletes", async () => {
    await fs.writeFile(path.join(dir, "old.txt"), "x", "utf8");
    const { text } = await evalText(
      lines("import quill.io.fs", 'move("old.txt", "moved/new.txt")', 'listOf(exists("old.txt"), delete("moved/new.txt"), delete("moved/new.txt"))'),
      { cwd: dir },
    );
    expect(text).toBe("[false, true, false]");
  });

  it("lets scripts catch a denied operation", async () => {
    const { value } = await evalText(
      lines(
        "import quill.io.fs",
        'try { writeText("x.txt", "no") } catch (e: IllegalOperationException) { e.message }',
      ),
      { cwd: dir, fsPolicy: FsAccessPolicy.readOnly() },
    );
    expect(value).toBe("filesystem is read-only: CreateFile");
  });

  it("raises IllegalStateException for I/O failures", async () => {
    const { engine } = await testEngine({ cwd: dir });
    const e = await rejection(engine.eval('import quill.io.fs\nreadText("missing.txt")'));
    expect(e).toBeInstanceOf(ExecutionError);
    if (!(e instanceof ExecutionError)) return;
    expect(e.className).toBe("IllegalStateException");
    expect(e.detail.startsWith(path.join(dir, "missing.txt"))).toBe(true);
  });
});
