// test/support.spec.ts

import * as fs from "fs/promises";
import * as os from "os";
import * as path from "path";
import { describe, expect, it, vi } from "vitest";

import {
  dedupeDiagnostics,
  error,
  formatDiagnostic,
  formatDiagnostics,
  fromScriptError,
  mergeDiagnostics,
  sortDiagnostics,
  toDiagnostic,
  warn,
} from "../src/diagnostics/errors";
import type { Diagnostic } from "../src/diagnostics/errors";
import { CancelledError, ConfigError, ImportError, ScriptError } from "../src/diagnostics/scriptErrors";
import { defaultHostServices } from "../src/runtime/interop";
import { DEFAULT_CONFIG, loadConfig, parseConfig } from "../src/utils/config";
import { createLogger, safeStringify } from "../src/utils/logger";
import type { LogSink } from "../src/utils/logger";
import { isWithin, resolveUserPath } from "../src/utils/paths";

function captureSink(): { sink: LogSink; lines: string[] } {
  const lines: string[] = [];
  const push = (msg: string): void => {
    lines.push(msg);
  };
  return { sink: { error: push, warn: push, info: push, debug: push }, lines };
}

describe("config", () => {
  it("resolves directories against the config file", () => {
    const config = parseConfig(JSON.stringify({ logLevel: "debug", fsRoots: ["data"], allowProcess: true }), "/w/quill.config.json");
    expect(config).toEqual({
      logLevel: "debug",
      usePool: true,
      allowProcess: true,
      fsRoots: [path.resolve("/w", "data")],
      modulePaths: [],
      source: "/w/quill.config.json",
    });
  });

  it("rejects unknown keys and bad values", () => {
    expect(() => parseConfig('{"colour": 1}', "/w/quill.config.json")).toThrow(new ConfigError("colour", "unknown key"));
    expect(() => parseConfig('{"usePool": "yes"}', "/w/quill.config.json")).toThrow("config 'usePool': expected a boolean, got \"yes\"");
    expect(() => parseConfig('{"modulePaths": [""]}', "/w/quill.config.json")).toThrow("config 'modulePaths[0]': expected a non-empty string, got \"\"");
    expect(() => parseConfig("[]", "/w/quill.config.json")).toThrow("config '<file>': /w/quill.config.json must contain a JSON object");
  });

  it("falls back to the defaults without a config file", async () => {
    const dir = await fs.mkdtemp(path.join(os.tmpdir(), "quill-cfg-"));
    try {
      await fs.writeFile(path.join(dir, "package.json"), "{}", "utf8");
      expect(await loadConfig(dir)).toEqual({ ...DEFAULT_CONFIG });
    } finally {
      await fs.rm(dir, { recursive: true, force: true });
    }
  });
});

describe("logger", () => {
  it("filters by level and prefixes the logger name", () => {
    const { sink, lines } = captureSink();
    const log = createLogger({ name: "t", level: "warn", sink, timestamp: false });
    log.info("hidden");
    log.warn("careful", { n: 1n });
    log.child("sub").error("broken");
    expect(lines).toEqual(['[t] WARN: careful {"n":"1"}', "[t.sub] ERROR: broken"]);
  });

  it("logs a keyed message once", () => {
    const { sink, lines } = captureSink();
    const log = createLogger({ level: "info", sink, timestamp: false });
    log.logOnce("info", "k", "first");
    log.logOnce("info", "k", "second");
    expect(lines).toEqual(["[quill] INFO: first"]);
  });

  it("stringifies bigints", () => {
    expect(safeStringify({ big: 12345678901234567890n })).toBe('{"big":"12345678901234567890"}');
  });
});

describe("paths", () => {
  it("resolves relative and home paths", () => {
    expect(resolveUserPath("a/b.txt", { cwd: "/work" })).toBe(path.resolve("/work", "a/b.txt"));
    expect(resolveUserPath("~/notes", { cwd: "/work", homeDir: "/home/test" })).toBe(path.resolve("/home/test", "notes"));
    expect(resolveUserPath("  ", { cwd: "/work" })).toBe("/work");
  });

  it("checks containment", () => {
    expect(isWithin("/data", "/data")).toBe(true);
    expect(isWithin("/data", "/data/x/y")).toBe(true);
    expect(isWithin("/data", "/database")).toBe(false);
    expect(isWithin("/data", "/data/../etc")).toBe(false);
  });
});

describe("diagnostics", () => {
  const at = (offset: number, line: number, column: number) => ({ start: { offset, line, column }, end: { offset, line, column } });

  it("converts script errors by stage", () => {
    const pos = { file: "m.quill", line: 3, column: 4, offset: 40 };
    expect(fromScriptError(new ScriptError(pos, "bad class"))).toMatchObject({
      code: "DECLARATION_ERROR",
      message: "bad class",
      file: "m.quill",
      source: "declaration",
    });
    expect(fromScriptError(new ImportError(pos, "x.y", "denied"))).toMatchObject({ code: "IMPORT_ERROR", source: "import" });
  });

  it("turns cancellation into a runtime diagnostic and ignores other errors", () => {
    expect(toDiagnostic(new CancelledError("stop"))?.message).toBe("execution cancelled: stop");
    expect(toDiagnostic(new Error("plain"))).toBeNull();
  });

  it("sorts and formats", () => {
    const list: Diagnostic[] = [
      { severity: "error", code: "B", message: "second", range: at(30, 2, 0), file: "f.quill" },
      { severity: "warning", code: "A", message: "first", range: at(5, 0, 5) },
    ];
    expect(sortDiagnostics(list).map(formatDiagnostic)).toEqual(["WARNING A @ 1:6: first", "ERROR B @ f.quill:3:1: second"]);
  });

  it("merges lists and drops duplicates", () => {
    const e = error("PARSE_ERROR", "x", at(4, 0, 4));
    const w = warn("W1", "note", at(4, 0, 4));
    const merged = mergeDiagnostics([w], null, [e, e]);
    expect(merged).toEqual([e, e, w]);
    expect(formatDiagnostics(dedupeDiagnostics(merged))).toBe("ERROR PARSE_ERROR @ 1:5: x\nWARNING W1 @ 1:5: note");
  });
});

describe("default host services", () => {
  it("clears the sleep timer when the signal aborts", async () => {
    vi.useFakeTimers();
    try {
      const controller = new AbortController();
      const sleeping = defaultHostServices().sleep(60_000, controller.signal);
      expect(vi.getTimerCount()).toBe(1);
      controller.abort();
      await sleeping;
      expect(vi.getTimerCount()).toBe(0);
    } finally {
      vi.useRealTimers();
    }
  });

  it("wakes after the delay without a signal", async () => {
    vi.useFakeTimers();
    try {
      let woke = false;
      const sleeping = defaultHostServices()
        .sleep(100)
        .then(() => {
          woke = true;
        });
      vi.advanceTimersByTime(99);
      await Promise.resolve();
      expect(woke).toBe(false);
      vi.advanceTimersByTime(1);
      await sleeping;
      expect(woke).toBe(true);
    } finally {
      vi.useRealTimers();
    }
  });
});
