// test/codec.spec.ts

import { describe, expect, it } from "vitest";

import { decode, encode } from "../src/codec/codec";
import type { Engine } from "../src/core/engine";
import { Scope } from "../src/core/scope";
import { ExecutionError } from "../src/diagnostics/scriptErrors";
import { ClassObj, EnumEntryObj, InstanceObj } from "../src/runtime/classes";
import type { Value } from "../src/runtime/values";
import { ListObj } from "../src/runtime/values";
import { lines, rejection, testEngine } from "./helpers";

describe("wire format", () => {
  it("writes magic, version and a zig-zag Int", async () => {
    const { engine } = await testEngine();
    expect(Array.from(encode(1n, engine))).toEqual([0x51, 1, 4, 2]);
    expect(Array.from(encode(-1n, engine))).toEqual([0x51, 1, 4, 1]);
    expect(Array.from(encode("hi", engine))).toEqual([0x51, 1, 6, 2, 104, 105]);
    expect(Array.from(encode(null, engine))).toEqual([0x51, 1, 0]);
  });

  it("keeps the full 64-bit range", async () => {
    const { engine } = await testEngine();
    const scope = engine.createScope();
    for (const n of [-9223372036854775808n, 9223372036854775807n, 300n]) {
      expect(await decode(encode(n, engine), scope, engine)).toBe(n);
    }
  });
});

describe("values", () => {
  it("restores collections, ranges and instances", async () => {
    const { engine } = await testEngine();
    const scope = engine.createScope();
    const value = await engine.eval(
      lines(
        "class Point(val x, val y)",
        "val p = Point(1, 2)",
        "listOf(p, p, mapOf(\"k\" => setOf(1, 2)), 1..<3, 'c', 2.5, null, true, \"s\")",
      ),
      { scope },
    );

    const back = await decode(encode(value, engine), scope, engine);
    expect(await engine.evaluator().stringify(back)).toBe("[Point(x=1, y=2), Point(x=1, y=2), {k=Set(1, 2)}, 1..<3, c, 2.5, null, true, s]");
    expect(back).toBeInstanceOf(ListObj);
    if (!(back instanceof ListObj)) return;
    expect(back.items[1]).toBe(back.items[0]);
  });

  it("restores a shared list whose repeat ends the stream", async () => {
    const { engine } = await testEngine();
    const scope = engine.createScope();
    const value = await engine.eval("val a = listOf(1)\nlistOf(a, a)", { scope });

    const bytes = encode(value, engine);
    expect(Array.from(bytes)).toEqual([0x51, 1, 8, 2, 8, 1, 4, 2, 14, 1]);
    const back = await decode(bytes, scope, engine);
    expect(back).toBeInstanceOf(ListObj);
    if (!(back instanceof ListObj)) return;
    expect(back.items).toHaveLength(2);
    expect(back.items[1]).toBe(back.items[0]);
  });

  it("restores a list that contains itself", async () => {
    const { engine } = await testEngine();
    const scope = engine.createScope();
    const value = await engine.eval("val xs = listOf(1)\nxs.add(xs)\nxs", { scope });

    const back = await decode(encode(value, engine), scope, engine);
    expect(back).toBeInstanceOf(ListObj);
    if (!(back instanceof ListObj)) return;
    expect(back.items[0]).toBe(1n);
    expect(back.items[1]).toBe(back);
  });

  it("decodes enum entries to the declared entry", async () => {
    const { engine } = await testEngine();
    const scope = engine.createScope();
    const value = await engine.eval("enum Dir { Up, Down }\nDir.Down", { scope });

    const back = await decode(encode(value, engine), scope, engine);
    expect(back).toBeInstanceOf(EnumEntryObj);
    expect(back).toBe(value);
  });

  it("skips transient fields and calls onDeserialized", async () => {
    const { engine } = await testEngine();
    const scope = engine.createScope();
    const value = await engine.eval(
      lines(
        'class Account(val owner, @Transient var session = "none") {',
        "  var balance = 0",
        '  @Transient var cache = "c0"',
        "  var restored = false",
        "  fun onDeserialized() { restored = true }",
        "}",
        'val a = Account("ann", "live")',
        "a.balance = 50",
        'a.cache = "dirty"',
        "a",
      ),
      { scope },
    );

    const back = await decode(encode(value, engine), scope, engine);
    expect(back).toBeInstanceOf(InstanceObj);
    if (!(back instanceof InstanceObj)) return;
    expect(back.fields.get("owner")).toBe("ann");
    expect(back.fields.get("session")).toBe("none");
    expect(back.fields.get("balance")).toBe(50n);
    expect(back.fields.get("cache")).toBe("c0");
    expect(back.fields.get("restored")).toBe(true);
  });
});

describe("class resolution", () => {
  async function packageClass(engine: Engine, packageName: string, name: string): Promise<ClassObj | null> {
    const v = (await engine.modules.import(packageName)).getLocal(name)?.value;
    return v instanceof ClassObj ? v : null;
  }

  const classOf = (v: Value): ClassObj | null => (v instanceof InstanceObj ? v.cls : null);

  // two loaded packages declare a class with the same simple name
  async function samePointTwice(): Promise<{ engine: Engine; bytes: Uint8Array; a: ClassObj | null; b: ClassObj | null }> {
    const { engine } = await testEngine();
    await engine.modules.registerSources([
      { text: lines("package geo.a", "class Point(val x, val y)"), fileName: "a.quill" },
      { text: lines("package geo.b", "class Point(val x, val y)"), fileName: "b.quill" },
    ]);
    const value = await engine.eval("import geo.a\nPoint(1, 2)", { scope: engine.createScope() });
    const a = await packageClass(engine, "geo.a", "Point");
    const b = await packageClass(engine, "geo.b", "Point");
    return { engine, bytes: encode(value, engine), a, b };
  }

  it("uses the class imported into the decode scope", async () => {
    const { engine, bytes, a, b } = await samePointTwice();
    expect(b).not.toBeNull();
    expect(b).not.toBe(a);
    const scope = engine.createScope();
    await engine.eval("import geo.b", { scope });

    expect(classOf(await decode(bytes, scope, engine))).toBe(b);
  });

  it("falls back to loaded modules in package order", async () => {
    const { engine, bytes, a } = await samePointTwice();
    expect(a).not.toBeNull();

    const back = await decode(bytes, engine.createScope(), engine);
    expect(classOf(back)).toBe(a);
    expect(await engine.evaluator().stringify(back)).toBe("Point(x=1, y=2)");
  });

  it("prefers a class declared in an enclosing scope over imports", async () => {
    const { engine, bytes } = await samePointTwice();
    const outer = engine.createScope();
    await engine.eval("import geo.b\nclass Point(val x, val y)", { scope: outer });
    const local = outer.getLocal("Point")?.value;
    expect(local).toBeInstanceOf(ClassObj);

    expect(classOf(await decode(bytes, new Scope(outer), engine))).toBe(local);
  });

  it("walks a dotted name through nested classes", async () => {
    const { engine } = await testEngine();
    const scope = engine.createScope();
    await engine.eval("class Outer { class Inner(val v) }", { scope });

    const name = Array.from(new TextEncoder().encode("Outer.Inner"));
    const back = await decode(Uint8Array.from([0x51, 1, 12, name.length, ...name, 4, 10]), scope, engine);
    expect(back).toBeInstanceOf(InstanceObj);
    if (!(back instanceof InstanceObj)) return;
    expect(back.cls.name).toBe("Inner");
    expect(back.fields.get("v")).toBe(5n);
  });
});

describe("decode errors", () => {
  it("needs the class to be visible from the decode scope", async () => {
    const { engine } = await testEngine();
    const value = await engine.eval("class Point(val x, val y)\nPoint(1, 2)", { scope: engine.createScope() });

    const e = await rejection(decode(encode(value, engine), engine.createScope(), engine));
    expect(e).toBeInstanceOf(ExecutionError);
    if (!(e instanceof ExecutionError)) return;
    expect(e.className).toBe("SymbolNotFoundException");
    expect(e.detail).toBe("class 'Point' is not visible from the decode scope");
  });

  it("rejects input that is not a codec stream", async () => {
    const { engine } = await testEngine();
    const e = await rejection(decode(Uint8Array.from([0x00, 1, 0]), engine.createScope(), engine));
    expect(e).toBeInstanceOf(ExecutionError);
    if (!(e instanceof ExecutionError)) return;
    expect(e.className).toBe("IllegalArgumentException");
    expect(e.detail).toBe("not a Quill codec stream");
  });

  it("rejects trailing and truncated bytes", async () => {
    const { engine } = await testEngine();
    const scope = engine.createScope();

    const trailing = await rejection(decode(Uint8Array.from([0x51, 1, 4, 2, 0]), scope, engine));
    expect(trailing instanceof ExecutionError ? trailing.detail : null).toBe("trailing bytes after the value at byte 4");

    const truncated = await rejection(decode(Uint8Array.from([0x51, 1, 5, 0, 0]), scope, engine));
    expect(truncated instanceof ExecutionError ? truncated.detail : null).toBe("truncated input at byte 3");
  });

  it("rejects a reference past the decoded values", async () => {
    const { engine } = await testEngine();
    const e = await rejection(decode(Uint8Array.from([0x51, 1, 8, 1, 14, 5]), engine.createScope(), engine));
    expect(e instanceof ExecutionError ? e.detail : null).toBe("reference #5 at byte 4 points past the decoded values");
  });
});
