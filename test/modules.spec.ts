// test/modules.spec.ts

import { describe, expect, it } from "vitest";

import { ImportError } from "../src/diagnostics/scriptErrors";
import { allowList, denyList, matchesPackage } from "../src/modules/security";
import { lines, rejection, testEngine } from "./helpers";

describe("package patterns", () => {
  it("matches exact names and .* prefixes", () => {
    expect(matchesPackage("quill.io.fs", "quill.io.fs")).toBe(true);
    expect(matchesPackage("quill.io.*", "quill.io.process")).toBe(true);
    expect(matchesPackage("quill.io.*", "quill.io")).toBe(false);
    expect(matchesPackage("quill.io", "quill.io.fs")).toBe(false);
  });
});

describe("registry", () => {
  it("builds a module once for concurrent first imports", async () => {
    const { engine } = await testEngine();
    let builds = 0;
    await engine.modules.register("test.counter", async (scope) => {
      builds++;
      await new Promise((resolve) => setTimeout(resolve, 10));
      scope.define("answer", 42n);
    });

    const [a, b, c] = await Promise.all([
      engine.modules.import("test.counter"),
      engine.modules.import("test.counter"),
      engine.modules.import("test.counter"),
    ]);
    expect(builds).toBe(1);
    expect(b).toBe(a);
    expect(c).toBe(a);
    expect(await engine.eval("import test.counter\nanswer")).toBe(42n);
  });

  it("does not cache a failed build", async () => {
    const { engine } = await testEngine();
    let builds = 0;
    await engine.modules.register("test.flaky", (scope) => {
      builds++;
      if (builds === 1) throw new Error("first build fails");
      scope.define("ok", true);
    });

    expect(await rejection(engine.modules.import("test.flaky"))).toBeInstanceOf(Error);
    expect((await engine.modules.import("test.flaky")).getLocal("ok")?.value).toBe(true);
    expect(builds).toBe(2);
  });

  it("refuses a second registration of a package", async () => {
    const { engine } = await testEngine();
    await engine.modules.register("test.dup", () => undefined);
    const e = await rejection(engine.modules.register("test.dup", () => undefined));
    expect(e).toBeInstanceOf(ImportError);
    if (!(e instanceof ImportError)) return;
    expect(e.detail).toBe("package 'test.dup' is already registered");
  });

  it("reports unknown packages", async () => {
    const { engine } = await testEngine();
    const e = await rejection(engine.eval("import test.missing"));
    expect(e).toBeInstanceOf(ImportError);
    if (!(e instanceof ImportError)) return;
    expect(e.detail).toBe("package 'test.missing' is not registered");
    expect(e.packageName).toBe("test.missing");
  });

  it("lists registered and loaded packages", async () => {
    const { engine } = await testEngine();
    await engine.modules.register("test.b", () => undefined);
    await engine.modules.register("test.a", () => undefined);
    expect(engine.modules.packageNames()).toEqual(["quill.io.fs", "quill.io.process", "test.a", "test.b"]);

    await engine.modules.import("test.b");
    expect(engine.modules.loadedModules().map((m) => m.packageName)).toEqual(["test.b"]);
    engine.modules.teardown();
    expect(engine.modules.loadedModules()).toEqual([]);
    expect(engine.modules.isRegistered("test.b")).toBe(true);
  });
});

describe("source modules", () => {
  it("imports the public declarations of a package", async () => {
    const { engine } = await testEngine();
    const name = await engine.modules.registerSource(
      lines("package demo.math", "", "fun square(x) = x * x", "private fun hidden() = 1"),
      "math.quill",
    );
    expect(name).toBe("demo.math");
    expect(await engine.eval("import demo.math\nsquare(7)")).toBe(49n);

    const e = await rejection(engine.eval("import demo.math.{hidden}"));
    expect(e).toBeInstanceOf(ImportError);
  });

  it("merges files that declare the same package", async () => {
    const { engine } = await testEngine();
    const names = await engine.modules.registerSources([
      { text: "package demo.merged\nval a = 1", fileName: "a.quill" },
      { text: "package demo.merged\nval b = a + 1", fileName: "b.quill" },
    ]);
    expect(names).toEqual(["demo.merged"]);
    expect(await engine.eval("import demo.merged\na + b")).toBe(3n);
  });

  it("rejects a package that imports itself", async () => {
    const { engine } = await testEngine();
    await engine.modules.registerSource(lines("package p.self", "import p.self", "val x = 1"), "self.quill");

    const e = await rejection(engine.eval("import p.self\nx"));
    expect(e).toBeInstanceOf(ImportError);
    if (!(e instanceof ImportError)) return;
    expect(e.packageName).toBe("p.self");
    expect(e.detail).toBe("cyclic import of 'p.self' (p.self -> p.self)");
    expect(e.pos).toMatchObject({ file: "self.quill", line: 1, column: 0 });
    expect(engine.modules.loadedModules()).toEqual([]);
  });

  it("rejects packages that import each other", async () => {
    const { engine } = await testEngine();
    await engine.modules.registerSources([
      { text: lines("package t.a", "import t.b", "val a = 1"), fileName: "a.quill" },
      { text: lines("package t.b", "import t.a", "val b = 2"), fileName: "b.quill" },
    ]);

    for (let attempt = 0; attempt < 2; attempt++) {
      const e = await rejection(engine.eval("import t.a\na"));
      expect(e).toBeInstanceOf(ImportError);
      if (!(e instanceof ImportError)) return;
      expect(e.detail).toBe("cyclic import of 't.a' (t.a -> t.b -> t.a)");
      expect(e.pos.file).toBe("b.quill");
    }
  });

  it("lets two packages share a dependency", async () => {
    const { engine } = await testEngine();
    await engine.modules.registerSources([
      { text: lines("package d.base", "val one = 1"), fileName: "base.quill" },
      { text: lines("package d.left", "import d.base", "val left = one + 1"), fileName: "left.quill" },
      { text: lines("package d.right", "import d.base", "import d.left", "val right = left + one"), fileName: "right.quill" },
    ]);
    expect(await engine.eval("import d.right\nright")).toBe(3n);
  });

  it("needs a package header", async () => {
    const { engine } = await testEngine();
    const e = await rejection(engine.modules.registerSource("val a = 1", "loose.quill"));
    expect(e).toBeInstanceOf(Error);
    expect(e instanceof Error ? e.message : "").toContain("source module needs a 'package' header");
  });

  it("reports a name imported from two packages", async () => {
    const { engine } = await testEngine();
    await engine.modules.register("m.one", (scope) => {
      scope.define("x", 1n);
    });
    await engine.modules.register("m.two", (scope) => {
      scope.define("x", 2n);
    });
    const e = await rejection(engine.eval("import m.one\nimport m.two\nx"));
    expect(e).toBeInstanceOf(ImportError);
    if (!(e instanceof ImportError)) return;
    expect(e.detail).toBe("'x' from 'm.two' conflicts with 'x' from 'm.one'");
  });
});

describe("import security", () => {
  it("rejects a denied import before the script runs", async () => {
    const { engine, lines: out } = await testEngine({ security: denyList(["secret.*"]) });
    let ran = false;
    await engine.modules.register("secret.stuff", () => {
      ran = true;
    });

    const e = await rejection(engine.eval('println("start")\nimport secret.stuff'));
    expect(e).toBeInstanceOf(ImportError);
    if (!(e instanceof ImportError)) return;
    expect(e.detail).toBe("import of package 'secret.stuff' is not allowed");
    expect(e.pos.line).toBe(1);
    expect(ran).toBe(false);
    expect(out).toEqual([]);
  });

  it("narrows the symbols of an allowed package", async () => {
    const { engine } = await testEngine({ security: allowList(["quill.io.fs"], { "quill.io.fs": ["readText"] }) });
    await expect(engine.eval("import quill.io.fs.{readText}\n1")).resolves.toBe(1n);

    const e = await rejection(engine.eval("import quill.io.fs.{writeText}"));
    expect(e).toBeInstanceOf(ImportError);
    if (!(e instanceof ImportError)) return;
    expect(e.detail).toBe("import of 'writeText' from 'quill.io.fs' is not allowed");
  });

  it("checks imports of registry callers too", async () => {
    const { engine } = await testEngine({ security: allowList(["quill.io.*"]) });
    await engine.modules.register("other.pkg", () => undefined);
    expect(await rejection(engine.modules.import("other.pkg"))).toBeInstanceOf(ImportError);
  });
});
