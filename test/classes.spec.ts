// test/classes.spec.ts

import { describe, expect, it } from "vitest";

import { ExecutionError, ScriptError } from "../src/diagnostics/scriptErrors";
import { evalText, lines, rejection, testEngine } from "./helpers";

describe("linearization", () => {
  it("dispatches through the C3 order and qualified views", async () => {
    const { text } = await evalText(
      lines(
        'class A { fun who() = "A" }',
        'class B : A { override fun who() = "B" }',
        'class C : A { override fun who() = "C" }',
        "class D : B, C",
        "val d = D()",
        "listOf(d.who(), (d as C).who(), (d as A).who(), d is C)",
      ),
    );
    expect(text).toBe("[B, C, A, true]");
  });

  it("rejects a class whose bases cannot be ordered", async () => {
    const { engine } = await testEngine();
    const e = await rejection(
      engine.eval(lines("class X", "class Y", "class P : X, Y", "class Q : Y, X", "class Z : P, Q"), { fileName: "c3.quill" }),
    );
    expect(e).toBeInstanceOf(ScriptError);
    if (!(e instanceof ScriptError)) return;
    expect(e.detail).toBe("inconsistent base order for class Z: cannot order X, Y");
    expect(e.pos.line).toBe(4);
    expect(e.pos.column).toBe(6);
  });

  it("initializes a shared base once, bases first", async () => {
    const { text } = await evalText(
      lines(
        "val inits = listOf()",
        'class Top { init { inits.add("Top") } }',
        'class L : Top { init { inits.add("L") } }',
        'class R : Top { init { inits.add("R") } }',
        'class Bottom : L, R { init { inits.add("Bottom") } }',
        "Bottom()",
        "inits",
      ),
    );
    expect(text).toBe("[Top, L, R, Bottom]");
  });

  it("requires override to hide an inherited member", async () => {
    const { engine } = await testEngine();
    const e = await rejection(engine.eval(lines("class A { fun f() = 1 }", "class B : A { fun f() = 2 }")));
    expect(e).toBeInstanceOf(ScriptError);
    if (!(e instanceof ScriptError)) return;
    expect(e.detail).toBe("'f' hides A.f; mark it override");
  });

  it("checks override against every base that declares the member", async () => {
    const { engine } = await testEngine();
    const e = await rejection(
      engine.eval(
        lines(
          "class Top",
          "class L : Top { fun f() = 1 }",
          "class R : Top { fun f() = 2 }",
          "class Bottom : L, R { fun f() = 3 }",
        ),
      ),
    );
    expect(e).toBeInstanceOf(ScriptError);
    if (!(e instanceof ScriptError)) return;
    expect(e.detail).toBe("'f' hides L.f, R.f; mark it override");

    const { text } = await evalText(
      lines("class A { fun f() = 1 }", "class Mid : A", "class C : Mid { override fun f() = 2 }", "C().f()"),
    );
    expect(text).toBe("2");
  });
});

describe("members", () => {
  it("prints instances by their public fields", async () => {
    const { text } = await evalText("class Point(val x, var y)\nPoint(1, 2)");
    expect(text).toBe("Point(x=1, y=2)");
  });

  it("computes properties through get and set", async () => {
    const { text } = await evalText(
      lines(
        "class Temp(var celsius) {",
        "  var fahrenheit",
        "    get() = celsius * 9 / 5 + 32",
        "    set(v) { celsius = (v - 32) * 5 / 9 }",
        "}",
        "val t = Temp(100)",
        "val f = t.fahrenheit",
        "t.fahrenheit = 32",
        "listOf(f, t.celsius)",
      ),
    );
    expect(text).toBe("[212, 0]");
  });

  it("lets only the class write a private setter", async () => {
    const source = lines(
      "class Counter {",
      "  var count = 0",
      "    private set",
      "  fun inc() { count++ }",
      "}",
      "val c = Counter()",
      "c.inc(); c.inc()",
    );
    const { value } = await evalText(`${source}\nc.count`);
    expect(value).toBe(2n);

    const { engine } = await testEngine();
    const e = await rejection(engine.eval(`${source}\nc.count = 5`));
    expect(e).toBeInstanceOf(ExecutionError);
    if (!(e instanceof ExecutionError)) return;
    expect(e.className).toBe("IllegalAccessException");
  });

  it("hides private members from outside code", async () => {
    const { engine } = await testEngine();
    const e = await rejection(engine.eval("class S { private val secret = 1 }\nS().secret"));
    expect(e).toBeInstanceOf(ExecutionError);
    if (!(e instanceof ExecutionError)) return;
    expect(e.className).toBe("IllegalAccessException");
  });

  it("rejects writes to a val field", async () => {
    const { engine } = await testEngine();
    const e = await rejection(engine.eval("class P(val x)\nval p = P(1)\np.x = 2"));
    expect(e).toBeInstanceOf(ExecutionError);
    if (!(e instanceof ExecutionError)) return;
    expect(e.className).toBe("IllegalAssignmentException");
  });

  it("reads static members from the class", async () => {
    const { value } = await evalText("class MathUtil { static fun twice(x) = x * 2; static val base = 10 }\nMathUtil.twice(MathUtil.base)");
    expect(value).toBe(20n);
  });

  it("creates object singletons once", async () => {
    const { value } = await evalText("object Registry { var count = 0; fun bump() { count++; count } }\nRegistry.bump(); Registry.bump()");
    expect(value).toBe(2n);
  });
});

describe("operators", () => {
  const vec = lines(
    "class Vec(val x, val y) {",
    "  fun plus(o) = Vec(x + o.x, y + o.y)",
    "  fun negate() = Vec(-x, -y)",
    "  fun compareTo(o) = (x * x + y * y) <=> (o.x * o.x + o.y * o.y)",
    "  fun getAt(i) = if (i == 0) x else y",
    '  fun toString() = "Vec(" + x + ", " + y + ")"',
    "}",
  );

  it("dispatches to operator methods", async () => {
    const { text } = await evalText(
      lines(vec, "val a = Vec(1, 2) + Vec(3, 4)", "listOf(a, -a, a[1], Vec(1, 1) < Vec(2, 2), a == Vec(4, 6))"),
    );
    expect(text).toBe("[Vec(4, 6), Vec(-4, -6), 6, true, true]");
  });

  it("falls back to plus for += without plusAssign", async () => {
    const { text } = await evalText(lines(vec, "var v = Vec(1, 1)", "v += Vec(1, 1)", "v"));
    expect(text).toBe("Vec(2, 2)");
  });
});

describe("enums", () => {
  it("exposes entries, ordinals and valueOf", async () => {
    const { text } = await evalText(
      lines(
        "enum Color { Red, Green, Blue }",
        'listOf(Color.Green.ordinal, Color.valueOf("Blue").name, Color.entries.size, Color.Red < Color.Blue, Color.Green)',
      ),
    );
    expect(text).toBe("[1, Blue, 3, true, Green]");
  });
});

describe("delegation", () => {
  it("routes every read and write of a delegated var", async () => {
    const { text } = await evalText(
      lines(
        "class Recorder {",
        "  var reads = 0",
        "  var writes = 0",
        "  var stored = 0",
        "  fun getValue(thisRef, name) { reads++; stored }",
        "  fun setValue(thisRef, name, value) { writes++; stored = value }",
        "}",
        "val rec = Recorder()",
        "var x by rec",
        "for (i in 1..100) { x = x + i }",
        "listOf(x, rec.reads, rec.writes)",
      ),
    );
    expect(text).toBe("[5050, 100, 100]");
  });

  it("calls bind with the member name and access kind", async () => {
    const { text } = await evalText(
      lines(
        "class Upper {",
        "  var bound = null",
        '  fun bind(name, access, thisRef) { bound = name + ":" + access.name; this }',
        "  fun getValue(thisRef, name) = name.upper()",
        "}",
        "val u = Upper()",
        "class Holder { val title by u }",
        "val h = Holder()",
        "listOf(h.title, u.bound)",
      ),
    );
    expect(text).toBe("[TITLE, title:Val]");
  });

  it("delegates calls of a function to invoke", async () => {
    const { value } = await evalText(
      lines(
        'class Greeter { fun invoke(thisRef, name, who) = "hello " + who + " from " + name }',
        "fun greet by Greeter()",
        'greet("ann")',
      ),
    );
    expect(value).toBe("hello ann from greet");
  });

  it("computes a lazy value once", async () => {
    const { text } = await evalText(lines("var calls = 0", "val v by lazy { calls++; 42 }", "listOf(v, v, calls)"));
    expect(text).toBe("[42, 42, 1]");
  });

  it("refuses a lazy var", async () => {
    const { engine } = await testEngine();
    const e = await rejection(engine.eval("var v by lazy { 1 }"));
    expect(e).toBeInstanceOf(ExecutionError);
    if (!(e instanceof ExecutionError)) return;
    expect(e.className).toBe("IllegalArgumentException");
    expect(e.detail).toBe("lazy delegate of 'v' must be a val");
  });
});
