// test/evaluator.spec.ts

import { describe, expect, it } from "vitest";

import { CancelledError, ExecutionError, ScriptError } from "../src/diagnostics/scriptErrors";
import { evalText, lines, rejection, testEngine } from "./helpers";

describe("bindings", () => {
  it("reads and reassigns variables", async () => {
    const { value } = await evalText("val a = 1; var b = 2; b = b + a; b");
    expect(value).toBe(3n);
  });

  it("rejects reassigning a val at the assignment", async () => {
    const { engine } = await testEngine();
    const e = await rejection(engine.eval("val a = 1; a = 10"));
    expect(e).toBeInstanceOf(ExecutionError);
    if (!(e instanceof ExecutionError)) return;
    expect(e.className).toBe("IllegalAssignmentException");
    expect(e.detail).toBe("val 'a' cannot be reassigned");
    expect(e.pos?.line).toBe(0);
    expect(e.pos?.column).toBe(11);
  });

  it("rejects a second declaration of a name in one scope", async () => {
    const { engine } = await testEngine();
    const e = await rejection(engine.eval("val x = 1\nval x = 2"));
    expect(e).toBeInstanceOf(ExecutionError);
    if (!(e instanceof ExecutionError)) return;
    expect(e.className).toBe("IllegalArgumentException");
    expect(e.detail).toBe("'x' is already defined in this scope");
  });

  it("reports undefined names", async () => {
    const { engine } = await testEngine();
    const e = await rejection(engine.eval("nope + 1"));
    expect(e).toBeInstanceOf(ExecutionError);
    if (!(e instanceof ExecutionError)) return;
    expect(e.className).toBe("SymbolNotFoundException");
    expect(e.detail).toBe("symbol 'nope' is not defined");
  });
});

describe("arithmetic", () => {
  it("wraps Int at 64 bits", async () => {
    const { value } = await evalText("9223372036854775807 + 1");
    expect(value).toBe(-9223372036854775808n);
  });

  it("truncates Int division and widens to Real", async () => {
    const { text } = await evalText("listOf(7 / 2, 7 / 2.0, -7 / 2, 7 % 3, 2 * 1.5)");
    expect(text).toBe("[3, 3.5, -3, 1, 3.0]");
  });

  it("raises ArithmeticException on division by zero", async () => {
    const { engine } = await testEngine();
    const e = await rejection(engine.eval("1 / 0"));
    expect(e).toBeInstanceOf(ExecutionError);
    if (!(e instanceof ExecutionError)) return;
    expect(e.className).toBe("ArithmeticException");
    expect(e.detail).toBe("division by zero");
  });

  it("concatenates anything onto a string", async () => {
    const { value } = await evalText('"n=" + 4 + ", ok=" + true');
    expect(value).toBe("n=4, ok=true");
  });

  it("requires Bool conditions", async () => {
    const { engine } = await testEngine();
    const e = await rejection(engine.eval("if (1) 2"));
    expect(e).toBeInstanceOf(ExecutionError);
    if (!(e instanceof ExecutionError)) return;
    expect(e.className).toBe("IllegalArgumentException");
    expect(e.detail).toBe("if condition must be Bool, got Int");
  });
});

describe("functions", () => {
  it("binds positional, named, default and variadic arguments", async () => {
    const { text } = await evalText(
      lines(
        "fun f(a, b = a * 2, rest...) = listOf(a, b, rest.size)",
        "listOf(f(1), f(1, 5), f(1, 2, 3, 4), f(b: 7, a: 2))",
      ),
    );
    expect(text).toBe("[[1, 2, 0], [1, 5, 0], [1, 2, 2], [2, 7, 0]]");
  });

  it("rejects surplus arguments", async () => {
    const { engine } = await testEngine();
    const e = await rejection(engine.eval("fun g(x) = x; g(1, 2)"));
    expect(e).toBeInstanceOf(ExecutionError);
    if (!(e instanceof ExecutionError)) return;
    expect(e.className).toBe("IllegalArgumentException");
    expect(e.detail).toBe("too many arguments for g: expected 1, got 2");
  });

  it("spreads lists into positional arguments and maps into named ones", async () => {
    const { text } = await evalText(
      lines("fun f(a, b, c) = listOf(a, b, c)", 'listOf(f(...listOf(1, 2, 3)), f(0, ...mapOf("c" => 9, "b" => 8)))'),
    );
    expect(text).toBe("[[1, 2, 3], [0, 8, 9]]");
  });

  it("binds `it` in a lambda without parameters", async () => {
    const { text } = await evalText("listOf(1, 2, 3).map { it * 10 }");
    expect(text).toBe("[10, 20, 30]");
  });

  it("keeps captured variables alive in closures", async () => {
    const { value } = await evalText(
      lines("fun counter() { var n = 0; val inc = { n = n + 1; n }; inc }", "val c = counter()", "c(); c(); c()"),
    );
    expect(value).toBe(3n);
  });

  it("returns from the enclosing function through a trailing lambda", async () => {
    const { value } = await evalText(
      lines("fun firstEven(xs) { xs.forEach { if (it % 2 == 0) return@firstEven it }; null }", "firstEven(listOf(1, 3, 4, 5))"),
    );
    expect(value).toBe(4n);
  });

  it("formats strings called as templates", async () => {
    const { text } = await evalText('listOf("%s=%d"("k", 5), "%.2f"(3.14159), "100%%"())');
    expect(text).toBe("[k=5, 3.14, 100%]");
  });
});

describe("loops", () => {
  it("yields the break value, else-body, last iteration or void", async () => {
    const { text } = await evalText(
      lines(
        "val a = for (i in 1..5) { if (i == 3) break i * 10; i }",
        "val b = for (i in 1..3) { i } else { 99 }",
        "val c = for (i in 1..3) { i * 2 }",
        "val d = for (i in listOf()) { i }",
        "listOf(a, b, c, d)",
      ),
    );
    expect(text).toBe("[30, 99, 6, void]");
  });

  it("continues an outer loop by label", async () => {
    const { value } = await evalText(
      lines(
        "var hits = 0",
        "outer@ for (i in 1..3) {",
        "  for (j in 1..3) {",
        "    if (j == 2) continue@outer",
        "    hits++",
        "  }",
        "}",
        "hits",
      ),
    );
    expect(value).toBe(3n);
  });

  it("runs while and do-while loops", async () => {
    const { text } = await evalText(
      lines("var i = 0", 'val w = while (i < 3) { i++ } else { "done" }', "var k = 0", "do { k++ } while (k < 5)", "listOf(w, i, k)"),
    );
    expect(text).toBe("[done, 3, 5]");
  });

  it("iterates instances through iterator()", async () => {
    const { text } = await evalText(
      lines(
        "class Countdown(val from) { fun iterator() = CountdownIter(from) }",
        "class CountdownIter(var n) {",
        "  fun hasNext() = n > 0",
        "  fun next() { n--; n + 1 }",
        "}",
        "val out = listOf()",
        "for (x in Countdown(3)) out.add(x)",
        "out",
      ),
    );
    expect(text).toBe("[3, 2, 1]");
  });

  it("iterates map entries", async () => {
    const { text } = await evalText(
      lines('val m = mapOf("a" => 1, "b" => 2)', "val keys = listOf()", "for (e in m) { keys.add(e.key + e.value) }", "keys"),
    );
    expect(text).toBe("[a1, b2]");
  });

  it("matches when branches in order", async () => {
    const { text } = await evalText(
      lines(
        "fun kind(x) = when (x) {",
        '  0 -> "zero"',
        '  is String -> "text"',
        '  in 1..9 -> "digit"',
        '  else -> "other"',
        "}",
        'listOf(kind(0), kind(5), kind("s"), kind(42))',
      ),
    );
    expect(text).toBe("[zero, digit, text, other]");
  });
});

describe("exceptions", () => {
  it("picks the first matching catch and always runs finally", async () => {
    const { text } = await evalText(
      lines(
        "val log = listOf()",
        "fun risky(n) {",
        "  try {",
        '    if (n > 1) throw IllegalStateException("too big")',
        '    log.add("ok " + n)',
        "    n",
        "  } catch (e: IllegalArgumentException) {",
        '    log.add("arg")',
        "    -1",
        "  } catch (e: IllegalStateException) {",
        '    log.add("state " + e.message)',
        "    -2",
        "  } finally {",
        '    log.add("finally " + n)',
        "  }",
        "}",
        "val r = listOf(risky(1), risky(2))",
        "listOf(r, log)",
      ),
    );
    expect(text).toBe("[[1, -2], [ok 1, finally 1, state too big, finally 2]]");
  });

  it("binds `it` in a catch without a parameter", async () => {
    const { value } = await evalText("try { 1 / 0 } catch { it.message }");
    expect(value).toBe("division by zero");
  });

  it("catches native failures by class", async () => {
    const { value } = await evalText('try { listOf(1)[5] } catch (e: IndexOutOfBoundsException) { "caught" }');
    expect(value).toBe("caught");
  });

  it("catches user subclasses through their base", async () => {
    const { value } = await evalText(
      lines(
        "class MyError(msg) : IllegalArgumentException(msg)",
        'try { throw MyError("bad") } catch (e: IllegalArgumentException) { e.message + "!" }',
      ),
    );
    expect(value).toBe("bad!");
  });

  it("wraps a thrown string in Exception", async () => {
    const { engine } = await testEngine();
    const e = await rejection(engine.eval('try { throw "boom" } catch (e: IllegalStateException) { 1 }'));
    expect(e).toBeInstanceOf(ExecutionError);
    if (!(e instanceof ExecutionError)) return;
    expect(e.className).toBe("Exception");
    expect(e.detail).toBe("boom");
  });

  it("checks failures with assertThrows", async () => {
    const { value } = await evalText("val e = assertThrows(ArithmeticException) { 1 / 0 }\ne.message");
    expect(value).toBe("division by zero");
  });
});

describe("values", () => {
  it("short-circuits null-safe access and elvis", async () => {
    const { text } = await evalText('val s = null\nlistOf(s?.size, s ?: "dflt")');
    expect(text).toBe("[null, dflt]");
  });

  it("indexes and updates maps", async () => {
    const { text } = await evalText('val m = mapOf("a" => 1, "b" => 2)\nm["c"] = 3\nlistOf(m["a"], m.size, m)');
    expect(text).toBe("[1, 3, {a=1, b=2, c=3}]");
  });

  it("indexes strings by position and range", async () => {
    const { text } = await evalText('listOf("hello"[1], "hello"[1..3], "abc".upper())');
    expect(text).toBe("[e, ell, ABC]");
  });

  it("mutates lists in place with +=", async () => {
    const { text } = await evalText("val xs = listOf(1)\nxs += 2\nxs");
    expect(text).toBe("[1, 2]");
  });
});

describe("concurrency", () => {
  it("awaits launched blocks", async () => {
    const { value } = await evalText("val d = launch { delay(5); 7 }\nd.await() + 1");
    expect(value).toBe(8n);
  });

  it("collects a cold flow", async () => {
    const { text } = await evalText("val f = flow { emit(1); emit(2); emit(3) }\nf.toList()");
    expect(text).toBe("[1, 2, 3]");
  });
});

describe("cancellation", () => {
  it("stops a running loop when the signal aborts", async () => {
    const { engine } = await testEngine();
    const controller = new AbortController();
    const running = engine.eval("var n = 0\nwhile (true) { n++; yield() }", { signal: controller.signal });
    setTimeout(() => controller.abort(), 20);
    expect(await rejection(running)).toBeInstanceOf(CancelledError);
  });

  it("is not catchable but still runs finally blocks", async () => {
    const { engine, lines: out } = await testEngine();
    const controller = new AbortController();
    const running = engine.eval(
      lines("try {", "  try { while (true) { yield() } } catch (e) { println(\"caught\") }", "} finally {", '  println("cleanup")', "}"),
      { signal: controller.signal },
    );
    setTimeout(() => controller.abort(), 20);
    expect(await rejection(running)).toBeInstanceOf(CancelledError);
    expect(out).toEqual(["cleanup"]);
  });

  it("hands the signal to the host sleep", async () => {
    const signals: (AbortSignal | undefined)[] = [];
    const { engine } = await testEngine({
      host: {
        sleep: (_ms, signal) => {
          signals.push(signal);
          return new Promise<void>(() => undefined);
        },
      },
    });
    const controller = new AbortController();
    const running = engine.eval("delay(60000)", { signal: controller.signal });
    setTimeout(() => controller.abort(), 20);
    expect(await rejection(running)).toBeInstanceOf(CancelledError);
    expect(signals).toHaveLength(1);
    expect(signals[0]?.aborted).toBe(true);
  });
});

describe("frame pooling", () => {
  const program = lines(
    "fun fib(n) = if (n < 2) n else fib(n - 1) + fib(n - 2)",
    "fun sumTo(n) { var s = 0; for (i in 1..n) { s += i }; s }",
    "listOf(fib(15), sumTo(100))",
  );

  it("gives the same results with and without the pool", async () => {
    const pooled = await testEngine();
    const plain = await testEngine({ usePool: false });

    const a = await pooled.engine.eval(program);
    const b = await plain.engine.eval(program);
    expect(await pooled.engine.evaluator().stringify(a)).toBe("[610, 5050]");
    expect(await plain.engine.evaluator().stringify(b)).toBe("[610, 5050]");

    expect(plain.engine.poolStats()).toBeNull();
    expect(pooled.engine.poolStats()?.reused ?? 0).toBeGreaterThan(0);
  });
});

describe("compile errors", () => {
  it("reports the first lexical error with its position", async () => {
    const { engine } = await testEngine();
    const e = await rejection(engine.eval('val x = 1\nval s = "abc', { fileName: "test.quill" }));
    expect(e).toBeInstanceOf(ScriptError);
    if (!(e instanceof ScriptError)) return;
    expect(e.stage).toBe("lexer");
    expect(e.pos).toEqual({ file: "test.quill", line: 1, column: 8, offset: 18 });
    expect(e.message).toBe("test.quill:2:9: unterminated string literal");
  });
});
