// test/syntax.spec.ts

import { describe, expect, it } from "vitest";

import { compile, compileLenient } from "../src/core/compiler";
import { TokenKind, tokenize } from "../src/core/lexer";
import { parseSource } from "../src/core/parser";
import { ScriptError } from "../src/diagnostics/scriptErrors";
import { lines } from "./helpers";

function kinds(source: string): TokenKind[] {
  return tokenize(source).tokens.map((t) => t.kind);
}

describe("lexer", () => {
  it("tokenizes a declaration", () => {
    expect(kinds("val x = 10")).toEqual([TokenKind.KW_VAL, TokenKind.IDENTIFIER, TokenKind.ASSIGN, TokenKind.INT, TokenKind.EOF]);
  });

  it("tells loop labels from jump labels", () => {
    const { tokens } = tokenize("outer@ for (i in xs) break@outer");
    expect(tokens[0]).toMatchObject({ kind: TokenKind.LABEL, text: "outer" });
    expect(tokens[1].kind).toBe(TokenKind.KW_FOR);

    const jump = tokens.find((t) => t.kind === TokenKind.AT_LABEL);
    expect(jump).toMatchObject({ text: "outer", spaced: false });
  });

  it("skips a shebang line", () => {
    const { tokens } = tokenize("#!/usr/bin/env quill\n1");
    expect(tokens.map((t) => t.kind)).toEqual([TokenKind.NEWLINE, TokenKind.INT, TokenKind.EOF]);
    expect(tokens[1].range.start).toEqual({ offset: 21, line: 1, column: 0 });
  });

  it("splits ranges from numbers", () => {
    expect(kinds("1..5")).toEqual([TokenKind.INT, TokenKind.DOTDOT, TokenKind.INT, TokenKind.EOF]);
    expect(kinds("1..<5")).toEqual([TokenKind.INT, TokenKind.DOTDOT_LT, TokenKind.INT, TokenKind.EOF]);
  });

  it("decodes numeric literals", () => {
    const [a, b, c] = tokenize("1_000 0xFF 2.5e3").tokens;
    expect(a).toMatchObject({ kind: TokenKind.INT, text: "1000", lexeme: "1_000" });
    expect(b).toMatchObject({ kind: TokenKind.INT, text: "0xFF" });
    expect(c).toMatchObject({ kind: TokenKind.REAL, text: "2.5e3" });
  });

  it("unescapes strings and chars", () => {
    const [s, c] = tokenize("\"a\\tb\" '\\n'").tokens;
    expect(s).toMatchObject({ kind: TokenKind.STRING, text: "a\tb" });
    expect(c).toMatchObject({ kind: TokenKind.CHAR, text: "\n" });
  });

  it("reads keyword operators", () => {
    expect(kinds("x !in xs")[1]).toBe(TokenKind.NOT_IN);
    expect(kinds("x !is T")[1]).toBe(TokenKind.NOT_IS);
    expect(kinds("y as? T")[1]).toBe(TokenKind.AS_SAFE);
  });

  it("stops at the first error", () => {
    const { tokens, errors } = tokenize("a # b");
    expect(errors).toHaveLength(1);
    expect(errors[0].message).toBe("unexpected character '#'");
    expect(errors[0].range.start.column).toBe(2);
    expect(tokens.map((t) => t.kind)).toEqual([TokenKind.IDENTIFIER, TokenKind.ERROR, TokenKind.EOF]);
  });

  it("reports malformed literals and comments", () => {
    expect(tokenize("val c = 'ab'").errors[0].message).toBe("unterminated or malformed char literal");
    expect(tokenize("x /* open").errors[0].message).toBe("unterminated block comment (expected '*/')");
    expect(tokenize('"bad \\q"').errors[0].message).toBe("invalid escape sequence in string literal");
  });

  it("keeps comments only on request", () => {
    expect(kinds("x // note")).toEqual([TokenKind.IDENTIFIER, TokenKind.EOF]);
    expect(tokenize("x // note", { includeComments: true }).tokens[1].kind).toBe(TokenKind.COMMENT_LINE);
  });
});

describe("parser", () => {
  it("parses statements separated by newlines and semicolons", () => {
    const { program, errors } = parseSource("val a = 1\nval b = a + 2; b");
    expect(errors).toEqual([]);
    expect(program.body.map((n) => n.kind)).toEqual(["VariableDeclaration", "VariableDeclaration", "Identifier"]);
  });

  it("reads the package header", () => {
    expect(parseSource("package demo.app\nval x = 1").program.packageName).toBe("demo.app");
  });

  it("rejects a positional argument after a named one", () => {
    const { errors } = parseSource("f(a: 1, 2)");
    expect(errors).toHaveLength(1);
    expect(errors[0]).toMatchObject({ message: "positional argument after a named one", source: "parser" });
  });

  it("orders lexer and parser errors by offset", () => {
    const { errors } = parseSource("val = 1\nval s = 2 #", { lenient: true });
    expect(errors.map((e) => e.source)).toEqual(["parser", "lexer"]);
  });
});

describe("compile", () => {
  it("collects top-level imports", () => {
    const script = compile("import a.b\nimport c.d.{x, y}\nx");
    expect(script.imports.map((i) => [i.packageName, i.symbols])).toEqual([
      ["a.b", null],
      ["c.d", ["x", "y"]],
    ]);
  });

  it("throws the first syntax error as a ScriptError", () => {
    let caught: unknown = null;
    try {
      compile("val a = )", { fileName: "bad.quill" });
    } catch (e) {
      caught = e;
    }
    expect(caught).toBeInstanceOf(ScriptError);
    if (!(caught instanceof ScriptError)) return;
    expect(caught.stage).toBe("parser");
    expect(caught.pos).toMatchObject({ file: "bad.quill", line: 0, column: 8 });
  });

  it("summarizes declarations past syntax errors", () => {
    const summary = compileLenient(lines("val a = )", "fun ok() = 1", "val b = ]", "val c = 3"));
    expect(summary.diagnostics.map((d) => d.range.start.line)).toEqual([0, 2]);
    expect(summary.firstError?.range.start.line).toBe(0);
    expect(summary.declarations.map((d) => `${d.kind} ${d.name}`)).toEqual(["fun ok", "val c"]);
  });

  it("describes classes with their doc comments", () => {
    const summary = compileLenient(
      lines("// first", "// second", "class K(val a, b) : Base {", "  /** Adds one. */", "  fun m(x, rest...) = x", "}"),
    );
    const [k] = summary.declarations;
    expect(k).toMatchObject({ kind: "class", name: "K", params: ["a", "b"], bases: ["Base"], doc: "first\nsecond" });
    expect(k.members).toHaveLength(1);
    expect(k.members?.[0]).toMatchObject({ kind: "fun", name: "m", params: ["x", "rest..."], doc: "Adds one." });
  });
});
