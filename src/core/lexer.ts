// src/core/lexer.ts
//
// Quill Lexer (Tokenizer)
// -----------------------
// Single pass over the source text, no backtracking. Produces tokens with
// precise source ranges and a synthetic EOF token.
//
// Syntax covered:
// - Shebang first line (skipped)
// - Comments: // line, /* block */
// - Identifiers: Unicode letters, digits, underscore
// - Numbers: 123, 1_000, 1.5, 2e10, 1.5e-3, 0xFF
// - Strings: "double" with escapes (\n \r \t \" \' \\ \0); multi-line strings
//   lose a blank first/last line and their common indentation
// - Chars: 'a', '\n'
// - Labels: name@ (LABEL) and @name (AT_LABEL, also used for annotations)
// - Operators: + - * / % = += -= *= /= %= ++ -- == != === !== < <= > >= <=>
//              && || ! & | ^ ~ << >> -> => . .. ..< ... ?: ?? ?. ?[ ?( ? ::
//              in !in is !is as as?
//
// Notes:
// - Newlines are emitted as tokens; the parser decides where they end statements.
// - Comments are skipped unless includeComments is set (doc extraction).
// - Errors stop the scan; the compiler reports the first one.

import type { Position, Range } from "./ast";

/* =========================================================
   Token Kinds
   ========================================================= */

export enum TokenKind {
  // Meta
  EOF = "EOF",
  ERROR = "ERROR",

  // Trivia
  NEWLINE = "NEWLINE",
  COMMENT_LINE = "COMMENT_LINE",
  COMMENT_BLOCK = "COMMENT_BLOCK",

  // Literals
  IDENTIFIER = "IDENTIFIER",
  INT = "INT",
  REAL = "REAL",
  STRING = "STRING",
  CHAR = "CHAR",
  LABEL = "LABEL", // name@
  AT_LABEL = "AT_LABEL", // @name

  // Keywords
  KW_VAL = "KW_VAL",
  KW_VAR = "KW_VAR",
  KW_FUN = "KW_FUN",
  KW_CLASS = "KW_CLASS",
  KW_ENUM = "KW_ENUM",
  KW_OBJECT = "KW_OBJECT",
  KW_IF = "KW_IF",
  KW_ELSE = "KW_ELSE",
  KW_WHEN = "KW_WHEN",
  KW_WHILE = "KW_WHILE",
  KW_DO = "KW_DO",
  KW_FOR = "KW_FOR",
  KW_IN = "KW_IN",
  KW_IS = "KW_IS",
  KW_AS = "KW_AS",
  KW_BREAK = "KW_BREAK",
  KW_CONTINUE = "KW_CONTINUE",
  KW_RETURN = "KW_RETURN",
  KW_THROW = "KW_THROW",
  KW_TRY = "KW_TRY",
  KW_CATCH = "KW_CATCH",
  KW_FINALLY = "KW_FINALLY",
  KW_IMPORT = "KW_IMPORT",
  KW_PACKAGE = "KW_PACKAGE",
  KW_TRUE = "KW_TRUE",
  KW_FALSE = "KW_FALSE",
  KW_NULL = "KW_NULL",
  KW_VOID = "KW_VOID",
  KW_THIS = "KW_THIS",

  // Keyword operators
  NOT_IN = "NOT_IN", // !in
  NOT_IS = "NOT_IS", // !is
  AS_SAFE = "AS_SAFE", // as?

  // Operators
  PLUS = "PLUS",
  MINUS = "MINUS",
  STAR = "STAR",
  SLASH = "SLASH",
  PERCENT = "PERCENT",
  ASSIGN = "ASSIGN",
  PLUS_ASSIGN = "PLUS_ASSIGN",
  MINUS_ASSIGN = "MINUS_ASSIGN",
  STAR_ASSIGN = "STAR_ASSIGN",
  SLASH_ASSIGN = "SLASH_ASSIGN",
  PERCENT_ASSIGN = "PERCENT_ASSIGN",
  INC = "INC",
  DEC = "DEC",
  EQ = "EQ", // ==
  NEQ = "NEQ", // !=
  SEQ = "SEQ", // ===
  SNEQ = "SNEQ", // !==
  LT = "LT",
  LTE = "LTE",
  GT = "GT",
  GTE = "GTE",
  SPACESHIP = "SPACESHIP", // <=>
  AND = "AND", // &&
  OR = "OR", // ||
  NOT = "NOT", // !
  BIT_AND = "BIT_AND",
  BIT_OR = "BIT_OR",
  BIT_XOR = "BIT_XOR",
  BIT_NOT = "BIT_NOT",
  SHL = "SHL",
  SHR = "SHR",
  ARROW = "ARROW", // ->
  FAT_ARROW = "FAT_ARROW", // =>
  DOT = "DOT",
  DOTDOT = "DOTDOT", // ..
  DOTDOT_LT = "DOTDOT_LT", // ..<
  ELLIPSIS = "ELLIPSIS", // ...
  ELVIS = "ELVIS", // ?: and ??
  SAFE_DOT = "SAFE_DOT", // ?.
  SAFE_INDEX = "SAFE_INDEX", // ?[
  SAFE_CALL = "SAFE_CALL", // ?(
  QUESTION = "QUESTION",
  COLONCOLON = "COLONCOLON",

  // Punctuation
  LPAREN = "LPAREN",
  RPAREN = "RPAREN",
  LBRACE = "LBRACE",
  RBRACE = "RBRACE",
  LBRACKET = "LBRACKET",
  RBRACKET = "RBRACKET",
  COMMA = "COMMA",
  SEMICOLON = "SEMICOLON",
  COLON = "COLON",
}

/* =========================================================
   Token Types
   ========================================================= */

export type Token = {
  kind: TokenKind;
  /** Exact source slice. */
  lexeme: string;
  range: Range;
  /**
   * Decoded payload: identifier/label name, unescaped string or char, or the
   * numeric literal with underscores removed.
   */
  text: string;
  /** Whitespace, a newline or a comment directly precedes the token. */
  spaced: boolean;
};

/* =========================================================
   Lexer Options
   ========================================================= */

export type LexerOptions = {
  /** Include comment tokens. Default: false */
  includeComments?: boolean;
  /** Emit NEWLINE tokens. Default: true */
  emitNewlines?: boolean;
};

export const DEFAULT_LEXER_OPTIONS: Required<LexerOptions> = {
  includeComments: false,
  emitNewlines: true,
};

/* =========================================================
   Lexer Error
   ========================================================= */

export type LexerError = {
  message: string;
  range: Range;
};

export type LexResult = {
  tokens: Token[];
  errors: LexerError[];
};

/* =========================================================
   Core Lexer
   ========================================================= */

export class Lexer {
  private readonly src: string;
  private readonly opts: Required<LexerOptions>;

  private i = 0; // offset
  private line = 0; // 0-based
  private col = 0; // 0-based
  private spaced = true;

  private tokens: Token[] = [];
  private errors: LexerError[] = [];

  constructor(source: string, options?: LexerOptions) {
    this.src = source;
    this.opts = { ...DEFAULT_LEXER_OPTIONS, ...(options ?? {}) };
  }

  public lex(): LexResult {
    this.skipShebang();

    while (!this.isEOF() && this.errors.length === 0) {
      const c = this.peek();

      if (c === "\n") {
        this.emitNewline();
        continue;
      }
      if (c === "\r" || c === " " || c === "\t" || c === "\f" || c === "﻿") {
        this.advance();
        this.spaced = true;
        continue;
      }

      if (c === "/" && this.peek(1) === "/") {
        this.lexLineComment();
        continue;
      }
      if (c === "/" && this.peek(1) === "*") {
        this.lexBlockComment();
        continue;
      }

      if (c === '"') {
        this.lexString();
        continue;
      }
      if (c === "'") {
        this.lexChar();
        continue;
      }

      if (isDigit(c)) {
        this.lexNumber();
        continue;
      }

      if (isIdentStart(c)) {
        this.lexIdentifierOrKeyword();
        continue;
      }

      if (c === "@" && isIdentStart(this.peek(1))) {
        this.lexAtLabel();
        continue;
      }

      if (this.lexOperatorOrPunct()) continue;

      this.errorHere(`unexpected character '${printable(c)}'`);
    }

    const here = this.position();
    this.tokens.push({ kind: TokenKind.EOF, lexeme: "", text: "", range: { start: here, end: here }, spaced: true });

    return { tokens: this.tokens, errors: this.errors };
  }

  /* =========================================================
     Basics
     ========================================================= */

  private isEOF(): boolean {
    return this.i >= this.src.length;
  }

  private peek(ahead = 0): string {
    const idx = this.i + ahead;
    if (idx < 0 || idx >= this.src.length) return "\0";
    return this.src[idx];
  }

  private advance(): string {
    const c = this.peek();
    this.i++;

    if (c === "\n") {
      this.line++;
      this.col = 0;
    } else {
      this.col++;
    }

    return c;
  }

  private position(): Position {
    return { offset: this.i, line: this.line, column: this.col };
  }

  private push(kind: TokenKind, start: Position, text?: string): void {
    const end = this.position();
    const lexeme = this.src.slice(start.offset, end.offset);
    this.tokens.push({ kind, lexeme, text: text ?? lexeme, range: { start, end }, spaced: this.spaced });
    this.spaced = false;
  }

  private errorHere(message: string): void {
    const start = this.position();
    const end = { ...start, offset: start.offset + 1, column: start.column + 1 };
    this.addError(message, start, end);
  }

  private addError(message: string, start: Position, end: Position): void {
    const range = { start, end };
    this.errors.push({ message, range });
    this.tokens.push({
      kind: TokenKind.ERROR,
      lexeme: this.src.slice(start.offset, end.offset),
      text: message,
      range,
      spaced: this.spaced,
    });
  }

  /* =========================================================
     Trivia
     ========================================================= */

  private skipShebang(): void {
    if (this.peek() !== "#" || this.peek(1) !== "!") return;
    while (!this.isEOF() && this.peek() !== "\n") this.advance();
  }

  private emitNewline(): void {
    const start = this.position();
    this.advance();
    if (this.opts.emitNewlines) this.push(TokenKind.NEWLINE, start, "\n");
    this.spaced = true;
  }

  private lexLineComment(): void {
    const start = this.position();
    while (!this.isEOF() && this.peek() !== "\n") this.advance();
    if (this.opts.includeComments) this.push(TokenKind.COMMENT_LINE, start);
    this.spaced = true;
  }

  private lexBlockComment(): void {
    const start = this.position();
    this.advance();
    this.advance();

    while (!this.isEOF()) {
      if (this.peek() === "*" && this.peek(1) === "/") {
        this.advance();
        this.advance();
        if (this.opts.includeComments) this.push(TokenKind.COMMENT_BLOCK, start);
        this.spaced = true;
        return;
      }
      this.advance();
    }

    this.addError("unterminated block comment (expected '*/')", start, this.position());
  }

  /* =========================================================
     Strings / chars
     ========================================================= */

  private lexString(): void {
    const start = this.position();
    this.advance(); // opening quote

    let raw = "";
    while (!this.isEOF()) {
      const c = this.peek();

      if (c === '"') {
        this.advance();
        const body = raw.includes("\n") ? trimMultilineMargin(raw) : raw;
        const decoded = decodeEscapes(body);
        if (decoded === null) {
          this.addError("invalid escape sequence in string literal", start, this.position());
          return;
        }
        this.push(TokenKind.STRING, start, decoded);
        return;
      }

      if (c === "\\") {
        raw += this.advance();
        if (this.isEOF()) break;
      }
      raw += this.advance();
    }

    this.addError("unterminated string literal", start, this.position());
  }

  private lexChar(): void {
    const start = this.position();
    this.advance(); // opening quote

    let raw = "";
    if (this.peek() === "\\") raw += this.advance();
    if (!this.isEOF() && this.peek() !== "\n") raw += this.advance();

    if (this.peek() !== "'" || raw === "" || raw === "\\") {
      this.addError("unterminated or malformed char literal", start, this.position());
      return;
    }
    this.advance(); // closing quote

    const decoded = decodeEscapes(raw);
    if (decoded === null) {
      this.addError("invalid escape sequence in char literal", start, this.position());
      return;
    }
    this.push(TokenKind.CHAR, start, decoded);
  }

  /* =========================================================
     Numbers
     ========================================================= */

  private lexNumber(): void {
    const start = this.position();

    if (this.peek() === "0" && (this.peek(1) === "x" || this.peek(1) === "X")) {
      this.advance();
      this.advance();
      let digits = "";
      while (isHexDigit(this.peek()) || this.peek() === "_") {
        const d = this.advance();
        if (d !== "_") digits += d;
      }
      if (digits === "") {
        this.addError("hex literal needs at least one digit", start, this.position());
        return;
      }
      this.push(TokenKind.INT, start, `0x${digits}`);
      return;
    }

    let text = this.readDigits();
    let isReal = false;

    // fraction: "1.5" but not "1..5" or "1.foo"
    if (this.peek() === "." && isDigit(this.peek(1))) {
      isReal = true;
      text += this.advance();
      text += this.readDigits();
    }

    // exponent
    const e = this.peek();
    if ((e === "e" || e === "E") && (isDigit(this.peek(1)) || ((this.peek(1) === "+" || this.peek(1) === "-") && isDigit(this.peek(2))))) {
      isReal = true;
      text += this.advance();
      if (this.peek() === "+" || this.peek() === "-") text += this.advance();
      text += this.readDigits();
    }

    if (isIdentStart(this.peek())) {
      this.errorHere(`unexpected '${this.peek()}' after numeric literal`);
      return;
    }

    this.push(isReal ? TokenKind.REAL : TokenKind.INT, start, text);
  }

  private readDigits(): string {
    let digits = "";
    while (isDigit(this.peek()) || (this.peek() === "_" && isDigit(this.peek(1)))) {
      const d = this.advance();
      if (d !== "_") digits += d;
    }
    return digits;
  }

  /* =========================================================
     Identifiers / Keywords / Labels
     ========================================================= */

  private lexIdentifierOrKeyword(): void {
    const start = this.position();
    let text = this.advance();
    while (isIdentPart(this.peek())) text += this.advance();

    // name@ (label), but not name@@ or e-mail-ish a@b inside code
    if (this.peek() === "@" && !isIdentStart(this.peek(1))) {
      this.advance();
      this.push(TokenKind.LABEL, start, text);
      return;
    }

    const kw = keywordKind(text);
    if (kw === TokenKind.KW_AS && this.peek() === "?") {
      this.advance();
      this.push(TokenKind.AS_SAFE, start, "as?");
      return;
    }
    if (kw) {
      this.push(kw, start, text);
      return;
    }

    this.push(TokenKind.IDENTIFIER, start, text);
  }

  private lexAtLabel(): void {
    const start = this.position();
    this.advance(); // @
    let text = this.advance();
    while (isIdentPart(this.peek())) text += this.advance();
    this.push(TokenKind.AT_LABEL, start, text);
  }

  private matchesWord(ahead: number, word: string): boolean {
    for (let k = 0; k < word.length; k++) {
      if (this.peek(ahead + k) !== word[k]) return false;
    }
    return !isIdentPart(this.peek(ahead + word.length));
  }

  /* =========================================================
     Operators / punctuation
     ========================================================= */

  private lexOperatorOrPunct(): boolean {
    const start = this.position();

    // !in / !is
    if (this.peek() === "!" && this.matchesWord(1, "in")) {
      this.consume(3);
      this.push(TokenKind.NOT_IN, start);
      return true;
    }
    if (this.peek() === "!" && this.matchesWord(1, "is")) {
      this.consume(3);
      this.push(TokenKind.NOT_IS, start);
      return true;
    }

    for (const [op, kind] of OPERATORS) {
      if (this.src.startsWith(op, this.i)) {
        this.consume(op.length);
        this.push(kind, start);
        return true;
      }
    }
    return false;
  }

  private consume(n: number): void {
    for (let k = 0; k < n; k++) this.advance();
  }
}

/* =========================================================
   Public helpers
   ========================================================= */

export function tokenize(source: string, options?: LexerOptions): LexResult {
  return new Lexer(source, options).lex();
}

/* =========================================================
   Operator table (longest first)
   ========================================================= */

const OPERATORS: ReadonlyArray<readonly [string, TokenKind]> = [
  ["===", TokenKind.SEQ],
  ["!==", TokenKind.SNEQ],
  ["<=>", TokenKind.SPACESHIP],
  ["..<", TokenKind.DOTDOT_LT],
  ["...", TokenKind.ELLIPSIS],
  ["==", TokenKind.EQ],
  ["!=", TokenKind.NEQ],
  ["<=", TokenKind.LTE],
  [">=", TokenKind.GTE],
  ["<<", TokenKind.SHL],
  [">>", TokenKind.SHR],
  ["&&", TokenKind.AND],
  ["||", TokenKind.OR],
  ["+=", TokenKind.PLUS_ASSIGN],
  ["-=", TokenKind.MINUS_ASSIGN],
  ["*=", TokenKind.STAR_ASSIGN],
  ["/=", TokenKind.SLASH_ASSIGN],
  ["%=", TokenKind.PERCENT_ASSIGN],
  ["++", TokenKind.INC],
  ["--", TokenKind.DEC],
  ["->", TokenKind.ARROW],
  ["=>", TokenKind.FAT_ARROW],
  ["..", TokenKind.DOTDOT],
  ["?:", TokenKind.ELVIS],
  ["??", TokenKind.ELVIS],
  ["?.", TokenKind.SAFE_DOT],
  ["?[", TokenKind.SAFE_INDEX],
  ["?(", TokenKind.SAFE_CALL],
  ["::", TokenKind.COLONCOLON],
  ["+", TokenKind.PLUS],
  ["-", TokenKind.MINUS],
  ["*", TokenKind.STAR],
  ["/", TokenKind.SLASH],
  ["%", TokenKind.PERCENT],
  ["=", TokenKind.ASSIGN],
  ["<", TokenKind.LT],
  [">", TokenKind.GT],
  ["!", TokenKind.NOT],
  ["&", TokenKind.BIT_AND],
  ["|", TokenKind.BIT_OR],
  ["^", TokenKind.BIT_XOR],
  ["~", TokenKind.BIT_NOT],
  [".", TokenKind.DOT],
  ["?", TokenKind.QUESTION],
  ["(", TokenKind.LPAREN],
  [")", TokenKind.RPAREN],
  ["{", TokenKind.LBRACE],
  ["}", TokenKind.RBRACE],
  ["[", TokenKind.LBRACKET],
  ["]", TokenKind.RBRACKET],
  [",", TokenKind.COMMA],
  [";", TokenKind.SEMICOLON],
  [":", TokenKind.COLON],
];

/* =========================================================
   Keyword map
   ========================================================= */

const KEYWORDS: ReadonlyMap<string, TokenKind> = new Map([
  ["val", TokenKind.KW_VAL],
  ["var", TokenKind.KW_VAR],
  ["fun", TokenKind.KW_FUN],
  ["fn", TokenKind.KW_FUN],
  ["class", TokenKind.KW_CLASS],
  ["enum", TokenKind.KW_ENUM],
  ["object", TokenKind.KW_OBJECT],
  ["if", TokenKind.KW_IF],
  ["else", TokenKind.KW_ELSE],
  ["when", TokenKind.KW_WHEN],
  ["while", TokenKind.KW_WHILE],
  ["do", TokenKind.KW_DO],
  ["for", TokenKind.KW_FOR],
  ["in", TokenKind.KW_IN],
  ["is", TokenKind.KW_IS],
  ["as", TokenKind.KW_AS],
  ["break", TokenKind.KW_BREAK],
  ["continue", TokenKind.KW_CONTINUE],
  ["return", TokenKind.KW_RETURN],
  ["throw", TokenKind.KW_THROW],
  ["try", TokenKind.KW_TRY],
  ["catch", TokenKind.KW_CATCH],
  ["finally", TokenKind.KW_FINALLY],
  ["import", TokenKind.KW_IMPORT],
  ["package", TokenKind.KW_PACKAGE],
  ["true", TokenKind.KW_TRUE],
  ["false", TokenKind.KW_FALSE],
  ["null", TokenKind.KW_NULL],
  ["void", TokenKind.KW_VOID],
  ["this", TokenKind.KW_THIS],
]);

function keywordKind(text: string): TokenKind | null {
  return KEYWORDS.get(text) ?? null;
}

/* =========================================================
   Character utilities
   ========================================================= */

const LETTER = /\p{L}/u;
const DIGIT = /\p{Nd}/u;

function isDigit(c: string): boolean {
  return c >= "0" && c <= "9";
}

function isHexDigit(c: string): boolean {
  return isDigit(c) || (c >= "a" && c <= "f") || (c >= "A" && c <= "F");
}

function isIdentStart(c: string): boolean {
  return c === "_" || (c >= "a" && c <= "z") || (c >= "A" && c <= "Z") || (c > "\x7f" && LETTER.test(c));
}

function isIdentPart(c: string): boolean {
  return isIdentStart(c) || isDigit(c) || (c > "\x7f" && DIGIT.test(c));
}

/** Returns null on an unknown escape. */
function decodeEscapes(raw: string): string | null {
  let out = "";
  for (let k = 0; k < raw.length; k++) {
    const c = raw[k];
    if (c !== "\\") {
      out += c;
      continue;
    }
    k++;
    switch (raw[k]) {
      case "n":
        out += "\n";
        break;
      case "r":
        out += "\r";
        break;
      case "t":
        out += "\t";
        break;
      case "0":
        out += "\0";
        break;
      case '"':
        out += '"';
        break;
      case "'":
        out += "'";
        break;
      case "\\":
        out += "\\";
        break;
      default:
        return null;
    }
  }
  return out;
}

/**
 * Multi-line literal layout: a blank first and last line are dropped and the
 * smallest indentation of the remaining non-blank lines is removed.
 */
export function trimMultilineMargin(raw: string): string {
  const lines = raw.split("\n").map((l) => l.replace(/\r$/, ""));
  if (lines.length > 0 && lines[0].trim() === "") lines.shift();
  if (lines.length > 0 && lines[lines.length - 1].trim() === "") lines.pop();

  let margin = Infinity;
  for (const l of lines) {
    if (l.trim() === "") continue;
    const indent = l.length - l.trimStart().length;
    margin = Math.min(margin, indent);
  }
  if (!Number.isFinite(margin)) margin = 0;

  return lines.map((l) => l.slice(Math.min(margin, l.length - l.trimStart().length))).join("\n");
}

function printable(c: string): string {
  if (c === "\n") return "\\n";
  if (c === "\t") return "\\t";
  if (c === "\0") return "\\0";
  return c;
}
