// src/core/parser.ts
//
// Quill Parser
// ------------
// Turns tokens (from src/core/lexer.ts) into the executable AST
// (src/core/ast.ts). Recursive descent for statements and declarations,
// precedence climbing (BIN_OP_TABLE) for binary operators.
//
// Modes:
// - strict: the first syntax error stops parsing; compile() turns it into a
//   ScriptError and discards the partial tree.
// - lenient: errors are recorded and parsing resumes at the next statement
//   or class member boundary (used by the declaration summary).
//
// Newlines end statements except inside () and [], right after a binary
// operator, and before a `.`/`?.` chain continuation. `else`, `catch`,
// `finally` and the `while` of do-while may sit on the next line.
//
// Exports:
//   - parseSource(source, options): ParseResult
//   - Parser class (advanced usage)

import type {
  Accessor,
  Annotation,
  AssignmentOperator,
  BaseSpecifier,
  BinaryOperator,
  BlockExpression,
  CallArgument,
  CatchClause,
  ClassDeclaration,
  ClassMember,
  EnumDeclaration,
  EnumEntryDeclaration,
  Expression,
  ForInExpression,
  FunctionDeclaration,
  ImportDeclaration,
  LambdaExpression,
  ListElement,
  Modifiers,
  Parameter,
  Position,
  Program,
  Range,
  TypeRef,
  VariableDeclaration,
  Visibility,
  WhenBranch,
  WhenCondition,
} from "./ast";
import { defaultModifiers, hasAnnotation } from "./ast";

import { tokenize, TokenKind } from "./lexer";
import type { LexerError, Token } from "./lexer";

/* =========================================================
   Parse result & diagnostics
   ========================================================= */

export type ParseError = {
  message: string;
  range: Range;
  source: "lexer" | "parser";
};

export type ParseResult = {
  program: Program;
  errors: ParseError[];
  /** Comment tokens, only when requested (doc extraction). */
  comments: Token[];
};

export type ParseOptions = {
  fileName?: string;
  lenient?: boolean;
  keepComments?: boolean;
};

/** Thrown inside the parser; caught at the recovery points. */
class ParseFailure extends Error {
  constructor(
    message: string,
    public readonly range: Range,
  ) {
    super(message);
  }
}

/* =========================================================
   Public helpers
   ========================================================= */

export function parseSource(source: string, options: ParseOptions = {}): ParseResult {
  const lex = tokenize(source, { includeComments: options.keepComments ?? false, emitNewlines: true });

  const comments = lex.tokens.filter((t) => t.kind === TokenKind.COMMENT_LINE || t.kind === TokenKind.COMMENT_BLOCK);
  const tokens = lex.tokens.filter(
    (t) => t.kind !== TokenKind.COMMENT_LINE && t.kind !== TokenKind.COMMENT_BLOCK && t.kind !== TokenKind.ERROR,
  );

  const parser = new Parser(tokens, { fileName: options.fileName ?? "<eval>", lenient: options.lenient ?? false });
  const program = parser.parseProgram();

  const errors: ParseError[] = [...lex.errors.map((e: LexerError) => ({ ...e, source: "lexer" as const })), ...parser.errors];
  errors.sort((a, b) => a.range.start.offset - b.range.start.offset);

  return { program, errors, comments };
}

/* =========================================================
   Precedence
   ========================================================= */

type BinOpInfo =
  | { precedence: number; node: "binary"; op: BinaryOperator }
  | { precedence: number; node: "range"; inclusive: boolean }
  | { precedence: number; node: "is"; negated: boolean }
  | { precedence: number; node: "as"; safe: boolean };

const BIN_OP_TABLE: Partial<Record<TokenKind, BinOpInfo>> = {
  [TokenKind.BIT_OR]: { precedence: 1, node: "binary", op: "|" },
  [TokenKind.BIT_XOR]: { precedence: 2, node: "binary", op: "^" },
  [TokenKind.BIT_AND]: { precedence: 3, node: "binary", op: "&" },

  [TokenKind.EQ]: { precedence: 4, node: "binary", op: "==" },
  [TokenKind.NEQ]: { precedence: 4, node: "binary", op: "!=" },
  [TokenKind.SEQ]: { precedence: 4, node: "binary", op: "===" },
  [TokenKind.SNEQ]: { precedence: 4, node: "binary", op: "!==" },

  [TokenKind.LT]: { precedence: 5, node: "binary", op: "<" },
  [TokenKind.LTE]: { precedence: 5, node: "binary", op: "<=" },
  [TokenKind.GT]: { precedence: 5, node: "binary", op: ">" },
  [TokenKind.GTE]: { precedence: 5, node: "binary", op: ">=" },
  [TokenKind.SPACESHIP]: { precedence: 5, node: "binary", op: "<=>" },

  [TokenKind.KW_IN]: { precedence: 6, node: "binary", op: "in" },
  [TokenKind.NOT_IN]: { precedence: 6, node: "binary", op: "!in" },
  [TokenKind.KW_IS]: { precedence: 6, node: "is", negated: false },
  [TokenKind.NOT_IS]: { precedence: 6, node: "is", negated: true },
  [TokenKind.KW_AS]: { precedence: 6, node: "as", safe: false },
  [TokenKind.AS_SAFE]: { precedence: 6, node: "as", safe: true },

  [TokenKind.DOTDOT]: { precedence: 7, node: "range", inclusive: true },
  [TokenKind.DOTDOT_LT]: { precedence: 7, node: "range", inclusive: false },

  [TokenKind.SHL]: { precedence: 8, node: "binary", op: "<<" },
  [TokenKind.SHR]: { precedence: 8, node: "binary", op: ">>" },

  [TokenKind.PLUS]: { precedence: 9, node: "binary", op: "+" },
  [TokenKind.MINUS]: { precedence: 9, node: "binary", op: "-" },

  [TokenKind.STAR]: { precedence: 10, node: "binary", op: "*" },
  [TokenKind.SLASH]: { precedence: 10, node: "binary", op: "/" },
  [TokenKind.PERCENT]: { precedence: 10, node: "binary", op: "%" },
};

const ASSIGN_OPS: Partial<Record<TokenKind, AssignmentOperator>> = {
  [TokenKind.ASSIGN]: "=",
  [TokenKind.PLUS_ASSIGN]: "+=",
  [TokenKind.MINUS_ASSIGN]: "-=",
  [TokenKind.STAR_ASSIGN]: "*=",
  [TokenKind.SLASH_ASSIGN]: "/=",
  [TokenKind.PERCENT_ASSIGN]: "%=",
};

const MODIFIER_WORDS = new Set(["private", "protected", "public", "static", "override", "open", "abstract"]);

const DECLARATION_STARTS = new Set<TokenKind>([
  TokenKind.KW_VAL,
  TokenKind.KW_VAR,
  TokenKind.KW_FUN,
  TokenKind.KW_CLASS,
  TokenKind.KW_OBJECT,
  TokenKind.KW_ENUM,
]);

type FunctionFrame = { poolable: boolean };

export class Parser {
  private readonly tokens: Token[];
  private readonly fileName: string;
  private readonly lenient: boolean;
  private idx = 0;

  /** Enclosing function/lambda bodies; a closure-creating node clears `poolable`. */
  private readonly functions: FunctionFrame[] = [];

  public readonly errors: ParseError[] = [];

  constructor(tokens: Token[], options: { fileName: string; lenient: boolean }) {
    this.tokens = tokens;
    this.fileName = options.fileName;
    this.lenient = options.lenient;
  }

  /* =========================================================
     Top-level
     ========================================================= */

  public parseProgram(): Program {
    const start = this.current().range.start;
    const body: Expression[] = [];
    let packageName: string | null = null;

    this.skipSeparators();

    if (this.is(TokenKind.KW_PACKAGE)) {
      packageName = this.recover<string | null>(() => {
        this.advance();
        const name = this.parseQualifiedName();
        this.expectStatementEnd();
        return name.text;
      }, null);
      this.skipSeparators();
    }

    while (!this.isAtEnd()) {
      if (this.errors.length > 0 && !this.lenient) break;

      const before = this.idx;
      const st = this.recover<Expression | null>(() => {
        const node = this.parseStatement();
        this.expectStatementEnd();
        return node;
      }, null);
      if (st) body.push(st);
      if (this.idx === before) this.advance(); // stray '}'

      this.skipSeparators();
    }

    return {
      kind: "Program",
      range: { start, end: this.previous().range.end },
      fileName: this.fileName,
      packageName,
      body,
    };
  }

  /**
   * Runs a parse step. On failure the error is recorded; in lenient mode the
   * parser skips to the next boundary and returns the fallback.
   */
  private recover<T>(step: () => T, fallback: T): T {
    try {
      return step();
    } catch (e) {
      if (!(e instanceof ParseFailure)) throw e;
      this.errors.push({ message: e.message, range: e.range, source: "parser" });
      if (this.lenient) this.synchronize();
      else this.idx = this.tokens.length - 1;
      return fallback;
    }
  }

  /* =========================================================
     Statements
     ========================================================= */

  private parseStatement(): Expression {
    const annotations = this.parseAnnotations();
    const modifiers = this.parseModifiers(annotations);

    switch (this.current().kind) {
      case TokenKind.KW_VAL:
      case TokenKind.KW_VAR:
        return this.parseVariableDeclaration(modifiers, false);
      case TokenKind.KW_FUN:
        if (this.peekKind(1) === TokenKind.LPAREN) break; // anonymous fun expression
        return this.parseFunctionDeclaration(modifiers);
      case TokenKind.KW_CLASS:
      case TokenKind.KW_OBJECT:
        return this.parseClassDeclaration(modifiers);
      case TokenKind.KW_ENUM:
        return this.parseEnumDeclaration(modifiers);
      case TokenKind.KW_IMPORT:
        return this.parseImport();
      case TokenKind.LBRACE:
        return this.parseBlock();
      default:
        break;
    }

    if (annotations.length > 0 || modifiers.visibility !== "public" || modifiers.isStatic || modifiers.isOverride) {
      this.fail("modifiers and annotations must precede a declaration");
    }

    return this.parseExpression();
  }

  private parseAnnotations(): Annotation[] {
    const out: Annotation[] = [];
    while (this.is(TokenKind.AT_LABEL)) {
      const t = this.advance();
      out.push({ name: t.text, range: t.range });
      this.skipNewlines();
    }
    return out;
  }

  private parseModifiers(annotations: Annotation[]): Modifiers {
    const mods: Modifiers = { ...defaultModifiers(), annotations };

    while (this.is(TokenKind.IDENTIFIER) && MODIFIER_WORDS.has(this.current().text) && this.startsDeclarationAfterModifier(1)) {
      const word = this.advance().text;
      switch (word) {
        case "private":
        case "protected":
        case "public":
          mods.visibility = word;
          break;
        case "static":
          mods.isStatic = true;
          break;
        case "override":
          mods.isOverride = true;
          break;
        case "abstract":
          mods.isAbstract = true;
          break;
        default:
          // open: every class is extensible
          break;
      }
    }
    return mods;
  }

  private startsDeclarationAfterModifier(ahead: number): boolean {
    const t = this.tokens[this.idx + ahead];
    if (!t) return false;
    if (DECLARATION_STARTS.has(t.kind)) return true;
    return t.kind === TokenKind.IDENTIFIER && MODIFIER_WORDS.has(t.text) && this.startsDeclarationAfterModifier(ahead + 1);
  }

  private parseImport(): ImportDeclaration {
    const start = this.advance().range.start;
    const parts: string[] = [this.expectIdentifier("expected package name after 'import'").text];
    let symbols: string[] | null = null;

    while (this.match(TokenKind.DOT)) {
      if (this.match(TokenKind.STAR)) break;
      if (this.match(TokenKind.LBRACE)) {
        symbols = [];
        this.skipNewlines();
        do {
          this.skipNewlines();
          if (this.is(TokenKind.RBRACE)) break;
          symbols.push(this.expectIdentifier("expected symbol name").text);
          this.skipNewlines();
        } while (this.match(TokenKind.COMMA));
        this.expect(TokenKind.RBRACE, "expected '}' after imported symbols");
        break;
      }
      parts.push(this.expectIdentifier("expected package name segment").text);
    }

    return {
      kind: "ImportDeclaration",
      range: this.rangeFrom(start),
      packageName: parts.join("."),
      symbols,
    };
  }

  /* =========================================================
     Declarations
     ========================================================= */

  private parseVariableDeclaration(modifiers: Modifiers, inClassBody: boolean): VariableDeclaration {
    const kw = this.advance();
    const mutable = kw.kind === TokenKind.KW_VAR;
    const nameTok = this.expectIdentifier(`expected a name after '${kw.lexeme}'`);

    let type: TypeRef | null = null;
    if (this.match(TokenKind.COLON)) type = this.parseTypeRef();

    let initializer: Expression | null = null;
    let delegate: Expression | null = null;

    if (this.match(TokenKind.ASSIGN)) {
      this.skipNewlines();
      initializer = this.parseExpression();
    } else if (this.isWord("by")) {
      this.advance();
      this.skipNewlines();
      delegate = this.parseExpression();
    }

    let getter: Accessor | null = null;
    let setter: Accessor | null = null;
    let setterVisibility: Visibility | null = null;

    if (inClassBody && !delegate) {
      for (;;) {
        const save = this.idx;
        this.skipNewlines();

        let vis: Visibility | null = null;
        if (this.isWord("private") || this.isWord("protected") || this.isWord("public")) {
          const next = this.tokens[this.idx + 1];
          if (next && next.kind === TokenKind.IDENTIFIER && next.text === "set") {
            const w = this.advance().text;
            vis = w === "private" ? "private" : w === "protected" ? "protected" : "public";
          }
        }

        if (!getter && vis === null && this.isWord("get") && this.peekKind(1) === TokenKind.LPAREN) {
          getter = this.parseAccessor(false);
          continue;
        }
        if (!setter && this.isWord("set")) {
          if (this.peekKind(1) === TokenKind.LPAREN) {
            setter = this.parseAccessor(true);
            setterVisibility = vis;
            continue;
          }
          if (vis !== null) {
            // `private set` without a body only narrows visibility
            this.advance();
            setterVisibility = vis;
            continue;
          }
        }

        this.idx = save;
        break;
      }
    }

    if (!mutable && setter) this.failAt(setter.range, `'val ${nameTok.text}' cannot have a setter`);

    return {
      kind: "VariableDeclaration",
      range: this.rangeFrom(kw.range.start),
      mutable,
      name: nameTok.text,
      nameRange: nameTok.range,
      type,
      initializer,
      delegate,
      getter,
      setter,
      setterVisibility,
      modifiers,
      transient: hasAnnotation(modifiers.annotations, "Transient"),
    };
  }

  private parseAccessor(isSetter: boolean): Accessor {
    const start = this.advance().range.start; // get / set
    this.expect(TokenKind.LPAREN, "expected '('");
    let param: string | null = null;
    if (isSetter) param = this.expectIdentifier("expected setter parameter name").text;
    this.expect(TokenKind.RPAREN, "expected ')'");

    const body = this.parseFunctionBody();
    if (!body) this.fail(isSetter ? "setter needs a body" : "getter needs a body");
    return { param, body: body ?? this.emptyBlock(start), range: this.rangeFrom(start) };
  }

  private parseFunctionDeclaration(modifiers: Modifiers): FunctionDeclaration {
    const kw = this.advance(); // fun
    this.markClosure();

    const nameTok = this.expectIdentifier("expected function name");

    let params: Parameter[] = [];
    let delegate: Expression | null = null;
    let returnType: TypeRef | null = null;
    let body: Expression | null = null;
    let expressionBody = false;

    const frame: FunctionFrame = { poolable: true };
    this.functions.push(frame);
    try {
      if (this.isWord("by")) {
        this.advance();
        this.skipNewlines();
        delegate = this.parseExpression();
      } else {
        params = this.parseParameterList(false);
        if (this.match(TokenKind.COLON)) returnType = this.parseTypeRef();
        expressionBody = this.is(TokenKind.ASSIGN);
        body = this.parseFunctionBody();
      }
    } finally {
      this.functions.pop();
    }

    if (!body && !delegate && !modifiers.isAbstract) {
      // bodiless member: abstract by declaration
      modifiers = { ...modifiers, isAbstract: true };
    }

    return {
      kind: "FunctionDeclaration",
      range: this.rangeFrom(kw.range.start),
      name: nameTok.text,
      nameRange: nameTok.range,
      params,
      returnType,
      body,
      expressionBody,
      delegate,
      modifiers,
      poolable: frame.poolable,
    };
  }

  /** `{ ... }`, `= expr`, or nothing (abstract). */
  private parseFunctionBody(): Expression | null {
    if (this.is(TokenKind.LBRACE)) return this.parseBlock();
    if (this.match(TokenKind.ASSIGN)) {
      this.skipNewlines();
      return this.parseExpression();
    }
    return null;
  }

  private parseParameterList(isConstructor: boolean): Parameter[] {
    this.expect(TokenKind.LPAREN, "expected '(' to start the parameter list");
    const params: Parameter[] = [];

    this.skipNewlines();
    while (!this.is(TokenKind.RPAREN)) {
      params.push(this.parseParameter(isConstructor));
      this.skipNewlines();
      if (!this.match(TokenKind.COMMA)) break;
      this.skipNewlines();
    }
    this.expect(TokenKind.RPAREN, "expected ')' after parameters");

    const seen = new Set<string>();
    for (const p of params) {
      if (seen.has(p.name)) this.failAt(p.range, `duplicate parameter '${p.name}'`);
      seen.add(p.name);
    }
    return params;
  }

  private parseParameter(isConstructor: boolean): Parameter {
    const start = this.current().range.start;
    const annotations = this.parseAnnotations();

    let visibility: Visibility = "public";
    if ((this.isWord("private") || this.isWord("protected")) && this.peekKind(1) !== TokenKind.COLON) {
      visibility = this.advance().text === "private" ? "private" : "protected";
    }

    let fieldKind: Parameter["fieldKind"] = null;
    if (isConstructor && (this.is(TokenKind.KW_VAL) || this.is(TokenKind.KW_VAR))) {
      fieldKind = this.advance().kind === TokenKind.KW_VAL ? "val" : "var";
    }

    const nameTok = this.expectIdentifier("expected parameter name");
    const variadic = this.match(TokenKind.ELLIPSIS);

    let type: TypeRef | null = null;
    if (this.match(TokenKind.COLON)) type = this.parseTypeRef();

    let defaultValue: Expression | null = null;
    if (this.match(TokenKind.ASSIGN)) {
      this.skipNewlines();
      defaultValue = this.parseExpression();
    }

    return {
      name: nameTok.text,
      range: this.rangeFrom(start),
      type,
      defaultValue,
      variadic,
      fieldKind,
      visibility,
      annotations,
      transient: hasAnnotation(annotations, "Transient"),
    };
  }

  private parseClassDeclaration(modifiers: Modifiers): ClassDeclaration {
    const kw = this.advance(); // class / object
    const isObject = kw.kind === TokenKind.KW_OBJECT;
    this.markClosure();

    const nameTok = this.expectIdentifier(isObject ? "expected object name" : "expected class name");

    let constructorParams: Parameter[] | null = null;
    if (!isObject && this.is(TokenKind.LPAREN)) constructorParams = this.parseParameterList(true);

    const bases: BaseSpecifier[] = [];
    if (this.match(TokenKind.COLON)) {
      do {
        this.skipNewlines();
        const bStart = this.current().range.start;
        const type = this.parseTypeOperand();
        let args: CallArgument[] | null = null;
        if (this.is(TokenKind.LPAREN)) args = this.parseCallArguments();
        bases.push({ type, args, range: this.rangeFrom(bStart) });
      } while (this.match(TokenKind.COMMA));
    }

    let members: ClassMember[] = [];
    if (this.is(TokenKind.LBRACE)) members = this.parseClassBody();

    return {
      kind: "ClassDeclaration",
      range: this.rangeFrom(kw.range.start),
      name: nameTok.text,
      nameRange: nameTok.range,
      isObject,
      constructorParams,
      bases,
      members,
      modifiers,
    };
  }

  private parseClassBody(): ClassMember[] {
    this.expect(TokenKind.LBRACE, "expected '{' to start the class body");
    const members: ClassMember[] = [];

    this.skipSeparators();
    while (!this.is(TokenKind.RBRACE) && !this.isAtEnd()) {
      const member = this.recover<ClassMember | null>(() => {
        const m = this.parseClassMember();
        this.expectStatementEnd();
        return m;
      }, null);
      if (member) members.push(member);
      if (!this.lenient && this.errors.length > 0) return members;
      this.skipSeparators();
    }
    this.expect(TokenKind.RBRACE, "expected '}' to close the class body");
    return members;
  }

  private parseClassMember(): ClassMember {
    if (this.isWord("init") && this.peekKind(1) === TokenKind.LBRACE) {
      const start = this.advance().range.start;
      const frame: FunctionFrame = { poolable: false };
      this.functions.push(frame);
      try {
        const body = this.parseBlock();
        return { kind: "InitBlock", range: this.rangeFrom(start), body };
      } finally {
        this.functions.pop();
      }
    }

    const annotations = this.parseAnnotations();
    const modifiers = this.parseModifiers(annotations);

    switch (this.current().kind) {
      case TokenKind.KW_VAL:
      case TokenKind.KW_VAR: {
        const frame: FunctionFrame = { poolable: false };
        this.functions.push(frame);
        try {
          return this.parseVariableDeclaration(modifiers, true);
        } finally {
          this.functions.pop();
        }
      }
      case TokenKind.KW_FUN:
        return this.parseFunctionDeclaration(modifiers);
      case TokenKind.KW_CLASS:
      case TokenKind.KW_OBJECT:
        return this.parseClassDeclaration(modifiers);
      case TokenKind.KW_ENUM:
        return this.parseEnumDeclaration(modifiers);
      default:
        return this.fail(`unexpected '${this.current().lexeme}' in class body`);
    }
  }

  private parseEnumDeclaration(modifiers: Modifiers): EnumDeclaration {
    const kw = this.advance(); // enum
    if (this.is(TokenKind.KW_CLASS)) this.advance();
    this.markClosure();

    const nameTok = this.expectIdentifier("expected enum name");
    this.expect(TokenKind.LBRACE, "expected '{' after enum name");

    const entries: EnumEntryDeclaration[] = [];
    this.skipSeparators();
    while (this.is(TokenKind.IDENTIFIER)) {
      const t = this.advance();
      if (entries.some((e) => e.name === t.text)) this.failAt(t.range, `duplicate enum entry '${t.text}'`);
      entries.push({ name: t.text, range: t.range });
      this.skipNewlines();
      if (!this.match(TokenKind.COMMA)) break;
      this.skipNewlines();
    }
    this.skipSeparators();
    this.expect(TokenKind.RBRACE, "expected '}' to close the enum");

    return {
      kind: "EnumDeclaration",
      range: this.rangeFrom(kw.range.start),
      name: nameTok.text,
      nameRange: nameTok.range,
      entries,
      modifiers,
    };
  }

  /* =========================================================
     Types (metadata only)
     ========================================================= */

  private parseTypeRef(): TypeRef {
    const start = this.current().range.start;

    if (this.match(TokenKind.LPAREN)) {
      // function type: (A, B) -> C
      const args: TypeRef[] = [];
      this.skipNewlines();
      while (!this.is(TokenKind.RPAREN)) {
        args.push(this.parseTypeRef());
        if (!this.match(TokenKind.COMMA)) break;
        this.skipNewlines();
      }
      this.expect(TokenKind.RPAREN, "expected ')' in function type");
      this.expect(TokenKind.ARROW, "expected '->' in function type");
      args.push(this.parseTypeRef());
      const nullable = this.match(TokenKind.QUESTION);
      return { name: "Function", nullable, args, range: this.rangeFrom(start) };
    }

    const name = this.parseQualifiedName().text;
    const args: TypeRef[] = [];
    if (this.match(TokenKind.LT)) {
      do {
        this.skipNewlines();
        if (this.match(TokenKind.STAR)) continue;
        args.push(this.parseTypeRef());
      } while (this.match(TokenKind.COMMA));
      this.expectTypeClose();
    }
    const nullable = this.match(TokenKind.QUESTION);
    return { name, nullable, args, range: this.rangeFrom(start) };
  }

  /** Right-hand side of `is`/`as` and base class references: a name chain. */
  private parseTypeOperand(): Expression {
    const first = this.expectIdentifier("expected a type name");
    let expr: Expression = { kind: "Identifier", range: first.range, name: first.text };
    while (this.is(TokenKind.DOT) && this.peekKind(1) === TokenKind.IDENTIFIER) {
      this.advance();
      const t = this.advance();
      expr = { kind: "MemberExpression", range: this.rangeFrom(expr.range.start), object: expr, name: t.text, nullSafe: false };
    }
    if (this.is(TokenKind.LT)) {
      // generic arguments are metadata only
      this.parseTypeArgumentsSkip();
    }
    if (this.is(TokenKind.QUESTION)) this.advance();
    return expr;
  }

  private parseTypeArgumentsSkip(): void {
    this.expect(TokenKind.LT, "expected '<'");
    do {
      if (this.match(TokenKind.STAR)) continue;
      this.parseTypeRef();
    } while (this.match(TokenKind.COMMA));
    this.expectTypeClose();
  }

  /** `>` closing type arguments; splits `>>` from nested generics. */
  private expectTypeClose(): void {
    const t = this.current();
    if (t.kind === TokenKind.SHR) {
      const mid: Position = { offset: t.range.start.offset + 1, line: t.range.start.line, column: t.range.start.column + 1 };
      this.tokens.splice(
        this.idx,
        1,
        { kind: TokenKind.GT, lexeme: ">", text: ">", range: { start: t.range.start, end: mid }, spaced: t.spaced },
        { kind: TokenKind.GT, lexeme: ">", text: ">", range: { start: mid, end: t.range.end }, spaced: false },
      );
    }
    this.expect(TokenKind.GT, "expected '>' to close type arguments");
  }

  private parseQualifiedName(): { text: string; range: Range } {
    const first = this.expectIdentifier("expected a name");
    let text = first.text;
    while (this.is(TokenKind.DOT) && this.peekKind(1) === TokenKind.IDENTIFIER) {
      this.advance();
      text += `.${this.advance().text}`;
    }
    return { text, range: this.rangeFrom(first.range.start) };
  }

  /* =========================================================
     Expressions
     ========================================================= */

  public parseExpression(): Expression {
    return this.parseAssignment();
  }

  private parseAssignment(): Expression {
    const left = this.parsePair();
    const op = ASSIGN_OPS[this.current().kind];
    if (!op) return left;

    const opTok = this.advance();
    if (!isAssignable(left)) this.failAt(opTok.range, "invalid assignment target");
    this.skipNewlines();
    const value = this.parseAssignment();

    return {
      kind: "AssignmentExpression",
      range: this.rangeFrom(left.range.start),
      operator: op,
      target: left,
      value,
    };
  }

  private parsePair(): Expression {
    const key = this.parseElvis();
    if (!this.match(TokenKind.FAT_ARROW)) return key;
    this.skipNewlines();
    const value = this.parseElvis();
    return { kind: "PairExpression", range: this.rangeFrom(key.range.start), key, value };
  }

  private parseElvis(): Expression {
    const left = this.parseOr();
    if (!this.match(TokenKind.ELVIS)) return left;
    this.skipNewlines();
    const right = this.parseElvis();
    return { kind: "LogicalExpression", range: this.rangeFrom(left.range.start), operator: "?:", left, right };
  }

  private parseOr(): Expression {
    let left = this.parseAnd();
    while (this.match(TokenKind.OR)) {
      this.skipNewlines();
      const right = this.parseAnd();
      left = { kind: "LogicalExpression", range: this.rangeFrom(left.range.start), operator: "||", left, right };
    }
    return left;
  }

  private parseAnd(): Expression {
    let left = this.parseBinary(1);
    while (this.match(TokenKind.AND)) {
      this.skipNewlines();
      const right = this.parseBinary(1);
      left = { kind: "LogicalExpression", range: this.rangeFrom(left.range.start), operator: "&&", left, right };
    }
    return left;
  }

  private parseBinary(minPrecedence: number): Expression {
    let left = this.parseUnary();

    for (;;) {
      const info = BIN_OP_TABLE[this.current().kind];
      if (!info || info.precedence < minPrecedence) break;
      this.advance();
      this.skipNewlines();

      const start = left.range.start;
      switch (info.node) {
        case "is":
          left = { kind: "TypeCheckExpression", range: this.rangeFrom(start), negated: info.negated, value: left, type: this.parseTypeOperand() };
          break;
        case "as":
          left = { kind: "CastExpression", range: this.rangeFrom(start), safe: info.safe, value: left, type: this.parseTypeOperand() };
          break;
        case "range": {
          const end = this.parseBinary(info.precedence + 1);
          left = { kind: "RangeExpression", range: this.rangeFrom(start), start: left, end, inclusive: info.inclusive };
          break;
        }
        case "binary": {
          const right = this.parseBinary(info.precedence + 1);
          left = { kind: "BinaryExpression", range: this.rangeFrom(start), operator: info.op, left, right };
          break;
        }
      }
    }

    return left;
  }

  private parseUnary(): Expression {
    const t = this.current();
    const start = t.range.start;

    switch (t.kind) {
      case TokenKind.MINUS:
      case TokenKind.PLUS:
      case TokenKind.NOT:
      case TokenKind.BIT_NOT: {
        this.advance();
        const operand = this.parseUnary();
        const operator = t.kind === TokenKind.MINUS ? "-" : t.kind === TokenKind.PLUS ? "+" : t.kind === TokenKind.NOT ? "!" : "~";
        // fold negative numeric literals so `-9223372036854775808` stays in range
        if (operator === "-" && operand.kind === "IntLiteral") {
          return { kind: "IntLiteral", range: this.rangeFrom(start), value: BigInt.asIntN(64, -operand.value) };
        }
        if (operator === "-" && operand.kind === "RealLiteral") {
          return { kind: "RealLiteral", range: this.rangeFrom(start), value: -operand.value };
        }
        return { kind: "UnaryExpression", range: this.rangeFrom(start), operator, operand };
      }
      case TokenKind.INC:
      case TokenKind.DEC: {
        this.advance();
        const target = this.parseUnary();
        if (!isAssignable(target)) this.failAt(target.range, "invalid increment target");
        return { kind: "UpdateExpression", range: this.rangeFrom(start), operator: t.kind === TokenKind.INC ? "++" : "--", prefix: true, target };
      }
      default:
        return this.parsePostfix(this.parsePrimary());
    }
  }

  private parsePostfix(base: Expression): Expression {
    let expr = base;

    for (;;) {
      const t = this.current();

      // chain continuation on the next line: `\n  .foo()`
      if (t.kind === TokenKind.NEWLINE) {
        let j = this.idx;
        while (this.tokens[j] && this.tokens[j].kind === TokenKind.NEWLINE) j++;
        const next = this.tokens[j];
        if (next && (next.kind === TokenKind.DOT || next.kind === TokenKind.SAFE_DOT)) {
          this.idx = j;
          continue;
        }
        break;
      }

      if (t.kind === TokenKind.DOT || t.kind === TokenKind.SAFE_DOT) {
        this.advance();
        this.skipNewlines();
        const nameTok = this.expectMemberName();
        expr = {
          kind: "MemberExpression",
          range: this.rangeFrom(expr.range.start),
          object: expr,
          name: nameTok.text,
          nullSafe: t.kind === TokenKind.SAFE_DOT,
        };
        continue;
      }

      if (t.kind === TokenKind.LPAREN || t.kind === TokenKind.SAFE_CALL) {
        const args = this.parseCallArguments();
        const trailingLambda = this.tryParseTrailingLambda();
        expr = {
          kind: "CallExpression",
          range: this.rangeFrom(expr.range.start),
          callee: expr,
          args,
          trailingLambda,
          nullSafe: t.kind === TokenKind.SAFE_CALL,
        };
        continue;
      }

      if ((t.kind === TokenKind.LBRACE || t.kind === TokenKind.LABEL) && isCallableHead(expr)) {
        const trailingLambda = this.tryParseTrailingLambda();
        if (!trailingLambda) break;
        expr = {
          kind: "CallExpression",
          range: this.rangeFrom(expr.range.start),
          callee: expr,
          args: [],
          trailingLambda,
          nullSafe: false,
        };
        continue;
      }

      if (t.kind === TokenKind.LBRACKET || t.kind === TokenKind.SAFE_INDEX) {
        this.advance();
        const indices: Expression[] = [];
        this.skipNewlines();
        do {
          this.skipNewlines();
          indices.push(this.parseExpression());
          this.skipNewlines();
        } while (this.match(TokenKind.COMMA));
        this.expect(TokenKind.RBRACKET, "expected ']' after index");
        expr = {
          kind: "IndexExpression",
          range: this.rangeFrom(expr.range.start),
          object: expr,
          indices,
          nullSafe: t.kind === TokenKind.SAFE_INDEX,
        };
        continue;
      }

      if ((t.kind === TokenKind.INC || t.kind === TokenKind.DEC) && isAssignable(expr)) {
        this.advance();
        expr = {
          kind: "UpdateExpression",
          range: this.rangeFrom(expr.range.start),
          operator: t.kind === TokenKind.INC ? "++" : "--",
          prefix: false,
          target: expr,
        };
        continue;
      }

      break;
    }

    return expr;
  }

  private tryParseTrailingLambda(): LambdaExpression | null {
    if (this.is(TokenKind.LBRACE)) return this.parseLambda(null);
    if (this.is(TokenKind.LABEL) && this.peekKind(1) === TokenKind.LBRACE) {
      const label = this.advance().text;
      return this.parseLambda(label);
    }
    return null;
  }

  private parseCallArguments(): CallArgument[] {
    this.advance(); // ( or ?(
    const args: CallArgument[] = [];

    this.skipNewlines();
    while (!this.is(TokenKind.RPAREN)) {
      const start = this.current().range.start;
      if (this.match(TokenKind.ELLIPSIS)) {
        const value = this.parseExpression();
        args.push({ kind: "spread", value, range: this.rangeFrom(start) });
      } else if (this.is(TokenKind.IDENTIFIER) && this.peekKind(1) === TokenKind.COLON) {
        const name = this.advance().text;
        this.advance(); // :
        this.skipNewlines();
        const value = this.parseExpression();
        if (args.some((a) => a.kind === "named" && a.name === name)) this.fail(`argument '${name}' is passed twice`);
        args.push({ kind: "named", name, value, range: this.rangeFrom(start) });
      } else {
        const value = this.parseExpression();
        if (args.some((a) => a.kind === "named")) this.failAt(value.range, "positional argument after a named one");
        args.push({ kind: "positional", value, range: this.rangeFrom(start) });
      }
      this.skipNewlines();
      if (!this.match(TokenKind.COMMA)) break;
      this.skipNewlines();
    }
    this.expect(TokenKind.RPAREN, "expected ')' after arguments");
    return args;
  }

  private parsePrimary(): Expression {
    const t = this.current();
    const start = t.range.start;

    switch (t.kind) {
      case TokenKind.INT: {
        this.advance();
        return { kind: "IntLiteral", range: t.range, value: BigInt.asIntN(64, BigInt(t.text)) };
      }
      case TokenKind.REAL:
        this.advance();
        return { kind: "RealLiteral", range: t.range, value: Number(t.text) };
      case TokenKind.STRING:
        this.advance();
        return { kind: "StringLiteral", range: t.range, value: t.text };
      case TokenKind.CHAR:
        this.advance();
        return { kind: "CharLiteral", range: t.range, value: t.text };
      case TokenKind.KW_TRUE:
      case TokenKind.KW_FALSE:
        this.advance();
        return { kind: "BooleanLiteral", range: t.range, value: t.kind === TokenKind.KW_TRUE };
      case TokenKind.KW_NULL:
        this.advance();
        return { kind: "NullLiteral", range: t.range };
      case TokenKind.KW_VOID:
        this.advance();
        return { kind: "VoidLiteral", range: t.range };
      case TokenKind.KW_THIS:
        this.advance();
        return { kind: "ThisExpression", range: t.range };
      case TokenKind.IDENTIFIER:
        this.advance();
        return { kind: "Identifier", range: t.range, name: t.text };

      case TokenKind.LPAREN: {
        this.advance();
        this.skipNewlines();
        const inner = this.parseExpression();
        this.skipNewlines();
        this.expect(TokenKind.RPAREN, "expected ')'");
        return inner;
      }

      case TokenKind.LBRACKET:
        return this.parseListLiteral();

      case TokenKind.LBRACE:
        return this.parseLambda(null);

      case TokenKind.LABEL: {
        this.advance();
        if (this.is(TokenKind.LBRACE)) return this.parseLambda(t.text);
        if (this.is(TokenKind.KW_WHILE)) return this.parseWhile(t.text, start);
        if (this.is(TokenKind.KW_DO)) return this.parseDoWhile(t.text, start);
        if (this.is(TokenKind.KW_FOR)) return this.parseFor(t.text, start);
        return this.fail(`label '${t.text}@' must precede a loop or a lambda`);
      }

      case TokenKind.KW_FUN:
        return this.parseAnonymousFunction();

      case TokenKind.KW_IF:
        return this.parseIf();
      case TokenKind.KW_WHEN:
        return this.parseWhen();
      case TokenKind.KW_WHILE:
        return this.parseWhile(null, start);
      case TokenKind.KW_DO:
        return this.parseDoWhile(null, start);
      case TokenKind.KW_FOR:
        return this.parseFor(null, start);
      case TokenKind.KW_TRY:
        return this.parseTry();

      case TokenKind.KW_BREAK: {
        this.advance();
        const label = this.parseJumpLabel();
        const value = this.isExpressionEnd() ? null : this.parseExpression();
        return { kind: "BreakExpression", range: this.rangeFrom(start), label, value };
      }
      case TokenKind.KW_CONTINUE: {
        this.advance();
        const label = this.parseJumpLabel();
        return { kind: "ContinueExpression", range: this.rangeFrom(start), label };
      }
      case TokenKind.KW_RETURN: {
        this.advance();
        const label = this.parseJumpLabel();
        const value = this.isExpressionEnd() ? null : this.parseExpression();
        return { kind: "ReturnExpression", range: this.rangeFrom(start), label, value };
      }
      case TokenKind.KW_THROW: {
        this.advance();
        const value = this.parseExpression();
        return { kind: "ThrowExpression", range: this.rangeFrom(start), value };
      }

      case TokenKind.EOF:
        return this.fail("unexpected end of input");
      default:
        return this.fail(`unexpected '${t.lexeme}'`);
    }
  }

  private parseJumpLabel(): string | null {
    if (this.is(TokenKind.AT_LABEL) && !this.current().spaced) return this.advance().text;
    return null;
  }

  private parseListLiteral(): Expression {
    const start = this.advance().range.start; // [
    const elements: ListElement[] = [];

    this.skipNewlines();
    while (!this.is(TokenKind.RBRACKET)) {
      if (this.match(TokenKind.ELLIPSIS)) elements.push({ spread: true, value: this.parseExpression() });
      else elements.push({ spread: false, value: this.parseExpression() });
      this.skipNewlines();
      if (!this.match(TokenKind.COMMA)) break;
      this.skipNewlines();
    }
    this.expect(TokenKind.RBRACKET, "expected ']' to close the list");
    return { kind: "ListLiteral", range: this.rangeFrom(start), elements };
  }

  /* =========================================================
     Lambdas / blocks
     ========================================================= */

  private parseLambda(label: string | null): LambdaExpression {
    const start = this.current().range.start;
    this.expect(TokenKind.LBRACE, "expected '{'");
    this.markClosure();

    let params: Parameter[] | null = null;
    if (this.lambdaHasParameters()) {
      params = [];
      this.skipNewlines();
      while (!this.is(TokenKind.ARROW)) {
        params.push(this.parseParameter(false));
        if (!this.match(TokenKind.COMMA)) break;
        this.skipNewlines();
      }
      this.expect(TokenKind.ARROW, "expected '->' after lambda parameters");
    }

    const frame: FunctionFrame = { poolable: true };
    this.functions.push(frame);
    let body: BlockExpression;
    try {
      body = this.parseBlockBody(start);
    } finally {
      this.functions.pop();
    }

    return { kind: "LambdaExpression", range: this.rangeFrom(start), params, body, label, poolable: frame.poolable };
  }

  /** Scans ahead for `a, b: T ->` or a bare `->` right after `{`. */
  private lambdaHasParameters(): boolean {
    let j = this.idx;
    const at = (k: number): Token => this.tokens[Math.min(k, this.tokens.length - 1)];
    while (at(j).kind === TokenKind.NEWLINE) j++;
    if (at(j).kind === TokenKind.ARROW) return true;

    for (;;) {
      while (at(j).kind === TokenKind.AT_LABEL) j++;
      if (at(j).kind !== TokenKind.IDENTIFIER) return false;
      j++;
      if (at(j).kind === TokenKind.ELLIPSIS) j++;
      if (at(j).kind === TokenKind.COLON) {
        // skip a type up to ',' or '->' without crossing statement boundaries
        j++;
        let depth = 0;
        while (depth > 0 || (at(j).kind !== TokenKind.COMMA && at(j).kind !== TokenKind.ARROW)) {
          const k = at(j).kind;
          if (k === TokenKind.EOF || k === TokenKind.NEWLINE || k === TokenKind.LBRACE || k === TokenKind.RBRACE) return false;
          if (k === TokenKind.LPAREN || k === TokenKind.LT) depth++;
          if (k === TokenKind.RPAREN || k === TokenKind.GT) depth--;
          j++;
        }
      }
      if (at(j).kind === TokenKind.ARROW) return true;
      if (at(j).kind !== TokenKind.COMMA) return false;
      j++;
      while (at(j).kind === TokenKind.NEWLINE) j++;
    }
  }

  private parseAnonymousFunction(): LambdaExpression {
    const start = this.advance().range.start; // fun
    this.markClosure();
    const frame: FunctionFrame = { poolable: true };
    this.functions.push(frame);
    try {
      const params = this.parseParameterList(false);
      if (this.match(TokenKind.COLON)) this.parseTypeRef();
      const bodyExpr = this.parseFunctionBody();
      if (!bodyExpr) this.fail("anonymous function needs a body");
      const body: BlockExpression =
        bodyExpr && bodyExpr.kind === "BlockExpression"
          ? bodyExpr
          : { kind: "BlockExpression", range: this.rangeFrom(start), body: bodyExpr ? [bodyExpr] : [] };
      return { kind: "LambdaExpression", range: this.rangeFrom(start), params, body, label: null, poolable: frame.poolable };
    } finally {
      this.functions.pop();
    }
  }

  /** `{ stmt* }` as a plain block (own scope, no parameters). */
  private parseBlock(): BlockExpression {
    const start = this.current().range.start;
    this.expect(TokenKind.LBRACE, "expected '{'");
    return this.parseBlockBody(start);
  }

  /** Statements up to and including the closing '}'. */
  private parseBlockBody(start: Position): BlockExpression {
    const body: Expression[] = [];
    this.skipSeparators();
    while (!this.is(TokenKind.RBRACE)) {
      if (this.isAtEnd()) this.fail("expected '}' before end of input");
      body.push(this.parseStatement());
      this.expectStatementEnd();
      this.skipSeparators();
    }
    this.expect(TokenKind.RBRACE, "expected '}'");
    return { kind: "BlockExpression", range: this.rangeFrom(start), body };
  }

  private emptyBlock(start: Position): BlockExpression {
    return { kind: "BlockExpression", range: this.rangeFrom(start), body: [] };
  }

  /** Body of if/when/loops: a block or a single statement. */
  private parseControlBody(): Expression {
    this.skipNewlines();
    if (this.is(TokenKind.LBRACE)) return this.parseBlock();
    return this.parseStatement();
  }

  /* =========================================================
     Control flow
     ========================================================= */

  private parseParenthesized(what: string): Expression {
    this.expect(TokenKind.LPAREN, `expected '(' after '${what}'`);
    this.skipNewlines();
    const e = this.parseExpression();
    this.skipNewlines();
    this.expect(TokenKind.RPAREN, `expected ')' after ${what} condition`);
    return e;
  }

  private parseIf(): Expression {
    const start = this.advance().range.start; // if
    const test = this.parseParenthesized("if");
    const consequent = this.parseControlBody();
    const alternate = this.matchAcrossNewlines(TokenKind.KW_ELSE) ? this.parseControlBody() : null;
    return { kind: "IfExpression", range: this.rangeFrom(start), test, consequent, alternate };
  }

  private parseWhen(): Expression {
    const start = this.advance().range.start; // when
    let subject: Expression | null = null;
    if (this.is(TokenKind.LPAREN)) subject = this.parseParenthesized("when");

    this.skipNewlines();
    this.expect(TokenKind.LBRACE, "expected '{' after 'when'");

    const branches: WhenBranch[] = [];
    let elseBranch: Expression | null = null;

    this.skipSeparators();
    while (!this.is(TokenKind.RBRACE)) {
      const bStart = this.current().range.start;

      if (this.match(TokenKind.KW_ELSE)) {
        this.expect(TokenKind.ARROW, "expected '->' after 'else'");
        if (elseBranch) this.fail("duplicate 'else' branch in when");
        elseBranch = this.parseControlBody();
      } else {
        const conditions: WhenCondition[] = [];
        do {
          this.skipNewlines();
          conditions.push(this.parseWhenCondition(subject !== null));
        } while (this.match(TokenKind.COMMA));
        this.expect(TokenKind.ARROW, "expected '->' after when condition");
        const body = this.parseControlBody();
        branches.push({ conditions, body, range: this.rangeFrom(bStart) });
      }

      this.expectStatementEnd();
      this.skipSeparators();
    }
    this.expect(TokenKind.RBRACE, "expected '}' to close 'when'");

    return { kind: "WhenExpression", range: this.rangeFrom(start), subject, branches, elseBranch };
  }

  private parseWhenCondition(hasSubject: boolean): WhenCondition {
    if (hasSubject) {
      if (this.is(TokenKind.KW_IN) || this.is(TokenKind.NOT_IN)) {
        const negated = this.advance().kind === TokenKind.NOT_IN;
        return { kind: "in", negated, value: this.parseExpression() };
      }
      if (this.is(TokenKind.KW_IS) || this.is(TokenKind.NOT_IS)) {
        const negated = this.advance().kind === TokenKind.NOT_IS;
        return { kind: "is", negated, type: this.parseTypeOperand() };
      }
    }
    return { kind: "value", value: this.parseExpression() };
  }

  private parseLoopElse(): Expression | null {
    return this.matchAcrossNewlines(TokenKind.KW_ELSE) ? this.parseControlBody() : null;
  }

  private parseWhile(label: string | null, start: Position): Expression {
    this.advance(); // while
    const test = this.parseParenthesized("while");
    const body = this.parseControlBody();
    const elseBody = this.parseLoopElse();
    return { kind: "WhileExpression", range: this.rangeFrom(start), label, test, body, elseBody };
  }

  private parseDoWhile(label: string | null, start: Position): Expression {
    this.advance(); // do
    const body = this.parseControlBody();
    if (!this.matchAcrossNewlines(TokenKind.KW_WHILE)) this.fail("expected 'while' after do-block");
    const test = this.parseParenthesized("while");
    const elseBody = this.parseLoopElse();
    return { kind: "DoWhileExpression", range: this.rangeFrom(start), label, body, test, elseBody };
  }

  private parseFor(label: string | null, start: Position): ForInExpression {
    this.advance(); // for
    this.expect(TokenKind.LPAREN, "expected '(' after 'for'");
    const variable = this.expectIdentifier("expected loop variable").text;
    if (this.match(TokenKind.COLON)) this.parseTypeRef();
    this.expect(TokenKind.KW_IN, "expected 'in' in for loop");
    this.skipNewlines();
    const iterable = this.parseExpression();
    this.skipNewlines();
    this.expect(TokenKind.RPAREN, "expected ')' after for header");
    const body = this.parseControlBody();
    const elseBody = this.parseLoopElse();
    return { kind: "ForInExpression", range: this.rangeFrom(start), label, variable, iterable, body, elseBody };
  }

  private parseTry(): Expression {
    const start = this.advance().range.start; // try
    this.skipNewlines();
    const body = this.parseBlock();

    const catches: CatchClause[] = [];
    while (this.matchAcrossNewlines(TokenKind.KW_CATCH)) {
      const cStart = this.previous().range.start;
      let name: string | null = null;
      const types: Expression[] = [];
      if (this.match(TokenKind.LPAREN)) {
        name = this.expectIdentifier("expected exception variable name").text;
        if (this.match(TokenKind.COLON)) {
          do {
            this.skipNewlines();
            types.push(this.parseTypeOperand());
          } while (this.match(TokenKind.COMMA) || this.match(TokenKind.BIT_OR));
        }
        this.expect(TokenKind.RPAREN, "expected ')' after catch parameter");
      }
      this.skipNewlines();
      const cBody = this.parseBlock();
      catches.push({ name, types, body: cBody, range: this.rangeFrom(cStart) });
    }

    let finalizer: BlockExpression | null = null;
    if (this.matchAcrossNewlines(TokenKind.KW_FINALLY)) {
      this.skipNewlines();
      finalizer = this.parseBlock();
    }

    if (catches.length === 0 && !finalizer) this.fail("'try' needs a 'catch' or 'finally'");

    return { kind: "TryExpression", range: this.rangeFrom(start), body, catches, finalizer };
  }

  /* =========================================================
     Closures
     ========================================================= */

  /** The enclosing function body creates a closure, so its frame cannot be recycled. */
  private markClosure(): void {
    const top = this.functions[this.functions.length - 1];
    if (top) top.poolable = false;
  }

  /* =========================================================
     Token helpers
     ========================================================= */

  private current(): Token {
    return this.tokens[this.idx] ?? this.tokens[this.tokens.length - 1];
  }

  private previous(): Token {
    return this.tokens[Math.max(0, this.idx - 1)] ?? this.tokens[0];
  }

  private peekKind(ahead: number): TokenKind {
    return this.tokens[this.idx + ahead]?.kind ?? TokenKind.EOF;
  }

  private isAtEnd(): boolean {
    return this.current().kind === TokenKind.EOF;
  }

  private is(kind: TokenKind): boolean {
    return this.current().kind === kind;
  }

  private isWord(word: string): boolean {
    const t = this.current();
    return t.kind === TokenKind.IDENTIFIER && t.text === word;
  }

  private match(kind: TokenKind): boolean {
    if (this.is(kind)) {
      this.advance();
      return true;
    }
    return false;
  }

  /** Matches `kind` possibly after newlines; restores position otherwise. */
  private matchAcrossNewlines(kind: TokenKind): boolean {
    const save = this.idx;
    this.skipNewlines();
    if (this.match(kind)) return true;
    this.idx = save;
    return false;
  }

  private advance(): Token {
    if (!this.isAtEnd()) this.idx++;
    return this.previous();
  }

  private expect(kind: TokenKind, message: string): Token {
    if (this.is(kind)) return this.advance();
    return this.fail(message);
  }

  private expectIdentifier(message: string): Token {
    if (this.is(TokenKind.IDENTIFIER)) return this.advance();
    return this.fail(message);
  }

  /** After `.`: identifiers and a few keywords usable as member names. */
  private expectMemberName(): Token {
    const t = this.current();
    if (t.kind === TokenKind.IDENTIFIER || t.kind === TokenKind.KW_CLASS || t.kind === TokenKind.KW_OBJECT) {
      return this.advance();
    }
    return this.fail("expected member name after '.'");
  }

  private expectStatementEnd(): void {
    const k = this.current().kind;
    if (k === TokenKind.NEWLINE || k === TokenKind.SEMICOLON || k === TokenKind.RBRACE || k === TokenKind.EOF) return;
    this.fail(`unexpected '${this.current().lexeme}' (expected end of statement)`);
  }

  private isExpressionEnd(): boolean {
    const k = this.current().kind;
    return (
      k === TokenKind.NEWLINE ||
      k === TokenKind.SEMICOLON ||
      k === TokenKind.RBRACE ||
      k === TokenKind.RPAREN ||
      k === TokenKind.COMMA ||
      k === TokenKind.KW_ELSE ||
      k === TokenKind.EOF
    );
  }

  private skipNewlines(): void {
    while (this.is(TokenKind.NEWLINE)) this.advance();
  }

  private skipSeparators(): void {
    while (this.is(TokenKind.NEWLINE) || this.is(TokenKind.SEMICOLON)) this.advance();
  }

  private rangeFrom(start: Position): Range {
    return { start, end: this.previous().range.end };
  }

  private fail(message: string): never {
    throw new ParseFailure(message, this.current().range);
  }

  private failAt(range: Range, message: string): never {
    throw new ParseFailure(message, range);
  }

  /** Skip to the next statement boundary at the current nesting level. */
  private synchronize(): void {
    let depth = 0;
    while (!this.isAtEnd()) {
      const k = this.current().kind;
      if (depth === 0 && (k === TokenKind.NEWLINE || k === TokenKind.SEMICOLON)) return;
      if (depth === 0 && k === TokenKind.RBRACE) return;
      if (k === TokenKind.LBRACE || k === TokenKind.LPAREN || k === TokenKind.LBRACKET) depth++;
      if (k === TokenKind.RBRACE || k === TokenKind.RPAREN || k === TokenKind.RBRACKET) depth = Math.max(0, depth - 1);
      this.advance();
    }
  }
}

/* =========================================================
   Node predicates
   ========================================================= */

function isAssignable(e: Expression): boolean {
  return e.kind === "Identifier" || (e.kind === "MemberExpression" && !e.nullSafe) || e.kind === "IndexExpression";
}

/** Expressions that may take a trailing lambda without parentheses: `launch { }`. */
function isCallableHead(e: Expression): boolean {
  return e.kind === "Identifier" || e.kind === "MemberExpression";
}
