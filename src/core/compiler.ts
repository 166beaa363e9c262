// src/core/compiler.ts
//
// Quill Compiler
// --------------
// Turns source text into an executable Script (the AST plus what the engine
// needs to know before running it). There is no lowering step: the tree the
// parser builds is the tree the evaluator walks.
//
//   compile(text)         strict: the first lexical or syntax error throws a
//                         ScriptError; with a security manager every import
//                         is checked before anything runs
//   compileLenient(text)  tooling: never throws, recovers at statement
//                         boundaries and returns a declaration summary

import type {
  ClassDeclaration,
  EnumDeclaration,
  Expression,
  FunctionDeclaration,
  ImportDeclaration,
  Parameter,
  Program,
  Range,
  SourceFile,
  TypeRef,
  VariableDeclaration,
} from "./ast";
import { sourceFile } from "./ast";
import { parseSource } from "./parser";
import type { ParseError } from "./parser";
import type { Token } from "./lexer";

import { ImportError, ScriptError, toSourcePosition } from "../diagnostics/scriptErrors";
import type { SecurityManager } from "../modules/security";

/* =========================================================
   Strict compile
   ========================================================= */

export type Script = {
  source: SourceFile;
  program: Program;
  packageName: string | null;
  /** Top-level imports, in source order. */
  imports: ImportDeclaration[];
};

export type CompileOptions = {
  fileName?: string;
  /** Checked against every top-level import. */
  security?: SecurityManager;
};

export function compile(text: string, options: CompileOptions = {}): Script {
  const source = sourceFile(text, options.fileName);
  const parsed = parseSource(text, { fileName: source.fileName });

  const first = parsed.errors[0];
  if (first) throw new ScriptError(toSourcePosition(source.fileName, first.range.start), first.message, first.source);

  const imports = parsed.program.body.filter((n): n is ImportDeclaration => n.kind === "ImportDeclaration");
  if (options.security) checkImports(imports, options.security, source.fileName);

  return { source, program: parsed.program, packageName: parsed.program.packageName, imports };
}

export function checkImports(imports: ImportDeclaration[], security: SecurityManager, fileName: string): void {
  for (const imp of imports) {
    const pos = toSourcePosition(fileName, imp.range.start);
    if (!security.canImportModule(imp.packageName)) {
      throw new ImportError(pos, imp.packageName, `import of package '${imp.packageName}' is not allowed`);
    }
    for (const symbol of imp.symbols ?? []) {
      if (!security.canImportSymbol(imp.packageName, symbol)) {
        throw new ImportError(pos, imp.packageName, `import of '${symbol}' from '${imp.packageName}' is not allowed`);
      }
    }
  }
}

/* =========================================================
   Lenient compile (declaration summary)
   ========================================================= */

export type DeclarationKind = "class" | "object" | "enum" | "fun" | "val" | "var";

export type DeclarationInfo = {
  kind: DeclarationKind;
  name: string;
  range: Range;
  nameRange: Range;
  params?: string[];
  bases?: string[];
  /** Declared type annotation, as written. */
  type?: string;
  /** Text of the comment block directly above the declaration. */
  doc?: string;
  members?: DeclarationInfo[];
};

export type DeclarationSummary = {
  packageName: string | null;
  imports: { packageName: string; symbols: string[] | null; range: Range }[];
  declarations: DeclarationInfo[];
  diagnostics: ParseError[];
  /** Position of the earliest error, kept for display. */
  firstError: ParseError | null;
};

export function compileLenient(text: string, fileName = "<eval>"): DeclarationSummary {
  const parsed = parseSource(text, { fileName, lenient: true, keepComments: true });
  const docs = new DocIndex(parsed.comments);

  const declarations: DeclarationInfo[] = [];
  const imports: DeclarationSummary["imports"] = [];

  for (const node of parsed.program.body) {
    if (node.kind === "ImportDeclaration") {
      imports.push({ packageName: node.packageName, symbols: node.symbols, range: node.range });
      continue;
    }
    const info = describeDeclaration(node, docs);
    if (info) declarations.push(info);
  }

  return {
    packageName: parsed.program.packageName,
    imports,
    declarations,
    diagnostics: parsed.errors,
    firstError: parsed.errors[0] ?? null,
  };
}

function describeDeclaration(node: Expression, docs: DocIndex): DeclarationInfo | null {
  switch (node.kind) {
    case "ClassDeclaration":
      return describeClass(node, docs);
    case "EnumDeclaration":
      return describeEnum(node, docs);
    case "FunctionDeclaration":
      return describeFunction(node, docs);
    case "VariableDeclaration":
      return describeVariable(node, docs);
    default:
      return null;
  }
}

function describeClass(node: ClassDeclaration, docs: DocIndex): DeclarationInfo {
  const members: DeclarationInfo[] = [];
  for (const m of node.members) {
    if (m.kind === "InitBlock") continue;
    const info = describeDeclaration(m, docs);
    if (info) members.push(info);
  }
  return withDoc(
    {
      kind: node.isObject ? "object" : "class",
      name: node.name,
      range: node.range,
      nameRange: node.nameRange,
      params: node.constructorParams ? paramNames(node.constructorParams) : undefined,
      bases: node.bases.map((b) => (b.type.kind === "Identifier" ? b.type.name : "?")),
      members,
    },
    docs,
  );
}

function describeEnum(node: EnumDeclaration, docs: DocIndex): DeclarationInfo {
  return withDoc(
    {
      kind: "enum",
      name: node.name,
      range: node.range,
      nameRange: node.nameRange,
      members: node.entries.map((e) => ({ kind: "val", name: e.name, range: e.range, nameRange: e.range })),
    },
    docs,
  );
}

function describeFunction(node: FunctionDeclaration, docs: DocIndex): DeclarationInfo {
  return withDoc(
    {
      kind: "fun",
      name: node.name,
      range: node.range,
      nameRange: node.nameRange,
      params: paramNames(node.params),
      type: node.returnType ? typeText(node.returnType) : undefined,
    },
    docs,
  );
}

function describeVariable(node: VariableDeclaration, docs: DocIndex): DeclarationInfo {
  return withDoc(
    {
      kind: node.mutable ? "var" : "val",
      name: node.name,
      range: node.range,
      nameRange: node.nameRange,
      type: node.type ? typeText(node.type) : undefined,
    },
    docs,
  );
}

function paramNames(params: Parameter[]): string[] {
  return params.map((p) => (p.variadic ? `${p.name}...` : p.name));
}

function typeText(t: TypeRef): string {
  const args = t.args.length > 0 ? `<${t.args.map(typeText).join(", ")}>` : "";
  return `${t.name}${args}${t.nullable ? "?" : ""}`;
}

function withDoc(info: DeclarationInfo, docs: DocIndex): DeclarationInfo {
  const doc = docs.above(info.range);
  return doc === null ? info : { ...info, doc };
}

/* =========================================================
   Doc comments
   ========================================================= */

class DocIndex {
  /** Comment text keyed by the line it ends on. */
  private readonly byEndLine = new Map<number, { text: string; startLine: number }>();

  constructor(comments: Token[]) {
    for (const c of comments) {
      const line = c.range.end.line;
      const text = stripCommentMarkers(c.lexeme);
      const prev = this.byEndLine.get(c.range.start.line - 1);
      // consecutive line comments form one block
      if (prev && c.lexeme.startsWith("//")) {
        this.byEndLine.delete(c.range.start.line - 1);
        this.byEndLine.set(line, { text: `${prev.text}\n${text}`, startLine: prev.startLine });
      } else {
        this.byEndLine.set(line, { text, startLine: c.range.start.line });
      }
    }
  }

  public above(range: Range): string | null {
    const entry = this.byEndLine.get(range.start.line - 1);
    return entry ? entry.text : null;
  }
}

function stripCommentMarkers(lexeme: string): string {
  if (lexeme.startsWith("//")) return lexeme.slice(2).trim();
  return lexeme
    .replace(/^\/\*+/, "")
    .replace(/\*+\/$/, "")
    .split("\n")
    .map((l) => l.replace(/^\s*\*?\s?/, "").trimEnd())
    .filter((l, i, all) => l.length > 0 || (i > 0 && i < all.length - 1))
    .join("\n")
    .trim();
}
