// src/diagnostics/errors.ts
//
// Quill diagnostics model + helpers
// ---------------------------------
// One shared format for everything the runner and tooling report:
// - Lexer errors
// - Parser errors
// - Import / declaration failures
// - Uncaught script exceptions
//
// Design goals:
// - Stable codes (LEX_ERROR, PARSE_ERROR, IMPORT_ERROR, DECLARATION_ERROR, EXEC_ERROR)
// - Range-based (offset+line+col), 0-based internally, printed 1-based
// - Convenience factories + merging + sorting

import type { Position, Range } from "../core/ast";
import type { ParseError } from "../core/parser";
import { CancelledError, ExecutionError, ImportError, ScriptError } from "./scriptErrors";
import type { SourcePosition } from "./scriptErrors";

export type Severity = "error" | "warning" | "info";

export type DiagnosticSource = "lexer" | "parser" | "declaration" | "import" | "runtime";

export type Diagnostic = {
  severity: Severity;
  code: string;
  message: string;
  range: Range;
  file?: string;

  // Optional metadata
  source?: DiagnosticSource;
  hint?: string;
};

export const DIAGNOSTIC_CODES = {
  lexer: "LEX_ERROR",
  parser: "PARSE_ERROR",
  declaration: "DECLARATION_ERROR",
  import: "IMPORT_ERROR",
  runtime: "EXEC_ERROR",
} as const satisfies Record<DiagnosticSource, string>;

/* =========================================================
   Factories
   ========================================================= */

export function diag(
  severity: Severity,
  code: string,
  message: string,
  range: Range,
  source?: DiagnosticSource,
  hint?: string,
): Diagnostic {
  return { severity, code, message, range, source, hint };
}

export function error(code: string, message: string, range: Range, source?: DiagnosticSource, hint?: string): Diagnostic {
  return diag("error", code, message, range, source, hint);
}

export function warn(code: string, message: string, range: Range, source?: DiagnosticSource, hint?: string): Diagnostic {
  return diag("warning", code, message, range, source, hint);
}

export function info(code: string, message: string, range: Range, source?: DiagnosticSource, hint?: string): Diagnostic {
  return diag("info", code, message, range, source, hint);
}

/* =========================================================
   Merging & sorting
   ========================================================= */

export function mergeDiagnostics(...lists: Array<Diagnostic[] | undefined | null>): Diagnostic[] {
  const out: Diagnostic[] = [];
  for (const l of lists) {
    if (l) out.push(...l);
  }
  return sortDiagnostics(out);
}

export function sortDiagnostics(list: Diagnostic[]): Diagnostic[] {
  return [...list].sort((a, b) => {
    const ao = a.range.start.offset;
    const bo = b.range.start.offset;
    if (ao !== bo) return ao - bo;

    // error > warning > info
    const sa = severityRank(a.severity);
    const sb = severityRank(b.severity);
    if (sa !== sb) return sb - sa;

    return a.code.localeCompare(b.code);
  });
}

function severityRank(s: Severity): number {
  switch (s) {
    case "error":
      return 3;
    case "warning":
      return 2;
    case "info":
      return 1;
  }
}

export function dedupeDiagnostics(list: Diagnostic[]): Diagnostic[] {
  const seen = new Set<string>();
  const out: Diagnostic[] = [];

  for (const d of sortDiagnostics(list)) {
    const key = `${d.code}|${d.severity}|${d.range.start.offset}|${d.range.end.offset}|${d.message}`;
    if (seen.has(key)) continue;
    seen.add(key);
    out.push(d);
  }

  return out;
}

/* =========================================================
   Converters
   ========================================================= */

function pointRange(pos: SourcePosition): Range {
  const p: Position = { offset: pos.offset, line: pos.line, column: pos.column };
  return { start: p, end: p };
}

export function fromParseErrors(errors: ParseError[], file?: string): Diagnostic[] {
  return errors.map((e) => ({ ...error(DIAGNOSTIC_CODES[e.source], e.message, e.range, e.source), file }));
}

export function fromScriptError(e: ScriptError): Diagnostic {
  const source: DiagnosticSource = e instanceof ImportError ? "import" : e.stage;
  return { ...error(DIAGNOSTIC_CODES[source], e.detail, pointRange(e.pos), source), file: e.pos.file };
}

export function fromExecutionError(e: ExecutionError): Diagnostic {
  const at = e.pos ? pointRange(e.pos) : pointRange({ file: "", line: 0, column: 0, offset: 0 });
  const d = error(DIAGNOSTIC_CODES.runtime, `${e.className}: ${e.detail}`, at, "runtime");
  return e.pos ? { ...d, file: e.pos.file } : d;
}

/** Any error escaping compile or execute; null when it is not a script failure. */
export function toDiagnostic(e: unknown): Diagnostic | null {
  if (e instanceof ScriptError) return fromScriptError(e);
  if (e instanceof ExecutionError) return fromExecutionError(e);
  if (e instanceof CancelledError) {
    return error(DIAGNOSTIC_CODES.runtime, e.message, pointRange({ file: "", line: 0, column: 0, offset: 0 }), "runtime");
  }
  return null;
}

/* =========================================================
   Pretty printing
   ========================================================= */

export function formatDiagnostic(d: Diagnostic): string {
  const loc = `${d.range.start.line + 1}:${d.range.start.column + 1}`;
  const where = d.file ? `${d.file}:${loc}` : loc;
  return `${d.severity.toUpperCase()} ${d.code} @ ${where}: ${d.message}`;
}

export function formatDiagnostics(list: Diagnostic[]): string {
  return sortDiagnostics(list).map(formatDiagnostic).join("\n");
}
