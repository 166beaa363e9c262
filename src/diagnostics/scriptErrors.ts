// src/diagnostics/scriptErrors.ts
//
// Quill error classes
// -------------------
// The JS-level exceptions that cross the engine's public surface:
//
//   ScriptError        lexical / syntax / structural failure at a source position
//   ImportError        unknown or denied package, denied symbol, name conflict
//   ExecutionError     an uncaught language exception (carries the language value)
//   CancelledError     execution aborted through an AbortSignal
//   ScopeCycleError    a frame whose parent chain would loop back on itself
//   ConfigError        bad quill.config.json contents
//
// QuillRuntimeError is internal: native helpers throw it with the name of a
// root exception class, and the evaluator turns it into a language exception
// instance the moment user code could observe it.

import type { Position, Range } from "../core/ast";
import type { InstanceObj } from "../runtime/classes";

export type SourcePosition = {
  file: string;
  /** 0-based */
  line: number;
  /** 0-based */
  column: number;
  offset: number;
};

export function toSourcePosition(file: string, pos: Position): SourcePosition {
  return { file, line: pos.line, column: pos.column, offset: pos.offset };
}

export function formatSourcePosition(pos: SourcePosition): string {
  return `${pos.file}:${pos.line + 1}:${pos.column + 1}`;
}

/* =========================================================
   Compile-time
   ========================================================= */

/** Where a compile-time failure was detected. */
export type ScriptErrorStage = "lexer" | "parser" | "declaration";

export class ScriptError extends Error {
  public readonly pos: SourcePosition;
  public readonly detail: string;
  public readonly stage: ScriptErrorStage;

  constructor(pos: SourcePosition, detail: string, stage: ScriptErrorStage = "declaration") {
    super(`${formatSourcePosition(pos)}: ${detail}`);
    this.name = "ScriptError";
    this.pos = pos;
    this.detail = detail;
    this.stage = stage;
  }
}

export class ImportError extends ScriptError {
  public readonly packageName: string;

  constructor(pos: SourcePosition, packageName: string, detail: string) {
    super(pos, detail);
    this.name = "ImportError";
    this.packageName = packageName;
  }
}

/* =========================================================
   Run-time
   ========================================================= */

export const EXCEPTION_CLASS_NAMES = [
  "Exception",
  "IllegalArgumentException",
  "IllegalStateException",
  "IllegalAssignmentException",
  "SymbolNotFoundException",
  "IllegalAccessException",
  "IllegalOperationException",
  "IndexOutOfBoundsException",
  "ArithmeticException",
  "ClassCastException",
  "NullReferenceException",
  "NotImplementedException",
  "AssertionFailedException",
] as const;

export type ExceptionClassName = (typeof EXCEPTION_CLASS_NAMES)[number];

export class QuillRuntimeError extends Error {
  public readonly code: ExceptionClassName;
  public readonly range?: Range;

  constructor(code: ExceptionClassName, message: string, range?: Range) {
    super(message);
    this.name = "QuillRuntimeError";
    this.code = code;
    this.range = range;
  }
}

export class ExecutionError extends Error {
  /** The language-level exception instance; catchable by user try/catch. */
  public readonly errorObject: InstanceObj;
  public readonly className: string;
  public readonly detail: string;
  public readonly pos: SourcePosition | null;

  constructor(errorObject: InstanceObj, className: string, detail: string, pos: SourcePosition | null) {
    super(pos ? `${formatSourcePosition(pos)}: ${className}: ${detail}` : `${className}: ${detail}`);
    this.name = "ExecutionError";
    this.errorObject = errorObject;
    this.className = className;
    this.detail = detail;
    this.pos = pos;
  }
}

export class CancelledError extends Error {
  constructor(reason?: string) {
    super(reason ? `execution cancelled: ${reason}` : "execution cancelled");
    this.name = "CancelledError";
  }
}

export class ScopeCycleError extends Error {
  constructor(frameId: number) {
    super(`scope ${frameId} would become its own ancestor`);
    this.name = "ScopeCycleError";
  }
}

export class ConfigError extends Error {
  public readonly key: string;

  constructor(key: string, message: string) {
    super(`config '${key}': ${message}`);
    this.name = "ConfigError";
    this.key = key;
  }
}
