// src/index.ts
//
// Quill public API
// ----------------
// One import point for embedders:
//
//   import { Engine, compile, encode, decode } from "quill-script";

export { Engine } from "./core/engine";
export type { EngineOptions, EvalOptions, ExecuteOptions } from "./core/engine";
export { compile, compileLenient } from "./core/compiler";
export type { CompileOptions, DeclarationInfo, DeclarationKind, DeclarationSummary, Script } from "./core/compiler";
export { tokenize } from "./core/lexer";
export type { Token } from "./core/lexer";
export { parseSource } from "./core/parser";
export type { ParseError, ParseResult } from "./core/parser";
export { Scope, ModuleScope } from "./core/scope";
export { ScopePool } from "./core/scopePool";
export type { ScopePoolStats } from "./core/scopePool";

export * from "./diagnostics";

export { ModuleRegistry } from "./modules/registry";
export type { ModuleBuilder, ModuleHost } from "./modules/registry";
export { allowAll, allowList, denyList } from "./modules/security";
export type { SecurityManager } from "./modules/security";

export { ClassObj, EnumEntryObj, InstanceObj } from "./runtime/classes";
export { CallableObj, FunctionObj, NativeFunction } from "./runtime/functions";
export type { Args, HostServices, Interpreter, NativeCall, NativeImpl } from "./runtime/interop";
export { CharObj, ListObj, MapObj, RangeObj, SetObj, VOID } from "./runtime/values";
export type { Value } from "./runtime/values";

export { decode, decodeWith, encode } from "./codec/codec";
export type { CodecHost } from "./codec/codec";
export type { Bytes } from "./codec/buffer";

export { FS_PACKAGE, fileModule } from "./system/file";
export { PROCESS_PACKAGE, processModule } from "./system/process";
export { AccessPolicy, FsAccessPolicy, ProcessAccessPolicy } from "./system/policy";
export type { AccessDecision, FsAccessOp, ProcessAccessOp } from "./system/policy";

export { runFile, runSource } from "./runner/run";
export type { RunOptions, RunResult } from "./runner/run";
export { loadConfig, parseConfig } from "./utils/config";
export type { QuillConfig } from "./utils/config";
export { Logger, createLogger, silentLogger } from "./utils/logger";
export type { LogLevel } from "./utils/logger";
