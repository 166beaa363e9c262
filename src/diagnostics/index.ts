// src/diagnostics/index.ts
//
// Diagnostics barrel: the tooling-facing Diagnostic model and the error
// classes thrown across the engine's public surface.

export * from "./errors";
export * from "./scriptErrors";
