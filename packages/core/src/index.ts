/**
 * @avdl/core
 * Compiler from Avro IDL to Avro JSON schemas and protocols
 */

// Types
export * from "./types/index.js";

// Diagnostics
export * from "./diagnostics/index.js";

// Compiler
export * from "./compiler/index.js";
