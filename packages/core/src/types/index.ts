/**
 * Type exports for @avdl/core
 */

export * from "./schema.js";
export type {
  CompilationResult,
  NamedSchemataResult,
  SchemaDocument,
} from "./result.js";
