/**
 * Compiler exports
 */

export * from "./idl/index.js";

export {
  compile,
  compileFile,
  compileToNamedSchemata,
  type CompileOptions,
  type RootSource,
} from "./compile.js";
export { type BuiltUnit, type BuildOptions, IdlBuilder, buildIdl } from "./builder.js";
export { SchemaRegistry, forEachReference } from "./registry.js";
export {
  type ImportSessionOptions,
  type ImportedUnit,
  ImportSession,
  MAX_IMPORT_DEPTH,
} from "./imports.js";
export { MAX_SCHEMA_DEPTH, readProtocolDocument, readSchemaDocument } from "./json-reader.js";
export { JsonSerializer, formatJson } from "./serializer.js";
export { LOGICAL_TYPE_RULES, decidePromotion } from "./logical.js";
export { checkDefault } from "./defaults.js";
export { NamespaceContext, RESERVED_TYPE_NAMES, isValidName } from "./names.js";
export { decodeEscapes } from "./literals.js";
