/**
 * Results returned by the compile entry points
 */

import type { Diagnostic } from "../diagnostics/diagnostic.js";
import type { JsonValue } from "./schema.js";

/** Compilation result */
export interface CompilationResult {
  success: boolean;
  /** Protocol document, main schema, or the array of declared types */
  output?: JsonValue;
  errors: Diagnostic[];
  warnings: Diagnostic[];
}

/** One self-contained schema document per named type */
export interface SchemaDocument {
  /** Simple name, used for the output file name */
  name: string;
  fullName: string;
  schema: JsonValue;
}

export interface NamedSchemataResult {
  success: boolean;
  schemata: SchemaDocument[];
  errors: Diagnostic[];
  warnings: Diagnostic[];
}
