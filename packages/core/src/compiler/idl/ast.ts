/**
 * Syntax tree for Avro IDL files
 */

import type { SourceSpan } from "../../diagnostics/diagnostic.js";
import type { DocComment } from "./tokenizer.js";

// =============================================================================
// BASE TYPES
// =============================================================================

/** Base syntax node with location info */
export interface ASTNode {
  span: SourceSpan;
}

export interface Identifier extends ASTNode {
  kind: "identifier";
  /** Text with backticks removed, possibly dotted */
  text: string;
  /** Last segment was backtick-escaped */
  escaped: boolean;
}

/** `@name(value)` annotation */
export interface PropertyNode extends ASTNode {
  kind: "property";
  name: Identifier;
  value: JsonNode;
}

// =============================================================================
// JSON VALUES
// =============================================================================

export type JsonNode = JsonLiteralNode | JsonObjectNode | JsonArrayNode;

export interface JsonLiteralNode extends ASTNode {
  kind: "json-literal";
  literal: "string" | "integer" | "float" | "true" | "false" | "null";
  /** Raw text: string content without quotes, numbers as written */
  raw: string;
}

export interface JsonObjectNode extends ASTNode {
  kind: "json-object";
  entries: Array<{ key: JsonLiteralNode; value: JsonNode }>;
}

export interface JsonArrayNode extends ASTNode {
  kind: "json-array";
  items: JsonNode[];
}

// =============================================================================
// FILE STRUCTURE
// =============================================================================

/** Parsed IDL file */
export interface IdlFile {
  root: ProtocolDecl | SchemaFileDecl;
  /** Doc comments no declaration picked up */
  orphanedDocComments: DocComment[];
}

export interface ProtocolDecl extends ASTNode {
  kind: "protocol";
  doc?: DocComment;
  properties: PropertyNode[];
  name: Identifier;
  items: ProtocolItem[];
}

/** File of bare declarations, optionally with a namespace and a main schema */
export interface SchemaFileDecl extends ASTNode {
  kind: "schema-file";
  namespace?: Identifier;
  mainSchema?: TypeNode;
  items: Array<ImportDecl | NamedSchemaDecl>;
}

export type ProtocolItem = ImportDecl | NamedSchemaDecl | MessageDecl;

export type ImportKind = "idl" | "protocol" | "schema";

export interface ImportDecl extends ASTNode {
  kind: "import";
  importKind: ImportKind;
  location: JsonLiteralNode;
}

// =============================================================================
// NAMED SCHEMA DECLARATIONS
// =============================================================================

export type NamedSchemaDecl = RecordDecl | EnumDecl | FixedDecl;

export interface RecordDecl extends ASTNode {
  kind: "record";
  isError: boolean;
  doc?: DocComment;
  properties: PropertyNode[];
  name: Identifier;
  fields: FieldDecl[];
}

export interface FieldDecl extends ASTNode {
  kind: "field";
  doc?: DocComment;
  type: TypeNode;
  variables: VariableDecl[];
}

export interface VariableDecl extends ASTNode {
  kind: "variable";
  doc?: DocComment;
  properties: PropertyNode[];
  name: Identifier;
  defaultValue?: JsonNode;
}

export interface EnumDecl extends ASTNode {
  kind: "enum";
  doc?: DocComment;
  properties: PropertyNode[];
  name: Identifier;
  symbols: EnumSymbolDecl[];
  defaultSymbol?: Identifier;
}

export interface EnumSymbolDecl extends ASTNode {
  kind: "enum-symbol";
  doc?: DocComment;
  properties: PropertyNode[];
  name: Identifier;
}

export interface FixedDecl extends ASTNode {
  kind: "fixed";
  doc?: DocComment;
  properties: PropertyNode[];
  name: Identifier;
  size: JsonLiteralNode;
}

// =============================================================================
// MESSAGES
// =============================================================================

export interface MessageDecl extends ASTNode {
  kind: "message";
  doc?: DocComment;
  properties: PropertyNode[];
  result: TypeNode | VoidTypeNode;
  name: Identifier;
  parameters: ParameterDecl[];
  oneWay: boolean;
  throws?: Identifier[];
}

export interface ParameterDecl extends ASTNode {
  kind: "parameter";
  doc?: DocComment;
  type: TypeNode;
  variable: VariableDecl;
}

// =============================================================================
// TYPES
// =============================================================================

/** A type with the annotations written before it */
export interface TypeNode extends ASTNode {
  kind: "type";
  properties: PropertyNode[];
  type: PlainTypeNode;
}

export type PlainTypeNode = ArrayTypeNode | MapTypeNode | UnionTypeNode | NullableTypeNode;

export interface ArrayTypeNode extends ASTNode {
  kind: "array";
  items: TypeNode;
}

export interface MapTypeNode extends ASTNode {
  kind: "map";
  values: TypeNode;
}

export interface UnionTypeNode extends ASTNode {
  kind: "union";
  branches: TypeNode[];
}

/** Primitive or named type, optionally followed by `?` */
export interface NullableTypeNode extends ASTNode {
  kind: "nullable";
  base: PrimitiveTypeNode | ReferenceTypeNode;
  optional: boolean;
}

export interface PrimitiveTypeNode extends ASTNode {
  kind: "primitive-type";
  /** Keyword as written, e.g. `int`, `timestamp_ms`, `decimal` */
  name: string;
  precision?: JsonLiteralNode;
  scale?: JsonLiteralNode;
}

export interface ReferenceTypeNode extends ASTNode {
  kind: "reference-type";
  name: Identifier;
}

export interface VoidTypeNode extends ASTNode {
  kind: "void";
}
