/**
 * Schema model for compiled Avro IDL
 */

import type { SourceSpan, SourceText } from "../diagnostics/diagnostic.js";

// =============================================================================
// JSON VALUES
// =============================================================================

/** JSON value; integers past the safe double range are kept as `bigint` */
export type JsonValue = null | boolean | number | bigint | string | JsonValue[] | JsonObject;

export interface JsonObject {
  [key: string]: JsonValue;
}

/** JSON type name of a value, as used in diagnostics */
export function jsonTypeName(value: JsonValue): string {
  if (value === null) return "null";
  if (Array.isArray(value)) return "array";
  if (typeof value === "object") return "object";
  if (typeof value === "number") return Number.isInteger(value) ? "integer" : "number";
  if (typeof value === "bigint") return "integer";
  return typeof value;
}

export function isJsonObject(value: JsonValue | undefined): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

// =============================================================================
// SCHEMAS
// =============================================================================

export const PRIMITIVE_TYPES = [
  "null",
  "boolean",
  "int",
  "long",
  "float",
  "double",
  "bytes",
  "string",
] as const;

export type PrimitiveType = (typeof PRIMITIVE_TYPES)[number];

const PRIMITIVE_SET: ReadonlySet<string> = new Set(PRIMITIVE_TYPES);

export function isPrimitiveType(name: string): name is PrimitiveType {
  return PRIMITIVE_SET.has(name);
}

export type LogicalType =
  | "decimal"
  | "date"
  | "time-millis"
  | "time-micros"
  | "timestamp-millis"
  | "timestamp-micros"
  | "local-timestamp-millis"
  | "local-timestamp-micros"
  | "uuid"
  | "duration";

export type FieldOrder = "ascending" | "descending" | "ignore";

/** Primitive, optionally annotated with properties */
export interface PrimitiveSchema {
  kind: "primitive";
  type: PrimitiveType;
  properties: JsonObject;
}

export interface RecordSchema {
  kind: "record";
  name: string;
  namespace?: string;
  doc?: string;
  fields: Field[];
  aliases: string[];
  properties: JsonObject;
  isError: boolean;
  span?: SourceSpan;
  source?: SourceText;
}

export interface EnumSchema {
  kind: "enum";
  name: string;
  namespace?: string;
  doc?: string;
  symbols: string[];
  default?: string;
  aliases: string[];
  properties: JsonObject;
  span?: SourceSpan;
  source?: SourceText;
}

/** Logical annotation carried by a fixed type */
export interface FixedLogical {
  logicalType: LogicalType;
  precision?: number;
  scale?: number;
}

export interface FixedSchema {
  kind: "fixed";
  name: string;
  namespace?: string;
  doc?: string;
  size: number;
  aliases: string[];
  properties: JsonObject;
  logical?: FixedLogical;
  span?: SourceSpan;
  source?: SourceText;
}

export interface ArraySchema {
  kind: "array";
  items: Schema;
  properties: JsonObject;
}

export interface MapSchema {
  kind: "map";
  values: Schema;
  properties: JsonObject;
}

export interface UnionSchema {
  kind: "union";
  branches: Schema[];
  /** Created by the `T?` shorthand */
  nullable: boolean;
}

/** Placeholder naming a registered named type */
export interface ReferenceSchema {
  kind: "reference";
  fullName: string;
  properties: JsonObject;
  span?: SourceSpan;
  source?: SourceText;
}

export interface LogicalSchema {
  kind: "logical";
  logicalType: LogicalType;
  base: PrimitiveType;
  precision?: number;
  scale?: number;
  properties: JsonObject;
}

export type NamedSchema = RecordSchema | EnumSchema | FixedSchema;

export type Schema =
  | PrimitiveSchema
  | NamedSchema
  | ArraySchema
  | MapSchema
  | UnionSchema
  | ReferenceSchema
  | LogicalSchema;

export interface Field {
  name: string;
  schema: Schema;
  doc?: string;
  default?: JsonValue;
  order?: FieldOrder;
  aliases: string[];
  properties: JsonObject;
  span?: SourceSpan;
  source?: SourceText;
}

// =============================================================================
// PROTOCOLS
// =============================================================================

export interface Message {
  name: string;
  doc?: string;
  properties: JsonObject;
  request: Field[];
  response: Schema;
  /** Declared `throws` clause, absent when the message declares none */
  errors?: ReferenceSchema[];
  oneWay: boolean;
}

export interface Protocol {
  name: string;
  namespace?: string;
  doc?: string;
  properties: JsonObject;
  /** Full names of the protocol's types in declaration order */
  types: string[];
  messages: Map<string, Message>;
}

// =============================================================================
// HELPERS
// =============================================================================

export function primitive(type: PrimitiveType, properties: JsonObject = {}): PrimitiveSchema {
  return { kind: "primitive", type, properties };
}

export function reference(
  fullName: string,
  options?: { properties?: JsonObject; span?: SourceSpan; source?: SourceText }
): ReferenceSchema {
  return {
    kind: "reference",
    fullName,
    properties: options?.properties ?? {},
    span: options?.span,
    source: options?.source,
  };
}

export function fullNameOf(schema: NamedSchema): string {
  return schema.namespace ? `${schema.namespace}.${schema.name}` : schema.name;
}

/**
 * Key used to detect duplicate union branches: primitive name, full name for
 * named types, the container kind for arrays and maps, the base type for
 * logical types.
 */
export function unionBranchKey(schema: Schema): string {
  switch (schema.kind) {
    case "primitive":
      return schema.type;
    case "record":
    case "enum":
    case "fixed":
      return fullNameOf(schema);
    case "reference":
      return schema.fullName;
    case "array":
      return "array";
    case "map":
      return "map";
    case "union":
      return "union";
    case "logical":
      return schema.base;
  }
}

/** Human-readable type description for diagnostics */
export function describeSchema(schema: Schema): string {
  switch (schema.kind) {
    case "primitive":
      return schema.type;
    case "record":
      return `record ${fullNameOf(schema)}`;
    case "enum":
      return `enum ${fullNameOf(schema)}`;
    case "fixed":
      return `fixed ${fullNameOf(schema)}`;
    case "reference":
      return schema.fullName;
    case "array":
      return `array<${describeSchema(schema.items)}>`;
    case "map":
      return `map<${describeSchema(schema.values)}>`;
    case "union":
      return `union { ${schema.branches.map(describeSchema).join(", ")} }`;
    case "logical":
      return schema.logicalType;
  }
}
