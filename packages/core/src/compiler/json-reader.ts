/**
 * Conversion of JSON schema (.avsc) and protocol (.avpr) documents into the
 * schema model
 */

import {
  DuplicateEnumSymbolError,
  IdlError,
  NumericRangeError,
} from "../diagnostics/errors.js";
import {
  type EnumSchema,
  type Field,
  type FieldOrder,
  type FixedSchema,
  type JsonObject,
  type JsonValue,
  type Message,
  type PrimitiveType,
  type RecordSchema,
  type ReferenceSchema,
  type Schema,
  fullNameOf,
  isJsonObject,
  isPrimitiveType,
  primitive,
  reference,
} from "../types/schema.js";
import { stringifyJson } from "./json-text.js";
import { UINT32_MAX, decidePromotion, withoutLogicalKeys } from "./logical.js";
import { NamespaceContext, simpleName, validateName } from "./names.js";
import type { SchemaRegistry } from "./registry.js";
import { makeUnion } from "./unions.js";

/** Deepest schema nesting accepted in a JSON document */
export const MAX_SCHEMA_DEPTH = 256;

const FIELD_ORDERS: ReadonlySet<string> = new Set(["ascending", "descending", "ignore"]);

interface ReaderContext {
  registry: SchemaRegistry;
  /** File the document was read from */
  origin?: string;
}

function invalid(message: string): IdlError {
  return new IdlError("INVALID_SCHEMA", message);
}

// =============================================================================
// DOCUMENTS
// =============================================================================

/**
 * Register every named type of a JSON schema document. A primitive or
 * anonymous document registers nothing.
 */
export function readSchemaDocument(json: JsonValue, registry: SchemaRegistry, origin?: string): void {
  readSchema(json, NamespaceContext.root(), { registry, origin }, 0);
}

/** Contents of a JSON protocol document */
export interface ProtocolDocument {
  name?: string;
  namespace?: string;
  messages: Map<string, Message>;
}

/** Register a JSON protocol's types and read its messages */
export function readProtocolDocument(
  json: JsonValue,
  registry: SchemaRegistry,
  origin?: string
): ProtocolDocument {
  if (!isJsonObject(json)) {
    throw invalid("protocol document must be a JSON object");
  }
  const context: ReaderContext = { registry, origin };
  const namespace = optionalString(json, "namespace", "protocol");
  const name = optionalString(json, "protocol", "protocol");
  const scope = NamespaceContext.root(namespace);

  const types = json.types;
  if (types !== undefined) {
    if (!Array.isArray(types)) throw invalid("protocol `types` must be an array");
    for (const type of types) {
      readSchema(type, scope, context, 0);
    }
  }

  const messages = new Map<string, Message>();
  const messagesJson = json.messages;
  if (messagesJson !== undefined) {
    if (!isJsonObject(messagesJson)) throw invalid("protocol `messages` must be an object");
    for (const [messageName, messageJson] of Object.entries(messagesJson)) {
      validateName(messageName);
      messages.set(messageName, readMessage(messageName, messageJson, scope, context));
    }
  }

  return { name, namespace: scope.namespace, messages };
}

// =============================================================================
// SCHEMAS
// =============================================================================

/**
 * Convert a JSON schema. Named types are registered as they are met, outer
 * before inner, and replaced by references.
 */
export function readSchema(
  json: JsonValue,
  scope: NamespaceContext,
  context: ReaderContext,
  depth: number
): Schema {
  if (depth > MAX_SCHEMA_DEPTH) {
    throw invalid(`schema nesting exceeds ${MAX_SCHEMA_DEPTH} levels`);
  }

  if (typeof json === "string") {
    return isPrimitiveType(json) ? primitive(json) : reference(scope.qualify(json));
  }
  if (Array.isArray(json)) {
    return makeUnion(json.map((branch) => readSchema(branch, scope, context, depth + 1)));
  }
  if (!isJsonObject(json)) {
    throw invalid(`invalid schema: ${stringifyJson(json)}`);
  }

  const type = json.type;
  if (typeof type !== "string") {
    throw invalid("schema object missing 'type' field");
  }

  switch (type) {
    case "record":
    case "error":
      return readRecord(json, type === "error", scope, context, depth);
    case "enum":
      return readEnum(json, scope, context);
    case "fixed":
      return readFixed(json, scope, context);
    case "array": {
      if (json.items === undefined) throw invalid("array missing 'items'");
      return {
        kind: "array",
        items: readSchema(json.items, scope, context, depth + 1),
        properties: extraProperties(json, ["type", "items"]),
      };
    }
    case "map": {
      if (json.values === undefined) throw invalid("map missing 'values'");
      return {
        kind: "map",
        values: readSchema(json.values, scope, context, depth + 1),
        properties: extraProperties(json, ["type", "values"]),
      };
    }
    default:
      if (isPrimitiveType(type)) {
        return readAnnotatedPrimitive(json, type);
      }
      // A named type written as an object, with properties on the reference
      return reference(scope.qualify(type), { properties: extraProperties(json, ["type"]) });
  }
}

function readAnnotatedPrimitive(json: JsonObject, type: PrimitiveType): Schema {
  const properties = extraProperties(json, ["type"]);
  const logicalType = json.logicalType;
  if (typeof logicalType === "string") {
    const promotion = decidePromotion(logicalType, type, {
      precision: json.precision,
      scale: json.scale,
    });
    if (promotion.promoted) {
      return {
        kind: "logical",
        logicalType: promotion.logicalType,
        base: type,
        precision: promotion.precision,
        scale: promotion.scale,
        properties: withoutLogicalKeys(properties, promotion.logicalType === "decimal"),
      };
    }
  }
  return primitive(type, properties);
}

/** Name, namespace, doc and aliases shared by named types */
function namedParts(json: JsonObject, what: string, scope: NamespaceContext) {
  const rawName = json.name;
  if (typeof rawName !== "string") {
    throw invalid(`${what} missing 'name'`);
  }
  const explicit = optionalString(json, "namespace", what);
  return {
    name: simpleName(rawName),
    namespace: scope.namespaceFor(rawName, explicit),
    doc: typeof json.doc === "string" ? json.doc : undefined,
    aliases: stringArray(json, "aliases", what),
  };
}

function readRecord(
  json: JsonObject,
  isError: boolean,
  scope: NamespaceContext,
  context: ReaderContext,
  depth: number
): ReferenceSchema {
  const what = isError ? "error" : "record";
  const parts = namedParts(json, what, scope);
  const record: RecordSchema = {
    kind: "record",
    ...parts,
    fields: [],
    properties: extraProperties(json, ["type", "name", "namespace", "doc", "fields", "aliases"]),
    isError,
  };
  const fullName = fullNameOf(record);
  context.registry.register(record, context.origin);

  const fieldsJson = json.fields;
  if (!Array.isArray(fieldsJson)) {
    throw invalid(`${what} ${fullName} missing 'fields'`);
  }
  const inner = scope.enter(record.namespace);
  const names = new Set<string>();
  for (const fieldJson of fieldsJson) {
    const field = readField(fieldJson, inner, context, depth);
    if (names.has(field.name)) {
      throw new IdlError("DUPLICATE_FIELD", `duplicate field ${field.name} in record ${fullName}`);
    }
    names.add(field.name);
    record.fields.push(field);
  }
  return reference(fullName);
}

function readEnum(json: JsonObject, scope: NamespaceContext, context: ReaderContext): ReferenceSchema {
  const parts = namedParts(json, "enum", scope);
  const fullName = parts.namespace ? `${parts.namespace}.${parts.name}` : parts.name;

  const symbols = stringArray(json, "symbols", "enum");
  const seen = new Set<string>();
  for (const symbol of symbols) {
    validateName(symbol);
    if (seen.has(symbol)) {
      throw new DuplicateEnumSymbolError(fullName, symbol);
    }
    seen.add(symbol);
  }

  const defaultSymbol = optionalString(json, "default", "enum");
  if (defaultSymbol !== undefined && !seen.has(defaultSymbol)) {
    throw new IdlError(
      "INVALID_DEFAULT",
      `Default symbol \`${defaultSymbol}\` is not a symbol of enum \`${fullName}\``
    );
  }

  const schema: EnumSchema = {
    kind: "enum",
    ...parts,
    symbols,
    default: defaultSymbol,
    properties: extraProperties(json, [
      "type",
      "name",
      "namespace",
      "doc",
      "symbols",
      "default",
      "aliases",
    ]),
  };
  context.registry.register(schema, context.origin);
  return reference(fullName);
}

function readFixed(json: JsonObject, scope: NamespaceContext, context: ReaderContext): ReferenceSchema {
  const parts = namedParts(json, "fixed", scope);
  const size = json.size;
  if (typeof size === "bigint" && size > 0n) {
    throw new NumericRangeError("fixed size", String(size), `at most ${UINT32_MAX}`);
  }
  if (typeof size !== "number" || !Number.isInteger(size) || size < 0) {
    throw invalid(`fixed ${parts.name} needs a non-negative integer 'size'`);
  }
  if (size > UINT32_MAX) {
    throw new NumericRangeError("fixed size", String(size), `at most ${UINT32_MAX}`);
  }

  const schema: FixedSchema = {
    kind: "fixed",
    ...parts,
    size,
    properties: extraProperties(json, ["type", "name", "namespace", "doc", "size", "aliases"]),
  };

  const logicalType = json.logicalType;
  if (typeof logicalType === "string") {
    const promotion = decidePromotion(logicalType, "fixed", {
      precision: json.precision,
      scale: json.scale,
      fixedSize: size,
    });
    if (promotion.promoted) {
      schema.properties = withoutLogicalKeys(schema.properties, promotion.logicalType === "decimal");
      schema.logical = {
        logicalType: promotion.logicalType,
        precision: promotion.precision,
        scale: promotion.scale,
      };
    }
  }

  context.registry.register(schema, context.origin);
  return reference(fullNameOf(schema));
}

// =============================================================================
// FIELDS AND MESSAGES
// =============================================================================

function readField(json: JsonValue, scope: NamespaceContext, context: ReaderContext, depth: number): Field {
  if (!isJsonObject(json)) {
    throw invalid("field must be an object");
  }
  const name = json.name;
  if (typeof name !== "string") {
    throw invalid("field missing 'name'");
  }
  validateName(name);
  if (json.type === undefined) {
    throw invalid(`field ${name} missing 'type'`);
  }

  let order: FieldOrder | undefined;
  const rawOrder = json.order;
  if (rawOrder !== undefined) {
    if (typeof rawOrder !== "string" || !FIELD_ORDERS.has(rawOrder)) {
      throw invalid(`field ${name} has invalid order ${stringifyJson(rawOrder)}`);
    }
    order = parseOrder(rawOrder);
  }

  return {
    name,
    schema: readSchema(json.type, scope, context, depth + 1),
    doc: typeof json.doc === "string" ? json.doc : undefined,
    default: json.default,
    order,
    aliases: stringArray(json, "aliases", `field ${name}`),
    properties: extraProperties(json, ["name", "type", "doc", "default", "order", "aliases"]),
  };
}

function parseOrder(order: string): FieldOrder {
  return order === "descending" ? "descending" : order === "ignore" ? "ignore" : "ascending";
}

function readMessage(
  name: string,
  json: JsonValue,
  scope: NamespaceContext,
  context: ReaderContext
): Message {
  if (!isJsonObject(json)) {
    throw invalid(`message ${name} must be an object`);
  }

  const request: Field[] = [];
  const requestJson = json.request;
  if (requestJson !== undefined) {
    if (!Array.isArray(requestJson)) throw invalid(`message ${name} request must be an array`);
    for (const parameter of requestJson) {
      request.push(readField(parameter, scope, context, 0));
    }
  }

  const response =
    json.response === undefined ? primitive("null") : readSchema(json.response, scope, context, 0);

  let errors: ReferenceSchema[] | undefined;
  const errorsJson = json.errors;
  if (errorsJson !== undefined) {
    if (!Array.isArray(errorsJson)) throw invalid(`message ${name} errors must be an array`);
    errors = errorsJson.map((errorJson) => {
      const schema = readSchema(errorJson, scope, context, 0);
      if (schema.kind !== "reference") {
        throw invalid(`message ${name} declares a non-error type in 'errors'`);
      }
      return schema;
    });
  }

  return {
    name,
    doc: typeof json.doc === "string" ? json.doc : undefined,
    properties: extraProperties(json, ["doc", "request", "response", "errors", "one-way"]),
    request,
    response,
    errors,
    oneWay: json["one-way"] === true,
  };
}

// =============================================================================
// HELPERS
// =============================================================================

function optionalString(json: JsonObject, key: string, what: string): string | undefined {
  const value = json[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== "string") {
    throw invalid(`${what} '${key}' must be a string`);
  }
  return value;
}

function stringArray(json: JsonObject, key: string, what: string): string[] {
  const value = json[key];
  if (value === undefined) return [];
  if (!Array.isArray(value)) {
    throw invalid(`${what} '${key}' must be an array of strings`);
  }
  return value.map((item) => {
    if (typeof item !== "string") {
      throw invalid(`${what} '${key}' must be an array of strings`);
    }
    return item;
  });
}

/** Keys of a JSON object other than the known ones, in document order */
function extraProperties(json: JsonObject, known: readonly string[]): JsonObject {
  const properties: JsonObject = {};
  for (const [key, value] of Object.entries(json)) {
    if (!known.includes(key)) {
      properties[key] = value;
    }
  }
  return properties;
}
