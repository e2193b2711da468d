/**
 * JSON output of compiled schemas and protocols
 *
 * Key order is fixed per node kind. A named type is written in full the first
 * time it is reached and by name afterwards.
 */

import {
  type EnumSchema,
  type Field,
  type FixedSchema,
  type JsonObject,
  type JsonValue,
  type Message,
  type NamedSchema,
  type Protocol,
  type RecordSchema,
  type ReferenceSchema,
  type Schema,
  fullNameOf,
  isJsonObject,
} from "../types/schema.js";
import { stringifyJson } from "./json-text.js";
import type { SchemaRegistry } from "./registry.js";

export class JsonSerializer {
  private readonly registry: SchemaRegistry;
  private readonly written = new Set<string>();

  constructor(registry: SchemaRegistry) {
    this.registry = registry;
  }

  // ===========================================================================
  // DOCUMENTS
  // ===========================================================================

  /** Protocol: protocol, namespace, doc, properties, types, messages */
  protocol(protocol: Protocol): JsonObject {
    const json: JsonObject = { protocol: protocol.name };
    if (protocol.namespace) json.namespace = protocol.namespace;
    if (protocol.doc !== undefined) json.doc = protocol.doc;
    Object.assign(json, protocol.properties);

    const types: JsonValue[] = [];
    for (const fullName of protocol.types) {
      const schema = this.registry.lookup(fullName);
      if (schema) types.push(this.named(schema, protocol.namespace));
    }
    json.types = types;

    const messages: JsonObject = {};
    for (const [name, message] of protocol.messages) {
      messages[name] = this.message(message, protocol.namespace);
    }
    json.messages = messages;
    return json;
  }

  /** Message: doc, properties, request, response, errors, one-way */
  message(message: Message, namespace: string | undefined): JsonObject {
    const json: JsonObject = {};
    if (message.doc !== undefined) json.doc = message.doc;
    Object.assign(json, message.properties);
    json.request = message.request.map((field) => this.field(field, namespace));
    json.response = this.schema(message.response, namespace);
    if (message.errors) {
      json.errors = message.errors.map((error) => this.schema(error, namespace));
    }
    if (message.oneWay) json["one-way"] = true;
    return json;
  }

  // ===========================================================================
  // SCHEMAS
  // ===========================================================================

  schema(schema: Schema, namespace: string | undefined): JsonValue {
    switch (schema.kind) {
      case "primitive":
        return isEmpty(schema.properties)
          ? schema.type
          : { type: schema.type, ...schema.properties };

      case "logical": {
        const json: JsonObject = { type: schema.base, logicalType: schema.logicalType };
        if (schema.precision !== undefined) json.precision = schema.precision;
        if (schema.scale !== undefined) json.scale = schema.scale;
        return Object.assign(json, schema.properties);
      }

      case "array":
        return Object.assign(
          { type: "array", items: this.schema(schema.items, namespace) },
          schema.properties
        );

      case "map":
        return Object.assign(
          { type: "map", values: this.schema(schema.values, namespace) },
          schema.properties
        );

      case "union":
        return schema.branches.map((branch) => this.schema(branch, namespace));

      case "reference":
        return this.reference(schema, namespace);

      case "record":
      case "enum":
      case "fixed":
        return this.named(schema, namespace);
    }
  }

  /**
   * A reference is written as its target's name. The first occurrence of a
   * target inlines the definition instead, taking on the reference's
   * properties where the definition has no key of that name; later
   * annotated occurrences become `{"type": name, ...properties}`.
   */
  private reference(schema: ReferenceSchema, namespace: string | undefined): JsonValue {
    const target = this.registry.lookup(schema.fullName);
    if (isEmpty(schema.properties)) {
      return target ? this.named(target, namespace) : schema.fullName;
    }
    if (target && !this.written.has(schema.fullName)) {
      const definition = this.named(target, namespace);
      if (!isJsonObject(definition)) return definition;
      const merged: JsonObject = { ...definition };
      for (const [key, value] of Object.entries(schema.properties)) {
        if (!(key in merged)) merged[key] = value;
      }
      return merged;
    }
    const type = target ? this.named(target, namespace) : schema.fullName;
    return { type, ...schema.properties };
  }

  /** Full definition on first use, name afterwards */
  named(schema: NamedSchema, namespace: string | undefined): JsonValue {
    const fullName = fullNameOf(schema);
    if (this.written.has(fullName)) {
      return schema.namespace === namespace ? schema.name : fullName;
    }
    this.written.add(fullName);

    switch (schema.kind) {
      case "record":
        return this.record(schema, namespace);
      case "enum":
        return this.enumeration(schema, namespace);
      case "fixed":
        return this.fixed(schema, namespace);
    }
  }

  /** Record: type, name, namespace, doc, fields, aliases */
  private record(schema: RecordSchema, enclosing: string | undefined): JsonObject {
    const json = this.header(schema.isError ? "error" : "record", schema, enclosing);
    if (schema.doc !== undefined) json.doc = schema.doc;
    const inner = schema.namespace ?? enclosing;
    json.fields = schema.fields.map((field) => this.field(field, inner));
    if (schema.aliases.length > 0) json.aliases = schema.aliases;
    return Object.assign(json, schema.properties);
  }

  /** Enum: type, name, namespace, aliases, doc, symbols, default */
  private enumeration(schema: EnumSchema, enclosing: string | undefined): JsonObject {
    const json = this.header("enum", schema, enclosing);
    if (schema.aliases.length > 0) json.aliases = schema.aliases;
    if (schema.doc !== undefined) json.doc = schema.doc;
    json.symbols = schema.symbols;
    if (schema.default !== undefined) json.default = schema.default;
    return Object.assign(json, schema.properties);
  }

  /** Fixed: type, name, namespace, doc, size, aliases, logical keys */
  private fixed(schema: FixedSchema, enclosing: string | undefined): JsonObject {
    const json = this.header("fixed", schema, enclosing);
    if (schema.doc !== undefined) json.doc = schema.doc;
    json.size = schema.size;
    if (schema.aliases.length > 0) json.aliases = schema.aliases;
    if (schema.logical) {
      json.logicalType = schema.logical.logicalType;
      if (schema.logical.precision !== undefined) json.precision = schema.logical.precision;
      if (schema.logical.scale !== undefined) json.scale = schema.logical.scale;
    }
    return Object.assign(json, schema.properties);
  }

  private header(type: string, schema: NamedSchema, enclosing: string | undefined): JsonObject {
    const json: JsonObject = { type, name: schema.name };
    if (schema.namespace !== undefined && schema.namespace !== enclosing) {
      json.namespace = schema.namespace;
    }
    return json;
  }

  /** Field: name, type, doc, default, order, aliases */
  field(field: Field, namespace: string | undefined): JsonObject {
    const json: JsonObject = { name: field.name, type: this.schema(field.schema, namespace) };
    if (field.doc !== undefined) json.doc = field.doc;
    if (field.default !== undefined) json.default = field.default;
    if (field.order === "descending" || field.order === "ignore") json.order = field.order;
    if (field.aliases.length > 0) json.aliases = field.aliases;
    return Object.assign(json, field.properties);
  }
}

function isEmpty(object: JsonObject): boolean {
  return Object.keys(object).length === 0;
}

/** Two-space indented JSON text */
export function formatJson(value: JsonValue): string {
  return stringifyJson(value, 2);
}
