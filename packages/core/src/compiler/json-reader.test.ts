/**
 * JSON schema and protocol reader tests
 */

import { describe, expect, test } from "vitest";
import { DuplicateEnumSymbolError, IdlError, NumericRangeError } from "../diagnostics/errors.js";
import type { JsonValue } from "../types/schema.js";
import { MAX_SCHEMA_DEPTH, readProtocolDocument, readSchemaDocument } from "./json-reader.js";
import { SchemaRegistry } from "./registry.js";

function read(json: JsonValue): SchemaRegistry {
  const registry = new SchemaRegistry();
  readSchemaDocument(json, registry, "test.avsc");
  return registry;
}

describe("readSchemaDocument", () => {
  test("registers nested named types, outer first", () => {
    const registry = read({
      type: "record",
      name: "Order",
      namespace: "org.shop",
      fields: [
        { name: "status", type: { type: "enum", name: "Status", symbols: ["NEW", "PAID"] } },
        { name: "hash", type: { type: "fixed", name: "Hash", namespace: "org.crypto", size: 16 } },
      ],
    });
    expect(registry.names).toEqual(["org.shop.Order", "org.shop.Status", "org.crypto.Hash"]);
    expect(registry.origin("org.shop.Status")).toBe("test.avsc");
  });

  test("turns nested definitions into references", () => {
    const registry = read({
      type: "record",
      name: "Pair",
      fields: [
        { name: "left", type: { type: "fixed", name: "Half", size: 2 } },
        { name: "right", type: "Half" },
      ],
    });
    const pair = registry.lookup("Pair");
    if (pair?.kind !== "record") throw new Error("expected a record");
    expect(pair.fields.map((f) => f.schema)).toEqual([
      { kind: "reference", fullName: "Half", properties: {}, span: undefined, source: undefined },
      { kind: "reference", fullName: "Half", properties: {}, span: undefined, source: undefined },
    ]);
  });

  test("a dotted name wins over the namespace key", () => {
    const registry = read({ type: "fixed", name: "a.b.Id", namespace: "ignored", size: 4 });
    expect(registry.names).toEqual(["a.b.Id"]);
  });

  test("keeps field order, aliases and extra properties", () => {
    const registry = read({
      type: "record",
      name: "R",
      fields: [{ name: "x", type: "int", order: "descending", aliases: ["y"], note: "kept" }],
      custom: true,
    });
    const record = registry.lookup("R");
    if (record?.kind !== "record") throw new Error("expected a record");
    expect(record.properties).toEqual({ custom: true });
    expect(record.fields[0]).toMatchObject({
      name: "x",
      order: "descending",
      aliases: ["y"],
      properties: { note: "kept" },
    });
  });

  test("promotes logical types on annotated primitives", () => {
    const registry = read({
      type: "record",
      name: "R",
      fields: [
        { name: "d", type: { type: "bytes", logicalType: "decimal", precision: 6, scale: 2 } },
        { name: "c", type: { type: "string", logicalType: "color" } },
      ],
    });
    const record = registry.lookup("R");
    if (record?.kind !== "record") throw new Error("expected a record");
    expect(record.fields[0]?.schema).toEqual({
      kind: "logical",
      logicalType: "decimal",
      base: "bytes",
      precision: 6,
      scale: 2,
      properties: {},
    });
    expect(record.fields[1]?.schema).toEqual({
      kind: "primitive",
      type: "string",
      properties: { logicalType: "color" },
    });
  });

  test("rejects duplicate enum symbols", () => {
    expect(() => read({ type: "enum", name: "E", symbols: ["A", "A"] })).toThrow(DuplicateEnumSymbolError);
  });

  test("rejects an enum default that is not a symbol", () => {
    expect(() => read({ type: "enum", name: "E", symbols: ["A"], default: "B" })).toThrow(
      "Default symbol `B` is not a symbol of enum `E`"
    );
  });

  test("rejects an invalid field order", () => {
    expect(() => read({ type: "record", name: "R", fields: [{ name: "x", type: "int", order: "up" }] })).toThrow(
      'field x has invalid order "up"'
    );
  });

  test("rejects a fixed size beyond 32 bits", () => {
    expect(() => read({ type: "fixed", name: "F", size: 5000000000 })).toThrow(NumericRangeError);
  });

  test("reads an object naming a type as a reference with properties", () => {
    const registry = read({
      type: "record",
      name: "org.shop.Line",
      fields: [
        { name: "hash", type: { type: "fixed", name: "Hash", size: 4 } },
        { name: "copy", type: { type: "Hash", note: "kept" } },
      ],
    });
    const line = registry.lookup("org.shop.Line");
    if (line?.kind !== "record") throw new Error("expected a record");
    expect(line.fields[1]?.schema).toEqual({
      kind: "reference",
      fullName: "org.shop.Hash",
      properties: { note: "kept" },
      span: undefined,
      source: undefined,
    });
  });

  test("rejects an object without a type", () => {
    expect(() => read({ name: "X" })).toThrow("schema object missing 'type' field");
  });

  test("limits nesting depth", () => {
    let json: JsonValue = "int";
    for (let i = 0; i <= MAX_SCHEMA_DEPTH; i++) {
      json = { type: "array", items: json };
    }
    expect(() => read(json)).toThrow(`schema nesting exceeds ${MAX_SCHEMA_DEPTH} levels`);
  });
});

describe("readProtocolDocument", () => {
  test("reads types and messages", () => {
    const registry = new SchemaRegistry();
    const protocol = readProtocolDocument(
      {
        protocol: "Greeter",
        namespace: "org.greet",
        types: [{ type: "error", name: "Failure", fields: [{ name: "why", type: "string" }] }],
        messages: {
          greet: {
            doc: "Say hello",
            request: [{ name: "who", type: "string" }],
            response: "string",
            errors: ["Failure"],
          },
          ping: { request: [], "one-way": true },
        },
      },
      registry
    );
    expect(protocol.name).toBe("Greeter");
    expect(protocol.namespace).toBe("org.greet");
    expect(registry.names).toEqual(["org.greet.Failure"]);

    const greet = protocol.messages.get("greet");
    expect(greet?.doc).toBe("Say hello");
    expect(greet?.errors?.map((e) => e.fullName)).toEqual(["org.greet.Failure"]);

    const ping = protocol.messages.get("ping");
    expect(ping?.oneWay).toBe(true);
    expect(ping?.response).toEqual({ kind: "primitive", type: "null", properties: {} });
  });

  test("rejects a document that is not an object", () => {
    expect(() => readProtocolDocument([], new SchemaRegistry())).toThrow(IdlError);
  });
});
