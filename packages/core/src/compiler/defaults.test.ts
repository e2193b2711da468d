/**
 * Default value validation tests
 */

import { describe, expect, test } from "vitest";
import { IncompleteRecordDefaultError, InvalidDefaultError } from "../diagnostics/errors.js";
import {
  type EnumSchema,
  type NamedSchema,
  type RecordSchema,
  type Schema,
  primitive,
  reference,
} from "../types/schema.js";
import { checkDefault } from "./defaults.js";
import { makeUnion } from "./unions.js";

const suit: EnumSchema = {
  kind: "enum",
  name: "Suit",
  symbols: ["HEARTS", "SPADES"],
  aliases: [],
  properties: {},
};

const inner: RecordSchema = {
  kind: "record",
  name: "Inner",
  fields: [
    { name: "value", schema: primitive("int"), aliases: [], properties: {} },
    { name: "label", schema: primitive("string"), default: "none", aliases: [], properties: {} },
  ],
  aliases: [],
  properties: {},
  isError: false,
};

const named: Record<string, NamedSchema> = { Suit: suit, Inner: inner };
const lookup = (fullName: string): NamedSchema | undefined => named[fullName];

function check(schema: Schema, value: Parameters<typeof checkDefault>[1]): void {
  checkDefault(schema, value, { field: "f", enclosingType: "Outer", lookup });
}

describe("checkDefault", () => {
  test("accepts matching primitives", () => {
    expect(() => check(primitive("boolean"), true)).not.toThrow();
    expect(() => check(primitive("long"), 2 ** 40)).not.toThrow();
    expect(() => check(primitive("double"), "NaN")).not.toThrow();
    expect(() => check(primitive("bytes"), "ÿ")).not.toThrow();
  });

  test("reports the field, the enclosing type and the mismatch", () => {
    expect(() => check(primitive("string"), 5)).toThrow(
      "Invalid default for field `f` in `Outer`: expected string, got integer"
    );
  });

  test("rejects an int outside the 32-bit range", () => {
    expect(() => check(primitive("int"), 2 ** 31)).toThrow(
      "expected int, got integer 2147483648 outside the int range"
    );
  });

  test("checks logical types against their base", () => {
    expect(() => check({ kind: "logical", logicalType: "date", base: "int", properties: {} }, 19000)).not.toThrow();
    expect(() =>
      check({ kind: "logical", logicalType: "date", base: "int", properties: {} }, "2024-01-01")
    ).toThrow(InvalidDefaultError);
  });

  test("requires a known enum symbol", () => {
    expect(() => check(reference("Suit"), "SPADES")).not.toThrow();
    expect(() => check(reference("Suit"), "CLUBS")).toThrow('got unknown symbol "CLUBS"');
  });

  test("checks array items and map values", () => {
    expect(() => check({ kind: "array", items: primitive("int"), properties: {} }, [1, 2])).not.toThrow();
    expect(() => check({ kind: "map", values: primitive("int"), properties: {} }, { a: "x" })).toThrow(
      InvalidDefaultError
    );
  });

  test("accepts a union default matching any branch", () => {
    const union = makeUnion([primitive("null"), primitive("string")]);
    expect(() => check(union, null)).not.toThrow();
    expect(() => check(union, "text")).not.toThrow();
    expect(() => check(union, 3)).toThrow("expected union { null, string }, got integer");
  });

  test("requires every record field without a default", () => {
    expect(() => check(reference("Inner"), { value: 1 })).not.toThrow();
    expect(() => check(reference("Inner"), { label: "x" })).toThrow(
      "Default for field `f` in `Outer` is incomplete: no value for `Inner.value`, which has no default"
    );
  });

  test("prefers the incomplete record report when no union branch matches", () => {
    const union = makeUnion([primitive("null"), reference("Inner")]);
    expect(() => check(union, {})).toThrow(IncompleteRecordDefaultError);
  });

  test("accepts anything for a reference it cannot follow", () => {
    expect(() => checkDefault(reference("Unknown"), 42, { field: "f" })).not.toThrow();
  });
});
