/**
 * Union construction tests
 */

import { describe, expect, test } from "vitest";
import { IdlError, NestedUnionError } from "../diagnostics/errors.js";
import { primitive, reference } from "../types/schema.js";
import { makeUnion } from "./unions.js";

describe("makeUnion", () => {
  test("keeps branches in order", () => {
    const union = makeUnion([primitive("null"), reference("org.User")], { nullable: true });
    expect(union.branches.map((b) => b.kind)).toEqual(["primitive", "reference"]);
    expect(union.nullable).toBe(true);
  });

  test("rejects a union directly inside a union", () => {
    const inner = makeUnion([primitive("int"), primitive("string")]);
    expect(() => makeUnion([primitive("null"), inner])).toThrow(NestedUnionError);
  });

  test("rejects repeated branches", () => {
    expect(() => makeUnion([primitive("string"), primitive("string")])).toThrow("Duplicate in union: string");
    expect(() =>
      makeUnion([
        { kind: "array", items: primitive("int"), properties: {} },
        { kind: "array", items: primitive("long"), properties: {} },
      ])
    ).toThrow(IdlError);
  });

  test("allows distinct named types", () => {
    expect(makeUnion([reference("a.User"), reference("b.User")]).branches).toHaveLength(2);
  });
});
