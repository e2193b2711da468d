/**
 * End-to-end compiler tests
 */

import { mkdtempSync, realpathSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, test } from "vitest";
import type { CompilationResult } from "../types/result.js";
import type { JsonValue } from "../types/schema.js";
import { compile, compileFile, compileToNamedSchemata } from "./compile.js";
import { formatJson } from "./serializer.js";

function compileText(text: string): CompilationResult {
  return compile({ text, name: "test.avdl" });
}

function outputOf(text: string): JsonValue | undefined {
  const result = compileText(text);
  expect(result.errors).toEqual([]);
  return result.output;
}

function firstError(text: string): { code: string; message: string } {
  const [error] = compileText(text).errors;
  return { code: error?.code ?? "", message: error?.message ?? "" };
}

describe("compile", () => {
  describe("protocols", () => {
    test("compiles a protocol with types and messages", () => {
      const output = outputOf(`
        /** Online shop. */
        @namespace("org.shop")
        protocol Shop {
          enum Status { NEW, PAID } = NEW;
          fixed Sku(8);
          /** A product. */
          record Item {
            Sku sku;
            string name = "unnamed";
            Status status = "NEW";
            union { null, Item } next = null;
          }
          error Rejected { string reason; }
          Item lookup(Sku sku) throws Rejected;
          void notify(string message) oneway;
        }
      `);
      expect(formatJson(output ?? null)).toBe(
        formatJson({
          protocol: "Shop",
          namespace: "org.shop",
          doc: "Online shop.",
          types: [
            { type: "enum", name: "Status", symbols: ["NEW", "PAID"], default: "NEW" },
            { type: "fixed", name: "Sku", size: 8 },
            {
              type: "record",
              name: "Item",
              doc: "A product.",
              fields: [
                { name: "sku", type: "Sku" },
                { name: "name", type: "string", default: "unnamed" },
                { name: "status", type: "Status", default: "NEW" },
                { name: "next", type: ["null", "Item"], default: null },
              ],
            },
            { type: "error", name: "Rejected", fields: [{ name: "reason", type: "string" }] },
          ],
          messages: {
            lookup: { request: [{ name: "sku", type: "Sku" }], response: "Item", errors: ["Rejected"] },
            notify: { request: [{ name: "message", type: "string" }], response: "null", "one-way": true },
          },
        })
      );
    });

    test("omits the namespace key for an empty @namespace", () => {
      expect(outputOf('@namespace("") protocol P { record R {} }')).toEqual({
        protocol: "P",
        types: [{ type: "record", name: "R", fields: [] }],
        messages: {},
      });
    });

    test("writes a namespace only where it changes", () => {
      const output = outputOf(`@namespace("a") protocol P {
        @namespace("b") record R { a.S s; }
        record S {}
      }`);
      expect(output).toEqual({
        protocol: "P",
        namespace: "a",
        types: [
          {
            type: "record",
            name: "R",
            namespace: "b",
            fields: [{ name: "s", type: { type: "record", name: "S", namespace: "a", fields: [] } }],
          },
          "S",
        ],
        messages: {},
      });
    });

    test("writes field keys in a fixed order", () => {
      const output = outputOf('protocol P { record R { /** The name. */ string @aliases(["n"]) name = "x"; } }');
      expect(formatJson(output ?? null)).toBe(
        formatJson({
          protocol: "P",
          types: [
            {
              type: "record",
              name: "R",
              fields: [{ name: "name", type: "string", doc: "The name.", default: "x", aliases: ["n"] }],
            },
          ],
          messages: {},
        })
      );
    });

    test("keeps annotations of a nullable type on the non-null branch", () => {
      const output = outputOf('protocol P { record R { @java("String") string? s = null; } }');
      expect(output).toMatchObject({
        types: [{ fields: [{ name: "s", type: ["null", { type: "string", java: "String" }], default: null }] }],
      });
    });
  });

  describe("schema files", () => {
    test("outputs the main schema", () => {
      expect(outputOf("namespace org.example;\nschema User;\nrecord User { string name; }")).toEqual({
        type: "record",
        name: "User",
        namespace: "org.example",
        fields: [{ name: "name", type: "string" }],
      });
    });

    test("outputs every declared type when there is no main schema", () => {
      expect(outputOf("record A {} record B { A a; }")).toEqual([
        { type: "record", name: "A", fields: [] },
        { type: "record", name: "B", fields: [{ name: "a", type: "A" }] },
      ]);
    });

    test("keeps a long default exact across the 64-bit range", () => {
      const output = outputOf("schema A;\nrecord A { long max = 9223372036854775807; long min = -9223372036854775808; }");
      expect(output).toEqual({
        type: "record",
        name: "A",
        fields: [
          { name: "max", type: "long", default: 9223372036854775807n },
          { name: "min", type: "long", default: -9223372036854775808n },
        ],
      });
      expect(formatJson(output ?? null)).toContain('"default": 9223372036854775807\n');
    });

    test("rejects an integer literal beyond the 64-bit range", () => {
      expect(firstError("schema A;\nrecord A { long x = 9223372036854775808; }").code).toBe("NUMERIC_RANGE");
    });

    test("fails on a file with nothing in it", () => {
      expect(firstError("")).toEqual({
        code: "INVALID_SCHEMA",
        message: "IDL file contains neither a protocol nor a schema declaration",
      });
    });
  });

  describe("errors", () => {
    test("reports every unresolved name together", () => {
      expect(firstError("protocol P { record R { Strin s; Missing m; } }")).toEqual({
        code: "UNRESOLVED_REFERENCES",
        message: "Undefined names: Missing, Strin",
      });
    });

    test("reports an incomplete record default with the missing field", () => {
      expect(
        firstError(`protocol P {
          record Inner { int value; }
          record Outer { Inner inner = {}; }
        }`)
      ).toEqual({
        code: "INCOMPLETE_RECORD_DEFAULT",
        message:
          "Default for field `inner` in `Outer` is incomplete: no value for `Inner.value`, which has no default",
      });
    });

    test("requires thrown types to be errors", () => {
      expect(firstError("protocol P { record NotError {} void f() throws NotError; }")).toEqual({
        code: "INVALID_MESSAGE",
        message: "Message 'f' throws NotError, which is not an error type",
      });
    });

    test("enriches syntax errors", () => {
      expect(firstError("protocol P { record R { stringname; } }")).toEqual({
        code: "SYNTAX_ERROR",
        message:
          "Expected identifier but got ';'; 'stringname' looks like 'string' and 'name' run together; add a space between them",
      });
    });

    test("keeps warnings when compilation fails", () => {
      const result = compileText("protocol P { enum E { @x(1) A } record R { Missing m; } }");
      expect(result.success).toBe(false);
      expect(result.output).toBeUndefined();
      expect(result.warnings.map((w) => w.code)).toEqual(["IGNORED_ANNOTATION"]);
    });

    test("reports types nested past the depth limit", () => {
      const levels = 20000;
      expect(firstError(`schema ${"array<".repeat(levels)}int${">".repeat(levels)};`)).toEqual({
        code: "INVALID_SCHEMA",
        message: "schema nesting exceeds 256 levels",
      });
    });

    test("reports a JSON default nested past the depth limit", () => {
      const levels = 20000;
      expect(firstError(`protocol P { record R { int x = ${"[".repeat(levels)}${"]".repeat(levels)}; } }`)).toEqual({
        code: "INVALID_SCHEMA",
        message: "JSON value nesting exceeds 256 levels",
      });
    });

    test("reports a missing root file", () => {
      const result = compileFile(join(tmpdir(), "avdl-no-such-dir", "none.avdl"));
      expect(result.success).toBe(false);
      expect(result.errors[0]?.code).toBe("FILE_READ_ERROR");
    });
  });
});

describe("compile with imports", () => {
  let dir: string;

  beforeEach(() => {
    dir = realpathSync(mkdtempSync(join(tmpdir(), "avdl-compile-")));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  function write(name: string, text: string): string {
    const path = join(dir, name);
    writeFileSync(path, text);
    return path;
  }

  test("merges imported IDL and JSON types in import order", () => {
    write("common.avdl", '@namespace("org.common") protocol Common { record Money { long cents; } }');
    write("currency.avsc", '{"type": "enum", "name": "Currency", "namespace": "org.common", "symbols": ["EUR", "USD"]}');
    const main = write(
      "main.avdl",
      `@namespace("org.shop") protocol Shop {
        import idl "common.avdl";
        import schema "currency.avsc";
        record Price { org.common.Money amount; org.common.Currency currency; }
      }`
    );
    const result = compileFile(main);
    expect(result.errors).toEqual([]);
    expect(result.output).toEqual({
      protocol: "Shop",
      namespace: "org.shop",
      types: [
        { type: "record", name: "Money", namespace: "org.common", fields: [{ name: "cents", type: "long" }] },
        { type: "enum", name: "Currency", namespace: "org.common", symbols: ["EUR", "USD"] },
        {
          type: "record",
          name: "Price",
          fields: [
            { name: "amount", type: "org.common.Money" },
            { name: "currency", type: "org.common.Currency" },
          ],
        },
      ],
      messages: {},
    });
  });

  test("contributes the types of a diamond import once", () => {
    write("shared.avdl", "protocol Shared { record Common {} }");
    write("left.avdl", 'protocol Left { import idl "shared.avdl"; record FromLeft { Common c; } }');
    write("right.avdl", 'protocol Right { import idl "shared.avdl"; record FromRight { Common c; } }');
    const main = write("main.avdl", 'protocol Main { import idl "left.avdl"; import idl "right.avdl"; }');

    const result = compileFile(main);
    expect(result.errors).toEqual([]);
    expect(result.output).toMatchObject({
      types: [
        { name: "Common" },
        { name: "FromLeft", fields: [{ name: "c", type: "Common" }] },
        { name: "FromRight", fields: [{ name: "c", type: "Common" }] },
      ],
    });
  });

  test("finds imports through import directories", () => {
    const libDir = mkdtempSync(join(dir, "lib-"));
    writeFileSync(join(libDir, "lib.avdl"), "protocol Lib { fixed Hash(4); }");
    const main = write("main.avdl", 'protocol Main { import idl "lib.avdl"; record R { Hash h; } }');

    expect(compileFile(main).errors[0]?.code).toBe("IMPORT_NOT_FOUND");
    expect(compileFile(main, { importDirs: [libDir] }).success).toBe(true);
  });

  test("detects an import cycle back to the root", () => {
    const root = write("a.avdl", 'protocol A { import idl "b.avdl"; }');
    write("b.avdl", 'protocol B { import idl "a.avdl"; }');

    const [error] = compileFile(root).errors;
    expect(error?.code).toBe("IMPORT_CYCLE");
    expect(error?.message).toBe(`Import cycle detected: ${root} -> ${join(dir, "b.avdl")} -> ${root}`);
  });

  test("reports colliding imported types together", () => {
    write("one.avdl", "protocol One { record Dup {} }");
    const main = write("main.avdl", 'protocol Main { record Dup {} import idl "one.avdl"; }');
    expect(compileFile(main).errors[0]).toMatchObject({
      code: "DUPLICATE_DEFINITION",
      message: `duplicate type Dup imported from ${join(dir, "one.avdl")} (already defined in ${main})`,
    });
  });

  test("names both files when a local type repeats an imported one", () => {
    write("one.avdl", "protocol One { record Dup {} }");
    const main = write("main.avdl", 'protocol Main { import idl "one.avdl"; record Dup {} }');
    expect(compileFile(main).errors[0]).toMatchObject({
      code: "DUPLICATE_DEFINITION",
      message: `duplicate type Dup defined in ${main} (already imported from ${join(dir, "one.avdl")})`,
    });
  });

  test("keeps an imported long default exact", () => {
    write(
      "big.avsc",
      '{"type": "record", "name": "Big", "fields": [{"name": "x", "type": "long", "default": 9223372036854775807}, {"name": "y", "type": "long", "default": 9007199254740993}]}'
    );
    const main = write("main.avdl", 'schema Big;\nimport schema "big.avsc";');
    const result = compileFile(main);
    expect(result.errors).toEqual([]);
    expect(result.output).toEqual({
      type: "record",
      name: "Big",
      fields: [
        { name: "x", type: "long", default: 9223372036854775807n },
        { name: "y", type: "long", default: 9007199254740993n },
      ],
    });
  });

  test("keeps the warnings of an imported file when the import fails", () => {
    const imported = write("b.avdl", 'protocol B { /** orphan */ import schema "missing.avsc"; }');
    const main = write("main.avdl", 'protocol Main { import idl "b.avdl"; }');
    const result = compileFile(main);
    expect(result.success).toBe(false);
    expect(result.errors[0]?.code).toBe("IMPORT_NOT_FOUND");
    expect(result.warnings.map((w) => w.code)).toEqual(["ORPHANED_DOC_COMMENT"]);
    expect(result.warnings[0]?.source?.name).toBe(imported);
  });

  test("reads back a named schema written with an annotated reference", () => {
    const { schemata } = compileToNamedSchemata({ text: 'protocol P { record A { @foo("x") B b; } record B {} }' });
    const expected = {
      type: "record",
      name: "A",
      fields: [{ name: "b", type: { type: "record", name: "B", fields: [], foo: "x" } }],
    };
    const [first] = schemata;
    expect(first?.schema).toEqual(expected);

    write("A.avsc", formatJson(first?.schema ?? null));
    const main = write("main.avdl", 'schema A;\nimport schema "A.avsc";');
    const result = compileFile(main);
    expect(result.errors).toEqual([]);
    expect(result.output).toEqual(expected);
  });

  test("locates a syntax error inside an imported file", () => {
    const broken = write("broken.avdl", "protocol Broken { record { } }");
    const main = write("main.avdl", 'protocol Main { import idl "broken.avdl"; }');
    const [error] = compileFile(main).errors;
    expect(error?.code).toBe("SYNTAX_ERROR");
    expect(error?.source?.name).toBe(broken);
    expect(error?.help).toBe(`import chain: ${main} -> ${broken}`);
  });
});

describe("compileToNamedSchemata", () => {
  test("writes one self-contained document per named type", () => {
    const result = compileToNamedSchemata({ text: "protocol P { record A { B b; } record B {} }" });
    expect(result.success).toBe(true);
    expect(result.schemata).toEqual([
      {
        name: "A",
        fullName: "A",
        schema: { type: "record", name: "A", fields: [{ name: "b", type: { type: "record", name: "B", fields: [] } }] },
      },
      { name: "B", fullName: "B", schema: { type: "record", name: "B", fields: [] } },
    ]);
  });

  test("returns no documents when compilation fails", () => {
    const result = compileToNamedSchemata({ text: "protocol P { record A { Missing m; } }" });
    expect(result).toMatchObject({ success: false, schemata: [] });
    expect(result.errors[0]?.code).toBe("UNRESOLVED_REFERENCES");
  });
});
