/**
 * CLI helper tests
 */

import { mkdirSync, mkdtempSync, realpathSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { delimiter, join } from "node:path";
import { compile } from "@avdl/core";
import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { summarize } from "./check.js";
import { schemaFileName } from "./idl2schemata.js";
import { collect, collectIdlFiles, importDirs, rootFor } from "./shared.js";

describe("import directories", () => {
  test("collect appends repeated values", () => {
    expect(collect("b", collect("a", undefined))).toEqual(["a", "b"]);
  });

  test("explicit directories come before AVDL_IMPORT_PATH entries", () => {
    const env = { AVDL_IMPORT_PATH: ["env1", "", "env2"].join(delimiter) };
    expect(importDirs({ importDir: ["flag"] }, env)).toEqual(["flag", "env1", "env2"]);
  });

  test("no flags and no variable give an empty path", () => {
    expect(importDirs({}, {})).toEqual([]);
  });
});

describe("rootFor", () => {
  test("a path becomes a file root", async () => {
    expect(await rootFor("schema.avdl")).toEqual({ path: "schema.avdl" });
  });
});

describe("collectIdlFiles", () => {
  let dir: string;

  beforeEach(() => {
    dir = realpathSync(mkdtempSync(join(tmpdir(), "avdl-cli-")));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  test("walks subdirectories and sorts by path", async () => {
    mkdirSync(join(dir, "nested"));
    writeFileSync(join(dir, "b.avdl"), "");
    writeFileSync(join(dir, "a.avdl"), "");
    writeFileSync(join(dir, "notes.txt"), "");
    writeFileSync(join(dir, "nested", "c.avdl"), "");

    expect(await collectIdlFiles(dir)).toEqual([
      join(dir, "a.avdl"),
      join(dir, "b.avdl"),
      join(dir, "nested", "c.avdl"),
    ]);
  });
});

describe("schemaFileName", () => {
  test("uses the simple name", () => {
    expect(schemaFileName({ name: "User", fullName: "org.example.User", schema: {} })).toBe(
      "User.avsc"
    );
  });
});

describe("summarize", () => {
  const withWarning = "protocol P { record R { string a; /** Dangling. */ } }";

  test("reports error codes with their line", () => {
    const result = compile({ text: "protocol P {\n  record R { Missing m; }\n}" });
    const summary = summarize("p.avdl", result);
    expect(summary.success).toBe(false);
    expect(summary.errors).toHaveLength(1);
    expect(summary.errors[0]?.code).toBe("UNRESOLVED_REFERENCES");
  });

  test("warnings pass unless strict", () => {
    const result = compile({ text: withWarning });
    expect(result.success).toBe(true);
    expect(summarize("p.avdl", result).success).toBe(true);
    expect(summarize("p.avdl", result, true).success).toBe(false);
    expect(summarize("p.avdl", result).warnings[0]?.code).toBe("ORPHANED_DOC_COMMENT");
  });
});
