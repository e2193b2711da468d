/**
 * Import resolution tests
 */

import { mkdirSync, mkdtempSync, realpathSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { IdlError, ImportCycleError, ImportNotFoundError } from "../diagnostics/errors.js";
import { loadIdlUnit } from "./builder.js";
import { ImportSession, MAX_IMPORT_DEPTH, loadImport } from "./imports.js";

let dir: string;

beforeEach(() => {
  dir = realpathSync(mkdtempSync(join(tmpdir(), "avdl-imports-")));
});

afterEach(() => {
  rmSync(dir, { recursive: true, force: true });
});

function write(name: string, text: string): string {
  const path = join(dir, name);
  writeFileSync(path, text);
  return path;
}

describe("ImportSession", () => {
  test("resolves against the importing directory first, then import dirs", () => {
    const libDir = join(dir, "lib");
    mkdirSync(libDir);
    writeFileSync(join(libDir, "shared.avsc"), '"int"');
    const local = write("shared.avsc", '"long"');

    const session = new ImportSession({ importDirs: [libDir] });
    expect(session.resolve("shared.avsc", dir)).toBe(local);
    expect(session.resolve("shared.avsc", join(dir, "elsewhere"))).toBe(join(libDir, "shared.avsc"));
  });

  test("lists the searched paths when an import is missing", () => {
    const session = new ImportSession();
    expect(() => session.resolve("missing.avdl", dir)).toThrow(
      `import not found: missing.avdl (searched ${join(dir, "missing.avdl")})`
    );
  });

  test("enters each file once and detects cycles", () => {
    const session = new ImportSession();
    expect(session.enter("/a.avdl")).toBe(true);
    expect(session.enter("/b.avdl")).toBe(true);
    expect(() => session.enter("/a.avdl")).toThrow(ImportCycleError);
    session.leave("/b.avdl");
    expect(session.enter("/b.avdl")).toBe(false);
    expect(session.chain).toEqual(["/a.avdl"]);
  });

  test("limits the depth of an import chain", () => {
    const session = new ImportSession();
    for (let i = 0; i < MAX_IMPORT_DEPTH; i++) {
      session.enter(`/f${i}.avdl`);
    }
    expect(() => session.enter("/deep.avdl")).toThrow(`Import chain exceeds ${MAX_IMPORT_DEPTH} nested files`);
  });
});

describe("loadImport", () => {
  test("loads a JSON schema into its own registry", () => {
    write("status.avsc", '{"type": "enum", "name": "Status", "namespace": "org.x", "symbols": ["ON"]}');
    const unit = loadImport("schema", "status.avsc", dir, new ImportSession(), loadIdlUnit, {});
    expect(unit?.registry.names).toEqual(["org.x.Status"]);
    expect(unit?.messages.size).toBe(0);
  });

  test("loads a JSON protocol with its messages", () => {
    write(
      "greeter.avpr",
      JSON.stringify({ protocol: "Greeter", messages: { hi: { request: [], response: "string" } } })
    );
    const unit = loadImport("protocol", "greeter.avpr", dir, new ImportSession(), loadIdlUnit, {});
    expect([...(unit?.messages.keys() ?? [])]).toEqual(["hi"]);
  });

  test("loads an IDL file without resolving it", () => {
    write("part.avdl", "protocol Part { record Uses { Elsewhere e; } }");
    const unit = loadImport("idl", "part.avdl", dir, new ImportSession(), loadIdlUnit, {});
    expect(unit?.registry.names).toEqual(["Uses"]);
  });

  test("skips a file already imported", () => {
    write("once.avsc", '{"type": "fixed", "name": "Once", "size": 1}');
    const session = new ImportSession();
    expect(loadImport("schema", "once.avsc", dir, session, loadIdlUnit, {})).toBeDefined();
    expect(loadImport("schema", "once.avsc", dir, session, loadIdlUnit, {})).toBeUndefined();
  });

  test("reports malformed JSON as a parse error located in the imported file", () => {
    const path = write("broken.avsc", "{ not json");
    try {
      loadImport("schema", "broken.avsc", dir, new ImportSession(), loadIdlUnit, {});
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(IdlError);
      if (error instanceof IdlError) {
        expect(error.code).toBe("IMPORT_PARSE_ERROR");
        expect(error.source?.name).toBe(path);
      }
    }
  });

  test("locates a missing import at the import statement", () => {
    const site = { span: { offset: 4, length: 10 }, source: { name: "main.avdl", text: "x" } };
    try {
      loadImport("idl", "nowhere.avdl", dir, new ImportSession(), loadIdlUnit, site);
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ImportNotFoundError);
      if (error instanceof ImportNotFoundError) {
        expect(error.span).toEqual(site.span);
        expect(error.source?.name).toBe("main.avdl");
      }
    }
  });
});
