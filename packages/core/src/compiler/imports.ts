/**
 * Import resolution: locating, reading and loading imported files
 */

import { existsSync, readFileSync, realpathSync } from "node:fs";
import { isAbsolute, join, resolve } from "node:path";
import type { Diagnostic, SourceSpan, SourceText } from "../diagnostics/diagnostic.js";
import {
  IdlError,
  ImportCycleError,
  ImportNotFoundError,
  ImportParseError,
  ImportReadError,
} from "../diagnostics/errors.js";
import type { JsonValue, Message } from "../types/schema.js";
import type { ImportKind } from "./idl/ast.js";
import { readProtocolDocument, readSchemaDocument } from "./json-reader.js";
import { parseJsonText } from "./json-text.js";
import { SchemaRegistry } from "./registry.js";

/** Longest chain of nested imports */
export const MAX_IMPORT_DEPTH = 64;

/** Types and messages contributed by one imported file */
export interface ImportedUnit {
  path: string;
  registry: SchemaRegistry;
  messages: Map<string, Message>;
}

/** Builds an imported IDL file into a fresh registry without resolving it */
export type IdlUnitLoader = (path: string, text: string, session: ImportSession) => ImportedUnit;

export interface ImportSessionOptions {
  /** Directories searched after the importing file's own directory */
  importDirs?: string[];
}

/**
 * State of the imports of one top-level compilation: every file visited so
 * far and the chain of files currently being imported.
 */
export class ImportSession {
  readonly importDirs: string[];
  /** Warnings of every file built in this compilation, kept when it fails */
  readonly warnings: Diagnostic[] = [];
  private readonly visited = new Set<string>();
  private readonly stack: string[] = [];

  constructor(options?: ImportSessionOptions) {
    this.importDirs = (options?.importDirs ?? []).map((dir) => resolve(dir));
  }

  /** Files currently being imported, outermost first */
  get chain(): string[] {
    return [...this.stack];
  }

  hasVisited(path: string): boolean {
    return this.visited.has(path);
  }

  /** Canonical path of an import, searching the importing directory first */
  resolve(location: string, fromDir: string): string {
    const searched: string[] = [];
    const candidates = isAbsolute(location)
      ? [location]
      : [fromDir, ...this.importDirs].map((dir) => join(dir, location));
    for (const candidate of candidates) {
      searched.push(candidate);
      if (existsSync(candidate)) {
        return realpathSync(candidate);
      }
    }
    throw new ImportNotFoundError(location, searched);
  }

  /**
   * Start importing a file. Returns false when the file was already imported
   * by this compilation.
   */
  enter(path: string): boolean {
    if (this.stack.includes(path)) {
      throw new ImportCycleError([...this.stack, path]);
    }
    if (this.visited.has(path)) {
      return false;
    }
    if (this.stack.length >= MAX_IMPORT_DEPTH) {
      throw new IdlError(
        "IMPORT_CYCLE",
        `Import chain exceeds ${MAX_IMPORT_DEPTH} nested files at ${path}`
      );
    }
    this.visited.add(path);
    this.stack.push(path);
    return true;
  }

  /** Finish importing the innermost file */
  leave(path: string): void {
    if (this.stack[this.stack.length - 1] === path) {
      this.stack.pop();
    }
  }
}

/** Where an import statement sits, for locating errors */
export interface ImportSite {
  span?: SourceSpan;
  source?: SourceText;
}

/**
 * Load an import. Returns nothing when the file was already imported, so
 * diamond imports contribute their types once.
 */
export function loadImport(
  kind: ImportKind,
  location: string,
  fromDir: string,
  session: ImportSession,
  loadIdl: IdlUnitLoader,
  site: ImportSite
): ImportedUnit | undefined {
  let path: string;
  try {
    path = session.resolve(location, fromDir);
    if (!session.enter(path)) {
      return undefined;
    }
  } catch (error) {
    if (error instanceof IdlError) {
      error.locate(site.span, site.source).withImportChain(session.chain);
    }
    throw error;
  }

  try {
    const text = readImport(path);
    if (kind === "idl") {
      return loadIdl(path, text, session);
    }

    const json = parseJson(path, text);
    const registry = new SchemaRegistry();
    if (kind === "schema") {
      readSchemaDocument(json, registry, path);
      return { path, registry, messages: new Map() };
    }
    const protocol = readProtocolDocument(json, registry, path);
    return { path, registry, messages: protocol.messages };
  } catch (error) {
    if (error instanceof IdlError) {
      error.locate(undefined, { name: path, text: "" }).withImportChain(session.chain);
    }
    throw error;
  } finally {
    session.leave(path);
  }
}

function readImport(path: string): string {
  try {
    return readFileSync(path, "utf8");
  } catch (error) {
    throw new ImportReadError(path, error instanceof Error ? error.message : String(error));
  }
}

function parseJson(path: string, text: string): JsonValue {
  try {
    return parseJsonText(text);
  } catch (error) {
    throw new ImportParseError(path, error instanceof Error ? error.message : String(error));
  }
}
