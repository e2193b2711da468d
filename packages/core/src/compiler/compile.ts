/**
 * Compile entry points: IDL source in, JSON documents and diagnostics out
 */

import { readFileSync, realpathSync } from "node:fs";
import { dirname, resolve } from "node:path";
import type { Diagnostic, SourceText } from "../diagnostics/diagnostic.js";
import { enrichParserMessage } from "../diagnostics/enrich.js";
import { IdlError, toDiagnostic } from "../diagnostics/errors.js";
import type { CompilationResult, NamedSchemataResult, SchemaDocument } from "../types/result.js";
import { type JsonValue, type Message, type Schema, fullNameOf } from "../types/schema.js";
import { type BuiltUnit, buildIdl } from "./builder.js";
import { ImportSession } from "./imports.js";
import { messageSchemas } from "./registry.js";
import { JsonSerializer } from "./serializer.js";

/** Root of a compilation: a file on disk or in-memory text */
export type RootSource = { path: string } | { text: string; name?: string };

export interface CompileOptions {
  /** Directories searched for imports after the importing file's directory */
  importDirs?: string[];
}

// =============================================================================
// PIPELINE
// =============================================================================

/** Built and resolved unit, or the diagnostics that stopped it */
type Outcome =
  | { ok: true; unit: BuiltUnit; warnings: Diagnostic[] }
  | { ok: false; errors: Diagnostic[]; warnings: Diagnostic[] };

function run(root: RootSource, options?: CompileOptions): Outcome {
  const session = new ImportSession({ importDirs: options?.importDirs });
  try {
    const { source, path, baseDir } = readRoot(root, session);
    const unit = buildIdl(source.text, source, { path, baseDir, session });

    const messages = [...unit.messages.values()];
    const extra: Schema[] = messages.flatMap(messageSchemas);
    if (unit.mainSchema) extra.push(unit.mainSchema);
    unit.registry.resolveAll(extra);
    unit.registry.validateDefaults(messages);
    checkThrows(unit, messages);

    return { ok: true, unit, warnings: session.warnings };
  } catch (error) {
    return { ok: false, errors: [diagnose(error)], warnings: session.warnings };
  }
}

function readRoot(
  root: RootSource,
  session: ImportSession
): { source: SourceText; path?: string; baseDir: string } {
  if ("text" in root) {
    return {
      source: { name: root.name, text: root.text },
      baseDir: root.name ? dirname(resolve(root.name)) : process.cwd(),
    };
  }

  let text: string;
  let canonical: string;
  try {
    text = readFileSync(root.path, "utf8");
    canonical = realpathSync(root.path);
  } catch (error) {
    const cause = error instanceof Error ? error.message : String(error);
    throw new IdlError("FILE_READ_ERROR", `Failed to read file: ${cause}`);
  }
  // The root counts as visited, so importing it back is a cycle
  session.enter(canonical);
  return { source: { name: root.path, text }, path: canonical, baseDir: dirname(canonical) };
}

/** Every `throws` clause must name an error record */
function checkThrows(unit: BuiltUnit, messages: Message[]): void {
  for (const message of messages) {
    for (const ref of message.errors ?? []) {
      const target = unit.registry.lookup(ref.fullName);
      if (target?.kind === "record" && target.isError) continue;
      throw new IdlError(
        "INVALID_MESSAGE",
        `Message '${message.name}' throws ${ref.fullName}, which is not an error type`,
        { span: ref.span, source: ref.source, label: "not an error" }
      );
    }
  }
}

function diagnose(error: unknown): Diagnostic {
  const diagnostic = toDiagnostic(error);
  if (diagnostic.code === "SYNTAX_ERROR") {
    return { ...diagnostic, message: enrichParserMessage(diagnostic.message) };
  }
  return diagnostic;
}

// =============================================================================
// ENTRY POINTS
// =============================================================================

/**
 * Compile an IDL file or text. Protocol files produce a protocol document;
 * schema files produce their main schema, or an array of every declared type
 * when there is none.
 */
export function compile(root: RootSource, options?: CompileOptions): CompilationResult {
  const outcome = run(root, options);
  if (!outcome.ok) {
    return { success: false, errors: outcome.errors, warnings: outcome.warnings };
  }

  const { unit, warnings } = outcome;
  const serializer = new JsonSerializer(unit.registry);
  let output: JsonValue;
  if (unit.protocol) {
    output = serializer.protocol(unit.protocol);
  } else if (unit.mainSchema) {
    output = serializer.schema(unit.mainSchema, undefined);
  } else if (unit.registry.size > 0) {
    output = unit.registry.all().map((schema) => serializer.named(schema, undefined));
  } else {
    const error = new IdlError(
      "INVALID_SCHEMA",
      "IDL file contains neither a protocol nor a schema declaration"
    );
    return { success: false, errors: [error.toDiagnostic()], warnings };
  }
  return { success: true, output, errors: [], warnings };
}

/** Compile an IDL file from disk */
export function compileFile(path: string, options?: CompileOptions): CompilationResult {
  return compile({ path }, options);
}

/**
 * Compile to one document per named type. Each document inlines every type
 * it depends on.
 */
export function compileToNamedSchemata(
  root: RootSource,
  options?: CompileOptions
): NamedSchemataResult {
  const outcome = run(root, options);
  if (!outcome.ok) {
    return { success: false, schemata: [], errors: outcome.errors, warnings: outcome.warnings };
  }

  const { registry } = outcome.unit;
  const schemata: SchemaDocument[] = registry.all().map((schema) => ({
    name: schema.name,
    fullName: fullNameOf(schema),
    schema: new JsonSerializer(registry).named(schema, undefined),
  }));
  return { success: true, schemata, errors: [], warnings: outcome.warnings };
}
