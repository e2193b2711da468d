/**
 * Schema registry: the single owner of every named type, keyed by full name
 */

import type { Diagnostic } from "../diagnostics/diagnostic.js";
import {
  DuplicateDefinitionError,
  type UnresolvedReference,
  UnresolvedReferencesError,
} from "../diagnostics/errors.js";
import { suggestTypeName } from "../diagnostics/suggest.js";
import {
  type Field,
  type Message,
  type NamedSchema,
  type ReferenceSchema,
  type Schema,
  fullNameOf,
} from "../types/schema.js";
import { checkDefault } from "./defaults.js";
import { validateName, validateNamespace } from "./names.js";

export class SchemaRegistry {
  private readonly schemas = new Map<string, NamedSchema>();
  /** File each type was declared in, for collision reports */
  private readonly origins = new Map<string, string | undefined>();

  /** Register a named type; its full name must be new */
  register(schema: NamedSchema, origin?: string): void {
    const location = { span: schema.span, source: schema.source };
    validateName(schema.name, location);
    if (schema.namespace !== undefined) {
      validateNamespace(schema.namespace, location);
    }
    const fullName = fullNameOf(schema);
    if (this.schemas.has(fullName)) {
      const existing = this.origin(fullName);
      const message =
        existing !== undefined && origin !== undefined && existing !== origin
          ? `duplicate type ${fullName} defined in ${origin} (already imported from ${existing})`
          : undefined;
      throw new DuplicateDefinitionError(fullName, { ...location, label: "defined again here", message });
    }
    this.schemas.set(fullName, schema);
    this.origins.set(fullName, origin);
  }

  lookup(fullName: string): NamedSchema | undefined {
    return this.schemas.get(fullName);
  }

  has(fullName: string): boolean {
    return this.schemas.has(fullName);
  }

  /** Full names in registration order */
  get names(): string[] {
    return [...this.schemas.keys()];
  }

  /** Named types in registration order */
  all(): NamedSchema[] {
    return [...this.schemas.values()];
  }

  origin(fullName: string): string | undefined {
    return this.origins.get(fullName);
  }

  get size(): number {
    return this.schemas.size;
  }

  /**
   * Move every type of an imported unit into this registry. All collisions
   * are reported together.
   */
  merge(imported: SchemaRegistry, importedFile: string, importingFile?: string): void {
    const collisions = imported.names.filter((name) => this.schemas.has(name));
    if (collisions.length > 0) {
      throw collisionError("type", collisions, (name) => this.origin(name) ?? importingFile, importedFile);
    }
    for (const schema of imported.all()) {
      const fullName = fullNameOf(schema);
      this.schemas.set(fullName, schema);
      this.origins.set(fullName, imported.origin(fullName) ?? importedFile);
    }
  }

  // ===========================================================================
  // RESOLUTION
  // ===========================================================================

  /**
   * Check that every reference in the registered types and in `extra` binds
   * to a registered type. Every unresolved name is reported at once.
   */
  resolveAll(extra: Iterable<Schema> = []): void {
    const unresolved = new Map<string, UnresolvedReference>();
    const visit = (ref: ReferenceSchema): void => {
      if (this.schemas.has(ref.fullName) || unresolved.has(ref.fullName)) return;
      unresolved.set(ref.fullName, {
        name: ref.fullName,
        span: ref.span,
        source: ref.source,
        help: suggestTypeName(ref.fullName, this.schemas.keys()),
      });
    };

    for (const schema of this.schemas.values()) {
      forEachReference(schema, visit);
    }
    for (const schema of extra) {
      forEachReference(schema, visit);
    }

    if (unresolved.size > 0) {
      const references = [...unresolved.values()].sort((a, b) => compareStrings(a.name, b.name));
      throw new UnresolvedReferencesError(references);
    }
  }

  /**
   * Validate every default against the resolved type graph, including record
   * completeness and enum symbols.
   */
  validateDefaults(messages: Iterable<Message> = []): void {
    const lookup = (fullName: string): NamedSchema | undefined => this.schemas.get(fullName);
    const checkFields = (fields: Field[], enclosingType: string): void => {
      for (const field of fields) {
        if (field.default === undefined) continue;
        checkDefault(field.schema, field.default, {
          field: field.name,
          enclosingType,
          span: field.span,
          source: field.source,
          lookup,
        });
      }
    };

    for (const schema of this.schemas.values()) {
      if (schema.kind === "record") {
        checkFields(schema.fields, fullNameOf(schema));
      }
    }
    for (const message of messages) {
      checkFields(message.request, message.name);
    }
  }
}

/** Visit every reference reachable without crossing into another named type */
export function forEachReference(schema: Schema, visit: (ref: ReferenceSchema) => void): void {
  switch (schema.kind) {
    case "reference":
      visit(schema);
      return;
    case "record":
      for (const field of schema.fields) forEachReference(field.schema, visit);
      return;
    case "array":
      forEachReference(schema.items, visit);
      return;
    case "map":
      forEachReference(schema.values, visit);
      return;
    case "union":
      for (const branch of schema.branches) forEachReference(branch, visit);
      return;
    default:
      return;
  }
}

/** References of a message: parameters, response and declared errors */
export function messageSchemas(message: Message): Schema[] {
  return [...message.request.map((field) => field.schema), message.response, ...(message.errors ?? [])];
}

/** Bundled duplicate-definition error for an import collision */
export function collisionError(
  what: "type" | "message",
  names: string[],
  existingFile: (name: string) => string | undefined,
  importedFile: string
): DuplicateDefinitionError {
  const related: Diagnostic[] = names.map((name) => {
    const existing = existingFile(name);
    return {
      code: "DUPLICATE_DEFINITION",
      severity: "error",
      message: `duplicate ${what} ${name}: defined in ${existing ?? "the importing file"} and in ${importedFile}`,
      related: [],
    };
  });
  const [first] = names;
  const message =
    names.length === 1 && first !== undefined
      ? `duplicate ${what} ${first} imported from ${importedFile} (already defined in ${existingFile(first) ?? "the importing file"})`
      : `duplicate ${what}s imported from ${importedFile}: ${names.join(", ")}`;
  return new DuplicateDefinitionError(names.join(", "), {
    message,
    related: names.length > 1 ? related : [],
  });
}

function compareStrings(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}
