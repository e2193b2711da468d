/**
 * Namespaces and name validation
 */

import type { SourceSpan, SourceText } from "../diagnostics/diagnostic.js";
import { InvalidNameError } from "../diagnostics/errors.js";

const NAME_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*$/;

/** Names that may not be used for records, enums, fixed types or protocols */
export const RESERVED_TYPE_NAMES: ReadonlySet<string> = new Set([
  "null",
  "boolean",
  "int",
  "long",
  "float",
  "double",
  "bytes",
  "string",
  "date",
  "time_ms",
  "timestamp_ms",
  "local_timestamp_ms",
  "localtimestamp_ms",
  "uuid",
  "decimal",
]);

export function isValidName(name: string): boolean {
  return NAME_PATTERN.test(name);
}

interface Location {
  span?: SourceSpan;
  source?: SourceText;
}

/** Validate a simple (undotted) name */
export function validateName(name: string, location?: Location): void {
  if (!isValidName(name)) {
    throw new InvalidNameError(
      name,
      `invalid Avro name: \`${name}\` (must start with a letter or underscore and contain only letters, digits and underscores)`,
      location
    );
  }
}

/** Validate every segment of a dotted namespace */
export function validateNamespace(namespace: string, location?: Location): void {
  for (const segment of namespace.split(".")) {
    if (!isValidName(segment)) {
      throw new InvalidNameError(
        namespace,
        `invalid Avro namespace segment: \`${segment}\` in \`${namespace}\``,
        location
      );
    }
  }
}

/** Validate a type name as declared, rejecting reserved names unless escaped */
export function validateTypeName(name: string, escaped: boolean, location?: Location): void {
  validateName(name, location);
  if (!escaped && RESERVED_TYPE_NAMES.has(name)) {
    throw new InvalidNameError(name, `Illegal name: ${name}`, {
      ...location,
      help: `escape it as \`${name}\` in backticks to use a reserved word as a type name`,
    });
  }
}

/**
 * Namespace in effect at a point of the tree. Entering a declaration creates a
 * new context; contexts are never mutated.
 */
export class NamespaceContext {
  readonly namespace?: string;

  private constructor(namespace: string | undefined) {
    this.namespace = namespace === "" ? undefined : namespace;
  }

  static root(namespace?: string): NamespaceContext {
    return new NamespaceContext(namespace);
  }

  /** Context for the body of a declaration in the given namespace */
  enter(namespace: string | undefined): NamespaceContext {
    return namespace === this.namespace ? this : new NamespaceContext(namespace);
  }

  /** Full name for a name as written: dotted names are already full */
  qualify(name: string): string {
    if (name.includes(".") || !this.namespace) return name;
    return `${this.namespace}.${name}`;
  }

  /**
   * Namespace of a declaration: a dotted identifier wins over an explicit
   * `@namespace`, which wins over the enclosing namespace.
   */
  namespaceFor(identifier: string, explicit: string | undefined): string | undefined {
    const dot = identifier.lastIndexOf(".");
    if (dot >= 0) {
      const prefix = identifier.slice(0, dot);
      return prefix === "" ? undefined : prefix;
    }
    if (explicit !== undefined) {
      return explicit === "" ? undefined : explicit;
    }
    return this.namespace;
  }
}

/** Simple name of a possibly dotted identifier */
export function simpleName(identifier: string): string {
  return identifier.slice(identifier.lastIndexOf(".") + 1);
}
