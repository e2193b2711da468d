/**
 * Error types raised while compiling Avro IDL
 */

import type { Diagnostic, DiagnosticCode, SourceSpan, SourceText } from "./diagnostic.js";
import { formatDiagnostic } from "./render.js";

interface ErrorOptions {
  span?: SourceSpan;
  source?: SourceText;
  label?: string;
  help?: string;
  related?: Diagnostic[];
}

/** Base error class for compilation failures */
export class IdlError extends Error {
  readonly code: DiagnosticCode;
  span?: SourceSpan;
  source?: SourceText;
  readonly label?: string;
  readonly help?: string;
  readonly related: Diagnostic[];
  importChain?: string[];

  constructor(code: DiagnosticCode, message: string, options?: ErrorOptions) {
    super(message);
    this.name = "IdlError";
    this.code = code;
    this.span = options?.span;
    this.source = options?.source;
    this.label = options?.label;
    this.help = options?.help;
    this.related = options?.related ?? [];
  }

  /** Attach a location unless the error already carries one */
  locate(span: SourceSpan | undefined, source: SourceText | undefined): this {
    if (this.span === undefined && this.source === undefined) {
      this.span = span;
      this.source = source;
    }
    return this;
  }

  /** Record the import chain the error surfaced through, innermost wins */
  withImportChain(chain: readonly string[]): this {
    if (this.importChain === undefined && chain.length > 0) {
      this.importChain = [...chain];
    }
    return this;
  }

  toDiagnostic(): Diagnostic {
    const chainHelp =
      this.importChain && this.importChain.length > 0
        ? `import chain: ${this.importChain.join(" -> ")}`
        : undefined;
    return {
      code: this.code,
      severity: "error",
      message: this.message,
      span: this.span,
      source: this.source,
      label: this.label,
      help: [this.help, chainHelp].filter((h) => h !== undefined).join("\n") || undefined,
      related: this.related,
    };
  }

  /** Format error with source context */
  format(): string {
    return formatDiagnostic(this.toDiagnostic());
  }
}

/** Lexer or parser failure */
export class IdlSyntaxError extends IdlError {
  constructor(message: string, options?: ErrorOptions) {
    super("SYNTAX_ERROR", message, options);
    this.name = "IdlSyntaxError";
  }
}

/** Identifier that is not a legal Avro name */
export class InvalidNameError extends IdlError {
  readonly invalidName: string;
  readonly reason: string;

  constructor(name: string, reason: string, options?: ErrorOptions) {
    super("INVALID_NAME", reason, options);
    this.name = "InvalidNameError";
    this.invalidName = name;
    this.reason = reason;
  }
}

/** A full name or message name declared twice */
export class DuplicateDefinitionError extends IdlError {
  readonly duplicateName: string;

  constructor(name: string, options?: ErrorOptions & { message?: string }) {
    super("DUPLICATE_DEFINITION", options?.message ?? `duplicate schema name: ${name}`, options);
    this.name = "DuplicateDefinitionError";
    this.duplicateName = name;
  }
}

export class DuplicateEnumSymbolError extends IdlError {
  readonly enumName: string;
  readonly symbol: string;

  constructor(enumName: string, symbol: string, options?: ErrorOptions) {
    super("DUPLICATE_ENUM_SYMBOL", `duplicate enum symbol: ${symbol} in enum ${enumName}`, {
      label: "repeated here",
      ...options,
    });
    this.name = "DuplicateEnumSymbolError";
    this.enumName = enumName;
    this.symbol = symbol;
  }
}

export class DuplicateNamespaceAnnotationError extends IdlError {
  constructor(options?: ErrorOptions) {
    super("DUPLICATE_NAMESPACE_ANNOTATION", "duplicate @namespace annotation", options);
    this.name = "DuplicateNamespaceAnnotationError";
  }
}

export class NestedUnionError extends IdlError {
  constructor(options?: ErrorOptions) {
    super("NESTED_UNION", "Unions may not immediately contain other unions", options);
    this.name = "NestedUnionError";
  }
}

/** A reference that did not bind to a registered named type */
export interface UnresolvedReference {
  name: string;
  span?: SourceSpan;
  source?: SourceText;
  help?: string;
}

/** Every unresolved reference of a unit, bundled */
export class UnresolvedReferencesError extends IdlError {
  readonly references: UnresolvedReference[];

  constructor(references: UnresolvedReference[]) {
    const [first] = references;
    const single = references.length === 1 ? first : undefined;
    super(
      "UNRESOLVED_REFERENCES",
      single
        ? `Undefined name: ${single.name}`
        : `Undefined names: ${references.map((r) => r.name).join(", ")}`,
      {
        span: single?.span,
        source: single?.source,
        help: single?.help,
        label: single ? "not defined" : undefined,
        related: single
          ? []
          : references.map((r) => ({
              code: "UNRESOLVED_REFERENCES",
              severity: "error",
              message: `Undefined name: ${r.name}`,
              span: r.span,
              source: r.source,
              label: "not defined",
              help: r.help,
              related: [],
            })),
      }
    );
    this.name = "UnresolvedReferencesError";
    this.references = references;
  }
}

/** Default value incompatible with its field's type */
export class InvalidDefaultError extends IdlError {
  readonly field: string;
  readonly enclosingType?: string;
  readonly expected: string;
  readonly actual: string;

  constructor(
    field: string,
    enclosingType: string | undefined,
    expected: string,
    actual: string,
    options?: ErrorOptions
  ) {
    const where = enclosingType ? ` in \`${enclosingType}\`` : "";
    super(
      "INVALID_DEFAULT",
      `Invalid default for field \`${field}\`${where}: expected ${expected}, got ${actual}`,
      options
    );
    this.name = "InvalidDefaultError";
    this.field = field;
    this.enclosingType = enclosingType;
    this.expected = expected;
    this.actual = actual;
  }
}

/** Record default lacking a value for a field without its own default */
export class IncompleteRecordDefaultError extends IdlError {
  readonly field: string;
  readonly enclosingType?: string;
  readonly record: string;
  readonly missingField: string;

  constructor(
    field: string,
    enclosingType: string | undefined,
    record: string,
    missingField: string,
    options?: ErrorOptions
  ) {
    const where = enclosingType ? ` in \`${enclosingType}\`` : "";
    super(
      "INCOMPLETE_RECORD_DEFAULT",
      `Default for field \`${field}\`${where} is incomplete: no value for \`${record}.${missingField}\`, which has no default`,
      options
    );
    this.name = "IncompleteRecordDefaultError";
    this.field = field;
    this.enclosingType = enclosingType;
    this.record = record;
    this.missingField = missingField;
  }
}

export class InvalidLogicalTypeError extends IdlError {
  readonly logicalType: string;
  readonly base: string;
  readonly reason: string;

  constructor(logicalType: string, base: string, reason: string, options?: ErrorOptions) {
    super("INVALID_LOGICAL_TYPE", `Invalid ${logicalType} on ${base}: ${reason}`, options);
    this.name = "InvalidLogicalTypeError";
    this.logicalType = logicalType;
    this.base = base;
    this.reason = reason;
  }
}

/** Numeric value that does not fit its target width */
export class NumericRangeError extends IdlError {
  readonly field: string;
  readonly value: string;
  readonly limit: string;

  constructor(field: string, value: string, limit: string, options?: ErrorOptions) {
    super("NUMERIC_RANGE", `${field} ${value} is out of range (${limit})`, options);
    this.name = "NumericRangeError";
    this.field = field;
    this.value = value;
    this.limit = limit;
  }
}

export class InvalidEscapeError extends IdlError {
  readonly sequence: string;

  constructor(sequence: string, reason: string, options?: ErrorOptions) {
    super("INVALID_ESCAPE", `${reason}: '${sequence}'`, options);
    this.name = "InvalidEscapeError";
    this.sequence = sequence;
  }
}

export class ImportNotFoundError extends IdlError {
  readonly path: string;

  constructor(path: string, searched: readonly string[], options?: ErrorOptions) {
    super(
      "IMPORT_NOT_FOUND",
      `import not found: ${path} (searched ${searched.join(", ")})`,
      options
    );
    this.name = "ImportNotFoundError";
    this.path = path;
  }
}

export class ImportReadError extends IdlError {
  readonly path: string;

  constructor(path: string, cause: string, options?: ErrorOptions) {
    super("IMPORT_READ_ERROR", `failed to read import ${path}: ${cause}`, options);
    this.name = "ImportReadError";
    this.path = path;
  }
}

export class ImportParseError extends IdlError {
  readonly path: string;
  readonly causeMessage: string;

  constructor(path: string, cause: string, options?: ErrorOptions) {
    super("IMPORT_PARSE_ERROR", `failed to parse import ${path}: ${cause}`, options);
    this.name = "ImportParseError";
    this.path = path;
    this.causeMessage = cause;
  }
}

export class ImportCycleError extends IdlError {
  readonly chain: string[];

  constructor(chain: string[], options?: ErrorOptions) {
    super("IMPORT_CYCLE", `Import cycle detected: ${chain.join(" -> ")}`, options);
    this.name = "ImportCycleError";
    this.chain = chain;
  }
}

/** Convert any thrown value into a diagnostic */
export function toDiagnostic(error: unknown): Diagnostic {
  if (error instanceof IdlError) {
    return error.toDiagnostic();
  }
  const message = error instanceof Error ? error.message : String(error);
  return { code: "INTERNAL_ERROR", severity: "error", message, related: [] };
}
