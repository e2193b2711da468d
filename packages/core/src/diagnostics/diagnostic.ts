/**
 * Uniform diagnostic values shared by every compiler stage
 */

/** Position in source text, 1-based line and column, 0-based offset */
export interface SourceLocation {
  line: number;
  column: number;
  offset: number;
}

/** Region of source text as a code-unit offset and length */
export interface SourceSpan {
  offset: number;
  length: number;
}

/** A named source text a span points into */
export interface SourceText {
  name?: string;
  text: string;
}

export type Severity = "error" | "warning";

export type DiagnosticCode =
  | "SYNTAX_ERROR"
  | "INVALID_NAME"
  | "DUPLICATE_DEFINITION"
  | "DUPLICATE_ENUM_SYMBOL"
  | "DUPLICATE_NAMESPACE_ANNOTATION"
  | "DUPLICATE_PROPERTY"
  | "DUPLICATE_FIELD"
  | "NESTED_UNION"
  | "UNRESOLVED_REFERENCES"
  | "INVALID_DEFAULT"
  | "INCOMPLETE_RECORD_DEFAULT"
  | "INVALID_LOGICAL_TYPE"
  | "INVALID_ESCAPE"
  | "INVALID_ANNOTATION"
  | "INVALID_MESSAGE"
  | "INVALID_SCHEMA"
  | "NUMERIC_RANGE"
  | "IMPORT_NOT_FOUND"
  | "IMPORT_READ_ERROR"
  | "IMPORT_PARSE_ERROR"
  | "IMPORT_CYCLE"
  | "ORPHANED_DOC_COMMENT"
  | "IGNORED_ANNOTATION"
  | "FILE_READ_ERROR"
  | "INTERNAL_ERROR";

export interface Diagnostic {
  code: DiagnosticCode;
  severity: Severity;
  message: string;
  span?: SourceSpan;
  source?: SourceText;
  label?: string;
  help?: string;
  related: Diagnostic[];
}

/**
 * Build a span from a start offset and an inclusive stop offset.
 * Negative or inverted offsets give a zero-length span.
 */
export function spanFromOffsets(start: number, stop: number): SourceSpan {
  if (!Number.isInteger(start) || start < 0) {
    return { offset: 0, length: 0 };
  }
  if (!Number.isInteger(stop) || stop < start) {
    return { offset: start, length: 0 };
  }
  return { offset: start, length: stop - start + 1 };
}

/** Smallest span covering both spans */
export function joinSpans(a: SourceSpan, b: SourceSpan): SourceSpan {
  const start = Math.min(a.offset, b.offset);
  const end = Math.max(a.offset + a.length, b.offset + b.length);
  return { offset: start, length: end - start };
}

/** Resolve an offset to a 1-based line and column */
export function locate(text: string, offset: number): SourceLocation {
  const clamped = Math.max(0, Math.min(offset, text.length));
  let line = 1;
  let lineStart = 0;
  for (let i = 0; i < clamped; i++) {
    if (text.charCodeAt(i) === 10) {
      line++;
      lineStart = i + 1;
    }
  }
  return { line, column: clamped - lineStart + 1, offset: clamped };
}

/** Create a warning diagnostic */
export function warning(
  code: DiagnosticCode,
  message: string,
  options?: { span?: SourceSpan; source?: SourceText; help?: string; label?: string }
): Diagnostic {
  return {
    code,
    severity: "warning",
    message,
    span: options?.span,
    source: options?.source,
    label: options?.label,
    help: options?.help,
    related: [],
  };
}
