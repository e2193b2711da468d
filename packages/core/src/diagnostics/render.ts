/**
 * Plain-text rendering of diagnostics with source context
 */

import { type Diagnostic, locate } from "./diagnostic.js";

/** Format a diagnostic with its source line and an underline */
export function formatDiagnostic(diagnostic: Diagnostic, indent = ""): string {
  const lines: string[] = [];
  const kind = diagnostic.severity === "warning" ? "Warning" : "Error";
  const source = diagnostic.source;
  const span = diagnostic.span;
  const file = source?.name ? ` in ${source.name}` : "";

  if (source && span) {
    const at = locate(source.text, span.offset);
    lines.push(`${kind} [${diagnostic.code}]${file} at line ${at.line}, column ${at.column}:`);
  } else {
    lines.push(`${kind} [${diagnostic.code}]${file}:`);
  }

  lines.push(`  ${diagnostic.message}`);

  if (source && span) {
    const at = locate(source.text, span.offset);
    const sourceLine = source.text.split("\n")[at.line - 1];
    if (sourceLine !== undefined) {
      const gutter = String(at.line);
      const width = Math.max(1, Math.min(span.length, sourceLine.length - at.column + 1));
      const underline = `${" ".repeat(at.column - 1)}${"^".repeat(width)}`;
      lines.push("");
      lines.push(`  ${gutter} | ${sourceLine.replace(/\r$/, "")}`);
      lines.push(
        `  ${" ".repeat(gutter.length)} | ${underline}${diagnostic.label ? ` ${diagnostic.label}` : ""}`
      );
    }
  }

  if (diagnostic.help) {
    for (const helpLine of diagnostic.help.split("\n")) {
      lines.push(`  help: ${helpLine}`);
    }
  }

  for (const related of diagnostic.related) {
    lines.push("");
    lines.push(formatDiagnostic(related, "  "));
  }

  return lines.map((line) => (line === "" ? line : `${indent}${line}`)).join("\n");
}

/** Format multiple diagnostics */
export function formatDiagnostics(diagnostics: Diagnostic[]): string {
  return diagnostics.map((d) => formatDiagnostic(d)).join("\n\n");
}
