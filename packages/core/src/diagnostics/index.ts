/**
 * Diagnostics exports
 */

export * from "./diagnostic.js";
export * from "./errors.js";
export { formatDiagnostic, formatDiagnostics } from "./render.js";
export { enrichParserMessage } from "./enrich.js";
export { closestMatch, levenshtein, suggestTypeName } from "./suggest.js";
