/**
 * Union construction and branch checks
 */

import type { SourceSpan, SourceText } from "../diagnostics/diagnostic.js";
import { IdlError, NestedUnionError } from "../diagnostics/errors.js";
import { type Schema, type UnionSchema, unionBranchKey } from "../types/schema.js";

/**
 * Build a union, rejecting nested unions and repeated branches. `spans`, when
 * given, holds the span of each branch for error reporting.
 */
export function makeUnion(
  branches: Schema[],
  options?: { nullable?: boolean; spans?: SourceSpan[]; source?: SourceText; span?: SourceSpan }
): UnionSchema {
  const seen = new Set<string>();
  branches.forEach((branch, index) => {
    const span = options?.spans?.[index] ?? options?.span;
    if (branch.kind === "union") {
      throw new NestedUnionError({ span, source: options?.source, label: "nested union" });
    }
    const key = unionBranchKey(branch);
    if (seen.has(key)) {
      throw new IdlError("INVALID_SCHEMA", `Duplicate in union: ${key}`, {
        span,
        source: options?.source,
        label: "repeated branch",
      });
    }
    seen.add(key);
  });
  return { kind: "union", branches, nullable: options?.nullable ?? false };
}
