/**
 * Logical type promotion rules
 */

import type { SourceSpan, SourceText } from "../diagnostics/diagnostic.js";
import { NumericRangeError } from "../diagnostics/errors.js";
import type { JsonObject, JsonValue, LogicalType, PrimitiveType } from "../types/schema.js";

export const INT32_MAX = 2 ** 31 - 1;
export const UINT32_MAX = 2 ** 32 - 1;

/** Base a logical type may annotate */
export type LogicalBase = PrimitiveType | "fixed";

interface LogicalRule {
  bases: readonly LogicalBase[];
  /** Required size when the base is fixed */
  fixedSize?: number;
  /** Takes precision and scale parameters */
  decimal?: boolean;
}

/** Which bases each recognized logical type accepts */
export const LOGICAL_TYPE_RULES: Readonly<Record<LogicalType, LogicalRule>> = {
  decimal: { bases: ["bytes", "fixed"], decimal: true },
  date: { bases: ["int"] },
  "time-millis": { bases: ["int"] },
  "time-micros": { bases: ["long"] },
  "timestamp-millis": { bases: ["long"] },
  "timestamp-micros": { bases: ["long"] },
  "local-timestamp-millis": { bases: ["long"] },
  "local-timestamp-micros": { bases: ["long"] },
  uuid: { bases: ["string"] },
  duration: { bases: ["fixed"], fixedSize: 12 },
};

function isLogicalType(name: string): name is LogicalType {
  return Object.prototype.hasOwnProperty.call(LOGICAL_TYPE_RULES, name);
}

export type Promotion =
  | { promoted: true; logicalType: LogicalType; precision?: number; scale?: number }
  | { promoted: false; reason: string };

/**
 * Decide whether a `logicalType` annotation turns its base into a logical
 * type. Rejected combinations stay plain properties on the base; only
 * parameters that overflow their width are errors.
 */
export function decidePromotion(
  logicalType: string,
  base: LogicalBase,
  parameters: { precision?: JsonValue; scale?: JsonValue; fixedSize?: number },
  location?: { span?: SourceSpan; source?: SourceText }
): Promotion {
  if (!isLogicalType(logicalType)) {
    return { promoted: false, reason: `unknown logical type ${logicalType}` };
  }
  const rule = LOGICAL_TYPE_RULES[logicalType];
  if (!rule.bases.includes(base)) {
    return { promoted: false, reason: `${logicalType} cannot annotate ${base}` };
  }
  if (rule.fixedSize !== undefined && parameters.fixedSize !== rule.fixedSize) {
    return { promoted: false, reason: `${logicalType} requires fixed size ${rule.fixedSize}` };
  }
  if (!rule.decimal) {
    return { promoted: true, logicalType };
  }

  const precision = parameters.precision;
  const scale = parameters.scale ?? 0;
  if (typeof precision === "bigint" || (typeof precision === "number" && precision > INT32_MAX)) {
    throw new NumericRangeError("decimal precision", String(precision), `at most ${INT32_MAX}`, location);
  }
  if (typeof scale === "bigint" || (typeof scale === "number" && scale > INT32_MAX)) {
    throw new NumericRangeError("decimal scale", String(scale), `at most ${INT32_MAX}`, location);
  }
  if (typeof precision !== "number" || !Number.isInteger(precision)) {
    return { promoted: false, reason: "decimal precision must be an integer" };
  }
  if (typeof scale !== "number" || !Number.isInteger(scale)) {
    return { promoted: false, reason: "decimal scale must be an integer" };
  }
  if (precision < 1) {
    return { promoted: false, reason: "decimal precision must be at least 1" };
  }
  if (scale < 0 || scale > precision) {
    return { promoted: false, reason: "decimal scale must be between 0 and the precision" };
  }
  if (base === "fixed" && parameters.fixedSize !== undefined) {
    const maxPrecision = maxDecimalPrecision(parameters.fixedSize);
    if (precision > maxPrecision) {
      return {
        promoted: false,
        reason: `fixed(${parameters.fixedSize}) holds at most ${maxPrecision} digits`,
      };
    }
  }
  return { promoted: true, logicalType, precision, scale };
}

/** Largest decimal precision a two's-complement value of `size` bytes can hold */
export function maxDecimalPrecision(size: number): number {
  if (size <= 0) return 0;
  return Math.floor(Math.log10(2) * (8 * size - 1));
}

/** Split the logical keys off an annotation map */
export function withoutLogicalKeys(properties: JsonObject, decimal: boolean): JsonObject {
  const rest: JsonObject = {};
  for (const [key, value] of Object.entries(properties)) {
    if (key === "logicalType") continue;
    if (decimal && (key === "precision" || key === "scale")) continue;
    rest[key] = value;
  }
  return rest;
}
