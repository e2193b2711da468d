/**
 * JSON text in and out, keeping integers outside the safe double range exact
 */

import { parse, stringify } from "lossless-json";
import type { JsonObject, JsonValue } from "../types/schema.js";
import { exactInteger } from "./literals.js";

const INTEGER = /^-?[0-9]+$/;

function parseNumber(text: string): number | bigint {
  return INTEGER.test(text) ? exactInteger(BigInt(text)) : Number(text);
}

function toJsonValue(value: unknown): JsonValue {
  if (value === null || typeof value === "boolean" || typeof value === "string") return value;
  if (typeof value === "number" || typeof value === "bigint") return value;
  if (Array.isArray(value)) return value.map(toJsonValue);
  if (typeof value === "object") {
    const object: JsonObject = {};
    for (const [key, entry] of Object.entries(value)) {
      object[key] = toJsonValue(entry);
    }
    return object;
  }
  throw new TypeError(`unexpected ${typeof value} in parsed JSON`);
}

/** Parse JSON text; throws the parser's SyntaxError on malformed input */
export function parseJsonText(text: string): JsonValue {
  return toJsonValue(parse(text, null, parseNumber));
}

/** Serialize a JSON value, with `bigint` written as plain digits */
export function stringifyJson(value: JsonValue, indent?: number): string {
  return stringify(value, null, indent) ?? "null";
}
