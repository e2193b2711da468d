/**
 * Decoding of string, integer and floating point literals
 */

import type { SourceSpan, SourceText } from "../diagnostics/diagnostic.js";
import { InvalidEscapeError, NumericRangeError } from "../diagnostics/errors.js";

const SIMPLE_ESCAPES: Record<string, string> = {
  b: "\b",
  t: "\t",
  n: "\n",
  f: "\f",
  r: "\r",
  '"': '"',
  "'": "'",
  "\\": "\\",
};

const HEX4 = /^[0-9a-fA-F]{4}$/;

/** Where a literal sits in its source, for pointing at bad escapes */
export interface LiteralOrigin {
  /** Offset of the first character after the opening quote */
  offset: number;
  source?: SourceText;
}

/**
 * Decode the escapes of a string literal body. Unicode escapes pairing a high
 * and a low surrogate combine into one code point; octal escapes take up to
 * three digits and must not exceed 0o377.
 */
export function decodeEscapes(raw: string, origin?: LiteralOrigin): string {
  const units: number[] = [];
  let i = 0;

  const fail = (start: number, end: number, reason: string): InvalidEscapeError =>
    new InvalidEscapeError(raw.slice(start, end), reason, {
      span: origin ? spanAt(origin.offset + start, end - start) : undefined,
      source: origin?.source,
    });

  while (i < raw.length) {
    const char = raw[i] ?? "";
    if (char !== "\\") {
      units.push(raw.charCodeAt(i));
      i++;
      continue;
    }

    const start = i;
    const next = raw[i + 1];
    if (next === undefined) {
      throw fail(start, i + 1, "Incomplete escape sequence");
    }

    const simple = SIMPLE_ESCAPES[next];
    if (simple !== undefined) {
      units.push(simple.charCodeAt(0));
      i += 2;
      continue;
    }

    if (next === "u") {
      let j = i + 1;
      while (raw[j] === "u") j++;
      const hex = raw.slice(j, j + 4);
      if (!HEX4.test(hex)) {
        throw fail(start, Math.min(raw.length, j + 4), "Invalid unicode escape");
      }
      units.push(Number.parseInt(hex, 16));
      i = j + 4;
      continue;
    }

    if (next >= "0" && next <= "7") {
      let j = i + 1;
      while (j < i + 4 && (raw[j] ?? "") >= "0" && (raw[j] ?? "") <= "7") j++;
      const value = Number.parseInt(raw.slice(i + 1, j), 8);
      if (value > 0o377) {
        throw fail(start, j, "Octal escape out of range");
      }
      units.push(value);
      i = j;
      continue;
    }

    throw fail(start, i + 2, "Invalid escape sequence");
  }

  return combineSurrogates(units);
}

/** Build a string from UTF-16 units, pairing adjacent high and low surrogates */
function combineSurrogates(units: number[]): string {
  const codePoints: number[] = [];
  for (let i = 0; i < units.length; i++) {
    const unit = units[i] ?? 0;
    const following = units[i + 1];
    if (
      unit >= 0xd800 &&
      unit <= 0xdbff &&
      following !== undefined &&
      following >= 0xdc00 &&
      following <= 0xdfff
    ) {
      codePoints.push((unit - 0xd800) * 0x400 + (following - 0xdc00) + 0x10000);
      i++;
    } else {
      codePoints.push(unit);
    }
  }
  let result = "";
  for (const codePoint of codePoints) {
    result += String.fromCodePoint(codePoint);
  }
  return result;
}

function spanAt(offset: number, length: number): SourceSpan {
  return { offset, length };
}

// =============================================================================
// NUMBERS
// =============================================================================

const LONG_MIN = -(2n ** 63n);
const LONG_MAX = 2n ** 63n - 1n;

/**
 * Parse an integer literal: `_` separators, optional sign, `L` suffix, hex
 * `0x` and octal leading-zero forms. Any 64-bit signed value is accepted;
 * values past the exactly representable double range come back as `bigint`.
 */
export function parseIntegerLiteral(
  raw: string,
  options?: { span?: SourceSpan; source?: SourceText }
): number | bigint {
  let text = raw.replace(/_/g, "");
  let negative = false;
  if (text.startsWith("-")) {
    negative = true;
    text = text.slice(1);
  }
  if (text.endsWith("l") || text.endsWith("L")) {
    text = text.slice(0, -1);
  }

  let magnitude: bigint;
  if (/^0[xX][0-9a-fA-F]+$/.test(text)) {
    magnitude = BigInt(`0x${text.slice(2)}`);
  } else if (/^0[0-7]+$/.test(text)) {
    magnitude = BigInt(`0o${text.slice(1)}`);
  } else if (/^[0-9]+$/.test(text)) {
    magnitude = BigInt(text);
  } else {
    throw new NumericRangeError("integer literal", raw, "not a valid integer", options);
  }

  const value = negative ? -magnitude : magnitude;
  if (value > LONG_MAX || value < LONG_MIN) {
    throw new NumericRangeError(
      "integer literal",
      raw,
      `must be within ${LONG_MIN} to ${LONG_MAX}`,
      options
    );
  }
  return exactInteger(value);
}

/** A `number` when the value survives the conversion, else the `bigint` */
export function exactInteger(value: bigint): number | bigint {
  const small = Number(value);
  return Number.isSafeInteger(small) ? small : value;
}

/** Parse a floating point literal; `NaN` and the infinities become strings */
export function parseFloatLiteral(raw: string): number | string {
  let text = raw.replace(/_/g, "");
  if (text === "NaN" || text === "-NaN") return "NaN";
  if (text === "Infinity") return "Infinity";
  if (text === "-Infinity") return "-Infinity";

  if (/[fFdD]$/.test(text) && !/^-?0[xX]/.test(text)) {
    text = text.slice(0, -1);
  }

  const hex = /^(-?)0[xX]([0-9a-fA-F]*)(?:\.([0-9a-fA-F]*))?[pP]([+-]?[0-9]+)[fFdD]?$/.exec(text);
  if (hex) {
    const [, sign = "", whole = "", fraction = "", exponent = "0"] = hex;
    let mantissa = whole === "" ? 0 : Number.parseInt(whole, 16);
    for (let i = 0; i < fraction.length; i++) {
      mantissa += Number.parseInt(fraction[i] ?? "0", 16) / 16 ** (i + 1);
    }
    const value = mantissa * 2 ** Number.parseInt(exponent, 10);
    return sign === "-" ? -value : value;
  }

  return Number(text);
}
