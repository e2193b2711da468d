/**
 * Default value validation
 */

import type { SourceSpan, SourceText } from "../diagnostics/diagnostic.js";
import { IdlError, IncompleteRecordDefaultError, InvalidDefaultError } from "../diagnostics/errors.js";
import {
  type JsonValue,
  type NamedSchema,
  type PrimitiveType,
  type Schema,
  describeSchema,
  fullNameOf,
  isJsonObject,
  jsonTypeName,
} from "../types/schema.js";

const INT_MIN = -(2 ** 31);
const INT_MAX = 2 ** 31 - 1;
const LONG_MIN = -(2n ** 63n);
const LONG_MAX = 2n ** 63n - 1n;

const SPECIAL_FLOATS: ReadonlySet<string> = new Set(["NaN", "Infinity", "-Infinity"]);

/** Where a default is being checked */
export interface DefaultContext {
  field: string;
  /** Full name of the record (or message) declaring the field */
  enclosingType?: string;
  span?: SourceSpan;
  source?: SourceText;
  /**
   * Look up a named type. Without it references cannot be followed and any
   * value is accepted for them.
   */
  lookup?: (fullName: string) => NamedSchema | undefined;
}

/** Throw if `value` is not a valid default for `schema` */
export function checkDefault(schema: Schema, value: JsonValue, context: DefaultContext): void {
  const mismatch = (expected: Schema | string, actual = jsonTypeName(value)): InvalidDefaultError =>
    new InvalidDefaultError(
      context.field,
      context.enclosingType,
      typeof expected === "string" ? expected : describeSchema(expected),
      actual,
      { span: context.span, source: context.source }
    );

  switch (schema.kind) {
    case "primitive":
      if (!matchesPrimitive(schema.type, value)) {
        throw mismatch(schema, describeValue(schema.type, value));
      }
      return;

    case "logical":
      if (!matchesPrimitive(schema.base, value)) {
        throw mismatch(schema, describeValue(schema.base, value));
      }
      return;

    case "reference": {
      const target = context.lookup?.(schema.fullName);
      if (target) {
        checkDefault(target, value, context);
      }
      return;
    }

    case "enum":
      if (typeof value !== "string") throw mismatch(schema);
      if (!schema.symbols.includes(value)) {
        throw mismatch(schema, `unknown symbol "${value}"`);
      }
      return;

    case "fixed":
      if (typeof value !== "string") throw mismatch(schema);
      return;

    case "array":
      if (!Array.isArray(value)) throw mismatch(schema);
      for (const item of value) {
        checkDefault(schema.items, item, context);
      }
      return;

    case "map":
      if (!isJsonObject(value)) throw mismatch(schema);
      for (const entry of Object.values(value)) {
        checkDefault(schema.values, entry, context);
      }
      return;

    case "union":
      checkUnionDefault(schema.branches, value, context, () => mismatch(schema));
      return;

    case "record": {
      if (!isJsonObject(value)) throw mismatch(schema);
      for (const field of schema.fields) {
        const provided = value[field.name];
        if (provided !== undefined) {
          checkDefault(field.schema, provided, context);
        } else if (field.default === undefined) {
          throw new IncompleteRecordDefaultError(
            context.field,
            context.enclosingType,
            fullNameOf(schema),
            field.name,
            { span: context.span, source: context.source }
          );
        }
      }
      return;
    }
  }
}

/**
 * A union default may match any branch. When no branch matches, an incomplete
 * record default is the more useful report.
 */
function checkUnionDefault(
  branches: Schema[],
  value: JsonValue,
  context: DefaultContext,
  mismatch: () => InvalidDefaultError
): void {
  let incomplete: IncompleteRecordDefaultError | undefined;
  for (const branch of branches) {
    try {
      checkDefault(branch, value, context);
      return;
    } catch (error) {
      if (!(error instanceof IdlError)) throw error;
      if (error instanceof IncompleteRecordDefaultError && !incomplete) {
        incomplete = error;
      }
    }
  }
  throw incomplete ?? mismatch();
}

function matchesPrimitive(type: PrimitiveType, value: JsonValue): boolean {
  switch (type) {
    case "null":
      return value === null;
    case "boolean":
      return typeof value === "boolean";
    case "int":
      return typeof value === "number" && Number.isInteger(value) && value >= INT_MIN && value <= INT_MAX;
    case "long":
      return (
        (typeof value === "number" && Number.isSafeInteger(value)) ||
        (typeof value === "bigint" && value >= LONG_MIN && value <= LONG_MAX)
      );
    case "float":
    case "double":
      return (
        typeof value === "number" ||
        typeof value === "bigint" ||
        (typeof value === "string" && SPECIAL_FLOATS.has(value))
      );
    case "bytes":
    case "string":
      return typeof value === "string";
  }
}

function describeValue(type: PrimitiveType, value: JsonValue): string {
  if (type === "int" && ((typeof value === "number" && Number.isInteger(value)) || typeof value === "bigint")) {
    return `integer ${value} outside the int range`;
  }
  if (type === "long" && typeof value === "bigint") {
    return `integer ${value} outside the long range`;
  }
  return jsonTypeName(value);
}
