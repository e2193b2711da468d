/**
 * Parser message enrichment tests
 */

import { describe, expect, test } from "vitest";
import { parse } from "../compiler/idl/parser.js";
import { enrichParserMessage } from "./enrich.js";
import { IdlSyntaxError } from "./errors.js";

function rawMessage(source: string): string {
  try {
    parse(source);
  } catch (error) {
    if (error instanceof IdlSyntaxError) return error.message;
    throw error;
  }
  throw new Error("expected a syntax error");
}

describe("enrichParserMessage", () => {
  test("renames token classes and punctuation", () => {
    expect(enrichParserMessage("Expected IDENTIFIER but got RBRACE '}' after KEYWORD 'int'")).toBe(
      "Expected identifier but got '}'"
    );
  });

  test("names literals and end of file", () => {
    expect(enrichParserMessage("Expected ';' but got STRING '\"x\"' after IDENTIFIER 'a'")).toBe(
      "Expected ';' but got string literal '\"x\"'"
    );
    expect(enrichParserMessage("Expected '}' but got EOF after LBRACE '{'")).toBe(
      "Expected '}' but got end of file"
    );
  });

  test("names a type keyword token as a type name", () => {
    expect(enrichParserMessage("Expected IDENTIFIER but got KEYWORD 'int'")).toBe(
      "Expected identifier but got type name 'int'"
    );
    expect(enrichParserMessage("Expected IDENTIFIER but got KEYWORD 'record'")).toBe(
      "Expected identifier but got keyword 'record'"
    );
  });

  test("collapses the type keywords into one entry", () => {
    const raw = rawMessage("protocol P { record R { 5 } }");
    expect(enrichParserMessage(raw)).toBe(
      "Expected one of: '@', 'array', 'map', 'union', type name, identifier but got integer literal '5'"
    );
  });

  test("caps long alternative lists", () => {
    const raw = rawMessage("protocol P { 5 }");
    expect(enrichParserMessage(raw)).toBe(
      "Expected one of: 'import', 'record', 'error', 'enum', 'fixed', 'void', '@', 'array', ... but got integer literal '5'"
    );
  });

  test("spots a type keyword run into the field name", () => {
    const raw = rawMessage("protocol P { record R { stringname; } }");
    expect(raw).toBe("Expected IDENTIFIER but got SEMICOLON ';' after IDENTIFIER 'stringname'");
    expect(enrichParserMessage(raw)).toBe(
      "Expected identifier but got ';'; 'stringname' looks like 'string' and 'name' run together; add a space between them"
    );
  });

  test("spots a declaration keyword run into the type name", () => {
    expect(enrichParserMessage(rawMessage("recordFoo {}"))).toBe(
      "Expected one of: 'record', 'error', 'enum', 'fixed', '@', 'import', end of file but got identifier 'recordFoo'; 'recordFoo' looks like 'record' and 'Foo' run together; add a space between them"
    );
  });

  test("suggests the closest keyword for a typo", () => {
    expect(enrichParserMessage(rawMessage("recrod Foo {}"))).toBe(
      "Expected one of: 'record', 'error', 'enum', 'fixed', '@', 'import', end of file but got identifier 'recrod'; did you mean 'record'?"
    );
  });

  test("leaves other messages unchanged", () => {
    expect(enrichParserMessage("Unterminated string literal")).toBe("Unterminated string literal");
  });
});
