/**
 * Tokenizer tests
 */

import { describe, expect, test } from "vitest";
import { IdlSyntaxError } from "../../diagnostics/errors.js";
import { tokenize } from "./tokenizer.js";

function types(source: string): string[] {
  return tokenize(source).tokens.map((token) => token.type);
}

describe("Tokenizer", () => {
  describe("keywords and identifiers", () => {
    test("separates keywords from identifiers", () => {
      const { tokens } = tokenize("record User");
      expect(tokens[0]).toMatchObject({ type: "KEYWORD", value: "record" });
      expect(tokens[1]).toMatchObject({ type: "IDENTIFIER", value: "User" });
      expect(tokens[2]?.type).toBe("EOF");
    });

    test("reads dotted and dashed identifiers as one token", () => {
      const { tokens } = tokenize("org.example.User my-prop");
      expect(tokens[0]).toMatchObject({ type: "IDENTIFIER", value: "org.example.User" });
      expect(tokens[1]).toMatchObject({ type: "IDENTIFIER", value: "my-prop" });
    });

    test("backtick escapes turn keywords into identifiers", () => {
      const { tokens } = tokenize("`record`");
      expect(tokens[0]).toMatchObject({ type: "IDENTIFIER", value: "record", escaped: true });
    });

    test("a dotted name containing a keyword segment is an identifier", () => {
      const { tokens } = tokenize("org.record");
      expect(tokens[0]).toMatchObject({ type: "IDENTIFIER", value: "org.record" });
    });

    test("throws on an empty escaped identifier", () => {
      expect(() => tokenize("``")).toThrow("Empty escaped identifier");
    });
  });

  describe("literals", () => {
    test("keeps string escapes undecoded", () => {
      const { tokens } = tokenize('"a\\nb"');
      expect(tokens[0]).toMatchObject({ type: "STRING", value: "a\\nb" });
    });

    test("accepts single-quoted strings", () => {
      const { tokens } = tokenize("'x'");
      expect(tokens[0]).toMatchObject({ type: "STRING", value: "x" });
    });

    test("throws on an unterminated string", () => {
      expect(() => tokenize('"open')).toThrow(IdlSyntaxError);
    });

    test("classifies integers and floats", () => {
      expect(types("12 -3 0x1F 7L 1.5 2e3 3f -NaN Infinity")).toEqual([
        "INTEGER",
        "INTEGER",
        "INTEGER",
        "INTEGER",
        "FLOAT",
        "FLOAT",
        "FLOAT",
        "FLOAT",
        "FLOAT",
        "EOF",
      ]);
    });

    test("keeps the raw text of numbers", () => {
      const { tokens } = tokenize("1_000L 0x1.8p1");
      expect(tokens[0]?.value).toBe("1_000L");
      expect(tokens[1]).toMatchObject({ type: "FLOAT", value: "0x1.8p1" });
    });

    test("rejects a malformed exponent", () => {
      expect(() => tokenize("1e")).toThrow("Malformed exponent in number");
    });
  });

  describe("punctuation", () => {
    test("emits a token per symbol", () => {
      expect(types("(){}[]<>:;,@=?")).toEqual([
        "LPAREN",
        "RPAREN",
        "LBRACE",
        "RBRACE",
        "LBRACKET",
        "RBRACKET",
        "LT",
        "GT",
        "COLON",
        "SEMICOLON",
        "COMMA",
        "AT",
        "ASSIGN",
        "QUESTION",
        "EOF",
      ]);
    });

    test("throws on an unexpected character", () => {
      expect(() => tokenize("#")).toThrow("Unexpected character '#'");
    });
  });

  describe("comments", () => {
    test("skips line and block comments", () => {
      expect(types("// line\n/* block */ int")).toEqual(["KEYWORD", "EOF"]);
    });

    test("attaches a doc comment to the next token", () => {
      const { tokens, docComments } = tokenize("/** The user. */ record");
      expect(docComments).toHaveLength(1);
      expect(tokens[0]?.doc?.text).toBe("/** The user. */");
    });

    test("a plain comment between detaches the doc comment", () => {
      const { tokens, docComments } = tokenize("/** Lost. */ /* plain */ record");
      expect(docComments).toHaveLength(1);
      expect(tokens[0]?.doc).toBeUndefined();
    });

    test("the empty comment is not a doc comment", () => {
      const { docComments } = tokenize("/**/ int");
      expect(docComments).toHaveLength(0);
    });

    test("throws on an unterminated comment", () => {
      expect(() => tokenize("/* open")).toThrow("Unterminated comment");
    });
  });

  describe("locations", () => {
    test("tracks lines, columns and offsets", () => {
      const { tokens } = tokenize("int\n  long");
      expect(tokens[1]?.location).toEqual({ line: 2, column: 3, offset: 6 });
      expect(tokens[1]?.end).toBe(10);
    });
  });
});
