/**
 * Tokenizer for Avro IDL source text
 */

import { type SourceLocation, spanFromOffsets } from "../../diagnostics/diagnostic.js";
import { IdlSyntaxError } from "../../diagnostics/errors.js";

// =============================================================================
// TOKEN TYPES
// =============================================================================

export type TokenType =
  | "EOF"
  // Identifiers and keywords
  | "IDENTIFIER"
  | "KEYWORD"
  // Literals (value holds the raw, undecoded text)
  | "STRING"
  | "INTEGER"
  | "FLOAT"
  // Punctuation
  | "LPAREN" // (
  | "RPAREN" // )
  | "LBRACE" // {
  | "RBRACE" // }
  | "LBRACKET" // [
  | "RBRACKET" // ]
  | "LT" // <
  | "GT" // >
  | "COLON" // :
  | "SEMICOLON" // ;
  | "COMMA" // ,
  | "AT" // @
  | "ASSIGN" // =
  | "QUESTION"; // ?

/** `/** ... *\/` comment, kept out of the token stream */
export interface DocComment {
  /** Full comment text including delimiters */
  text: string;
  location: SourceLocation;
  end: number;
}

/** Token with location info */
export interface Token {
  type: TokenType;
  /** Identifier text without backticks, string content without quotes, or raw literal text */
  value: string;
  location: SourceLocation;
  /** Offset just past the token */
  end: number;
  /** Last identifier segment was written in backticks */
  escaped?: boolean;
  /** Doc comment separated from this token only by whitespace */
  doc?: DocComment;
}

/** Reserved words of Avro IDL */
export const KEYWORDS = new Set([
  "protocol",
  "namespace",
  "import",
  "idl",
  "schema",
  "enum",
  "fixed",
  "error",
  "record",
  "array",
  "map",
  "union",
  "boolean",
  "int",
  "long",
  "float",
  "double",
  "string",
  "bytes",
  "null",
  "true",
  "false",
  "decimal",
  "date",
  "time_ms",
  "timestamp_ms",
  "local_timestamp_ms",
  "uuid",
  "void",
  "oneway",
  "throws",
]);

const PUNCTUATION: Record<string, TokenType> = {
  "(": "LPAREN",
  ")": "RPAREN",
  "{": "LBRACE",
  "}": "RBRACE",
  "[": "LBRACKET",
  "]": "RBRACKET",
  "<": "LT",
  ">": "GT",
  ":": "COLON",
  ";": "SEMICOLON",
  ",": "COMMA",
  "@": "AT",
  "=": "ASSIGN",
  "?": "QUESTION",
};

const IDENTIFIER_START = /[\p{L}_$]/u;
const IDENTIFIER_PART = /[\p{L}\p{N}_$]/u;
const DIGIT = /[0-9]/;
const HEX_DIGIT = /[0-9a-fA-F_]/;

// =============================================================================
// TOKENIZER CLASS
// =============================================================================

export class Tokenizer {
  private readonly source: string;
  private readonly sourceName?: string;
  private pos = 0;
  private line = 1;
  private column = 1;
  private tokens: Token[] = [];
  private docComments: DocComment[] = [];
  private pendingDoc?: DocComment;

  constructor(source: string, sourceName?: string) {
    this.source = source;
    this.sourceName = sourceName;
  }

  /** Tokenize the entire source */
  tokenize(): { tokens: Token[]; docComments: DocComment[] } {
    while (this.pos < this.source.length) {
      this.scanToken();
    }
    this.emit("EOF", "", this.location());
    return { tokens: this.tokens, docComments: this.docComments };
  }

  /** Get current character */
  private current(): string {
    return this.source[this.pos] ?? "";
  }

  /** Peek at next character */
  private peek(offset = 1): string {
    return this.source[this.pos + offset] ?? "";
  }

  /** Advance position and update line/column tracking */
  private advance(): string {
    const char = this.current();
    this.pos++;
    if (char === "\n") {
      this.line++;
      this.column = 1;
    } else {
      this.column++;
    }
    return char;
  }

  private advanceBy(count: number): void {
    for (let i = 0; i < count; i++) this.advance();
  }

  /** Get current location */
  private location(): SourceLocation {
    return { line: this.line, column: this.column, offset: this.pos };
  }

  /** Emit a token ending at the current position */
  private emit(
    type: TokenType,
    value: string,
    location: SourceLocation,
    extra?: { escaped?: boolean }
  ): void {
    const token: Token = { type, value, location, end: this.pos };
    if (extra?.escaped) token.escaped = true;
    if (this.pendingDoc) {
      token.doc = this.pendingDoc;
      this.pendingDoc = undefined;
    }
    this.tokens.push(token);
  }

  private error(message: string, start: number, stop = start): IdlSyntaxError {
    return new IdlSyntaxError(message, {
      span: spanFromOffsets(start, stop),
      source: { name: this.sourceName, text: this.source },
    });
  }

  /** Scan a single token */
  private scanToken(): void {
    const char = this.current();

    // Whitespace
    if (char === " " || char === "\t" || char === "\n" || char === "\r" || char === "\f") {
      this.advance();
      return;
    }

    const start = this.location();

    // Comments
    if (char === "/" && this.peek() === "/") {
      this.pendingDoc = undefined;
      while (this.pos < this.source.length && this.current() !== "\n") {
        this.advance();
      }
      return;
    }
    if (char === "/" && this.peek() === "*") {
      this.scanBlockComment(start);
      return;
    }

    // String literal
    if (char === '"' || char === "'") {
      this.scanString(char, start);
      return;
    }

    // Numbers, including signed forms and the named floats
    if (DIGIT.test(char) || (char === "-" && this.startsNumber(1))) {
      this.scanNumber(start);
      return;
    }

    // Identifier or keyword
    if (char === "`" || IDENTIFIER_START.test(char)) {
      this.scanIdentifier(start);
      return;
    }

    const punctuation = PUNCTUATION[char];
    if (punctuation) {
      this.advance();
      this.emit(punctuation, char, start);
      return;
    }

    throw this.error(`Unexpected character '${char}'`, start.offset);
  }

  private startsNumber(offset: number): boolean {
    const next = this.peek(offset);
    if (DIGIT.test(next)) return true;
    return (
      this.source.startsWith("NaN", this.pos + offset) ||
      this.source.startsWith("Infinity", this.pos + offset)
    );
  }

  /** Scan `/* *\/`, `/** *\/` and the empty `/**\/` comment */
  private scanBlockComment(start: SourceLocation): void {
    const close = this.source.indexOf("*/", this.pos + 2);
    if (close < 0) {
      throw this.error("Unterminated comment", start.offset, this.source.length - 1);
    }
    const text = this.source.slice(this.pos, close + 2);
    this.advanceBy(text.length);

    if (text === "/**/") {
      // Empty comment keeps any pending doc comment attached
      return;
    }
    if (text.startsWith("/**") && text.length > 5 && text[3] !== "/") {
      const doc: DocComment = { text, location: start, end: this.pos };
      this.docComments.push(doc);
      this.pendingDoc = doc;
      return;
    }
    this.pendingDoc = undefined;
  }

  /** Scan a string literal, keeping escapes undecoded */
  private scanString(quote: string, start: SourceLocation): void {
    this.advance(); // opening quote
    const contentStart = this.pos;

    while (this.current() !== quote) {
      const char = this.current();
      if (this.pos >= this.source.length || char === "\n" || char === "\r") {
        throw this.error("Unterminated string literal", start.offset, this.pos - 1);
      }
      if (char === "\\") {
        this.advance();
        if (this.pos >= this.source.length) {
          throw this.error("Unterminated string literal", start.offset, this.pos - 1);
        }
      }
      this.advance();
    }

    const value = this.source.slice(contentStart, this.pos);
    this.advance(); // closing quote
    this.emit("STRING", value, start);
  }

  /** Scan integer and floating point literals */
  private scanNumber(start: SourceLocation): void {
    if (this.current() === "-") this.advance();

    for (const named of ["NaN", "Infinity"]) {
      if (this.source.startsWith(named, this.pos)) {
        this.advanceBy(named.length);
        this.emit("FLOAT", this.source.slice(start.offset, this.pos), start);
        return;
      }
    }

    let isFloat = false;

    if (this.current() === "0" && (this.peek() === "x" || this.peek() === "X")) {
      this.advanceBy(2);
      while (HEX_DIGIT.test(this.current())) this.advance();
      if (this.current() === "." || this.current() === "p" || this.current() === "P") {
        isFloat = true;
        if (this.current() === ".") {
          this.advance();
          while (HEX_DIGIT.test(this.current())) this.advance();
        }
        if (this.current() !== "p" && this.current() !== "P") {
          throw this.error(
            "Hexadecimal floating point literal requires a 'p' exponent",
            start.offset,
            this.pos - 1
          );
        }
        this.scanExponent(start);
      }
    } else {
      while (DIGIT.test(this.current()) || this.current() === "_") this.advance();
      if (this.current() === "." && DIGIT.test(this.peek())) {
        isFloat = true;
        this.advance();
        while (DIGIT.test(this.current()) || this.current() === "_") this.advance();
      }
      if (this.current() === "e" || this.current() === "E") {
        isFloat = true;
        this.scanExponent(start);
      }
    }

    if (isFloat || /[fFdD]/.test(this.current())) {
      if (/[fFdD]/.test(this.current())) this.advance();
      this.emit("FLOAT", this.source.slice(start.offset, this.pos), start);
      return;
    }

    if (this.current() === "l" || this.current() === "L") this.advance();
    this.emit("INTEGER", this.source.slice(start.offset, this.pos), start);
  }

  private scanExponent(start: SourceLocation): void {
    this.advance(); // e, E, p or P
    if (this.current() === "+" || this.current() === "-") this.advance();
    if (!DIGIT.test(this.current())) {
      throw this.error("Malformed exponent in number", start.offset, this.pos - 1);
    }
    while (DIGIT.test(this.current()) || this.current() === "_") this.advance();
  }

  /** Scan a possibly dotted or dashed identifier, with optional backtick escapes */
  private scanIdentifier(start: SourceLocation): void {
    let value = "";
    let parts = 0;
    let escaped = false;

    for (;;) {
      if (this.current() === "`") {
        const partStart = this.pos;
        this.advance();
        let part = "";
        while (this.current() !== "`") {
          if (this.pos >= this.source.length || !IDENTIFIER_PART.test(this.current())) {
            throw this.error("Unterminated escaped identifier", partStart, this.pos - 1);
          }
          part += this.advance();
        }
        this.advance(); // closing backtick
        if (part === "") {
          throw this.error("Empty escaped identifier", partStart, this.pos - 1);
        }
        value += part;
        escaped = true;
      } else {
        while (IDENTIFIER_PART.test(this.current())) {
          value += this.advance();
        }
        escaped = false;
      }
      parts++;

      const separator = this.current();
      const next = this.peek();
      if ((separator === "." || separator === "-") && (next === "`" || IDENTIFIER_START.test(next))) {
        value += this.advance();
        continue;
      }
      break;
    }

    if (parts === 1 && !escaped && KEYWORDS.has(value)) {
      this.emit("KEYWORD", value, start);
      return;
    }
    if (parts === 1 && !escaped && (value === "NaN" || value === "Infinity")) {
      this.emit("FLOAT", value, start);
      return;
    }
    this.emit("IDENTIFIER", value, start, { escaped });
  }
}

/** Tokenize a source string */
export function tokenize(
  source: string,
  sourceName?: string
): { tokens: Token[]; docComments: DocComment[] } {
  return new Tokenizer(source, sourceName).tokenize();
}
