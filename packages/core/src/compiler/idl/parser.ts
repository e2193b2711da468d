/**
 * Recursive descent parser for Avro IDL
 */

import { type SourceSpan, spanFromOffsets } from "../../diagnostics/diagnostic.js";
import { IdlError, IdlSyntaxError } from "../../diagnostics/errors.js";
import { MAX_SCHEMA_DEPTH } from "../json-reader.js";
import type {
  EnumDecl,
  EnumSymbolDecl,
  FieldDecl,
  FixedDecl,
  Identifier,
  IdlFile,
  ImportDecl,
  ImportKind,
  JsonLiteralNode,
  JsonNode,
  MessageDecl,
  NamedSchemaDecl,
  ParameterDecl,
  PlainTypeNode,
  PrimitiveTypeNode,
  PropertyNode,
  ProtocolDecl,
  ProtocolItem,
  RecordDecl,
  ReferenceTypeNode,
  SchemaFileDecl,
  TypeNode,
  VariableDecl,
  VoidTypeNode,
} from "./ast.js";
import { type DocComment, type Token, type TokenType, tokenize } from "./tokenizer.js";

/** Keywords that name a primitive or logical type */
export const TYPE_KEYWORDS = [
  "boolean",
  "int",
  "long",
  "float",
  "double",
  "bytes",
  "string",
  "null",
  "date",
  "time_ms",
  "timestamp_ms",
  "local_timestamp_ms",
  "uuid",
  "decimal",
] as const;

const TYPE_KEYWORD_SET: ReadonlySet<string> = new Set(TYPE_KEYWORDS);

const NAMED_DECLARATION_KEYWORDS = ["record", "error", "enum", "fixed"];

const TYPE_START = ["'@'", "'array'", "'map'", "'union'", ...TYPE_KEYWORDS.map((k) => `'${k}'`), "IDENTIFIER"];

const JSON_VALUE_START = ["'{'", "'['", "STRING", "INTEGER", "FLOAT", "'true'", "'false'", "'null'"];

const PUNCTUATION_TEXT: Partial<Record<TokenType, string>> = {
  LPAREN: "(",
  RPAREN: ")",
  LBRACE: "{",
  RBRACE: "}",
  LBRACKET: "[",
  RBRACKET: "]",
  LT: "<",
  GT: ">",
  COLON: ":",
  SEMICOLON: ";",
  COMMA: ",",
  AT: "@",
  ASSIGN: "=",
  QUESTION: "?",
};

// =============================================================================
// PARSER CLASS
// =============================================================================

export class Parser {
  private readonly tokens: Token[];
  private readonly source: string;
  private readonly sourceName?: string;
  private readonly docComments: DocComment[];
  private readonly consumedDocs = new Set<DocComment>();
  private pos = 0;
  private depth = 0;

  constructor(
    tokens: Token[],
    source: string,
    options?: { sourceName?: string; docComments?: DocComment[] }
  ) {
    this.tokens = tokens;
    this.source = source;
    this.sourceName = options?.sourceName;
    this.docComments = options?.docComments ?? [];
  }

  // ===========================================================================
  // UTILITIES
  // ===========================================================================

  /** Get current token */
  private current(): Token {
    return this.peek(0);
  }

  /** Peek at token at offset */
  private peek(offset = 1): Token {
    return (
      this.tokens[this.pos + offset] ??
      this.tokens[this.tokens.length - 1] ?? {
        type: "EOF",
        value: "",
        location: { line: 0, column: 0, offset: this.source.length },
        end: this.source.length,
      }
    );
  }

  /** Last consumed token */
  private previous(): Token {
    return this.tokens[this.pos - 1] ?? this.current();
  }

  /** Check if current token matches */
  private check(type: TokenType, value?: string): boolean {
    const token = this.current();
    if (token.type !== type) return false;
    if (value !== undefined && token.value !== value) return false;
    return true;
  }

  private checkKeyword(...values: string[]): boolean {
    const token = this.current();
    return token.type === "KEYWORD" && values.includes(token.value);
  }

  /** Advance and return previous token */
  private advance(): Token {
    const token = this.current();
    if (token.type !== "EOF") {
      this.pos++;
    }
    return token;
  }

  /** Expect and consume a specific token */
  private expect(type: TokenType, value?: string): Token {
    if (!this.check(type, value)) {
      throw this.unexpected([describeExpected(type, value)]);
    }
    return this.advance();
  }

  /** Build the error for an unexpected current token */
  private unexpected(expected: string[]): IdlSyntaxError {
    const token = this.current();
    const wanted =
      expected.length === 1 ? (expected[0] ?? "") : `one of {${expected.join(", ")}}`;
    const prev = this.tokens[this.pos - 1];
    const after = prev ? ` after ${this.describeToken(prev)}` : "";
    return new IdlSyntaxError(`Expected ${wanted} but got ${this.describeToken(token)}${after}`, {
      span: this.tokenSpan(token),
      source: { name: this.sourceName, text: this.source },
    });
  }

  private describeToken(token: Token): string {
    if (token.type === "EOF") return "EOF";
    return `${token.type} '${this.source.slice(token.location.offset, token.end)}'`;
  }

  private tokenSpan(token: Token): SourceSpan {
    return spanFromOffsets(token.location.offset, token.end - 1);
  }

  /** Span from a start token through the last consumed token */
  private makeSpan(startToken: Token): SourceSpan {
    return spanFromOffsets(startToken.location.offset, this.previous().end - 1);
  }

  /** Run a nested parse; nesting past the schema depth limit is an error */
  private nested<T>(what: string, parse: () => T): T {
    if (this.depth >= MAX_SCHEMA_DEPTH) {
      throw new IdlError("INVALID_SCHEMA", `${what} nesting exceeds ${MAX_SCHEMA_DEPTH} levels`, {
        span: this.tokenSpan(this.current()),
        source: { name: this.sourceName, text: this.source },
        label: "nested too deeply",
      });
    }
    this.depth++;
    try {
      return parse();
    } finally {
      this.depth--;
    }
  }

  /** Take the doc comment attached to a token */
  private takeDoc(token: Token): DocComment | undefined {
    if (token.doc) {
      this.consumedDocs.add(token.doc);
    }
    return token.doc;
  }

  // ===========================================================================
  // TOP-LEVEL PARSING
  // ===========================================================================

  /** Parse a complete IDL file */
  parseFile(): IdlFile {
    const start = this.current();
    let root: ProtocolDecl | SchemaFileDecl;

    if (this.checkKeyword("namespace", "schema", "import")) {
      root = this.parseSchemaFile(start, []);
    } else {
      const properties = this.parseProperties();
      if (this.checkKeyword("protocol")) {
        root = this.parseProtocol(start, properties);
        this.expect("EOF");
      } else {
        root = this.parseSchemaFile(start, properties);
      }
    }

    return {
      root,
      orphanedDocComments: this.docComments.filter((doc) => !this.consumedDocs.has(doc)),
    };
  }

  /** protocol Name { ... } */
  private parseProtocol(start: Token, properties: PropertyNode[]): ProtocolDecl {
    const doc = this.takeDoc(start);
    this.expect("KEYWORD", "protocol");
    const name = this.parseIdentifier();
    this.expect("LBRACE");

    const items: ProtocolItem[] = [];
    while (!this.check("RBRACE")) {
      if (this.check("EOF")) {
        throw this.unexpected(["'}'"]);
      }
      items.push(this.parseProtocolItem());
    }
    this.expect("RBRACE");

    return { kind: "protocol", doc, properties, name, items, span: this.makeSpan(start) };
  }

  private parseProtocolItem(): ProtocolItem {
    const start = this.current();
    if (this.checkKeyword("import")) {
      return this.parseImport();
    }
    const properties = this.parseProperties();
    if (this.checkKeyword(...NAMED_DECLARATION_KEYWORDS)) {
      return this.parseNamedDeclaration(start, properties);
    }
    return this.parseMessage(start, properties);
  }

  /** [namespace x;] [schema T;] (import | declaration)* */
  private parseSchemaFile(start: Token, leadingProperties: PropertyNode[]): SchemaFileDecl {
    let namespace: Identifier | undefined;
    let mainSchema: TypeNode | undefined;
    const items: Array<ImportDecl | NamedSchemaDecl> = [];
    let pending: PropertyNode[] | undefined = leadingProperties.length > 0 ? leadingProperties : undefined;
    let pendingStart = start;

    if (!pending && this.checkKeyword("namespace")) {
      this.advance();
      namespace = this.parseIdentifier();
      this.expect("SEMICOLON");
    }
    if (!pending && this.checkKeyword("schema")) {
      this.advance();
      mainSchema = this.parseFullType();
      this.expect("SEMICOLON");
    }

    for (;;) {
      if (!pending) {
        if (this.check("EOF")) break;
        if (this.checkKeyword("import")) {
          items.push(this.parseImport());
          continue;
        }
        pendingStart = this.current();
        pending = this.parseProperties();
      }
      if (!this.checkKeyword(...NAMED_DECLARATION_KEYWORDS)) {
        const expected = NAMED_DECLARATION_KEYWORDS.map((k) => `'${k}'`);
        throw this.unexpected(
          pending.length > 0 ? expected : [...expected, "'@'", "'import'", "EOF"]
        );
      }
      items.push(this.parseNamedDeclaration(pendingStart, pending));
      pending = undefined;
    }

    return { kind: "schema-file", namespace, mainSchema, items, span: this.makeSpan(start) };
  }

  /** import idl|protocol|schema "path"; */
  private parseImport(): ImportDecl {
    const start = this.expect("KEYWORD", "import");
    if (!this.checkKeyword("idl", "protocol", "schema")) {
      throw this.unexpected(["'idl'", "'protocol'", "'schema'"]);
    }
    const kindToken = this.advance();
    const importKind: ImportKind =
      kindToken.value === "idl" ? "idl" : kindToken.value === "protocol" ? "protocol" : "schema";
    if (!this.check("STRING")) {
      throw this.unexpected(["STRING"]);
    }
    const location = this.parseJsonLiteral();
    this.expect("SEMICOLON");
    return { kind: "import", importKind, location, span: this.makeSpan(start) };
  }

  // ===========================================================================
  // NAMED SCHEMA DECLARATIONS
  // ===========================================================================

  private parseNamedDeclaration(start: Token, properties: PropertyNode[]): NamedSchemaDecl {
    const doc = this.takeDoc(start);
    if (this.checkKeyword("record", "error")) {
      return this.parseRecord(start, doc, properties);
    }
    if (this.checkKeyword("enum")) {
      return this.parseEnum(start, doc, properties);
    }
    return this.parseFixed(start, doc, properties);
  }

  /** record Name { fields } */
  private parseRecord(
    start: Token,
    doc: DocComment | undefined,
    properties: PropertyNode[]
  ): RecordDecl {
    const isError = this.advance().value === "error";
    const name = this.parseIdentifier();
    this.expect("LBRACE");

    const fields: FieldDecl[] = [];
    while (!this.check("RBRACE")) {
      if (this.check("EOF")) {
        throw this.unexpected(["'}'"]);
      }
      fields.push(this.parseField());
    }
    this.expect("RBRACE");

    return { kind: "record", isError, doc, properties, name, fields, span: this.makeSpan(start) };
  }

  /** Type name [= default] (, name [= default])* ; */
  private parseField(): FieldDecl {
    const start = this.current();
    const doc = this.takeDoc(start);
    const type = this.parseFullType();

    const variables = [this.parseVariable()];
    while (this.check("COMMA")) {
      this.advance();
      variables.push(this.parseVariable());
    }
    if (!this.check("SEMICOLON")) {
      throw this.unexpected(["';'", "','", "'='"]);
    }
    this.advance();

    return { kind: "field", doc, type, variables, span: this.makeSpan(start) };
  }

  private parseVariable(): VariableDecl {
    const start = this.current();
    const doc = this.takeDoc(start);
    const properties = this.parseProperties();
    const name = this.parseIdentifier();
    let defaultValue: JsonNode | undefined;
    if (this.check("ASSIGN")) {
      this.advance();
      defaultValue = this.parseJsonValue();
    }
    return { kind: "variable", doc, properties, name, defaultValue, span: this.makeSpan(start) };
  }

  /** enum Name { A, B } [= A;] */
  private parseEnum(
    start: Token,
    doc: DocComment | undefined,
    properties: PropertyNode[]
  ): EnumDecl {
    this.expect("KEYWORD", "enum");
    const name = this.parseIdentifier();
    this.expect("LBRACE");

    const symbols: EnumSymbolDecl[] = [];
    if (!this.check("RBRACE")) {
      symbols.push(this.parseEnumSymbol());
      while (this.check("COMMA")) {
        this.advance();
        symbols.push(this.parseEnumSymbol());
      }
    }
    if (!this.check("RBRACE")) {
      throw this.unexpected(["','", "'}'"]);
    }
    this.advance();

    let defaultSymbol: Identifier | undefined;
    if (this.check("ASSIGN")) {
      this.advance();
      defaultSymbol = this.parseIdentifier();
      this.expect("SEMICOLON");
    }

    return {
      kind: "enum",
      doc,
      properties,
      name,
      symbols,
      defaultSymbol,
      span: this.makeSpan(start),
    };
  }

  private parseEnumSymbol(): EnumSymbolDecl {
    const start = this.current();
    const doc = this.takeDoc(start);
    const properties = this.parseProperties();
    const name = this.parseIdentifier();
    return { kind: "enum-symbol", doc, properties, name, span: this.makeSpan(start) };
  }

  /** fixed Name(size); */
  private parseFixed(
    start: Token,
    doc: DocComment | undefined,
    properties: PropertyNode[]
  ): FixedDecl {
    this.expect("KEYWORD", "fixed");
    const name = this.parseIdentifier();
    this.expect("LPAREN");
    if (!this.check("INTEGER")) {
      throw this.unexpected(["INTEGER"]);
    }
    const size = this.parseJsonLiteral();
    this.expect("RPAREN");
    this.expect("SEMICOLON");
    return { kind: "fixed", doc, properties, name, size, span: this.makeSpan(start) };
  }

  // ===========================================================================
  // MESSAGES
  // ===========================================================================

  /** Result name(params) [oneway | throws E, ...]; */
  private parseMessage(start: Token, properties: PropertyNode[]): MessageDecl {
    const doc = this.takeDoc(start);

    let result: TypeNode | VoidTypeNode;
    if (this.checkKeyword("void")) {
      const voidToken = this.advance();
      result = { kind: "void", span: this.tokenSpan(voidToken) };
    } else if (this.isTypeStart()) {
      const typeStart = this.current();
      const plain = this.parsePlainType();
      result = { kind: "type", properties: [], type: plain, span: this.makeSpan(typeStart) };
    } else {
      throw this.unexpected([
        "'import'",
        ...NAMED_DECLARATION_KEYWORDS.map((k) => `'${k}'`),
        "'void'",
        ...TYPE_START,
        "'}'",
      ]);
    }

    const name = this.parseIdentifier();
    this.expect("LPAREN");

    const parameters: ParameterDecl[] = [];
    if (!this.check("RPAREN")) {
      parameters.push(this.parseParameter());
      while (this.check("COMMA")) {
        this.advance();
        parameters.push(this.parseParameter());
      }
    }
    if (!this.check("RPAREN")) {
      throw this.unexpected(["','", "')'"]);
    }
    this.advance();

    let oneWay = false;
    let throws: Identifier[] | undefined;
    if (this.checkKeyword("oneway")) {
      this.advance();
      oneWay = true;
    } else if (this.checkKeyword("throws")) {
      this.advance();
      throws = [this.parseIdentifier()];
      while (this.check("COMMA")) {
        this.advance();
        throws.push(this.parseIdentifier());
      }
    }
    if (!this.check("SEMICOLON")) {
      throw this.unexpected(
        oneWay || throws ? ["';'"] : ["';'", "'oneway'", "'throws'"]
      );
    }
    this.advance();

    return {
      kind: "message",
      doc,
      properties,
      result,
      name,
      parameters,
      oneWay,
      throws,
      span: this.makeSpan(start),
    };
  }

  private parseParameter(): ParameterDecl {
    const start = this.current();
    const doc = this.takeDoc(start);
    const type = this.parseFullType();
    const variable = this.parseVariable();
    return { kind: "parameter", doc, type, variable, span: this.makeSpan(start) };
  }

  // ===========================================================================
  // TYPES
  // ===========================================================================

  private isTypeStart(): boolean {
    const token = this.current();
    if (token.type === "IDENTIFIER") return true;
    if (token.type !== "KEYWORD") return false;
    return (
      token.value === "array" ||
      token.value === "map" ||
      token.value === "union" ||
      TYPE_KEYWORD_SET.has(token.value)
    );
  }

  /** Annotations followed by a plain type */
  private parseFullType(): TypeNode {
    return this.nested("schema", () => this.parseTypeNode());
  }

  private parseTypeNode(): TypeNode {
    const start = this.current();
    const properties = this.parseProperties();
    if (!this.isTypeStart()) {
      throw this.unexpected(properties.length > 0 ? TYPE_START.slice(1) : TYPE_START);
    }
    const type = this.parsePlainType();
    return { kind: "type", properties, type, span: this.makeSpan(start) };
  }

  private parsePlainType(): PlainTypeNode {
    const start = this.current();

    if (this.checkKeyword("array")) {
      this.advance();
      this.expect("LT");
      const items = this.parseFullType();
      this.expect("GT");
      return { kind: "array", items, span: this.makeSpan(start) };
    }

    if (this.checkKeyword("map")) {
      this.advance();
      this.expect("LT");
      const values = this.parseFullType();
      this.expect("GT");
      return { kind: "map", values, span: this.makeSpan(start) };
    }

    if (this.checkKeyword("union")) {
      this.advance();
      this.expect("LBRACE");
      const branches = [this.parseFullType()];
      while (this.check("COMMA")) {
        this.advance();
        branches.push(this.parseFullType());
      }
      if (!this.check("RBRACE")) {
        throw this.unexpected(["','", "'}'"]);
      }
      this.advance();
      return { kind: "union", branches, span: this.makeSpan(start) };
    }

    let base: PrimitiveTypeNode | ReferenceTypeNode;
    if (this.check("KEYWORD") && TYPE_KEYWORD_SET.has(this.current().value)) {
      base = this.parsePrimitiveType();
    } else {
      const name = this.parseIdentifier();
      base = { kind: "reference-type", name, span: name.span };
    }

    let optional = false;
    if (this.check("QUESTION")) {
      this.advance();
      optional = true;
    }
    return { kind: "nullable", base, optional, span: this.makeSpan(start) };
  }

  private parsePrimitiveType(): PrimitiveTypeNode {
    const start = this.advance();
    if (start.value !== "decimal") {
      return { kind: "primitive-type", name: start.value, span: this.tokenSpan(start) };
    }

    this.expect("LPAREN");
    if (!this.check("INTEGER")) {
      throw this.unexpected(["INTEGER"]);
    }
    const precision = this.parseJsonLiteral();
    let scale: JsonLiteralNode | undefined;
    if (this.check("COMMA")) {
      this.advance();
      if (!this.check("INTEGER")) {
        throw this.unexpected(["INTEGER"]);
      }
      scale = this.parseJsonLiteral();
    }
    if (!this.check("RPAREN")) {
      throw this.unexpected(["','", "')'"]);
    }
    this.advance();
    return {
      kind: "primitive-type",
      name: "decimal",
      precision,
      scale,
      span: this.makeSpan(start),
    };
  }

  // ===========================================================================
  // IDENTIFIERS AND ANNOTATIONS
  // ===========================================================================

  /** Identifier; keywords are allowed wherever a name is */
  private parseIdentifier(): Identifier {
    const token = this.current();
    if (token.type !== "IDENTIFIER" && token.type !== "KEYWORD") {
      throw this.unexpected(["IDENTIFIER"]);
    }
    this.advance();
    return {
      kind: "identifier",
      text: token.value,
      escaped: token.escaped === true,
      span: this.tokenSpan(token),
    };
  }

  /** Zero or more `@name(value)` annotations */
  private parseProperties(): PropertyNode[] {
    const properties: PropertyNode[] = [];
    while (this.check("AT")) {
      const start = this.advance();
      const name = this.parseIdentifier();
      this.expect("LPAREN");
      const value = this.parseJsonValue();
      this.expect("RPAREN");
      properties.push({ kind: "property", name, value, span: this.makeSpan(start) });
    }
    return properties;
  }

  // ===========================================================================
  // JSON VALUES
  // ===========================================================================

  private parseJsonValue(): JsonNode {
    return this.nested("JSON value", () => this.parseJsonNode());
  }

  private parseJsonNode(): JsonNode {
    const start = this.current();

    if (this.check("LBRACE")) {
      this.advance();
      const entries: Array<{ key: JsonLiteralNode; value: JsonNode }> = [];
      if (!this.check("RBRACE")) {
        entries.push(this.parseJsonEntry());
        while (this.check("COMMA")) {
          this.advance();
          entries.push(this.parseJsonEntry());
        }
      }
      if (!this.check("RBRACE")) {
        throw this.unexpected(["','", "'}'"]);
      }
      this.advance();
      return { kind: "json-object", entries, span: this.makeSpan(start) };
    }

    if (this.check("LBRACKET")) {
      this.advance();
      const items: JsonNode[] = [];
      if (!this.check("RBRACKET")) {
        items.push(this.parseJsonValue());
        while (this.check("COMMA")) {
          this.advance();
          items.push(this.parseJsonValue());
        }
      }
      if (!this.check("RBRACKET")) {
        throw this.unexpected(["','", "']'"]);
      }
      this.advance();
      return { kind: "json-array", items, span: this.makeSpan(start) };
    }

    if (
      this.check("STRING") ||
      this.check("INTEGER") ||
      this.check("FLOAT") ||
      this.checkKeyword("true", "false", "null")
    ) {
      return this.parseJsonLiteral();
    }

    throw this.unexpected(JSON_VALUE_START);
  }

  private parseJsonEntry(): { key: JsonLiteralNode; value: JsonNode } {
    if (!this.check("STRING")) {
      throw this.unexpected(["STRING"]);
    }
    const key = this.parseJsonLiteral();
    this.expect("COLON");
    return { key, value: this.parseJsonValue() };
  }

  private parseJsonLiteral(): JsonLiteralNode {
    const token = this.advance();
    const span = this.tokenSpan(token);
    switch (token.type) {
      case "STRING":
        return { kind: "json-literal", literal: "string", raw: token.value, span };
      case "INTEGER":
        return { kind: "json-literal", literal: "integer", raw: token.value, span };
      case "FLOAT":
        return { kind: "json-literal", literal: "float", raw: token.value, span };
      default:
        return {
          kind: "json-literal",
          literal: token.value === "true" ? "true" : token.value === "false" ? "false" : "null",
          raw: token.value,
          span,
        };
    }
  }
}

function describeExpected(type: TokenType, value?: string): string {
  if (value !== undefined) return `'${value}'`;
  const text = PUNCTUATION_TEXT[type];
  return text !== undefined ? `'${text}'` : type;
}

/** Parse IDL source into a syntax tree */
export function parse(source: string, sourceName?: string): IdlFile {
  const { tokens, docComments } = tokenize(source, sourceName);
  return new Parser(tokens, source, { sourceName, docComments }).parseFile();
}
