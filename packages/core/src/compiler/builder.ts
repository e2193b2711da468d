/**
 * Builder: turns a parsed IDL file into schema model values and registers
 * its named types
 */

import { dirname } from "node:path";
import {
  type Diagnostic,
  type SourceSpan,
  type SourceText,
  spanFromOffsets,
  warning,
} from "../diagnostics/diagnostic.js";
import {
  DuplicateDefinitionError,
  DuplicateEnumSymbolError,
  DuplicateNamespaceAnnotationError,
  IdlError,
  InvalidLogicalTypeError,
  NumericRangeError,
} from "../diagnostics/errors.js";
import {
  type EnumSchema,
  type Field,
  type FieldOrder,
  type FixedSchema,
  type JsonObject,
  type JsonValue,
  type LogicalSchema,
  type Message,
  type Protocol,
  type RecordSchema,
  type ReferenceSchema,
  type Schema,
  fullNameOf,
  isPrimitiveType,
  primitive,
  reference,
} from "../types/schema.js";
import type {
  EnumDecl,
  FieldDecl,
  FixedDecl,
  Identifier,
  IdlFile,
  ImportDecl,
  JsonLiteralNode,
  JsonNode,
  MessageDecl,
  NamedSchemaDecl,
  PrimitiveTypeNode,
  PropertyNode,
  ProtocolDecl,
  RecordDecl,
  SchemaFileDecl,
  TypeNode,
  VariableDecl,
} from "./idl/ast.js";
import { parse } from "./idl/parser.js";
import { checkDefault } from "./defaults.js";
import { docText } from "./doc-comments.js";
import { type ImportSession, type ImportedUnit, loadImport } from "./imports.js";
import { decodeEscapes, parseFloatLiteral, parseIntegerLiteral } from "./literals.js";
import { INT32_MAX, UINT32_MAX, decidePromotion, withoutLogicalKeys } from "./logical.js";
import {
  NamespaceContext,
  simpleName,
  validateName,
  validateNamespace,
  validateTypeName,
} from "./names.js";
import { SchemaRegistry, collisionError } from "./registry.js";
import { makeUnion } from "./unions.js";

/** Logical types written as IDL keywords */
const KEYWORD_LOGICAL_TYPES: Readonly<Record<string, Pick<LogicalSchema, "logicalType" | "base">>> = {
  date: { logicalType: "date", base: "int" },
  time_ms: { logicalType: "time-millis", base: "int" },
  timestamp_ms: { logicalType: "timestamp-millis", base: "long" },
  local_timestamp_ms: { logicalType: "local-timestamp-millis", base: "long" },
  uuid: { logicalType: "uuid", base: "string" },
};

const FIELD_ORDERS: Readonly<Record<string, FieldOrder>> = {
  ascending: "ascending",
  descending: "descending",
  ignore: "ignore",
};

/** Result of building one IDL file */
export interface BuiltUnit {
  registry: SchemaRegistry;
  /** Set for protocol files */
  protocol?: Protocol;
  /** Main schema of a schema file, when it declares one */
  mainSchema?: Schema;
  messages: Map<string, Message>;
  warnings: Diagnostic[];
}

export interface BuildOptions {
  /** Path of the file, when it was read from disk */
  path?: string;
  /** Directory its relative imports are resolved against */
  baseDir: string;
  session: ImportSession;
}

/** Annotations of one declaration, split into intercepted ones and the rest */
interface SortedProperties {
  properties: JsonObject;
  intercepted: Map<string, { value: JsonValue; node: PropertyNode }>;
}

// =============================================================================
// BUILDER CLASS
// =============================================================================

export class IdlBuilder {
  private readonly file: IdlFile;
  private readonly source: SourceText;
  private readonly options: BuildOptions;
  private readonly registry = new SchemaRegistry();
  private readonly messages = new Map<string, Message>();
  /** Warnings of this file */
  readonly warnings: Diagnostic[] = [];

  constructor(file: IdlFile, source: SourceText, options: BuildOptions) {
    this.file = file;
    this.source = source;
    this.options = options;
  }

  /** Build every declaration; references are left for the resolver */
  build(): BuiltUnit {
    for (const comment of this.file.orphanedDocComments) {
      this.warn(
        warning("ORPHANED_DOC_COMMENT", "Ignoring out-of-place documentation comment", {
          span: spanFromOffsets(comment.location.offset, comment.end - 1),
          source: this.source,
          help: "Did you mean to use a multiline comment ( /* ... */ ) instead?",
        })
      );
    }

    const root = this.file.root;
    return root.kind === "protocol" ? this.buildProtocol(root) : this.buildSchemaFile(root);
  }

  /** Record a warning here and in the session, which outlives a failed build */
  private warn(diagnostic: Diagnostic): void {
    this.warnings.push(diagnostic);
    this.options.session.warnings.push(diagnostic);
  }

  // ===========================================================================
  // FILES
  // ===========================================================================

  private buildProtocol(decl: ProtocolDecl): BuiltUnit {
    const sorted = this.sortProperties(decl.properties, ["namespace"]);
    const explicit = this.namespaceAnnotation(sorted);
    const namespace = NamespaceContext.root().namespaceFor(decl.name.text, explicit);
    const name = simpleName(decl.name.text);
    validateTypeName(name, decl.name.escaped, this.at(decl.name.span));
    if (namespace !== undefined) {
      validateNamespace(namespace, this.at(decl.name.span));
    }

    const context = NamespaceContext.root(namespace);
    for (const item of decl.items) {
      switch (item.kind) {
        case "import":
          this.buildImport(item);
          break;
        case "message":
          this.addMessage(this.buildMessage(item, context), item.name);
          break;
        default:
          this.buildNamed(item, context);
      }
    }

    const protocol: Protocol = {
      name,
      namespace,
      doc: docText(decl.doc),
      properties: sorted.properties,
      types: this.registry.names,
      messages: this.messages,
    };
    return {
      registry: this.registry,
      protocol,
      messages: this.messages,
      warnings: this.warnings,
    };
  }

  private buildSchemaFile(decl: SchemaFileDecl): BuiltUnit {
    let namespace: string | undefined;
    if (decl.namespace) {
      namespace = decl.namespace.text;
      validateNamespace(namespace, this.at(decl.namespace.span));
    }
    const context = NamespaceContext.root(namespace);

    for (const item of decl.items) {
      if (item.kind === "import") {
        this.buildImport(item);
      } else {
        this.buildNamed(item, context);
      }
    }

    const mainSchema = decl.mainSchema ? this.buildType(decl.mainSchema, context) : undefined;
    return {
      registry: this.registry,
      mainSchema,
      messages: this.messages,
      warnings: this.warnings,
    };
  }

  // ===========================================================================
  // IMPORTS
  // ===========================================================================

  private buildImport(decl: ImportDecl): void {
    const location = this.stringValue(decl.location);
    const unit = loadImport(
      decl.importKind,
      location,
      this.options.baseDir,
      this.options.session,
      loadIdlUnit,
      this.at(decl.span)
    );
    if (!unit) return;

    const importer = this.options.path ?? this.source.name;
    try {
      this.registry.merge(unit.registry, unit.path, importer);
    } catch (error) {
      if (error instanceof IdlError) error.locate(decl.span, this.source);
      throw error;
    }

    const collisions = [...unit.messages.keys()].filter((name) => this.messages.has(name));
    if (collisions.length > 0) {
      throw collisionError("message", collisions, () => importer, unit.path).locate(
        decl.span,
        this.source
      );
    }
    for (const [name, message] of unit.messages) {
      this.messages.set(name, message);
    }
  }

  // ===========================================================================
  // NAMED TYPES
  // ===========================================================================

  private buildNamed(decl: NamedSchemaDecl, context: NamespaceContext): void {
    const schema =
      decl.kind === "record"
        ? this.buildRecord(decl, context)
        : decl.kind === "enum"
          ? this.buildEnum(decl, context)
          : this.buildFixed(decl, context);
    this.registry.register(schema, this.options.path ?? this.source.name);
  }

  /** Name, namespace and aliases common to named declarations */
  private namedParts(
    decl: NamedSchemaDecl,
    context: NamespaceContext
  ): { name: string; namespace?: string; aliases: string[]; properties: JsonObject } {
    const sorted = this.sortProperties(decl.properties, ["namespace", "aliases"]);
    const explicit = this.namespaceAnnotation(sorted);
    const name = simpleName(decl.name.text);
    const location = this.at(decl.name.span);
    validateTypeName(name, decl.name.escaped, location);
    const namespace = context.namespaceFor(decl.name.text, explicit);
    if (namespace !== undefined) {
      validateNamespace(namespace, location);
    }
    return {
      name,
      namespace,
      aliases: this.aliasesAnnotation(sorted),
      properties: sorted.properties,
    };
  }

  private buildRecord(decl: RecordDecl, context: NamespaceContext): RecordSchema {
    const parts = this.namedParts(decl, context);
    const record: RecordSchema = {
      kind: "record",
      name: parts.name,
      namespace: parts.namespace,
      doc: docText(decl.doc),
      fields: [],
      aliases: parts.aliases,
      properties: parts.properties,
      isError: decl.isError,
      span: decl.name.span,
      source: this.source,
    };
    const fullName = fullNameOf(record);
    const inner = context.enter(record.namespace);

    const names = new Set<string>();
    for (const fieldDecl of decl.fields) {
      for (const field of this.buildFields(fieldDecl, inner, fullName)) {
        if (names.has(field.name)) {
          throw new IdlError(
            "DUPLICATE_FIELD",
            `duplicate field name: ${field.name} in record ${fullName}`,
            { span: field.span, source: this.source, label: "declared again here" }
          );
        }
        names.add(field.name);
        record.fields.push(field);
      }
    }
    return record;
  }

  private buildEnum(decl: EnumDecl, context: NamespaceContext): EnumSchema {
    const parts = this.namedParts(decl, context);
    const fullName = parts.namespace ? `${parts.namespace}.${parts.name}` : parts.name;

    const symbols: string[] = [];
    for (const symbol of decl.symbols) {
      const name = symbol.name.text;
      validateName(name, this.at(symbol.name.span));
      if (symbols.includes(name)) {
        throw new DuplicateEnumSymbolError(fullName, name, this.at(symbol.name.span));
      }
      for (const property of symbol.properties) {
        this.ignoredAnnotation(property, "enum symbols cannot carry properties");
      }
      symbols.push(name);
    }

    let defaultSymbol: string | undefined;
    if (decl.defaultSymbol) {
      defaultSymbol = decl.defaultSymbol.text;
      if (!symbols.includes(defaultSymbol)) {
        throw new IdlError(
          "INVALID_DEFAULT",
          `Default symbol \`${defaultSymbol}\` is not a symbol of enum \`${fullName}\``,
          this.at(decl.defaultSymbol.span)
        );
      }
    }

    return {
      kind: "enum",
      name: parts.name,
      namespace: parts.namespace,
      doc: docText(decl.doc),
      symbols,
      default: defaultSymbol,
      aliases: parts.aliases,
      properties: parts.properties,
      span: decl.name.span,
      source: this.source,
    };
  }

  private buildFixed(decl: FixedDecl, context: NamespaceContext): FixedSchema {
    const parts = this.namedParts(decl, context);
    const size = parseIntegerLiteral(decl.size.raw, this.at(decl.size.span));
    if (typeof size === "bigint" || size < 0 || size > UINT32_MAX) {
      throw new NumericRangeError("fixed size", decl.size.raw, `0 to ${UINT32_MAX}`, this.at(decl.size.span));
    }

    const schema: FixedSchema = {
      kind: "fixed",
      name: parts.name,
      namespace: parts.namespace,
      doc: docText(decl.doc),
      size,
      aliases: parts.aliases,
      properties: parts.properties,
      span: decl.name.span,
      source: this.source,
    };

    const logicalType = parts.properties.logicalType;
    if (typeof logicalType === "string") {
      const promotion = decidePromotion(
        logicalType,
        "fixed",
        { precision: parts.properties.precision, scale: parts.properties.scale, fixedSize: size },
        this.at(decl.span)
      );
      if (promotion.promoted) {
        schema.properties = withoutLogicalKeys(parts.properties, promotion.logicalType === "decimal");
        schema.logical = {
          logicalType: promotion.logicalType,
          precision: promotion.precision,
          scale: promotion.scale,
        };
      }
    }
    return schema;
  }

  // ===========================================================================
  // FIELDS
  // ===========================================================================

  /** One field per variable of a field declaration */
  private buildFields(decl: FieldDecl, context: NamespaceContext, enclosingType: string): Field[] {
    return decl.variables.map((variable) =>
      this.buildVariable(variable, decl.type, docText(decl.doc), context, enclosingType)
    );
  }

  private buildVariable(
    variable: VariableDecl,
    typeNode: TypeNode,
    inheritedDoc: string | undefined,
    context: NamespaceContext,
    enclosingType: string
  ): Field {
    const name = variable.name.text;
    const location = this.at(variable.name.span);
    validateName(name, location);

    const sorted = this.sortProperties(variable.properties, ["aliases", "order"]);
    const defaultValue = variable.defaultValue ? this.jsonValue(variable.defaultValue) : undefined;
    const schema = this.buildType(typeNode, context, defaultValue);

    if (defaultValue !== undefined) {
      checkDefault(schema, defaultValue, {
        field: name,
        enclosingType,
        span: variable.defaultValue?.span,
        source: this.source,
      });
    }

    return {
      name,
      schema,
      doc: docText(variable.doc) ?? inheritedDoc,
      default: defaultValue,
      order: this.orderAnnotation(sorted),
      aliases: this.aliasesAnnotation(sorted),
      properties: sorted.properties,
      span: variable.name.span,
      source: this.source,
    };
  }

  // ===========================================================================
  // MESSAGES
  // ===========================================================================

  private buildMessage(decl: MessageDecl, context: NamespaceContext): Message {
    const name = decl.name.text;
    validateName(name, this.at(decl.name.span));
    const sorted = this.sortProperties(decl.properties, []);

    if (decl.oneWay && decl.result.kind !== "void") {
      throw new IdlError("INVALID_MESSAGE", `One-way message '${name}' must return void`, {
        ...this.at(decl.result.span),
        label: "declared result type",
      });
    }
    const response =
      decl.result.kind === "void" ? primitive("null") : this.buildType(decl.result, context);

    const request: Field[] = [];
    for (const parameter of decl.parameters) {
      const field = this.buildVariable(
        parameter.variable,
        parameter.type,
        docText(parameter.doc),
        context,
        name
      );
      if (request.some((existing) => existing.name === field.name)) {
        throw new IdlError(
          "DUPLICATE_FIELD",
          `duplicate parameter name: ${field.name} in message ${name}`,
          { span: field.span, source: this.source, label: "declared again here" }
        );
      }
      request.push(field);
    }

    const errors = decl.throws?.map((identifier) => this.referenceTo(identifier, context, {}));

    return {
      name,
      doc: docText(decl.doc),
      properties: sorted.properties,
      request,
      response,
      errors,
      oneWay: decl.oneWay,
    };
  }

  private addMessage(message: Message, name: Identifier): void {
    if (this.messages.has(message.name)) {
      throw new DuplicateDefinitionError(message.name, {
        message: `duplicate message name: ${message.name}`,
        ...this.at(name.span),
        label: "declared again here",
      });
    }
    this.messages.set(message.name, message);
  }

  // ===========================================================================
  // TYPES
  // ===========================================================================

  /**
   * Build a type. Annotations written before a `T?` target `T`; the default,
   * when non-null, moves `T` to the first branch.
   */
  buildType(node: TypeNode, context: NamespaceContext, defaultValue?: JsonValue): Schema {
    const sorted = this.sortProperties(node.properties, []);
    const properties = sorted.properties;
    const type = node.type;

    switch (type.kind) {
      case "array":
        return { kind: "array", items: this.buildType(type.items, context), properties };

      case "map":
        return { kind: "map", values: this.buildType(type.values, context), properties };

      case "union": {
        for (const property of node.properties) {
          this.ignoredAnnotation(property, "unions cannot carry properties");
        }
        return makeUnion(
          type.branches.map((branch) => this.buildType(branch, context)),
          { spans: type.branches.map((branch) => branch.span), source: this.source }
        );
      }

      case "nullable": {
        const base =
          type.base.kind === "primitive-type"
            ? this.buildPrimitive(type.base, properties)
            : this.referenceTo(type.base.name, context, properties);
        if (!type.optional) return base;
        const branches =
          defaultValue !== undefined && defaultValue !== null
            ? [base, primitive("null")]
            : [primitive("null"), base];
        return makeUnion(branches, { nullable: true, span: type.span, source: this.source });
      }
    }
  }

  private buildPrimitive(node: PrimitiveTypeNode, properties: JsonObject): Schema {
    if (node.name === "decimal") {
      return this.buildDecimal(node, properties);
    }

    const keywordLogical = KEYWORD_LOGICAL_TYPES[node.name];
    if (keywordLogical) {
      return { kind: "logical", ...keywordLogical, properties };
    }

    if (!isPrimitiveType(node.name)) {
      throw new IdlError("INTERNAL_ERROR", `unknown type keyword ${node.name}`, this.at(node.span));
    }
    const type = node.name;
    const logicalType = properties.logicalType;
    if (typeof logicalType === "string") {
      const promotion = decidePromotion(
        logicalType,
        type,
        { precision: properties.precision, scale: properties.scale },
        this.at(node.span)
      );
      if (promotion.promoted) {
        return {
          kind: "logical",
          logicalType: promotion.logicalType,
          base: type,
          precision: promotion.precision,
          scale: promotion.scale,
          properties: withoutLogicalKeys(properties, promotion.logicalType === "decimal"),
        };
      }
    }
    return primitive(type, properties);
  }

  /** `decimal(precision[, scale])` */
  private buildDecimal(node: PrimitiveTypeNode, properties: JsonObject): LogicalSchema {
    const precision = this.decimalParameter("decimal precision", node.precision);
    const scale = node.scale ? this.decimalParameter("decimal scale", node.scale) : 0;
    const location = this.at(node.span);
    if (precision < 1) {
      throw new InvalidLogicalTypeError("decimal", "bytes", "precision must be at least 1", location);
    }
    if (scale < 0 || scale > precision) {
      throw new InvalidLogicalTypeError(
        "decimal",
        "bytes",
        `scale ${scale} must be between 0 and the precision ${precision}`,
        location
      );
    }
    return { kind: "logical", logicalType: "decimal", base: "bytes", precision, scale, properties };
  }

  private decimalParameter(what: string, node: JsonLiteralNode | undefined): number {
    if (!node) {
      throw new IdlError("INTERNAL_ERROR", `missing ${what}`);
    }
    const value = parseIntegerLiteral(node.raw, this.at(node.span));
    if (typeof value === "bigint" || value > INT32_MAX) {
      throw new NumericRangeError(what, node.raw, `at most ${INT32_MAX}`, this.at(node.span));
    }
    return value;
  }

  private referenceTo(
    identifier: Identifier,
    context: NamespaceContext,
    properties: JsonObject
  ): ReferenceSchema {
    return reference(context.qualify(identifier.text), {
      properties,
      span: identifier.span,
      source: this.source,
    });
  }

  // ===========================================================================
  // ANNOTATIONS
  // ===========================================================================

  /** Split annotations into the intercepted names and plain properties */
  private sortProperties(nodes: PropertyNode[], intercept: readonly string[]): SortedProperties {
    const properties: JsonObject = {};
    const intercepted = new Map<string, { value: JsonValue; node: PropertyNode }>();
    const seen = new Set<string>();

    for (const node of nodes) {
      const key = node.name.text;
      if (seen.has(key)) {
        if (key === "namespace" && intercept.includes("namespace")) {
          throw new DuplicateNamespaceAnnotationError(this.at(node.span));
        }
        throw new IdlError("DUPLICATE_PROPERTY", `duplicate annotation @${key}`, {
          ...this.at(node.span),
          label: "repeated here",
        });
      }
      seen.add(key);

      const value = this.jsonValue(node.value);
      if (intercept.includes(key)) {
        intercepted.set(key, { value, node });
      } else {
        properties[key] = value;
      }
    }
    return { properties, intercepted };
  }

  private namespaceAnnotation(sorted: SortedProperties): string | undefined {
    const entry = sorted.intercepted.get("namespace");
    if (!entry) return undefined;
    if (typeof entry.value !== "string") {
      throw this.invalidAnnotation(entry.node, "@namespace must be a string");
    }
    return entry.value;
  }

  private aliasesAnnotation(sorted: SortedProperties): string[] {
    const entry = sorted.intercepted.get("aliases");
    if (!entry) return [];
    const value = entry.value;
    if (!Array.isArray(value)) {
      throw this.invalidAnnotation(entry.node, "@aliases must be an array of strings");
    }
    return value.map((alias) => {
      if (typeof alias !== "string") {
        throw this.invalidAnnotation(entry.node, "@aliases must be an array of strings");
      }
      return alias;
    });
  }

  private orderAnnotation(sorted: SortedProperties): FieldOrder | undefined {
    const entry = sorted.intercepted.get("order");
    if (!entry) return undefined;
    const order = typeof entry.value === "string" ? FIELD_ORDERS[entry.value.toLowerCase()] : undefined;
    if (!order) {
      throw this.invalidAnnotation(entry.node, "@order must be one of ascending, descending, ignore");
    }
    return order;
  }

  private invalidAnnotation(node: PropertyNode, message: string): IdlError {
    return new IdlError("INVALID_ANNOTATION", message, this.at(node.span));
  }

  private ignoredAnnotation(node: PropertyNode, reason: string): void {
    this.warn(
      warning("IGNORED_ANNOTATION", `Ignoring annotation @${node.name.text}: ${reason}`, {
        ...this.at(node.span),
        label: "ignored",
      })
    );
  }

  // ===========================================================================
  // JSON VALUES
  // ===========================================================================

  private jsonValue(node: JsonNode): JsonValue {
    switch (node.kind) {
      case "json-object": {
        const object: JsonObject = {};
        for (const entry of node.entries) {
          object[this.stringValue(entry.key)] = this.jsonValue(entry.value);
        }
        return object;
      }
      case "json-array":
        return node.items.map((item) => this.jsonValue(item));
      case "json-literal":
        switch (node.literal) {
          case "string":
            return this.stringValue(node);
          case "integer":
            return parseIntegerLiteral(node.raw, this.at(node.span));
          case "float":
            return parseFloatLiteral(node.raw);
          case "true":
            return true;
          case "false":
            return false;
          case "null":
            return null;
        }
    }
  }

  private stringValue(node: JsonLiteralNode): string {
    return decodeEscapes(node.raw, { offset: node.span.offset + 1, source: this.source });
  }

  private at(span: SourceSpan): { span: SourceSpan; source: SourceText } {
    return { span, source: this.source };
  }
}

// =============================================================================
// ENTRY POINTS
// =============================================================================

/** Parse and build IDL text */
export function buildIdl(text: string, source: SourceText, options: BuildOptions): BuiltUnit {
  const file = parse(text, source.name);
  return new IdlBuilder(file, source, options).build();
}

/** Build an imported IDL file for merging into its importer */
export function loadIdlUnit(path: string, text: string, session: ImportSession): ImportedUnit {
  const unit = buildIdl(text, { name: path, text }, { path, baseDir: dirname(path), session });
  return {
    path,
    registry: unit.registry,
    messages: unit.messages,
  };
}
