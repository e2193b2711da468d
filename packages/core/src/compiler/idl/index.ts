/**
 * Avro IDL front end: tokenizer, syntax tree and parser
 */

export * from "./tokenizer.js";
export * from "./ast.js";
export { Parser, TYPE_KEYWORDS, parse } from "./parser.js";
