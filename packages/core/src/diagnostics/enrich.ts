/**
 * Rewriting of raw parser messages into user-facing text
 */

import { TYPE_KEYWORDS } from "../compiler/idl/parser.js";
import { KEYWORDS } from "../compiler/idl/tokenizer.js";
import { levenshtein, maxEditDistance } from "./suggest.js";

/** Most entries listed in an "expected one of" message */
export const MAX_EXPECTED_ENTRIES = 8;

const TOKEN_CLASS_NAMES: Readonly<Record<string, string>> = {
  IDENTIFIER: "identifier",
  KEYWORD: "type name",
  STRING: "string literal",
  INTEGER: "integer literal",
  FLOAT: "number",
  EOF: "end of file",
};

const PUNCTUATION_CLASSES: ReadonlySet<string> = new Set([
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
]);

const RAW_MESSAGE = /^Expected (.+?) but got (EOF|[A-Z]+ '.*?')(?: after ([A-Z]+) '(.*)')?$/s;

const TOKEN = /^([A-Z]+) '(.*)'$/s;

const WORD_TAIL = /^[A-Za-z0-9_]+$/;

/**
 * Rewrite a raw parser message. Token classes get readable names, expected
 * lists are de-duplicated and capped, and a hint is added for keywords run
 * together with the following word or misspelled. Messages of any other shape
 * are returned unchanged.
 */
export function enrichParserMessage(raw: string): string {
  const match = RAW_MESSAGE.exec(raw);
  if (!match) return raw;
  const [, expectedText = "", gotText = "", afterClass, afterText] = match;

  const expected = splitExpected(expectedText);
  const got = describeGot(gotText);
  const list = renderExpected(expected);
  const base =
    list.length === 1 ? `Expected ${list[0] ?? ""} but got ${got}` : `Expected one of: ${list.join(", ")} but got ${got}`;

  const gotToken = TOKEN.exec(gotText);
  const gotClass = gotText === "EOF" ? "EOF" : gotToken?.[1];
  const gotIdentifier = gotClass === "IDENTIFIER" ? gotToken?.[2] : undefined;

  // A type keyword run into the field name: the pair was read as one type name
  const missingName =
    expected.includes("IDENTIFIER") &&
    (gotClass === "EOF" || (gotClass !== undefined && PUNCTUATION_CLASSES.has(gotClass)));
  if (missingName && afterClass === "IDENTIFIER" && afterText !== undefined) {
    const merged = splitMergedKeyword(afterText, TYPE_KEYWORDS);
    if (merged) return `${base}; ${mergedHint(afterText, merged)}`;
  }

  if (gotIdentifier !== undefined) {
    // A keyword the parser wanted, run into the following word
    const merged = splitMergedKeyword(gotIdentifier, quotedKeywords(expected));
    if (merged) return `${base}; ${mergedHint(gotIdentifier, merged)}`;

    const typo = closestKeyword(gotIdentifier, expected);
    if (typo) return `${base}; did you mean '${typo}'?`;
  }
  return base;
}

function splitExpected(text: string): string[] {
  if (text.startsWith("one of {") && text.endsWith("}")) {
    return text.slice("one of {".length, -1).split(", ");
  }
  return [text];
}

const TYPE_NAMES: ReadonlySet<string> = new Set(TYPE_KEYWORDS);

/** Readable, de-duplicated and capped expected list */
function renderExpected(expected: string[]): string[] {
  const typeNames = new Set(TYPE_KEYWORDS.map((keyword) => `'${keyword}'`));
  const collapse = [...typeNames].every((name) => expected.includes(name));

  const rendered: string[] = [];
  for (const entry of expected) {
    const name = collapse && typeNames.has(entry) ? "type name" : (TOKEN_CLASS_NAMES[entry] ?? entry);
    if (!rendered.includes(name)) {
      rendered.push(name);
    }
  }
  if (rendered.length > MAX_EXPECTED_ENTRIES) {
    return [...rendered.slice(0, MAX_EXPECTED_ENTRIES), "..."];
  }
  return rendered;
}

function describeGot(text: string): string {
  if (text === "EOF") return "end of file";
  const token = TOKEN.exec(text);
  if (!token) return text;
  const [, tokenClass = "", tokenText = ""] = token;
  if (PUNCTUATION_CLASSES.has(tokenClass)) return `'${tokenText}'`;
  // Declaration keywords are not type names
  if (tokenClass === "KEYWORD" && !TYPE_NAMES.has(tokenText)) return `keyword '${tokenText}'`;
  return `${TOKEN_CLASS_NAMES[tokenClass] ?? tokenClass.toLowerCase()} '${tokenText}'`;
}

/** Keywords quoted in an expected list */
function quotedKeywords(expected: string[]): string[] {
  return expected
    .filter((entry) => entry.startsWith("'") && entry.endsWith("'"))
    .map((entry) => entry.slice(1, -1))
    .filter((keyword) => KEYWORDS.has(keyword));
}

/** Longest keyword the word starts with, when the rest is a word of its own */
function splitMergedKeyword(
  word: string,
  keywords: Iterable<string>
): { keyword: string; rest: string } | undefined {
  let best: string | undefined;
  for (const keyword of keywords) {
    if (word.length > keyword.length && word.startsWith(keyword) && WORD_TAIL.test(word.slice(keyword.length))) {
      if (!best || keyword.length > best.length) best = keyword;
    }
  }
  return best ? { keyword: best, rest: word.slice(best.length) } : undefined;
}

function mergedHint(word: string, merged: { keyword: string; rest: string }): string {
  return `'${word}' looks like '${merged.keyword}' and '${merged.rest}' run together; add a space between them`;
}

/** Closest keyword the parser would have accepted */
function closestKeyword(word: string, expected: string[]): string | undefined {
  const limit = maxEditDistance([...word].length);
  let best: string | undefined;
  let bestDistance = Number.POSITIVE_INFINITY;
  for (const keyword of quotedKeywords(expected)) {
    const distance = levenshtein(word, keyword);
    if (distance > 0 && distance <= limit && distance < bestDistance) {
      best = keyword;
      bestDistance = distance;
    }
  }
  return best;
}
