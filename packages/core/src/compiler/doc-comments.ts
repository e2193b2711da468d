/**
 * Documentation comment extraction
 */

import type { DocComment } from "./idl/tokenizer.js";

/** Text of a doc comment without delimiters and indentation; empty comments give nothing */
export function docText(comment: DocComment | undefined): string | undefined {
  if (!comment) return undefined;
  const inner = comment.text.slice(3, -2).trim();
  return inner === "" ? undefined : stripIndents(inner);
}

/**
 * Remove a shared `*` / `**` line prefix, or failing that the common
 * whitespace indent of the lines after the first.
 */
export function stripIndents(text: string): string {
  return stripStarIndent(text) ?? stripWhitespaceIndent(text) ?? text;
}

function stripStarIndent(text: string): string | undefined {
  const lines = text.split(/\r?\n/);
  const [first, ...rest] = lines;
  if (first === undefined || rest.length === 0) return undefined;

  const stars = first.startsWith("**") ? "**" : first.startsWith("*") ? "*" : undefined;
  if (!stars) return undefined;

  for (const line of rest) {
    const trimmed = line.trimStart();
    if (trimmed !== "" && !trimmed.startsWith(stars)) return undefined;
  }

  const strip = (line: string): string => {
    const afterStars = line.slice(stars.length);
    return afterStars.startsWith(" ") ? afterStars.slice(1) : afterStars;
  };

  return [
    strip(first),
    ...rest.map((line) => {
      const trimmed = line.trimStart();
      return trimmed === "" ? "" : strip(trimmed);
    }),
  ].join("\n");
}

function stripWhitespaceIndent(text: string): string | undefined {
  const lines = text.split(/\r?\n/);
  const [first, ...rest] = lines;
  if (first === undefined || rest.length === 0) return undefined;

  let common: string | undefined;
  for (const line of rest) {
    if (line.trim() === "") continue;
    const indent = line.slice(0, line.length - line.trimStart().length);
    common = common === undefined ? indent : commonPrefix(common, indent);
  }
  if (!common) return undefined;

  const indent = common;
  return [first, ...rest.map((line) => (line.length >= indent.length ? line.slice(indent.length) : line))].join(
    "\n"
  );
}

function commonPrefix(a: string, b: string): string {
  let i = 0;
  while (i < a.length && i < b.length && a[i] === b[i]) i++;
  return a.slice(0, i);
}
