/**
 * "Did you mean" suggestions based on edit distance
 */

import { PRIMITIVE_TYPES } from "../types/schema.js";

/** Levenshtein distance between two strings, by code point */
export function levenshtein(a: string, b: string): number {
  const left = [...a];
  const right = [...b];
  if (left.length === 0) return right.length;
  if (right.length === 0) return left.length;

  let previous = Array.from({ length: right.length + 1 }, (_, i) => i);
  for (let i = 1; i <= left.length; i++) {
    const current = [i];
    for (let j = 1; j <= right.length; j++) {
      const cost = left[i - 1] === right[j - 1] ? 0 : 1;
      current.push(
        Math.min(
          (previous[j] ?? 0) + 1,
          (current[j - 1] ?? 0) + 1,
          (previous[j - 1] ?? 0) + cost
        )
      );
    }
    previous = current;
  }
  return previous[right.length] ?? 0;
}

/** Largest edit distance still worth suggesting for a name of this length */
export function maxEditDistance(length: number): number {
  return length <= 4 ? 1 : 2;
}

/** Closest candidate within the allowed distance, ties going to the first candidate */
export function closestMatch(name: string, candidates: Iterable<string>): string | undefined {
  const limit = maxEditDistance([...name].length);
  let best: string | undefined;
  let bestDistance = Number.POSITIVE_INFINITY;
  for (const candidate of candidates) {
    if (candidate === name) continue;
    const distance = levenshtein(name, candidate);
    if (distance <= limit && distance < bestDistance) {
      best = candidate;
      bestDistance = distance;
    }
  }
  return best;
}

/**
 * Suggest a fix for an undefined type name, checking primitive names first
 * and then every registered full name.
 */
export function suggestTypeName(name: string, registered: Iterable<string>): string | undefined {
  const simple = name.slice(name.lastIndexOf(".") + 1);
  const lowered = simple.toLowerCase();

  for (const primitive of PRIMITIVE_TYPES) {
    if (primitive === lowered && primitive !== simple) {
      return `did you mean the primitive type \`${primitive}\`? Type names are case-sensitive`;
    }
  }

  const primitive = closestMatch(simple, PRIMITIVE_TYPES);
  if (primitive) {
    return `did you mean the primitive type \`${primitive}\`?`;
  }

  const names = [...registered];
  const byFullName = closestMatch(name, names);
  if (byFullName) {
    return `did you mean \`${byFullName}\`?`;
  }

  const bySimpleName = names.find((candidate) => {
    const candidateSimple = candidate.slice(candidate.lastIndexOf(".") + 1);
    return candidateSimple === simple || closestMatch(simple, [candidateSimple]) !== undefined;
  });
  return bySimpleName ? `did you mean \`${bySimpleName}\`?` : undefined;
}
