/**
 * Text preprocessing shared by the classifier: tokenize, case-fold and
 * strip stopwords.
 */

import stopwordList from "./stopwords.json";

export const STOPWORDS: ReadonlySet<string> = new Set(stopwordList);

/** Lowercase and collapse everything but letters, digits and `&` into single spaces. */
export function normalizeDescription(text: string): string {
  return text
    .toLowerCase()
    .replace(/[^\p{L}\p{N}&]+/gu, " ")
    .trim();
}

/**
 * Split a description into classifier tokens.
 * Drops stopwords, single characters and pure numbers (card suffixes, reference ids).
 */
export function tokenize(text: string, stopwords: ReadonlySet<string> = STOPWORDS): string[] {
  const normalized = normalizeDescription(text);
  if (!normalized) return [];
  return normalized
    .split(" ")
    .filter((token) => token.length > 1 && !/^\d+$/.test(token) && !stopwords.has(token));
}
