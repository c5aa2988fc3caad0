/**
 * Title normalisation and similarity scoring
 */

import stringSimilarity from 'string-similarity';

/** Fuzzy match threshold on the 0-100 similarity scale */
export const TITLE_SIMILARITY_THRESHOLD = 98;

/**
 * Lowercase, drop parenthesised parts and quote/colon punctuation, turn
 * separators into spaces, collapse whitespace.
 *
 * "Re:Zero (TV) - Starting Life" -> "rezero starting life"
 */
export function normalizeTitle(title: string): string {
  return title
    .toLowerCase()
    .replace(/\(.*?\)/g, '')
    .replace(/[:!?'"]/g, '')
    .replace(/[-_.,]/g, ' ')
    .replace(/\s+/g, ' ')
    .trim();
}

/**
 * Dice coefficient of the normalised titles, scaled to 0-100.
 */
export function titleSimilarity(a: string, b: string): number {
  const left = normalizeTitle(a);
  const right = normalizeTitle(b);
  if (!left || !right) return 0;
  if (left === right) return 100;
  return stringSimilarity.compareTwoStrings(left, right) * 100;
}

/**
 * Two title strings refer to the same work: case-insensitive equality,
 * normalised equality, or similarity at or above the threshold.
 * Empty strings never match.
 */
export function titlesMatch(a: string, b: string): boolean {
  if (!a || !b) return false;
  if (a.toLowerCase() === b.toLowerCase()) return true;
  const left = normalizeTitle(a);
  const right = normalizeTitle(b);
  if (left && left === right) return true;
  return titleSimilarity(a, b) >= TITLE_SIMILARITY_THRESHOLD;
}
