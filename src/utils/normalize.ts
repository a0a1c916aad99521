/**
 * Generic normalization and string helpers.
 * These utilities are used across filtering, classification, and data shaping.
 */

/**
 * Normalize a headline for lexicon matching: lowercase + trim + collapse whitespace.
 */
export function normalizeHeadline(text: string): string {
  return (text || '').toLowerCase().trim().replace(/\s+/g, ' ');
}

/**
 * Number of whitespace-separated tokens in a headline.
 */
export function countWords(text: string): number {
  const trimmed = (text || '').trim();
  if (!trimmed) return 0;
  return trimmed.split(/\s+/).length;
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Whole-word (or whole-phrase) match of a lowercase term inside normalized text,
 * so "dow" does not match "window".
 */
export function containsTerm(normalized: string, term: string): boolean {
  return new RegExp(`(?:^|[^a-z0-9])${escapeRegExp(term)}(?:$|[^a-z0-9])`).test(normalized);
}
