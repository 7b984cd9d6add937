/**
 * Text normalization shared by every lookup structure.
 *
 * @module utils/text
 */

/** Trim and lowercase a phrase. */
export function normalizePhrase(phrase: string): string {
  return phrase.trim().toLowerCase();
}

/** Split normalized text into whitespace-separated tokens. */
export function tokenize(text: string): string[] {
  const normalized = normalizePhrase(text);
  return normalized === '' ? [] : normalized.split(/\s+/);
}

/**
 * Bidirectional containment: true when either string contains the other.
 * Both arguments are expected to be normalized already; an empty candidate
 * never matches.
 */
export function containsEitherWay(keyword: string, input: string): boolean {
  if (keyword === '' || input === '') return false;
  return input.includes(keyword) || keyword.includes(input);
}
