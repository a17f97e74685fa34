// Shared text helpers.
//
// Phrase matching across the filter, the endpointing heuristic and the session
// manager all goes through normalizeText() so that "Hey, Luna!" and "hey luna"
// compare equal.

/**
 * Lower-case, drop punctuation (apostrophes inside words are kept so "what's"
 * stays one word) and collapse whitespace.
 */
export function normalizeText(text: string): string {
  return text
    .toLowerCase()
    .replace(/[^\p{L}\p{N}'\s]+/gu, " ")
    .replace(/(^|\s)'+|'+(?=\s|$)/g, "$1")
    .replace(/\s+/g, " ")
    .trim();
}

/** Collapse runs of whitespace into single spaces and trim. */
export function collapseWhitespace(text: string): string {
  return text.replace(/\s+/g, " ").trim();
}

/**
 * Count the number of words in a text string.
 * A "word" is a contiguous sequence of non-whitespace characters.
 */
export function countWords(text: string): number {
  const trimmed = text.trim();
  if (trimmed.length === 0) return 0;
  return trimmed.split(/\s+/).length;
}

/**
 * True if `phrase` occurs in `text` on word boundaries, after normalizing both.
 * "bye" matches "ok bye now" but not "maybe".
 */
export function containsPhrase(text: string, phrase: string): boolean {
  const needle = normalizeText(phrase);
  if (needle.length === 0) return false;
  return ` ${normalizeText(text)} `.includes(` ${needle} `);
}

/** True if the normalized text ends with the normalized phrase on a word boundary. */
export function endsWithPhrase(text: string, phrase: string): boolean {
  const needle = normalizeText(phrase);
  if (needle.length === 0) return false;
  return ` ${normalizeText(text)}`.endsWith(` ${needle}`);
}

/** First phrase of `phrases` contained in `text`, or null. */
export function findPhrase(text: string, phrases: readonly string[]): string | null {
  for (const phrase of phrases) {
    if (containsPhrase(text, phrase)) return phrase;
  }
  return null;
}
