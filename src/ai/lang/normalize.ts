// src/ai/lang/normalize.ts

// Basic helpers
const stripExtraSpaces = (s: string) => s.replace(/\s+/g, " ").trim();

/**
 * Phone keyboards and voice input love curly quotes ("I’m", “hi”).
 * The keyword tables and name patterns are written with plain ASCII quotes.
 */
export function normalizeQuotes(text: string): string {
  return text
    .replace(/[‘’‛`]/g, "'")
    .replace(/[“”„]/g, '"')
    .replace(/[–—]/g, "-"); // dashes
}

/**
 * Normalization used BEFORE keyword matching.
 *  - plain quotes / dashes
 *  - lower case (no-op for Tamil script)
 *  - single spaces
 */
export function normalizeForMatching(raw: string): string {
  if (!raw) return "";
  return stripExtraSpaces(normalizeQuotes(String(raw)).toLowerCase());
}

const WORD_CHAR = /[\p{L}\p{M}\p{N}]/u;

/**
 * `keyword` occurs where a word starts: "happy" is not in "unhappy", but
 * "lonely" is in "lonely," and "தனிமை" is in "தனிமையாக".
 */
export function includesAtWordStart(text: string, keyword: string): boolean {
  if (!keyword) return false;
  let i = text.indexOf(keyword);
  while (i !== -1) {
    if (i === 0 || !WORD_CHAR.test(text.charAt(i - 1))) return true;
    i = text.indexOf(keyword, i + 1);
  }
  return false;
}
