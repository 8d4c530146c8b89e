// src/ai/companion/categories.ts
import { INTRO_MARKER } from "./tables";
import type { KeywordEntry } from "./tables";

export const DEFAULT_CATEGORY = "default";
export const NAME_RECEIVED = "name_received";
export const NAME_GREETING = "name_greeting";
export const GREETINGS = "greetings";

/**
 * Stage 1: raw keyword category.
 * Keywords come pre-sorted longest first, so "how are you" beats "hi".
 * Expects text already run through normalizeForMatching().
 */
export function matchCategory(
  normalizedText: string,
  keywords: readonly KeywordEntry[]
): string {
  for (const [keyword, category] of keywords) {
    if (normalizedText.includes(keyword)) return category;
  }
  return DEFAULT_CATEGORY;
}

/**
 * Stage 2: fold in whether a name was actually extracted.
 * The intro marker and name_received need a name, otherwise default.
 */
export function refineCategory(raw: string, detectedName: string | null): string {
  if (raw === INTRO_MARKER || raw === NAME_RECEIVED) {
    return detectedName ? NAME_RECEIVED : DEFAULT_CATEGORY;
  }
  return raw;
}
