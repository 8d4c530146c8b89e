// src/ai/lang/detectLanguage.ts

export type Language = "english" | "tamil";

// Tamil Unicode block U+0B80–U+0BFF
const TAMIL_CHAR = /[\u0B80-\u0BFF]/;

export function isLanguage(v: unknown): v is Language {
  return v === "english" || v === "tamil";
}

export function containsTamil(text: string): boolean {
  return TAMIL_CHAR.test(text || "");
}

/**
 * A caller-forced language always wins (user picked it in settings).
 * Otherwise a single Tamil code point is enough to answer in Tamil.
 */
export function detectLanguage(
  text: string,
  forced?: Language | null
): Language {
  if (forced) return forced;
  return containsTamil(text) ? "tamil" : "english";
}
