// src/ai/companion/names.ts
import { normalizeQuotes } from "../lang/normalize";
import type { NamePattern } from "./tables";

const MIN_NAME_LENGTH = 2;

/** "ravi" / "RAVI" → "Ravi". Tamil has no case, so it passes through. */
export function capitalizeName(raw: string): string {
  const s = raw.trim();
  if (!s) return "";
  return s.charAt(0).toUpperCase() + s.slice(1).toLowerCase();
}

/**
 * Self-introduction detection ("my name is Ravi", "I'm Ravi", "என் பெயர் ரவி").
 *
 * Patterns run in configured order and the FIRST one that matches decides:
 * if its capture is a stop word ("I am fine") the answer is null, we do not
 * keep looking further down the list.
 */
export function extractName(
  message: string,
  patterns: readonly NamePattern[],
  stopWords: ReadonlySet<string>
): string | null {
  const text = normalizeQuotes(message || "");
  if (!text.trim()) return null;

  for (const p of patterns) {
    const m = p.regex.exec(text);
    if (!m) continue;

    const candidate = (m[1] ?? "").trim();
    if (candidate.length < MIN_NAME_LENGTH) return null;
    if (stopWords.has(candidate.toLowerCase())) return null;
    return capitalizeName(candidate);
  }
  return null;
}

/** Clean up a remembered display name; blank → null. */
export function cleanDisplayName(v: string | null | undefined): string | null {
  const s = (v ?? "").trim();
  return s ? s : null;
}
