// src/ai/tone.ts
import { includesAtWordStart } from "./lang/normalize";

export type Tone = "lonely" | "sad" | "worried" | "scared" | "happy";

/** Iteration order doubles as the tie-break: earlier tone wins on equal counts. */
export const TONES: readonly Tone[] = ["lonely", "sad", "worried", "scared", "happy"];

export type Sender = "user" | "bot";

export interface ConversationTurn {
  sender: Sender;
  message: string;
}

export type ToneKeywords = Readonly<Record<Tone, readonly string[]>>;

/** Fewer prior turns than this is not enough signal to pick up a mood. */
export const HISTORY_MIN_TURNS = 3;
/** Only the latest user turns count. */
export const HISTORY_WINDOW = 6;

export function isConversationTurn(v: unknown): v is ConversationTurn {
  if (!v || typeof v !== "object") return false;
  if (!("sender" in v) || !("message" in v)) return false;
  return (v.sender === "user" || v.sender === "bot") && typeof v.message === "string";
}

/**
 * Dominant recent tone of the user's own messages.
 *
 * History is caller supplied (usually straight out of chat_history), so
 * entries that are not `{ sender, message }` are skipped rather than trusted.
 * Each message counts at most once per tone; keywords only match at the
 * start of a word.
 */
export function detectDominantTone(
  history: readonly unknown[] | null | undefined,
  keywords: ToneKeywords
): Tone | null {
  if (!history || history.length < HISTORY_MIN_TURNS) return null;

  const recentUserMessages = history
    .filter(isConversationTurn)
    .filter((t) => t.sender === "user")
    .slice(-HISTORY_WINDOW)
    .map((t) => t.message.toLowerCase());

  const counts = new Map<Tone, number>();
  for (const msg of recentUserMessages) {
    for (const tone of TONES) {
      if (keywords[tone].some((k) => includesAtWordStart(msg, k))) {
        counts.set(tone, (counts.get(tone) ?? 0) + 1);
      }
    }
  }

  let best: Tone | null = null;
  let bestCount = 0;
  for (const tone of TONES) {
    const n = counts.get(tone) ?? 0;
    if (n > bestCount) {
      best = tone;
      bestCount = n;
    }
  }
  return best;
}
