// src/ai/companion/engine.ts
import { InvalidInputError } from "../../errors";
import { detectLanguage } from "../lang/detectLanguage";
import type { Language } from "../lang/detectLanguage";
import { normalizeForMatching } from "../lang/normalize";
import { detectDominantTone } from "../tone";
import { matchCategory, refineCategory } from "./categories";
import { createMicroResponder } from "./microResponder";
import type { MicroResponder } from "./microResponder";
import { cleanDisplayName, extractName } from "./names";
import { chance, mathRandom, pick } from "./random";
import type { RandomSource } from "./random";
import { loadEngineTables } from "./tables";
import type { EngineTables } from "./tables";
import { selectBaseTemplate } from "./templates";

export const EMPTY_INPUT_RESPONSE =
  "I'm here to listen. Feel free to share whatever's on your mind!";

/** Tuning knobs. Values were picked by feel, keep them overridable. */
export interface EngineProbabilities {
  /** greeting → name_greeting when a display name is known */
  nameGreeting: number;
  /** prepend the history preamble when a tone was found */
  historyPreamble: number;
  /** append a follow-up question when the reply is not already a question */
  followUp: number;
}

export const DEFAULT_PROBABILITIES: Readonly<EngineProbabilities> = {
  nameGreeting: 0.55,
  historyPreamble: 0.35,
  followUp: 0.75,
};

export interface GenerateOptions {
  /** account username, only handed to the micro responder */
  username?: string | null;
  /** prior turns, oldest first; anything not `{sender, message}` is ignored */
  history?: readonly unknown[] | null;
  /** name remembered from an earlier turn */
  displayName?: string | null;
  forcedLanguage?: Language | null;
}

export interface ResponseResult {
  response: string;
  /** name found in this message only, never the remembered one */
  detected_name: string | null;
  language: Language;
}

export interface ResponseEngine {
  generateResponse(message: unknown, options?: GenerateOptions): ResponseResult;
}

export interface ResponseEngineOptions {
  tables?: EngineTables;
  random?: RandomSource;
  probabilities?: Partial<EngineProbabilities>;
  microResponder?: MicroResponder;
}

export function createResponseEngine(opts: ResponseEngineOptions = {}): ResponseEngine {
  const tables = opts.tables ?? loadEngineTables();
  const random = opts.random ?? mathRandom;
  const p: EngineProbabilities = { ...DEFAULT_PROBABILITIES, ...opts.probabilities };
  const microRespond = opts.microResponder ?? createMicroResponder({ random });

  function generateResponse(message: unknown, options: GenerateOptions = {}): ResponseResult {
    if (typeof message !== "string") {
      throw new InvalidInputError(
        message == null ? "Message cannot be empty" : "Message must be a string"
      );
    }

    const text = message.trim();
    if (!text) {
      return { response: EMPTY_INPUT_RESPONSE, detected_name: null, language: "english" };
    }

    const language = detectLanguage(text, options.forcedLanguage);
    const pack = tables.languages[language];

    const detectedName = extractName(text, tables.namePatterns, tables.nameStopWords);
    const displayName = detectedName ?? cleanDisplayName(options.displayName);

    const rawCategory = matchCategory(normalizeForMatching(text), pack.keywords);
    const category = refineCategory(rawCategory, detectedName);

    const base = selectBaseTemplate(
      pack,
      category,
      { detectedName, displayName, nameGreetingProbability: p.nameGreeting },
      random
    );

    const tone = detectDominantTone(options.history, tables.toneKeywords);
    const preamble = tone && chance(random, p.historyPreamble) ? pack.preambles[tone] : "";

    const secondary = microRespond(text, options.username ?? null, language);

    const followUp =
      !base.trim().endsWith("?") && chance(random, p.followUp)
        ? pick(random, pack.followUps) ?? ""
        : "";

    const response = [preamble, base, secondary, followUp]
      .map((part) => part.trim())
      .filter(Boolean)
      .join(" ");

    return { response, detected_name: detectedName, language };
  }

  return { generateResponse };
}
