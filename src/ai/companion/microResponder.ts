// src/ai/companion/microResponder.ts
import { z } from "zod";
import micro from "./data/micro.json";
import { detectLanguage } from "../lang/detectLanguage";
import type { Language } from "../lang/detectLanguage";
import { includesAtWordStart, normalizeForMatching } from "../lang/normalize";
import { mathRandom, pick } from "./random";
import type { RandomSource } from "./random";
import { NAME_PLACEHOLDER } from "./tables";
import { interpolateName } from "./templates";

/**
 * Second, simpler responder whose line is appended after the main template.
 * Black box to the engine: message (+ account username) in, one line out.
 * `language` is the reply language the engine resolved; without it the
 * message's script decides.
 */
export type MicroResponder = (
  message: string,
  username?: string | null,
  language?: Language | null
) => string;

const RuleSchema = z.object({
  topic: z.string().min(1),
  keywords: z.array(z.string().min(1)).min(1),
  replies: z.array(z.string().min(1)).min(1),
});

const RuleSetSchema = z.object({
  rules: z.array(RuleSchema),
  fallback: z.array(z.string().min(1)).min(1),
});

const MicroTablesSchema = z.object({
  english: RuleSetSchema,
  tamil: RuleSetSchema,
});

export type MicroRuleSet = z.infer<typeof RuleSetSchema>;
export type MicroTables = Readonly<Record<Language, MicroRuleSet>>;

export function loadMicroTables(raw: unknown = micro): MicroTables {
  return MicroTablesSchema.parse(raw);
}

export interface MicroResponderOptions {
  tables?: MicroTables;
  random?: RandomSource;
}

/**
 * Rules are checked top to bottom, first keyword hit wins.
 * No hit → a generic acknowledgement; lines with {name} only when we know
 * the username.
 */
export function createMicroResponder(opts: MicroResponderOptions = {}): MicroResponder {
  const tables = opts.tables ?? loadMicroTables();
  const random = opts.random ?? mathRandom;

  return (message: string, username?: string | null, language?: Language | null): string => {
    const text = normalizeForMatching(message);
    const set = tables[detectLanguage(text, language)];

    for (const rule of set.rules) {
      if (rule.keywords.some((k) => includesAtWordStart(text, k.toLowerCase()))) {
        return pick(random, rule.replies) ?? "";
      }
    }

    const name = (username ?? "").trim();
    const pool = name
      ? set.fallback
      : set.fallback.filter((line) => !line.includes(NAME_PLACEHOLDER));
    const line = pick(random, pool) ?? "";
    return name ? interpolateName(line, name) : line;
  };
}
