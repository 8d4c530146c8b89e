// src/ai/companion/tables.ts
import { z } from "zod";
import english from "./data/english.json";
import tamil from "./data/tamil.json";
import names from "./data/names.json";
import tones from "./data/tones.json";
import type { Language } from "../lang/detectLanguage";
import type { Tone, ToneKeywords } from "../tone";

/**
 * Pseudo-category used by the Tamil keyword table for "user is introducing
 * themselves". It has no templates; refineCategory() resolves it.
 */
export const INTRO_MARKER = "intro";

export const NAME_PLACEHOLDER = "{name}";

const NAMED_CATEGORIES = ["name_received", "name_greeting"] as const;

const TemplatePoolSchema = z.array(z.string().trim().min(1)).min(1);

const LanguagePackSchema = z
  .object({
    responses: z.record(TemplatePoolSchema),
    keywords: z.record(z.string().min(1)),
    followUps: TemplatePoolSchema,
    preambles: z.object({
      lonely: z.string().min(1),
      sad: z.string().min(1),
      worried: z.string().min(1),
      scared: z.string().min(1),
      happy: z.string().min(1),
    }),
  })
  .superRefine((pack, ctx) => {
    if (!pack.responses.default) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["responses", "default"],
        message: "every language needs a default category",
      });
    }
    for (const cat of NAMED_CATEGORIES) {
      for (const t of pack.responses[cat] ?? []) {
        if (!t.includes(NAME_PLACEHOLDER)) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: ["responses", cat],
            message: `template must contain ${NAME_PLACEHOLDER}: ${t}`,
          });
        }
      }
    }
    for (const [keyword, cat] of Object.entries(pack.keywords)) {
      if (keyword !== keyword.toLowerCase()) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["keywords", keyword],
          message: "keywords are matched against lowercased text",
        });
      }
      if (cat !== INTRO_MARKER && !pack.responses[cat]) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["keywords", keyword],
          message: `unknown category ${cat}`,
        });
      }
    }
  });

const NamePatternSchema = z
  .object({
    id: z.string().min(1),
    source: z.string().min(1),
    flags: z.string().default(""),
  })
  .superRefine((p, ctx) => {
    try {
      new RegExp(p.source, p.flags);
    } catch (e) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["source"],
        message: `invalid pattern ${p.id}: ${String(e)}`,
      });
    }
  });

const NameConfigSchema = z.object({
  patterns: z.array(NamePatternSchema).min(1),
  stopWords: z.array(z.string().min(1)),
});

const ToneKeywordsSchema = z.object({
  lonely: z.array(z.string().min(1)),
  sad: z.array(z.string().min(1)),
  worried: z.array(z.string().min(1)),
  scared: z.array(z.string().min(1)),
  happy: z.array(z.string().min(1)),
});

// ─────────────────────────────
// Compiled (read-only) shapes the engine works with
// ─────────────────────────────

export type KeywordEntry = readonly [keyword: string, category: string];

export interface LanguagePack {
  responses: Readonly<Record<string, readonly string[]>>;
  /** sorted by descending keyword length, ties keep table order */
  keywords: readonly KeywordEntry[];
  followUps: readonly string[];
  preambles: Readonly<Record<Tone, string>>;
}

export interface NamePattern {
  id: string;
  regex: RegExp;
}

export interface EngineTables {
  languages: Readonly<Record<Language, LanguagePack>>;
  /** evaluated in order, first match wins */
  namePatterns: readonly NamePattern[];
  nameStopWords: ReadonlySet<string>;
  toneKeywords: ToneKeywords;
}

export interface TableSources {
  english: unknown;
  tamil: unknown;
  names: unknown;
  tones: unknown;
}

export const DEFAULT_TABLE_SOURCES: TableSources = { english, tamil, names, tones };

function compilePack(raw: unknown, language: Language): LanguagePack {
  const parsed = LanguagePackSchema.safeParse(raw);
  if (!parsed.success) {
    throw new Error(
      `[CHAT][tables] ${language} pack invalid: ${parsed.error.issues
        .map((i) => `${i.path.join(".")}: ${i.message}`)
        .join("; ")}`
    );
  }
  const pack = parsed.data;
  const keywords: KeywordEntry[] = Object.entries(pack.keywords)
    .map(([k, c]): KeywordEntry => [k, c])
    .sort((a, b) => b[0].length - a[0].length);

  return {
    responses: pack.responses,
    keywords,
    followUps: pack.followUps,
    preambles: pack.preambles,
  };
}

/**
 * Validate and compile the response, keyword, name and tone tables.
 * Throws at startup when a table is malformed so lookups never miss later.
 */
export function loadEngineTables(
  sources: TableSources = DEFAULT_TABLE_SOURCES
): EngineTables {
  const nameConfig = NameConfigSchema.parse(sources.names);
  const toneKeywords = ToneKeywordsSchema.parse(sources.tones);

  return {
    languages: {
      english: compilePack(sources.english, "english"),
      tamil: compilePack(sources.tamil, "tamil"),
    },
    namePatterns: nameConfig.patterns.map((p) => ({
      id: p.id,
      // exec() on a g/y regex keeps lastIndex between calls
      regex: new RegExp(p.source, p.flags.replace(/[gy]/g, "")),
    })),
    nameStopWords: new Set(nameConfig.stopWords.map((w) => w.toLowerCase())),
    toneKeywords: {
      lonely: toneKeywords.lonely.map((k) => k.toLowerCase()),
      sad: toneKeywords.sad.map((k) => k.toLowerCase()),
      worried: toneKeywords.worried.map((k) => k.toLowerCase()),
      scared: toneKeywords.scared.map((k) => k.toLowerCase()),
      happy: toneKeywords.happy.map((k) => k.toLowerCase()),
    },
  };
}
