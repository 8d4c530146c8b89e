// src/ai/companion/templates.ts
import { chance, pick } from "./random";
import type { RandomSource } from "./random";
import { NAME_PLACEHOLDER } from "./tables";
import type { LanguagePack } from "./tables";
import { DEFAULT_CATEGORY, GREETINGS, NAME_GREETING, NAME_RECEIVED } from "./categories";

export function interpolateName(template: string, name: string): string {
  return template.split(NAME_PLACEHOLDER).join(name);
}

/** Category pool, or the default pool when the language lacks the category. */
export function templatePool(pack: LanguagePack, category: string): readonly string[] {
  const pool = pack.responses[category];
  if (pool && pool.length) return pool;
  return pack.responses[DEFAULT_CATEGORY] ?? [];
}

export function pickTemplate(
  pack: LanguagePack,
  category: string,
  random: RandomSource
): string {
  return pick(random, templatePool(pack, category)) ?? "";
}

export interface TemplateContext {
  /** name found in THIS message */
  detectedName: string | null;
  /** detected name, else the one remembered from earlier turns */
  displayName: string | null;
  /** chance of swapping a plain greeting for a name_greeting */
  nameGreetingProbability: number;
}

export function selectBaseTemplate(
  pack: LanguagePack,
  category: string,
  ctx: TemplateContext,
  random: RandomSource
): string {
  if (category === NAME_RECEIVED && ctx.detectedName) {
    return interpolateName(pickTemplate(pack, NAME_RECEIVED, random), ctx.detectedName);
  }

  if (
    category === GREETINGS &&
    ctx.displayName &&
    pack.responses[NAME_GREETING]?.length &&
    chance(random, ctx.nameGreetingProbability)
  ) {
    return interpolateName(pickTemplate(pack, NAME_GREETING, random), ctx.displayName);
  }

  return pickTemplate(pack, category, random);
}
