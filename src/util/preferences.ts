// src/util/preferences.ts
import { isLanguage } from "../ai/lang/detectLanguage";
import type { Language } from "../ai/lang/detectLanguage";
import type { PreferenceRepository } from "../types";

/** stored when the user wants the language picked from what they type */
export const AUTO_LANGUAGE = "auto";

export type LanguageSetting = Language | typeof AUTO_LANGUAGE;

/** Forced reply language, or null to detect it per message. */
export async function getUserLanguage(
  prefs: PreferenceRepository,
  userId: string
): Promise<Language | null> {
  const v = await prefs.get(userId, "language");
  return isLanguage(v) ? v : null;
}

export async function setUserLanguage(
  prefs: PreferenceRepository,
  userId: string,
  setting: LanguageSetting
): Promise<void> {
  await prefs.set(userId, "language", setting);
}

export async function getDisplayName(
  prefs: PreferenceRepository,
  userId: string
): Promise<string | null> {
  const v = await prefs.get(userId, "display_name");
  return v && v.trim() ? v.trim() : null;
}

export async function rememberDisplayName(
  prefs: PreferenceRepository,
  userId: string,
  name: string
): Promise<void> {
  await prefs.set(userId, "display_name", name);
}
