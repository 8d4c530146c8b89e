// src/routes/preferences.ts
import express from "express";
import type { RequestHandler } from "express";
import { z } from "zod";
import type { PreferenceRepository } from "../types";
import { AUTO_LANGUAGE, getUserLanguage, setUserLanguage } from "../util/preferences";
import { requireUser } from "./_ensureAuth";
import { sendError } from "./_respond";

const LanguageBody = z.object({
  language: z.enum(["english", "tamil", AUTO_LANGUAGE]),
});

export interface PreferencesRouterDeps {
  preferences: PreferenceRepository;
  ensureAuth: RequestHandler;
}

export function createPreferencesRouter(deps: PreferencesRouterDeps) {
  const prefs = express.Router();
  prefs.use(deps.ensureAuth);

  // GET /api/preferences/language
  prefs.get("/language", async (req, res) => {
    try {
      const user = requireUser(req);
      const language = await getUserLanguage(deps.preferences, user.id);
      return res.json({ language: language ?? AUTO_LANGUAGE });
    } catch (e) {
      return sendError(res, e, "[PREFS] get language error", "preferences_failed");
    }
  });

  // PUT /api/preferences/language {language: "english" | "tamil" | "auto"}
  prefs.put("/language", async (req, res) => {
    try {
      const body = LanguageBody.safeParse(req.body ?? {});
      if (!body.success) return res.status(400).json({ error: "invalid_language" });

      const user = requireUser(req);
      await setUserLanguage(deps.preferences, user.id, body.data.language);
      return res.json({ language: body.data.language });
    } catch (e) {
      return sendError(res, e, "[PREFS] set language error", "preferences_failed");
    }
  });

  return prefs;
}
