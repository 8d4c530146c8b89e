// src/routes/chat.ts
import express from "express";
import type { RequestHandler } from "express";
import { z } from "zod";
import type { ResponseEngine } from "../ai/companion/engine";
import { InvalidInputError, ValidationError } from "../errors";
import type { ChatHistoryRepository, PreferenceRepository } from "../types";
import { getDisplayName, getUserLanguage, rememberDisplayName } from "../util/preferences";
import { requireUser } from "./_ensureAuth";
import { sendError } from "./_respond";

const LanguageField = z.enum(["english", "tamil"]).nullish();

// Stateless entry point: caller brings its own history / name / language
const RespondBody = z.object({
  message: z.unknown(),
  username: z.string().nullish(),
  history: z.array(z.unknown()).nullish(),
  display_name: z.string().nullish(),
  forced_language: LanguageField,
});

const SessionBody = z.object({
  message: z.unknown(),
  forced_language: LanguageField,
});

const HistoryQuery = z.object({
  limit: z.coerce.number().int().min(1).max(200).default(50),
});

export interface ChatRouterDeps {
  engine: ResponseEngine;
  chat: ChatHistoryRepository;
  preferences: PreferenceRepository;
  ensureAuth: RequestHandler;
  historyLimit: number;
  maxMessageLength: number;
}

export function createChatRouter(deps: ChatRouterDeps) {
  const chat = express.Router();

  function checkMessage(message: unknown): string {
    if (typeof message !== "string") throw new InvalidInputError();
    if (message.trim().length > deps.maxMessageLength) {
      throw new ValidationError(
        `Message must be at most ${deps.maxMessageLength} characters`,
        "message_too_long"
      );
    }
    return message;
  }

  // POST /api/chat/respond
  chat.post("/respond", (req, res) => {
    try {
      const body = RespondBody.safeParse(req.body ?? {});
      if (!body.success) return res.status(400).json({ error: "invalid_body" });
      const b = body.data;

      const result = deps.engine.generateResponse(checkMessage(b.message), {
        username: b.username,
        history: b.history,
        displayName: b.display_name,
        forcedLanguage: b.forced_language,
      });
      return res.json(result);
    } catch (e) {
      return sendError(res, e, "[CHAT][respond] error", "chat_failed");
    }
  });

  // POST /api/chat  {message, forced_language?}
  // Remembers turns + detected name for the logged-in user.
  chat.post("/", deps.ensureAuth, async (req, res) => {
    try {
      const body = SessionBody.safeParse(req.body ?? {});
      if (!body.success) return res.status(400).json({ error: "invalid_body" });

      const user = requireUser(req);
      const message = checkMessage(body.data.message);

      const [history, savedLanguage, displayName] = await Promise.all([
        deps.chat.getRecentMessages(user.id, deps.historyLimit),
        getUserLanguage(deps.preferences, user.id),
        getDisplayName(deps.preferences, user.id),
      ]);

      const result = deps.engine.generateResponse(message, {
        username: user.username,
        history,
        displayName,
        forcedLanguage: body.data.forced_language ?? savedLanguage,
      });

      if (message.trim()) {
        await deps.chat.saveMessage(user.id, "user", message);
        await deps.chat.saveMessage(user.id, "bot", result.response);
      }
      if (result.detected_name && result.detected_name !== displayName) {
        await rememberDisplayName(deps.preferences, user.id, result.detected_name);
      }

      console.log("[CHAT] reply", {
        user_id: user.id,
        language: result.language,
        detected_name: result.detected_name,
        history: history.length,
      });
      return res.json(result);
    } catch (e) {
      return sendError(res, e, "[CHAT] error", "chat_failed");
    }
  });

  // GET /api/chat/history?limit=50
  chat.get("/history", deps.ensureAuth, async (req, res) => {
    try {
      const q = HistoryQuery.safeParse(req.query);
      if (!q.success) return res.status(400).json({ error: "invalid_limit" });

      const user = requireUser(req);
      const messages = await deps.chat.getHistory(user.id, q.data.limit);
      return res.json({ messages });
    } catch (e) {
      return sendError(res, e, "[CHAT][history] error", "history_failed");
    }
  });

  // DELETE /api/chat/history
  chat.delete("/history", deps.ensureAuth, async (req, res) => {
    try {
      const user = requireUser(req);
      const deleted = await deps.chat.clearHistory(user.id);
      console.log("[CHAT] history cleared", { user_id: user.id, deleted });
      return res.json({ deleted });
    } catch (e) {
      return sendError(res, e, "[CHAT][history] clear error", "history_clear_failed");
    }
  });

  return chat;
}
