// src/app.ts
import express from "express";
import type { ErrorRequestHandler } from "express";
import cors from "cors";
import bodyParser from "body-parser";
import { DateTime } from "luxon";
import type { ResponseEngine } from "./ai/companion/engine";
import type { Repositories } from "./types";
import { createEnsureAuth } from "./routes/_ensureAuth";
import { createActivityRouter } from "./routes/activity";
import { createAuthRouter } from "./routes/auth";
import { createChatRouter } from "./routes/chat";
import { createPreferencesRouter } from "./routes/preferences";
import { createRemindersRouter } from "./routes/reminders";

export interface AppDeps {
  repos: Repositories;
  engine: ResponseEngine;
  jwtSecret: string;
  corsOrigins?: string[];
  chatHistoryLimit?: number;
  maxMessageLength?: number;
  inactivityThresholdMinutes?: number;
  now?: () => DateTime;
}

export function createApp(deps: AppDeps) {
  const app = express();
  const origins = deps.corsOrigins ?? ["*"];

  // ─────────────────────────────
  // Global CORS + JSON body
  // ─────────────────────────────
  app.use(
    cors({
      origin: origins.includes("*") ? "*" : origins,
      methods: ["GET", "POST", "PUT", "DELETE", "OPTIONS"],
      allowedHeaders: ["Content-Type", "Authorization"],
      credentials: false,
    })
  );
  app.use(bodyParser.json());

  // ─────────────────────────────
  // Health check
  // ─────────────────────────────
  app.get("/health", (_req, res) => res.json({ ok: true }));

  // ─────────────────────────────
  // Main API routes
  // ─────────────────────────────
  const ensureAuth = createEnsureAuth(deps.repos.users, deps.jwtSecret);

  app.use(
    "/api/auth",
    createAuthRouter({ users: deps.repos.users, jwtSecret: deps.jwtSecret, ensureAuth })
  );
  app.use(
    "/api/chat",
    createChatRouter({
      engine: deps.engine,
      chat: deps.repos.chat,
      preferences: deps.repos.preferences,
      ensureAuth,
      historyLimit: deps.chatHistoryLimit ?? 10,
      maxMessageLength: deps.maxMessageLength ?? 500,
    })
  );
  app.use(
    "/api/preferences",
    createPreferencesRouter({ preferences: deps.repos.preferences, ensureAuth })
  );
  app.use(
    "/api/reminders",
    createRemindersRouter({ reminders: deps.repos.reminders, ensureAuth })
  );
  app.use(
    "/api/activity",
    createActivityRouter({
      activity: deps.repos.activity,
      ensureAuth,
      thresholdMinutes: deps.inactivityThresholdMinutes ?? 5,
      now: deps.now ?? (() => DateTime.now()),
    })
  );

  app.use((_req, res) => {
    res.status(404).json({ error: "not_found" });
  });

  // body-parser rejects malformed JSON before any route sees it
  const onError: ErrorRequestHandler = (err, _req, res, _next) => {
    if (err instanceof SyntaxError) {
      res.status(400).json({ error: "invalid_json" });
      return;
    }
    console.error("[SERVER] unhandled", err);
    res.status(500).json({ error: "internal_error" });
  };
  app.use(onError);

  return app;
}
