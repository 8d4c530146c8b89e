// src/server.ts
import "dotenv/config";
import { createResponseEngine } from "./ai/companion/engine";
import { createApp } from "./app";
import { loadConfig } from "./config";
import { createSupabase } from "./db";
import { createSupabaseRepositories } from "./db/index";

const config = loadConfig();

// ─────────────────────────────
// Boot diagnostics
// ─────────────────────────────
console.log("[BOOT] JWT_SECRET present?", !!config.jwtSecret);
console.log("[BOOT] CORS_ORIGIN =", config.corsOrigins.join(","));
console.log("[BOOT] CHAT_HISTORY_LIMIT =", config.chatHistoryLimit);
console.log("[BOOT] INACTIVITY_THRESHOLD_MINUTES =", config.inactivityThresholdMinutes);
console.log("[BOOT] chat probabilities", config.probabilities);

const supa = createSupabase(config.supabaseUrl, config.supabaseServiceRole);

// tables are validated here; a broken table stops the boot
const engine = createResponseEngine({ probabilities: config.probabilities });

const app = createApp({
  repos: createSupabaseRepositories(supa),
  engine,
  jwtSecret: config.jwtSecret,
  corsOrigins: config.corsOrigins,
  chatHistoryLimit: config.chatHistoryLimit,
  maxMessageLength: config.maxMessageLength,
  inactivityThresholdMinutes: config.inactivityThresholdMinutes,
});

app.listen(config.port, () => console.log("✅ Backend listening on", config.port));
