// src/config.ts
import { z } from "zod";
import type { EngineProbabilities } from "./ai/companion/engine";

const probability = (fallback: number) => z.coerce.number().min(0).max(1).default(fallback);

const EnvSchema = z.object({
  PORT: z.coerce.number().int().positive().default(5000),
  JWT_SECRET: z.string().min(1, "JWT_SECRET is required"),
  SUPABASE_URL: z.string().url(),
  SUPABASE_SERVICE_ROLE: z.string().min(1, "SUPABASE_SERVICE_ROLE is required"),
  CORS_ORIGIN: z.string().default("*"),

  CHAT_HISTORY_LIMIT: z.coerce.number().int().min(0).default(10),
  MAX_MESSAGE_LENGTH: z.coerce.number().int().positive().default(500),
  INACTIVITY_THRESHOLD_MINUTES: z.coerce.number().int().positive().default(5),

  CHAT_PROB_NAME_GREETING: probability(0.55),
  CHAT_PROB_HISTORY_PREAMBLE: probability(0.35),
  CHAT_PROB_FOLLOW_UP: probability(0.75),
});

export interface AppConfig {
  port: number;
  jwtSecret: string;
  supabaseUrl: string;
  supabaseServiceRole: string;
  corsOrigins: string[];
  chatHistoryLimit: number;
  maxMessageLength: number;
  inactivityThresholdMinutes: number;
  probabilities: EngineProbabilities;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((i) => `${i.path.join(".")}: ${i.message}`)
      .join("; ");
    throw new Error(`[CONFIG] invalid environment: ${details}`);
  }
  const e = parsed.data;

  return {
    port: e.PORT,
    jwtSecret: e.JWT_SECRET,
    supabaseUrl: e.SUPABASE_URL,
    supabaseServiceRole: e.SUPABASE_SERVICE_ROLE,
    corsOrigins: e.CORS_ORIGIN.split(",").map((s) => s.trim()).filter(Boolean),
    chatHistoryLimit: e.CHAT_HISTORY_LIMIT,
    maxMessageLength: e.MAX_MESSAGE_LENGTH,
    inactivityThresholdMinutes: e.INACTIVITY_THRESHOLD_MINUTES,
    probabilities: {
      nameGreeting: e.CHAT_PROB_NAME_GREETING,
      historyPreamble: e.CHAT_PROB_HISTORY_PREAMBLE,
      followUp: e.CHAT_PROB_FOLLOW_UP,
    },
  };
}
