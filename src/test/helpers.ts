// src/test/helpers.ts
import { DateTime } from "luxon";
import { createResponseEngine } from "../ai/companion/engine";
import type { EngineProbabilities } from "../ai/companion/engine";
import type { RandomSource } from "../ai/companion/random";
import { createApp } from "../app";
import { signToken } from "../routes/_ensureAuth";
import type { Repositories } from "../types";
import { createMemoryRepositories } from "./fakes";

export const TEST_SECRET = "test-secret";

/** Every draw returns `value`: pick() takes index 0, chance(p) is p > value. */
export function constantRandom(value = 0): RandomSource {
  return { next: () => value };
}

/** Engine with pinned randomness and no micro responder line. */
export function quietEngine(probabilities: Partial<EngineProbabilities> = {}) {
  return createResponseEngine({
    random: constantRandom(0),
    probabilities: { nameGreeting: 0, historyPreamble: 0, followUp: 0, ...probabilities },
    microResponder: () => "",
  });
}

export function createTestApp(opts: { probabilities?: Partial<EngineProbabilities> } = {}) {
  const repos: Repositories = createMemoryRepositories();
  let now = DateTime.fromISO("2026-01-01T10:00:00.000Z", { zone: "utc" });

  const app = createApp({
    repos,
    engine: quietEngine(opts.probabilities),
    jwtSecret: TEST_SECRET,
    chatHistoryLimit: 10,
    maxMessageLength: 500,
    inactivityThresholdMinutes: 5,
    now: () => now,
  });

  return {
    app,
    repos,
    advanceMinutes(minutes: number) {
      now = now.plus({ minutes });
    },
    async login(username: string) {
      const user = await repos.users.create(username, "not-a-real-hash");
      return { user, token: `Bearer ${signToken(user.id, TEST_SECRET)}` };
    },
  };
}
