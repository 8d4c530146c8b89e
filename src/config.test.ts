import { describe, it, expect } from "vitest";
import { loadConfig } from "./config";

const base = {
  JWT_SECRET: "test-secret",
  SUPABASE_URL: "http://localhost:54321",
  SUPABASE_SERVICE_ROLE: "test-service-role",
};

describe("loadConfig", () => {
  it("fills in defaults", () => {
    expect(loadConfig(base)).toEqual({
      port: 5000,
      jwtSecret: "test-secret",
      supabaseUrl: "http://localhost:54321",
      supabaseServiceRole: "test-service-role",
      corsOrigins: ["*"],
      chatHistoryLimit: 10,
      maxMessageLength: 500,
      inactivityThresholdMinutes: 5,
      probabilities: { nameGreeting: 0.55, historyPreamble: 0.35, followUp: 0.75 },
    });
  });

  it("reads overrides from strings", () => {
    const cfg = loadConfig({
      ...base,
      PORT: "8080",
      CORS_ORIGIN: "http://a.test, http://b.test",
      CHAT_PROB_FOLLOW_UP: "0",
      INACTIVITY_THRESHOLD_MINUTES: "15",
    });
    expect(cfg.port).toBe(8080);
    expect(cfg.corsOrigins).toEqual(["http://a.test", "http://b.test"]);
    expect(cfg.probabilities.followUp).toBe(0);
    expect(cfg.inactivityThresholdMinutes).toBe(15);
  });

  it("rejects a missing secret or an out-of-range probability", () => {
    expect(() => loadConfig({ ...base, JWT_SECRET: undefined })).toThrow(
      /^\[CONFIG\] invalid environment: JWT_SECRET/
    );
    expect(() => loadConfig({ ...base, CHAT_PROB_NAME_GREETING: "1.5" })).toThrow(
      /CHAT_PROB_NAME_GREETING/
    );
    expect(() => loadConfig({ ...base, SUPABASE_URL: "not a url" })).toThrow(/SUPABASE_URL/);
  });
});
