import { describe, it, expect } from "vitest";
import { DateTime } from "luxon";
import { evaluateInactivity } from "./inactivity";

const LAST = "2026-01-01T10:00:00.000Z";
const at = (iso: string) => DateTime.fromISO(iso, { zone: "utc" });

describe("evaluateInactivity", () => {
  it("starts tracking when nothing was recorded", () => {
    expect(evaluateInactivity(null, at(LAST), 5)).toEqual({
      is_inactive: false,
      message: "Activity tracking started.",
    });
  });

  it("reports minutes left before the alert", () => {
    expect(evaluateInactivity(LAST, at("2026-01-01T10:02:59.000Z"), 5)).toEqual({
      is_inactive: false,
      message: "User is active. Inactivity alert in 3 minutes.",
      minutes_remaining: 3,
    });
  });

  it("flags inactivity at the threshold", () => {
    expect(evaluateInactivity(LAST, at("2026-01-01T10:07:30.000Z"), 5)).toEqual({
      is_inactive: true,
      message:
        "You have been inactive for 7 minutes. Please take a moment to check in with yourself or continue using the app.",
      minutes_inactive: 7,
      last_activity: LAST,
    });
    expect(evaluateInactivity(LAST, at("2026-01-01T10:05:00.000Z"), 5).is_inactive).toBe(true);
  });

  it("treats a timestamp in the future as just now", () => {
    expect(evaluateInactivity(LAST, at("2026-01-01T09:58:00.000Z"), 5).minutes_remaining).toBe(5);
  });

  it("survives an unreadable timestamp", () => {
    expect(evaluateInactivity("yesterday", at(LAST), 5)).toEqual({
      is_inactive: false,
      message: "Unable to parse activity timestamp: yesterday",
    });
  });
});
