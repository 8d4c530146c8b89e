// src/util/inactivity.ts
import { DateTime } from "luxon";

export type InactivityStatus = {
  is_inactive: boolean;
  message: string;
  minutes_inactive?: number;
  minutes_remaining?: number;
  last_activity?: string;
};

/**
 * Compare the last recorded activity with `now`.
 * No activity yet means tracking just started, never "inactive".
 */
export function evaluateInactivity(
  lastActivity: string | null,
  now: DateTime,
  thresholdMinutes: number
): InactivityStatus {
  if (!lastActivity) {
    return { is_inactive: false, message: "Activity tracking started." };
  }

  const last = DateTime.fromISO(lastActivity);
  if (!last.isValid) {
    return {
      is_inactive: false,
      message: `Unable to parse activity timestamp: ${lastActivity}`,
    };
  }

  const elapsed = Math.floor(now.diff(last, "minutes").minutes);
  if (elapsed >= thresholdMinutes) {
    return {
      is_inactive: true,
      message: `You have been inactive for ${elapsed} minutes. Please take a moment to check in with yourself or continue using the app.`,
      minutes_inactive: elapsed,
      last_activity: lastActivity,
    };
  }

  const remaining = thresholdMinutes - Math.max(elapsed, 0);
  return {
    is_inactive: false,
    message: `User is active. Inactivity alert in ${remaining} minutes.`,
    minutes_remaining: remaining,
  };
}
