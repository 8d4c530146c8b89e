// src/util/reminders.ts
import { DateTime } from "luxon";
import { ValidationError } from "../errors";

export const MAX_MEDICINE_NAME_LENGTH = 100;

export type ReminderInput = {
  medicineName: string;
  time: string; // normalized HH:mm
};

/**
 * "8:30" and "08:30" are both accepted and stored as "08:30",
 * so ordering by the text column is ordering by time of day.
 */
export function normalizeReminderTime(raw: string): string | null {
  const t = (raw || "").trim();
  if (!/^\d{1,2}:\d{2}$/.test(t)) return null;
  const dt = DateTime.fromFormat(t, "H:mm");
  return dt.isValid ? dt.toFormat("HH:mm") : null;
}

export function parseReminderInput(body: unknown): ReminderInput {
  const obj: object = body && typeof body === "object" ? body : {};
  const rawName = "medicine_name" in obj ? obj.medicine_name : undefined;
  const rawTime = "time" in obj ? obj.time : undefined;

  const medicineName = typeof rawName === "string" ? rawName.trim() : "";
  if (!medicineName) {
    throw new ValidationError("Medicine name is required", "medicine_name_required");
  }
  if (medicineName.length > MAX_MEDICINE_NAME_LENGTH) {
    throw new ValidationError(
      `Medicine name must be at most ${MAX_MEDICINE_NAME_LENGTH} characters`,
      "medicine_name_too_long"
    );
  }

  const timeText = typeof rawTime === "string" ? rawTime.trim() : "";
  if (!timeText) {
    throw new ValidationError("Time is required", "time_required");
  }
  const time = normalizeReminderTime(timeText);
  if (!time) {
    throw new ValidationError(
      "Time must be in HH:MM format (e.g., 08:30, 14:45)",
      "invalid_time"
    );
  }

  return { medicineName, time };
}
