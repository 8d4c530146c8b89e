// src/db/reminders.ts
import { z } from "zod";
import type { SupabaseClient } from "@supabase/supabase-js";
import type { Reminder, ReminderRepository } from "../types";
import { RowId } from "./rows";

const ReminderRow = z.object({
  id: RowId,
  user_id: RowId,
  medicine_name: z.string(),
  time: z.string(),
  created_at: z.string(),
});

const COLUMNS = "id, user_id, medicine_name, time, created_at";

export function createSupabaseReminders(supa: SupabaseClient): ReminderRepository {
  return {
    async add(userId: string, medicineName: string, time: string): Promise<Reminder> {
      const { data, error } = await supa
        .from("reminders")
        .insert({ user_id: userId, medicine_name: medicineName.trim(), time: time.trim() })
        .select(COLUMNS)
        .single();

      if (error) throw error;
      return ReminderRow.parse(data);
    },

    async listForUser(userId: string): Promise<Reminder[]> {
      const { data, error } = await supa
        .from("reminders")
        .select(COLUMNS)
        .eq("user_id", userId)
        .order("time", { ascending: true });

      if (error) throw error;
      return z.array(ReminderRow).parse(data ?? []);
    },

    async delete(reminderId: string, userId: string): Promise<boolean> {
      // user_id filter doubles as the ownership check
      const { error, count } = await supa
        .from("reminders")
        .delete({ count: "exact" })
        .eq("id", reminderId)
        .eq("user_id", userId);

      if (error) throw error;
      return (count ?? 0) > 0;
    },
  };
}
