// src/db/activity.ts
import { z } from "zod";
import type { SupabaseClient } from "@supabase/supabase-js";
import type { ActivityRepository } from "../types";

const ActivityRow = z.object({ last_activity: z.string().nullable() });

export function createSupabaseActivity(supa: SupabaseClient): ActivityRepository {
  return {
    async getLastActivity(userId: string): Promise<string | null> {
      const { data, error } = await supa
        .from("user_activity")
        .select("last_activity")
        .eq("user_id", userId)
        .maybeSingle();

      if (error) throw error;
      return data ? ActivityRow.parse(data).last_activity : null;
    },

    async touch(userId: string, at: string): Promise<void> {
      const { error } = await supa
        .from("user_activity")
        .upsert({ user_id: userId, last_activity: at }, { onConflict: "user_id" });
      if (error) throw error;
    },
  };
}
