// src/db/preferences.ts
import { z } from "zod";
import type { SupabaseClient } from "@supabase/supabase-js";
import type { PreferenceKey, PreferenceRepository } from "../types";

const PrefRow = z.object({ pref_value: z.string() });

export function createSupabasePreferences(supa: SupabaseClient): PreferenceRepository {
  return {
    async get(userId: string, key: PreferenceKey): Promise<string | null> {
      const { data, error } = await supa
        .from("user_preferences")
        .select("pref_value")
        .eq("user_id", userId)
        .eq("pref_key", key)
        .maybeSingle();

      if (error) throw error;
      return data ? PrefRow.parse(data).pref_value : null;
    },

    async set(userId: string, key: PreferenceKey, value: string): Promise<void> {
      const { error } = await supa.from("user_preferences").upsert(
        {
          user_id: userId,
          pref_key: key,
          pref_value: value,
          updated_at: new Date().toISOString(),
        },
        { onConflict: "user_id,pref_key" }
      );
      if (error) throw error;
    },
  };
}
