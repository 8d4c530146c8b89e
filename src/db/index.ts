// src/db/index.ts
import type { SupabaseClient } from "@supabase/supabase-js";
import type { Repositories } from "../types";
import { createSupabaseActivity } from "./activity";
import { createSupabaseChatHistory } from "./chatHistory";
import { createSupabasePreferences } from "./preferences";
import { createSupabaseReminders } from "./reminders";
import { createSupabaseUserRepository } from "./users";

export function createSupabaseRepositories(supa: SupabaseClient): Repositories {
  return {
    users: createSupabaseUserRepository(supa),
    chat: createSupabaseChatHistory(supa),
    preferences: createSupabasePreferences(supa),
    reminders: createSupabaseReminders(supa),
    activity: createSupabaseActivity(supa),
  };
}
