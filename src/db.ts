// src/db.ts
import { createClient } from "@supabase/supabase-js";
import type { SupabaseClient } from "@supabase/supabase-js";

export function createSupabase(url: string, serviceRole: string): SupabaseClient {
  console.log("[DB] SUPABASE_URL =", url);
  console.log("[DB] SUPABASE_SERVICE_ROLE len", serviceRole.length);
  return createClient(
    url,
    serviceRole, // MUST be service role (not anon)
    { auth: { persistSession: false } }
  );
}
