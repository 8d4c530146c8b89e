// src/db/users.ts
import { z } from "zod";
import type { SupabaseClient } from "@supabase/supabase-js";
import { UsernameTakenError } from "../errors";
import type { User, UserRepository, UserWithHash } from "../types";
import { RowId, escapeLike } from "./rows";

const UserRow = z.object({
  id: RowId,
  username: z.string(),
  created_at: z.string(),
});

const UserWithHashRow = UserRow.extend({
  password_hash: z.string(),
});

export function createSupabaseUserRepository(supa: SupabaseClient): UserRepository {
  return {
    async create(username: string, passwordHash: string): Promise<User> {
      const name = username.trim();
      const { data, error } = await supa
        .from("users")
        .insert({ username: name, password_hash: passwordHash })
        .select("id, username, created_at")
        .single();

      if (error) {
        // unique_violation on lower(username)
        if (error.code === "23505") throw new UsernameTakenError(name);
        throw error;
      }
      return UserRow.parse(data);
    },

    async findByUsername(username: string): Promise<UserWithHash | null> {
      const { data, error } = await supa
        .from("users")
        .select("id, username, password_hash, created_at")
        .ilike("username", escapeLike(username.trim()))
        .limit(1)
        .maybeSingle();

      if (error) throw error;
      return data ? UserWithHashRow.parse(data) : null;
    },

    async findById(id: string): Promise<User | null> {
      const { data, error } = await supa
        .from("users")
        .select("id, username, created_at")
        .eq("id", id)
        .maybeSingle();

      if (error) throw error;
      return data ? UserRow.parse(data) : null;
    },
  };
}
