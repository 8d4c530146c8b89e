// src/db/chatHistory.ts
import { z } from "zod";
import type { SupabaseClient } from "@supabase/supabase-js";
import type { ConversationTurn, Sender } from "../ai/tone";
import type { ChatHistoryRepository, ChatMessage } from "../types";
import { RowId, SenderSchema } from "./rows";

const ChatRow = z.object({
  id: RowId,
  user_id: RowId,
  sender: SenderSchema,
  message: z.string(),
  timestamp: z.string(),
});

const TurnRow = z.object({
  sender: SenderSchema,
  message: z.string(),
});

export function createSupabaseChatHistory(supa: SupabaseClient): ChatHistoryRepository {
  return {
    async saveMessage(userId: string, sender: Sender, message: string): Promise<ChatMessage> {
      const { data, error } = await supa
        .from("chat_history")
        .insert({
          user_id: userId,
          sender,
          message: message.trim(),
          timestamp: new Date().toISOString(),
        })
        .select("id, user_id, sender, message, timestamp")
        .single();

      if (error) throw error;
      return ChatRow.parse(data);
    },

    async getRecentMessages(userId: string, limit: number): Promise<ConversationTurn[]> {
      if (limit <= 0) return [];
      const { data, error } = await supa
        .from("chat_history")
        .select("sender, message")
        .eq("user_id", userId)
        .order("id", { ascending: false })
        .limit(limit);

      if (error) throw error;
      // newest-first from the query → chronological for the engine
      return z.array(TurnRow).parse(data ?? []).reverse();
    },

    async getHistory(userId: string, limit: number): Promise<ChatMessage[]> {
      const { data, error } = await supa
        .from("chat_history")
        .select("id, user_id, sender, message, timestamp")
        .eq("user_id", userId)
        .order("id", { ascending: false })
        .limit(limit);

      if (error) throw error;
      return z.array(ChatRow).parse(data ?? []).reverse();
    },

    async clearHistory(userId: string): Promise<number> {
      const { error, count } = await supa
        .from("chat_history")
        .delete({ count: "exact" })
        .eq("user_id", userId);

      if (error) throw error;
      return count ?? 0;
    },
  };
}
