// src/types.ts
import type { ConversationTurn, Sender } from "./ai/tone";

export type User = {
  id: string;
  username: string;
  created_at: string;
};

export type UserWithHash = User & {
  password_hash: string;
};

export type ChatMessage = {
  id: string;
  user_id: string;
  sender: Sender;
  message: string;
  timestamp: string;
};

export type Reminder = {
  id: string;
  user_id: string;
  medicine_name: string;
  time: string; // HH:mm, 24h
  created_at: string;
};

export type PreferenceKey = "language" | "display_name";

// ─────────────────────────────────────────────
// Repositories (Supabase in prod, in-memory fakes in tests)
// ─────────────────────────────────────────────

export interface UserRepository {
  /** throws UsernameTakenError on duplicate (case-insensitive) */
  create(username: string, passwordHash: string): Promise<User>;
  findByUsername(username: string): Promise<UserWithHash | null>;
  findById(id: string): Promise<User | null>;
}

export interface ChatHistoryRepository {
  saveMessage(userId: string, sender: Sender, message: string): Promise<ChatMessage>;
  /** latest `limit` turns, oldest first */
  getRecentMessages(userId: string, limit: number): Promise<ConversationTurn[]>;
  /** latest `limit` full rows, oldest first */
  getHistory(userId: string, limit: number): Promise<ChatMessage[]>;
  /** returns number of deleted rows */
  clearHistory(userId: string): Promise<number>;
}

export interface PreferenceRepository {
  get(userId: string, key: PreferenceKey): Promise<string | null>;
  set(userId: string, key: PreferenceKey, value: string): Promise<void>;
}

export interface ReminderRepository {
  add(userId: string, medicineName: string, time: string): Promise<Reminder>;
  /** sorted by time ascending */
  listForUser(userId: string): Promise<Reminder[]>;
  /** false when missing or owned by someone else */
  delete(reminderId: string, userId: string): Promise<boolean>;
}

export interface ActivityRepository {
  /** ISO timestamp or null when nothing was recorded yet */
  getLastActivity(userId: string): Promise<string | null>;
  touch(userId: string, at: string): Promise<void>;
}

export interface Repositories {
  users: UserRepository;
  chat: ChatHistoryRepository;
  preferences: PreferenceRepository;
  reminders: ReminderRepository;
  activity: ActivityRepository;
}
