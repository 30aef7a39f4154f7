// packages/memory/src/repositories.ts
// Storage seams. Drizzle/Neon implementations live in ./drizzle; tests use in-memory ones.
import type {
  ChatMessage,
  Conversation,
  ConversationSummary,
  Folder,
  NewChatMessage,
  NewConversation,
  NewUserMemory,
  Pulse,
  PulseValues,
  TokenUsageRow,
  UserMemory,
} from "./types";

export type ConversationPatch = Partial<Pick<Conversation, "title" | "folder_id" | "is_active" | "updated_at">>;

export interface ConversationRepository {
  findActive(id: number, userId: number): Promise<Conversation | null>;
  insert(values: NewConversation): Promise<Conversation>;
  update(id: number, patch: ConversationPatch): Promise<boolean>;
  /** Conditional write: only succeeds while title IS NULL. */
  setTitleIfUnset(id: number, title: string, at: Date): Promise<boolean>;
  listActive(userId: number, page: { limit: number; offset: number }): Promise<ConversationSummary[]>;
  /** Most recently updated first. */
  listRecentActive(userId: number, limit: number): Promise<Conversation[]>;
}

export interface MessageRepository {
  insert(values: NewChatMessage): Promise<ChatMessage>;
  count(conversationId: number): Promise<number>;
  /** The `limit` messages with id < beforeId, returned oldest-first. */
  listBefore(conversationId: number, beforeId: number, limit: number): Promise<ChatMessage[]>;
  listAll(conversationId: number): Promise<ChatMessage[]>;
}

export interface FolderRepository {
  insert(userId: number, name: string): Promise<Folder>;
  rename(userId: number, folderId: number, name: string, at: Date): Promise<boolean>;
  /** Deactivates the folder and nulls folder_id on its conversations in one unit. */
  softDeleteCascade(userId: number, folderId: number, at: Date): Promise<boolean>;
}

export interface UserMemoryRepository {
  /** Newest first. */
  listRecentActive(userId: number, limit: number): Promise<UserMemory[]>;
  insert(values: NewUserMemory): Promise<UserMemory>;
  deactivate(userId: number, memoryId: number, at: Date): Promise<boolean>;
}

export type TokenWindow = Pick<TokenUsageRow, "total_tokens" | "reset_at" | "last_updated">;

export interface TokenUsageRepository {
  find(userId: number): Promise<TokenUsageRow | null>;
  /** INSERT … ON CONFLICT DO NOTHING; false when a concurrent writer got there first. */
  insertIfAbsent(userId: number, window: TokenWindow): Promise<boolean>;
  /** UPDATE … WHERE version = expected; bumps version. */
  replaceIfVersion(userId: number, expectedVersion: number, window: TokenWindow): Promise<boolean>;
  delete(userId: number): Promise<boolean>;
}

export interface PulseRepository {
  find(userId: number): Promise<Pulse | null>;
  /** Single-statement insert-or-overwrite keyed on user_id. */
  upsert(values: PulseValues): Promise<Pulse>;
  listDueUserIds(now: Date): Promise<number[]>;
}

export interface UserRepository {
  listActiveIds(): Promise<number[]>;
}

export type Repositories = {
  conversations: ConversationRepository;
  messages: MessageRepository;
  folders: FolderRepository;
  memories: UserMemoryRepository;
  tokenUsage: TokenUsageRepository;
  pulses: PulseRepository;
  users: UserRepository;
};
