// packages/memory/src/types.ts
import type {
  conversations,
  chatMessages,
  folders,
  userMemories,
  tokenUsage,
  pulses,
} from "@orcha/sources/schemas";

export type Conversation = typeof conversations.$inferSelect;
export type NewConversation = typeof conversations.$inferInsert;
export type ConversationSummary = Conversation & { message_count: number };

export type ChatMessage = typeof chatMessages.$inferSelect;
export type NewChatMessage = typeof chatMessages.$inferInsert;
export type ChatRole = ChatMessage["role"];

export type Folder = typeof folders.$inferSelect;

export type UserMemory = typeof userMemories.$inferSelect;
export type NewUserMemory = typeof userMemories.$inferInsert;

export type TokenUsageRow = typeof tokenUsage.$inferSelect;

export type Pulse = typeof pulses.$inferSelect;
export type PulseValues = Omit<Pulse, "id">;

/** What the model sees from stored history. */
export type HistoryMessage = { role: "user" | "assistant"; content: string };
