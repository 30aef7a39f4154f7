// packages/sources/neon/schemas/chat_messages.ts
import { pgTable, serial, integer, text, timestamp, varchar, jsonb, index } from "drizzle-orm/pg-core";
import { conversations } from "./conversations";

export type StoredAttachment = {
  type?: string;
  filename?: string;
  uri?: string;
  size?: number;
};

export type StoredContext = { source: string; text: string };

export const chatMessages = pgTable("chat_messages", {
  // id is the ordering key: history queries compare ids, never created_at
  id: serial("id").primaryKey(),
  conversation_id: integer("conversation_id")
    .notNull()
    .references(() => conversations.id, { onDelete: "cascade" }),
  role: varchar("role", { length: 16 }).notNull().$type<"user" | "assistant" | "system">(),
  content: text("content").notNull(),
  attachments: jsonb("attachments").$type<StoredAttachment[]>(),
  token_count: integer("token_count"),
  model: varchar("model", { length: 128 }),
  error_message: text("error_message"),
  contexts_used: jsonb("contexts_used").$type<StoredContext[]>(),
  created_at: timestamp("created_at").defaultNow().notNull(),
}, (t) => ({
  convIdIdx: index("chat_messages_conversation_id_idx").on(t.conversation_id, t.id),
}));
