// packages/sources/neon/schemas/user_memories.ts
import { pgTable, serial, integer, text, varchar, boolean, timestamp, jsonb, index } from "drizzle-orm/pg-core";
import { users } from "./users";
import { conversations } from "./conversations";

export type MemorySource = "manual" | "auto_extraction" | "import";

// Several rows per user are allowed; readers take the N most recent active ones.
export const userMemories = pgTable("user_memories", {
  id: serial("id").primaryKey(),
  user_id: integer("user_id")
    .notNull()
    .references(() => users.id, { onDelete: "cascade" }),
  content: text("content").notNull(),
  title: varchar("title", { length: 255 }),
  conversation_id: integer("conversation_id").references(() => conversations.id, { onDelete: "set null" }),
  source: varchar("source", { length: 32 }).$type<MemorySource>().default("manual").notNull(),
  tags: jsonb("tags").$type<string[]>(),
  is_active: boolean("is_active").default(true).notNull(),
  created_at: timestamp("created_at").defaultNow().notNull(),
  updated_at: timestamp("updated_at").defaultNow().notNull(),
}, (t) => ({
  userActiveIdx: index("user_memories_user_active_idx").on(t.user_id, t.is_active, t.created_at),
}));
