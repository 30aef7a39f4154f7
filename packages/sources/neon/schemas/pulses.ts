// packages/sources/neon/schemas/pulses.ts
import { pgTable, serial, integer, text, timestamp, index } from "drizzle-orm/pg-core";
import { users } from "./users";

export const pulses = pgTable("pulses", {
  id: serial("id").primaryKey(),
  user_id: integer("user_id")
    .notNull()
    .unique()
    .references(() => users.id, { onDelete: "cascade" }),
  content: text("content").notNull(),
  generated_at: timestamp("generated_at").defaultNow().notNull(),
  conversations_analyzed: integer("conversations_analyzed").default(0).notNull(),
  messages_analyzed: integer("messages_analyzed").default(0).notNull(),
  next_generation: timestamp("next_generation").notNull(),
}, (t) => ({
  nextGenIdx: index("pulses_next_generation_idx").on(t.next_generation),
}));
