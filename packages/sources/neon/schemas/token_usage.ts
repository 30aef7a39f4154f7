// packages/sources/neon/schemas/token_usage.ts
import { pgTable, integer, bigint, timestamp } from "drizzle-orm/pg-core";
import { users } from "./users";

export const tokenUsage = pgTable("token_usage", {
  user_id: integer("user_id")
    .primaryKey()
    .references(() => users.id, { onDelete: "cascade" }),
  total_tokens: bigint("total_tokens", { mode: "number" }).default(0).notNull(),
  reset_at: timestamp("reset_at").notNull(),
  last_updated: timestamp("last_updated").defaultNow().notNull(),
  // bumped on every write; writers compare-and-set on it
  version: integer("version").default(0).notNull(),
});
