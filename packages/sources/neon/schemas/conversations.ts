// packages/sources/neon/schemas/conversations.ts
import { pgTable, serial, integer, varchar, boolean, timestamp, index } from "drizzle-orm/pg-core";
import { users } from "./users";
import { folders } from "./folders";

export const conversations = pgTable("conversations", {
  id: serial("id").primaryKey(),
  user_id: integer("user_id")
    .notNull()
    .references(() => users.id, { onDelete: "cascade" }),
  tenant_id: varchar("tenant_id", { length: 64 }),
  title: varchar("title", { length: 255 }),               // null until the first reply is stored
  // weak link: nulled when the folder goes away
  folder_id: integer("folder_id").references(() => folders.id, { onDelete: "set null" }),
  is_active: boolean("is_active").default(true).notNull(),
  created_at: timestamp("created_at").defaultNow().notNull(),
  updated_at: timestamp("updated_at").defaultNow().notNull(),
}, (t) => ({
  userUpdatedIdx: index("conversations_user_updated_idx").on(t.user_id, t.updated_at),
  folderIdx: index("conversations_folder_id_idx").on(t.folder_id),
}));
