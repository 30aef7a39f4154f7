// packages/sources/neon/schemas/users.ts
import { pgTable, serial, varchar, boolean, timestamp } from "drizzle-orm/pg-core";

// Owned by the auth service; read here only to find active users for the pulse job.
export const users = pgTable("users", {
  id: serial("id").primaryKey(),
  username: varchar("username", { length: 64 }).notNull().unique(),
  email: varchar("email", { length: 255 }),
  is_active: boolean("is_active").default(true).notNull(),
  created_at: timestamp("created_at").defaultNow().notNull(),
});
