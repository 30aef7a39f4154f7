// packages/sources/neon/client/index.ts
import { drizzle, type NeonHttpDatabase } from "drizzle-orm/neon-http";
import { neon } from "@neondatabase/serverless";

export type Db = NeonHttpDatabase;

let db: Db | null = null;

/** Lazy singleton: nothing connects until the first query path asks for it. */
export function getDb(databaseUrl = process.env.DATABASE_URL): Db {
  if (db) return db;
  if (!databaseUrl) throw new Error("DATABASE_URL not set");
  db = drizzle(neon(databaseUrl));
  return db;
}
