// packages/memory/src/drizzle/tokenUsage.ts
import { and, eq, sql } from "drizzle-orm";
import type { Db } from "@orcha/sources/client";
import { tokenUsage } from "@orcha/sources/schemas";
import type { TokenUsageRepository, TokenWindow } from "../repositories";
import type { TokenUsageRow } from "../types";

export class DrizzleTokenUsageRepository implements TokenUsageRepository {
  constructor(private readonly db: Db) {}

  async find(userId: number): Promise<TokenUsageRow | null> {
    const rows = await this.db.select().from(tokenUsage).where(eq(tokenUsage.user_id, userId)).limit(1);
    return rows[0] ?? null;
  }

  async insertIfAbsent(userId: number, window: TokenWindow): Promise<boolean> {
    const rows = await this.db
      .insert(tokenUsage)
      .values({ user_id: userId, ...window, version: 0 })
      .onConflictDoNothing({ target: tokenUsage.user_id })
      .returning({ user_id: tokenUsage.user_id });
    return rows.length > 0;
  }

  async replaceIfVersion(userId: number, expectedVersion: number, window: TokenWindow): Promise<boolean> {
    const rows = await this.db
      .update(tokenUsage)
      .set({ ...window, version: sql`${tokenUsage.version} + 1` })
      .where(and(eq(tokenUsage.user_id, userId), eq(tokenUsage.version, expectedVersion)))
      .returning({ user_id: tokenUsage.user_id });
    return rows.length > 0;
  }

  async delete(userId: number): Promise<boolean> {
    const rows = await this.db
      .delete(tokenUsage)
      .where(eq(tokenUsage.user_id, userId))
      .returning({ user_id: tokenUsage.user_id });
    return rows.length > 0;
  }
}
