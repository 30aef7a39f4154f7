// packages/memory/src/drizzle/memories.ts
import { and, desc, eq } from "drizzle-orm";
import type { Db } from "@orcha/sources/client";
import { userMemories } from "@orcha/sources/schemas";
import type { UserMemoryRepository } from "../repositories";
import type { NewUserMemory, UserMemory } from "../types";

export class DrizzleUserMemoryRepository implements UserMemoryRepository {
  constructor(private readonly db: Db) {}

  async listRecentActive(userId: number, limit: number): Promise<UserMemory[]> {
    return this.db
      .select()
      .from(userMemories)
      .where(and(eq(userMemories.user_id, userId), eq(userMemories.is_active, true)))
      .orderBy(desc(userMemories.created_at), desc(userMemories.id))
      .limit(limit);
  }

  async insert(values: NewUserMemory): Promise<UserMemory> {
    const [row] = await this.db.insert(userMemories).values(values).returning();
    if (!row) throw new Error("user_memories insert returned no row");
    return row;
  }

  async deactivate(userId: number, memoryId: number, at: Date): Promise<boolean> {
    const rows = await this.db
      .update(userMemories)
      .set({ is_active: false, updated_at: at })
      .where(and(eq(userMemories.id, memoryId), eq(userMemories.user_id, userId)))
      .returning({ id: userMemories.id });
    return rows.length > 0;
  }
}
