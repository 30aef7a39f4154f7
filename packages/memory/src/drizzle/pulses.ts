// packages/memory/src/drizzle/pulses.ts
import { eq, lte } from "drizzle-orm";
import type { Db } from "@orcha/sources/client";
import { pulses, users } from "@orcha/sources/schemas";
import type { PulseRepository, UserRepository } from "../repositories";
import type { Pulse, PulseValues } from "../types";

export class DrizzlePulseRepository implements PulseRepository {
  constructor(private readonly db: Db) {}

  async find(userId: number): Promise<Pulse | null> {
    const rows = await this.db.select().from(pulses).where(eq(pulses.user_id, userId)).limit(1);
    return rows[0] ?? null;
  }

  async upsert(values: PulseValues): Promise<Pulse> {
    const { user_id, ...rest } = values;
    const [row] = await this.db
      .insert(pulses)
      .values(values)
      .onConflictDoUpdate({ target: pulses.user_id, set: rest })
      .returning();
    if (!row) throw new Error(`pulses upsert returned no row for user ${user_id}`);
    return row;
  }

  async listDueUserIds(now: Date): Promise<number[]> {
    const rows = await this.db
      .select({ user_id: pulses.user_id })
      .from(pulses)
      .where(lte(pulses.next_generation, now));
    return rows.map((r) => r.user_id);
  }
}

export class DrizzleUserRepository implements UserRepository {
  constructor(private readonly db: Db) {}

  async listActiveIds(): Promise<number[]> {
    const rows = await this.db.select({ id: users.id }).from(users).where(eq(users.is_active, true));
    return rows.map((r) => r.id);
  }
}
