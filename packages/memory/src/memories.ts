// packages/memory/src/memories.ts
import type { UserMemoryRepository } from "./repositories";
import type { MemorySource } from "@orcha/sources/schemas";
import type { UserMemory } from "./types";
import { ValidationError } from "@orcha/utils";

export const DEFAULT_MEMORY_LIMIT = 5;

export class UserMemoryStore {
  private readonly now: () => Date;

  constructor(
    private readonly repo: UserMemoryRepository,
    opts: { now?: () => Date } = {},
  ) {
    this.now = opts.now ?? (() => new Date());
  }

  /** The `limit` most recent active memories, oldest first. */
  async recent(userId: number, limit = DEFAULT_MEMORY_LIMIT): Promise<UserMemory[]> {
    const rows = await this.repo.listRecentActive(userId, limit);
    return [...rows].reverse();
  }

  async add(input: {
    userId: number;
    content: string;
    title?: string | null;
    conversationId?: number | null;
    source?: MemorySource;
    tags?: string[] | null;
  }): Promise<UserMemory> {
    const content = input.content.trim();
    if (!content) throw new ValidationError("memory content must not be empty");
    const at = this.now();
    return this.repo.insert({
      user_id: input.userId,
      content,
      title: input.title ?? null,
      conversation_id: input.conversationId ?? null,
      source: input.source ?? "manual",
      tags: input.tags ?? null,
      is_active: true,
      created_at: at,
      updated_at: at,
    });
  }

  remove(userId: number, memoryId: number): Promise<boolean> {
    return this.repo.deactivate(userId, memoryId, this.now());
  }
}
