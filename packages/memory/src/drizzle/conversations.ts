// packages/memory/src/drizzle/conversations.ts
import { and, asc, count, desc, eq, isNull, lt } from "drizzle-orm";
import type { Db } from "@orcha/sources/client";
import { chatMessages, conversations, folders } from "@orcha/sources/schemas";
import type {
  ConversationPatch,
  ConversationRepository,
  FolderRepository,
  MessageRepository,
} from "../repositories";
import type {
  ChatMessage,
  Conversation,
  ConversationSummary,
  Folder,
  NewChatMessage,
  NewConversation,
} from "../types";

export class DrizzleConversationRepository implements ConversationRepository {
  constructor(private readonly db: Db) {}

  async findActive(id: number, userId: number): Promise<Conversation | null> {
    const rows = await this.db
      .select()
      .from(conversations)
      .where(and(eq(conversations.id, id), eq(conversations.user_id, userId), eq(conversations.is_active, true)))
      .limit(1);
    return rows[0] ?? null;
  }

  async insert(values: NewConversation): Promise<Conversation> {
    const [row] = await this.db.insert(conversations).values(values).returning();
    if (!row) throw new Error("conversations insert returned no row");
    return row;
  }

  async update(id: number, patch: ConversationPatch): Promise<boolean> {
    const rows = await this.db
      .update(conversations)
      .set(patch)
      .where(eq(conversations.id, id))
      .returning({ id: conversations.id });
    return rows.length > 0;
  }

  async setTitleIfUnset(id: number, title: string, at: Date): Promise<boolean> {
    const rows = await this.db
      .update(conversations)
      .set({ title, updated_at: at })
      .where(and(eq(conversations.id, id), isNull(conversations.title)))
      .returning({ id: conversations.id });
    return rows.length > 0;
  }

  async listActive(userId: number, page: { limit: number; offset: number }): Promise<ConversationSummary[]> {
    const rows = await this.db
      .select({ conversation: conversations, message_count: count(chatMessages.id) })
      .from(conversations)
      .leftJoin(chatMessages, eq(chatMessages.conversation_id, conversations.id))
      .where(and(eq(conversations.user_id, userId), eq(conversations.is_active, true)))
      .groupBy(conversations.id)
      .orderBy(desc(conversations.updated_at))
      .limit(page.limit)
      .offset(page.offset);
    return rows.map((r) => ({ ...r.conversation, message_count: r.message_count }));
  }

  async listRecentActive(userId: number, limit: number): Promise<Conversation[]> {
    return this.db
      .select()
      .from(conversations)
      .where(and(eq(conversations.user_id, userId), eq(conversations.is_active, true)))
      .orderBy(desc(conversations.updated_at))
      .limit(limit);
  }
}

export class DrizzleMessageRepository implements MessageRepository {
  constructor(private readonly db: Db) {}

  async insert(values: NewChatMessage): Promise<ChatMessage> {
    const [row] = await this.db.insert(chatMessages).values(values).returning();
    if (!row) throw new Error("chat_messages insert returned no row");
    return row;
  }

  async count(conversationId: number): Promise<number> {
    const [row] = await this.db
      .select({ value: count() })
      .from(chatMessages)
      .where(eq(chatMessages.conversation_id, conversationId));
    return row?.value ?? 0;
  }

  async listBefore(conversationId: number, beforeId: number, limit: number): Promise<ChatMessage[]> {
    const rows = await this.db
      .select()
      .from(chatMessages)
      .where(and(eq(chatMessages.conversation_id, conversationId), lt(chatMessages.id, beforeId)))
      .orderBy(desc(chatMessages.id))
      .limit(limit);
    return rows.reverse();
  }

  async listAll(conversationId: number): Promise<ChatMessage[]> {
    return this.db
      .select()
      .from(chatMessages)
      .where(eq(chatMessages.conversation_id, conversationId))
      .orderBy(asc(chatMessages.id));
  }
}

export class DrizzleFolderRepository implements FolderRepository {
  constructor(private readonly db: Db) {}

  async insert(userId: number, name: string): Promise<Folder> {
    const [row] = await this.db.insert(folders).values({ user_id: userId, name }).returning();
    if (!row) throw new Error("folders insert returned no row");
    return row;
  }

  async rename(userId: number, folderId: number, name: string, at: Date): Promise<boolean> {
    const rows = await this.db
      .update(folders)
      .set({ name, updated_at: at })
      .where(and(eq(folders.id, folderId), eq(folders.user_id, userId), eq(folders.is_active, true)))
      .returning({ id: folders.id });
    return rows.length > 0;
  }

  async softDeleteCascade(userId: number, folderId: number, at: Date): Promise<boolean> {
    // neon-http runs a batch as one transaction
    const [, dropped] = await this.db.batch([
      this.db
        .update(conversations)
        .set({ folder_id: null, updated_at: at })
        .where(and(eq(conversations.folder_id, folderId), eq(conversations.user_id, userId))),
      this.db
        .update(folders)
        .set({ is_active: false, updated_at: at })
        .where(and(eq(folders.id, folderId), eq(folders.user_id, userId), eq(folders.is_active, true)))
        .returning({ id: folders.id }),
    ]);
    return dropped.length > 0;
  }
}
