// packages/memory/src/conversations.ts
import { clip, createLog, ValidationError, type Log } from "@orcha/utils";
import type {
  ConversationRepository,
  FolderRepository,
  MessageRepository,
} from "./repositories";
import type {
  ChatMessage,
  ChatRole,
  Conversation,
  ConversationSummary,
  Folder,
  HistoryMessage,
} from "./types";
import type { StoredAttachment, StoredContext } from "@orcha/sources/schemas";

export const TITLE_MAX_CHARS = 50;
export const DEFAULT_HISTORY_LIMIT = 10;

export type AppendMessageInput = {
  conversationId: number;
  role: ChatRole;
  content: string;
  attachments?: StoredAttachment[] | null;
  tokenCount?: number | null;
  model?: string | null;
  error?: string | null;
  contextsUsed?: StoredContext[] | null;
};

export type ResolvedConversation = { conversation: Conversation; created: boolean };

export type ConversationStoreDeps = {
  conversations: ConversationRepository;
  messages: MessageRepository;
  folders: FolderRepository;
};

/** First 50 chars of the user's text, with "..." when cut. */
export function makeTitle(candidate: string): string {
  return clip(candidate, TITLE_MAX_CHARS);
}

export class ConversationStore {
  private readonly log: Log;
  private readonly now: () => Date;

  constructor(
    private readonly repos: ConversationStoreDeps,
    opts: { log?: Log; now?: () => Date } = {},
  ) {
    this.log = opts.log ?? createLog("store");
    this.now = opts.now ?? (() => new Date());
  }

  /**
   * Reuses an active conversation owned by `userId`, otherwise creates one with a null title.
   * An id that does not resolve is logged and treated as "create new".
   */
  async resolveOrCreate(input: {
    conversationId?: number | null;
    userId: number;
    tenantId?: string | null;
  }): Promise<ResolvedConversation> {
    const { conversationId, userId } = input;
    if (conversationId != null) {
      const found = await this.repos.conversations.findActive(conversationId, userId);
      if (found) return { conversation: found, created: false };
      this.log.warn(`conversation ${conversationId} not found for user ${userId}; creating a new one`);
    }
    const at = this.now();
    const conversation = await this.repos.conversations.insert({
      user_id: userId,
      tenant_id: input.tenantId ?? null,
      title: null,
      created_at: at,
      updated_at: at,
    });
    this.log.debug(`created conversation ${conversation.id} for user ${userId}`);
    return { conversation, created: true };
  }

  async appendMessage(input: AppendMessageInput): Promise<ChatMessage> {
    return this.repos.messages.insert({
      conversation_id: input.conversationId,
      role: input.role,
      content: input.content,
      attachments: input.attachments ?? null,
      token_count: input.tokenCount ?? null,
      model: input.model ?? null,
      error_message: input.error ?? null,
      contexts_used: input.contextsUsed ?? null,
      created_at: this.now(),
    });
  }

  /** Up to `limit` user/assistant messages strictly before `beforeMessageId`, oldest first. */
  async loadHistory(
    conversationId: number,
    beforeMessageId: number,
    limit = DEFAULT_HISTORY_LIMIT,
  ): Promise<HistoryMessage[]> {
    const rows = await this.repos.messages.listBefore(conversationId, beforeMessageId, limit);
    return toHistory(rows);
  }

  countMessages(conversationId: number): Promise<number> {
    return this.repos.messages.count(conversationId);
  }

  /**
   * Sets the title once, while the conversation holds at most the first user/assistant pair.
   * Returns the title written, or null when nothing changed. A blank candidate leaves the title unset.
   */
  async maybeSetTitle(conversation: Pick<Conversation, "id" | "title">, candidate: string): Promise<string | null> {
    if (conversation.title || !candidate.trim()) return null;
    const n = await this.repos.messages.count(conversation.id);
    if (n > 2) return null;
    const title = makeTitle(candidate);
    const written = await this.repos.conversations.setTitleIfUnset(conversation.id, title, this.now());
    return written ? title : null;
  }

  async touch(conversationId: number): Promise<void> {
    await this.repos.conversations.update(conversationId, { updated_at: this.now() });
  }

  async softDelete(userId: number, conversationId: number): Promise<boolean> {
    const found = await this.repos.conversations.findActive(conversationId, userId);
    if (!found) return false;
    return this.repos.conversations.update(conversationId, { is_active: false, updated_at: this.now() });
  }

  softDeleteFolderCascade(userId: number, folderId: number): Promise<boolean> {
    return this.repos.folders.softDeleteCascade(userId, folderId, this.now());
  }

  listConversations(userId: number, page: { limit?: number; offset?: number } = {}): Promise<ConversationSummary[]> {
    const limit = Math.max(1, Math.min(100, page.limit ?? 20));
    const offset = Math.max(0, page.offset ?? 0);
    return this.repos.conversations.listActive(userId, { limit, offset });
  }

  /** Most recently updated active conversations, newest first. */
  recentConversations(userId: number, limit: number): Promise<Conversation[]> {
    return this.repos.conversations.listRecentActive(userId, limit);
  }

  listMessages(conversationId: number): Promise<ChatMessage[]> {
    return this.repos.messages.listAll(conversationId);
  }

  async getConversation(
    userId: number,
    conversationId: number,
  ): Promise<{ conversation: Conversation; messages: ChatMessage[] } | null> {
    const conversation = await this.repos.conversations.findActive(conversationId, userId);
    if (!conversation) return null;
    const messages = await this.repos.messages.listAll(conversationId);
    return { conversation, messages };
  }

  async rename(userId: number, conversationId: number, title: string): Promise<boolean> {
    const name = title.trim();
    if (!name) throw new ValidationError("title must not be empty");
    const found = await this.repos.conversations.findActive(conversationId, userId);
    if (!found) return false;
    return this.repos.conversations.update(conversationId, { title: name, updated_at: this.now() });
  }

  async createFolder(userId: number, name: string): Promise<Folder> {
    const clean = name.trim();
    if (!clean) throw new ValidationError("folder name must not be empty");
    return this.repos.folders.insert(userId, clean);
  }

  async renameFolder(userId: number, folderId: number, name: string): Promise<boolean> {
    const clean = name.trim();
    if (!clean) throw new ValidationError("folder name must not be empty");
    return this.repos.folders.rename(userId, folderId, clean, this.now());
  }
}

export function toHistory(rows: ChatMessage[]): HistoryMessage[] {
  const out: HistoryMessage[] = [];
  for (const m of rows) {
    if (m.role === "user" || m.role === "assistant") out.push({ role: m.role, content: m.content });
  }
  return out;
}
