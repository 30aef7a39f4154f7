// packages/pulse/src/service.ts
import { createLog, DAY_MS, errMessage, isoMinute, withDeadline, type Log } from "@orcha/utils";
import { ChatUpstreamError, loadPrompt, type ChatClient } from "@orcha/llm";
import type { ChatMessage, Conversation, ConversationStore, Pulse, PulseStore } from "@orcha/memory";

export const NOTHING_IMPORTANT = "Nothing important for now.";
export const CONTEXT_TOO_LARGE = "Pulse generation failed: Context too large. Try reducing conversation history.";
const TRUNCATED_MESSAGE = "... (truncated)";
const TRUNCATED_DIGEST = "\n... (Additional conversations truncated to fit context limit)\n";

export type PulseLimits = {
  conversations: number;
  messageChars: number;
  totalChars: number;
  timeoutMs: number;
  intervalMs: number;
};

export const DEFAULT_PULSE_LIMITS: PulseLimits = {
  conversations: 5,
  messageChars: 300,
  totalChars: 4000,
  timeoutMs: 120_000,
  intervalMs: DAY_MS,
};

export type PulseDigest = {
  text: string;
  conversationsAnalyzed: number;
  messagesAnalyzed: number;
};

export type PulseServiceDeps = {
  conversations: ConversationStore;
  pulses: PulseStore;
  chat: ChatClient;
  limits?: Partial<PulseLimits>;
  prompt?: string;
  now?: () => Date;
  log?: Log;
};

/**
 * Transcript of the given conversations, oldest message first inside each one.
 * Stops once the text grows past `totalChars`.
 */
export function buildDigest(
  threads: Array<{ conversation: Conversation; messages: ChatMessage[] }>,
  limits: Pick<PulseLimits, "messageChars" | "totalChars">,
): PulseDigest {
  let text = "";
  let messagesAnalyzed = 0;
  let full = false;

  for (const { conversation, messages } of threads) {
    messagesAnalyzed += messages.length;
    if (full || !messages.length) continue;

    text += `\n\n=== Conversation: ${conversation.title || "Untitled Conversation"} ===\n`;
    text += `Date: ${isoMinute(conversation.created_at)}\n\n`;

    for (const m of messages) {
      if (m.role !== "user" && m.role !== "assistant") continue;
      const label = m.role === "user" ? "User" : "Assistant";
      const body =
        m.content.length > limits.messageChars ? m.content.slice(0, limits.messageChars) + TRUNCATED_MESSAGE : m.content;
      text += `${label}: ${body}\n\n`;
      if (text.length > limits.totalChars) {
        text += TRUNCATED_DIGEST;
        full = true;
        break;
      }
    }
  }

  return { text, conversationsAnalyzed: threads.length, messagesAnalyzed };
}

export class PulseService {
  private readonly limits: PulseLimits;
  private readonly now: () => Date;
  private readonly log: Log;

  constructor(private readonly deps: PulseServiceDeps) {
    this.limits = { ...DEFAULT_PULSE_LIMITS, ...deps.limits };
    this.now = deps.now ?? (() => new Date());
    this.log = deps.log ?? createLog("pulse");
  }

  async collect(userId: number): Promise<PulseDigest> {
    const recent = await this.deps.conversations.recentConversations(userId, this.limits.conversations);
    const threads: Array<{ conversation: Conversation; messages: ChatMessage[] }> = [];
    for (const conversation of recent) {
      threads.push({ conversation, messages: await this.deps.conversations.listMessages(conversation.id) });
    }
    return buildDigest(threads, this.limits);
  }

  /**
   * Pulse text for a user, or null when generation failed.
   * A 400 from the model (context too large) yields a fixed explanatory text instead.
   */
  async generate(userId: number): Promise<{ content: string; digest: PulseDigest } | null> {
    try {
      const digest = await this.collect(userId);
      if (!digest.conversationsAnalyzed || !digest.text.trim()) {
        this.log.info(`user ${userId}: nothing to analyze`);
        return { content: NOTHING_IMPORTANT, digest };
      }
      this.log.debug(`user ${userId}: ${digest.messagesAnalyzed} messages, ${digest.text.length} chars`);

      try {
        const res = await withDeadline(
          (signal) =>
            this.deps.chat.complete({
              messages: [
                { role: "system", content: this.deps.prompt ?? loadPrompt("pulse") },
                { role: "user", content: `Here are all the conversations to analyze:\n${digest.text}` },
              ],
              signal,
            }),
          this.limits.timeoutMs,
          "pulse",
        );
        return { content: res.text.trim() ? res.text : NOTHING_IMPORTANT, digest };
      } catch (e) {
        if (e instanceof ChatUpstreamError && e.status === 400) {
          this.log.error(`user ${userId}: model rejected ${digest.text.length} chars of context`);
          return { content: CONTEXT_TOO_LARGE, digest };
        }
        throw e;
      }
    } catch (e) {
      this.log.error(`generation failed for user ${userId}:`, errMessage(e));
      return null;
    }
  }

  /** Generates and upserts. Returns the stored row, or null when nothing was written. */
  async update(userId: number): Promise<Pulse | null> {
    const generated = await this.generate(userId);
    if (!generated) return null;
    const at = this.now();
    try {
      const saved = await this.deps.pulses.save({
        user_id: userId,
        content: generated.content,
        generated_at: at,
        next_generation: new Date(at.getTime() + this.limits.intervalMs),
        conversations_analyzed: generated.digest.conversationsAnalyzed,
        messages_analyzed: generated.digest.messagesAnalyzed,
      });
      this.log.info(`user ${userId}: pulse saved, next at ${saved.next_generation.toISOString()}`);
      return saved;
    } catch (e) {
      this.log.error(`saving pulse failed for user ${userId}:`, errMessage(e));
      return null;
    }
  }

  get(userId: number): Promise<Pulse | null> {
    return this.deps.pulses.get(userId);
  }
}
