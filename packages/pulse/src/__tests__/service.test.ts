import { describe, expect, it, vi } from "vitest";
import { ChatUpstreamError, type ChatClient, type ChatRequest, type ChatResult } from "@orcha/llm";
import { ConversationStore, PulseStore } from "@orcha/memory";
import { DAY_MS } from "@orcha/utils";
import { buildDigest, CONTEXT_TOO_LARGE, NOTHING_IMPORTANT, PulseService } from "../service";
import { createInMemoryRepositories } from "../../../memory/src/__tests__/helpers/inMemory";
import { silentLog } from "../../../memory/src/__tests__/helpers/silentLog";

const NOW = new Date("2026-06-01T09:30:00.000Z");

function chatWith(impl: (req: ChatRequest) => Promise<ChatResult>) {
  const complete = vi.fn(impl);
  const chat: ChatClient = { complete, listModels: async () => [] };
  return { chat, complete };
}

const reply = (text: string) => async (): Promise<ChatResult> => ({
  text,
  model: "test-model",
  usage: { promptTokens: 1, completionTokens: 1, totalTokens: 2 },
});

function setup(chat: ChatClient) {
  const repos = createInMemoryRepositories();
  const conversations = new ConversationStore(repos, { log: silentLog, now: () => NOW });
  const pulses = new PulseStore(repos.pulses, repos.users);
  const service = new PulseService({ conversations, pulses, chat, prompt: "PULSE PROMPT", now: () => NOW, log: silentLog });
  return { repos, conversations, pulses, service };
}

async function seedConversation(conversations: ConversationStore, userId: number, title: string | null, lines: string[]) {
  const { conversation } = await conversations.resolveOrCreate({ userId });
  if (title) await conversations.rename(userId, conversation.id, title);
  for (const [i, content] of lines.entries()) {
    await conversations.appendMessage({ conversationId: conversation.id, role: i % 2 ? "assistant" : "user", content });
  }
  const stored = await conversations.getConversation(userId, conversation.id);
  if (!stored) throw new Error(`conversation ${conversation.id} not stored`);
  return stored.conversation;
}

describe("buildDigest", () => {
  it("renders a conversation transcript with labelled turns", async () => {
    const { conversations } = setup(chatWith(reply("x")).chat);
    const conv = await seedConversation(conversations, 1, "Renewal", ["Hello", "Hi there"]);

    const digest = buildDigest([{ conversation: conv, messages: await conversations.listMessages(conv.id) }], {
      messageChars: 300,
      totalChars: 4000,
    });

    expect(digest).toEqual({
      text: "\n\n=== Conversation: Renewal ===\nDate: 2026-06-01 09:30\n\nUser: Hello\n\nAssistant: Hi there\n\n",
      conversationsAnalyzed: 1,
      messagesAnalyzed: 2,
    });
  });

  it("clips long messages and stops at the total budget", async () => {
    const { conversations } = setup(chatWith(reply("x")).chat);
    const a = await seedConversation(conversations, 1, null, ["abcdefgh", "ignored"]);
    const b = await seedConversation(conversations, 1, null, ["never rendered"]);

    const digest = buildDigest(
      [
        { conversation: a, messages: await conversations.listMessages(a.id) },
        { conversation: b, messages: await conversations.listMessages(b.id) },
      ],
      { messageChars: 5, totalChars: 40 },
    );

    expect(digest.text).toBe(
      "\n\n=== Conversation: Untitled Conversation ===\nDate: 2026-06-01 09:30\n\n" +
        "User: abcde... (truncated)\n\n" +
        "\n... (Additional conversations truncated to fit context limit)\n",
    );
    expect(digest.messagesAnalyzed).toBe(3);
    expect(digest.conversationsAnalyzed).toBe(2);
  });
});

describe("PulseService", () => {
  it("answers without calling the model when the user has no conversations", async () => {
    const { chat, complete } = chatWith(reply("unused"));
    const { service } = setup(chat);
    const out = await service.generate(9);
    expect(out?.content).toBe(NOTHING_IMPORTANT);
    expect(complete).not.toHaveBeenCalled();
  });

  it("sends the pulse prompt and the transcript", async () => {
    const { chat, complete } = chatWith(reply("🧭 Professional Pulse"));
    const { service, conversations } = setup(chat);
    await seedConversation(conversations, 1, "Renewal", ["Hello"]);

    const out = await service.generate(1);

    expect(out?.content).toBe("🧭 Professional Pulse");
    expect(complete.mock.calls[0][0].messages).toEqual([
      { role: "system", content: "PULSE PROMPT" },
      {
        role: "user",
        content:
          "Here are all the conversations to analyze:\n\n\n=== Conversation: Renewal ===\nDate: 2026-06-01 09:30\n\nUser: Hello\n\n",
      },
    ]);
  });

  it("an empty model reply becomes the nothing-important text", async () => {
    const { service, conversations } = setup(chatWith(reply("  ")).chat);
    await seedConversation(conversations, 1, null, ["Hello"]);
    expect((await service.generate(1))?.content).toBe(NOTHING_IMPORTANT);
  });

  it("a 400 from the model yields the context-too-large text", async () => {
    const { chat } = chatWith(async () => {
      throw new ChatUpstreamError("context length exceeded", 400);
    });
    const { service, conversations } = setup(chat);
    await seedConversation(conversations, 1, null, ["Hello"]);
    expect((await service.generate(1))?.content).toBe(CONTEXT_TOO_LARGE);
  });

  it("other failures write nothing", async () => {
    const { chat } = chatWith(async () => {
      throw new ChatUpstreamError("server error", 500);
    });
    const { service, conversations, repos } = setup(chat);
    await seedConversation(conversations, 1, null, ["Hello"]);

    expect(await service.update(1)).toBeNull();
    expect(repos.db.pulses).toEqual([]);
  });

  it("upserts one row per user with the next generation a day later", async () => {
    const { service, conversations, repos } = setup(chatWith(reply("digest")).chat);
    await seedConversation(conversations, 1, null, ["Hello", "Hi"]);

    await service.update(1);
    const again = await service.update(1);

    expect(repos.db.pulses).toHaveLength(1);
    expect(again).toEqual({
      id: 1,
      user_id: 1,
      content: "digest",
      generated_at: NOW,
      next_generation: new Date(NOW.getTime() + DAY_MS),
      conversations_analyzed: 1,
      messages_analyzed: 2,
    });
  });
});
