// packages/llm/src/client.ts
import OpenAI from "openai";
import type { ChatCompletionMessageParam } from "openai/resources/chat/completions";
import { createLog, type Log } from "@orcha/utils";
import type { ChatBlock } from "./prompt";

export type ChatUsage = { promptTokens: number; completionTokens: number; totalTokens: number };

export type ChatRequest = {
  messages: ChatBlock[];
  model?: string;
  maxTokens?: number;
  temperature?: number;
  signal?: AbortSignal;
};

export type ChatResult = { text: string; usage: ChatUsage; model: string };

export interface ChatClient {
  complete(req: ChatRequest): Promise<ChatResult>;
  listModels(signal?: AbortSignal): Promise<string[]>;
}

/** Raised for HTTP errors from the model endpoint; keeps the status for callers that branch on it. */
export class ChatUpstreamError extends Error {
  constructor(
    message: string,
    readonly status: number | null,
  ) {
    super(message);
    this.name = "ChatUpstreamError";
  }
}

export type OpenAIChatClientOptions = {
  apiKey: string;
  baseURL?: string;
  model: string;
  maxTokens: number;
  temperature: number;
  log?: Log;
};

function toOpenAI(block: ChatBlock): ChatCompletionMessageParam {
  switch (block.role) {
    case "system":
      return { role: "system", content: block.content };
    case "assistant":
      return { role: "assistant", content: block.content };
    case "user":
      return { role: "user", content: block.content };
  }
}

/** Any OpenAI-compatible endpoint (OpenAI, LM Studio, Scaleway...). */
export class OpenAIChatClient implements ChatClient {
  private readonly openai: OpenAI;
  private readonly log: Log;

  constructor(private readonly opts: OpenAIChatClientOptions) {
    // retries/timeouts are owned by the caller's deadline
    this.openai = new OpenAI({ apiKey: opts.apiKey, baseURL: opts.baseURL, maxRetries: 0 });
    this.log = opts.log ?? createLog("llm");
  }

  async complete(req: ChatRequest): Promise<ChatResult> {
    const model = req.model ?? this.opts.model;
    this.log.debug(`model=${model} messages=${req.messages.length}`);
    try {
      const res = await this.openai.chat.completions.create(
        {
          model,
          messages: req.messages.map(toOpenAI),
          max_tokens: req.maxTokens ?? this.opts.maxTokens,
          temperature: req.temperature ?? this.opts.temperature,
        },
        { signal: req.signal },
      );
      const text = res.choices?.[0]?.message?.content ?? "";
      return {
        text,
        model: res.model || model,
        usage: {
          promptTokens: res.usage?.prompt_tokens ?? 0,
          completionTokens: res.usage?.completion_tokens ?? 0,
          totalTokens: res.usage?.total_tokens ?? 0,
        },
      };
    } catch (e) {
      if (e instanceof OpenAI.APIError) throw new ChatUpstreamError(e.message, e.status ?? null);
      throw e;
    }
  }

  async listModels(signal?: AbortSignal): Promise<string[]> {
    const page = await this.openai.models.list({ signal });
    return page.data.map((m) => m.id);
  }
}
