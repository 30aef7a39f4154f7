// packages/core/src/services.ts
import { createLog, type Log } from "@orcha/utils";
import { OpenAIChatClient, type ChatClient } from "@orcha/llm";
import {
  ConversationStore,
  createDrizzleRepositories,
  PulseStore,
  TokenUsageTracker,
  UserMemoryStore,
  type Repositories,
} from "@orcha/memory";
import { HttpRetrievalClient } from "@orcha/retriever";
import { getRedis, HttpOcrClient, OcrJobQueue, PdfParseExtractor, redisBackend, type OcrClient } from "@orcha/ocr";
import { GoogleSearchClient } from "@orcha/search";
import { getDb } from "@orcha/sources/client";
import type { AppConfig } from "./config";
import { Orchestrator } from "./orchestrator";
import { Passthrough } from "./passthrough";

export type Services = {
  config: AppConfig;
  conversations: ConversationStore;
  memories: UserMemoryStore;
  tokens: TokenUsageTracker;
  pulses: PulseStore;
  chat: ChatClient;
  ocr: OcrClient;
  queue: OcrJobQueue | null;
  orchestrator: Orchestrator;
  passthrough: Passthrough;
};

/** Wires every store and client from one config. Redis is only touched when enabled. */
export async function createServices(
  config: AppConfig,
  opts: { repos?: Repositories; log?: Log } = {},
): Promise<Services> {
  const log = opts.log ?? createLog("core", { verbose: config.verbose });
  const repos = opts.repos ?? createDrizzleRepositories(getDb(config.databaseUrl));

  const conversations = new ConversationStore(repos, { log: log.child({ tag: "store" }) });
  const memories = new UserMemoryStore(repos.memories);
  const tokens = new TokenUsageTracker(repos.tokenUsage, { log: log.child({ tag: "tokens" }) });
  const pulses = new PulseStore(repos.pulses, repos.users);

  const chat = new OpenAIChatClient({
    apiKey: config.llm.apiKey,
    baseURL: config.llm.baseUrl,
    model: config.llm.model,
    maxTokens: config.llm.maxTokens,
    temperature: config.llm.temperature,
    log: log.child({ tag: "llm" }),
  });
  const ocr = new HttpOcrClient({
    baseUrl: config.ocr.url,
    defaultLanguage: config.ocr.defaultLanguage,
    log: log.child({ tag: "ocr" }),
  });
  const retrieval = new HttpRetrievalClient({ baseUrl: config.retrieval.url, log: log.child({ tag: "retriever" }) });
  const search = new GoogleSearchClient({
    apiKey: config.search.apiKey,
    engineId: config.search.engineId,
    timeoutMs: config.search.timeoutMs,
    log: log.child({ tag: "search" }),
  });

  const queue = config.redis.enabled
    ? new OcrJobQueue(redisBackend(await getRedis(config.redis.url)), {
        ttlSeconds: config.redis.jobTtlSeconds,
        log: log.child({ tag: "ocr-queue" }),
      })
    : null;

  const orchestrator = new Orchestrator({
    conversations,
    memories,
    tokens,
    chat,
    ocr,
    retrieval,
    pdf: new PdfParseExtractor(),
    config,
    log,
  });
  const passthrough = new Passthrough({ ocr, retrieval, search, queue, config, log: log.child({ tag: "passthrough" }) });

  return { config, conversations, memories, tokens, pulses, chat, ocr, queue, orchestrator, passthrough };
}
