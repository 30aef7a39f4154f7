// packages/core/src/config.ts
import { toBool, toFloat, toInt, toStr, type EnvLike } from "@orcha/utils";
import { DEFAULT_LIMITS, type PromptLimits } from "@orcha/llm";
import { normalizeLanguage, type OcrLanguage } from "@orcha/ocr";
import { isLocale, type Locale } from "./messages";

export type AppConfig = {
  verbose: boolean;
  locale: Locale;
  databaseUrl: string | undefined;
  llm: {
    baseUrl: string | undefined;
    apiKey: string;
    model: string;
    visionModel: string;
    maxTokens: number;
    visionMaxTokens: number;
    temperature: number;
    timeoutMs: number;
  };
  ocr: { url: string; timeoutMs: number; defaultLanguage: OcrLanguage };
  retrieval: { url: string; timeoutMs: number; topK: number; rerank: boolean };
  search: { apiKey: string; engineId: string; timeoutMs: number; maxResults: number };
  context: PromptLimits & { memoryCount: number };
  pulse: {
    enabled: boolean;
    cron: string;
    checkCron: string;
    conversations: number;
    messageChars: number;
    totalChars: number;
    timeoutMs: number;
    intervalHours: number;
  };
  redis: { enabled: boolean; url: string; ocrWorkerEnabled: boolean; jobTtlSeconds: number };
  api: { port: number; webOrigin: string | undefined; rateLimitWindowMs: number; rateLimitMax: number };
};

/** Builds the whole configuration from env vars (.env is loaded by the entry points). */
export function loadConfig(env: EnvLike = process.env): AppConfig {
  const locale = toStr(env.APOLOGY_LOCALE, "en");
  return {
    verbose: toBool(env.CORE_VERBOSE, false),
    locale: isLocale(locale) ? locale : "en",
    databaseUrl: env.DATABASE_URL,

    llm: {
      baseUrl: env.LLM_BASE_URL || undefined,
      apiKey: toStr(env.LLM_API_KEY, toStr(env.OPENAI_API_KEY, "not-needed")),
      model: toStr(env.CHAT_MODEL, "gpt-4o-mini"),
      visionModel: toStr(env.VISION_MODEL, "llava-v1.6-34b"),
      maxTokens: toInt(env.LLM_MAX_TOKENS, 2048),
      // vision replies are capped tighter than text ones
      visionMaxTokens: toInt(env.LLM_VISION_MAX_TOKENS, 1024),
      temperature: toFloat(env.LLM_TEMPERATURE, 0.7),
      timeoutMs: toInt(env.CORE_LLM_TIMEOUT_MS, 500_000),
    },

    ocr: {
      url: toStr(env.OCR_SERVICE_URL, "http://localhost:8001"),
      timeoutMs: toInt(env.OCR_TIMEOUT_MS, 60_000),
      defaultLanguage: normalizeLanguage(env.OCR_DEFAULT_LANGUAGE),
    },

    retrieval: {
      url: toStr(env.RAG_SERVICE_URL, "http://localhost:8002"),
      timeoutMs: toInt(env.CORE_RETRIEVER_TIMEOUT_MS, 15_000),
      topK: toInt(env.RETRIEVER_TOP_K, 8),
      rerank: toBool(env.RETRIEVER_RERANK, true),
    },

    search: {
      apiKey: toStr(env.GOOGLE_SEARCH_API_KEY),
      engineId: toStr(env.GOOGLE_SEARCH_ENGINE_ID),
      timeoutMs: toInt(env.SEARCH_TIMEOUT_MS, 10_000),
      maxResults: toInt(env.SEARCH_MAX_RESULTS, 5),
    },

    context: {
      maxContexts: toInt(env.CONTEXT_MAX_SOURCES, DEFAULT_LIMITS.maxContexts),
      contextChars: toInt(env.CONTEXT_SOURCE_CHARS, DEFAULT_LIMITS.contextChars),
      memoryTokens: toInt(env.CONTEXT_MEMORY_TOKENS, DEFAULT_LIMITS.memoryTokens),
      historyMessages: toInt(env.CONTEXT_HISTORY_MESSAGES, DEFAULT_LIMITS.historyMessages),
      memoryCount: toInt(env.CONTEXT_MEMORY_COUNT, 5),
    },

    pulse: {
      enabled: toBool(env.PULSE_ENABLED, true),
      cron: toStr(env.PULSE_CRON, "0 6 * * *"),
      checkCron: toStr(env.PULSE_CHECK_CRON, "0 * * * *"),
      conversations: toInt(env.PULSE_CONVERSATIONS, 5),
      messageChars: toInt(env.PULSE_MESSAGE_CHARS, 300),
      totalChars: toInt(env.PULSE_TOTAL_CHARS, 4000),
      timeoutMs: toInt(env.PULSE_TIMEOUT_MS, 120_000),
      intervalHours: toInt(env.PULSE_INTERVAL_HOURS, 24),
    },

    redis: {
      enabled: toBool(env.REDIS_ENABLED, false),
      url: toStr(env.REDIS_URL, "redis://localhost:6379"),
      ocrWorkerEnabled: toBool(env.OCR_WORKER_ENABLED, false),
      jobTtlSeconds: toInt(env.OCR_JOB_TTL_SECONDS, 86_400),
    },

    api: {
      port: toInt(env.PORT, 3001),
      webOrigin: env.WEB_ORIGIN || undefined,
      rateLimitWindowMs: toInt(env.RATE_LIMIT_WINDOW_MS, 60_000),
      rateLimitMax: toInt(env.RATE_LIMIT_MAX, 30),
    },
  };
}
