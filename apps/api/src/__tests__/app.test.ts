import type { Server } from "node:http";
import { afterEach, describe, expect, it } from "vitest";
import { loadConfig, Passthrough } from "@orcha/core";
import { PulseStore } from "@orcha/memory";
import { PulseService } from "@orcha/pulse";
import type { WebSearchClient } from "@orcha/search";
import { createApp } from "../app";
import { ScriptedChat, setupOrchestrator, silentLog, StubRetrieval } from "../../../../packages/core/src/__tests__/helpers/fakes";

const NOW = new Date("2026-06-01T09:30:00.000Z");

class EchoSearch implements WebSearchClient {
  async search(query: string): Promise<string> {
    return `results for ${query}`;
  }
}

let server: Server | null = null;

afterEach(async () => {
  const s = server;
  server = null;
  if (s) await new Promise<void>((resolve) => s.close(() => resolve()));
});

async function start(opts: { chat?: ScriptedChat; retrieval?: StubRetrieval } = {}) {
  const parts = setupOrchestrator(opts);
  const config = loadConfig({ RATE_LIMIT_MAX: "1000" });
  const passthrough = new Passthrough({
    ocr: parts.ocr,
    retrieval: parts.retrieval,
    search: new EchoSearch(),
    queue: null,
    config,
    log: silentLog,
  });
  const pulse = new PulseService({
    conversations: parts.conversations,
    pulses: new PulseStore(parts.repos.pulses, parts.repos.users),
    chat: parts.chat,
    prompt: "PULSE PROMPT",
    now: () => NOW,
    log: silentLog,
  });
  const app = createApp({ ...parts, passthrough, pulse, config, log: silentLog });

  const s = await new Promise<Server>((resolve) => {
    const listening = app.listen(0, () => resolve(listening));
  });
  server = s;
  const address = s.address();
  const port = typeof address === "object" && address ? address.port : 0;
  const base = `http://127.0.0.1:${port}`;

  const call = async (method: string, path: string, body?: unknown, headers: Record<string, string> = {}) => {
    const res = await fetch(base + path, {
      method,
      headers: { "Content-Type": "application/json", ...headers },
      body: body === undefined ? undefined : JSON.stringify(body),
    });
    return { status: res.status, headers: res.headers, json: JSON.parse(await res.text()) };
  };
  return { ...parts, call };
}

describe("api", () => {
  it("answers health checks with a generated trace id", async () => {
    const { call } = await start();
    const res = await call("GET", "/health");
    expect(res.status).toBe(200);
    expect(res.json).toEqual({ ok: true });
    expect(res.headers.get("x-trace-id")).toMatch(/^[0-9a-f-]{8}$/);
  });

  it("runs a chat turn and echoes a valid incoming trace id", async () => {
    const { call } = await start();
    const res = await call("POST", "/orcha/chat", { user_id: 1, message: "Hello" }, { "X-Trace-Id": "trace-1" });

    expect(res.status).toBe(200);
    expect(res.headers.get("x-trace-id")).toBe("trace-1");
    expect(res.json).toMatchObject({
      status: "ok",
      message: "ok",
      conversationId: 1,
      title: "Hello",
      capability: "chat",
      attachmentsProcessed: 0,
      degraded: [],
    });
  });

  it("rejects a turn with neither text nor attachments", async () => {
    const { call, chat } = await start();
    const res = await call("POST", "/orcha/chat", { user_id: 1, message: "   " });
    expect(res.status).toBe(400);
    expect(res.json).toEqual({ error: "message or attachments are required" });
    expect(chat.requests).toEqual([]);
  });

  it("reports schema problems as invalid_request", async () => {
    const { call } = await start();
    const res = await call("POST", "/orcha/chat", { user_id: "abc", message: "Hi" });
    expect(res.status).toBe(400);
    expect(res.json.error).toBe("invalid_request");
    expect(res.json.issues[0]).toMatch(/^user_id: /);
  });

  it("returns 200 with status error when the model fails", async () => {
    const { call } = await start({ chat: new ScriptedChat([new Error("boom")]) });
    const res = await call("POST", "/orcha/chat", { user_id: 1, message: "Hello" });
    expect(res.status).toBe(200);
    expect(res.json).toEqual({
      status: "error",
      message: "Sorry, I encountered an error processing your request. Please try again.",
      conversationId: 1,
      errorType: "upstream",
      degraded: [],
    });
  });

  it("lists, reads, renames and deletes conversations", async () => {
    const { call } = await start();
    await call("POST", "/orcha/chat", { user_id: 1, message: "Hello" });

    const list = await call("GET", "/conversations/1?limit=5");
    expect(list.json).toHaveLength(1);
    expect(list.json[0]).toMatchObject({ id: 1, title: "Hello", message_count: 2 });

    const one = await call("GET", "/conversations/1/1");
    expect(one.json.messages.map((m: { role: string }) => m.role)).toEqual(["user", "assistant"]);

    expect((await call("GET", "/conversations/2/1")).status).toBe(404);
    expect((await call("PUT", "/conversations/1/1", { title: "  " })).json).toEqual({ error: "title must not be empty" });
    expect((await call("PUT", "/conversations/1/1", { title: "Renamed" })).json).toEqual({ updated: true });
    expect((await call("DELETE", "/conversations/1/1")).json).toEqual({ deleted: true });
    expect((await call("GET", "/conversations/1")).json).toEqual([]);
  });

  it("creates and deletes folders", async () => {
    const { call } = await start();
    const created = await call("POST", "/folders/1", { name: "Claims" });
    expect(created.status).toBe(201);
    expect(created.json).toMatchObject({ user_id: 1, name: "Claims" });
    expect((await call("DELETE", `/folders/1/${created.json.id}`)).json).toEqual({ deleted: true });
    expect((await call("DELETE", "/folders/1/999")).status).toBe(404);
  });

  it("exposes models and token usage", async () => {
    const { call } = await start();
    expect((await call("GET", "/models")).json).toEqual({ models: ["test-model", "test-vision"] });

    await call("POST", "/orcha/chat", { user_id: 7, message: "Hello" });
    expect((await call("GET", "/tokens/usage/7")).json).toMatchObject({ trackingEnabled: true, currentUsage: 30 });
    expect((await call("POST", "/tokens/reset/7")).json).toEqual({ reset: true });
    expect((await call("GET", "/tokens/usage/7")).json).toEqual({
      trackingEnabled: true,
      currentUsage: 0,
      resetAt: null,
      timeUntilResetMs: null,
    });
  });

  it("stores manual memories", async () => {
    const { call } = await start();
    const saved = await call("POST", "/memories/3", { content: " Prefers email ", tags: ["contact"] });
    expect(saved.status).toBe(201);
    expect(saved.json).toMatchObject({ user_id: 3, content: "Prefers email", source: "manual", tags: ["contact"] });

    const listed = await call("GET", "/memories/3");
    expect(listed.json.map((m: { content: string }) => m.content)).toEqual(["Prefers email"]);
    expect((await call("DELETE", `/memories/3/${saved.json.id}`)).json).toEqual({ deleted: true });
    expect((await call("GET", "/memories/3")).json).toEqual([]);
  });

  it("returns 404 before the first pulse and the stored pulse after regeneration", async () => {
    const { call } = await start();
    expect((await call("GET", "/pulse/4")).status).toBe(404);

    const regenerated = await call("POST", "/pulse/4/regenerate");
    expect(regenerated.json).toMatchObject({
      user_id: 4,
      content: "Nothing important for now.",
      conversations_analyzed: 0,
      messages_analyzed: 0,
    });
    expect((await call("GET", "/pulse/4")).json.content).toBe("Nothing important for now.");
  });

  it("maps passthrough failures to their status codes", async () => {
    const retrieval = new StubRetrieval();
    retrieval.failQuery = true;
    const { call } = await start({ retrieval });

    expect(await call("POST", "/orcha/rag/query", { query: "coverage" })).toMatchObject({
      status: 502,
      json: { status: "error", error: "Retrieval service unavailable" },
    });
    expect(await call("POST", "/orcha/ocr", { file_uri: "s3://bucket/a.png" })).toMatchObject({
      status: 503,
      json: { status: "error", error: "OCR job queue is disabled" },
    });
    expect((await call("POST", "/orcha/search", { query: "rates" })).json).toMatchObject({
      status: "ok",
      results: "results for rates",
    });
  });

  it("suggests an endpoint without calling anything", async () => {
    const { call, chat } = await start();
    const res = await call("POST", "/orcha/route", { message: "hi", use_rag: true });
    expect(res.json.endpoint).toBe("/orcha/rag/query");
    expect(chat.requests).toEqual([]);
  });
});
