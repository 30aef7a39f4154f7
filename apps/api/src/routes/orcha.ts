// apps/api/src/routes/orcha.ts
import { Router } from "express";
import { z } from "zod";
import { ValidationError, type Log } from "@orcha/utils";
import type { HistoryTurn } from "@orcha/llm";
import { suggestEndpoint, type Orchestrator, type Passthrough } from "@orcha/core";
import { requestContext, sendError } from "../http";

const Attachment = z.object({
  type: z.string().nullish(),
  data: z.string().nullish(),
  uri: z.string().nullish(),
  filename: z.string().nullish(),
  size: z.number().int().nonnegative().nullish(),
});

const HistoryItem = z.object({
  role: z.enum(["user", "assistant", "system"]),
  content: z.string(),
});

const ChatBody = z.object({
  user_id: z.coerce.number().int().positive(),
  tenant_id: z.string().nullish(),
  conversation_id: z.coerce.number().int().positive().nullish(),
  message: z.string().default(""),
  attachments: z.array(Attachment).default([]),
  use_rag: z.boolean().default(false),
  conversation_history: z.array(HistoryItem).nullish(),
});

const RouteBody = z.object({
  message: z.string().default(""),
  attachments: z.array(Attachment).default([]),
  use_rag: z.boolean().default(false),
  user_id: z.union([z.string(), z.number()]).nullish(),
  tenant_id: z.string().nullish(),
});

const OcrJobBody = z.object({
  file_uri: z.string(),
  mode: z.string().default("auto"),
  user_id: z.union([z.string(), z.number()]).nullish(),
  tenant_id: z.string().nullish(),
});

const OcrExtractBody = z.object({
  data: z.string(),
  filename: z.string().nullish(),
  language: z.string().nullish(),
});

const RagBody = z.object({
  query: z.string(),
  k: z.number().int().min(1).max(50).nullish(),
  rerank: z.boolean().nullish(),
});

const IngestBody = z.object({
  source: z.string(),
  uri: z.string(),
  metadata: z.record(z.unknown()).nullish(),
});

const SearchBody = z.object({
  query: z.string(),
  max_results: z.number().int().nullish(),
});

const asText = (v: string | number | null | undefined) => (v == null ? null : String(v));

function toHistory(items: z.infer<typeof HistoryItem>[] | null | undefined): HistoryTurn[] | null {
  if (!items) return null;
  const out: HistoryTurn[] = [];
  for (const m of items) if (m.role !== "system") out.push({ role: m.role, content: m.content });
  return out;
}

export function orchaRouter(deps: { orchestrator: Orchestrator; passthrough: Passthrough; log: Log }): Router {
  const router = Router();
  const { orchestrator, passthrough } = deps;

  router.post("/orcha/chat", async (req, res) => {
    const { log, signal } = requestContext(res, deps.log);
    try {
      const body = ChatBody.parse(req.body ?? {});
      if (!body.message.trim() && !body.attachments.length) {
        throw new ValidationError("message or attachments are required");
      }
      const out = await orchestrator.handleTurn({
        userId: body.user_id,
        tenantId: body.tenant_id,
        conversationId: body.conversation_id,
        message: body.message,
        attachments: body.attachments,
        useRag: body.use_rag,
        conversationHistory: toHistory(body.conversation_history),
        signal,
        log,
      });
      res.json(out);
    } catch (e) {
      sendError(res, e, log, "/orcha/chat");
    }
  });

  router.post("/orcha/route", (req, res) => {
    const { log } = requestContext(res, deps.log);
    try {
      const body = RouteBody.parse(req.body ?? {});
      res.json(
        suggestEndpoint({
          message: body.message,
          attachments: body.attachments,
          useRag: body.use_rag,
          userId: asText(body.user_id),
          tenantId: body.tenant_id,
        }),
      );
    } catch (e) {
      sendError(res, e, log, "/orcha/route");
    }
  });

  router.post("/orcha/ocr", async (req, res) => {
    const { log } = requestContext(res, deps.log);
    try {
      const body = OcrJobBody.parse(req.body ?? {});
      const out = await passthrough.handleOcrJob({
        fileUri: body.file_uri,
        mode: body.mode,
        userId: asText(body.user_id),
        tenantId: body.tenant_id,
      });
      res.status(out.status === "queued" ? 202 : 503).json(out);
    } catch (e) {
      sendError(res, e, log, "/orcha/ocr");
    }
  });

  router.get("/orcha/ocr/:jobId", async (req, res) => {
    const { log } = requestContext(res, deps.log);
    try {
      const job = await passthrough.ocrJobStatus(req.params.jobId);
      if (!job) {
        res.status(404).json({ error: "job not found" });
        return;
      }
      res.json(job);
    } catch (e) {
      sendError(res, e, log, "/orcha/ocr/:jobId");
    }
  });

  router.post("/orcha/ocr/extract", async (req, res) => {
    const { log, signal } = requestContext(res, deps.log);
    try {
      const body = OcrExtractBody.parse(req.body ?? {});
      res.json(await passthrough.handleOcrExtract(body, signal));
    } catch (e) {
      sendError(res, e, log, "/orcha/ocr/extract");
    }
  });

  router.post("/orcha/rag/query", async (req, res) => {
    const { log, signal } = requestContext(res, deps.log);
    try {
      const out = await passthrough.handleRagQuery(RagBody.parse(req.body ?? {}), signal);
      res.status(out.status === "ok" ? 200 : 502).json(out);
    } catch (e) {
      sendError(res, e, log, "/orcha/rag/query");
    }
  });

  router.post("/orcha/ingest", async (req, res) => {
    const { log, signal } = requestContext(res, deps.log);
    try {
      const out = await passthrough.handleIngest(IngestBody.parse(req.body ?? {}), signal);
      res.status(out.status === "ok" ? 200 : 502).json(out);
    } catch (e) {
      sendError(res, e, log, "/orcha/ingest");
    }
  });

  router.post("/orcha/search", async (req, res) => {
    const { log, signal } = requestContext(res, deps.log);
    try {
      const body = SearchBody.parse(req.body ?? {});
      res.json(await passthrough.handleWebSearch({ query: body.query, maxResults: body.max_results }, signal));
    } catch (e) {
      sendError(res, e, log, "/orcha/search");
    }
  });

  return router;
}
