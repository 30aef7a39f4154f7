// apps/api/src/routes/account.ts
import { Router } from "express";
import { z } from "zod";
import { errMessage, type Log } from "@orcha/utils";
import type { ChatClient } from "@orcha/llm";
import type { TokenUsageTracker, UserMemoryStore } from "@orcha/memory";
import type { PulseService } from "@orcha/pulse";
import { Id, requestContext, sendError } from "../http";

const MemoryBody = z.object({
  content: z.string(),
  title: z.string().nullish(),
  tags: z.array(z.string()).nullish(),
  conversation_id: z.number().int().positive().nullish(),
});

const MemoryQuery = z.object({ limit: z.coerce.number().int().min(1).max(100).default(20) });

export type AccountDeps = {
  chat: ChatClient;
  tokens: TokenUsageTracker;
  memories: UserMemoryStore;
  pulse: PulseService;
  log: Log;
};

/** Models, token usage, memories and pulse. */
export function accountRouter(deps: AccountDeps): Router {
  const router = Router();

  router.get("/models", async (_req, res) => {
    const { log, signal } = requestContext(res, deps.log);
    try {
      res.json({ models: await deps.chat.listModels(signal) });
    } catch (e) {
      log.warn("listing models failed:", errMessage(e));
      res.status(502).json({ error: "model service unavailable" });
    }
  });

  router.get("/tokens/usage/:userId", async (req, res) => {
    const { log } = requestContext(res, deps.log);
    try {
      res.json(await deps.tokens.get(Id.parse(req.params.userId)));
    } catch (e) {
      sendError(res, e, log, "GET /tokens/usage");
    }
  });

  router.post("/tokens/reset/:userId", async (req, res) => {
    const { log } = requestContext(res, deps.log);
    try {
      res.json({ reset: await deps.tokens.reset(Id.parse(req.params.userId)) });
    } catch (e) {
      sendError(res, e, log, "POST /tokens/reset");
    }
  });

  router.get("/memories/:userId", async (req, res) => {
    const { log } = requestContext(res, deps.log);
    try {
      const { limit } = MemoryQuery.parse(req.query);
      res.json(await deps.memories.recent(Id.parse(req.params.userId), limit));
    } catch (e) {
      sendError(res, e, log, "GET /memories");
    }
  });

  router.post("/memories/:userId", async (req, res) => {
    const { log } = requestContext(res, deps.log);
    try {
      const body = MemoryBody.parse(req.body ?? {});
      const saved = await deps.memories.add({
        userId: Id.parse(req.params.userId),
        content: body.content,
        title: body.title,
        tags: body.tags,
        conversationId: body.conversation_id,
        source: "manual",
      });
      res.status(201).json(saved);
    } catch (e) {
      sendError(res, e, log, "POST /memories");
    }
  });

  router.delete("/memories/:userId/:memoryId", async (req, res) => {
    const { log } = requestContext(res, deps.log);
    try {
      const ok = await deps.memories.remove(Id.parse(req.params.userId), Id.parse(req.params.memoryId));
      res.status(ok ? 200 : 404).json(ok ? { deleted: true } : { error: "memory not found" });
    } catch (e) {
      sendError(res, e, log, "DELETE /memories/:id");
    }
  });

  router.get("/pulse/:userId", async (req, res) => {
    const { log } = requestContext(res, deps.log);
    try {
      const pulse = await deps.pulse.get(Id.parse(req.params.userId));
      if (!pulse) {
        res.status(404).json({ error: "no pulse generated yet" });
        return;
      }
      res.json(pulse);
    } catch (e) {
      sendError(res, e, log, "GET /pulse");
    }
  });

  router.post("/pulse/:userId/regenerate", async (req, res) => {
    const { log } = requestContext(res, deps.log);
    try {
      const pulse = await deps.pulse.update(Id.parse(req.params.userId));
      if (!pulse) {
        res.status(502).json({ error: "pulse generation failed" });
        return;
      }
      res.json(pulse);
    } catch (e) {
      sendError(res, e, log, "POST /pulse/regenerate");
    }
  });

  return router;
}
