// apps/api/src/app.ts
import express, { type Express } from "express";
import cors from "cors";
import rateLimit from "express-rate-limit";
import type { Log } from "@orcha/utils";
import type { AppConfig, Services } from "@orcha/core";
import type { PulseService } from "@orcha/pulse";
import { TRACE_HEADER, traceId } from "./http";
import { orchaRouter } from "./routes/orcha";
import { conversationsRouter } from "./routes/conversations";
import { accountRouter } from "./routes/account";

export type AppDeps = Pick<Services, "orchestrator" | "passthrough" | "conversations" | "memories" | "tokens" | "chat"> & {
  config: Pick<AppConfig, "api">;
  pulse: PulseService;
  log: Log;
};

export function createApp(deps: AppDeps): Express {
  const { api } = deps.config;
  const app = express();

  app.use(
    cors({
      origin: api.webOrigin || true,
      methods: ["GET", "POST", "PUT", "DELETE", "OPTIONS"],
      allowedHeaders: ["Content-Type", TRACE_HEADER],
      exposedHeaders: [TRACE_HEADER],
    }),
  );
  // inline attachments travel as base64
  app.use(express.json({ limit: "25mb" }));
  app.use(rateLimit({ windowMs: api.rateLimitWindowMs, max: api.rateLimitMax }));
  app.use(traceId);

  app.get("/health", (_req, res) => {
    res.json({ ok: true });
  });

  app.use(orchaRouter({ orchestrator: deps.orchestrator, passthrough: deps.passthrough, log: deps.log }));
  app.use(conversationsRouter({ conversations: deps.conversations, log: deps.log }));
  app.use(
    accountRouter({
      chat: deps.chat,
      tokens: deps.tokens,
      memories: deps.memories,
      pulse: deps.pulse,
      log: deps.log,
    }),
  );

  return app;
}
