// apps/api/src/http.ts
import { randomUUID } from "node:crypto";
import type { NextFunction, Request, Response } from "express";
import { z, ZodError } from "zod";
import { errMessage, ValidationError, type Log } from "@orcha/utils";

export const TRACE_HEADER = "X-Trace-Id";

/** Every request gets a short trace id, echoed back in X-Trace-Id. */
export function traceId(req: Request, res: Response, next: NextFunction): void {
  const incoming = req.header(TRACE_HEADER);
  res.setHeader(TRACE_HEADER, incoming && /^[\w-]{1,64}$/.test(incoming) ? incoming : randomUUID().slice(0, 8));
  next();
}

export type RequestContext = { traceId: string; log: Log; signal: AbortSignal };

/** Logger tagged with the trace id, and a signal that aborts when the client goes away. */
export function requestContext(res: Response, base: Log): RequestContext {
  const header = res.getHeader(TRACE_HEADER);
  const id = typeof header === "string" ? header : "-";
  const ac = new AbortController();
  res.on("close", () => {
    if (!res.writableEnded) ac.abort(new Error("client disconnected"));
  });
  return { traceId: id, log: base.child({ traceId: id }), signal: ac.signal };
}

/** 400 for bad input, 500 (without details) for everything else. */
export function sendError(res: Response, e: unknown, log: Log, label: string): void {
  if (e instanceof ValidationError) {
    res.status(400).json({ error: e.message });
    return;
  }
  if (e instanceof ZodError) {
    res.status(400).json({
      error: "invalid_request",
      issues: e.issues.map((i) => `${i.path.join(".") || "body"}: ${i.message}`),
    });
    return;
  }
  log.error(`[${label}] error:`, errMessage(e));
  res.status(500).json({ error: "internal_error" });
}

export const Id = z.coerce.number().int().positive();

export const Page = z.object({
  limit: z.coerce.number().int().min(1).max(100).default(20),
  offset: z.coerce.number().int().min(0).default(0),
});
