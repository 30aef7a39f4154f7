// packages/ocr/src/queue.ts
import { randomUUID } from "node:crypto";
import { z } from "zod";
import { createLog, errMessage, type Log } from "@orcha/utils";
import type { OcrClient } from "./client";
import type { RedisClient } from "./redisClient";

const OcrJobSchema = z.object({
  id: z.string(),
  status: z.enum(["queued", "running", "done", "failed"]),
  fileUri: z.string(),
  mode: z.string(),
  userId: z.string().nullable(),
  tenantId: z.string().nullable(),
  createdAt: z.string(),
  finishedAt: z.string().optional(),
  result: z.record(z.unknown()).optional(),
  error: z.string().optional(),
});

export type OcrJob = z.infer<typeof OcrJobSchema>;
export type OcrJobStatus = OcrJob["status"];

/** The handful of list/string commands the queue needs. */
export interface QueueBackend {
  rPush(key: string, value: string): Promise<number>;
  lPop(key: string): Promise<string | null>;
  set(key: string, value: string, ttlSeconds: number): Promise<void>;
  get(key: string): Promise<string | null>;
}

export function redisBackend(client: RedisClient): QueueBackend {
  return {
    rPush: (key, value) => client.rPush(key, value),
    lPop: (key) => client.lPop(key),
    set: async (key, value, ttlSeconds) => {
      await client.set(key, value, { EX: ttlSeconds });
    },
    get: (key) => client.get(key),
  };
}

const PENDING_KEY = "ocr:jobs:pending";
const jobKey = (id: string) => `ocr:job:${id}`;

export class OcrJobQueue {
  private readonly log: Log;
  private readonly ttlSeconds: number;

  constructor(
    private readonly backend: QueueBackend,
    opts: { ttlSeconds?: number; log?: Log } = {},
  ) {
    this.ttlSeconds = opts.ttlSeconds ?? 24 * 3600;
    this.log = opts.log ?? createLog("ocr-queue");
  }

  async enqueue(input: { fileUri: string; mode?: string; userId?: string | null; tenantId?: string | null }): Promise<OcrJob> {
    const job: OcrJob = {
      id: randomUUID(),
      status: "queued",
      fileUri: input.fileUri,
      mode: input.mode || "auto",
      userId: input.userId ?? null,
      tenantId: input.tenantId ?? null,
      createdAt: new Date().toISOString(),
    };
    await this.save(job);
    await this.backend.rPush(PENDING_KEY, job.id);
    this.log.debug(`queued ${job.id} uri=${job.fileUri}`);
    return job;
  }

  async status(id: string): Promise<OcrJob | null> {
    const raw = await this.backend.get(jobKey(id));
    if (!raw) return null;
    return OcrJobSchema.parse(JSON.parse(raw));
  }

  /** Runs one pending job. Returns false when the queue is empty. */
  async processNext(ocr: OcrClient, signal?: AbortSignal): Promise<boolean> {
    const id = await this.backend.lPop(PENDING_KEY);
    if (!id) return false;
    const job = await this.status(id);
    if (!job) {
      this.log.warn(`job ${id} expired before it ran`);
      return true;
    }
    await this.save({ ...job, status: "running" });
    try {
      const result = await ocr.ocrUri(job.fileUri, job.mode, signal);
      await this.save({ ...job, status: "done", result, finishedAt: new Date().toISOString() });
    } catch (e) {
      this.log.warn(`job ${id} failed:`, errMessage(e));
      await this.save({ ...job, status: "failed", error: errMessage(e), finishedAt: new Date().toISOString() });
    }
    return true;
  }

  private save(job: OcrJob): Promise<void> {
    return this.backend.set(jobKey(job.id), JSON.stringify(job), this.ttlSeconds);
  }
}

/** Drains the queue every `intervalMs`; returns a stop function. */
export function startOcrWorker(
  queue: OcrJobQueue,
  ocr: OcrClient,
  opts: { intervalMs?: number; log?: Log } = {},
): () => void {
  const log = opts.log ?? createLog("ocr-worker");
  let busy = false;
  const tick = async () => {
    if (busy) return;
    busy = true;
    try {
      let more = true;
      while (more) more = await queue.processNext(ocr);
    } catch (e) {
      log.error("worker tick failed:", errMessage(e));
    } finally {
      busy = false;
    }
  };
  const timer = setInterval(() => {
    void tick();
  }, opts.intervalMs ?? 2000);
  return () => clearInterval(timer);
}
