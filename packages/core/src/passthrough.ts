// packages/core/src/passthrough.ts
import { createLog, errMessage, TimeoutError, ValidationError, withDeadline, type Log } from "@orcha/utils";
import type { IngestReceipt, RetrievalClient, RetrievalContext } from "@orcha/retriever";
import type { OcrClient, OcrExtractResult, OcrJob, OcrJobQueue } from "@orcha/ocr";
import type { WebSearchClient } from "@orcha/search";
import type { AppConfig } from "./config";

export type PassthroughDeps = {
  ocr: OcrClient;
  retrieval: RetrievalClient;
  search: WebSearchClient;
  /** absent when the Redis-backed job queue is disabled */
  queue?: OcrJobQueue | null;
  config: Pick<AppConfig, "ocr" | "retrieval" | "search">;
  log?: Log;
};

export type Failure = { status: "error"; error: string };
export type RagQueryResult = { status: "ok"; query: string; contexts: RetrievalContext[] } | Failure;
export type IngestResult = { status: "ok"; source: string; uri: string; receipt: IngestReceipt } | Failure;
export type SearchResult = { status: "ok"; query: string; results: string };
export type OcrJobResult = { status: "queued"; jobId: string } | Failure;

function required(value: string | undefined | null, field: string): string {
  const v = (value ?? "").trim();
  if (!v) throw new ValidationError(`${field} is required`);
  return v;
}

function failure(what: string, e: unknown): Failure {
  return { status: "error", error: e instanceof TimeoutError ? `${what} timed out` : `${what} unavailable` };
}

/** Direct access to the collaborators, outside of a chat turn. Inputs are validated first. */
export class Passthrough {
  private readonly log: Log;

  constructor(private readonly deps: PassthroughDeps) {
    this.log = deps.log ?? createLog("passthrough");
  }

  async handleOcrExtract(
    input: { data?: string | null; filename?: string | null; language?: string | null },
    signal?: AbortSignal,
  ): Promise<OcrExtractResult> {
    const data = required(input.data, "data");
    const { ocr } = this.deps.config;
    try {
      return await withDeadline(
        (s) =>
          this.deps.ocr.extractText(
            { data, filename: input.filename ?? undefined, language: input.language ?? ocr.defaultLanguage },
            s,
          ),
        ocr.timeoutMs,
        "ocr",
        signal,
      );
    } catch (e) {
      this.log.warn("ocr extract failed:", errMessage(e));
      return { success: false, text: "", linesCount: 0, message: `OCR extraction failed: ${errMessage(e)}` };
    }
  }

  async handleRagQuery(
    input: { query?: string | null; k?: number | null; rerank?: boolean | null },
    signal?: AbortSignal,
  ): Promise<RagQueryResult> {
    const query = required(input.query, "query");
    const { retrieval } = this.deps.config;
    try {
      const contexts = await withDeadline(
        (s) =>
          this.deps.retrieval.query(
            { query, k: input.k ?? retrieval.topK, rerank: input.rerank ?? retrieval.rerank },
            s,
          ),
        retrieval.timeoutMs,
        "retrieval",
        signal,
      );
      return { status: "ok", query, contexts };
    } catch (e) {
      this.log.warn("rag query failed:", errMessage(e));
      return failure("Retrieval service", e);
    }
  }

  async handleIngest(
    input: { source?: string | null; uri?: string | null; metadata?: Record<string, unknown> | null },
    signal?: AbortSignal,
  ): Promise<IngestResult> {
    const source = required(input.source, "source");
    const uri = required(input.uri, "uri");
    try {
      const receipt = await withDeadline(
        (s) => this.deps.retrieval.ingest({ source, uri, metadata: input.metadata ?? {} }, s),
        this.deps.config.retrieval.timeoutMs,
        "ingest",
        signal,
      );
      return { status: "ok", source, uri, receipt };
    } catch (e) {
      this.log.warn("ingest failed:", errMessage(e));
      return failure("Ingestion service", e);
    }
  }

  /** The search client reports its own failures as text, so this never fails after validation. */
  async handleWebSearch(
    input: { query?: string | null; maxResults?: number | null },
    signal?: AbortSignal,
  ): Promise<SearchResult> {
    const query = required(input.query, "query");
    const max = Math.max(1, Math.min(10, input.maxResults ?? this.deps.config.search.maxResults));
    const results = await this.deps.search.search(query, max, signal);
    return { status: "ok", query, results };
  }

  async handleOcrJob(input: {
    fileUri?: string | null;
    mode?: string | null;
    userId?: string | null;
    tenantId?: string | null;
  }): Promise<OcrJobResult> {
    const fileUri = required(input.fileUri, "file_uri");
    if (!this.deps.queue) return { status: "error", error: "OCR job queue is disabled" };
    try {
      const job = await this.deps.queue.enqueue({
        fileUri,
        mode: input.mode ?? "auto",
        userId: input.userId,
        tenantId: input.tenantId,
      });
      return { status: "queued", jobId: job.id };
    } catch (e) {
      this.log.warn("enqueue failed:", errMessage(e));
      return failure("OCR job queue", e);
    }
  }

  async ocrJobStatus(jobId: string): Promise<OcrJob | null> {
    if (!this.deps.queue) return null;
    return this.deps.queue.status(required(jobId, "job id"));
  }
}
