// packages/retriever/src/index.ts
import { z } from "zod";
import { createLog, joinUrl, postJson, type FetchLike, type Log } from "@orcha/utils";

export type RetrievalContext = { source: string; text: string; score: number | null };

export type RetrievalQuery = { query: string; k: number; rerank: boolean };
export type IngestRequest = { source: string; uri: string; metadata: Record<string, unknown> };
export type IngestReceipt = Record<string, unknown>;

export interface RetrievalClient {
  query(req: RetrievalQuery, signal?: AbortSignal): Promise<RetrievalContext[]>;
  ingest(req: IngestRequest, signal?: AbortSignal): Promise<IngestReceipt>;
}

// The index answers with either `contexts` or `results`, and several field spellings.
const ContextItem = z
  .object({
    source: z.string().nullish(),
    doc_id: z.union([z.string(), z.number()]).nullish(),
    text: z.string().nullish(),
    chunk: z.string().nullish(),
    content: z.string().nullish(),
    score: z.number().nullish(),
  })
  .passthrough();

const QueryResponse = z.object({
  contexts: z.array(ContextItem).nullish(),
  results: z.array(ContextItem).nullish(),
});

const Receipt = z.record(z.unknown());

export function normalizeContexts(payload: unknown): RetrievalContext[] {
  const parsed = QueryResponse.parse(payload);
  const items = parsed.contexts ?? parsed.results ?? [];
  return items.map((c, i) => ({
    source: c.source || (c.doc_id != null && c.doc_id !== "" ? String(c.doc_id) : `context_${i}`),
    text: c.text || c.chunk || c.content || "",
    score: c.score ?? null,
  }));
}

export type HttpRetrievalClientOptions = { baseUrl: string; fetchImpl?: FetchLike; log?: Log };

export class HttpRetrievalClient implements RetrievalClient {
  private readonly fetchImpl: FetchLike;
  private readonly log: Log;

  constructor(private readonly opts: HttpRetrievalClientOptions) {
    this.fetchImpl = opts.fetchImpl ?? fetch;
    this.log = opts.log ?? createLog("retriever");
  }

  async query(req: RetrievalQuery, signal?: AbortSignal): Promise<RetrievalContext[]> {
    const payload = await postJson(this.fetchImpl, joinUrl(this.opts.baseUrl, "/query"), req, signal);
    const contexts = normalizeContexts(payload);
    this.log.debug(`query k=${req.k} rerank=${req.rerank} → ${contexts.length} contexts`);
    return contexts;
  }

  async ingest(req: IngestRequest, signal?: AbortSignal): Promise<IngestReceipt> {
    const payload = await postJson(this.fetchImpl, joinUrl(this.opts.baseUrl, "/ingest"), req, signal);
    this.log.debug(`ingest source=${req.source} uri=${req.uri}`);
    return Receipt.parse(payload);
  }
}
