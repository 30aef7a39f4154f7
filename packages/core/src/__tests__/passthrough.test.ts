import { describe, expect, it } from "vitest";
import { ValidationError } from "@orcha/utils";
import { OcrJobQueue, type QueueBackend } from "@orcha/ocr";
import type { WebSearchClient } from "@orcha/search";
import { Passthrough } from "../passthrough";
import { StubOcr, StubRetrieval, silentLog } from "./helpers/fakes";
import { loadConfig } from "../config";

class MemoryBackend implements QueueBackend {
  lists = new Map<string, string[]>();
  values = new Map<string, string>();

  async rPush(key: string, value: string): Promise<number> {
    const list = this.lists.get(key) ?? [];
    list.push(value);
    this.lists.set(key, list);
    return list.length;
  }

  async lPop(key: string): Promise<string | null> {
    return this.lists.get(key)?.shift() ?? null;
  }

  async set(key: string, value: string): Promise<void> {
    this.values.set(key, value);
  }

  async get(key: string): Promise<string | null> {
    return this.values.get(key) ?? null;
  }
}

class EchoSearch implements WebSearchClient {
  calls: Array<[string, number]> = [];
  async search(query: string, maxResults: number): Promise<string> {
    this.calls.push([query, maxResults]);
    return `results for ${query}`;
  }
}

function setup(withQueue = true) {
  const ocr = new StubOcr();
  const retrieval = new StubRetrieval([{ source: "doc", text: "body", score: null }]);
  const search = new EchoSearch();
  const queue = withQueue ? new OcrJobQueue(new MemoryBackend(), { log: silentLog }) : null;
  const passthrough = new Passthrough({ ocr, retrieval, search, queue, config: loadConfig({}), log: silentLog });
  return { ocr, retrieval, search, queue, passthrough };
}

describe("Passthrough", () => {
  it("rejects empty required fields before calling anything", async () => {
    const { passthrough, retrieval, ocr } = setup();
    await expect(passthrough.handleRagQuery({ query: "  " })).rejects.toBeInstanceOf(ValidationError);
    await expect(passthrough.handleOcrExtract({ data: "" })).rejects.toThrow("data is required");
    await expect(passthrough.handleIngest({ source: "s", uri: "" })).rejects.toThrow("uri is required");
    await expect(passthrough.handleWebSearch({})).rejects.toThrow("query is required");
    expect(retrieval.queries).toEqual([]);
    expect(ocr.extracts).toEqual([]);
  });

  it("queries the index with configured defaults", async () => {
    const { passthrough, retrieval } = setup();
    const res = await passthrough.handleRagQuery({ query: "deductible" });
    expect(res).toEqual({ status: "ok", query: "deductible", contexts: [{ source: "doc", text: "body", score: null }] });
    expect(retrieval.queries).toEqual([{ query: "deductible", k: 8, rerank: true }]);
  });

  it("reports an unavailable index without leaking the error", async () => {
    const { passthrough, retrieval } = setup();
    retrieval.failQuery = true;
    expect(await passthrough.handleRagQuery({ query: "q", k: 3, rerank: false })).toEqual({
      status: "error",
      error: "Retrieval service unavailable",
    });
  });

  it("forwards OCR extraction with the default language", async () => {
    const { passthrough, ocr } = setup();
    const res = await passthrough.handleOcrExtract({ data: "aGVsbG8=", filename: "scan.png" });
    expect(res).toEqual({ success: true, text: "scanned", linesCount: 1 });
    expect(ocr.extracts).toEqual([{ data: "aGVsbG8=", filename: "scan.png", language: "en" }]);
  });

  it("clamps the number of web results", async () => {
    const { passthrough, search } = setup();
    expect(await passthrough.handleWebSearch({ query: "flood cover", maxResults: 50 })).toEqual({
      status: "ok",
      query: "flood cover",
      results: "results for flood cover",
    });
    expect(search.calls).toEqual([["flood cover", 10]]);
  });

  it("enqueues OCR jobs and reads their status back", async () => {
    const { passthrough } = setup();
    const res = await passthrough.handleOcrJob({ fileUri: "s3://bucket/a.pdf", userId: "7" });
    expect(res.status).toBe("queued");
    if (res.status !== "queued") return;
    const job = await passthrough.ocrJobStatus(res.jobId);
    expect(job).toMatchObject({ id: res.jobId, status: "queued", fileUri: "s3://bucket/a.pdf", mode: "auto", userId: "7" });
  });

  it("answers with an error when the job queue is disabled", async () => {
    const { passthrough } = setup(false);
    expect(await passthrough.handleOcrJob({ fileUri: "s3://bucket/a.pdf" })).toEqual({
      status: "error",
      error: "OCR job queue is disabled",
    });
  });
});
