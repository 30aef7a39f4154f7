// packages/search/src/index.ts
import { z } from "zod";
import { createLog, errMessage, TimeoutError, withDeadline, type FetchLike, type Log } from "@orcha/utils";

export interface WebSearchClient {
  /** Always resolves: failures come back as user-facing text. */
  search(query: string, maxResults: number, signal?: AbortSignal): Promise<string>;
}

export const SEARCH_MESSAGES = {
  notConfigured: "Web search is not configured.",
  quota: "Web search quota exceeded. Please try again later.",
  auth: "Web search authentication failed. Check the search API key and engine ID.",
  timeout: "Web search timed out. Please try again.",
} as const;

const SearchResponse = z.object({
  items: z
    .array(
      z.object({
        title: z.string().default(""),
        snippet: z.string().default(""),
        link: z.string().default(""),
      }),
    )
    .default([]),
});

export type GoogleSearchClientOptions = {
  apiKey: string;
  engineId: string;
  timeoutMs: number;
  endpoint?: string;
  fetchImpl?: FetchLike;
  log?: Log;
};

/** Google Custom Search JSON API. */
export class GoogleSearchClient implements WebSearchClient {
  private readonly fetchImpl: FetchLike;
  private readonly log: Log;
  private readonly endpoint: string;

  constructor(private readonly opts: GoogleSearchClientOptions) {
    this.fetchImpl = opts.fetchImpl ?? fetch;
    this.log = opts.log ?? createLog("search");
    this.endpoint = opts.endpoint ?? "https://www.googleapis.com/customsearch/v1";
  }

  async search(query: string, maxResults: number, signal?: AbortSignal): Promise<string> {
    if (!this.opts.apiKey || !this.opts.engineId) return SEARCH_MESSAGES.notConfigured;

    const url = new URL(this.endpoint);
    url.searchParams.set("key", this.opts.apiKey);
    url.searchParams.set("cx", this.opts.engineId);
    url.searchParams.set("q", query);
    // the API caps num at 10
    url.searchParams.set("num", String(Math.max(1, Math.min(10, maxResults))));

    try {
      const res = await withDeadline((s) => this.fetchImpl(url, { signal: s }), this.opts.timeoutMs, "search", signal);
      if (res.status === 429) return SEARCH_MESSAGES.quota;
      if (res.status === 401 || res.status === 403) return SEARCH_MESSAGES.auth;
      if (!res.ok) return `Web search failed (HTTP ${res.status}).`;
      const body: unknown = await res.json();
      return formatResults(query, SearchResponse.parse(body).items);
    } catch (e) {
      if (e instanceof TimeoutError) return SEARCH_MESSAGES.timeout;
      this.log.warn("search failed:", errMessage(e));
      return `Web search failed: ${errMessage(e)}`;
    }
  }
}

export function formatResults(query: string, items: Array<{ title: string; snippet: string; link: string }>): string {
  if (!items.length) return `No results found for "${query}".`;
  const lines = [`Search results for "${query}":`, ""];
  items.forEach((it, i) => {
    lines.push(`${i + 1}. ${it.title}`);
    if (it.snippet) lines.push(`   ${it.snippet.replace(/\s+/g, " ").trim()}`);
    lines.push(`   URL: ${it.link}`);
    lines.push("");
  });
  return lines.join("\n").trimEnd();
}
