// packages/utils/http.ts
export type FetchLike = typeof fetch;
export type FetchInit = NonNullable<Parameters<typeof fetch>[1]>;

export class HttpError extends Error {
  constructor(
    readonly status: number,
    readonly url: string,
    readonly body: string,
  ) {
    super(`HTTP ${status} from ${url}${body ? `: ${body.slice(0, 200)}` : ""}`);
    this.name = "HttpError";
  }
}

export function joinUrl(base: string, path: string): string {
  return base.replace(/\/+$/, "") + path;
}

/** Non-2xx → HttpError; empty body → {}. */
export async function requestJson(fetchImpl: FetchLike, url: string, init: FetchInit): Promise<unknown> {
  const res = await fetchImpl(url, init);
  const text = await res.text();
  if (!res.ok) throw new HttpError(res.status, url, text);
  if (!text) return {};
  const parsed: unknown = JSON.parse(text);
  return parsed;
}

export function postJson(fetchImpl: FetchLike, url: string, body: unknown, signal?: AbortSignal): Promise<unknown> {
  return requestJson(fetchImpl, url, {
    method: "POST",
    headers: { "Content-Type": "application/json" },
    body: JSON.stringify(body),
    signal,
  });
}
