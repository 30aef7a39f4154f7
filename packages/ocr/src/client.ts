// packages/ocr/src/client.ts
import { z } from "zod";
import { createLog, errMessage, joinUrl, postJson, requestJson, type FetchLike, type Log } from "@orcha/utils";

export const SUPPORTED_LANGUAGES = ["en", "fr", "ar", "zh", "es", "de", "it", "pt", "ru", "ja", "ko"] as const;
export type OcrLanguage = (typeof SUPPORTED_LANGUAGES)[number];
export const DEFAULT_LANGUAGE: OcrLanguage = "en";

export type OcrExtractInput = { data: string; filename?: string; language?: string };
export type OcrExtractResult = { success: boolean; text: string; linesCount: number; message?: string };
export type OcrUriResult = Record<string, unknown>;

export interface OcrClient {
  extractText(input: OcrExtractInput, signal?: AbortSignal): Promise<OcrExtractResult>;
  /** Legacy path: the OCR service fetches `uri` itself. */
  ocrUri(uri: string, mode: string, signal?: AbortSignal): Promise<OcrUriResult>;
}

function isSupported(lang: string): lang is OcrLanguage {
  return SUPPORTED_LANGUAGES.some((l) => l === lang);
}

/** Unknown hints fall back to the default instead of failing the request. */
export function normalizeLanguage(lang: string | undefined, fallback: OcrLanguage = DEFAULT_LANGUAGE): OcrLanguage {
  const l = (lang ?? "").trim().toLowerCase();
  return isSupported(l) ? l : fallback;
}

const ExtractResponse = z.object({
  success: z.boolean().nullish(),
  text: z.string().nullish(),
  lines_count: z.number().int().nonnegative().nullish(),
  message: z.string().nullish(),
});

export type HttpOcrClientOptions = {
  baseUrl: string;
  defaultLanguage?: OcrLanguage;
  fetchImpl?: FetchLike;
  log?: Log;
};

export class HttpOcrClient implements OcrClient {
  private readonly fetchImpl: FetchLike;
  private readonly log: Log;

  constructor(private readonly opts: HttpOcrClientOptions) {
    this.fetchImpl = opts.fetchImpl ?? fetch;
    this.log = opts.log ?? createLog("ocr");
  }

  async extractText(input: OcrExtractInput, signal?: AbortSignal): Promise<OcrExtractResult> {
    const lang = normalizeLanguage(input.language, this.opts.defaultLanguage);
    const bytes = Buffer.from(input.data.replace(/^data:[^,]*,/, ""), "base64");
    const form = new FormData();
    form.append("file", new Blob([new Uint8Array(bytes)]), input.filename || "image.png");
    form.append("lang", lang);

    try {
      const payload = await requestJson(this.fetchImpl, joinUrl(this.opts.baseUrl, "/extract-text"), {
        method: "POST",
        body: form,
        signal,
      });
      const parsed = ExtractResponse.parse(payload);
      const text = parsed.text ?? "";
      const linesCount = parsed.lines_count ?? (text ? text.split("\n").length : 0);
      this.log.debug(`extract lang=${lang} → ${linesCount} lines`);
      return {
        success: parsed.success ?? true,
        text,
        linesCount,
        ...(parsed.message ? { message: parsed.message } : {}),
      };
    } catch (e) {
      this.log.warn("extract-text failed:", errMessage(e));
      return { success: false, text: "", linesCount: 0, message: `OCR extraction failed: ${errMessage(e)}` };
    }
  }

  async ocrUri(uri: string, mode: string, signal?: AbortSignal): Promise<OcrUriResult> {
    const payload = await postJson(this.fetchImpl, joinUrl(this.opts.baseUrl, "/ocr"), { file_uri: uri, mode }, signal);
    return z.record(z.unknown()).parse(payload);
  }
}
