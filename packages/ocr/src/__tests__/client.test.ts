import { describe, expect, it } from "vitest";
import { HttpOcrClient, normalizeLanguage } from "../client";
import { fakeFetch } from "../../../utils/__tests__/helpers/fakeFetch";
import { silentLog } from "../../../memory/src/__tests__/helpers/silentLog";

describe("normalizeLanguage", () => {
  it("lowercases supported hints and falls back otherwise", () => {
    expect(normalizeLanguage(" FR ")).toBe("fr");
    expect(normalizeLanguage("xx")).toBe("en");
    expect(normalizeLanguage(undefined, "de")).toBe("de");
  });
});

describe("HttpOcrClient.extractText", () => {
  it("uploads the decoded image with the language and counts lines", async () => {
    const { fetchImpl, calls } = fakeFetch({ body: { success: true, text: "line one\nline two" } });
    const client = new HttpOcrClient({ baseUrl: "http://ocr.test", fetchImpl, log: silentLog });

    const out = await client.extractText({ data: "data:image/png;base64,QUJD", language: "FR", filename: "scan.png" });

    expect(out).toEqual({ success: true, text: "line one\nline two", linesCount: 2 });
    expect(calls[0]?.url).toBe("http://ocr.test/extract-text");
    const form = calls[0]?.init?.body;
    expect(form).toBeInstanceOf(FormData);
    expect(form instanceof FormData ? form.get("lang") : null).toBe("fr");
  });

  it("prefers the reported line count", async () => {
    const { fetchImpl } = fakeFetch({ body: { text: "a", lines_count: 5 } });
    const client = new HttpOcrClient({ baseUrl: "http://ocr.test", fetchImpl, log: silentLog });
    await expect(client.extractText({ data: "QUJD" })).resolves.toEqual({ success: true, text: "a", linesCount: 5 });
  });

  it("accepts null optional fields in the reply", async () => {
    const { fetchImpl } = fakeFetch({ body: { success: true, text: "hello", lines_count: 1, message: null } });
    const client = new HttpOcrClient({ baseUrl: "http://ocr.test", fetchImpl, log: silentLog });
    await expect(client.extractText({ data: "QUJD" })).resolves.toEqual({ success: true, text: "hello", linesCount: 1 });
  });

  it("counts lines itself when the reported count is null", async () => {
    const { fetchImpl } = fakeFetch({ body: { success: null, text: "a\nb\nc", lines_count: null } });
    const client = new HttpOcrClient({ baseUrl: "http://ocr.test", fetchImpl, log: silentLog });
    await expect(client.extractText({ data: "QUJD" })).resolves.toEqual({ success: true, text: "a\nb\nc", linesCount: 3 });
  });

  it("turns failures into an unsuccessful result", async () => {
    const { fetchImpl } = fakeFetch({ status: 500, body: "boom" });
    const client = new HttpOcrClient({ baseUrl: "http://ocr.test", fetchImpl, log: silentLog });
    await expect(client.extractText({ data: "QUJD" })).resolves.toEqual({
      success: false,
      text: "",
      linesCount: 0,
      message: "OCR extraction failed: HTTP 500 from http://ocr.test/extract-text: boom",
    });
  });
});

describe("HttpOcrClient.ocrUri", () => {
  it("asks the service to fetch the URI itself", async () => {
    const { fetchImpl, calls, jsonBody } = fakeFetch({ body: { text: "scanned" } });
    const client = new HttpOcrClient({ baseUrl: "http://ocr.test", fetchImpl, log: silentLog });

    await expect(client.ocrUri("s3://bucket/a.png", "auto")).resolves.toEqual({ text: "scanned" });
    expect(calls[0]?.url).toBe("http://ocr.test/ocr");
    expect(jsonBody()).toEqual({ file_uri: "s3://bucket/a.png", mode: "auto" });
  });
});
