// packages/ocr/src/pdf.ts
import { PDFParse } from "pdf-parse";

export interface PdfTextExtractor {
  extract(data: Buffer): Promise<string>;
}

export class PdfError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "PdfError";
  }
}

function toBytes(base64: string): Buffer {
  return Buffer.from(base64.replace(/^data:[^,]*,/, ""), "base64");
}

/** Strips a data-URI prefix and decodes; rejects payloads without the %PDF header. */
export function decodePdf(base64: string): Buffer {
  const buf = toBytes(base64);
  if (buf.subarray(0, 4).toString("latin1") !== "%PDF") throw new PdfError("not a PDF payload");
  return buf;
}

/** Text per page, framed `--- Page N ---`. */
export class PdfParseExtractor implements PdfTextExtractor {
  async extract(data: Buffer): Promise<string> {
    const parser = new PDFParse({ data });
    try {
      const result = await parser.getText();
      if (!result.pages.length) return result.text.trim();
      return result.pages
        .map((p) => `--- Page ${p.num} ---\n${p.text.trim()}`)
        .join("\n\n")
        .trim();
    } finally {
      await parser.destroy();
    }
  }
}
