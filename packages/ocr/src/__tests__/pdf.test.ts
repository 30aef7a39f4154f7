import { describe, expect, it } from "vitest";
import { decodePdf, PdfError } from "../pdf";

const PDF = Buffer.from("%PDF-1.4 body").toString("base64");

describe("decodePdf", () => {
  it("decodes plain and data-URI payloads", () => {
    expect(decodePdf(PDF).toString("latin1")).toBe("%PDF-1.4 body");
    expect(decodePdf(`data:application/pdf;base64,${PDF}`).toString("latin1")).toBe("%PDF-1.4 body");
  });

  it("rejects payloads without the PDF header", () => {
    const png = Buffer.from("\x89PNG").toString("base64");
    expect(() => decodePdf(png)).toThrow(PdfError);
    expect(() => decodePdf(png)).toThrow("not a PDF payload");
  });
});
