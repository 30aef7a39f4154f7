// packages/core/src/attachments.ts
import type { StoredAttachment } from "@orcha/sources/schemas";

export type AttachmentDescriptor = {
  type?: string | null;
  data?: string | null;
  uri?: string | null;
  filename?: string | null;
  size?: number | null;
};

export type AttachmentKind = "vision" | "pdf" | "uri" | "skipped";

export type InlineAttachment = { type: string; data: string; filename: string | null };
export type UriAttachment = { type: string | null; uri: string; filename: string | null };

export type ClassifiedAttachments = {
  vision: InlineAttachment[];
  pdf: InlineAttachment[];
  uri: UriAttachment[];
  skipped: AttachmentDescriptor[];
};

function isImageType(type: string): boolean {
  return type === "image" || type.startsWith("image/");
}

/** Inline payload wins: with `data` present the URI is never looked at. */
export function classifyAttachment(a: AttachmentDescriptor): AttachmentKind {
  const type = (a.type ?? "").trim().toLowerCase();
  if (a.data) {
    if (isImageType(type)) return "vision";
    if (type === "application/pdf") return "pdf";
    return "skipped";
  }
  if (a.uri) return "uri";
  return "skipped";
}

export function classifyAttachments(list: AttachmentDescriptor[]): ClassifiedAttachments {
  const out: ClassifiedAttachments = { vision: [], pdf: [], uri: [], skipped: [] };
  for (const a of list) {
    const type = (a.type ?? "").trim().toLowerCase();
    const filename = a.filename ?? null;
    switch (classifyAttachment(a)) {
      case "vision":
        out.vision.push({ type, data: a.data ?? "", filename });
        break;
      case "pdf":
        out.pdf.push({ type, data: a.data ?? "", filename });
        break;
      case "uri":
        out.uri.push({ type: type || null, uri: a.uri ?? "", filename });
        break;
      case "skipped":
        out.skipped.push(a);
        break;
    }
  }
  return out;
}

/** Attachment metadata kept on the user message row; inline payloads are not persisted. */
export function toStoredAttachments(list: AttachmentDescriptor[]): StoredAttachment[] | null {
  if (!list.length) return null;
  return list.map((a) => ({
    ...(a.type ? { type: a.type } : {}),
    ...(a.filename ? { filename: a.filename } : {}),
    ...(a.uri ? { uri: a.uri } : {}),
    ...(a.size != null ? { size: a.size } : a.data ? { size: a.data.length } : {}),
  }));
}
