// packages/core/src/suggest.ts
import type { AttachmentDescriptor } from "./attachments";

export type SuggestInput = {
  message: string;
  attachments?: AttachmentDescriptor[];
  useRag?: boolean;
  userId?: string | null;
  tenantId?: string | null;
};

export type SuggestedEndpoint =
  | {
      endpoint: "/orcha/ocr";
      reason: string;
      payload: { user_id: string; tenant_id: string | null; file_uri: string; mode: "auto" };
    }
  | {
      endpoint: "/orcha/ingest";
      reason: string;
      payload: { source: "user"; uri: ""; metadata: { requested_by: string } };
    }
  | {
      endpoint: "/orcha/rag/query";
      reason: string;
      payload: { user_id: string; tenant_id: string | null; query: string; k: number; rerank: boolean };
    }
  | {
      endpoint: "/orcha/chat";
      reason: string;
      payload: {
        user_id: string;
        tenant_id: string | null;
        message: string;
        attachments: AttachmentDescriptor[];
        use_rag: boolean;
      };
    };

const OCR_HINTS = ["scan", "ocr", "extract text", "read file"];
const INGEST_HINTS = ["ingest", "index", "add document", "load dataset"];
const RAG_HINTS = ["rag", "search", "retrieve", "context"];

const mentions = (text: string, hints: string[]) => hints.some((h) => text.includes(h));

/** Keyword routing for clients that do not know which endpoint to call next. */
export function suggestEndpoint(input: SuggestInput): SuggestedEndpoint {
  const text = input.message.toLowerCase();
  const attachments = input.attachments ?? [];
  const user = input.userId || "anonymous";
  const tenant = input.tenantId ?? null;

  if (attachments.length || mentions(text, OCR_HINTS)) {
    return {
      endpoint: "/orcha/ocr",
      reason: "attachments or OCR intent detected",
      payload: { user_id: user, tenant_id: tenant, file_uri: attachments[0]?.uri ?? "", mode: "auto" },
    };
  }
  if (mentions(text, INGEST_HINTS)) {
    // uri is left for the caller to fill
    return {
      endpoint: "/orcha/ingest",
      reason: "ingest intent detected",
      payload: { source: "user", uri: "", metadata: { requested_by: user } },
    };
  }
  if (input.useRag || mentions(text, RAG_HINTS)) {
    return {
      endpoint: "/orcha/rag/query",
      reason: "RAG intent detected",
      payload: { user_id: user, tenant_id: tenant, query: input.message, k: 8, rerank: true },
    };
  }
  return {
    endpoint: "/orcha/chat",
    reason: "default to chat",
    payload: { user_id: user, tenant_id: tenant, message: input.message, attachments, use_rag: !!input.useRag },
  };
}
