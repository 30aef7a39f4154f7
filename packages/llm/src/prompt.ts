// packages/llm/src/prompt.ts
import { isoDate, truncateToTokens } from "@orcha/utils";

export type TextPart = { type: "text"; text: string };
export type ImagePart = { type: "image_url"; image_url: { url: string } };
export type ContentPart = TextPart | ImagePart;

export type ChatBlock =
  | { role: "system"; content: string }
  | { role: "assistant"; content: string }
  | { role: "user"; content: string | ContentPart[] };

export type HistoryTurn = { role: "user" | "assistant"; content: string };
export type SourceSnippet = { source: string; text: string };
export type MemoryNote = { title: string | null; content: string; createdAt: Date };
export type InlineImage = { type: string; data: string };

export type PromptLimits = {
  maxContexts: number;
  contextChars: number;
  memoryTokens: number;
  historyMessages: number;
};

export const DEFAULT_LIMITS: PromptLimits = {
  maxContexts: 4,
  contextChars: 800,
  memoryTokens: 2000,
  historyMessages: 10,
};

/** Case-sensitive prefix that switches the turn to the general persona. */
export const MEMORY_TRIGGER = "Based on my recent messages, extract and remember";

/** Leading whitespace is ignored; the rest must match exactly. */
export function isMemoryExtraction(message: string): boolean {
  return message.trimStart().startsWith(MEMORY_TRIGGER);
}

export function renderSources(contexts: SourceSnippet[], limits: Pick<PromptLimits, "maxContexts" | "contextChars">): string {
  let out = "\n\n=== SOURCES ===\n";
  for (const c of contexts.slice(0, limits.maxContexts)) {
    out += `[${c.source}] ${c.text.slice(0, limits.contextChars)}\n\n`;
  }
  return out;
}

/** Oldest-first entries; the body keeps its tail when over budget, the header stays. */
export function renderMemories(memories: MemoryNote[], memoryTokens: number): string {
  const body = memories
    .map((m) => `[${isoDate(m.createdAt)}] ${m.title || "Memory"}\n${m.content}`)
    .join("\n\n");
  return `=== USER MEMORY ===\n${truncateToTokens(body, memoryTokens)}`;
}

export function frameDocument(filename: string, text: string): string {
  return `\n\n=== Document: ${filename} ===\n${text}\n=== End of ${filename} ===\n`;
}

export function withDocument(message: string, documentText: string): string {
  return (
    `The user has attached a document with the following content:\n\n${documentText}\n\n` +
    `User's question: ${message}\n\n` +
    "Please answer the user's question based on the document content above."
  );
}

/** data:image/<subtype>;base64,<payload>; an existing data-URI prefix is dropped first. */
export function toImageDataUri(image: InlineImage): string {
  const payload = image.data.replace(/^data:[^,]*,/, "");
  const fmt = image.type.includes("/") ? image.type.split("/").pop() || "jpeg" : "jpeg";
  return `data:image/${fmt};base64,${payload}`;
}

export function buildUserTurn(opts: { message: string; documentText?: string; images?: InlineImage[] }): ChatBlock {
  const text = opts.documentText ? withDocument(opts.message, opts.documentText) : opts.message;
  if (!opts.images?.length) return { role: "user", content: text };
  const parts: ContentPart[] = [{ type: "text", text }];
  for (const img of opts.images) parts.push({ type: "image_url", image_url: { url: toImageDataUri(img) } });
  return { role: "user", content: parts };
}

/**
 * Fixed order: persona, sources, memory, history, current turn.
 * Empty inputs drop their block.
 */
export function buildMessages(opts: {
  persona: string;
  contexts?: SourceSnippet[];
  memories?: MemoryNote[];
  history?: HistoryTurn[];
  user: ChatBlock;
  limits?: Partial<PromptLimits>;
}): ChatBlock[] {
  const limits = { ...DEFAULT_LIMITS, ...opts.limits };
  const msgs: ChatBlock[] = [{ role: "system", content: opts.persona }];

  if (opts.contexts?.length) msgs.push({ role: "system", content: renderSources(opts.contexts, limits) });
  if (opts.memories?.length) msgs.push({ role: "system", content: renderMemories(opts.memories, limits.memoryTokens) });

  const history = (opts.history ?? []).filter((m) => m.role === "user" || m.role === "assistant");
  for (const m of history.slice(-limits.historyMessages)) msgs.push({ role: m.role, content: m.content });

  msgs.push(opts.user);
  return msgs;
}
