// packages/core/src/orchestrator.ts
import { createLog, errMessage, TimeoutError, withDeadline, type Log } from "@orcha/utils";
import { frameDocument, type ChatClient, type ChatUsage, type HistoryTurn } from "@orcha/llm";
import type {
  ChatMessage,
  Conversation,
  ConversationStore,
  TokenUsageTracker,
  UserMemory,
  UserMemoryStore,
} from "@orcha/memory";
import type { IngestReceipt, RetrievalClient, RetrievalContext } from "@orcha/retriever";
import { decodePdf, type OcrClient, type PdfTextExtractor } from "@orcha/ocr";
import type { AppConfig } from "./config";
import { APOLOGIES, type Apologies } from "./messages";
import { classifyAttachments, toStoredAttachments, type AttachmentDescriptor, type InlineAttachment, type UriAttachment } from "./attachments";
import { ModelRouter, type Capability, type RouteDecision } from "./router";
import { ContextAssembler, type PersonaLoader } from "./context";
import { degrade, Degradations } from "./result";

export type TurnRequest = {
  userId: number;
  tenantId?: string | null;
  conversationId?: number | null;
  message: string;
  attachments?: AttachmentDescriptor[];
  useRag?: boolean;
  conversationHistory?: HistoryTurn[] | null;
  signal?: AbortSignal;
  log?: Log;
};

export type IngestedDocument = { uri: string; filename: string | null; receipt: IngestReceipt };

export type TurnOk = {
  status: "ok";
  message: string;
  conversationId: number;
  title: string | null;
  contexts: RetrievalContext[];
  model: string;
  capability: Capability;
  tokenUsage: ChatUsage;
  attachmentsProcessed: number;
  ingestedDocuments: IngestedDocument[];
  documentTextLength: number;
  degraded: string[];
};

export type TurnErrorType = "timeout" | "upstream" | "storage";

export type TurnError = {
  status: "error";
  message: string;
  conversationId: number | null;
  errorType: TurnErrorType;
  degraded: string[];
};

export type TurnResult = TurnOk | TurnError;

export type OrchestratorConfig = Pick<AppConfig, "llm" | "ocr" | "retrieval" | "context" | "locale">;

export type OrchestratorDeps = {
  conversations: ConversationStore;
  memories: UserMemoryStore;
  tokens: TokenUsageTracker;
  chat: ChatClient;
  ocr: OcrClient;
  retrieval: RetrievalClient;
  pdf: PdfTextExtractor;
  config: OrchestratorConfig;
  personas?: PersonaLoader;
  log?: Log;
};

const EXTRACTED_MEMORY_TITLE = "Extracted memory";

type TurnState = {
  req: TurnRequest;
  conversation: Conversation;
  userMessage: ChatMessage;
  log: Log;
  steps: Degradations;
};

type PreparedAttachments = {
  documentText: string;
  processed: number;
  ingested: IngestedDocument[];
};

/**
 * One chat turn: resolve conversation → persist user message → attachments → route →
 * retrieval → assemble → model → persist reply → title/usage/memory side effects.
 * Only the first two writes are required; everything after degrades.
 */
export class Orchestrator {
  private readonly router: ModelRouter;
  private readonly assembler: ContextAssembler;
  private readonly apologies: Apologies;
  private readonly log: Log;

  constructor(private readonly deps: OrchestratorDeps) {
    const { llm, context, locale } = deps.config;
    this.router = new ModelRouter({
      model: llm.model,
      visionModel: llm.visionModel,
      maxTokens: llm.maxTokens,
      visionMaxTokens: llm.visionMaxTokens,
    });
    this.log = deps.log ?? createLog("core");
    this.assembler = new ContextAssembler({
      conversations: deps.conversations,
      memories: deps.memories,
      limits: context,
      personas: deps.personas,
      log: this.log,
    });
    this.apologies = APOLOGIES[locale];
  }

  async handleTurn(req: TurnRequest): Promise<TurnResult> {
    const log = req.log ?? this.log;
    const steps = new Degradations();
    let conversationId: number | null = null;

    log.time("total");
    try {
      const { conversation, created } = await this.deps.conversations.resolveOrCreate({
        conversationId: req.conversationId,
        userId: req.userId,
        tenantId: req.tenantId,
      });
      conversationId = conversation.id;
      log.debug(`conversation=${conversation.id} created=${created}`);

      const userMessage = await this.deps.conversations.appendMessage({
        conversationId: conversation.id,
        role: "user",
        content: req.message,
        attachments: toStoredAttachments(req.attachments ?? []),
      });

      return await this.runTurn({ req, conversation, userMessage, log, steps });
    } catch (e) {
      log.error("turn failed before the model call:", errMessage(e));
      return {
        status: "error",
        message: this.apologies.error,
        conversationId,
        errorType: "storage",
        degraded: steps.labels,
      };
    } finally {
      log.timeEnd("total");
    }
  }

  private async runTurn(state: TurnState): Promise<TurnResult> {
    const { req, conversation, userMessage, log, steps } = state;
    const { config } = this.deps;
    const classified = classifyAttachments(req.attachments ?? []);
    if (classified.skipped.length) log.debug(`skipped ${classified.skipped.length} attachment(s)`);

    const prepared = await this.prepareAttachments(state, classified.pdf, classified.uri);

    const route = this.router.route({
      visionImages: classified.vision.length,
      uriAttachments: classified.uri.length,
      useRag: !!req.useRag,
    });
    log.debug(`route=${route.capability} model=${route.model} (${route.reason})`);

    let contexts: RetrievalContext[] = [];
    if (route.capability === "retrieval") {
      log.time("retrieval");
      const step = await degrade<RetrievalContext[]>(
        "retrieval",
        [],
        () =>
          withDeadline(
            (signal) =>
              this.deps.retrieval.query(
                { query: req.message, k: config.retrieval.topK, rerank: config.retrieval.rerank },
                signal,
              ),
            config.retrieval.timeoutMs,
            "retrieval",
            req.signal,
          ),
        log,
      );
      log.timeEnd("retrieval");
      contexts = steps.take("retrieval", step);
    }

    const images = route.capability === "vision" ? classified.vision : [];
    const assembled = await this.assembler.assemble(
      {
        userId: req.userId,
        conversationId: conversation.id,
        currentMessageId: userMessage.id,
        message: req.message,
        suppliedHistory: req.conversationHistory,
        contexts,
        documentText: prepared.documentText || undefined,
        images,
      },
      log,
    );
    steps.take("memories", assembled.memories);
    steps.take("history", assembled.history);

    log.time("llm");
    const call = await withDeadline(
      (signal) =>
        this.deps.chat.complete({
          messages: assembled.messages,
          model: route.model,
          maxTokens: route.maxTokens,
          temperature: config.llm.temperature,
          signal,
        }),
      config.llm.timeoutMs,
      "llm",
      req.signal,
    ).then(
      (res) => ({ ok: true as const, res }),
      (error: unknown) => ({ ok: false as const, error }),
    );
    log.timeEnd("llm");
    if (!call.ok) return this.failTurn(state, route, call.error);

    const { usage, model } = call.res;
    const reply = call.res.text.trim() ? call.res.text : this.apologies.emptyReply;

    const persisted = await degrade<ChatMessage | null>(
      "persist-reply",
      null,
      () =>
        this.deps.conversations.appendMessage({
          conversationId: conversation.id,
          role: "assistant",
          content: reply,
          tokenCount: usage.totalTokens || null,
          model,
          contextsUsed: contexts.length ? contexts.map((c) => ({ source: c.source, text: c.text })) : null,
        }),
      log,
    );
    steps.take("persist-reply", persisted);

    const title = steps.take(
      "title",
      await degrade<string | null>("title", null, () => this.deps.conversations.maybeSetTitle(conversation, req.message), log),
    );
    steps.take("touch", await degrade<void>("touch", undefined, () => this.deps.conversations.touch(conversation.id), log));

    const tracked = await this.deps.tokens.increment(req.userId, usage.totalTokens);
    if (!tracked.trackingEnabled) steps.labels.push("token-usage");

    if (assembled.persona === "general" && reply !== this.apologies.emptyReply) {
      const saved = await degrade<UserMemory | null>(
        "memory-extraction",
        null,
        () =>
          this.deps.memories.add({
            userId: req.userId,
            content: reply,
            title: EXTRACTED_MEMORY_TITLE,
            conversationId: conversation.id,
            source: "auto_extraction",
          }),
        log,
      );
      steps.take("memory-extraction", saved);
    }

    return {
      status: "ok",
      message: reply,
      conversationId: conversation.id,
      title,
      contexts,
      model,
      capability: route.capability,
      tokenUsage: usage,
      attachmentsProcessed: classified.vision.length + prepared.processed,
      ingestedDocuments: prepared.ingested,
      documentTextLength: prepared.documentText.length,
      degraded: steps.labels,
    };
  }

  /** PDFs become framed document text; legacy URIs are OCR'd then ingested. */
  private async prepareAttachments(
    state: TurnState,
    pdfs: InlineAttachment[],
    uris: UriAttachment[],
  ): Promise<PreparedAttachments> {
    const { req, log, steps } = state;
    const { config } = this.deps;
    const out: PreparedAttachments = { documentText: "", processed: 0, ingested: [] };

    for (const [i, pdf] of pdfs.entries()) {
      const name = pdf.filename || `document_${i + 1}.pdf`;
      const step = await degrade(
        `pdf:${name}`,
        "",
        () =>
          withDeadline(
            () => this.deps.pdf.extract(decodePdf(pdf.data)),
            config.ocr.timeoutMs,
            `pdf:${name}`,
            req.signal,
          ),
        log,
      );
      const text = steps.take(`pdf:${name}`, step);
      if (text) {
        out.documentText += frameDocument(name, text);
        out.processed++;
      } else if (step.ok) {
        log.warn(`no text extracted from ${name}`);
      }
    }

    for (const att of uris) {
      const step = await degrade<IngestedDocument | null>(
        `ingest:${att.uri}`,
        null,
        async () => {
          const ocrResult = await withDeadline(
            (signal) => this.deps.ocr.ocrUri(att.uri, "auto", signal),
            config.ocr.timeoutMs,
            "ocr",
            req.signal,
          );
          const receipt = await withDeadline(
            (signal) =>
              this.deps.retrieval.ingest(
                {
                  source: `attachment_${req.userId}`,
                  uri: att.uri,
                  metadata: {
                    user_id: req.userId,
                    original_message: req.message,
                    type: att.type,
                    ocr_result: ocrResult,
                  },
                },
                signal,
              ),
            config.retrieval.timeoutMs,
            "ingest",
            req.signal,
          );
          return { uri: att.uri, filename: att.filename, receipt };
        },
        log,
      );
      const doc = steps.take(`ingest:${att.uri}`, step);
      if (doc) {
        out.ingested.push(doc);
        out.processed++;
      }
    }

    return out;
  }

  /** Model call failed: store a fixed apology with the real error, answer with the apology. */
  private async failTurn(state: TurnState, route: RouteDecision, e: unknown): Promise<TurnError> {
    const { conversation, log, steps } = state;
    const timedOut = e instanceof TimeoutError;
    const message = timedOut ? this.apologies.timeout : this.apologies.error;
    log.error(`model call failed (${route.model}):`, errMessage(e));

    steps.take(
      "persist-error",
      await degrade<ChatMessage | null>(
        "persist-error",
        null,
        () =>
          this.deps.conversations.appendMessage({
            conversationId: conversation.id,
            role: "assistant",
            content: message,
            model: route.model,
            error: errMessage(e),
          }),
        log,
      ),
    );
    steps.take("touch", await degrade<void>("touch", undefined, () => this.deps.conversations.touch(conversation.id), log));

    return {
      status: "error",
      message,
      conversationId: conversation.id,
      errorType: timedOut ? "timeout" : "upstream",
      degraded: steps.labels,
    };
  }
}
