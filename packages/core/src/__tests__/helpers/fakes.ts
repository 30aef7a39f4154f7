// Scripted collaborators for orchestrator tests.
import type { ChatClient, ChatRequest, ChatResult } from "@orcha/llm";
import type { OcrClient, OcrExtractInput, OcrExtractResult, OcrUriResult, PdfTextExtractor } from "@orcha/ocr";
import type { IngestReceipt, IngestRequest, RetrievalClient, RetrievalContext, RetrievalQuery } from "@orcha/retriever";
import { ConversationStore, TokenUsageTracker, UserMemoryStore } from "@orcha/memory";
import { loadConfig } from "../../config";
import type { Persona } from "../../context";
import { Orchestrator, type OrchestratorConfig } from "../../orchestrator";
import { createInMemoryRepositories } from "../../../../memory/src/__tests__/helpers/inMemory";
import { silentLog } from "../../../../memory/src/__tests__/helpers/silentLog";

export { silentLog };

export const PERSONAS: Record<Persona, string> = {
  domain: "DOMAIN PERSONA",
  general: "GENERAL PERSONA",
};

export const personas = (name: Persona): string => PERSONAS[name];

type Reply = string | Error | "hang";

export class ScriptedChat implements ChatClient {
  readonly requests: ChatRequest[] = [];

  constructor(private readonly replies: Reply[] = ["ok"], private readonly totalTokens = 30) {}

  async complete(req: ChatRequest): Promise<ChatResult> {
    this.requests.push(req);
    const next = this.replies.length > 1 ? this.replies.shift() : this.replies[0];
    if (next instanceof Error) throw next;
    if (next === "hang" || next === undefined) {
      return new Promise<ChatResult>(() => undefined);
    }
    return {
      text: next,
      model: req.model ?? "test-model",
      usage: { promptTokens: this.totalTokens - 10, completionTokens: 10, totalTokens: this.totalTokens },
    };
  }

  async listModels(): Promise<string[]> {
    return ["test-model", "test-vision"];
  }
}

export class StubOcr implements OcrClient {
  readonly uris: string[] = [];
  readonly extracts: OcrExtractInput[] = [];
  fail = false;

  async extractText(input: OcrExtractInput): Promise<OcrExtractResult> {
    this.extracts.push(input);
    return { success: true, text: "scanned", linesCount: 1 };
  }

  async ocrUri(uri: string): Promise<OcrUriResult> {
    this.uris.push(uri);
    if (this.fail) throw new Error("ocr down");
    return { text: `text of ${uri}` };
  }
}

export class StubRetrieval implements RetrievalClient {
  readonly queries: RetrievalQuery[] = [];
  readonly ingests: IngestRequest[] = [];
  failQuery = false;

  constructor(private readonly contexts: RetrievalContext[] = []) {}

  async query(req: RetrievalQuery): Promise<RetrievalContext[]> {
    this.queries.push(req);
    if (this.failQuery) throw new Error("index down");
    return this.contexts;
  }

  async ingest(req: IngestRequest): Promise<IngestReceipt> {
    this.ingests.push(req);
    return { status: "ingested", doc_id: "doc-1" };
  }
}

export class StubPdf implements PdfTextExtractor {
  constructor(private readonly text = "--- Page 1 ---\nPolicy number 42") {}

  async extract(): Promise<string> {
    return this.text;
  }
}

/** base64 of "%PDF-1.4 test" */
export const PDF_BASE64 = Buffer.from("%PDF-1.4 test").toString("base64");

export function testConfig(overrides: Partial<OrchestratorConfig> = {}): OrchestratorConfig {
  const cfg = loadConfig({ CHAT_MODEL: "test-model", VISION_MODEL: "test-vision", LLM_API_KEY: "test-secret" });
  return { llm: cfg.llm, ocr: cfg.ocr, retrieval: cfg.retrieval, context: cfg.context, locale: cfg.locale, ...overrides };
}

export function setupOrchestrator(opts: {
  chat?: ScriptedChat;
  ocr?: StubOcr;
  retrieval?: StubRetrieval;
  pdf?: PdfTextExtractor;
  config?: OrchestratorConfig;
} = {}) {
  const repos = createInMemoryRepositories();
  const conversations = new ConversationStore(repos, { log: silentLog });
  const memories = new UserMemoryStore(repos.memories);
  const tokens = new TokenUsageTracker(repos.tokenUsage, { log: silentLog });
  const chat = opts.chat ?? new ScriptedChat();
  const ocr = opts.ocr ?? new StubOcr();
  const retrieval = opts.retrieval ?? new StubRetrieval();
  const orchestrator = new Orchestrator({
    conversations,
    memories,
    tokens,
    chat,
    ocr,
    retrieval,
    pdf: opts.pdf ?? new StubPdf(),
    config: opts.config ?? testConfig(),
    personas,
    log: silentLog,
  });
  return { repos, db: repos.db, conversations, memories, tokens, chat, ocr, retrieval, orchestrator };
}
