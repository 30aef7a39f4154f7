// packages/core/src/context.ts
import { createLog, type Log } from "@orcha/utils";
import {
  buildMessages,
  buildUserTurn,
  DEFAULT_LIMITS,
  isMemoryExtraction,
  loadPrompt,
  type ChatBlock,
  type HistoryTurn,
  type InlineImage,
  type MemoryNote,
  type PromptLimits,
  type SourceSnippet,
} from "@orcha/llm";
import type { ConversationStore, UserMemoryStore } from "@orcha/memory";
import { degrade, type Step } from "./result";

export type Persona = "general" | "domain";
export type PersonaLoader = (name: Persona) => string;

export type AssembleInput = {
  userId: number;
  conversationId: number;
  /** id of the stored user message; history is read strictly before it */
  currentMessageId: number;
  message: string;
  suppliedHistory?: HistoryTurn[] | null;
  contexts?: SourceSnippet[];
  documentText?: string;
  images?: InlineImage[];
};

export type AssembledContext = {
  messages: ChatBlock[];
  persona: Persona;
  memories: Step<MemoryNote[]>;
  history: Step<HistoryTurn[]>;
};

export type ContextAssemblerDeps = {
  conversations: ConversationStore;
  memories: UserMemoryStore;
  limits?: Partial<PromptLimits> & { memoryCount?: number };
  personas?: PersonaLoader;
  log?: Log;
};

export function pickPersona(message: string): Persona {
  return isMemoryExtraction(message) ? "general" : "domain";
}

export class ContextAssembler {
  private readonly limits: PromptLimits;
  private readonly memoryCount: number;
  private readonly personas: PersonaLoader;
  private readonly log: Log;

  constructor(private readonly deps: ContextAssemblerDeps) {
    const { memoryCount, ...limits } = deps.limits ?? {};
    this.limits = { ...DEFAULT_LIMITS, ...limits };
    this.memoryCount = memoryCount ?? 5;
    this.personas = deps.personas ?? loadPrompt;
    this.log = deps.log ?? createLog("context");
  }

  /** Memory and history loads degrade to empty blocks; the call itself does not reject on them. */
  async assemble(input: AssembleInput, log: Log = this.log): Promise<AssembledContext> {
    const persona = pickPersona(input.message);

    const memories = await degrade<MemoryNote[]>("memories", [], async () => {
      const rows = await this.deps.memories.recent(input.userId, this.memoryCount);
      return rows.map((m) => ({ title: m.title, content: m.content, createdAt: m.created_at }));
    }, log);

    const supplied = (input.suppliedHistory ?? []).filter((m) => m.role === "user" || m.role === "assistant");
    const history: Step<HistoryTurn[]> = supplied.length
      ? { ok: true, value: supplied.slice(-this.limits.historyMessages) }
      : await degrade<HistoryTurn[]>(
          "history",
          [],
          () => this.deps.conversations.loadHistory(input.conversationId, input.currentMessageId, this.limits.historyMessages),
          log,
        );

    const messages = buildMessages({
      persona: this.personas(persona),
      contexts: input.contexts,
      memories: memories.value,
      history: history.value,
      user: buildUserTurn({ message: input.message, documentText: input.documentText, images: input.images }),
      limits: this.limits,
    });

    log.debug(
      `persona=${persona} contexts=${input.contexts?.length ?? 0} memories=${memories.value.length} history=${history.value.length}`,
    );
    return { messages, persona, memories, history };
  }
}
