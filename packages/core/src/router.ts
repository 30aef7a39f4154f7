// packages/core/src/router.ts
export type Capability = "vision" | "retrieval" | "chat";

export type RouteDecision = {
  capability: Capability;
  model: string;
  maxTokens: number;
  reason: string;
};

export type ModelRouterConfig = {
  model: string;
  visionModel: string;
  maxTokens: number;
  visionMaxTokens: number;
};

export type RouteSignals = {
  visionImages: number;
  /** legacy URI attachments in the turn */
  uriAttachments: number;
  useRag: boolean;
};

/** Priority list: vision > retrieval > chat. Exactly one per turn. */
export class ModelRouter {
  constructor(private readonly cfg: ModelRouterConfig) {}

  route(s: RouteSignals): RouteDecision {
    if (s.visionImages > 0) {
      return {
        capability: "vision",
        model: this.cfg.visionModel,
        maxTokens: this.cfg.visionMaxTokens,
        reason: `${s.visionImages} inline image(s)`,
      };
    }
    if (s.useRag || s.uriAttachments > 0) {
      return {
        capability: "retrieval",
        model: this.cfg.model,
        maxTokens: this.cfg.maxTokens,
        reason: s.uriAttachments > 0 ? "legacy URI attachment forces retrieval" : "use_rag flag",
      };
    }
    return { capability: "chat", model: this.cfg.model, maxTokens: this.cfg.maxTokens, reason: "default" };
  }
}
