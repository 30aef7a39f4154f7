// packages/memory/src/tokenUsage.ts
import { createLog, DAY_MS, errMessage, type Log } from "@orcha/utils";
import type { TokenUsageRepository, TokenWindow } from "./repositories";
import type { TokenUsageRow } from "./types";

export type TokenUsageResult = {
  trackingEnabled: boolean;
  currentUsage: number;
  resetAt: Date | null;
  timeUntilResetMs: number | null;
  tokensAdded?: number;
  note?: string;
  error?: string;
};

/**
 * Next counter state. An expired window restarts at `tokens` with a fresh reset time;
 * a live one accumulates and keeps its reset time.
 */
export function nextWindow(
  row: Pick<TokenUsageRow, "total_tokens" | "reset_at"> | null,
  tokens: number,
  now: Date,
  windowMs = DAY_MS,
): TokenWindow {
  if (!row || now.getTime() >= row.reset_at.getTime()) {
    return { total_tokens: tokens, reset_at: new Date(now.getTime() + windowMs), last_updated: now };
  }
  return { total_tokens: row.total_tokens + tokens, reset_at: row.reset_at, last_updated: now };
}

export type TokenUsageTrackerOptions = {
  windowMs?: number;
  maxRetries?: number;
  now?: () => Date;
  log?: Log;
};

export class TokenUsageTracker {
  private readonly windowMs: number;
  private readonly maxRetries: number;
  private readonly now: () => Date;
  private readonly log: Log;

  constructor(
    private readonly repo: TokenUsageRepository,
    opts: TokenUsageTrackerOptions = {},
  ) {
    this.windowMs = opts.windowMs ?? DAY_MS;
    this.maxRetries = opts.maxRetries ?? 5;
    this.now = opts.now ?? (() => new Date());
    this.log = opts.log ?? createLog("tokens");
  }

  /** Never throws: storage failures come back as trackingEnabled=false. */
  async increment(userId: number, tokensUsed: number): Promise<TokenUsageResult> {
    const tokens = Math.max(0, Math.floor(tokensUsed));
    try {
      for (let attempt = 0; attempt <= this.maxRetries; attempt++) {
        const row = await this.repo.find(userId);
        const now = this.now();
        const next = nextWindow(row, tokens, now, this.windowMs);
        const written = row
          ? await this.repo.replaceIfVersion(userId, row.version, next)
          : await this.repo.insertIfAbsent(userId, next);
        if (written) {
          this.log.debug(`user ${userId} +${tokens} → ${next.total_tokens}`);
          return {
            trackingEnabled: true,
            currentUsage: next.total_tokens,
            tokensAdded: tokens,
            resetAt: next.reset_at,
            timeUntilResetMs: next.reset_at.getTime() - now.getTime(),
          };
        }
        this.log.debug(`user ${userId} lost write race (attempt ${attempt + 1}), retrying`);
      }
      throw new Error(`token usage update conflicted ${this.maxRetries + 1} times`);
    } catch (e) {
      this.log.warn(`increment failed for user ${userId}:`, errMessage(e));
      return disabled(errMessage(e), tokens);
    }
  }

  /** Read-only; an expired window reads as zero before any write resets it. */
  async get(userId: number): Promise<TokenUsageResult> {
    try {
      const row = await this.repo.find(userId);
      if (!row) return { trackingEnabled: true, currentUsage: 0, resetAt: null, timeUntilResetMs: null };
      const now = this.now();
      if (now.getTime() >= row.reset_at.getTime()) {
        return {
          trackingEnabled: true,
          currentUsage: 0,
          resetAt: null,
          timeUntilResetMs: null,
          note: "Usage window expired, will reset on next use",
        };
      }
      return {
        trackingEnabled: true,
        currentUsage: row.total_tokens,
        resetAt: row.reset_at,
        timeUntilResetMs: row.reset_at.getTime() - now.getTime(),
      };
    } catch (e) {
      this.log.warn(`get failed for user ${userId}:`, errMessage(e));
      return disabled(errMessage(e));
    }
  }

  async reset(userId: number): Promise<boolean> {
    try {
      return await this.repo.delete(userId);
    } catch (e) {
      this.log.warn(`reset failed for user ${userId}:`, errMessage(e));
      return false;
    }
  }
}

function disabled(error: string, tokensAdded?: number): TokenUsageResult {
  return {
    trackingEnabled: false,
    currentUsage: 0,
    resetAt: null,
    timeUntilResetMs: null,
    ...(tokensAdded === undefined ? {} : { tokensAdded }),
    error,
  };
}
