// packages/utils/text.ts

/** Approximation used for every context budget: 1 token ≈ 4 chars. */
export const CHARS_PER_TOKEN = 4;
export const TRUNCATION_MARKER = "...";

/**
 * Keeps the TAIL of `text` when it exceeds `maxTokens * 4` chars.
 * Memory value skews toward recent content, so the oldest part is dropped.
 */
export function truncateToTokens(text: string, maxTokens: number): string {
  const budget = Math.max(0, maxTokens) * CHARS_PER_TOKEN;
  if (text.length <= budget) return text;
  return TRUNCATION_MARKER + (budget === 0 ? "" : text.slice(-budget));
}

/** Head truncation with an ellipsis, counted in code points so surrogate pairs stay whole. */
export function clip(s: string, n: number, suffix = "..."): string {
  const chars = Array.from(s);
  return chars.length > n ? chars.slice(0, n).join("") + suffix : s;
}
