// packages/llm/src/system.ts
import { readFileSync } from "node:fs";
import { join, dirname } from "node:path";
import { fileURLToPath } from "node:url";

export type PromptName = "domain" | "general" | "pulse";

const here = dirname(fileURLToPath(import.meta.url));
const cache = new Map<string, string>();

/**
 * Reads a prompt from:
 * 1) `dir` / LLM_PROMPTS_DIR when set
 * 2) packages/llm/prompts (default, relative to this package)
 */
export function loadPrompt(name: PromptName, dir = process.env.LLM_PROMPTS_DIR): string {
  const path = join(dir || join(here, "..", "prompts"), `${name}.txt`);
  const hit = cache.get(path);
  if (hit !== undefined) return hit;
  const text = readFileSync(path, "utf8").trim();
  cache.set(path, text);
  return text;
}
