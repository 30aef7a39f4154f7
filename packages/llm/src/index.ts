// packages/llm/src/index.ts
export * from "./client";
export * from "./prompt";
export { loadPrompt, type PromptName } from "./system";
