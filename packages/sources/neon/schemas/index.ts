// packages/sources/neon/schemas/index.ts
export * from "./users";
export * from "./folders";
export * from "./conversations";
export * from "./chat_messages";
export * from "./user_memories";
export * from "./token_usage";
export * from "./pulses";
