// packages/memory/src/index.ts
export * from "./types";
export * from "./repositories";
export * from "./conversations";
export * from "./memories";
export * from "./tokenUsage";
export * from "./pulses";
export { createDrizzleRepositories } from "./drizzle";
