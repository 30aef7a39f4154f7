// packages/core/src/index.ts
export { loadConfig, type AppConfig } from "./config";
export * from "./messages";
export * from "./result";
export * from "./attachments";
export * from "./router";
export * from "./context";
export * from "./orchestrator";
export * from "./passthrough";
export * from "./suggest";
export * from "./services";
