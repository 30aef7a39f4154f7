export * from "./env";
export * from "./log";
export * from "./time";
export * from "./text";
export * from "./errors";
export * from "./http";
