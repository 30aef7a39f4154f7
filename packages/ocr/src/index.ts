// packages/ocr/src/index.ts
export * from "./client";
export * from "./pdf";
export * from "./queue";
export { getRedis, closeRedis, type RedisClient } from "./redisClient";
