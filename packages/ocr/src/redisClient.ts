// packages/ocr/src/redisClient.ts
import { createClient } from "redis";

export type RedisClient = ReturnType<typeof createClient>;

let client: RedisClient | null = null;
let connectPromise: Promise<void> | null = null;

export async function getRedis(url = process.env.REDIS_URL || "redis://localhost:6379"): Promise<RedisClient> {
  if (!client) {
    client = createClient({ url });
    client.on("error", (err) => {
      console.error("[redis] client error:", err);
    });
  }
  const c = client;

  // lock so concurrent callers share one connect()
  if (!c.isOpen) {
    if (!connectPromise) {
      connectPromise = c
        .connect()
        .then(() => {
          connectPromise = null;
        })
        .catch((e: unknown) => {
          connectPromise = null;
          throw e;
        });
    }
    await connectPromise;
  }

  return c;
}

export async function closeRedis(): Promise<void> {
  if (client?.isOpen) {
    await client.quit();
  }
  client = null;
  connectPromise = null;
}
