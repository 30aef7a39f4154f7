import { describe, expect, it } from "vitest";
import { UserMemoryStore } from "../memories";
import { InMemoryDb, InMemoryUserMemoryRepository } from "./helpers/inMemory";

describe("UserMemoryStore", () => {
  it("returns the five most recent active memories, oldest first", async () => {
    const db = new InMemoryDb();
    let tick = Date.parse("2026-01-01T00:00:00Z");
    const store = new UserMemoryStore(new InMemoryUserMemoryRepository(db), {
      now: () => new Date((tick += 60_000)),
    });
    for (let i = 1; i <= 7; i++) await store.add({ userId: 1, content: `fact ${i}` });
    await store.add({ userId: 2, content: "someone else" });
    const dropped = db.memories.find((m) => m.content === "fact 7");
    if (dropped) await store.remove(1, dropped.id);

    const recent = await store.recent(1);
    expect(recent.map((m) => m.content)).toEqual(["fact 2", "fact 3", "fact 4", "fact 5", "fact 6"]);
  });

  it("rejects empty content", async () => {
    const store = new UserMemoryStore(new InMemoryUserMemoryRepository(new InMemoryDb()));
    await expect(store.add({ userId: 1, content: " " })).rejects.toThrow("memory content must not be empty");
  });
});
