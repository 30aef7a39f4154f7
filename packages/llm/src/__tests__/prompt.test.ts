import { describe, expect, it } from "vitest";
import {
  buildMessages,
  buildUserTurn,
  frameDocument,
  isMemoryExtraction,
  MEMORY_TRIGGER,
  renderMemories,
  renderSources,
  toImageDataUri,
} from "../prompt";

describe("renderSources", () => {
  it("caps the number of snippets and their length", () => {
    const out = renderSources(
      [
        { source: "a.pdf", text: "abcdef" },
        { source: "b.pdf", text: "dropped" },
      ],
      { maxContexts: 1, contextChars: 3 },
    );
    expect(out).toBe("\n\n=== SOURCES ===\n[a.pdf] abc\n\n");
  });
});

describe("renderMemories", () => {
  it("dates each entry and falls back to a generic title", () => {
    const out = renderMemories(
      [
        { title: null, content: "likes tea", createdAt: new Date("2026-01-05T10:00:00Z") },
        { title: "Car", content: "drives a van", createdAt: new Date("2026-02-01T10:00:00Z") },
      ],
      2000,
    );
    expect(out).toBe("=== USER MEMORY ===\n[2026-01-05] Memory\nlikes tea\n\n[2026-02-01] Car\ndrives a van");
  });

  it("keeps the newest tail when over budget", () => {
    const out = renderMemories([{ title: "T", content: "0123456789", createdAt: new Date("2026-01-05T00:00:00Z") }], 2);
    expect(out).toBe("=== USER MEMORY ===\n...23456789");
  });
});

describe("toImageDataUri", () => {
  it("uses the MIME subtype and strips an existing prefix", () => {
    expect(toImageDataUri({ type: "image/png", data: "data:image/png;base64,AAAA" })).toBe("data:image/png;base64,AAAA");
    expect(toImageDataUri({ type: "image/webp", data: "QUJD" })).toBe("data:image/webp;base64,QUJD");
  });

  it("defaults to jpeg without a subtype", () => {
    expect(toImageDataUri({ type: "image", data: "QUJD" })).toBe("data:image/jpeg;base64,QUJD");
  });
});

describe("buildUserTurn", () => {
  it("is plain text without images", () => {
    expect(buildUserTurn({ message: "hi" })).toEqual({ role: "user", content: "hi" });
  });

  it("wraps document text around the question and appends images as parts", () => {
    const turn = buildUserTurn({
      message: "What is the limit?",
      documentText: frameDocument("policy.pdf", "Limit: 500"),
      images: [{ type: "image/png", data: "AAAA" }],
    });
    expect(turn).toEqual({
      role: "user",
      content: [
        {
          type: "text",
          text:
            "The user has attached a document with the following content:\n\n" +
            "\n\n=== Document: policy.pdf ===\nLimit: 500\n=== End of policy.pdf ===\n" +
            "\n\nUser's question: What is the limit?\n\n" +
            "Please answer the user's question based on the document content above.",
        },
        { type: "image_url", image_url: { url: "data:image/png;base64,AAAA" } },
      ],
    });
  });
});

describe("buildMessages", () => {
  it("orders persona, sources, memory, history and the current turn", () => {
    const msgs = buildMessages({
      persona: "PERSONA",
      contexts: [{ source: "s", text: "fact" }],
      memories: [{ title: "M", content: "note", createdAt: new Date("2026-03-01T00:00:00Z") }],
      history: [
        { role: "user", content: "one" },
        { role: "assistant", content: "two" },
        { role: "user", content: "three" },
      ],
      user: { role: "user", content: "now" },
      limits: { historyMessages: 2 },
    });
    expect(msgs).toEqual([
      { role: "system", content: "PERSONA" },
      { role: "system", content: "\n\n=== SOURCES ===\n[s] fact\n\n" },
      { role: "system", content: "=== USER MEMORY ===\n[2026-03-01] M\nnote" },
      { role: "assistant", content: "two" },
      { role: "user", content: "three" },
      { role: "user", content: "now" },
    ]);
  });

  it("drops empty blocks", () => {
    expect(buildMessages({ persona: "P", contexts: [], memories: [], user: { role: "user", content: "x" } })).toEqual([
      { role: "system", content: "P" },
      { role: "user", content: "x" },
    ]);
  });
});

it("detects the memory extraction prefix case-sensitively", () => {
  expect(isMemoryExtraction(`${MEMORY_TRIGGER} my preferences`)).toBe(true);
  expect(isMemoryExtraction(`\n  ${MEMORY_TRIGGER} my preferences`)).toBe(true);
  expect(isMemoryExtraction(MEMORY_TRIGGER.toLowerCase())).toBe(false);
});
