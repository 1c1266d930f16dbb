import { mkdtempSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { ConversationMemory, summarizeSnapshot } from "../../src/memory/conversation.js";
import { MemoryStore } from "../../src/memory/store.js";
import { makeChat, makeLogger, makeSnapshot } from "../helpers/fixtures.js";

const fixedNow = () => new Date("2026-03-02T10:00:00.000Z");

describe("ConversationMemory", () => {
  it("keeps only the newest entries, oldest first", () => {
    const memory = new ConversationMemory({ windowSize: 3, logger: makeLogger() });
    for (let i = 0; i < 5; i++) memory.recordChat("viewer", `m${i}`);
    expect(memory.recent().map((e) => e.content)).toEqual(["m2", "m3", "m4"]);
    expect(memory.size).toBe(3);
  });

  it("mixes utterances and chat in one window", () => {
    const memory = new ConversationMemory({ windowSize: 2, logger: makeLogger(), now: fixedNow });
    memory.recordChat("carol", "hello");
    memory.recordUtterance("Hi carol!", makeSnapshot({ viewerCount: 3, recentChat: [makeChat("carol", "hello")] }));
    expect(memory.recent()).toEqual([
      { role: "user", content: "hello", timestamp: "2026-03-02T10:00:00.000Z", username: "carol" },
      {
        role: "assistant",
        content: "Hi carol!",
        timestamp: "2026-03-02T10:00:00.000Z",
        contextSummary: "viewers=3 chat=1",
      },
    ]);
  });

  it("returns the last n entries and nothing for n <= 0", () => {
    const memory = new ConversationMemory({ windowSize: 10, logger: makeLogger() });
    for (const m of ["a", "b", "c"]) memory.recordChat("v", m);
    expect(memory.recent(2).map((e) => e.content)).toEqual(["b", "c"]);
    expect(memory.recent(0)).toEqual([]);
    expect(memory.recent(-1)).toEqual([]);
  });

  it("renders prompt messages without metadata", () => {
    const memory = new ConversationMemory({ windowSize: 10, logger: makeLogger() });
    memory.recordChat("carol", "hello");
    memory.recordUtterance("Hi!", makeSnapshot());
    expect(memory.toPromptMessages()).toEqual([
      { role: "user", content: "hello" },
      { role: "assistant", content: "Hi!" },
    ]);
  });

  it("keeps important events outside the window", () => {
    const memory = new ConversationMemory({ windowSize: 1, logger: makeLogger(), now: fixedNow });
    memory.recordEvent("donation", { username: "alice", amount: 5 });
    memory.recordEvent("follow");
    memory.recordChat("v", "x");
    memory.recordChat("v", "y");
    expect(memory.importantEvents()).toEqual([
      { type: "donation", timestamp: "2026-03-02T10:00:00.000Z", data: { username: "alice", amount: 5 } },
      { type: "follow", timestamp: "2026-03-02T10:00:00.000Z", data: {} },
    ]);
    expect(memory.importantEvents(1).map((e) => e.type)).toEqual(["follow"]);
  });

  it("clears history and events", () => {
    const logger = makeLogger();
    const memory = new ConversationMemory({ windowSize: 5, logger });
    memory.recordChat("v", "x");
    memory.recordEvent("follow");
    memory.clear();
    expect(memory.recent()).toEqual([]);
    expect(memory.importantEvents()).toEqual([]);
    expect(logger.info).toHaveBeenCalledWith("Conversation memory cleared");
  });

  it("freezes stored entries", () => {
    const memory = new ConversationMemory({ windowSize: 5, logger: makeLogger() });
    memory.recordChat("v", "x");
    expect(Object.isFrozen(memory.recent()[0])).toBe(true);
  });

  it("rejects a non-positive window", () => {
    expect(() => new ConversationMemory({ windowSize: 0, logger: makeLogger() })).toThrow(
      "Invalid memory window size: 0",
    );
  });

  it("summarizes a snapshot", () => {
    expect(summarizeSnapshot(makeSnapshot({ viewerCount: 7 }))).toBe("viewers=7 chat=0");
  });

  describe("with a store", () => {
    let dir: string;
    let store: MemoryStore;

    beforeEach(() => {
      dir = mkdtempSync(join(tmpdir(), "onair-memory-"));
      store = new MemoryStore(dir, 3);
    });

    afterEach(() => {
      store.close();
      rmSync(dir, { recursive: true, force: true });
    });

    it("restores the window and events from a previous run", () => {
      const first = new ConversationMemory({ windowSize: 3, logger: makeLogger(), store });
      for (let i = 0; i < 5; i++) first.recordChat("viewer", `m${i}`);
      first.recordEvent("donation", { amount: 5 });

      const second = new ConversationMemory({ windowSize: 3, logger: makeLogger(), store });
      expect(second.recent().map((e) => e.content)).toEqual(["m2", "m3", "m4"]);
      expect(second.importantEvents().map((e) => e.data)).toEqual([{ amount: 5 }]);
    });

    it("keeps working in memory when the store fails", () => {
      const logger = makeLogger();
      const memory = new ConversationMemory({ windowSize: 3, logger, store });
      store.close();
      memory.recordChat("v", "still here");
      expect(memory.recent().map((e) => e.content)).toEqual(["still here"]);
      expect(logger.warn).toHaveBeenCalledWith(
        expect.objectContaining({ err: expect.any(Error) }),
        "Failed to persist conversation memory",
      );
    });
  });
});
