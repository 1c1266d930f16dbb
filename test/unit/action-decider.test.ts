import { describe, it, expect } from "vitest";
import { ACTION_KINDS } from "../../src/brain/actions.js";
import {
  ActionDecider,
  ambientWeights,
  decide,
  eventPayload,
  GAME_CHAT_KEYWORD,
  TALK_WEIGHTS,
  weightedChoice,
} from "../../src/brain/decider.js";
import type { GameContext, GameEvent } from "../../src/perception/types.js";
import { makeChat, makeSnapshot } from "../helpers/fixtures.js";

function gameContext(events: GameEvent[]): GameContext {
  return {
    gameName: "Minecraft",
    state: { timestamp: "2026-03-02T10:00:00.000Z", status: "running", details: {} },
    events,
    minPauseSeconds: 3,
    maxPauseSeconds: 10,
  };
}

describe("decide", () => {
  it("reacts to a donation before replying to chat", () => {
    const action = decide(
      makeSnapshot({
        viewerCount: 50,
        pendingEvents: [{ type: "donation", username: "alice", amount: 5000, metadata: {} }],
        recentChat: [makeChat("bob", "hi")],
      }),
    );
    expect(action.kind).toBe("donation_react");
    expect(action.priority).toBe(10);
    expect(action.metadata["amount"]).toBe(5000);
    expect(action.metadata["username"]).toBe("alice");
  });

  it("maps subscriptions and follows to subscribe_react with the user", () => {
    for (const type of ["subscription", "follow"]) {
      const action = decide(
        makeSnapshot({
          pendingEvents: [{ type, username: "dave", metadata: {} }],
          recentChat: [makeChat("bob", "hi")],
        }),
      );
      expect(action.kind).toBe("subscribe_react");
      expect(action.targetUser).toBe("dave");
      expect(action.priority).toBe(9);
    }
  });

  it("greets on stream_start", () => {
    const action = decide(makeSnapshot({ pendingEvents: [{ type: "stream_start", metadata: {} }] }));
    expect(action.kind).toBe("greeting");
  });

  it("uses the first recognized event and skips unknown ones", () => {
    const action = decide(
      makeSnapshot({
        pendingEvents: [
          { type: "raid", metadata: {} },
          { type: "follow", username: "erin", metadata: {} },
          { type: "donation", username: "alice", amount: 5, metadata: {} },
        ],
      }),
    );
    expect(action.kind).toBe("subscribe_react");
    expect(action.targetUser).toBe("erin");
  });

  it("falls through to chat when only unknown events are pending", () => {
    const action = decide(
      makeSnapshot({
        pendingEvents: [{ type: "raid", metadata: {} }],
        recentChat: [makeChat("carol", "hello")],
      }),
    );
    expect(action.kind).toBe("chat_reply");
  });

  it("replies to the latest chat line", () => {
    const action = decide(
      makeSnapshot({
        viewerCount: 3,
        recentChat: [makeChat("zoe", "first"), makeChat("carol", "hello")],
      }),
    );
    expect(action.kind).toBe("chat_reply");
    expect(action.targetUser).toBe("carol");
    expect(action.triggerMessage).toBe("hello");
    expect(action.priority).toBe(5);
  });

  it("always returns a known kind, even for an empty snapshot", () => {
    for (const r of [0, 0.25, 0.5, 0.75, 0.999]) {
      const action = decide(makeSnapshot({ viewerCount: 0 }), () => r);
      expect(ACTION_KINDS).toContain(action.kind);
      expect(action.priority).toBe(1);
    }
  });

  it("returns frozen actions", () => {
    const action = decide(makeSnapshot(), () => 0);
    expect(Object.isFrozen(action)).toBe(true);
    expect(Object.isFrozen(action.metadata)).toBe(true);
  });

  it("draws free_talk and silence from an empty room in proportion to their weights", () => {
    const counts = new Map<string, number>();
    const snapshot = makeSnapshot({ viewerCount: 0 });
    for (let i = 0; i < 1000; i++) {
      const kind = decide(snapshot, () => (i + 0.5) / 1000).kind;
      counts.set(kind, (counts.get(kind) ?? 0) + 1);
    }
    // 0.60 / 1.30 and 0.20 / 1.30 after implicit normalization
    expect(counts.get("free_talk")).toBe(462);
    expect(counts.get("silence")).toBe(154);
    expect([...counts.keys()].sort()).toEqual(
      ["announcement", "ask_viewers", "free_talk", "reaction", "silence", "topic_change"],
    );
  });

  describe("game mode", () => {
    it("replies to the latest keyword hit over plain chat", () => {
      const action = decide(
        makeSnapshot({
          mode: "game",
          gameName: "Minecraft",
          recentChat: [makeChat("ann", "nice kill"), makeChat("ben", "lol")],
          game: gameContext([
            {
              type: GAME_CHAT_KEYWORD,
              timestamp: "t",
              username: "ann",
              message: "nice kill",
              keyword: "kill",
              data: {},
            },
          ]),
        }),
      );
      expect(action.kind).toBe("game_chat_reply");
      expect(action.targetUser).toBe("ann");
      expect(action.triggerMessage).toBe("nice kill");
      expect(action.metadata).toEqual({ keyword: "kill" });
    });

    it("replies to plain chat as game_chat_reply", () => {
      const action = decide(
        makeSnapshot({ mode: "game", recentChat: [makeChat("ben", "lol")], game: gameContext([]) }),
      );
      expect(action.kind).toBe("game_chat_reply");
      expect(action.targetUser).toBe("ben");
    });

    it("reacts to the latest game event when chat is quiet", () => {
      const action = decide(
        makeSnapshot({
          mode: "game",
          game: gameContext([
            { type: "game_boss", timestamp: "t", data: {} },
            { type: "game_death", timestamp: "t", data: { cause: "lava" } },
          ]),
        }),
      );
      expect(action.kind).toBe("game_reaction");
      expect(action.metadata).toEqual({ event: "game_death", cause: "lava" });
    });

    it("draws from the game table otherwise", () => {
      expect(decide(makeSnapshot({ mode: "game" }), () => 0).kind).toBe("game_commentary");
    });
  });
});

describe("weightedChoice", () => {
  it("walks the cumulative weights", () => {
    const entries = [["a", 1], ["b", 3]] as const;
    expect(weightedChoice(entries, () => 0.2)).toBe("a");
    expect(weightedChoice(entries, () => 0.3)).toBe("b");
    expect(weightedChoice(entries, () => 0.9999)).toBe("b");
  });

  it("throws on an empty table", () => {
    expect(() => weightedChoice([], () => 0)).toThrow("weightedChoice needs at least one entry");
  });
});

describe("ambientWeights", () => {
  it("keeps the talk table when viewers are present", () => {
    expect(ambientWeights(makeSnapshot({ viewerCount: 4 }))).toBe(TALK_WEIGHTS);
  });

  it("overrides only free_talk and silence for an empty room", () => {
    expect(ambientWeights(makeSnapshot({ viewerCount: 0 }))).toEqual([
      ["free_talk", 0.6],
      ["topic_change", 0.15],
      ["reaction", 0.1],
      ["ask_viewers", 0.2],
      ["announcement", 0.05],
      ["silence", 0.2],
    ]);
  });
});

describe("eventPayload", () => {
  it("omits absent fields and appends metadata", () => {
    expect(eventPayload({ type: "subscription", username: "dave", metadata: { months: 3 } })).toEqual({
      type: "subscription",
      username: "dave",
      months: 3,
    });
  });

  it("keeps the event's own fields over clashing metadata keys", () => {
    const event = {
      type: "donation",
      username: "alice",
      amount: 5,
      metadata: { type: "follow", amount: 99999, username: "mallory", note: "hi" },
    };
    expect(eventPayload(event)).toEqual({ type: "donation", username: "alice", amount: 5, note: "hi" });
    expect(decide(makeSnapshot({ pendingEvents: [event] })).metadata).toEqual({
      type: "donation",
      username: "alice",
      amount: 5,
      note: "hi",
    });
  });
});

describe("ActionDecider", () => {
  it("uses the injected random source", () => {
    const decider = new ActionDecider(() => 0.99);
    expect(decider.decide(makeSnapshot()).kind).toBe("silence");
  });
});
