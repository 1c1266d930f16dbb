import { describe, it, expect, vi } from "vitest";
import type { PlaybackSink } from "../../src/output/playback.js";
import { Broadcaster } from "../../src/runtime/broadcaster.js";
import type { Sleep } from "../../src/utils/sleep.js";
import { FakeBackend, makeLogger, makeOnAirConfig } from "../helpers/fixtures.js";

// Ending delays pass instantly; loop pauses hold until the loop is stopped.
const sleep: Sleep = (ms, signal) =>
  new Promise((resolve) => {
    if (signal?.aborted) return resolve(false);
    if (ms >= 30_000) return resolve(true);
    signal?.addEventListener("abort", () => resolve(false), { once: true });
  });

/** Like `sleep`, but the listed delays hold until released or aborted. */
function heldSleep(held: readonly number[]): { sleep: Sleep; release: (ms: number) => void } {
  const releases = new Map<number, () => void>();
  return {
    sleep: (ms, signal) =>
      new Promise((resolve) => {
        if (signal?.aborted) return resolve(false);
        signal?.addEventListener("abort", () => resolve(false), { once: true });
        if (held.includes(ms)) {
          releases.set(ms, () => resolve(true));
          return;
        }
        if (ms >= 30_000) resolve(true);
      }),
    release: (ms) => releases.get(ms)?.(),
  };
}

// runSession(100) with a 15-minute wind-down waits 85 minutes for its ending.
const SCHEDULED_WAIT = 85 * 60_000;
const ANNOUNCE_WAIT = 5 * 60_000;

function recordingPlayback(): PlaybackSink & { spoken: string[] } {
  const spoken: string[] = [];
  return {
    spoken,
    speak: async (text) => {
      spoken.push(text);
    },
    speakStream: async () => "",
    stop: async () => {},
  };
}

describe("Broadcaster", () => {
  it("greets at start, then signs off through the ending sequence", async () => {
    const playback = recordingPlayback();
    const broadcaster = new Broadcaster({
      config: makeOnAirConfig(),
      logger: makeLogger(),
      backend: new FakeBackend({ ok: true, text: "Hello chat!" }),
      playback,
      sleep,
      random: () => 0.5,
    });

    const running = broadcaster.loop.start();
    await vi.waitFor(() => expect(broadcaster.loop.cycles).toBe(1));
    expect(broadcaster.status().lastUtterance).toBe("Hello chat!");
    expect(broadcaster.memory.importantEvents().map((e) => e.type)).toEqual(["stream_start"]);

    expect(broadcaster.startEnding()).toEqual({ ok: true });
    expect(broadcaster.startEnding()).toEqual({ ok: false, reason: "Ending sequence already running" });

    await running;
    await vi.waitFor(() => expect(broadcaster.status().endingRunning).toBe(false));

    expect(broadcaster.status().loop).toBe("idle");
    expect(broadcaster.state.endingPhase).toBe("final_goodbye");
    expect(playback.spoken).toHaveLength(4);
    expect(broadcaster.memory.recent().map((e) => e.role)).toEqual([
      "assistant",
      "assistant",
      "assistant",
      "assistant",
    ]);
    await broadcaster.shutdown();
  });

  describe("ending a scheduled broadcast by hand", () => {
    it("signs off once and ends the scheduled session", async () => {
      const playback = recordingPlayback();
      const { sleep: held, release } = heldSleep([SCHEDULED_WAIT]);
      const broadcaster = new Broadcaster({
        config: makeOnAirConfig(),
        logger: makeLogger(),
        backend: new FakeBackend({ ok: true, text: "Hello chat!" }),
        playback,
        sleep: held,
        random: () => 0.5,
      });

      const session = broadcaster.scheduler.runSession(100);
      await vi.waitFor(() => expect(broadcaster.loop.cycles).toBe(1));
      expect(broadcaster.startEnding()).toEqual({ ok: true });

      await expect(session).resolves.toBe(false);
      await vi.waitFor(() => expect(broadcaster.status().endingRunning).toBe(false));
      release(SCHEDULED_WAIT);
      await new Promise((resolve) => setTimeout(resolve, 0));

      expect(broadcaster.status().loop).toBe("idle");
      expect(broadcaster.scheduler.isSessionRunning).toBe(false);
      expect(playback.spoken).toHaveLength(4);
      expect(broadcaster.memory.recent()).toHaveLength(4);
      await broadcaster.shutdown();
    });

    it("lets the scheduled ending wait for a manual one already under way", async () => {
      const playback = recordingPlayback();
      const logger = makeLogger();
      const { sleep: held, release } = heldSleep([SCHEDULED_WAIT, ANNOUNCE_WAIT]);
      const broadcaster = new Broadcaster({
        config: makeOnAirConfig(),
        logger,
        backend: new FakeBackend({ ok: true, text: "Hello chat!" }),
        playback,
        sleep: held,
        random: () => 0.5,
      });

      const session = broadcaster.scheduler.runSession(100);
      await vi.waitFor(() => expect(broadcaster.loop.cycles).toBe(1));
      expect(broadcaster.startEnding()).toEqual({ ok: true });
      await vi.waitFor(() => expect(broadcaster.state.endingPhase).toBe("ending_announce"));
      await vi.waitFor(() => expect(playback.spoken).toHaveLength(3));

      release(SCHEDULED_WAIT);
      await vi.waitFor(() =>
        expect(logger.info).toHaveBeenCalledWith("Ending sequence already running; scheduled ending waits for it"),
      );
      release(ANNOUNCE_WAIT);

      await expect(session).resolves.toBe(true);
      expect(broadcaster.state.endingPhase).toBe("final_goodbye");
      expect(broadcaster.status().loop).toBe("idle");
      expect(playback.spoken).toHaveLength(4);
      await broadcaster.shutdown();
    });
  });

  it("replies to pushed chat on the next cycle", async () => {
    const backend = new FakeBackend({ ok: true, text: "Hi carol!" });
    const broadcaster = new Broadcaster({
      config: makeOnAirConfig(),
      logger: makeLogger(),
      backend,
      playback: recordingPlayback(),
      sleep,
    });
    broadcaster.pushChat({ username: "carol", message: "hello" });

    const result = await broadcaster.loop.runCycle();
    expect(result.action.kind).toBe("chat_reply");
    expect(result.spoken).toBe("Hi carol!");
    expect(backend.requests[0].messages.at(-1)?.content).toContain('[Message] hello');
  });

  describe("mode switching", () => {
    const gameConfig = (games: { name: string }[], defaultGame?: string) => {
      const base = makeOnAirConfig();
      return makeOnAirConfig({
        game: { ...base.game, enabled: true, games, ...(defaultGame ? { defaultGame } : {}) },
      });
    };

    it("starts in game mode with the default game", () => {
      const base = gameConfig([{ name: "Minecraft" }], "Minecraft");
      const broadcaster = new Broadcaster({
        config: { ...base, broadcast: { ...base.broadcast, mode: "game" } },
        logger: makeLogger(),
        backend: new FakeBackend(),
      });
      expect(broadcaster.state.mode).toBe("game");
      expect(broadcaster.state.gameName).toBe("Minecraft");
    });

    it("accepts any game name when no library is configured", () => {
      const broadcaster = new Broadcaster({ config: gameConfig([]), logger: makeLogger(), backend: new FakeBackend() });
      expect(broadcaster.setMode("game", "Tetris")).toEqual({ ok: true });
      expect(broadcaster.status().game).toBe("Tetris");
    });

    it("refuses a game missing from the library", () => {
      const broadcaster = new Broadcaster({
        config: gameConfig([{ name: "Minecraft" }]),
        logger: makeLogger(),
        backend: new FakeBackend(),
      });
      expect(broadcaster.setMode("game", "Doom")).toEqual({ ok: false, reason: "Unknown game: Doom" });
      expect(broadcaster.state.mode).toBe("talk");
    });

    it("routes game events into the next snapshot", async () => {
      const broadcaster = new Broadcaster({
        config: gameConfig([]),
        logger: makeLogger(),
        backend: new FakeBackend({ ok: true, text: "Ouch!" }),
        playback: recordingPlayback(),
        sleep,
      });
      broadcaster.setMode("game", "Tetris");
      expect(broadcaster.pushGameEvent("death", { cause: "lava" })).toEqual({ ok: true });

      const result = await broadcaster.loop.runCycle();
      expect(result.action.kind).toBe("game_reaction");
      expect(result.action.metadata).toEqual({ event: "game_death", cause: "lava" });
    });

    it("returns to talk mode", () => {
      const broadcaster = new Broadcaster({ config: gameConfig([]), logger: makeLogger(), backend: new FakeBackend() });
      broadcaster.setMode("game", "Tetris");
      expect(broadcaster.setMode("talk")).toEqual({ ok: true });
      expect(broadcaster.state.mode).toBe("talk");
      expect(broadcaster.state.gameName).toBe("");
    });
  });
});
