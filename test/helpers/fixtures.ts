import { vi } from "vitest";
import type { GenerationBackend, GenerationRequest, GenerationResult, StreamEvent } from "../../src/brain/llm-client.js";
import type { OnAirConfig } from "../../src/config/types.js";
import type { Logger } from "../../src/logging/logger.js";
import type { ChatEntry, ContextSnapshot } from "../../src/perception/types.js";

export function makeLogger(): Logger {
  return {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
    trace: vi.fn(),
    fatal: vi.fn(),
    child: vi.fn().mockReturnThis(),
    level: "info",
  } as unknown as Logger;
}

export function makeChat(username: string, message: string): ChatEntry {
  return { username, message, timestamp: "2026-03-02T10:00:00.000Z", platform: "test" };
}

export function makeSnapshot(overrides: Partial<ContextSnapshot> = {}): ContextSnapshot {
  return {
    viewerCount: 10,
    viewerChange: "stable",
    recentChat: [],
    pendingEvents: [],
    elapsedMs: null,
    elapsedLabel: "",
    mode: "talk",
    gameName: "",
    endingPhase: "none",
    ...overrides,
  };
}

export function makeOnAirConfig(overrides: Partial<OnAirConfig> = {}): OnAirConfig {
  return {
    logging: { level: "info" },
    llm: {
      baseUrl: "http://ollama.test",
      model: "llama3",
      temperature: 0.8,
      maxTokens: 300,
      timeoutMs: 60_000,
    },
    persona: {
      name: "Mika",
      personality: "cheerful",
      speakingStyle: "casual",
      interests: [],
      catchphrase: "",
      mood: "bright",
      boundaries: [],
    },
    broadcast: {
      mode: "talk",
      minPauseSeconds: 1,
      maxPauseSeconds: 5,
      memoryWindowSize: 50,
      chatWindow: 10,
      recoveryDelaySeconds: 5,
      streaming: false,
    },
    memory: { persist: false },
    game: {
      enabled: false,
      reactionKeywords: ["kill", "win"],
      minPauseSeconds: 3,
      maxPauseSeconds: 10,
      games: [],
    },
    schedule: {
      enabled: false,
      startTimes: [],
      durationMinutes: { min: 360, max: 420 },
      ending: { windDownMinutes: 15, finalGoodbyeSeconds: 30 },
    },
    control: { enabled: false, port: 19890, hostname: "127.0.0.1" },
    ...overrides,
  };
}

/** Scripted backend: returns queued results in order, then repeats the last one. */
export class FakeBackend implements GenerationBackend {
  readonly requests: GenerationRequest[] = [];
  private readonly results: GenerationResult[];
  chunks: string[] = [];
  streamError: string | null = null;

  constructor(...results: GenerationResult[]) {
    this.results = results.length > 0 ? results : [{ ok: true, text: "Hello chat!" }];
  }

  async complete(request: GenerationRequest): Promise<GenerationResult> {
    this.requests.push(request);
    const next = this.results.length > 1 ? this.results.shift() : this.results[0];
    return next ?? { ok: false, reason: "no result" };
  }

  async *stream(request: GenerationRequest): AsyncGenerator<StreamEvent> {
    this.requests.push(request);
    for (const text of this.chunks) {
      yield { type: "chunk", text };
    }
    if (this.streamError !== null) {
      yield { type: "error", reason: this.streamError };
    }
  }
}

/** Sleep stand-in that records every delay and returns immediately. */
export function recordingSleep(): { delays: number[]; sleep: (ms: number, signal?: AbortSignal) => Promise<boolean> } {
  const delays: number[] = [];
  return {
    delays,
    sleep: async (ms, signal) => {
      delays.push(ms);
      await Promise.resolve();
      return !signal?.aborted;
    },
  };
}
