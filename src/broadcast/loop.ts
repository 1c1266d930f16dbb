import type { Action } from "../brain/actions.js";
import { eventPayload, type Random } from "../brain/decider.js";
import type { PromptHistory } from "../brain/speech.js";
import type { BroadcastConfig } from "../config/types.js";
import type { Logger } from "../logging/logger.js";
import type { ContextSnapshot } from "../perception/types.js";
import type { PlaybackSink } from "../output/playback.js";
import { ChunkChannel } from "../utils/channel.js";
import { sleep as defaultSleep, type Sleep } from "../utils/sleep.js";
import { computePause } from "./pacing.js";
import type { BroadcastState } from "./state.js";

export type LoopStatus = "idle" | "running";

export interface SnapshotSource {
  assemble(): Promise<ContextSnapshot>;
}

export interface Decider {
  decide(snapshot: ContextSnapshot): Action;
}

export interface Speaker {
  generate(action: Action, snapshot: ContextSnapshot, memory: PromptHistory, signal?: AbortSignal): Promise<string>;
  stream(action: Action, snapshot: ContextSnapshot, memory: PromptHistory, signal?: AbortSignal): AsyncIterable<string>;
}

export interface MemoryWriter extends PromptHistory {
  recordUtterance(text: string, snapshot: ContextSnapshot): void;
  recordChat(username: string, message: string): void;
  recordEvent(type: string, data?: Readonly<Record<string, unknown>>): void;
}

export interface StreamStartSignal {
  signalStreamStart(): void;
}

export interface BroadcastLoopDeps {
  readonly assembler: SnapshotSource;
  readonly decider: Decider;
  readonly speech: Speaker;
  readonly memory: MemoryWriter;
  readonly playback: PlaybackSink;
  readonly events: StreamStartSignal;
  readonly state: BroadcastState;
  readonly config: BroadcastConfig;
  readonly logger: Logger;
  readonly sleep?: Sleep;
  readonly random?: Random;
  readonly now?: () => Date;
}

export interface CycleResult {
  readonly action: Action;
  /** What was actually voiced and remembered; empty when nothing was. */
  readonly spoken: string;
  readonly pauseSeconds: number;
}

/**
 * Perceive, decide, speak, remember, pause; until stopped. A failing
 * cycle is logged and retried after the recovery delay. Only `stop()`
 * ends the loop.
 */
export class BroadcastLoop {
  private controller: AbortController | null = null;
  private running: Promise<void> | null = null;
  private lastSpoken = "";
  private cycleCount = 0;
  private readonly sleep: Sleep;
  private readonly random: Random;
  private readonly now: () => Date;

  constructor(private readonly deps: BroadcastLoopDeps) {
    this.sleep = deps.sleep ?? defaultSleep;
    this.random = deps.random ?? Math.random;
    this.now = deps.now ?? (() => new Date());
  }

  get status(): LoopStatus {
    return this.running ? "running" : "idle";
  }

  get lastUtterance(): string {
    return this.lastSpoken;
  }

  get cycles(): number {
    return this.cycleCount;
  }

  /** Starts broadcasting. The returned promise settles when the loop exits. */
  start(): Promise<void> {
    if (this.running) {
      this.deps.logger.warn("Broadcast already running");
      return this.running;
    }

    const controller = new AbortController();
    this.controller = controller;
    this.deps.state.beginSession(this.now());
    this.deps.events.signalStreamStart();
    this.deps.logger.info({ mode: this.deps.state.mode }, "Broadcast started");

    this.running = this.run(controller.signal).finally(() => {
      this.running = null;
      this.controller = null;
    });
    return this.running;
  }

  async stop(): Promise<void> {
    const running = this.running;
    if (!running) return;
    this.controller?.abort();
    await running;
    await this.deps.playback.stop();
    this.deps.logger.info({ cycles: this.cycleCount }, "Broadcast stopped");
  }

  async runCycle(signal?: AbortSignal): Promise<CycleResult> {
    const { assembler, decider, memory, config, logger } = this.deps;

    const snapshot = await assembler.assemble();
    const action = decider.decide(snapshot);
    logger.debug({ kind: action.kind, priority: action.priority }, "Action decided");

    const spoken = config.streaming
      ? await this.speakStreaming(action, snapshot, signal)
      : await this.speakWhole(action, snapshot, signal);

    for (const chat of snapshot.recentChat) {
      memory.recordChat(chat.username, chat.message);
    }
    for (const event of snapshot.pendingEvents) {
      memory.recordEvent(event.type, eventPayload(event));
    }

    this.cycleCount++;
    return { action, spoken, pauseSeconds: computePause(snapshot, config, this.random) };
  }

  private async run(signal: AbortSignal): Promise<void> {
    const recoveryMs = this.deps.config.recoveryDelaySeconds * 1000;
    while (!signal.aborted) {
      try {
        const { pauseSeconds } = await this.runCycle(signal);
        await this.sleep(pauseSeconds * 1000, signal);
      } catch (err) {
        if (signal.aborted) break;
        this.deps.logger.error({ err }, "Broadcast cycle failed");
        await this.sleep(recoveryMs, signal);
      }
    }
  }

  private async speakWhole(action: Action, snapshot: ContextSnapshot, signal?: AbortSignal): Promise<string> {
    const { speech, memory, playback, logger } = this.deps;

    const text = await speech.generate(action, snapshot, memory, signal);
    if (!text || signal?.aborted) return "";

    try {
      await playback.speak(text, signal);
    } catch (err) {
      logger.error({ err, kind: action.kind }, "Playback failed");
      return "";
    }
    return this.remember(text, snapshot);
  }

  private async speakStreaming(action: Action, snapshot: ContextSnapshot, signal?: AbortSignal): Promise<string> {
    const { speech, memory, playback, logger } = this.deps;
    const channel = new ChunkChannel<string>();

    const produce = async (): Promise<void> => {
      try {
        for await (const chunk of speech.stream(action, snapshot, memory, signal)) {
          if (!(await channel.send(chunk))) break;
        }
      } finally {
        channel.close();
      }
    };
    // A producer failure is captured here and rethrown once playback is done.
    const producer = produce().then(
      () => null,
      (err: unknown) => ({ err }),
    );

    let voiced: string;
    try {
      voiced = await playback.speakStream(channel, signal);
    } catch (err) {
      channel.cancel();
      await producer;
      logger.error({ err, kind: action.kind }, "Playback failed");
      return "";
    }
    channel.cancel();
    const failed = await producer;
    if (failed) throw failed.err;

    if (!voiced || signal?.aborted) return "";
    return this.remember(voiced, snapshot);
  }

  private remember(text: string, snapshot: ContextSnapshot): string {
    this.deps.memory.recordUtterance(text, snapshot);
    this.lastSpoken = text;
    this.deps.logger.info({ preview: text.slice(0, 80) }, "Utterance delivered");
    return text;
  }
}
