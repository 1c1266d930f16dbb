import { createAction } from "../brain/actions.js";
import { eventPayload } from "../brain/decider.js";
import { ENDING_ACTIONS } from "../brain/prompts.js";
import type { EndingConfig } from "../config/types.js";
import type { Logger } from "../logging/logger.js";
import type { PlaybackSink } from "../output/playback.js";
import type { SceneController } from "../output/scene.js";
import type { ContextSnapshot, EndingPhase } from "../perception/types.js";
import { sleep as defaultSleep, type Sleep } from "../utils/sleep.js";
import type { MemoryWriter, SnapshotSource, Speaker } from "./loop.js";
import { phaseRank, type BroadcastState } from "./state.js";

type ActivePhase = Exclude<EndingPhase, "none">;

/** Lead time between the announcement and the final goodbye. */
export const ANNOUNCE_LEAD_MINUTES = 5;

export interface EndingSequenceDeps {
  readonly assembler: SnapshotSource;
  readonly speech: Speaker;
  readonly memory: MemoryWriter;
  readonly playback: PlaybackSink;
  readonly scene: SceneController;
  readonly state: BroadcastState;
  readonly config: EndingConfig;
  readonly logger: Logger;
  readonly sleep?: Sleep;
  readonly onPhase?: (phase: ActivePhase) => void;
}

/**
 * Three-step sign-off: wind down, announce, say goodbye. Each step speaks
 * once; a failed step is logged and the timeline moves on regardless.
 * A sequence runs at most once.
 */
export class EndingSequence {
  private current: EndingPhase = "none";
  private started = false;
  private finished = false;
  private terminated = false;
  private readonly sleep: Sleep;

  constructor(private readonly deps: EndingSequenceDeps) {
    this.sleep = deps.sleep ?? defaultSleep;
  }

  get phase(): EndingPhase {
    return this.current;
  }

  get isRunning(): boolean {
    return this.started && !this.finished;
  }

  get isTerminated(): boolean {
    return this.terminated;
  }

  /** Resolves true after the goodbye hold, false when aborted first. */
  async run(signal?: AbortSignal): Promise<boolean> {
    if (this.started) throw new Error("Ending sequence already started");
    this.started = true;

    try {
      const { windDownMinutes, finalGoodbyeSeconds } = this.deps.config;
      if (signal?.aborted) return false;

      await this.enter("wind_down", signal);
      const untilAnnounce = Math.max(0, windDownMinutes - ANNOUNCE_LEAD_MINUTES) * 60_000;
      if (!(await this.sleep(untilAnnounce, signal))) return this.aborted();

      await this.enter("ending_announce", signal);
      if (!(await this.sleep(ANNOUNCE_LEAD_MINUTES * 60_000, signal))) return this.aborted();

      await this.enter("final_goodbye", signal);
      await this.showEndingScene();
      if (!(await this.sleep(finalGoodbyeSeconds * 1000, signal))) return this.aborted();

      this.terminated = true;
      this.deps.logger.info("Ending sequence complete");
      return true;
    } finally {
      this.finished = true;
    }
  }

  private aborted(): boolean {
    this.deps.logger.info({ phase: this.current }, "Ending sequence aborted");
    return false;
  }

  private async enter(phase: ActivePhase, signal?: AbortSignal): Promise<void> {
    if (phaseRank(phase) <= phaseRank(this.current)) return;
    this.current = phase;
    this.deps.state.advanceEnding(phase);
    this.deps.logger.info({ phase }, "Ending phase entered");
    this.deps.onPhase?.(phase);
    await this.trigger(phase, signal);
  }

  private async trigger(phase: ActivePhase, signal?: AbortSignal): Promise<void> {
    const { assembler, speech, memory, playback, logger } = this.deps;

    let snapshot: ContextSnapshot;
    try {
      snapshot = await assembler.assemble();
    } catch (err) {
      logger.error({ err, phase }, "Ending context failed");
      return;
    }
    const stamped: ContextSnapshot = { ...snapshot, endingPhase: phase };

    try {
      const action = createAction(ENDING_ACTIONS[phase]);
      const text = await speech.generate(action, stamped, memory, signal);
      if (text && !signal?.aborted) {
        await playback.speak(text, signal);
        memory.recordUtterance(text, stamped);
        logger.info({ phase, preview: text.slice(0, 80) }, "Ending speech delivered");
      }
    } catch (err) {
      logger.error({ err, phase }, "Ending speech failed");
    }

    for (const chat of stamped.recentChat) {
      memory.recordChat(chat.username, chat.message);
    }
    for (const event of stamped.pendingEvents) {
      memory.recordEvent(event.type, eventPayload(event));
    }
  }

  private async showEndingScene(): Promise<void> {
    try {
      const switched = await this.deps.scene.switchToEndingScene();
      if (!switched) this.deps.logger.warn("Ending scene switch did not happen");
    } catch (err) {
      this.deps.logger.warn({ err }, "Ending scene switch failed");
    }
  }
}
