import { ActionDecider, type Random } from "../brain/decider.js";
import type { GenerationBackend } from "../brain/llm-client.js";
import { SpeechGenerator } from "../brain/speech.js";
import { EndingSequence } from "../broadcast/ending.js";
import { BroadcastLoop, type LoopStatus } from "../broadcast/loop.js";
import { BroadcastScheduler, type ScheduledEnding } from "../broadcast/scheduler.js";
import { BroadcastState } from "../broadcast/state.js";
import type { BroadcastMode, OnAirConfig } from "../config/types.js";
import { GameLibrary } from "../game/library.js";
import { GamePerception } from "../game/perception.js";
import type { Logger } from "../logging/logger.js";
import { ConversationMemory } from "../memory/conversation.js";
import type { MemoryStore } from "../memory/store.js";
import { LogPlayback, type PlaybackSink } from "../output/playback.js";
import { NullSceneController, type SceneController } from "../output/scene.js";
import { ChatBuffer, type IncomingChat } from "../perception/chat-buffer.js";
import { ContextAssembler } from "../perception/context-assembler.js";
import { EventQueue, type IncomingEvent } from "../perception/event-queue.js";
import type { ChatEntry, EndingPhase } from "../perception/types.js";
import { ViewerTracker } from "../perception/viewer-tracker.js";
import { Persona, type PersonaProvider } from "../persona/persona.js";
import type { Sleep } from "../utils/sleep.js";

export interface BroadcasterDeps {
  readonly config: OnAirConfig;
  readonly logger: Logger;
  readonly backend: GenerationBackend;
  readonly persona?: PersonaProvider;
  readonly playback?: PlaybackSink;
  readonly scene?: SceneController;
  readonly memoryStore?: MemoryStore;
  readonly sleep?: Sleep;
  readonly random?: Random;
}

export interface BroadcastStatus {
  readonly loop: LoopStatus;
  readonly mode: BroadcastMode;
  readonly game: string;
  readonly endingPhase: EndingPhase;
  readonly endingRunning: boolean;
  readonly startedAt: string | null;
  readonly viewers: number;
  readonly memorySize: number;
  readonly cycles: number;
  readonly lastUtterance: string;
  readonly nextScheduled: string | null;
}

export type ControlResult =
  | { readonly ok: true }
  | { readonly ok: false; readonly reason: string };

/**
 * Owns one broadcaster: perception buffers, brain, memory, the loop, the
 * ending sequence and the weekly scheduler, all wired to a single state
 * handle.
 */
export class Broadcaster {
  readonly state: BroadcastState;
  readonly chat: ChatBuffer;
  readonly events: EventQueue;
  readonly viewers: ViewerTracker;
  readonly memory: ConversationMemory;
  readonly games: GameLibrary;
  readonly gamePerception: GamePerception | null;
  readonly loop: BroadcastLoop;
  readonly scheduler: BroadcastScheduler;

  private readonly assembler: ContextAssembler;
  private readonly speech: SpeechGenerator;
  private readonly playback: PlaybackSink;
  private readonly scene: SceneController;
  private ending: EndingSequence | null = null;
  private endingController: AbortController | null = null;
  private endingRun: Promise<void> | null = null;

  constructor(private readonly deps: BroadcasterDeps) {
    const { config, logger } = deps;

    this.games = new GameLibrary(config.game.games, logger, config.game.defaultGame);
    this.gamePerception = config.game.enabled ? new GamePerception({ config: config.game, logger }) : null;
    this.state = new BroadcastState({ mode: "talk" });

    this.chat = new ChatBuffer();
    this.events = new EventQueue(logger);
    this.viewers = new ViewerTracker(logger);
    this.memory = new ConversationMemory({
      windowSize: config.broadcast.memoryWindowSize,
      logger,
      store: deps.memoryStore,
    });

    this.assembler = new ContextAssembler({
      chat: this.chat,
      events: this.events,
      viewers: this.viewers,
      state: this.state,
      logger,
      game: this.gamePerception ?? undefined,
      chatWindow: config.broadcast.chatWindow,
    });
    this.speech = new SpeechGenerator({
      persona: deps.persona ?? new Persona(config.persona, logger),
      backend: deps.backend,
      logger,
      sampling: { temperature: config.llm.temperature, maxTokens: config.llm.maxTokens },
    });
    this.playback = deps.playback ?? new LogPlayback(logger);
    this.scene = deps.scene ?? new NullSceneController(logger);

    this.loop = new BroadcastLoop({
      assembler: this.assembler,
      decider: new ActionDecider(deps.random),
      speech: this.speech,
      memory: this.memory,
      playback: this.playback,
      events: this.events,
      state: this.state,
      config: config.broadcast,
      logger,
      sleep: deps.sleep,
      random: deps.random,
    });
    this.scheduler = new BroadcastScheduler({
      config: config.schedule,
      loop: this.loop,
      createEnding: () => this.scheduledEnding(),
      logger,
      sleep: deps.sleep,
      random: deps.random,
    });

    if (config.broadcast.mode === "game") {
      const result = this.setMode("game");
      if (!result.ok) logger.warn({ reason: result.reason }, "Starting in talk mode instead of game mode");
    }
  }

  status(): BroadcastStatus {
    return {
      loop: this.loop.status,
      mode: this.state.mode,
      game: this.state.gameName,
      endingPhase: this.state.endingPhase,
      endingRunning: this.ending?.isRunning ?? false,
      startedAt: this.state.startedAt?.toISOString() ?? null,
      viewers: this.viewers.currentCount,
      memorySize: this.memory.size,
      cycles: this.loop.cycles,
      lastUtterance: this.loop.lastUtterance,
      nextScheduled: this.scheduler.nextBroadcastTime()?.toISOString() ?? null,
    };
  }

  pushChat(chat: IncomingChat): ChatEntry {
    return this.chat.push(chat);
  }

  pushEvent(event: IncomingEvent): void {
    this.events.add(event);
  }

  pushGameEvent(type: string, data?: Readonly<Record<string, unknown>>): ControlResult {
    if (!this.gamePerception) return { ok: false, reason: "Game mode is disabled" };
    this.gamePerception.addGameEvent(type, data);
    return { ok: true };
  }

  recordViewers(count: number): void {
    this.viewers.record(count);
  }

  /**
   * Switches between talk and game mode. With games configured the name
   * must match one of them (or the default); with none configured any
   * name is taken as given.
   */
  setMode(mode: BroadcastMode, gameName?: string): ControlResult {
    if (mode === "talk") {
      this.games.clear();
      this.state.setMode("talk");
      this.deps.logger.info("Switched to talk mode");
      return { ok: true };
    }

    if (!this.gamePerception) return { ok: false, reason: "Game mode is disabled" };

    let name = gameName ?? "";
    if (this.games.list().length > 0) {
      const game = this.games.select(gameName);
      if (!game) return { ok: false, reason: `Unknown game: ${gameName ?? "(default)"}` };
      name = game.name;
    }
    this.state.setMode("game", name);
    this.deps.logger.info({ game: name }, "Switched to game mode");
    return { ok: true };
  }

  createEnding(): EndingSequence {
    const sequence = new EndingSequence({
      assembler: this.assembler,
      speech: this.speech,
      memory: this.memory,
      playback: this.playback,
      scene: this.scene,
      state: this.state,
      config: this.deps.config.schedule.ending,
      logger: this.deps.logger,
      sleep: this.deps.sleep,
    });
    this.ending = sequence;
    return sequence;
  }

  /** A scheduled ending that finds a manual one under way waits for it instead of starting another. */
  private scheduledEnding(): ScheduledEnding {
    const manual = this.endingRun;
    if (!manual) return this.createEnding();

    this.deps.logger.info("Ending sequence already running; scheduled ending waits for it");
    return {
      run: async () => {
        await manual;
        return this.state.endingPhase === "final_goodbye";
      },
    };
  }

  /** Runs the ending in the background and stops the loop once it completes. */
  startEnding(): ControlResult {
    if (this.loop.status !== "running") return { ok: false, reason: "Broadcast is not running" };
    if (this.ending?.isRunning) return { ok: false, reason: "Ending sequence already running" };

    const controller = new AbortController();
    this.endingController = controller;
    const sequence = this.createEnding();
    this.endingRun = sequence
      .run(controller.signal)
      .then(async (completed) => {
        if (completed) await this.loop.stop();
      })
      .catch((err) => {
        this.deps.logger.error({ err }, "Ending sequence failed");
      })
      .finally(() => {
        this.endingController = null;
        this.endingRun = null;
      });
    return { ok: true };
  }

  async shutdown(): Promise<void> {
    this.endingController?.abort();
    await this.scheduler.stop();
    if (this.endingRun) await this.endingRun;
    await this.loop.stop();
  }
}
