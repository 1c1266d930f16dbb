import type { GameConfig } from "../config/types.js";
import type { Logger } from "../logging/logger.js";
import { GAME_CHAT_KEYWORD } from "../brain/decider.js";
import type {
  ChatEntry,
  GameContext,
  GameEvent,
  GamePerceptionSource,
  GameState,
} from "../perception/types.js";

export interface GamePerceptionDeps {
  readonly config: GameConfig;
  readonly logger: Logger;
  readonly now?: () => Date;
}

/**
 * Game-side perception. Screen capture and process probing live outside
 * this process; what remains is keyword spotting in chat and a queue of
 * game events pushed in from outside.
 */
export class GamePerception implements GamePerceptionSource {
  private readonly pending: GameEvent[] = [];
  private readonly now: () => Date;

  constructor(private readonly deps: GamePerceptionDeps) {
    this.now = deps.now ?? (() => new Date());
  }

  /** Queues `game_<type>` for the next context. */
  addGameEvent(type: string, data: Readonly<Record<string, unknown>> = {}): void {
    this.pending.push(
      Object.freeze({
        type: `game_${type}`,
        timestamp: this.now().toISOString(),
        data: Object.freeze({ ...data }),
      }),
    );
    this.deps.logger.debug({ type }, "Game event queued");
  }

  /** At most one event per chat line: the first configured keyword it contains. */
  detectChatKeywords(chat: readonly ChatEntry[]): GameEvent[] {
    const keywords = this.deps.config.reactionKeywords;
    const events: GameEvent[] = [];
    for (const entry of chat) {
      const content = entry.message.toLowerCase();
      const keyword = keywords.find((k) => content.includes(k.toLowerCase()));
      if (keyword === undefined) continue;
      events.push(
        Object.freeze({
          type: GAME_CHAT_KEYWORD,
          timestamp: this.now().toISOString(),
          username: entry.username,
          message: entry.message,
          keyword,
          data: Object.freeze({}),
        }),
      );
    }
    return events;
  }

  drainPending(): GameEvent[] {
    return this.pending.splice(0);
  }

  async getGameContext(currentGame: string | null, recentChat: readonly ChatEntry[]): Promise<GameContext> {
    const events = [...this.detectChatKeywords(recentChat), ...this.drainPending()];
    const state: GameState = {
      timestamp: this.now().toISOString(),
      status: currentGame ? "running" : "stopped",
      details: {},
    };
    return Object.freeze({
      gameName: currentGame ?? "",
      state: Object.freeze(state),
      events: Object.freeze(events),
      minPauseSeconds: this.deps.config.minPauseSeconds,
      maxPauseSeconds: this.deps.config.maxPauseSeconds,
    });
  }
}
