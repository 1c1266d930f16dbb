import type { BroadcastMode } from "../config/types.js";

export type ViewerChange = "surge" | "drop" | "stable";

export type EndingPhase = "none" | "wind_down" | "ending_announce" | "final_goodbye";

export interface ChatEntry {
  readonly username: string;
  readonly message: string;
  /** ISO-8601 arrival time. */
  readonly timestamp: string;
  readonly platform: string;
}

/**
 * Something that happened on the stream: `donation`, `subscription`,
 * `follow`, `stream_start`, or a `game_*` tag. Other tags pass through
 * untouched and are ignored by the decider.
 */
export interface BroadcastEvent {
  readonly type: string;
  readonly username?: string;
  readonly amount?: number;
  readonly message?: string;
  readonly metadata: Readonly<Record<string, unknown>>;
}

export interface GameEvent {
  readonly type: string;
  readonly timestamp: string;
  readonly username?: string;
  readonly message?: string;
  readonly keyword?: string;
  readonly data: Readonly<Record<string, unknown>>;
}

export interface GameState {
  readonly timestamp: string;
  readonly status: "running" | "stopped";
  readonly details: Readonly<Record<string, unknown>>;
}

export interface GameContext {
  readonly gameName: string;
  readonly state: GameState;
  readonly events: readonly GameEvent[];
  readonly minPauseSeconds: number;
  readonly maxPauseSeconds: number;
}

/** Everything one broadcast cycle knows about the stream. Built once, never mutated. */
export interface ContextSnapshot {
  readonly viewerCount: number;
  readonly viewerChange: ViewerChange;
  readonly recentChat: readonly ChatEntry[];
  readonly pendingEvents: readonly BroadcastEvent[];
  /** Milliseconds since the broadcast started; null before start. */
  readonly elapsedMs: number | null;
  /** Human-readable elapsed time ("1h 5m", "12m"); empty before start. */
  readonly elapsedLabel: string;
  readonly mode: BroadcastMode;
  readonly gameName: string;
  readonly endingPhase: EndingPhase;
  readonly game?: GameContext;
}

export interface ChatSource {
  /** Newest `n` messages, oldest first. Does not remove anything. */
  getRecent(n: number): ChatEntry[];
  clear(): void;
}

export interface EventSource {
  /** Returns every pending event in arrival order and empties the queue. */
  drain(): BroadcastEvent[];
}

export interface ViewerSource {
  readonly currentCount: number;
  changeStatus(): ViewerChange;
}

export interface GamePerceptionSource {
  getGameContext(currentGame: string | null, recentChat: readonly ChatEntry[]): Promise<GameContext>;
}
