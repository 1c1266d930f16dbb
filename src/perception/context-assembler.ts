import type { Logger } from "../logging/logger.js";
import type { BroadcastState } from "../broadcast/state.js";
import type {
  ChatSource,
  ContextSnapshot,
  EventSource,
  GamePerceptionSource,
  ViewerSource,
} from "./types.js";

export const DEFAULT_CHAT_WINDOW = 10;

export interface ContextAssemblerDeps {
  readonly chat: ChatSource;
  readonly events: EventSource;
  readonly viewers: ViewerSource;
  readonly state: BroadcastState;
  readonly logger: Logger;
  readonly game?: GamePerceptionSource;
  readonly chatWindow?: number;
  readonly now?: () => number;
}

export function formatElapsed(elapsedMs: number): string {
  const totalMinutes = Math.floor(Math.max(0, elapsedMs) / 60_000);
  const hours = Math.floor(totalMinutes / 60);
  const minutes = totalMinutes % 60;
  return hours > 0 ? `${hours}h ${minutes}m` : `${minutes}m`;
}

/**
 * Builds one snapshot per call. Reading chat and events drains them, so
 * whatever lands in a snapshot is never seen by the next one.
 */
export class ContextAssembler {
  private readonly chatWindow: number;
  private readonly now: () => number;

  constructor(private readonly deps: ContextAssemblerDeps) {
    this.chatWindow = deps.chatWindow ?? DEFAULT_CHAT_WINDOW;
    this.now = deps.now ?? Date.now;
  }

  async assemble(): Promise<ContextSnapshot> {
    const { chat, events, viewers, state } = this.deps;

    const recentChat = chat.getRecent(this.chatWindow);
    chat.clear();
    const pendingEvents = events.drain();

    const startedAt = state.startedAt;
    const elapsedMs = startedAt ? Math.max(0, this.now() - startedAt.getTime()) : null;

    const game =
      state.mode === "game" && this.deps.game
        ? await this.deps.game.getGameContext(state.gameName || null, recentChat)
        : undefined;

    const snapshot: ContextSnapshot = Object.freeze({
      viewerCount: viewers.currentCount,
      viewerChange: viewers.changeStatus(),
      recentChat: Object.freeze([...recentChat]),
      pendingEvents: Object.freeze([...pendingEvents]),
      elapsedMs,
      elapsedLabel: elapsedMs === null ? "" : formatElapsed(elapsedMs),
      mode: state.mode,
      gameName: state.mode === "game" ? state.gameName : "",
      endingPhase: state.endingPhase,
      ...(game ? { game } : {}),
    });

    this.deps.logger.debug(
      {
        viewers: snapshot.viewerCount,
        chat: snapshot.recentChat.length,
        events: snapshot.pendingEvents.length,
        mode: snapshot.mode,
      },
      "Context assembled",
    );
    return snapshot;
  }
}
