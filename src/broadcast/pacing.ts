import type { Random } from "../brain/decider.js";
import type { ContextSnapshot } from "../perception/types.js";

export interface PauseRange {
  readonly minPauseSeconds: number;
  readonly maxPauseSeconds: number;
}

export const BUSY_CHAT_THRESHOLD = 3;

function uniform(min: number, max: number, random: Random): number {
  return min + (max - min) * random();
}

/**
 * Seconds to wait before the next cycle. Game mode follows the game's own
 * range; otherwise pending events answer fast, busy chat answers
 * quickly, and a quiet room drifts across the full range.
 */
export function computePause(snapshot: ContextSnapshot, range: PauseRange, random: Random = Math.random): number {
  const { minPauseSeconds: min, maxPauseSeconds: max } = range;

  if (snapshot.mode === "game") {
    const game = snapshot.game;
    return game
      ? uniform(game.minPauseSeconds, game.maxPauseSeconds, random)
      : uniform(min, max, random);
  }

  if (snapshot.pendingEvents.length > 0) return min;

  if (snapshot.recentChat.length >= BUSY_CHAT_THRESHOLD) {
    return uniform(min, min * 2, random);
  }

  return uniform(min, max, random);
}
