import type { BroadcastEvent, ContextSnapshot, GameEvent } from "../perception/types.js";
import { createAction, type Action, type AmbientKind } from "./actions.js";

export type Random = () => number;

export type WeightTable = ReadonlyArray<readonly [AmbientKind, number]>;

/** Chat lines that mention a configured reaction keyword. */
export const GAME_CHAT_KEYWORD = "game_chat_keyword";

export const TALK_WEIGHTS: WeightTable = [
  ["free_talk", 0.4],
  ["topic_change", 0.15],
  ["reaction", 0.1],
  ["ask_viewers", 0.2],
  ["announcement", 0.05],
  ["silence", 0.1],
];

// Only these two move when nobody is watching; the rest keep their
// defaults, so the table sums to 1.30 and the sampler normalizes.
export const EMPTY_ROOM_OVERRIDES: Readonly<Partial<Record<AmbientKind, number>>> = {
  free_talk: 0.6,
  silence: 0.2,
};

export const GAME_WEIGHTS: WeightTable = [
  ["game_commentary", 0.35],
  ["game_reaction", 0.2],
  ["game_strategy", 0.15],
  ["free_talk", 0.15],
  ["ask_viewers", 0.1],
  ["silence", 0.05],
];

/**
 * Picks one entry with probability weight / sum(weights). Weights need not
 * sum to 1.
 */
export function weightedChoice<T>(
  entries: ReadonlyArray<readonly [T, number]>,
  random: Random,
): T {
  if (entries.length === 0) {
    throw new Error("weightedChoice needs at least one entry");
  }
  const total = entries.reduce((sum, [, weight]) => sum + weight, 0);
  let threshold = random() * total;
  for (const [item, weight] of entries) {
    threshold -= weight;
    if (threshold < 0) return item;
  }
  return entries[entries.length - 1][0];
}

export function ambientWeights(snapshot: ContextSnapshot): WeightTable {
  if (snapshot.mode === "game") return GAME_WEIGHTS;
  if (snapshot.viewerCount !== 0) return TALK_WEIGHTS;
  return TALK_WEIGHTS.map(
    ([kind, weight]) => [kind, EMPTY_ROOM_OVERRIDES[kind] ?? weight] as const,
  );
}

/** Flattens an event into one record; its own fields win over metadata keys. */
export function eventPayload(event: BroadcastEvent): Record<string, unknown> {
  return {
    ...event.metadata,
    type: event.type,
    ...(event.username !== undefined ? { username: event.username } : {}),
    ...(event.amount !== undefined ? { amount: event.amount } : {}),
    ...(event.message !== undefined ? { message: event.message } : {}),
  };
}

function reactToEvent(event: BroadcastEvent): Action | null {
  switch (event.type) {
    case "donation":
      return createAction("donation_react", { metadata: eventPayload(event) });
    case "subscription":
    case "follow":
      return createAction("subscribe_react", {
        targetUser: event.username,
        metadata: eventPayload(event),
      });
    case "stream_start":
      return createAction("greeting", { metadata: eventPayload(event) });
    default:
      return null;
  }
}

function lastOf<T>(items: readonly T[], predicate: (item: T) => boolean): T | undefined {
  for (let i = items.length - 1; i >= 0; i--) {
    if (predicate(items[i])) return items[i];
  }
  return undefined;
}

function replyToChat(snapshot: ContextSnapshot): Action | null {
  if (snapshot.mode === "game") {
    const keywordHit = lastOf(
      snapshot.game?.events ?? [],
      (e) => e.type === GAME_CHAT_KEYWORD && e.username !== undefined,
    );
    if (keywordHit) {
      return createAction("game_chat_reply", {
        targetUser: keywordHit.username,
        triggerMessage: keywordHit.message,
        metadata: { keyword: keywordHit.keyword },
      });
    }
  }

  const latest = snapshot.recentChat.at(-1);
  if (!latest) return null;
  return createAction(snapshot.mode === "game" ? "game_chat_reply" : "chat_reply", {
    targetUser: latest.username,
    triggerMessage: latest.message,
  });
}

function reactToGame(snapshot: ContextSnapshot): Action | null {
  if (snapshot.mode !== "game") return null;
  const event: GameEvent | undefined = lastOf(
    snapshot.game?.events ?? [],
    (e) => e.type !== GAME_CHAT_KEYWORD,
  );
  if (!event) return null;
  return createAction("game_reaction", {
    metadata: { event: event.type, ...event.data },
  });
}

/**
 * Chooses what to do this cycle: the first recognized stream event, then
 * the newest chat line, then (in game mode) the newest game event, and
 * otherwise a weighted draw over ambient behaviors. Never throws.
 */
export function decide(snapshot: ContextSnapshot, random: Random = Math.random): Action {
  for (const event of snapshot.pendingEvents) {
    const action = reactToEvent(event);
    if (action) return action;
  }

  const reply = replyToChat(snapshot);
  if (reply) return reply;

  const gameReaction = reactToGame(snapshot);
  if (gameReaction) return gameReaction;

  return createAction(weightedChoice(ambientWeights(snapshot), random));
}

export class ActionDecider {
  constructor(private readonly random: Random = Math.random) {}

  decide(snapshot: ContextSnapshot): Action {
    return decide(snapshot, this.random);
  }
}
