export type HighPriorityKind =
  | "donation_react"
  | "subscribe_react"
  | "greeting"
  | "wind_down"
  | "ending_announce"
  | "final_goodbye";

export type ReplyKind = "chat_reply" | "game_chat_reply";

export type AmbientKind =
  | "free_talk"
  | "topic_change"
  | "reaction"
  | "ask_viewers"
  | "announcement"
  | "silence"
  | "game_reaction"
  | "game_commentary"
  | "game_strategy";

export type ActionKind = HighPriorityKind | ReplyKind | AmbientKind;

export type EndingActionKind = "wind_down" | "ending_announce" | "final_goodbye";

export const ACTION_PRIORITY: Readonly<Record<ActionKind, number>> = {
  donation_react: 10,
  subscribe_react: 9,
  greeting: 10,
  wind_down: 10,
  ending_announce: 10,
  final_goodbye: 10,
  chat_reply: 5,
  game_chat_reply: 5,
  free_talk: 1,
  topic_change: 1,
  reaction: 1,
  ask_viewers: 1,
  announcement: 1,
  silence: 1,
  game_reaction: 1,
  game_commentary: 1,
  game_strategy: 1,
};

export const ACTION_KINDS: readonly ActionKind[] = Object.freeze(
  Object.keys(ACTION_PRIORITY).filter(isActionKind),
);

export function isActionKind(value: string): value is ActionKind {
  return Object.prototype.hasOwnProperty.call(ACTION_PRIORITY, value);
}

/** The single behavior chosen for one cycle. */
export interface Action {
  readonly kind: ActionKind;
  readonly priority: number;
  readonly targetUser?: string;
  /** Verbatim chat text that prompted the action. */
  readonly triggerMessage?: string;
  readonly metadata: Readonly<Record<string, unknown>>;
}

export interface ActionInit {
  readonly targetUser?: string;
  readonly triggerMessage?: string;
  readonly metadata?: Readonly<Record<string, unknown>>;
}

export function createAction(kind: ActionKind, init: ActionInit = {}): Action {
  const action: Action = {
    kind,
    priority: ACTION_PRIORITY[kind],
    ...(init.targetUser !== undefined ? { targetUser: init.targetUser } : {}),
    ...(init.triggerMessage !== undefined ? { triggerMessage: init.triggerMessage } : {}),
    metadata: Object.freeze({ ...(init.metadata ?? {}) }),
  };
  return Object.freeze(action);
}
