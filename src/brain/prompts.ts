import type { ContextSnapshot, EndingPhase } from "../perception/types.js";
import type { Action, ActionKind, EndingActionKind } from "./actions.js";

type Instruction = (action: Action, snapshot: ContextSnapshot) => string;

const who = (action: Action): string => action.targetUser ?? "a viewer";

export const INSTRUCTIONS: Readonly<Record<ActionKind, Instruction>> = {
  donation_react: (action) => {
    const amount = action.metadata["amount"];
    const from = action.metadata["username"];
    const giver = typeof from === "string" ? from : "someone";
    return typeof amount === "number"
      ? `${giver} just donated ${amount}. Thank them warmly and sincerely.`
      : `${giver} just donated. Thank them warmly and sincerely.`;
  },
  subscribe_react: (action) => `Welcome ${who(action)}, who just subscribed or followed.`,
  greeting: () => "The stream is starting. Greet everyone warmly.",
  wind_down: () =>
    "The stream is entering its final stretch. Let viewers know gently and start wrapping up today's topics.",
  ending_announce: () =>
    "The stream ends in about 5 minutes. Look back on today's highlights and thank the viewers.",
  final_goodbye: () =>
    "This is the last thing you say today. Say a heartfelt goodbye and promise to see everyone next time.",
  chat_reply: (action) =>
    `Reply naturally to ${who(action)}, who wrote: "${action.triggerMessage ?? ""}".`,
  game_chat_reply: (action, snapshot) =>
    `While playing ${snapshot.gameName || "the game"}, reply to ${who(action)}, who wrote: "${action.triggerMessage ?? ""}".`,
  free_talk: () => "Talk naturally about whatever is on your mind right now.",
  topic_change: () => "Move on to a fresh topic and start talking about it.",
  reaction: () => "React emotionally to how the stream is going right now.",
  ask_viewers: () => "Ask the viewers an interesting question to get them talking.",
  announcement: () => "Share a short stream-related notice in a natural way.",
  silence: () => "Stay quiet for a moment.",
  game_reaction: (action) => {
    const event = action.metadata["event"];
    return typeof event === "string"
      ? `React out loud to what just happened in the game (${event}).`
      : "React out loud to what is happening in the game right now.";
  },
  game_commentary: (_action, snapshot) =>
    `Give a short play-by-play of what you are doing in ${snapshot.gameName || "the game"}.`,
  game_strategy: (_action, snapshot) =>
    `Think out loud about your next move or strategy in ${snapshot.gameName || "the game"}.`,
};

export const FALLBACK_SPEECH: Readonly<Record<ActionKind, string>> = {
  donation_react: "Thank you so much for the donation! That really means a lot!",
  subscribe_react: "Thank you so much for subscribing!",
  greeting: "Hi everyone! We're live!",
  wind_down: "We're getting close to the end of today's stream.",
  ending_announce: "Just a few more minutes today. Thanks for hanging out!",
  final_goodbye: "That's it for today. Thank you all, see you next time!",
  chat_reply: "Hold on, let me think about that!",
  game_chat_reply: "Hold on, let me think about that!",
  free_talk: "Thanks for coming to the stream today!",
  topic_change: "Okay, let's switch things up and talk about something else!",
  reaction: "Whoa!",
  ask_viewers: "How's everyone doing today?",
  announcement: "Quick reminder: follow the channel so you don't miss the next stream!",
  silence: "",
  game_reaction: "Whoa, did you see that?",
  game_commentary: "Okay, let's keep going!",
  game_strategy: "Hmm, what should I do next?",
};

export const ENDING_ACTIONS: Readonly<Record<Exclude<EndingPhase, "none">, EndingActionKind>> = {
  wind_down: "wind_down",
  ending_announce: "ending_announce",
  final_goodbye: "final_goodbye",
};

const ENDING_BANNERS: Readonly<Record<Exclude<EndingPhase, "none">, string>> = {
  wind_down: "[Ending] The stream is winding down.",
  ending_announce: "[Ending] About 5 minutes left in the stream.",
  final_goodbye: "[Ending] The stream is ending now.",
};

const CLOSING_TONE: Readonly<Record<Exclude<EndingPhase, "none">, string>> = {
  wind_down: "Keep the tone relaxed; the stream is winding down.",
  ending_announce: "Keep it short and warm; the stream is almost over.",
  final_goodbye: "Keep it brief; these are the last moments of the stream.",
};

const MODE_GUIDANCE = {
  talk: "You are in a talk stream. Chat with viewers and keep the conversation flowing.",
  game: "You are playing a game live. Mix commentary on the game with chat replies, and keep each line short.",
} as const;

export function modeGuidance(snapshot: ContextSnapshot): string {
  return MODE_GUIDANCE[snapshot.mode];
}

function isEndingKind(kind: ActionKind): kind is EndingActionKind {
  return kind === "wind_down" || kind === "ending_announce" || kind === "final_goodbye";
}

export function instructionFor(action: Action, snapshot: ContextSnapshot): string {
  const base = INSTRUCTIONS[action.kind](action, snapshot);
  if (snapshot.endingPhase === "none" || isEndingKind(action.kind)) return base;
  return `${base} ${CLOSING_TONE[snapshot.endingPhase]}`;
}

export const PROMPT_CHAT_LINES = 10;

/** The final user turn: situation first, instruction last. */
export function buildUserContent(action: Action, snapshot: ContextSnapshot): string {
  const parts: string[] = [];

  const change = snapshot.viewerChange === "stable" ? "" : ` (${snapshot.viewerChange})`;
  parts.push(`[Now] Viewers: ${snapshot.viewerCount}${change}`);

  if (snapshot.elapsedLabel) {
    parts.push(`[Elapsed] ${snapshot.elapsedLabel}`);
  }

  parts.push(
    snapshot.mode === "game"
      ? `[Mode] Game: ${snapshot.gameName || "unknown game"}`
      : "[Mode] Talk",
  );

  if (snapshot.endingPhase !== "none") {
    parts.push(ENDING_BANNERS[snapshot.endingPhase]);
  }

  const chat = snapshot.recentChat.slice(-PROMPT_CHAT_LINES);
  if (chat.length > 0) {
    parts.push(["[Chat]", ...chat.map((c) => `${c.username}: ${c.message}`)].join("\n"));
  }

  const gameEvents = snapshot.game?.events ?? [];
  if (gameEvents.length > 0) {
    parts.push(
      ["[Game events]", ...gameEvents.map((e) => `- ${e.type}${e.keyword ? ` (${e.keyword})` : ""}`)].join("\n"),
    );
  }

  if (action.triggerMessage !== undefined) {
    parts.push(`[Message] ${action.triggerMessage}`);
  }

  parts.push(`[Instruction] ${instructionFor(action, snapshot)}`);
  return parts.join("\n");
}
