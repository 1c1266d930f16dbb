export type MemoryRole = "assistant" | "user";

export interface MemoryEntry {
  readonly role: MemoryRole;
  readonly content: string;
  /** ISO-8601 time the entry was recorded. */
  readonly timestamp: string;
  readonly username?: string;
  /** Short situation note for assistant entries, e.g. `viewers=12 chat=3`. */
  readonly contextSummary?: string;
}

export interface ImportantEvent {
  readonly type: string;
  readonly timestamp: string;
  readonly data: Readonly<Record<string, unknown>>;
}

export interface PromptMessage {
  readonly role: MemoryRole;
  readonly content: string;
}
