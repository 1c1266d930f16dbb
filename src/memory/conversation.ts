import type { Logger } from "../logging/logger.js";
import type { ContextSnapshot } from "../perception/types.js";
import type { MemoryStore } from "./store.js";
import type { ImportantEvent, MemoryEntry, PromptMessage } from "./types.js";

export interface ConversationMemoryDeps {
  readonly windowSize: number;
  readonly logger: Logger;
  readonly store?: MemoryStore;
  readonly now?: () => Date;
}

export function summarizeSnapshot(snapshot: ContextSnapshot): string {
  return `viewers=${snapshot.viewerCount} chat=${snapshot.recentChat.length}`;
}

/**
 * Rolling window of what was said on stream plus an append-only log of
 * notable events. The window evicts oldest-first; the event log is only
 * emptied by `clear()`.
 */
export class ConversationMemory {
  private readonly history: MemoryEntry[] = [];
  private readonly events: ImportantEvent[] = [];
  private readonly windowSize: number;
  private readonly logger: Logger;
  private readonly store: MemoryStore | undefined;
  private readonly now: () => Date;

  constructor(deps: ConversationMemoryDeps) {
    if (!Number.isInteger(deps.windowSize) || deps.windowSize <= 0) {
      throw new Error(`Invalid memory window size: ${deps.windowSize}`);
    }
    this.windowSize = deps.windowSize;
    this.logger = deps.logger;
    this.store = deps.store;
    this.now = deps.now ?? (() => new Date());
    this.restore();
  }

  get size(): number {
    return this.history.length;
  }

  recordUtterance(text: string, snapshot: ContextSnapshot): void {
    this.append({
      role: "assistant",
      content: text,
      timestamp: this.timestamp(),
      contextSummary: summarizeSnapshot(snapshot),
    });
  }

  recordChat(username: string, message: string): void {
    this.append({
      role: "user",
      content: message,
      timestamp: this.timestamp(),
      username,
    });
  }

  recordEvent(type: string, data: Readonly<Record<string, unknown>> = {}): void {
    const event: ImportantEvent = Object.freeze({
      type,
      timestamp: this.timestamp(),
      data: Object.freeze({ ...data }),
    });
    this.events.push(event);
    this.logger.debug({ type }, "Important event recorded");
    this.mirror((store) => store.appendEvent(event));
  }

  /** Last `n` entries (all when omitted), oldest first. */
  recent(n?: number): MemoryEntry[] {
    if (n === undefined) return [...this.history];
    if (n <= 0) return [];
    return this.history.slice(-n);
  }

  importantEvents(limit = 10): ImportantEvent[] {
    if (limit <= 0) return [];
    return this.events.slice(-limit);
  }

  toPromptMessages(): PromptMessage[] {
    return this.history.map((entry) => ({ role: entry.role, content: entry.content }));
  }

  clear(): void {
    this.history.length = 0;
    this.events.length = 0;
    this.mirror((store) => store.clear());
    this.logger.info("Conversation memory cleared");
  }

  private append(entry: MemoryEntry): void {
    const frozen = Object.freeze(entry);
    this.history.push(frozen);
    if (this.history.length > this.windowSize) {
      this.history.splice(0, this.history.length - this.windowSize);
    }
    this.mirror((store) => store.appendEntry(frozen));
  }

  private timestamp(): string {
    return this.now().toISOString();
  }

  private restore(): void {
    if (!this.store) return;
    try {
      const entries = this.store.loadEntries().slice(-this.windowSize);
      this.history.push(...entries.map((e) => Object.freeze(e)));
      this.events.push(...this.store.loadEvents().map((e) => Object.freeze(e)));
      this.logger.info(
        { entries: this.history.length, events: this.events.length },
        "Conversation memory restored",
      );
    } catch (err) {
      this.logger.warn({ err }, "Failed to restore conversation memory");
    }
  }

  // In-memory state stays authoritative; a failing store only costs persistence.
  private mirror(write: (store: MemoryStore) => void): void {
    if (!this.store) return;
    try {
      write(this.store);
    } catch (err) {
      this.logger.warn({ err }, "Failed to persist conversation memory");
    }
  }
}
