import type { ChatEntry, ChatSource } from "./types.js";

export const DEFAULT_CHAT_CAPACITY = 100;

export interface IncomingChat {
  readonly username: string;
  readonly message: string;
  readonly platform?: string;
  readonly timestamp?: string;
}

/** Bounded chat queue that transports push into; oldest lines fall off first. */
export class ChatBuffer implements ChatSource {
  private readonly entries: ChatEntry[] = [];

  constructor(
    private readonly capacity = DEFAULT_CHAT_CAPACITY,
    private readonly now: () => Date = () => new Date(),
  ) {
    if (!Number.isInteger(capacity) || capacity <= 0) {
      throw new Error(`Invalid chat capacity: ${capacity}`);
    }
  }

  get size(): number {
    return this.entries.length;
  }

  push(chat: IncomingChat): ChatEntry {
    const entry: ChatEntry = Object.freeze({
      username: chat.username,
      message: chat.message,
      timestamp: chat.timestamp ?? this.now().toISOString(),
      platform: chat.platform ?? "unknown",
    });
    this.entries.push(entry);
    if (this.entries.length > this.capacity) {
      this.entries.splice(0, this.entries.length - this.capacity);
    }
    return entry;
  }

  getRecent(n: number): ChatEntry[] {
    if (n <= 0) return [];
    return this.entries.slice(-n);
  }

  clear(): void {
    this.entries.length = 0;
  }
}
