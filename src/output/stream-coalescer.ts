export interface CoalescerConfig {
  /** Shortest text worth handing to the voice on its own. */
  readonly minChars: number;
  readonly maxChars: number;
  readonly idleMs: number;
}

export const DEFAULT_COALESCER_CONFIG: CoalescerConfig = {
  minChars: 12,
  maxChars: 240,
  idleMs: 800,
};

const SENTENCE_END = /[.!?…]+(?=\s)|\n/g;

/**
 * Regroups streamed tokens into sentence-sized pieces. A sentence is
 * flushed once it is at least `minChars` long; shorter ones wait for the
 * next so interjections do not go out alone.
 */
export class StreamCoalescer {
  private buffer = "";
  private idleTimer: ReturnType<typeof setTimeout> | null = null;

  constructor(
    private readonly config: CoalescerConfig,
    private readonly onFlush: (text: string) => void,
  ) {}

  append(delta: string): void {
    this.buffer += delta;
    this.resetIdleTimer();

    let end = this.findSentenceEnd(this.buffer);
    while (end > 0) {
      this.take(end);
      end = this.findSentenceEnd(this.buffer);
    }

    while (this.buffer.length >= this.config.maxChars) {
      this.take(this.findBreakPoint(this.buffer, this.config.maxChars));
    }
  }

  end(): void {
    this.clearIdleTimer();
    this.take(this.buffer.length);
  }

  dispose(): void {
    this.clearIdleTimer();
  }

  private take(length: number): void {
    const text = this.buffer.slice(0, length).trim();
    this.buffer = this.buffer.slice(length);
    if (text) this.onFlush(text);
  }

  private findSentenceEnd(text: string): number {
    for (const match of text.matchAll(SENTENCE_END)) {
      const end = (match.index ?? 0) + match[0].length;
      if (text.slice(0, end).trim().length >= this.config.minChars) return end;
    }
    return -1;
  }

  private resetIdleTimer(): void {
    this.clearIdleTimer();
    this.idleTimer = setTimeout(() => {
      if (this.buffer.trim().length >= this.config.minChars) {
        this.take(this.buffer.length);
      }
    }, this.config.idleMs);
  }

  private clearIdleTimer(): void {
    if (this.idleTimer) {
      clearTimeout(this.idleTimer);
      this.idleTimer = null;
    }
  }

  private findBreakPoint(text: string, maxLen: number): number {
    const idx = text.slice(0, maxLen).lastIndexOf(" ");
    return idx > 0 ? idx + 1 : maxLen;
  }
}
