import type { Logger } from "../logging/logger.js";
import { DEFAULT_COALESCER_CONFIG, StreamCoalescer, type CoalescerConfig } from "./stream-coalescer.js";

/** Where generated speech goes: a TTS engine in production, the log here. */
export interface PlaybackSink {
  /** Resolves once the text has been synthesized and queued. */
  speak(text: string, signal?: AbortSignal): Promise<void>;
  /** Consumes chunks until exhausted or aborted; resolves with everything actually voiced. */
  speakStream(chunks: AsyncIterable<string>, signal?: AbortSignal): Promise<string>;
  stop(): Promise<void>;
}

/** Text-only sink: every sentence becomes one log line. */
export class LogPlayback implements PlaybackSink {
  private spoken = 0;

  constructor(
    private readonly logger: Logger,
    private readonly coalescer: CoalescerConfig = DEFAULT_COALESCER_CONFIG,
  ) {}

  /** Sentences voiced since start. */
  get sentenceCount(): number {
    return this.spoken;
  }

  async speak(text: string, signal?: AbortSignal): Promise<void> {
    if (signal?.aborted || !text.trim()) return;
    this.voice(text.trim());
  }

  async speakStream(chunks: AsyncIterable<string>, signal?: AbortSignal): Promise<string> {
    const voiced: string[] = [];
    const coalescer = new StreamCoalescer(this.coalescer, (sentence) => {
      voiced.push(sentence);
      this.voice(sentence);
    });
    try {
      for await (const chunk of chunks) {
        if (signal?.aborted) break;
        coalescer.append(chunk);
      }
      if (!signal?.aborted) coalescer.end();
    } finally {
      coalescer.dispose();
    }
    return voiced.join(" ");
  }

  async stop(): Promise<void> {
    this.logger.info({ sentences: this.spoken }, "Playback stopped");
  }

  private voice(text: string): void {
    this.spoken++;
    this.logger.info({ text }, "On air");
  }
}
