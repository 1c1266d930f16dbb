interface Slot<T> {
  readonly value: T;
}

const DEFAULT_CAPACITY = 16;

/**
 * Bounded single-consumer channel between a producer task and an async
 * iterator. `send()` waits while the buffer is full and returns `false`
 * once the consumer has gone away, which is the producer's cue to stop
 * pulling from its own source.
 */
export class ChunkChannel<T> implements AsyncIterable<T> {
  private readonly buffer: Slot<T>[] = [];
  private readonly waitingReaders: Array<(result: IteratorResult<T>) => void> = [];
  private readonly waitingWriters: Array<() => void> = [];
  private closed = false;
  private cancelled = false;

  constructor(private readonly capacity = DEFAULT_CAPACITY) {
    if (!Number.isInteger(capacity) || capacity <= 0) {
      throw new Error(`Invalid channel capacity: ${capacity}`);
    }
  }

  get size(): number {
    return this.buffer.length;
  }

  /** True once the consumer stopped reading. */
  get isCancelled(): boolean {
    return this.cancelled;
  }

  async send(value: T): Promise<boolean> {
    while (!this.closed && !this.cancelled && this.buffer.length >= this.capacity) {
      await new Promise<void>((resolve) => this.waitingWriters.push(resolve));
    }
    if (this.closed || this.cancelled) return false;

    const reader = this.waitingReaders.shift();
    if (reader) {
      reader({ value, done: false });
    } else {
      this.buffer.push({ value });
    }
    return true;
  }

  /** Producer side: no more values. Buffered values are still delivered. */
  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.releaseReaders();
    this.releaseWriters();
  }

  /** Consumer side: stop reading and drop anything buffered. */
  cancel(): void {
    if (this.cancelled) return;
    this.cancelled = true;
    this.buffer.length = 0;
    this.releaseReaders();
    this.releaseWriters();
  }

  [Symbol.asyncIterator](): AsyncIterator<T> {
    return {
      next: (): Promise<IteratorResult<T>> => {
        const slot = this.buffer.shift();
        if (slot) {
          this.waitingWriters.shift()?.();
          return Promise.resolve({ value: slot.value, done: false });
        }
        if (this.closed || this.cancelled) {
          return Promise.resolve({ value: undefined, done: true });
        }
        return new Promise((resolve) => this.waitingReaders.push(resolve));
      },
      return: (): Promise<IteratorResult<T>> => {
        this.cancel();
        return Promise.resolve({ value: undefined, done: true });
      },
    };
  }

  private releaseReaders(): void {
    for (const reader of this.waitingReaders.splice(0)) {
      reader({ value: undefined, done: true });
    }
  }

  private releaseWriters(): void {
    for (const writer of this.waitingWriters.splice(0)) {
      writer();
    }
  }
}
