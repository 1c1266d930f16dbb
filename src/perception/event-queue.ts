import type { Logger } from "../logging/logger.js";
import type { BroadcastEvent, EventSource } from "./types.js";

export const DEFAULT_EVENT_CAPACITY = 50;

export interface IncomingEvent {
  readonly type: string;
  readonly username?: string;
  readonly amount?: number;
  readonly message?: string;
  readonly metadata?: Readonly<Record<string, unknown>>;
}

export class EventQueue implements EventSource {
  private readonly queue: BroadcastEvent[] = [];

  constructor(
    private readonly logger: Logger,
    private readonly capacity = DEFAULT_EVENT_CAPACITY,
  ) {
    if (!Number.isInteger(capacity) || capacity <= 0) {
      throw new Error(`Invalid event capacity: ${capacity}`);
    }
  }

  get size(): number {
    return this.queue.length;
  }

  hasEvents(): boolean {
    return this.queue.length > 0;
  }

  add(event: IncomingEvent): void {
    this.queue.push(
      Object.freeze({
        type: event.type,
        ...(event.username !== undefined ? { username: event.username } : {}),
        ...(event.amount !== undefined ? { amount: event.amount } : {}),
        ...(event.message !== undefined ? { message: event.message } : {}),
        metadata: Object.freeze({ ...(event.metadata ?? {}) }),
      }),
    );
    if (this.queue.length > this.capacity) {
      this.queue.shift();
    }
    this.logger.info({ type: event.type, username: event.username }, "Event received");
  }

  addDonation(username: string, amount: number, message = ""): void {
    this.add({ type: "donation", username, amount, message });
  }

  addSubscription(username: string, months = 1): void {
    this.add({ type: "subscription", username, metadata: { months } });
  }

  addFollow(username: string): void {
    this.add({ type: "follow", username });
  }

  signalStreamStart(): void {
    this.add({ type: "stream_start" });
  }

  drain(): BroadcastEvent[] {
    return this.queue.splice(0);
  }
}
