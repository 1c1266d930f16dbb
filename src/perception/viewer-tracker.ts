import type { Logger } from "../logging/logger.js";
import type { ViewerChange, ViewerSource } from "./types.js";

const SURGE_RATIO = 0.5;
const DROP_RATIO = 0.3;

export function classifyChange(previous: number, current: number): ViewerChange {
  if (previous === 0) return "stable";
  const ratio = (current - previous) / previous;
  if (ratio >= SURGE_RATIO) return "surge";
  if (ratio <= -DROP_RATIO) return "drop";
  return "stable";
}

/** Holds the last two viewer counts reported by whatever polls the platform. */
export class ViewerTracker implements ViewerSource {
  private current = 0;
  private previous = 0;

  constructor(private readonly logger: Logger) {}

  get currentCount(): number {
    return this.current;
  }

  get previousCount(): number {
    return this.previous;
  }

  record(count: number): void {
    if (!Number.isInteger(count) || count < 0) {
      throw new Error(`Invalid viewer count: ${count}`);
    }
    this.previous = this.current;
    this.current = count;

    const status = this.changeStatus();
    if (status !== "stable") {
      this.logger.info({ previous: this.previous, current: count, status }, "Viewer count changed sharply");
    }
  }

  changeStatus(): ViewerChange {
    return classifyChange(this.previous, this.current);
  }
}
