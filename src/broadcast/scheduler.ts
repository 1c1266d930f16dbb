import { Cron } from "croner";
import type { Random } from "../brain/decider.js";
import type { ScheduleConfig, ScheduleStartTime, Weekday } from "../config/types.js";
import type { Logger } from "../logging/logger.js";
import { sleep as defaultSleep, type Sleep } from "../utils/sleep.js";
import type { LoopStatus } from "./loop.js";

const WEEKDAY_INDEX: Readonly<Record<Weekday, number>> = {
  sunday: 0,
  monday: 1,
  tuesday: 2,
  wednesday: 3,
  thursday: 4,
  friday: 5,
  saturday: 6,
};

/** `HH:MM` on a weekday, as a five-field cron pattern. */
export function cronPattern(start: ScheduleStartTime): string {
  const [hour, minute] = start.time.split(":").map(Number);
  return `${minute} ${hour} * * ${WEEKDAY_INDEX[start.day]}`;
}

export interface ScheduledLoop {
  readonly status: LoopStatus;
  start(): Promise<void>;
  stop(): Promise<void>;
}

export interface ScheduledEnding {
  run(signal?: AbortSignal): Promise<boolean>;
}

export interface BroadcastSchedulerDeps {
  readonly config: ScheduleConfig;
  readonly loop: ScheduledLoop;
  readonly createEnding: () => ScheduledEnding;
  readonly logger: Logger;
  readonly sleep?: Sleep;
  readonly random?: Random;
}

export class BroadcastScheduler {
  private readonly jobs: Cron[] = [];
  private session: Promise<boolean> | null = null;
  private sessionController: AbortController | null = null;
  private readonly sleep: Sleep;
  private readonly random: Random;

  constructor(private readonly deps: BroadcastSchedulerDeps) {
    this.sleep = deps.sleep ?? defaultSleep;
    this.random = deps.random ?? Math.random;
  }

  get isSessionRunning(): boolean {
    return this.session !== null;
  }

  /** Registers one weekly job per start time. Returns how many were scheduled. */
  start(): number {
    const { config, logger } = this.deps;
    if (config.startTimes.length === 0) {
      logger.warn("No broadcast start times configured; nothing scheduled");
      return 0;
    }

    for (const startTime of config.startTimes) {
      const pattern = cronPattern(startTime);
      const job = new Cron(pattern, config.timezone ? { timezone: config.timezone } : {}, () => {
        this.runSession().catch((err) => {
          logger.error({ err }, "Scheduled broadcast failed");
        });
      });
      this.jobs.push(job);
      logger.debug({ day: startTime.day, time: startTime.time, pattern }, "Scheduled broadcast start");
    }

    logger.info(
      { count: this.jobs.length, next: this.nextBroadcastTime()?.toISOString() ?? null },
      "Broadcast scheduler started",
    );
    return this.jobs.length;
  }

  async stop(): Promise<void> {
    for (const job of this.jobs) {
      job.stop();
    }
    this.jobs.length = 0;
    this.sessionController?.abort();
    if (this.session) {
      await this.session;
    }
    this.deps.logger.info("Broadcast scheduler stopped");
  }

  nextBroadcastTime(): Date | null {
    let earliest: Date | null = null;
    for (const job of this.jobs) {
      const next = job.nextRun();
      if (next && (!earliest || next < earliest)) earliest = next;
    }
    return earliest;
  }

  /** Whole minutes, uniform over the configured inclusive range. */
  pickDurationMinutes(): number {
    const { min, max } = this.deps.config.durationMinutes;
    const upper = Math.max(min, max);
    return min + Math.floor(this.random() * (upper - min + 1));
  }

  /**
   * One scheduled broadcast: start the loop, let it run until the ending
   * is due, run the ending, stop the loop. Resolves true when the ending
   * completed, false when skipped or stopped early.
   */
  runSession(durationMinutes = this.pickDurationMinutes()): Promise<boolean> {
    const { loop, logger } = this.deps;
    if (this.session || loop.status === "running") {
      logger.warn("Broadcast already running; skipping scheduled start");
      return Promise.resolve(false);
    }

    const controller = new AbortController();
    this.sessionController = controller;
    this.session = this.broadcast(durationMinutes, controller.signal).finally(() => {
      this.session = null;
      this.sessionController = null;
    });
    return this.session;
  }

  private async broadcast(durationMinutes: number, signal: AbortSignal): Promise<boolean> {
    const { loop, createEnding, config, logger } = this.deps;
    const endsAt = new Date(Date.now() + durationMinutes * 60_000);
    logger.info({ durationMinutes, endsAt: endsAt.toISOString() }, "Scheduled broadcast starting");

    // Aborted by stop() or by the loop exiting on its own (a manual ending).
    const ended = new AbortController();
    const abortSession = () => ended.abort();
    signal.addEventListener("abort", abortSession, { once: true });
    const looping = loop.start().finally(abortSession);
    try {
      const untilEnding = Math.max(0, durationMinutes - config.ending.windDownMinutes) * 60_000;
      if (!(await this.sleep(untilEnding, ended.signal)) || loop.status !== "running") {
        if (!signal.aborted) logger.info("Broadcast ended before its scheduled ending");
        return false;
      }

      logger.info("Starting ending sequence");
      return await createEnding().run(ended.signal);
    } finally {
      signal.removeEventListener("abort", abortSession);
      await loop.stop();
      await looping;
    }
  }
}
