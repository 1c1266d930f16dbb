import { Hono } from "hono";
import { serve } from "@hono/node-server";
import { z } from "zod";
import type { Logger } from "../logging/logger.js";
import { VERSION } from "../version.js";
import type { Broadcaster } from "./broadcaster.js";

const chatSchema = z.object({
  username: z.string().min(1),
  message: z.string().min(1),
  platform: z.string().optional(),
});

const eventSchema = z.object({
  type: z.string().min(1),
  username: z.string().optional(),
  amount: z.number().nonnegative().optional(),
  message: z.string().optional(),
  metadata: z.record(z.unknown()).optional(),
});

const gameEventSchema = z.object({
  type: z.string().min(1),
  data: z.record(z.unknown()).optional(),
});

const viewersSchema = z.object({
  count: z.number().int().nonnegative(),
});

const modeSchema = z.object({
  mode: z.enum(["talk", "game"]),
  game: z.string().min(1).optional(),
});

export type ControlTarget = Pick<
  Broadcaster,
  "status" | "pushChat" | "pushEvent" | "pushGameEvent" | "recordViewers" | "setMode" | "startEnding"
>;

export interface ControlServerDeps {
  readonly broadcaster: ControlTarget;
  readonly logger: Logger;
  readonly port: number;
  readonly hostname: string;
}

async function readJson(req: { json(): Promise<unknown> }): Promise<unknown> {
  try {
    return await req.json();
  } catch {
    return undefined;
  }
}

/**
 * Local HTTP surface: health and status for operators, and signal
 * endpoints that chat and platform bridges push into.
 */
export class ControlServer {
  private readonly app: Hono;
  private server: ReturnType<typeof serve> | null = null;
  private readonly startedAt = Date.now();

  constructor(private readonly deps: ControlServerDeps) {
    this.app = new Hono();
    this.setupRoutes();
  }

  /** Dispatches a request in-process, without a listening socket. */
  request(path: string, init?: RequestInit): Response | Promise<Response> {
    return this.app.request(path, init);
  }

  private setupRoutes(): void {
    const { broadcaster, logger } = this.deps;

    this.app.get("/health", (c) => {
      const mem = process.memoryUsage();
      const uptime = Date.now() - this.startedAt;
      return c.json({
        status: "ok",
        version: VERSION,
        uptime,
        uptimeHuman: formatUptime(uptime),
        system: {
          memoryMB: {
            rss: Math.round(mem.rss / 1024 / 1024),
            heapUsed: Math.round(mem.heapUsed / 1024 / 1024),
          },
          nodeVersion: process.version,
          platform: process.platform,
          pid: process.pid,
        },
      });
    });

    this.app.get("/status", (c) => c.json(broadcaster.status()));

    this.app.post("/signals/chat", async (c) => {
      const parsed = chatSchema.safeParse(await readJson(c.req));
      if (!parsed.success) {
        return c.json({ error: "Invalid request", details: parsed.error.flatten() }, 400);
      }
      const entry = broadcaster.pushChat(parsed.data);
      return c.json({ ok: true, entry });
    });

    this.app.post("/signals/event", async (c) => {
      const parsed = eventSchema.safeParse(await readJson(c.req));
      if (!parsed.success) {
        return c.json({ error: "Invalid request", details: parsed.error.flatten() }, 400);
      }
      broadcaster.pushEvent(parsed.data);
      return c.json({ ok: true });
    });

    this.app.post("/signals/game", async (c) => {
      const parsed = gameEventSchema.safeParse(await readJson(c.req));
      if (!parsed.success) {
        return c.json({ error: "Invalid request", details: parsed.error.flatten() }, 400);
      }
      const result = broadcaster.pushGameEvent(parsed.data.type, parsed.data.data);
      if (!result.ok) return c.json({ error: result.reason }, 409);
      return c.json({ ok: true });
    });

    this.app.post("/signals/viewers", async (c) => {
      const parsed = viewersSchema.safeParse(await readJson(c.req));
      if (!parsed.success) {
        return c.json({ error: "Invalid request", details: parsed.error.flatten() }, 400);
      }
      broadcaster.recordViewers(parsed.data.count);
      return c.json({ ok: true });
    });

    this.app.post("/broadcast/mode", async (c) => {
      const parsed = modeSchema.safeParse(await readJson(c.req));
      if (!parsed.success) {
        return c.json({ error: "Invalid request", details: parsed.error.flatten() }, 400);
      }
      const result = broadcaster.setMode(parsed.data.mode, parsed.data.game);
      if (!result.ok) return c.json({ error: result.reason }, 409);
      const { mode, game } = broadcaster.status();
      return c.json({ ok: true, mode, game });
    });

    this.app.post("/broadcast/ending", (c) => {
      const result = broadcaster.startEnding();
      if (!result.ok) return c.json({ error: result.reason }, 409);
      logger.info("Ending sequence requested over control server");
      return c.json({ ok: true }, 202);
    });
  }

  async start(): Promise<void> {
    this.server = serve({
      fetch: this.app.fetch,
      port: this.deps.port,
      hostname: this.deps.hostname,
    });
    this.deps.logger.info({ port: this.deps.port, hostname: this.deps.hostname }, "Control server started");
  }

  async stop(): Promise<void> {
    if (this.server) {
      this.server.close();
      this.server = null;
    }
  }
}

export function formatUptime(ms: number): string {
  const seconds = Math.floor(ms / 1000);
  const minutes = Math.floor(seconds / 60);
  const hours = Math.floor(minutes / 60);
  const days = Math.floor(hours / 24);

  if (days > 0) return `${days}d ${hours % 24}h`;
  if (hours > 0) return `${hours}h ${minutes % 60}m`;
  if (minutes > 0) return `${minutes}m ${seconds % 60}s`;
  return `${seconds}s`;
}
