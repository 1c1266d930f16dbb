import { loadConfig } from "../config/loader.js";
import { ensureDir, getStateDir } from "../config/paths.js";
import type { OnAirConfig } from "../config/types.js";
import { createLogger, type Logger } from "../logging/logger.js";
import { OllamaClient } from "../brain/llm-client.js";
import { MemoryStore } from "../memory/store.js";
import { Broadcaster } from "./broadcaster.js";
import { ControlServer } from "./control-server.js";

export type StartMode = "now" | "schedule";

export interface StartOptions {
  readonly configPath?: string;
  /** Defaults to `schedule` when the schedule is enabled, else `now`. */
  readonly mode?: StartMode;
}

export interface RuntimeContext {
  readonly config: OnAirConfig;
  readonly logger: Logger;
  readonly broadcaster: Broadcaster;
  readonly backend: OllamaClient;
  readonly controlServer: ControlServer | null;
  readonly memoryStore: MemoryStore | null;
  readonly mode: StartMode;
  shutdown(): Promise<void>;
}

const SHUTDOWN_TIMEOUT_MS = 15_000;

export async function startBroadcaster(options: StartOptions = {}): Promise<RuntimeContext> {
  // 1. Load config
  const config = loadConfig(options.configPath);

  // 2. Create logger
  const logger = createLogger(config.logging);
  logger.info("Starting onair...");

  // 3. Ensure state directory
  const stateDir = ensureDir(getStateDir());

  // 4. LLM backend (a missing model is only a warning)
  const backend = new OllamaClient(config.llm, logger);
  const check = await backend.checkModel();
  if (check.ok) {
    logger.info({ model: config.llm.model, baseUrl: config.llm.baseUrl }, "LLM backend ready");
  } else {
    logger.warn(
      { model: config.llm.model, baseUrl: config.llm.baseUrl, error: check.error },
      "LLM backend not ready; fallback lines will be used until it is",
    );
  }

  // 5. Memory persistence
  const memoryStore = config.memory.persist
    ? new MemoryStore(stateDir, config.broadcast.memoryWindowSize)
    : null;

  // 6. Broadcaster
  const broadcaster = new Broadcaster({
    config,
    logger,
    backend,
    memoryStore: memoryStore ?? undefined,
  });

  // 7. Control server
  let controlServer: ControlServer | null = null;
  if (config.control.enabled) {
    controlServer = new ControlServer({
      broadcaster,
      logger,
      port: config.control.port,
      hostname: config.control.hostname,
    });
    await controlServer.start();
  }

  // 8. Start broadcasting, now or on schedule
  const mode = options.mode ?? (config.schedule.enabled ? "schedule" : "now");
  if (mode === "schedule") {
    broadcaster.scheduler.start();
  } else {
    broadcaster.loop.start().catch((err) => {
      logger.error({ err }, "Broadcast loop crashed");
    });
  }

  // 9. Graceful shutdown (use 'once' to avoid handler accumulation)
  let shutdownInProgress = false;
  const shutdown = async (): Promise<void> => {
    if (shutdownInProgress) return;
    shutdownInProgress = true;
    logger.info("Shutting down gracefully...");

    const forceExit = setTimeout(() => {
      logger.warn("Shutdown timeout reached, forcing exit");
      process.exit(1);
    }, SHUTDOWN_TIMEOUT_MS);
    forceExit.unref();

    try {
      await broadcaster.shutdown();
    } catch (err) {
      logger.error({ err }, "Error stopping broadcaster");
    }
    await controlServer?.stop();
    memoryStore?.close();

    clearTimeout(forceExit);
    logger.info("Shutdown complete");
  };

  const onSignal = (): void => {
    shutdown()
      .then(() => process.exit(0))
      .catch((err) => {
        logger.error({ err }, "Shutdown failed");
        process.exit(1);
      });
  };
  process.once("SIGTERM", onSignal);
  process.once("SIGINT", onSignal);

  logger.info({ mode }, "onair started");
  return { config, logger, broadcaster, backend, controlServer, memoryStore, mode, shutdown };
}
