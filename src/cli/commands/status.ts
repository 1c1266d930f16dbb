import { Command, Option } from "clipanion";
import { loadConfig } from "../../config/loader.js";
import { getConfigPath, getStateDir } from "../../config/paths.js";
import type { OnAirConfig } from "../../config/types.js";
import { Cron } from "croner";
import { cronPattern } from "../../broadcast/scheduler.js";

/** Earliest upcoming start across the configured weekly times. */
export function nextScheduledStart(config: OnAirConfig, from = new Date()): Date | null {
  let earliest: Date | null = null;
  for (const start of config.schedule.startTimes) {
    const job = new Cron(cronPattern(start), config.schedule.timezone ? { timezone: config.schedule.timezone } : {});
    const next = job.nextRun(from);
    job.stop();
    if (next && (!earliest || next < earliest)) earliest = next;
  }
  return earliest;
}

export class StatusCommand extends Command {
  static override paths = [["status"]];

  static override usage = Command.Usage({
    description: "Show configuration summary and the next scheduled broadcast",
    examples: [["Show status", "onair status"]],
  });

  config = Option.String("--config,-c", {
    description: "Path to config file",
    required: false,
  });

  async execute(): Promise<void> {
    const configPath = this.config ?? getConfigPath();
    const stateDir = getStateDir();

    let config: OnAirConfig;
    try {
      config = loadConfig(configPath);
    } catch (err) {
      this.context.stdout.write(`Config: INVALID (${configPath})\n`);
      this.context.stdout.write(
        `  Error: ${err instanceof Error ? err.message : String(err)}\n`,
      );
      process.exitCode = 1;
      return;
    }

    const { broadcast, llm, schedule, control, game, memory } = config;
    this.context.stdout.write(`onair status\n`);
    this.context.stdout.write(`------------\n`);
    this.context.stdout.write(`Config path: ${configPath}\n`);
    this.context.stdout.write(`State dir:   ${stateDir}\n`);
    this.context.stdout.write(`Persona:     ${config.persona.name}\n`);
    this.context.stdout.write(`LLM:         ${llm.model} @ ${llm.baseUrl}\n`);
    this.context.stdout.write(
      `Broadcast:   mode=${broadcast.mode} pause=${broadcast.minPauseSeconds}-${broadcast.maxPauseSeconds}s streaming=${broadcast.streaming ? "on" : "off"}\n`,
    );
    this.context.stdout.write(
      `Game:        ${game.enabled ? `enabled (${game.games.length} games)` : "disabled"}\n`,
    );
    this.context.stdout.write(`Memory:      window=${broadcast.memoryWindowSize} persist=${memory.persist ? "on" : "off"}\n`);
    this.context.stdout.write(
      `Control:     ${control.enabled ? `${control.hostname}:${control.port}` : "disabled"}\n`,
    );

    if (schedule.startTimes.length === 0) {
      this.context.stdout.write(`Schedule:    (no start times configured)\n`);
      return;
    }
    this.context.stdout.write(`Schedule:    ${schedule.enabled ? "enabled" : "disabled"}\n`);
    for (const start of schedule.startTimes) {
      this.context.stdout.write(`  ${start.day} ${start.time}\n`);
    }
    const next = nextScheduledStart(config);
    this.context.stdout.write(`Next start:  ${next ? next.toISOString() : "(none)"}\n`);
  }
}
