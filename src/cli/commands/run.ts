import { Command, Option } from "clipanion";
import * as t from "typanion";
import { startBroadcaster, type StartMode } from "../../runtime/lifecycle.js";
import { VERSION } from "../../version.js";
import { printBanner } from "../banner.js";

export class RunCommand extends Command {
  static override paths = [["run"], Command.Default];

  static override usage = Command.Usage({
    description: "Start the broadcaster",
    examples: [
      ["Start with default config", "onair run"],
      ["Go live right away", "onair run --mode now"],
      ["Follow the weekly schedule", "onair run --mode schedule --config ./onair.config.json"],
    ],
  });

  config = Option.String("--config,-c", {
    description: "Path to config file",
    required: false,
  });

  mode = Option.String("--mode,-m", {
    description: "now: broadcast immediately; schedule: follow the weekly schedule",
    required: false,
    validator: t.isEnum<StartMode>(["now", "schedule"]),
  });

  async execute(): Promise<number> {
    printBanner(VERSION);

    try {
      await startBroadcaster({ configPath: this.config, mode: this.mode });
    } catch (err) {
      this.context.stderr.write(
        `Failed to start: ${err instanceof Error ? err.message : String(err)}\n`,
      );
      return 1;
    }
    // Runs until a signal triggers shutdown
    return new Promise<number>(() => {});
  }
}
