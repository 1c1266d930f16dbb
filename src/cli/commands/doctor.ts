import { Command, Option } from "clipanion";
import { accessSync, constants, existsSync, mkdirSync } from "node:fs";
import { OllamaClient } from "../../brain/llm-client.js";
import { loadConfig } from "../../config/loader.js";
import { getConfigPath, getStateDir } from "../../config/paths.js";
import type { OnAirConfig } from "../../config/types.js";
import { createLogger } from "../../logging/logger.js";

export class DoctorCommand extends Command {
  static override paths = [["doctor"]];

  static override usage = Command.Usage({
    description: "Run diagnostic checks on the onair configuration and environment",
    examples: [["Run diagnostics", "onair doctor"]],
  });

  config = Option.String("--config,-c", {
    description: "Path to config file",
    required: false,
  });

  async execute(): Promise<void> {
    this.context.stdout.write("onair doctor\n");
    this.context.stdout.write("============\n\n");

    let allPassed = true;

    // Check 1: Config valid
    const configPath = this.config ?? getConfigPath();
    let config: OnAirConfig | null = null;
    try {
      config = loadConfig(configPath);
      this.context.stdout.write(`[PASS] Config valid (${configPath})\n`);
    } catch (err) {
      this.context.stdout.write(
        `[FAIL] Config invalid (${configPath}): ${err instanceof Error ? err.message : String(err)}\n`,
      );
      allPassed = false;
    }

    // Check 2: State dir exists and writable
    const stateDir = getStateDir();
    try {
      mkdirSync(stateDir, { recursive: true });
      accessSync(stateDir, constants.W_OK);
      this.context.stdout.write(`[PASS] State dir writable (${stateDir})\n`);
    } catch (err) {
      this.context.stdout.write(
        `[FAIL] State dir not writable (${stateDir}): ${err instanceof Error ? err.message : String(err)}\n`,
      );
      allPassed = false;
    }

    if (config) {
      // Check 3: LLM server reachable and model installed
      const client = new OllamaClient(config.llm, createLogger({ level: "error", json: true }));
      const check = await client.checkModel();
      if (check.ok) {
        this.context.stdout.write(`[PASS] Model "${config.llm.model}" available (${config.llm.baseUrl})\n`);
      } else {
        this.context.stdout.write(`[FAIL] LLM not ready (${config.llm.baseUrl}): ${check.error ?? "unknown error"}\n`);
        if (check.models && check.models.length > 0) {
          this.context.stdout.write(`       Installed: ${check.models.join(", ")}\n`);
        }
        allPassed = false;
      }

      // Check 4: Persona template
      const promptFile = config.persona.promptFile;
      if (!promptFile) {
        this.context.stdout.write(`[PASS] Persona uses the built-in prompt\n`);
      } else if (existsSync(promptFile)) {
        this.context.stdout.write(`[PASS] Persona template found (${promptFile})\n`);
      } else {
        this.context.stdout.write(`[FAIL] Persona template missing (${promptFile})\n`);
        allPassed = false;
      }

      // Check 5: Schedule
      if (config.schedule.enabled && config.schedule.startTimes.length === 0) {
        this.context.stdout.write(`[FAIL] Schedule enabled but no start times configured\n`);
        allPassed = false;
      } else if (config.schedule.enabled) {
        this.context.stdout.write(
          `[PASS] Schedule configured (${config.schedule.startTimes.length} weekly starts)\n`,
        );
      }
    }

    this.context.stdout.write("\n");
    if (allPassed) {
      this.context.stdout.write("All checks passed.\n");
    } else {
      this.context.stdout.write("Some checks failed.\n");
      process.exitCode = 1;
    }
  }
}
