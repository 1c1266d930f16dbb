import { existsSync, readFileSync } from "node:fs";
import type { PersonaConfig } from "../config/types.js";
import type { Logger } from "../logging/logger.js";

export interface PersonaProvider {
  readonly name: string;
  buildSystemPrompt(): string;
}

const PLACEHOLDER = /\{(\w+)\}/g;

/** Fills `{name}`-style placeholders; unknown ones are left as written. */
export function renderTemplate(template: string, values: Readonly<Record<string, string>>): string {
  return template.replace(PLACEHOLDER, (match, key: string) => values[key] ?? match);
}

export class Persona implements PersonaProvider {
  constructor(
    private readonly config: PersonaConfig,
    private readonly logger: Logger,
  ) {}

  get name(): string {
    return this.config.name;
  }

  /** Re-reads the template on every call so edits apply without a restart. */
  buildSystemPrompt(): string {
    const path = this.config.promptFile;
    if (!path) return this.fallbackPrompt();

    if (!existsSync(path)) {
      this.logger.warn({ path }, "Persona prompt template not found, using built-in prompt");
      return this.fallbackPrompt();
    }

    let template: string;
    try {
      template = readFileSync(path, "utf-8");
    } catch (err) {
      this.logger.warn({ err, path }, "Persona prompt template unreadable, using built-in prompt");
      return this.fallbackPrompt();
    }
    return renderTemplate(template, this.placeholders());
  }

  placeholders(): Record<string, string> {
    const { interests, boundaries } = this.config;
    return {
      name: this.config.name,
      personality: this.config.personality,
      speakingStyle: this.config.speakingStyle,
      interests: interests.length > 0 ? interests.join(", ") : "all sorts of things",
      catchphrase: this.config.catchphrase,
      mood: this.config.mood,
      boundaries: boundaries.length > 0 ? boundaries.map((b) => `- ${b}`).join("\n") : "- none",
    };
  }

  private fallbackPrompt(): string {
    return (
      `You are ${this.config.name}, the host of a live stream. ` +
      `Personality: ${this.config.personality}. ` +
      `Speaking style: ${this.config.speakingStyle}. ` +
      "Talk with your viewers naturally, the way people speak out loud."
    );
  }
}
