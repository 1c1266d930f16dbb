import type { Logger } from "../logging/logger.js";
import type { PromptMessage } from "../memory/types.js";
import type { PersonaProvider } from "../persona/persona.js";
import type { ContextSnapshot } from "../perception/types.js";
import type { Action } from "./actions.js";
import type { ChatMessage, GenerationBackend } from "./llm-client.js";
import { buildUserContent, FALLBACK_SPEECH, modeGuidance } from "./prompts.js";

/** The part of conversation memory speech generation reads. */
export interface PromptHistory {
  toPromptMessages(): readonly PromptMessage[];
}

export interface SamplingOptions {
  readonly temperature: number;
  readonly maxTokens: number;
}

export interface SpeechGeneratorDeps {
  readonly persona: PersonaProvider;
  readonly backend: GenerationBackend;
  readonly logger: Logger;
  readonly sampling?: SamplingOptions;
}

export function fallbackSpeech(action: Action): string {
  return FALLBACK_SPEECH[action.kind];
}

/**
 * Turns a decided action into words. Backend trouble never escapes: the
 * caller gets the kind's fallback line instead.
 */
export class SpeechGenerator {
  constructor(private readonly deps: SpeechGeneratorDeps) {}

  buildMessages(action: Action, snapshot: ContextSnapshot, memory: PromptHistory): ChatMessage[] {
    const system = `${this.deps.persona.buildSystemPrompt()}\n\n${modeGuidance(snapshot)}`;
    return [
      { role: "system", content: system },
      ...memory.toPromptMessages(),
      { role: "user", content: buildUserContent(action, snapshot) },
    ];
  }

  async generate(
    action: Action,
    snapshot: ContextSnapshot,
    memory: PromptHistory,
    signal?: AbortSignal,
  ): Promise<string> {
    if (action.kind === "silence") return "";

    const result = await this.deps.backend.complete({
      messages: this.buildMessages(action, snapshot, memory),
      ...this.deps.sampling,
      signal,
    });
    if (result.ok) {
      this.deps.logger.debug({ kind: action.kind, preview: result.text.slice(0, 80) }, "Speech generated");
      return result.text;
    }

    this.deps.logger.warn({ kind: action.kind, reason: result.reason }, "Speech generation failed, using fallback");
    return fallbackSpeech(action);
  }

  /** Yields text chunks as they arrive; a failure yields one fallback chunk and ends the stream. */
  async *stream(
    action: Action,
    snapshot: ContextSnapshot,
    memory: PromptHistory,
    signal?: AbortSignal,
  ): AsyncGenerator<string> {
    if (action.kind === "silence") return;

    const request = {
      messages: this.buildMessages(action, snapshot, memory),
      ...this.deps.sampling,
      signal,
    };

    let failure: string | null = null;
    try {
      for await (const event of this.deps.backend.stream(request)) {
        if (event.type === "error") {
          failure = event.reason;
          break;
        }
        yield event.text;
      }
    } catch (err) {
      failure = err instanceof Error ? err.message : String(err);
    }

    if (failure !== null) {
      this.deps.logger.warn({ kind: action.kind, reason: failure }, "Speech stream failed, using fallback");
      yield fallbackSpeech(action);
    }
  }
}
