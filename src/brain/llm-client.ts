import { z } from "zod";
import type { LlmConfig } from "../config/types.js";
import type { Logger } from "../logging/logger.js";

export interface ChatMessage {
  readonly role: "system" | "user" | "assistant";
  readonly content: string;
}

export interface GenerationRequest {
  readonly messages: readonly ChatMessage[];
  readonly temperature?: number;
  readonly maxTokens?: number;
  readonly signal?: AbortSignal;
}

export type GenerationResult =
  | { readonly ok: true; readonly text: string }
  | { readonly ok: false; readonly reason: string };

export type StreamEvent =
  | { readonly type: "chunk"; readonly text: string }
  | { readonly type: "error"; readonly reason: string };

export interface ModelCheck {
  readonly ok: boolean;
  readonly models?: readonly string[];
  readonly error?: string;
}

/** Anything that turns a chat transcript into text. Failures are values, not throws. */
export interface GenerationBackend {
  complete(request: GenerationRequest): Promise<GenerationResult>;
  stream(request: GenerationRequest): AsyncIterable<StreamEvent>;
}

const chatResponseSchema = z.object({
  message: z.object({ content: z.string() }),
});

const streamLineSchema = z.object({
  message: z.object({ content: z.string() }).optional(),
  done: z.boolean().default(false),
  error: z.string().optional(),
});

const tagsSchema = z.object({
  models: z.array(z.object({ name: z.string() })).default([]),
});

const TAGS_TIMEOUT_MS = 5_000;

function baseModelName(name: string): string {
  return name.split(":")[0];
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

interface RequestSignals {
  readonly signal: AbortSignal;
  readonly timeout: AbortSignal;
  readonly local: AbortController;
}

/** Client for an Ollama-compatible `/api/chat` server. */
export class OllamaClient implements GenerationBackend {
  private readonly baseUrl: string;

  constructor(
    private readonly config: LlmConfig,
    private readonly logger: Logger,
  ) {
    this.baseUrl = config.baseUrl.replace(/\/+$/, "");
  }

  get model(): string {
    return this.config.model;
  }

  async complete(request: GenerationRequest): Promise<GenerationResult> {
    const signals = this.signalsFor(request.signal);
    try {
      const res = await this.postChat(request, false, signals.signal);
      if (!res.ok) {
        return { ok: false, reason: `HTTP ${res.status}: ${await res.text()}` };
      }
      const parsed = chatResponseSchema.safeParse(await res.json());
      if (!parsed.success) {
        return { ok: false, reason: "Malformed chat response" };
      }
      const text = parsed.data.message.content.trim();
      this.logger.debug({ length: text.length }, "Chat completion received");
      return { ok: true, text };
    } catch (err) {
      return { ok: false, reason: this.describeFailure(err, signals, request.signal) };
    } finally {
      signals.local.abort();
    }
  }

  /**
   * Streams NDJSON chunks. Breaking out of the iteration cancels the
   * response body and aborts the request.
   */
  async *stream(request: GenerationRequest): AsyncGenerator<StreamEvent> {
    const signals = this.signalsFor(request.signal);
    try {
      const res = await this.postChat(request, true, signals.signal);
      if (!res.ok || !res.body) {
        yield { type: "error", reason: `HTTP ${res.status}` };
        return;
      }

      const decoder = new TextDecoder();
      let buffer = "";
      for await (const bytes of res.body) {
        buffer += decoder.decode(bytes, { stream: true });
        let newline = buffer.indexOf("\n");
        while (newline >= 0) {
          const line = buffer.slice(0, newline).trim();
          buffer = buffer.slice(newline + 1);
          newline = buffer.indexOf("\n");
          if (!line) continue;

          const event = this.parseStreamLine(line);
          if (event === "done") return;
          if (event) {
            yield event;
            if (event.type === "error") return;
          }
        }
      }

      const tail = (buffer + decoder.decode()).trim();
      if (tail) {
        const event = this.parseStreamLine(tail);
        if (event && event !== "done") yield event;
      }
    } catch (err) {
      yield { type: "error", reason: this.describeFailure(err, signals, request.signal) };
    } finally {
      signals.local.abort();
    }
  }

  /** Lists installed models and reports whether the configured one is among them. */
  async checkModel(): Promise<ModelCheck> {
    try {
      const res = await fetch(`${this.baseUrl}/api/tags`, {
        signal: AbortSignal.timeout(TAGS_TIMEOUT_MS),
      });
      if (!res.ok) {
        return { ok: false, error: `HTTP ${res.status}` };
      }
      const parsed = tagsSchema.safeParse(await res.json());
      if (!parsed.success) {
        return { ok: false, error: "Malformed model list" };
      }
      const models = parsed.data.models.map((m) => m.name);
      const wanted = baseModelName(this.config.model);
      if (!models.some((name) => baseModelName(name) === wanted)) {
        return { ok: false, models, error: `Model "${this.config.model}" is not installed` };
      }
      return { ok: true, models };
    } catch (err) {
      return { ok: false, error: errorMessage(err) };
    }
  }

  private signalsFor(external?: AbortSignal): RequestSignals {
    const local = new AbortController();
    const timeout = AbortSignal.timeout(this.config.timeoutMs);
    const sources = external ? [local.signal, timeout, external] : [local.signal, timeout];
    return { signal: AbortSignal.any(sources), timeout, local };
  }

  private postChat(request: GenerationRequest, stream: boolean, signal: AbortSignal): Promise<Response> {
    this.logger.debug(
      { model: this.config.model, messages: request.messages.length, stream },
      "Sending chat request",
    );
    return fetch(`${this.baseUrl}/api/chat`, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify({
        model: this.config.model,
        messages: request.messages,
        stream,
        options: {
          temperature: request.temperature ?? this.config.temperature,
          num_predict: request.maxTokens ?? this.config.maxTokens,
        },
      }),
      signal,
    });
  }

  private parseStreamLine(line: string): StreamEvent | "done" | null {
    let raw: unknown;
    try {
      raw = JSON.parse(line);
    } catch {
      return { type: "error", reason: "Malformed stream line" };
    }
    const parsed = streamLineSchema.safeParse(raw);
    if (!parsed.success) return { type: "error", reason: "Malformed stream line" };
    if (parsed.data.error) return { type: "error", reason: parsed.data.error };
    if (parsed.data.done) return "done";
    const text = parsed.data.message?.content ?? "";
    return text ? { type: "chunk", text } : null;
  }

  private describeFailure(err: unknown, signals: RequestSignals, external?: AbortSignal): string {
    if (external?.aborted) return "aborted";
    if (signals.timeout.aborted) return `timed out after ${this.config.timeoutMs}ms`;
    return errorMessage(err);
  }
}
