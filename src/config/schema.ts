import { z } from "zod";
import type { OnAirConfig } from "./types.js";

const weekdaySchema = z.enum([
  "monday",
  "tuesday",
  "wednesday",
  "thursday",
  "friday",
  "saturday",
  "sunday",
]);

const loggingSchema = z.object({
  level: z.enum(["debug", "info", "warn", "error"]).default("info"),
  file: z.string().optional(),
  json: z.boolean().optional(),
});

const llmSchema = z.object({
  baseUrl: z.string().url().default("http://localhost:11434"),
  model: z.string().min(1).default("llama3"),
  temperature: z.number().min(0).max(2).default(0.8),
  maxTokens: z.number().int().positive().default(300),
  timeoutMs: z.number().int().positive().default(60_000),
});

const personaSchema = z.object({
  name: z.string().min(1).default("Mika"),
  personality: z.string().default("friendly, playful and a little goofy"),
  speakingStyle: z.string().default("casual spoken English, short sentences"),
  interests: z.array(z.string()).default([]),
  catchphrase: z.string().default(""),
  mood: z.string().default("bright and full of energy"),
  boundaries: z.array(z.string()).default([]),
  promptFile: z.string().optional(),
});

const broadcastSchema = z.object({
  mode: z.enum(["talk", "game"]).default("talk"),
  minPauseSeconds: z.number().min(0).default(1.0),
  maxPauseSeconds: z.number().min(0).default(5.0),
  memoryWindowSize: z.number().int().positive().default(50),
  chatWindow: z.number().int().positive().default(10),
  recoveryDelaySeconds: z.number().min(0).default(5),
  streaming: z.boolean().default(false),
}).refine((b) => b.maxPauseSeconds >= b.minPauseSeconds, {
  message: "maxPauseSeconds must be >= minPauseSeconds",
  path: ["maxPauseSeconds"],
});

const memorySchema = z.object({
  persist: z.boolean().default(false),
});

const gameSchema = z.object({
  enabled: z.boolean().default(false),
  reactionKeywords: z
    .array(z.string().min(1))
    .default(["kill", "death", "win", "lose", "clear", "boss"]),
  minPauseSeconds: z.number().min(0).default(3.0),
  maxPauseSeconds: z.number().min(0).default(10.0),
  games: z.array(z.object({
    name: z.string().min(1),
    processName: z.string().optional(),
  })).default([]),
  defaultGame: z.string().optional(),
});

const scheduleSchema = z.object({
  enabled: z.boolean().default(false),
  timezone: z.string().optional(),
  startTimes: z.array(z.object({
    day: weekdaySchema,
    time: z.string().regex(/^([01]?\d|2[0-3]):[0-5]\d$/, "time must be HH:MM"),
  })).default([]),
  durationMinutes: z.object({
    min: z.number().int().positive().default(360),
    max: z.number().int().positive().default(420),
  }).default({}),
  ending: z.object({
    windDownMinutes: z.number().min(0).default(15),
    finalGoodbyeSeconds: z.number().min(0).default(30),
  }).default({}),
});

const controlSchema = z.object({
  enabled: z.boolean().default(false),
  port: z.number().int().positive().default(19890),
  hostname: z.string().default("127.0.0.1"),
});

export const onairConfigSchema = z.object({
  logging: loggingSchema.default({}),
  llm: llmSchema.default({}),
  persona: personaSchema.default({}),
  broadcast: broadcastSchema.default({}),
  memory: memorySchema.default({}),
  game: gameSchema.default({}),
  schedule: scheduleSchema.default({}),
  control: controlSchema.default({}),
});

export function parseConfig(raw: unknown): OnAirConfig {
  return onairConfigSchema.parse(raw);
}
