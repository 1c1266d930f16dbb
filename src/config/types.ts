export type BroadcastMode = "talk" | "game";

export type Weekday =
  | "monday"
  | "tuesday"
  | "wednesday"
  | "thursday"
  | "friday"
  | "saturday"
  | "sunday";

export interface OnAirConfig {
  readonly logging: LoggingConfig;
  readonly llm: LlmConfig;
  readonly persona: PersonaConfig;
  readonly broadcast: BroadcastConfig;
  readonly memory: MemoryConfig;
  readonly game: GameConfig;
  readonly schedule: ScheduleConfig;
  readonly control: ControlConfig;
}

export interface LoggingConfig {
  readonly level: "debug" | "info" | "warn" | "error";
  readonly file?: string;
  readonly json?: boolean;
}

export interface LlmConfig {
  /** Base URL of the Ollama-compatible chat server. */
  readonly baseUrl: string;
  readonly model: string;
  readonly temperature: number;
  readonly maxTokens: number;
  /** Hard upper bound for a single generation call. */
  readonly timeoutMs: number;
}

export interface PersonaConfig {
  readonly name: string;
  readonly personality: string;
  readonly speakingStyle: string;
  readonly interests: readonly string[];
  readonly catchphrase: string;
  readonly mood: string;
  readonly boundaries: readonly string[];
  /** Optional system prompt template with {name}-style placeholders. */
  readonly promptFile?: string;
}

export interface BroadcastConfig {
  readonly mode: BroadcastMode;
  readonly minPauseSeconds: number;
  readonly maxPauseSeconds: number;
  readonly memoryWindowSize: number;
  /** How many of the newest chat lines go into one snapshot. */
  readonly chatWindow: number;
  readonly recoveryDelaySeconds: number;
  /** Stream generated tokens to the playback sink instead of waiting for the full text. */
  readonly streaming: boolean;
}

export interface MemoryConfig {
  readonly persist: boolean;
}

export interface GameDefinition {
  readonly name: string;
  readonly processName?: string;
}

export interface GameConfig {
  readonly enabled: boolean;
  readonly reactionKeywords: readonly string[];
  readonly minPauseSeconds: number;
  readonly maxPauseSeconds: number;
  readonly games: readonly GameDefinition[];
  readonly defaultGame?: string;
}

export interface ScheduleStartTime {
  readonly day: Weekday;
  /** Local time, HH:MM. */
  readonly time: string;
}

export interface EndingConfig {
  readonly windDownMinutes: number;
  readonly finalGoodbyeSeconds: number;
}

export interface ScheduleConfig {
  readonly enabled: boolean;
  /** IANA timezone name; host timezone when omitted. */
  readonly timezone?: string;
  readonly startTimes: readonly ScheduleStartTime[];
  readonly durationMinutes: {
    readonly min: number;
    readonly max: number;
  };
  readonly ending: EndingConfig;
}

export interface ControlConfig {
  readonly enabled: boolean;
  readonly port: number;
  readonly hostname: string;
}
