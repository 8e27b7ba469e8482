export type ChatKind = "direct" | "group";
export type GifRate = "off" | "low" | "medium" | "high";

export interface BotConfig {
  readonly timezone: string;
  readonly tone: string;
  readonly gifRate: GifRate;
  readonly gifFolder: string;
  readonly proactive: ProactiveConfig;
  readonly quietHours: QuietHoursConfig[];
  readonly groups: GroupsConfig;
  readonly security: SecurityConfig;
  readonly runtime: RuntimeConfig;
  readonly connector: ConnectorConfig;
  readonly memory: MemoryConfig;
  readonly llm: LlmConfig;
  readonly logging: LoggingConfig;
}

export interface ProactiveConfig {
  readonly enabled: boolean;
  readonly maxPerDay: number;
  readonly cooldownHours: number;
  /** Plans proposed below this confidence are dropped. */
  readonly minConfidence: number;
  readonly maxPendingPerChat: number;
}

/** Local time-of-day bounds, "HH:MM" or "HH:MM:SS". start > end wraps midnight. */
export interface QuietHoursConfig {
  readonly start: string;
  readonly end: string;
}

export interface GroupsConfig {
  readonly allowProactive: boolean;
  readonly replyOnlyWhenMentioned: boolean;
}

export interface SecurityConfig {
  readonly sharedSecret: string;
}

export interface RuntimeConfig {
  readonly host: string;
  readonly port: number;
  readonly schedulerIntervalSeconds: number;
  readonly dbPath?: string;
}

export type ConnectorConfig = StubConnectorConfig | HttpConnectorConfig;

export interface StubConnectorConfig {
  readonly type: "stub";
}

export interface HttpConnectorConfig {
  readonly type: "http";
  readonly url: string;
  readonly token?: string;
  readonly timeoutMs: number;
}

export interface MemoryConfig {
  readonly recentMessages: number;
  readonly summaryMaxChars: number;
}

export interface LlmConfig {
  readonly baseUrl?: string;
  readonly apiKey?: string;
  readonly model?: string;
  readonly timeoutMs: number;
  readonly temperature: number;
}

export interface LoggingConfig {
  readonly level: "debug" | "info" | "warn" | "error";
  readonly file?: string;
  readonly json?: boolean;
}
