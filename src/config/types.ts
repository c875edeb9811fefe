export type SafetyFailMode = "open" | "closed";

export interface AgentConfig {
  readonly identity: IdentityConfig;
  readonly constitution: ConstitutionConfig;
  readonly oracle: OracleConfig;
  readonly platform: PlatformConfig;
  readonly heartbeat: HeartbeatConfig;
  readonly consolidation: ConsolidationConfig;
  readonly reflection: ReflectionConfig;
  readonly safety: SafetyConfig;
  readonly operator: OperatorConfig;
  readonly worker: WorkerConfig;
  readonly gateway: GatewayConfig;
  readonly logging: LoggingConfig;
}

export interface IdentityConfig {
  readonly name?: string;
  readonly description: string;
  readonly tone: string;
  readonly length: string;
}

export interface ConstitutionConfig {
  readonly values: string[];
  readonly safetyRules: string[];
  readonly trustBoundary: string;
  readonly performance: string[];
}

export interface OracleProviderConfig {
  readonly name: string;
  readonly baseUrl: string;
  readonly apiKey?: string;
  readonly model: string;
  readonly timeoutMs: number;
}

export interface OracleConfig {
  readonly providers: OracleProviderConfig[];
  readonly maxAttempts: number;
}

export interface PlatformConfig {
  readonly baseUrl: string;
  readonly apiKey?: string;
  readonly postCooldownSec: number;
  readonly commentCooldownSec: number;
  readonly maxCommentsPerDay: number;
  readonly timeoutMs: number;
}

export interface HeartbeatConfig {
  readonly minIntervalSec: number;
  readonly maxIntervalSec: number;
  readonly maxRepliesPerTick: number;
  readonly ownPostWindowHours: number;
  readonly feedLimit: number;
}

export interface ConsolidationConfig {
  readonly schedule: string;
  readonly compressionAgeHours: number;
  readonly compressionImportanceThreshold: number;
  readonly insightFloor: number;
  readonly insightStaleDays: number;
  readonly insightDecay: number;
  /** Agent events older than this are deleted, delivered or not. */
  readonly eventRetentionDays: number;
}

export interface ReflectionConfig {
  readonly everyHeartbeats: number;
  readonly zeroEngagementAfterHours: number;
}

export interface SafetyConfig {
  readonly failMode: SafetyFailMode;
}

export interface OperatorConfig {
  readonly enabled: boolean;
  readonly token?: string;
  readonly ownerId?: number;
  readonly pollIntervalMs: number;
}

export interface WorkerConfig {
  readonly pollIntervalMs: number;
}

export interface GatewayConfig {
  readonly enabled: boolean;
  readonly port: number;
  readonly hostname: string;
}

export interface LoggingConfig {
  readonly level: "debug" | "info" | "warn" | "error";
  readonly file?: string;
  readonly json?: boolean;
}
