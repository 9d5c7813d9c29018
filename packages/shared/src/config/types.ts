import type { AlertChannelConfig, LogLevel } from "../observability";
import type { CheckType, CommandSpec, MaintenanceScope } from "../types";

export interface ValidationResult {
  valid: boolean;
  errors?: string[];
}

/** A service entry as written in the configuration file. */
export interface ServiceConfig {
  id: string;
  name?: string;
  checkType: CheckType;
  target: string;
  remediation?: CommandSpec;
  maxRestartAttempts?: number;
  dependsOn?: string[];
  intervalMs?: number;
  timeoutMs?: number;
  expectedStatus?: number[];
  expectContent?: string;
  group?: string;
  groupRoot?: boolean;
  enabled?: boolean;
}

export interface ProbeConfig {
  intervalMs: number;
  tickMs: number;
  timeoutMs: number;
  concurrency: number;
  historySize: number;
}

export interface ClassifierConfig {
  downAfterFailures: number;
  degradedLatencyMs: number;
  recoverFromDegradedSuccesses: number;
  recoverFromDownSuccesses: number;
  latencyHistorySize: number;
  /** Status changes kept per service for display and downtime accounting. */
  changeHistorySize: number;
  changeRetentionMs: number;
}

export interface RecoveryConfig {
  enabled: boolean;
  backoffStagesMs: number[];
  maxRestartAttempts: number;
  verifyDelayMs: number;
  commandTimeoutMs: number;
}

export interface GovernorConfig {
  windowMs: number;
  maxRestarts: number;
}

export interface DependencyConfig {
  correlationWindowMs: number;
  rootDownIntervalMs: number;
}

export interface ScheduledMaintenanceConfig {
  startAt: string;
  durationMs: number;
  scope: MaintenanceScope;
  reason?: string;
}

export interface MaintenanceConfig {
  scheduled: ScheduledMaintenanceConfig[];
}

export interface StateConfig {
  path: string;
  fallbackPaths: string[];
}

export interface ShutdownConfig {
  drainTimeoutMs: number;
}

interface LogSinkBaseConfig {
  enabled: boolean;
  level?: LogLevel;
}

export interface ConsoleLogSinkConfig extends LogSinkBaseConfig {
  format?: "json" | "line";
  components?: string[];
}

export interface FileLogSinkConfig extends LogSinkBaseConfig {
  outputDir?: string;
  maxFileSizeMb?: number;
  maxFiles?: number;
}

export interface WebhookLogSinkConfig extends LogSinkBaseConfig {
  url?: string;
  headers?: Record<string, string>;
  batchSize?: number;
  retry?: {
    attempts: number;
    backoffMs: number;
  };
}

export interface ObservabilityLogsConfig {
  level: LogLevel;
  sinks: {
    console?: ConsoleLogSinkConfig;
    file?: FileLogSinkConfig;
    webhook?: WebhookLogSinkConfig;
  };
}

export interface ObservabilityAlertsConfig {
  enabled: boolean;
  channels: AlertChannelConfig[];
}

export interface ObservabilityConfig {
  logs: ObservabilityLogsConfig;
  alerts: ObservabilityAlertsConfig;
}

export interface ControlServerConfig {
  enabled: boolean;
  host: string;
  port: number;
  authToken?: string;
}

/** Shape of the configuration file. Everything except `services` may be omitted. */
export interface MonitorConfig {
  services: ServiceConfig[];
  probe?: Partial<ProbeConfig>;
  classifier?: Partial<ClassifierConfig>;
  recovery?: Partial<RecoveryConfig>;
  governor?: Partial<GovernorConfig>;
  dependencies?: Partial<DependencyConfig>;
  maintenance?: Partial<MaintenanceConfig>;
  state?: Partial<StateConfig>;
  shutdown?: Partial<ShutdownConfig>;
  observability?: Partial<ObservabilityConfig>;
  control?: Partial<ControlServerConfig>;
}

/** Fully defaulted settings injected into the monitor at startup. */
export interface MonitorSettings {
  probe: ProbeConfig;
  classifier: ClassifierConfig;
  recovery: RecoveryConfig;
  governor: GovernorConfig;
  dependencies: DependencyConfig;
  maintenance: MaintenanceConfig;
  state: StateConfig;
  shutdown: ShutdownConfig;
  observability: ObservabilityConfig;
  control: ControlServerConfig;
}
