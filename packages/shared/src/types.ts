export type CheckType = "http" | "tcp" | "container" | "unit" | "custom";

export const CHECK_TYPES: readonly CheckType[] = ["http", "tcp", "container", "unit", "custom"];

/** A command line, either as a shell-free argv list or a whitespace-separated string. */
export type CommandSpec = string | string[];

export interface ServiceDescriptor {
  id: string;
  name?: string;
  checkType: CheckType;
  /** URL for http, host:port for tcp, container name, unit name, or command for custom. */
  target: string;
  remediation?: CommandSpec;
  maxRestartAttempts: number;
  dependsOn: string[];
  intervalMs?: number;
  timeoutMs?: number;
  expectedStatus?: number[];
  expectContent?: string;
  group?: string;
  groupRoot?: boolean;
  enabled: boolean;
}

export interface ProbeResult {
  serviceId: string;
  timestamp: number;
  success: boolean;
  latencyMs: number;
  error?: string;
  statusCode?: number;
}

export type ServiceState = "checking" | "operational" | "degraded" | "down";

export interface StatusRecord {
  state: ServiceState;
  consecutiveFailures: number;
  consecutiveSuccesses: number;
  lastTransitionAt: number;
  latencies: number[];
  lastProbeAt?: number;
}

export interface StatusTransition {
  serviceId: string;
  from: ServiceState;
  to: ServiceState;
  at: number;
  probe: ProbeResult;
  /** Root service this transition is attributed to, when part of a cascade. */
  causedBy?: string;
}

/** Running check counters for one service since monitoring began. */
export interface UptimeStats {
  totalChecks: number;
  successfulChecks: number;
  failedChecks: number;
  /** Share of checks that found the service Operational, 0 to 100. */
  uptimePercent: number;
  /** Mean latency of the checks that found the service Operational. */
  averageResponseMs: number;
  lastCheckAt?: number;
  lastState?: ServiceState;
}

export interface StatusChangeEvent {
  at: number;
  from: ServiceState;
  to: ServiceState;
  causedBy?: string;
  error?: string;
}

export type RestartOutcome =
  | "success"
  | "failure"
  | "skipped_rate_limited"
  | "skipped_maintenance";

export interface RestartAttempt {
  attempt: number;
  scheduledAt: number;
  executedAt?: number;
  outcome: RestartOutcome;
  detail?: string;
}

export interface AlertGroup {
  id: string;
  rootServiceId: string;
  memberServiceIds: string[];
  firstSeenAt: number;
  lastSeenAt: number;
  acknowledged: boolean;
  acknowledgedBy?: string;
  acknowledgedAt?: number;
  escalated: boolean;
  resolvedAt?: number;
}

export type AlertNotificationKind = "opened" | "escalated" | "rate_limited" | "resolved";

export interface AlertNotification {
  kind: AlertNotificationKind;
  group: AlertGroup;
  serviceId: string;
  at: number;
  detail?: string;
}

export type MaintenanceScope =
  | { kind: "all" }
  | { kind: "services"; serviceIds: string[] };

export interface MaintenanceWindow {
  id: string;
  scope: MaintenanceScope;
  startAt: number;
  /** `null` for an open-ended manual toggle. */
  durationMs: number | null;
  source: "manual" | "scheduled";
  reason?: string;
}
