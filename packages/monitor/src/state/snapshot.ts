import type {
  AlertGroup,
  MaintenanceScope,
  MaintenanceWindow,
  ServiceState,
  StatusChangeEvent,
  StatusRecord,
  UptimeStats
} from "@fleetwarden/shared";

export const STATE_VERSION = 1;

export interface PersistedRestartState {
  attemptsUsed: number;
  lastClosedAt?: number;
  incidentOpen: boolean;
}

export interface PersistedServiceState {
  status: StatusRecord;
  restart: PersistedRestartState;
  /** Restart timestamps still inside the governor window, ascending. */
  failureWindow: number[];
  rateLimited: boolean;
  /** When the service last went Down, while it still is. */
  downSince?: number;
  uptime: UptimeStats;
  changes: StatusChangeEvent[];
}

export interface MonitorStateSnapshot {
  version: typeof STATE_VERSION;
  savedAt: number;
  services: Record<string, PersistedServiceState>;
  alertGroups: AlertGroup[];
  maintenance: MaintenanceWindow[];
}

export function emptySnapshot(savedAt: number): MonitorStateSnapshot {
  return { version: STATE_VERSION, savedAt, services: {}, alertGroups: [], maintenance: [] };
}

type Json = Record<string, unknown>;

const SERVICE_STATES: readonly ServiceState[] = ["checking", "operational", "degraded", "down"];

function isRecord(value: unknown): value is Json {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isFiniteNumber(value: unknown): value is number {
  return typeof value === "number" && Number.isFinite(value);
}

function optionalNumber(value: unknown): number | undefined {
  return isFiniteNumber(value) ? value : undefined;
}

function optionalString(value: unknown): string | undefined {
  return typeof value === "string" ? value : undefined;
}

function numberList(value: unknown): number[] {
  return Array.isArray(value) ? value.filter(isFiniteNumber) : [];
}

function stringList(value: unknown): string[] {
  return Array.isArray(value) ? value.filter((item): item is string => typeof item === "string") : [];
}

function isServiceState(value: unknown): value is ServiceState {
  return typeof value === "string" && SERVICE_STATES.some(state => state === value);
}

function parseStatus(value: unknown): StatusRecord | null {
  if (!isRecord(value) || !isServiceState(value.state) || !isFiniteNumber(value.lastTransitionAt)) {
    return null;
  }
  return {
    state: value.state,
    consecutiveFailures: optionalNumber(value.consecutiveFailures) ?? 0,
    consecutiveSuccesses: optionalNumber(value.consecutiveSuccesses) ?? 0,
    lastTransitionAt: value.lastTransitionAt,
    latencies: numberList(value.latencies),
    lastProbeAt: optionalNumber(value.lastProbeAt)
  };
}

function parseUptime(value: unknown): UptimeStats {
  const stats = isRecord(value) ? value : {};
  return {
    totalChecks: optionalNumber(stats.totalChecks) ?? 0,
    successfulChecks: optionalNumber(stats.successfulChecks) ?? 0,
    failedChecks: optionalNumber(stats.failedChecks) ?? 0,
    uptimePercent: optionalNumber(stats.uptimePercent) ?? 0,
    averageResponseMs: optionalNumber(stats.averageResponseMs) ?? 0,
    lastCheckAt: optionalNumber(stats.lastCheckAt),
    lastState: isServiceState(stats.lastState) ? stats.lastState : undefined
  };
}

function parseChange(value: unknown): StatusChangeEvent | null {
  if (!isRecord(value) || !isFiniteNumber(value.at) || !isServiceState(value.from) || !isServiceState(value.to)) {
    return null;
  }
  return {
    at: value.at,
    from: value.from,
    to: value.to,
    causedBy: optionalString(value.causedBy),
    error: optionalString(value.error)
  };
}

function parseService(value: unknown): PersistedServiceState | null {
  if (!isRecord(value)) {
    return null;
  }
  const status = parseStatus(value.status);
  if (!status) {
    return null;
  }
  const restart = isRecord(value.restart) ? value.restart : {};
  return {
    status,
    restart: {
      attemptsUsed: optionalNumber(restart.attemptsUsed) ?? 0,
      lastClosedAt: optionalNumber(restart.lastClosedAt),
      incidentOpen: restart.incidentOpen === true
    },
    failureWindow: numberList(value.failureWindow).sort((a, b) => a - b),
    rateLimited: value.rateLimited === true,
    downSince: optionalNumber(value.downSince),
    uptime: parseUptime(value.uptime),
    changes: Array.isArray(value.changes) ? compact(value.changes.map(parseChange)) : []
  };
}

function parseAlertGroup(value: unknown): AlertGroup | null {
  if (
    !isRecord(value) ||
    typeof value.id !== "string" ||
    typeof value.rootServiceId !== "string" ||
    !isFiniteNumber(value.firstSeenAt) ||
    !isFiniteNumber(value.lastSeenAt)
  ) {
    return null;
  }
  return {
    id: value.id,
    rootServiceId: value.rootServiceId,
    memberServiceIds: stringList(value.memberServiceIds),
    firstSeenAt: value.firstSeenAt,
    lastSeenAt: value.lastSeenAt,
    acknowledged: value.acknowledged === true,
    acknowledgedBy: optionalString(value.acknowledgedBy),
    acknowledgedAt: optionalNumber(value.acknowledgedAt),
    escalated: value.escalated === true,
    resolvedAt: optionalNumber(value.resolvedAt)
  };
}

function parseScope(value: unknown): MaintenanceScope | null {
  if (!isRecord(value)) {
    return null;
  }
  if (value.kind === "all") {
    return { kind: "all" };
  }
  if (value.kind === "services") {
    return { kind: "services", serviceIds: stringList(value.serviceIds) };
  }
  return null;
}

function parseWindow(value: unknown): MaintenanceWindow | null {
  if (!isRecord(value) || typeof value.id !== "string" || !isFiniteNumber(value.startAt)) {
    return null;
  }
  const scope = parseScope(value.scope);
  if (!scope) {
    return null;
  }
  return {
    id: value.id,
    scope,
    startAt: value.startAt,
    durationMs: isFiniteNumber(value.durationMs) ? value.durationMs : null,
    source: value.source === "scheduled" ? "scheduled" : "manual",
    reason: optionalString(value.reason)
  };
}

function compact<T>(values: Array<T | null>): T[] {
  return values.filter((value): value is T => value !== null);
}

/**
 * Reads a persisted snapshot. Returns null when the document is not a
 * version 1 snapshot; unknown fields are ignored and malformed entries dropped.
 */
export function parseSnapshot(raw: unknown): MonitorStateSnapshot | null {
  if (!isRecord(raw) || raw.version !== STATE_VERSION) {
    return null;
  }
  const services: Record<string, PersistedServiceState> = {};
  if (isRecord(raw.services)) {
    for (const [serviceId, value] of Object.entries(raw.services)) {
      const parsed = parseService(value);
      if (parsed) {
        services[serviceId] = parsed;
      }
    }
  }
  return {
    version: STATE_VERSION,
    savedAt: optionalNumber(raw.savedAt) ?? 0,
    services,
    alertGroups: Array.isArray(raw.alertGroups) ? compact(raw.alertGroups.map(parseAlertGroup)) : [],
    maintenance: Array.isArray(raw.maintenance) ? compact(raw.maintenance.map(parseWindow)) : []
  };
}
