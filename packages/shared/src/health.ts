import type {
  AlertGroup,
  MaintenanceWindow,
  ServiceState,
  StatusChangeEvent,
  StatusRecord,
  UptimeStats
} from "./types";

export type FleetHealth = "healthy" | "degraded" | "failed" | "unknown";

export interface ServiceStatusView {
  serviceId: string;
  name: string;
  record: StatusRecord;
  inMaintenance: boolean;
  uptime: UptimeStats;
  /** Time spent Degraded or Down over the last 24 hours. */
  downtimeMs: number;
  /** Recent lifecycle changes, oldest first. */
  changes: StatusChangeEvent[];
  incident?: {
    attemptsUsed: number;
    phase: string;
    openedAt: number;
  };
}

export interface FleetSnapshot {
  id: string;
  overall: FleetHealth;
  services: ServiceStatusView[];
  openAlertGroups: AlertGroup[];
  activeMaintenance: MaintenanceWindow[];
  issuedAt: number;
}

export function computeOverallHealth(states: ServiceState[]): FleetHealth {
  if (states.length === 0 || states.every(state => state === "checking")) {
    return "unknown";
  }
  if (states.some(state => state === "down")) {
    return "failed";
  }
  if (states.some(state => state === "degraded")) {
    return "degraded";
  }
  return "healthy";
}

/** Counts services per lifecycle state, for status summaries. */
export function summarizeStates(states: ServiceState[]): Record<ServiceState, number> {
  const summary: Record<ServiceState, number> = {
    checking: 0,
    operational: 0,
    degraded: 0,
    down: 0
  };
  for (const state of states) {
    summary[state] += 1;
  }
  return summary;
}
