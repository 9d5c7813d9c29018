import type {
  ClassifierConfig,
  ProbeResult,
  ServiceState,
  StatusChangeEvent,
  StatusTransition,
  UptimeStats
} from "@fleetwarden/shared";

export type UptimeConfig = Pick<ClassifierConfig, "changeHistorySize" | "changeRetentionMs">;

export interface ServiceHistory {
  uptime: UptimeStats;
  changes: StatusChangeEvent[];
}

export const DAY_MS = 24 * 3_600_000;

export function emptyUptime(): UptimeStats {
  return { totalChecks: 0, successfulChecks: 0, failedChecks: 0, uptimePercent: 0, averageResponseMs: 0 };
}

function isFailing(state: ServiceState): boolean {
  return state === "down" || state === "degraded";
}

/**
 * Per-service check counters and the bounded log of lifecycle changes. A
 * check counts as successful when it leaves the service Operational.
 */
export class UptimeTracker {
  private readonly stats = new Map<string, UptimeStats>();
  private readonly changes = new Map<string, StatusChangeEvent[]>();

  constructor(private config: UptimeConfig) {}

  updateConfig(next: UptimeConfig): void {
    this.config = next;
  }

  record(result: ProbeResult, state: ServiceState): UptimeStats {
    const current = this.stats.get(result.serviceId) ?? emptyUptime();
    const healthy = state === "operational";
    const successfulChecks = current.successfulChecks + (healthy ? 1 : 0);
    const totalChecks = current.totalChecks + 1;
    const next: UptimeStats = {
      totalChecks,
      successfulChecks,
      failedChecks: current.failedChecks + (healthy ? 0 : 1),
      uptimePercent: (successfulChecks / totalChecks) * 100,
      averageResponseMs: healthy
        ? (current.averageResponseMs * (successfulChecks - 1) + result.latencyMs) / successfulChecks
        : current.averageResponseMs,
      lastCheckAt: result.timestamp,
      lastState: state
    };
    this.stats.set(result.serviceId, next);
    return next;
  }

  recordChange(transition: StatusTransition): void {
    const list = this.changes.get(transition.serviceId) ?? [];
    list.push({
      at: transition.at,
      from: transition.from,
      to: transition.to,
      causedBy: transition.causedBy,
      error: transition.probe.error
    });
    if (list.length > this.config.changeHistorySize) {
      list.splice(0, list.length - this.config.changeHistorySize);
    }
    this.changes.set(transition.serviceId, list);
  }

  statsOf(serviceId: string): UptimeStats {
    return { ...(this.stats.get(serviceId) ?? emptyUptime()) };
  }

  changesOf(serviceId: string): StatusChangeEvent[] {
    return (this.changes.get(serviceId) ?? []).map(event => ({ ...event }));
  }

  /** Time spent Degraded or Down within `[now - windowMs, now]`. */
  downtimeMs(serviceId: string, now: number, windowMs: number = DAY_MS): number {
    const events = this.changes.get(serviceId) ?? [];
    const windowStart = now - windowMs;
    const overlap = (start: number, end: number) =>
      Math.max(0, Math.min(end, now) - Math.max(start, windowStart));

    let failingSince: number | undefined =
      events.length > 0 && isFailing(events[0].from) ? windowStart : undefined;
    let total = 0;
    for (const event of events) {
      if (isFailing(event.to)) {
        failingSince ??= event.at;
      } else if (failingSince !== undefined) {
        total += overlap(failingSince, event.at);
        failingSince = undefined;
      }
    }
    if (failingSince !== undefined) {
      total += overlap(failingSince, now);
    }
    return total;
  }

  /** Drops changes older than the retention period. Returns how many were removed. */
  prune(now: number): number {
    const cutoff = now - this.config.changeRetentionMs;
    let removed = 0;
    for (const [serviceId, list] of this.changes) {
      const kept = list.filter(event => event.at >= cutoff);
      removed += list.length - kept.length;
      this.changes.set(serviceId, kept);
    }
    return removed;
  }

  history(serviceId: string): ServiceHistory {
    return { uptime: this.statsOf(serviceId), changes: this.changesOf(serviceId) };
  }

  restore(serviceId: string, history: ServiceHistory): void {
    this.stats.set(serviceId, { ...history.uptime });
    this.changes.set(serviceId, history.changes.slice(-this.config.changeHistorySize));
  }

  forget(serviceId: string): void {
    this.stats.delete(serviceId);
    this.changes.delete(serviceId);
  }
}
