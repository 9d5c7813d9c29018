import type {
  ClassifierConfig,
  ProbeResult,
  ServiceState,
  StatusRecord,
  StatusTransition
} from "@fleetwarden/shared";

type Observation = "healthy" | "slow" | "failed";

function pushBounded(values: number[], value: number, capacity: number): number[] {
  const next = [...values, value];
  return next.length > capacity ? next.slice(next.length - capacity) : next;
}

export function createStatusRecord(now: number): StatusRecord {
  return {
    state: "checking",
    consecutiveFailures: 0,
    consecutiveSuccesses: 0,
    lastTransitionAt: now,
    latencies: []
  };
}

/**
 * Owns every service's StatusRecord and is the only place lifecycle state
 * changes. Each probe result is one observation:
 *
 * - healthy: success within `degradedLatencyMs`
 * - slow: success above the latency threshold (resets both streaks)
 * - failed: anything else
 *
 * `downAfterFailures` consecutive failures mean Down; a failure short of that
 * means Degraded, except that a Down service stays Down on any failure.
 * Operational needs `recoverFromDegradedSuccesses` healthy observations in a
 * row from Degraded, `recoverFromDownSuccesses` from Down.
 */
export class StatusClassifier {
  private readonly records = new Map<string, StatusRecord>();

  constructor(private config: ClassifierConfig) {}

  updateConfig(next: ClassifierConfig): void {
    this.config = next;
  }

  classify(results: readonly ProbeResult[]): StatusTransition[] {
    const transitions: StatusTransition[] = [];
    for (const result of results) {
      const transition = this.observe(result);
      if (transition) {
        transitions.push(transition);
      }
    }
    return transitions;
  }

  observe(result: ProbeResult): StatusTransition | null {
    const current = this.records.get(result.serviceId) ?? createStatusRecord(result.timestamp);
    const observation = this.toObservation(result);

    const consecutiveFailures = observation === "failed" ? current.consecutiveFailures + 1 : 0;
    const consecutiveSuccesses = observation === "healthy" ? current.consecutiveSuccesses + 1 : 0;
    const latencies =
      observation === "failed"
        ? current.latencies
        : pushBounded(current.latencies, result.latencyMs, this.config.latencyHistorySize);

    const nextState = this.nextState(current.state, observation, consecutiveFailures, consecutiveSuccesses);
    const changed = nextState !== current.state;

    this.records.set(result.serviceId, {
      state: nextState,
      consecutiveFailures,
      consecutiveSuccesses,
      lastTransitionAt: changed ? result.timestamp : current.lastTransitionAt,
      latencies,
      lastProbeAt: result.timestamp
    });

    if (!changed) {
      return null;
    }
    return {
      serviceId: result.serviceId,
      from: current.state,
      to: nextState,
      at: result.timestamp,
      probe: result
    };
  }

  get(serviceId: string): StatusRecord | undefined {
    return this.records.get(serviceId);
  }

  stateOf(serviceId: string): ServiceState {
    return this.records.get(serviceId)?.state ?? "checking";
  }

  /** Makes sure a record exists so the service shows up as Checking before its first probe. */
  ensure(serviceId: string, now: number): StatusRecord {
    const existing = this.records.get(serviceId);
    if (existing) {
      return existing;
    }
    const record = createStatusRecord(now);
    this.records.set(serviceId, record);
    return record;
  }

  restore(serviceId: string, record: StatusRecord): void {
    this.records.set(serviceId, {
      ...record,
      latencies: record.latencies.slice(-this.config.latencyHistorySize)
    });
  }

  forget(serviceId: string): void {
    this.records.delete(serviceId);
  }

  entries(): Array<[string, StatusRecord]> {
    return [...this.records.entries()];
  }

  private toObservation(result: ProbeResult): Observation {
    if (!result.success) {
      return "failed";
    }
    return result.latencyMs > this.config.degradedLatencyMs ? "slow" : "healthy";
  }

  private nextState(
    state: ServiceState,
    observation: Observation,
    consecutiveFailures: number,
    consecutiveSuccesses: number
  ): ServiceState {
    if (observation === "failed") {
      if (state === "down") {
        return "down";
      }
      return consecutiveFailures >= this.config.downAfterFailures ? "down" : "degraded";
    }
    if (observation === "slow") {
      return "degraded";
    }
    switch (state) {
      case "checking":
      case "operational":
        return "operational";
      case "degraded":
        return consecutiveSuccesses >= this.config.recoverFromDegradedSuccesses ? "operational" : "degraded";
      case "down":
        return consecutiveSuccesses >= this.config.recoverFromDownSuccesses ? "operational" : "down";
    }
  }
}
