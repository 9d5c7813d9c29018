import type { GovernorConfig } from "@fleetwarden/shared";

export interface GovernorDecision {
  allowed: boolean;
  /** Restarts still inside the rolling window at decision time. */
  inWindow: number;
  /** True only for the first denial of a suppression episode. */
  episodeStarted: boolean;
}

export interface GovernorServiceState {
  timestamps: number[];
  suppressed: boolean;
}

/**
 * Rolling-window restart cap per service. Timestamps older than `windowMs`
 * are pruned whenever a service is evaluated, never on fixed buckets.
 */
export class FailureRateGovernor {
  private readonly windows = new Map<string, number[]>();
  private readonly suppressed = new Set<string>();

  constructor(private config: GovernorConfig) {}

  updateConfig(next: GovernorConfig): void {
    this.config = next;
  }

  evaluate(serviceId: string, now: number): GovernorDecision {
    const inWindow = this.prune(serviceId, now).length;
    if (inWindow < this.config.maxRestarts) {
      this.suppressed.delete(serviceId);
      return { allowed: true, inWindow, episodeStarted: false };
    }
    const episodeStarted = !this.suppressed.has(serviceId);
    this.suppressed.add(serviceId);
    return { allowed: false, inWindow, episodeStarted };
  }

  /** Whether `evaluate` would allow an attempt now, without touching the episode. */
  wouldAllow(serviceId: string, now: number): boolean {
    return this.prune(serviceId, now).length < this.config.maxRestarts;
  }

  record(serviceId: string, at: number): void {
    this.windows.set(serviceId, [...(this.windows.get(serviceId) ?? []), at]);
  }

  isSuppressed(serviceId: string): boolean {
    return this.suppressed.has(serviceId);
  }

  window(serviceId: string): readonly number[] {
    return this.windows.get(serviceId) ?? [];
  }

  snapshot(serviceId: string): GovernorServiceState {
    return { timestamps: [...this.window(serviceId)], suppressed: this.suppressed.has(serviceId) };
  }

  restore(serviceId: string, state: GovernorServiceState): void {
    this.windows.set(serviceId, [...state.timestamps].sort((a, b) => a - b));
    if (state.suppressed) {
      this.suppressed.add(serviceId);
    } else {
      this.suppressed.delete(serviceId);
    }
  }

  forget(serviceId: string): void {
    this.windows.delete(serviceId);
    this.suppressed.delete(serviceId);
  }

  private prune(serviceId: string, now: number): number[] {
    const cutoff = now - this.config.windowMs;
    const kept = (this.windows.get(serviceId) ?? []).filter(at => at > cutoff);
    this.windows.set(serviceId, kept);
    return kept;
  }
}
