import {
  LogLevel,
  type ProbeResult,
  type RecoveryConfig,
  type RestartAttempt,
  type ServiceDescriptor,
  type ServiceState,
  type StatusTransition
} from "@fleetwarden/shared";
import type { ComponentLogger } from "@fleetwarden/logger";
import type { KeyedMutex } from "../concurrency/keyedMutex";
import { describeError } from "../errors";
import type { MaintenanceWindowManager } from "../maintenance/windowManager";
import { backoffDelay, cooldownPeriod } from "./backoff";
import type { RemediationExecutor } from "./executor";
import type { FailureRateGovernor, GovernorDecision } from "./governor";

/**
 * - backoff: waiting for the next attempt
 * - verifying: attempts exhausted, waiting for the final re-probe
 * - parked: denied by maintenance or the rate cap, resumed by a later tick
 * - escalated: manual intervention required, no more automatic attempts
 * - unmanaged: no remediation command, or recovery disabled
 */
export type IncidentPhase = "backoff" | "verifying" | "parked" | "escalated" | "unmanaged";

export type ParkReason = "maintenance" | "rate_limited";

export interface Incident {
  serviceId: string;
  openedAt: number;
  phase: IncidentPhase;
  attempts: RestartAttempt[];
  parkedReason?: ParkReason;
  nextAttemptAt?: number;
}

export interface RestartCounter {
  attemptsUsed: number;
  lastClosedAt?: number;
}

export interface ReprobeOutcome {
  result: ProbeResult;
  state: ServiceState;
}

export interface RecoveryHooks {
  /** Probes the service out of band and feeds the result through the classifier. */
  reprobe(serviceId: string): Promise<ReprobeOutcome>;
  onEscalated(serviceId: string, incident: Incident, at: number): void;
  onRateLimited(serviceId: string, decision: GovernorDecision, at: number): void;
  onChange(): void;
}

export interface RecoveryControllerOptions {
  recovery: RecoveryConfig;
  governor: FailureRateGovernor;
  maintenance: Pick<MaintenanceWindowManager, "isActive">;
  executor: RemediationExecutor;
  mutex: KeyedMutex;
  logger: ComponentLogger;
  hooks: RecoveryHooks;
  lookup: (serviceId: string) => ServiceDescriptor | undefined;
  clock?: () => number;
}

/**
 * Drives automatic remediation for services that went Down.
 *
 * An incident opens on a transition into Down and closes on Operational.
 * Attempt N waits `backoffStagesMs[N-1]`, re-probes, and only issues the
 * command when the service is still failing. After the last permitted attempt
 * the controller waits `verifyDelayMs`, re-probes once more and escalates if
 * the service is still Down. The attempt counter survives the incident and
 * only resets when a new incident starts at least the last backoff stage
 * after the previous one closed.
 *
 * Timer work for a service runs under that service's mutex, so it never
 * interleaves with a tick classifying the same service.
 */
export class RecoveryController {
  private readonly incidents = new Map<string, Incident>();
  private readonly counters = new Map<string, RestartCounter>();
  private readonly timers = new Map<string, NodeJS.Timeout>();
  private readonly pending = new Set<Promise<void>>();
  private readonly clock: () => number;
  private config: RecoveryConfig;
  private stopping = false;

  constructor(private readonly options: RecoveryControllerOptions) {
    this.clock = options.clock ?? Date.now;
    this.config = options.recovery;
  }

  updateConfig(next: RecoveryConfig): void {
    this.config = next;
  }

  onTransition(transition: StatusTransition): void {
    if (transition.to === "down" && transition.from !== "down") {
      this.open(transition.serviceId, transition.at, false);
    } else if (transition.to === "operational") {
      this.close(transition.serviceId, transition.at);
    }
  }

  /**
   * Re-opens an incident for a service restored as Down. The counter is kept
   * as persisted, and an exhausted counter goes straight to escalated without
   * a second notification.
   */
  resume(serviceId: string, at: number): void {
    this.open(serviceId, at, true);
  }

  /** Re-arms parked incidents whose denial no longer applies. */
  resumeParked(now: number): void {
    for (const incident of this.incidents.values()) {
      if (incident.phase !== "parked") {
        continue;
      }
      const cleared =
        incident.parkedReason === "maintenance"
          ? !this.options.maintenance.isActive(incident.serviceId, now)
          : this.options.governor.wouldAllow(incident.serviceId, now);
      if (!cleared) {
        continue;
      }
      this.options.logger.log(LogLevel.INFO, "remediation_resumed", {
        serviceId: incident.serviceId,
        reason: incident.parkedReason
      });
      incident.parkedReason = undefined;
      this.arm(incident, 0, now);
    }
  }

  incidentOf(serviceId: string): Incident | undefined {
    return this.incidents.get(serviceId);
  }

  openIncidents(): Incident[] {
    return [...this.incidents.values()];
  }

  counterOf(serviceId: string): RestartCounter {
    const counter = this.counters.get(serviceId);
    return counter ? { ...counter } : { attemptsUsed: 0 };
  }

  restoreCounter(serviceId: string, counter: RestartCounter): void {
    this.counters.set(serviceId, { ...counter });
  }

  forget(serviceId: string): void {
    this.clearTimer(serviceId);
    this.incidents.delete(serviceId);
    this.counters.delete(serviceId);
  }

  /**
   * Stops arming and firing timers, then waits for remediation steps already
   * running. Resolves false when they did not finish within `timeoutMs`.
   */
  async drain(timeoutMs: number): Promise<boolean> {
    this.stopping = true;
    for (const serviceId of [...this.timers.keys()]) {
      this.clearTimer(serviceId);
    }
    if (this.pending.size === 0) {
      return true;
    }
    let timer: NodeJS.Timeout | undefined;
    const expired = new Promise<false>(resolve => {
      timer = setTimeout(() => resolve(false), timeoutMs);
    });
    const settled = Promise.allSettled([...this.pending]).then(() => true);
    try {
      const drained = await Promise.race([settled, expired]);
      if (!drained) {
        this.options.logger.log(LogLevel.WARN, "remediation_abandoned", { pending: this.pending.size });
      }
      return drained;
    } finally {
      clearTimeout(timer);
    }
  }

  private open(serviceId: string, at: number, resumed: boolean): void {
    if (this.incidents.has(serviceId)) {
      return;
    }
    const service = this.options.lookup(serviceId);
    if (!service) {
      return;
    }
    const counter = this.counterFor(serviceId);
    if (
      !resumed &&
      counter.lastClosedAt !== undefined &&
      at - counter.lastClosedAt >= cooldownPeriod(this.config.backoffStagesMs)
    ) {
      counter.attemptsUsed = 0;
    }

    const incident: Incident = { serviceId, openedAt: at, phase: "backoff", attempts: [] };
    this.incidents.set(serviceId, incident);
    this.options.logger.log(LogLevel.INFO, "incident_opened", {
      serviceId,
      attemptsUsed: counter.attemptsUsed,
      resumed
    });

    if (!this.config.enabled || !service.remediation) {
      incident.phase = "unmanaged";
    } else if (this.options.maintenance.isActive(serviceId, at)) {
      this.park(incident, "maintenance", at, at);
    } else if (counter.attemptsUsed >= service.maxRestartAttempts) {
      if (resumed) {
        incident.phase = "escalated";
      } else {
        this.escalate(incident, at);
      }
    } else {
      this.arm(incident, backoffDelay(this.config.backoffStagesMs, counter.attemptsUsed + 1), at);
    }
    this.options.hooks.onChange();
  }

  private close(serviceId: string, at: number): void {
    const incident = this.incidents.get(serviceId);
    if (!incident) {
      return;
    }
    this.clearTimer(serviceId);
    this.incidents.delete(serviceId);
    this.counterFor(serviceId).lastClosedAt = at;
    this.options.logger.log(LogLevel.INFO, "incident_closed", {
      serviceId,
      attempts: incident.attempts.length,
      durationMs: at - incident.openedAt
    });
    this.options.hooks.onChange();
  }

  private arm(incident: Incident, delayMs: number, now: number): void {
    if (this.stopping) {
      return;
    }
    this.clearTimer(incident.serviceId);
    const service = this.options.lookup(incident.serviceId);
    const exhausted =
      service !== undefined && this.counterFor(incident.serviceId).attemptsUsed >= service.maxRestartAttempts;
    incident.phase = exhausted ? "verifying" : "backoff";
    incident.nextAttemptAt = now + delayMs;

    const serviceId = incident.serviceId;
    const handle = setTimeout(() => {
      this.timers.delete(serviceId);
      const task: Promise<void> = this.fire(serviceId).finally(() => {
        this.pending.delete(task);
      });
      this.pending.add(task);
    }, delayMs);
    this.timers.set(serviceId, handle);
    this.options.logger.log(LogLevel.DEBUG, "remediation_scheduled", {
      serviceId,
      phase: incident.phase,
      delayMs
    });
  }

  private async fire(serviceId: string): Promise<void> {
    const release = await this.options.mutex.acquire(serviceId);
    try {
      if (!this.stopping) {
        await this.advance(serviceId);
      }
    } catch (error) {
      this.options.logger.log(LogLevel.ERROR, "remediation_step_failed", {
        serviceId,
        error: describeError(error)
      });
    } finally {
      release();
    }
  }

  private async advance(serviceId: string): Promise<void> {
    const incident = this.incidents.get(serviceId);
    if (!incident || (incident.phase !== "backoff" && incident.phase !== "verifying")) {
      return;
    }
    const service = this.options.lookup(serviceId);
    if (!service) {
      this.forget(serviceId);
      return;
    }
    const scheduledAt = incident.nextAttemptAt ?? this.clock();
    incident.nextAttemptAt = undefined;

    if (this.options.maintenance.isActive(serviceId, this.clock())) {
      this.park(incident, "maintenance", this.clock(), scheduledAt);
      this.options.hooks.onChange();
      return;
    }

    const { result, state } = await this.options.hooks.reprobe(serviceId);
    if (this.incidents.get(serviceId) !== incident || this.stopping) {
      return;
    }
    const counter = this.counterFor(serviceId);
    const now = this.clock();

    if (result.success || state !== "down") {
      this.options.logger.log(LogLevel.DEBUG, "remediation_deferred", { serviceId, state });
      this.arm(incident, this.nextDelay(service, counter), now);
      return;
    }

    if (counter.attemptsUsed >= service.maxRestartAttempts) {
      this.escalate(incident, now);
      this.options.hooks.onChange();
      return;
    }

    const decision = this.options.governor.evaluate(serviceId, now);
    if (!decision.allowed) {
      this.park(incident, "rate_limited", now, scheduledAt);
      if (decision.episodeStarted) {
        this.options.logger.log(LogLevel.WARN, "rate_limit_episode_started", {
          serviceId,
          inWindow: decision.inWindow
        });
        this.options.hooks.onRateLimited(serviceId, decision, now);
      }
      this.options.hooks.onChange();
      return;
    }

    this.options.governor.record(serviceId, now);
    counter.attemptsUsed += 1;
    const attempt: RestartAttempt = {
      attempt: counter.attemptsUsed,
      scheduledAt,
      executedAt: now,
      outcome: "failure"
    };
    incident.attempts.push(attempt);
    this.options.hooks.onChange();

    const outcome = await this.options.executor.run(service, attempt.attempt);
    attempt.outcome = outcome.ok ? "success" : "failure";
    attempt.detail = outcome.detail;

    if (this.incidents.get(serviceId) === incident) {
      this.arm(incident, this.nextDelay(service, counter), this.clock());
    }
    this.options.hooks.onChange();
  }

  private nextDelay(service: ServiceDescriptor, counter: RestartCounter): number {
    if (counter.attemptsUsed >= service.maxRestartAttempts) {
      return this.config.verifyDelayMs;
    }
    return backoffDelay(this.config.backoffStagesMs, counter.attemptsUsed + 1);
  }

  private escalate(incident: Incident, at: number): void {
    this.clearTimer(incident.serviceId);
    incident.phase = "escalated";
    incident.nextAttemptAt = undefined;
    this.options.logger.log(LogLevel.WARN, "remediation_escalated", {
      serviceId: incident.serviceId,
      attemptsUsed: this.counterFor(incident.serviceId).attemptsUsed,
      attempts: incident.attempts.length
    });
    this.options.hooks.onEscalated(incident.serviceId, incident, at);
  }

  private park(incident: Incident, reason: ParkReason, at: number, scheduledAt: number): void {
    this.clearTimer(incident.serviceId);
    incident.phase = "parked";
    incident.parkedReason = reason;
    incident.nextAttemptAt = undefined;
    incident.attempts.push({
      attempt: this.counterFor(incident.serviceId).attemptsUsed + 1,
      scheduledAt,
      outcome: reason === "maintenance" ? "skipped_maintenance" : "skipped_rate_limited"
    });
    this.options.logger.log(LogLevel.INFO, "remediation_skipped", {
      serviceId: incident.serviceId,
      reason,
      at
    });
  }

  private counterFor(serviceId: string): RestartCounter {
    let counter = this.counters.get(serviceId);
    if (!counter) {
      counter = { attemptsUsed: 0 };
      this.counters.set(serviceId, counter);
    }
    return counter;
  }

  private clearTimer(serviceId: string): void {
    const handle = this.timers.get(serviceId);
    if (handle) {
      clearTimeout(handle);
      this.timers.delete(serviceId);
    }
  }
}
