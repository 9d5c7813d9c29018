import { randomUUID } from "node:crypto";
import type { Dispatcher } from "undici";
import {
  LogLevel,
  computeOverallHealth,
  type AlertGroup,
  type FleetSnapshot,
  type MaintenanceScope,
  type MaintenanceWindow,
  type MonitorSettings,
  type ProbeResult,
  type ServiceDescriptor,
  type ServiceStatusView,
  type StatusTransition
} from "@fleetwarden/shared";
import type { ComponentLogger } from "@fleetwarden/logger";
import { AlertAggregator, type NotificationHook } from "./alerts/aggregator";
import { ChannelNotifier } from "./alerts/channelNotifier";
import { KeyedMutex } from "./concurrency/keyedMutex";
import { CascadeCorrelator } from "./dependency/cascade";
import { DependencyGraph } from "./dependency/graph";
import { probeIntervalFor } from "./dependency/priority";
import { UnknownServiceError, describeError } from "./errors";
import { MaintenanceWindowManager, sameScope, windowEnd, type ToggleResult } from "./maintenance/windowManager";
import type { CheckerRegistry } from "./probe/checkers";
import { execFileRunner, type CommandRunner } from "./probe/commandRunner";
import { ProbeEngine } from "./probe/engine";
import { RecoveryController, type ReprobeOutcome } from "./recovery/controller";
import { RemediationExecutor } from "./recovery/executor";
import { FailureRateGovernor } from "./recovery/governor";
import { STATE_VERSION, type MonitorStateSnapshot, type PersistedServiceState } from "./state/snapshot";
import type { StateStore } from "./state/stateStore";
import { StatusClassifier, createStatusRecord } from "./status/classifier";
import { UptimeTracker } from "./status/uptime";

export interface FleetMonitorOptions {
  settings: MonitorSettings;
  services: readonly ServiceDescriptor[];
  logger: ComponentLogger;
  store: StateStore;
  /** Defaults to a ChannelNotifier over `settings.observability.alerts`. */
  notifier?: NotificationHook;
  checkers?: Partial<CheckerRegistry>;
  runner?: CommandRunner;
  dispatcher?: Dispatcher;
  clock?: () => number;
  alertIdGenerator?: () => string;
  maintenanceIdGenerator?: () => string;
}

export type SnapshotListener = (snapshot: FleetSnapshot) => void;

const TRANSITION_LEVELS: Record<StatusTransition["to"], LogLevel> = {
  checking: LogLevel.DEBUG,
  operational: LogLevel.INFO,
  degraded: LogLevel.WARN,
  down: LogLevel.ERROR
};

function enabledServices(services: readonly ServiceDescriptor[]): Map<string, ServiceDescriptor> {
  return new Map(services.filter(service => service.enabled).map(service => [service.id, service]));
}

/**
 * The tick driver. Each tick probes the services that are due, classifies the
 * batch, tags cascades, and hands every transition to recovery and alerting
 * while holding the affected services' locks. Roots are handled before the
 * dependents attributed to them.
 */
export class FleetMonitor {
  private settings: MonitorSettings;
  private services: Map<string, ServiceDescriptor>;
  private graph: DependencyGraph;
  private readonly logger: ComponentLogger;
  private readonly clock: () => number;
  private readonly store: StateStore;
  private readonly mutex = new KeyedMutex();
  private readonly classifier: StatusClassifier;
  private readonly uptime: UptimeTracker;
  private readonly correlator: CascadeCorrelator;
  private readonly governor: FailureRateGovernor;
  private readonly maintenance: MaintenanceWindowManager;
  private readonly engine: ProbeEngine;
  private readonly executor: RemediationExecutor;
  private readonly recovery: RecoveryController;
  private readonly aggregator: AlertAggregator;
  private readonly notifier: NotificationHook;
  private readonly listeners = new Set<SnapshotListener>();
  private timer?: NodeJS.Timeout;
  private ticking = false;
  private stopping = false;
  private restoring = false;
  private dirty = false;

  constructor(options: FleetMonitorOptions) {
    this.settings = options.settings;
    this.logger = options.logger;
    this.clock = options.clock ?? Date.now;
    this.store = options.store;
    this.services = enabledServices(options.services);
    this.graph = DependencyGraph.build([...this.services.values()], this.logger.child("dependencies"));

    this.classifier = new StatusClassifier(this.settings.classifier);
    this.uptime = new UptimeTracker(this.settings.classifier);
    this.correlator = new CascadeCorrelator(this.graph, this.settings.dependencies, id =>
      this.classifier.stateOf(id)
    );
    this.governor = new FailureRateGovernor(this.settings.governor);
    this.maintenance = new MaintenanceWindowManager(options.maintenanceIdGenerator);
    this.engine = new ProbeEngine({
      probe: this.settings.probe,
      logger: this.logger.child("probe"),
      checkers: options.checkers,
      runner: options.runner,
      dispatcher: options.dispatcher,
      clock: this.clock
    });
    this.executor = new RemediationExecutor(
      options.runner ?? execFileRunner,
      this.logger.child("remediation"),
      this.settings.recovery.commandTimeoutMs
    );
    this.notifier =
      options.notifier ??
      new ChannelNotifier(this.settings.observability.alerts, {
        logger: this.logger.child("notifier"),
        dispatcher: options.dispatcher
      });
    this.aggregator = new AlertAggregator({
      hook: this.notifier,
      logger: this.logger.child("alerts"),
      stateOf: id => (this.services.has(id) ? this.classifier.stateOf(id) : undefined),
      idGenerator: options.alertIdGenerator
    });
    this.recovery = new RecoveryController({
      recovery: this.settings.recovery,
      governor: this.governor,
      maintenance: this.maintenance,
      executor: this.executor,
      mutex: this.mutex,
      logger: this.logger.child("recovery"),
      lookup: id => this.services.get(id),
      clock: this.clock,
      hooks: {
        reprobe: id => this.reprobe(id),
        onEscalated: (id, _incident, at) => {
          this.aggregator.escalate(
            id,
            at,
            `${this.recovery.counterOf(id).attemptsUsed} restart attempt(s) did not recover the service`
          );
          this.markDirty();
        },
        onRateLimited: (id, decision, at) => {
          this.aggregator.rateLimited(
            id,
            at,
            `${decision.inWindow} restarts within ${this.settings.governor.windowMs}ms`
          );
          this.markDirty();
        },
        onChange: () => {
          this.markDirty();
        }
      }
    });

    const now = this.clock();
    for (const id of this.services.keys()) {
      this.classifier.ensure(id, now);
    }
  }

  /**
   * Selects the state path (fatal when none is writable), restores the last
   * checkpoint and starts ticking.
   */
  async start(): Promise<void> {
    if (this.timer) {
      return;
    }
    await this.store.ensureWritable();
    const snapshot = await this.store.load();
    const now = this.clock();
    this.restoring = true;
    try {
      this.restore(snapshot, now);
    } finally {
      this.restoring = false;
    }
    this.applyScheduledMaintenance(now);
    this.stopping = false;
    this.logger.log(LogLevel.INFO, "monitor_started", {
      services: this.services.size,
      statePath: this.store.path,
      tickMs: this.settings.probe.tickMs
    });
    void this.tick(now);
    this.timer = setInterval(() => {
      void this.tick();
    }, this.settings.probe.tickMs);
  }

  async stop(): Promise<void> {
    this.stopping = true;
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = undefined;
    }
    const timeoutMs = this.settings.shutdown.drainTimeoutMs;
    const [remediationDrained, probesDrained] = await Promise.all([
      this.recovery.drain(timeoutMs),
      this.engine.drain(timeoutMs)
    ]);
    await this.checkpoint(this.clock());
    await this.store.flush();
    this.logger.log(LogLevel.INFO, "monitor_stopped", {
      drained: remediationDrained && probesDrained
    });
  }

  /** Runs one tick. A tick requested while another is running is skipped. */
  async tick(now: number = this.clock()): Promise<void> {
    if (this.stopping) {
      return;
    }
    if (this.ticking) {
      this.logger.log(LogLevel.DEBUG, "tick_skipped", { at: now });
      return;
    }
    this.ticking = true;
    try {
      await this.runTick(now);
    } catch (error) {
      this.logger.log(LogLevel.ERROR, "tick_failed", { at: now, error: describeError(error) });
    } finally {
      this.ticking = false;
    }
    this.publish();
  }

  async acknowledge(groupId: string, actor = "operator"): Promise<AlertGroup> {
    const group = this.aggregator.acknowledge(groupId, actor, this.clock());
    this.dirty = true;
    await this.checkpoint(this.clock());
    this.publish();
    return group;
  }

  async toggleMaintenance(
    scope: MaintenanceScope = { kind: "all" },
    options: { durationMs?: number; reason?: string } = {}
  ): Promise<ToggleResult> {
    this.assertKnownScope(scope);
    const now = this.clock();
    const result = this.maintenance.toggleNow(scope, now, options);
    this.logger.log(LogLevel.INFO, result.active ? "maintenance_started" : "maintenance_ended", {
      windowId: result.window.id,
      scope,
      source: "manual"
    });
    if (!result.active) {
      this.afterMaintenanceChange(now);
    }
    this.dirty = true;
    await this.checkpoint(now);
    this.publish();
    return result;
  }

  async scheduleMaintenance(
    startAt: number,
    durationMs: number,
    scope: MaintenanceScope,
    reason?: string
  ): Promise<MaintenanceWindow> {
    this.assertKnownScope(scope);
    const window = this.maintenance.schedule(startAt, durationMs, scope, reason);
    this.logger.log(LogLevel.INFO, "maintenance_scheduled", {
      windowId: window.id,
      startAt,
      durationMs,
      scope
    });
    this.dirty = true;
    await this.checkpoint(this.clock());
    return window;
  }

  async cancelMaintenance(windowId: string): Promise<MaintenanceWindow> {
    const window = this.maintenance.cancel(windowId);
    const now = this.clock();
    this.logger.log(LogLevel.INFO, "maintenance_cancelled", { windowId });
    this.afterMaintenanceChange(now);
    this.dirty = true;
    await this.checkpoint(now);
    this.publish();
    return window;
  }

  getSnapshot(): FleetSnapshot {
    const now = this.clock();
    const services: ServiceStatusView[] = [...this.services.values()].map(service => {
      const record = this.classifier.get(service.id) ?? createStatusRecord(now);
      const incident = this.recovery.incidentOf(service.id);
      return {
        serviceId: service.id,
        name: service.name ?? service.id,
        record: { ...record, latencies: [...record.latencies] },
        inMaintenance: this.maintenance.isActive(service.id, now),
        uptime: this.uptime.statsOf(service.id),
        downtimeMs: this.uptime.downtimeMs(service.id, now),
        changes: this.uptime.changesOf(service.id),
        incident: incident
          ? {
              attemptsUsed: this.recovery.counterOf(service.id).attemptsUsed,
              phase: incident.phase,
              openedAt: incident.openedAt
            }
          : undefined
      };
    });
    return {
      id: randomUUID(),
      overall: computeOverallHealth(services.map(view => view.record.state)),
      services,
      openAlertGroups: this.aggregator.openGroups(),
      activeMaintenance: this.maintenance.activeWindows(now),
      issuedAt: now
    };
  }

  /** Listeners receive a fresh snapshot after every tick and operator action. */
  subscribe(listener: SnapshotListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /**
   * Swaps the inventory and, optionally, the settings. Removed services lose
   * their timers and history; new services start in Checking. The tick
   * interval only changes on the next start.
   */
  reconfigure(services: readonly ServiceDescriptor[], settings?: MonitorSettings): void {
    const next = enabledServices(services);
    for (const id of this.services.keys()) {
      if (!next.has(id)) {
        this.recovery.forget(id);
        this.classifier.forget(id);
        this.uptime.forget(id);
        this.governor.forget(id);
        this.correlator.forget(id);
        this.engine.log.forget(id);
      }
    }
    if (settings) {
      this.settings = settings;
      this.engine.updateConfig(settings.probe);
      this.classifier.updateConfig(settings.classifier);
      this.uptime.updateConfig(settings.classifier);
      this.governor.updateConfig(settings.governor);
      this.recovery.updateConfig(settings.recovery);
      this.executor.updateTimeout(settings.recovery.commandTimeoutMs);
      if (this.notifier instanceof ChannelNotifier) {
        this.notifier.updateConfig(settings.observability.alerts);
      }
    }
    this.services = next;
    this.graph = DependencyGraph.build([...next.values()], this.logger.child("dependencies"));
    this.correlator.update(this.graph, this.settings.dependencies);

    const now = this.clock();
    for (const id of next.keys()) {
      this.classifier.ensure(id, now);
    }
    this.aggregator.closeStable(now);
    this.dirty = true;
    this.logger.log(LogLevel.INFO, "monitor_reconfigured", { services: next.size });
  }

  probeHistory(serviceId: string): readonly ProbeResult[] {
    return this.engine.log.history(serviceId);
  }

  private async runTick(now: number): Promise<void> {
    const expired = this.maintenance.prune(now);
    if (expired.length > 0) {
      this.dirty = true;
      for (const window of expired) {
        this.logger.log(LogLevel.INFO, "maintenance_ended", { windowId: window.id, source: window.source });
      }
    }

    if (this.uptime.prune(now) > 0) {
      this.dirty = true;
    }

    const due = this.dueServices(now);
    if (due.length > 0) {
      const results = await this.engine.probeBatch(due, now);
      const release = await this.mutex.acquireAll(due.map(service => service.id));
      try {
        const known = results.filter(result => this.services.has(result.serviceId));
        const transitions = this.classifier.classify(known);
        for (const result of known) {
          this.uptime.record(result, this.classifier.stateOf(result.serviceId));
        }
        const attributed = this.correlator.attribute(transitions);
        const ordered = [
          ...attributed.filter(transition => transition.causedBy === undefined),
          ...attributed.filter(transition => transition.causedBy !== undefined)
        ];
        for (const transition of ordered) {
          this.applyTransition(transition);
        }
      } finally {
        release();
      }
    }

    this.aggregator.closeStable(now);
    this.reconcile(now);
    this.recovery.resumeParked(now);
    if (this.dirty) {
      await this.checkpoint(now);
    }
  }

  private dueServices(now: number): ServiceDescriptor[] {
    return [...this.services.values()].filter(service => {
      const record = this.classifier.get(service.id);
      if (record?.lastProbeAt === undefined) {
        return true;
      }
      const interval = probeIntervalFor(service, record.state, this.graph, this.settings);
      return now - record.lastProbeAt >= interval;
    });
  }

  /** Out-of-band probe used by recovery; runs under the service's lock held by the caller. */
  private async reprobe(serviceId: string): Promise<ReprobeOutcome> {
    const service = this.services.get(serviceId);
    if (!service) {
      throw new UnknownServiceError([serviceId]);
    }
    const result = await this.engine.probeOne(service, this.clock());
    const transition = this.classifier.observe(result);
    this.uptime.record(result, this.classifier.stateOf(serviceId));
    if (transition) {
      for (const attributed of this.correlator.attribute([transition])) {
        this.applyTransition(attributed);
      }
    }
    return { result, state: this.classifier.stateOf(serviceId) };
  }

  private applyTransition(transition: StatusTransition): void {
    this.dirty = true;
    this.uptime.recordChange(transition);
    this.logger.log(TRANSITION_LEVELS[transition.to], "status_transition", {
      serviceId: transition.serviceId,
      from: transition.from,
      to: transition.to,
      causedBy: transition.causedBy,
      error: transition.probe.error,
      latencyMs: transition.probe.latencyMs
    });
    this.aggregator.onTransition(transition, this.isInert(transition.serviceId, transition.causedBy, transition.at));
    this.recovery.onTransition(transition);
  }

  private isInert(serviceId: string, rootServiceId: string | undefined, at: number): boolean {
    return (
      this.maintenance.isActive(serviceId, at) ||
      (rootServiceId !== undefined && this.maintenance.isActive(rootServiceId, at))
    );
  }

  /**
   * Opens groups for failing services no open group covers, e.g. failures
   * first seen during maintenance or restored from a checkpoint.
   */
  private reconcile(now: number): void {
    for (const id of this.services.keys()) {
      const state = this.classifier.stateOf(id);
      if ((state !== "down" && state !== "degraded") || this.aggregator.findByMember(id)) {
        continue;
      }
      const root = this.correlator.rootFor(id, now, Number.POSITIVE_INFINITY);
      if (this.isInert(id, root, now)) {
        continue;
      }
      this.aggregator.track(id, root ?? id, now);
      this.dirty = true;
    }
  }

  private afterMaintenanceChange(now: number): void {
    this.reconcile(now);
    this.recovery.resumeParked(now);
  }

  private restore(snapshot: MonitorStateSnapshot, now: number): void {
    const entries = Object.entries(snapshot.services).filter(([id]) => this.services.has(id));
    for (const [id, persisted] of entries) {
      this.classifier.restore(id, persisted.status);
      this.recovery.restoreCounter(id, {
        attemptsUsed: persisted.restart.attemptsUsed,
        lastClosedAt: persisted.restart.lastClosedAt
      });
      this.governor.restore(id, { timestamps: persisted.failureWindow, suppressed: persisted.rateLimited });
      this.uptime.restore(id, { uptime: persisted.uptime, changes: persisted.changes });
      if (persisted.downSince !== undefined) {
        this.correlator.restoreDownSince(id, persisted.downSince);
      }
    }
    this.aggregator.restore(snapshot.alertGroups);
    this.maintenance.restore(snapshot.maintenance);
    for (const [id, persisted] of entries) {
      if (persisted.status.state === "down") {
        this.recovery.resume(id, now);
      }
    }
    this.logger.log(LogLevel.INFO, "state_restored", {
      services: entries.length,
      alertGroups: snapshot.alertGroups.length,
      maintenance: snapshot.maintenance.length,
      savedAt: snapshot.savedAt
    });
  }

  private applyScheduledMaintenance(now: number): void {
    for (const entry of this.settings.maintenance.scheduled) {
      const startAt = Date.parse(entry.startAt);
      if (Number.isNaN(startAt)) {
        this.logger.log(LogLevel.WARN, "maintenance_schedule_invalid", { startAt: entry.startAt });
        continue;
      }
      if (startAt + entry.durationMs <= now) {
        continue;
      }
      const known = this.maintenance
        .list()
        .some(
          window =>
            window.source === "scheduled" &&
            window.startAt === startAt &&
            windowEnd(window) === startAt + entry.durationMs &&
            sameScope(window.scope, entry.scope)
        );
      if (known) {
        continue;
      }
      try {
        this.assertKnownScope(entry.scope);
        this.maintenance.schedule(startAt, entry.durationMs, entry.scope, entry.reason);
      } catch (error) {
        this.logger.log(LogLevel.WARN, "maintenance_schedule_invalid", {
          startAt: entry.startAt,
          error: describeError(error)
        });
      }
    }
  }

  private assertKnownScope(scope: MaintenanceScope): void {
    if (scope.kind === "all") {
      return;
    }
    if (scope.serviceIds.length === 0) {
      throw new RangeError("Maintenance scope names no services");
    }
    const unknown = scope.serviceIds.filter(id => !this.services.has(id));
    if (unknown.length > 0) {
      throw new UnknownServiceError(unknown);
    }
  }

  /**
   * Recovery changes that land between ticks are written straight away; a
   * running tick (or the restore at start) checkpoints once it finishes.
   */
  private markDirty(): void {
    this.dirty = true;
    if (!this.ticking && !this.restoring) {
      void this.checkpoint(this.clock());
    }
  }

  private async checkpoint(now: number): Promise<void> {
    const services: Record<string, PersistedServiceState> = {};
    for (const [id, record] of this.classifier.entries()) {
      if (!this.services.has(id)) {
        continue;
      }
      const counter = this.recovery.counterOf(id);
      const governorState = this.governor.snapshot(id);
      services[id] = {
        status: { ...record, latencies: [...record.latencies] },
        restart: {
          attemptsUsed: counter.attemptsUsed,
          lastClosedAt: counter.lastClosedAt,
          incidentOpen: this.recovery.incidentOf(id) !== undefined
        },
        failureWindow: governorState.timestamps,
        rateLimited: governorState.suppressed,
        downSince: this.correlator.downSinceOf(id),
        ...this.uptime.history(id)
      };
    }
    const snapshot: MonitorStateSnapshot = {
      version: STATE_VERSION,
      savedAt: now,
      services,
      alertGroups: this.aggregator.openGroups(),
      maintenance: this.maintenance.list()
    };
    this.dirty = false;
    try {
      await this.store.save(snapshot);
    } catch (error) {
      this.dirty = true;
      this.logger.log(LogLevel.ERROR, "state_checkpoint_failed", { error: describeError(error) });
    }
  }

  private publish(): void {
    if (this.listeners.size === 0) {
      return;
    }
    const snapshot = this.getSnapshot();
    for (const listener of this.listeners) {
      try {
        listener(snapshot);
      } catch (error) {
        this.logger.log(LogLevel.WARN, "snapshot_listener_failed", { error: describeError(error) });
      }
    }
  }
}
