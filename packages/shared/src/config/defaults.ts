import { LogLevel } from "../observability";
import type { ServiceDescriptor } from "../types";
import type { MonitorConfig, MonitorSettings, ServiceConfig } from "./types";

export const DEFAULT_BACKOFF_STAGES_MS = [30_000, 60_000, 120_000, 300_000];

export const DEFAULT_SETTINGS: MonitorSettings = {
  probe: {
    intervalMs: 15_000,
    tickMs: 1_000,
    timeoutMs: 5_000,
    concurrency: 10,
    historySize: 100
  },
  classifier: {
    downAfterFailures: 2,
    degradedLatencyMs: 1_000,
    recoverFromDegradedSuccesses: 1,
    recoverFromDownSuccesses: 2,
    latencyHistorySize: 20,
    changeHistorySize: 200,
    changeRetentionMs: 30 * 24 * 3_600_000
  },
  recovery: {
    enabled: true,
    backoffStagesMs: DEFAULT_BACKOFF_STAGES_MS,
    maxRestartAttempts: 3,
    verifyDelayMs: 30_000,
    commandTimeoutMs: 30_000
  },
  governor: {
    windowMs: 3_600_000,
    maxRestarts: 5
  },
  dependencies: {
    correlationWindowMs: 60_000,
    rootDownIntervalMs: 5_000
  },
  maintenance: {
    scheduled: []
  },
  state: {
    path: "state/monitor-state.json",
    fallbackPaths: []
  },
  shutdown: {
    drainTimeoutMs: 10_000
  },
  observability: {
    logs: {
      level: LogLevel.INFO,
      sinks: {
        console: { enabled: true }
      }
    },
    alerts: {
      enabled: true,
      channels: [{ id: "console", type: "console", enabled: true, level: LogLevel.WARN }]
    }
  },
  control: {
    enabled: false,
    host: "127.0.0.1",
    port: 7787
  }
};

/**
 * Merge a configuration file over the defaults. Sections are merged one level deep;
 * arrays replace the default wholesale.
 */
export function resolveMonitorSettings(
  config: Omit<MonitorConfig, "services"> = {},
  base: MonitorSettings = DEFAULT_SETTINGS
): MonitorSettings {
  return {
    probe: { ...base.probe, ...config.probe },
    classifier: { ...base.classifier, ...config.classifier },
    recovery: { ...base.recovery, ...config.recovery },
    governor: { ...base.governor, ...config.governor },
    dependencies: { ...base.dependencies, ...config.dependencies },
    maintenance: { ...base.maintenance, ...config.maintenance },
    state: { ...base.state, ...config.state },
    shutdown: { ...base.shutdown, ...config.shutdown },
    observability: {
      logs: config.observability?.logs ?? base.observability.logs,
      alerts: config.observability?.alerts ?? base.observability.alerts
    },
    control: { ...base.control, ...config.control }
  };
}

export function toServiceDescriptor(
  service: ServiceConfig,
  settings: Pick<MonitorSettings, "recovery"> = DEFAULT_SETTINGS
): ServiceDescriptor {
  return {
    id: service.id,
    name: service.name,
    checkType: service.checkType,
    target: service.target,
    remediation: service.remediation,
    maxRestartAttempts: service.maxRestartAttempts ?? settings.recovery.maxRestartAttempts,
    dependsOn: [...(service.dependsOn ?? [])],
    intervalMs: service.intervalMs,
    timeoutMs: service.timeoutMs,
    expectedStatus: service.expectedStatus,
    expectContent: service.expectContent,
    group: service.group,
    groupRoot: service.groupRoot,
    enabled: service.enabled ?? true
  };
}
