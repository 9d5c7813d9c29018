import path from "node:path";
import { nanoid } from "nanoid";
import {
  LogLevel,
  assertEnvVars,
  envFlag,
  createConfigManager,
  resolveMonitorSettings,
  type MonitorConfig,
  type MonitorSettings
} from "@fleetwarden/shared";
import { ControlServer } from "./control/server";
import { describeError } from "./errors";
import { normalizeInventory } from "./inventory";
import { FleetMonitor } from "./monitor";
import { createMonitorLogger } from "./observability/logging";
import { StateStore } from "./state/stateStore";

type EnvSource = Record<string, string | undefined>;

/** Environment wins over the configuration file for state paths and the control token. */
export function applyEnvOverrides(settings: MonitorSettings, env: EnvSource = process.env): MonitorSettings {
  const statePath = env.MONITOR_STATE_PATH?.trim();
  const fallbacks = (env.MONITOR_STATE_FALLBACK ?? "")
    .split(",")
    .map(entry => entry.trim())
    .filter(entry => entry.length > 0);
  const token = env.MONITOR_CONTROL_TOKEN?.trim();
  return {
    ...settings,
    state: {
      path: statePath ? path.resolve(statePath) : settings.state.path,
      fallbackPaths: fallbacks.length > 0 ? fallbacks.map(entry => path.resolve(entry)) : settings.state.fallbackPaths
    },
    control: token ? { ...settings.control, authToken: token } : settings.control
  };
}

function settingsFor(config: MonitorConfig, env: EnvSource): MonitorSettings {
  return applyEnvOverrides(resolveMonitorSettings(config), env);
}

export interface DaemonHandle {
  monitor: FleetMonitor;
  shutdown(): Promise<void>;
}

/**
 * Starts the monitor daemon: configuration, logging, durable state, the tick
 * driver and the control server. Resolves once everything is running.
 */
export async function runDaemon(env: EnvSource = process.env): Promise<DaemonHandle> {
  assertEnvVars("monitor", env);
  const configPath = path.resolve(env.MONITOR_CONFIG ?? "config/monitor/default.monitor.json");
  const configManager = await createConfigManager(configPath);
  const config = configManager.current();
  const settings = settingsFor(config, env);

  const runId = env.MONITOR_RUN_ID?.trim() || `run_${nanoid(8)}`;
  const logger = createMonitorLogger(settings.observability.logs, runId, { logDir: env.MONITOR_LOG_DIR });
  await logger.start();

  const store = new StateStore([settings.state.path, ...settings.state.fallbackPaths], logger.child("state"));
  const monitor = new FleetMonitor({
    settings,
    services: normalizeInventory(config.services, [], settings),
    logger,
    store
  });
  try {
    await monitor.start();
  } catch (error) {
    logger.log(LogLevel.CRITICAL, "monitor_start_failed", { error: describeError(error) });
    await logger.stop();
    throw error;
  }

  const control = new ControlServer(settings.control, monitor, logger.child("control"));
  await control.start();

  configManager.subscribe("", () => {
    try {
      const next = configManager.current();
      const nextSettings = settingsFor(next, env);
      monitor.reconfigure(normalizeInventory(next.services, [], nextSettings), nextSettings);
    } catch (error) {
      logger.log(LogLevel.ERROR, "reconfigure_failed", { error: describeError(error) });
    }
  });
  if (envFlag(env.CONFIG_WATCH)) {
    await configManager.startWatching();
  }

  let stopping: Promise<void> | undefined;
  const shutdown = (): Promise<void> => {
    stopping ??= (async () => {
      logger.log(LogLevel.INFO, "shutdown_requested", {});
      await control.stop();
      await configManager.stopWatching();
      await monitor.stop();
      await logger.stop();
    })();
    return stopping;
  };

  for (const signal of ["SIGINT", "SIGTERM"] as const) {
    process.once(signal, () => {
      shutdown().catch(error => {
        console.error("Shutdown failed", error);
        process.exitCode = 1;
      });
    });
  }

  return { monitor, shutdown };
}
