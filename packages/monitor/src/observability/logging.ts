import path from "node:path";
import type { Dispatcher } from "undici";
import type { ObservabilityLogsConfig } from "@fleetwarden/shared";
import {
  StructuredLogger,
  createConsoleSink,
  createFileSink,
  createWebhookSink,
  type LogSink
} from "@fleetwarden/logger";

export interface MonitorLoggerOptions {
  /** Overrides the file sink's configured directory (MONITOR_LOG_DIR). */
  logDir?: string;
  dispatcher?: Dispatcher;
  consoleImpl?: Pick<Console, "debug" | "info" | "warn" | "error">;
}

export function buildLogSinks(
  config: ObservabilityLogsConfig,
  runId: string,
  options: MonitorLoggerOptions = {}
): LogSink[] {
  const sinks: LogSink[] = [];
  if (config.sinks.console?.enabled) {
    sinks.push(
      createConsoleSink({
        level: config.sinks.console.level ?? config.level,
        format: config.sinks.console.format,
        components: config.sinks.console.components,
        consoleImpl: options.consoleImpl
      })
    );
  }
  const fileDir = options.logDir ?? config.sinks.file?.outputDir;
  if (config.sinks.file?.enabled && fileDir) {
    sinks.push(
      createFileSink({
        runId,
        level: config.sinks.file.level ?? config.level,
        outputDir: path.resolve(fileDir),
        maxFileSizeMb: config.sinks.file.maxFileSizeMb,
        maxFiles: config.sinks.file.maxFiles
      })
    );
  }
  if (config.sinks.webhook?.enabled && config.sinks.webhook.url) {
    sinks.push(
      createWebhookSink({
        level: config.sinks.webhook.level ?? config.level,
        url: config.sinks.webhook.url,
        headers: config.sinks.webhook.headers,
        batchSize: config.sinks.webhook.batchSize,
        retry: config.sinks.webhook.retry,
        dispatcher: options.dispatcher
      })
    );
  }
  return sinks;
}

/** Builds (but does not start) the daemon's structured logger. */
export function createMonitorLogger(
  config: ObservabilityLogsConfig,
  runId: string,
  options: MonitorLoggerOptions = {}
): StructuredLogger {
  return new StructuredLogger({
    runId,
    baseComponent: "monitor",
    level: config.level,
    sinks: buildLogSinks(config, runId, options)
  });
}
