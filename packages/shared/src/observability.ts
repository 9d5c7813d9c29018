import type { AlertNotificationKind } from "./types";

export enum LogLevel {
  DEBUG = "debug",
  INFO = "info",
  WARN = "warn",
  ERROR = "error",
  CRITICAL = "critical"
}

const levelOrder: Record<LogLevel, number> = {
  [LogLevel.DEBUG]: 10,
  [LogLevel.INFO]: 20,
  [LogLevel.WARN]: 30,
  [LogLevel.ERROR]: 40,
  [LogLevel.CRITICAL]: 50
};

export function shouldLog(target: LogLevel, minimum: LogLevel): boolean {
  return levelOrder[target] >= levelOrder[minimum];
}

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === "string" && Object.prototype.hasOwnProperty.call(levelOrder, value);
}

/**
 * One monitor log record. `serviceId` is lifted out of the payload so sinks
 * can filter and render per service without digging into it.
 */
export interface StructuredLogEvent<TPayload = Record<string, unknown>> {
  runId: string;
  component: string;
  event: string;
  level: LogLevel;
  timestamp: number;
  serviceId?: string;
  payload?: TPayload;
}

export interface AlertChannelConfig {
  id: string;
  type: "console" | "file" | "webhook";
  enabled: boolean;
  level?: LogLevel;
  path?: string;
  url?: string;
  headers?: Record<string, string>;
}

const alertLevels: Record<AlertNotificationKind, LogLevel> = {
  opened: LogLevel.WARN,
  escalated: LogLevel.CRITICAL,
  rate_limited: LogLevel.WARN,
  resolved: LogLevel.INFO
};

/** Severity an alert notification is delivered and logged at. */
export function alertLevel(kind: AlertNotificationKind): LogLevel {
  return alertLevels[kind];
}

interface StructuredEventOptions {
  runId: string;
  component: string;
  level: LogLevel;
  event: string;
  payload?: Record<string, unknown>;
  timestamp?: number;
}

export function createStructuredEvent(options: StructuredEventOptions): StructuredLogEvent {
  const serviceId = options.payload?.serviceId;
  return {
    runId: options.runId,
    component: options.component,
    level: options.level,
    event: options.event,
    timestamp: options.timestamp ?? Date.now(),
    serviceId: typeof serviceId === "string" ? serviceId : undefined,
    payload: options.payload
  };
}
