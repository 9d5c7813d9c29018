import { LogLevel, shouldLog, type StructuredLogEvent } from "@fleetwarden/shared";
import type { LogSink } from "../types";

export type ConsoleFormat = "json" | "line";

interface ConsoleSinkOptions {
  level: LogLevel;
  /** `json` writes the raw event; `line` renders it for a terminal. Defaults to `json`. */
  format?: ConsoleFormat;
  /** When set, only events from these components are written. */
  components?: string[];
  consoleImpl?: Pick<Console, "debug" | "info" | "warn" | "error">;
}

const BARE_VALUE = /^[\w.:/@-]+$/;

function renderValue(value: unknown): string {
  if (typeof value === "string" && BARE_VALUE.test(value)) {
    return value;
  }
  return JSON.stringify(value);
}

/**
 * `<iso time> <LEVEL> <component> [serviceId] <event> key=value ...`. The
 * service id leads the line instead of repeating among the fields.
 */
export function formatLogLine(event: StructuredLogEvent): string {
  const head = [new Date(event.timestamp).toISOString(), event.level.toUpperCase(), event.component];
  if (event.serviceId) {
    head.push(event.serviceId);
  }
  head.push(event.event);
  const fields = Object.entries(event.payload ?? {})
    .filter(([key, value]) => value !== undefined && !(key === "serviceId" && value === event.serviceId))
    .map(([key, value]) => `${key}=${renderValue(value)}`);
  return [...head, ...fields].join(" ");
}

export function createConsoleSink(options: ConsoleSinkOptions): LogSink {
  const consoleImpl = options.consoleImpl ?? console;
  const components = options.components?.length ? new Set(options.components) : undefined;
  const render = options.format === "line" ? formatLogLine : (event: StructuredLogEvent) => JSON.stringify(event);
  return {
    name: "console",
    level: options.level,
    async publish(event: StructuredLogEvent) {
      if (!shouldLog(event.level, options.level)) {
        return;
      }
      if (components && !components.has(event.component)) {
        return;
      }
      const line = render(event);
      switch (event.level) {
        case LogLevel.DEBUG:
          consoleImpl.debug(line);
          break;
        case LogLevel.WARN:
          consoleImpl.warn(line);
          break;
        case LogLevel.ERROR:
        case LogLevel.CRITICAL:
          consoleImpl.error(line);
          break;
        default:
          consoleImpl.info(line);
      }
    }
  };
}
