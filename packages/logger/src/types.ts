import type { LogLevel, StructuredLogEvent } from "@fleetwarden/shared";

export interface LogOptions {
  component?: string;
}

/**
 * The slice of the structured logger handed to components. Components log
 * and derive children; only the owner of the logger starts or stops it.
 */
export interface ComponentLogger {
  log(level: LogLevel, event: string, payload?: Record<string, unknown>, options?: LogOptions): void;
  child(component: string, defaultContext?: Record<string, unknown>): ComponentLogger;
}

/** A destination for structured events. Sinks filter by their own level. */
export interface LogSink {
  readonly name: string;
  level: LogLevel;
  start?(): Promise<void> | void;
  stop?(): Promise<void> | void;
  flush?(): Promise<void> | void;
  publish(event: StructuredLogEvent): Promise<void>;
}
