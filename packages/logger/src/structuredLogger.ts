import {
  LogLevel,
  createStructuredEvent,
  shouldLog,
  type StructuredLogEvent
} from "@fleetwarden/shared";
import type { ComponentLogger, LogOptions, LogSink } from "./types";

export interface StructuredLoggerOptions {
  runId: string;
  baseComponent: string;
  level: LogLevel;
  sinks: LogSink[];
  queueSize?: number;
  defaultContext?: Record<string, unknown>;
  onDrop?: (event: StructuredLogEvent) => void;
  clock?: () => number;
}

export class StructuredLogger implements ComponentLogger {
  private readonly queue: StructuredLogEvent[] = [];
  private draining = false;
  private stopped = false;
  private readonly queueSize: number;
  private readonly defaultContext: Record<string, unknown>;
  private readonly clock: () => number;

  constructor(private readonly options: StructuredLoggerOptions) {
    this.queueSize = Math.max(100, options.queueSize ?? 1000);
    this.defaultContext = options.defaultContext ?? {};
    this.clock = options.clock ?? Date.now;
  }

  get runId(): string {
    return this.options.runId;
  }

  async start() {
    await Promise.all(
      this.options.sinks.map(async sink => {
        if (sink.start) {
          await sink.start();
        }
      })
    );
  }

  async stop() {
    await this.flushOutstanding();
    this.stopped = true;
    await Promise.all(
      this.options.sinks.map(async sink => {
        if (sink.stop) {
          await sink.stop();
        }
      })
    );
  }

  async flushOutstanding() {
    while (this.queue.length > 0 || this.draining) {
      await this.drainQueue();
      if (this.draining) {
        await new Promise(resolve => setImmediate(resolve));
      }
    }
    await Promise.all(
      this.options.sinks.map(async sink => {
        if (sink.flush) {
          await sink.flush();
        }
      })
    );
  }

  log(level: LogLevel, event: string, payload?: Record<string, unknown>, logOptions?: LogOptions) {
    if (this.stopped) {
      return;
    }
    if (!shouldLog(level, this.options.level)) {
      return;
    }
    const component = logOptions?.component ?? this.options.baseComponent;
    if (this.queue.length >= this.queueSize) {
      this.options.onDrop?.(
        createStructuredEvent({
          runId: this.options.runId,
          component,
          level,
          event,
          payload,
          timestamp: this.clock()
        })
      );
      return;
    }
    this.queue.push(
      createStructuredEvent({
        runId: this.options.runId,
        component,
        level,
        event,
        payload: { ...this.defaultContext, ...payload },
        timestamp: this.clock()
      })
    );
    void this.drainQueue();
  }

  child(component: string, defaultContext?: Record<string, unknown>): ComponentLogger {
    const mergedContext = {
      ...this.defaultContext,
      ...(defaultContext ?? {})
    };
    return {
      log: (level, event, payload, options) => {
        this.log(level, event, { ...mergedContext, ...payload }, { ...options, component });
      },
      child: (nextComponent, childContext) =>
        this.child(nextComponent, {
          ...mergedContext,
          ...(childContext ?? {})
        })
    };
  }

  private async drainQueue() {
    if (this.draining) {
      return;
    }
    this.draining = true;
    try {
      let next = this.queue.shift();
      while (next) {
        const event = next;
        await Promise.allSettled(
          this.options.sinks.map(async sink => {
            try {
              await sink.publish(event);
            } catch (error) {
              if (sink.name === "console") {
                return;
              }
              console.warn(`[structured-logger] sink ${sink.name} failed`, error);
            }
          })
        );
        next = this.queue.shift();
      }
    } finally {
      this.draining = false;
    }
  }
}

/** A logger that drops everything; handy for tests and one-shot CLI commands. */
export const noopLogger: ComponentLogger = {
  log: () => undefined,
  child: () => noopLogger
};
