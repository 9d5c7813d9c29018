import { setTimeout as delay } from "node:timers/promises";
import { request, type Dispatcher } from "undici";
import { shouldLog, type LogLevel, type StructuredLogEvent } from "@fleetwarden/shared";
import type { LogSink } from "../types";

interface WebhookSinkOptions {
  level: LogLevel;
  url: string;
  headers?: Record<string, string>;
  batchSize?: number;
  retry?: {
    attempts: number;
    backoffMs: number;
  };
  dispatcher?: Dispatcher;
  logger?: Pick<Console, "warn" | "error">;
}

export function createWebhookSink(options: WebhookSinkOptions): LogSink {
  const sink = new WebhookSink(options);
  return {
    name: "webhook",
    level: options.level,
    start: () => sink.start(),
    stop: () => sink.stop(),
    publish: event => sink.publish(event)
  };
}

class WebhookSink {
  private queue: StructuredLogEvent[] = [];
  private draining = false;
  private stopped = false;
  private readonly batchSize: number;
  private readonly retryAttempts: number;
  private readonly retryBackoff: number;
  private circuitOpenUntil = 0;

  constructor(private readonly options: WebhookSinkOptions) {
    this.batchSize = Math.max(1, options.batchSize ?? 10);
    this.retryAttempts = Math.max(1, options.retry?.attempts ?? 3);
    this.retryBackoff = Math.max(0, options.retry?.backoffMs ?? 1000);
  }

  async start() {
    this.stopped = false;
  }

  async stop() {
    this.stopped = true;
  }

  async publish(event: StructuredLogEvent) {
    if (!shouldLog(event.level, this.options.level) || this.stopped) {
      return;
    }

    if (Date.now() < this.circuitOpenUntil) {
      this.options.logger?.warn("Webhook sink circuit open, dropping event");
      return;
    }

    this.queue.push(event);
    if (this.draining) {
      return;
    }
    this.draining = true;
    try {
      while (this.queue.length && !this.stopped) {
        await this.sendBatch(this.queue.splice(0, this.batchSize));
      }
    } finally {
      this.draining = false;
    }
  }

  private async sendBatch(batch: StructuredLogEvent[]) {
    const body = JSON.stringify({ events: batch });
    for (let attempt = 1; attempt <= this.retryAttempts; attempt += 1) {
      try {
        const response = await request(this.options.url, {
          method: "POST",
          headers: {
            "content-type": "application/json",
            ...this.options.headers
          },
          body,
          dispatcher: this.options.dispatcher
        });
        await response.body.dump();
        if (response.statusCode < 200 || response.statusCode >= 300) {
          throw new Error(`Webhook responded with status ${response.statusCode}`);
        }
        return;
      } catch (error) {
        this.options.logger?.warn(`Webhook sink attempt ${attempt} failed`, error);
        if (attempt === this.retryAttempts) {
          this.circuitOpenUntil = Date.now() + this.retryBackoff * 5;
          return;
        }
        await delay(this.retryBackoff * attempt);
      }
    }
  }
}
