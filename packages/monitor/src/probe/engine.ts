import { performance } from "node:perf_hooks";
import type { Dispatcher } from "undici";
import { LogLevel, type ProbeConfig, type ProbeResult, type ServiceDescriptor } from "@fleetwarden/shared";
import type { ComponentLogger } from "@fleetwarden/logger";
import { runBounded } from "../concurrency/pool";
import { describeError } from "../errors";
import { defaultCheckers, type CheckerRegistry } from "./checkers";
import { execFileRunner, type CommandRunner } from "./commandRunner";
import { ProbeLog } from "./probeLog";

export class ProbeTimeoutError extends Error {
  constructor(public readonly timeoutMs: number) {
    super(`Timeout after ${timeoutMs}ms`);
    this.name = "ProbeTimeoutError";
  }
}

export interface ProbeEngineOptions {
  probe: ProbeConfig;
  logger: ComponentLogger;
  checkers?: Partial<CheckerRegistry>;
  runner?: CommandRunner;
  dispatcher?: Dispatcher;
  clock?: () => number;
}

const NETWORK_ERRORS: Record<string, string> = {
  ECONNREFUSED: "Connection refused",
  ECONNRESET: "Connection reset",
  EHOSTUNREACH: "Host unreachable",
  ENETUNREACH: "Network unreachable",
  ENOTFOUND: "DNS lookup failed",
  EAI_AGAIN: "DNS lookup failed"
};

export function describeProbeError(error: unknown): string {
  if (error instanceof Error && "code" in error && typeof error.code === "string") {
    const label = NETWORK_ERRORS[error.code];
    if (label) {
      return label;
    }
  }
  return describeError(error);
}

/**
 * Executes health checks. Never throws for a single target: every failure,
 * including a checker that throws or overruns its timeout, becomes a failed
 * ProbeResult.
 */
export class ProbeEngine {
  readonly log: ProbeLog;
  private readonly checkers: CheckerRegistry;
  private readonly runner: CommandRunner;
  private readonly clock: () => number;
  private readonly inFlight = new Set<Promise<ProbeResult>>();
  private config: ProbeConfig;

  constructor(private readonly options: ProbeEngineOptions) {
    this.config = options.probe;
    this.log = new ProbeLog(options.probe.historySize);
    this.checkers = { ...defaultCheckers, ...options.checkers };
    this.runner = options.runner ?? execFileRunner;
    this.clock = options.clock ?? Date.now;
  }

  updateConfig(next: ProbeConfig): void {
    this.config = next;
  }

  /** Resolves once every service has a result, stamped with the batch time. */
  async probeBatch(services: readonly ServiceDescriptor[], now: number = this.clock()): Promise<ProbeResult[]> {
    if (services.length === 0) {
      return [];
    }
    const started = performance.now();
    const results = await runBounded(services, this.config.concurrency, service =>
      this.probeOne(service, now)
    );
    const failed = results.filter(result => !result.success).length;
    this.options.logger.log(LogLevel.DEBUG, "probe_batch_completed", {
      probed: results.length,
      failed,
      durationMs: Math.round(performance.now() - started)
    });
    return results;
  }

  probeOne(service: ServiceDescriptor, timestamp?: number): Promise<ProbeResult> {
    const task = this.execute(service, timestamp);
    this.inFlight.add(task);
    return task.finally(() => {
      this.inFlight.delete(task);
    });
  }

  /** Waits for in-flight checks, giving up after `timeoutMs`. Returns false on timeout. */
  async drain(timeoutMs: number): Promise<boolean> {
    if (this.inFlight.size === 0) {
      return true;
    }
    let timer: NodeJS.Timeout | undefined;
    const expired = new Promise<false>(resolve => {
      timer = setTimeout(() => resolve(false), timeoutMs);
    });
    const settled = Promise.allSettled([...this.inFlight]).then(() => true);
    try {
      return await Promise.race([settled, expired]);
    } finally {
      clearTimeout(timer);
    }
  }

  private async execute(service: ServiceDescriptor, timestamp?: number): Promise<ProbeResult> {
    const timeoutMs = service.timeoutMs ?? this.config.timeoutMs;
    const controller = new AbortController();
    const started = performance.now();
    let timer: NodeJS.Timeout | undefined;
    const deadline = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        const error = new ProbeTimeoutError(timeoutMs);
        controller.abort(error);
        reject(error);
      }, timeoutMs);
    });

    let result: ProbeResult;
    try {
      const checker = this.checkers[service.checkType];
      const outcome = await Promise.race([
        checker(service, {
          signal: controller.signal,
          timeoutMs,
          runner: this.runner,
          dispatcher: this.options.dispatcher
        }),
        deadline
      ]);
      result = {
        serviceId: service.id,
        timestamp: timestamp ?? this.clock(),
        success: outcome.success,
        latencyMs: Math.round(performance.now() - started),
        statusCode: outcome.statusCode,
        error: outcome.success ? undefined : outcome.error ?? "Check failed"
      };
    } catch (error) {
      const timedOut = error instanceof ProbeTimeoutError || controller.signal.aborted;
      result = {
        serviceId: service.id,
        timestamp: timestamp ?? this.clock(),
        success: false,
        latencyMs: Math.round(performance.now() - started),
        error: timedOut ? `Timeout after ${timeoutMs}ms` : describeProbeError(error)
      };
    } finally {
      clearTimeout(timer);
    }

    if (!result.success) {
      this.options.logger.log(LogLevel.DEBUG, "probe_failed", {
        serviceId: service.id,
        checkType: service.checkType,
        error: result.error
      });
    }
    this.log.append(result);
    return result;
  }
}
