import { performance } from "node:perf_hooks";
import { LogLevel, type ServiceDescriptor } from "@fleetwarden/shared";
import type { ComponentLogger } from "@fleetwarden/logger";
import { formatCommand, toArgv, type CommandRunner } from "../probe/commandRunner";

export interface RemediationOutcome {
  ok: boolean;
  exitCode: number | null;
  durationMs: number;
  detail?: string;
}

/**
 * Issues remediation commands. Reports whether the invocation succeeded
 * (exit 0), never whether the service recovered.
 */
export class RemediationExecutor {
  constructor(
    private readonly runner: CommandRunner,
    private readonly logger: ComponentLogger,
    private timeoutMs: number
  ) {}

  updateTimeout(timeoutMs: number): void {
    this.timeoutMs = timeoutMs;
  }

  async run(service: ServiceDescriptor, attempt: number): Promise<RemediationOutcome> {
    if (!service.remediation) {
      return { ok: false, exitCode: null, durationMs: 0, detail: "no remediation command" };
    }
    const argv = toArgv(service.remediation);
    const command = formatCommand(service.remediation);
    const started = performance.now();
    this.logger.log(LogLevel.INFO, "remediation_issued", { serviceId: service.id, attempt, command });

    const result = await this.runner.run(argv, { timeoutMs: this.timeoutMs });
    const durationMs = Math.round(performance.now() - started);
    const ok = result.exitCode === 0;
    const detail = ok
      ? undefined
      : result.timedOut
        ? `timed out after ${this.timeoutMs}ms`
        : result.error ?? `exit ${result.exitCode ?? "?"}${result.stderr.trim() ? `: ${result.stderr.trim().slice(0, 200)}` : ""}`;

    this.logger.log(ok ? LogLevel.INFO : LogLevel.WARN, "remediation_completed", {
      serviceId: service.id,
      attempt,
      ok,
      exitCode: result.exitCode,
      durationMs,
      detail
    });
    return { ok, exitCode: result.exitCode, durationMs, detail };
  }
}
