import type { ServiceDescriptor } from "@fleetwarden/shared";
import { toArgv, type CommandResult } from "../commandRunner";
import type { CheckContext, CheckOutcome } from "./types";

function trimOutput(output: string): string {
  return output.trim().slice(0, 100);
}

function invocationFailure(label: string, result: CommandResult): CheckOutcome {
  if (result.timedOut) {
    return { success: false, error: `${label} timed out` };
  }
  if (result.error) {
    return { success: false, error: `${label} failed: ${result.error}` };
  }
  const stderr = trimOutput(result.stderr);
  return {
    success: false,
    error: `${label} failed (exit ${result.exitCode ?? "?"})${stderr ? `: ${stderr}` : ""}`
  };
}

/** `docker inspect` must report the container as running. */
export async function checkContainer(service: ServiceDescriptor, context: CheckContext): Promise<CheckOutcome> {
  const result = await context.runner.run(
    ["docker", "inspect", "--format", "{{.State.Status}}", service.target],
    { timeoutMs: context.timeoutMs, signal: context.signal }
  );
  if (result.exitCode !== 0) {
    return invocationFailure("docker inspect", result);
  }
  const status = result.stdout.trim();
  return status === "running" ? { success: true } : { success: false, error: `Container ${status || "unknown"}` };
}

/** `systemctl is-active` must print `active`. */
export async function checkUnit(service: ServiceDescriptor, context: CheckContext): Promise<CheckOutcome> {
  const result = await context.runner.run(["systemctl", "is-active", service.target], {
    timeoutMs: context.timeoutMs,
    signal: context.signal
  });
  const state = result.stdout.trim();
  if (state === "active") {
    return { success: true };
  }
  if (result.error || result.timedOut) {
    return invocationFailure("systemctl is-active", result);
  }
  return { success: false, error: `Unit ${state || "unknown"}` };
}

export async function checkCustom(service: ServiceDescriptor, context: CheckContext): Promise<CheckOutcome> {
  const argv = toArgv(service.target);
  if (argv.length === 0) {
    throw new Error("No custom command specified");
  }
  const result = await context.runner.run(argv, { timeoutMs: context.timeoutMs, signal: context.signal });
  if (result.exitCode === 0) {
    return { success: true };
  }
  return invocationFailure("Custom check", result);
}
