import type { Dispatcher } from "undici";
import type { ServiceDescriptor } from "@fleetwarden/shared";
import type { CommandRunner } from "../commandRunner";

export interface CheckContext {
  signal: AbortSignal;
  timeoutMs: number;
  runner: CommandRunner;
  dispatcher?: Dispatcher;
}

export interface CheckOutcome {
  success: boolean;
  statusCode?: number;
  error?: string;
}

/** Checkers may throw; the engine turns any thrown error into a failed result. */
export type HealthChecker = (service: ServiceDescriptor, context: CheckContext) => Promise<CheckOutcome>;
