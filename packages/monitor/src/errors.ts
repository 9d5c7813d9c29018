export class MonitorError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "MonitorError";
  }
}

/** No configured state path is writable; the monitor must not run without durable state. */
export class StateStoreUnavailableError extends MonitorError {
  constructor(public readonly attemptedPaths: string[], options?: { cause?: unknown }) {
    super(`No writable state path (tried: ${attemptedPaths.join(", ")})`, options);
    this.name = "StateStoreUnavailableError";
  }
}

export class AlertGroupNotFoundError extends MonitorError {
  constructor(public readonly groupId: string) {
    super(`Alert group ${groupId} is not open`);
    this.name = "AlertGroupNotFoundError";
  }
}

export class UnknownServiceError extends MonitorError {
  constructor(public readonly serviceIds: string[]) {
    super(`Unknown service(s): ${serviceIds.join(", ")}`);
    this.name = "UnknownServiceError";
  }
}

export class MaintenanceWindowNotFoundError extends MonitorError {
  constructor(public readonly windowId: string) {
    super(`Maintenance window ${windowId} does not exist`);
    this.name = "MaintenanceWindowNotFoundError";
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
