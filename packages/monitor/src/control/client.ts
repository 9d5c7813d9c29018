import { request, type Dispatcher } from "undici";
import type { FleetSnapshot } from "@fleetwarden/shared";
import { MonitorError } from "../errors";

export class ControlRequestError extends MonitorError {
  constructor(public readonly statusCode: number, message: string) {
    super(`Control request failed (HTTP ${statusCode}): ${message}`);
    this.name = "ControlRequestError";
  }
}

type HttpMethod = "GET" | "POST" | "DELETE";

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function isFleetSnapshot(value: unknown): value is FleetSnapshot {
  return (
    isRecord(value) &&
    typeof value.overall === "string" &&
    Array.isArray(value.services) &&
    Array.isArray(value.openAlertGroups) &&
    Array.isArray(value.activeMaintenance)
  );
}

/** Talks to a running daemon's control server. */
export class ControlClient {
  constructor(
    private readonly baseUrl: string,
    private readonly token?: string,
    private readonly dispatcher?: Dispatcher
  ) {}

  async status(): Promise<FleetSnapshot> {
    const payload = await this.call("GET", "/status");
    if (!isFleetSnapshot(payload)) {
      throw new ControlRequestError(200, "unexpected status payload");
    }
    return payload;
  }

  acknowledge(groupId: string, actor?: string): Promise<unknown> {
    return this.call("POST", `/alerts/${encodeURIComponent(groupId)}/ack`, actor ? { actor } : {});
  }

  toggleMaintenance(body: { services?: string[]; durationMs?: number; reason?: string }): Promise<unknown> {
    return this.call("POST", "/maintenance/toggle", body);
  }

  scheduleMaintenance(body: {
    startAt: string;
    durationMs: number;
    services?: string[];
    reason?: string;
  }): Promise<unknown> {
    return this.call("POST", "/maintenance/schedule", body);
  }

  cancelMaintenance(windowId: string): Promise<unknown> {
    return this.call("DELETE", `/maintenance/${encodeURIComponent(windowId)}`);
  }

  private async call(method: HttpMethod, path: string, body?: unknown): Promise<unknown> {
    const headers: Record<string, string> = { accept: "application/json" };
    if (body !== undefined) {
      headers["content-type"] = "application/json";
    }
    if (this.token) {
      headers.authorization = `Bearer ${this.token}`;
    }
    const response = await request(new URL(path, this.baseUrl), {
      method,
      headers,
      body: body === undefined ? undefined : JSON.stringify(body),
      dispatcher: this.dispatcher
    });
    const text = await response.body.text();
    let payload: unknown = undefined;
    if (text.length > 0) {
      try {
        payload = JSON.parse(text);
      } catch {
        payload = text;
      }
    }
    if (response.statusCode >= 400) {
      const message = isRecord(payload) && typeof payload.error === "string" ? payload.error : text;
      throw new ControlRequestError(response.statusCode, message);
    }
    return payload;
  }
}
