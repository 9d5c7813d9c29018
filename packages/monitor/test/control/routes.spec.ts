import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { Agent, MockAgent } from "undici";
import type { AlertGroup, FleetSnapshot, MaintenanceScope, MaintenanceWindow } from "@fleetwarden/shared";
import { formatStatus } from "../../src/cli";
import { ControlClient, ControlRequestError } from "../../src/control/client";
import { routeControlRequest, type ControlTarget } from "../../src/control/routes";
import { ControlServer } from "../../src/control/server";
import { AlertGroupNotFoundError, MaintenanceWindowNotFoundError, UnknownServiceError } from "../../src/errors";
import type { ToggleResult } from "../../src/maintenance/windowManager";
import { capturingLogger } from "../helpers";

const GROUP: AlertGroup = {
  id: "ag_1",
  rootServiceId: "postgres",
  memberServiceIds: ["postgres", "api"],
  firstSeenAt: 0,
  lastSeenAt: 1_000,
  acknowledged: false,
  escalated: true
};

const SNAPSHOT: FleetSnapshot = {
  id: "snap-1",
  overall: "failed",
  issuedAt: 2_000,
  services: [
    {
      serviceId: "postgres",
      name: "postgres",
      inMaintenance: false,
      uptime: {
        totalChecks: 8,
        successfulChecks: 6,
        failedChecks: 2,
        uptimePercent: 75,
        averageResponseMs: 6.5,
        lastCheckAt: 1_900,
        lastState: "down"
      },
      downtimeMs: 1_500,
      changes: [{ at: 500, from: "degraded", to: "down", error: "HTTP 503" }],
      record: {
        state: "down",
        consecutiveFailures: 3,
        consecutiveSuccesses: 0,
        lastTransitionAt: 500,
        latencies: [4, 9]
      },
      incident: { attemptsUsed: 2, phase: "backoff", openedAt: 500 }
    },
    {
      serviceId: "api",
      name: "api",
      inMaintenance: true,
      uptime: { totalChecks: 0, successfulChecks: 0, failedChecks: 0, uptimePercent: 0, averageResponseMs: 0 },
      downtimeMs: 0,
      changes: [],
      record: { state: "checking", consecutiveFailures: 0, consecutiveSuccesses: 0, lastTransitionAt: 0, latencies: [] }
    }
  ],
  openAlertGroups: [GROUP],
  activeMaintenance: [
    {
      id: "mw_1",
      scope: { kind: "services", serviceIds: ["api"] },
      startAt: 0,
      durationMs: 60_000,
      source: "scheduled"
    }
  ]
};

class FakeTarget implements ControlTarget {
  readonly calls: unknown[][] = [];
  subscribers = 0;

  getSnapshot(): FleetSnapshot {
    return SNAPSHOT;
  }

  async acknowledge(groupId: string, actor = "operator"): Promise<AlertGroup> {
    this.calls.push(["acknowledge", groupId, actor]);
    if (groupId !== GROUP.id) {
      throw new AlertGroupNotFoundError(groupId);
    }
    return { ...GROUP, acknowledged: true, acknowledgedBy: actor, acknowledgedAt: 1_500 };
  }

  async toggleMaintenance(
    scope: MaintenanceScope = { kind: "all" },
    options: { durationMs?: number; reason?: string } = {}
  ): Promise<ToggleResult> {
    this.calls.push(["toggleMaintenance", scope, options]);
    if (scope.kind === "services" && scope.serviceIds.includes("ghost")) {
      throw new UnknownServiceError(["ghost"]);
    }
    return {
      active: true,
      window: { id: "mw_2", scope, startAt: 1_000, durationMs: options.durationMs ?? null, source: "manual" }
    };
  }

  async scheduleMaintenance(
    startAt: number,
    durationMs: number,
    scope: MaintenanceScope,
    reason?: string
  ): Promise<MaintenanceWindow> {
    this.calls.push(["scheduleMaintenance", startAt, durationMs, scope, reason]);
    return { id: "mw_3", scope, startAt, durationMs, source: "scheduled", reason };
  }

  async cancelMaintenance(windowId: string): Promise<MaintenanceWindow> {
    this.calls.push(["cancelMaintenance", windowId]);
    if (windowId === "explode") {
      throw new Error("disk on fire");
    }
    if (windowId !== "mw_1") {
      throw new MaintenanceWindowNotFoundError(windowId);
    }
    return SNAPSHOT.activeMaintenance[0];
  }

  subscribe(): () => void {
    this.subscribers += 1;
    return () => {
      this.subscribers -= 1;
    };
  }
}

describe("routeControlRequest", () => {
  it("requires the bearer token when one is configured", async () => {
    const target = new FakeTarget();

    expect(await routeControlRequest(target, { method: "GET", path: "/status" }, "test-secret")).toEqual({
      status: 401,
      body: { error: "unauthorized" }
    });
    expect(
      await routeControlRequest(target, { method: "GET", path: "/status", authorization: "Bearer nope" }, "test-secret")
    ).toMatchObject({ status: 401 });
    expect(
      await routeControlRequest(
        target,
        { method: "GET", path: "/status?verbose=1", authorization: "Bearer test-secret" },
        "test-secret"
      )
    ).toEqual({ status: 200, body: SNAPSHOT });
  });

  it("acknowledges alert groups with an optional actor", async () => {
    const target = new FakeTarget();

    const named = await routeControlRequest(target, { method: "POST", path: "/alerts/ag_1/ack", body: { actor: "alice" } });
    const anonymous = await routeControlRequest(target, { method: "post", path: "/alerts/ag_1/ack" });

    expect(named).toMatchObject({ status: 200, body: { acknowledgedBy: "alice" } });
    expect(anonymous.status).toBe(200);
    expect(target.calls).toEqual([
      ["acknowledge", "ag_1", "alice"],
      ["acknowledge", "ag_1", "operator"]
    ]);
  });

  it("maps a missing group to 404", async () => {
    const response = await routeControlRequest(new FakeTarget(), { method: "POST", path: "/alerts/ag_9/ack" });

    expect(response).toEqual({ status: 404, body: { error: "Alert group ag_9 is not open" } });
  });

  it("rejects bodies that do not match the route's schema", async () => {
    const target = new FakeTarget();

    const extra = await routeControlRequest(target, { method: "POST", path: "/alerts/ag_1/ack", body: { who: "alice" } });
    const emptyList = await routeControlRequest(target, {
      method: "POST",
      path: "/maintenance/toggle",
      body: { services: [] }
    });

    expect(extra).toEqual({ status: 400, body: { error: "invalid body: data must NOT have additional properties" } });
    expect(emptyList).toEqual({
      status: 400,
      body: { error: "invalid body: data/services must NOT have fewer than 1 items" }
    });
    expect(target.calls).toEqual([]);
  });

  it("toggles maintenance for the whole fleet or a service list", async () => {
    const target = new FakeTarget();

    await routeControlRequest(target, { method: "POST", path: "/maintenance/toggle" });
    const scoped = await routeControlRequest(target, {
      method: "POST",
      path: "/maintenance/toggle",
      body: { services: ["api"], durationMs: 60_000, reason: "deploy" }
    });

    expect(scoped.status).toBe(200);
    expect(target.calls).toEqual([
      ["toggleMaintenance", { kind: "all" }, { durationMs: undefined, reason: undefined }],
      ["toggleMaintenance", { kind: "services", serviceIds: ["api"] }, { durationMs: 60_000, reason: "deploy" }]
    ]);
  });

  it("maps unknown services to 400", async () => {
    const response = await routeControlRequest(new FakeTarget(), {
      method: "POST",
      path: "/maintenance/toggle",
      body: { services: ["ghost"] }
    });

    expect(response).toEqual({ status: 400, body: { error: "Unknown service(s): ghost" } });
  });

  it("schedules maintenance from an ISO start time", async () => {
    const target = new FakeTarget();

    const created = await routeControlRequest(target, {
      method: "POST",
      path: "/maintenance/schedule",
      body: { startAt: "2026-01-01T00:00:00.000Z", durationMs: 1_800_000, reason: "upgrade" }
    });
    const invalid = await routeControlRequest(target, {
      method: "POST",
      path: "/maintenance/schedule",
      body: { startAt: "tomorrow", durationMs: 1_000 }
    });

    expect(created.status).toBe(201);
    expect(target.calls).toEqual([
      ["scheduleMaintenance", 1_767_225_600_000, 1_800_000, { kind: "all" }, "upgrade"]
    ]);
    expect(invalid).toEqual({ status: 400, body: { error: "invalid startAt: tomorrow" } });
  });

  it("cancels windows and maps failures", async () => {
    const target = new FakeTarget();

    expect(await routeControlRequest(target, { method: "DELETE", path: "/maintenance/mw_1" })).toMatchObject({
      status: 200,
      body: { id: "mw_1" }
    });
    expect(await routeControlRequest(target, { method: "DELETE", path: "/maintenance/mw_9" })).toEqual({
      status: 404,
      body: { error: "Maintenance window mw_9 does not exist" }
    });
    expect(await routeControlRequest(target, { method: "DELETE", path: "/maintenance/explode" })).toEqual({
      status: 500,
      body: { error: "disk on fire" }
    });
  });

  it("answers 404 for anything else", async () => {
    expect(await routeControlRequest(new FakeTarget(), { method: "PUT", path: "/status/" })).toEqual({
      status: 404,
      body: { error: "no route for PUT /status" }
    });
  });
});

describe("ControlClient", () => {
  let agent: MockAgent;

  beforeEach(() => {
    agent = new MockAgent();
    agent.disableNetConnect();
  });

  afterEach(async () => {
    await agent.close();
  });

  it("fetches the fleet snapshot with the bearer token", async () => {
    agent
      .get("http://monitor.test")
      .intercept({ path: "/status", method: "GET", headers: { authorization: "Bearer test-secret" } })
      .reply(200, JSON.stringify(SNAPSHOT), { headers: { "content-type": "application/json" } });
    const client = new ControlClient("http://monitor.test", "test-secret", agent);

    expect(await client.status()).toEqual(SNAPSHOT);
  });

  it("surfaces the server's error message", async () => {
    agent
      .get("http://monitor.test")
      .intercept({ path: "/alerts/ag_9/ack", method: "POST" })
      .reply(404, JSON.stringify({ error: "Alert group ag_9 is not open" }));
    const client = new ControlClient("http://monitor.test", undefined, agent);

    const failure = client.acknowledge("ag_9");

    await expect(failure).rejects.toBeInstanceOf(ControlRequestError);
    await expect(failure).rejects.toThrow("Control request failed (HTTP 404): Alert group ag_9 is not open");
  });

  it("rejects a status payload that is not a snapshot", async () => {
    agent.get("http://monitor.test").intercept({ path: "/status", method: "GET" }).reply(200, "[]");
    const client = new ControlClient("http://monitor.test", undefined, agent);

    await expect(client.status()).rejects.toThrow("Control request failed (HTTP 200): unexpected status payload");
  });
});

describe("ControlServer", () => {
  it("serves control routes over HTTP", async () => {
    const target = new FakeTarget();
    const server = new ControlServer(
      { enabled: true, host: "127.0.0.1", port: 0, authToken: "test-secret" },
      target,
      capturingLogger()
    );
    const dispatcher = new Agent();
    await server.start();
    try {
      const client = new ControlClient(`http://127.0.0.1:${server.port() ?? 0}`, "test-secret", dispatcher);
      const anonymous = new ControlClient(`http://127.0.0.1:${server.port() ?? 0}`, undefined, dispatcher);

      expect(await client.status()).toEqual(SNAPSHOT);
      expect(await client.toggleMaintenance({ services: ["api"] })).toMatchObject({ active: true });
      await expect(anonymous.status()).rejects.toThrow("Control request failed (HTTP 401): unauthorized");
      expect(target.subscribers).toBe(1);
    } finally {
      await dispatcher.close();
      await server.stop();
    }
    expect(target.subscribers).toBe(0);
  });

  it("stays down when disabled", async () => {
    const server = new ControlServer({ enabled: false, host: "127.0.0.1", port: 0 }, new FakeTarget(), capturingLogger());

    await server.start();

    expect(server.port()).toBeUndefined();
  });
});

describe("formatStatus", () => {
  it("renders services, alert groups and maintenance", () => {
    expect(formatStatus(SNAPSHOT)).toEqual([
      "overall: failed (operational 0, degraded 0, down 1, checking 1)",
      "  postgres down 9ms uptime 75.0% [incident backoff attempts=2]",
      "  api checking - [maintenance]",
      "alert ag_1 root=postgres members=postgres,api escalated",
      "maintenance mw_1 scope=api until 1970-01-01T00:01:00.000Z"
    ]);
  });
});
