import { describe, expect, it } from "vitest";
import { discoverAll, normalizeInventory, type DiscoverySource } from "../../src/inventory";
import { settings } from "../helpers";

describe("normalizeInventory", () => {
  it("fills defaults from the recovery settings", () => {
    const [api] = normalizeInventory(
      [{ id: "api", checkType: "http", target: "http://api.test/health" }],
      [],
      settings({ recovery: { maxRestartAttempts: 5 } })
    );

    expect(api).toMatchObject({ id: "api", maxRestartAttempts: 5, dependsOn: [], enabled: true });
    expect(api.remediation).toBeUndefined();
  });

  it("keeps the first entry for a duplicated id and lets configuration win over discovery", () => {
    const services = normalizeInventory(
      [
        { id: "web", checkType: "http", target: "http://web.test/", maxRestartAttempts: 1 },
        { id: "web", checkType: "tcp", target: "web.test:80" }
      ],
      [
        { id: "web", checkType: "container", target: "web" },
        { id: "redis", checkType: "container", target: "redis", group: "cache", remediation: ["docker", "restart", "redis"] },
        { id: "redis", checkType: "unit", target: "redis.service" }
      ]
    );

    expect(services.map(entry => [entry.id, entry.checkType])).toEqual([
      ["web", "http"],
      ["redis", "container"]
    ]);
    expect(services[1]).toMatchObject({ group: "cache", remediation: ["docker", "restart", "redis"], maxRestartAttempts: 3 });
  });
});

describe("discoverAll", () => {
  it("collects entities from healthy sources and reports failing ones", async () => {
    const failures: string[] = [];
    const sources: DiscoverySource[] = [
      { name: "docker", discover: async () => [{ id: "db", checkType: "container", target: "db" }] },
      {
        name: "systemd",
        discover: async () => {
          throw new Error("dbus unavailable");
        }
      }
    ];

    const entities = await discoverAll(sources, (source, error) => {
      failures.push(`${source.name}: ${error instanceof Error ? error.message : String(error)}`);
    });

    expect(entities).toEqual([{ id: "db", checkType: "container", target: "db" }]);
    expect(failures).toEqual(["systemd: dbus unavailable"]);
  });
});
