import { describe, expect, it } from "vitest";
import type { ServiceState, StatusTransition } from "@fleetwarden/shared";
import { CascadeCorrelator } from "../../src/dependency/cascade";
import { DependencyGraph } from "../../src/dependency/graph";
import { probeIntervalFor } from "../../src/dependency/priority";
import { capturingLogger, service, settings } from "../helpers";

function transition(serviceId: string, from: ServiceState, to: ServiceState, at: number): StatusTransition {
  return { serviceId, from, to, at, probe: { serviceId, timestamp: at, success: false, latencyMs: 1 } };
}

const fleet = [
  service("postgres"),
  service("api", { dependsOn: ["postgres"] }),
  service("worker", { dependsOn: ["postgres"] }),
  service("nginx", { dependsOn: ["api"] })
];

describe("DependencyGraph", () => {
  it("builds root to dependent edges from dependsOn", () => {
    const graph = DependencyGraph.build(fleet);

    expect(graph.dependentsOf("postgres")).toEqual(["api", "worker"]);
    expect(graph.dependenciesOf("nginx")).toEqual(["api"]);
    expect([...graph.ancestors("nginx").entries()]).toEqual([
      ["api", 1],
      ["postgres", 2]
    ]);
    expect(graph.descendants("postgres").get("nginx")).toBe(2);
  });

  it("drops the edge that would close a cycle and logs it", () => {
    const logger = capturingLogger();
    const graph = DependencyGraph.build(
      [service("a", { dependsOn: ["c"] }), service("b", { dependsOn: ["a"] }), service("c", { dependsOn: ["b"] })],
      logger
    );

    expect(graph.edges().map(edge => `${edge.root}->${edge.dependent}`)).toEqual(["c->a", "a->b"]);
    expect(graph.ignoredEdges()).toEqual([{ root: "b", dependent: "c", source: "declared" }]);
    expect(logger.named("dependency_cycle_ignored")).toHaveLength(1);
    expect(graph.ancestors("b").size).toBe(2);
  });

  it("ignores self-dependencies and unknown ids", () => {
    const logger = capturingLogger();
    const graph = DependencyGraph.build([service("a", { dependsOn: ["a", "ghost"] })], logger);

    expect(graph.edges()).toEqual([]);
    expect(logger.named("dependency_unknown")[0].payload).toEqual({ serviceId: "a", dependsOn: "ghost" });
  });

  it("hangs group members off the marked root or the first member", () => {
    const graph = DependencyGraph.build([
      service("web-1", { group: "web" }),
      service("lb", { group: "web", groupRoot: true }),
      service("web-2", { group: "web" }),
      service("q-1", { group: "queue" }),
      service("q-2", { group: "queue" })
    ]);

    expect(graph.dependentsOf("lb")).toEqual(["web-1", "web-2"]);
    expect(graph.dependentsOf("q-1")).toEqual(["q-2"]);
    expect(graph.edges().every(edge => edge.source === "group")).toBe(true);
  });
});

describe("CascadeCorrelator", () => {
  function correlator(states: Record<string, ServiceState>) {
    const graph = DependencyGraph.build(fleet);
    return new CascadeCorrelator(graph, settings().dependencies, id => states[id] ?? "checking");
  }

  it("attributes dependents to the farthest Down root in the same batch", () => {
    const subject = correlator({ postgres: "down", api: "degraded", nginx: "degraded" });

    const result = subject.attribute([
      transition("nginx", "operational", "degraded", 1_000),
      transition("api", "operational", "degraded", 1_000),
      transition("postgres", "operational", "down", 1_000)
    ]);

    expect(result.map(entry => [entry.serviceId, entry.causedBy])).toEqual([
      ["nginx", "postgres"],
      ["api", "postgres"],
      ["postgres", undefined]
    ]);
  });

  it("does not attribute outside the correlation window", () => {
    const subject = correlator({ postgres: "down", worker: "degraded" });
    subject.attribute([transition("postgres", "operational", "down", 1_000)]);

    const [late] = subject.attribute([transition("worker", "operational", "degraded", 61_001)]);
    const [early] = subject.attribute([transition("worker", "degraded", "down", 60_999)]);

    expect(late.causedBy).toBeUndefined();
    expect(early.causedBy).toBe("postgres");
  });

  it("forgets a root once it recovers", () => {
    const states: Record<string, ServiceState> = { postgres: "down", api: "degraded" };
    const subject = correlator(states);
    subject.attribute([transition("postgres", "operational", "down", 0)]);
    states.postgres = "operational";
    subject.attribute([transition("postgres", "down", "operational", 10)]);

    const [result] = subject.attribute([transition("api", "operational", "degraded", 20)]);

    expect(result.causedBy).toBeUndefined();
    expect(subject.downSinceOf("postgres")).toBeUndefined();
  });

  it("measures the window from the root's Down transition, not its first failure", () => {
    const states: Record<string, ServiceState> = { postgres: "degraded" };
    const subject = correlator(states);
    subject.attribute([transition("postgres", "operational", "degraded", 15_000)]);

    const [whileDegraded] = subject.attribute([transition("api", "operational", "degraded", 20_000)]);

    states.postgres = "down";
    subject.attribute([transition("postgres", "degraded", "down", 30_000)]);
    const [atWindowEnd] = subject.attribute([transition("worker", "operational", "degraded", 90_000)]);
    const [pastWindow] = subject.attribute([transition("nginx", "operational", "degraded", 90_001)]);

    expect(whileDegraded.causedBy).toBeUndefined();
    expect(subject.downSinceOf("postgres")).toBe(30_000);
    expect(atWindowEnd.causedBy).toBe("postgres");
    expect(pastWindow.causedBy).toBeUndefined();
  });
});

describe("probeIntervalFor", () => {
  const graph = DependencyGraph.build(fleet);
  const config = settings();

  it("shortens the interval of a Down root with dependents", () => {
    expect(probeIntervalFor(fleet[0], "down", graph, config)).toBe(5_000);
    expect(probeIntervalFor(fleet[0], "degraded", graph, config)).toBe(15_000);
  });

  it("keeps the normal interval for leaves and faster per-service intervals", () => {
    expect(probeIntervalFor(fleet[3], "down", graph, config)).toBe(15_000);
    expect(probeIntervalFor(service("postgres", { intervalMs: 2_000 }), "down", graph, config)).toBe(2_000);
  });
});
