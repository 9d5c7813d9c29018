import type { MonitorSettings, ServiceDescriptor, ServiceState } from "@fleetwarden/shared";
import type { DependencyGraph } from "./graph";

/**
 * A Down service with dependents is probed at `rootDownIntervalMs` (when that
 * is shorter than its normal interval): its recovery ends the whole cascade.
 */
export function probeIntervalFor(
  service: ServiceDescriptor,
  state: ServiceState,
  graph: DependencyGraph,
  settings: Pick<MonitorSettings, "probe" | "dependencies">
): number {
  const base = service.intervalMs ?? settings.probe.intervalMs;
  if (state === "down" && graph.hasDependents(service.id)) {
    return Math.min(base, settings.dependencies.rootDownIntervalMs);
  }
  return base;
}
