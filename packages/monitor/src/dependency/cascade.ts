import type { DependencyConfig, ServiceState, StatusTransition } from "@fleetwarden/shared";
import type { DependencyGraph } from "./graph";

function isFailing(state: ServiceState): boolean {
  return state === "down" || state === "degraded";
}

/**
 * Tags failing transitions of dependents with the root that caused them.
 *
 * A root qualifies when it is Down and its Down transition happened no
 * earlier than `correlationWindowMs` before the dependent's transition. A
 * Degraded ancestor never claims dependents. When several ancestors qualify,
 * the farthest one wins (ties go to the earliest Down transition). Down
 * transitions from the current batch are recorded before anything is
 * attributed, so siblings probed in the same tick correlate with their root.
 */
export class CascadeCorrelator {
  private readonly downSince = new Map<string, number>();

  constructor(
    private graph: DependencyGraph,
    private config: DependencyConfig,
    private readonly stateOf: (serviceId: string) => ServiceState
  ) {}

  update(graph: DependencyGraph, config: DependencyConfig): void {
    this.graph = graph;
    this.config = config;
  }

  attribute(transitions: readonly StatusTransition[]): StatusTransition[] {
    for (const transition of transitions) {
      this.recordDown(transition);
    }
    return transitions.map(transition => {
      if (!isFailing(transition.to)) {
        return transition;
      }
      const root = this.rootFor(transition.serviceId, transition.at);
      return root ? { ...transition, causedBy: root } : transition;
    });
  }

  /**
   * The Down ancestor a service's failure is attributed to at `at`, if any.
   * Pass `Number.POSITIVE_INFINITY` as `windowMs` to ignore the window.
   */
  rootFor(serviceId: string, at: number, windowMs: number = this.config.correlationWindowMs): string | undefined {
    let best: { id: string; distance: number; since: number } | undefined;
    for (const [ancestor, distance] of this.graph.ancestors(serviceId)) {
      const since = this.downSince.get(ancestor);
      if (since === undefined || this.stateOf(ancestor) !== "down") {
        continue;
      }
      if (since > at || at - since > windowMs) {
        continue;
      }
      if (!best || distance > best.distance || (distance === best.distance && since < best.since)) {
        best = { id: ancestor, distance, since };
      }
    }
    return best?.id;
  }

  downSinceOf(serviceId: string): number | undefined {
    return this.downSince.get(serviceId);
  }

  restoreDownSince(serviceId: string, since: number): void {
    this.downSince.set(serviceId, since);
  }

  forget(serviceId: string): void {
    this.downSince.delete(serviceId);
  }

  private recordDown(transition: StatusTransition): void {
    if (transition.to !== "down") {
      this.downSince.delete(transition.serviceId);
      return;
    }
    if (transition.from !== "down") {
      this.downSince.set(transition.serviceId, transition.at);
    }
  }
}
