import { LogLevel, type ServiceDescriptor } from "@fleetwarden/shared";
import type { ComponentLogger } from "@fleetwarden/logger";

export interface DependencyEdge {
  root: string;
  dependent: string;
  source: "declared" | "group";
}

/**
 * Directed root → dependent edges. Edges are added in declaration order
 * (declared `dependsOn` first, then discovery groups); an edge that would close
 * a cycle is dropped, so every walk over the graph terminates.
 */
export class DependencyGraph {
  private readonly dependents = new Map<string, string[]>();
  private readonly dependencies = new Map<string, string[]>();
  private readonly accepted: DependencyEdge[] = [];
  private readonly ignored: DependencyEdge[] = [];

  private constructor(private readonly logger?: ComponentLogger) {}

  static build(services: readonly ServiceDescriptor[], logger?: ComponentLogger): DependencyGraph {
    const graph = new DependencyGraph(logger);
    const known = new Set(services.map(service => service.id));

    for (const service of services) {
      for (const root of service.dependsOn) {
        if (!known.has(root)) {
          logger?.log(LogLevel.WARN, "dependency_unknown", { serviceId: service.id, dependsOn: root });
          continue;
        }
        graph.addEdge({ root, dependent: service.id, source: "declared" });
      }
    }

    for (const [group, members] of groupMembers(services)) {
      const root = members.find(member => member.groupRoot) ?? members[0];
      for (const member of members) {
        if (member.id !== root.id) {
          graph.addEdge({ root: root.id, dependent: member.id, source: "group" }, group);
        }
      }
    }
    return graph;
  }

  dependentsOf(serviceId: string): readonly string[] {
    return this.dependents.get(serviceId) ?? [];
  }

  dependenciesOf(serviceId: string): readonly string[] {
    return this.dependencies.get(serviceId) ?? [];
  }

  hasDependents(serviceId: string): boolean {
    return this.dependentsOf(serviceId).length > 0;
  }

  /** Every transitive root of `serviceId` with its hop distance (breadth-first, nearest first). */
  ancestors(serviceId: string): Map<string, number> {
    return this.walk(serviceId, id => this.dependenciesOf(id));
  }

  descendants(serviceId: string): Map<string, number> {
    return this.walk(serviceId, id => this.dependentsOf(id));
  }

  reaches(from: string, to: string): boolean {
    return from === to || this.descendants(from).has(to);
  }

  edges(): readonly DependencyEdge[] {
    return this.accepted;
  }

  ignoredEdges(): readonly DependencyEdge[] {
    return this.ignored;
  }

  private addEdge(edge: DependencyEdge, group?: string): void {
    if (this.dependentsOf(edge.root).includes(edge.dependent)) {
      return;
    }
    if (this.reaches(edge.dependent, edge.root)) {
      this.ignored.push(edge);
      this.logger?.log(LogLevel.WARN, "dependency_cycle_ignored", {
        root: edge.root,
        dependent: edge.dependent,
        source: edge.source,
        group
      });
      return;
    }
    this.dependents.set(edge.root, [...this.dependentsOf(edge.root), edge.dependent]);
    this.dependencies.set(edge.dependent, [...this.dependenciesOf(edge.dependent), edge.root]);
    this.accepted.push(edge);
  }

  private walk(start: string, next: (id: string) => readonly string[]): Map<string, number> {
    const distances = new Map<string, number>();
    let frontier = [start];
    let distance = 0;
    while (frontier.length > 0) {
      distance += 1;
      const upcoming: string[] = [];
      for (const id of frontier) {
        for (const neighbour of next(id)) {
          if (neighbour !== start && !distances.has(neighbour)) {
            distances.set(neighbour, distance);
            upcoming.push(neighbour);
          }
        }
      }
      frontier = upcoming;
    }
    return distances;
  }
}

function groupMembers(services: readonly ServiceDescriptor[]): Map<string, ServiceDescriptor[]> {
  const groups = new Map<string, ServiceDescriptor[]>();
  for (const service of services) {
    if (!service.group) {
      continue;
    }
    groups.set(service.group, [...(groups.get(service.group) ?? []), service]);
  }
  return groups;
}
