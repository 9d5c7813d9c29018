import {
  DEFAULT_SETTINGS,
  toServiceDescriptor,
  type CheckType,
  type CommandSpec,
  type MonitorSettings,
  type ServiceConfig,
  type ServiceDescriptor
} from "@fleetwarden/shared";

/** A service found by a discovery collaborator (container or unit listing). */
export interface DiscoveredEntity {
  id: string;
  checkType: CheckType;
  target: string;
  name?: string;
  group?: string;
  groupRoot?: boolean;
  remediation?: CommandSpec;
}

export interface DiscoverySource {
  readonly name: string;
  discover(): Promise<DiscoveredEntity[]>;
}

/**
 * Merges configured services with discovered ones into one descriptor list.
 * Ids are unique: a configured entry wins over a discovered one, and the first
 * of several entries with the same id wins within each list.
 */
export function normalizeInventory(
  declared: readonly ServiceConfig[],
  discovered: readonly DiscoveredEntity[] = [],
  settings: Pick<MonitorSettings, "recovery"> = DEFAULT_SETTINGS
): ServiceDescriptor[] {
  const byId = new Map<string, ServiceDescriptor>();
  for (const service of declared) {
    if (!byId.has(service.id)) {
      byId.set(service.id, toServiceDescriptor(service, settings));
    }
  }
  for (const entity of discovered) {
    if (byId.has(entity.id)) {
      continue;
    }
    byId.set(
      entity.id,
      toServiceDescriptor(
        {
          id: entity.id,
          name: entity.name,
          checkType: entity.checkType,
          target: entity.target,
          remediation: entity.remediation,
          group: entity.group,
          groupRoot: entity.groupRoot
        },
        settings
      )
    );
  }
  return [...byId.values()];
}

/** Runs every discovery source; a failing source contributes nothing. */
export async function discoverAll(
  sources: readonly DiscoverySource[],
  onError: (source: DiscoverySource, error: unknown) => void
): Promise<DiscoveredEntity[]> {
  const results = await Promise.allSettled(sources.map(source => source.discover()));
  const entities: DiscoveredEntity[] = [];
  results.forEach((result, index) => {
    if (result.status === "fulfilled") {
      entities.push(...result.value);
    } else {
      onError(sources[index], result.reason);
    }
  });
  return entities;
}
