import type { ProbeResult } from "@fleetwarden/shared";

/**
 * Append-only, per-service history of probe results, bounded to the newest
 * `capacity` entries per service.
 */
export class ProbeLog {
  private readonly entries = new Map<string, ProbeResult[]>();

  constructor(private readonly capacity: number) {}

  append(result: ProbeResult): void {
    const list = this.entries.get(result.serviceId) ?? [];
    list.push(result);
    if (list.length > this.capacity) {
      list.splice(0, list.length - this.capacity);
    }
    this.entries.set(result.serviceId, list);
  }

  history(serviceId: string): readonly ProbeResult[] {
    return this.entries.get(serviceId) ?? [];
  }

  latest(serviceId: string): ProbeResult | undefined {
    const list = this.entries.get(serviceId);
    return list?.[list.length - 1];
  }

  forget(serviceId: string): void {
    this.entries.delete(serviceId);
  }
}
