import { nanoid } from "nanoid";
import type { MaintenanceScope, MaintenanceWindow } from "@fleetwarden/shared";
import { MaintenanceWindowNotFoundError } from "../errors";

export interface ToggleResult {
  /** Whether maintenance for the scope is on after the toggle. */
  active: boolean;
  window: MaintenanceWindow;
}

export function windowEnd(window: MaintenanceWindow): number {
  return window.durationMs === null ? Number.POSITIVE_INFINITY : window.startAt + window.durationMs;
}

export function isWindowActive(window: MaintenanceWindow, now: number): boolean {
  return window.startAt <= now && now < windowEnd(window);
}

export function scopeCovers(scope: MaintenanceScope, serviceId: string): boolean {
  return scope.kind === "all" || scope.serviceIds.includes(serviceId);
}

export function sameScope(a: MaintenanceScope, b: MaintenanceScope): boolean {
  if (a.kind === "all" || b.kind === "all") {
    return a.kind === b.kind;
  }
  const left = new Set(a.serviceIds);
  return left.size === new Set(b.serviceIds).size && b.serviceIds.every(id => left.has(id));
}

/**
 * Manual and scheduled maintenance windows. Whether a service is in
 * maintenance is always computed from the windows and the time asked about.
 */
export class MaintenanceWindowManager {
  private readonly windows = new Map<string, MaintenanceWindow>();

  constructor(private readonly idGenerator: () => string = () => `mw_${nanoid(10)}`) {}

  /**
   * Switches manual maintenance for `scope`: ends an active manual window with
   * the same scope, otherwise opens one (open-ended unless `durationMs` is given).
   */
  toggleNow(
    scope: MaintenanceScope,
    now: number,
    options: { durationMs?: number; reason?: string } = {}
  ): ToggleResult {
    const existing = [...this.windows.values()].find(
      window => window.source === "manual" && sameScope(window.scope, scope) && isWindowActive(window, now)
    );
    if (existing) {
      this.windows.delete(existing.id);
      return { active: false, window: existing };
    }
    const window: MaintenanceWindow = {
      id: this.idGenerator(),
      scope,
      startAt: now,
      durationMs: options.durationMs ?? null,
      source: "manual",
      reason: options.reason
    };
    this.windows.set(window.id, window);
    return { active: true, window };
  }

  schedule(startAt: number, durationMs: number, scope: MaintenanceScope, reason?: string): MaintenanceWindow {
    if (!Number.isFinite(startAt) || !Number.isFinite(durationMs) || durationMs <= 0) {
      throw new RangeError("Maintenance window needs a valid start and a positive duration");
    }
    const window: MaintenanceWindow = {
      id: this.idGenerator(),
      scope,
      startAt,
      durationMs,
      source: "scheduled",
      reason
    };
    this.windows.set(window.id, window);
    return window;
  }

  cancel(windowId: string): MaintenanceWindow {
    const window = this.windows.get(windowId);
    if (!window) {
      throw new MaintenanceWindowNotFoundError(windowId);
    }
    this.windows.delete(windowId);
    return window;
  }

  isActive(serviceId: string, now: number): boolean {
    for (const window of this.windows.values()) {
      if (isWindowActive(window, now) && scopeCovers(window.scope, serviceId)) {
        return true;
      }
    }
    return false;
  }

  activeWindows(now: number): MaintenanceWindow[] {
    return [...this.windows.values()].filter(window => isWindowActive(window, now));
  }

  /** Drops windows that have ended and returns them. */
  prune(now: number): MaintenanceWindow[] {
    const expired = [...this.windows.values()].filter(window => windowEnd(window) <= now);
    for (const window of expired) {
      this.windows.delete(window.id);
    }
    return expired;
  }

  list(): MaintenanceWindow[] {
    return [...this.windows.values()];
  }

  restore(windows: readonly MaintenanceWindow[]): void {
    for (const window of windows) {
      this.windows.set(window.id, window);
    }
  }
}
