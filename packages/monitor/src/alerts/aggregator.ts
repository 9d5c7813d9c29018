import { nanoid } from "nanoid";
import {
  LogLevel,
  type AlertGroup,
  type AlertNotification,
  type AlertNotificationKind,
  type ServiceState,
  type StatusTransition
} from "@fleetwarden/shared";
import type { ComponentLogger } from "@fleetwarden/logger";
import { AlertGroupNotFoundError, describeError } from "../errors";

/** Delivery is best effort: the aggregator never waits on or retries a notification. */
export interface NotificationHook {
  notify(notification: AlertNotification): void | Promise<void>;
}

export interface AlertAggregatorOptions {
  hook: NotificationHook;
  logger: ComponentLogger;
  stateOf: (serviceId: string) => ServiceState | undefined;
  idGenerator?: () => string;
  archiveLimit?: number;
}

function cloneGroup(group: AlertGroup): AlertGroup {
  return { ...group, memberServiceIds: [...group.memberServiceIds] };
}

/**
 * Folds failing transitions into alert groups keyed by root service.
 *
 * A transition attributed to a root (`causedBy`) joins that root's open
 * group; an unattributed one joins the open group the service already belongs
 * to, or opens a new group rooted at itself. A service that opened its own
 * group before its root went Down has that group folded into the root's once
 * the cascade is attributed. Only new groups, escalations and
 * rate-limit episodes notify; acknowledged groups stay silent. A group closes
 * once its root and every member are Operational again (services no longer in
 * the inventory count as stable).
 */
export class AlertAggregator {
  private readonly open = new Map<string, AlertGroup>();
  private readonly archive: AlertGroup[] = [];
  private readonly idGenerator: () => string;
  private readonly archiveLimit: number;

  constructor(private readonly options: AlertAggregatorOptions) {
    this.idGenerator = options.idGenerator ?? (() => `ag_${nanoid(12)}`);
    this.archiveLimit = options.archiveLimit ?? 500;
  }

  /**
   * @param inert - the service (or the root it is attributed to) is under
   * maintenance; failing transitions are not grouped or notified.
   */
  onTransition(transition: StatusTransition, inert: boolean): void {
    if (transition.to === "down" || transition.to === "degraded") {
      if (!inert) {
        this.track(transition.serviceId, transition.causedBy ?? transition.serviceId, transition.at);
      }
      return;
    }
    if (transition.to === "operational") {
      this.closeStable(transition.at);
    }
  }

  /**
   * Records a failing service under `rootServiceId` and returns its group,
   * opening (and announcing) one when no open group covers it.
   */
  track(serviceId: string, rootServiceId: string, at: number): AlertGroup {
    const rootGroup = this.findByRoot(rootServiceId);
    const ownGroup = this.findByMember(serviceId);
    if (rootGroup && ownGroup && ownGroup !== rootGroup && ownGroup.rootServiceId === serviceId) {
      this.fold(ownGroup, rootGroup);
    }
    const existing = rootGroup ?? ownGroup;
    if (existing) {
      if (!existing.memberServiceIds.includes(serviceId)) {
        existing.memberServiceIds.push(serviceId);
        this.options.logger.log(LogLevel.INFO, "alert_group_merged", {
          groupId: existing.id,
          rootServiceId: existing.rootServiceId,
          serviceId
        });
      }
      existing.lastSeenAt = Math.max(existing.lastSeenAt, at);
      return existing;
    }

    const group: AlertGroup = {
      id: this.idGenerator(),
      rootServiceId,
      memberServiceIds: [serviceId],
      firstSeenAt: at,
      lastSeenAt: at,
      acknowledged: false,
      escalated: false
    };
    this.open.set(group.id, group);
    this.options.logger.log(LogLevel.WARN, "alert_group_opened", {
      groupId: group.id,
      rootServiceId,
      serviceId
    });
    this.dispatch("opened", group, serviceId, at);
    return group;
  }

  escalate(serviceId: string, at: number, detail?: string): void {
    const group = this.track(serviceId, this.findByMember(serviceId)?.rootServiceId ?? serviceId, at);
    group.escalated = true;
    this.dispatch("escalated", group, serviceId, at, detail);
  }

  rateLimited(serviceId: string, at: number, detail?: string): void {
    const group = this.track(serviceId, this.findByMember(serviceId)?.rootServiceId ?? serviceId, at);
    this.dispatch("rate_limited", group, serviceId, at, detail);
  }

  acknowledge(groupId: string, actor: string, at: number): AlertGroup {
    const group = this.open.get(groupId);
    if (!group) {
      throw new AlertGroupNotFoundError(groupId);
    }
    if (!group.acknowledged) {
      group.acknowledged = true;
      group.acknowledgedBy = actor;
      group.acknowledgedAt = at;
      this.options.logger.log(LogLevel.INFO, "alert_group_acknowledged", { groupId, actor });
    }
    return cloneGroup(group);
  }

  /** Closes every open group whose root and members are all Operational. */
  closeStable(at: number): AlertGroup[] {
    const closed: AlertGroup[] = [];
    for (const group of [...this.open.values()]) {
      const ids = [group.rootServiceId, ...group.memberServiceIds];
      if (!ids.every(id => this.isStable(id))) {
        continue;
      }
      group.resolvedAt = at;
      this.open.delete(group.id);
      this.archive.push(group);
      if (this.archive.length > this.archiveLimit) {
        this.archive.splice(0, this.archive.length - this.archiveLimit);
      }
      this.options.logger.log(LogLevel.INFO, "alert_group_resolved", {
        groupId: group.id,
        rootServiceId: group.rootServiceId,
        durationMs: at - group.firstSeenAt
      });
      this.dispatch("resolved", group, group.rootServiceId, at);
      closed.push(group);
    }
    return closed;
  }

  findByMember(serviceId: string): AlertGroup | undefined {
    for (const group of this.open.values()) {
      if (group.memberServiceIds.includes(serviceId)) {
        return group;
      }
    }
    return undefined;
  }

  openGroups(): AlertGroup[] {
    return [...this.open.values()].map(cloneGroup);
  }

  archived(): AlertGroup[] {
    return this.archive.map(cloneGroup);
  }

  restore(groups: readonly AlertGroup[]): void {
    for (const group of groups) {
      if (group.resolvedAt === undefined) {
        this.open.set(group.id, cloneGroup(group));
      }
    }
  }

  private fold(source: AlertGroup, target: AlertGroup): void {
    for (const member of source.memberServiceIds) {
      if (!target.memberServiceIds.includes(member)) {
        target.memberServiceIds.push(member);
      }
    }
    target.firstSeenAt = Math.min(target.firstSeenAt, source.firstSeenAt);
    target.lastSeenAt = Math.max(target.lastSeenAt, source.lastSeenAt);
    target.escalated = target.escalated || source.escalated;
    this.open.delete(source.id);
    this.options.logger.log(LogLevel.INFO, "alert_group_folded", {
      groupId: source.id,
      into: target.id,
      rootServiceId: target.rootServiceId
    });
  }

  private findByRoot(rootServiceId: string): AlertGroup | undefined {
    for (const group of this.open.values()) {
      if (group.rootServiceId === rootServiceId) {
        return group;
      }
    }
    return undefined;
  }

  private isStable(serviceId: string): boolean {
    const state = this.options.stateOf(serviceId);
    return state === undefined || state === "operational";
  }

  private dispatch(
    kind: AlertNotificationKind,
    group: AlertGroup,
    serviceId: string,
    at: number,
    detail?: string
  ): void {
    if (group.acknowledged) {
      this.options.logger.log(LogLevel.DEBUG, "alert_suppressed", { groupId: group.id, kind, serviceId });
      return;
    }
    const notification: AlertNotification = { kind, group: cloneGroup(group), serviceId, at, detail };
    try {
      const delivery = this.options.hook.notify(notification);
      if (delivery) {
        void delivery.catch(error => {
          this.options.logger.log(LogLevel.WARN, "alert_delivery_failed", {
            groupId: group.id,
            kind,
            error: describeError(error)
          });
        });
      }
    } catch (error) {
      this.options.logger.log(LogLevel.WARN, "alert_delivery_failed", {
        groupId: group.id,
        kind,
        error: describeError(error)
      });
    }
  }
}
