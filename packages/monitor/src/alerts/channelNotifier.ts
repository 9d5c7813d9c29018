import path from "node:path";
import { appendFile, mkdir } from "node:fs/promises";
import { request, type Dispatcher } from "undici";
import {
  LogLevel,
  alertLevel,
  shouldLog,
  type AlertChannelConfig,
  type AlertNotification,
  type ObservabilityAlertsConfig
} from "@fleetwarden/shared";
import type { ComponentLogger } from "@fleetwarden/logger";
import { describeError } from "../errors";
import type { NotificationHook } from "./aggregator";

export function formatNotification(notification: AlertNotification): string {
  const { group } = notification;
  const members = group.memberServiceIds.join(", ");
  switch (notification.kind) {
    case "opened":
      return `${notification.serviceId} is failing (root ${group.rootServiceId}; members: ${members})`;
    case "escalated":
      return `${notification.serviceId} needs manual intervention: automatic recovery exhausted`;
    case "rate_limited":
      return `${notification.serviceId} restart suppressed by the rate cap`;
    case "resolved":
      return `${group.rootServiceId} and its dependents recovered`;
  }
}

interface ChannelNotifierOptions {
  logger: ComponentLogger;
  consoleImpl?: Pick<Console, "warn">;
  dispatcher?: Dispatcher;
}

/** Fans notifications out to the configured console, file and webhook channels. */
export class ChannelNotifier implements NotificationHook {
  private readonly consoleImpl: Pick<Console, "warn">;

  constructor(
    private alertsConfig: ObservabilityAlertsConfig,
    private readonly options: ChannelNotifierOptions
  ) {
    this.consoleImpl = options.consoleImpl ?? console;
  }

  updateConfig(next: ObservabilityAlertsConfig): void {
    this.alertsConfig = next;
  }

  async notify(notification: AlertNotification): Promise<void> {
    if (!this.alertsConfig.enabled) {
      return;
    }
    const level = alertLevel(notification.kind);
    this.options.logger.log(level, "alert_dispatched", {
      kind: notification.kind,
      groupId: notification.group.id,
      serviceId: notification.serviceId
    });
    const body = JSON.stringify({
      kind: notification.kind,
      level,
      message: formatNotification(notification),
      group: notification.group,
      serviceId: notification.serviceId,
      detail: notification.detail,
      timestamp: notification.at
    });
    const tasks = this.alertsConfig.channels
      .filter(channel => channel.enabled && shouldLog(level, channel.level ?? LogLevel.INFO))
      .map(channel => this.deliver(channel, notification, body));
    await Promise.allSettled(tasks);
  }

  private async deliver(channel: AlertChannelConfig, notification: AlertNotification, body: string): Promise<void> {
    try {
      if (channel.type === "console") {
        this.consoleImpl.warn(`[alert:${notification.kind}] ${body}`);
      } else if (channel.type === "file" && channel.path) {
        const resolved = path.resolve(channel.path);
        await mkdir(path.dirname(resolved), { recursive: true });
        await appendFile(resolved, `${body}\n`, "utf-8");
      } else if (channel.type === "webhook" && channel.url) {
        const response = await request(channel.url, {
          method: "POST",
          headers: {
            "content-type": "application/json",
            ...(channel.headers ?? {})
          },
          body,
          dispatcher: this.options.dispatcher
        });
        await response.body.dump();
        if (response.statusCode >= 400) {
          throw new Error(`webhook responded with status ${response.statusCode}`);
        }
      }
    } catch (error) {
      this.options.logger.log(LogLevel.ERROR, "alert_channel_failed", {
        channelId: channel.id,
        kind: notification.kind,
        error: describeError(error)
      });
    }
  }
}
