import yargs from "yargs";
import { hideBin } from "yargs/helpers";
import { readFile } from "node:fs/promises";
import path from "node:path";
import { summarizeStates, validateConfig, type FleetSnapshot } from "@fleetwarden/shared";
import { ControlClient } from "./control/client";
import { describeError } from "./errors";
import { runDaemon } from "./main";

type Output = Pick<Console, "log" | "error">;

function splitList(value: string | undefined): string[] | undefined {
  if (!value) {
    return undefined;
  }
  const entries = value
    .split(",")
    .map(entry => entry.trim())
    .filter(entry => entry.length > 0);
  return entries.length > 0 ? entries : undefined;
}

function formatLatency(latencies: readonly number[]): string {
  const last = latencies[latencies.length - 1];
  return last === undefined ? "-" : `${last}ms`;
}

/** Plain-text rendering of a fleet snapshot for `fleetwarden status`. */
export function formatStatus(snapshot: FleetSnapshot): string[] {
  const counts = summarizeStates(snapshot.services.map(service => service.record.state));
  const lines = [
    `overall: ${snapshot.overall} (operational ${counts.operational}, degraded ${counts.degraded}, down ${counts.down}, checking ${counts.checking})`
  ];
  for (const service of snapshot.services) {
    const flags: string[] = [];
    if (service.inMaintenance) {
      flags.push("maintenance");
    }
    if (service.incident) {
      flags.push(`incident ${service.incident.phase} attempts=${service.incident.attemptsUsed}`);
    }
    const uptime = service.uptime.totalChecks > 0 ? ` uptime ${service.uptime.uptimePercent.toFixed(1)}%` : "";
    const suffix = flags.length > 0 ? ` [${flags.join(", ")}]` : "";
    lines.push(
      `  ${service.serviceId} ${service.record.state} ${formatLatency(service.record.latencies)}${uptime}${suffix}`
    );
  }
  for (const group of snapshot.openAlertGroups) {
    const ack = group.acknowledged ? ` ack by ${group.acknowledgedBy ?? "operator"}` : "";
    const escalated = group.escalated ? " escalated" : "";
    lines.push(`alert ${group.id} root=${group.rootServiceId} members=${group.memberServiceIds.join(",")}${escalated}${ack}`);
  }
  for (const window of snapshot.activeMaintenance) {
    const scope = window.scope.kind === "all" ? "all" : window.scope.serviceIds.join(",");
    const until = window.durationMs === null ? "until toggled" : `until ${new Date(window.startAt + window.durationMs).toISOString()}`;
    lines.push(`maintenance ${window.id} scope=${scope} ${until}`);
  }
  return lines;
}

export function buildCli(argv: string[], out: Output = console) {
  const clientFor = (args: { url: string; token?: string }) => new ControlClient(args.url, args.token);

  return yargs(argv)
    .scriptName("fleetwarden")
    .option("url", {
      type: "string",
      default: process.env.MONITOR_CONTROL_URL ?? "http://127.0.0.1:7787",
      describe: "Control server base URL"
    })
    .option("token", {
      type: "string",
      default: process.env.MONITOR_CONTROL_TOKEN,
      describe: "Bearer token for the control server"
    })
    .command(
      "run",
      "Start the monitor daemon (reads MONITOR_* environment variables)",
      builder => builder,
      async () => {
        await runDaemon();
      }
    )
    .command(
      "validate <config>",
      "Validate a monitor configuration file against the schema",
      builder => builder.positional("config", { type: "string", demandOption: true }),
      async args => {
        const file = path.resolve(args.config);
        let parsed: unknown;
        try {
          parsed = JSON.parse(await readFile(file, "utf-8"));
        } catch (error) {
          out.error(`${file}: ${describeError(error)}`);
          process.exitCode = 1;
          return;
        }
        const result = validateConfig(parsed);
        if (result.valid) {
          out.log(`${file}: valid`);
          return;
        }
        out.error(`${file}: invalid`);
        for (const error of result.errors ?? []) {
          out.error(`  ${error}`);
        }
        process.exitCode = 1;
      }
    )
    .command(
      "status",
      "Show service states, open alert groups and active maintenance",
      builder => builder.option("json", { type: "boolean", default: false }),
      async args => {
        const snapshot = await clientFor(args).status();
        if (args.json) {
          out.log(JSON.stringify(snapshot, null, 2));
          return;
        }
        for (const line of formatStatus(snapshot)) {
          out.log(line);
        }
      }
    )
    .command(
      "ack <groupId>",
      "Acknowledge an alert group",
      builder =>
        builder
          .positional("groupId", { type: "string", demandOption: true })
          .option("actor", { type: "string", describe: "Who acknowledged" }),
      async args => {
        out.log(JSON.stringify(await clientFor(args).acknowledge(args.groupId, args.actor), null, 2));
      }
    )
    .command("maintenance", "Manage maintenance windows", builder =>
      builder
        .command(
          "toggle",
          "Switch manual maintenance on or off",
          sub =>
            sub
              .option("services", { type: "string", describe: "Comma-separated service ids (default: all)" })
              .option("duration", { type: "number", describe: "Window length in ms (default: until toggled)" })
              .option("reason", { type: "string" }),
          async args => {
            const result = await clientFor(args).toggleMaintenance({
              services: splitList(args.services),
              durationMs: args.duration,
              reason: args.reason
            });
            out.log(JSON.stringify(result, null, 2));
          }
        )
        .command(
          "schedule",
          "Schedule a maintenance window",
          sub =>
            sub
              .option("start", { type: "string", demandOption: true, describe: "ISO-8601 start time" })
              .option("duration", { type: "number", demandOption: true, describe: "Window length in ms" })
              .option("services", { type: "string", describe: "Comma-separated service ids (default: all)" })
              .option("reason", { type: "string" }),
          async args => {
            const result = await clientFor(args).scheduleMaintenance({
              startAt: args.start,
              durationMs: args.duration,
              services: splitList(args.services),
              reason: args.reason
            });
            out.log(JSON.stringify(result, null, 2));
          }
        )
        .command(
          "cancel <windowId>",
          "Cancel a maintenance window",
          sub => sub.positional("windowId", { type: "string", demandOption: true }),
          async args => {
            out.log(JSON.stringify(await clientFor(args).cancelMaintenance(args.windowId), null, 2));
          }
        )
        .demandCommand()
    )
    .demandCommand()
    .help()
    .strict();
}

export async function main(argv: string[] = hideBin(process.argv)): Promise<void> {
  await buildCli(argv).parseAsync();
}
