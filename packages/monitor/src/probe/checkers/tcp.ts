import net from "node:net";
import type { ServiceDescriptor } from "@fleetwarden/shared";
import type { CheckContext, CheckOutcome } from "./types";

export interface HostPort {
  host: string;
  port: number;
}

/** Accepts `host:port` and `[v6-address]:port`. */
export function parseHostPort(target: string): HostPort {
  const match = /^\[([^\]]+)\]:(\d+)$/.exec(target) ?? /^([^:\s]+):(\d+)$/.exec(target);
  if (!match) {
    throw new Error(`Invalid tcp target "${target}", expected host:port`);
  }
  const port = Number(match[2]);
  if (!Number.isInteger(port) || port < 1 || port > 65_535) {
    throw new Error(`Invalid tcp port in "${target}"`);
  }
  return { host: match[1], port };
}

export function checkTcp(service: ServiceDescriptor, context: CheckContext): Promise<CheckOutcome> {
  const { host, port } = parseHostPort(service.target);
  return new Promise((resolve, reject) => {
    const socket = net.connect({ host, port });
    const cleanup = () => {
      context.signal.removeEventListener("abort", onAbort);
      socket.removeAllListeners();
      socket.destroy();
    };
    const onAbort = () => {
      cleanup();
      reject(context.signal.reason);
    };

    if (context.signal.aborted) {
      onAbort();
      return;
    }
    context.signal.addEventListener("abort", onAbort, { once: true });
    socket.once("connect", () => {
      cleanup();
      resolve({ success: true });
    });
    socket.once("error", error => {
      cleanup();
      reject(error);
    });
  });
}
