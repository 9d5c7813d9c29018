import http from "node:http";
import { LogLevel, type ControlServerConfig, type FleetSnapshot } from "@fleetwarden/shared";
import type { ComponentLogger } from "@fleetwarden/logger";
import { describeError } from "../errors";
import type { FleetMonitor } from "../monitor";
import { isAuthorized, routeControlRequest, type ControlTarget } from "./routes";

type ControlMonitor = ControlTarget & Pick<FleetMonitor, "subscribe">;

const MAX_BODY_BYTES = 64 * 1024;

function readBody(req: http.IncomingMessage): Promise<unknown> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    let size = 0;
    req.on("data", (chunk: Buffer) => {
      size += chunk.length;
      if (size > MAX_BODY_BYTES) {
        reject(new Error("request body too large"));
        req.destroy();
        return;
      }
      chunks.push(chunk);
    });
    req.on("end", () => {
      const raw = Buffer.concat(chunks).toString("utf-8").trim();
      if (raw.length === 0) {
        resolve(undefined);
        return;
      }
      try {
        resolve(JSON.parse(raw));
      } catch (error) {
        reject(error);
      }
    });
    req.on("error", reject);
  });
}

/**
 * Token-protected HTTP surface for operators: JSON routes plus `/events`,
 * a server-sent stream of fleet snapshots.
 */
export class ControlServer {
  private server?: http.Server;
  private readonly listeners = new Set<http.ServerResponse>();
  private unsubscribe?: () => void;

  constructor(
    private readonly config: ControlServerConfig,
    private readonly monitor: ControlMonitor,
    private readonly logger: ComponentLogger
  ) {}

  async start(): Promise<void> {
    if (!this.config.enabled || this.server) {
      return;
    }
    const server = http.createServer((req, res) => {
      void this.handle(req, res);
    });
    await new Promise<void>((resolve, reject) => {
      server.once("error", reject);
      server.listen(this.config.port, this.config.host, () => {
        server.off("error", reject);
        resolve();
      });
    });
    this.server = server;
    this.unsubscribe = this.monitor.subscribe(snapshot => this.broadcast(snapshot));
    this.logger.log(LogLevel.INFO, "control_server_listening", {
      host: this.config.host,
      port: this.port()
    });
  }

  async stop(): Promise<void> {
    const server = this.server;
    if (!server) {
      return;
    }
    this.unsubscribe?.();
    this.unsubscribe = undefined;
    for (const res of this.listeners) {
      res.end();
    }
    this.listeners.clear();
    await new Promise<void>((resolve, reject) => {
      server.close(err => (err ? reject(err) : resolve()));
    });
    this.server = undefined;
  }

  /** The bound port; differs from the configured one when that was 0. */
  port(): number | undefined {
    const address = this.server?.address();
    if (!address || typeof address === "string") {
      return undefined;
    }
    return address.port;
  }

  private async handle(req: http.IncomingMessage, res: http.ServerResponse): Promise<void> {
    const method = req.method ?? "GET";
    const path = req.url ?? "/";
    try {
      if (method === "GET" && path.split("?")[0] === "/events") {
        if (!isAuthorized(req.headers.authorization, this.config.authToken)) {
          this.reply(res, 401, { error: "unauthorized" });
          return;
        }
        this.handleSSE(res);
        return;
      }
      let body: unknown;
      try {
        body = await readBody(req);
      } catch (error) {
        this.reply(res, 400, { error: `invalid body: ${describeError(error)}` });
        return;
      }
      const response = await routeControlRequest(
        this.monitor,
        { method, path, authorization: req.headers.authorization, body },
        this.config.authToken
      );
      this.logger.log(LogLevel.DEBUG, "control_request", { method, path, status: response.status });
      this.reply(res, response.status, response.body);
    } catch (error) {
      this.logger.log(LogLevel.ERROR, "control_request_failed", { method, path, error: describeError(error) });
      this.reply(res, 500, { error: "internal error" });
    }
  }

  private reply(res: http.ServerResponse, status: number, body: unknown): void {
    if (res.headersSent) {
      res.end();
      return;
    }
    res.statusCode = status;
    res.setHeader("Content-Type", "application/json");
    res.end(JSON.stringify(body));
  }

  private handleSSE(res: http.ServerResponse): void {
    res.writeHead(200, {
      "Content-Type": "text/event-stream",
      Connection: "keep-alive",
      "Cache-Control": "no-cache"
    });
    this.listeners.add(res);
    res.write(`data: ${JSON.stringify(this.monitor.getSnapshot())}\n\n`);
    res.on("close", () => {
      this.listeners.delete(res);
    });
  }

  private broadcast(snapshot: FleetSnapshot): void {
    for (const res of this.listeners) {
      res.write(`data: ${JSON.stringify(snapshot)}\n\n`);
    }
  }
}
