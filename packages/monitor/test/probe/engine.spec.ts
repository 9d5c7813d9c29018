import { afterEach, beforeEach, describe, expect, it } from "vitest";
import net from "node:net";
import { MockAgent } from "undici";
import { ProbeEngine } from "../../src/probe/engine";
import type { HealthChecker } from "../../src/probe/checkers";
import { FakeRunner, capturingLogger, service, settings } from "../helpers";

function engineWith(options: Partial<ConstructorParameters<typeof ProbeEngine>[0]> = {}) {
  return new ProbeEngine({
    probe: settings().probe,
    logger: capturingLogger(),
    ...options
  });
}

function listen(server: net.Server): Promise<number> {
  return new Promise((resolve, reject) => {
    server.once("error", reject);
    server.listen(0, "127.0.0.1", () => {
      const address = server.address();
      if (address && typeof address !== "string") {
        resolve(address.port);
      } else {
        reject(new Error("no port"));
      }
    });
  });
}

function close(server: net.Server): Promise<void> {
  return new Promise(resolve => server.close(() => resolve()));
}

describe("ProbeEngine http checks", () => {
  let agent: MockAgent;

  beforeEach(() => {
    agent = new MockAgent();
    agent.disableNetConnect();
  });

  afterEach(async () => {
    await agent.close();
  });

  it("treats a 2xx HEAD response as success", async () => {
    agent.get("http://api.test").intercept({ path: "/health", method: "HEAD" }).reply(204, "");
    const engine = engineWith({ dispatcher: agent });

    const result = await engine.probeOne(service("api", { target: "http://api.test/health" }), 1_000);

    expect(result).toMatchObject({ serviceId: "api", timestamp: 1_000, success: true, statusCode: 204 });
    expect(result.error).toBeUndefined();
  });

  it("fails on a status outside the expected set", async () => {
    agent.get("http://api.test").intercept({ path: "/health", method: "HEAD" }).reply(503, "");
    const engine = engineWith({ dispatcher: agent });

    const result = await engine.probeOne(service("api", { target: "http://api.test/health" }));

    expect(result.success).toBe(false);
    expect(result.statusCode).toBe(503);
    expect(result.error).toBe("HTTP 503");
  });

  it("accepts configured non-2xx statuses", async () => {
    agent.get("http://site.test").intercept({ path: "/", method: "HEAD" }).reply(301, "");
    const engine = engineWith({ dispatcher: agent });

    const result = await engine.probeOne(
      service("site", { target: "http://site.test/", expectedStatus: [200, 301] })
    );

    expect(result.success).toBe(true);
  });

  it("uses GET and checks the body when content is expected", async () => {
    agent.get("http://api.test").intercept({ path: "/ready", method: "GET" }).reply(200, "status: starting");
    const engine = engineWith({ dispatcher: agent });

    const result = await engine.probeOne(
      service("api", { target: "http://api.test/ready", expectContent: "status: ok" })
    );

    expect(result.success).toBe(false);
    expect(result.error).toBe("Content missing (HTTP 200)");
  });
});

describe("ProbeEngine tcp checks", () => {
  it("succeeds when the port accepts a connection", async () => {
    const server = net.createServer(socket => socket.destroy());
    const port = await listen(server);
    try {
      const result = await engineWith().probeOne(service("db", { checkType: "tcp", target: `127.0.0.1:${port}` }));
      expect(result.success).toBe(true);
    } finally {
      await close(server);
    }
  });

  it("reports a refused connection", async () => {
    const server = net.createServer();
    const port = await listen(server);
    await close(server);

    const result = await engineWith().probeOne(service("db", { checkType: "tcp", target: `127.0.0.1:${port}` }));

    expect(result.success).toBe(false);
    expect(result.error).toBe("Connection refused");
  });

  it("turns a malformed target into a failed result", async () => {
    const result = await engineWith().probeOne(service("db", { checkType: "tcp", target: "nope" }));

    expect(result.success).toBe(false);
    expect(result.error).toBe('Invalid tcp target "nope", expected host:port');
  });
});

describe("ProbeEngine command checks", () => {
  it("requires a running container", async () => {
    const runner = new FakeRunner(() => ({ stdout: "exited\n" }));
    const result = await engineWith({ runner }).probeOne(
      service("pg", { checkType: "container", target: "app-postgres" })
    );

    expect(runner.calls[0].argv).toEqual(["docker", "inspect", "--format", "{{.State.Status}}", "app-postgres"]);
    expect(result.success).toBe(false);
    expect(result.error).toBe("Container exited");
  });

  it("requires an active unit", async () => {
    const runner = new FakeRunner(() => ({ exitCode: 3, stdout: "inactive\n" }));
    const result = await engineWith({ runner }).probeOne(
      service("worker", { checkType: "unit", target: "app-worker.service" })
    );

    expect(runner.calls[0].argv).toEqual(["systemctl", "is-active", "app-worker.service"]);
    expect(result.error).toBe("Unit inactive");
  });

  it("fails a custom command with a non-zero exit", async () => {
    const runner = new FakeRunner(() => ({ exitCode: 2, stderr: "disk full\n" }));
    const result = await engineWith({ runner }).probeOne(
      service("disk", { checkType: "custom", target: "check-disk --min 10" })
    );

    expect(runner.calls[0].argv).toEqual(["check-disk", "--min", "10"]);
    expect(result.error).toBe("Custom check failed (exit 2): disk full");
  });

  it("passes a custom command that exits 0", async () => {
    const runner = new FakeRunner();
    const result = await engineWith({ runner }).probeOne(service("disk", { checkType: "custom", target: "true" }));

    expect(result.success).toBe(true);
  });
});

describe("ProbeEngine failure handling", () => {
  it("converts an overrun into a timeout failure", async () => {
    const hang: HealthChecker = () => new Promise(() => undefined);
    const engine = engineWith({ checkers: { custom: hang } });

    const result = await engine.probeOne(service("slow", { checkType: "custom", target: "sleep", timeoutMs: 20 }));

    expect(result.success).toBe(false);
    expect(result.error).toBe("Timeout after 20ms");
  });

  it("converts a throwing checker into a failure", async () => {
    const broken: HealthChecker = async () => {
      throw new Error("bad target");
    };
    const result = await engineWith({ checkers: { http: broken } }).probeOne(service("api"));

    expect(result.success).toBe(false);
    expect(result.error).toBe("bad target");
  });

  it("probes a batch within the pool size and stamps the batch time", async () => {
    let active = 0;
    let peak = 0;
    const checker: HealthChecker = async target => {
      active += 1;
      peak = Math.max(peak, active);
      await new Promise(resolve => setTimeout(resolve, 5));
      active -= 1;
      return target.id === "c" ? { success: false, error: "nope" } : { success: true };
    };
    const engine = engineWith({
      probe: settings({ probe: { concurrency: 2 } }).probe,
      checkers: { http: checker }
    });

    const results = await engine.probeBatch([service("a"), service("b"), service("c"), service("d")], 5_000);

    expect(peak).toBe(2);
    expect(results.map(result => result.serviceId)).toEqual(["a", "b", "c", "d"]);
    expect(results.every(result => result.timestamp === 5_000)).toBe(true);
    expect(results.map(result => result.success)).toEqual([true, true, false, true]);
    expect(engine.log.latest("c")?.error).toBe("nope");
  });

  it("keeps only the newest results per service", async () => {
    const engine = engineWith({
      probe: settings({ probe: { historySize: 2 } }).probe,
      checkers: { http: async () => ({ success: true }) }
    });

    for (const at of [1, 2, 3]) {
      await engine.probeOne(service("api"), at);
    }

    expect(engine.log.history("api").map(result => result.timestamp)).toEqual([2, 3]);
  });
});
