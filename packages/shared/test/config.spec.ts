import { describe, it, expect, afterEach, beforeEach, vi } from "vitest";
import path from "path";
import fs from "fs";
import os from "os";
import { ConfigValidationError, loadConfig, parseConfig, validateConfig } from "../src/config/loader";
import { ConfigurationManager, createConfigManager } from "../src/config/manager";
import { DEFAULT_SETTINGS, resolveMonitorSettings, toServiceDescriptor } from "../src/config/defaults";
import type { MonitorConfig } from "../src/config/types";

const defaultConfigPath = path.resolve(__dirname, "../../../config/monitor/default.monitor.json");
const schemaPath = path.resolve(__dirname, "../../../config/schema/monitor-config.schema.json");

const silentLogger = { warn: () => undefined, error: () => undefined };

async function readConfig(filePath: string): Promise<MonitorConfig> {
  return JSON.parse(await fs.promises.readFile(filePath, "utf-8"));
}

describe("config loader", () => {
  it("loads and validates default config", () => {
    const cfg = loadConfig(defaultConfigPath, schemaPath);
    expect(cfg.services.map(service => service.id)).toEqual([
      "postgres",
      "api",
      "worker",
      "nginx",
      "public-site"
    ]);
  });

  it("accepts a config with only services", () => {
    const result = validateConfig(
      { services: [{ id: "api", checkType: "http", target: "http://localhost/health" }] },
      schemaPath
    );
    expect(result).toEqual({ valid: true });
  });

  it("rejects unknown check types", () => {
    const result = validateConfig(
      { services: [{ id: "api", checkType: "ping", target: "localhost" }] },
      schemaPath
    );
    expect(result.valid).toBe(false);
    expect(result.errors).toContain("/services/0/checkType must be equal to one of the allowed values");
  });

  it("reports a missing services list at the root", () => {
    const result = validateConfig({ probe: { intervalMs: 1000 } }, schemaPath);
    expect(result.valid).toBe(false);
    expect(result.errors).toContain("/ must have required property 'services'");
  });

  it("checks each log sink against its own fields", () => {
    const services = [{ id: "api", checkType: "http", target: "http://localhost/health" }];
    const accepted = validateConfig(
      {
        services,
        observability: {
          logs: { level: "info", sinks: { console: { enabled: true, format: "line", components: ["recovery"] } } }
        }
      },
      schemaPath
    );
    const rejected = validateConfig(
      {
        services,
        observability: {
          logs: { level: "info", sinks: { console: { enabled: true, outputDir: "logs", format: "yaml" } } }
        }
      },
      schemaPath
    );

    expect(accepted).toEqual({ valid: true });
    expect(rejected.errors).toHaveLength(2);
    expect(rejected.errors).toEqual(
      expect.arrayContaining([
        "/observability/logs/sinks/console must NOT have additional properties",
        "/observability/logs/sinks/console/format must be equal to one of the allowed values"
      ])
    );
  });

  it("wraps malformed JSON in a ConfigValidationError", () => {
    expect(() => parseConfig("{ services: ", "inline.json", schemaPath)).toThrowError(ConfigValidationError);
    expect(() => parseConfig("{ services: ", "inline.json", schemaPath)).toThrow(
      "Config validation failed for inline.json"
    );
  });
});

describe("resolveMonitorSettings", () => {
  it("returns the defaults when no sections are given", () => {
    expect(resolveMonitorSettings({})).toEqual(DEFAULT_SETTINGS);
  });

  it("merges sections one level deep and replaces arrays", () => {
    const settings = resolveMonitorSettings({
      probe: { concurrency: 2 },
      recovery: { backoffStagesMs: [0, 0, 0, 0] }
    });
    expect(settings.probe).toEqual({ ...DEFAULT_SETTINGS.probe, concurrency: 2 });
    expect(settings.recovery.backoffStagesMs).toEqual([0, 0, 0, 0]);
    expect(settings.recovery.maxRestartAttempts).toBe(3);
  });

  it("fills service descriptor defaults", () => {
    const descriptor = toServiceDescriptor({ id: "db", checkType: "tcp", target: "127.0.0.1:5432" });
    expect(descriptor.maxRestartAttempts).toBe(3);
    expect(descriptor.dependsOn).toEqual([]);
    expect(descriptor.enabled).toBe(true);
  });
});

describe("ConfigurationManager", () => {
  let tempDir: string;
  let tempConfigPath: string;
  let manager: ConfigurationManager | null = null;

  beforeEach(async () => {
    tempDir = await fs.promises.mkdtemp(path.join(os.tmpdir(), "config-test-"));
    tempConfigPath = path.join(tempDir, "test-config.json");
    const defaultConfig = await fs.promises.readFile(defaultConfigPath, "utf-8");
    await fs.promises.writeFile(tempConfigPath, defaultConfig, "utf-8");
  });

  afterEach(async () => {
    if (manager) {
      await manager.stopWatching();
      manager = null;
    }
    if (tempDir && fs.existsSync(tempDir)) {
      await fs.promises.rm(tempDir, { recursive: true, force: true });
    }
  });

  describe("Basic loading and validation", () => {
    it("loads valid config successfully", async () => {
      manager = new ConfigurationManager(schemaPath, silentLogger);
      const cfg = await manager.load(tempConfigPath);
      expect(cfg.services).toHaveLength(5);
      expect(cfg.governor).toEqual({ windowMs: 3_600_000, maxRestarts: 5 });
    });

    it("throws error on invalid config", async () => {
      const invalidConfigPath = path.join(tempDir, "invalid.json");
      await fs.promises.writeFile(invalidConfigPath, JSON.stringify({ invalid: "config" }), "utf-8");

      manager = new ConfigurationManager(schemaPath, silentLogger);
      await expect(manager.load(invalidConfigPath)).rejects.toThrow("Config validation failed");
    });

    it("throws when reading before load", () => {
      manager = new ConfigurationManager(schemaPath, silentLogger);
      expect(() => manager?.current()).toThrow("Config not loaded");
    });
  });

  describe("get", () => {
    it("reads nested values with dot notation", async () => {
      const loaded = await createConfigManager(tempConfigPath, schemaPath, silentLogger);
      manager = loaded;
      expect(loaded.get("probe.intervalMs")).toBe(15_000);
      expect(loaded.get("classifier.degradedLatencyMs")).toBe(1_000);
      expect(loaded.get("services.1.id")).toBe("api");
    });

    it("returns undefined for missing paths", async () => {
      const loaded = await createConfigManager(tempConfigPath, schemaPath, silentLogger);
      manager = loaded;
      expect(loaded.get("nonexistent")).toBeUndefined();
      expect(loaded.get("probe.nonexistent.deeper")).toBeUndefined();
    });
  });

  describe("Hot-reload", () => {
    it("hot-reloads with valid config", async () => {
      const loaded = await createConfigManager(tempConfigPath, schemaPath, silentLogger);
      manager = loaded;

      const config = await readConfig(tempConfigPath);
      config.probe = { ...config.probe, intervalMs: 30_000 };
      await fs.promises.writeFile(tempConfigPath, JSON.stringify(config, null, 2), "utf-8");

      await loaded.hotReload();
      expect(loaded.get("probe.intervalMs")).toBe(30_000);
    });

    it("rolls back on invalid config", async () => {
      const loaded = await createConfigManager(tempConfigPath, schemaPath, silentLogger);
      manager = loaded;

      await fs.promises.writeFile(tempConfigPath, JSON.stringify({ invalid: "config" }), "utf-8");
      await expect(loaded.hotReload()).rejects.toThrow("Config validation failed");
      expect(loaded.get("probe.intervalMs")).toBe(15_000);
    });

    it("serializes concurrent reloads", async () => {
      const loaded = await createConfigManager(tempConfigPath, schemaPath, silentLogger);
      manager = loaded;

      const config = await readConfig(tempConfigPath);
      config.governor = { windowMs: 600_000, maxRestarts: 2 };
      await fs.promises.writeFile(tempConfigPath, JSON.stringify(config, null, 2), "utf-8");

      await Promise.all([loaded.hotReload(), loaded.hotReload(), loaded.hotReload()]);
      expect(loaded.get("governor.maxRestarts")).toBe(2);
    });
  });

  describe("Subscription system", () => {
    it("notifies subscriber on config change", async () => {
      const loaded = await createConfigManager(tempConfigPath, schemaPath, silentLogger);
      manager = loaded;
      const values: unknown[] = [];
      loaded.subscribe("recovery.maxRestartAttempts", value => {
        values.push(value);
      });

      const config = await readConfig(tempConfigPath);
      config.recovery = { ...config.recovery, maxRestartAttempts: 2 };
      await fs.promises.writeFile(tempConfigPath, JSON.stringify(config, null, 2), "utf-8");
      await loaded.hotReload();

      expect(values).toEqual([2]);
    });

    it("does not notify subscribers for unrelated changes", async () => {
      const loaded = await createConfigManager(tempConfigPath, schemaPath, silentLogger);
      manager = loaded;
      let called = false;
      loaded.subscribe("recovery.maxRestartAttempts", () => {
        called = true;
      });

      const config = await readConfig(tempConfigPath);
      config.probe = { ...config.probe, concurrency: 4 };
      await fs.promises.writeFile(tempConfigPath, JSON.stringify(config, null, 2), "utf-8");
      await loaded.hotReload();

      expect(called).toBe(false);
    });

    it("stops notifying after unsubscribe", async () => {
      const loaded = await createConfigManager(tempConfigPath, schemaPath, silentLogger);
      manager = loaded;
      let calls = 0;
      const unsubscribe = loaded.subscribe("probe.concurrency", () => {
        calls += 1;
      });
      unsubscribe();

      const config = await readConfig(tempConfigPath);
      config.probe = { ...config.probe, concurrency: 3 };
      await fs.promises.writeFile(tempConfigPath, JSON.stringify(config, null, 2), "utf-8");
      await loaded.hotReload();

      expect(calls).toBe(0);
    });
  });

  describe("File watching", () => {
    it("triggers reload on file change", async () => {
      const loaded = await createConfigManager(tempConfigPath, schemaPath, silentLogger);
      manager = loaded;
      await loaded.startWatching();

      const config = await readConfig(tempConfigPath);
      config.probe = { ...config.probe, timeoutMs: 2_500 };
      await fs.promises.writeFile(tempConfigPath, JSON.stringify(config, null, 2), "utf-8");

      await vi.waitFor(
        () => {
          expect(loaded.get("probe.timeoutMs")).toBe(2_500);
        },
        { timeout: 3_000, interval: 50 }
      );
    });
  });
});
