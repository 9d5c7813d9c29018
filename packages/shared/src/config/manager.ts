import fs from "fs";
import type { FSWatcher } from "chokidar";
import type { MonitorConfig, ValidationResult } from "./types";
import { defaultSchemaPath, parseConfig, validateConfig } from "./loader";

type ConfigListener = (value: unknown) => void;

/**
 * ConfigurationManager handles configuration loading, validation, hot-reload, and subscriptions.
 * Use the factory function createConfigManager() to instantiate.
 */
export class ConfigurationManager {
  private config: MonitorConfig | null = null;
  private lastValidConfig: MonitorConfig | null = null;
  private watcher: FSWatcher | null = null;
  private readonly subscribers = new Map<string, Set<ConfigListener>>();
  private configPath: string | null = null;
  private pendingReload: Promise<void> | null = null;

  constructor(
    private readonly schemaPath: string = defaultSchemaPath,
    private readonly logger: Pick<Console, "warn" | "error"> = console
  ) {}

  /**
   * Load configuration from file and validate it.
   * @param configPath - Path to configuration JSON file
   */
  async load(configPath: string): Promise<MonitorConfig> {
    const raw = await fs.promises.readFile(configPath, "utf-8");
    const cfg = parseConfig(raw, configPath, this.schemaPath);

    this.config = cfg;
    this.lastValidConfig = cfg;
    this.configPath = configPath;

    this.detectAndNotifyChanges(cfg, null);
    return cfg;
  }

  validate(config: unknown): ValidationResult {
    return validateConfig(config, this.schemaPath);
  }

  /**
   * Hot-reload configuration from file with validation and rollback on failure.
   * Concurrent calls are serialized.
   * @param configPath - Optional path to config file (defaults to last loaded path)
   */
  async hotReload(configPath?: string): Promise<void> {
    if (this.pendingReload) {
      await this.pendingReload;
    }

    const reloadPath = configPath ?? this.configPath;
    if (!reloadPath) {
      throw new Error("No config path available for hot-reload");
    }

    this.pendingReload = this.performReload(reloadPath);
    try {
      await this.pendingReload;
    } finally {
      this.pendingReload = null;
    }
  }

  private async performReload(configPath: string): Promise<void> {
    try {
      const raw = await fs.promises.readFile(configPath, "utf-8");
      const next = parseConfig(raw, configPath, this.schemaPath);
      const previous = this.lastValidConfig;

      // Update first so subscribers can read new values via get()
      this.config = next;
      this.lastValidConfig = next;
      this.configPath = configPath;

      this.detectAndNotifyChanges(next, previous);
    } catch (error) {
      this.logger.error(`Hot-reload failed for ${configPath}:`, error);
      if (this.lastValidConfig) {
        this.config = this.lastValidConfig;
      }
      throw error;
    }
  }

  current(): MonitorConfig {
    if (!this.config) {
      throw new Error("Config not loaded");
    }
    return this.config;
  }

  /**
   * Get configuration value at a dot-separated key path (e.g. "probe.intervalMs").
   * Returns undefined when any segment is missing.
   */
  get(keyPath: string): unknown {
    return this.getValueAtPath(this.current(), this.parseKeyPath(keyPath));
  }

  /**
   * Subscribe to configuration changes at a key path. The callback fires on first
   * load and whenever the value at keyPath changes during hot-reload.
   */
  subscribe(keyPath: string, callback: ConfigListener): () => void {
    let listeners = this.subscribers.get(keyPath);
    if (!listeners) {
      listeners = new Set();
      this.subscribers.set(keyPath, listeners);
    }
    listeners.add(callback);
    return () => {
      listeners?.delete(callback);
    };
  }

  /**
   * Start watching the configuration file; changes trigger a hot-reload once
   * the write has been stable for 100ms.
   */
  async startWatching(configPath?: string): Promise<void> {
    const watchPath = configPath ?? this.configPath;
    if (!watchPath) {
      throw new Error("No config path available for watching");
    }

    if (this.watcher) {
      await this.stopWatching();
    }

    const chokidar = await import("chokidar");
    const watcher = chokidar.watch(watchPath, {
      persistent: true,
      ignoreInitial: true,
      awaitWriteFinish: {
        stabilityThreshold: 100,
        pollInterval: 50
      }
    });

    watcher.on("change", () => {
      this.hotReload(watchPath).catch(error => {
        this.logger.error("File watch hot-reload failed:", error);
      });
    });

    watcher.on("unlink", () => {
      this.logger.warn(`Config file deleted: ${watchPath}; keeping last valid config`);
    });

    watcher.on("error", (error: unknown) => {
      this.logger.error(`File watcher error for ${watchPath}:`, error);
    });

    this.watcher = watcher;
  }

  async stopWatching(): Promise<void> {
    if (this.watcher) {
      await this.watcher.close();
      this.watcher = null;
    }
  }

  private detectAndNotifyChanges(next: MonitorConfig, previous: MonitorConfig | null): void {
    for (const [keyPath, listeners] of this.subscribers) {
      const parts = this.parseKeyPath(keyPath);
      const nextValue = this.getValueAtPath(next, parts);
      if (previous !== null) {
        const previousValue = this.getValueAtPath(previous, parts);
        if (JSON.stringify(nextValue) === JSON.stringify(previousValue)) {
          continue;
        }
      }
      for (const listener of listeners) {
        try {
          listener(nextValue);
        } catch (error) {
          this.logger.error(`Subscriber callback failed for ${keyPath}:`, error);
        }
      }
    }
  }

  private parseKeyPath(keyPath: string): string[] {
    return keyPath.split(".").filter(part => part.length > 0);
  }

  private getValueAtPath(config: MonitorConfig, pathParts: string[]): unknown {
    let current: unknown = config;
    for (const part of pathParts) {
      if (current === null || typeof current !== "object") {
        return undefined;
      }
      current = Reflect.get(current, part);
    }
    return current;
  }
}

/**
 * Create a ConfigurationManager and load the given file.
 */
export async function createConfigManager(
  configPath: string,
  schemaPath?: string,
  logger?: Pick<Console, "warn" | "error">
): Promise<ConfigurationManager> {
  const manager = new ConfigurationManager(schemaPath, logger);
  await manager.load(configPath);
  return manager;
}
