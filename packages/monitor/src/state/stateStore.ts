import { dirname } from "node:path";
import { mkdir, readFile, rename, unlink, writeFile } from "node:fs/promises";
import { LogLevel } from "@fleetwarden/shared";
import type { ComponentLogger } from "@fleetwarden/logger";
import { StateStoreUnavailableError, describeError } from "../errors";
import { emptySnapshot, parseSnapshot, type MonitorStateSnapshot } from "./snapshot";

export interface StateFileSystem {
  readFile(path: string, encoding: BufferEncoding): Promise<string>;
  writeFile(path: string, data: string): Promise<void>;
  rename(from: string, to: string): Promise<void>;
  mkdir(path: string, options: { recursive: boolean }): Promise<string | undefined>;
  unlink(path: string): Promise<void>;
}

const defaultFs: StateFileSystem = {
  readFile,
  writeFile,
  rename,
  mkdir,
  unlink
};

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

/**
 * Durable monitor state. `ensureWritable` picks the first candidate path that
 * accepts a write; every save goes through one promise chain and replaces the
 * file with a rename, so readers never see a partial snapshot.
 */
export class StateStore {
  private activePath: string | undefined;
  private writeChain: Promise<void> = Promise.resolve();

  constructor(
    private readonly candidates: readonly string[],
    private readonly logger: ComponentLogger,
    private readonly fs: StateFileSystem = defaultFs,
    private readonly clock: () => number = Date.now
  ) {}

  get path(): string | undefined {
    return this.activePath;
  }

  /** Throws StateStoreUnavailableError when no candidate path can be written. */
  async ensureWritable(): Promise<string> {
    if (this.activePath) {
      return this.activePath;
    }
    let lastError: unknown;
    for (const candidate of this.candidates) {
      const probePath = `${candidate}.probe`;
      try {
        await this.fs.mkdir(dirname(candidate), { recursive: true });
        await this.fs.writeFile(probePath, "");
        await this.fs.unlink(probePath);
        this.activePath = candidate;
        this.logger.log(LogLevel.INFO, "state_path_selected", { path: candidate });
        return candidate;
      } catch (error) {
        lastError = error;
        this.logger.log(LogLevel.WARN, "state_path_unwritable", { path: candidate, error: describeError(error) });
      }
    }
    throw new StateStoreUnavailableError([...this.candidates], { cause: lastError });
  }

  /** Missing or unreadable state yields an empty snapshot and a `state_reset` warning. */
  async load(): Promise<MonitorStateSnapshot> {
    const filePath = await this.ensureWritable();
    let raw: string;
    try {
      raw = await this.fs.readFile(filePath, "utf-8");
    } catch (error) {
      this.logger.log(LogLevel.WARN, "state_reset", {
        path: filePath,
        reason: isMissingFile(error) ? "missing" : "unreadable",
        error: describeError(error)
      });
      return emptySnapshot(this.clock());
    }

    let parsed: MonitorStateSnapshot | null = null;
    try {
      parsed = parseSnapshot(JSON.parse(raw));
    } catch (error) {
      this.logger.log(LogLevel.WARN, "state_reset", {
        path: filePath,
        reason: "corrupt",
        error: describeError(error)
      });
      return emptySnapshot(this.clock());
    }
    if (!parsed) {
      this.logger.log(LogLevel.WARN, "state_reset", { path: filePath, reason: "unsupported_version" });
      return emptySnapshot(this.clock());
    }
    return parsed;
  }

  save(snapshot: MonitorStateSnapshot): Promise<void> {
    const next = this.writeChain.then(() => this.write(snapshot));
    this.writeChain = next.catch(() => undefined);
    return next;
  }

  /** Resolves once every save issued so far has finished. */
  flush(): Promise<void> {
    return this.writeChain;
  }

  private async write(snapshot: MonitorStateSnapshot): Promise<void> {
    const filePath = await this.ensureWritable();
    const tempPath = `${filePath}.tmp`;
    await this.fs.writeFile(tempPath, JSON.stringify(snapshot, null, 2));
    await this.fs.rename(tempPath, filePath);
  }
}
