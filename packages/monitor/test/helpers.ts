import {
  DEFAULT_SETTINGS,
  type LogLevel,
  type MonitorSettings,
  type ServiceDescriptor
} from "@fleetwarden/shared";
import type { ComponentLogger } from "@fleetwarden/logger";
import type { CommandResult, CommandRunner, CommandRunOptions } from "../src/probe/commandRunner";
import type { StateFileSystem } from "../src/state/stateStore";

export interface CapturedEvent {
  level: LogLevel;
  event: string;
  component: string;
  payload: Record<string, unknown>;
}

export interface CapturingLogger extends ComponentLogger {
  events: CapturedEvent[];
  named(event: string): CapturedEvent[];
}

export function capturingLogger(): CapturingLogger {
  const events: CapturedEvent[] = [];
  const make = (component: string, context: Record<string, unknown>): ComponentLogger => ({
    log: (level, event, payload) => {
      events.push({ level, event, component, payload: { ...context, ...payload } });
    },
    child: (next, childContext) => make(next, { ...context, ...childContext })
  });
  const root = make("monitor", {});
  return {
    log: root.log,
    child: root.child,
    events,
    named: event => events.filter(entry => entry.event === event)
  };
}

export function service(id: string, overrides: Partial<ServiceDescriptor> = {}): ServiceDescriptor {
  return {
    id,
    checkType: "http",
    target: `http://${id}.test/health`,
    remediation: ["restart", id],
    maxRestartAttempts: 3,
    dependsOn: [],
    enabled: true,
    ...overrides
  };
}

type SettingsOverrides = { [K in keyof MonitorSettings]?: Partial<MonitorSettings[K]> };

export function settings(overrides: SettingsOverrides = {}): MonitorSettings {
  return {
    probe: { ...DEFAULT_SETTINGS.probe, ...overrides.probe },
    classifier: { ...DEFAULT_SETTINGS.classifier, ...overrides.classifier },
    recovery: { ...DEFAULT_SETTINGS.recovery, ...overrides.recovery },
    governor: { ...DEFAULT_SETTINGS.governor, ...overrides.governor },
    dependencies: { ...DEFAULT_SETTINGS.dependencies, ...overrides.dependencies },
    maintenance: { ...DEFAULT_SETTINGS.maintenance, ...overrides.maintenance },
    state: { ...DEFAULT_SETTINGS.state, ...overrides.state },
    shutdown: { ...DEFAULT_SETTINGS.shutdown, ...overrides.shutdown },
    observability: { ...DEFAULT_SETTINGS.observability, ...overrides.observability },
    control: { ...DEFAULT_SETTINGS.control, ...overrides.control }
  };
}

export interface RecordedCommand {
  argv: string[];
  options: CommandRunOptions;
}

/** Command runner stand-in: records every argv and answers from `respond`. */
export class FakeRunner implements CommandRunner {
  readonly calls: RecordedCommand[] = [];

  constructor(private readonly respond: (argv: string[]) => Partial<CommandResult> = () => ({})) {}

  async run(argv: string[], options: CommandRunOptions): Promise<CommandResult> {
    this.calls.push({ argv, options });
    return { exitCode: 0, stdout: "", stderr: "", timedOut: false, ...this.respond(argv) };
  }
}

function enoent(path: string): Error {
  return Object.assign(new Error(`ENOENT: no such file or directory, open '${path}'`), { code: "ENOENT" });
}

/** In-memory file system for the state store. Paths under `readOnlyDirs` reject writes. */
export class MemoryFs implements StateFileSystem {
  readonly files = new Map<string, string>();

  constructor(private readonly readOnlyDirs: string[] = []) {}

  async readFile(path: string): Promise<string> {
    const contents = this.files.get(path);
    if (contents === undefined) {
      throw enoent(path);
    }
    return contents;
  }

  async writeFile(path: string, data: string): Promise<void> {
    if (this.readOnlyDirs.some(dir => path.startsWith(dir))) {
      throw Object.assign(new Error(`EACCES: permission denied, open '${path}'`), { code: "EACCES" });
    }
    this.files.set(path, data);
  }

  async rename(from: string, to: string): Promise<void> {
    const contents = this.files.get(from);
    if (contents === undefined) {
      throw enoent(from);
    }
    this.files.delete(from);
    this.files.set(to, contents);
  }

  async mkdir(): Promise<string | undefined> {
    return undefined;
  }

  async unlink(path: string): Promise<void> {
    if (!this.files.delete(path)) {
      throw enoent(path);
    }
  }
}

export function flushMicrotasks(): Promise<void> {
  return new Promise(resolve => setImmediate(resolve));
}
