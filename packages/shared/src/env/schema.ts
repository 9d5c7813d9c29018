/**
 * Value shapes checked beyond presence. `json-file` and `json-file-list`
 * (comma separated) point at JSON documents the daemon reads or writes.
 */
export type EnvFormat = "url" | "flag" | "json-file" | "json-file-list";

export type EnvSchema = {
  required: string[];
  optional?: string[];
  allowEmpty?: string[];
  formats?: Record<string, EnvFormat>;
};

export const ENV_SERVICES = ["monitor", "cli"] as const;

export type EnvService = (typeof ENV_SERVICES)[number];

export const ENV_SCHEMAS: Record<EnvService, EnvSchema> = {
  monitor: {
    required: ["MONITOR_CONFIG", "MONITOR_STATE_PATH", "MONITOR_LOG_DIR"],
    optional: ["MONITOR_RUN_ID", "CONFIG_WATCH", "MONITOR_CONTROL_TOKEN", "MONITOR_STATE_FALLBACK"],
    allowEmpty: ["MONITOR_RUN_ID", "CONFIG_WATCH", "MONITOR_CONTROL_TOKEN", "MONITOR_STATE_FALLBACK"],
    formats: {
      MONITOR_CONFIG: "json-file",
      MONITOR_STATE_PATH: "json-file",
      MONITOR_STATE_FALLBACK: "json-file-list",
      CONFIG_WATCH: "flag"
    }
  },
  cli: {
    required: ["MONITOR_CONTROL_URL"],
    optional: ["MONITOR_CONTROL_TOKEN"],
    allowEmpty: ["MONITOR_CONTROL_TOKEN"],
    formats: {
      MONITOR_CONTROL_URL: "url"
    }
  }
};
