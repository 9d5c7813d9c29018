export * from "./types";
export * from "./health";
export * from "./observability";
export * from "./env/validator";
export * from "./env/schema";
export * as config from "./config";
export {
  ConfigValidationError,
  ConfigurationManager,
  DEFAULT_SETTINGS,
  createConfigManager,
  loadConfig,
  resolveMonitorSettings,
  toServiceDescriptor,
  validateConfig
} from "./config";
export type {
  ClassifierConfig,
  ControlServerConfig,
  DependencyConfig,
  GovernorConfig,
  MonitorConfig,
  MonitorSettings,
  ObservabilityAlertsConfig,
  ObservabilityConfig,
  ObservabilityLogsConfig,
  ProbeConfig,
  RecoveryConfig,
  ServiceConfig,
  StateConfig
} from "./config";
