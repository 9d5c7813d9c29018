export * from "./types";
export * from "./defaults";
export { ConfigValidationError, defaultSchemaPath, loadConfig, parseConfig, validate, validateConfig } from "./loader";
export { ConfigurationManager, createConfigManager } from "./manager";
