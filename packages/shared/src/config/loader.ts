import fs from "fs";
import path from "path";
import Ajv2020 from "ajv/dist/2020";
import type { ValidateFunction } from "ajv";
import type { MonitorConfig, ValidationResult } from "./types";

export const defaultSchemaPath = path.resolve(
  __dirname,
  "../../../../config/schema/monitor-config.schema.json"
);

export class ConfigValidationError extends Error {
  constructor(public readonly errors: string[], source?: string) {
    super(`Config validation failed${source ? ` for ${source}` : ""}:\n${errors.join("\n")}`);
    this.name = "ConfigValidationError";
  }
}

const compiled = new Map<string, ValidateFunction>();

function compileSchema(schemaFilePath: string): ValidateFunction {
  const cached = compiled.get(schemaFilePath);
  if (cached) {
    return cached;
  }
  const schemaRaw = fs.readFileSync(schemaFilePath, "utf-8");
  const schema = JSON.parse(schemaRaw);
  const ajv = new Ajv2020({ allErrors: true, strict: false });
  const validateFn = ajv.compile(schema);
  compiled.set(schemaFilePath, validateFn);
  return validateFn;
}

/**
 * Validates config and returns structured result without throwing.
 * @param config - Configuration object to validate
 * @param schemaFilePath - Path to JSON schema file
 */
export function validateConfig(config: unknown, schemaFilePath: string = defaultSchemaPath): ValidationResult {
  const validateFn = compileSchema(schemaFilePath);
  const valid = validateFn(config);
  if (!valid) {
    const errors = validateFn.errors?.map(err => `${err.instancePath || "/"} ${err.message}`) ?? [];
    return { valid: false, errors };
  }
  return { valid: true };
}

export function validate(
  config: unknown,
  schemaFilePath: string = defaultSchemaPath,
  source?: string
): asserts config is MonitorConfig {
  const result = validateConfig(config, schemaFilePath);
  if (!result.valid) {
    throw new ConfigValidationError(result.errors ?? [], source);
  }
}

export function parseConfig(raw: string, source: string, schemaFilePath: string = defaultSchemaPath): MonitorConfig {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new ConfigValidationError([`invalid JSON: ${error instanceof Error ? error.message : String(error)}`], source);
  }
  validate(parsed, schemaFilePath, source);
  return parsed;
}

export function loadConfig(filePath: string, schemaFilePath: string = defaultSchemaPath): MonitorConfig {
  const raw = fs.readFileSync(filePath, "utf-8");
  return parseConfig(raw, filePath, schemaFilePath);
}
