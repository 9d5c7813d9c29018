import { ENV_SCHEMAS, type EnvFormat, type EnvService } from "./schema";

type EnvSource = Record<string, string | undefined>;

const PLACEHOLDER_PATTERNS = [/CHANGE_ME/i, /REPLACE_ME/i, /^<.*>$/];

const FLAG_VALUES = new Set(["1", "0", "true", "false"]);

export interface InvalidEnvVar {
  key: string;
  reason: string;
}

export interface EnvReport {
  missing: string[];
  invalid: InvalidEnvVar[];
}

export class EnvValidationError extends Error {
  readonly missing: string[];
  readonly invalid: InvalidEnvVar[];

  constructor(service: EnvService, report: EnvReport) {
    const problems: string[] = [];
    if (report.missing.length) {
      problems.push(`missing ${[...report.missing].sort().join(", ")}`);
    }
    if (report.invalid.length) {
      problems.push(`invalid ${report.invalid.map(entry => `${entry.key} (${entry.reason})`).join(", ")}`);
    }
    super(`[env] ${service}: ${problems.join("; ")}`);
    this.name = "EnvValidationError";
    this.missing = report.missing;
    this.invalid = report.invalid;
  }
}

/** True for `1` and `true`, the spellings a `flag` variable switches on with. */
export function envFlag(value: string | undefined): boolean {
  const normalized = value?.trim().toLowerCase();
  return normalized === "1" || normalized === "true";
}

function checkFormat(format: EnvFormat, value: string): string | undefined {
  switch (format) {
    case "url": {
      let parsed: URL;
      try {
        parsed = new URL(value);
      } catch {
        return "expected an absolute URL";
      }
      return parsed.protocol === "http:" || parsed.protocol === "https:" ? undefined : "expected http or https";
    }
    case "flag":
      return FLAG_VALUES.has(value.toLowerCase()) ? undefined : "expected 1, 0, true or false";
    case "json-file":
      return value.endsWith(".json") ? undefined : "expected a .json path";
    case "json-file-list":
      return value
        .split(",")
        .map(entry => entry.trim())
        .filter(entry => entry.length > 0)
        .every(entry => entry.endsWith(".json"))
        ? undefined
        : "expected comma-separated .json paths";
  }
}

export function getMissingEnvVars(service: EnvService, source: EnvSource = process.env): string[] {
  const schema = ENV_SCHEMAS[service];
  return schema.required.filter(key => {
    const value = source[key];
    if (value === undefined) {
      return true;
    }

    if (schema.allowEmpty?.includes(key)) {
      return false;
    }

    const trimmed = value.trim();
    if (!trimmed.length) {
      return true;
    }

    return PLACEHOLDER_PATTERNS.some(pattern => pattern.test(trimmed));
  });
}

/** Values present but malformed. Empty and placeholder values are left to the missing check. */
export function getInvalidEnvVars(service: EnvService, source: EnvSource = process.env): InvalidEnvVar[] {
  const invalid: InvalidEnvVar[] = [];
  for (const [key, format] of Object.entries(ENV_SCHEMAS[service].formats ?? {})) {
    const value = source[key]?.trim();
    if (!value || PLACEHOLDER_PATTERNS.some(pattern => pattern.test(value))) {
      continue;
    }
    const reason = checkFormat(format, value);
    if (reason) {
      invalid.push({ key, reason });
    }
  }
  return invalid;
}

/** Keys set in `source` that the service's schema does not declare. */
export function getUndeclaredEnvVars(service: EnvService, source: EnvSource): string[] {
  const schema = ENV_SCHEMAS[service];
  const declared = new Set([...schema.required, ...(schema.optional ?? [])]);
  return Object.keys(source).filter(key => !declared.has(key));
}

export function checkEnvVars(service: EnvService, source: EnvSource = process.env): EnvReport {
  return { missing: getMissingEnvVars(service, source), invalid: getInvalidEnvVars(service, source) };
}

export function assertEnvVars(service: EnvService, source: EnvSource = process.env): void {
  const report = checkEnvVars(service, source);
  if (report.missing.length || report.invalid.length) {
    throw new EnvValidationError(service, report);
  }
}
