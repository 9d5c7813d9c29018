import { readFileSync } from "node:fs";
import path from "node:path";
import { parse } from "dotenv";
import { ENV_SERVICES, type EnvService } from "../packages/shared/src/env/schema";
import { checkEnvVars, getUndeclaredEnvVars } from "../packages/shared/src/env/validator";

const TEMPLATES: Record<EnvService, string> = {
  monitor: "env/.env.monitor",
  cli: "env/.env.cli"
};

function readTemplate(service: EnvService): Record<string, string> {
  return parse(readFileSync(path.resolve(process.cwd(), TEMPLATES[service]), "utf8"));
}

function main() {
  const failures: string[] = [];
  const warnings: string[] = [];

  for (const service of ENV_SERVICES) {
    const values = readTemplate(service);
    const { missing, invalid } = checkEnvVars(service, values);
    if (missing.length) {
      failures.push(`${service}: missing ${missing.join(", ")}`);
    }
    for (const entry of invalid) {
      failures.push(`${service}: ${entry.key} ${entry.reason}`);
    }
    const undeclared = getUndeclaredEnvVars(service, values);
    if (undeclared.length) {
      warnings.push(`${service}: ${TEMPLATES[service]} sets undeclared ${undeclared.join(", ")}`);
    }
  }

  warnings.forEach(warning => console.warn(` ! ${warning}`));
  if (failures.length) {
    console.error("Environment template validation failed:\n");
    failures.forEach(failure => console.error(` • ${failure}`));
    process.exitCode = 1;
    return;
  }

  console.log("All environment templates satisfy the schema:", ENV_SERVICES.join(", "));
}

main();
