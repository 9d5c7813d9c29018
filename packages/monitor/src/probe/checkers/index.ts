import type { CheckType } from "@fleetwarden/shared";
import { checkContainer, checkCustom, checkUnit } from "./command";
import { checkHttp } from "./http";
import { checkTcp } from "./tcp";
import type { HealthChecker } from "./types";

export type CheckerRegistry = Record<CheckType, HealthChecker>;

export const defaultCheckers: CheckerRegistry = {
  http: checkHttp,
  tcp: checkTcp,
  container: checkContainer,
  unit: checkUnit,
  custom: checkCustom
};

export { checkContainer, checkCustom, checkUnit } from "./command";
export { checkHttp, isExpectedStatus } from "./http";
export { checkTcp, parseHostPort, type HostPort } from "./tcp";
export type { CheckContext, CheckOutcome, HealthChecker } from "./types";
