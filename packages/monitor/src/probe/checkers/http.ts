import { request } from "undici";
import type { ServiceDescriptor } from "@fleetwarden/shared";
import type { CheckContext, CheckOutcome } from "./types";

const USER_AGENT = "fleetwarden-probe/0.1";

export function isExpectedStatus(statusCode: number, expected?: number[]): boolean {
  if (expected && expected.length > 0) {
    return expected.includes(statusCode);
  }
  return statusCode >= 200 && statusCode < 300;
}

/**
 * HEAD by default; GET when the body has to contain `expectContent`.
 */
export async function checkHttp(service: ServiceDescriptor, context: CheckContext): Promise<CheckOutcome> {
  const url = new URL(service.target);
  const needsBody = Boolean(service.expectContent);
  const response = await request(url, {
    method: needsBody ? "GET" : "HEAD",
    headers: {
      "user-agent": USER_AGENT,
      "cache-control": "no-cache"
    },
    signal: context.signal,
    dispatcher: context.dispatcher
  });
  const statusCode = response.statusCode;
  const statusOk = isExpectedStatus(statusCode, service.expectedStatus);

  if (!needsBody || !statusOk) {
    await response.body.dump();
    return statusOk ? { success: true, statusCode } : { success: false, statusCode, error: `HTTP ${statusCode}` };
  }

  const body = await response.body.text();
  if (service.expectContent && !body.includes(service.expectContent)) {
    return { success: false, statusCode, error: `Content missing (HTTP ${statusCode})` };
  }
  return { success: true, statusCode };
}
