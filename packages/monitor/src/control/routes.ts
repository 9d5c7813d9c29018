import Ajv2020 from "ajv/dist/2020";
import type { JSONSchemaType, ValidateFunction } from "ajv";
import type { MaintenanceScope } from "@fleetwarden/shared";
import {
  AlertGroupNotFoundError,
  MaintenanceWindowNotFoundError,
  UnknownServiceError,
  describeError
} from "../errors";
import type { FleetMonitor } from "../monitor";

export type ControlTarget = Pick<
  FleetMonitor,
  "getSnapshot" | "acknowledge" | "toggleMaintenance" | "scheduleMaintenance" | "cancelMaintenance"
>;

export interface ControlRequest {
  method: string;
  path: string;
  authorization?: string;
  body?: unknown;
}

export interface ControlResponse {
  status: number;
  body: unknown;
}

interface AckBody {
  actor?: string;
}

interface ToggleBody {
  services?: string[];
  durationMs?: number;
  reason?: string;
}

interface ScheduleBody {
  startAt: string;
  durationMs: number;
  services?: string[];
  reason?: string;
}

const ackSchema: JSONSchemaType<AckBody> = {
  type: "object",
  properties: {
    actor: { type: "string", minLength: 1, nullable: true }
  },
  required: [],
  additionalProperties: false
};

const toggleSchema: JSONSchemaType<ToggleBody> = {
  type: "object",
  properties: {
    services: { type: "array", items: { type: "string", minLength: 1 }, minItems: 1, nullable: true },
    durationMs: { type: "number", exclusiveMinimum: 0, nullable: true },
    reason: { type: "string", nullable: true }
  },
  required: [],
  additionalProperties: false
};

const scheduleSchema: JSONSchemaType<ScheduleBody> = {
  type: "object",
  properties: {
    startAt: { type: "string", minLength: 1 },
    durationMs: { type: "number", exclusiveMinimum: 0 },
    services: { type: "array", items: { type: "string", minLength: 1 }, minItems: 1, nullable: true },
    reason: { type: "string", nullable: true }
  },
  required: ["startAt", "durationMs"],
  additionalProperties: false
};

const ajv = new Ajv2020({ allErrors: true });
const validateAck = ajv.compile(ackSchema);
const validateToggle = ajv.compile(toggleSchema);
const validateSchedule = ajv.compile(scheduleSchema);

class BadRequestError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "BadRequestError";
  }
}

function toScope(services: string[] | undefined): MaintenanceScope {
  return services ? { kind: "services", serviceIds: services } : { kind: "all" };
}

function parseBody<T>(validate: ValidateFunction<T>, body: unknown): T {
  const candidate = body ?? {};
  if (!validate(candidate)) {
    throw new BadRequestError(`invalid body: ${ajv.errorsText(validate.errors)}`);
  }
  return candidate;
}

export function isAuthorized(authorization: string | undefined, authToken?: string): boolean {
  if (!authToken) {
    return true;
  }
  return authorization === `Bearer ${authToken}`;
}

/**
 * Maps one control request onto the monitor. Knows nothing about sockets;
 * ControlServer feeds it parsed requests.
 */
export async function routeControlRequest(
  target: ControlTarget,
  request: ControlRequest,
  authToken?: string
): Promise<ControlResponse> {
  if (!isAuthorized(request.authorization, authToken)) {
    return { status: 401, body: { error: "unauthorized" } };
  }
  const segments = request.path.split("?")[0].split("/").filter(segment => segment.length > 0);
  const method = request.method.toUpperCase();
  const route = `${method} /${segments.join("/")}`;

  try {
    if (route === "GET /status") {
      return { status: 200, body: target.getSnapshot() };
    }
    if (method === "POST" && segments.length === 3 && segments[0] === "alerts" && segments[2] === "ack") {
      const body = parseBody(validateAck, request.body);
      const group = await target.acknowledge(decodeURIComponent(segments[1]), body.actor ?? "operator");
      return { status: 200, body: group };
    }
    if (route === "POST /maintenance/toggle") {
      const body = parseBody(validateToggle, request.body);
      const result = await target.toggleMaintenance(toScope(body.services), {
        durationMs: body.durationMs,
        reason: body.reason
      });
      return { status: 200, body: result };
    }
    if (route === "POST /maintenance/schedule") {
      const body = parseBody(validateSchedule, request.body);
      const startAt = Date.parse(body.startAt);
      if (Number.isNaN(startAt)) {
        throw new BadRequestError(`invalid startAt: ${body.startAt}`);
      }
      const window = await target.scheduleMaintenance(startAt, body.durationMs, toScope(body.services), body.reason);
      return { status: 201, body: window };
    }
    if (method === "DELETE" && segments.length === 2 && segments[0] === "maintenance") {
      const window = await target.cancelMaintenance(decodeURIComponent(segments[1]));
      return { status: 200, body: window };
    }
    return { status: 404, body: { error: `no route for ${route}` } };
  } catch (error) {
    if (error instanceof AlertGroupNotFoundError || error instanceof MaintenanceWindowNotFoundError) {
      return { status: 404, body: { error: error.message } };
    }
    if (error instanceof UnknownServiceError || error instanceof BadRequestError || error instanceof RangeError) {
      return { status: 400, body: { error: error.message } };
    }
    return { status: 500, body: { error: describeError(error) } };
  }
}
