import type { Logger } from "../core/logger";
import type { AuthenticatedTransport } from "../transport/authenticated-transport";
import { asArray, asRecord, asString } from "../transport/wire";
import { ConfigurationError, NotFoundError } from "../types/error/echo-relay-error";
import type { SmartHomeDevice } from "../types/records";

export type SmartHomeAction =
  | { kind: "turnOn" }
  | { kind: "turnOff" }
  | { kind: "setBrightness"; level: number };

export interface ControlRequest {
  entityId: string;
  entityType: "APPLIANCE";
  parameters: Record<string, string | number>;
}

export function toSmartHomeDevice(raw: unknown): SmartHomeDevice {
  const record = asRecord(raw);
  const types = record.applianceTypes;
  return {
    entityId: asString(record.entityId),
    applianceId: asString(record.applianceId),
    name: asString(record.friendlyName),
    description: asString(record.friendlyDescription),
    types: Array.isArray(types)
      ? types.filter((t): t is string => typeof t === "string")
      : typeof types === "string" && types
        ? [types]
        : [],
    reachable: record.isReachable === true,
  };
}

/**
 * Exact case-insensitive name first, then substring.
 *
 * @throws NotFoundError when neither matches.
 */
export function findSmartHomeDevice(devices: readonly SmartHomeDevice[], name: string): SmartHomeDevice {
  const wanted = name.toLowerCase();
  const found =
    devices.find((d) => d.name.toLowerCase() === wanted) ??
    devices.find((d) => d.name.toLowerCase().includes(wanted));
  if (!found) {
    throw new NotFoundError("smart-home device", name);
  }
  return found;
}

export function buildControlRequest(entityId: string, action: SmartHomeAction): ControlRequest {
  switch (action.kind) {
    case "turnOn":
      return { entityId, entityType: "APPLIANCE", parameters: { action: "turnOn" } };
    case "turnOff":
      return { entityId, entityType: "APPLIANCE", parameters: { action: "turnOff" } };
    case "setBrightness":
      if (!Number.isInteger(action.level) || action.level < 0 || action.level > 100) {
        throw new ConfigurationError("Invalid brightness", ["brightness must be an integer from 0 to 100"]);
      }
      return {
        entityId,
        entityType: "APPLIANCE",
        parameters: { action: "setBrightness", brightness: action.level },
      };
  }
}

export class SmartHomeService {
  constructor(
    private readonly api: AuthenticatedTransport,
    private readonly logger: Logger,
  ) {}

  /**
   * Flattens the appliance topology of every network into one list.
   */
  async listDevices(): Promise<SmartHomeDevice[]> {
    const body = await this.api.requestJson("GET", "/api/phoenix", "smart home devices");
    const devices: SmartHomeDevice[] = [];
    for (const network of asArray(asRecord(body).networkDetail)) {
      for (const appliance of Object.values(asRecord(asRecord(network).applianceDetails))) {
        devices.push(toSmartHomeDevice(appliance));
      }
    }
    return devices;
  }

  async control(entityId: string, action: SmartHomeAction): Promise<void> {
    const request = buildControlRequest(entityId, action);
    this.logger.debug("Smart home control", { entityId, action: action.kind });
    await this.api.request("PUT", "/api/phoenix/state", { controlRequests: [request] });
  }
}
