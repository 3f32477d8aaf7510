import type { Logger } from "../core/logger";
import type { Session } from "../session/session";
import type { AuthenticatedTransport } from "../transport/authenticated-transport";
import { asArray, asRecord, asString } from "../transport/wire";
import { NotFoundError } from "../types/error/echo-relay-error";
import type { Device } from "../types/records";

export function toDevice(raw: unknown): Device {
  const record = asRecord(raw);
  return {
    accountName: asString(record.accountName),
    serialNumber: asString(record.serialNumber),
    deviceType: asString(record.deviceType),
    deviceFamily: asString(record.deviceFamily),
    customerId: asString(record.deviceOwnerCustomerId),
    online: record.online === true,
    capabilities: asArray(record.capabilities).filter((c): c is string => typeof c === "string"),
  };
}

/**
 * Exact serial or name match first, then a case-insensitive name substring.
 */
export function findDevice(devices: readonly Device[], nameOrSerial: string): Device {
  const wanted = nameOrSerial.toLowerCase();
  const found =
    devices.find((d) => d.serialNumber === nameOrSerial || d.accountName === nameOrSerial) ??
    devices.find((d) => d.accountName.toLowerCase().includes(wanted));
  if (!found) {
    throw new NotFoundError("device", nameOrSerial);
  }
  return found;
}

export class DeviceService {
  constructor(
    private readonly api: AuthenticatedTransport,
    private readonly session: Session,
    private readonly logger: Logger,
  ) {}

  /**
   * Fetches a fresh device list. The first device's owner becomes the
   * session's customer identifier.
   */
  async listDevices(): Promise<Device[]> {
    const body = await this.api.requestJson("GET", "/api/devices-v2/device?cached=true", "devices");
    const devices = asArray(asRecord(body).devices).map(toDevice);
    const first = devices[0];
    if (first && first.customerId) {
      this.session.customerId = first.customerId;
    }
    this.logger.debug("Devices listed", { count: devices.length });
    return devices;
  }
}
