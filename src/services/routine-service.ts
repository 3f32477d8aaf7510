import type { Logger } from "../core/logger";
import type { AuthenticatedTransport } from "../transport/authenticated-transport";
import { asArray, asRecord, asString } from "../transport/wire";
import type { Routine } from "../types/records";

/**
 * String sequences are kept byte for byte. Object sequences have already been
 * through `JSON.parse`, so they are re-serialized compactly: whitespace is lost
 * and integers beyond `Number.MAX_SAFE_INTEGER` lose precision.
 */
function serializeSequence(value: unknown): string {
  if (typeof value === "string") {
    return value;
  }
  if (value === undefined || value === null) {
    return "";
  }
  return JSON.stringify(value);
}

export function toRoutine(raw: unknown): Routine {
  const record = asRecord(raw);
  return {
    automationId: asString(record.automationId),
    name: asString(record.name),
    sequence: serializeSequence(record.sequence),
  };
}

/**
 * Case-insensitive exact name match. A name that only appears as a substring does not match.
 */
export function findRoutine(routines: readonly Routine[], name: string): Routine | undefined {
  const wanted = name.toLowerCase();
  return routines.find((routine) => routine.name.toLowerCase() === wanted);
}

export class RoutineService {
  constructor(
    private readonly api: AuthenticatedTransport,
    private readonly logger: Logger,
  ) {}

  async listRoutines(): Promise<Routine[]> {
    const body = await this.api.requestAlexaJson("GET", "/api/behaviors/automations", "routines");
    const routines = asArray(body).map(toRoutine);
    this.logger.debug("Routines listed", { count: routines.length });
    return routines;
  }
}
