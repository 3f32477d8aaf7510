import type { Logger } from "../core/logger";
import { findRoutine, type RoutineService } from "../services/routine-service";
import type { Session } from "../session/session";
import type { AuthenticatedTransport } from "../transport/authenticated-transport";
import { NotFoundError } from "../types/error/echo-relay-error";
import type { Device } from "../types/records";
import type { Command } from "./command";

const SEQUENCE_TYPE = "com.amazon.alexa.behaviors.model.Sequence";
const OPAQUE_NODE_TYPE = "com.amazon.alexa.behaviors.model.OpaquePayloadOperationNode";
const TELL_ALEXA_SKILL = "amzn1.ask.1p.tellalexa";
const LOCALE = "en-US";
const PREVIEW_BEHAVIOR = "PREVIEW";

export interface BehaviorPayload {
  behaviorId: string;
  sequenceJson: string;
  status: "ENABLED";
}

type PayloadCommand = Exclude<Command, { kind: "automation" }>;

function operationNode(type: string, operationPayload: Record<string, unknown>, extra: Record<string, unknown> = {}) {
  return {
    "@type": SEQUENCE_TYPE,
    startNode: {
      "@type": OPAQUE_NODE_TYPE,
      type,
      ...extra,
      operationPayload,
    },
  };
}

function sequenceFor(device: Device, customerId: string, command: PayloadCommand) {
  switch (command.kind) {
    case "speak":
      return operationNode("Alexa.Speak", {
        deviceType: device.deviceType,
        deviceSerialNumber: device.serialNumber,
        customerId,
        locale: LOCALE,
        textToSpeak: command.text,
      });
    case "announce":
      // Broadcast: addressed to the customer, not to the target device.
      return operationNode("AlexaAnnouncement", {
        expireAfter: "PT5S",
        content: [
          {
            locale: LOCALE,
            display: { title: "Announcement", body: command.text },
            speak: { type: "text", value: command.text },
          },
        ],
        target: { customerId },
      });
    case "textCommand":
      return operationNode(
        "Alexa.TextCommand",
        {
          deviceType: device.deviceType,
          deviceSerialNumber: device.serialNumber,
          customerId,
          text: command.text,
        },
        { skillId: TELL_ALEXA_SKILL },
      );
  }
}

/**
 * Builds the behaviour-preview payload for a text-carrying command. Pure:
 * the same inputs always give the same bytes, and text is JSON-escaped by
 * serialization rather than templating.
 */
export function buildCommandPayload(device: Device, customerId: string, command: PayloadCommand): BehaviorPayload {
  return {
    behaviorId: PREVIEW_BEHAVIOR,
    sequenceJson: JSON.stringify(sequenceFor(device, customerId, command)),
    status: "ENABLED",
  };
}

/**
 * Maps logical commands onto the behaviour-execution endpoint.
 */
export class CommandDispatcher {
  constructor(
    private readonly api: AuthenticatedTransport,
    private readonly session: Session,
    private readonly routines: RoutineService,
    private readonly logger: Logger,
  ) {}

  async dispatch(device: Device, command: Command): Promise<void> {
    if (command.kind === "automation") {
      await this.runRoutine(command.routineName);
      return;
    }
    const customerId = this.resolveCustomerId(device);
    const payload = buildCommandPayload(device, customerId, command);
    this.logger.debug("Dispatching command", { kind: command.kind, device: device.serialNumber });
    await this.api.request("POST", "/api/behaviors/preview", payload);
  }

  /**
   * Replays a stored routine, found by case-insensitive exact name.
   *
   * @throws NotFoundError when no routine has that name.
   */
  async runRoutine(name: string): Promise<void> {
    const routine = findRoutine(await this.routines.listRoutines(), name);
    if (!routine) {
      throw new NotFoundError("routine", name);
    }
    const payload: BehaviorPayload = {
      behaviorId: routine.automationId,
      sequenceJson: routine.sequence,
      status: "ENABLED",
    };
    this.logger.debug("Running routine", { name: routine.name, automationId: routine.automationId });
    await this.api.request("POST", "/api/behaviors/preview", payload);
  }

  /**
   * First use caches the target device's owner as the session customer.
   */
  private resolveCustomerId(device: Device): string {
    const customerId = this.session.customerId || device.customerId;
    this.session.customerId = customerId;
    return customerId;
  }
}
