import { CommandDispatcher } from "../commands/command-dispatcher";
import { announce, audioSsml, automation, speak, textCommand, type Command } from "../commands/command";
import { Logger } from "../core/logger";
import { systemClock } from "../core/retry/poll-executor";
import type { PollClock } from "../core/retry/poll-types";
import { ConversationProtocol } from "../conversation/conversation-protocol";
import type { EventReply } from "../extraction/event-reply";
import { ResponseCorrelator } from "../correlation/response-correlator";
import { DeviceService, findDevice } from "../services/device-service";
import { HistoryService } from "../services/history-service";
import { RoutineService } from "../services/routine-service";
import { findSmartHomeDevice, SmartHomeService, type SmartHomeAction } from "../services/smart-home-service";
import { createSession, snapshotSession, type SessionSnapshot } from "../session/session";
import { SessionManager } from "../session/session-manager";
import { AuthenticatedTransport } from "../transport/authenticated-transport";
import { AxiosHttpTransport, type HttpTransport } from "../transport/http-transport";
import type { EchoRelayConfig } from "../types/configuration";
import { ConfigurationError } from "../types/error/echo-relay-error";
import type {
  ConversationSnapshot,
  ConversationSummary,
  Device,
  HistoryRecord,
  Routine,
  SmartHomeDevice,
} from "../types/records";

export interface EchoRelayClientDependencies {
  transport?: HttpTransport;
  clock?: PollClock;
  logger?: Logger;
  /** Identifier source for conversational events. */
  newId?: () => string;
}

const UNSAFE_URL_CHARACTERS = /["<>\s]/;

/**
 * Authenticated client for one session.
 *
 * @remarks
 * Operations must be awaited one at a time: they share and mutate a single
 * session. Use one client per concurrent caller.
 *
 * @example
 * ```ts
 * const client = await EchoRelayClient.connect(loadConfig());
 * const [kitchen] = await client.listDevices();
 * await client.speak(kitchen, "Dinner is ready");
 * const answer = await client.ask(kitchen, "what time is it");
 * ```
 */
export class EchoRelayClient {
  private readonly devices: DeviceService;
  private readonly routines: RoutineService;
  private readonly smartHome: SmartHomeService;
  private readonly history: HistoryService;
  private readonly dispatcher: CommandDispatcher;
  private readonly conversation: ConversationProtocol;
  private readonly correlator: ResponseCorrelator;

  private constructor(
    private readonly config: EchoRelayConfig,
    private readonly sessions: SessionManager,
    transport: HttpTransport,
    clock: PollClock,
    private readonly logger: Logger,
    newId?: () => string,
  ) {
    const api = new AuthenticatedTransport(sessions, transport, logger.child("api"));
    this.devices = new DeviceService(api, sessions.session, logger.child("devices"));
    this.routines = new RoutineService(api, logger.child("routines"));
    this.smartHome = new SmartHomeService(api, logger.child("smarthome"));
    this.history = new HistoryService(sessions, transport, logger.child("history"));
    this.dispatcher = new CommandDispatcher(api, sessions.session, this.routines, logger.child("dispatch"));
    this.conversation = new ConversationProtocol(sessions, transport, logger.child("avs"), {
      avsBaseUrl: config.avsBaseUrl,
      newId,
    });
    this.correlator = new ResponseCorrelator(
      this.dispatcher,
      this.history,
      this.conversation,
      logger.child("correlation"),
      { clock, intervalMs: config.pollIntervalMs },
    );
  }

  /**
   * Exchanges the refresh secret for cookies and a CSRF token, then returns a ready client.
   *
   * @throws AuthError when either step fails.
   */
  static async connect(
    config: EchoRelayConfig,
    dependencies: EchoRelayClientDependencies = {},
  ): Promise<EchoRelayClient> {
    const logger = dependencies.logger ?? new Logger("EchoRelay", config.logLevel);
    const transport = dependencies.transport ?? new AxiosHttpTransport({ timeoutMs: config.httpTimeoutMs });
    const session = createSession(config.refreshToken, config.amazonDomain);
    const sessions = new SessionManager(session, transport, logger.child("session"));

    await sessions.ensureCookies(config.refreshToken);
    await sessions.ensureCsrf();
    logger.info("Connected", { amazonDomain: config.amazonDomain });

    return new EchoRelayClient(
      config,
      sessions,
      transport,
      dependencies.clock ?? systemClock,
      logger,
      dependencies.newId,
    );
  }

  get session(): SessionSnapshot {
    return snapshotSession(this.sessions.session);
  }

  get conversationId(): string | undefined {
    return this.conversation.conversationId;
  }

  setConversationId(id: string): void {
    this.conversation.setConversationId(id);
  }

  startConversation(): string {
    return this.conversation.startConversation();
  }

  listDevices(): Promise<Device[]> {
    return this.devices.listDevices();
  }

  /**
   * Looks a device up by serial or name, falling back to the configured default device.
   *
   * @throws ConfigurationError when neither a name nor a default device is given.
   */
  async resolveDevice(nameOrSerial: string | undefined = this.config.defaultDevice): Promise<Device> {
    if (!nameOrSerial) {
      throw new ConfigurationError("No device selected", ["pass a device name or set ALEXA_DEFAULT_DEVICE"]);
    }
    return findDevice(await this.devices.listDevices(), nameOrSerial);
  }

  dispatch(device: Device, command: Command): Promise<void> {
    return this.dispatcher.dispatch(device, command);
  }

  speak(device: Device, text: string): Promise<void> {
    return this.dispatch(device, speak(text));
  }

  announce(device: Device, text: string): Promise<void> {
    return this.dispatch(device, announce(text));
  }

  textCommand(device: Device, text: string): Promise<void> {
    return this.dispatch(device, textCommand(text));
  }

  runRoutine(device: Device, name: string): Promise<void> {
    return this.dispatch(device, automation(name));
  }

  /**
   * Plays a hosted MP3 (48 kbps, 22 050 Hz) through speech synthesis markup.
   *
   * @throws ConfigurationError when the URL is not a plain HTTPS URL.
   */
  playAudio(device: Device, url: string): Promise<void> {
    if (!url.startsWith("https://") || UNSAFE_URL_CHARACTERS.test(url)) {
      return Promise.reject(
        new ConfigurationError("Invalid audio URL", ["audio must be served from an https:// URL without quotes, spaces or angle brackets"]),
      );
    }
    return this.dispatch(device, speak(audioSsml(url)));
  }

  listRoutines(): Promise<Routine[]> {
    return this.routines.listRoutines();
  }

  listSmartHomeDevices(): Promise<SmartHomeDevice[]> {
    return this.smartHome.listDevices();
  }

  /**
   * Resolves `name` against the current topology and applies `action`.
   *
   * @returns The device that was controlled.
   */
  async controlSmartHome(name: string, action: SmartHomeAction): Promise<SmartHomeDevice> {
    const device = findSmartHomeDevice(await this.smartHome.listDevices(), name);
    await this.smartHome.control(device.entityId, action);
    return device;
  }

  getHistory(startTime: number, endTime: number): Promise<HistoryRecord[]> {
    return this.history.getRecords(startTime, endTime);
  }

  ask(device: Device, question: string, timeoutMs = this.config.askTimeoutMs): Promise<string> {
    this.logger.debug("Ask", { device: device.serialNumber, timeoutMs });
    return this.correlator.ask(device, question, timeoutMs);
  }

  askPlus(question: string, timeoutMs = this.config.askPlusTimeoutMs): Promise<string> {
    this.logger.debug("AskPlus", { timeoutMs });
    return this.correlator.askPlus(question, timeoutMs);
  }

  listConversations(): Promise<ConversationSummary[]> {
    return this.conversation.listConversations();
  }

  sendTextMessage(text: string): Promise<EventReply> {
    return this.conversation.sendTextMessage(text);
  }

  synchronizeState(): Promise<void> {
    return this.conversation.synchronizeState();
  }

  getFragments(): Promise<ConversationSnapshot> {
    return this.conversation.getFragments();
  }
}
