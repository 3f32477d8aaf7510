/**
 * Synthetic device state sent with every conversational event. The backend
 * rejects events whose context is missing a subsystem, so the shape (keys and
 * nesting) must stay as is; the values describe an idle phone app.
 */

export interface ContextEntry {
  header: { namespace: string; name: string };
  payload: Record<string, unknown>;
}

const entry = (namespace: string, name: string, payload: Record<string, unknown>): ContextEntry => ({
  header: { namespace, name },
  payload,
});

const APP_WINDOW = "app_window";
const PLACEHOLDER_PERSON_ID = "amzn1.actor.person.did.UNKNOWN";
const EXTERNAL_PLAYER_AGENT = "XOGFXO466L";

export function buildDeviceContext(conversationId?: string): ContextEntry[] {
  const conversation: Record<string, unknown> = {
    type: "VCF2",
    version: "2024.1",
    windowState: "NORMAL",
    size: { width: 430, height: 932 },
    scrollable: { direction: "vertical", allowForward: false, allowBackward: true },
    elements: [],
  };
  if (conversationId) {
    conversation.conversationId = conversationId;
  }

  return [
    entry("SpeechSynthesizer", "SpeechState", {
      playerActivity: "FINISHED",
      token: "",
      offsetInMilliseconds: 0,
    }),
    entry("SpeechRecognizer", "RecognizerState", { wakeword: "ALEXA" }),
    entry("Speaker", "VolumeState", { volume: 50, muted: false }),
    entry("Alexa.Display.Window", "WindowState", {
      defaultWindowId: APP_WINDOW,
      instances: [
        {
          id: APP_WINDOW,
          templateId: "app_window_template",
          configuration: { interactionMode: "mobile_mode", sizeConfigurationId: "fullscreen" },
        },
      ],
    }),
    // Marks the interaction as typed rather than spoken.
    entry("VisualActivityTracker", "ActivityState", { focused: { interface: "Text" } }),
    entry("AudioActivityTracker", "ActivityState", {
      dialog: { interface: "SpeechSynthesizer", idleTimeInMilliseconds: 100000 },
    }),
    entry("Alerts", "AlertsState", { allAlerts: [], activeAlerts: [] }),
    entry("Alexa.IOComponents", "TrustedStates", { sessionStates: [], unlockState: "NEVER_UNLOCKED" }),
    entry("Alexa.IOComponents", "IOComponentStates", { activeIOComponents: [], allIOComponents: [] }),
    entry("Alexa.PlaybackStateReporter", "PlaybackState", {
      state: "IDLE",
      shuffle: "NOT_SHUFFLED",
      repeat: "NOT_REPEATED",
      favorite: "NOT_RATED",
      positionMilliseconds: 0,
      supportedOperations: ["Play", "Pause", "Previous", "Next"],
      players: [],
    }),
    entry("Alexa.IOComponents.Bluetooth", "BluetoothState", { bluetoothStates: [] }),
    entry("Alexa.Identity.Recognition", "RecognitionState", {
      RecognitionState: { primaryPerson: { acl: 100, id: PLACEHOLDER_PERSON_ID } },
    }),
    entry("ExternalMediaPlayer", "ExternalMediaPlayerState", {
      agent: EXTERNAL_PLAYER_AGENT,
      spiVersion: "2.2.0",
      players: [],
      playerInFocus: "",
    }),
    entry("Alexa.Comms.PhoneCallController", "PhoneCallControllerState", {
      allCalls: [],
      currentCall: {},
      device: { connectionState: "DISCONNECTED" },
      configuration: { callingFeature: [{ OVERRIDE_RINGTONE_SUPPORTED: "false" }] },
    }),
    entry("Alexa.Comms.MessagingController", "MessagingControllerState", {
      messagingEndpointStates: [
        {
          messagingEndpointInfo: { name: "DEFAULT" },
          permissions: { sendPermission: "OFF", readPermission: "OFF" },
          connectionState: "DISCONNECTED",
        },
      ],
    }),
    entry("Alexa.Conversation", "ConversationState", conversation),
  ];
}
