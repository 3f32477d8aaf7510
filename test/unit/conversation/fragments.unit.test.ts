import { buildDeviceContext } from "../../../src/conversation/device-context";
import {
  isAgentFragment,
  renderAgentText,
  selectAgentReply,
  toConversationSnapshot,
  toConversationSummaries,
  toFragment,
} from "../../../src/conversation/fragments";
import { expect } from "../../helpers/chai-setup";
import { suite, test } from "../../mocha-globals";

const agentFragment = {
  fragmentURI: "frag://LLM:APE/2",
  timestamp: "2026-03-01T10:00:02Z",
  metadata: { purpose: "AGENT", provenance: { type: "LLM" } },
  content: {
    text: "It is sunny.",
    items: [
      { text: "Source: weather.test", style: "text-style-attribution" },
      { text: "Tap for more", style: "text-style-hint" },
    ],
  },
};

suite("Unit: conversation fragments", () => {
  test("normalizes a plain card fragment", () => {
    expect(toFragment(agentFragment)).to.deep.equal({
      fragmentUri: "frag://LLM:APE/2",
      timestamp: "2026-03-01T10:00:02Z",
      purpose: "AGENT",
      provenance: "LLM",
      text: "It is sunny.",
      items: [
        { text: "Source: weather.test", style: "text-style-attribution" },
        { text: "Tap for more", style: "text-style-hint" },
      ],
    });
  });

  test("reads text and items nested in card data", () => {
    const fragment = toFragment({
      fragmentURI: "frag://apl/3",
      metadata: { purpose: "AGENT" },
      content: {
        datasources: {
          cardData: { text: "Rain later today.", items: [{ text: "Via forecast.test", style: "text-style-attribution" }] },
        },
      },
    });

    expect(fragment.text).to.equal("Rain later today.");
    expect(renderAgentText(fragment)).to.equal("Rain later today.\nVia forecast.test");
    expect(fragment).to.not.have.property("provenance");
  });

  test("selects the first agent fragment that has text", () => {
    const snapshot = toConversationSnapshot({
      conversationId: "amzn1.conversation.abc",
      fragments: [
        { fragmentURI: "frag://user/1", metadata: { purpose: "USER" }, content: { text: "weather?" } },
        { fragmentURI: "frag://LLM:APE/1", metadata: { purpose: "AGENT" }, content: {} },
        agentFragment,
      ],
      token: "sync-1",
    });

    expect(snapshot.conversationId).to.equal("amzn1.conversation.abc");
    expect(snapshot.token).to.equal("sync-1");
    expect(selectAgentReply(snapshot.fragments)).to.equal("It is sunny.\nSource: weather.test");
  });

  test("user-only conversations have no reply yet", () => {
    const { fragments } = toConversationSnapshot({
      fragments: [{ fragmentURI: "frag://user/1", metadata: { purpose: "USER" }, content: { text: "weather?" } }],
    });

    expect(selectAgentReply(fragments)).to.equal(undefined);
  });

  test("the generated-content marker in the URI also identifies agent fragments", () => {
    const fragment = toFragment({ fragmentURI: "frag://LLM:APE/9", content: { text: "Hi" } });

    expect(fragment.purpose).to.equal("");
    expect(isAgentFragment(fragment)).to.equal(true);
  });

  test("summaries prefer the device of the latest turn", () => {
    const summaries = toConversationSummaries({
      conversations: [
        {
          id: "amzn1.conversation.1",
          creation: { origin: { name: "Kitchen Echo" } },
          lastTurn: { origin: { name: "Phone" } },
        },
        { id: "amzn1.conversation.2", creation: { origin: { name: "Bedroom Echo" } } },
      ],
    });

    expect(summaries).to.deep.equal([
      { conversationId: "amzn1.conversation.1", deviceName: "Phone" },
      { conversationId: "amzn1.conversation.2", deviceName: "Bedroom Echo" },
    ]);
  });
});

suite("Unit: device context", () => {
  test("describes every subsystem and ends with the conversation state", () => {
    const context = buildDeviceContext("amzn1.conversation.abc");

    expect(context).to.have.length(16);
    expect(context[0]?.header).to.deep.equal({ namespace: "SpeechSynthesizer", name: "SpeechState" });
    expect(context[15]?.header).to.deep.equal({ namespace: "Alexa.Conversation", name: "ConversationState" });
    expect(context[15]?.payload.conversationId).to.equal("amzn1.conversation.abc");
  });

  test("omits the conversation id when none is known", () => {
    const context = buildDeviceContext();

    expect(context[15]?.payload).to.not.have.property("conversationId");
    expect(context[4]?.payload).to.deep.equal({ focused: { interface: "Text" } });
  });
});
