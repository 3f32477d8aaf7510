import {
  AuthError,
  BackendError,
  ConfigurationError,
  describeError,
  EchoRelayErrorCode,
  isEchoRelayError,
  NoConversationError,
  NotFoundError,
  TimeoutError,
} from "../../../src/types/error/echo-relay-error";
import { DEFAULT_SEVERITY_FOR_DOMAIN, isFaultDomain, isSeverity } from "../../../src/types/error/error-taxonomy";
import { expect } from "../../helpers/chai-setup";
import { suite, test } from "../../mocha-globals";

suite("Unit: EchoRelayError taxonomy", () => {
  test("backend errors carry status, body and operation", () => {
    const error = new BackendError("POST /api/behaviors/preview", 400, '{"message":"bad"}');

    expect(error.message).to.equal('POST /api/behaviors/preview failed with status 400: {"message":"bad"}');
    expect(error.status).to.equal(400);
    expect(error.body).to.equal('{"message":"bad"}');
    expect(error.code).to.equal(EchoRelayErrorCode.BackendStatus);
    expect(error.faultDomain).to.equal("transport");
    expect(error.severity).to.equal("error");
  });

  test("status 0 reads as a transport failure", () => {
    const cause = new Error("socket hang up");
    const error = new BackendError("GET https://alexa.amazon.com/api/language", 0, "", cause);

    expect(error.message).to.equal("GET https://alexa.amazon.com/api/language failed before a response was received");
    expect(error.cause).to.equal(cause);
  });

  test("authentication failures are critical", () => {
    const error = new AuthError("CSRF token not found");

    expect(error.severity).to.equal("critical");
    expect(error.name).to.equal("AuthError");
    expect(isEchoRelayError(error)).to.equal(true);
  });

  test("messages name the missing entity or the elapsed budget", () => {
    expect(new NotFoundError("routine", "Bedtime").message).to.equal("routine 'Bedtime' not found");
    expect(new TimeoutError("Alexa", 1_500, 3).message).to.equal(
      "timeout waiting for Alexa response after 1500ms (3 polls)",
    );
    expect(new ConfigurationError("Invalid audio URL", ["must be https"]).message).to.equal(
      "Invalid audio URL: must be https",
    );
  });

  test("a timeout is a warning but a missing conversation is an error", () => {
    expect(new TimeoutError("Alexa+", 30_000, 60).severity).to.equal("warning");
    expect(new NoConversationError().severity).to.equal("error");
  });

  test("describeError redacts metadata and handles foreign values", () => {
    const described = describeError(new AuthError("exchange failed", { status: 401, cookie: "session-id=x" }));

    expect(described.metadata).to.deep.equal({ status: 401, cookie: "***REDACTED***" });
    expect(described.code).to.equal("AUTH_FAILED");
    expect(describeError(new TypeError("nope"))).to.deep.equal({ name: "TypeError", message: "nope" });
    expect(describeError("plain")).to.deep.equal({ message: "plain" });
  });

  test("taxonomy guards and domain defaults", () => {
    const error = new NotFoundError("device", "garage");

    expect(error.resource).to.equal("device");
    expect(error.lookupName).to.equal("garage");
    expect(error.faultDomain).to.equal("dispatch");
    expect(isFaultDomain(error.faultDomain)).to.equal(true);
    expect(error.severity).to.equal(DEFAULT_SEVERITY_FOR_DOMAIN.dispatch);
    expect(isFaultDomain("audio")).to.equal(false);
    expect(isSeverity("fatal")).to.equal(false);
  });
});
