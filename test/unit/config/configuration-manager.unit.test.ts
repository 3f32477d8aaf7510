import { ConfigurationManager, isLogLevel, loadConfig } from "../../../src/config/configuration-manager";
import { CONFIG_DEFAULTS } from "../../../src/types/configuration";
import { ConfigurationError } from "../../../src/types/error/echo-relay-error";
import { expect } from "../../helpers/chai-setup";
import { suite, test } from "../../mocha-globals";

function captureConfigError(run: () => unknown): ConfigurationError {
  try {
    run();
  } catch (error: unknown) {
    if (error instanceof ConfigurationError) {
      return error;
    }
    throw error;
  }
  throw new Error("expected a ConfigurationError");
}

suite("Unit: ConfigurationManager", () => {
  test("applies defaults when only the refresh secret is set", () => {
    const config = new ConfigurationManager({ ALEXA_REFRESH_TOKEN: "test-secret" }).load();

    expect(config).to.deep.equal({
      refreshToken: "test-secret",
      amazonDomain: CONFIG_DEFAULTS.amazonDomain,
      logLevel: "info",
      askTimeoutMs: 10_000,
      askPlusTimeoutMs: 30_000,
      httpTimeoutMs: 30_000,
      pollIntervalMs: 500,
      avsBaseUrl: "https://avs-alexa-12-na.amazon.com",
    });
  });

  test("reads environment variables and normalizes the log level", () => {
    const config = loadConfig(
      {},
      {
        ALEXA_REFRESH_TOKEN: "test-secret",
        ALEXA_AMAZON_DOMAIN: "amazon.de",
        ALEXA_DEFAULT_DEVICE: "Kitchen Echo",
        ALEXA_LOG_LEVEL: "DEBUG",
        ALEXA_ASK_TIMEOUT_MS: " 15000 ",
      },
    );

    expect(config.amazonDomain).to.equal("amazon.de");
    expect(config.defaultDevice).to.equal("Kitchen Echo");
    expect(config.logLevel).to.equal("debug");
    expect(config.askTimeoutMs).to.equal(15_000);
  });

  test("explicit overrides win over the environment", () => {
    const config = loadConfig(
      { amazonDomain: "amazon.co.uk", pollIntervalMs: 250 },
      { ALEXA_REFRESH_TOKEN: "test-secret", ALEXA_AMAZON_DOMAIN: "amazon.de", ALEXA_POLL_INTERVAL_MS: "900" },
    );

    expect(config.amazonDomain).to.equal("amazon.co.uk");
    expect(config.pollIntervalMs).to.equal(250);
  });

  test("names the environment variable for a missing secret", () => {
    const error = captureConfigError(() => new ConfigurationManager({}).load());

    expect(error.errors).to.deep.equal(["refreshToken is required (set ALEXA_REFRESH_TOKEN)"]);
    expect(error.message).to.equal(
      "Invalid client configuration: refreshToken is required (set ALEXA_REFRESH_TOKEN)",
    );
  });

  test("treats a blank secret as missing", () => {
    const error = captureConfigError(() => new ConfigurationManager({ ALEXA_REFRESH_TOKEN: "   " }).load());

    expect(error.errors).to.deep.equal(["refreshToken is required (set ALEXA_REFRESH_TOKEN)"]);
  });

  test("reports every schema violation at once", () => {
    const error = captureConfigError(() =>
      new ConfigurationManager({
        ALEXA_REFRESH_TOKEN: "test-secret",
        ALEXA_AMAZON_DOMAIN: "example.com",
        ALEXA_POLL_INTERVAL_MS: "fast",
      }).load(),
    );

    expect(error.errors).to.have.length(2);
    expect(error.errors[0]).to.match(/^amazonDomain must match pattern/);
    expect(error.errors[1]).to.equal("pollIntervalMs must be integer");
  });

  test("rejects a non-HTTPS event endpoint", () => {
    const error = captureConfigError(() =>
      loadConfig({ refreshToken: "test-secret", avsBaseUrl: "http://avs.test" }, {}),
    );

    expect(error.errors).to.have.length(1);
    expect(error.errors[0]).to.match(/^avsBaseUrl must match pattern/);
  });

  test("rejects non-positive timeouts", () => {
    const error = captureConfigError(() => loadConfig({ refreshToken: "test-secret", askTimeoutMs: 0 }, {}));

    expect(error.errors).to.deep.equal(["askTimeoutMs must be >= 1"]);
  });

  test("isLogLevel recognizes only known levels", () => {
    expect(isLogLevel("warn")).to.equal(true);
    expect(isLogLevel("trace")).to.equal(false);
  });
});
