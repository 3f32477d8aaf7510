import * as assert from "assert";
import {
  asNumber,
  buildMultipartBody,
  encodeForm,
  parseJson,
  readCookieBlob,
  readSetCookie,
} from "../../../src/transport/wire";
import { ProtocolError } from "../../../src/types/error/echo-relay-error";
import { expect } from "../../helpers/chai-setup";
import { suite, test } from "../../mocha-globals";
import { textResponse } from "../../utils/scripted-transport";

suite("Unit: wire helpers", () => {
  test("multipart body has a single JSON part named metadata", () => {
    const body = buildMultipartBody("BOUNDARY-1", "metadata", '{"a":1}');

    expect(body).to.equal(
      "--BOUNDARY-1\r\n" +
        'Content-Disposition: form-data; name="metadata"\r\n' +
        "Content-Type: application/json; charset=UTF-8\r\n\r\n" +
        '{"a":1}\r\n' +
        "--BOUNDARY-1--",
    );
  });

  test("form encoding escapes reserved characters", () => {
    expect(encodeForm({ app_name: "Amazon Alexa", domain: ".amazon.com", source_token: "a|b" })).to.equal(
      "app_name=Amazon+Alexa&domain=.amazon.com&source_token=a%7Cb",
    );
  });

  test("reads a cookie from set-cookie headers and from a blob", () => {
    expect(readSetCookie(["session-id=1; Path=/", "csrf=abc123; Secure"], "csrf")).to.equal("abc123");
    expect(readSetCookie(["session-id=1"], "csrf")).to.equal(undefined);
    expect(readCookieBlob("session-id=1; csrf=xyz; ubid-main=2", "csrf")).to.equal("xyz");
    expect(readCookieBlob("session-id=1; xcsrf=no", "csrf")).to.equal(undefined);
  });

  test("parseJson reports unreadable bodies as protocol drift", () => {
    assert.throws(
      () => parseJson(textResponse("<html>", 200), "devices"),
      (error: unknown) => error instanceof ProtocolError && error.message === "failed to parse devices response",
    );
  });

  test("asNumber accepts numeric strings", () => {
    expect(asNumber("1700000000000")).to.equal(1_700_000_000_000);
    expect(asNumber("soon")).to.equal(0);
    expect(asNumber(42)).to.equal(42);
  });
});
