import { previewSecret, REDACTION_PLACEHOLDER, sanitizeUnknown } from "../../../src/helpers/error/redaction";
import { expect } from "../../helpers/chai-setup";
import { suite, test } from "../../mocha-globals";

suite("Unit: redaction", () => {
  test("replaces credential keys at any depth, case-insensitively", () => {
    const result = sanitizeUnknown({
      headers: { Cookie: "session-id=x", CSRF: "y", Accept: "application/json" },
      tokens: [{ access_token: "z", kind: "bearer" }],
    });

    expect(result).to.deep.equal({
      headers: { Cookie: REDACTION_PLACEHOLDER, CSRF: REDACTION_PLACEHOLDER, Accept: "application/json" },
      tokens: [{ access_token: REDACTION_PLACEHOLDER, kind: "bearer" }],
    });
  });

  test("truncates long strings", () => {
    const result = sanitizeUnknown({ body: "a".repeat(300) });

    expect(result).to.deep.equal({ body: `${"a".repeat(128)}…` });
  });

  test("marks circular references", () => {
    const node: Record<string, unknown> = { name: "root" };
    node.self = node;

    expect(sanitizeUnknown(node)).to.deep.equal({ name: "root", self: "[Circular]" });
  });

  test("drops functions and keeps errors readable", () => {
    const result = sanitizeUnknown({ callback: () => undefined, cause: new Error("boom") });

    expect(result).to.deep.equal({ cause: { name: "Error", message: "boom" } });
  });

  test("previewSecret keeps only a short prefix", () => {
    expect(previewSecret(undefined)).to.equal("<none>");
    expect(previewSecret("short")).to.equal(REDACTION_PLACEHOLDER);
    expect(previewSecret("Atza|test-bearer-value")).to.equal("Atza|t…");
  });
});
