import crypto from "crypto";
import { anonymousVoterKey, userVoterKey } from "../voterKey";

describe("voter keys", () => {
  it("prefixes user ids", () => {
    expect(userVoterKey("64b000000000000000000001")).toBe("user:64b000000000000000000001");
  });

  it("hashes the client address with the secret", () => {
    const expected = crypto.createHash("sha256").update("test-secret:203.0.113.7").digest("hex");

    expect(anonymousVoterKey("203.0.113.7", "test-secret")).toBe(`device:${expected}`);
  });

  it("never contains the raw address", () => {
    const key = anonymousVoterKey("203.0.113.7", "test-secret");

    expect(key).toMatch(/^device:[0-9a-f]{64}$/);
  });

  it("separates addresses and secrets", () => {
    const base = anonymousVoterKey("203.0.113.7", "test-secret");

    expect(anonymousVoterKey("203.0.113.8", "test-secret")).not.toBe(base);
    expect(anonymousVoterKey("203.0.113.7", "other-secret")).not.toBe(base);
    expect(anonymousVoterKey("203.0.113.7", "test-secret")).toBe(base);
  });
});
