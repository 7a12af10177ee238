import { describe, expect, it } from "vitest";
import { belongsToUser, createNonce, decodeReference, encodeReference } from "./reference";

describe("external references", () => {
  it("encodes the user id as hex between prefix and nonce", () => {
    expect(encodeReference("tee", "u1", "0a1b2c3d")).toBe("tee-7531-0a1b2c3d");
  });

  it("decodes back to the user id, including non-ascii ids", () => {
    const reference = encodeReference("tee", "zoë-42", "deadbeef");
    expect(decodeReference(reference, "tee")).toEqual({ prefix: "tee", userId: "zoë-42", nonce: "deadbeef" });
  });

  it("rejects other prefixes and foreign strings", () => {
    expect(decodeReference("tee-7531-0a1b2c3d", "mug")).toBeNull();
    expect(decodeReference("order #42")).toBeNull();
    expect(decodeReference("")).toBeNull();
  });

  it("does not confuse users whose ids share a prefix", () => {
    const reference = encodeReference("tee", "u12", "00000000");
    expect(belongsToUser(reference, "tee", "u12")).toBe(true);
    expect(belongsToUser(reference, "tee", "u1")).toBe(false);
  });

  it("creates eight-character hex nonces", () => {
    expect(createNonce()).toMatch(/^[0-9a-f]{8}$/);
  });
});
