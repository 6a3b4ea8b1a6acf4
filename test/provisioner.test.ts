import { describe, it, expect } from "vitest";
import { keyFingerprint } from "@/lib/gateway/api-keys";
import { KEY_ALPHABET, generateApiKey, handleProvisionEvent } from "@/lib/provisioner/api-key";
import { captureLogger } from "./fakes";

describe("generateApiKey", () => {
  it("draws every character from the key alphabet", () => {
    const key = generateApiKey();
    expect(key).toHaveLength(32);
    expect([...key].every((c) => KEY_ALPHABET.includes(c))).toBe(true);
  });

  it("uses the supplied picker", () => {
    let i = 0;
    expect(generateApiKey(20, () => i++)).toBe("ABCDEFGHIJKLMNOPQRST");
  });

  it("refuses short or fractional lengths", () => {
    expect(() => generateApiKey(19)).toThrow("API key length must be an integer of at least 20");
    expect(() => generateApiKey(24.5)).toThrow("API key length must be an integer of at least 20");
  });
});

describe("handleProvisionEvent", () => {
  it("issues a key on Create and logs only its fingerprint", async () => {
    const { logger, lines } = captureLogger();
    const res = await handleProvisionEvent(
      { RequestType: "Create", KeyLength: 24 },
      { logger, generate: (n) => "k".repeat(n) }
    );
    const keyId = await keyFingerprint("k".repeat(24));

    expect(res).toEqual({
      Status: "SUCCESS",
      PhysicalResourceId: "rag-api-key",
      Data: { ApiKey: "k".repeat(24), KeyId: keyId },
    });
    expect(lines).toHaveLength(1);
    expect(lines[0].record).toMatchObject({ event: "apikey.created", keyId, length: 24 });
    expect(JSON.stringify(lines[0].record)).not.toContain("k".repeat(24));
  });

  it("does nothing on Update and Delete", async () => {
    const { logger } = captureLogger();
    expect(await handleProvisionEvent({ RequestType: "Update", PhysicalResourceId: "keys-1" }, { logger })).toEqual({
      Status: "SUCCESS",
      PhysicalResourceId: "keys-1",
      Data: {},
    });
    expect(await handleProvisionEvent({ RequestType: "Delete" }, { logger })).toEqual({
      Status: "SUCCESS",
      PhysicalResourceId: "rag-api-key",
      Data: {},
    });
  });

  it("reports failures instead of throwing", async () => {
    const { logger, lines } = captureLogger();
    const res = await handleProvisionEvent({ RequestType: "Create", KeyLength: 8 }, { logger });

    expect(res).toEqual({
      Status: "FAILED",
      PhysicalResourceId: "rag-api-key",
      Data: {},
      Reason: "API key length must be an integer of at least 20",
    });
    expect(lines[0].record).toMatchObject({ level: "error", event: "apikey.failed" });
  });
});
