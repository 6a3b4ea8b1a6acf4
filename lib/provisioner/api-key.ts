// lib/provisioner/api-key.ts
// One-shot credential provisioning, shaped after a deployment lifecycle hook:
// Create issues a key, Update and Delete have nothing to do.
import { randomInt } from "crypto";
import { errorMessage } from "@/lib/errors";
import { keyFingerprint } from "@/lib/gateway/api-keys";
import type { Logger } from "@/lib/logging/logger";

export const KEY_ALPHABET = "ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz0123456789";
export const MIN_KEY_LENGTH = 20;

export type ProvisionRequestType = "Create" | "Update" | "Delete";

export type ProvisionEvent = {
  RequestType: ProvisionRequestType;
  PhysicalResourceId?: string;
  KeyLength?: number;
};

export type ProvisionResponse = {
  Status: "SUCCESS" | "FAILED";
  PhysicalResourceId: string;
  Data: { ApiKey?: string; KeyId?: string };
  Reason?: string;
};

/** `randomInt` draws from the OS CSPRNG without modulo bias. */
export function generateApiKey(length = 32, pick: (max: number) => number = randomInt): string {
  if (!Number.isInteger(length) || length < MIN_KEY_LENGTH) {
    throw new Error(`API key length must be an integer of at least ${MIN_KEY_LENGTH}`);
  }
  let key = "";
  for (let i = 0; i < length; i++) key += KEY_ALPHABET[pick(KEY_ALPHABET.length)];
  return key;
}

export async function handleProvisionEvent(
  event: ProvisionEvent,
  deps: { logger: Logger; generate?: (length: number) => string }
): Promise<ProvisionResponse> {
  const physicalId = event.PhysicalResourceId ?? "rag-api-key";
  try {
    if (event.RequestType === "Create") {
      const apiKey = (deps.generate ?? generateApiKey)(event.KeyLength ?? 32);
      const keyId = await keyFingerprint(apiKey);
      deps.logger.info("apikey.created", { keyId, length: apiKey.length });
      return { Status: "SUCCESS", PhysicalResourceId: physicalId, Data: { ApiKey: apiKey, KeyId: keyId } };
    }
    deps.logger.info("apikey.noop", { requestType: event.RequestType });
    return { Status: "SUCCESS", PhysicalResourceId: physicalId, Data: {} };
  } catch (err) {
    deps.logger.error("apikey.failed", { requestType: event.RequestType, error: errorMessage(err) });
    return { Status: "FAILED", PhysicalResourceId: physicalId, Data: {}, Reason: errorMessage(err) };
  }
}
