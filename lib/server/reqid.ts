// lib/server/reqid.ts
// Collision-resistant request id (URL-safe, 16 chars by default)
import { randomBytes } from "crypto";

const ALPHABET = "0123456789ABCDEFGHIJKLMNOPQRSTUVWXYZ_abcdefghijklmnopqrstuvwxyz-";

export function genRequestId(size = 16): string {
  const bytes = randomBytes(size);
  let id = "";
  // 64 symbols: masking the low six bits keeps the distribution uniform
  for (let i = 0; i < size; i++) id += ALPHABET[bytes[i] & 63];
  return id;
}
