import { randomBytes } from "node:crypto";
import { base58btc } from "multiformats/bases/base58";
import { BridgeError } from "./errors.js";

export const KEY_BYTES = 32;

/** A 32-byte account key written in base58 (no multibase prefix). */
export type IdentityKey = string & {};

export const encodeIdentityKey = (bytes: Uint8Array): IdentityKey => {
  if (bytes.length !== KEY_BYTES) {
    throw new BridgeError("invalid_identity_key", `expected ${KEY_BYTES} bytes`);
  }
  return base58btc.baseEncode(bytes);
};

export const decodeIdentityKey = (value: string): Uint8Array => {
  let bytes: Uint8Array;
  try {
    bytes = base58btc.baseDecode(value);
  } catch {
    throw new BridgeError("invalid_identity_key", "not base58");
  }
  if (bytes.length !== KEY_BYTES) {
    throw new BridgeError("invalid_identity_key", `expected ${KEY_BYTES} bytes`);
  }
  return bytes;
};

export const isIdentityKey = (value: string) => {
  try {
    decodeIdentityKey(value);
    return true;
  } catch {
    return false;
  }
};

export const randomIdentityKey = (): IdentityKey => encodeIdentityKey(randomBytes(KEY_BYTES));
