import { BridgeError } from "@idbridge/shared";

const decoder = new TextDecoder("utf-8", { fatal: true, ignoreBOM: true });
const encoder = new TextEncoder();

export const decodeUtf8 = (bytes: Uint8Array, field: string) => {
  try {
    return decoder.decode(bytes);
  } catch {
    throw new BridgeError("encoding_error", `${field}: not valid UTF-8`);
  }
};

export const encodeUtf8 = (value: string) => encoder.encode(value);
