import { createHash } from "node:crypto";

export const sha256 = (data: Uint8Array | string): Uint8Array =>
  new Uint8Array(createHash("sha256").update(data).digest());

export const toHex = (bytes: Uint8Array) => Buffer.from(bytes).toString("hex");

export const bytesEqual = (a: Uint8Array, b: Uint8Array) =>
  a.length === b.length && a.every((value, index) => value === b[index]);
