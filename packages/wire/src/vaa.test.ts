import { test } from "node:test";
import assert from "node:assert/strict";
import { isBridgeError } from "@idbridge/shared";
import { encodeVaa, parseVaa } from "./vaa.js";

const frame = {
  guardianSetIndex: 4,
  signatures: [{ guardianIndex: 0, signature: new Uint8Array(65).fill(0x5a) }],
  timestamp: 1_700_000_000,
  nonce: 7,
  emitterChain: 2,
  emitterAddress: new Uint8Array(32).fill(0xee),
  sequence: 12n,
  consistencyLevel: 1,
  payload: new Uint8Array([1, 2, 3])
};

test("vaa: big-endian header then payload", () => {
  const bytes = encodeVaa(frame);
  assert.equal(bytes.length, 1 + 4 + 1 + 66 + 51 + 3);
  assert.deepEqual(Array.from(bytes.subarray(80, 82)), [0, 2]);
  assert.deepEqual(parseVaa(bytes), { version: 1, ...frame });
});

test("vaa: empty payload is allowed", () => {
  const parsed = parseVaa(encodeVaa({ ...frame, signatures: [], payload: new Uint8Array() }));
  assert.equal(parsed.signatures.length, 0);
  assert.equal(parsed.payload.length, 0);
});

test("vaa: truncated frames and unknown versions are not attested", () => {
  const bytes = encodeVaa(frame);
  const isInvalid = (error: unknown) => isBridgeError(error, "attestation_invalid");
  assert.throws(() => parseVaa(bytes.subarray(0, 100)), isInvalid);
  const wrongVersion = new Uint8Array(bytes);
  wrongVersion[0] = 2;
  assert.throws(() => parseVaa(wrongVersion), isInvalid);
});
