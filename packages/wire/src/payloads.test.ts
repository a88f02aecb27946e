import { test } from "node:test";
import assert from "node:assert/strict";
import { isBridgeError } from "@idbridge/shared";
import { ByteWriter } from "./bytes.js";
import {
  decodeAssetCreation,
  decodeCredentialVerification,
  decodeDidRequest,
  decodeRoleSync,
  decodeTokenTransfer,
  encodeAssetCreation,
  encodeCredentialVerification,
  encodeDidRequest,
  encodeRoleSync,
  encodeTokenTransfer
} from "./payloads.js";
import { decodeUtf8, encodeUtf8 } from "./text.js";

const filled = (value: number, length = 32) => new Uint8Array(length).fill(value);
const isMalformed = (error: unknown) => isBridgeError(error, "malformed_payload");
const isTooLong = (error: unknown) => isBridgeError(error, "field_too_long");

test("did request: round trip at the 128-byte bound", () => {
  const request = { requestId: 18_446_744_073_709_551_615n, did: filled(0x61, 128) };
  assert.deepEqual(decodeDidRequest(encodeDidRequest(request)), request);
  const short = { requestId: 1n, did: encodeUtf8("did:example:alice") };
  const bytes = encodeDidRequest(short);
  assert.equal(bytes.length, 12 + 17);
  assert.equal(decodeUtf8(decodeDidRequest(bytes).did, "did"), "did:example:alice");
});

test("did request: declared length 129 fails before any slice", () => {
  const bytes = new ByteWriter().u64le(1n).u32le(129).raw(filled(0x61, 5)).toBytes();
  assert.throws(() => decodeDidRequest(bytes), isTooLong);
  assert.throws(() => encodeDidRequest({ requestId: 1n, did: filled(0x61, 129) }), isTooLong);
});

test("did request: short buffers are malformed", () => {
  assert.throws(() => decodeDidRequest(new Uint8Array(11)), isMalformed);
  const bytes = new ByteWriter().u64le(1n).u32le(10).raw(filled(0x61, 9)).toBytes();
  assert.throws(() => decodeDidRequest(bytes), isMalformed);
});

test("asset creation: round trip and per-field bounds", () => {
  const request = { issuer: filled(7), name: filled(0x41, 32), symbol: filled(0x42, 10) };
  assert.deepEqual(decodeAssetCreation(encodeAssetCreation(request)), request);

  const longName = new ByteWriter().raw(filled(7)).u32le(33).toBytes();
  assert.throws(() => decodeAssetCreation(longName), isTooLong);

  const longSymbol = new ByteWriter()
    .raw(filled(7))
    .u32le(4)
    .raw(encodeUtf8("Gold"))
    .u32le(11)
    .toBytes();
  assert.throws(() => decodeAssetCreation(longSymbol), isTooLong);

  const missingSymbol = new ByteWriter().raw(filled(7)).u32le(4).raw(encodeUtf8("Gold")).toBytes();
  assert.throws(() => decodeAssetCreation(missingSymbol), isMalformed);
});

test("token transfer: 48-byte layout", () => {
  const request = { transferId: 1n, tokenAddress: filled(0x11), amount: 1000n };
  const bytes = encodeTokenTransfer(request);
  assert.equal(bytes.length, 48);
  assert.deepEqual(Array.from(bytes.subarray(40)), [0xe8, 0x03, 0, 0, 0, 0, 0, 0]);
  assert.deepEqual(decodeTokenTransfer(bytes), request);
  assert.throws(() => decodeTokenTransfer(bytes.subarray(0, 47)), isMalformed);
});

test("credential verification: round trip and 40-byte minimum", () => {
  const request = { requestId: 99n, credentialHash: filled(0x33) };
  const bytes = encodeCredentialVerification(request);
  assert.equal(bytes.length, 40);
  assert.deepEqual(decodeCredentialVerification(bytes), request);
  assert.throws(() => decodeCredentialVerification(bytes.subarray(0, 39)), isMalformed);
});

test("role sync: round trip, non-zero grant byte and 73-byte minimum", () => {
  const request = { requestId: 5n, role: filled(1), account: filled(2), isGrant: true };
  const bytes = encodeRoleSync(request);
  assert.equal(bytes.length, 73);
  assert.deepEqual(decodeRoleSync(bytes), request);
  assert.deepEqual(decodeRoleSync(encodeRoleSync({ ...request, isGrant: false })), {
    ...request,
    isGrant: false
  });
  const loose = new Uint8Array(bytes);
  loose[72] = 2;
  assert.equal(decodeRoleSync(loose).isGrant, true);
  assert.throws(() => decodeRoleSync(bytes.subarray(0, 72)), isMalformed);
});

test("text fields: invalid UTF-8 is an encoding error", () => {
  assert.throws(() => decodeUtf8(new Uint8Array([0xc3, 0x28]), "did"), (error) =>
    isBridgeError(error, "encoding_error")
  );
  assert.equal(decodeUtf8(encodeUtf8("Goldé"), "name"), "Goldé");
});

test("text fields: a leading byte-order mark is kept", () => {
  const bytes = new Uint8Array([0xef, 0xbb, 0xbf, 0x64, 0x69, 0x64]);
  const text = decodeUtf8(bytes, "did");
  assert.equal(text, "\ufeffdid");
  assert.deepEqual(encodeUtf8(text), bytes);
});

test("encoders reject values outside their field widths", () => {
  assert.throws(() => encodeTokenTransfer({ transferId: -1n, tokenAddress: filled(0), amount: 0n }), isMalformed);
  assert.throws(() => encodeTokenTransfer({ transferId: 1n, tokenAddress: filled(0), amount: 1n << 64n }), isMalformed);
  assert.throws(() => encodeCredentialVerification({ requestId: 1n, credentialHash: filled(0, 31) }), isMalformed);
});
