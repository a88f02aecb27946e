import { test } from "node:test";
import assert from "node:assert/strict";
import { decodeIdentityKey, encodeIdentityKey, isIdentityKey, randomIdentityKey } from "./keys.js";
import { isBridgeError } from "./errors.js";

test("identity keys: all-zero key encodes to 32 base58 ones", () => {
  assert.equal(encodeIdentityKey(new Uint8Array(32)), "1".repeat(32));
  assert.deepEqual(decodeIdentityKey("1".repeat(32)), new Uint8Array(32));
});

test("identity keys: random keys decode back to the same bytes", () => {
  const key = randomIdentityKey();
  assert.equal(encodeIdentityKey(decodeIdentityKey(key)), key);
  assert.equal(isIdentityKey(key), true);
});

test("identity keys: wrong length and bad alphabet are rejected", () => {
  assert.throws(() => encodeIdentityKey(new Uint8Array(31)), (error) =>
    isBridgeError(error, "invalid_identity_key")
  );
  assert.throws(() => decodeIdentityKey("1111"), (error) =>
    isBridgeError(error, "invalid_identity_key")
  );
  assert.equal(isIdentityKey("0OIl"), false);
});
