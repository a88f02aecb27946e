import { test } from "node:test";
import assert from "node:assert/strict";
import { isBridgeError } from "@idbridge/shared";
import { encodeVaa } from "@idbridge/wire";
import { createVaaAttestationVerifier } from "./attestation.js";

const EMITTER = new Uint8Array(32).fill(0xee);

const frame = (emitterAddress = EMITTER) =>
  encodeVaa({
    guardianSetIndex: 0,
    signatures: [],
    timestamp: 1_700_000_000,
    nonce: 1,
    emitterChain: 2,
    emitterAddress,
    sequence: 5n,
    consistencyLevel: 1,
    payload: new Uint8Array([9, 9])
  });

test("attestation: reports the emitter chain and payload", async () => {
  const verifier = createVaaAttestationVerifier();
  const attested = await verifier.verify(frame());
  assert.deepEqual(attested, {
    originChainId: 2,
    payload: new Uint8Array([9, 9]),
    emitterAddress: EMITTER,
    sequence: 5n
  });
});

test("attestation: trusted emitter is enforced when configured", async () => {
  const verifier = createVaaAttestationVerifier({ trustedEmitter: EMITTER });
  assert.equal((await verifier.verify(frame())).originChainId, 2);
  await assert.rejects(verifier.verify(frame(new Uint8Array(32).fill(0x01))), (error) =>
    isBridgeError(error, "attestation_untrusted_emitter")
  );
});

test("attestation: garbage is not an attested frame", async () => {
  const verifier = createVaaAttestationVerifier();
  await assert.rejects(verifier.verify(new Uint8Array([1, 0, 0])), (error) =>
    isBridgeError(error, "attestation_invalid")
  );
});
