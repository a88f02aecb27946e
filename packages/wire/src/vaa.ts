import { BridgeError } from "@idbridge/shared";
import { ByteReader, ByteWriter } from "./bytes.js";

export const VAA_VERSION = 1;
export const GUARDIAN_SIGNATURE_BYTES = 65;

export type GuardianSignature = {
  guardianIndex: number;
  signature: Uint8Array;
};

/**
 * Attested cross-chain message frame (big-endian). Signatures are carried,
 * not checked: the guardian quorum is verified before the frame reaches us.
 */
export type VaaFrame = {
  version: number;
  guardianSetIndex: number;
  signatures: GuardianSignature[];
  timestamp: number;
  nonce: number;
  emitterChain: number;
  emitterAddress: Uint8Array;
  sequence: bigint;
  consistencyLevel: number;
  payload: Uint8Array;
};

export const parseVaa = (bytes: Uint8Array): VaaFrame => {
  const reader = new ByteReader(bytes);
  try {
    const version = reader.u8("version");
    if (version !== VAA_VERSION) {
      throw new BridgeError("attestation_invalid", `unsupported version ${version}`);
    }
    const guardianSetIndex = reader.u32be("guardian_set_index");
    const signatureCount = reader.u8("signature_count");
    const signatures: GuardianSignature[] = [];
    for (let i = 0; i < signatureCount; i += 1) {
      signatures.push({
        guardianIndex: reader.u8("guardian_index"),
        signature: reader.bytes(GUARDIAN_SIGNATURE_BYTES, "signature")
      });
    }
    return {
      version,
      guardianSetIndex,
      signatures,
      timestamp: reader.u32be("timestamp"),
      nonce: reader.u32be("nonce"),
      emitterChain: reader.u16be("emitter_chain"),
      emitterAddress: reader.bytes(32, "emitter_address"),
      sequence: reader.u64be("sequence"),
      consistencyLevel: reader.u8("consistency_level"),
      payload: reader.rest()
    };
  } catch (error) {
    if (error instanceof BridgeError && error.code === "malformed_payload") {
      throw new BridgeError("attestation_invalid", error.details);
    }
    throw error;
  }
};

export const encodeVaa = (frame: Omit<VaaFrame, "version">) => {
  const writer = new ByteWriter()
    .u8(VAA_VERSION)
    .u32be(frame.guardianSetIndex)
    .u8(frame.signatures.length);
  for (const entry of frame.signatures) {
    writer.u8(entry.guardianIndex).fixed(entry.signature, GUARDIAN_SIGNATURE_BYTES, "signature");
  }
  return writer
    .u32be(frame.timestamp)
    .u32be(frame.nonce)
    .u16be(frame.emitterChain)
    .fixed(frame.emitterAddress, 32, "emitter_address")
    .u64be(frame.sequence)
    .u8(frame.consistencyLevel)
    .raw(frame.payload)
    .toBytes();
};
