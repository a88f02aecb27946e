import { BridgeError, bytesEqual } from "@idbridge/shared";
import { parseVaa } from "@idbridge/wire";
import type { AttestationVerifier } from "./collaborators.js";

export type VaaAttestationOptions = {
  /** When set, frames from any other emitter are refused. */
  trustedEmitter?: Uint8Array;
};

/**
 * Reads the attested frame posted by the relayer. Guardian signatures were
 * checked by the relayer before posting; only the frame structure and the
 * emitter are checked here.
 */
export const createVaaAttestationVerifier = (
  options: VaaAttestationOptions = {}
): AttestationVerifier => ({
  async verify(raw) {
    const frame = parseVaa(raw);
    if (options.trustedEmitter && !bytesEqual(frame.emitterAddress, options.trustedEmitter)) {
      throw new BridgeError("attestation_untrusted_emitter", `chain ${frame.emitterChain}`);
    }
    return {
      originChainId: frame.emitterChain,
      payload: frame.payload,
      emitterAddress: frame.emitterAddress,
      sequence: frame.sequence
    };
  }
});
