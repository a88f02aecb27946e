export { createVaaAttestationVerifier } from "./attestation.js";
export type { VaaAttestationOptions } from "./attestation.js";
export type {
  AttestationVerifier,
  AttestedMessage,
  MintAuthority,
  MintRequest,
  OutboundReply,
  ReplyTransport
} from "./collaborators.js";
export { MessageDispatcher, resolveRequestType } from "./dispatcher.js";
export type {
  DispatchContext,
  DispatchOutcome,
  DispatchReply,
  DispatchStage,
  MessageDispatcherOptions
} from "./dispatcher.js";
export { BridgeProgram } from "./program.js";
export type { BridgeProgramOptions } from "./program.js";
export { ReplyBuilder, replyMessageId } from "./replyBuilder.js";
