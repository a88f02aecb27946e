export { ByteReader, ByteWriter, U64_MAX, assertU64, u64le } from "./bytes.js";
export {
  MESSAGE_TYPES,
  isRequestMessageType,
  messageTypeFromTag,
  messageTypeTag
} from "./messageType.js";
export type { MessageType, RequestMessageType, ResponseMessageType } from "./messageType.js";
export { decodeUtf8, encodeUtf8 } from "./text.js";
export {
  MESSAGE_ID_BYTES,
  decodeEnvelope,
  decodeMessagePayload,
  encodeEnvelope
} from "./envelope.js";
export type { DecodedEnvelope, MessagePayload } from "./envelope.js";
export {
  HASH_BYTES,
  MAX_ASSET_NAME_BYTES,
  MAX_ASSET_SYMBOL_BYTES,
  MAX_DID_BYTES,
  TOKEN_TRANSFER_BYTES,
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
export type {
  AssetCreationRequest,
  CredentialVerificationRequest,
  DidRequest,
  RoleSyncRequest,
  TokenTransferRequest
} from "./payloads.js";
export {
  decodeCredentialVerificationResponse,
  decodeDidResolutionResponse,
  decodeRoleSyncResponse,
  decodeTokenTransferResponse,
  decodeVerificationResponse,
  encodeCredentialVerificationResponse,
  encodeDidResolutionResponse,
  encodeRoleSyncResponse,
  encodeTokenTransferResponse,
  encodeVerificationResponse
} from "./responses.js";
export type {
  CredentialVerificationResponse,
  DidResolutionResponse,
  RoleSyncResponse,
  TokenTransferResponse,
  VerificationResponse
} from "./responses.js";
export {
  ACCOUNT_SIZE,
  DISCRIMINATOR_BYTES,
  accountDiscriminator,
  decodeCredentialAccount,
  decodeProgramStateAccount,
  encodeCredentialAccount,
  encodeProgramStateAccount
} from "./accounts.js";
export type {
  AccountKind,
  CredentialAccount,
  ProgramStateAccount
} from "./accounts.js";
export { GUARDIAN_SIGNATURE_BYTES, VAA_VERSION, encodeVaa, parseVaa } from "./vaa.js";
export type { GuardianSignature, VaaFrame } from "./vaa.js";
