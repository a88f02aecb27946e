import { ByteReader, ByteWriter } from "./bytes.js";

export type VerificationResponse = { requestId: bigint; verified: boolean };
export type TokenTransferResponse = { transferId: bigint; success: boolean };
export type CredentialVerificationResponse = { requestId: bigint; verified: boolean };
export type RoleSyncResponse = { requestId: bigint; success: boolean };
export type DidResolutionResponse = {
  requestId: bigint;
  resolved: boolean;
  didDocument: Uint8Array;
};

const encodeFlag = (id: bigint, flag: boolean) => new ByteWriter().u64le(id).bool(flag).toBytes();

const decodeFlag = (bytes: Uint8Array, idField: string, flagField: string) => {
  const reader = new ByteReader(bytes);
  const id = reader.u64le(idField);
  const flag = reader.bool(flagField);
  reader.expectEnd(flagField);
  return { id, flag };
};

export const encodeVerificationResponse = (response: VerificationResponse) =>
  encodeFlag(response.requestId, response.verified);

export const decodeVerificationResponse = (bytes: Uint8Array): VerificationResponse => {
  const { id, flag } = decodeFlag(bytes, "request_id", "verified");
  return { requestId: id, verified: flag };
};

export const encodeTokenTransferResponse = (response: TokenTransferResponse) =>
  encodeFlag(response.transferId, response.success);

export const decodeTokenTransferResponse = (bytes: Uint8Array): TokenTransferResponse => {
  const { id, flag } = decodeFlag(bytes, "transfer_id", "success");
  return { transferId: id, success: flag };
};

export const encodeCredentialVerificationResponse = (response: CredentialVerificationResponse) =>
  encodeFlag(response.requestId, response.verified);

export const decodeCredentialVerificationResponse = (
  bytes: Uint8Array
): CredentialVerificationResponse => {
  const { id, flag } = decodeFlag(bytes, "request_id", "verified");
  return { requestId: id, verified: flag };
};

export const encodeRoleSyncResponse = (response: RoleSyncResponse) =>
  encodeFlag(response.requestId, response.success);

export const decodeRoleSyncResponse = (bytes: Uint8Array): RoleSyncResponse => {
  const { id, flag } = decodeFlag(bytes, "request_id", "success");
  return { requestId: id, success: flag };
};

export const encodeDidResolutionResponse = (response: DidResolutionResponse) =>
  new ByteWriter()
    .u64le(response.requestId)
    .bool(response.resolved)
    .lengthPrefixed(response.didDocument, "did_document")
    .toBytes();

export const decodeDidResolutionResponse = (bytes: Uint8Array): DidResolutionResponse => {
  const reader = new ByteReader(bytes);
  const requestId = reader.u64le("request_id");
  const resolved = reader.bool("resolved");
  const didDocument = reader.lengthPrefixed("did_document");
  reader.expectEnd("did_resolution_response");
  return { requestId, resolved, didDocument };
};
