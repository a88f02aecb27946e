import { ByteReader, ByteWriter } from "./bytes.js";

export const HASH_BYTES = 32;
export const MAX_DID_BYTES = 128;
export const MAX_ASSET_NAME_BYTES = 32;
export const MAX_ASSET_SYMBOL_BYTES = 10;

/** Shared by `verification` and `did_resolution`. */
export type DidRequest = {
  requestId: bigint;
  did: Uint8Array;
};

export type AssetCreationRequest = {
  issuer: Uint8Array;
  name: Uint8Array;
  symbol: Uint8Array;
};

export type TokenTransferRequest = {
  transferId: bigint;
  tokenAddress: Uint8Array;
  amount: bigint;
};

export type CredentialVerificationRequest = {
  requestId: bigint;
  credentialHash: Uint8Array;
};

export type RoleSyncRequest = {
  requestId: bigint;
  role: Uint8Array;
  account: Uint8Array;
  isGrant: boolean;
};

// Request decoders read a fixed prefix and ignore trailing bytes.

export const encodeDidRequest = (request: DidRequest) =>
  new ByteWriter()
    .u64le(request.requestId)
    .lengthPrefixed(request.did, "did", MAX_DID_BYTES)
    .toBytes();

export const decodeDidRequest = (bytes: Uint8Array): DidRequest => {
  const reader = new ByteReader(bytes);
  const requestId = reader.u64le("request_id");
  const did = reader.lengthPrefixed("did", MAX_DID_BYTES);
  return { requestId, did };
};

export const encodeAssetCreation = (request: AssetCreationRequest) =>
  new ByteWriter()
    .fixed(request.issuer, HASH_BYTES, "issuer")
    .lengthPrefixed(request.name, "name", MAX_ASSET_NAME_BYTES)
    .lengthPrefixed(request.symbol, "symbol", MAX_ASSET_SYMBOL_BYTES)
    .toBytes();

export const decodeAssetCreation = (bytes: Uint8Array): AssetCreationRequest => {
  const reader = new ByteReader(bytes);
  const issuer = reader.bytes(HASH_BYTES, "issuer");
  const name = reader.lengthPrefixed("name", MAX_ASSET_NAME_BYTES);
  const symbol = reader.lengthPrefixed("symbol", MAX_ASSET_SYMBOL_BYTES);
  return { issuer, name, symbol };
};

export const TOKEN_TRANSFER_BYTES = 8 + HASH_BYTES + 8;

export const encodeTokenTransfer = (request: TokenTransferRequest) =>
  new ByteWriter()
    .u64le(request.transferId)
    .fixed(request.tokenAddress, HASH_BYTES, "token_address")
    .u64le(request.amount)
    .toBytes();

export const decodeTokenTransfer = (bytes: Uint8Array): TokenTransferRequest => {
  const reader = new ByteReader(bytes);
  const transferId = reader.u64le("transfer_id");
  const tokenAddress = reader.bytes(HASH_BYTES, "token_address");
  const amount = reader.u64le("amount");
  return { transferId, tokenAddress, amount };
};

export const encodeCredentialVerification = (request: CredentialVerificationRequest) =>
  new ByteWriter()
    .u64le(request.requestId)
    .fixed(request.credentialHash, HASH_BYTES, "credential_hash")
    .toBytes();

export const decodeCredentialVerification = (bytes: Uint8Array): CredentialVerificationRequest => {
  const reader = new ByteReader(bytes);
  const requestId = reader.u64le("request_id");
  const credentialHash = reader.bytes(HASH_BYTES, "credential_hash");
  return { requestId, credentialHash };
};

export const encodeRoleSync = (request: RoleSyncRequest) =>
  new ByteWriter()
    .u64le(request.requestId)
    .fixed(request.role, HASH_BYTES, "role")
    .fixed(request.account, HASH_BYTES, "account")
    .bool(request.isGrant)
    .toBytes();

export const decodeRoleSync = (bytes: Uint8Array): RoleSyncRequest => {
  const reader = new ByteReader(bytes);
  const requestId = reader.u64le("request_id");
  const role = reader.bytes(HASH_BYTES, "role");
  const account = reader.bytes(HASH_BYTES, "account");
  // Any non-zero byte is a grant.
  const isGrant = reader.u8("is_grant") !== 0;
  return { requestId, role, account, isGrant };
};
