import {
  BridgeError,
  bytesEqual,
  decodeIdentityKey,
  encodeIdentityKey,
  sha256,
  type IdentityKey
} from "@idbridge/shared";
import { ByteReader, ByteWriter } from "./bytes.js";
import { HASH_BYTES } from "./payloads.js";

export const DISCRIMINATOR_BYTES = 8;

export type AccountKind = "ProgramState" | "Credential";

export type ProgramStateAccount = {
  authority: IdentityKey;
  verificationCount: bigint;
  credentialCount: bigint;
};

export type CredentialAccount = {
  hash: Uint8Array;
  isValid: boolean;
  owner: IdentityKey;
  /** Unix seconds; 0 while the credential is valid. */
  revocationDate: bigint;
};

export const accountDiscriminator = (kind: AccountKind) =>
  sha256(`account:${kind}`).subarray(0, DISCRIMINATOR_BYTES);

export const ACCOUNT_SIZE: Record<AccountKind, number> = {
  ProgramState: DISCRIMINATOR_BYTES + 32 + 8 + 8,
  Credential: DISCRIMINATOR_BYTES + HASH_BYTES + 1 + 32 + 8
};

const openAccount = (kind: AccountKind, data: Uint8Array) => {
  if (data.length !== ACCOUNT_SIZE[kind]) {
    throw new BridgeError("account_data_invalid", `${kind}: size ${data.length}`);
  }
  const reader = new ByteReader(data);
  const discriminator = reader.bytes(DISCRIMINATOR_BYTES, "discriminator");
  if (!bytesEqual(discriminator, accountDiscriminator(kind))) {
    throw new BridgeError("account_data_invalid", `${kind}: discriminator mismatch`);
  }
  return reader;
};

export const encodeProgramStateAccount = (account: ProgramStateAccount) =>
  new ByteWriter()
    .raw(accountDiscriminator("ProgramState"))
    .fixed(decodeIdentityKey(account.authority), 32, "authority")
    .u64le(account.verificationCount)
    .u64le(account.credentialCount)
    .toBytes();

export const decodeProgramStateAccount = (data: Uint8Array): ProgramStateAccount => {
  const reader = openAccount("ProgramState", data);
  return {
    authority: encodeIdentityKey(reader.bytes(32, "authority")),
    verificationCount: reader.u64le("verification_count"),
    credentialCount: reader.u64le("credential_count")
  };
};

export const encodeCredentialAccount = (account: CredentialAccount) =>
  new ByteWriter()
    .raw(accountDiscriminator("Credential"))
    .fixed(account.hash, HASH_BYTES, "hash")
    .bool(account.isValid)
    .fixed(decodeIdentityKey(account.owner), 32, "owner")
    .u64le(account.revocationDate)
    .toBytes();

export const decodeCredentialAccount = (data: Uint8Array): CredentialAccount => {
  const reader = openAccount("Credential", data);
  const hash = reader.bytes(HASH_BYTES, "hash");
  const validByte = reader.u8("is_valid");
  if (validByte > 1) {
    throw new BridgeError("account_data_invalid", `Credential: is_valid ${validByte}`);
  }
  return {
    hash,
    isValid: validByte === 1,
    owner: encodeIdentityKey(reader.bytes(32, "owner")),
    revocationDate: reader.u64le("revocation_date")
  };
};
