import {
  BridgeError,
  randomIdentityKey,
  toHex,
  type IdentityKey
} from "@idbridge/shared";
import {
  HASH_BYTES,
  decodeCredentialAccount,
  encodeCredentialAccount,
  type CredentialAccount
} from "@idbridge/wire";
import { EventBuffer, type EventSink } from "./events.js";
import { bumpCounter, type StateHandle } from "./programState.js";
import type { AccountReader, AccountStore, AccountTransaction } from "./store.js";

/** Opaque reference to a credential record (its account address). */
export type CredentialHandle = string & {};

export type CredentialRecord = CredentialAccount & { handle: CredentialHandle };

export type CredentialRegistryOptions = {
  store: AccountStore;
  events: EventSink;
  clock?: () => Date;
  newHandle?: () => CredentialHandle;
};

const unixSeconds = (date: Date) => BigInt(Math.floor(date.getTime() / 1000));

export const readCredential = async (
  reader: AccountReader,
  handle: CredentialHandle
): Promise<CredentialRecord> => {
  const data = await reader.read(handle);
  if (!data) {
    throw new BridgeError("credential_not_found", handle);
  }
  return { handle, ...decodeCredentialAccount(data) };
};

export class CredentialRegistry {
  private readonly accounts: AccountStore;
  private readonly events: EventSink;
  private readonly clock: () => Date;
  private readonly newHandle: () => CredentialHandle;

  constructor(options: CredentialRegistryOptions) {
    this.accounts = options.store;
    this.events = options.events;
    this.clock = options.clock ?? (() => new Date());
    this.newHandle = options.newHandle ?? randomIdentityKey;
  }

  /**
   * Creates a valid credential owned by `owner` and bumps the deployment's
   * credential counter. Duplicate hashes get independent records.
   */
  async store(input: {
    state: StateHandle;
    hash: Uint8Array;
    owner: IdentityKey;
  }): Promise<CredentialRecord> {
    if (input.hash.length !== HASH_BYTES) {
      throw new BridgeError("malformed_payload", `hash: expected ${HASH_BYTES} bytes`);
    }
    const buffer = new EventBuffer();
    const record = await this.accounts.transaction(async (tx) => {
      const handle = this.newHandle();
      const account: CredentialAccount = {
        hash: new Uint8Array(input.hash),
        isValid: true,
        owner: input.owner,
        revocationDate: 0n
      };
      await tx.create(handle, "Credential", encodeCredentialAccount(account));
      await bumpCounter(tx, input.state, "credentialCount");
      buffer.push({
        type: "credential_stored",
        handle,
        hash: toHex(account.hash),
        owner: account.owner
      });
      return { handle, ...account };
    });
    buffer.flush(this.events);
    return record;
  }

  /**
   * Marks a credential revoked at the current time. Only the owner may revoke.
   * Revoking again is allowed and moves the revocation date.
   */
  async revoke(input: { handle: CredentialHandle; caller: IdentityKey }): Promise<CredentialRecord> {
    const buffer = new EventBuffer();
    const record = await this.accounts.transaction((tx) => this.revokeIn(tx, input, buffer));
    buffer.flush(this.events);
    return record;
  }

  private async revokeIn(
    tx: AccountTransaction,
    input: { handle: CredentialHandle; caller: IdentityKey },
    buffer: EventBuffer
  ): Promise<CredentialRecord> {
    const current = await readCredential(tx, input.handle);
    if (current.owner !== input.caller) {
      throw new BridgeError("unauthorized", input.handle);
    }
    const revoked: CredentialRecord = {
      ...current,
      isValid: false,
      revocationDate: unixSeconds(this.clock())
    };
    await tx.write(input.handle, encodeCredentialAccount(revoked));
    buffer.push({
      type: "credential_revoked",
      handle: input.handle,
      hash: toHex(revoked.hash),
      revocationDate: revoked.revocationDate
    });
    return revoked;
  }

  /**
   * Always reports the credential as verified. The records' validity and
   * revocation date are not consulted yet.
   */
  verify(_hash: Uint8Array): boolean {
    return true;
  }

  get(handle: CredentialHandle): Promise<CredentialRecord> {
    return readCredential(this.accounts, handle);
  }
}
