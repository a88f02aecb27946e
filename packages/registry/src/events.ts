import type { IdentityKey } from "@idbridge/shared";

export type VerificationEvent = {
  type: "verification";
  requestId: bigint;
  did: string;
  verified: boolean;
};

export type AssetCreationEvent = {
  type: "asset_creation";
  issuer: IdentityKey;
  name: string;
  symbol: string;
};

export type CredentialVerificationEvent = {
  type: "credential_verification";
  requestId: bigint;
  credentialHash: string;
  verified: boolean;
};

export type RoleSyncEvent = {
  type: "role_sync";
  requestId: bigint;
  role: string;
  account: string;
  isGrant: boolean;
};

export type DidResolutionEvent = {
  type: "did_resolution";
  requestId: bigint;
  did: string;
  resolved: boolean;
};

export type CredentialStoredEvent = {
  type: "credential_stored";
  handle: string;
  hash: string;
  owner: IdentityKey;
};

export type CredentialRevokedEvent = {
  type: "credential_revoked";
  handle: string;
  hash: string;
  revocationDate: bigint;
};

/** Byte fields (hashes, roles, accounts) are lowercase hex. */
export type BridgeEvent =
  | VerificationEvent
  | AssetCreationEvent
  | CredentialVerificationEvent
  | RoleSyncEvent
  | DidResolutionEvent
  | CredentialStoredEvent
  | CredentialRevokedEvent;

export interface EventSink {
  emit(event: BridgeEvent): void;
}

/** Holds a call's events until its transaction commits. */
export class EventBuffer {
  private readonly pending: BridgeEvent[] = [];

  push(event: BridgeEvent) {
    this.pending.push(event);
  }

  flush(sink: EventSink) {
    const events = this.pending.splice(0);
    for (const event of events) {
      sink.emit(event);
    }
    return events;
  }
}

export const createMemoryEventSink = () => {
  const events: BridgeEvent[] = [];
  return {
    events,
    emit: (event: BridgeEvent) => {
      events.push(event);
    }
  };
};
