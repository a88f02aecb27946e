import { silentLogger, type IdentityKey, type Logger } from "@idbridge/shared";
import type { ProgramStateAccount } from "@idbridge/wire";
import {
  CredentialRegistry,
  initializeProgramState,
  loadProgramState,
  type AccountStore,
  type CredentialHandle,
  type CredentialRecord,
  type EventSink,
  type StateHandle
} from "@idbridge/registry";
import type { AttestationVerifier, MintAuthority, ReplyTransport } from "./collaborators.js";
import { MessageDispatcher, type DispatchOutcome } from "./dispatcher.js";

export type BridgeProgramOptions = {
  store: AccountStore;
  attestation: AttestationVerifier;
  mint: MintAuthority;
  transport: ReplyTransport;
  events: EventSink;
  expectedOriginChainId: number;
  clock?: () => Date;
  newHandle?: () => CredentialHandle;
  log?: Logger;
};

/**
 * The bridge's public entrypoints. Every call runs against one account store;
 * `state` names the deployment's ProgramState record.
 */
export class BridgeProgram {
  readonly credentials: CredentialRegistry;
  private readonly store: AccountStore;
  private readonly dispatcher: MessageDispatcher;
  private readonly log: Logger;

  constructor(options: BridgeProgramOptions) {
    this.store = options.store;
    this.log = options.log ?? silentLogger;
    this.credentials = new CredentialRegistry({
      store: options.store,
      events: options.events,
      clock: options.clock,
      newHandle: options.newHandle
    });
    this.dispatcher = new MessageDispatcher({
      store: options.store,
      registry: this.credentials,
      attestation: options.attestation,
      mint: options.mint,
      transport: options.transport,
      events: options.events,
      expectedOriginChainId: options.expectedOriginChainId,
      clock: options.clock,
      log: this.log
    });
  }

  async initialize(authority: IdentityKey, state: StateHandle): Promise<ProgramStateAccount> {
    const account = await this.store.transaction((tx) =>
      initializeProgramState(tx, state, authority)
    );
    this.log.info("program.initialized", { state, authority });
    return account;
  }

  receiveMessage(
    raw: Uint8Array,
    context: { state: StateHandle; recipient?: string }
  ): Promise<DispatchOutcome> {
    return this.dispatcher.receive(raw, context);
  }

  async storeCredential(
    state: StateHandle,
    hash: Uint8Array,
    owner: IdentityKey
  ): Promise<CredentialRecord> {
    const record = await this.credentials.store({ state, hash, owner });
    this.log.info("credential.stored", { handle: record.handle, owner });
    return record;
  }

  async revokeCredential(handle: CredentialHandle, caller: IdentityKey): Promise<CredentialRecord> {
    const record = await this.credentials.revoke({ handle, caller });
    this.log.info("credential.revoked", { handle, revocationDate: record.revocationDate });
    return record;
  }

  getProgramState(state: StateHandle): Promise<ProgramStateAccount> {
    return loadProgramState(this.store, state);
  }

  getCredential(handle: CredentialHandle): Promise<CredentialRecord> {
    return this.credentials.get(handle);
  }
}
