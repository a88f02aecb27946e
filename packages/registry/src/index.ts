export { MemoryAccountStore, assertAccountSize } from "./store.js";
export type { AccountReader, AccountStore, AccountTransaction } from "./store.js";
export { EventBuffer, createMemoryEventSink } from "./events.js";
export type {
  AssetCreationEvent,
  BridgeEvent,
  CredentialRevokedEvent,
  CredentialStoredEvent,
  CredentialVerificationEvent,
  DidResolutionEvent,
  EventSink,
  RoleSyncEvent,
  VerificationEvent
} from "./events.js";
export {
  bumpCounter,
  incrementCounter,
  initializeProgramState,
  loadProgramState
} from "./programState.js";
export type { ProgramCounter, StateHandle } from "./programState.js";
export { CredentialRegistry, readCredential } from "./credentials.js";
export type {
  CredentialHandle,
  CredentialRecord,
  CredentialRegistryOptions
} from "./credentials.js";
