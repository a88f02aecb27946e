import { BridgeError, isBridgeError, type IdentityKey } from "@idbridge/shared";
import {
  U64_MAX,
  decodeProgramStateAccount,
  encodeProgramStateAccount,
  type ProgramStateAccount
} from "@idbridge/wire";
import type { AccountReader, AccountTransaction } from "./store.js";

/** Address of a deployment's ProgramState record. */
export type StateHandle = string & {};

export type ProgramCounter = "verificationCount" | "credentialCount";

export const initializeProgramState = async (
  tx: AccountTransaction,
  state: StateHandle,
  authority: IdentityKey
): Promise<ProgramStateAccount> => {
  if (await tx.read(state)) {
    throw new BridgeError("already_initialized", state);
  }
  const account: ProgramStateAccount = {
    authority,
    verificationCount: 0n,
    credentialCount: 0n
  };
  try {
    await tx.create(state, "ProgramState", encodeProgramStateAccount(account));
  } catch (error) {
    if (isBridgeError(error, "account_exists")) {
      throw new BridgeError("already_initialized", state);
    }
    throw error;
  }
  return account;
};

export const loadProgramState = async (
  reader: AccountReader,
  state: StateHandle
): Promise<ProgramStateAccount> => {
  const data = await reader.read(state);
  if (!data) {
    throw new BridgeError("not_initialized", state);
  }
  return decodeProgramStateAccount(data);
};

export const incrementCounter = (
  account: ProgramStateAccount,
  counter: ProgramCounter
): ProgramStateAccount => {
  if (account[counter] >= U64_MAX) {
    throw new BridgeError("counter_overflow", counter);
  }
  return counter === "verificationCount"
    ? { ...account, verificationCount: account.verificationCount + 1n }
    : { ...account, credentialCount: account.credentialCount + 1n };
};

/** Reads, increments and writes back one counter inside `tx`. */
export const bumpCounter = async (
  tx: AccountTransaction,
  state: StateHandle,
  counter: ProgramCounter
) => {
  const next = incrementCounter(await loadProgramState(tx, state), counter);
  await tx.write(state, encodeProgramStateAccount(next));
  return next;
};
