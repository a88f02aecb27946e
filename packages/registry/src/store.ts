import { BridgeError } from "@idbridge/shared";
import { ACCOUNT_SIZE, type AccountKind } from "@idbridge/wire";

/** Reads see the transaction's own writes. */
export interface AccountReader {
  read(address: string): Promise<Uint8Array | null>;
}

export interface AccountTransaction extends AccountReader {
  /** Allocates a fixed-size record; fails with `account_exists` if the address is taken. */
  create(address: string, kind: AccountKind, data: Uint8Array): Promise<void>;
  /** Overwrites an allocated record; the size may not change. */
  write(address: string, data: Uint8Array): Promise<void>;
}

/**
 * Persistence substrate for fixed-size account records. A transaction's writes
 * land together or not at all, and transactions against one store never
 * interleave.
 */
export interface AccountStore extends AccountReader {
  transaction<T>(work: (tx: AccountTransaction) => Promise<T>): Promise<T>;
}

type StoredAccount = { kind: AccountKind; data: Uint8Array };

export const assertAccountSize = (kind: AccountKind, data: Uint8Array) => {
  if (data.length !== ACCOUNT_SIZE[kind]) {
    throw new BridgeError("account_data_invalid", `${kind}: size ${data.length}`);
  }
};

export class MemoryAccountStore implements AccountStore {
  private readonly accounts = new Map<string, StoredAccount>();
  private tail: Promise<unknown> = Promise.resolve();

  async read(address: string) {
    const account = this.accounts.get(address);
    return account ? new Uint8Array(account.data) : null;
  }

  size() {
    return this.accounts.size;
  }

  transaction<T>(work: (tx: AccountTransaction) => Promise<T>): Promise<T> {
    const run = this.tail.then(() => this.runTransaction(work));
    this.tail = run.catch(() => undefined);
    return run;
  }

  private async runTransaction<T>(work: (tx: AccountTransaction) => Promise<T>): Promise<T> {
    const staged = new Map<string, StoredAccount>();
    const current = (address: string) => staged.get(address) ?? this.accounts.get(address);
    const tx: AccountTransaction = {
      read: async (address) => {
        const account = current(address);
        return account ? new Uint8Array(account.data) : null;
      },
      create: async (address, kind, data) => {
        if (current(address)) {
          throw new BridgeError("account_exists", address);
        }
        assertAccountSize(kind, data);
        staged.set(address, { kind, data: new Uint8Array(data) });
      },
      write: async (address, data) => {
        const account = current(address);
        if (!account) {
          throw new Error(`account_not_allocated:${address}`);
        }
        assertAccountSize(account.kind, data);
        staged.set(address, { kind: account.kind, data: new Uint8Array(data) });
      }
    };
    const result = await work(tx);
    for (const [address, account] of staged) {
      this.accounts.set(address, account);
    }
    return result;
  }
}
