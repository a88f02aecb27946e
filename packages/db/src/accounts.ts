import type { Knex } from "knex";
import { BridgeError } from "@idbridge/shared";
import type { AccountKind } from "@idbridge/wire";
import {
  assertAccountSize,
  type AccountStore,
  type AccountTransaction
} from "@idbridge/registry";

export const ACCOUNTS_TABLE = "bridge_accounts";

type AccountRow = {
  address: string;
  kind: string;
  data: Buffer;
  updated_at: Date;
};

const parseKind = (address: string, kind: string): AccountKind => {
  if (kind === "ProgramState" || kind === "Credential") {
    return kind;
  }
  throw new BridgeError("account_data_invalid", `${address}: unknown kind ${kind}`);
};

const readRow = async (db: Knex, address: string, lock: boolean) => {
  const query = db<AccountRow>(ACCOUNTS_TABLE).where({ address });
  const row = await (lock ? query.forUpdate() : query).first();
  return row ?? null;
};

const toBytes = (row: AccountRow | null) => (row ? new Uint8Array(row.data) : null);

const transactionView = (trx: Knex.Transaction): AccountTransaction => ({
  read: async (address) => toBytes(await readRow(trx, address, true)),
  create: async (address, kind, data) => {
    assertAccountSize(kind, data);
    const inserted = await trx<AccountRow>(ACCOUNTS_TABLE)
      .insert({ address, kind, data: Buffer.from(data), updated_at: new Date() })
      .onConflict("address")
      .ignore()
      .returning(["address"]);
    if (inserted.length === 0) {
      throw new BridgeError("account_exists", address);
    }
  },
  write: async (address, data) => {
    const row = await readRow(trx, address, true);
    if (!row) {
      throw new Error(`account_not_allocated:${address}`);
    }
    assertAccountSize(parseKind(address, row.kind), data);
    await trx<AccountRow>(ACCOUNTS_TABLE)
      .where({ address })
      .update({ data: Buffer.from(data), updated_at: new Date() });
  }
});

/**
 * Account records in Postgres. Reads inside a transaction take row locks, so
 * two messages bumping the same counter queue behind each other.
 */
export const createKnexAccountStore = (db: Knex): AccountStore => ({
  read: async (address) => toBytes(await readRow(db, address, false)),
  transaction: (work) => db.transaction((trx) => work(transactionView(trx)))
});
