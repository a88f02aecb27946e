import { closeDb, createDb, runMigrations, type DbClient } from "@idbridge/db";
import type { Logger } from "@idbridge/shared";
import type { AppConfig } from "./config.js";

let pending: Promise<DbClient> | null = null;

const connect = async (config: AppConfig, log: Logger) => {
  const db = createDb(config.DATABASE_URL);
  if (!config.AUTO_MIGRATE) {
    return db;
  }
  try {
    const run = await runMigrations(db);
    log.info("db.migrated", { ...run });
  } catch (error) {
    await closeDb(db);
    throw error;
  }
  return db;
};

/** Shared account database. A failed connect is retried on the next call. */
export const openAccountsDb = (config: AppConfig, log: Logger) => {
  if (!pending) {
    pending = connect(config, log).catch((error: unknown) => {
      pending = null;
      throw error;
    });
  }
  return pending;
};
