import knex, { type Knex } from "knex";
import { migratorConfig, toMigrationRun, type MigrationRun } from "./migrations.js";

export type DbClient = Knex;

export type DbOptions = {
  poolMax?: number;
};

/** Postgres client for the account table. Connections open on first query. */
export const createDb = (connectionString: string, options: DbOptions = {}): DbClient =>
  knex({
    client: "pg",
    connection: connectionString,
    pool: { min: 0, max: options.poolMax ?? 10 }
  });

export const runMigrations = async (db: DbClient): Promise<MigrationRun> =>
  toMigrationRun(await db.migrate.latest(migratorConfig()));

export const closeDb = (db: DbClient) => db.destroy();

export { ACCOUNTS_TABLE, createKnexAccountStore } from "./accounts.js";
export {
  MIGRATIONS_DIR,
  MIGRATIONS_TABLE,
  migrationDatabaseUrl,
  migratorConfig,
  toMigrationRun,
  type MigrationRun
} from "./migrations.js";
