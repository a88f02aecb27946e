import dotenv from "dotenv";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { closeDb, createDb, migrationDatabaseUrl, runMigrations } from "@idbridge/db";
import { createLogger } from "@idbridge/shared";

const log = createLogger("migrate");

dotenv.config({ path: path.resolve(path.dirname(fileURLToPath(import.meta.url)), "..", ".env") });

const migrate = async () => {
  const db = createDb(migrationDatabaseUrl(process.env), { poolMax: 1 });
  try {
    const run = await runMigrations(db);
    log.info(run.applied.length ? "migrations.applied" : "migrations.up_to_date", { ...run });
  } finally {
    await closeDb(db);
  }
};

migrate().catch((error: unknown) => {
  log.error("migrations.failed", { error });
  process.exitCode = 1;
});
