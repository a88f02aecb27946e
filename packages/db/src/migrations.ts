import type { Knex } from "knex";
import path from "node:path";
import { fileURLToPath } from "node:url";

export const MIGRATIONS_TABLE = "bridge_migrations";
export const MIGRATIONS_DIR = path.resolve(
  path.dirname(fileURLToPath(import.meta.url)),
  "..",
  "migrations"
);

// Sources run under tsx; the build emits .js beside them.
const MIGRATION_EXTENSIONS = [".ts", ".js"];

export type MigrationRun = {
  batch: number;
  applied: string[];
};

export const migratorConfig = (): Knex.MigratorConfig => ({
  directory: MIGRATIONS_DIR,
  tableName: MIGRATIONS_TABLE,
  loadExtensions: MIGRATION_EXTENSIONS
});

/** knex resolves `migrate.latest` to `[batchNo, fileNames]`. */
export const toMigrationRun = (result: unknown): MigrationRun => {
  if (!Array.isArray(result) || typeof result[0] !== "number" || !Array.isArray(result[1])) {
    throw new Error("unexpected_migration_result");
  }
  const applied: string[] = [];
  for (const name of result[1]) {
    if (typeof name !== "string") {
      throw new Error("unexpected_migration_result");
    }
    applied.push(path.basename(name, path.extname(name)));
  }
  return { batch: result[0], applied };
};

/**
 * Migrations run with their own credentials where given. Production refuses
 * to fall back to the service's connection string.
 */
export const migrationDatabaseUrl = (env: Record<string, string | undefined>) => {
  const dedicated = env.MIGRATIONS_DATABASE_URL?.trim();
  if (dedicated) {
    return dedicated;
  }
  if (env.NODE_ENV === "production") {
    throw new Error("migrations_database_url_required_in_production");
  }
  const shared = env.DATABASE_URL?.trim();
  if (!shared) {
    throw new Error("missing_required_envs:MIGRATIONS_DATABASE_URL|DATABASE_URL");
  }
  return shared;
};
