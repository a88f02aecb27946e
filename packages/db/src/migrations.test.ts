import { test } from "node:test";
import assert from "node:assert/strict";
import path from "node:path";
import { MIGRATIONS_DIR, migrationDatabaseUrl, migratorConfig, toMigrationRun } from "./migrations.js";

test("migrator: reads the package's migrations into its own table", () => {
  assert.equal(path.basename(MIGRATIONS_DIR), "migrations");
  assert.equal(path.basename(path.dirname(MIGRATIONS_DIR)), "db");
  assert.deepEqual(migratorConfig(), {
    directory: MIGRATIONS_DIR,
    tableName: "bridge_migrations",
    loadExtensions: [".ts", ".js"]
  });
});

test("migrator: a run reports its batch and bare migration names", () => {
  assert.deepEqual(toMigrationRun([2, ["001_bridge_accounts.ts", "002_next.js"]]), {
    batch: 2,
    applied: ["001_bridge_accounts", "002_next"]
  });
  assert.deepEqual(toMigrationRun([1, []]), { batch: 1, applied: [] });
  assert.throws(() => toMigrationRun(undefined), /unexpected_migration_result/);
  assert.throws(() => toMigrationRun([1, [7]]), /unexpected_migration_result/);
});

test("migrator: connection string prefers dedicated credentials", () => {
  assert.equal(
    migrationDatabaseUrl({
      MIGRATIONS_DATABASE_URL: "postgres://migrator@db/bridge",
      DATABASE_URL: "postgres://service@db/bridge"
    }),
    "postgres://migrator@db/bridge"
  );
  assert.equal(
    migrationDatabaseUrl({ DATABASE_URL: " postgres://service@db/bridge " }),
    "postgres://service@db/bridge"
  );
  assert.throws(
    () => migrationDatabaseUrl({ NODE_ENV: "production", DATABASE_URL: "postgres://service@db/bridge" }),
    /migrations_database_url_required_in_production/
  );
  assert.throws(() => migrationDatabaseUrl({}), /missing_required_envs/);
});
