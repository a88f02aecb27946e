import { test } from "node:test";
import assert from "node:assert/strict";
import { parseConfig } from "./config.js";

test("config: defaults", () => {
  const config = parseConfig({});
  assert.equal(config.NODE_ENV, "development");
  assert.equal(config.PORT, 3010);
  assert.equal(config.STORE_DRIVER, "postgres");
  assert.equal(config.EXPECTED_ORIGIN_CHAIN_ID, 2);
  assert.equal(config.PROGRAM_STATE_HANDLE, "program-state");
  assert.equal(config.BODY_LIMIT_BYTES, 65536);
  assert.equal(config.AUTO_MIGRATE, true);
  assert.equal(config.SERVICE_JWT_SECRET, undefined);
  assert.equal(config.TRUSTED_EMITTER_ADDRESS, undefined);
});

test("config: numeric values are parsed and clamped", () => {
  const config = parseConfig({
    PORT: "8080",
    BODY_LIMIT_BYTES: "10",
    EXPECTED_ORIGIN_CHAIN_ID: "23",
    HEDERA_MAX_FEE_TINYBARS: "500000000"
  });
  assert.equal(config.PORT, 8080);
  assert.equal(config.BODY_LIMIT_BYTES, 1024);
  assert.equal(config.EXPECTED_ORIGIN_CHAIN_ID, 23);
  assert.equal(config.HEDERA_MAX_FEE_TINYBARS, 500_000_000);
});

test("config: production refuses unsafe combinations", () => {
  assert.throws(() => parseConfig({ NODE_ENV: "production", STORE_DRIVER: "memory" }), {
    message: "memory_store_not_allowed_in_production"
  });
  assert.throws(() => parseConfig({ NODE_ENV: "production", AUTO_MIGRATE: "true" }), {
    message: "auto_migrate_not_allowed_in_production"
  });
  assert.throws(() => parseConfig({ NODE_ENV: "production" }), {
    message: "trust_proxy_required_in_production"
  });
  const config = parseConfig({ NODE_ENV: "production", TRUST_PROXY: "true" });
  assert.equal(config.AUTO_MIGRATE, false);
});

test("config: mainnet needs an explicit opt-in", () => {
  assert.throws(() => parseConfig({ HEDERA_NETWORK: "mainnet" }), { message: "mainnet_not_allowed" });
  assert.equal(parseConfig({ HEDERA_NETWORK: "mainnet", ALLOW_MAINNET: "true" }).HEDERA_NETWORK, "mainnet");
});

test("config: malformed secrets and emitters are rejected", () => {
  assert.throws(() => parseConfig({ SERVICE_JWT_SECRET: "short" }));
  assert.throws(() => parseConfig({ TRUSTED_EMITTER_ADDRESS: "abcd" }));
  assert.equal(
    parseConfig({ TRUSTED_EMITTER_ADDRESS: "ee".repeat(32) }).TRUSTED_EMITTER_ADDRESS,
    "ee".repeat(32)
  );
  assert.equal(parseConfig({ SERVICE_JWT_SECRET: "" }).SERVICE_JWT_SECRET, undefined);
});
