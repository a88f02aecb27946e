import { test } from "node:test";
import assert from "node:assert/strict";
import { createLogger, type LogLevel } from "./log.js";

const capture = () => {
  const lines: Array<{ level: LogLevel; line: string }> = [];
  return { lines, writer: (level: LogLevel, line: string) => lines.push({ level, line }) };
};

test("logger writes one JSON line with service and event", () => {
  const { lines, writer } = capture();
  const log = createLogger("bridge-service", writer);
  log.info("dispatch.accepted", { messageType: "verification" });
  assert.equal(lines.length, 1);
  assert.equal(lines[0]?.level, "info");
  assert.deepEqual(JSON.parse(lines[0]?.line ?? ""), {
    level: "info",
    service: "bridge-service",
    event: "dispatch.accepted",
    messageType: "verification"
  });
});

test("logger renders bigint and bytes and redacts secrets", () => {
  const { lines, writer } = capture();
  const log = createLogger("bridge-service", writer);
  log.warn("dispatch.rejected", {
    requestId: 42n,
    messageId: new Uint8Array([0xde, 0xad]),
    serviceSecret: "test-secret",
    auth: "Bearer abc.def"
  });
  assert.deepEqual(JSON.parse(lines[0]?.line ?? ""), {
    level: "warn",
    service: "bridge-service",
    event: "dispatch.rejected",
    requestId: "42",
    messageId: "dead",
    serviceSecret: "[redacted]",
    auth: "Bearer [redacted]"
  });
});

test("logger flattens errors to name and message", () => {
  const { lines, writer } = capture();
  const log = createLogger("bridge-service", writer);
  log.error("mint.failed", { error: new TypeError("boom") });
  assert.equal(lines[0]?.level, "error");
  assert.deepEqual(JSON.parse(lines[0]?.line ?? "").error, { name: "TypeError", message: "boom" });
});
