import { test } from "node:test";
import assert from "node:assert/strict";
import { toHex } from "@idbridge/shared";
import { ReplyBuilder, replyMessageId } from "./replyBuilder.js";

test("reply id: sha256 of the correlator's little-endian bytes", () => {
  assert.equal(
    toHex(replyMessageId(1n)),
    "7c9fa136d4413fa6173637e883b6998d32e1d675f88cddff9dcbcf331820f4b8"
  );
  assert.equal(
    toHex(replyMessageId(42n)),
    "ed049108bc18f2c64369e8d0ea42850bdd1a7d1dd340cfde716315579702a76c"
  );
});

test("reply builder: stamps unix seconds from the clock", () => {
  const builder = new ReplyBuilder(() => new Date("2024-01-01T00:00:00.900Z"));
  const data = new Uint8Array([1, 2, 3]);
  const reply = builder.build("role_sync_response", data, 7n);
  assert.equal(reply.msgType, "role_sync_response");
  assert.equal(reply.timestamp, 1_704_067_200n);
  assert.deepEqual(reply.data, data);
  assert.equal(
    toHex(reply.messageId),
    "aae89fc0f03e2959ae4d701a80cc3915918c950b159f6abb6c92c1433b1a8534"
  );
});

test("reply builder: equal correlators give equal ids", () => {
  const builder = new ReplyBuilder();
  const first = builder.build("verification_response", new Uint8Array(), 9n);
  const second = builder.build("did_resolution_response", new Uint8Array([1]), 9n);
  assert.deepEqual(first.messageId, second.messageId);
});
