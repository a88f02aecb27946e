import { createKnexAccountStore } from "@idbridge/db";
import {
  BridgeProgram,
  createVaaAttestationVerifier,
  type MintAuthority,
  type ReplyTransport
} from "@idbridge/dispatch";
import {
  buildHederaClient,
  createHederaMintAuthority,
  createTopicReplyTransport
} from "@idbridge/hedera";
import { MemoryAccountStore, type AccountStore, type EventSink } from "@idbridge/registry";
import type { Logger } from "@idbridge/shared";
import type { AppConfig } from "./config.js";
import { openAccountsDb } from "./db.js";

const createStore = async (config: AppConfig, log: Logger): Promise<AccountStore> => {
  if (config.STORE_DRIVER === "memory") {
    return new MemoryAccountStore();
  }
  return createKnexAccountStore(await openAccountsDb(config, log));
};

const unconfigured = (name: string): MintAuthority & ReplyTransport => ({
  mintTo: async () => {
    throw new Error(`${name}_not_configured`);
  },
  send: async () => {
    throw new Error(`${name}_not_configured`);
  }
});

const createHederaCollaborators = (config: AppConfig, log: Logger) => {
  const operatorId = config.HEDERA_OPERATOR_ID;
  const operatorKey = config.HEDERA_OPERATOR_PRIVATE_KEY;
  if (!operatorId || !operatorKey) {
    log.warn("hedera.operator.missing", { network: config.HEDERA_NETWORK });
    const missing = unconfigured("hedera_operator");
    return { mint: missing, transport: missing };
  }
  const client = buildHederaClient(config.HEDERA_NETWORK, operatorId, operatorKey);
  const options = { maxFeeTinybars: config.HEDERA_MAX_FEE_TINYBARS };
  const mint: MintAuthority = config.HEDERA_TOKEN_ID
    ? createHederaMintAuthority({
        client,
        tokenId: config.HEDERA_TOKEN_ID,
        treasuryAccountId: operatorId,
        options
      })
    : unconfigured("hedera_token");
  const transport: ReplyTransport = config.HEDERA_REPLY_TOPIC_ID
    ? createTopicReplyTransport({ client, topicId: config.HEDERA_REPLY_TOPIC_ID, options })
    : unconfigured("hedera_reply_topic");
  return { mint, transport };
};

/** Events go to the service log. */
const logEventSink = (log: Logger): EventSink => ({
  emit: (event) => log.info("bridge.event", { ...event })
});

export const createBridgeProgram = async (config: AppConfig, log: Logger) => {
  const { mint, transport } = createHederaCollaborators(config, log);
  return new BridgeProgram({
    store: await createStore(config, log),
    attestation: createVaaAttestationVerifier({
      trustedEmitter: config.TRUSTED_EMITTER_ADDRESS
        ? new Uint8Array(Buffer.from(config.TRUSTED_EMITTER_ADDRESS, "hex"))
        : undefined
    }),
    mint,
    transport,
    events: logEventSink(log),
    expectedOriginChainId: config.EXPECTED_ORIGIN_CHAIN_ID,
    log
  });
};
