import {
  AccountId,
  Client as HashgraphClient,
  Hbar,
  TokenId,
  TokenMintTransaction,
  TopicMessageSubmitTransaction,
  TransferTransaction
} from "@hashgraph/sdk";
import Long from "long";
import { toHex } from "@idbridge/shared";
import type { MintAuthority, MintRequest, OutboundReply, ReplyTransport } from "@idbridge/dispatch";

export type HederaNetwork = "testnet" | "previewnet" | "mainnet";

const I64_MAX = (1n << 63n) - 1n;

export function createHederaClient(network: HederaNetwork) {
  return HashgraphClient.forName(network);
}

export function buildHederaClient(
  network: HederaNetwork,
  operatorId: string,
  operatorPrivateKey: string
) {
  const client = createHederaClient(network);
  client.setOperator(operatorId, operatorPrivateKey);
  return client;
}

/** Token amounts are int64 on Hedera; wire amounts are u64. */
export const toTokenAmount = (amount: bigint) => {
  if (amount <= 0n || amount > I64_MAX) {
    throw new Error("mint_amount_out_of_range");
  }
  return Long.fromString(amount.toString());
};

export type TxOptions = { maxFeeTinybars?: number };

const applyMaxFee = <T extends { setMaxTransactionFee(fee: Hbar): T }>(
  tx: T,
  options: TxOptions
) => {
  if (typeof options.maxFeeTinybars === "number" && Number.isFinite(options.maxFeeTinybars)) {
    tx.setMaxTransactionFee(Hbar.fromTinybars(Math.floor(options.maxFeeTinybars)));
  }
  return tx;
};

/**
 * Mints the bridged token into the operator's treasury, then moves it to the
 * destination account. `tokenAddress` on the wire is recorded in the memo;
 * the minted token is always the configured one.
 */
export const createHederaMintAuthority = (input: {
  client: HashgraphClient;
  tokenId: string;
  treasuryAccountId: string;
  options?: TxOptions;
}): MintAuthority => {
  const tokenId = TokenId.fromString(input.tokenId);
  const treasury = AccountId.fromString(input.treasuryAccountId);
  const options = input.options ?? {};
  return {
    async mintTo(request: MintRequest) {
      const amount = toTokenAmount(request.amount);
      const destination = AccountId.fromString(request.destination);
      const memo = `bridge transfer ${request.transferId} ${toHex(request.tokenAddress).slice(0, 16)}`;

      const mint = applyMaxFee(
        new TokenMintTransaction().setTokenId(tokenId).setAmount(amount).setTransactionMemo(memo),
        options
      );
      const mintResponse = await mint.execute(input.client);
      await mintResponse.getReceipt(input.client);

      const transfer = applyMaxFee(
        new TransferTransaction()
          .addTokenTransfer(tokenId, treasury, amount.negate())
          .addTokenTransfer(tokenId, destination, amount)
          .setTransactionMemo(memo),
        options
      );
      const transferResponse = await transfer.execute(input.client);
      await transferResponse.getReceipt(input.client);
    }
  };
};

export type ReplyTopicMessage = {
  kind: "bridge_reply";
  msgType: string;
  messageId: string;
  destinationChainId: number;
  payload: string;
};

/** Topic message body the relay picks replies up from. */
export const encodeReplyTopicMessage = (reply: OutboundReply) => {
  const message: ReplyTopicMessage = {
    kind: "bridge_reply",
    msgType: reply.msgType,
    messageId: toHex(reply.messageId),
    destinationChainId: reply.destinationChainId,
    payload: Buffer.from(reply.payload).toString("base64")
  };
  return Buffer.from(JSON.stringify(message), "utf8");
};

export const createTopicReplyTransport = (input: {
  client: HashgraphClient;
  topicId: string;
  options?: TxOptions & { maxMessageBytes?: number };
}): ReplyTransport => {
  const options = input.options ?? {};
  return {
    async send(reply) {
      const bytes = encodeReplyTopicMessage(reply);
      if (typeof options.maxMessageBytes === "number" && bytes.length > options.maxMessageBytes) {
        throw new Error("reply_message_too_large");
      }
      const tx = applyMaxFee(
        new TopicMessageSubmitTransaction().setTopicId(input.topicId).setMessage(bytes),
        options
      );
      const response = await tx.execute(input.client);
      await response.getReceipt(input.client);
    }
  };
};
