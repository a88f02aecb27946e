import type { MessageType } from "@idbridge/wire";

export type AttestedMessage = {
  originChainId: number;
  payload: Uint8Array;
  emitterAddress?: Uint8Array;
  sequence?: bigint;
};

/** Authenticates inbound bytes and says which chain they came from. */
export interface AttestationVerifier {
  verify(raw: Uint8Array): Promise<AttestedMessage>;
}

export type MintRequest = {
  transferId: bigint;
  tokenAddress: Uint8Array;
  amount: bigint;
  destination: string;
};

/** Performs the balance-increasing call. Failures abort the dispatch. */
export interface MintAuthority {
  mintTo(request: MintRequest): Promise<void>;
}

export type OutboundReply = {
  msgType: MessageType;
  messageId: Uint8Array;
  payload: Uint8Array;
  destinationChainId: number;
};

/** Hands encoded replies to the relay; delivery and retries are its job. */
export interface ReplyTransport {
  send(reply: OutboundReply): Promise<void>;
}
