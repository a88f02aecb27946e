import {
  BridgeError,
  encodeIdentityKey,
  isBridgeError,
  silentLogger,
  toHex,
  type Logger
} from "@idbridge/shared";
import {
  decodeAssetCreation,
  decodeCredentialVerification,
  decodeDidRequest,
  decodeEnvelope,
  decodeRoleSync,
  decodeTokenTransfer,
  decodeUtf8,
  encodeCredentialVerificationResponse,
  encodeDidResolutionResponse,
  encodeEnvelope,
  encodeProgramStateAccount,
  encodeRoleSyncResponse,
  encodeTokenTransferResponse,
  encodeVerificationResponse,
  isRequestMessageType,
  type DecodedEnvelope,
  type MessagePayload,
  type RequestMessageType,
  type ResponseMessageType
} from "@idbridge/wire";
import {
  EventBuffer,
  incrementCounter,
  loadProgramState,
  type AccountStore,
  type AccountTransaction,
  type BridgeEvent,
  type CredentialRegistry,
  type EventSink,
  type ProgramCounter,
  type StateHandle
} from "@idbridge/registry";
import type {
  AttestationVerifier,
  MintAuthority,
  ReplyTransport
} from "./collaborators.js";
import { ReplyBuilder } from "./replyBuilder.js";

export type DispatchStage =
  | "awaiting_envelope"
  | "type_matched"
  | "handler_executed"
  | "reply_emitted";

export type DispatchContext = {
  state: StateHandle;
  /** Mint destination for `token_transfer`, chosen by the caller. */
  recipient?: string;
};

export type DispatchReply = {
  envelope: MessagePayload;
  bytes: Uint8Array;
  destinationChainId: number;
};

export type DispatchOutcome = {
  messageType: RequestMessageType;
  originChainId: number;
  stage: "handler_executed" | "reply_emitted";
  reply?: DispatchReply;
  events: BridgeEvent[];
};

export type MessageDispatcherOptions = {
  store: AccountStore;
  registry: CredentialRegistry;
  attestation: AttestationVerifier;
  mint: MintAuthority;
  transport: ReplyTransport;
  events: EventSink;
  expectedOriginChainId: number;
  clock?: () => Date;
  log?: Logger;
};

type PendingReply = {
  msgType: ResponseMessageType;
  data: Uint8Array;
  correlator: bigint;
};

type HandlerResult = {
  counter?: ProgramCounter;
  reply?: PendingReply;
};

type HandlerInput = {
  data: Uint8Array;
  context: DispatchContext;
  events: EventBuffer;
};

export const resolveRequestType = (envelope: DecodedEnvelope): RequestMessageType => {
  const { msgType } = envelope;
  if (!msgType || !isRequestMessageType(msgType)) {
    throw new BridgeError("invalid_message_type", msgType ?? `tag ${envelope.tag}`);
  }
  return msgType;
};

/**
 * Inbound message state machine:
 * awaiting_envelope -> type_matched -> handler_executed -> reply_emitted.
 *
 * Counter writes and the reply hand-off share one store transaction. Events
 * are released after it commits; a rejected message changes nothing.
 */
export class MessageDispatcher {
  private readonly store: AccountStore;
  private readonly registry: CredentialRegistry;
  private readonly attestation: AttestationVerifier;
  private readonly mint: MintAuthority;
  private readonly transport: ReplyTransport;
  private readonly events: EventSink;
  private readonly expectedOriginChainId: number;
  private readonly replies: ReplyBuilder;
  private readonly log: Logger;

  constructor(options: MessageDispatcherOptions) {
    this.store = options.store;
    this.registry = options.registry;
    this.attestation = options.attestation;
    this.mint = options.mint;
    this.transport = options.transport;
    this.events = options.events;
    this.expectedOriginChainId = options.expectedOriginChainId;
    this.replies = new ReplyBuilder(options.clock);
    this.log = options.log ?? silentLogger;
  }

  async receive(raw: Uint8Array, context: DispatchContext): Promise<DispatchOutcome> {
    let stage: DispatchStage = "awaiting_envelope";
    try {
      const attested = await this.attestation.verify(raw);
      const envelope = decodeEnvelope(attested.payload);
      if (attested.originChainId !== this.expectedOriginChainId) {
        throw new BridgeError(
          "invalid_chain",
          `origin ${attested.originChainId}, expected ${this.expectedOriginChainId}`
        );
      }
      const messageType = resolveRequestType(envelope);
      stage = "type_matched";

      const buffer = new EventBuffer();
      const reply = await this.store.transaction(async (tx) => {
        const result = await this.handle(tx, messageType, {
          data: envelope.data,
          context,
          events: buffer
        });
        stage = "handler_executed";
        if (!result.reply) {
          return undefined;
        }
        return this.emitReply(result.reply, attested.originChainId);
      });
      if (reply) {
        stage = "reply_emitted";
      }
      const events = buffer.flush(this.events);
      this.log.info("dispatch.completed", {
        messageType,
        stage,
        originChainId: attested.originChainId,
        replyMessageId: reply?.envelope.messageId
      });
      return {
        messageType,
        originChainId: attested.originChainId,
        stage: reply ? "reply_emitted" : "handler_executed",
        ...(reply ? { reply } : {}),
        events
      };
    } catch (error) {
      this.log.warn("dispatch.rejected", {
        stage,
        error: isBridgeError(error) ? error.code : error,
        details: isBridgeError(error) ? error.details : undefined
      });
      throw error;
    }
  }

  private async handle(
    tx: AccountTransaction,
    messageType: RequestMessageType,
    input: HandlerInput
  ): Promise<HandlerResult> {
    const state = await loadProgramState(tx, input.context.state);
    const result = await this.route(messageType, input);
    if (result.counter) {
      await tx.write(
        input.context.state,
        encodeProgramStateAccount(incrementCounter(state, result.counter))
      );
    }
    return result;
  }

  private async route(messageType: RequestMessageType, input: HandlerInput): Promise<HandlerResult> {
    switch (messageType) {
      case "verification":
        return this.onVerification(input);
      case "did_resolution":
        return this.onDidResolution(input);
      case "asset_creation":
        return this.onAssetCreation(input);
      case "token_transfer":
        return this.onTokenTransfer(input);
      case "credential_verification":
        return this.onCredentialVerification(input);
      case "role_synchronization":
        return this.onRoleSynchronization(input);
      default: {
        const unhandled: never = messageType;
        throw new BridgeError("invalid_message_type", String(unhandled));
      }
    }
  }

  // Verification outcomes are not computed: every request reports success.
  private onVerification({ data, events }: HandlerInput): HandlerResult {
    const request = decodeDidRequest(data);
    events.push({
      type: "verification",
      requestId: request.requestId,
      did: decodeUtf8(request.did, "did"),
      verified: true
    });
    return {
      counter: "verificationCount",
      reply: {
        msgType: "verification_response",
        data: encodeVerificationResponse({ requestId: request.requestId, verified: true }),
        correlator: request.requestId
      }
    };
  }

  private onDidResolution({ data, events }: HandlerInput): HandlerResult {
    const request = decodeDidRequest(data);
    events.push({
      type: "did_resolution",
      requestId: request.requestId,
      did: decodeUtf8(request.did, "did"),
      resolved: true
    });
    return {
      counter: "verificationCount",
      reply: {
        msgType: "did_resolution_response",
        data: encodeDidResolutionResponse({
          requestId: request.requestId,
          resolved: true,
          didDocument: new Uint8Array()
        }),
        correlator: request.requestId
      }
    };
  }

  private onAssetCreation({ data, events }: HandlerInput): HandlerResult {
    const request = decodeAssetCreation(data);
    events.push({
      type: "asset_creation",
      issuer: encodeIdentityKey(request.issuer),
      name: decodeUtf8(request.name, "name"),
      symbol: decodeUtf8(request.symbol, "symbol")
    });
    return {};
  }

  private async onTokenTransfer({ data, context }: HandlerInput): Promise<HandlerResult> {
    const request = decodeTokenTransfer(data);
    if (!context.recipient) {
      throw new BridgeError("recipient_required", `transfer ${request.transferId}`);
    }
    await this.mint.mintTo({
      transferId: request.transferId,
      tokenAddress: request.tokenAddress,
      amount: request.amount,
      destination: context.recipient
    });
    return {
      reply: {
        msgType: "token_transfer_response",
        data: encodeTokenTransferResponse({ transferId: request.transferId, success: true }),
        correlator: request.transferId
      }
    };
  }

  private onCredentialVerification({ data, events }: HandlerInput): HandlerResult {
    const request = decodeCredentialVerification(data);
    const verified = this.registry.verify(request.credentialHash);
    events.push({
      type: "credential_verification",
      requestId: request.requestId,
      credentialHash: toHex(request.credentialHash),
      verified
    });
    return {
      counter: "credentialCount",
      reply: {
        msgType: "credential_verification_response",
        data: encodeCredentialVerificationResponse({ requestId: request.requestId, verified }),
        correlator: request.requestId
      }
    };
  }

  // Roles are announced, not stored.
  private onRoleSynchronization({ data, events }: HandlerInput): HandlerResult {
    const request = decodeRoleSync(data);
    events.push({
      type: "role_sync",
      requestId: request.requestId,
      role: toHex(request.role),
      account: toHex(request.account),
      isGrant: request.isGrant
    });
    return {
      reply: {
        msgType: "role_sync_response",
        data: encodeRoleSyncResponse({ requestId: request.requestId, success: true }),
        correlator: request.requestId
      }
    };
  }

  private async emitReply(pending: PendingReply, destinationChainId: number): Promise<DispatchReply> {
    const envelope = this.replies.build(pending.msgType, pending.data, pending.correlator);
    const bytes = encodeEnvelope(envelope);
    await this.transport.send({
      msgType: envelope.msgType,
      messageId: envelope.messageId,
      payload: bytes,
      destinationChainId
    });
    return { envelope, bytes, destinationChainId };
  }
}
