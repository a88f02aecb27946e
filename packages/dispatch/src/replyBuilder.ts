import { sha256 } from "@idbridge/shared";
import { u64le, type MessagePayload, type ResponseMessageType } from "@idbridge/wire";

/**
 * Reply ids are the hash of the request's correlator, so a reply can be
 * matched to its request. Two requests with the same id get the same reply id.
 */
export const replyMessageId = (correlator: bigint) => sha256(u64le(correlator));

export class ReplyBuilder {
  private readonly clock: () => Date;

  constructor(clock: () => Date = () => new Date()) {
    this.clock = clock;
  }

  build(msgType: ResponseMessageType, data: Uint8Array, correlator: bigint): MessagePayload {
    return {
      msgType,
      data,
      timestamp: BigInt(Math.floor(this.clock().getTime() / 1000)),
      messageId: replyMessageId(correlator)
    };
  }
}
