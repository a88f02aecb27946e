import { BridgeError } from "@idbridge/shared";
import { ByteReader, ByteWriter } from "./bytes.js";
import { messageTypeFromTag, messageTypeTag, type MessageType } from "./messageType.js";

export const MESSAGE_ID_BYTES = 32;

export type MessagePayload = {
  msgType: MessageType;
  data: Uint8Array;
  timestamp: bigint;
  messageId: Uint8Array;
};

/**
 * An envelope as read off the wire. The tag stays numeric: an unknown tag is
 * a dispatch decision, not a framing error.
 */
export type DecodedEnvelope = {
  tag: number;
  msgType: MessageType | undefined;
  data: Uint8Array;
  timestamp: bigint;
  messageId: Uint8Array;
};

export const encodeEnvelope = (envelope: MessagePayload) =>
  new ByteWriter()
    .u8(messageTypeTag(envelope.msgType))
    .lengthPrefixed(envelope.data, "data")
    .u64le(envelope.timestamp)
    .fixed(envelope.messageId, MESSAGE_ID_BYTES, "message_id")
    .toBytes();

export const decodeEnvelope = (bytes: Uint8Array): DecodedEnvelope => {
  const reader = new ByteReader(bytes);
  const tag = reader.u8("msg_type");
  const data = reader.lengthPrefixed("data");
  const timestamp = reader.u64le("timestamp");
  const messageId = reader.bytes(MESSAGE_ID_BYTES, "message_id");
  reader.expectEnd("envelope");
  return { tag, msgType: messageTypeFromTag(tag), data, timestamp, messageId };
};

/** Decodes and requires a known tag; for consumers of replies. */
export const decodeMessagePayload = (bytes: Uint8Array): MessagePayload => {
  const { tag, msgType, data, timestamp, messageId } = decodeEnvelope(bytes);
  if (!msgType) {
    throw new BridgeError("invalid_message_type", `tag ${tag}`);
  }
  return { msgType, data, timestamp, messageId };
};
