/** Wire tags are the declaration index; the order is part of the format. */
export const MESSAGE_TYPES = [
  "verification",
  "verification_response",
  "asset_creation",
  "token_transfer",
  "token_transfer_response",
  "credential_verification",
  "credential_verification_response",
  "role_synchronization",
  "role_sync_response",
  "did_resolution",
  "did_resolution_response"
] as const;

export type MessageType = (typeof MESSAGE_TYPES)[number];

export type RequestMessageType =
  | "verification"
  | "asset_creation"
  | "token_transfer"
  | "credential_verification"
  | "role_synchronization"
  | "did_resolution";

export type ResponseMessageType = Exclude<MessageType, RequestMessageType>;

const REQUEST_TYPES: ReadonlySet<MessageType> = new Set<RequestMessageType>([
  "verification",
  "asset_creation",
  "token_transfer",
  "credential_verification",
  "role_synchronization",
  "did_resolution"
]);

export const messageTypeTag = (type: MessageType) => MESSAGE_TYPES.indexOf(type);

export const messageTypeFromTag = (tag: number): MessageType | undefined => MESSAGE_TYPES[tag];

export const isRequestMessageType = (type: MessageType): type is RequestMessageType =>
  REQUEST_TYPES.has(type);
