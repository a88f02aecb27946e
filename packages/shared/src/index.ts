export {
  BridgeError,
  httpStatusForBridgeError,
  isBridgeError,
  makeErrorResponse
} from "./errors.js";
export type { BridgeErrorCode, ErrorCode, ErrorResponse } from "./errors.js";
export { createLogger, silentLogger } from "./log.js";
export type { LogLevel, LogMeta, Logger } from "./log.js";
export { createMetricsRegistry } from "./metrics.js";
export type { MetricLabels, MetricsRegistry } from "./metrics.js";
export { bytesEqual, sha256, toHex } from "./hashing.js";
export {
  KEY_BYTES,
  decodeIdentityKey,
  encodeIdentityKey,
  isIdentityKey,
  randomIdentityKey
} from "./keys.js";
export type { IdentityKey } from "./keys.js";
export { extractBearerToken, verifyServiceJwt } from "./serviceAuth.js";
export type { ServiceCaller } from "./serviceAuth.js";
