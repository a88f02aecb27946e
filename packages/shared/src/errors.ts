export type BridgeErrorCode =
  | "malformed_payload"
  | "field_too_long"
  | "encoding_error"
  | "invalid_chain"
  | "invalid_message_type"
  | "unauthorized"
  | "already_initialized"
  | "not_initialized"
  | "credential_not_found"
  | "recipient_required"
  | "invalid_identity_key"
  | "account_data_invalid"
  | "account_exists"
  | "attestation_invalid"
  | "attestation_untrusted_emitter"
  | "counter_overflow";

export type ErrorCode =
  | BridgeErrorCode
  | "invalid_request"
  | "forbidden"
  | "service_auth_not_configured"
  | "service_auth_scope_missing"
  | "rate_limited"
  | "internal_error";

export class BridgeError extends Error {
  readonly code: BridgeErrorCode;
  readonly details?: string;

  constructor(code: BridgeErrorCode, details?: string) {
    super(code);
    this.name = "BridgeError";
    this.code = code;
    this.details = details;
  }
}

export const isBridgeError = (error: unknown, code?: BridgeErrorCode): error is BridgeError =>
  error instanceof BridgeError && (code === undefined || error.code === code);

const STATUS_BY_CODE: Record<BridgeErrorCode, number> = {
  malformed_payload: 400,
  field_too_long: 400,
  encoding_error: 400,
  invalid_chain: 422,
  invalid_message_type: 422,
  unauthorized: 403,
  already_initialized: 409,
  not_initialized: 409,
  credential_not_found: 404,
  recipient_required: 400,
  invalid_identity_key: 400,
  account_data_invalid: 500,
  account_exists: 409,
  attestation_invalid: 400,
  attestation_untrusted_emitter: 403,
  counter_overflow: 500
};

export const httpStatusForBridgeError = (error: BridgeError) => STATUS_BY_CODE[error.code];

export type ErrorResponse = {
  error: ErrorCode;
  message: string;
  details?: string;
  debug?: { cause?: string; hint?: string };
};

type ErrorOptions = {
  details?: string;
  debug?: { cause?: string; hint?: string };
  devMode?: boolean;
};

export const makeErrorResponse = (
  error: ErrorCode,
  message: string,
  options: ErrorOptions = {}
): ErrorResponse => {
  const response: ErrorResponse = { error, message };
  if (options.details) {
    response.details = options.details;
  }
  if (options.devMode && options.debug) {
    response.debug = options.debug;
  }
  return response;
};
