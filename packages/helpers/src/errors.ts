export type FlowTxErrorCode =
  | "DECODE_ERROR"
  | "CRYPTO_ERROR"
  | "INVALID_ARGUMENT"
  | "ENCODING_OVERFLOW"
  | "INVALID_STATE"
  | "CONFIG_ERROR"
  | "SUBMISSION_ERROR";

export interface FlowTxErrorOptions {
  details?: Record<string, unknown>;
  cause?: unknown;
}

export class FlowTxError extends Error {
  readonly code: FlowTxErrorCode;
  readonly details?: Record<string, unknown>;

  constructor(code: FlowTxErrorCode, message: string, options: FlowTxErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.code = code;
    this.details = options.details;
    this.name = this.constructor.name;
  }
}

/** Malformed hex, address or other textual input. */
export class DecodeError extends FlowTxError {
  constructor(message: string, options?: FlowTxErrorOptions) {
    super("DECODE_ERROR", message, options);
  }
}

/** Malformed key material or a failure inside the signature scheme. */
export class CryptoError extends FlowTxError {
  constructor(message: string, options?: FlowTxErrorOptions) {
    super("CRYPTO_ERROR", message, options);
  }
}

export class InvalidArgumentError extends FlowTxError {
  constructor(message: string, options?: FlowTxErrorOptions) {
    super("INVALID_ARGUMENT", message, options);
  }
}

/** A value is wider than the fixed field it has to fit. */
export class EncodingOverflowError extends FlowTxError {
  constructor(message: string, options?: FlowTxErrorOptions) {
    super("ENCODING_OVERFLOW", message, options);
  }
}

export class TransactionStateError extends FlowTxError {
  constructor(message: string, options?: FlowTxErrorOptions) {
    super("INVALID_STATE", message, options);
  }
}

export class ConfigError extends FlowTxError {
  constructor(message: string, options?: FlowTxErrorOptions) {
    super("CONFIG_ERROR", message, options);
  }
}

export class SubmissionError extends FlowTxError {
  constructor(message: string, options?: FlowTxErrorOptions) {
    super("SUBMISSION_ERROR", message, options);
  }
}
