// ============================================================================
// Namespace Exports (for module functions)
// ============================================================================
export * as accounts from "./modules/accounts";
export * as blocks from "./modules/blocks";
export * as transactions from "./modules/transactions";

// ============================================================================
// Value Exports (classes, enums, functions)
// ============================================================================
export { accountKeysArgument, encodeAccountKey } from "./domain/accounts";
export { Argument, cadenceValueSchema, compositeField, decodeArgument } from "./domain/arguments";
export {
  signingInput,
  signTransaction,
  signWithCredentials,
  Transaction,
  TransactionBuilder,
  transactionDomainTag,
} from "./domain/transactions";
export { decodeCanonical, decodedToBigInt, encodeCanonical } from "./encoding/canonical";
export { createFlowClientContext, TransactionStatus } from "./core/client";
export { classifyTransactionResult } from "./modules/transactions";
export { resolveSdkConfig, sdkConfigSchema } from "./config";
export { createConsoleLogger, NOOP_LOGGER } from "./logger";
export { calculatePollDelay } from "./retry";
export {
  ConfigError,
  CryptoError,
  DecodeError,
  EncodingOverflowError,
  FlowTxError,
  InvalidArgumentError,
  SubmissionError,
  TransactionStateError,
} from "@flow-tx/helpers";

// ============================================================================
// Type Exports - Domain
// ============================================================================
export type { AccountKeyParams } from "./domain/accounts";
export type { CadenceValue, FixedPointType, IntegerType } from "./domain/arguments";
export type {
  BuildAndSignParams,
  BuildTransactionParams,
  SignatureRecord,
  SignerCredential,
  TransactionMessage,
  TransactionState,
} from "./domain/transactions";
export type { CanonicalItem, DecodedItem } from "./encoding/canonical";

// ============================================================================
// Type Exports - Collaborator boundary
// ============================================================================
export type {
  AccessApi,
  AccountInfo,
  AccountKeyInfo,
  BlockInfo,
  FlowClientContext,
  TransactionEventInfo,
  TransactionResultInfo,
} from "./core/client";
export type {
  BuildAndSignTransactionOptions,
  BuildTransactionOptions,
  ProposerConfig,
  TransactionOutcome,
} from "./modules/transactions";

// ============================================================================
// Type Exports - Config and logging
// ============================================================================
export type { SdkConfig, SdkConfigInput } from "./config";
export type { LogLevel, TxLogger } from "./logger";
export type { PollingConfig } from "./retry";
