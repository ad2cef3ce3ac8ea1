export { signingInput, signTransaction, signWithCredentials, transactionDomainTag } from "./signing";
export { Transaction } from "./Transaction";
export { TransactionBuilder } from "./TransactionBuilder";
export type { BuildAndSignParams } from "./TransactionBuilder";
export { REFERENCE_BLOCK_ID_LENGTH } from "./types";
export type {
    BuildTransactionParams,
    ProposalKey,
    ProposalKeyInput,
    SignatureMessage,
    SignatureRecord,
    SignerCredential,
    TransactionArgumentInput,
    TransactionFields,
    TransactionMessage,
    TransactionState,
} from "./types";
