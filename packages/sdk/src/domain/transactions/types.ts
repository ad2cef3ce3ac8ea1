import type { HashAlgorithm, PrivateKey, SignatureAlgorithm } from "@flow-tx/crypto";
import type { AddressInput, BytesLike } from "@flow-tx/helpers";

import type { Argument } from "../arguments";

export const REFERENCE_BLOCK_ID_LENGTH = 32;

export type TransactionState = "unsigned" | "payload-signed" | "fully-signed";

export interface ProposalKey {
    address: Uint8Array;
    keyIndex: number;
    sequenceNumber: bigint;
}

export interface ProposalKeyInput {
    address: AddressInput;
    keyIndex: number;
    sequenceNumber: bigint | number;
}

export interface SignatureRecord {
    address: Uint8Array;
    keyIndex: number;
    signature: Uint8Array;
}

/** Key material for one signer. Decoded key bytes live only for one signing call. */
export interface SignerCredential {
    address: AddressInput;
    keyIndex: number;
    privateKey: string | PrivateKey;
    signatureAlgorithm?: SignatureAlgorithm;
    hashAlgorithm?: HashAlgorithm;
}

/** Pre-encoded argument bytes pass through untouched. */
export type TransactionArgumentInput = Argument | Uint8Array;

export interface BuildTransactionParams {
    /** Script body; strings are encoded as UTF-8 */
    script: string | Uint8Array;
    arguments?: TransactionArgumentInput[];
    referenceBlockId: BytesLike;
    gasLimit: bigint | number;
    proposer: ProposalKeyInput;
    authorizers?: AddressInput[];
    payer: AddressInput;
}

export interface TransactionFields {
    script: Uint8Array;
    arguments: Uint8Array[];
    referenceBlockId: Uint8Array;
    gasLimit: bigint;
    proposalKey: ProposalKey;
    authorizers: Uint8Array[];
    payer: Uint8Array;
}

export interface SignatureMessage {
    address: string;
    keyIndex: number;
    signature: string;
}

/** Plain request object handed to the submission collaborator's wire layer. */
export interface TransactionMessage {
    script: string;
    arguments: string[];
    referenceBlockId: string;
    gasLimit: string;
    proposalKey: {
        address: string;
        keyIndex: number;
        sequenceNumber: string;
    };
    authorizers: string[];
    payer: string;
    payloadSignatures: SignatureMessage[];
    envelopeSignatures: SignatureMessage[];
}
