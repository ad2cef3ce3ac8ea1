import { hashMessage } from "@flow-tx/crypto";
import {
    ADDRESS_LENGTH,
    bytesToHex,
    copyBytes,
    encodeAddress,
    padLeft,
    TransactionStateError,
} from "@flow-tx/helpers";

import { encodeCanonical } from "../../encoding/canonical";
import type { CanonicalItem } from "../../encoding/canonical";
import { signWithCredentials } from "./signing";
import { REFERENCE_BLOCK_ID_LENGTH } from "./types";
import type {
    ProposalKey,
    SignatureMessage,
    SignatureRecord,
    SignerCredential,
    TransactionFields,
    TransactionMessage,
    TransactionState,
} from "./types";
import { parseUint32, parseUint64 } from "./utils";

function copyRecord(record: SignatureRecord): SignatureRecord {
    return {
        address: copyBytes(record.address),
        keyIndex: record.keyIndex,
        signature: copyBytes(record.signature),
    };
}

/** `[positionalIndex, keyIndex, signature]` for each record, in sequence order. */
function signatureTriples(records: readonly SignatureRecord[]): CanonicalItem[] {
    return records.map((record, index) => [index, record.keyIndex, record.signature]);
}

function signatureMessage(record: SignatureRecord): SignatureMessage {
    return {
        address: encodeAddress(record.address),
        keyIndex: record.keyIndex,
        signature: bytesToHex(record.signature),
    };
}

/**
 * A transaction under the two-tier signing scheme.
 *
 * Moves `unsigned` -> `payload-signed` -> `fully-signed`. Payload signers sign
 * the body; envelope signers sign the body plus every payload signature, so
 * the payload signatures are frozen once the envelope is signed.
 */
export class Transaction {
    readonly gasLimit: bigint;

    private readonly scriptBytes: Uint8Array;
    private readonly argumentBlobs: readonly Uint8Array[];
    private readonly referenceBlock: Uint8Array;
    private readonly proposer: ProposalKey;
    private readonly authorizerAddresses: readonly Uint8Array[];
    private readonly payerAddress: Uint8Array;

    private currentState: TransactionState = "unsigned";
    private payloadSignatureRecords: SignatureRecord[] = [];
    private envelopeSignatureRecords: SignatureRecord[] = [];

    constructor(fields: TransactionFields) {
        this.scriptBytes = copyBytes(fields.script);
        this.argumentBlobs = fields.arguments.map(copyBytes);
        this.referenceBlock = padLeft(fields.referenceBlockId, REFERENCE_BLOCK_ID_LENGTH, "Reference block id");
        this.gasLimit = parseUint64(fields.gasLimit, "Gas limit");
        this.proposer = {
            address: padLeft(fields.proposalKey.address, ADDRESS_LENGTH, "Proposer address"),
            keyIndex: parseUint32(fields.proposalKey.keyIndex, "Proposer key index"),
            sequenceNumber: parseUint64(fields.proposalKey.sequenceNumber, "Proposer sequence number"),
        };
        this.authorizerAddresses = fields.authorizers.map((address, index) =>
            padLeft(address, ADDRESS_LENGTH, `Authorizer ${index} address`),
        );
        this.payerAddress = padLeft(fields.payer, ADDRESS_LENGTH, "Payer address");
    }

    get script(): Uint8Array {
        return copyBytes(this.scriptBytes);
    }

    get arguments(): Uint8Array[] {
        return this.argumentBlobs.map(copyBytes);
    }

    get referenceBlockId(): Uint8Array {
        return copyBytes(this.referenceBlock);
    }

    get proposalKey(): ProposalKey {
        return { ...this.proposer, address: copyBytes(this.proposer.address) };
    }

    get authorizers(): Uint8Array[] {
        return this.authorizerAddresses.map(copyBytes);
    }

    get payer(): Uint8Array {
        return copyBytes(this.payerAddress);
    }

    get state(): TransactionState {
        return this.currentState;
    }

    get payloadSignatures(): SignatureRecord[] {
        return this.payloadSignatureRecords.map(copyRecord);
    }

    get envelopeSignatures(): SignatureRecord[] {
        return this.envelopeSignatureRecords.map(copyRecord);
    }

    /** Nine-item payload view; every byte field is a copy. */
    payloadItems(): CanonicalItem[] {
        const proposalKey = this.proposalKey;
        return [
            this.script,
            this.arguments,
            this.referenceBlockId,
            this.gasLimit,
            proposalKey.address,
            proposalKey.keyIndex,
            proposalKey.sequenceNumber,
            this.payer,
            this.authorizers,
        ];
    }

    envelopeItems(): CanonicalItem[] {
        return this.envelopeItemsFor(this.payloadSignatureRecords);
    }

    /** Canonical bytes signed by payload signers (without the domain tag). */
    payloadMessage(): Uint8Array {
        return encodeCanonical(this.payloadItems());
    }

    /** Canonical bytes signed by envelope signers (without the domain tag). */
    envelopeMessage(): Uint8Array {
        return encodeCanonical(this.envelopeItems());
    }

    /** Full canonical form, including both signature sequences. */
    toCanonical(): Uint8Array {
        return encodeCanonical([
            this.payloadItems(),
            signatureTriples(this.payloadSignatureRecords),
            signatureTriples(this.envelopeSignatureRecords),
        ]);
    }

    /** SHA3-256 of the full canonical form, as lowercase hex. */
    id(): string {
        return bytesToHex(hashMessage(this.toCanonical(), "SHA3_256"));
    }

    signPayload(signers: readonly SignerCredential[]): this {
        this.assertUnsigned();
        const records = signWithCredentials(this.payloadMessage(), signers);
        this.payloadSignatureRecords = records;
        this.currentState = "payload-signed";
        return this;
    }

    /**
     * Signs the envelope. An unsigned transaction is first treated as
     * payload-signed with no payload signatures.
     */
    signEnvelope(signers: readonly SignerCredential[]): this {
        if (this.currentState === "fully-signed") {
            throw new TransactionStateError("Cannot sign the envelope of a fully-signed transaction");
        }
        const records = signWithCredentials(this.envelopeMessage(), signers);
        this.envelopeSignatureRecords = records;
        this.currentState = "fully-signed";
        return this;
    }

    /**
     * Signs payload and envelope in one step. Nothing is attached unless
     * every signer in both lists succeeds.
     */
    sign(payloadSigners: readonly SignerCredential[], envelopeSigners: readonly SignerCredential[]): this {
        this.assertUnsigned();
        const payloadRecords = signWithCredentials(this.payloadMessage(), payloadSigners);
        const envelopeRecords = signWithCredentials(
            encodeCanonical(this.envelopeItemsFor(payloadRecords)),
            envelopeSigners,
        );
        this.payloadSignatureRecords = payloadRecords;
        this.envelopeSignatureRecords = envelopeRecords;
        this.currentState = "fully-signed";
        return this;
    }

    toMessage(): TransactionMessage {
        return {
            script: bytesToHex(this.scriptBytes),
            arguments: this.argumentBlobs.map(bytesToHex),
            referenceBlockId: bytesToHex(this.referenceBlock),
            gasLimit: this.gasLimit.toString(),
            proposalKey: {
                address: encodeAddress(this.proposer.address),
                keyIndex: this.proposer.keyIndex,
                sequenceNumber: this.proposer.sequenceNumber.toString(),
            },
            authorizers: this.authorizerAddresses.map(encodeAddress),
            payer: encodeAddress(this.payerAddress),
            payloadSignatures: this.payloadSignatureRecords.map(signatureMessage),
            envelopeSignatures: this.envelopeSignatureRecords.map(signatureMessage),
        };
    }

    private envelopeItemsFor(payloadRecords: readonly SignatureRecord[]): CanonicalItem[] {
        return [this.payloadItems(), signatureTriples(payloadRecords)];
    }

    private assertUnsigned(): void {
        if (this.currentState !== "unsigned") {
            throw new TransactionStateError(`Cannot sign the payload of a ${this.currentState} transaction`);
        }
    }
}
