import { DEFAULT_SIGNATURE_ALGORITHM, PrivateKey, signMessage } from "@flow-tx/crypto";
import { concatBytes, CryptoError, decodeAddress, padRight, utf8ToBytes } from "@flow-tx/helpers";

import type { Transaction } from "./Transaction";
import type { SignatureRecord, SignerCredential } from "./types";
import { parseUint32 } from "./utils";

const DOMAIN_TAG_LENGTH = 32;
const TRANSACTION_DOMAIN = "FLOW-V0.0-transaction";

/**
 * Domain separation tag prepended to every signed transaction message:
 * ASCII `FLOW-V0.0-transaction` right-padded with zeros to 32 bytes.
 */
export function transactionDomainTag(): Uint8Array {
    return padRight(utf8ToBytes(TRANSACTION_DOMAIN), DOMAIN_TAG_LENGTH, "Domain tag");
}

export function signingInput(message: Uint8Array): Uint8Array {
    return concatBytes(transactionDomainTag(), message);
}

/**
 * Signs `message` once per credential, in input order.
 *
 * Either every signer succeeds or the call throws before returning any
 * record. Keys decoded from hex are zeroized before this returns; a
 * {@link PrivateKey} passed in stays owned by the caller.
 */
export function signWithCredentials(message: Uint8Array, signers: readonly SignerCredential[]): SignatureRecord[] {
    const input = signingInput(message);
    return signers.map((signer, index) => signOne(input, signer, index));
}

function signOne(input: Uint8Array, signer: SignerCredential, index: number): SignatureRecord {
    const address = decodeAddress(signer.address, `Signer ${index} address`);
    const keyIndex = parseUint32(signer.keyIndex, `Signer ${index} key index`);
    const ownsKey = typeof signer.privateKey === "string";
    const key =
        typeof signer.privateKey === "string"
            ? PrivateKey.fromHex(signer.privateKey, signer.signatureAlgorithm ?? DEFAULT_SIGNATURE_ALGORITHM)
            : signer.privateKey;
    try {
        if (signer.signatureAlgorithm !== undefined && key.algorithm !== signer.signatureAlgorithm) {
            throw new CryptoError(
                `Signer ${index} key is a ${key.algorithm} key, expected ${signer.signatureAlgorithm}`,
            );
        }
        const signature = signMessage(input, key, { hashAlgorithm: signer.hashAlgorithm });
        return { address, keyIndex, signature };
    } finally {
        if (ownsKey) {
            key.zeroize();
        }
    }
}

/** Attaches payload and envelope signatures together, or neither. */
export function signTransaction(
    transaction: Transaction,
    payloadSigners: readonly SignerCredential[],
    envelopeSigners: readonly SignerCredential[],
): Transaction {
    return transaction.sign(payloadSigners, envelopeSigners);
}
