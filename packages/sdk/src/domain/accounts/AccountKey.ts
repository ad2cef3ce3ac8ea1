import {
    DEFAULT_HASH_ALGORITHM,
    DEFAULT_SIGNATURE_ALGORITHM,
    HASH_ALGORITHM_CODES,
    PUBLIC_KEY_SIZE,
    SIGNATURE_ALGORITHM_CODES,
} from "@flow-tx/crypto";
import type { HashAlgorithm, SignatureAlgorithm } from "@flow-tx/crypto";
import { bytesToHex, copyBytes, DecodeError, hexToBytes, InvalidArgumentError } from "@flow-tx/helpers";

import { DEFAULT_ACCOUNT_KEY_WEIGHT } from "../../defaults";
import { encodeCanonical } from "../../encoding/canonical";
import { Argument } from "../arguments";

const UNCOMPRESSED_PREFIX = 0x04;

export interface AccountKeyParams {
    /** 64-byte `x || y` public key; a leading `0x04` is dropped */
    publicKey: Uint8Array | string;
    signatureAlgorithm?: SignatureAlgorithm;
    hashAlgorithm?: HashAlgorithm;
    weight?: number;
}

function parsePublicKey(value: Uint8Array | string): Uint8Array {
    let bytes: Uint8Array;
    if (typeof value === "string") {
        try {
            bytes = hexToBytes(value);
        } catch (err) {
            throw new DecodeError("Public key is not valid hex", { cause: err });
        }
    } else {
        bytes = value;
    }
    if (bytes.length === PUBLIC_KEY_SIZE + 1 && bytes[0] === UNCOMPRESSED_PREFIX) {
        bytes = bytes.subarray(1);
    }
    if (bytes.length !== PUBLIC_KEY_SIZE) {
        throw new DecodeError(`Public key must contain ${PUBLIC_KEY_SIZE} bytes, got ${bytes.length}`, {
            details: { expected: PUBLIC_KEY_SIZE, actual: bytes.length },
        });
    }
    return copyBytes(bytes);
}

/**
 * Canonical account key: `[publicKey, signatureAlgorithmCode, hashAlgorithmCode, weight]`.
 * Returned as hex, ready to hand to an account-creation script as a String argument.
 */
export function encodeAccountKey(params: AccountKeyParams): string {
    const weight = params.weight ?? DEFAULT_ACCOUNT_KEY_WEIGHT;
    if (!Number.isSafeInteger(weight) || weight < 0) {
        throw new InvalidArgumentError(`Account key weight must be a non-negative integer, got ${weight}`);
    }
    return bytesToHex(
        encodeCanonical([
            parsePublicKey(params.publicKey),
            SIGNATURE_ALGORITHM_CODES[params.signatureAlgorithm ?? DEFAULT_SIGNATURE_ALGORITHM],
            HASH_ALGORITHM_CODES[params.hashAlgorithm ?? DEFAULT_HASH_ALGORITHM],
            weight,
        ]),
    );
}

/** Array of String arguments, one hex-encoded account key each. */
export function accountKeysArgument(keys: readonly AccountKeyParams[]): Argument {
    return Argument.array(keys.map((key) => Argument.string(encodeAccountKey(key))));
}
