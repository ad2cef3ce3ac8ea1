import { concatBytes, CryptoError } from "@flow-tx/helpers";

import {
    curveFor,
    DEFAULT_SIGNATURE_ALGORITHM,
    PUBLIC_KEY_SIZE,
    SIGNATURE_SIZE,
    type SignatureAlgorithm,
} from "./algorithms";
import { DEFAULT_HASH_ALGORITHM, hashMessage, type HashAlgorithm } from "./hash";
import { PrivateKey } from "./private-key";

const UNCOMPRESSED_PREFIX = 0x04;

export interface SignOptions {
    hashAlgorithm?: HashAlgorithm;
}

export interface VerifyOptions {
    signatureAlgorithm?: SignatureAlgorithm;
    hashAlgorithm?: HashAlgorithm;
}

export interface GeneratedKeyPair {
    privateKey: PrivateKey;
    publicKey: Uint8Array;
    signatureAlgorithm: SignatureAlgorithm;
}

/**
 * Hashes `message` and signs the digest with RFC 6979 deterministic ECDSA.
 * Returns the raw 64-byte `r || s` encoding, not DER.
 */
export function signMessage(message: Uint8Array, privateKey: PrivateKey, options: SignOptions = {}): Uint8Array {
    const digest = hashMessage(message, options.hashAlgorithm ?? DEFAULT_HASH_ALGORITHM);
    const curve = curveFor(privateKey.algorithm);
    let signature: Uint8Array;
    try {
        signature = privateKey.withBytes((bytes) => curve.sign(digest, bytes).toCompactRawBytes());
    } catch (err) {
        if (err instanceof CryptoError) {
            throw err;
        }
        throw new CryptoError(`${privateKey.algorithm} signing failed`, { cause: err });
    }
    if (signature.length !== SIGNATURE_SIZE) {
        throw new CryptoError(`${privateKey.algorithm} signing produced an invalid signature`);
    }
    return signature;
}

export function verifySignature(
    signature: Uint8Array,
    message: Uint8Array,
    publicKey: Uint8Array,
    options: VerifyOptions = {},
): boolean {
    if (signature.length !== SIGNATURE_SIZE) {
        return false;
    }
    const curve = curveFor(options.signatureAlgorithm ?? DEFAULT_SIGNATURE_ALGORITHM);
    const digest = hashMessage(message, options.hashAlgorithm ?? DEFAULT_HASH_ALGORITHM);
    const point = publicKey.length === PUBLIC_KEY_SIZE
        ? concatBytes(new Uint8Array([UNCOMPRESSED_PREFIX]), publicKey)
        : publicKey;
    try {
        return curve.verify(signature, digest, point);
    } catch {
        return false;
    }
}

/** Uncompressed public key without the leading `0x04`: 64 bytes of `x || y`. */
export function derivePublicKey(privateKey: PrivateKey): Uint8Array {
    const curve = curveFor(privateKey.algorithm);
    const uncompressed = privateKey.withBytes((bytes) => curve.getPublicKey(bytes, false));
    return uncompressed.slice(1);
}

export function generateKeyPair(signatureAlgorithm: SignatureAlgorithm = DEFAULT_SIGNATURE_ALGORITHM): GeneratedKeyPair {
    const seed = curveFor(signatureAlgorithm).utils.randomPrivateKey();
    const privateKey = PrivateKey.fromBytes(seed, signatureAlgorithm);
    seed.fill(0);
    return {
        privateKey,
        publicKey: derivePublicKey(privateKey),
        signatureAlgorithm,
    };
}
