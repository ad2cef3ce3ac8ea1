import { CryptoError, hexToBytes } from "@flow-tx/helpers";

import { curveFor, DEFAULT_SIGNATURE_ALGORITHM, PRIVATE_KEY_SIZE, type SignatureAlgorithm } from "./algorithms";
import { SecureMemory } from "./secure-memory";

/**
 * A private scalar held for the duration of one signing call.
 *
 * The bytes are owned by the instance: callers reach them through
 * {@link PrivateKey.withBytes} and release them with {@link PrivateKey.zeroize}.
 */
export class PrivateKey {
    readonly algorithm: SignatureAlgorithm;
    private bytes: Uint8Array | undefined;

    private constructor(bytes: Uint8Array, algorithm: SignatureAlgorithm) {
        this.bytes = bytes;
        this.algorithm = algorithm;
    }

    static fromHex(hex: string, algorithm: SignatureAlgorithm = DEFAULT_SIGNATURE_ALGORITHM): PrivateKey {
        let bytes: Uint8Array;
        try {
            bytes = hexToBytes(hex);
        } catch (err) {
            throw new CryptoError("Private key is not valid hex", { cause: err });
        }
        return PrivateKey.adopt(bytes, algorithm);
    }

    /** Copies `bytes`; the caller keeps ownership of (and should zeroize) its own array. */
    static fromBytes(bytes: Uint8Array, algorithm: SignatureAlgorithm = DEFAULT_SIGNATURE_ALGORITHM): PrivateKey {
        return PrivateKey.adopt(new Uint8Array(bytes), algorithm);
    }

    private static adopt(bytes: Uint8Array, algorithm: SignatureAlgorithm): PrivateKey {
        if (bytes.length !== PRIVATE_KEY_SIZE) {
            const length = bytes.length;
            SecureMemory.zeroize(bytes);
            throw new CryptoError(`Private key must contain ${PRIVATE_KEY_SIZE} bytes`, {
                details: { length },
            });
        }
        if (!curveFor(algorithm).utils.isValidPrivateKey(bytes)) {
            SecureMemory.zeroize(bytes);
            throw new CryptoError(`Private key is not a valid ${algorithm} scalar`);
        }
        return new PrivateKey(bytes, algorithm);
    }

    get isZeroized(): boolean {
        return this.bytes === undefined;
    }

    withBytes<T>(fn: (bytes: Uint8Array) => T): T {
        if (!this.bytes) {
            throw new CryptoError("Private key has already been zeroized");
        }
        return fn(this.bytes);
    }

    zeroize(): void {
        if (this.bytes) {
            SecureMemory.zeroize(this.bytes);
            this.bytes = undefined;
        }
    }
}
