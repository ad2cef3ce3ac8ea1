import { sha256 } from "@noble/hashes/sha2";
import { sha3_256 } from "@noble/hashes/sha3";

export type HashAlgorithm = "SHA2_256" | "SHA3_256";

/** Numeric codes the network stores alongside an account key. */
export const HASH_ALGORITHM_CODES: Record<HashAlgorithm, number> = {
    SHA2_256: 1,
    SHA3_256: 3,
};

export const DEFAULT_HASH_ALGORITHM: HashAlgorithm = "SHA3_256";

export function hashMessage(message: Uint8Array, algorithm: HashAlgorithm = DEFAULT_HASH_ALGORITHM): Uint8Array {
    switch (algorithm) {
        case "SHA2_256":
            return sha256(message);
        case "SHA3_256":
            return sha3_256(message);
    }
}
