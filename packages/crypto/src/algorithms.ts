import type { CurveFn } from "@noble/curves/abstract/weierstrass";
import { p256 } from "@noble/curves/p256";
import { secp256k1 } from "@noble/curves/secp256k1";

export type SignatureAlgorithm = "ECDSA_P256" | "ECDSA_secp256k1";

export const SIGNATURE_ALGORITHM_CODES: Record<SignatureAlgorithm, number> = {
    ECDSA_P256: 2,
    ECDSA_secp256k1: 3,
};

export const DEFAULT_SIGNATURE_ALGORITHM: SignatureAlgorithm = "ECDSA_P256";

export const PRIVATE_KEY_SIZE = 32;
export const PUBLIC_KEY_SIZE = 64;
export const SIGNATURE_SIZE = 64;

const CURVES: Record<SignatureAlgorithm, CurveFn> = {
    ECDSA_P256: p256,
    ECDSA_secp256k1: secp256k1,
};

export function curveFor(algorithm: SignatureAlgorithm): CurveFn {
    return CURVES[algorithm];
}
