export {
    DEFAULT_SIGNATURE_ALGORITHM,
    PRIVATE_KEY_SIZE,
    PUBLIC_KEY_SIZE,
    SIGNATURE_ALGORITHM_CODES,
    SIGNATURE_SIZE,
} from './algorithms';
export type { SignatureAlgorithm } from './algorithms';
export { DEFAULT_HASH_ALGORITHM, HASH_ALGORITHM_CODES, hashMessage } from './hash';
export type { HashAlgorithm } from './hash';
export { PrivateKey } from './private-key';
export { SecureMemory } from './secure-memory';
export { derivePublicKey, generateKeyPair, signMessage, verifySignature } from './signer';
export type { GeneratedKeyPair, SignOptions, VerifyOptions } from './signer';
