import { bytesToHex, CryptoError, utf8ToBytes } from "@flow-tx/helpers";
import { describe, expect, it } from "vitest";

import { PrivateKey } from "../private-key";
import { derivePublicKey, generateKeyPair, signMessage, verifySignature } from "../signer";

const KEY_ONE = "0000000000000000000000000000000000000000000000000000000000000001";
const TEST_KEY = "4f3a1c7e9b2d5a8f0e6c3b1a9d7f5e2c8b4a6d0f1e3c5a7b9d2f4e6a8c0b1d3f";

const P256_GENERATOR =
    "6b17d1f2e12c4247f8bce6e563a440f277037d812deb33a0f4a13945d898c296" +
    "4fe342e2fe1a7f9b8ee7eb4a7c0f9e162bce33576b315ececbb6406837bf51f5";
const SECP256K1_GENERATOR =
    "79be667ef9dcbbac55a06295ce870b07029bfcdb2dce28d959f2815b16f81798" +
    "483ada7726a3c4655da4fbfc0e1108a8fd17b448a68554199c47d08ffb10d4b8";

describe("derivePublicKey", () => {
    it("maps scalar 1 to the P-256 generator", () => {
        const key = PrivateKey.fromHex(KEY_ONE);
        expect(bytesToHex(derivePublicKey(key))).toBe(P256_GENERATOR);
    });

    it("maps scalar 1 to the secp256k1 generator", () => {
        const key = PrivateKey.fromHex(KEY_ONE, "ECDSA_secp256k1");
        expect(bytesToHex(derivePublicKey(key))).toBe(SECP256K1_GENERATOR);
    });
});

describe("signMessage", () => {
    const message = utf8ToBytes("transfer 10 tokens");

    it("is deterministic for a fixed key and message", () => {
        const key = PrivateKey.fromHex(TEST_KEY);
        const first = signMessage(message, key);
        const second = signMessage(message, key);

        expect(first.length).toBe(64);
        expect(second).toEqual(first);
    });

    it("produces signatures that verify against the derived public key", () => {
        const key = PrivateKey.fromHex(TEST_KEY);
        const signature = signMessage(message, key);
        const publicKey = derivePublicKey(key);

        expect(verifySignature(signature, message, publicKey)).toBe(true);
        expect(verifySignature(signature, utf8ToBytes("transfer 11 tokens"), publicKey)).toBe(false);
    });

    it("binds the hash algorithm into the signature", () => {
        const key = PrivateKey.fromHex(TEST_KEY);
        const signature = signMessage(message, key, { hashAlgorithm: "SHA2_256" });
        const publicKey = derivePublicKey(key);

        expect(verifySignature(signature, message, publicKey, { hashAlgorithm: "SHA2_256" })).toBe(true);
        expect(verifySignature(signature, message, publicKey)).toBe(false);
    });

    it("signs with secp256k1 keys", () => {
        const key = PrivateKey.fromHex(TEST_KEY, "ECDSA_secp256k1");
        const signature = signMessage(message, key);
        expect(
            verifySignature(signature, message, derivePublicKey(key), { signatureAlgorithm: "ECDSA_secp256k1" }),
        ).toBe(true);
    });

    it("rejects malformed signatures without throwing", () => {
        const key = PrivateKey.fromHex(TEST_KEY);
        expect(verifySignature(new Uint8Array(10), message, derivePublicKey(key))).toBe(false);
    });

    it("refuses to sign with a zeroized key", () => {
        const key = PrivateKey.fromHex(TEST_KEY);
        key.zeroize();
        expect(() => signMessage(message, key)).toThrow(CryptoError);
    });
});

describe("PrivateKey", () => {
    it("rejects non-hex input with CryptoError", () => {
        expect(() => PrivateKey.fromHex("not-a-key")).toThrow(CryptoError);
        expect(() => PrivateKey.fromHex("not-a-key")).toThrow("Private key is not valid hex");
    });

    it("rejects keys of the wrong length", () => {
        expect(() => PrivateKey.fromHex("0x0102")).toThrow("Private key must contain 32 bytes");
    });

    it("rejects the zero scalar", () => {
        expect(() => PrivateKey.fromHex("00".repeat(32))).toThrow("Private key is not a valid ECDSA_P256 scalar");
    });

    it("zeroizes its bytes", () => {
        const key = PrivateKey.fromHex(TEST_KEY);
        let held: Uint8Array | undefined;
        key.withBytes((bytes) => {
            held = bytes;
        });
        key.zeroize();

        expect(key.isZeroized).toBe(true);
        expect(held?.every((byte) => byte === 0)).toBe(true);
    });

    it("copies caller bytes in fromBytes", () => {
        const source = new Uint8Array(32);
        source[31] = 1;
        const key = PrivateKey.fromBytes(source);
        key.zeroize();
        expect(source[31]).toBe(1);
    });
});

describe("generateKeyPair", () => {
    it("returns a usable key pair", () => {
        const pair = generateKeyPair();
        const message = utf8ToBytes("hello");
        const signature = signMessage(message, pair.privateKey);

        expect(pair.publicKey.length).toBe(64);
        expect(pair.signatureAlgorithm).toBe("ECDSA_P256");
        expect(verifySignature(signature, message, pair.publicKey)).toBe(true);
    });
});
