import { derivePublicKey, PrivateKey, verifySignature } from "@flow-tx/crypto";
import {
  bytesToHex,
  DecodeError,
  EncodingOverflowError,
  InvalidArgumentError,
  TransactionStateError,
} from "@flow-tx/helpers";
import { describe, expect, it } from "vitest";

import { decodeCanonical } from "../../../encoding/canonical";
import { Argument } from "../../arguments";
import { signingInput, signTransaction } from "../signing";
import { Transaction } from "../Transaction";
import { TransactionBuilder } from "../TransactionBuilder";
import type { BuildTransactionParams } from "../types";
import { TEST_KEY_A, TEST_KEY_B } from "../../../__tests__/helpers/test-utils";

const ADDRESS_ONE = "0000000000000001";

const PAYLOAD_VECTOR =
  "f83c" +
  "83616263" +
  "c0" +
  "a0" + "00".repeat(31) + "01" +
  "64" +
  "88" + ADDRESS_ONE +
  "80" +
  "05" +
  "88" + ADDRESS_ONE +
  "c0";

const createMinimalParams = (): BuildTransactionParams => ({
  script: "abc",
  referenceBlockId: "01",
  gasLimit: 100,
  proposer: { address: "01", keyIndex: 0, sequenceNumber: 5 },
  payer: "01",
});

const build = (overrides: Partial<BuildTransactionParams> = {}): Transaction =>
  new TransactionBuilder().build({ ...createMinimalParams(), ...overrides });

describe("Transaction", () => {
  describe("payload", () => {
    it("should match the hand-computed vector for zero arguments and authorizers", () => {
      expect(bytesToHex(build().payloadMessage())).toBe(PAYLOAD_VECTOR);
    });

    it("should produce the envelope with an empty signature list before payload signing", () => {
      expect(bytesToHex(build().envelopeMessage())).toBe("f83f" + PAYLOAD_VECTOR + "c0");
    });

    it("should be deterministic", () => {
      expect(build().payloadMessage()).toEqual(build().payloadMessage());
    });

    it("should keep duplicate authorizers in caller order", () => {
      const transaction = build({ authorizers: ["02", "01", "02"] });
      expect(transaction.authorizers.map(bytesToHex)).toEqual([
        "0000000000000002",
        "0000000000000001",
        "0000000000000002",
      ]);
    });

    it("should decode back into the nine payload fields", () => {
      const decoded = decodeCanonical(build({ authorizers: ["02"] }).payloadMessage());
      if (!Array.isArray(decoded)) {
        throw new Error("expected a list");
      }
      expect(decoded).toHaveLength(9);
      expect(decoded[8]).toEqual([Uint8Array.of(0, 0, 0, 0, 0, 0, 0, 2)]);
    });
  });

  describe("immutability", () => {
    it("should not let returned fields change the encoded payload", () => {
      const transaction = build({ arguments: [Argument.int(1)], authorizers: ["02"] });
      const before = transaction.payloadMessage();

      transaction.authorizers[0] = new Uint8Array(20);
      transaction.arguments.push(Uint8Array.of(1));
      transaction.payer[0] = 0xff;
      transaction.proposalKey.address[0] = 0xff;

      expect(transaction.payloadMessage()).toEqual(before);
      expect(transaction.authorizers.map(bytesToHex)).toEqual(["0000000000000002"]);
    });
  });

  describe("construction", () => {
    it("should reject addresses wider than 8 bytes", () => {
      expect(() => build({ payer: "01".repeat(9) })).toThrow(EncodingOverflowError);
    });

    it("should reject reference block ids wider than 32 bytes", () => {
      expect(() => build({ referenceBlockId: new Uint8Array(33) })).toThrow(EncodingOverflowError);
    });

    it("should reject out-of-range key indices and gas limits", () => {
      expect(() => build({ proposer: { address: "01", keyIndex: -1, sequenceNumber: 0 } })).toThrow(
        InvalidArgumentError,
      );
      expect(() => build({ gasLimit: 2n ** 64n })).toThrow("Gas limit must fit within uint64 range");
    });
  });

  describe("signing", () => {
    it("should move through the signing states", () => {
      const transaction = build();
      expect(transaction.state).toBe("unsigned");
      transaction.signPayload([{ address: "01", keyIndex: 0, privateKey: TEST_KEY_A }]);
      expect(transaction.state).toBe("payload-signed");
      transaction.signEnvelope([{ address: "01", keyIndex: 0, privateKey: TEST_KEY_B }]);
      expect(transaction.state).toBe("fully-signed");
    });

    it("should number envelope entries by payload position, not key index", () => {
      const transaction = build().signPayload([
        { address: "02", keyIndex: 7, privateKey: TEST_KEY_A },
        { address: "03", keyIndex: 3, privateKey: TEST_KEY_B },
      ]);
      const [first, second] = transaction.payloadSignatures;
      expect(transaction.envelopeItems()[1]).toEqual([
        [0, 7, first.signature],
        [1, 3, second.signature],
      ]);
    });

    it("should produce signatures that verify against the domain-tagged payload", () => {
      const transaction = build().signPayload([{ address: "01", keyIndex: 0, privateKey: TEST_KEY_A }]);
      const [record] = transaction.payloadSignatures;
      const publicKey = derivePublicKey(PrivateKey.fromHex(TEST_KEY_A));

      expect(record.signature).toHaveLength(64);
      expect(verifySignature(record.signature, signingInput(transaction.payloadMessage()), publicKey)).toBe(true);
      expect(verifySignature(record.signature, transaction.payloadMessage(), publicKey)).toBe(false);
    });

    it("should sign the envelope of an unsigned transaction over an empty payload list", () => {
      const transaction = build();
      const envelope = transaction.envelopeMessage();
      transaction.signEnvelope([{ address: "01", keyIndex: 0, privateKey: TEST_KEY_A }]);
      const [record] = transaction.envelopeSignatures;
      const publicKey = derivePublicKey(PrivateKey.fromHex(TEST_KEY_A));

      expect(transaction.payloadSignatures).toEqual([]);
      expect(verifySignature(record.signature, signingInput(envelope), publicKey)).toBe(true);
    });

    it("should refuse to sign twice", () => {
      const transaction = build().signPayload([]);
      expect(() => transaction.signPayload([])).toThrow(TransactionStateError);
      transaction.signEnvelope([]);
      expect(() => transaction.signEnvelope([])).toThrow(
        "Cannot sign the envelope of a fully-signed transaction",
      );
    });

    it("should attach nothing when any signer fails", () => {
      const transaction = build();
      expect(() =>
        transaction.signPayload([
          { address: "01", keyIndex: 0, privateKey: TEST_KEY_A },
          { address: "01", keyIndex: 1, privateKey: "zz" },
        ]),
      ).toThrow("Private key is not valid hex");
      expect(transaction.state).toBe("unsigned");
      expect(transaction.payloadSignatures).toEqual([]);
    });
  });

  describe("signTransaction", () => {
    it("should leave the transaction unsigned when an envelope key is bad", () => {
      const transaction = build();
      const payloadSigner = { address: "01", keyIndex: 0, privateKey: TEST_KEY_A };

      expect(() =>
        signTransaction(transaction, [payloadSigner], [{ address: "02", keyIndex: 0, privateKey: "zz" }]),
      ).toThrow("Private key is not valid hex");
      expect(transaction.state).toBe("unsigned");
      expect(transaction.payloadSignatures).toEqual([]);
      expect(transaction.envelopeSignatures).toEqual([]);

      signTransaction(transaction, [payloadSigner], [{ address: "02", keyIndex: 0, privateKey: TEST_KEY_B }]);
      expect(transaction.state).toBe("fully-signed");
    });

    it("should fail the whole call with DecodeError on a malformed signer address", () => {
      const transaction = build();

      expect(() =>
        signTransaction(
          transaction,
          [
            { address: "01", keyIndex: 0, privateKey: TEST_KEY_A },
            { address: "0xnothex", keyIndex: 0, privateKey: TEST_KEY_A },
          ],
          [],
        ),
      ).toThrow(DecodeError);
      expect(transaction.state).toBe("unsigned");
      expect(transaction.payloadSignatures).toEqual([]);
    });

    it("should sign a one-argument script with one payload and one envelope signer", () => {
      const credential = { address: "01", keyIndex: 0, privateKey: TEST_KEY_A };
      const transaction = signTransaction(build({ arguments: [Argument.string("hello")] }), [credential], [credential]);
      const publicKey = derivePublicKey(PrivateKey.fromHex(TEST_KEY_A));
      const [envelopeRecord] = transaction.envelopeSignatures;

      expect(transaction.arguments).toHaveLength(1);
      expect(transaction.payloadSignatures).toHaveLength(1);
      expect(transaction.envelopeSignatures).toHaveLength(1);
      expect(verifySignature(envelopeRecord.signature, signingInput(transaction.envelopeMessage()), publicKey)).toBe(
        true,
      );
    });

    it("should change the envelope message when payload signers are swapped", () => {
      const first = { address: "01", keyIndex: 0, privateKey: TEST_KEY_A };
      const second = { address: "02", keyIndex: 1, privateKey: TEST_KEY_B };

      const inOrder = build().signPayload([first, second]).envelopeMessage();
      const swapped = build().signPayload([second, first]).envelopeMessage();

      expect(bytesToHex(swapped)).not.toBe(bytesToHex(inOrder));
    });
  });

  describe("id", () => {
    it("should change when signatures are attached", () => {
      const transaction = build();
      const unsignedId = transaction.id();
      transaction.signEnvelope([{ address: "01", keyIndex: 0, privateKey: TEST_KEY_A }]);

      expect(unsignedId).toHaveLength(64);
      expect(transaction.id()).not.toBe(unsignedId);
    });
  });

  describe("toMessage", () => {
    it("should render fields for the wire layer", () => {
      const message = build({ authorizers: ["02"] }).toMessage();
      expect(message).toEqual({
        script: "616263",
        arguments: [],
        referenceBlockId: "00".repeat(31) + "01",
        gasLimit: "100",
        proposalKey: { address: "0x0000000000000001", keyIndex: 0, sequenceNumber: "5" },
        authorizers: ["0x0000000000000002"],
        payer: "0x0000000000000001",
        payloadSignatures: [],
        envelopeSignatures: [],
      });
    });
  });
});
