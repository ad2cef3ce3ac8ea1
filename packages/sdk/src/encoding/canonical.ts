import { DecodeError, InvalidArgumentError } from "@flow-tx/helpers";
import { decode, encode } from "rlp";

/**
 * Canonical (RLP) encoding used for signing and transport.
 *
 * Items are byte strings, unsigned integers or nested lists of items. Integers
 * are written as minimal big-endian byte strings, so `0` encodes like the empty
 * string. Item order is kept exactly as given and empty lists are encoded.
 *
 * This codec is unrelated to the JSON argument encoding in `domain/arguments`.
 */
export type CanonicalItem = Uint8Array | bigint | number | readonly CanonicalItem[];

export type DecodedItem = Uint8Array | DecodedItem[];

type RlpInput = Uint8Array | bigint | RlpInput[];

export function encodeCanonical(item: CanonicalItem): Uint8Array {
    return encode(toRlpInput(item, "$"));
}

export function decodeCanonical(bytes: Uint8Array): DecodedItem {
    let decoded: DecodedItem;
    try {
        decoded = decode(bytes);
    } catch (err) {
        throw new DecodeError("Malformed canonical encoding", { cause: err });
    }
    return copyDecoded(decoded);
}

/** Reads a decoded byte string back as the unsigned integer it encodes. */
export function decodedToBigInt(item: DecodedItem): bigint {
    if (!(item instanceof Uint8Array)) {
        throw new DecodeError("Expected a byte string, found a list");
    }
    let value = 0n;
    for (const byte of item) {
        value = (value << 8n) | BigInt(byte);
    }
    return value;
}

function toRlpInput(item: CanonicalItem, path: string): RlpInput {
    if (item instanceof Uint8Array) {
        return item;
    }
    if (typeof item === "bigint") {
        if (item < 0n) {
            throw new InvalidArgumentError(`Canonical integer at ${path} must be unsigned`, {
                details: { path, value: item.toString() },
            });
        }
        return item;
    }
    if (typeof item === "number") {
        if (!Number.isSafeInteger(item) || item < 0) {
            throw new InvalidArgumentError(`Canonical integer at ${path} must be a non-negative safe integer`, {
                details: { path, value: item },
            });
        }
        return BigInt(item);
    }
    return item.map((child, index) => toRlpInput(child, `${path}[${index}]`));
}

function copyDecoded(value: DecodedItem): DecodedItem {
    if (value instanceof Uint8Array) {
        return new Uint8Array(value);
    }
    return value.map(copyDecoded);
}
