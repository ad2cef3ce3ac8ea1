import { decodeAddress, DecodeError, hexToBytes, InvalidArgumentError, padLeft, utf8ToBytes } from "@flow-tx/helpers";
import type { AddressInput, BytesLike } from "@flow-tx/helpers";

import { Argument } from "../arguments";
import { REFERENCE_BLOCK_ID_LENGTH } from "./types";
import type { TransactionArgumentInput } from "./types";

const MAX_UINT32 = 0xffff_ffffn;
const MAX_UINT64 = 0xffff_ffff_ffff_ffffn;

export function parseScript(value: string | Uint8Array): Uint8Array {
    if (value instanceof Uint8Array) {
        return new Uint8Array(value);
    }
    return utf8ToBytes(value);
}

export function parseArguments(values: TransactionArgumentInput[] = []): Uint8Array[] {
    return values.map((value) => (value instanceof Argument ? value.encode() : new Uint8Array(value)));
}

/** Reference block ids shorter than 32 bytes are left-padded. */
export function parseReferenceBlockId(value: BytesLike): Uint8Array {
    if (value instanceof Uint8Array) {
        return padLeft(value, REFERENCE_BLOCK_ID_LENGTH, "Reference block id");
    }
    let bytes: Uint8Array;
    try {
        bytes = hexToBytes(value);
    } catch (err) {
        throw new DecodeError(`Reference block id is not valid hex: "${value}"`, { cause: err });
    }
    return padLeft(bytes, REFERENCE_BLOCK_ID_LENGTH, "Reference block id");
}

export function parseAddressList(values: AddressInput[], field: string): Uint8Array[] {
    return values.map((value, index) => decodeAddress(value, `${field}[${index}]`));
}

export function parseUint64(value: bigint | number, field: string): bigint {
    if (typeof value === "number" && !Number.isSafeInteger(value)) {
        throw new InvalidArgumentError(`${field} must be an integer, got ${value}`);
    }
    const parsed = BigInt(value);
    if (parsed < 0n || parsed > MAX_UINT64) {
        throw new InvalidArgumentError(`${field} must fit within uint64 range`, {
            details: { field, value: parsed.toString() },
        });
    }
    return parsed;
}

export function parseUint32(value: number, field: string): number {
    if (!Number.isSafeInteger(value) || value < 0 || BigInt(value) > MAX_UINT32) {
        throw new InvalidArgumentError(`${field} must fit within uint32 range`, {
            details: { field, value },
        });
    }
    return value;
}
