import { InvalidArgumentError } from "@flow-tx/helpers";

import type { FixedPointInput, FixedPointType, IntegerInput, IntegerType } from "./types";

const FIXED_POINT_DECIMALS = 8;
const FIXED_POINT_SCALE = 10n ** BigInt(FIXED_POINT_DECIMALS);
const DECIMAL_PATTERN = /^-?\d+(\.\d+)?$/;
const INTEGER_PATTERN = /^-?\d+$/;

/** Bounds on the scaled (value * 10^8) representation. */
const FIXED_POINT_RANGES: Record<FixedPointType, { min: bigint; max: bigint }> = {
    UFix64: { min: 0n, max: (1n << 64n) - 1n },
    Fix64: { min: -(1n << 63n), max: (1n << 63n) - 1n },
};

function signedRange(bits: bigint): { min: bigint; max: bigint } {
    return { min: -(1n << (bits - 1n)), max: (1n << (bits - 1n)) - 1n };
}

function unsignedRange(bits: bigint): { min: bigint; max: bigint } {
    return { min: 0n, max: (1n << bits) - 1n };
}

const INTEGER_RANGES: Record<IntegerType, { min?: bigint; max?: bigint }> = {
    Int: {},
    Int8: signedRange(8n),
    Int16: signedRange(16n),
    Int32: signedRange(32n),
    Int64: signedRange(64n),
    Int128: signedRange(128n),
    Int256: signedRange(256n),
    UInt: { min: 0n },
    UInt8: unsignedRange(8n),
    UInt16: unsignedRange(16n),
    UInt32: unsignedRange(32n),
    UInt64: unsignedRange(64n),
    UInt128: unsignedRange(128n),
    UInt256: unsignedRange(256n),
    Word8: unsignedRange(8n),
    Word16: unsignedRange(16n),
    Word32: unsignedRange(32n),
    Word64: unsignedRange(64n),
};

function parseInteger(type: IntegerType, value: IntegerInput): bigint {
    if (typeof value === "bigint") {
        return value;
    }
    if (typeof value === "number") {
        if (!Number.isSafeInteger(value)) {
            throw new InvalidArgumentError(`${type} value must be a safe integer, got ${value}`);
        }
        return BigInt(value);
    }
    if (!INTEGER_PATTERN.test(value)) {
        throw new InvalidArgumentError(`${type} value must be a decimal integer string, got "${value}"`);
    }
    return BigInt(value);
}

/** Range-checks an integer and renders it as the decimal string the interpreter expects. */
export function formatInteger(type: IntegerType, value: IntegerInput): string {
    const parsed = parseInteger(type, value);
    const { min, max } = INTEGER_RANGES[type];
    if ((min !== undefined && parsed < min) || (max !== undefined && parsed > max)) {
        throw new InvalidArgumentError(`${type} value ${parsed} is out of range`, {
            details: { type, value: parsed.toString() },
        });
    }
    return parsed.toString();
}

function decimalStringFor(type: FixedPointType, value: FixedPointInput): string {
    if (typeof value === "string") {
        return value;
    }
    if (!Number.isFinite(value)) {
        throw new InvalidArgumentError(`${type} value must be finite, got ${value}`);
    }
    if (type === "UFix64" && value < 0) {
        throw negativeUFix64(value);
    }
    if (Math.abs(value) >= 1e21) {
        throw new InvalidArgumentError(`${type} value ${value} is out of range`);
    }
    // toFixed never uses exponent notation below 1e21.
    const text = value.toFixed(FIXED_POINT_DECIMALS);
    if (Number(text) !== value) {
        throw new InvalidArgumentError(`${type} value ${value} has more than ${FIXED_POINT_DECIMALS} decimal places`);
    }
    return text;
}

function negativeUFix64(value: FixedPointInput): InvalidArgumentError {
    return new InvalidArgumentError(`UFix64 value cannot be negative, got ${String(value)}`, {
        details: { type: "UFix64", value: String(value) },
    });
}

function parseScaled(type: FixedPointType, text: string): bigint {
    if (!DECIMAL_PATTERN.test(text)) {
        throw new InvalidArgumentError(`${type} value must be a decimal string, got "${text}"`);
    }
    const negative = text.startsWith("-");
    const unsigned = negative ? text.slice(1) : text;
    const [whole, fraction = ""] = unsigned.split(".");
    if (fraction.length > FIXED_POINT_DECIMALS) {
        throw new InvalidArgumentError(
            `${type} value "${text}" has more than ${FIXED_POINT_DECIMALS} decimal places`,
        );
    }
    const scaled = BigInt(whole) * FIXED_POINT_SCALE + BigInt(fraction.padEnd(FIXED_POINT_DECIMALS, "0"));
    return negative ? -scaled : scaled;
}

function renderScaled(scaled: bigint): string {
    const negative = scaled < 0n;
    const magnitude = negative ? -scaled : scaled;
    const whole = magnitude / FIXED_POINT_SCALE;
    const fraction = (magnitude % FIXED_POINT_SCALE)
        .toString()
        .padStart(FIXED_POINT_DECIMALS, "0")
        .replace(/0+$/, "");
    const body = fraction.length > 0 ? `${whole}.${fraction}` : whole.toString();
    return negative ? `-${body}` : body;
}

/**
 * Validates a fixed-point value and renders it as a decimal string with at
 * most 8 fractional digits, trailing zeros trimmed (`0` -> `"0"`, `1.50` -> `"1.5"`).
 */
export function formatFixedPoint(type: FixedPointType, value: FixedPointInput): string {
    const text = decimalStringFor(type, value);
    if (type === "UFix64" && text.startsWith("-")) {
        throw negativeUFix64(value);
    }
    const scaled = parseScaled(type, text);
    const { min, max } = FIXED_POINT_RANGES[type];
    if (scaled < min || scaled > max) {
        throw new InvalidArgumentError(`${type} value ${String(value)} is out of range`, {
            details: { type, value: String(value) },
        });
    }
    return renderScaled(scaled);
}
