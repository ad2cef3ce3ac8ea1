export const SIGNED_INTEGER_TYPES = ["Int", "Int8", "Int16", "Int32", "Int64", "Int128", "Int256"] as const;
export const UNSIGNED_INTEGER_TYPES = [
    "UInt",
    "UInt8",
    "UInt16",
    "UInt32",
    "UInt64",
    "UInt128",
    "UInt256",
    "Word8",
    "Word16",
    "Word32",
    "Word64",
] as const;
export const FIXED_POINT_TYPES = ["Fix64", "UFix64"] as const;
export const COMPOSITE_TYPES = ["Struct", "Resource", "Event", "Contract", "Enum"] as const;

export type SignedIntegerType = (typeof SIGNED_INTEGER_TYPES)[number];
export type UnsignedIntegerType = (typeof UNSIGNED_INTEGER_TYPES)[number];
export type IntegerType = SignedIntegerType | UnsignedIntegerType;
export type FixedPointType = (typeof FIXED_POINT_TYPES)[number];
export type CompositeType = (typeof COMPOSITE_TYPES)[number];

/** Types whose JSON value is a plain string. */
export const STRING_VALUE_TYPES = [
    "String",
    "Character",
    "Address",
    ...FIXED_POINT_TYPES,
    ...SIGNED_INTEGER_TYPES,
    ...UNSIGNED_INTEGER_TYPES,
] as const;
export type StringValueType = (typeof STRING_VALUE_TYPES)[number];

export interface DictionaryEntryValue {
    key: CadenceValue;
    value: CadenceValue;
}

export interface CompositeField {
    name: string;
    value: CadenceValue;
}

/**
 * Structured `{ type, value }` record consumed by the remote script
 * interpreter (JSON-Cadence).
 */
export type CadenceValue =
    | { type: "Void" }
    | { type: "Bool"; value: boolean }
    | { type: StringValueType; value: string }
    | { type: "Optional"; value: CadenceValue | null }
    | { type: "Array"; value: CadenceValue[] }
    | { type: "Dictionary"; value: DictionaryEntryValue[] }
    | { type: CompositeType; value: { id: string; fields: CompositeField[] } };

export type IntegerInput = number | bigint | string;
export type FixedPointInput = number | string;
