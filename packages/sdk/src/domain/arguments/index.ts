export { Argument } from "./Argument";
export type { DictionaryEntryInput, DictionaryKeyInput } from "./Argument";
export { cadenceValueSchema, compositeField, decodeArgument } from "./decode";
export { formatFixedPoint, formatInteger } from "./numbers";
export {
    COMPOSITE_TYPES,
    FIXED_POINT_TYPES,
    SIGNED_INTEGER_TYPES,
    STRING_VALUE_TYPES,
    UNSIGNED_INTEGER_TYPES,
} from "./types";
export type {
    CadenceValue,
    CompositeField,
    CompositeType,
    DictionaryEntryValue,
    FixedPointInput,
    FixedPointType,
    IntegerInput,
    IntegerType,
    SignedIntegerType,
    StringValueType,
    UnsignedIntegerType,
} from "./types";
