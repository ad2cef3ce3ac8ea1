import { decodeAddress, encodeAddress, InvalidArgumentError, utf8ToBytes } from "@flow-tx/helpers";
import type { AddressInput } from "@flow-tx/helpers";

import { formatFixedPoint, formatInteger } from "./numbers";
import type { CadenceValue, FixedPointInput, IntegerInput, IntegerType } from "./types";

export type DictionaryKeyInput = Argument | string;
export type DictionaryEntryInput = readonly [DictionaryKeyInput, DictionaryKeyInput];

function asArgument(value: DictionaryKeyInput): Argument {
    return typeof value === "string" ? Argument.string(value) : value;
}

/**
 * A typed transaction argument. Serialises to the JSON value format read by
 * the script interpreter; independent of the canonical (RLP) encoder.
 */
export class Argument {
    private readonly value: CadenceValue;

    private constructor(value: CadenceValue) {
        this.value = value;
    }

    static fromValue(value: CadenceValue): Argument {
        return new Argument(value);
    }

    static boolean(value: boolean): Argument {
        return new Argument({ type: "Bool", value });
    }

    static string(value: string): Argument {
        return new Argument({ type: "String", value });
    }

    static character(value: string): Argument {
        if (Array.from(value).length !== 1) {
            throw new InvalidArgumentError(`Character value must be a single character, got "${value}"`);
        }
        return new Argument({ type: "Character", value });
    }

    static address(value: AddressInput): Argument {
        return new Argument({ type: "Address", value: encodeAddress(decodeAddress(value)) });
    }

    static ufix64(value: FixedPointInput): Argument {
        return new Argument({ type: "UFix64", value: formatFixedPoint("UFix64", value) });
    }

    static fix64(value: FixedPointInput): Argument {
        return new Argument({ type: "Fix64", value: formatFixedPoint("Fix64", value) });
    }

    static integer(type: IntegerType, value: IntegerInput): Argument {
        return new Argument({ type, value: formatInteger(type, value) });
    }

    static int(value: IntegerInput): Argument {
        return Argument.integer("Int", value);
    }

    static uint(value: IntegerInput): Argument {
        return Argument.integer("UInt", value);
    }

    static int64(value: IntegerInput): Argument {
        return Argument.integer("Int64", value);
    }

    static uint64(value: IntegerInput): Argument {
        return Argument.integer("UInt64", value);
    }

    static array(values: readonly Argument[]): Argument {
        return new Argument({ type: "Array", value: values.map((item) => item.toJSON()) });
    }

    /** Entries keep their input order. Plain strings become String values. */
    static dictionary(entries: readonly DictionaryEntryInput[]): Argument {
        return new Argument({
            type: "Dictionary",
            value: entries.map(([key, value]) => ({
                key: asArgument(key).toJSON(),
                value: asArgument(value).toJSON(),
            })),
        });
    }

    static optional(value: Argument | null): Argument {
        return new Argument({ type: "Optional", value: value === null ? null : value.toJSON() });
    }

    static void(): Argument {
        return new Argument({ type: "Void" });
    }

    get type(): CadenceValue["type"] {
        return this.value.type;
    }

    toJSON(): CadenceValue {
        return structuredClone(this.value);
    }

    encode(): Uint8Array {
        return utf8ToBytes(JSON.stringify(this.value));
    }
}
