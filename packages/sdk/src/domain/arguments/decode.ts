import { bytesToUtf8, DecodeError } from "@flow-tx/helpers";
import { z } from "zod";

import { Argument } from "./Argument";
import { COMPOSITE_TYPES, STRING_VALUE_TYPES } from "./types";
import type { CadenceValue } from "./types";

export const cadenceValueSchema: z.ZodType<CadenceValue> = z.lazy(() =>
    z.union([
        z.object({ type: z.literal("Void") }),
        z.object({ type: z.literal("Bool"), value: z.boolean() }),
        z.object({ type: z.enum(STRING_VALUE_TYPES), value: z.string() }),
        z.object({ type: z.literal("Optional"), value: cadenceValueSchema.nullable() }),
        z.object({ type: z.literal("Array"), value: z.array(cadenceValueSchema) }),
        z.object({
            type: z.literal("Dictionary"),
            value: z.array(z.object({ key: cadenceValueSchema, value: cadenceValueSchema })),
        }),
        z.object({
            type: z.enum(COMPOSITE_TYPES),
            value: z.object({
                id: z.string(),
                fields: z.array(z.object({ name: z.string(), value: cadenceValueSchema })),
            }),
        }),
    ]),
);

/**
 * Parses a JSON value record, as returned in script results and event
 * payloads, back into an {@link Argument}.
 */
export function decodeArgument(input: Uint8Array | string): Argument {
    const text = typeof input === "string" ? input : bytesToUtf8(input);
    let json: unknown;
    try {
        json = JSON.parse(text);
    } catch (error) {
        throw new DecodeError("Argument is not valid JSON", { cause: error });
    }
    const parsed = cadenceValueSchema.safeParse(json);
    if (!parsed.success) {
        throw new DecodeError("Argument is not a valid value record", {
            details: { issues: parsed.error.issues },
        });
    }
    return Argument.fromValue(parsed.data);
}

/** Looks up a named field of a composite value (event, struct, resource). */
export function compositeField(value: CadenceValue, name: string): CadenceValue | undefined {
    switch (value.type) {
        case "Struct":
        case "Resource":
        case "Event":
        case "Contract":
        case "Enum":
            return value.value.fields.find((field) => field.name === name)?.value;
        default:
            return undefined;
    }
}
