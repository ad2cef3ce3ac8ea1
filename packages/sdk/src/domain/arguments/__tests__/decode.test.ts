import { DecodeError, utf8ToBytes } from "@flow-tx/helpers";
import { describe, expect, it } from "vitest";

import { Argument } from "../Argument";
import { compositeField, decodeArgument } from "../decode";

const ACCOUNT_CREATED_EVENT = JSON.stringify({
  type: "Event",
  value: {
    id: "flow.AccountCreated",
    fields: [{ name: "address", value: { type: "Address", value: "0x01cf0e2f2f715450" } }],
  },
});

describe("decodeArgument", () => {
  it("should decode what an argument encodes", () => {
    const original = Argument.dictionary([["amount", Argument.ufix64("12.5")]]);
    const decoded = decodeArgument(original.encode());
    expect(decoded.toJSON()).toEqual(original.toJSON());
  });

  it("should decode event payloads from a string", () => {
    const decoded = decodeArgument(ACCOUNT_CREATED_EVENT);
    expect(decoded.type).toBe("Event");
    expect(compositeField(decoded.toJSON(), "address")).toEqual({
      type: "Address",
      value: "0x01cf0e2f2f715450",
    });
    expect(compositeField(decoded.toJSON(), "missing")).toBeUndefined();
  });

  it("should return undefined for fields of non-composite values", () => {
    expect(compositeField(Argument.string("x").toJSON(), "address")).toBeUndefined();
  });

  it("should reject invalid JSON", () => {
    expect(() => decodeArgument(utf8ToBytes("{not json"))).toThrow("Argument is not valid JSON");
  });

  it("should reject records of unknown shape", () => {
    expect(() => decodeArgument('{"type":"Bool","value":"yes"}')).toThrow(DecodeError);
    expect(() => decodeArgument('{"type":"Mystery","value":1}')).toThrow(
      "Argument is not a valid value record",
    );
  });
});
