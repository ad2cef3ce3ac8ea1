import { DecodeError } from "./errors";
import { bytesToHex, hexToBytes } from "./encoding";
import { padLeft } from "./padding";

export const ADDRESS_LENGTH = 8;

export type AddressInput = Uint8Array | string;

/**
 * Decodes a hex account address (with or without `0x`) into its canonical
 * 8-byte form. Short addresses are left-padded with zeros.
 */
export function decodeAddress(value: AddressInput, field = "Address"): Uint8Array {
  if (value instanceof Uint8Array) {
    return padLeft(value, ADDRESS_LENGTH, field);
  }
  let bytes: Uint8Array;
  try {
    bytes = hexToBytes(value);
  } catch (err) {
    throw new DecodeError(`${field} is not valid hex: "${value}"`, { cause: err });
  }
  if (bytes.length === 0) {
    throw new DecodeError(`${field} cannot be empty`);
  }
  return padLeft(bytes, ADDRESS_LENGTH, field);
}

export function encodeAddress(bytes: Uint8Array): string {
  return `0x${bytesToHex(padLeft(bytes, ADDRESS_LENGTH, "Address"))}`;
}
