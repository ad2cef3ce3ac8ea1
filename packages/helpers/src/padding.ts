import { EncodingOverflowError } from "./errors";

/**
 * Fixed-width field padding.
 *
 * Both functions return a fresh array of exactly `width` bytes and never
 * truncate: an input wider than `width` is a caller bug and throws
 * {@link EncodingOverflowError}.
 */

function checkWidth(bytes: Uint8Array, width: number, field: string): void {
  if (!Number.isInteger(width) || width < 0) {
    throw new RangeError(`Padding width must be a non-negative integer (got ${width})`);
  }
  if (bytes.length > width) {
    throw new EncodingOverflowError(`${field} is ${bytes.length} bytes, wider than its ${width}-byte field`, {
      details: { field, width, actual: bytes.length },
    });
  }
}

/** Big-endian zero extension: zeros go in front, the input ends the result. */
export function padLeft(bytes: Uint8Array, width: number, field = "Value"): Uint8Array {
  checkWidth(bytes, width, field);
  const out = new Uint8Array(width);
  out.set(bytes, width - bytes.length);
  return out;
}

/** Zeros go after the input. Used for tag-style fields such as the signing domain tag. */
export function padRight(bytes: Uint8Array, width: number, field = "Value"): Uint8Array {
  checkWidth(bytes, width, field);
  const out = new Uint8Array(width);
  out.set(bytes, 0);
  return out;
}
