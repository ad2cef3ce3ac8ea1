import { DecodeError } from "./errors";

const textEncoder = new TextEncoder();
const textDecoder = new TextDecoder("utf-8", { fatal: true });

export function stripHexPrefix(value: string): string {
  return value.startsWith('0x') || value.startsWith('0X') ? value.slice(2) : value;
}

export function hexToBytes(value: string): Uint8Array {
  const normalized = stripHexPrefix(value);
  if (normalized.length % 2 !== 0) {
    throw new DecodeError('Hex string must contain an even number of characters', {
      details: { length: normalized.length },
    });
  }
  if (!/^[0-9a-fA-F]*$/.test(normalized)) {
    throw new DecodeError('Hex string contains invalid characters');
  }
  const bytes = new Uint8Array(normalized.length / 2);
  for (let i = 0; i < normalized.length; i += 2) {
    bytes[i / 2] = parseInt(normalized.slice(i, i + 2), 16);
  }
  return bytes;
}

export function isHexString(value: string): boolean {
  const normalized = stripHexPrefix(value);
  return normalized.length % 2 === 0 && normalized.length > 0 && /^[0-9a-fA-F]+$/.test(normalized);
}

export function bytesToHex(bytes: Uint8Array): string {
  const hex: string[] = new Array(bytes.length);
  for (let i = 0; i < bytes.length; i++) {
    hex[i] = bytes[i].toString(16).padStart(2, '0');
  }
  return hex.join('');
}

export function utf8ToBytes(value: string): Uint8Array {
  return textEncoder.encode(value);
}

export function bytesToUtf8(bytes: Uint8Array): string {
  try {
    return textDecoder.decode(bytes);
  } catch (err) {
    throw new DecodeError('Bytes are not valid UTF-8', { cause: err });
  }
}
