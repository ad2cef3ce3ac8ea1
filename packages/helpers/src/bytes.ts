export type BytesLike = Uint8Array | string;

export function copyBytes(source: Uint8Array): Uint8Array {
  const bytes = new Uint8Array(source.length);
  bytes.set(source);
  return bytes;
}

export function concatBytes(...arrays: Uint8Array[]): Uint8Array {
  const total = arrays.reduce((sum, arr) => sum + arr.length, 0);
  const result = new Uint8Array(total);
  let offset = 0;
  for (const arr of arrays) {
    result.set(arr, offset);
    offset += arr.length;
  }
  return result;
}
