// src/utils/utils.ts

const HEX_TABLE = '0123456789abcdef';

/**
 * Concatenates an array of Uint8Arrays into a single Uint8Array.
 * @param arrays - An array of Uint8Arrays to concatenate.
 * @returns A new Uint8Array containing all elements from the input arrays.
 */
export function concatUint8Arrays(arrays: Uint8Array[]): Uint8Array {
  const totalLength: number = arrays.reduce((sum: number, arr: Uint8Array) => sum + arr.length, 0);
  const result: Uint8Array = new Uint8Array(totalLength);
  let offset: number = 0;
  for (const arr of arrays) {
    result.set(arr, offset);
    offset += arr.length;
  }
  return result;
}

/**
 * Converts a Uint8Array to a hex string (lookup table, no separators).
 */
export function toHex(uint8arr: Uint8Array): string {
  let hex = '';
  for (let i = 0; i < uint8arr.length; i++) {
    const b = uint8arr[i];
    hex += HEX_TABLE[(b >> 4) & 0xf] + HEX_TABLE[b & 0xf];
  }
  return hex;
}

/**
 * Packs booleans LSB-first into bytes, as coil and discrete input tables travel on the wire.
 */
export function packBits(values: readonly boolean[]): Uint8Array {
  const bytes = new Uint8Array(Math.ceil(values.length / 8));
  values.forEach((value, i) => {
    if (value) bytes[Math.floor(i / 8)] |= 1 << i % 8;
  });
  return bytes;
}

/**
 * Unpacks `count` LSB-first bits; padding bits of the last byte are ignored.
 */
export function unpackBits(bytes: Uint8Array, count: number): boolean[] {
  const values: boolean[] = [];
  for (let i = 0; i < count; i++) {
    values.push((bytes[Math.floor(i / 8)] & (1 << i % 8)) !== 0);
  }
  return values;
}
