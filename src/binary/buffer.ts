/**
 * Accept raw bytes in either of the shapes callers usually hold them
 */
export function toUint8Array(input: Uint8Array | ArrayBuffer): Uint8Array {
  return input instanceof Uint8Array ? input : new Uint8Array(input);
}

/**
 * Check if data starts with a specific pattern
 */
export function startsWith(data: Uint8Array, pattern: Uint8Array | number[]): boolean {
  const patternArray = pattern instanceof Uint8Array ? pattern : new Uint8Array(pattern);
  if (data.length < patternArray.length) {
    return false;
  }
  for (let i = 0; i < patternArray.length; i++) {
    if (data[i] !== patternArray[i]) {
      return false;
    }
  }
  return true;
}

/**
 * Byte-wise equality of two arrays
 */
export function equals(a: Uint8Array, b: Uint8Array): boolean {
  return a.length === b.length && startsWith(a, b);
}

/**
 * Concatenate multiple Uint8Arrays
 */
export function concat(...arrays: Uint8Array[]): Uint8Array {
  const totalLength = arrays.reduce((sum, arr) => sum + arr.length, 0);
  const result = new Uint8Array(totalLength);
  let offset = 0;
  for (const arr of arrays) {
    result.set(arr, offset);
    offset += arr.length;
  }
  return result;
}

/**
 * A-Z or a-z
 */
export function isAsciiLetter(byte: number): boolean {
  return (byte >= 0x41 && byte <= 0x5a) || (byte >= 0x61 && byte <= 0x7a);
}

/**
 * Convert a string to Uint8Array using ASCII encoding
 */
export function fromAscii(str: string): Uint8Array {
  const bytes = new Uint8Array(str.length);
  for (let i = 0; i < str.length; i++) {
    bytes[i] = str.charCodeAt(i) & 0xff;
  }
  return bytes;
}

/**
 * Convert Uint8Array to ASCII string
 */
export function toAscii(data: Uint8Array, offset = 0, length?: number): string {
  const end = length !== undefined ? offset + length : data.length;
  let result = '';
  for (let i = offset; i < end && i < data.length; i++) {
    result += String.fromCharCode(data[i]!);
  }
  return result;
}
