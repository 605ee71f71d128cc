import { UnexpectedEofError } from '../errors.js';

function ensureAvailable(data: Uint8Array, offset: number, size: number): void {
  if (offset < 0 || offset + size > data.length) {
    throw new UnexpectedEofError(offset, size, Math.max(0, data.length - offset));
  }
}

/**
 * Read an unsigned 32-bit integer (big-endian)
 */
export function readUint32BE(data: Uint8Array, offset: number): number {
  ensureAvailable(data, offset, 4);
  return (
    ((data[offset]! << 24) >>> 0) +
    (data[offset + 1]! << 16) +
    (data[offset + 2]! << 8) +
    data[offset + 3]!
  );
}

/**
 * Write an unsigned 32-bit integer (big-endian)
 */
export function writeUint32BE(data: Uint8Array, offset: number, value: number): void {
  ensureAvailable(data, offset, 4);
  data[offset] = (value >>> 24) & 0xff;
  data[offset + 1] = (value >> 16) & 0xff;
  data[offset + 2] = (value >> 8) & 0xff;
  data[offset + 3] = value & 0xff;
}
