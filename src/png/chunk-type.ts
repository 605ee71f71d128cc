import { InvalidTypeCodeError } from '../errors.js';
import { isAsciiLetter, toAscii } from '../binary/buffer.js';

export const CHUNK_TYPE_LENGTH = 4;

/**
 * Bit 5 of each type byte: clear for uppercase letters, set for lowercase.
 */
const PROPERTY_BIT = 0x20;

/**
 * A 4-byte PNG chunk type code.
 *
 * The case of each letter carries one property bit:
 *
 * | byte | bit clear (uppercase) | bit set (lowercase) |
 * |------|-----------------------|---------------------|
 * | 0    | critical              | ancillary           |
 * | 1    | public                | private             |
 * | 2    | reserved, conforming  | reserved, invalid   |
 * | 3    | unsafe to copy        | safe to copy        |
 */
export class ChunkType {
  private readonly bytes: Uint8Array;

  private constructor(bytes: Uint8Array) {
    this.bytes = bytes;
  }

  /**
   * Wrap 4 raw bytes. The bytes are stored verbatim, letters or not;
   * use `isValid()` to check conformance.
   */
  static fromBytes(bytes: Uint8Array | readonly number[]): ChunkType {
    if (bytes.length !== CHUNK_TYPE_LENGTH) {
      const text = bytes instanceof Uint8Array ? toAscii(bytes) : String.fromCharCode(...bytes);
      throw new InvalidTypeCodeError(text, `length must be 4, got ${bytes.length}`);
    }
    return new ChunkType(Uint8Array.from(bytes, b => b & 0xff));
  }

  /**
   * Parse a textual type code such as `IHDR` or `stEg`.
   */
  static fromString(text: string): ChunkType {
    if (text.length !== CHUNK_TYPE_LENGTH) {
      throw new InvalidTypeCodeError(text, `length must be 4, got ${text.length}`);
    }
    for (let i = 0; i < text.length; i++) {
      const code = text.charCodeAt(i);
      if (!ChunkType.isValidByte(code)) {
        throw new InvalidTypeCodeError(text, `character ${JSON.stringify(text[i])} is not an ASCII letter`);
      }
    }
    return new ChunkType(Uint8Array.from(text, ch => ch.charCodeAt(0)));
  }

  static isValidByte(byte: number): boolean {
    return isAsciiLetter(byte);
  }

  private bitClear(index: number): boolean {
    return (this.bytes[index]! & PROPERTY_BIT) === 0;
  }

  isCritical(): boolean {
    return this.bitClear(0);
  }

  isPublic(): boolean {
    return this.bitClear(1);
  }

  isReservedBitValid(): boolean {
    return this.bitClear(2);
  }

  isSafeToCopy(): boolean {
    return !this.bitClear(3);
  }

  /**
   * Conforming codes are four letters with the reserved bit clear.
   */
  isValid(): boolean {
    return this.bytes.every(b => ChunkType.isValidByte(b)) && this.isReservedBitValid();
  }

  toBytes(): Uint8Array {
    return this.bytes.slice();
  }

  toString(): string {
    return toAscii(this.bytes);
  }

  equals(other: ChunkType | string): boolean {
    return this.compare(other) === 0;
  }

  /**
   * Byte-wise ordering, so uppercase sorts before lowercase.
   */
  compare(other: ChunkType | string): number {
    const a = this.toString();
    const b = typeof other === 'string' ? other : other.toString();
    if (a === b) {
      return 0;
    }
    return a < b ? -1 : 1;
  }
}
