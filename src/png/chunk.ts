import { CrcMismatchError, InvalidTypeCodeError, InvalidUtf8Error, UnexpectedEofError } from '../errors.js';
import * as buffer from '../binary/buffer.js';
import * as dataview from '../binary/dataview.js';
import { chunkCrc } from '../binary/crc32.js';
import { ChunkType, CHUNK_TYPE_LENGTH } from './chunk-type.js';

/**
 * Bytes around the data: length (4) + type (4) + CRC (4)
 */
export const CHUNK_OVERHEAD = 12;

const utf8Decoder = new TextDecoder('utf-8', { fatal: true });
const utf8Encoder = new TextEncoder();

/**
 * One length-prefixed, type-tagged, CRC-checked unit of a PNG stream.
 *
 * On the wire:
 * ```
 * [4] length L (big-endian)   [4] type   [L] data   [4] CRC over type + data
 * ```
 */
export class Chunk {
  readonly type: ChunkType;
  readonly crc: number;
  private readonly bytes: Uint8Array;

  /**
   * The data is copied and the CRC computed from it.
   */
  constructor(type: ChunkType, data: Uint8Array) {
    this.type = type;
    this.bytes = data.slice();
    this.crc = chunkCrc(type.toBytes(), this.bytes);
  }

  /**
   * Build a chunk whose data is the UTF-8 encoding of `text`.
   */
  static fromText(typeCode: string | ChunkType, text: string): Chunk {
    const type = typeof typeCode === 'string' ? ChunkType.fromString(typeCode) : typeCode;
    return new Chunk(type, utf8Encoder.encode(text));
  }

  /**
   * Parse the chunk that starts at `offset`. Bytes past the chunk are left
   * alone; advance by `byteLength` to reach the next one.
   */
  static parse(data: Uint8Array, offset = 0): Chunk {
    const length = dataview.readUint32BE(data, offset);
    const available = Math.max(0, data.length - offset);
    if (CHUNK_OVERHEAD + length > available) {
      throw new UnexpectedEofError(offset, CHUNK_OVERHEAD + length, available);
    }

    const typeStart = offset + 4;
    const typeBytes = data.subarray(typeStart, typeStart + CHUNK_TYPE_LENGTH);
    const dataStart = typeStart + CHUNK_TYPE_LENGTH;
    const chunk = new Chunk(ChunkType.fromBytes(typeBytes), data.subarray(dataStart, dataStart + length));

    // Corruption anywhere in type or data surfaces as a CRC mismatch.
    const stored = dataview.readUint32BE(data, dataStart + length);
    if (stored !== chunk.crc) {
      throw new CrcMismatchError(chunk.type.toString(), stored, chunk.crc);
    }

    const badIndex = typeBytes.findIndex(b => !ChunkType.isValidByte(b));
    if (badIndex !== -1) {
      throw new InvalidTypeCodeError(
        buffer.toAscii(typeBytes),
        `byte 0x${typeBytes[badIndex]!.toString(16).padStart(2, '0')} at offset ${typeStart + badIndex} is not an ASCII letter`
      );
    }

    return chunk;
  }

  /**
   * Number of data bytes
   */
  get length(): number {
    return this.bytes.length;
  }

  /**
   * Size of the serialized chunk
   */
  get byteLength(): number {
    return this.bytes.length + CHUNK_OVERHEAD;
  }

  /**
   * A copy of the data bytes
   */
  get data(): Uint8Array {
    return this.bytes.slice();
  }

  /**
   * Decode the data as UTF-8. Meant for showing message payloads, not for
   * deciding anything about the file.
   */
  dataAsString(): string {
    try {
      return utf8Decoder.decode(this.bytes);
    } catch (err) {
      if (err instanceof TypeError) {
        throw new InvalidUtf8Error(this.type.toString());
      }
      throw err;
    }
  }

  serialize(): Uint8Array {
    const length = this.bytes.length;
    const result = new Uint8Array(CHUNK_OVERHEAD + length);
    dataview.writeUint32BE(result, 0, length);
    result.set(this.type.toBytes(), 4);
    result.set(this.bytes, 8);
    dataview.writeUint32BE(result, 8 + length, this.crc);
    return result;
  }

  equals(other: Chunk): boolean {
    return this.type.equals(other.type) && this.crc === other.crc && buffer.equals(this.bytes, other.bytes);
  }

  toString(): string {
    return `${this.type.toString()} (${this.length} bytes, crc 0x${this.crc.toString(16).padStart(8, '0')})`;
  }
}
