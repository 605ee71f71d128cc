import { InvalidSignatureError, MissingEndChunkError, ChunkNotFoundError, ProtectedChunkError } from '../errors.js';
import * as buffer from '../binary/buffer.js';
import { PNG_SIGNATURE, CHUNK_TYPES } from '../signatures.js';
import { Chunk } from './chunk.js';
import type { ChunkType } from './chunk-type.js';

/**
 * A PNG byte stream as its signature and an ordered list of chunks.
 *
 * Parsed instances hold exactly one IEND, as their last chunk, and
 * `appendChunk` keeps it there.
 * Chunks are otherwise kept in file order and never interpreted.
 */
export class Png {
  private readonly chunkList: Chunk[];

  private constructor(chunks: Chunk[]) {
    this.chunkList = chunks;
  }

  /**
   * Compose a PNG from chunks. No IEND check happens here; `appendChunk`
   * reports a missing one.
   */
  static fromChunks(chunks: Iterable<Chunk>): Png {
    return new Png([...chunks]);
  }

  static parse(input: Uint8Array | ArrayBuffer): Png {
    const data = buffer.toUint8Array(input);
    if (!buffer.startsWith(data, PNG_SIGNATURE)) {
      throw new InvalidSignatureError();
    }

    const chunks: Chunk[] = [];
    let offset = PNG_SIGNATURE.length;
    let ended = false;
    while (offset < data.length) {
      const chunk = Chunk.parse(data, offset);
      chunks.push(chunk);
      offset += chunk.byteLength;
      if (chunk.type.equals(CHUNK_TYPES.END)) {
        ended = true;
        break;
      }
    }

    if (!ended) {
      const last = chunks[chunks.length - 1];
      throw new MissingEndChunkError(
        last === undefined
          ? 'Invalid PNG: no chunks after signature'
          : `Invalid PNG: last chunk is ${last.type.toString()}, expected IEND`
      );
    }
    if (offset < data.length) {
      throw new MissingEndChunkError(
        `Invalid PNG: ${data.length - offset} bytes after IEND chunk`
      );
    }

    return new Png(chunks);
  }

  /**
   * The 8 signature bytes
   */
  get header(): Uint8Array {
    return PNG_SIGNATURE.slice();
  }

  get chunkCount(): number {
    return this.chunkList.length;
  }

  chunks(): readonly Chunk[] {
    return [...this.chunkList];
  }

  /**
   * First chunk of the given type, if any
   */
  chunkByType(typeCode: string | ChunkType): Chunk | undefined {
    return this.chunkList.find(c => c.type.equals(typeCode));
  }

  /**
   * Every chunk of the given type, in file order
   */
  chunksByType(typeCode: string | ChunkType): Chunk[] {
    return this.chunkList.filter(c => c.type.equals(typeCode));
  }

  /**
   * Insert a chunk immediately before the first IEND.
   */
  appendChunk(chunk: Chunk): void {
    if (chunk.type.equals(CHUNK_TYPES.END)) {
      throw new ProtectedChunkError(CHUNK_TYPES.END, 'append');
    }
    const endIdx = this.chunkList.findIndex(c => c.type.equals(CHUNK_TYPES.END));
    if (endIdx === -1) {
      throw new MissingEndChunkError();
    }
    this.chunkList.splice(endIdx, 0, chunk);
  }

  /**
   * Remove and return the first chunk of the given type. IEND is never removed.
   */
  removeChunkByType(typeCode: string | ChunkType): Chunk {
    const code = typeof typeCode === 'string' ? typeCode : typeCode.toString();
    if (code === CHUNK_TYPES.END) {
      throw new ProtectedChunkError(code);
    }
    const idx = this.chunkList.findIndex(c => c.type.equals(code));
    if (idx === -1) {
      throw new ChunkNotFoundError(code);
    }
    const [removed] = this.chunkList.splice(idx, 1);
    if (removed === undefined) {
      throw new ChunkNotFoundError(code);
    }
    return removed;
  }

  serialize(): Uint8Array {
    return buffer.concat(PNG_SIGNATURE, ...this.chunkList.map(c => c.serialize()));
  }

  equals(other: Png): boolean {
    return (
      this.chunkList.length === other.chunkList.length &&
      this.chunkList.every((c, i) => c.equals(other.chunkList[i]!))
    );
  }

  toString(): string {
    return ['PNG', ...this.chunkList.map(c => `  ${c.toString()}`)].join('\n');
  }
}
