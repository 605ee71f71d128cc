import { describe, it, expect } from 'vitest';
import { Png } from '../../src/png/png.js';
import { Chunk } from '../../src/png/chunk.js';
import { ChunkType } from '../../src/png/chunk-type.js';
import {
  ChunkNotFoundError,
  CrcMismatchError,
  InvalidSignatureError,
  MissingEndChunkError,
  ProtectedChunkError,
  UnexpectedEofError,
} from '../../src/errors.js';
import {
  SIGNATURE,
  IHDR_DATA,
  IDAT_DATA,
  rawChunk,
  buildPng,
  createMinimalPng,
} from '../helpers/create-test-png.js';

function chunk(type: string, data: number[] = []): Chunk {
  return new Chunk(ChunkType.fromString(type), new Uint8Array(data));
}

function typesOf(png: Png): string[] {
  return png.chunks().map(c => c.type.toString());
}

function minimalPng(): Png {
  return Png.fromChunks([chunk('IHDR', IHDR_DATA), chunk('IDAT', IDAT_DATA), chunk('IEND')]);
}

describe('Png', () => {
  describe('parse', () => {
    it('should read every chunk in file order', () => {
      const png = Png.parse(createMinimalPng());
      expect(typesOf(png)).toEqual(['IHDR', 'IDAT', 'IEND']);
      expect(png.chunkCount).toBe(3);
    });

    it('should accept an ArrayBuffer', () => {
      const bytes = createMinimalPng();
      const arrayBuffer = new ArrayBuffer(bytes.length);
      new Uint8Array(arrayBuffer).set(bytes);
      expect(typesOf(Png.parse(arrayBuffer))).toEqual(['IHDR', 'IDAT', 'IEND']);
    });

    it('should preserve chunk data', () => {
      const png = Png.parse(createMinimalPng());
      expect(Array.from(png.chunkByType('IHDR')?.data ?? [])).toEqual(IHDR_DATA);
    });

    it('should reject data without the PNG signature', () => {
      const bytes = createMinimalPng();
      bytes[0] = 0x88;
      expect(() => Png.parse(bytes)).toThrow(InvalidSignatureError);
    });

    it('should check the signature before anything else', () => {
      const garbage = new Uint8Array([0x47, 0x49, 0x46, 0x38, 0x39, 0x61, 0x00, 0x00, 0xff, 0xff]);
      expect(() => Png.parse(garbage)).toThrow(InvalidSignatureError);
    });

    it('should reject input shorter than the signature', () => {
      expect(() => Png.parse(new Uint8Array([0x89, 0x50]))).toThrow(InvalidSignatureError);
    });

    it('should reject a signature with no chunks', () => {
      expect(() => Png.parse(new Uint8Array(SIGNATURE))).toThrow(
        'Invalid PNG: no chunks after signature'
      );
    });

    it('should reject a stream that does not end with IEND', () => {
      const bytes = buildPng(rawChunk('IHDR', IHDR_DATA), rawChunk('IDAT', IDAT_DATA));
      expect(() => Png.parse(bytes)).toThrow(MissingEndChunkError);
      expect(() => Png.parse(bytes)).toThrow('Invalid PNG: last chunk is IDAT, expected IEND');
    });

    it('should reject chunks after IEND', () => {
      const bytes = buildPng(rawChunk('IHDR', IHDR_DATA), rawChunk('IEND'), rawChunk('IDAT', IDAT_DATA));
      expect(() => Png.parse(bytes)).toThrow(MissingEndChunkError);
    });

    it('should fail when a chunk length exceeds the remaining bytes', () => {
      const truncated = rawChunk('IDAT', IDAT_DATA).subarray(0, 14);
      const bytes = buildPng(rawChunk('IHDR', IHDR_DATA), truncated);
      expect(() => Png.parse(bytes)).toThrow(UnexpectedEofError);
    });

    it('should reject a second IEND', () => {
      const bytes = buildPng(rawChunk('IHDR', IHDR_DATA), rawChunk('IEND'), rawChunk('IEND'));
      expect(() => Png.parse(bytes)).toThrow(MissingEndChunkError);
      expect(() => Png.parse(bytes)).toThrow('Invalid PNG: 12 bytes after IEND chunk');
    });

    it('should stop at the first IEND before reading what follows', () => {
      // The trailing chunk has a bad CRC; it is never parsed.
      const bytes = buildPng(rawChunk('IHDR', IHDR_DATA), rawChunk('IEND'), rawChunk('teSt', [0x61], 0));
      expect(() => Png.parse(bytes)).toThrow(MissingEndChunkError);
    });

    it('should fail on stray bytes after IEND', () => {
      const bytes = new Uint8Array([...createMinimalPng(), 0x00, 0x00]);
      expect(() => Png.parse(bytes)).toThrow('Invalid PNG: 2 bytes after IEND chunk');
    });

    it('should propagate CRC errors from chunks', () => {
      const bytes = createMinimalPng(rawChunk('teSt', [0x68, 0x69], 0x12345678));
      expect(() => Png.parse(bytes)).toThrow(CrcMismatchError);
    });
  });

  describe('serialize', () => {
    it('should reproduce the parsed bytes exactly', () => {
      const bytes = createMinimalPng(rawChunk('teSt', [0x68, 0x69]));
      expect(Array.from(Png.parse(bytes).serialize())).toEqual(Array.from(bytes));
    });

    it('should round-trip through parse', () => {
      const png = minimalPng();
      expect(Png.parse(png.serialize()).equals(png)).toBe(true);
    });

    it('should start with the signature', () => {
      const png = minimalPng();
      expect(Array.from(png.serialize().subarray(0, 8))).toEqual(SIGNATURE);
      expect(Array.from(png.header)).toEqual(SIGNATURE);
    });
  });

  describe('appendChunk', () => {
    it('should insert immediately before IEND', () => {
      const png = minimalPng();
      png.appendChunk(chunk('ruSt', [1, 2, 3]));
      expect(typesOf(png)).toEqual(['IHDR', 'IDAT', 'ruSt', 'IEND']);
    });

    it('should keep insertion order across appends', () => {
      const png = minimalPng();
      png.appendChunk(chunk('teSt', [0x61]));
      png.appendChunk(chunk('stEg', [0x62]));
      expect(typesOf(png)).toEqual(['IHDR', 'IDAT', 'teSt', 'stEg', 'IEND']);
    });

    it('should fail when there is no IEND', () => {
      const png = Png.fromChunks([chunk('IHDR', IHDR_DATA)]);
      expect(() => png.appendChunk(chunk('teSt'))).toThrow(MissingEndChunkError);
    });

    it('should insert before the first IEND of a composed stream', () => {
      const png = Png.fromChunks([chunk('IHDR', IHDR_DATA), chunk('IEND'), chunk('IEND')]);
      png.appendChunk(chunk('teSt', [0x61]));
      expect(typesOf(png)).toEqual(['IHDR', 'teSt', 'IEND', 'IEND']);
    });

    it('should refuse a second IEND', () => {
      const png = minimalPng();
      expect(() => png.appendChunk(chunk('IEND'))).toThrow(ProtectedChunkError);
      expect(typesOf(png)).toEqual(['IHDR', 'IDAT', 'IEND']);
    });
  });

  describe('removeChunkByType', () => {
    function withTestChunk(): Png {
      return Png.fromChunks([
        chunk('IHDR', IHDR_DATA),
        chunk('teSt', [0x68, 0x69]),
        chunk('IDAT', IDAT_DATA),
        chunk('IEND'),
      ]);
    }

    it('should remove and return the matching chunk', () => {
      const png = withTestChunk();
      const removed = png.removeChunkByType('teSt');

      expect(removed.dataAsString()).toBe('hi');
      expect(typesOf(png)).toEqual(['IHDR', 'IDAT', 'IEND']);
    });

    it('should fail once nothing matches', () => {
      const png = withTestChunk();
      png.removeChunkByType('teSt');
      expect(() => png.removeChunkByType('teSt')).toThrow(ChunkNotFoundError);
      expect(() => png.removeChunkByType('teSt')).toThrow('No teSt chunk found');
    });

    it('should remove only the first of several matches', () => {
      const png = minimalPng();
      png.appendChunk(chunk('teSt', [0x61]));
      png.appendChunk(chunk('teSt', [0x62]));

      expect(png.removeChunkByType('teSt').dataAsString()).toBe('a');
      expect(png.chunkByType('teSt')?.dataAsString()).toBe('b');
    });

    it('should accept a ChunkType', () => {
      const png = withTestChunk();
      expect(png.removeChunkByType(ChunkType.fromString('teSt')).length).toBe(2);
    });

    it('should match case-sensitively', () => {
      const png = withTestChunk();
      expect(() => png.removeChunkByType('test')).toThrow(ChunkNotFoundError);
    });

    it('should never remove IEND', () => {
      const png = withTestChunk();
      expect(() => png.removeChunkByType('IEND')).toThrow(ProtectedChunkError);
      expect(typesOf(png)).toEqual(['IHDR', 'teSt', 'IDAT', 'IEND']);
    });
  });

  describe('lookup', () => {
    it('should return the first chunk of a type', () => {
      const png = minimalPng();
      png.appendChunk(chunk('teSt', [0x61]));
      png.appendChunk(chunk('teSt', [0x62]));

      expect(png.chunkByType('teSt')?.dataAsString()).toBe('a');
      expect(png.chunksByType('teSt').map(c => c.dataAsString())).toEqual(['a', 'b']);
    });

    it('should return undefined when the type is absent', () => {
      expect(minimalPng().chunkByType('teSt')).toBeUndefined();
      expect(minimalPng().chunksByType('teSt')).toEqual([]);
    });

    it('should hand out a snapshot of the chunk list', () => {
      const png = minimalPng();
      const before = png.chunks();
      png.appendChunk(chunk('teSt'));

      expect(before.length).toBe(3);
      expect(png.chunks().length).toBe(4);
    });
  });

  describe('equals / toString', () => {
    it('should compare chunk sequences', () => {
      const other = minimalPng();
      expect(minimalPng().equals(other)).toBe(true);

      other.appendChunk(chunk('teSt'));
      expect(minimalPng().equals(other)).toBe(false);
    });

    it('should list chunks one per line', () => {
      const png = Png.fromChunks([chunk('IEND')]);
      expect(png.toString()).toBe('PNG\n  IEND (0 bytes, crc 0xae426082)');
    });
  });
});
