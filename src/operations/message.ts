/**
 * Message operations over raw PNG bytes: hide a text payload in a chunk,
 * read it back, remove it, and list what a file contains.
 *
 * @example
 * ```typescript
 * import { hideMessage, revealMessage } from 'pngstash';
 *
 * const { data: stashed } = hideMessage(pngBytes, 'meet at noon');
 * revealMessage(stashed); // 'meet at noon'
 * ```
 */

import { Png } from '../png/png.js';
import { Chunk } from '../png/chunk.js';
import { ChunkType } from '../png/chunk-type.js';
import { ChunkNotFoundError } from '../errors.js';
import type { ChunkSummary, HideMessageResult, MessageOptions, RemoveMessageResult } from '../types.js';

/**
 * Ancillary, private, reserved bit clear, safe to copy
 */
export const DEFAULT_MESSAGE_CHUNK_TYPE = 'stEg';

function resolveType(options: MessageOptions): ChunkType {
  return ChunkType.fromString(options.chunkType ?? DEFAULT_MESSAGE_CHUNK_TYPE);
}

export function summarizeChunk(chunk: Chunk): ChunkSummary {
  const { type } = chunk;
  return {
    type: type.toString(),
    length: chunk.length,
    crc: chunk.crc,
    critical: type.isCritical(),
    public: type.isPublic(),
    reservedBitValid: type.isReservedBitValid(),
    safeToCopy: type.isSafeToCopy(),
  };
}

/**
 * Return a copy of the PNG with `message` stored in a new chunk before IEND.
 */
export function hideMessage(
  input: Uint8Array | ArrayBuffer,
  message: string,
  options: MessageOptions = {}
): HideMessageResult {
  const png = Png.parse(input);
  const added = Chunk.fromText(resolveType(options), message);
  png.appendChunk(added);
  return { data: png.serialize(), added: summarizeChunk(added) };
}

/**
 * Read the message stored in the first chunk of the message type.
 */
export function revealMessage(input: Uint8Array | ArrayBuffer, options: MessageOptions = {}): string {
  const type = resolveType(options);
  const chunk = Png.parse(input).chunkByType(type);
  if (!chunk) {
    throw new ChunkNotFoundError(type.toString());
  }
  return chunk.dataAsString();
}

/**
 * Drop the first chunk of the message type.
 */
export function removeMessage(
  input: Uint8Array | ArrayBuffer,
  options: MessageOptions = {}
): RemoveMessageResult {
  const png = Png.parse(input);
  const removed = png.removeChunkByType(resolveType(options));
  return { data: png.serialize(), removed: summarizeChunk(removed) };
}

export function listChunks(input: Uint8Array | ArrayBuffer): ChunkSummary[] {
  return Png.parse(input).chunks().map(summarizeChunk);
}
