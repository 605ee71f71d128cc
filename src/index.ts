/**
 * pngstash - hide application data in PNG chunks
 *
 * Parse a PNG into its chunks, add, find and remove chunks without touching
 * the image, and write it back out byte for byte.
 *
 * @packageDocumentation
 */

// Container model
export { ChunkType, CHUNK_TYPE_LENGTH } from './png/chunk-type.js';
export { Chunk, CHUNK_OVERHEAD } from './png/chunk.js';
export { Png } from './png/png.js';

// Message operations
export {
  hideMessage,
  revealMessage,
  removeMessage,
  listChunks,
  summarizeChunk,
  DEFAULT_MESSAGE_CHUNK_TYPE,
} from './operations/message.js';

// Types
export type {
  ChunkSummary,
  MessageOptions,
  HideMessageResult,
  RemoveMessageResult,
  FileOutputOptions,
  FileWriteResult,
} from './types.js';

// Error classes
export {
  PngStashError,
  InvalidSignatureError,
  InvalidTypeCodeError,
  UnexpectedEofError,
  CrcMismatchError,
  MissingEndChunkError,
  ChunkNotFoundError,
  ProtectedChunkError,
  InvalidUtf8Error,
} from './errors.js';
export type { PngStashErrorCode } from './errors.js';

// Binary utilities for advanced usage
export * as buffer from './binary/buffer.js';
export * as dataview from './binary/dataview.js';
export { crc32, chunkCrc } from './binary/crc32.js';

// Signature and well-known type codes
export { PNG_SIGNATURE, CHUNK_TYPES } from './signatures.js';

// Default export for convenience
import { Png } from './png/png.js';
export default Png;
