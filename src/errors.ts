/**
 * Discriminator carried by every pngstash error
 */
export type PngStashErrorCode =
  | 'InvalidSignature'
  | 'InvalidTypeCode'
  | 'UnexpectedEof'
  | 'CrcMismatch'
  | 'MissingEndChunk'
  | 'ChunkNotFound'
  | 'ProtectedChunk'
  | 'InvalidUtf8';

function hex32(value: number): string {
  return `0x${(value >>> 0).toString(16).padStart(8, '0')}`;
}

/**
 * Base error class for pngstash errors
 */
export class PngStashError extends Error {
  public readonly code: PngStashErrorCode;

  constructor(code: PngStashErrorCode, message: string) {
    super(message);
    this.name = 'PngStashError';
    this.code = code;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * Thrown when the data does not begin with the 8-byte PNG signature
 */
export class InvalidSignatureError extends PngStashError {
  constructor(message = 'Invalid PNG: missing PNG signature') {
    super('InvalidSignature', message);
    this.name = 'InvalidSignatureError';
  }
}

/**
 * Thrown when a chunk type code is not four ASCII letters
 */
export class InvalidTypeCodeError extends PngStashError {
  public readonly typeCode: string;

  constructor(typeCode: string, reason: string) {
    super('InvalidTypeCode', `Invalid chunk type code ${JSON.stringify(typeCode)}: ${reason}`);
    this.name = 'InvalidTypeCodeError';
    this.typeCode = typeCode;
  }
}

/**
 * Thrown when a read needs more bytes than remain in the buffer
 */
export class UnexpectedEofError extends PngStashError {
  public readonly offset: number;
  public readonly requested: number;
  public readonly available: number;

  constructor(offset: number, requested: number, available: number) {
    super(
      'UnexpectedEof',
      `Unexpected end of data: requested ${requested} bytes but only ${available} available at offset ${offset}`
    );
    this.name = 'UnexpectedEofError';
    this.offset = offset;
    this.requested = requested;
    this.available = available;
  }
}

/**
 * Thrown when a chunk's stored CRC does not match its contents
 */
export class CrcMismatchError extends PngStashError {
  public readonly typeCode: string;
  public readonly stored: number;
  public readonly computed: number;

  constructor(typeCode: string, stored: number, computed: number) {
    super(
      'CrcMismatch',
      `CRC mismatch in ${typeCode} chunk: stored ${hex32(stored)}, computed ${hex32(computed)}`
    );
    this.name = 'CrcMismatchError';
    this.typeCode = typeCode;
    this.stored = stored;
    this.computed = computed;
  }
}

/**
 * Thrown when a PNG has no IEND chunk where one is required
 */
export class MissingEndChunkError extends PngStashError {
  constructor(message = 'Invalid PNG: missing IEND chunk') {
    super('MissingEndChunk', message);
    this.name = 'MissingEndChunkError';
  }
}

/**
 * Thrown when no chunk of the requested type exists
 */
export class ChunkNotFoundError extends PngStashError {
  public readonly typeCode: string;

  constructor(typeCode: string) {
    super('ChunkNotFound', `No ${typeCode} chunk found`);
    this.name = 'ChunkNotFoundError';
    this.typeCode = typeCode;
  }
}

/**
 * Thrown when a mutation would move, duplicate or drop the IEND chunk
 */
export class ProtectedChunkError extends PngStashError {
  public readonly typeCode: string;

  constructor(typeCode: string, action: 'remove' | 'append' = 'remove') {
    super('ProtectedChunk', `Cannot ${action} protected ${typeCode} chunk`);
    this.name = 'ProtectedChunkError';
    this.typeCode = typeCode;
  }
}

/**
 * Thrown when chunk data is displayed as text but is not valid UTF-8
 */
export class InvalidUtf8Error extends PngStashError {
  public readonly typeCode: string;

  constructor(typeCode: string) {
    super('InvalidUtf8', `Data of ${typeCode} chunk is not valid UTF-8 text`);
    this.name = 'InvalidUtf8Error';
    this.typeCode = typeCode;
  }
}
