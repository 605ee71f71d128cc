/**
 * What `listChunks` reports for each chunk
 */
export interface ChunkSummary {
  /** Four-character type code, case preserved */
  type: string;
  /** Data length in bytes (excludes the 12 bytes of framing) */
  length: number;
  crc: number;
  critical: boolean;
  public: boolean;
  reservedBitValid: boolean;
  safeToCopy: boolean;
}

/**
 * Options shared by the message operations
 */
export interface MessageOptions {
  /**
   * Chunk type the message lives in (default: `stEg`, an ancillary,
   * private, safe-to-copy code)
   */
  chunkType?: string;
}

/**
 * Result of `hideMessage`
 */
export interface HideMessageResult {
  /** PNG bytes with the message chunk inserted */
  data: Uint8Array;
  added: ChunkSummary;
}

/**
 * Result of `removeMessage`
 */
export interface RemoveMessageResult {
  /** PNG bytes without the removed chunk */
  data: Uint8Array;
  removed: ChunkSummary;
}

/**
 * Where the file layer writes its output
 */
export interface FileOutputOptions {
  /** Overwrite the input file */
  inPlace?: boolean;
  /** Suffix for the output filename (default depends on the operation) */
  suffix?: string;
  /** Explicit output path (overrides suffix and inPlace) */
  outputPath?: string;
}

/**
 * Result of the file layer's writing operations
 */
export interface FileWriteResult {
  inputPath: string;
  outputPath: string;
  originalSize: number;
  outputSize: number;
  /** The chunk that was added or removed */
  chunk: ChunkSummary;
}
