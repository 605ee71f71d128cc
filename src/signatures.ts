/**
 * PNG file signature: \x89 P N G \r \n \x1a \n
 */
export const PNG_SIGNATURE: Uint8Array = new Uint8Array([
  0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a,
]);

/**
 * Type codes the container layer treats specially
 */
export const CHUNK_TYPES = {
  END: 'IEND',
} as const;
