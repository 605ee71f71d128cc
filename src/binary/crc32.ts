/**
 * CRC32 lookup table (IEEE polynomial, reflected)
 */
const CRC32_TABLE: Uint32Array = ((): Uint32Array => {
  const table = new Uint32Array(256);
  for (let i = 0; i < 256; i++) {
    let c = i;
    for (let j = 0; j < 8; j++) {
      if (c & 1) {
        c = 0xedb88320 ^ (c >>> 1);
      } else {
        c = c >>> 1;
      }
    }
    table[i] = c;
  }
  return table;
})();

/**
 * Feed bytes into a running CRC register. The register is neither seeded
 * nor complemented here.
 */
export function updateCrc32(crc: number, data: Uint8Array): number {
  let c = crc;
  for (let i = 0; i < data.length; i++) {
    c = CRC32_TABLE[(c ^ data[i]!) & 0xff]! ^ (c >>> 8);
  }
  return c >>> 0;
}

/**
 * Calculate CRC32 checksum for a Uint8Array
 */
export function crc32(data: Uint8Array, initial = 0xffffffff): number {
  return (updateCrc32(initial, data) ^ 0xffffffff) >>> 0;
}

/**
 * CRC of a PNG chunk: covers the type code and the data, never the length field.
 */
export function chunkCrc(chunkType: Uint8Array, chunkData: Uint8Array): number {
  return (updateCrc32(updateCrc32(0xffffffff, chunkType), chunkData) ^ 0xffffffff) >>> 0;
}
