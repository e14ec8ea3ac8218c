// CRC-32 (IEEE 802.3), used for PNG chunk checksums and deterministic image hashes.

export function crc32Value(data: Uint8Array, seed = 0): number {
  let crc = (~seed) >>> 0;
  for (let i = 0; i < data.length; i++) {
    let c = (crc ^ data[i]!) & 0xFF;
    for (let k = 0; k < 8; k++) {
      const mask = -(c & 1);
      c = (c >>> 1) ^ (0xEDB88320 & mask);
    }
    crc = (crc >>> 8) ^ c;
  }
  return (~crc) >>> 0;
}

// 8-char lowercase hex
export function crc32(data: Uint8Array): string {
  return crc32Value(data).toString(16).padStart(8, '0');
}
