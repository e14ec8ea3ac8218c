import { decode } from 'fast-png';
import { FormatError } from '../errors.js';

// Decoded indexed image: pixel indices packed as stored, `rowBytes` per scanline, no filter bytes.
export interface IndexedImage {
  width: number;
  height: number;
  bitDepth: number;
  rowBytes: number;
  data: Uint8Array;
}

// Decode an indexed-color PNG. Sub-byte depths stay packed, most significant bits first.
export function parseIndexedPng(bytes: Uint8Array): IndexedImage {
  let png: ReturnType<typeof decode>;
  try {
    png = decode(bytes);
  } catch (err) {
    throw new FormatError(`unreadable PNG: ${err instanceof Error ? err.message : String(err)}`);
  }
  if (!png.palette || png.channels !== 1) throw new FormatError('not an indexed-color PNG');
  const rowBytes = Math.ceil((png.width * png.depth) / 8);
  return { width: png.width, height: png.height, bitDepth: png.depth, rowBytes, data: Uint8Array.from(png.data) };
}
