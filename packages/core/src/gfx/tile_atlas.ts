import { FormatError } from '../errors.js';
import { PIXELS_PER_BYTE, TILE_DIMENSION } from '../format/constants.js';
import type { IndexedImage } from './indexed_png.js';

export const ATLAS_BIT_DEPTH = 4;

// Sheet of 8x8 tiles stored as packed 4-bit indices (high nibble = even column).
// Tile IDs run row-major across the sheet.
export class TileAtlas {
  readonly pixelWidth: number;
  readonly pixelHeight: number;

  constructor(
    readonly data: Uint8Array,
    readonly tileWidth: number,
    readonly tileHeight: number,
  ) {
    this.pixelWidth = tileWidth * TILE_DIMENSION;
    this.pixelHeight = tileHeight * TILE_DIMENSION;
    const expected = (this.pixelWidth * this.pixelHeight) / PIXELS_PER_BYTE;
    if (data.length !== expected) {
      throw new FormatError(`atlas buffer is ${data.length} bytes, expected ${expected} for ${tileWidth}x${tileHeight} tiles`);
    }
  }

  static fromIndexedImage(image: IndexedImage): TileAtlas {
    if (image.bitDepth !== ATLAS_BIT_DEPTH) throw new FormatError(`tile sheet bit depth is ${image.bitDepth}, expected ${ATLAS_BIT_DEPTH}`);
    if (image.width % TILE_DIMENSION !== 0 || image.height % TILE_DIMENSION !== 0) {
      throw new FormatError(`tile sheet ${image.width}x${image.height} is not a multiple of ${TILE_DIMENSION}`);
    }
    return new TileAtlas(image.data, image.width / TILE_DIMENSION, image.height / TILE_DIMENSION);
  }

  get tileCount(): number {
    return this.tileWidth * this.tileHeight;
  }

  // 64 palette indices, row-major; undefined when tileId is outside the sheet.
  getTile(tileId: number): Uint8Array | undefined {
    if (!Number.isInteger(tileId) || tileId < 0 || tileId >= this.tileCount) return undefined;
    const tileX = tileId % this.tileWidth;
    const tileY = Math.floor(tileId / this.tileWidth);
    const out = new Uint8Array(TILE_DIMENSION * TILE_DIMENSION);
    for (let row = 0; row < TILE_DIMENSION; row++) {
      const py = tileY * TILE_DIMENSION + row;
      for (let col = 0; col < TILE_DIMENSION; col++) {
        const px = tileX * TILE_DIMENSION + col;
        const byte = this.data[((py * this.pixelWidth + px) / PIXELS_PER_BYTE) | 0]!;
        out[row * TILE_DIMENSION + col] = (px & 1) === 0 ? (byte >>> 4) & 0x0f : byte & 0x0f;
      }
    }
    return out;
  }
}
