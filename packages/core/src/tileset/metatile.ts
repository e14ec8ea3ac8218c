import { FormatError } from '../errors.js';
import {
  ATTRIBUTE_RECORD_SIZE,
  LAYER_TYPE_SHIFT,
  METATILE_RECORD_SIZE,
  TILES_PER_METATILE,
  TILE_HFLIP_BIT,
  TILE_ID_MASK,
  TILE_PALETTE_SHIFT,
  TILE_VFLIP_BIT,
} from '../format/constants.js';
import { bits, readU16LE, readU32LE } from '../utils/bit.js';

export interface TileRef {
  tileId: number;
  flipHorizontal: boolean;
  flipVertical: boolean;
  paletteNumber: number;
}

export function decodeTileRef(word: number): TileRef {
  return {
    tileId: word & TILE_ID_MASK,
    flipHorizontal: (word & TILE_HFLIP_BIT) !== 0,
    flipVertical: (word & TILE_VFLIP_BIT) !== 0,
    paletteNumber: bits(word, TILE_PALETTE_SHIFT, 4),
  };
}

export function encodeTileRef(ref: TileRef): number {
  return (
    (ref.tileId & TILE_ID_MASK) |
    (ref.flipHorizontal ? TILE_HFLIP_BIT : 0) |
    (ref.flipVertical ? TILE_VFLIP_BIT : 0) |
    ((ref.paletteNumber & 0x0f) << TILE_PALETTE_SHIFT)
  ) >>> 0;
}

export type LayerType = 'MiddleTop' | 'BottomMiddle' | 'BottomTop';

// Layer type selector 3 is not assigned; it falls back to MiddleTop.
export const LAYER_TYPES: readonly LayerType[] = ['MiddleTop', 'BottomMiddle', 'BottomTop'];

export interface MetatileAttributes {
  layerType: LayerType;
  // Full attribute word; behavior and terrain bits are carried but not interpreted.
  raw: number;
}

export function decodeMetatileAttributes(word: number): MetatileAttributes {
  const layerType = LAYER_TYPES[bits(word, LAYER_TYPE_SHIFT, 2)] ?? 'MiddleTop';
  return { layerType, raw: word >>> 0 };
}

// Slots 0..3 are the bottom layer, 4..7 the top layer; each layer is 2x2 row-major.
export interface Metatile {
  tiles: readonly TileRef[];
  attributes: MetatileAttributes;
}

export function metatileSlot(layer: number, row: number, col: number): number {
  return layer * 4 + row * 2 + col;
}

// Decode the parallel metatile and attribute tables. Both must describe the same record count.
export function parseMetatiles(metatileBytes: Uint8Array, attributeBytes: Uint8Array): Metatile[] {
  if (metatileBytes.length % METATILE_RECORD_SIZE !== 0) {
    throw new FormatError(`metatile table length ${metatileBytes.length} is not a multiple of ${METATILE_RECORD_SIZE}`);
  }
  if (attributeBytes.length % ATTRIBUTE_RECORD_SIZE !== 0) {
    throw new FormatError(`attribute table length ${attributeBytes.length} is not a multiple of ${ATTRIBUTE_RECORD_SIZE}`);
  }
  const count = metatileBytes.length / METATILE_RECORD_SIZE;
  const attrCount = attributeBytes.length / ATTRIBUTE_RECORD_SIZE;
  if (count !== attrCount) {
    throw new FormatError(`metatile table has ${count} records but attribute table has ${attrCount}`);
  }
  const metatiles: Metatile[] = [];
  for (let i = 0; i < count; i++) {
    const base = i * METATILE_RECORD_SIZE;
    const tiles: TileRef[] = [];
    for (let t = 0; t < TILES_PER_METATILE; t++) {
      tiles.push(decodeTileRef(readU16LE(metatileBytes, base + t * 2)));
    }
    const attributes = decodeMetatileAttributes(readU32LE(attributeBytes, i * ATTRIBUTE_RECORD_SIZE));
    metatiles.push({ tiles, attributes });
  }
  return metatiles;
}
