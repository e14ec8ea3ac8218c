// Fixed dimensions and namespace boundaries of the tileset/map asset format.
// None of these are recorded in the files themselves.

export const TILE_DIMENSION = 8;
export const METATILE_DIMENSION = 16;
export const PIXELS_PER_BYTE = 2;

export const TILES_PER_METATILE = 8;
export const TILES_PER_LAYER = 4;
export const PALETTE_SIZE = 16;

// Raw tile IDs below this index the primary atlas; the rest index the secondary atlas at (id - PRIMARY_TILE_COUNT).
export const PRIMARY_TILE_COUNT = 640;

export const METATILE_RECORD_SIZE = TILES_PER_METATILE * 2;
export const ATTRIBUTE_RECORD_SIZE = 4;
export const MAP_CELL_SIZE = 2;

// TileRef: iiiiiiiiii h v pppp
export const TILE_ID_MASK = 0x03ff;
export const TILE_HFLIP_BIT = 0x0400;
export const TILE_VFLIP_BIT = 0x0800;
export const TILE_PALETTE_SHIFT = 12;

// MapCell: 10-bit metatile id, 2-bit collision, 4-bit elevation
export const MAP_METATILE_ID_MASK = 0x03ff;
export const MAP_COLLISION_SHIFT = 10;
export const MAP_ELEVATION_SHIFT = 12;

// Metatile attribute word: layer type in bits 29..30
export const LAYER_TYPE_SHIFT = 29;

export const PALETTE_FILE_EXTENSION = '.pal';
export const JASC_TAG = 'JASC-PAL';
export const JASC_VERSION = '0100';

export const TILESET_FILES = {
  metatiles: 'metatiles.bin',
  attributes: 'metatile_attributes.bin',
  tiles: 'tiles.png',
  palettes: 'palettes',
} as const;
