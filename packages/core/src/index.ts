export * from './errors.js';
export * from './format/constants.js';
export * from './utils/bit.js';
export * from './utils/crc32.js';
export * from './utils/log.js';
export * from './gfx/palette.js';
export * from './gfx/indexed_png.js';
export * from './gfx/tile_atlas.js';
export * from './tileset/metatile.js';
export * from './tileset/tileset.js';
export * from './tileset/layout_tileset.js';
export * from './map/map_grid.js';
export * from './render/image.js';
export * from './render/compose_map.js';
export * from './assets/files.js';
export * from './assets/loader.js';
