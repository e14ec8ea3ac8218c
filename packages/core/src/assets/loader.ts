import path from 'node:path';
import { withAssetPath } from '../errors.js';
import { TILESET_FILES } from '../format/constants.js';
import { parseIndexedPng } from '../gfx/indexed_png.js';
import { isPaletteFile, orderPalettes, parsePalette, type Palette } from '../gfx/palette.js';
import { TileAtlas } from '../gfx/tile_atlas.js';
import { MapGrid, parseMapCells } from '../map/map_grid.js';
import { LayoutTileset } from '../tileset/layout_tileset.js';
import { parseMetatiles, type Metatile } from '../tileset/metatile.js';
import { Tileset } from '../tileset/tileset.js';
import { defaultLogger, type Logger } from '../utils/log.js';
import { listFiles, readBytes, readText } from './files.js';

// Every *.pal file in the directory, ordered by numeric file name. Other files are skipped.
export function loadPaletteDir(dirPath: string, logger: Logger = defaultLogger): Palette[] {
  const entries = listFiles(dirPath)
    .filter(isPaletteFile)
    .map((fileName) => {
      const filePath = path.join(dirPath, fileName);
      logger.debug('palette', `loading ${filePath}`);
      return withAssetPath(filePath, () => ({ fileName, palette: parsePalette(readText(filePath)) }));
    });
  return withAssetPath(dirPath, () => orderPalettes(entries));
}

export function loadTileAtlas(filePath: string): TileAtlas {
  const bytes = readBytes(filePath);
  return withAssetPath(filePath, () => TileAtlas.fromIndexedImage(parseIndexedPng(bytes)));
}

export function loadMetatileTable(metatilesPath: string, attributesPath: string): Metatile[] {
  const metatiles = readBytes(metatilesPath);
  const attributes = readBytes(attributesPath);
  return withAssetPath(metatilesPath, () => parseMetatiles(metatiles, attributes));
}

export function loadTileset(dirPath: string, logger: Logger = defaultLogger): Tileset {
  const name = path.basename(dirPath);
  const metatiles = loadMetatileTable(path.join(dirPath, TILESET_FILES.metatiles), path.join(dirPath, TILESET_FILES.attributes));
  const atlas = loadTileAtlas(path.join(dirPath, TILESET_FILES.tiles));
  const palettes = loadPaletteDir(path.join(dirPath, TILESET_FILES.palettes), logger);
  logger.info('tileset', `${name}: ${metatiles.length} metatiles, ${atlas.tileCount} tiles, ${palettes.length} palettes`);
  return new Tileset(name, metatiles, atlas, palettes, logger);
}

export function loadLayoutTileset(primaryDir: string, secondaryDir: string, logger: Logger = defaultLogger): LayoutTileset {
  return new LayoutTileset(loadTileset(primaryDir, logger), loadTileset(secondaryDir, logger), logger);
}

export function loadMapGrid(width: number, height: number, mapPath: string, borderPath: string): MapGrid {
  const cells = withAssetPath(mapPath, () => parseMapCells(readBytes(mapPath)));
  const border = withAssetPath(borderPath, () => parseMapCells(readBytes(borderPath)));
  return new MapGrid(width, height, cells, border);
}
