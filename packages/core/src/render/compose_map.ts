import { FormatError } from '../errors.js';
import { METATILE_DIMENSION } from '../format/constants.js';
import type { MapGrid } from '../map/map_grid.js';
import type { MetatileRenderer } from '../tileset/layout_tileset.js';
import { defaultLogger, type Logger } from '../utils/log.js';
import { blitImage, createImage, type RGBAImage } from './image.js';

export type MissingCell = { row: number; col: number; metatileId: number };

export type ComposeResult = { image: RGBAImage; missing: MissingCell[] };

// Render every cell of the grid, row by row, into a (width*16)x(height*16) image.
// Cells whose metatile cannot be rendered are logged, reported and left black.
export function composeMap(grid: MapGrid, tileset: MetatileRenderer, logger: Logger = defaultLogger): ComposeResult {
  if (!grid.isComplete) {
    throw new FormatError(`map has ${grid.cells.length} cells but layout is ${grid.width}x${grid.height}`);
  }
  const image = createImage(grid.width * METATILE_DIMENSION, grid.height * METATILE_DIMENSION);
  const missing: MissingCell[] = [];
  for (let row = 0; row < grid.height; row++) {
    for (let col = 0; col < grid.width; col++) {
      const cell = grid.getCell(row, col);
      if (!cell) continue;
      logger.debug('compose', `(${col}, ${row}) metatile ${cell.metatileId}`);
      const block = tileset.renderMetatile(cell.metatileId);
      if (!block) {
        logger.error('compose', `no metatile ${cell.metatileId} for cell (${col}, ${row}); ${tileset.metatileCount} available`);
        missing.push({ row, col, metatileId: cell.metatileId });
        continue;
      }
      blitImage(image, col * METATILE_DIMENSION, row * METATILE_DIMENSION, block);
    }
  }
  return { image, missing };
}
