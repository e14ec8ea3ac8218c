import { IndexRangeError } from '../errors.js';
import { METATILE_DIMENSION, TILE_DIMENSION, TILES_PER_LAYER } from '../format/constants.js';
import type { Palette } from '../gfx/palette.js';
import type { TileAtlas } from '../gfx/tile_atlas.js';
import { createImage, setPixel, type RGBAImage } from '../render/image.js';
import { defaultLogger, type Logger } from '../utils/log.js';
import { metatileSlot, type Metatile, type TileRef } from './metatile.js';

export type TileLookup =
  | { ok: true; indices: Uint8Array; palette: Palette }
  | { ok: false; reason: string };

// Resolves a TileRef to its 8x8 index grid and the palette it is drawn with.
export interface TileSource {
  resolveTile(ref: TileRef): TileLookup;
}

// Draw one tile into an 8x8 quadrant of `out`. Flips reverse the read order.
// With `transparentZero`, index 0 leaves the destination untouched.
export function drawTile(
  out: RGBAImage,
  originX: number,
  originY: number,
  ref: TileRef,
  indices: Uint8Array,
  palette: Palette,
  transparentZero: boolean,
): void {
  const last = TILE_DIMENSION - 1;
  for (let row = 0; row < TILE_DIMENSION; row++) {
    const srcRow = ref.flipVertical ? last - row : row;
    for (let col = 0; col < TILE_DIMENSION; col++) {
      const srcCol = ref.flipHorizontal ? last - col : col;
      const idx = indices[srcRow * TILE_DIMENSION + srcCol]!;
      if (transparentZero && idx === 0) continue;
      const color = palette[idx];
      if (color) setPixel(out, originX + col, originY + row, color);
    }
  }
}

// Render the two 2x2 layers of a metatile into a 16x16 block.
// The bottom layer is opaque; index 0 in the top layer shows the bottom layer through.
// Unresolvable tiles are logged and leave their quadrant black.
export function renderMetatileImage(metatile: Metatile, source: TileSource, logger: Logger = defaultLogger, label = 'metatile'): RGBAImage {
  const out = createImage(METATILE_DIMENSION, METATILE_DIMENSION);
  for (let layer = 0; layer < 2; layer++) {
    for (let row = 0; row < 2; row++) {
      for (let col = 0; col < 2; col++) {
        const slot = metatileSlot(layer, row, col);
        const ref = metatile.tiles[slot];
        if (!ref) continue;
        const tile = source.resolveTile(ref);
        if (!tile.ok) {
          logger.warn('tileset', `${label} slot ${slot}: ${tile.reason}`);
          continue;
        }
        drawTile(out, col * TILE_DIMENSION, row * TILE_DIMENSION, ref, tile.indices, tile.palette, slot >= TILES_PER_LAYER);
      }
    }
  }
  return out;
}

// One metatile table with the tile sheet and palettes it draws from.
export class Tileset implements TileSource {
  constructor(
    readonly name: string,
    readonly metatiles: readonly Metatile[],
    readonly atlas: TileAtlas,
    readonly palettes: readonly Palette[],
    private readonly logger: Logger = defaultLogger,
  ) {}

  get metatileCount(): number {
    return this.metatiles.length;
  }

  lookupTile(tileId: number, paletteNumber: number): TileLookup {
    const indices = this.atlas.getTile(tileId);
    if (!indices) return { ok: false, reason: `tile ${tileId} outside ${this.name} atlas (${this.atlas.tileCount} tiles)` };
    const palette = this.palettes[paletteNumber];
    if (!palette) return { ok: false, reason: `palette ${paletteNumber} not loaded for ${this.name} (${this.palettes.length} palettes)` };
    return { ok: true, indices, palette };
  }

  resolveTile(ref: TileRef): TileLookup {
    return this.lookupTile(ref.tileId, ref.paletteNumber);
  }

  getMetatile(relativeId: number): Metatile {
    const metatile = this.metatiles[relativeId];
    if (!metatile) throw new IndexRangeError(`metatile ${relativeId} outside ${this.name} (${this.metatiles.length} metatiles)`);
    return metatile;
  }

  // Tile references resolve through `source`; a standalone tileset resolves against itself.
  renderMetatile(relativeId: number, source: TileSource = this): RGBAImage {
    return renderMetatileImage(this.getMetatile(relativeId), source, this.logger, `${this.name} metatile ${relativeId}`);
  }
}
