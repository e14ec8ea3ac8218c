import { PRIMARY_TILE_COUNT } from '../format/constants.js';
import type { RGBAImage } from '../render/image.js';
import { defaultLogger, type Logger } from '../utils/log.js';
import type { TileRef } from './metatile.js';
import { renderMetatileImage, type TileLookup, type TileSource, type Tileset } from './tileset.js';

export type MetatileRoute = { tileset: 'primary' | 'secondary'; relativeId: number };

// Anything that can turn a map cell's metatile id into a 16x16 block.
export interface MetatileRenderer {
  readonly metatileCount: number;
  renderMetatile(metatileId: number): RGBAImage | undefined;
}

// Primary and secondary tilesets behind one metatile id space.
// Metatile ids split at primary.metatileCount; tile ids split at PRIMARY_TILE_COUNT
// whatever the table sizes are. Palettes always come from the tileset owning the metatile.
export class LayoutTileset implements MetatileRenderer {
  constructor(
    readonly primary: Tileset,
    readonly secondary: Tileset,
    private readonly logger: Logger = defaultLogger,
  ) {}

  get metatileCount(): number {
    return this.primary.metatileCount + this.secondary.metatileCount;
  }

  route(metatileId: number): MetatileRoute | undefined {
    if (!Number.isInteger(metatileId) || metatileId < 0) return undefined;
    const primaryCount = this.primary.metatileCount;
    if (metatileId < primaryCount) return { tileset: 'primary', relativeId: metatileId };
    if (metatileId < this.metatileCount) return { tileset: 'secondary', relativeId: metatileId - primaryCount };
    return undefined;
  }

  resolveTile(owner: Tileset, ref: TileRef): TileLookup {
    const inPrimaryAtlas = ref.tileId < PRIMARY_TILE_COUNT;
    const atlasOwner = inPrimaryAtlas ? this.primary : this.secondary;
    const tileId = inPrimaryAtlas ? ref.tileId : ref.tileId - PRIMARY_TILE_COUNT;
    const indices = atlasOwner.atlas.getTile(tileId);
    if (!indices) {
      return { ok: false, reason: `tile ${ref.tileId} (${atlasOwner.name} tile ${tileId}) outside atlas of ${atlasOwner.atlas.tileCount} tiles` };
    }
    const palette = owner.palettes[ref.paletteNumber];
    if (!palette) {
      return { ok: false, reason: `palette ${ref.paletteNumber} not loaded for ${owner.name} (${owner.palettes.length} palettes)` };
    }
    return { ok: true, indices, palette };
  }

  renderMetatile(metatileId: number): RGBAImage | undefined {
    const route = this.route(metatileId);
    if (!route) return undefined;
    const owner = route.tileset === 'primary' ? this.primary : this.secondary;
    const source: TileSource = { resolveTile: (ref) => this.resolveTile(owner, ref) };
    return renderMetatileImage(owner.getMetatile(route.relativeId), source, this.logger, `metatile ${metatileId} (${owner.name} ${route.relativeId})`);
  }
}
