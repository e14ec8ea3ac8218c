import { FormatError } from '../errors.js';
import { MAP_CELL_SIZE, MAP_COLLISION_SHIFT, MAP_ELEVATION_SHIFT, MAP_METATILE_ID_MASK } from '../format/constants.js';
import { bits, readU16LE } from '../utils/bit.js';

export interface MapCell {
  metatileId: number;
  collision: number;
  elevation: number;
}

export function decodeMapCell(word: number): MapCell {
  return {
    metatileId: word & MAP_METATILE_ID_MASK,
    collision: bits(word, MAP_COLLISION_SHIFT, 2),
    elevation: bits(word, MAP_ELEVATION_SHIFT, 4),
  };
}

export function encodeMapCell(cell: MapCell): number {
  return (
    (cell.metatileId & MAP_METATILE_ID_MASK) |
    ((cell.collision & 0x3) << MAP_COLLISION_SHIFT) |
    ((cell.elevation & 0xf) << MAP_ELEVATION_SHIFT)
  ) >>> 0;
}

export function parseMapCells(bytes: Uint8Array): MapCell[] {
  if (bytes.length % MAP_CELL_SIZE !== 0) {
    throw new FormatError(`map data length ${bytes.length} is not a whole number of ${MAP_CELL_SIZE}-byte cells`);
  }
  const cells: MapCell[] = [];
  for (let off = 0; off < bytes.length; off += MAP_CELL_SIZE) {
    cells.push(decodeMapCell(readU16LE(bytes, off)));
  }
  return cells;
}

// Row-major grid of map cells. Dimensions come from the layout, not the data.
// Border cells are decoded and kept but never drawn.
export class MapGrid {
  constructor(
    readonly width: number,
    readonly height: number,
    readonly cells: readonly MapCell[],
    readonly border: readonly MapCell[] = [],
  ) {}

  static parse(width: number, height: number, mapBytes: Uint8Array, borderBytes: Uint8Array): MapGrid {
    return new MapGrid(width, height, parseMapCells(mapBytes), parseMapCells(borderBytes));
  }

  // True when the decoded cell count matches width*height.
  get isComplete(): boolean {
    return this.cells.length === this.width * this.height;
  }

  getCell(row: number, col: number): MapCell | undefined {
    if (row < 0 || col < 0 || row >= this.height || col >= this.width) return undefined;
    return this.cells[row * this.width + col];
  }
}
