import { describe, it, expect } from 'vitest';
import { TileAtlas } from '../src/gfx/tile_atlas.js';
import { parseIndexedPng } from '../src/gfx/indexed_png.js';
import { FormatError } from '../src/errors.js';
import { encodePng, packNibbles, packTiles, solidTile } from './helpers/test_utils.js';

describe('TileAtlas', () => {
  it('returns absent at tileWidth*tileHeight and present just below', () => {
    const sheet = packTiles([solidTile(1), solidTile(2), solidTile(3), solidTile(4)], 2);
    const atlas = new TileAtlas(sheet.data, sheet.tileWidth, sheet.tileHeight);
    expect(atlas.tileCount).toBe(4);
    expect(atlas.getTile(3)).toBeDefined();
    expect(atlas.getTile(4)).toBeUndefined();
    expect(atlas.getTile(-1)).toBeUndefined();
    expect(atlas.getTile(1.5)).toBeUndefined();
  });

  it('addresses tiles row-major across the sheet', () => {
    const sheet = packTiles([solidTile(1), solidTile(2), solidTile(3), solidTile(4)], 2);
    const atlas = new TileAtlas(sheet.data, 2, 2);
    expect(Array.from(atlas.getTile(2)!)).toEqual(new Array(64).fill(3));
    expect(Array.from(atlas.getTile(1)!)).toEqual(new Array(64).fill(2));
  });

  it('reads the high nibble for even columns and the low nibble for odd columns', () => {
    const data = new Uint8Array(32);
    data[0] = 0xA1;
    data[4] = 0x3C; // row 1, columns 0 and 1
    const tile = new TileAtlas(data, 1, 1).getTile(0)!;
    expect(tile[0]).toBe(0xA);
    expect(tile[1]).toBe(0x1);
    expect(tile[8]).toBe(0x3);
    expect(tile[9]).toBe(0xC);
  });

  it('maps tile pixels to sheet pixels', () => {
    const f = (x: number, y: number) => (x + 2 * y) & 15;
    const atlas = new TileAtlas(packNibbles(16, 16, f), 2, 2);
    const tile = atlas.getTile(3)!;
    for (let row = 0; row < 8; row++) {
      for (let col = 0; col < 8; col++) {
        expect(tile[row * 8 + col]).toBe(f(8 + col, 8 + row));
      }
    }
  });

  it('rejects a buffer whose length does not match the tile grid', () => {
    expect(() => new TileAtlas(new Uint8Array(31), 1, 1)).toThrow(FormatError);
  });

  it('builds from a decoded 4-bit sheet', () => {
    const sheet = packTiles([solidTile(5), solidTile(6)], 2);
    const atlas = TileAtlas.fromIndexedImage(parseIndexedPng(encodePng(16, 8, sheet.data)));
    expect(atlas.tileWidth).toBe(2);
    expect(atlas.tileHeight).toBe(1);
    expect(atlas.getTile(1)![63]).toBe(6);
  });

  it('rejects sheets that are not 4-bit or not a multiple of 8 pixels', () => {
    const eightBit = parseIndexedPng(encodePng(8, 8, new Uint8Array(64), { bitDepth: 8 }));
    expect(() => TileAtlas.fromIndexedImage(eightBit)).toThrow('tile sheet bit depth is 8, expected 4');
    const narrow = parseIndexedPng(encodePng(12, 8, new Uint8Array(48)));
    expect(() => TileAtlas.fromIndexedImage(narrow)).toThrow('tile sheet 12x8 is not a multiple of 8');
  });
});
