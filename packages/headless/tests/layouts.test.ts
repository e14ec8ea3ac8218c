import { describe, it, expect } from 'vitest';
import { mkdirSync, writeFileSync } from 'node:fs';
import path from 'node:path';
import { FormatError, IndexRangeError } from '@metatile/core';
import { findLayout, listLayoutIds, parseOpts, resolveRoot, tilesetDirs, toSnakeCase, LAYOUTS_FILE } from '../src/lib.js';
import { catchError, makeTempDir } from '../../core/tests/helpers/test_utils.js';

function writeLayouts(root: string, table: unknown): void {
  mkdirSync(path.dirname(path.join(root, LAYOUTS_FILE)), { recursive: true });
  writeFileSync(path.join(root, LAYOUTS_FILE), JSON.stringify(table));
}

const TOWN = {
  id: 'LAYOUT_TEST_TOWN',
  name: 'TestTown_Layout',
  width: 2,
  height: 1,
  primary_tileset: 'gTileset_General',
  secondary_tileset: 'gTileset_SeviiIslands45',
  border_filepath: 'data/layouts/TestTown/border.bin',
  blockdata_filepath: 'data/layouts/TestTown/map.bin',
};

describe('layout table', () => {
  it('parses --key value options and bare flags', () => {
    expect(parseOpts(['render', '--layout', 'LAYOUT_X', '--verbose', '--output', 'o.png'])).toEqual({
      layout: 'LAYOUT_X',
      verbose: '1',
      output: 'o.png',
    });
  });

  it('resolves an explicit root to an absolute path', () => {
    expect(resolveRoot('/tmp/project/../project')).toBe('/tmp/project');
  });

  it('snake-cases tileset names', () => {
    expect(toSnakeCase('CeladonCity')).toBe('celadon_city');
    expect(toSnakeCase('SeviiIslands45')).toBe('sevii_islands_45');
    expect(toSnakeCase('SSAnne')).toBe('ss_anne');
    expect(toSnakeCase('PowerPlant')).toBe('power_plant');
    expect(toSnakeCase('PalletTown')).toBe('pallet_town');
    expect(toSnakeCase('SilphCo')).toBe('silph_co');
    expect(toSnakeCase('MtEmber')).toBe('mt_ember');
    expect(toSnakeCase('SeviiIslands67')).toBe('sevii_islands_67');
    expect(toSnakeCase('Building')).toBe('building');
  });

  it('derives tileset directories from the layout symbols', () => {
    const dirs = tilesetDirs('/proj', TOWN);
    expect(dirs.primary).toBe(path.join('/proj', 'data', 'tilesets', 'primary', 'general'));
    expect(dirs.secondary).toBe(path.join('/proj', 'data', 'tilesets', 'secondary', 'sevii_islands_45'));
  });

  it('lists layout ids, skipping placeholder records', () => {
    const root = makeTempDir();
    writeLayouts(root, { layouts_table_label: 'gMapLayouts', layouts: [{}, TOWN, { id: 'LAYOUT_OTHER' }] });
    expect(listLayoutIds(root)).toEqual(['LAYOUT_TEST_TOWN', 'LAYOUT_OTHER']);
  });

  it('finds a layout by id', () => {
    const root = makeTempDir();
    writeLayouts(root, { layouts: [TOWN] });
    const { name: _name, ...fields } = TOWN;
    // Keys outside the schema, such as name, are dropped.
    expect(findLayout(root, 'LAYOUT_TEST_TOWN')).toEqual(fields);
  });

  it('reports an unknown layout id', () => {
    const root = makeTempDir();
    writeLayouts(root, { layouts: [TOWN] });
    const err = catchError(() => findLayout(root, 'LAYOUT_NOPE'));
    expect(err).toBeInstanceOf(IndexRangeError);
    expect(err).toMatchObject({ message: `no layout matching name LAYOUT_NOPE (${path.join(root, LAYOUTS_FILE)})` });
  });

  it('rejects an invalid layout record', () => {
    const root = makeTempDir();
    writeLayouts(root, { layouts: [{ ...TOWN, width: -2 }] });
    expect(() => findLayout(root, 'LAYOUT_TEST_TOWN')).toThrow(FormatError);
    expect(() => findLayout(root, 'LAYOUT_TEST_TOWN')).toThrow(/layout LAYOUT_TEST_TOWN: width: /);
  });

  it('rejects a malformed layouts file', () => {
    const root = makeTempDir();
    mkdirSync(path.join(root, 'data', 'layouts'), { recursive: true });
    writeFileSync(path.join(root, LAYOUTS_FILE), '{ "layouts": [');
    expect(() => listLayoutIds(root)).toThrow(FormatError);
    writeLayouts(root, { maps: [] });
    expect(() => listLayoutIds(root)).toThrow(/layouts table: /);
  });
});
