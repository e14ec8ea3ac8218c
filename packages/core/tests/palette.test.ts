import { describe, it, expect } from 'vitest';
import { writeFileSync } from 'node:fs';
import path from 'node:path';
import { parsePalette, paletteNumber, orderPalettes } from '../src/gfx/palette.js';
import { loadPaletteDir } from '../src/assets/loader.js';
import { FormatError, IoError } from '../src/errors.js';
import { catchError, jascPal, makeTempDir, recordingLogger, testPalette } from './helpers/test_utils.js';

describe('JASC-PAL palettes', () => {
  it('parses 16 colors', () => {
    const pal = parsePalette(jascPal(testPalette(0)));
    expect(pal.length).toBe(16);
    expect(pal[0]).toEqual([0, 0, 255]);
    expect(pal[15]).toEqual([15, 150, 240]);
  });

  it('accepts CRLF line endings and extra spacing', () => {
    const text = jascPal(testPalette(0), '\r\n').replace('1 10 254', '  1   10\t254 ');
    expect(parsePalette(text)[1]).toEqual([1, 10, 254]);
  });

  it('rejects a bad header', () => {
    expect(() => parsePalette('JASC-PAL\r\n0100\r\n15\r\n')).toThrow(FormatError);
    expect(() => parsePalette('RIFF\n0100\n16\n')).toThrow(/bad JASC-PAL header/);
  });

  it('rejects color lines that are not exactly three bytes', () => {
    const twoValues = jascPal(testPalette(0)).replace('0 0 255', '0 0');
    expect(() => parsePalette(twoValues)).toThrow('palette line 4: expected 3 values, got 2');
    const tooBig = jascPal(testPalette(0)).replace('0 0 255', '0 0 256');
    expect(() => parsePalette(tooBig)).toThrow('palette line 4: 256 exceeds 255');
    const notNumber = jascPal(testPalette(0)).replace('0 0 255', '0 x 255');
    expect(() => parsePalette(notNumber)).toThrow(FormatError);
  });

  it('rejects a truncated palette', () => {
    expect(() => parsePalette('JASC-PAL\n0100\n16\n1 2 3')).toThrow('palette ends after 1 of 16 colors');
  });

  it('orders by the numeric file stem', () => {
    expect(paletteNumber('07.pal')).toBe(7);
    const a = testPalette(0), b = testPalette(32), c = testPalette(160);
    const ordered = orderPalettes([
      { fileName: '10.pal', palette: c },
      { fileName: '2.pal', palette: b },
      { fileName: '00.pal', palette: a },
    ]);
    expect(ordered).toEqual([a, b, c]);
  });

  it('loads a directory, skipping other extensions', () => {
    const dir = makeTempDir();
    writeFileSync(path.join(dir, '10.pal'), jascPal(testPalette(160)));
    writeFileSync(path.join(dir, '2.pal'), jascPal(testPalette(32)));
    writeFileSync(path.join(dir, '0.pal'), jascPal(testPalette(0)));
    writeFileSync(path.join(dir, 'notes.txt'), 'not a palette');
    writeFileSync(path.join(dir, '3.gbapal'), new Uint8Array(32));
    const logger = recordingLogger();
    const palettes = loadPaletteDir(dir, logger);
    expect(palettes.length).toBe(3);
    expect(palettes.map((p) => p[0])).toEqual([[0, 0, 255], [32, 0, 255], [160, 0, 255]]);
    expect(logger.debug).toHaveBeenCalledTimes(3);
  });

  it('reports the offending file for a malformed palette', () => {
    const dir = makeTempDir();
    writeFileSync(path.join(dir, '00.pal'), jascPal(testPalette(0)));
    writeFileSync(path.join(dir, '01.pal'), 'JASC-PAL\n0200\n16\n');
    const err = catchError(() => loadPaletteDir(dir, recordingLogger()));
    expect(err).toBeInstanceOf(FormatError);
    expect(err).toMatchObject({ code: 'format', path: path.join(dir, '01.pal') });
  });

  it('rejects a non-numeric palette file name', () => {
    const dir = makeTempDir();
    writeFileSync(path.join(dir, 'grass.pal'), jascPal(testPalette(0)));
    expect(() => loadPaletteDir(dir, recordingLogger())).toThrow('palette file name "grass.pal" is not numeric');
  });

  it('raises IoError for a missing directory', () => {
    const dir = path.join(makeTempDir(), 'missing');
    expect(() => loadPaletteDir(dir, recordingLogger())).toThrow(IoError);
  });
});
