import { FormatError } from '../errors.js';
import { JASC_TAG, JASC_VERSION, PALETTE_SIZE, PALETTE_FILE_EXTENSION } from '../format/constants.js';

export type RGB = readonly [number, number, number];
// Exactly PALETTE_SIZE entries.
export type Palette = readonly RGB[];

function parseChannel(token: string, line: number): number {
  if (!/^\d+$/.test(token)) throw new FormatError(`palette line ${line}: "${token}" is not a color value`);
  const v = Number(token);
  if (v > 255) throw new FormatError(`palette line ${line}: ${v} exceeds 255`);
  return v;
}

// Parse a JASC-PAL text file:
//   JASC-PAL
//   0100
//   16
//   r g b   (x16)
export function parsePalette(text: string): Palette {
  const lines = text.split(/\r?\n/);
  const [tag, version, count] = [lines[0]?.trim(), lines[1]?.trim(), lines[2]?.trim()];
  if (tag !== JASC_TAG || version !== JASC_VERSION || count !== String(PALETTE_SIZE)) {
    throw new FormatError(`bad JASC-PAL header: ${JSON.stringify([tag, version, count])}`);
  }
  const colors: RGB[] = [];
  for (let i = 0; i < PALETTE_SIZE; i++) {
    const lineNo = i + 4;
    const line = lines[i + 3];
    if (line === undefined) throw new FormatError(`palette ends after ${i} of ${PALETTE_SIZE} colors`);
    const tokens = line.trim().split(/\s+/).filter((t) => t.length > 0);
    if (tokens.length !== 3) throw new FormatError(`palette line ${lineNo}: expected 3 values, got ${tokens.length}`);
    colors.push([parseChannel(tokens[0]!, lineNo), parseChannel(tokens[1]!, lineNo), parseChannel(tokens[2]!, lineNo)]);
  }
  return colors;
}

export function isPaletteFile(fileName: string): boolean {
  return fileName.endsWith(PALETTE_FILE_EXTENSION) && fileName.length > PALETTE_FILE_EXTENSION.length;
}

// "07.pal" -> 7. The stem's numeric value is the palette number TileRefs select.
export function paletteNumber(fileName: string): number {
  const stem = fileName.slice(0, fileName.length - PALETTE_FILE_EXTENSION.length);
  if (!/^\d+$/.test(stem)) throw new FormatError(`palette file name "${fileName}" is not numeric`);
  return Number(stem);
}

// Order parsed palette files by their numeric file name.
export function orderPalettes(entries: ReadonlyArray<{ fileName: string; palette: Palette }>): Palette[] {
  return entries
    .map((e) => ({ n: paletteNumber(e.fileName), palette: e.palette }))
    .sort((a, b) => a.n - b.n)
    .map((e) => e.palette);
}
