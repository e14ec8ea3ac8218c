import { existsSync, mkdirSync, writeFileSync } from 'node:fs';
import path from 'node:path';
import { snakeCase } from 'change-case';
import pngjs from 'pngjs';
import { z } from 'zod';
import {
  FormatError,
  IndexRangeError,
  composeMap,
  crc32,
  defaultLogger,
  loadLayoutTileset,
  loadMapGrid,
  readText,
  withAssetPath,
  type Logger,
  type MissingCell,
  type RGBAImage,
} from '@metatile/core';

export const LAYOUTS_FILE = path.join('data', 'layouts', 'layouts.json');
export const PRIMARY_TILESETS_DIR = path.join('data', 'tilesets', 'primary');
export const SECONDARY_TILESETS_DIR = path.join('data', 'tilesets', 'secondary');
export const TILESET_SYMBOL_PREFIX = 'gTileset_';
export const DEFAULT_LAYOUT = 'LAYOUT_POWER_PLANT';
export const DEFAULT_OUTPUT = '/tmp/render.png';
export const ROOT_ENV = 'METATILE_ROOT';

const layoutSchema = z.object({
  id: z.string().min(1),
  width: z.number().int().positive(),
  height: z.number().int().positive(),
  primary_tileset: z.string().startsWith(TILESET_SYMBOL_PREFIX),
  secondary_tileset: z.string().startsWith(TILESET_SYMBOL_PREFIX),
  border_filepath: z.string().min(1),
  blockdata_filepath: z.string().min(1),
});

export type Layout = z.infer<typeof layoutSchema>;

// Entries are only checked when selected; the table may hold placeholder records.
const layoutsTableSchema = z.object({
  layouts: z.array(z.unknown()),
});

export function parseOpts(args: string[]): Record<string, string> {
  const opts: Record<string, string> = {};
  for (let i = 0; i < args.length; i++) {
    const a = args[i]!;
    if (a.startsWith('--')) {
      const key = a.slice(2);
      const next = (i + 1 < args.length) ? args[i + 1] : undefined;
      const val = (next && !next.startsWith('--')) ? args[++i]! : '1';
      opts[key] = val;
    }
  }
  return opts;
}

export function resolveRoot(opt: string | undefined): string {
  return path.resolve(opt ?? process.env[ROOT_ENV] ?? process.cwd());
}

function readLayoutEntries(root: string): unknown[] {
  const filePath = path.join(root, LAYOUTS_FILE);
  const text = readText(filePath);
  return withAssetPath(filePath, () => {
    let json: unknown;
    try {
      json = JSON.parse(text);
    } catch (err) {
      throw new FormatError(`invalid JSON: ${err instanceof Error ? err.message : String(err)}`);
    }
    const table = layoutsTableSchema.safeParse(json);
    if (!table.success) throw new FormatError(`layouts table: ${table.error.issues.map((i) => i.message).join('; ')}`);
    return table.data.layouts;
  });
}

function entryId(entry: unknown): string | undefined {
  if (typeof entry !== 'object' || entry === null || !('id' in entry)) return undefined;
  return typeof entry.id === 'string' ? entry.id : undefined;
}

export function listLayoutIds(root: string): string[] {
  return readLayoutEntries(root)
    .map(entryId)
    .filter((id): id is string => id !== undefined);
}

export function findLayout(root: string, id: string): Layout {
  const filePath = path.join(root, LAYOUTS_FILE);
  const entry = readLayoutEntries(root).find((e) => entryId(e) === id);
  if (entry === undefined) throw new IndexRangeError(`no layout matching name ${id}`, filePath);
  const parsed = layoutSchema.safeParse(entry);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new FormatError(`layout ${id}: ${issues}`, filePath);
  }
  return parsed.data;
}

// "CeladonCity" -> "celadon_city", "SeviiIslands45" -> "sevii_islands_45"
export function toSnakeCase(name: string): string {
  return snakeCase(name, { separateNumbers: true });
}

function stripTilesetPrefix(symbol: string): string {
  if (!symbol.startsWith(TILESET_SYMBOL_PREFIX)) throw new FormatError(`tileset symbol ${symbol} lacks ${TILESET_SYMBOL_PREFIX}`);
  return symbol.slice(TILESET_SYMBOL_PREFIX.length);
}

// Primary tileset directories are the lowercased symbol; secondary ones are snake_case.
export function tilesetDirs(root: string, layout: Layout): { primary: string; secondary: string } {
  return {
    primary: path.join(root, PRIMARY_TILESETS_DIR, stripTilesetPrefix(layout.primary_tileset).toLowerCase()),
    secondary: path.join(root, SECONDARY_TILESETS_DIR, toSnakeCase(stripTilesetPrefix(layout.secondary_tileset))),
  };
}

export type RenderResult = { layout: Layout; image: RGBAImage; missing: MissingCell[]; crc32: string };

export function renderLayout(root: string, layoutId: string, logger: Logger = defaultLogger): RenderResult {
  const layout = findLayout(root, layoutId);
  logger.info('layout', `${layout.id}: ${layout.width}x${layout.height}, ${layout.primary_tileset} + ${layout.secondary_tileset}`);
  const dirs = tilesetDirs(root, layout);
  const grid = loadMapGrid(
    layout.width,
    layout.height,
    path.join(root, layout.blockdata_filepath),
    path.join(root, layout.border_filepath),
  );
  const tileset = loadLayoutTileset(dirs.primary, dirs.secondary, logger);
  const { image, missing } = composeMap(grid, tileset, logger);
  return { layout, image, missing, crc32: crc32(image.pixels) };
}

// PNG via pngjs; any other extension is written as binary PPM (P6).
export function writeImage(image: RGBAImage, filePath: string): void {
  const dir = path.dirname(filePath);
  if (!existsSync(dir)) mkdirSync(dir, { recursive: true });
  if (filePath.toLowerCase().endsWith('.png')) {
    const png = new pngjs.PNG({ width: image.width, height: image.height });
    png.data = Buffer.from(image.pixels);
    writeFileSync(filePath, pngjs.PNG.sync.write(png));
    return;
  }
  const header = Buffer.from(`P6\n${image.width} ${image.height}\n255\n`, 'ascii');
  const data = Buffer.alloc(image.width * image.height * 3);
  for (let i = 0, di = 0; i < image.pixels.length; i += 4) {
    data[di++] = image.pixels[i]!;
    data[di++] = image.pixels[i + 1]!;
    data[di++] = image.pixels[i + 2]!;
  }
  writeFileSync(filePath, Buffer.concat([header, data]));
}
