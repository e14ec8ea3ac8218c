#!/usr/bin/env node
import { AssetError, defaultLogger } from '@metatile/core';
import {
  DEFAULT_LAYOUT,
  DEFAULT_OUTPUT,
  listLayoutIds,
  parseOpts,
  renderLayout,
  resolveRoot,
  writeImage,
} from './lib.js';

function printUsage() {
  console.log(`Usage:
  metatile-render render [--layout LAYOUT_ID] [--root DIR] [--output path.png|path.ppm]
  metatile-render list [--root DIR]

  --root defaults to $METATILE_ROOT, then the current directory.
  Set METATILE_LOG=error|warn|info|debug to control diagnostics (default warn).

Examples:
  metatile-render render --layout LAYOUT_POWER_PLANT --output tmp/power_plant.png
  metatile-render list --root ../pokefirered
`);
}

function runRender(args: string[]) {
  const opts = parseOpts(args);
  const root = resolveRoot(opts['root']);
  const layoutId = opts['layout'] ?? DEFAULT_LAYOUT;
  const output = opts['output'] ?? DEFAULT_OUTPUT;

  const { layout, image, missing, crc32 } = renderLayout(root, layoutId, defaultLogger);
  writeImage(image, output);
  console.log(JSON.stringify({
    command: 'render',
    layout: layout.id,
    width: image.width,
    height: image.height,
    crc32,
    missingCells: missing.length,
    output,
  }, null, 2));
}

function runList(args: string[]) {
  const opts = parseOpts(args);
  for (const id of listLayoutIds(resolveRoot(opts['root']))) console.log(id);
}

function main() {
  const argv = process.argv.slice(2);
  const cmd = argv[0];
  if (!cmd || cmd === 'help' || cmd === '-h' || cmd === '--help') {
    printUsage();
    return;
  }
  if (cmd === 'render') {
    runRender(argv.slice(1));
    return;
  }
  if (cmd === 'list') {
    runList(argv.slice(1));
    return;
  }
  printUsage();
  process.exitCode = 1;
}

try {
  main();
} catch (err) {
  if (err instanceof AssetError) {
    console.error(`[${err.code}] ${err.message}`);
  } else {
    console.error(err);
  }
  process.exit(1);
}
