import { readFileSync, readdirSync } from 'node:fs';
import { IoError } from '../errors.js';

export function readBytes(filePath: string): Uint8Array {
  try {
    return new Uint8Array(readFileSync(filePath));
  } catch (err) {
    throw new IoError(filePath, err);
  }
}

export function readText(filePath: string): string {
  try {
    return readFileSync(filePath, 'utf8');
  } catch (err) {
    throw new IoError(filePath, err);
  }
}

// File names only, in whatever order the filesystem returns them.
export function listFiles(dirPath: string): string[] {
  try {
    return readdirSync(dirPath, { withFileTypes: true })
      .filter((e) => e.isFile())
      .map((e) => e.name);
  } catch (err) {
    throw new IoError(dirPath, err);
  }
}
