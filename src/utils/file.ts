import { mkdirSync, readFileSync, writeFileSync } from 'node:fs';
import { dirname } from 'node:path';
import { parseSourceMap, serializeSourceMap, type SourceMapV3 } from './source-map.js';

/**
 * Safely read a file, returning null if it doesn't exist or can't be read.
 */
export function readFileSafe(filePath: string): string | null {
  try {
    return readFileSync(filePath, 'utf8');
  } catch {
    return null;
  }
}

/**
 * Write a file, ensuring the directory exists.
 */
export function writeFileEnsureDir(filePath: string, content: string): void {
  const dir = dirname(filePath);
  mkdirSync(dir, { recursive: true });
  writeFileSync(filePath, content, 'utf8');
}

/**
 * Read and validate a source map file. Returns null when the file is missing;
 * a file that exists but is not a v3 map throws `InvalidSourceMapError`.
 */
export function readSourceMapFile(filePath: string): SourceMapV3 | null {
  const content = readFileSafe(filePath);
  return content === null ? null : parseSourceMap(content);
}

export function writeSourceMapFile(filePath: string, map: SourceMapV3, prettyPrint = false): void {
  writeFileEnsureDir(filePath, serializeSourceMap(map, prettyPrint) + '\n');
}
