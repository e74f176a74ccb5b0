import { resolve } from 'node:path';
import { decodeSourceMap } from './mappings/decoder.js';
import { encodeSourceMap } from './mappings/encoder.js';
import { mergeWithStats } from './mappings/merger.js';
import { singleSourceLines } from './mappings/position-index.js';
import { SourceMapError } from './utils/errors.js';
import { readSourceMapFile, writeSourceMapFile } from './utils/file.js';
import { logComposed, logError, logSkipped } from './utils/logger.js';
import type { PathRelativizer } from './utils/paths.js';
import type { SourceMapV3 } from './utils/source-map.js';

export type ComposeMapOptions = {
  /** Defaults to the second map's `file`. */
  file?: string;
  /** Defaults to the second map's `lineCount`. */
  lineCount?: number;
  relativize?: PathRelativizer;
  /** Intermediate file to read from the second map when it lists several sources. */
  intermediateSource?: string;
};

export type ComposeFileOptions = ComposeMapOptions & {
  /** Map from original sources to the intermediate file. */
  sourceMapPath: string;
  /** Map from the intermediate file to the final output. */
  optimizedMapPath: string;
  outputPath: string;
  cwd?: string;
  prettyPrint?: boolean;
  /** Label used in log output. */
  scope?: string;
};

export type ComposedMap = {
  map: SourceMapV3;
  kept: number;
  dropped: number;
};

export type ComposeResult = ComposedMap & {
  outputPath: string;
};

/**
 * Compose two parsed source maps into one that maps the first map's sources
 * straight to the second map's output.
 */
export function composeSourceMaps(first: SourceMapV3, second: SourceMapV3, options: ComposeMapOptions = {}): ComposedMap {
  const file = options.file ?? second.file;
  const lineCount = options.lineCount ?? second.lineCount;

  const intermediate = singleSourceLines(decodeSourceMap(second), options.intermediateSource);
  const { index, kept, dropped } = mergeWithStats(decodeSourceMap(first), intermediate);

  const map = encodeSourceMap(index, { file, lineCount, relativize: options.relativize });
  return { map, kept, dropped };
}

/**
 * Read two source map files, compose them and write the result.
 *
 * Returns null when an input is missing or a map is invalid; the problem is
 * logged so a build can carry on with its other outputs.
 */
export function composeSourceMapFiles(options: ComposeFileOptions): ComposeResult | null {
  const cwd = options.cwd ?? process.cwd();
  const prettyPrint = options.prettyPrint ?? true;
  const scope = options.scope ?? 'sourcemap';

  const sourceMapPath = resolve(cwd, options.sourceMapPath);
  const optimizedMapPath = resolve(cwd, options.optimizedMapPath);
  const outputPath = resolve(cwd, options.outputPath);

  try {
    const first = readSourceMapFile(sourceMapPath);
    if (!first) {
      logSkipped(scope, `Source map not found: ${sourceMapPath}`);
      return null;
    }

    const second = readSourceMapFile(optimizedMapPath);
    if (!second) {
      logSkipped(scope, `Source map not found: ${optimizedMapPath}`);
      return null;
    }

    const composed = composeSourceMaps(first, second, options);
    writeSourceMapFile(outputPath, composed.map, prettyPrint);
    logComposed(scope, outputPath, composed);

    return { ...composed, outputPath };
  } catch (e) {
    if (e instanceof SourceMapError) {
      logError(scope, `Could not compose ${outputPath}`, e);
      return null;
    }
    throw e;
  }
}
