/**
 * Source map v3 document envelope: parsing, validation and serialization.
 * The `mappings` field itself is handled by the decoder and encoder.
 */
import { InvalidSourceMapError } from './errors.js';

export type SourceMapV3 = {
  version: 3;
  file: string;
  sourceRoot?: string;
  sources: string[];
  sourcesContent?: (string | null)[];
  lineCount?: number;
  mappings: string;
  names: string[];
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((item) => typeof item === 'string');
}

function isContentArray(value: unknown): value is (string | null)[] {
  return Array.isArray(value) && value.every((item) => item === null || typeof item === 'string');
}

/**
 * Parse and validate a source map document, given as JSON text or as an
 * already parsed value.
 */
export function parseSourceMap(input: unknown): SourceMapV3 {
  let raw = input;
  if (typeof input === 'string') {
    try {
      raw = JSON.parse(input);
    } catch (e) {
      throw new InvalidSourceMapError('Source map is not valid JSON', { cause: e });
    }
  }

  if (!isRecord(raw)) {
    throw new InvalidSourceMapError('Source map must be a JSON object');
  }

  const { version, file = '', sourceRoot, sources, sourcesContent, lineCount, mappings, names } = raw;

  if (version !== 3) {
    throw new InvalidSourceMapError(`Unsupported source map version ${JSON.stringify(version)}, expected 3`);
  }
  if (typeof file !== 'string') {
    throw new InvalidSourceMapError('"file" must be a string');
  }
  if (!isStringArray(sources)) {
    throw new InvalidSourceMapError('"sources" must be an array of strings');
  }
  if (!isStringArray(names)) {
    throw new InvalidSourceMapError('"names" must be an array of strings');
  }
  if (typeof mappings !== 'string') {
    throw new InvalidSourceMapError('"mappings" must be a string');
  }

  const map: SourceMapV3 = { version: 3, file, sources, mappings, names };

  if (sourceRoot !== undefined) {
    if (typeof sourceRoot !== 'string') {
      throw new InvalidSourceMapError('"sourceRoot" must be a string');
    }
    map.sourceRoot = sourceRoot;
  }
  if (sourcesContent !== undefined) {
    if (!isContentArray(sourcesContent)) {
      throw new InvalidSourceMapError('"sourcesContent" must be an array of strings or nulls');
    }
    map.sourcesContent = sourcesContent;
  }
  if (lineCount !== undefined && lineCount !== null) {
    if (typeof lineCount !== 'number' || !Number.isInteger(lineCount) || lineCount < 0) {
      throw new InvalidSourceMapError('"lineCount" must be a non-negative integer');
    }
    map.lineCount = lineCount;
  }

  return map;
}

/**
 * Serialize a source map document to JSON text.
 */
export function serializeSourceMap(map: SourceMapV3, prettyPrint = false): string {
  return JSON.stringify(map, null, prettyPrint ? 2 : undefined);
}

/**
 * Create the sourceMappingURL comment to append to generated files.
 */
export function createSourceMapComment(mapFileName: string): string {
  return `//# sourceMappingURL=${mapFileName}`;
}
