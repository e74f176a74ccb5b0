import { InvalidPositionError } from '../utils/errors.js';
import { identityPath, type PathRelativizer } from '../utils/paths.js';
import {
  INITIAL_SEGMENT_STATE,
  encodeOffset,
  startGeneratedLine,
  type AbsoluteSegment,
  type SegmentState,
} from '../utils/segment.js';
import type { SourceMapV3 } from '../utils/source-map.js';
import { MAX_VLQ_MAGNITUDE, encodeVLQRun } from '../utils/vlq.js';
import type { PositionIndex } from './position-index.js';

export type EncodeOptions = {
  /** Name of the generated file. */
  file: string;
  /** Total number of lines in the generated file. */
  lineCount?: number;
  /** Maps each source key to its `sources` entry. Defaults to the key itself. */
  relativize?: PathRelativizer;
};

export type EncodedMappings = {
  mappings: string;
  /** Source keys in index order; `sourceIndex` fields point into this array. */
  sources: string[];
  names: string[];
};

function isCoordinate(value: unknown): boolean {
  return typeof value === 'number' && Number.isInteger(value) && value >= 0 && value <= MAX_VLQ_MAGNITUDE;
}

function assertCoordinate(value: unknown, path: string): void {
  if (!isCoordinate(value)) {
    throw new InvalidPositionError(
      path,
      `expected a non-negative integer no greater than ${MAX_VLQ_MAGNITUDE}, got ${String(value)}`
    );
  }
}

/**
 * Check every key and position of the index before any output is produced.
 */
export function validatePositionIndex(index: PositionIndex): void {
  for (const [source, lines] of index) {
    for (const [line, columns] of lines) {
      assertCoordinate(line, `${source}:${line}`);
      for (const [column, positions] of columns) {
        const location = `${source}:${line}:${column}`;
        assertCoordinate(column, location);
        positions.forEach((position, i) => {
          assertCoordinate(position.generatedLine, `${location}[${i}].generatedLine`);
          assertCoordinate(position.generatedColumn, `${location}[${i}].generatedColumn`);
          if (position.name !== undefined && typeof position.name !== 'string') {
            throw new InvalidPositionError(`${location}[${i}].name`, 'expected a string');
          }
        });
      }
    }
  }
}

/**
 * Regroup the index by generated line. Lines without segments stay as empty
 * groups so later lines keep their numbers.
 */
function collectLines(index: PositionIndex): { lines: AbsoluteSegment[][]; names: string[] } {
  const lines: AbsoluteSegment[][] = [];
  const nameIndexes = new Map<string, number>();

  index.entries().forEach(([, sourceLines], sourceIndex) => {
    for (const [originalLine, columns] of sourceLines) {
      for (const [originalColumn, positions] of columns) {
        for (const { generatedLine, generatedColumn, name } of positions) {
          const segment: AbsoluteSegment = { generatedColumn, sourceIndex, originalLine, originalColumn };

          if (name !== undefined) {
            let nameIndex = nameIndexes.get(name);
            if (nameIndex === undefined) {
              nameIndex = nameIndexes.size;
              nameIndexes.set(name, nameIndex);
            }
            segment.nameIndex = nameIndex;
          }

          while (lines.length <= generatedLine) {
            lines.push([]);
          }
          lines[generatedLine].push(segment);
        }
      }
    }
  });

  // Stable: segments at the same column keep index order.
  for (const segments of lines) {
    segments.sort((a, b) => a.generatedColumn - b.generatedColumn);
  }

  return { lines, names: [...nameIndexes.keys()] };
}

function encodeLine(segments: readonly AbsoluteSegment[], state: SegmentState): { text: string; state: SegmentState } {
  const encoded: string[] = [];
  const last = segments.reduce<SegmentState>((previous, segment) => {
    const { offset, state: next } = encodeOffset(segment, previous);
    encoded.push(encodeVLQRun(offset));
    return next;
  }, state);

  return { text: encoded.join(','), state: last };
}

/**
 * Encode a position index into a `mappings` string plus the `sources` and
 * `names` tables it refers to.
 */
export function encodeMappings(index: PositionIndex): EncodedMappings {
  validatePositionIndex(index);

  const { lines, names } = collectLines(index);

  const { groups } = lines.reduce<{ groups: string[]; state: SegmentState }>(
    (acc, segments) => {
      const { text, state } = encodeLine(segments, startGeneratedLine(acc.state));
      acc.groups.push(text);
      return { groups: acc.groups, state };
    },
    { groups: [], state: INITIAL_SEGMENT_STATE }
  );

  return { mappings: groups.join(';'), sources: index.keys(), names };
}

/**
 * Encode a position index as a complete source map v3 document.
 */
export function encodeSourceMap(index: PositionIndex, options: EncodeOptions): SourceMapV3 {
  const { file, lineCount, relativize = identityPath } = options;

  if (lineCount !== undefined) {
    assertCoordinate(lineCount, 'lineCount');
  }

  const { mappings, sources, names } = encodeMappings(index);

  return {
    version: 3,
    file,
    sources: sources.map((source, i) => relativize(source, { file, index: i })),
    ...(lineCount !== undefined ? { lineCount } : {}),
    mappings,
    names,
  };
}
