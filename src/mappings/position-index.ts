/**
 * In-memory form of a decoded source map, organized by original location:
 *
 *   source → original line → original column → generated positions
 *
 * Sources are ordered by their rank in the map's `sources` array; lines and
 * columns by numeric value. The encoder relies on this ordering to emit a
 * stable `sources` array. A single original location can appear at several
 * generated locations, hence the list at the innermost level.
 */
import { InvalidSourceMapError } from '../utils/errors.js';
import { SortedMap, compareNumbers, rankComparator } from '../utils/sorted-map.js';

export type GeneratedPosition = {
  generatedLine: number;
  generatedColumn: number;
  name?: string;
};

export type ColumnIndex = SortedMap<number, GeneratedPosition[]>;
export type LineIndex = SortedMap<number, ColumnIndex>;
export type PositionIndex = SortedMap<string, LineIndex>;

/**
 * Plain-object view of a position index, e.g. for fixtures and debugging.
 */
export type PositionIndexObject = Record<string, LineIndexObject>;
export type LineIndexObject = Record<number, Record<number, GeneratedPosition[]>>;

export function createPositionIndex(sources: readonly string[] = []): PositionIndex {
  return new SortedMap<string, LineIndex>(rankComparator(sources));
}

export function createLineIndex(): LineIndex {
  return new SortedMap<number, ColumnIndex>(compareNumbers);
}

export function createColumnIndex(): ColumnIndex {
  return new SortedMap<number, GeneratedPosition[]>(compareNumbers);
}

/**
 * Line index of `source`, created empty if the index has none yet.
 */
export function ensureSource(index: PositionIndex, source: string): LineIndex {
  let lines = index.get(source);
  if (!lines) {
    lines = createLineIndex();
    index.set(source, lines);
  }
  return lines;
}

/**
 * Position list stored at `line`/`column`, created empty if missing.
 */
export function ensureColumn(lines: LineIndex, line: number, column: number): GeneratedPosition[] {
  let columns = lines.get(line);
  if (!columns) {
    columns = createColumnIndex();
    lines.set(line, columns);
  }

  let positions = columns.get(column);
  if (!positions) {
    positions = [];
    columns.set(column, positions);
  }
  return positions;
}

/**
 * Append a generated position for an original location. Existing positions at
 * the same location are kept.
 */
export function addGeneratedPosition(
  index: PositionIndex,
  source: string,
  line: number,
  column: number,
  position: GeneratedPosition
): void {
  ensureColumn(ensureSource(index, source), line, column).push(position);
}

export function getLines(index: PositionIndex, source: string): LineIndex | undefined {
  return index.get(source);
}

export function getGeneratedPositions(
  index: PositionIndex,
  source: string,
  line: number,
  column: number
): readonly GeneratedPosition[] {
  return lookupColumn(index.get(source), line, column);
}

export function lookupColumn(lines: LineIndex | undefined, line: number, column: number): readonly GeneratedPosition[] {
  return lines?.get(line)?.get(column) ?? [];
}

/**
 * Reduce a map to the lines of one file. With no `source` given the index must
 * describe exactly one source.
 */
export function singleSourceLines(index: PositionIndex, source?: string): LineIndex {
  if (source !== undefined) {
    const lines = index.get(source);
    if (!lines) {
      throw new InvalidSourceMapError(`Source "${source}" is not present in the map`);
    }
    return lines;
  }

  const entries = index.entries();
  if (entries.length !== 1) {
    throw new InvalidSourceMapError(
      `Expected a map of exactly one source, found ${entries.length}` +
        (entries.length > 0 ? `: ${entries.map(([name]) => name).join(', ')}` : '')
    );
  }
  return entries[0][1];
}

export function countGeneratedPositions(index: PositionIndex): number {
  let count = 0;
  for (const [, lines] of index) {
    for (const [, columns] of lines) {
      for (const [, positions] of columns) {
        count += positions.length;
      }
    }
  }
  return count;
}

export function lineIndexFromObject(record: LineIndexObject): LineIndex {
  const lines = createLineIndex();
  for (const [line, columns] of Object.entries(record)) {
    for (const [column, positions] of Object.entries(columns)) {
      ensureColumn(lines, Number(line), Number(column)).push(...positions.map((p) => ({ ...p })));
    }
  }
  return lines;
}

/**
 * Build an index from nested plain objects. Source order defaults to the
 * object's key order.
 */
export function positionIndexFromObject(
  record: PositionIndexObject,
  sources: readonly string[] = Object.keys(record)
): PositionIndex {
  const index = createPositionIndex(sources);
  for (const [source, lines] of Object.entries(record)) {
    index.set(source, lineIndexFromObject(lines));
  }
  return index;
}

export function lineIndexToObject(lines: LineIndex): LineIndexObject {
  const record: LineIndexObject = {};
  for (const [line, columns] of lines) {
    const columnRecord: Record<number, GeneratedPosition[]> = {};
    for (const [column, positions] of columns) {
      columnRecord[column] = positions.map((p) => ({ ...p }));
    }
    record[line] = columnRecord;
  }
  return record;
}

export function positionIndexToObject(index: PositionIndex): PositionIndexObject {
  const record: PositionIndexObject = {};
  for (const [source, lines] of index) {
    record[source] = lineIndexToObject(lines);
  }
  return record;
}
