import { IndexOutOfRangeError, MalformedMappingError, type SegmentLocation } from './errors.js';

/**
 * A segment as it appears on the wire: `[generatedColumn, sourceIndex,
 * originalLine, originalColumn, nameIndex?]`, each field relative to the
 * previous segment.
 */
export type RawSegment = readonly number[];

/**
 * Running absolute values carried from one segment to the next.
 * `generatedColumn` restarts at 0 on every generated line; the other fields
 * only restart at the beginning of the whole map.
 */
export type SegmentState = {
  readonly generatedColumn: number;
  readonly sourceIndex: number;
  readonly originalLine: number;
  readonly originalColumn: number;
  readonly nameIndex: number;
};

/**
 * A segment with absolute coordinates. `nameIndex` is only present when the
 * segment carries a name field; 0 is a valid name index.
 */
export type AbsoluteSegment = {
  generatedColumn: number;
  sourceIndex: number;
  originalLine: number;
  originalColumn: number;
  nameIndex?: number;
};

/**
 * A segment resolved against the `sources` and `names` tables.
 */
export type OriginalPosition = {
  generatedColumn: number;
  source: string;
  originalLine: number;
  originalColumn: number;
  name?: string;
};

export const INITIAL_SEGMENT_STATE: SegmentState = Object.freeze({
  generatedColumn: 0,
  sourceIndex: 0,
  originalLine: 0,
  originalColumn: 0,
  nameIndex: 0,
});

/**
 * State to use for the first segment of a new generated line.
 */
export function startGeneratedLine(state: SegmentState): SegmentState {
  return { ...state, generatedColumn: 0 };
}

/**
 * Add a relative segment to the running state.
 */
export function combineSegment(
  relative: RawSegment,
  previous: SegmentState,
  location: SegmentLocation = {}
): { segment: AbsoluteSegment; state: SegmentState } {
  if (relative.length !== 4 && relative.length !== 5) {
    throw new MalformedMappingError(`expected 4 or 5 fields, found ${relative.length}`, location);
  }

  const [generatedColumn, sourceIndex, originalLine, originalColumn, nameIndex = 0] = relative;

  const state: SegmentState = {
    generatedColumn: previous.generatedColumn + generatedColumn,
    sourceIndex: previous.sourceIndex + sourceIndex,
    originalLine: previous.originalLine + originalLine,
    originalColumn: previous.originalColumn + originalColumn,
    nameIndex: previous.nameIndex + nameIndex,
  };

  const segment: AbsoluteSegment = {
    generatedColumn: state.generatedColumn,
    sourceIndex: state.sourceIndex,
    originalLine: state.originalLine,
    originalColumn: state.originalColumn,
  };
  if (relative.length === 5) {
    segment.nameIndex = state.nameIndex;
  }

  return { segment, state };
}

/**
 * Look up the source and name of an absolute segment.
 */
export function resolveSegment(
  segment: AbsoluteSegment,
  sources: readonly string[],
  names: readonly string[],
  location: SegmentLocation = {}
): OriginalPosition {
  const { generatedColumn, sourceIndex, originalLine, originalColumn, nameIndex } = segment;

  if (generatedColumn < 0) {
    throw new MalformedMappingError(`negative generated column ${generatedColumn}`, location);
  }
  if (originalLine < 0) {
    throw new MalformedMappingError(`negative original line ${originalLine}`, location);
  }
  if (originalColumn < 0) {
    throw new MalformedMappingError(`negative original column ${originalColumn}`, location);
  }
  if (sourceIndex < 0 || sourceIndex >= sources.length) {
    throw new IndexOutOfRangeError('sources', sourceIndex, sources.length, location);
  }

  const position: OriginalPosition = {
    generatedColumn,
    source: sources[sourceIndex],
    originalLine,
    originalColumn,
  };

  if (nameIndex !== undefined) {
    if (nameIndex < 0 || nameIndex >= names.length) {
      throw new IndexOutOfRangeError('names', nameIndex, names.length, location);
    }
    position.name = names[nameIndex];
  }

  return position;
}

/**
 * Turn a relative wire segment into a resolved original position, returning
 * the state for the next segment.
 */
export function decodeSegment(
  relative: RawSegment,
  previous: SegmentState,
  sources: readonly string[],
  names: readonly string[],
  location: SegmentLocation = {}
): { position: OriginalPosition; state: SegmentState } {
  const { segment, state } = combineSegment(relative, previous, location);
  return { position: resolveSegment(segment, sources, names, location), state };
}

/**
 * Difference between an absolute segment and the running state. The name
 * field is emitted only when the segment has a name; a segment without one
 * leaves the running name index untouched.
 */
export function encodeOffset(
  current: AbsoluteSegment,
  previous: SegmentState
): { offset: number[]; state: SegmentState } {
  const offset = [
    current.generatedColumn - previous.generatedColumn,
    current.sourceIndex - previous.sourceIndex,
    current.originalLine - previous.originalLine,
    current.originalColumn - previous.originalColumn,
  ];
  if (current.nameIndex !== undefined) {
    offset.push(current.nameIndex - previous.nameIndex);
  }

  return {
    offset,
    state: {
      generatedColumn: current.generatedColumn,
      sourceIndex: current.sourceIndex,
      originalLine: current.originalLine,
      originalColumn: current.originalColumn,
      nameIndex: current.nameIndex ?? previous.nameIndex,
    },
  };
}
