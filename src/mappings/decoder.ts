import { MalformedVlqError, type SegmentLocation } from '../utils/errors.js';
import {
  INITIAL_SEGMENT_STATE,
  decodeSegment,
  startGeneratedLine,
  type RawSegment,
  type SegmentState,
} from '../utils/segment.js';
import type { SourceMapV3 } from '../utils/source-map.js';
import { decodeVLQRun } from '../utils/vlq.js';
import {
  addGeneratedPosition,
  createPositionIndex,
  ensureSource,
  type GeneratedPosition,
  type PositionIndex,
} from './position-index.js';

export type DecodeTables = {
  sources: readonly string[];
  names?: readonly string[];
};

type LineContext = {
  index: PositionIndex;
  sources: readonly string[];
  names: readonly string[];
  generatedLine: number;
};

function parseToken(token: string, location: SegmentLocation): RawSegment {
  try {
    return decodeVLQRun(token);
  } catch (e) {
    if (e instanceof MalformedVlqError) {
      throw new MalformedVlqError(e.reason, location, { cause: e });
    }
    throw e;
  }
}

function decodeLine(context: LineContext, text: string, state: SegmentState): SegmentState {
  if (text.trim() === '') return state;

  const { index, sources, names, generatedLine } = context;

  return text.split(',').reduce((previous, token, segment) => {
    const location: SegmentLocation = { line: generatedLine, segment, token };
    const { position, state: next } = decodeSegment(parseToken(token, location), previous, sources, names, location);

    const generated: GeneratedPosition = { generatedLine, generatedColumn: position.generatedColumn };
    if (position.name !== undefined) {
      generated.name = position.name;
    }
    addGeneratedPosition(index, position.source, position.originalLine, position.originalColumn, generated);

    return next;
  }, state);
}

/**
 * Decode a `mappings` string into a position index.
 *
 * Every entry of `sources` gets a key in the result, in `sources` order, even
 * when no segment refers to it.
 */
export function decode(mappings: string, tables: DecodeTables): PositionIndex {
  const { sources, names = [] } = tables;
  const index = createPositionIndex(sources);
  for (const source of sources) {
    ensureSource(index, source);
  }

  mappings
    .split(';')
    .reduce<SegmentState>(
      (state, text, generatedLine) =>
        decodeLine({ index, sources, names, generatedLine }, text, startGeneratedLine(state)),
      INITIAL_SEGMENT_STATE
    );

  return index;
}

/**
 * Decode the mappings of a parsed source map document.
 */
export function decodeSourceMap(map: Pick<SourceMapV3, 'mappings' | 'sources' | 'names'>): PositionIndex {
  return decode(map.mappings, map);
}
