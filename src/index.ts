/**
 * Source map v3 codec.
 *
 * - `decode` turns a `mappings` string into a position index
 *   (source → original line → original column → generated positions)
 * - `encodeSourceMap` turns a position index back into a v3 document
 * - `merge` composes a source-level map with an optimizer map, so fully
 *   optimized output still points at the original sources
 */
export { decode, decodeSourceMap, type DecodeTables } from './mappings/decoder.js';
export {
  encodeMappings,
  encodeSourceMap,
  validatePositionIndex,
  type EncodeOptions,
  type EncodedMappings,
} from './mappings/encoder.js';
export { merge, mergeSourceMaps, mergeWithStats, type MergeResult } from './mappings/merger.js';
export {
  addGeneratedPosition,
  countGeneratedPositions,
  createPositionIndex,
  getGeneratedPositions,
  getLines,
  lineIndexFromObject,
  lineIndexToObject,
  positionIndexFromObject,
  positionIndexToObject,
  singleSourceLines,
  type ColumnIndex,
  type GeneratedPosition,
  type LineIndex,
  type LineIndexObject,
  type PositionIndex,
  type PositionIndexObject,
} from './mappings/position-index.js';
export {
  composeSourceMapFiles,
  composeSourceMaps,
  type ComposeFileOptions,
  type ComposeMapOptions,
  type ComposeResult,
  type ComposedMap,
} from './compose.js';
export {
  IndexOutOfRangeError,
  InvalidPositionError,
  InvalidSourceMapError,
  MalformedMappingError,
  MalformedVlqError,
  SourceMapError,
  type SourceMapErrorCode,
} from './utils/errors.js';
export { readSourceMapFile, writeSourceMapFile } from './utils/file.js';
export {
  baseName,
  relativePath,
  relativizeSourcePath,
  type PathContext,
  type PathRelativizer,
  type RelativizeOptions,
} from './utils/paths.js';
export {
  combineSegment,
  decodeSegment,
  encodeOffset,
  resolveSegment,
  type AbsoluteSegment,
  type OriginalPosition,
  type RawSegment,
  type SegmentState,
} from './utils/segment.js';
export { SortedMap } from './utils/sorted-map.js';
export {
  createSourceMapComment,
  parseSourceMap,
  serializeSourceMap,
  type SourceMapV3,
} from './utils/source-map.js';
export { decodeVLQ, decodeVLQRun, encodeVLQ, encodeVLQRun } from './utils/vlq.js';
