import { SortedMap } from '../utils/sorted-map.js';
import {
  createColumnIndex,
  createLineIndex,
  lookupColumn,
  singleSourceLines,
  type GeneratedPosition,
  type LineIndex,
  type PositionIndex,
} from './position-index.js';

export type MergeResult = {
  index: PositionIndex;
  /** Generated positions in the merged index. */
  kept: number;
  /** First-stage positions with no counterpart in the second map. */
  dropped: number;
};

/**
 * Compose two successive translations.
 *
 * `first` maps original sources to an intermediate file; `second` holds the
 * lines of that intermediate file mapped onward to the final output. Every
 * original location in `first` is kept, and its generated positions are
 * replaced by whatever `second` has at those intermediate coordinates.
 * Positions `second` does not know about were optimized away and are dropped,
 * which can leave an empty list.
 */
export function mergeWithStats(first: PositionIndex, second: LineIndex): MergeResult {
  const index: PositionIndex = new SortedMap<string, LineIndex>(first.compare);
  let kept = 0;
  let dropped = 0;

  for (const [source, lines] of first) {
    const mergedLines = createLineIndex();

    for (const [line, columns] of lines) {
      const mergedColumns = createColumnIndex();

      for (const [column, positions] of columns) {
        const merged: GeneratedPosition[] = [];
        for (const { generatedLine, generatedColumn } of positions) {
          const targets = lookupColumn(second, generatedLine, generatedColumn);
          if (targets.length === 0) dropped++;
          merged.push(...targets.map((target) => ({ ...target })));
        }
        kept += merged.length;
        mergedColumns.set(column, merged);
      }

      mergedLines.set(line, mergedColumns);
    }

    index.set(source, mergedLines);
  }

  return { index, kept, dropped };
}

export function merge(first: PositionIndex, second: LineIndex): PositionIndex {
  return mergeWithStats(first, second).index;
}

/**
 * Merge with a decoded second-stage map. The second map must describe a single
 * intermediate file, or name it through `intermediateSource`.
 */
export function mergeSourceMaps(first: PositionIndex, second: PositionIndex, intermediateSource?: string): PositionIndex {
  return merge(first, singleSourceLines(second, intermediateSource));
}
