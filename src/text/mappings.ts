import type { RangeMapping, TextRange } from "../core/types.js";

// Mappings are recorded in order, so their normalized ranges are sorted and disjoint.
const findMappingIndex = (mappings: readonly RangeMapping[], offset: number): number => {
  let low = 0;
  let high = mappings.length - 1;
  while (low <= high) {
    const mid = (low + high) >>> 1;
    const { start, end } = mappings[mid].normalizedRange;
    if (offset < start) {
      high = mid - 1;
    } else if (offset >= end) {
      low = mid + 1;
    } else {
      return mid;
    }
  }
  return -1;
};

/**
 * Source offset of one character of the normalized text. Inserted line
 * breaks have no source and yield null.
 */
export const toOriginalOffset = (
  mappings: readonly RangeMapping[],
  offset: number
): number | null => {
  const found = findMappingIndex(mappings, offset);
  if (found < 0) {
    return null;
  }
  const mapping = mappings[found];
  return mapping.originalRange.start + (offset - mapping.normalizedRange.start);
};

/** Source ranges that produced the normalized range, in order. */
export const toOriginalRanges = (
  mappings: readonly RangeMapping[],
  range: TextRange
): TextRange[] => {
  const ranges: TextRange[] = [];
  if (range.end <= range.start) {
    return ranges;
  }
  for (const mapping of mappings) {
    const { normalizedRange, originalRange } = mapping;
    if (normalizedRange.end <= range.start) {
      continue;
    }
    if (normalizedRange.start >= range.end) {
      break;
    }
    const from = Math.max(range.start, normalizedRange.start);
    const to = Math.min(range.end, normalizedRange.end);
    ranges.push({
      start: originalRange.start + (from - normalizedRange.start),
      end: originalRange.start + (to - normalizedRange.start),
    });
  }
  return ranges;
};
