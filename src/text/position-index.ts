import type { SourceLocation } from "../core/types.js";

export interface PositionIndex {
  readonly source: string;
  /** Offsets of every line break, ascending. `\r\n` counts once, at the `\n`. */
  readonly breakOffsets: readonly number[];
}

export const buildPositionIndex = (source: string): PositionIndex => {
  const breakOffsets: number[] = [];
  for (let i = 0; i < source.length; i += 1) {
    const ch = source[i];
    if (ch === "\n" || (ch === "\r" && source[i + 1] !== "\n")) {
      breakOffsets.push(i);
    }
  }
  return { source, breakOffsets };
};

export const lineCount = (index: PositionIndex): number => index.breakOffsets.length + 1;

const lineStartOffset = (index: PositionIndex, line: number): number => {
  return line === 1 ? 0 : index.breakOffsets[line - 2] + 1;
};

// The scanner counts columns in code points; a surrogate pair is one column.
const charWidth = (source: string, offset: number): number => {
  const code = source.charCodeAt(offset);
  if (code >= 0xd800 && code <= 0xdbff) {
    const next = source.charCodeAt(offset + 1);
    if (next >= 0xdc00 && next <= 0xdfff) {
      return 2;
    }
  }
  return 1;
};

/**
 * Offset of a 1-based (line, column) pair, or null when the pair does not
 * point inside the source.
 */
export const resolvePosition = (
  index: PositionIndex,
  line: number,
  column: number
): number | null => {
  if (!Number.isInteger(line) || !Number.isInteger(column)) {
    return null;
  }
  if (line < 1 || column < 1 || line > lineCount(index)) {
    return null;
  }
  const { source } = index;
  let offset = lineStartOffset(index, line);
  for (let step = 1; step < column && offset < source.length; step += 1) {
    offset += charWidth(source, offset);
  }
  if (offset >= source.length) {
    return null;
  }
  return offset;
};

export const locate = (index: PositionIndex, offset: number): SourceLocation | null => {
  if (!Number.isInteger(offset) || offset < 0 || offset >= index.source.length) {
    return null;
  }
  // Count the breaks strictly before the offset.
  let low = 0;
  let high = index.breakOffsets.length;
  while (low < high) {
    const mid = (low + high) >>> 1;
    if (index.breakOffsets[mid] < offset) {
      low = mid + 1;
    } else {
      high = mid;
    }
  }
  const line = low + 1;
  let column = 1;
  for (let at = lineStartOffset(index, line); at < offset; column += 1) {
    at += charWidth(index.source, at);
  }
  return { line, column };
};
