import type { RangeMapping, SourceSpan } from "../core/types.js";
import { resolvePosition, type PositionIndex } from "./position-index.js";

/** Running normalized text of one parse and the provenance of every retained slice. */
export interface NormalizedTextBuffer {
  text: string;
  mappings: RangeMapping[];
}

export interface RangeMappingViolation {
  mapping: RangeMapping;
  original: string;
  normalized: string;
}

export const createNormalizedTextBuffer = (): NormalizedTextBuffer => ({
  text: "",
  mappings: [],
});

const isStructuralWhitespace = (ch: string): boolean => ch === "\n" || ch === "\r" || ch === " ";

export const appendLineBreak = (buffer: NormalizedTextBuffer): void => {
  buffer.text += "\n";
};

/**
 * Appends the source text covered by `span` to the buffer, without the
 * indentation and line breaks around it, and records where it came from.
 *
 * `span.start` is the `>` of the tag that opened (or the last tag that
 * closed) before the text; `span.end` is the `<` that ended it. Returns null
 * and records nothing when either end cannot be resolved or nothing is left
 * after trimming.
 */
export const recordTextSpan = (
  buffer: NormalizedTextBuffer,
  index: PositionIndex,
  span: SourceSpan
): RangeMapping | null => {
  const startOffset = resolvePosition(index, span.start.line, span.start.column);
  const endOffset = resolvePosition(index, span.end.line, span.end.column);
  if (startOffset === null || endOffset === null) {
    return null;
  }
  const { source } = index;

  let start = startOffset + 1;
  while (start < endOffset && isStructuralWhitespace(source[start])) {
    start += 1;
  }
  let end = endOffset;
  while (end - 1 > start && isStructuralWhitespace(source[end - 1])) {
    end -= 1;
  }
  if (start >= end) {
    return null;
  }

  const retained = source.slice(start, end);
  const mapping: RangeMapping = {
    originalRange: { start, end },
    normalizedRange: { start: buffer.text.length, end: buffer.text.length + retained.length },
  };
  buffer.text += retained;
  buffer.mappings.push(mapping);
  return mapping;
};

export const verifyRangeMappings = (
  source: string,
  text: string,
  mappings: readonly RangeMapping[]
): RangeMappingViolation[] => {
  const violations: RangeMappingViolation[] = [];
  for (const mapping of mappings) {
    const original = source.slice(mapping.originalRange.start, mapping.originalRange.end);
    const normalized = text.slice(mapping.normalizedRange.start, mapping.normalizedRange.end);
    if (original !== normalized) {
      violations.push({ mapping, original, normalized });
    }
  }
  return violations;
};
