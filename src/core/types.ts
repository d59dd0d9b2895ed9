export interface SourceLocation {
  line: number;
  column: number;
}

export interface SourceSpan {
  start: SourceLocation;
  end: SourceLocation;
}

/** Half-open interval of UTF-16 code unit offsets. */
export interface TextRange {
  start: number;
  end: number;
}

export interface RangeMapping {
  originalRange: TextRange;
  normalizedRange: TextRange;
}

export interface LineSpan {
  start: number;
  end: number;
}
