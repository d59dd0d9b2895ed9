import { XmlParseError } from "../core/errors.js";
import { trimCharacters, type ResolvedParseOptions } from "../core/options.js";
import type { RangeMapping, SourceLocation } from "../core/types.js";
import {
  appendLineBreak,
  createNormalizedTextBuffer,
  recordTextSpan,
  type NormalizedTextBuffer,
} from "../text/normalizer.js";
import { lineCount, type PositionIndex } from "../text/position-index.js";
import {
  DOCUMENT_ROOT_NAME,
  createElement,
  resolveElementName,
  sealElement,
  type MutableElement,
  type XmlElement,
} from "./element.js";
import type {
  CdataEvent,
  CharactersEvent,
  ElementEndEvent,
  ElementStartEvent,
  ParseErrorEvent,
  ScannerEvent,
} from "./events.js";

export interface TreeBuilderState {
  readonly index: PositionIndex;
  readonly options: ResolvedParseOptions;
  readonly root: MutableElement;
  readonly elements: MutableElement[];
  /** Open elements, bottom is the synthetic root. */
  readonly stack: MutableElement[];
  readonly buffer: NormalizedTextBuffer;
  /** Last element open or close boundary; text after it is measured from here. */
  start: SourceLocation | null;
  /** Last location any event reported. */
  last: SourceLocation;
  error: XmlParseError | null;
}

export interface ParsedXml {
  root: XmlElement;
  /** Every element by id, root first. */
  elements: readonly XmlElement[];
  text: string;
  mappings: readonly RangeMapping[];
}

export type XmlParseResult =
  | ({ ok: true } & ParsedXml)
  | { ok: false; error: XmlParseError };

export const createTreeBuilderState = (
  index: PositionIndex,
  options: ResolvedParseOptions
): TreeBuilderState => {
  const root = createElement(0, DOCUMENT_ROOT_NAME, null, 1);
  return {
    index,
    options,
    root,
    elements: [root],
    stack: [root],
    buffer: createNormalizedTextBuffer(),
    start: null,
    last: { line: 1, column: 1 },
    error: null,
  };
};

const top = (state: TreeBuilderState): MutableElement => state.stack[state.stack.length - 1];

const onElementStart = (state: TreeBuilderState, event: ElementStartEvent): void => {
  const parent = top(state);
  const name = resolveElementName(event.name, state.options.ignoreNamespaces);
  const node = createElement(state.elements.length, name, parent.id, event.line);
  if (Object.keys(event.attributes).length > 0) {
    node.attributes = { ...event.attributes };
  }
  parent.children.push(node);
  state.elements.push(node);
  state.stack.push(node);
  state.start = { line: event.line, column: event.column };

  // Break elements are matched on the scanner's name, prefix included.
  if (state.options.paragraphElements.has(event.name) && state.buffer.text.length > 0) {
    appendLineBreak(state.buffer);
  }
  if (state.options.lineBreakElements.has(event.name)) {
    appendLineBreak(state.buffer);
  }
};

const onCharacters = (state: TreeBuilderState, event: CharactersEvent): void => {
  const node = top(state);
  node.rawText = (node.rawText ?? "") + event.chunk;
  if (event.chunk.trim().length === 0 || !state.start) {
    return;
  }
  const span = { start: state.start, end: { line: event.line, column: event.column } };
  const mapping = recordTextSpan(state.buffer, state.index, span);
  if (!mapping) {
    state.options.logger.debug("No provenance recorded for character data", {
      element: node.name,
      span,
    });
  }
};

const onCdata = (state: TreeBuilderState, event: CdataEvent): void => {
  top(state).cdata = event.data;
};

const onElementEnd = (state: TreeBuilderState, event: ElementEndEvent): void => {
  // Unbalanced end events never close the synthetic root.
  if (state.stack.length > 1) {
    const node = top(state);
    node.lineSpan.end = event.line;
    const { trimming } = state.options;
    if (trimming && node.rawText !== undefined) {
      node.rawText = trimCharacters(node.rawText, trimming);
    }
    sealElement(node);
    state.stack.pop();
  }
  // Text after a nested element starts at its end tag, not at the parent's start tag.
  state.start = { line: event.line, column: event.column };
};

const onParseError = (state: TreeBuilderState, event: ParseErrorEvent): void => {
  if (!state.error) {
    state.error = new XmlParseError(event.message, event.location);
  }
};

/**
 * Advances the builder by one scanner event, mutating `state` in place. The
 * same state object is returned so events can be folded with `reduce`.
 * Events must arrive in document order.
 */
export const applyScannerEvent = (
  state: TreeBuilderState,
  event: ScannerEvent
): TreeBuilderState => {
  switch (event.type) {
    case "elementStart":
      state.last = { line: event.line, column: event.column };
      onElementStart(state, event);
      break;
    case "characters":
      state.last = { line: event.line, column: event.column };
      onCharacters(state, event);
      break;
    case "cdata":
      onCdata(state, event);
      break;
    case "elementEnd":
      state.last = { line: event.line, column: event.column };
      onElementEnd(state, event);
      break;
    case "parseError":
      onParseError(state, event);
      break;
  }
  return state;
};

export const finishTreeBuilder = (state: TreeBuilderState): XmlParseResult => {
  if (!state.error && state.stack.length > 1) {
    state.error = new XmlParseError(`Unclosed element <${top(state).name}>.`, state.last);
  }
  if (state.error) {
    return { ok: false, error: state.error };
  }
  state.root.lineSpan.end = lineCount(state.index);
  const root = sealElement(state.root);
  return {
    ok: true,
    root,
    elements: Object.freeze([...state.elements]),
    text: state.buffer.text,
    mappings: Object.freeze([...state.buffer.mappings]),
  };
};
