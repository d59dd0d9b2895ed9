import { XmlTextMapError } from "./errors.js";
import { silentLogger, type Logger } from "./logger.js";

/** Unicode white space and line separators, as one string of trimmable characters. */
export const WHITESPACE_AND_NEWLINES =
  " \t\n\r\u000b\u000c\u0085\u00a0\u1680\u2000\u2001\u2002\u2003\u2004\u2005" +
  "\u2006\u2007\u2008\u2009\u200a\u2028\u2029\u202f\u205f\u3000";

export const DEFAULT_PARAGRAPH_ELEMENTS: readonly string[] = ["p"];
export const DEFAULT_LINE_BREAK_ELEMENTS: readonly string[] = ["br"];

export interface ParseOptions {
  /** Characters stripped from both ends of an element's raw text when it closes. */
  trimming?: string | Iterable<string> | null;
  /** Drop the `prefix:` part of element names. */
  ignoreNamespaces?: boolean;
  /** Elements that start a new line in the normalized text, unless nothing precedes them. */
  paragraphElements?: readonly string[];
  /** Elements that always put a line break into the normalized text. */
  lineBreakElements?: readonly string[];
  /** Re-check every range mapping after the parse and throw on a mismatch. */
  verifyMappings?: boolean;
  logger?: Logger;
}

export interface ResolvedParseOptions {
  readonly trimming: ReadonlySet<string> | null;
  readonly ignoreNamespaces: boolean;
  readonly paragraphElements: ReadonlySet<string>;
  readonly lineBreakElements: ReadonlySet<string>;
  readonly verifyMappings: boolean;
  readonly logger: Logger;
}

const invalid = (message: string): XmlTextMapError =>
  new XmlTextMapError("OPTIONS_INVALID", message);

const resolveTrimming = (trimming: ParseOptions["trimming"]): ReadonlySet<string> | null => {
  if (trimming === undefined || trimming === null) {
    return null;
  }
  const chars = new Set<string>();
  for (const entry of trimming) {
    if (typeof entry !== "string" || [...entry].length !== 1) {
      throw invalid(`Trimming entries must be single characters, got ${JSON.stringify(entry)}.`);
    }
    chars.add(entry);
  }
  return chars;
};

const resolveElementNames = (
  option: string,
  names: readonly string[] | undefined,
  fallback: readonly string[]
): ReadonlySet<string> => {
  const list = names ?? fallback;
  for (const name of list) {
    if (typeof name !== "string" || name.length === 0) {
      throw invalid(`"${option}" must contain non-empty element names.`);
    }
  }
  return new Set(list);
};

export const resolveParseOptions = (options: ParseOptions = {}): ResolvedParseOptions => {
  return Object.freeze({
    trimming: resolveTrimming(options.trimming),
    ignoreNamespaces: options.ignoreNamespaces ?? false,
    paragraphElements: resolveElementNames(
      "paragraphElements",
      options.paragraphElements,
      DEFAULT_PARAGRAPH_ELEMENTS
    ),
    lineBreakElements: resolveElementNames(
      "lineBreakElements",
      options.lineBreakElements,
      DEFAULT_LINE_BREAK_ELEMENTS
    ),
    verifyMappings: options.verifyMappings ?? false,
    logger: options.logger ?? silentLogger,
  });
};

export const trimCharacters = (value: string, chars: ReadonlySet<string>): string => {
  const codePoints = [...value];
  let start = 0;
  let end = codePoints.length;
  while (start < end && chars.has(codePoints[start])) {
    start += 1;
  }
  while (end > start && chars.has(codePoints[end - 1])) {
    end -= 1;
  }
  return codePoints.slice(start, end).join("");
};
