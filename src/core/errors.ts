import type { SourceLocation, SourceSpan } from "./types.js";

export class XmlTextMapError extends Error {
  readonly code: string;
  readonly span?: SourceSpan;

  constructor(code: string, message: string, span?: SourceSpan) {
    super(message);
    this.name = "XmlTextMapError";
    this.code = code;
    this.span = span;
  }
}

/**
 * The scanner gave up on the document. Carries the scanner's own message and
 * the location it reported the failure at.
 */
export class XmlParseError extends XmlTextMapError {
  readonly kind = "interruptedParse";
  readonly location: SourceLocation;

  constructor(message: string, location: SourceLocation) {
    super("INTERRUPTED_PARSE", message, { start: location, end: location });
    this.name = "XmlParseError";
    this.location = location;
  }
}
