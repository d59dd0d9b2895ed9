import { TextEncoder } from "node:util";

import { SaxesParser } from "saxes";

import type { ScannerEvent } from "./events.js";

export type ScannerEventHandler = (event: ScannerEvent) => void;

/**
 * Runs saxes over the whole source and forwards its callbacks as scanner
 * events, in document order.
 *
 * Locations are the scanner's own: `line` is 1-based and `column` is the
 * 1-based column of the last character consumed, which is the `>` of a tag
 * for element events and the `<` that ended the text for character data.
 */
export const scanXml = (source: string, onEvent: ScannerEventHandler): void => {
  const parser = new SaxesParser({ xmlns: false });
  const encoder = new TextEncoder();

  parser.on("error", (error) => {
    onEvent({
      type: "parseError",
      message: error.message,
      location: { line: parser.line, column: parser.column },
    });
  });

  parser.on("opentag", (tag) => {
    onEvent({
      type: "elementStart",
      name: tag.name,
      attributes: Object.fromEntries(
        Object.entries(tag.attributes).map(([k, v]) => [k, String(v)])
      ),
      line: parser.line,
      column: parser.column,
    });
  });

  parser.on("text", (chunk) => {
    onEvent({ type: "characters", chunk, line: parser.line, column: parser.column });
  });

  parser.on("cdata", (cdata) => {
    onEvent({ type: "cdata", data: encoder.encode(cdata) });
  });

  parser.on("closetag", (tag) => {
    onEvent({ type: "elementEnd", name: tag.name, line: parser.line, column: parser.column });
  });

  parser.write(source).close();
};
