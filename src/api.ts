import { TextDecoder } from "node:util";

import {
  applyScannerEvent,
  createTreeBuilderState,
  finishTreeBuilder,
  type ParsedXml,
  type XmlParseResult,
} from "./builder/tree-builder.js";
import type { XmlElement } from "./builder/element.js";
import { scanXml } from "./builder/scanner.js";
import { XmlTextMapError } from "./core/errors.js";
import { resolveParseOptions, type ParseOptions } from "./core/options.js";
import { verifyRangeMappings } from "./text/normalizer.js";
import { buildPositionIndex } from "./text/position-index.js";

export type XmlInput = string | Uint8Array;

const decodeInput = (input: XmlInput): string => {
  if (typeof input === "string") {
    return input;
  }
  // TextDecoder drops a leading UTF-8 BOM.
  return new TextDecoder("utf-8").decode(input);
};

/**
 * Parses a whole document into its element tree, its normalized text and the
 * mapping from normalized text back to the source. A document the scanner
 * rejects yields only the error.
 */
export const parseXml = (input: XmlInput, options: ParseOptions = {}): XmlParseResult => {
  const resolved = resolveParseOptions(options);
  const { logger } = resolved;
  const source = decodeInput(input);
  const index = buildPositionIndex(source);
  const state = createTreeBuilderState(index, resolved);

  logger.debug("Parsing XML", { length: source.length });
  scanXml(source, (event) => {
    applyScannerEvent(state, event);
  });
  const result = finishTreeBuilder(state);

  if (!result.ok) {
    logger.warn("XML parse interrupted", {
      message: result.error.message,
      location: result.error.location,
    });
    return result;
  }

  if (resolved.verifyMappings) {
    const violations = verifyRangeMappings(source, result.text, result.mappings);
    if (violations.length > 0) {
      const [first] = violations;
      logger.error("Range mapping mismatch", { violations: violations.length });
      throw new XmlTextMapError(
        "MAPPING_INCONSISTENT",
        `Normalized text ${JSON.stringify(first.normalized)} does not match source ${JSON.stringify(first.original)}.`
      );
    }
  }

  logger.debug("Parsed XML", {
    elements: result.elements.length - 1,
    textLength: result.text.length,
    mappings: result.mappings.length,
  });
  return result;
};

export const parseXmlDocument = (input: XmlInput, options: ParseOptions = {}): ParsedXml => {
  const result = parseXml(input, options);
  if (!result.ok) {
    throw result.error;
  }
  const { root, elements, text, mappings } = result;
  return { root, elements, text, mappings };
};

export const getParent = (parsed: ParsedXml, element: XmlElement): XmlElement | null => {
  if (element.parentId === null) {
    return null;
  }
  return parsed.elements[element.parentId] ?? null;
};
