import type { LineSpan } from "../core/types.js";

export const DOCUMENT_ROOT_NAME = "#document-root";

export interface XmlElement {
  /** Position in the parse's element arena. The synthetic root is 0. */
  readonly id: number;
  readonly name: string;
  readonly attributes?: Readonly<Record<string, string>>;
  readonly children: readonly XmlElement[];
  /** Arena id of the parent, null for the synthetic root. */
  readonly parentId: number | null;
  /** Direct character data, before normalization. */
  readonly rawText?: string;
  /** UTF-8 bytes of the last CDATA section directly inside the element. */
  readonly cdata?: Uint8Array;
  readonly lineSpan: Readonly<LineSpan>;
}

/** The only writable view of a node; it lives while the node is on the open-element stack. */
export interface MutableElement {
  id: number;
  name: string;
  attributes?: Record<string, string>;
  children: MutableElement[];
  parentId: number | null;
  rawText?: string;
  cdata?: Uint8Array;
  lineSpan: LineSpan;
}

export const createElement = (
  id: number,
  name: string,
  parentId: number | null,
  line: number
): MutableElement => ({
  id,
  name,
  children: [],
  parentId,
  lineSpan: { start: line, end: line },
});

export const resolveElementName = (name: string, ignoreNamespaces: boolean): string => {
  if (!ignoreNamespaces) {
    return name;
  }
  const colonIdx = name.lastIndexOf(":");
  return colonIdx >= 0 ? name.slice(colonIdx + 1) : name;
};

/** Closes a node for writing. Its children are already sealed by then. */
export const sealElement = (node: MutableElement): XmlElement => {
  Object.freeze(node.children);
  Object.freeze(node.lineSpan);
  if (node.attributes) {
    Object.freeze(node.attributes);
  }
  return Object.freeze(node);
};
