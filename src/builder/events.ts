import type { SourceLocation } from "../core/types.js";

export interface ElementStartEvent {
  type: "elementStart";
  name: string;
  attributes: Record<string, string>;
  line: number;
  column: number;
}

export interface CharactersEvent {
  type: "characters";
  chunk: string;
  line: number;
  column: number;
}

export interface CdataEvent {
  type: "cdata";
  data: Uint8Array;
}

export interface ElementEndEvent {
  type: "elementEnd";
  name: string;
  line: number;
  column: number;
}

export interface ParseErrorEvent {
  type: "parseError";
  message: string;
  location: SourceLocation;
}

export type ScannerEvent =
  | ElementStartEvent
  | CharactersEvent
  | CdataEvent
  | ElementEndEvent
  | ParseErrorEvent;
