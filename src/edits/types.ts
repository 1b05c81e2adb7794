/**
 * Declarative page edits applied by the editor
 */

import type { Cheerio } from "cheerio";
import type { Element } from "domhandler";

/**
 * Elements an edit acts on
 */
export interface NodeTarget {
  selector: string;
  /** Keeps only the candidates this accepts */
  where?: (node: Cheerio<Element>) => boolean;
  /** Act on the direct parent instead, when the parent matches this selector */
  climb?: string;
}

export type InsertPosition = "before" | "after" | "prepend" | "append";

export interface InsertAnchor {
  target: NodeTarget;
  position: InsertPosition;
}

interface EditBase {
  /** Name used in the run report */
  label: string;
  /** Site-relative pages the edit is limited to; every page when absent */
  pages?: readonly string[];
}

/** Detach every target */
export interface RemoveEdit extends EditBase {
  kind: "remove";
  target: NodeTarget;
}

/** Replace the contents of every target */
export interface ReplaceEdit extends EditBase {
  kind: "replace";
  target: NodeTarget;
  html: string;
}

/** Insert markup once, at the first anchor that exists */
export interface InsertEdit extends EditBase {
  kind: "insert";
  anchors: readonly InsertAnchor[];
  html: string;
  /** Skip the page when this selector already matches */
  unless?: string;
  /** Skip the page unless this selector matches */
  requires?: string;
}

/** Rewrite text nodes outside scripts and styles */
export interface SubstituteEdit extends EditBase {
  kind: "substitute";
  pattern: RegExp;
  replacement: string;
  /** Trim changed text, dropping emptied nodes and emptied parents */
  prune?: boolean;
}

export type PageEdit = RemoveEdit | ReplaceEdit | InsertEdit | SubstituteEdit;

export interface EditCount {
  label: string;
  count: number;
}
