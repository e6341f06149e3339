/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause

  Flat element model: one record per element, addressed by structural path
  plus ordinal among the records sharing that path.
*/

export interface XmlElement {
  /** Index in the document arena (pre-order). */
  index: number;
  /** Raw tag name, prefix included. */
  name: string;
  attributes: Record<string, string>;
  /** Trimmed text of the last non-empty text run, or undefined when there is none. */
  content: string | undefined;
  /** Slash-delimited chain of tag names from the root, e.g. '/root/child'. */
  path: string;
  /** 0-based position among the records sharing `path`, in document order. */
  ordinal: number;
}

export interface FlatDocument {
  /** All elements in document order. */
  elements: XmlElement[];
  /** Path to arena indices, in document order. */
  byPath: Map<string, number[]>;
}

export function elementAt(doc: FlatDocument, path: string, ordinal: number): XmlElement | undefined {
  const indices = doc.byPath.get(path);
  if (!indices || ordinal >= indices.length) return undefined;
  return doc.elements[indices[ordinal]];
}
