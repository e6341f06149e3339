/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause
*/

export const DIFF_KINDS = [
  'ElementMissing',
  'ElementExtra',
  'AttributeDifferent',
  'ContentDifferent',
  'StructureDifferent',
] as const;

export type DiffKind = (typeof DIFF_KINDS)[number];

interface DiffBase {
  path: string;
  /** Ordinal of the element among those sharing `path`. */
  ordinal: number;
  message: string;
}

export interface ElementMissingDiff extends DiffBase {
  kind: 'ElementMissing';
  expected: string;
}

export interface ElementExtraDiff extends DiffBase {
  kind: 'ElementExtra';
  actual: string;
}

export interface AttributeDifferentDiff extends DiffBase {
  kind: 'AttributeDifferent';
  attribute: string;
  /** `key=value` in the first document; absent for an extra attribute. */
  expected?: string;
  /** `key=value` in the second document; absent for a missing attribute. */
  actual?: string;
}

export interface ContentDifferentDiff extends DiffBase {
  kind: 'ContentDifferent';
  expected?: string;
  actual?: string;
}

export interface StructureDifferentDiff extends DiffBase {
  kind: 'StructureDifferent';
  expected: string;
  actual: string;
}

export type XmlDiff =
  | ElementMissingDiff
  | ElementExtraDiff
  | AttributeDifferentDiff
  | ContentDifferentDiff
  | StructureDifferentDiff;

export interface ComparisonResult {
  /** True iff `diffs` is empty. */
  matched: boolean;
  /** matchedElements / totalElements, 1 for two empty documents. */
  matchRatio: number;
  diffs: XmlDiff[];
  /** Element count of the larger document. */
  totalElements: number;
  matchedElements: number;
}

export interface IgnoreOptions {
  ignorePaths?: string[];
  ignoreProperties?: string[];
}

export interface CompareRequest extends IgnoreOptions {
  xml1: string;
  xml2: string;
}

/** Zero-value result standing in for a comparison that could not run. */
export function placeholderResult(): ComparisonResult {
  return { matched: false, matchRatio: 0, diffs: [], totalElements: 0, matchedElements: 0 };
}
