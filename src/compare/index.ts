/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause
*/

export { compareDocuments, diffElements, describeDiff, countDiffsByKind } from './diff-engine';
export { matchPathPattern, pathIsIgnored, propertyIsIgnored, IgnoreRules } from './path-matcher';
export { renderElement, formatLocation } from './render';
export { ComparisonService, compareXml } from './compare-service';
export { DIFF_KINDS, placeholderResult } from './types';
export type {
  DiffKind,
  XmlDiff,
  ElementMissingDiff,
  ElementExtraDiff,
  AttributeDifferentDiff,
  ContentDifferentDiff,
  StructureDifferentDiff,
  ComparisonResult,
  CompareRequest,
  IgnoreOptions,
} from './types';
