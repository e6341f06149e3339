/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause
*/

import { elementAt, type FlatDocument, type XmlElement } from '../parser/types';
import { IgnoreRules } from './path-matcher';
import { renderAttribute, renderElement, formatLocation } from './render';
import type { ComparisonResult, DiffKind, XmlDiff } from './types';

/**
 * All differences between two aligned elements (same path, same ordinal).
 * Empty when the elements are equivalent under the rules.
 */
export function diffElements(e1: XmlElement, e2: XmlElement, rules: IgnoreRules): XmlDiff[] {
  const diffs: XmlDiff[] = [];
  const { path, ordinal } = e1;

  const contentIgnored = rules.isPropertyIgnored(e1.name) || rules.isPropertyIgnored(e2.name);
  if (!contentIgnored && e1.content !== e2.content) {
    diffs.push({
      kind: 'ContentDifferent',
      path,
      ordinal,
      expected: e1.content,
      actual: e2.content,
      message: 'Content differs',
    });
  }

  for (const [key, value1] of Object.entries(e1.attributes)) {
    if (rules.isPropertyIgnored(key)) continue;
    const value2 = Object.prototype.hasOwnProperty.call(e2.attributes, key) ? e2.attributes[key] : undefined;
    if (value2 === undefined) {
      diffs.push({
        kind: 'AttributeDifferent',
        path,
        ordinal,
        attribute: key,
        expected: renderAttribute(key, value1),
        message: `Attribute '${key}' missing in second XML`,
      });
    } else if (value1 !== value2) {
      diffs.push({
        kind: 'AttributeDifferent',
        path,
        ordinal,
        attribute: key,
        expected: renderAttribute(key, value1),
        actual: renderAttribute(key, value2),
        message: `Attribute '${key}' differs`,
      });
    }
  }

  for (const [key, value2] of Object.entries(e2.attributes)) {
    if (rules.isPropertyIgnored(key)) continue;
    if (Object.prototype.hasOwnProperty.call(e1.attributes, key)) continue;
    diffs.push({
      kind: 'AttributeDifferent',
      path,
      ordinal,
      attribute: key,
      actual: renderAttribute(key, value2),
      message: `Extra attribute '${key}' in second XML`,
    });
  }

  // records aligned by path normally share their tag name
  if (diffs.length === 0 && e1.name !== e2.name) {
    diffs.push({
      kind: 'StructureDifferent',
      path,
      ordinal,
      expected: renderElement(e1),
      actual: renderElement(e2),
      message: 'Elements differ',
    });
  }

  return diffs;
}

/**
 * Compare two flattened documents. Elements are aligned by path and ordinal;
 * totalElements is the larger document's element count, not the union size.
 */
export function compareDocuments(
  doc1: FlatDocument,
  doc2: FlatDocument,
  rules: IgnoreRules = new IgnoreRules()
): ComparisonResult {
  const diffs: XmlDiff[] = [];
  let matchedElements = 0;
  const totalElements = Math.max(doc1.elements.length, doc2.elements.length);

  for (const e1 of doc1.elements) {
    // ignored elements still count as matched
    if (rules.excludesElement(e1.path, e1.name)) {
      matchedElements++;
      continue;
    }

    const e2 = elementAt(doc2, e1.path, e1.ordinal);
    if (!e2) {
      diffs.push({
        kind: 'ElementMissing',
        path: e1.path,
        ordinal: e1.ordinal,
        expected: renderElement(e1),
        message: 'Element missing in second XML',
      });
      continue;
    }

    const elementDiffs = diffElements(e1, e2, rules);
    if (elementDiffs.length === 0) matchedElements++;
    else diffs.push(...elementDiffs);
  }

  for (const e2 of doc2.elements) {
    if (elementAt(doc1, e2.path, e2.ordinal)) continue;
    diffs.push({
      kind: 'ElementExtra',
      path: e2.path,
      ordinal: e2.ordinal,
      actual: renderElement(e2),
      message: 'Extra element in second XML',
    });
  }

  return {
    matched: diffs.length === 0,
    matchRatio: totalElements > 0 ? matchedElements / totalElements : 1,
    diffs,
    totalElements,
    matchedElements,
  };
}

function quote(value: string | undefined): string {
  return value === undefined ? '(none)' : JSON.stringify(value);
}

/** One-line description of a diff for logs and reports. */
export function describeDiff(diff: XmlDiff): string {
  const location = formatLocation(diff.path, diff.ordinal);
  switch (diff.kind) {
    case 'ElementMissing':
      return `${location}: missing in second document, expected ${diff.expected}`;
    case 'ElementExtra':
      return `${location}: unexpected element ${diff.actual}`;
    case 'AttributeDifferent':
      if (diff.expected === undefined) return `${location}: extra attribute ${diff.actual ?? diff.attribute}`;
      if (diff.actual === undefined) return `${location}: attribute missing, expected ${diff.expected}`;
      return `${location}: attribute ${diff.expected} became ${diff.actual}`;
    case 'ContentDifferent':
      return `${location}: content ${quote(diff.expected)} became ${quote(diff.actual)}`;
    case 'StructureDifferent':
      return `${location}: element ${diff.expected} became ${diff.actual}`;
    default: {
      const unreachable: never = diff;
      return unreachable;
    }
  }
}

export function countDiffsByKind(diffs: readonly XmlDiff[]): Record<DiffKind, number> {
  const counts: Record<DiffKind, number> = {
    ElementMissing: 0,
    ElementExtra: 0,
    AttributeDifferent: 0,
    ContentDifferent: 0,
    StructureDifferent: 0,
  };
  for (const diff of diffs) counts[diff.kind]++;
  return counts;
}
