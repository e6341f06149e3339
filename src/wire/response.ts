/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause
*/

import type { ComparisonResult, XmlDiff } from '../compare/types';
import type { BatchResult } from '../batch/types';
import type { WireBatchResponse, WireCompareResponse, WireDiff } from './types';

export function toWireDiff(diff: XmlDiff): WireDiff {
  const wire: WireDiff = { path: diff.path, kind: diff.kind, message: diff.message };
  switch (diff.kind) {
    case 'ElementMissing':
      wire.expected = diff.expected;
      break;
    case 'ElementExtra':
      wire.actual = diff.actual;
      break;
    case 'AttributeDifferent':
    case 'ContentDifferent':
    case 'StructureDifferent':
      if (diff.expected !== undefined) wire.expected = diff.expected;
      if (diff.actual !== undefined) wire.actual = diff.actual;
      break;
    default: {
      const unreachable: never = diff;
      return unreachable;
    }
  }
  return wire;
}

export function toCompareResponse(result: ComparisonResult): WireCompareResponse {
  return {
    matched: result.matched,
    match_ratio: result.matchRatio,
    diffs: result.diffs.map(toWireDiff),
    total_elements: result.totalElements,
    matched_elements: result.matchedElements,
  };
}

export function toBatchResponse(batch: BatchResult): WireBatchResponse {
  return {
    results: batch.results.map(toCompareResponse),
    total: batch.total,
    successful: batch.successful,
    failed: batch.failed,
    failures: batch.failures.map((f) => ({ index: f.index, code: f.code, message: f.message })),
  };
}
