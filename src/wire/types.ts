/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause
*/

import type { DiffKind } from '../compare/types';
import type { BatchFailureCode } from '../batch/types';

/** Response shapes returned to clients; field names are snake_case. */

export interface WireDiff {
  path: string;
  kind: DiffKind;
  expected?: string;
  actual?: string;
  message: string;
}

export interface WireCompareResponse {
  matched: boolean;
  match_ratio: number;
  diffs: WireDiff[];
  total_elements: number;
  matched_elements: number;
}

export interface WireBatchFailure {
  index: number;
  code: BatchFailureCode;
  message: string;
}

export interface WireBatchResponse {
  results: WireCompareResponse[];
  total: number;
  successful: number;
  failed: number;
  failures: WireBatchFailure[];
}
