/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause
*/

import type { XmlCompareErrorCode } from '../common/errors';
import type { CompareRequest, ComparisonResult, IgnoreOptions } from '../compare/types';
import type { AuthCredentials } from '../source/types';

export interface UrlCompareRequest extends IgnoreOptions {
  url1: string;
  url2: string;
  /** Login once (against url1) and reuse the session for both fetches. */
  credentials?: AuthCredentials;
  /** Existing session token; takes precedence over credentials. */
  sessionId?: string;
}

export type ComparisonSpec =
  | ({ kind: 'inline' } & CompareRequest)
  | ({ kind: 'url' } & UrlCompareRequest);

export type BatchFailureCode = XmlCompareErrorCode | 'CANCELLED' | 'INTERNAL_ERROR';

export interface BatchFailure {
  /** Position of the failed item in the submitted sequence. */
  index: number;
  code: BatchFailureCode;
  message: string;
}

export interface BatchResult {
  /** One entry per submitted item, in submission order; failed items hold a placeholder. */
  results: ComparisonResult[];
  total: number;
  successful: number;
  failed: number;
  failures: BatchFailure[];
}
