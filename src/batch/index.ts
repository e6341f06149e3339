/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause
*/

export { BatchRunner, runBatch, runInlineBatch, runUrlBatch } from './batch-runner';
export type { BatchRunnerOptions } from './batch-runner';
export { Semaphore } from './semaphore';
export type { BatchFailure, BatchFailureCode, BatchResult, ComparisonSpec, UrlCompareRequest } from './types';
