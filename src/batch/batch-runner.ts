/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause
*/

import type { Logger } from '../common/logger';
import { ConsoleLogger } from '../common/console-logger';
import { loadSettings, positiveInteger } from '../common/config';
import { XmlCompareError, errorMessage } from '../common/errors';
import { ComparisonService } from '../compare/compare-service';
import { placeholderResult, type CompareRequest, type ComparisonResult } from '../compare/types';
import type { DocumentSource } from '../source/types';
import { Semaphore } from './semaphore';
import type { BatchFailure, BatchFailureCode, BatchResult, ComparisonSpec, UrlCompareRequest } from './types';

export interface BatchRunnerOptions {
  /** Required for URL items. */
  source?: DocumentSource;
  /** Upper bound on URL items fetched and compared at the same time; values below 1 fall back to the setting. */
  concurrency?: number;
  logger?: Logger;
}

type Outcome = { ok: true; result: ComparisonResult } | { ok: false; error: unknown; code: BatchFailureCode };

function failureCode(error: unknown, signal?: AbortSignal): BatchFailureCode {
  if (signal?.aborted) return 'CANCELLED';
  if (error instanceof XmlCompareError) return error.code;
  return 'INTERNAL_ERROR';
}

/**
 * Runs many comparisons. Inline items run synchronously; URL items run as
 * concurrent tasks admitted through a semaphore. A failing item becomes a
 * placeholder result and never fails the batch; results keep submission
 * order.
 */
export class BatchRunner {
  logger: Logger;
  readonly concurrency: number;
  private source: DocumentSource | undefined;
  private comparator: ComparisonService;

  constructor(options: BatchRunnerOptions = {}) {
    if (options.logger) this.logger = options.logger.clone();
    else this.logger = new ConsoleLogger();
    this.logger.setContext('batch');

    this.source = options.source;
    const configured = loadSettings().batchConcurrency;
    this.concurrency = positiveInteger(options.concurrency ?? configured, configured);
    this.comparator = new ComparisonService(options.logger);
  }

  private _inline(request: CompareRequest): Outcome {
    try {
      return { ok: true, result: this.comparator.compare(request) };
    } catch (error) {
      return { ok: false, error, code: failureCode(error) };
    }
  }

  private _collect(outcomes: Outcome[]): BatchResult {
    const results: ComparisonResult[] = [];
    const failures: BatchFailure[] = [];

    outcomes.forEach((outcome, index) => {
      if (outcome.ok) {
        results.push(outcome.result);
        return;
      }
      const failure: BatchFailure = {
        index,
        code: outcome.code,
        message: errorMessage(outcome.error),
      };
      this.logger.warn(`item ${index} failed`, failure.code, failure.message);
      failures.push(failure);
      results.push(placeholderResult());
    });

    const summary: BatchResult = {
      results,
      total: outcomes.length,
      successful: outcomes.length - failures.length,
      failed: failures.length,
      failures,
    };
    this.logger.info('batch finished', `total=${summary.total}`, `successful=${summary.successful}`, `failed=${summary.failed}`);
    return summary;
  }

  /**
   * Fetch both documents of one URL pair and compare them. Throws on
   * authentication, fetch, validation or parse failure.
   */
  async compareUrls(request: UrlCompareRequest, signal?: AbortSignal): Promise<ComparisonResult> {
    const source = this.source;
    if (!source) throw new Error('no document source configured for URL comparisons');

    let token = request.sessionId;
    if (!token && request.credentials) {
      const auth = await source.authenticate(request.url1, request.credentials.username, request.credentials.password, signal);
      token = auth.token;
    }

    const [xml1, xml2] = await Promise.all([
      source.fetch(request.url1, token, signal),
      source.fetch(request.url2, token, signal),
    ]);

    return this.comparator.compare({
      xml1,
      xml2,
      ignorePaths: request.ignorePaths,
      ignoreProperties: request.ignoreProperties,
    });
  }

  /** Synchronous; no item suspends. */
  runInline(requests: readonly CompareRequest[]): BatchResult {
    return this._collect(requests.map((request) => this._inline(request)));
  }

  runUrls(requests: readonly UrlCompareRequest[], signal?: AbortSignal): Promise<BatchResult> {
    return this.run(
      requests.map((request) => ({ kind: 'url' as const, ...request })),
      signal
    );
  }

  /**
   * Run a mixed sequence. Every URL task is submitted up front; the
   * semaphore bounds how many are in flight. Outcomes are awaited in
   * submission order, never in completion order.
   */
  async run(specs: readonly ComparisonSpec[], signal?: AbortSignal): Promise<BatchResult> {
    const semaphore = new Semaphore(this.concurrency);

    const pending: Array<Promise<Outcome>> = specs.map((spec) => {
      if (spec.kind === 'inline') return Promise.resolve(this._inline(spec));
      return semaphore
        .run(() => this.compareUrls(spec, signal), signal)
        .then(
          (result): Outcome => ({ ok: true, result }),
          (error: unknown): Outcome => ({ ok: false, error, code: failureCode(error, signal) })
        );
    });

    const outcomes: Outcome[] = [];
    for (const task of pending) {
      outcomes.push(await task);
    }
    return this._collect(outcomes);
  }
}

export function runInlineBatch(requests: readonly CompareRequest[], logger?: Logger): BatchResult {
  return new BatchRunner({ logger }).runInline(requests);
}

export function runUrlBatch(
  requests: readonly UrlCompareRequest[],
  options: BatchRunnerOptions & { signal?: AbortSignal } = {}
): Promise<BatchResult> {
  return new BatchRunner(options).runUrls(requests, options.signal);
}

export function runBatch(
  specs: readonly ComparisonSpec[],
  options: BatchRunnerOptions & { signal?: AbortSignal } = {}
): Promise<BatchResult> {
  return new BatchRunner(options).run(specs, options.signal);
}
