/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause
*/

export type XmlCompareErrorCode =
  | 'PARSE_FAILED'
  | 'VALIDATION_FAILED'
  | 'FETCH_FAILED'
  | 'AUTH_FAILED';

export class XmlCompareError extends Error {
  constructor(
    message: string,
    public readonly code: XmlCompareErrorCode,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'XmlCompareError';
  }
}

/** Malformed XML reported by the tokenizer; line and column are 1-based. */
export class ParseError extends XmlCompareError {
  constructor(
    public readonly detail: string,
    public readonly line: number,
    public readonly column: number
  ) {
    super(`XML parsing error: ${detail}`, 'PARSE_FAILED');
    this.name = 'ParseError';
  }
}

export class ValidationError extends XmlCompareError {
  constructor(message: string) {
    super(`Validation error: ${message}`, 'VALIDATION_FAILED');
    this.name = 'ValidationError';
  }
}

export class FetchError extends XmlCompareError {
  constructor(
    message: string,
    public readonly url: string,
    public readonly status?: number,
    options?: { cause?: unknown }
  ) {
    super(message, 'FETCH_FAILED', options);
    this.name = 'FetchError';
  }
}

export class AuthError extends XmlCompareError {
  constructor(message: string, public readonly url: string, options?: { cause?: unknown }) {
    super(`Authentication failed: ${message}`, 'AUTH_FAILED', options);
    this.name = 'AuthError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
