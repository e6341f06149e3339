/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause
*/

import { ValidationError } from '../common/errors';
import type { CompareRequest, IgnoreOptions } from '../compare/types';
import type { ComparisonSpec, UrlCompareRequest } from '../batch/types';
import type { AuthCredentials } from '../source/types';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function asRecord(value: unknown, field: string): Record<string, unknown> {
  if (isRecord(value)) return value;
  throw new ValidationError(`${field} must be an object`);
}

function requireString(record: Record<string, unknown>, key: string, prefix: string): string {
  const value = record[key];
  if (typeof value !== 'string') {
    throw new ValidationError(`${prefix}${key} must be a string`);
  }
  return value;
}

function optionalString(record: Record<string, unknown>, key: string, prefix: string): string | undefined {
  if (record[key] === undefined || record[key] === null) return undefined;
  return requireString(record, key, prefix);
}

function optionalStringList(record: Record<string, unknown>, key: string, prefix: string): string[] | undefined {
  const value = record[key];
  if (value === undefined || value === null) return undefined;
  if (!Array.isArray(value)) {
    throw new ValidationError(`${prefix}${key} must be an array of strings`);
  }
  const list: string[] = [];
  value.forEach((entry: unknown, idx) => {
    if (typeof entry !== 'string') {
      throw new ValidationError(`${prefix}${key}[${idx}] must be a string`);
    }
    list.push(entry);
  });
  return list;
}

function ignoreOptions(record: Record<string, unknown>, prefix: string): IgnoreOptions {
  const options: IgnoreOptions = {};
  const ignorePaths = optionalStringList(record, 'ignore_paths', prefix);
  const ignoreProperties = optionalStringList(record, 'ignore_properties', prefix);
  if (ignorePaths) options.ignorePaths = ignorePaths;
  if (ignoreProperties) options.ignoreProperties = ignoreProperties;
  return options;
}

function compareRequestFrom(record: Record<string, unknown>, prefix: string): CompareRequest {
  return {
    xml1: requireString(record, 'xml1', prefix),
    xml2: requireString(record, 'xml2', prefix),
    ...ignoreOptions(record, prefix),
  };
}

function credentialsFrom(value: unknown, prefix: string): AuthCredentials | undefined {
  if (value === undefined || value === null) return undefined;
  const record = asRecord(value, `${prefix}credentials`);
  return {
    username: requireString(record, 'username', `${prefix}credentials.`),
    password: requireString(record, 'password', `${prefix}credentials.`),
  };
}

function urlCompareRequestFrom(record: Record<string, unknown>, prefix: string): UrlCompareRequest {
  const request: UrlCompareRequest = {
    url1: requireString(record, 'url1', prefix),
    url2: requireString(record, 'url2', prefix),
    ...ignoreOptions(record, prefix),
  };
  const credentials = credentialsFrom(record['credentials'], prefix);
  const sessionId = optionalString(record, 'session_id', prefix);
  if (credentials) request.credentials = credentials;
  if (sessionId) request.sessionId = sessionId;
  return request;
}

/** Validate a decoded JSON body as an inline comparison request. */
export function parseCompareRequest(body: unknown): CompareRequest {
  return compareRequestFrom(asRecord(body, 'request'), '');
}

/** Validate a decoded JSON body as a URL comparison request. */
export function parseUrlCompareRequest(body: unknown): UrlCompareRequest {
  return urlCompareRequestFrom(asRecord(body, 'request'), '');
}

/**
 * Validate a batch body. Each entry of `comparisons` is inline when it
 * carries `xml1`, URL-sourced when it carries `url1`; both kinds may be
 * mixed in one batch.
 */
export function parseBatchRequest(body: unknown): ComparisonSpec[] {
  const record = asRecord(body, 'request');
  const comparisons = record['comparisons'];
  if (!Array.isArray(comparisons)) {
    throw new ValidationError('comparisons must be an array');
  }

  return comparisons.map((entry: unknown, idx): ComparisonSpec => {
    const field = `comparisons[${idx}]`;
    const item = asRecord(entry, field);
    if ('xml1' in item) return { kind: 'inline', ...compareRequestFrom(item, `${field}.`) };
    if ('url1' in item) return { kind: 'url', ...urlCompareRequestFrom(item, `${field}.`) };
    throw new ValidationError(`${field} must contain xml1/xml2 or url1/url2`);
  });
}
