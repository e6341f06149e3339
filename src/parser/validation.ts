/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause
*/

import { ValidationError } from '../common/errors';

/**
 * Cheap shape check run before tokenizing: rejects empty input and text that
 * cannot start an XML document. Well-formedness is left to the flattener.
 */
export function validateXmlContent(xml: string): void {
  const trimmed = xml.trim();
  if (trimmed === '') {
    throw new ValidationError('XML content cannot be empty');
  }
  if (!trimmed.startsWith('<')) {
    throw new ValidationError('Invalid XML format');
  }
}

export function validateUrl(url: string): URL {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    throw new ValidationError(`Invalid URL: ${url}`);
  }
  if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') {
    throw new ValidationError(`Invalid URL: ${url}`);
  }
  return parsed;
}
