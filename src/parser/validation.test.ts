/*
  @author Sven Wisotzky
  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause
*/

import { describe, it, expect } from 'vitest';
import { validateXmlContent, validateUrl } from './validation';
import { ValidationError } from '../common/errors';

describe('validateXmlContent', () => {
  it('accepts text starting with markup', () => {
    expect(() => validateXmlContent('  <a/>')).not.toThrow();
  });

  it('rejects empty and whitespace-only input', () => {
    expect(() => validateXmlContent('')).toThrow('Validation error: XML content cannot be empty');
    expect(() => validateXmlContent(' \n ')).toThrow(ValidationError);
  });

  it('rejects text that does not start with <', () => {
    expect(() => validateXmlContent('hello')).toThrow('Validation error: Invalid XML format');
  });
});

describe('validateUrl', () => {
  it('returns the parsed URL for http and https', () => {
    expect(validateUrl('https://example.com/doc.xml').hostname).toBe('example.com');
    expect(validateUrl('http://localhost:8080/a').port).toBe('8080');
  });

  it('rejects other schemes and garbage', () => {
    expect(() => validateUrl('ftp://example.com/doc.xml')).toThrow(ValidationError);
    expect(() => validateUrl('invalid-url')).toThrow('Validation error: Invalid URL: invalid-url');
  });
});
