/*
  @author Sven Wisotzky
  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause
*/

import { describe, it, expect, vi } from 'vitest';
import { ComparisonService, compareXml } from './compare-service';
import { ConsoleLogger } from '../common/console-logger';
import { ParseError, ValidationError } from '../common/errors';

const quiet = new ConsoleLogger('off');

describe('ComparisonService', () => {
  it('compares two documents with ignore rules', () => {
    const service = new ComparisonService(quiet);
    const result = service.compare({
      xml1: '<Mapping date="20250819">test</Mapping>',
      xml2: '<Mapping date="20250818">test</Mapping>',
      ignorePaths: [],
      ignoreProperties: ['date'],
    });
    expect(result.matched).toBe(true);
    expect(result.diffs).toEqual([]);
  });

  it('excludes a root element named in ignoreProperties', () => {
    const result = compareXml(
      {
        xml1: '<Mapping date="20250819">test</Mapping>',
        xml2: '<Mapping date="20250818">test2</Mapping>',
        ignoreProperties: ['Mapping'],
      },
      quiet
    );
    expect(result.matched).toBe(true);
    expect(result.matchRatio).toBe(1);
  });

  it('rejects empty input before parsing', () => {
    expect(() => compareXml({ xml1: '', xml2: '<a/>' }, quiet)).toThrow(ValidationError);
    expect(() => compareXml({ xml1: '<a/>', xml2: 'plain text' }, quiet)).toThrow('Validation error: Invalid XML format');
  });

  it('surfaces malformed XML as ParseError', () => {
    expect(() => compareXml({ xml1: '<invalid><not-closed', xml2: '<test>valid</test>' }, quiet)).toThrow(ParseError);
  });

  it('logs through a clone of the given logger', () => {
    const base = new ConsoleLogger('off');
    const clone = new ConsoleLogger('off');
    const cloneSpy = vi.spyOn(base, 'clone').mockReturnValue(clone);
    const debug = vi.spyOn(clone, 'debug');

    new ComparisonService(base).compare({ xml1: '<a/>', xml2: '<a/>' });

    expect(cloneSpy).toHaveBeenCalledOnce();
    expect(debug).toHaveBeenCalledWith(
      'comparison finished',
      'matched=true',
      'ratio=1.000',
      'elements=1/1',
      { ElementMissing: 0, ElementExtra: 0, AttributeDifferent: 0, ContentDifferent: 0, StructureDifferent: 0 }
    );
  });
});
