/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause
*/

import xmlFormat from 'xml-formatter';

import type { Logger } from '../common/logger';
import { ConsoleLogger } from '../common/console-logger';
import { ParseError } from '../common/errors';
import { flattenXml } from '../parser/xml-flattener';
import { validateXmlContent } from '../parser/validation';
import type { FlatDocument } from '../parser/types';
import { compareDocuments, countDiffsByKind } from './diff-engine';
import { IgnoreRules } from './path-matcher';
import type { CompareRequest, ComparisonResult } from './types';

export class ComparisonService {
  logger: Logger;

  constructor(logger: Logger | undefined = undefined) {
    if (logger) this.logger = logger.clone();
    else this.logger = new ConsoleLogger();
    this.logger.setContext('compare');
  }

  private _dumpXML(data: string): string {
    try {
      return '\n' + xmlFormat(data, { indentation: '  ', collapseContent: true, lineSeparator: '\n' });
    } catch {
      return `\n${data}`;
    }
  }

  private _flatten(label: string, text: string): FlatDocument {
    validateXmlContent(text);
    try {
      return flattenXml(text);
    } catch (err) {
      if (err instanceof ParseError) {
        this.logger.debug(`${label} is not well-formed`, `line ${err.line}, column ${err.column}: ${err.detail}`);
        this.logger.trace(`${label} content`, this._dumpXML(text));
      }
      throw err;
    }
  }

  /**
   * Validate, flatten and compare both documents of a request.
   * Throws ValidationError or ParseError; never returns a partial result.
   */
  compare(request: CompareRequest): ComparisonResult {
    const doc1 = this._flatten('xml1', request.xml1);
    const doc2 = this._flatten('xml2', request.xml2);
    const rules = new IgnoreRules(request);

    const result = compareDocuments(doc1, doc2, rules);
    this.logger.debug(
      'comparison finished',
      `matched=${result.matched}`,
      `ratio=${result.matchRatio.toFixed(3)}`,
      `elements=${result.matchedElements}/${result.totalElements}`,
      countDiffsByKind(result.diffs)
    );
    return result;
  }
}

export function compareXml(request: CompareRequest, logger?: Logger): ComparisonResult {
  return new ComparisonService(logger).compare(request);
}
