/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause
*/

import * as sax from 'sax';
import { ParseError } from '../common/errors';
import type { FlatDocument, XmlElement } from './types';

function attributeValue(value: string | sax.QualifiedAttribute): string {
  return typeof value === 'string' ? value : value.value;
}

/** sax appends the position to its messages; keep the lexical part only. */
function lexicalMessage(err: Error): string {
  return err.message.split('\n')[0].trim();
}

/**
 * Flatten an XML string into path-addressed element records.
 * Uses sax in strict mode; the first tokenizer error aborts with ParseError.
 */
export function flattenXml(text: string): FlatDocument {
  const elements: XmlElement[] = [];
  const byPath = new Map<string, number[]>();
  const stack: XmlElement[] = [];
  let failure: ParseError | undefined;

  const parser = sax.parser(true, { trim: true });

  parser.onerror = (err: Error) => {
    failure ??= new ParseError(lexicalMessage(err), parser.line + 1, parser.column + 1);
  };

  parser.onopentag = (tag: sax.Tag | sax.QualifiedTag) => {
    if (failure) return;
    const parent = stack.length > 0 ? stack[stack.length - 1] : undefined;
    const path = parent ? `${parent.path}/${tag.name}` : `/${tag.name}`;

    const raw: Record<string, string | sax.QualifiedAttribute> = tag.attributes;
    const attributes: Record<string, string> = {};
    for (const [key, value] of Object.entries(raw)) {
      attributes[key] = attributeValue(value);
    }

    let indices = byPath.get(path);
    if (!indices) {
      indices = [];
      byPath.set(path, indices);
    }

    const element: XmlElement = {
      index: elements.length,
      name: tag.name,
      attributes,
      content: undefined,
      path,
      ordinal: indices.length,
    };
    indices.push(element.index);
    elements.push(element);
    stack.push(element);
  };

  const onText = (t: string) => {
    if (failure || stack.length === 0) return;
    const value = t.trim();
    if (value) stack[stack.length - 1].content = value;
  };
  parser.ontext = onText;
  parser.oncdata = onText;

  parser.onclosetag = () => {
    stack.pop();
  };

  try {
    parser.write(text).close();
  } catch (err) {
    // sax rethrows the recorded error on the next write/close
    if (!failure) {
      const cause = err instanceof Error ? err : new Error(String(err));
      failure = new ParseError(lexicalMessage(cause), parser.line + 1, parser.column + 1);
    }
  }

  if (failure) throw failure;
  return { elements, byPath };
}
