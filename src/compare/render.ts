/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause
*/

import type { XmlElement } from '../parser/types';

function escapeText(value: string): string {
  return value.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;');
}

function escapeAttribute(value: string): string {
  return escapeText(value).replace(/"/g, '&quot;');
}

/**
 * Compact single-element rendering used in diff payloads, e.g.
 * `<child a="1" b="2">hey</child>`. Attributes are sorted by key; children
 * are not rendered.
 */
export function renderElement(element: Pick<XmlElement, 'name' | 'attributes' | 'content'>): string {
  const attrs = Object.keys(element.attributes)
    .sort()
    .map((key) => ` ${key}="${escapeAttribute(element.attributes[key])}"`)
    .join('');
  if (element.content === undefined) return `<${element.name}${attrs}/>`;
  return `<${element.name}${attrs}>${escapeText(element.content)}</${element.name}>`;
}

export function renderAttribute(key: string, value: string): string {
  return `${key}=${value}`;
}

/** Path with a 1-based index suffix for repeated siblings: '/list/item[2]'. */
export function formatLocation(path: string, ordinal: number): string {
  return ordinal === 0 ? path : `${path}[${ordinal + 1}]`;
}
