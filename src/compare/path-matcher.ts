/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause

  Ignore-rule matching. Patterns are plain strings:
    /root/child     exact path
    /root/*         any path starting with '/root/'
    /root/          '/root' itself and everything below it
  A single trailing wildcard is the only special token.
*/

import type { IgnoreOptions } from './types';

export function matchPathPattern(path: string, pattern: string): boolean {
  if (pattern === path) return true;
  if (pattern.endsWith('*')) {
    return path.startsWith(pattern.slice(0, -1));
  }
  if (pattern.endsWith('/')) {
    return path.startsWith(pattern) || `${path}/`.startsWith(pattern);
  }
  return false;
}

export function pathIsIgnored(path: string, patterns: readonly string[]): boolean {
  return patterns.some((pattern) => matchPathPattern(path, pattern));
}

export function propertyIsIgnored(name: string, properties: readonly string[] | ReadonlySet<string>): boolean {
  return 'has' in properties ? properties.has(name) : properties.includes(name);
}

/**
 * Both ignore lists, prepared once per comparison.
 */
export class IgnoreRules {
  readonly paths: readonly string[];
  readonly properties: ReadonlySet<string>;

  constructor(options: IgnoreOptions = {}) {
    this.paths = [...(options.ignorePaths ?? [])];
    this.properties = new Set(options.ignoreProperties ?? []);
  }

  isPathIgnored(path: string): boolean {
    return pathIsIgnored(path, this.paths);
  }

  isPropertyIgnored(name: string): boolean {
    return this.properties.has(name);
  }

  /** Whole element excluded: by its path or by its tag name. */
  excludesElement(path: string, name: string): boolean {
    return this.isPathIgnored(path) || this.isPropertyIgnored(name);
  }

  get isEmpty(): boolean {
    return this.paths.length === 0 && this.properties.size === 0;
  }
}
