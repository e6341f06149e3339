/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause
*/

import { LOG_LEVELS, type LogLevel, type Logger } from './logger';
import { getConfiguration } from './config';

export class ConsoleLogger implements Logger {
  private context: string | undefined;
  private level: LogLevel;

  /**
   * @param level lowest level that is written; defaults to `logLevel` from the
   * `xmlcompare` configuration section (env `XMLCOMPARE_LOG_LEVEL`)
   */
  constructor(level?: LogLevel) {
    this.context = undefined;
    this.level = level ?? getConfiguration('xmlcompare').getLogLevel('logLevel', 'info');
  }

  clone(): ConsoleLogger {
    return new ConsoleLogger(this.level);
  }

  setContext(context: string | undefined): void {
    this.context = context;
  }

  getLevel(): LogLevel {
    return this.level;
  }

  private enabled(level: LogLevel): boolean {
    return LOG_LEVELS.indexOf(level) >= LOG_LEVELS.indexOf(this.level);
  }

  private prefix(message: string): unknown[] {
    return this.context ? [`[${this.context}]`, message] : [message];
  }

  trace(message: string, ...attributes: unknown[]): void {
    if (this.enabled('trace')) console.debug(...this.prefix(message), ...attributes);
  }

  debug(message: string, ...attributes: unknown[]): void {
    if (this.enabled('debug')) console.debug(...this.prefix(message), ...attributes);
  }

  info(message: string, ...attributes: unknown[]): void {
    if (this.enabled('info')) console.info(...this.prefix(message), ...attributes);
  }

  warn(message: string, ...attributes: unknown[]): void {
    if (this.enabled('warn')) console.warn(...this.prefix(message), ...attributes);
  }

  error(message: string, ...attributes: unknown[]): void {
    if (this.enabled('error')) console.error(...this.prefix(message), ...attributes);
  }
}
