/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause
*/

export * from './parser';
export * from './compare';
export * from './source';
export * from './batch';
export * from './wire';

export { ConsoleLogger } from './common/console-logger';
export { LOG_LEVELS, isLogLevel } from './common/logger';
export type { Logger, LogLevel } from './common/logger';
export { getConfiguration, loadSettings, DEFAULT_SETTINGS } from './common/config';
export type { CompareSettings, Configuration, Environment } from './common/config';
export {
  XmlCompareError,
  ParseError,
  ValidationError,
  FetchError,
  AuthError,
  errorMessage,
} from './common/errors';
export type { XmlCompareErrorCode } from './common/errors';
