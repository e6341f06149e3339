/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause
*/

export { HttpDocumentSource, cookiePair } from './http-document-source';
export type { FetchFunction, HttpDocumentSourceOptions } from './http-document-source';
export { SessionStore, createSession } from './session-store';
export type { SweepHandle } from './session-store';
export { RwLock } from './rw-lock';
export { isExpired } from './types';
export type { AuthCredentials, AuthToken, DocumentSource, Session } from './types';
