/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause
*/

export interface AuthCredentials {
  username: string;
  password: string;
}

export interface AuthToken {
  token: string;
  expiresAt: Date;
}

/**
 * Where URL-sourced documents come from. `fetch` rejects with FetchError,
 * `authenticate` with AuthError.
 */
export interface DocumentSource {
  fetch(url: string, token?: string, signal?: AbortSignal): Promise<string>;
  authenticate(url: string, username: string, password: string, signal?: AbortSignal): Promise<AuthToken>;
}

export interface Session {
  id: string;
  /** Login URL the session was created for. */
  url: string;
  /** `name=value` pairs sent back as the Cookie header. */
  cookies: string[];
  createdAt: Date;
  expiresAt: Date;
}

export function isExpired(session: Session, now: number = Date.now()): boolean {
  return now > session.expiresAt.getTime();
}
