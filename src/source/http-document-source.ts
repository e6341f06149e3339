/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause
*/

import type { Logger } from '../common/logger';
import { ConsoleLogger } from '../common/console-logger';
import { loadSettings } from '../common/config';
import { AuthError, FetchError, ValidationError, errorMessage } from '../common/errors';
import { validateUrl } from '../parser/validation';
import { SessionStore, createSession } from './session-store';
import type { AuthToken, DocumentSource } from './types';

const USER_AGENT = 'xml-compare-core/1.0';

export type FetchFunction = (input: string, init?: RequestInit) => Promise<Response>;

export interface HttpDocumentSourceOptions {
  store?: SessionStore;
  logger?: Logger;
  timeoutMs?: number;
  maxBodyBytes?: number;
  sessionTtlMs?: number;
  fetchImpl?: FetchFunction;
  now?: () => number;
}

function detectCharsetFromHeader(contentType: string | null): string | null {
  if (!contentType) return null;
  const match = contentType.match(/charset=([^\s;]+)/i);
  return match ? match[1].replace(/["']/g, '') : null;
}

function detectCharsetFromDeclaration(bytes: Uint8Array): string | null {
  // latin1 is byte-transparent, enough to read the XML declaration
  const snippet = new TextDecoder('latin1').decode(bytes.slice(0, 200));
  const match = snippet.match(/^\s*<\?xml[^>]*\sencoding=["']([^"']+)["']/);
  return match ? match[1] : null;
}

function decodeBody(bytes: Uint8Array, contentType: string | null): string {
  const charset = detectCharsetFromHeader(contentType) ?? detectCharsetFromDeclaration(bytes) ?? 'utf-8';
  try {
    return new TextDecoder(charset).decode(bytes);
  } catch {
    // unsupported label
    return new TextDecoder('utf-8').decode(bytes);
  }
}

/** `session=abc; HttpOnly; Path=/` → `session=abc` */
export function cookiePair(setCookie: string): string {
  return setCookie.split(';')[0].trim();
}

/**
 * Abort on timeout or when the caller's signal fires, whichever comes first.
 */
function deadline(timeoutMs: number, outer?: AbortSignal) {
  const controller = new AbortController();
  let timedOut = false;
  const timer = setTimeout(() => {
    timedOut = true;
    controller.abort(new Error(`timed out after ${timeoutMs} ms`));
  }, timeoutMs);
  const onAbort = () => controller.abort(outer?.reason);
  if (outer?.aborted) onAbort();
  else outer?.addEventListener('abort', onAbort, { once: true });

  return {
    signal: controller.signal,
    timedOut: () => timedOut,
    dispose: () => {
      clearTimeout(timer);
      outer?.removeEventListener('abort', onAbort);
    },
  };
}

/**
 * Fetches documents over HTTP(S). Sessions come from a form login whose
 * cookies are replayed on later GETs.
 */
export class HttpDocumentSource implements DocumentSource {
  readonly store: SessionStore;
  logger: Logger;
  private timeoutMs: number;
  private maxBodyBytes: number;
  private sessionTtlMs: number;
  private fetchImpl: FetchFunction;
  private now: () => number;

  constructor(options: HttpDocumentSourceOptions = {}) {
    const settings = loadSettings();

    if (options.logger) this.logger = options.logger.clone();
    else this.logger = new ConsoleLogger();
    this.logger.setContext('http');

    this.now = options.now ?? Date.now;
    this.store = options.store ?? new SessionStore(options.logger, this.now);
    this.timeoutMs = options.timeoutMs ?? settings.fetchTimeoutMs;
    this.maxBodyBytes = options.maxBodyBytes ?? settings.maxBodyBytes;
    this.sessionTtlMs = options.sessionTtlMs ?? settings.sessionTtlMs;
    this.fetchImpl = options.fetchImpl ?? ((input, init) => fetch(input, init));
  }

  async fetch(url: string, token?: string, signal?: AbortSignal): Promise<string> {
    try {
      validateUrl(url);
    } catch (err) {
      throw new FetchError(errorMessage(err), url, undefined, { cause: err });
    }

    const headers: Record<string, string> = {
      'User-Agent': USER_AGENT,
      Accept: 'application/xml, text/xml, */*;q=0.5',
    };

    if (token) {
      const session = await this.store.get(token);
      if (session && session.cookies.length > 0) headers['Cookie'] = session.cookies.join('; ');
      else if (!session) this.logger.warn('unknown or expired session, fetching without cookies', url);
    }

    const limit = deadline(this.timeoutMs, signal);
    try {
      this.logger.debug('GET', url);
      const response = await this.fetchImpl(url, { method: 'GET', headers, signal: limit.signal });
      if (!response.ok) {
        throw new FetchError(`HTTP ${response.status} fetching ${url}`, url, response.status);
      }
      return await this.readBody(url, response);
    } catch (err) {
      if (err instanceof FetchError) throw err;
      if (limit.timedOut()) {
        throw new FetchError(`Timed out after ${this.timeoutMs} ms fetching ${url}`, url, undefined, { cause: err });
      }
      throw new FetchError(`Failed to fetch ${url}: ${errorMessage(err)}`, url, undefined, { cause: err });
    } finally {
      limit.dispose();
    }
  }

  private async readBody(url: string, response: Response): Promise<string> {
    if (!response.body) return '';

    const reader = response.body.getReader();
    const chunks: Uint8Array[] = [];
    let totalSize = 0;

    try {
      while (true) {
        const { done, value } = await reader.read();
        if (done) break;

        totalSize += value.byteLength;
        if (totalSize > this.maxBodyBytes) {
          await reader.cancel();
          throw new FetchError(`Response body of ${url} exceeds ${this.maxBodyBytes} bytes`, url, response.status);
        }
        chunks.push(value);
      }
    } finally {
      reader.releaseLock();
    }

    const combined = new Uint8Array(totalSize);
    let offset = 0;
    for (const chunk of chunks) {
      combined.set(chunk, offset);
      offset += chunk.byteLength;
    }
    return decodeBody(combined, response.headers.get('content-type'));
  }

  async authenticate(url: string, username: string, password: string, signal?: AbortSignal): Promise<AuthToken> {
    try {
      validateUrl(url);
    } catch (err) {
      const reason = err instanceof ValidationError ? `invalid URL ${url}` : errorMessage(err);
      throw new AuthError(reason, url, { cause: err });
    }

    const limit = deadline(this.timeoutMs, signal);
    let response: Response;
    try {
      this.logger.debug('POST login', url, username);
      response = await this.fetchImpl(url, {
        method: 'POST',
        headers: { 'User-Agent': USER_AGENT, 'Content-Type': 'application/x-www-form-urlencoded' },
        body: new URLSearchParams({ username, password }).toString(),
        signal: limit.signal,
      });
    } catch (err) {
      const reason = limit.timedOut() ? `timed out after ${this.timeoutMs} ms` : errorMessage(err);
      throw new AuthError(reason, url, { cause: err });
    } finally {
      limit.dispose();
    }

    if (!response.ok) {
      throw new AuthError(`HTTP ${response.status}`, url);
    }

    const cookies = response.headers.getSetCookie().map(cookiePair).filter(Boolean);
    const session = createSession(url, cookies, this.sessionTtlMs, this.now());
    await this.store.insert(session);
    this.logger.info('login succeeded', url, `${cookies.length} cookie(s)`);

    return { token: session.id, expiresAt: session.expiresAt };
  }

  logout(token: string): Promise<boolean> {
    return this.store.remove(token);
  }
}
