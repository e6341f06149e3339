/*
  @author Sven Wisotzky
  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause
*/

import { describe, it, expect, vi } from 'vitest';
import { HttpDocumentSource, cookiePair, type FetchFunction } from './http-document-source';
import { SessionStore } from './session-store';
import { ConsoleLogger } from '../common/console-logger';
import { AuthError, FetchError } from '../common/errors';

const quiet = new ConsoleLogger('off');

function source(fetchImpl: FetchFunction, extra: { maxBodyBytes?: number; timeoutMs?: number } = {}) {
  const now = () => 10_000;
  const store = new SessionStore(quiet, now);
  return new HttpDocumentSource({ fetchImpl, store, logger: quiet, now, sessionTtlMs: 3_600_000, ...extra });
}

describe('cookiePair', () => {
  it('keeps the name=value part of a Set-Cookie header', () => {
    expect(cookiePair('session=abc123; HttpOnly; Path=/')).toBe('session=abc123');
    expect(cookiePair('plain=1')).toBe('plain=1');
  });
});

describe('HttpDocumentSource.fetch', () => {
  it('returns the response body', async () => {
    const fetchImpl = vi.fn<FetchFunction>(async () => new Response('<test>content</test>', { status: 200 }));
    const text = await source(fetchImpl).fetch('https://example.com/test.xml');
    expect(text).toBe('<test>content</test>');
    expect(fetchImpl).toHaveBeenCalledOnce();
    expect(fetchImpl.mock.calls[0][0]).toBe('https://example.com/test.xml');
    expect(fetchImpl.mock.calls[0][1]?.method).toBe('GET');
  });

  it('rejects non-success statuses with FetchError', async () => {
    const fetchImpl = vi.fn<FetchFunction>(async () => new Response('gone', { status: 404 }));
    const err = await source(fetchImpl)
      .fetch('https://example.com/notfound.xml')
      .catch((e: unknown) => e);
    expect(err).toBeInstanceOf(FetchError);
    if (err instanceof FetchError) {
      expect(err.status).toBe(404);
      expect(err.message).toBe('HTTP 404 fetching https://example.com/notfound.xml');
    }
  });

  it('rejects invalid URLs without a request', async () => {
    const fetchImpl = vi.fn<FetchFunction>(async () => new Response('<a/>'));
    await expect(source(fetchImpl).fetch('ftp://example.com/a.xml')).rejects.toBeInstanceOf(FetchError);
    expect(fetchImpl).not.toHaveBeenCalled();
  });

  it('caps the body size', async () => {
    const fetchImpl = vi.fn<FetchFunction>(async () => new Response('<abc/>'));
    await expect(source(fetchImpl, { maxBodyBytes: 4 }).fetch('https://example.com/a.xml')).rejects.toThrow(
      'Response body of https://example.com/a.xml exceeds 4 bytes'
    );
  });

  it('times out slow requests', async () => {
    const fetchImpl = vi.fn<FetchFunction>(
      (_url, init) =>
        new Promise<Response>((_resolve, reject) => {
          init?.signal?.addEventListener('abort', () => reject(init?.signal?.reason));
        })
    );
    await expect(source(fetchImpl, { timeoutMs: 20 }).fetch('https://example.com/slow.xml')).rejects.toThrow(
      'Timed out after 20 ms fetching https://example.com/slow.xml'
    );
  });

  it('decodes using the encoding of the XML declaration', async () => {
    const bytes = Uint8Array.from(Buffer.from('<?xml version="1.0" encoding="ISO-8859-1"?><a>caf\xe9</a>', 'latin1'));
    const fetchImpl = vi.fn<FetchFunction>(async () => new Response(bytes, { status: 200 }));
    const text = await source(fetchImpl).fetch('https://example.com/latin.xml');
    expect(text).toBe('<?xml version="1.0" encoding="ISO-8859-1"?><a>café</a>');
  });
});

describe('HttpDocumentSource.authenticate', () => {
  it('stores a session and replays its cookies', async () => {
    const fetchImpl = vi.fn<FetchFunction>(async (_url, init) => {
      if (init?.method === 'POST') {
        return new Response(null, {
          status: 200,
          headers: [
            ['set-cookie', 'session=abc123; HttpOnly'],
            ['set-cookie', 'theme=dark; Path=/'],
          ],
        });
      }
      return new Response('<doc/>', { status: 200 });
    });
    const http = source(fetchImpl);

    const auth = await http.authenticate('https://example.com/login', 'test', 'test-secret');
    expect(auth.expiresAt.getTime()).toBe(10_000 + 3_600_000);

    const login = fetchImpl.mock.calls[0][1];
    expect(login?.method).toBe('POST');
    expect(login?.body).toBe('username=test&password=test-secret');
    expect(login?.headers).toMatchObject({ 'Content-Type': 'application/x-www-form-urlencoded' });

    const session = await http.store.get(auth.token);
    expect(session?.cookies).toEqual(['session=abc123', 'theme=dark']);

    await expect(http.fetch('https://example.com/doc.xml', auth.token)).resolves.toBe('<doc/>');
    expect(fetchImpl.mock.calls[1][1]?.headers).toMatchObject({ Cookie: 'session=abc123; theme=dark' });

    expect(await http.logout(auth.token)).toBe(true);
    expect(await http.store.get(auth.token)).toBeUndefined();
  });

  it('rejects failed logins with AuthError', async () => {
    const fetchImpl = vi.fn<FetchFunction>(async () => new Response(null, { status: 401 }));
    await expect(source(fetchImpl).authenticate('https://example.com/login', 'test', 'wrong')).rejects.toThrow(
      'Authentication failed: HTTP 401'
    );
  });

  it('rejects invalid login URLs with AuthError', async () => {
    const fetchImpl = vi.fn<FetchFunction>(async () => new Response(null));
    await expect(source(fetchImpl).authenticate('invalid-url', 'test', 'test-secret')).rejects.toBeInstanceOf(AuthError);
    expect(fetchImpl).not.toHaveBeenCalled();
  });
});
