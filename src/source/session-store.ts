/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause
*/

import { EventEmitter } from 'events';
import { randomUUID } from 'crypto';

import type { Logger } from '../common/logger';
import { ConsoleLogger } from '../common/console-logger';
import { loadSettings } from '../common/config';
import { RwLock } from './rw-lock';
import { isExpired, type Session } from './types';

export interface SweepHandle {
  stop(): void;
}

export function createSession(url: string, cookies: string[], ttlMs: number, now: number = Date.now()): Session {
  return {
    id: randomUUID(),
    url,
    cookies,
    createdAt: new Date(now),
    expiresAt: new Date(now + ttlMs),
  };
}

/**
 * Credential sessions shared by all document fetches of the process.
 * Lookups take the read side of the lock; insert, remove and sweep take the
 * write side.
 *
 * Events:
 *   'expired' (ids: string[]) after a sweep removed at least one session
 */
export class SessionStore extends EventEmitter {
  logger: Logger;
  private sessions: Map<string, Session>;
  private lock: RwLock;
  private now: () => number;

  constructor(logger: Logger | undefined = undefined, now: () => number = Date.now) {
    super();

    if (logger) this.logger = logger.clone();
    else this.logger = new ConsoleLogger();
    this.logger.setContext('sessions');

    this.sessions = new Map();
    this.lock = new RwLock();
    this.now = now;
  }

  insert(session: Session): Promise<void> {
    return this.lock.write(() => {
      this.sessions.set(session.id, session);
      this.logger.debug('session stored', session.id, session.url);
    });
  }

  /** Live session by id; expired sessions are treated as absent. */
  get(id: string): Promise<Session | undefined> {
    return this.lock.read(() => {
      const session = this.sessions.get(id);
      return session && !isExpired(session, this.now()) ? session : undefined;
    });
  }

  remove(id: string): Promise<boolean> {
    return this.lock.write(() => this.sessions.delete(id));
  }

  size(): Promise<number> {
    return this.lock.read(() => this.sessions.size);
  }

  /** Drop expired sessions; returns the removed ids. */
  async sweepExpired(): Promise<string[]> {
    const removed = await this.lock.write(() => {
      const now = this.now();
      const ids: string[] = [];
      for (const [id, session] of this.sessions) {
        if (isExpired(session, now)) ids.push(id);
      }
      for (const id of ids) this.sessions.delete(id);
      return ids;
    });
    if (removed.length > 0) {
      this.logger.debug(`removed ${removed.length} expired session(s)`);
      this.emit('expired', removed);
    }
    return removed;
  }

  /**
   * Run sweepExpired every `intervalMs` (default: `sessionSweepMs` setting).
   * The timer does not keep the process alive; call stop() on shutdown.
   */
  startSweep(intervalMs: number = loadSettings().sessionSweepMs): SweepHandle {
    const timer = setInterval(() => {
      this.sweepExpired().catch((err: unknown) => {
        this.logger.error('session sweep failed', err);
      });
    }, intervalMs);
    timer.unref();
    this.logger.info(`session sweep every ${intervalMs} ms`);
    return {
      stop: () => {
        clearInterval(timer);
      },
    };
  }
}
