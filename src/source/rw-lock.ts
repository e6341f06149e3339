/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause
*/

type Waiter = { mode: 'read' | 'write'; grant: () => void };

/**
 * Async reader/writer lock: any number of concurrent readers or a single
 * writer. Waiters are served in arrival order, so a queued writer holds back
 * readers that arrive after it.
 */
export class RwLock {
  private readers = 0;
  private writing = false;
  private queue: Waiter[] = [];

  get activeReaders(): number {
    return this.readers;
  }

  get isWriteLocked(): boolean {
    return this.writing;
  }

  get pending(): number {
    return this.queue.length;
  }

  async read<T>(fn: () => T | Promise<T>): Promise<T> {
    await this.acquire('read');
    try {
      return await fn();
    } finally {
      this.readers--;
      this.drain();
    }
  }

  async write<T>(fn: () => T | Promise<T>): Promise<T> {
    await this.acquire('write');
    try {
      return await fn();
    } finally {
      this.writing = false;
      this.drain();
    }
  }

  private acquire(mode: Waiter['mode']): Promise<void> {
    if (this.queue.length === 0 && this.canGrant(mode)) {
      this.take(mode);
      return Promise.resolve();
    }
    return new Promise<void>((resolve) => {
      this.queue.push({
        mode,
        grant: () => {
          this.take(mode);
          resolve();
        },
      });
    });
  }

  private canGrant(mode: Waiter['mode']): boolean {
    return mode === 'read' ? !this.writing : !this.writing && this.readers === 0;
  }

  private take(mode: Waiter['mode']): void {
    if (mode === 'read') this.readers++;
    else this.writing = true;
  }

  private drain(): void {
    while (this.queue.length > 0 && this.canGrant(this.queue[0].mode)) {
      const next = this.queue.shift();
      if (!next) return;
      next.grant();
      if (next.mode === 'write') return;
    }
  }
}
