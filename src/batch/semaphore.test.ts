/*
  @author Sven Wisotzky
  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause
*/

import { describe, it, expect } from 'vitest';
import { Semaphore } from './semaphore';

function deferred() {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

describe('Semaphore', () => {
  it('rejects a capacity below one', () => {
    expect(() => new Semaphore(0)).toThrow(RangeError);
    expect(() => new Semaphore(1.5)).toThrow('semaphore capacity must be a positive integer, got 1.5');
  });

  it('admits waiters in arrival order', async () => {
    const semaphore = new Semaphore(1);
    const order: string[] = [];

    await semaphore.acquire();
    const first = semaphore.acquire().then(() => order.push('first'));
    const second = semaphore.acquire().then(() => order.push('second'));
    expect(semaphore.waiting).toBe(2);

    semaphore.release();
    await first;
    semaphore.release();
    await second;

    expect(order).toEqual(['first', 'second']);
    expect(semaphore.inFlight).toBe(1);
  });

  it('never runs more tasks than its capacity', async () => {
    const semaphore = new Semaphore(2);
    const gates = [deferred(), deferred(), deferred(), deferred()];
    let running = 0;
    let peak = 0;

    const tasks = gates.map((gate) =>
      semaphore.run(async () => {
        running++;
        peak = Math.max(peak, running);
        await gate.promise;
        running--;
      })
    );

    await Promise.resolve();
    expect(semaphore.inFlight).toBe(2);
    expect(semaphore.waiting).toBe(2);

    gates.forEach((gate) => gate.resolve());
    await Promise.all(tasks);

    expect(peak).toBe(2);
    expect(semaphore.inFlight).toBe(0);
  });

  it('releases the slot when a task throws', async () => {
    const semaphore = new Semaphore(1);
    await expect(semaphore.run(async () => Promise.reject(new Error('boom')))).rejects.toThrow('boom');
    expect(semaphore.inFlight).toBe(0);
  });

  it('drops an aborted waiter from the queue', async () => {
    const semaphore = new Semaphore(1);
    const controller = new AbortController();
    await semaphore.acquire();

    const waiting = semaphore.acquire(controller.signal);
    controller.abort(new Error('stop'));

    await expect(waiting).rejects.toThrow('stop');
    expect(semaphore.waiting).toBe(0);
    semaphore.release();
    expect(semaphore.inFlight).toBe(0);
  });

  it('refuses to release more than was acquired', () => {
    expect(() => new Semaphore(1).release()).toThrow('semaphore released more often than acquired');
  });
});
