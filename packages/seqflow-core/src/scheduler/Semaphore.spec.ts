/**
 * Copyright (c) 2025 Elara AI Pty Ltd
 * Licensed under BSL 1.1. See LICENSE for details.
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import { setTimeout as sleep } from 'node:timers/promises';
import { Semaphore } from './Semaphore.js';

describe('Semaphore', () => {
  it('never lets more than the permit count run at once', async () => {
    const semaphore = new Semaphore(2);
    let running = 0;
    let peak = 0;

    await Promise.all(
      [1, 2, 3, 4, 5].map((n) =>
        semaphore.runExclusive(async () => {
          running++;
          peak = Math.max(peak, running);
          await sleep(5);
          running--;
          return n;
        })
      )
    );

    assert.strictEqual(peak, 2);
    assert.strictEqual(semaphore.inUse, 0);
  });

  it('serves waiters in arrival order', async () => {
    const semaphore = new Semaphore(1);
    const order: string[] = [];
    await semaphore.acquire();

    const a = semaphore.runExclusive(() => order.push('a'));
    const b = semaphore.runExclusive(() => order.push('b'));
    assert.deepStrictEqual(order, []);

    semaphore.release();
    await Promise.all([a, b]);
    assert.deepStrictEqual(order, ['a', 'b']);
  });

  it('releases the permit when the callback throws', async () => {
    const semaphore = new Semaphore(1);
    await assert.rejects(
      semaphore.runExclusive(() => {
        throw new Error('boom');
      }),
      { message: 'boom' }
    );
    assert.strictEqual(semaphore.inUse, 0);
  });

  it('rejects a permit count below one', () => {
    assert.throws(() => new Semaphore(0), /at least one permit, got 0/);
    assert.throws(() => new Semaphore(1.5), /got 1.5/);
  });
});
