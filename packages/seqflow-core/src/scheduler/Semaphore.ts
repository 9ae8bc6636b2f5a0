/**
 * Copyright (c) 2025 Elara AI Pty Ltd
 * Licensed under BSL 1.1. See LICENSE for details.
 */

/**
 * Counting semaphore for async code.
 *
 * Waiters are served in arrival order.
 */
export class Semaphore {
  private queue: Array<() => void> = [];
  private held = 0;

  constructor(readonly permits: number) {
    if (!Number.isInteger(permits) || permits < 1) {
      throw new Error(`Semaphore needs at least one permit, got ${permits}`);
    }
  }

  /** Permits currently held */
  get inUse(): number {
    return this.held;
  }

  /**
   * Acquire a permit, execute the callback, then release.
   * If no permit is free, waits until one is.
   */
  async runExclusive<T>(fn: () => T): Promise<Awaited<T>> {
    await this.acquire();
    try {
      return await fn();
    } finally {
      this.release();
    }
  }

  acquire(): Promise<void> {
    return new Promise((resolve) => {
      if (this.held < this.permits) {
        this.held++;
        resolve();
      } else {
        this.queue.push(resolve);
      }
    });
  }

  release(): void {
    const next = this.queue.shift();
    if (next) {
      // permit passes straight to the next waiter
      next();
    } else {
      this.held--;
    }
  }
}
