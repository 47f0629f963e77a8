// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/concurrency/serial-lock`
 * Purpose: Promise-chain mutex that runs async critical sections one at a time, in call order.
 * Scope: FIFO serialization within one process. Does not detect re-entrancy (see exec-context).
 * Invariants:
 * - Sections start in acquire() order.
 * - A rejected section releases the lock like a resolved one.
 * Side-effects: none
 * Links: features/revenue/revenue-ledger.ts
 * @public
 */

export class SerialLock {
  private tail: Promise<void> = Promise.resolve();
  private waiting = 0;

  /** Number of sections queued or running */
  get pending(): number {
    return this.waiting;
  }

  /**
   * Wait for every earlier holder, then return the release function.
   * Release exactly once.
   */
  async acquire(): Promise<() => void> {
    const previous = this.tail;
    let release: () => void = () => undefined;
    this.tail = new Promise<void>((resolve) => {
      release = resolve;
    });
    this.waiting += 1;
    await previous;

    let released = false;
    return () => {
      if (released) return;
      released = true;
      this.waiting -= 1;
      release();
    };
  }

  async run<T>(section: () => Promise<T>): Promise<T> {
    const release = await this.acquire();
    try {
      return await section();
    } finally {
      release();
    }
  }
}
