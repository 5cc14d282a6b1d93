/**
 * Serializes the entry points of one engine instance.
 *
 * Calls from outside wait their turn on a promise chain and run one at a
 * time. A call made from inside the one in flight (typically from an
 * outbound refund or payout) would wait on itself, so it is rejected
 * before it reads any state.
 */

import { AsyncLocalStorage } from 'node:async_hooks';
import { MembershipError } from '@tierpay/core';

export class ReentrancyGuard {
  /** Name of the guarded call the current async context belongs to */
  private readonly context = new AsyncLocalStorage<string>();
  private tail: Promise<void> = Promise.resolve();
  private active = false;
  private waiting = 0;

  /** True while a guarded call is running */
  get locked(): boolean {
    return this.active;
  }

  /** Calls queued behind the one in flight */
  get pending(): number {
    return this.waiting;
  }

  /**
   * Run `fn` once every earlier call has settled. Rejects with
   * REENTRANT_CALL when invoked from within a guarded call; the turn is
   * handed on however `fn` settles.
   */
  async run<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    const outer = this.context.getStore();
    if (outer !== undefined) {
      throw new MembershipError(
        'REENTRANT_CALL',
        `${operation} rejected: called from within ${outer}`,
      );
    }

    let release: () => void = () => undefined;
    const turn = new Promise<void>((resolve) => {
      release = resolve;
    });
    const previous = this.tail;
    this.tail = previous.then(() => turn);

    this.waiting++;
    await previous;
    this.waiting--;

    this.active = true;
    try {
      return await this.context.run(operation, fn);
    } finally {
      this.active = false;
      release();
    }
  }
}
