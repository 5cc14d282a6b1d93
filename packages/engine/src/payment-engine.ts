/**
 * Payment Engine
 *
 * Reads and validates the price feed, converts whole-USD fees to native
 * units, settles a tendered amount with exact-or-refund semantics and
 * holds the collected treasury balance.
 *
 * Settlement order: validate oracle → compute required → check tender →
 * refund excess (or fail) → caller's commit → credit treasury.
 */

import {
  MAX_STALE_SECONDS,
  MembershipError,
  getErrorMessage,
  usdToNative,
  type AccountId,
  type Clock,
  type FundsTransfer,
  type PriceFeed,
  type PriceReading,
} from '@tierpay/core';
import { createLogger, type Logger } from './lib/logger.js';

export interface PaymentEngineDeps {
  priceFeed: PriceFeed;
  transfer: FundsTransfer;
  clock: Clock;
  logger?: Logger;
}

export interface Settlement {
  /** Native units kept */
  consumed: bigint;
  /** Native units sent back to the payer */
  refunded: bigint;
}

/**
 * Apply the oracle integrity checks in order, failing on the first one
 * violated. Exposed for testing.
 */
export function validateReading(reading: PriceReading, now: number): void {
  if (reading.price <= 0n) {
    throw new MembershipError('INVALID_ORACLE_PRICE', `Oracle price must be positive, got ${reading.price}`);
  }
  if (reading.updatedAt === 0) {
    throw new MembershipError('INVALID_ORACLE_UPDATE', 'Oracle round has no update timestamp');
  }
  if (reading.answeredInRound < reading.roundId) {
    throw new MembershipError(
      'INVALID_ORACLE_ROUND',
      `Oracle answer from round ${reading.answeredInRound} is older than round ${reading.roundId}`,
    );
  }
  if (now - reading.updatedAt > MAX_STALE_SECONDS) {
    throw new MembershipError(
      'ORACLE_TIMEOUT',
      `Oracle price is ${now - reading.updatedAt}s old (max ${MAX_STALE_SECONDS}s)`,
    );
  }
}

export class PaymentEngine {
  private feed: PriceFeed;
  private readonly transfer: FundsTransfer;
  private readonly clock: Clock;
  private readonly log: Logger;
  private balance = 0n;

  constructor(deps: PaymentEngineDeps) {
    this.feed = deps.priceFeed;
    this.transfer = deps.transfer;
    this.clock = deps.clock;
    this.log = deps.logger ?? createLogger('PaymentEngine');
  }

  get priceFeed(): PriceFeed {
    return this.feed;
  }

  setPriceFeed(feed: PriceFeed): void {
    this.feed = feed;
  }

  /** Native units collected and not yet withdrawn */
  get treasuryBalance(): bigint {
    return this.balance;
  }

  async feedDecimals(): Promise<number> {
    return this.feed.decimals();
  }

  /**
   * Native units owed right now for a whole-USD amount.
   */
  async quote(usdBaseAmount: bigint): Promise<bigint> {
    const reading = await this.feed.latestReading();
    try {
      validateReading(reading, this.clock.now());
    } catch (err) {
      this.log.warn('rejected oracle reading', {
        error: getErrorMessage(err),
        roundId: reading.roundId,
        answeredInRound: reading.answeredInRound,
        updatedAt: reading.updatedAt,
      });
      throw err;
    }
    const decimals = await this.feed.decimals();
    return usdToNative(usdBaseAmount, reading.price, decimals);
  }

  /**
   * Collect the native equivalent of `usdBaseAmount` from `tendered`,
   * returning any excess to `payer`. `commit` runs after the refund has
   * gone through and before the treasury is credited; if anything fails
   * before it, nothing is kept and `commit` never runs.
   */
  async settle(
    payer: AccountId,
    usdBaseAmount: bigint,
    tendered: bigint,
    commit: (consumed: bigint) => void,
  ): Promise<Settlement> {
    const required = await this.quote(usdBaseAmount);

    if (tendered < required) {
      throw new MembershipError(
        'INSUFFICIENT_FUNDS',
        `Tendered ${tendered} but ${required} is required`,
      );
    }

    const excess = tendered - required;
    if (excess > 0n) {
      await this.send(payer, excess, 'REFUND_FAILED', 'refund');
    }

    commit(required);
    this.balance += required;
    this.log.debug('settled payment', { payer, usd: usdBaseAmount, consumed: required, refunded: excess });
    return { consumed: required, refunded: excess };
  }

  /**
   * Pay the whole treasury out to `to`. The balance is only cleared once
   * the transfer has gone through.
   */
  async withdraw(to: AccountId): Promise<bigint> {
    const amount = this.balance;
    await this.send(to, amount, 'WITHDRAWAL_FAILED', 'withdrawal');
    this.balance -= amount;
    return amount;
  }

  private async send(
    to: AccountId,
    amount: bigint,
    code: 'REFUND_FAILED' | 'WITHDRAWAL_FAILED',
    label: string,
  ): Promise<void> {
    let delivered: boolean;
    try {
      delivered = await this.transfer.transfer(to, amount);
    } catch (err) {
      this.log.error(`${label} transfer threw`, { to, amount, error: getErrorMessage(err) });
      throw new MembershipError(code, `${label} of ${amount} to ${to} failed: ${getErrorMessage(err)}`, {
        cause: err,
      });
    }
    if (!delivered) {
      this.log.error(`${label} transfer rejected`, { to, amount });
      throw new MembershipError(code, `${label} of ${amount} to ${to} failed`);
    }
  }
}
