/**
 * Tests for oracle validation, conversion and settlement
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import { MAX_STALE_SECONDS, type PriceReading } from '@tierpay/core';
import { PaymentEngine, validateReading } from '../payment-engine.js';
import { MockPriceFeed } from '../testing/mock-price-feed.js';
import { MockFundsTransfer } from '../testing/mock-funds-transfer.js';
import { ManualClock } from '../testing/manual-clock.js';
import { ALICE, OWNER, PREMIUM_REQUIRED, PRICE, T0, silentLogger } from './helpers.js';

function reading(overrides: Partial<PriceReading> = {}): PriceReading {
  return { roundId: 5n, price: PRICE, updatedAt: T0, answeredInRound: 5n, ...overrides };
}

describe('validateReading', () => {
  it('accepts a healthy reading', () => {
    expect(() => validateReading(reading(), T0)).not.toThrow();
  });

  it('rejects a zero price', () => {
    expect(() => validateReading(reading({ price: 0n }), T0)).toThrow(
      expect.objectContaining({ code: 'INVALID_ORACLE_PRICE' }),
    );
  });

  it('rejects a negative price', () => {
    expect(() => validateReading(reading({ price: -1n }), T0)).toThrow(
      expect.objectContaining({ code: 'INVALID_ORACLE_PRICE' }),
    );
  });

  it('rejects a zero update timestamp', () => {
    expect(() => validateReading(reading({ updatedAt: 0 }), T0)).toThrow(
      expect.objectContaining({ code: 'INVALID_ORACLE_UPDATE' }),
    );
  });

  it('rejects an answer from an earlier round', () => {
    expect(() => validateReading(reading({ answeredInRound: 4n }), T0)).toThrow(
      expect.objectContaining({ code: 'INVALID_ORACLE_ROUND' }),
    );
  });

  it('accepts an answer from a later round', () => {
    expect(() => validateReading(reading({ answeredInRound: 6n }), T0)).not.toThrow();
  });

  it('accepts a reading exactly MAX_STALE_SECONDS old', () => {
    expect(() => validateReading(reading(), T0 + MAX_STALE_SECONDS)).not.toThrow();
  });

  it('rejects a reading one second older', () => {
    expect(() => validateReading(reading(), T0 + MAX_STALE_SECONDS + 1)).toThrow(
      expect.objectContaining({ code: 'ORACLE_TIMEOUT' }),
    );
  });

  it('checks in order and reports the first violation', () => {
    const broken = reading({ price: 0n, updatedAt: 0, answeredInRound: 1n });
    expect(() => validateReading(broken, T0 + 10 * MAX_STALE_SECONDS)).toThrow(
      expect.objectContaining({ code: 'INVALID_ORACLE_PRICE' }),
    );
    expect(() => validateReading({ ...broken, price: PRICE }, T0)).toThrow(
      expect.objectContaining({ code: 'INVALID_ORACLE_UPDATE' }),
    );
  });
});

describe('PaymentEngine', () => {
  let clock: ManualClock;
  let feed: MockPriceFeed;
  let transfer: MockFundsTransfer;
  let engine: PaymentEngine;

  beforeEach(() => {
    clock = new ManualClock(T0);
    feed = new MockPriceFeed(8, PRICE, clock);
    transfer = new MockFundsTransfer();
    engine = new PaymentEngine({ priceFeed: feed, transfer, clock, logger: silentLogger() });
  });

  describe('quote()', () => {
    it('converts $10 at $4923.00', async () => {
      expect(await engine.quote(10n)).toBe(PREMIUM_REQUIRED);
    });

    it('follows the current price', async () => {
      feed.updateAnswer(200_000_000_000n);
      expect(await engine.quote(10n)).toBe(5_000_000_000_000_000n);
    });

    it('reads decimals from the feed', async () => {
      const wide = new MockPriceFeed(18, 4923n * 10n ** 18n, clock);
      engine.setPriceFeed(wide);
      expect(await engine.feedDecimals()).toBe(18);
      expect(await engine.quote(10n)).toBe(PREMIUM_REQUIRED);
    });

    it('rejects a stale feed', async () => {
      clock.advance(MAX_STALE_SECONDS + 1);
      await expect(engine.quote(10n)).rejects.toMatchObject({ code: 'ORACLE_TIMEOUT' });
    });

    it('accepts a feed exactly at the staleness bound', async () => {
      clock.advance(MAX_STALE_SECONDS);
      expect(await engine.quote(10n)).toBe(PREMIUM_REQUIRED);
    });
  });

  describe('settle()', () => {
    it('commits and credits the treasury with the required amount', async () => {
      const commit = vi.fn();
      const settlement = await engine.settle(ALICE, 10n, PREMIUM_REQUIRED, commit);

      expect(settlement).toEqual({ consumed: PREMIUM_REQUIRED, refunded: 0n });
      expect(commit).toHaveBeenCalledWith(PREMIUM_REQUIRED);
      expect(engine.treasuryBalance).toBe(PREMIUM_REQUIRED);
    });

    it('refunds the excess before committing', async () => {
      const order: string[] = [];
      transfer.onTransfer = async () => {
        order.push('refund');
      };

      const settlement = await engine.settle(ALICE, 10n, PREMIUM_REQUIRED + 7n, () => order.push('commit'));

      expect(order).toEqual(['refund', 'commit']);
      expect(settlement.refunded).toBe(7n);
      expect(transfer.transfers).toEqual([{ to: ALICE, amount: 7n }]);
    });

    it('collects nothing when the tender is short', async () => {
      const commit = vi.fn();
      await expect(engine.settle(ALICE, 10n, PREMIUM_REQUIRED - 1n, commit)).rejects.toMatchObject({
        code: 'INSUFFICIENT_FUNDS',
      });
      expect(commit).not.toHaveBeenCalled();
      expect(engine.treasuryBalance).toBe(0n);
    });

    it('never evaluates funds on a bad oracle reading', async () => {
      feed.updateRoundData({ roundId: 2n, price: PRICE, updatedAt: T0, answeredInRound: 1n });
      const commit = vi.fn();

      await expect(engine.settle(ALICE, 10n, 10n ** 20n, commit)).rejects.toMatchObject({
        code: 'INVALID_ORACLE_ROUND',
      });
      expect(commit).not.toHaveBeenCalled();
      expect(transfer.transfers).toEqual([]);
    });

    it('fails REFUND_FAILED and does not commit when the refund is rejected', async () => {
      transfer.mode = 'reject';
      const commit = vi.fn();

      await expect(engine.settle(ALICE, 10n, PREMIUM_REQUIRED + 1n, commit)).rejects.toMatchObject({
        code: 'REFUND_FAILED',
      });
      expect(commit).not.toHaveBeenCalled();
      expect(engine.treasuryBalance).toBe(0n);
    });

    it('does not call the transfer for an exact tender', async () => {
      transfer.mode = 'throw';
      await engine.settle(ALICE, 10n, PREMIUM_REQUIRED, vi.fn());
      expect(engine.treasuryBalance).toBe(PREMIUM_REQUIRED);
    });
  });

  describe('withdraw()', () => {
    it('pays out the whole balance and clears it', async () => {
      await engine.settle(ALICE, 10n, PREMIUM_REQUIRED, vi.fn());

      const amount = await engine.withdraw(OWNER);

      expect(amount).toBe(PREMIUM_REQUIRED);
      expect(engine.treasuryBalance).toBe(0n);
      expect(transfer.transfers).toEqual([{ to: OWNER, amount: PREMIUM_REQUIRED }]);
    });

    it('leaves the balance untouched when the payout fails', async () => {
      await engine.settle(ALICE, 10n, PREMIUM_REQUIRED, vi.fn());
      transfer.mode = 'throw';

      await expect(engine.withdraw(OWNER)).rejects.toMatchObject({ code: 'WITHDRAWAL_FAILED' });
      expect(engine.treasuryBalance).toBe(PREMIUM_REQUIRED);
    });
  });
});
