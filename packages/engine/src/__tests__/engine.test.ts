import { describe, it, expect, vi, afterEach } from 'vitest';
import { createMembershipEngine } from '../engine.js';
import { MockPriceFeed } from '../testing/mock-price-feed.js';
import { MockFundsTransfer } from '../testing/mock-funds-transfer.js';
import { ManualClock } from '../testing/manual-clock.js';
import { ALICE, OWNER, PLUS_REQUIRED, PRICE, T0, silentLogger } from './helpers.js';

const ENV = {
  TIERPAY_OWNER: OWNER,
  TIERPAY_PREMIUM_FEE_USD: '10',
  TIERPAY_PLUS_FEE_USD: '5',
  TIERPAY_PLUS_PERIOD_SECONDS: '86400',
};

describe('createMembershipEngine', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  function deps() {
    const clock = new ManualClock(T0);
    return {
      priceFeed: new MockPriceFeed(8, PRICE, clock),
      transfer: new MockFundsTransfer(),
      clock,
      logger: silentLogger(),
    };
  }

  it('builds a registry from environment settings', async () => {
    vi.spyOn(process.stdout, 'write').mockReturnValue(true);
    const registry = createMembershipEngine(deps(), ENV);

    expect(registry.getOwner()).toBe(OWNER);
    expect(registry.getPremiumPriceUsd()).toBe(10n);
    expect(registry.getPlusPeriodSeconds()).toBe(86_400);

    await registry.register(ALICE, 1);
    const receipt = await registry.subscribePlus(ALICE, 1, PLUS_REQUIRED);
    expect(receipt.expiresAt).toBe(T0 + 86_400);
  });

  it('logs a ready line', () => {
    const write = vi.spyOn(process.stdout, 'write').mockReturnValue(true);
    createMembershipEngine(deps(), ENV);

    const line = JSON.parse(String(write.mock.calls[0]?.[0]));
    expect(line).toMatchObject({
      level: 'info',
      ns: 'Engine',
      msg: 'membership engine ready',
      data: { owner: OWNER, premiumFeeUsd: '10', plusFeeUsd: '5', plusPeriodSeconds: 86_400 },
    });
  });

  it('fails on invalid settings before building anything', () => {
    expect(() => createMembershipEngine(deps(), { ...ENV, TIERPAY_OWNER: '' })).toThrow(/TIERPAY_OWNER/);
  });

  it('rejects a missing price feed', () => {
    vi.spyOn(process.stdout, 'write').mockReturnValue(true);
    expect(() => createMembershipEngine({ ...deps(), priceFeed: null }, ENV)).toThrow(
      expect.objectContaining({ code: 'INVALID_ADDRESS' }),
    );
  });
});
