import { vi } from 'vitest';
import type { DomainEvent } from '@tierpay/core';
import { MembershipRegistry, type MembershipRegistryOptions } from '../registry.js';
import { MockPriceFeed } from '../testing/mock-price-feed.js';
import { MockFundsTransfer } from '../testing/mock-funds-transfer.js';
import { ManualClock } from '../testing/manual-clock.js';
import type { Logger } from '../lib/logger.js';

export const T0 = 1_700_000_000;
export const DAY = 86_400;
export const PERIOD = 30 * DAY;

export const OWNER = '0x1000000000000000000000000000000000000001';
export const ADMIN = '0x2000000000000000000000000000000000000002';
export const ALICE = '0xa000000000000000000000000000000000000000';
export const BOB = '0xb000000000000000000000000000000000000000';
export const STRANGER = '0xf000000000000000000000000000000000000000';

/** $4923.00 at 8 decimals */
export const PRICE = 492_300_000_000n;

/** ceil(10 * 10^8 * 10^18 / PRICE) */
export const PREMIUM_REQUIRED = 2_031_281_738_777_169n;
/** ceil(5 * 10^8 * 10^18 / PRICE) */
export const PLUS_REQUIRED = 1_015_640_869_388_585n;

export function silentLogger(): Logger {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

export interface Fixture {
  registry: MembershipRegistry;
  feed: MockPriceFeed;
  transfer: MockFundsTransfer;
  clock: ManualClock;
  logger: Logger;
  events: DomainEvent[];
}

export function createFixture(overrides: Partial<MembershipRegistryOptions> = {}): Fixture {
  const clock = new ManualClock(T0);
  const feed = new MockPriceFeed(8, PRICE, clock);
  const transfer = new MockFundsTransfer();
  const logger = silentLogger();
  const registry = new MembershipRegistry(
    {
      owner: OWNER,
      premiumFeeUsd: 10n,
      plusFeeUsd: 5n,
      plusPeriodSeconds: PERIOD,
      maxRenewalPeriods: 12,
      ...overrides,
    },
    { priceFeed: feed, transfer, clock, logger },
  );
  const events: DomainEvent[] = [];
  registry.events.on('*', (event) => events.push(event));
  return { registry, feed, transfer, clock, logger, events };
}
