/**
 * Membership Registry: account registry and tier state machine
 *
 *   unregistered → freemium → premium
 *   freemium / premium → plus (time-boxed)
 *
 * An expired plus account keeps its stored tier; `effectiveTier()` reports
 * it as premium at read time. No sweep ever rewrites it.
 *
 * Every mutating entry point takes the caller explicitly, runs inside the
 * engine's single in-flight guard, and publishes exactly one domain event
 * once it has fully succeeded.
 */

import {
  DEFAULT_MAX_RENEWAL_PERIODS,
  DEFAULT_PLUS_PERIOD_SECONDS,
  FIRST_INTERNAL_ID,
  MembershipError,
  createDomainEvent,
  fidSchema,
  periodCountSchema,
  periodSecondsSchema,
  usdAmountSchema,
  type AccountId,
  type AccountRecord,
  type Clock,
  type DomainEventData,
  type FundsTransfer,
  type MembershipSettings,
  type PaymentReceipt,
  type PlusReceipt,
  type PriceFeed,
  type Tier,
} from '@tierpay/core';
import { AccessControl, assertAccount, type PrivilegedAction } from './access-control.js';
import { PaymentEngine } from './payment-engine.js';
import { EventBus } from './lib/event-bus.js';
import { ReentrancyGuard } from './lib/reentrancy-guard.js';
import { systemClock, toIsoTimestamp } from './lib/clock.js';
import { createLogger, type Logger } from './lib/logger.js';

/** Settings accepted at construction; the tuning knobs have defaults */
export type MembershipRegistryOptions = Pick<MembershipSettings, 'owner' | 'premiumFeeUsd' | 'plusFeeUsd'> &
  Partial<Pick<MembershipSettings, 'plusPeriodSeconds' | 'maxRenewalPeriods' | 'adminsMustBeRegistered'>>;

export interface MembershipRegistryDeps {
  /** Validated on construction; null is rejected */
  priceFeed: PriceFeed | null;
  transfer: FundsTransfer;
  clock?: Clock;
  logger?: Logger;
  events?: EventBus;
}

function assertPositiveUsd(usd: bigint, what: string): void {
  if (!usdAmountSchema.safeParse(usd).success) {
    throw new MembershipError('INVALID_PRICE', `${what} must be a positive whole USD amount, got ${usd}`);
  }
}

function assertFid(fid: number): void {
  if (!fidSchema.safeParse(fid).success) {
    throw new MembershipError('INVALID_FID', `fid must be an integer >= 1, got ${fid}`);
  }
}

function assertPeriodSeconds(seconds: number): void {
  if (!periodSecondsSchema.safeParse(seconds).success) {
    throw new MembershipError('INVALID_DURATION', `Plus period must be a positive number of seconds, got ${seconds}`);
  }
}

function assertMaxPeriods(periods: number): void {
  if (!periodCountSchema.safeParse(periods).success) {
    throw new MembershipError('INVALID_PERIOD', `Max renewal periods must be a positive integer, got ${periods}`);
  }
}

export class MembershipRegistry {
  /** Domain events for observers and indexers */
  readonly events: EventBus;

  private accounts = new Map<AccountId, AccountRecord>();
  private nextInternalId = FIRST_INTERNAL_ID;
  private premiumFeeUsd: bigint;
  private plusFeeUsd: bigint;
  private plusPeriodSeconds: number;
  private maxRenewalPeriods: number;
  private readonly adminsMustBeRegistered: boolean;

  private readonly access: AccessControl;
  private readonly payments: PaymentEngine;
  private readonly guard = new ReentrancyGuard();
  private readonly clock: Clock;
  private readonly log: Logger;

  constructor(options: MembershipRegistryOptions, deps: MembershipRegistryDeps) {
    this.access = new AccessControl(options.owner);
    if (!deps.priceFeed) {
      throw new MembershipError('INVALID_ADDRESS', 'A price feed is required');
    }
    assertPositiveUsd(options.premiumFeeUsd, 'Premium fee');
    assertPositiveUsd(options.plusFeeUsd, 'Plus fee');

    const plusPeriodSeconds = options.plusPeriodSeconds ?? DEFAULT_PLUS_PERIOD_SECONDS;
    const maxRenewalPeriods = options.maxRenewalPeriods ?? DEFAULT_MAX_RENEWAL_PERIODS;
    assertPeriodSeconds(plusPeriodSeconds);
    assertMaxPeriods(maxRenewalPeriods);

    this.premiumFeeUsd = options.premiumFeeUsd;
    this.plusFeeUsd = options.plusFeeUsd;
    this.plusPeriodSeconds = plusPeriodSeconds;
    this.maxRenewalPeriods = maxRenewalPeriods;
    this.adminsMustBeRegistered = options.adminsMustBeRegistered ?? false;

    this.clock = deps.clock ?? systemClock;
    this.log = deps.logger ?? createLogger('MembershipRegistry');
    this.events = deps.events ?? new EventBus(this.log);
    this.payments = new PaymentEngine({
      priceFeed: deps.priceFeed,
      transfer: deps.transfer,
      clock: this.clock,
      logger: deps.logger,
    });
  }

  // ═══════════════════════════════════════════
  // Account lifecycle
  // ═══════════════════════════════════════════

  /** Register the caller as a freemium account */
  async register(caller: AccountId, fid: number): Promise<AccountRecord> {
    return this.guard.run('register', async () => {
      assertAccount(caller, 'Caller');
      assertFid(fid);
      if (this.accounts.has(caller)) {
        throw new MembershipError('ALREADY_EXISTS', `${caller} is already registered`);
      }

      const record: AccountRecord = {
        internalId: this.nextInternalId,
        fid,
        tier: 'freemium',
        expiresAt: 0,
      };
      this.accounts.set(caller, record);
      this.nextInternalId++;

      this.publish({ type: 'user_registered', account: caller, fid, internalId: record.internalId });
      return { ...record };
    });
  }

  /** Replace the caller's fid; tier and expiry are untouched */
  async update(caller: AccountId, fid: number): Promise<AccountRecord> {
    return this.guard.run('update', async () => {
      const record = this.requireRecord(caller);
      assertFid(fid);
      record.fid = fid;

      this.publish({ type: 'user_updated', account: caller, fid });
      return { ...record };
    });
  }

  /** Remove the caller's record entirely; returns the fid it held */
  async delete(caller: AccountId): Promise<number> {
    return this.guard.run('delete', async () => {
      const record = this.requireRecord(caller);
      this.accounts.delete(caller);

      this.publish({ type: 'user_deleted', account: caller, fid: record.fid });
      return record.fid;
    });
  }

  // ═══════════════════════════════════════════
  // Paid tier changes
  // ═══════════════════════════════════════════

  /**
   * Buy premium with `tendered` native units. Only an account already
   * stored as premium is refused: a plus account (active or not) is
   * overwritten to premium, and its stored expiry is left as it was.
   */
  async payForPremium(caller: AccountId, tendered: bigint): Promise<PaymentReceipt> {
    return this.guard.run('payForPremium', async () => {
      const record = this.requireRecord(caller);
      if (record.tier === 'premium') {
        throw new MembershipError('ALREADY_PREMIUM', `${caller} is already premium`);
      }

      const settlement = await this.payments.settle(caller, this.premiumFeeUsd, tendered, () => {
        record.tier = 'premium';
      });

      this.publish({ type: 'premium_paid', account: caller, amount: settlement.consumed });
      return { amountPaid: settlement.consumed, refunded: settlement.refunded };
    });
  }

  /**
   * Buy `periods` plus periods. Extends an unexpired subscription,
   * otherwise opens a fresh window from now.
   */
  async subscribePlus(caller: AccountId, periods: number, tendered: bigint): Promise<PlusReceipt> {
    return this.guard.run('subscribePlus', async () => {
      const record = this.requireRecord(caller);
      this.assertPeriods(periods);

      const expiresAt = this.nextPlusExpiry(record, periods);
      const cost = this.plusFeeUsd * BigInt(periods);
      const settlement = await this.payments.settle(caller, cost, tendered, () => {
        record.tier = 'plus';
        record.expiresAt = expiresAt;
      });

      this.publish({
        type: 'plus_subscribed',
        account: caller,
        periods,
        expiresAt,
        amountPaid: settlement.consumed,
      });
      return { amountPaid: settlement.consumed, refunded: settlement.refunded, expiresAt };
    });
  }

  // ═══════════════════════════════════════════
  // Privileged tier grants
  // ═══════════════════════════════════════════

  /** Grant premium without payment */
  async grantPremium(caller: AccountId, account: AccountId): Promise<void> {
    return this.guard.run('grantPremium', async () => {
      this.authorize(caller, 'grant_premium');
      const record = this.requireRecord(account);
      if (record.tier === 'plus' && this.clock.now() < record.expiresAt) {
        throw new MembershipError('USER_IS_PLUS', `${account} has an active plus subscription`);
      }
      if (record.tier === 'premium') {
        throw new MembershipError('ALREADY_PREMIUM', `${account} is already premium`);
      }
      record.tier = 'premium';

      this.publish({ type: 'premium_paid', account, amount: 0n });
    });
  }

  /** Grant plus periods without payment; returns the new expiry */
  async grantPlus(caller: AccountId, account: AccountId, periods: number): Promise<number> {
    return this.guard.run('grantPlus', async () => {
      this.authorize(caller, 'grant_plus');
      const record = this.requireRecord(account);
      this.assertPeriods(periods);
      const expiresAt = this.nextPlusExpiry(record, periods);
      record.tier = 'plus';
      record.expiresAt = expiresAt;

      this.publish({ type: 'plus_subscribed', account, periods, expiresAt, amountPaid: 0n });
      return expiresAt;
    });
  }

  // ═══════════════════════════════════════════
  // Configuration
  // ═══════════════════════════════════════════

  async setPremiumPrice(caller: AccountId, priceUsd: bigint): Promise<void> {
    return this.guard.run('setPremiumPrice', async () => {
      this.authorize(caller, 'set_premium_price');
      assertPositiveUsd(priceUsd, 'Premium price');
      this.premiumFeeUsd = priceUsd;

      this.log.info('premium price updated', { priceUsd, by: caller });
      this.publish({ type: 'premium_price_updated', priceUsd });
    });
  }

  async setPlusPrice(caller: AccountId, priceUsd: bigint): Promise<void> {
    return this.guard.run('setPlusPrice', async () => {
      this.authorize(caller, 'set_plus_price');
      assertPositiveUsd(priceUsd, 'Plus price');
      this.plusFeeUsd = priceUsd;

      this.log.info('plus price updated', { priceUsd, by: caller });
      this.publish({ type: 'plus_price_updated', priceUsd });
    });
  }

  async setPlusDuration(caller: AccountId, periodSeconds: number): Promise<void> {
    return this.guard.run('setPlusDuration', async () => {
      this.authorize(caller, 'set_plus_duration');
      assertPeriodSeconds(periodSeconds);
      this.plusPeriodSeconds = periodSeconds;

      this.log.info('plus period updated', { periodSeconds, by: caller });
      this.publish({ type: 'plus_duration_updated', periodSeconds });
    });
  }

  async setMaxRenewalPeriods(caller: AccountId, maxRenewalPeriods: number): Promise<void> {
    return this.guard.run('setMaxRenewalPeriods', async () => {
      this.authorize(caller, 'set_max_renewal_periods');
      assertMaxPeriods(maxRenewalPeriods);
      this.maxRenewalPeriods = maxRenewalPeriods;

      this.log.info('max renewal periods updated', { maxRenewalPeriods, by: caller });
      this.publish({ type: 'max_period_updated', maxRenewalPeriods });
    });
  }

  async setPriceFeed(caller: AccountId, feed: PriceFeed | null): Promise<void> {
    return this.guard.run('setPriceFeed', async () => {
      this.authorize(caller, 'set_price_feed');
      if (!feed) {
        throw new MembershipError('INVALID_ADDRESS', 'A price feed is required');
      }
      this.payments.setPriceFeed(feed);

      this.log.info('price feed replaced', { by: caller });
      this.publish({ type: 'price_feed_updated' });
    });
  }

  // ═══════════════════════════════════════════
  // Authorization & treasury
  // ═══════════════════════════════════════════

  async grantAdmin(caller: AccountId, account: AccountId): Promise<void> {
    return this.guard.run('grantAdmin', async () => {
      this.authorize(caller, 'grant_admin');
      const eligibility = this.adminsMustBeRegistered
        ? (candidate: AccountId) => this.accounts.has(candidate)
        : undefined;
      this.access.grantAdmin(account, eligibility);

      this.log.info('admin granted', { account, by: caller });
      this.publish({ type: 'admin_granted', account });
    });
  }

  async revokeAdmin(caller: AccountId, account: AccountId): Promise<void> {
    return this.guard.run('revokeAdmin', async () => {
      this.authorize(caller, 'revoke_admin');
      this.access.revokeAdmin(account);

      this.log.info('admin revoked', { account, by: caller });
      this.publish({ type: 'admin_revoked', account });
    });
  }

  async transferOwnership(caller: AccountId, newOwner: AccountId): Promise<void> {
    return this.guard.run('transferOwnership', async () => {
      this.authorize(caller, 'transfer_ownership');
      const previousOwner = this.access.transferOwnership(newOwner);

      this.log.info('ownership transferred', { previousOwner, newOwner });
      this.publish({ type: 'ownership_transferred', previousOwner, newOwner });
    });
  }

  /** Pay the whole treasury to the owner; returns the amount sent */
  async withdrawFunds(caller: AccountId): Promise<bigint> {
    return this.guard.run('withdrawFunds', async () => {
      this.authorize(caller, 'withdraw_funds');
      const to = this.access.owner;
      const amount = await this.payments.withdraw(to);

      this.log.info('funds withdrawn', { to, amount });
      this.publish({ type: 'funds_withdrawn', to, amount });
      return amount;
    });
  }

  // ═══════════════════════════════════════════
  // Queries
  // ═══════════════════════════════════════════

  isRegistered(account: AccountId): boolean {
    return this.accounts.has(account);
  }

  /** Copy of the stored record, or null when unregistered */
  getAccount(account: AccountId): AccountRecord | null {
    const record = this.accounts.get(account);
    return record ? { ...record } : null;
  }

  getFid(account: AccountId): number | null {
    return this.accounts.get(account)?.fid ?? null;
  }

  /** The tier as stored, without expiry applied */
  storedTier(account: AccountId): Tier {
    return this.accounts.get(account)?.tier ?? 'unregistered';
  }

  /** The tier as it should be treated now: an expired plus reads as premium */
  effectiveTier(account: AccountId): Tier {
    const record = this.accounts.get(account);
    if (!record) return 'unregistered';
    if (record.tier === 'plus' && this.clock.now() > record.expiresAt) return 'premium';
    return record.tier;
  }

  /** Plus and strictly before expiry */
  isPlusActive(account: AccountId): boolean {
    const record = this.accounts.get(account);
    return record !== undefined && record.tier === 'plus' && this.clock.now() < record.expiresAt;
  }

  /** Stored expiry in unix seconds (0 when none) */
  plusExpiresAt(account: AccountId): number {
    return this.accounts.get(account)?.expiresAt ?? 0;
  }

  plusRemainingSeconds(account: AccountId): number {
    if (!this.isPlusActive(account)) return 0;
    return this.plusExpiresAt(account) - this.clock.now();
  }

  isAdmin(account: AccountId): boolean {
    return this.access.isAdmin(account);
  }

  getOwner(): AccountId {
    return this.access.owner;
  }

  listAdmins(): AccountId[] {
    return this.access.listAdmins();
  }

  getPremiumPriceUsd(): bigint {
    return this.premiumFeeUsd;
  }

  getPlusPriceUsd(): bigint {
    return this.plusFeeUsd;
  }

  getPlusPeriodSeconds(): number {
    return this.plusPeriodSeconds;
  }

  getMaxRenewalPeriods(): number {
    return this.maxRenewalPeriods;
  }

  /** Sequence id the next registration will receive */
  getNextInternalId(): number {
    return this.nextInternalId;
  }

  getTreasuryBalance(): bigint {
    return this.payments.treasuryBalance;
  }

  /** Native units premium costs at the current oracle price */
  async quotePremium(): Promise<bigint> {
    return this.payments.quote(this.premiumFeeUsd);
  }

  /** Native units `periods` plus periods cost at the current oracle price */
  async quotePlus(periods = 1): Promise<bigint> {
    this.assertPeriods(periods);
    return this.payments.quote(this.plusFeeUsd * BigInt(periods));
  }

  async getFeedDecimals(): Promise<number> {
    return this.payments.feedDecimals();
  }

  // ═══════════════════════════════════════════
  // Internals
  // ═══════════════════════════════════════════

  private authorize(caller: AccountId, action: PrivilegedAction): void {
    try {
      this.access.authorize(caller, action);
    } catch (err) {
      this.log.warn('unauthorized call', { caller, action });
      throw err;
    }
  }

  private requireRecord(account: AccountId): AccountRecord {
    const record = this.accounts.get(account);
    if (!record) {
      throw new MembershipError('NOT_FOUND', `${account} is not registered`);
    }
    return record;
  }

  private assertPeriods(periods: number): void {
    if (!periodCountSchema.safeParse(periods).success) {
      throw new MembershipError('INVALID_PERIOD', `Periods must be a positive integer, got ${periods}`);
    }
    if (periods > this.maxRenewalPeriods) {
      throw new MembershipError(
        'MAX_PERIOD_EXCEEDED',
        `At most ${this.maxRenewalPeriods} periods per call, got ${periods}`,
      );
    }
  }

  /**
   * Expiry after adding `periods`: stacked onto an unexpired window, or a
   * fresh one from now when the stored expiry has passed (0 always has).
   * Computed before any funds move; must stay a safe integer.
   */
  private nextPlusExpiry(record: AccountRecord, periods: number): number {
    const now = this.clock.now();
    const added = this.plusPeriodSeconds * periods;
    const expiresAt = now > record.expiresAt ? now + added : record.expiresAt + added;
    if (!Number.isSafeInteger(expiresAt)) {
      throw new MembershipError(
        'INVALID_DURATION',
        `${periods} periods of ${this.plusPeriodSeconds}s push the plus expiry out of range`,
      );
    }
    return expiresAt;
  }

  private publish(data: DomainEventData): void {
    this.events.emit(createDomainEvent(data, toIsoTimestamp(this.clock.now())));
  }
}
