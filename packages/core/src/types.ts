/**
 * @tierpay/core: Core Type Definitions
 *
 * Account records, tiers, price readings and the capabilities the engine
 * consumes (price feed, funds transfer, clock).
 */

// ─── Accounts ───────────────────────────────────────────────────────

/** Opaque account identifier (e.g. a wallet address) */
export type AccountId = string;

/** All membership tiers, lowest first */
export const TIERS = ['unregistered', 'freemium', 'premium', 'plus'] as const;

/** Membership tier */
export type Tier = (typeof TIERS)[number];

/**
 * A registered account. Unregistered accounts have no record at all.
 */
export interface AccountRecord {
  /** Sequence number assigned at registration, never reused */
  internalId: number;
  /** Caller-supplied external identifier (>= 1) */
  fid: number;
  /** Stored tier; never 'unregistered' for a live record */
  tier: Exclude<Tier, 'unregistered'>;
  /** Plus expiry in unix seconds; 0 = no expiry */
  expiresAt: number;
}

// ─── Price Feed ─────────────────────────────────────────────────────

/**
 * One reading from the price oracle. Prices are scaled by the feed's
 * decimals (a price of 492300000000 at 8 decimals is $4923.00).
 */
export interface PriceReading {
  roundId: bigint;
  price: bigint;
  /** Unix seconds; 0 means the round was never completed */
  updatedAt: number;
  answeredInRound: bigint;
}

/**
 * Price oracle capability. Treated as untrusted input.
 */
export interface PriceFeed {
  latestReading(): Promise<PriceReading>;
  decimals(): Promise<number>;
}

// ─── Funds ──────────────────────────────────────────────────────────

/**
 * Outbound transfer of native units (refunds, withdrawals).
 * Resolving `false` or throwing both mean the transfer failed.
 */
export interface FundsTransfer {
  transfer(to: AccountId, amount: bigint): Promise<boolean>;
}

// ─── Time ───────────────────────────────────────────────────────────

export interface Clock {
  /** Current time in unix seconds */
  now(): number;
}

// ─── Settings ───────────────────────────────────────────────────────

/**
 * Resolved bootstrap configuration for one engine instance.
 */
export interface MembershipSettings {
  owner: AccountId;
  /** Whole USD, scaled by feed decimals at conversion time */
  premiumFeeUsd: bigint;
  plusFeeUsd: bigint;
  /** Seconds added per plus period */
  plusPeriodSeconds: number;
  maxRenewalPeriods: number;
  /** When true, only registered accounts can be made admins */
  adminsMustBeRegistered: boolean;
}

/** Result of a paid tier change */
export interface PaymentReceipt {
  /** Native units kept by the engine */
  amountPaid: bigint;
  /** Native units returned to the payer */
  refunded: bigint;
}

export interface PlusReceipt extends PaymentReceipt {
  expiresAt: number;
}
