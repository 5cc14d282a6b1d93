/**
 * @tierpay/core: Shared Constants
 */

/** Oldest oracle update accepted, in seconds */
export const MAX_STALE_SECONDS = 3600;

/** Decimals of the native currency's smallest unit */
export const NATIVE_DECIMALS = 18;

/** 10^18: one whole native coin in its smallest unit */
export const NATIVE_UNIT = 10n ** BigInt(NATIVE_DECIMALS);

/** Default plus period (30 days) */
export const DEFAULT_PLUS_PERIOD_SECONDS = 30 * 24 * 60 * 60;

/** Default cap on periods payable in one call */
export const DEFAULT_MAX_RENEWAL_PERIODS = 12;

/** First internal id handed out by a fresh registry */
export const FIRST_INTERNAL_ID = 1;

/** Null account identifier */
export const ZERO_ACCOUNT = '0x0000000000000000000000000000000000000000';
