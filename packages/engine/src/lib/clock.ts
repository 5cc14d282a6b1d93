import type { Clock } from '@tierpay/core';

/** Wall clock in unix seconds */
export const systemClock: Clock = {
  now: () => Math.floor(Date.now() / 1000),
};

/** ISO timestamp for a unix-seconds instant */
export function toIsoTimestamp(unixSeconds: number): string {
  return new Date(unixSeconds * 1000).toISOString();
}
