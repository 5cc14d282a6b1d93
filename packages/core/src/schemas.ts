/**
 * @tierpay/core: Zod Validation Schemas
 *
 * Runtime validation for engine inputs and bootstrap settings.
 */
import { z } from 'zod';
import { DEFAULT_MAX_RENEWAL_PERIODS, DEFAULT_PLUS_PERIOD_SECONDS, ZERO_ACCOUNT } from './constants.js';
import { TIERS } from './types.js';

export const tierSchema = z.enum(TIERS);

/** Non-null account identifier */
export const accountIdSchema = z
  .string()
  .trim()
  .min(1)
  .refine((v) => v.toLowerCase() !== ZERO_ACCOUNT, { message: 'zero address is not an account' });

/** External fid: a safe integer >= 1 */
export const fidSchema = z.number().int().min(1).max(Number.MAX_SAFE_INTEGER);

/** Whole-USD fee, strictly positive */
export const usdAmountSchema = z.bigint().positive();

/** Seconds per plus period, strictly positive */
export const periodSecondsSchema = z.number().int().positive().max(Number.MAX_SAFE_INTEGER);

/** Period count in one call, strictly positive */
export const periodCountSchema = z.number().int().positive().max(Number.MAX_SAFE_INTEGER);

// ─── Settings ───────────────────────────────────────────────────────

const positiveBigIntString = z
  .string()
  .trim()
  .regex(/^\d+$/, 'must be a whole number')
  .transform((v) => BigInt(v))
  .pipe(usdAmountSchema);

const positiveIntString = z
  .string()
  .trim()
  .regex(/^\d+$/, 'must be a whole number')
  .transform((v) => Number(v))
  .pipe(z.number().int().positive().max(Number.MAX_SAFE_INTEGER));

/**
 * Bootstrap settings as read from environment variables (all strings).
 */
export const settingsEnvSchema = z.object({
  owner: accountIdSchema,
  premiumFeeUsd: positiveBigIntString,
  plusFeeUsd: positiveBigIntString,
  plusPeriodSeconds: positiveIntString.default(String(DEFAULT_PLUS_PERIOD_SECONDS)),
  maxRenewalPeriods: positiveIntString.default(String(DEFAULT_MAX_RENEWAL_PERIODS)),
  adminsMustBeRegistered: z
    .enum(['true', 'false'])
    .default('false')
    .transform((v) => v === 'true'),
});

export type SettingsEnvInput = z.input<typeof settingsEnvSchema>;
