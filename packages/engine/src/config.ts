/**
 * Engine configuration: reads the bootstrap settings from environment
 * variables and validates them.
 */

import { settingsEnvSchema, type MembershipSettings } from '@tierpay/core';

/** Environment variable for each setting */
export const ENV_VARS = {
  owner: 'TIERPAY_OWNER',
  premiumFeeUsd: 'TIERPAY_PREMIUM_FEE_USD',
  plusFeeUsd: 'TIERPAY_PLUS_FEE_USD',
  plusPeriodSeconds: 'TIERPAY_PLUS_PERIOD_SECONDS',
  maxRenewalPeriods: 'TIERPAY_MAX_RENEWAL_PERIODS',
  adminsMustBeRegistered: 'TIERPAY_ADMINS_MUST_BE_REGISTERED',
} as const satisfies Record<keyof MembershipSettings, string>;

function isSettingKey(key: unknown): key is keyof typeof ENV_VARS {
  return typeof key === 'string' && key in ENV_VARS;
}

/**
 * Read settings from the environment. Unset optional variables take their
 * defaults; missing or malformed values throw, naming the variable.
 */
export function getConfig(env: Record<string, string | undefined> = process.env): MembershipSettings {
  const result = settingsEnvSchema.safeParse({
    owner: env[ENV_VARS.owner],
    premiumFeeUsd: env[ENV_VARS.premiumFeeUsd],
    plusFeeUsd: env[ENV_VARS.plusFeeUsd],
    plusPeriodSeconds: env[ENV_VARS.plusPeriodSeconds] || undefined,
    maxRenewalPeriods: env[ENV_VARS.maxRenewalPeriods] || undefined,
    adminsMustBeRegistered: env[ENV_VARS.adminsMustBeRegistered]?.toLowerCase() || undefined,
  });

  if (!result.success) {
    const problems = result.error.issues.map((issue) => {
      const key = issue.path[0];
      const name = isSettingKey(key) ? ENV_VARS[key] : String(key);
      return `${name}: ${issue.message}`;
    });
    throw new Error(`Invalid tierpay configuration. ${problems.join('; ')}`);
  }

  return result.data;
}
