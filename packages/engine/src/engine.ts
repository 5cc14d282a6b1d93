/**
 * Engine bootstrap: builds a registry from environment settings and the
 * injected collaborators.
 */

import { MembershipRegistry, type MembershipRegistryDeps } from './registry.js';
import { getConfig } from './config.js';
import { createLogger } from './lib/logger.js';

const log = createLogger('Engine');

export function createMembershipEngine(
  deps: MembershipRegistryDeps,
  env: Record<string, string | undefined> = process.env,
): MembershipRegistry {
  const settings = getConfig(env);
  const registry = new MembershipRegistry(settings, deps);
  log.info('membership engine ready', {
    owner: settings.owner,
    premiumFeeUsd: settings.premiumFeeUsd,
    plusFeeUsd: settings.plusFeeUsd,
    plusPeriodSeconds: settings.plusPeriodSeconds,
    maxRenewalPeriods: settings.maxRenewalPeriods,
    adminsMustBeRegistered: settings.adminsMustBeRegistered,
  });
  return registry;
}
