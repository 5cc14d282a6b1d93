/**
 * Authorization Overlay
 *
 * One owner and a set of admins. Permission matrix:
 *   Owner = every privileged action
 *   Admin = fee, duration and period updates, tier grants
 *
 * Callers are passed explicitly; nothing is read from ambient context.
 */

import { MembershipError, accountIdSchema, type AccountId } from '@tierpay/core';

export type Role = 'owner' | 'admin' | 'none';

export type PrivilegedAction =
  | 'set_price_feed'
  | 'withdraw_funds'
  | 'grant_admin'
  | 'revoke_admin'
  | 'transfer_ownership'
  | 'set_premium_price'
  | 'set_plus_price'
  | 'set_plus_duration'
  | 'set_max_renewal_periods'
  | 'grant_premium'
  | 'grant_plus';

/**
 * Permission matrix: which roles can perform which privileged action.
 */
export const PERMISSION_MATRIX: Record<PrivilegedAction, readonly Role[]> = {
  set_price_feed: ['owner'],
  withdraw_funds: ['owner'],
  grant_admin: ['owner'],
  revoke_admin: ['owner'],
  transfer_ownership: ['owner'],
  set_premium_price: ['owner', 'admin'],
  set_plus_price: ['owner', 'admin'],
  set_plus_duration: ['owner', 'admin'],
  set_max_renewal_periods: ['owner', 'admin'],
  grant_premium: ['owner', 'admin'],
  grant_plus: ['owner', 'admin'],
} as const;

/**
 * Check if a role is allowed to perform an action.
 */
export function isRoleAllowed(role: Role, action: PrivilegedAction): boolean {
  return PERMISSION_MATRIX[action].includes(role);
}

/**
 * Reject the null identifier (empty string or zero address).
 */
export function assertAccount(account: AccountId, what: string): void {
  if (!accountIdSchema.safeParse(account).success) {
    throw new MembershipError('INVALID_ADDRESS', `${what} must be a non-null account`);
  }
}

export class AccessControl {
  private currentOwner: AccountId;
  private admins = new Set<AccountId>();

  constructor(owner: AccountId) {
    assertAccount(owner, 'Owner');
    this.currentOwner = owner;
  }

  get owner(): AccountId {
    return this.currentOwner;
  }

  isAdmin(account: AccountId): boolean {
    return this.admins.has(account);
  }

  roleOf(account: AccountId): Role {
    if (account === this.currentOwner) return 'owner';
    if (this.admins.has(account)) return 'admin';
    return 'none';
  }

  /** Admins in grant order */
  listAdmins(): AccountId[] {
    return [...this.admins];
  }

  /**
   * Throw unless `caller` may perform `action`. Owner-only actions fail
   * with NOT_OWNER, owner-or-admin actions with NOT_PERMITTED.
   */
  authorize(caller: AccountId, action: PrivilegedAction): void {
    if (isRoleAllowed(this.roleOf(caller), action)) return;
    const ownerOnly = !PERMISSION_MATRIX[action].includes('admin');
    if (ownerOnly) {
      throw new MembershipError('NOT_OWNER', `${action} requires the owner`);
    }
    throw new MembershipError('NOT_PERMITTED', `${action} requires the owner or an admin`);
  }

  /**
   * Add an admin. `isEligible` lets the registry impose extra policy
   * (registered accounts only) after the address and duplicate checks.
   */
  grantAdmin(account: AccountId, isEligible?: (account: AccountId) => boolean): void {
    assertAccount(account, 'Admin');
    if (this.admins.has(account)) {
      throw new MembershipError('ALREADY_ADMIN', `${account} is already an admin`);
    }
    if (isEligible && !isEligible(account)) {
      throw new MembershipError('NOT_FOUND', `${account} must be registered to become an admin`);
    }
    this.admins.add(account);
  }

  revokeAdmin(account: AccountId): void {
    if (!this.admins.has(account)) {
      throw new MembershipError('NOT_ADMIN', `${account} is not an admin`);
    }
    this.admins.delete(account);
  }

  /** Hand ownership to another account; returns the previous owner */
  transferOwnership(newOwner: AccountId): AccountId {
    assertAccount(newOwner, 'New owner');
    const previous = this.currentOwner;
    this.currentOwner = newOwner;
    return previous;
  }
}
