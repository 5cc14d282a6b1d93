/**
 * @tierpay/core: Domain Events
 *
 * Events emitted once per successful engine call, for external observers
 * and indexers.
 */
import { ulid } from 'ulid';
import type { AccountId } from './types.js';

// ─── Registry Events ────────────────────────────────────────────────

export interface UserRegisteredEvent {
  type: 'user_registered';
  account: AccountId;
  fid: number;
  internalId: number;
}

export interface UserUpdatedEvent {
  type: 'user_updated';
  account: AccountId;
  fid: number;
}

export interface UserDeletedEvent {
  type: 'user_deleted';
  account: AccountId;
  /** fid the record held before deletion */
  fid: number;
}

/** Paid or granted premium; `amount` is 0 for grants */
export interface PremiumPaidEvent {
  type: 'premium_paid';
  account: AccountId;
  amount: bigint;
}

/** Paid or granted plus; `amountPaid` is 0 for grants */
export interface PlusSubscribedEvent {
  type: 'plus_subscribed';
  account: AccountId;
  periods: number;
  expiresAt: number;
  amountPaid: bigint;
}

// ─── Configuration Events ───────────────────────────────────────────

export interface PremiumPriceUpdatedEvent {
  type: 'premium_price_updated';
  priceUsd: bigint;
}

export interface PlusPriceUpdatedEvent {
  type: 'plus_price_updated';
  priceUsd: bigint;
}

export interface PlusDurationUpdatedEvent {
  type: 'plus_duration_updated';
  periodSeconds: number;
}

export interface MaxPeriodUpdatedEvent {
  type: 'max_period_updated';
  maxRenewalPeriods: number;
}

export interface PriceFeedUpdatedEvent {
  type: 'price_feed_updated';
}

// ─── Authorization & Treasury Events ────────────────────────────────

export interface AdminGrantedEvent {
  type: 'admin_granted';
  account: AccountId;
}

export interface AdminRevokedEvent {
  type: 'admin_revoked';
  account: AccountId;
}

export interface OwnershipTransferredEvent {
  type: 'ownership_transferred';
  previousOwner: AccountId;
  newOwner: AccountId;
}

export interface FundsWithdrawnEvent {
  type: 'funds_withdrawn';
  to: AccountId;
  amount: bigint;
}

export type DomainEventData =
  | UserRegisteredEvent
  | UserUpdatedEvent
  | UserDeletedEvent
  | PremiumPaidEvent
  | PlusSubscribedEvent
  | PremiumPriceUpdatedEvent
  | PlusPriceUpdatedEvent
  | PlusDurationUpdatedEvent
  | MaxPeriodUpdatedEvent
  | PriceFeedUpdatedEvent
  | AdminGrantedEvent
  | AdminRevokedEvent
  | OwnershipTransferredEvent
  | FundsWithdrawnEvent;

export type DomainEventType = DomainEventData['type'];

/** A domain event with its envelope */
export type DomainEvent = DomainEventData & {
  /** ULID */
  id: string;
  /** ISO 8601 */
  timestamp: string;
};

/** Narrow the event union to one type */
export type DomainEventOf<T extends DomainEventType> = Extract<DomainEvent, { type: T }>;

/**
 * Wrap event data in an envelope with a generated ULID id and an ISO
 * timestamp (defaults to now).
 */
export function createDomainEvent(data: DomainEventData, timestamp?: string): DomainEvent {
  return {
    ...data,
    id: ulid(),
    timestamp: timestamp ?? new Date().toISOString(),
  };
}
