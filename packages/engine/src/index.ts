/**
 * @tierpay/engine: Membership registry, payment engine and authorization overlay
 */

export { MembershipRegistry } from './registry.js';
export type { MembershipRegistryDeps, MembershipRegistryOptions } from './registry.js';

export { PaymentEngine, validateReading } from './payment-engine.js';
export type { PaymentEngineDeps, Settlement } from './payment-engine.js';

export { AccessControl, PERMISSION_MATRIX, isRoleAllowed, assertAccount } from './access-control.js';
export type { Role, PrivilegedAction } from './access-control.js';

export { createMembershipEngine } from './engine.js';
export { getConfig, ENV_VARS } from './config.js';

export { EventBus } from './lib/event-bus.js';
export type { DomainEventListener } from './lib/event-bus.js';
export { ReentrancyGuard } from './lib/reentrancy-guard.js';
export { createLogger } from './lib/logger.js';
export type { Logger } from './lib/logger.js';
export { systemClock, toIsoTimestamp } from './lib/clock.js';

// In-process doubles
export { MockPriceFeed, MockFundsTransfer, ManualClock } from './testing/index.js';
export type { RecordedTransfer, TransferMode } from './testing/index.js';
