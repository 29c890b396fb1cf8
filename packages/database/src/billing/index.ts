/**
 * Billing Engine Module
 *
 * Cycle processor, subscription operations and the store contracts they
 * run against.
 */

// Cycle processor (THE entry point for periodic billing)
export { CycleProcessor, defaultProcessorSettings } from './processor';
export type { RunOptions } from './processor';

// Subscription operations
export { createSubscription, listSubscriptions, cancelSubscription } from './subscriptions';
export type { SubscriptionServiceDeps, CreatedSubscription, SubscriptionWithHistory } from './subscriptions';

// State machine
export { transition, escalate, countConsecutiveFailures, isBillable } from './state-machine';
export type { ChargeOutcome, BillingSchedule, Transition } from './state-machine';

// Idempotency
export { generateChargeKey } from './idempotency';

// Building blocks
export { PagedLedgerHistory } from './ledger-history';
export type { LedgerPageFetcher } from './ledger-history';
export { runPool } from './worker-pool';
export type { PoolResult, PoolOptions } from './worker-pool';
export { consoleBillingLogger, silentBillingLogger } from './logger';

// Errors
export {
  BillingError,
  ValidationError,
  NotFoundError,
  ConflictError,
  StorageError,
  IndeterminateChargeError,
  describeError,
} from './errors';

// Types
export type * from './types';
