/**
 * System Constants - Single Source of Truth
 *
 * Status vocabularies are declared here as readonly tuples so the database
 * enums (packages/database/src/schema/enums.ts), zod schemas and TypeScript
 * unions all derive from the same list.
 */

// Subscription lifecycle states
export const SUBSCRIPTION_STATUSES = ['active', 'past_due', 'cancelled'] as const;
export type SubscriptionStatus = typeof SUBSCRIPTION_STATUSES[number];

// Statuses find_due may return (cancelled is terminal)
export const BILLABLE_STATUSES = ['active', 'past_due'] as const satisfies readonly SubscriptionStatus[];

// Outcome recorded on every ledger entry
export const LEDGER_OUTCOMES = ['success', 'failed', 'pending'] as const;
export type LedgerOutcome = typeof LEDGER_OUTCOMES[number];

// Plan billing cycles
export const BILLING_CYCLES = ['weekly', 'monthly', 'yearly'] as const;
export type BillingCycle = typeof BILLING_CYCLES[number];

// Billing run journal
export const BILLING_RUN_STATUSES = ['running', 'completed', 'aborted', 'failed'] as const;
export type BillingRunStatus = typeof BILLING_RUN_STATUSES[number];

export const BILLING_RUN_TRIGGERS = ['api', 'scheduler', 'manual'] as const;
export type BillingRunTrigger = typeof BILLING_RUN_TRIGGERS[number];

export const SUBSCRIPTION_STATUS = {
  ACTIVE: 'active',
  PAST_DUE: 'past_due',
  CANCELLED: 'cancelled',
} as const satisfies Record<string, SubscriptionStatus>;

export const LEDGER_OUTCOME = {
  SUCCESS: 'success',
  FAILED: 'failed',
  PENDING: 'pending',
} as const satisfies Record<string, LedgerOutcome>;

/**
 * Cycle processor defaults
 * Every value can be overridden through the API server's environment config.
 */
export const BILLING_DEFAULTS = {
  BATCH_SIZE: 100,
  CONCURRENCY: 8,
  CHARGE_TIMEOUT_MS: 30_000,
  RUN_TIMEOUT_MS: 5 * 60 * 1000,
  // How long a claim outlives chargeTimeoutMs (ledger write and final update)
  CLAIM_LEASE_MARGIN_MS: 60_000,
  // Consecutive failed charges before involuntary cancellation (0 disables)
  ESCALATION_THRESHOLD: 3,
  // Ledger entries attached to each subscription in list responses
  HISTORY_LIMIT: 5,
  // Page size used when iterating ledger history
  HISTORY_PAGE_SIZE: 50,
} as const;

// Column widths shared by the drizzle schema and zod validation
export const FIELD_LIMITS = {
  EMAIL: 255,
  NAME: 255,
  IDEMPOTENCY_KEY: 100,
  CHARGE_REFERENCE: 255,
  FAILURE_REASON: 1000,
} as const;
