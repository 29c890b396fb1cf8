/**
 * Billing Engine Types
 *
 * Domain records and the narrow store contracts the cycle processor
 * depends on. Postgres (src/stores) and in-memory (src/memory)
 * implementations both satisfy these interfaces.
 */

import type {
  BillingCycle,
  BillingRunStatus,
  BillingRunTrigger,
  LedgerOutcome,
  SubscriptionStatus,
} from '@renewly/shared/constants';
import type { BillingDate } from '@renewly/shared/billing';
import type { ChargeExecutor } from '@renewly/shared/charge-executor';
import type { DBClock } from '@renewly/shared/db-clock';

// ============================================================================
// Records
// ============================================================================

export interface User {
  id: number;
  email: string;
  name: string;
  isActive: boolean;
}

export interface Plan {
  id: number;
  name: string;
  priceCents: number;
  billingCycle: BillingCycle;
  /** Free days before the first charge (0 = charge at creation) */
  trialDays: number;
  isActive: boolean;
}

export interface Subscription {
  id: string;
  userId: number;
  planId: number;
  status: SubscriptionStatus;
  nextBillingDate: BillingDate;
  /** Optimistic concurrency token, bumped on every mutation */
  version: number;
  /** End of the free trial; the first charge is due on its date */
  trialEndsAt: Date | null;
  /** Set while a billing attempt owns the row; findDue skips it until then */
  claimedUntil: Date | null;
  createdAt: Date;
  updatedAt: Date;
  cancelledAt: Date | null;
}

export interface LedgerEntry {
  /** Monotonically increasing in creation order */
  id: number;
  subscriptionId: string;
  amountCents: number;
  outcome: LedgerOutcome;
  idempotencyKey: string;
  /** The next-billing-date this attempt was charging for */
  billedDate: BillingDate;
  reference: string | null;
  failureReason: string | null;
  processedAt: Date;
}

export type NewLedgerEntry = Omit<LedgerEntry, 'id'>;

export interface NewSubscription {
  userId: number;
  planId: number;
  nextBillingDate: BillingDate;
  trialEndsAt: Date | null;
  createdAt: Date;
}

export interface SubscriptionUpdate {
  status: SubscriptionStatus;
  nextBillingDate: BillingDate;
  updatedAt: Date;
}

export interface SubscriptionFilter {
  userId?: number;
  status?: SubscriptionStatus;
  limit: number;
}

/** Keyset position in the (nextBillingDate, id) due ordering */
export interface DueCursor {
  nextBillingDate: BillingDate;
  id: string;
}

export interface DueQuery {
  asOf: BillingDate;
  limit: number;
  /** Rows claimed until after this instant are skipped */
  now: Date;
  after?: DueCursor;
}

export interface ClaimLease {
  now: Date;
  until: Date;
}

// ============================================================================
// Store contracts
// ============================================================================

export interface SubscriptionStore {
  /**
   * Billable (active or past_due), unclaimed subscriptions with
   * nextBillingDate <= asOf, ordered by nextBillingDate then id, strictly
   * after `after` when given.
   */
  findDue(query: DueQuery): Promise<Subscription[]>;

  get(id: string): Promise<Subscription | null>;

  /** Newest first */
  list(filter: SubscriptionFilter): Promise<Subscription[]>;

  create(input: NewSubscription): Promise<Subscription>;

  /**
   * Take ownership of a subscription for one charge attempt: bump its
   * version and hold it until `lease.until`. Throws ConflictError if the
   * version moved, another claim is still live or the subscription was
   * cancelled, NotFoundError if it no longer exists.
   */
  claim(id: string, expectedVersion: number, lease: ClaimLease): Promise<Subscription>;

  /**
   * Conditional write of the post-attempt state; clears the claim. Guarded
   * by version and status like claim(); additionally refuses to move
   * nextBillingDate backwards. Moving to 'cancelled' (escalation) stamps
   * cancelledAt with updatedAt.
   */
  updateAfterAttempt(id: string, expectedVersion: number, update: SubscriptionUpdate): Promise<Subscription>;

  /**
   * Drop a claim without changing the subscription (attempt left it due).
   * No-op when the version has moved on since the claim.
   */
  release(id: string, expectedVersion: number): Promise<void>;

  /** Unconditional and idempotent; sets cancelledAt on the first call only */
  cancel(id: string, at: Date): Promise<Subscription>;
}

/**
 * Lazy, restartable, finite view over a subscription's ledger entries,
 * most recent first. Each iteration re-reads from the ledger.
 */
export interface LedgerHistory extends AsyncIterable<LedgerEntry> {
  toArray(): Promise<LedgerEntry[]>;
}

export interface Ledger {
  /**
   * Append-only. Throws StorageError when the write is not durable, and
   * ConflictError for a second 'success' entry with the same idempotency key.
   */
  append(entry: NewLedgerEntry): Promise<LedgerEntry>;

  history(subscriptionId: string, limit: number): LedgerHistory;
}

export interface PlanCatalog {
  getPlan(id: number): Promise<Plan | null>;
}

export interface UserDirectory {
  getUser(id: number): Promise<User | null>;
}

// ============================================================================
// Billing runs
// ============================================================================

export interface BillingRunCounts {
  /** Subscriptions selected by this run; the sum of every bucket below */
  considered: number;
  processed: number;
  failed: number;
  escalatedToCancelled: number;
  indeterminate: number;
  conflicts: number;
  errors: number;
  deferred: number;
}

export interface BillingRun extends BillingRunCounts {
  id: string;
  trigger: BillingRunTrigger;
  status: BillingRunStatus;
  error: string | null;
  startedAt: Date;
  completedAt: Date | null;
}

export interface BillingRunSummary extends BillingRunCounts {
  runId: string;
  status: BillingRunStatus;
  startedAt: Date;
  completedAt: Date;
  durationMs: number;
}

export type BillingRunResult = BillingRunCounts & {
  status: BillingRunStatus;
  error: string | null;
  completedAt: Date;
};

export interface BillingRunJournal {
  start(trigger: BillingRunTrigger, startedAt: Date): Promise<BillingRun>;
  finish(id: string, result: BillingRunResult): Promise<BillingRun>;
  get(id: string): Promise<BillingRun | null>;
}

// ============================================================================
// Attempts
// ============================================================================

export type AttemptOutcome =
  | 'processed'
  | 'failed'
  | 'escalated'
  | 'indeterminate'
  | 'conflict'
  | 'error';

export interface AttemptResult {
  subscriptionId: string;
  outcome: AttemptOutcome;
  /** Post-attempt state when the subscription was updated */
  subscription?: Subscription;
  ledgerEntryId?: number;
  error?: string;
}

// ============================================================================
// Configuration
// ============================================================================

export interface BillingLogger {
  info(message: string, details?: Record<string, unknown>): void;
  warn(message: string, details?: Record<string, unknown>): void;
  error(message: string, details?: Record<string, unknown>): void;
}

export interface CycleProcessorConfig {
  subscriptions: SubscriptionStore;
  ledger: Ledger;
  plans: PlanCatalog;
  runs: BillingRunJournal;
  executor: ChargeExecutor;
  clock: DBClock;

  batchSize: number; // Default: 100
  concurrency: number; // Default: 8
  chargeTimeoutMs: number; // Default: 30s
  runTimeoutMs: number; // Default: 5 min

  // Consecutive failed charges before involuntary cancellation (0 disables)
  escalationThreshold: number; // Default: 3

  logger?: BillingLogger;
}
