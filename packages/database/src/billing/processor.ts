/**
 * Billing Cycle Processor
 *
 * Finds every subscription due as of the clock's "today" and attempts to
 * charge each one exactly once per run, with bounded concurrency.
 *
 * Per-subscription sequence:
 * 1. claim        - bump version and take a lease; a concurrent run loses
 *                   here, and later runs do not select the row until the
 *                   lease is released or expires
 * 2. charge       - executor call bounded by chargeTimeoutMs
 * 3. ledger       - append the outcome (success / failed / pending)
 * 4. transition   - state machine + escalation policy
 * 5. update       - conditional write guarded by the claimed version;
 *                   clears the lease
 *
 * The ledger entry is always written before the subscription moves, and the
 * subscription only moves after the ledger write succeeded. An unknown charge
 * outcome writes a 'pending' entry and leaves the subscription as it was, so
 * the next run retries with the same idempotency key.
 *
 * A failure on one subscription never aborts the run. Only a failure of the
 * coordinating query (findDue) or of the run journal does.
 */

import { BILLING_DEFAULTS, type BillingRunTrigger, type LedgerOutcome } from '@renewly/shared/constants';
import { anchorDayOf, toBillingDate, type BillingDate } from '@renewly/shared/billing';
import type { ChargeParams } from '@renewly/shared/charge-executor';
import { formatCents } from '@renewly/shared/money';
import { ConflictError, IndeterminateChargeError, NotFoundError, ValidationError, describeError } from './errors';
import { generateChargeKey } from './idempotency';
import { consoleBillingLogger } from './logger';
import { countConsecutiveFailures, escalate, transition } from './state-machine';
import { runPool, type PoolResult } from './worker-pool';
import type {
  AttemptResult,
  BillingLogger,
  BillingRunCounts,
  BillingRunSummary,
  CycleProcessorConfig,
  DueCursor,
  LedgerEntry,
  Plan,
  Subscription,
} from './types';

// How far back escalation looks for the trailing run of failures
const ESCALATION_LOOKBACK = 100;

export interface RunOptions {
  trigger?: BillingRunTrigger;
  /** Stops dispatching new attempts; attempts in flight complete */
  signal?: AbortSignal;
}

interface AttemptPlan {
  billedDate: BillingDate;
  /** false for the charge at creation, which bills the current period */
  advanceOnSuccess: boolean;
}

type ChargeAttempt =
  | { kind: 'succeeded'; reference: string }
  | { kind: 'declined'; reference: string | null; reason: string }
  | { kind: 'indeterminate'; error: IndeterminateChargeError };

function emptyCounts(): BillingRunCounts {
  return {
    considered: 0,
    processed: 0,
    failed: 0,
    escalatedToCancelled: 0,
    indeterminate: 0,
    conflicts: 0,
    errors: 0,
    deferred: 0,
  };
}

function tally(counts: BillingRunCounts, results: PoolResult<AttemptResult>[]): void {
  for (const result of results) {
    counts.considered++;
    if (result.status === 'skipped') {
      counts.deferred++;
      continue;
    }
    if (result.status === 'rejected') {
      counts.errors++;
      continue;
    }
    switch (result.value.outcome) {
      case 'processed':
        counts.processed++;
        break;
      case 'failed':
        counts.failed++;
        break;
      case 'escalated':
        counts.escalatedToCancelled++;
        break;
      case 'indeterminate':
        counts.indeterminate++;
        break;
      case 'conflict':
        counts.conflicts++;
        break;
      case 'error':
        counts.errors++;
        break;
    }
  }
}

function assertPositiveInteger(name: string, value: number): void {
  if (!Number.isInteger(value) || value < 1) {
    throw new ValidationError(`${name} must be a positive integer, got ${value}`, 'INVALID_CONFIG');
  }
}

export class CycleProcessor {
  private readonly logger: BillingLogger;

  constructor(private readonly config: CycleProcessorConfig) {
    assertPositiveInteger('batchSize', config.batchSize);
    assertPositiveInteger('concurrency', config.concurrency);
    assertPositiveInteger('chargeTimeoutMs', config.chargeTimeoutMs);
    assertPositiveInteger('runTimeoutMs', config.runTimeoutMs);
    if (!Number.isInteger(config.escalationThreshold) || config.escalationThreshold < 0) {
      throw new ValidationError(
        `escalationThreshold must be a non-negative integer, got ${config.escalationThreshold}`,
        'INVALID_CONFIG'
      );
    }
    this.logger = config.logger ?? consoleBillingLogger;
  }

  /**
   * Process every subscription due as of today
   *
   * Subscriptions that are still due after their attempt (declined, pending,
   * abandoned) are not retried within the same run.
   *
   * @throws when selecting due subscriptions or writing the run journal fails;
   *         the run is recorded as 'failed' first where possible
   */
  async run(options: RunOptions = {}): Promise<BillingRunSummary> {
    const { clock, runs, subscriptions } = this.config;
    const startedAt = clock.now();
    const asOf = toBillingDate(clock.today());
    const run = await runs.start(options.trigger ?? 'manual', startedAt);
    const timeout = AbortSignal.timeout(this.config.runTimeoutMs);
    const signal = options.signal ? AbortSignal.any([options.signal, timeout]) : timeout;

    const counts = emptyCounts();
    const attempted = new Set<string>();
    let cursor: DueCursor | undefined;

    this.logger.info(`Billing run ${run.id} started`, { asOf, trigger: run.trigger });

    try {
      while (!signal.aborted) {
        const batch = await subscriptions.findDue({
          asOf,
          limit: this.config.batchSize,
          now: clock.now(),
          after: cursor,
        });
        if (batch.length === 0) {
          break;
        }
        const last = batch[batch.length - 1];
        cursor = { nextBillingDate: last.nextBillingDate, id: last.id };

        const fresh = batch.filter((subscription) => !attempted.has(subscription.id));
        for (const subscription of fresh) {
          attempted.add(subscription.id);
        }

        const results = await runPool(fresh, { concurrency: this.config.concurrency, signal }, (subscription) =>
          this.attempt(subscription, { billedDate: subscription.nextBillingDate, advanceOnSuccess: true })
        );
        tally(counts, results);
      }
    } catch (error) {
      const message = describeError(error);
      this.logger.error(`Billing run ${run.id} failed`, { error: message, ...counts });
      try {
        await runs.finish(run.id, { ...counts, status: 'failed', error: message, completedAt: clock.now() });
      } catch (journalError) {
        this.logger.error(`Could not record failure of billing run ${run.id}`, {
          error: describeError(journalError),
        });
      }
      throw error;
    }

    const status = signal.aborted ? 'aborted' : 'completed';
    const error = signal.aborted ? describeError(signal.reason) : null;
    const completedAt = clock.now();
    await runs.finish(run.id, { ...counts, status, error, completedAt });

    const summary: BillingRunSummary = {
      runId: run.id,
      status,
      ...counts,
      startedAt,
      completedAt,
      durationMs: completedAt.getTime() - startedAt.getTime(),
    };
    this.logger.info(`Billing run ${run.id} ${status}`, { ...counts });
    return summary;
  }

  /**
   * Charge a freshly created subscription for its first period
   *
   * Bills the creation date; on success the next billing date (already one
   * period ahead) is left as is.
   */
  async attemptInitialCharge(subscription: Subscription): Promise<AttemptResult> {
    return this.attempt(subscription, {
      billedDate: toBillingDate(subscription.createdAt),
      advanceOnSuccess: false,
    });
  }

  /**
   * One charge attempt. Never throws: every failure maps to an outcome.
   */
  private async attempt(subscription: Subscription, plan: AttemptPlan): Promise<AttemptResult> {
    const { subscriptions, ledger, plans, clock } = this.config;
    const subscriptionId = subscription.id;

    let claimed: Subscription;
    try {
      const now = clock.now();
      claimed = await subscriptions.claim(subscriptionId, subscription.version, {
        now,
        until: new Date(now.getTime() + this.config.chargeTimeoutMs + BILLING_DEFAULTS.CLAIM_LEASE_MARGIN_MS),
      });
    } catch (error) {
      return this.abandon(subscriptionId, 'claim', error);
    }

    let pricing: Plan | null;
    try {
      pricing = await plans.getPlan(claimed.planId);
    } catch (error) {
      await this.release(claimed);
      return this.abandon(subscriptionId, 'claim', error);
    }
    if (!pricing) {
      await this.release(claimed);
      return this.abandon(
        subscriptionId,
        'claim',
        new ValidationError(`Plan ${claimed.planId} not found`, 'UNKNOWN_PLAN', { planId: claimed.planId })
      );
    }

    const idempotencyKey = generateChargeKey(subscriptionId, plan.billedDate);
    const charge = await this.executeCharge({
      subscriptionId,
      userId: claimed.userId,
      amountCents: pricing.priceCents,
      idempotencyKey,
      description: `${pricing.name} (${pricing.billingCycle}) for ${plan.billedDate}`,
    });

    const outcome: LedgerOutcome =
      charge.kind === 'succeeded' ? 'success' : charge.kind === 'declined' ? 'failed' : 'pending';

    let entry: LedgerEntry | null;
    try {
      entry = await ledger.append({
        subscriptionId,
        amountCents: pricing.priceCents,
        outcome,
        idempotencyKey,
        billedDate: plan.billedDate,
        reference: charge.kind === 'indeterminate' ? null : charge.reference,
        failureReason:
          charge.kind === 'succeeded' ? null : charge.kind === 'declined' ? charge.reason : charge.error.message,
        processedAt: clock.now(),
      });
    } catch (error) {
      if (outcome === 'success' && error instanceof ConflictError) {
        // This period's success is already recorded (an earlier attempt whose
        // final update was lost). Finish the transition it never made.
        this.logger.info(`Success already recorded for ${idempotencyKey}; advancing`, { subscriptionId });
        entry = null;
      } else {
        // The charge happened (or may have) but is not recorded. Leave the
        // subscription untouched; the next run retries with the same key.
        this.logger.error(`Ledger write failed for ${idempotencyKey}`, {
          subscriptionId,
          chargeOutcome: outcome,
          error: describeError(error),
        });
        await this.release(claimed);
        return this.abandon(subscriptionId, 'ledger', error);
      }
    }
    const ledgerEntryId = entry?.id;

    if (charge.kind === 'indeterminate') {
      this.logger.warn(`Charge outcome unknown for ${idempotencyKey}`, {
        subscriptionId,
        ledgerEntryId,
        code: charge.error.code,
        reason: charge.error.message,
      });
      await this.release(claimed);
      return { subscriptionId, outcome: 'indeterminate', ledgerEntryId, error: charge.error.message };
    }
    const affirmative = charge.kind === 'succeeded' ? 'success' : 'failed';

    let escalated = false;
    let update: Subscription;
    try {
      let next = transition(claimed.status, affirmative, {
        nextBillingDate: claimed.nextBillingDate,
        billingCycle: pricing.billingCycle,
        anchorDay: anchorDayOf(claimed.trialEndsAt ?? claimed.createdAt),
      });
      if (!plan.advanceOnSuccess) {
        next = { ...next, nextBillingDate: null };
      }
      if (affirmative === 'failed' && this.config.escalationThreshold > 0) {
        const failures = await this.consecutiveFailures(subscriptionId);
        ({ transition: next, escalated } = escalate(next, failures, this.config.escalationThreshold));
      }

      update = await subscriptions.updateAfterAttempt(subscriptionId, claimed.version, {
        status: next.status,
        nextBillingDate: next.nextBillingDate ?? claimed.nextBillingDate,
        updatedAt: clock.now(),
      });
    } catch (error) {
      await this.release(claimed);
      return { ...this.abandon(subscriptionId, 'update', error), ledgerEntryId };
    }

    if (charge.kind === 'succeeded') {
      this.logger.info(`Charged ${formatCents(pricing.priceCents)} for ${idempotencyKey}`, {
        subscriptionId,
        nextBillingDate: update.nextBillingDate,
      });
      return { subscriptionId, outcome: 'processed', subscription: update, ledgerEntryId };
    }

    if (escalated) {
      this.logger.warn(`Subscription ${subscriptionId} cancelled after repeated failed charges`, {
        threshold: this.config.escalationThreshold,
      });
      return { subscriptionId, outcome: 'escalated', subscription: update, ledgerEntryId };
    }

    this.logger.info(`Charge declined for ${idempotencyKey}`, { subscriptionId, reason: charge.reason });
    return { subscriptionId, outcome: 'failed', subscription: update, ledgerEntryId };
  }

  /**
   * Call the executor, bounded by chargeTimeoutMs
   *
   * A throw or a timeout is an unknown outcome (IndeterminateChargeError),
   * never a decline.
   */
  private async executeCharge(params: ChargeParams): Promise<ChargeAttempt> {
    const pending = Promise.resolve().then(() => this.config.executor.charge(params));
    let timer: NodeJS.Timeout | undefined;
    const timedOut = new Promise<'timeout'>((resolve) => {
      timer = setTimeout(() => resolve('timeout'), this.config.chargeTimeoutMs);
    });

    try {
      const result = await Promise.race([pending, timedOut]);
      if (result === 'timeout') {
        void pending.then(
          (late) => this.logger.warn(`Charge ${params.idempotencyKey} settled after timeout`, { status: late.status }),
          (error) =>
            this.logger.warn(`Charge ${params.idempotencyKey} failed after timeout`, { error: describeError(error) })
        );
        return {
          kind: 'indeterminate',
          error: new IndeterminateChargeError(`Charge timed out after ${this.config.chargeTimeoutMs}ms`),
        };
      }
      if (result.status === 'succeeded') {
        return { kind: 'succeeded', reference: result.reference };
      }
      return { kind: 'declined', reference: result.reference ?? null, reason: result.reason };
    } catch (error) {
      return { kind: 'indeterminate', error: new IndeterminateChargeError(describeError(error), { cause: error }) };
    } finally {
      clearTimeout(timer);
    }
  }

  private async consecutiveFailures(subscriptionId: string): Promise<number> {
    const recent: LedgerEntry[] = [];
    for await (const entry of this.config.ledger.history(subscriptionId, ESCALATION_LOOKBACK)) {
      recent.push(entry);
      if (entry.outcome === 'success') {
        break;
      }
    }
    return countConsecutiveFailures(recent);
  }

  /**
   * Drop this attempt's lease so the next run can select the subscription.
   * A failure here only delays that until the lease expires.
   */
  private async release(claimed: Subscription): Promise<void> {
    try {
      await this.config.subscriptions.release(claimed.id, claimed.version);
    } catch (error) {
      this.logger.warn(`Could not release claim on ${claimed.id}`, { error: describeError(error) });
    }
  }

  private abandon(subscriptionId: string, stage: string, error: unknown): AttemptResult {
    const message = describeError(error);
    if (error instanceof ConflictError || error instanceof NotFoundError) {
      this.logger.info(`Skipped ${subscriptionId} at ${stage}: ${message}`);
      return { subscriptionId, outcome: 'conflict', error: message };
    }
    this.logger.error(`Attempt for ${subscriptionId} failed at ${stage}`, { error: message });
    return { subscriptionId, outcome: 'error', error: message };
  }
}

export function defaultProcessorSettings(): Pick<
  CycleProcessorConfig,
  'batchSize' | 'concurrency' | 'chargeTimeoutMs' | 'runTimeoutMs' | 'escalationThreshold'
> {
  return {
    batchSize: BILLING_DEFAULTS.BATCH_SIZE,
    concurrency: BILLING_DEFAULTS.CONCURRENCY,
    chargeTimeoutMs: BILLING_DEFAULTS.CHARGE_TIMEOUT_MS,
    runTimeoutMs: BILLING_DEFAULTS.RUN_TIMEOUT_MS,
    escalationThreshold: BILLING_DEFAULTS.ESCALATION_THRESHOLD,
  };
}
