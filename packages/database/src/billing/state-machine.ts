/**
 * Subscription State Machine
 *
 * Pure functions. The cycle processor calls these after the ledger entry for
 * an attempt has been written, then persists the result with a single
 * conditional update.
 *
 *   Active   --success--> Active   (date advances)
 *   Active   --failed---> PastDue  (date unchanged)
 *   PastDue  --success--> Active   (date advances)
 *   PastDue  --failed---> PastDue  (date unchanged)
 *   any      --cancel---> Cancelled (terminal, ignores later outcomes)
 *
 * Escalation: once the trailing run of failed attempts reaches the
 * configured threshold, a failure moves the subscription to Cancelled.
 */

import {
  BILLABLE_STATUSES,
  type BillingCycle,
  type LedgerOutcome,
  type SubscriptionStatus,
} from '@renewly/shared/constants';
import { addBillingPeriod, type BillingDate } from '@renewly/shared/billing';

export type ChargeOutcome = Exclude<LedgerOutcome, 'pending'>;

export interface BillingSchedule {
  /** The date that was just charged for */
  nextBillingDate: BillingDate;
  billingCycle: BillingCycle;
  /** Day of month monthly/yearly cycles snap back to */
  anchorDay: number;
}

export interface Transition {
  status: SubscriptionStatus;
  /** null: unchanged */
  nextBillingDate: BillingDate | null;
}

export function isBillable(status: SubscriptionStatus): boolean {
  return BILLABLE_STATUSES.some((billable) => billable === status);
}

/**
 * Next state after an affirmative charge outcome
 *
 * Cancelled is terminal: any outcome leaves it cancelled and undated.
 */
export function transition(
  current: SubscriptionStatus,
  outcome: ChargeOutcome,
  schedule: BillingSchedule
): Transition {
  if (!isBillable(current)) {
    return { status: current, nextBillingDate: null };
  }

  if (outcome === 'success') {
    return {
      status: 'active',
      nextBillingDate: addBillingPeriod(schedule.nextBillingDate, schedule.billingCycle, schedule.anchorDay),
    };
  }

  return { status: 'past_due', nextBillingDate: null };
}

/**
 * Length of the trailing run of failed attempts
 *
 * `history` is most recent first. Pending (indeterminate) entries neither
 * count nor break the run; a success ends it.
 */
export function countConsecutiveFailures(history: Iterable<{ outcome: LedgerOutcome }>): number {
  let failures = 0;
  for (const entry of history) {
    if (entry.outcome === 'success') {
      break;
    }
    if (entry.outcome === 'failed') {
      failures++;
    }
  }
  return failures;
}

/**
 * Apply the escalation policy to a failure transition
 *
 * @param consecutiveFailures Trailing failures including the current one
 * @param threshold 0 disables escalation
 */
export function escalate(
  next: Transition,
  consecutiveFailures: number,
  threshold: number
): { transition: Transition; escalated: boolean } {
  if (threshold > 0 && next.status === 'past_due' && consecutiveFailures >= threshold) {
    return { transition: { status: 'cancelled', nextBillingDate: null }, escalated: true };
  }
  return { transition: next, escalated: false };
}
