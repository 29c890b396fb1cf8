/**
 * Response shapes
 *
 * Amounts go out twice: integer cents and the fixed-point string ("9.99").
 * Timestamps go out as ISO strings so REST and tRPC responses match.
 */

import type {
  BillingRun,
  BillingRunSummary,
  LedgerEntry,
  Subscription,
  SubscriptionWithHistory,
} from '@renewly/database';
import { formatCents } from '@renewly/shared/money';

export function toLedgerEntryView(entry: LedgerEntry) {
  return {
    id: entry.id,
    subscriptionId: entry.subscriptionId,
    amountCents: entry.amountCents,
    amount: formatCents(entry.amountCents),
    outcome: entry.outcome,
    idempotencyKey: entry.idempotencyKey,
    billedDate: entry.billedDate,
    reference: entry.reference,
    failureReason: entry.failureReason,
    processedAt: entry.processedAt.toISOString(),
  };
}

export function toSubscriptionView(subscription: Subscription) {
  return {
    id: subscription.id,
    userId: subscription.userId,
    planId: subscription.planId,
    status: subscription.status,
    nextBillingDate: subscription.nextBillingDate,
    version: subscription.version,
    trialEndsAt: subscription.trialEndsAt?.toISOString() ?? null,
    createdAt: subscription.createdAt.toISOString(),
    updatedAt: subscription.updatedAt.toISOString(),
    cancelledAt: subscription.cancelledAt?.toISOString() ?? null,
  };
}

export function toSubscriptionWithHistoryView(subscription: SubscriptionWithHistory) {
  return {
    ...toSubscriptionView(subscription),
    recentCharges: subscription.recentCharges.map(toLedgerEntryView),
  };
}

export function toRunSummaryView(summary: BillingRunSummary) {
  return {
    runId: summary.runId,
    status: summary.status,
    considered: summary.considered,
    processed: summary.processed,
    failed: summary.failed,
    escalatedToCancelled: summary.escalatedToCancelled,
    indeterminate: summary.indeterminate,
    conflicts: summary.conflicts,
    errors: summary.errors,
    deferred: summary.deferred,
    startedAt: summary.startedAt.toISOString(),
    completedAt: summary.completedAt.toISOString(),
    durationMs: summary.durationMs,
  };
}

export function toRunView(run: BillingRun) {
  return {
    id: run.id,
    trigger: run.trigger,
    status: run.status,
    error: run.error,
    considered: run.considered,
    processed: run.processed,
    failed: run.failed,
    escalatedToCancelled: run.escalatedToCancelled,
    indeterminate: run.indeterminate,
    conflicts: run.conflicts,
    errors: run.errors,
    deferred: run.deferred,
    startedAt: run.startedAt.toISOString(),
    completedAt: run.completedAt?.toISOString() ?? null,
  };
}

export type SubscriptionView = ReturnType<typeof toSubscriptionView>;
export type LedgerEntryView = ReturnType<typeof toLedgerEntryView>;
export type RunSummaryView = ReturnType<typeof toRunSummaryView>;
export type RunView = ReturnType<typeof toRunView>;
