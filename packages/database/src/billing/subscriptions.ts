/**
 * Subscription Operations
 *
 * Create, list and cancel. These are the only writers outside the cycle
 * processor; cancellation is unconditional and wins over any billing attempt
 * in flight (the attempt's final update then fails its version guard).
 */

import { BILLING_DEFAULTS, type SubscriptionStatus } from '@renewly/shared/constants';
import { initialNextBillingDate, toBillingDate, trialEndsAt } from '@renewly/shared/billing';
import type { DBClock } from '@renewly/shared/db-clock';
import type { CreateSubscriptionInput } from '@renewly/shared/schemas';
import { ValidationError } from './errors';
import type { CycleProcessor } from './processor';
import type {
  AttemptOutcome,
  Ledger,
  LedgerEntry,
  PlanCatalog,
  Subscription,
  SubscriptionStore,
  UserDirectory,
} from './types';

export interface SubscriptionServiceDeps {
  subscriptions: SubscriptionStore;
  ledger: Ledger;
  plans: PlanCatalog;
  users: UserDirectory;
  processor: CycleProcessor;
  clock: DBClock;
}

export interface CreatedSubscription {
  subscription: Subscription;
  /** Outcome of the charge for the first period; 'trial' when none was made */
  initialCharge: AttemptOutcome | 'trial';
}

export interface SubscriptionWithHistory extends Subscription {
  /** Most recent first */
  recentCharges: LedgerEntry[];
}

/**
 * Create a subscription and charge its first period
 *
 * The subscription is persisted before the charge, so an indeterminate or
 * failed first charge still leaves a record (past_due on decline).
 *
 * With a trial (the input's trialDays, else the plan's) nothing is charged:
 * the first billing date is the day the trial ends, and monthly and yearly
 * periods stay anchored to that day.
 *
 * @throws ValidationError for an unknown or inactive user or plan
 */
export async function createSubscription(
  deps: SubscriptionServiceDeps,
  input: CreateSubscriptionInput
): Promise<CreatedSubscription> {
  const user = await deps.users.getUser(input.userId);
  if (!user || !user.isActive) {
    throw new ValidationError(`Unknown or inactive user ${input.userId}`, 'UNKNOWN_USER', { userId: input.userId });
  }

  const plan = await deps.plans.getPlan(input.planId);
  if (!plan || !plan.isActive) {
    throw new ValidationError(`Unknown or inactive plan ${input.planId}`, 'UNKNOWN_PLAN', { planId: input.planId });
  }

  const createdAt = deps.clock.now();
  const trialDays = input.trialDays ?? plan.trialDays;
  const trialEnd = trialDays > 0 ? trialEndsAt(createdAt, trialDays) : null;
  const created = await deps.subscriptions.create({
    userId: user.id,
    planId: plan.id,
    nextBillingDate: trialEnd ? toBillingDate(trialEnd) : initialNextBillingDate(createdAt, plan.billingCycle),
    trialEndsAt: trialEnd,
    createdAt,
  });
  if (trialEnd) {
    return { subscription: created, initialCharge: 'trial' };
  }

  const attempt = await deps.processor.attemptInitialCharge(created);
  const subscription = attempt.subscription ?? (await deps.subscriptions.get(created.id)) ?? created;
  return { subscription, initialCharge: attempt.outcome };
}

/**
 * List subscriptions (newest first), each with its latest ledger entries
 */
export async function listSubscriptions(
  deps: Pick<SubscriptionServiceDeps, 'subscriptions' | 'ledger'>,
  filter: { userId?: number; status?: SubscriptionStatus; limit: number },
  historyLimit: number = BILLING_DEFAULTS.HISTORY_LIMIT
): Promise<SubscriptionWithHistory[]> {
  const rows = await deps.subscriptions.list(filter);
  return Promise.all(
    rows.map(async (subscription) => ({
      ...subscription,
      recentCharges: await deps.ledger.history(subscription.id, historyLimit).toArray(),
    }))
  );
}

/**
 * Cancel a subscription (idempotent)
 *
 * @throws NotFoundError if the subscription does not exist
 */
export async function cancelSubscription(
  deps: Pick<SubscriptionServiceDeps, 'subscriptions' | 'clock'>,
  subscriptionId: string
): Promise<Subscription> {
  return deps.subscriptions.cancel(subscriptionId, deps.clock.now());
}
