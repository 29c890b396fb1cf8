/**
 * Idempotency Keys for Charge Attempts
 *
 * Every attempt to bill a subscription for a given next-billing-date uses
 * the same key, so retries after a decline, a timeout or a crash reach the
 * charge executor with a key it has already seen.
 *
 * Format: {subscriptionId}:{billedDate}
 *
 * The ledger enforces at most one 'success' entry per key (partial unique
 * index in schema/ledger.ts); the executor contract forbids a second
 * real-world charge for a key.
 */

import { isBillingDate, type BillingDate } from '@renewly/shared/billing';
import { ValidationError } from './errors';

/**
 * Generate the idempotency key for billing a subscription on a date
 *
 * @param subscriptionId Subscription UUID
 * @param billedDate The next-billing-date being charged
 */
export function generateChargeKey(subscriptionId: string, billedDate: BillingDate): string {
  if (!isBillingDate(billedDate)) {
    throw new ValidationError(`Invalid billed date: "${billedDate}"`, 'INVALID_BILLING_DATE');
  }
  return `${subscriptionId}:${billedDate}`;
}
