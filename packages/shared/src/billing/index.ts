/**
 * Billing module exports
 *
 * Calendar arithmetic for subscription billing dates
 */

export {
  type BillingDate,
  daysInMonth,
  isBillingDate,
  toBillingDate,
  parseBillingDate,
  anchorDayOf,
  addBillingPeriod,
  initialNextBillingDate,
  trialEndsAt,
  compareBillingDates,
} from './periods';
