/**
 * Billing period calendar arithmetic
 *
 * Billing dates are calendar dates in ISO form (YYYY-MM-DD, UTC). Strings
 * compare correctly with < and >, serialize without timezone surprises and
 * map one-to-one onto a PostgreSQL DATE column.
 *
 * The next billing date is always derived from the previous billing date,
 * never from "now", so a run that is delayed does not shift the schedule.
 */

import type { BillingCycle } from '../constants';

/** Calendar date, YYYY-MM-DD */
export type BillingDate = string;

const BILLING_DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;
const MS_PER_DAY = 24 * 60 * 60 * 1000;

interface DateParts {
  year: number;
  month: number; // 1-12
  day: number;
}

function toParts(date: BillingDate): DateParts {
  const match = BILLING_DATE_PATTERN.exec(date);
  if (!match) {
    throw new RangeError(`Invalid billing date: "${date}"`);
  }
  const parts = {
    year: Number(match[1]),
    month: Number(match[2]),
    day: Number(match[3]),
  };
  if (parts.month < 1 || parts.month > 12 || parts.day < 1 || parts.day > daysInMonth(parts.year, parts.month)) {
    throw new RangeError(`Invalid billing date: "${date}"`);
  }
  return parts;
}

function fromParts({ year, month, day }: DateParts): BillingDate {
  return `${String(year).padStart(4, '0')}-${String(month).padStart(2, '0')}-${String(day).padStart(2, '0')}`;
}

/**
 * Number of days in a month (month is 1-12)
 */
export function daysInMonth(year: number, month: number): number {
  // Day 0 of the following month is the last day of this one
  return new Date(Date.UTC(year, month, 0)).getUTCDate();
}

export function isBillingDate(value: string): boolean {
  try {
    toParts(value);
    return true;
  } catch {
    return false;
  }
}

/**
 * Calendar date (UTC) of a timestamp
 */
export function toBillingDate(timestamp: Date): BillingDate {
  return fromParts({
    year: timestamp.getUTCFullYear(),
    month: timestamp.getUTCMonth() + 1,
    day: timestamp.getUTCDate(),
  });
}

/**
 * Midnight UTC of a billing date
 */
export function parseBillingDate(date: BillingDate): Date {
  const { year, month, day } = toParts(date);
  return new Date(Date.UTC(year, month - 1, day));
}

/**
 * Day of month the subscription is anchored to (UTC day of creation)
 *
 * Month and year steps re-anchor to this day so that a subscription created
 * on the 31st bills on Feb 29 and then returns to Mar 31 instead of drifting
 * to the 29th forever.
 */
export function anchorDayOf(createdAt: Date): number {
  return createdAt.getUTCDate();
}

/**
 * Advance a billing date by one billing cycle
 *
 * @param date Previous billing date
 * @param cycle Plan billing cycle
 * @param anchorDay Preferred day of month for monthly/yearly cycles
 *                  (defaults to the day of `date`)
 */
export function addBillingPeriod(
  date: BillingDate,
  cycle: BillingCycle,
  anchorDay?: number
): BillingDate {
  const parts = toParts(date);

  switch (cycle) {
    case 'weekly': {
      const next = parseBillingDate(date);
      next.setUTCDate(next.getUTCDate() + 7);
      return toBillingDate(next);
    }
    case 'monthly': {
      const month = parts.month === 12 ? 1 : parts.month + 1;
      const year = parts.month === 12 ? parts.year + 1 : parts.year;
      const day = Math.min(anchorDay ?? parts.day, daysInMonth(year, month));
      return fromParts({ year, month, day });
    }
    case 'yearly': {
      const year = parts.year + 1;
      const day = Math.min(anchorDay ?? parts.day, daysInMonth(year, parts.month));
      return fromParts({ year, month: parts.month, day });
    }
  }
}

/**
 * First next-billing-date of a subscription created at `createdAt`
 */
export function initialNextBillingDate(createdAt: Date, cycle: BillingCycle): BillingDate {
  return addBillingPeriod(toBillingDate(createdAt), cycle, anchorDayOf(createdAt));
}

/**
 * End of a free trial of `trialDays` whole days starting at `createdAt`
 */
export function trialEndsAt(createdAt: Date, trialDays: number): Date {
  if (!Number.isInteger(trialDays) || trialDays < 1) {
    throw new RangeError(`Invalid trial length: ${trialDays}`);
  }
  return new Date(createdAt.getTime() + trialDays * MS_PER_DAY);
}

/**
 * Compare two billing dates (negative, zero or positive)
 */
export function compareBillingDates(a: BillingDate, b: BillingDate): number {
  return a < b ? -1 : a > b ? 1 : 0;
}
