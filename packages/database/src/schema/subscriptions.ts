import { pgTable, uuid, integer, date, timestamp, index } from 'drizzle-orm/pg-core';
import { sql } from 'drizzle-orm';
import { users } from './users';
import { plans } from './plans';
import { subscriptionStatusEnum } from './enums';

/**
 * Subscriptions table
 *
 * `version` is the optimistic concurrency token. Every mutation is a single
 * UPDATE guarded by `version = expected`, so two billing runs racing on the
 * same row cannot both win.
 *
 * `next_billing_date` is a DATE (no time component) and only moves forward.
 *
 * `claimed_until` is set by the billing attempt that owns the row and
 * cleared by its final update; find_due skips rows claimed past "now".
 */
export const subscriptions = pgTable('subscriptions', {
  id: uuid('id').primaryKey().defaultRandom(),
  userId: integer('user_id').notNull().references(() => users.id),
  planId: integer('plan_id').notNull().references(() => plans.id),
  status: subscriptionStatusEnum('status').notNull().default('active'),
  nextBillingDate: date('next_billing_date', { mode: 'string' }).notNull(),
  version: integer('version').notNull().default(0),
  trialEndsAt: timestamp('trial_ends_at', { withTimezone: true }),
  claimedUntil: timestamp('claimed_until', { withTimezone: true }),
  createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
  updatedAt: timestamp('updated_at', { withTimezone: true }).notNull().defaultNow(),
  cancelledAt: timestamp('cancelled_at', { withTimezone: true }),
}, (table) => ({
  idxSubscriptionUser: index('idx_subscription_user').on(table.userId),
  // find_due: billable rows ordered by (next_billing_date, id)
  idxSubscriptionDue: index('idx_subscription_due')
    .on(table.nextBillingDate, table.id)
    .where(sql`${table.status} != 'cancelled'`),
}));
