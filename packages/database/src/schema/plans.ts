import { pgTable, serial, varchar, text, bigint, integer, boolean, timestamp, index, check } from 'drizzle-orm/pg-core';
import { sql } from 'drizzle-orm';
import { FIELD_LIMITS } from '@renewly/shared/constants';
import { billingCycleEnum } from './enums';

/**
 * Subscription plans
 *
 * Owned by catalog management. Immutable as far as billing is concerned:
 * a price change creates a new plan, so ledger amounts copied at charge
 * time never disagree with the plan they came from.
 *
 * Prices are integer cents (fixed point), never floating point.
 */
export const plans = pgTable('plans', {
  id: serial('id').primaryKey(),
  name: varchar('name', { length: FIELD_LIMITS.NAME }).notNull(),
  description: text('description'),
  priceCents: bigint('price_cents', { mode: 'number' }).notNull(),
  billingCycle: billingCycleEnum('billing_cycle').notNull(),
  trialDays: integer('trial_days').notNull().default(0),
  isActive: boolean('is_active').notNull().default(true),
  createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
}, (table) => ({
  idxPlanActive: index('idx_plan_active').on(table.isActive),
  checkPriceNotNegative: check('check_price_not_negative', sql`${table.priceCents} >= 0`),
  checkTrialDaysNotNegative: check('check_trial_days_not_negative', sql`${table.trialDays} >= 0`),
}));
