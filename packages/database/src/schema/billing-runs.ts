import { pgTable, uuid, integer, text, timestamp, index } from 'drizzle-orm/pg-core';
import { billingRunStatusEnum, billingRunTriggerEnum } from './enums';

/**
 * Billing run journal
 *
 * One row per cycle processor pass. Written at start ('running') and again
 * when the pass ends, so a crashed run stays visible as 'running'.
 */
export const billingRuns = pgTable('billing_runs', {
  id: uuid('id').primaryKey().defaultRandom(),
  trigger: billingRunTriggerEnum('trigger').notNull(),
  status: billingRunStatusEnum('status').notNull().default('running'),

  considered: integer('considered').notNull().default(0),
  processed: integer('processed').notNull().default(0),
  failed: integer('failed').notNull().default(0),
  escalatedToCancelled: integer('escalated_to_cancelled').notNull().default(0),
  indeterminate: integer('indeterminate').notNull().default(0),
  conflicts: integer('conflicts').notNull().default(0),
  errors: integer('errors').notNull().default(0),
  deferred: integer('deferred').notNull().default(0),

  error: text('error'),
  startedAt: timestamp('started_at', { withTimezone: true }).notNull(),
  completedAt: timestamp('completed_at', { withTimezone: true }),
}, (table) => ({
  idxBillingRunStarted: index('idx_billing_run_started').on(table.startedAt),
}));
