import { pgTable, bigserial, uuid, bigint, varchar, date, timestamp, index, uniqueIndex } from 'drizzle-orm/pg-core';
import { sql } from 'drizzle-orm';
import { FIELD_LIMITS } from '@renewly/shared/constants';
import { subscriptions } from './subscriptions';
import { ledgerOutcomeEnum } from './enums';

/**
 * Ledger entries (append-only)
 *
 * One row per charge attempt. Rows are never updated or deleted; the charge
 * history of a subscription is its rows ordered by id.
 *
 * A failed or indeterminate attempt is retried with the same idempotency key
 * on a later run, so the key alone is not unique. What must never happen is
 * two successful charges for the same key: the partial unique index makes a
 * second 'success' row for a key fail at insert time.
 */
export const ledgerEntries = pgTable('ledger_entries', {
  id: bigserial('id', { mode: 'number' }).primaryKey(),
  subscriptionId: uuid('subscription_id').notNull().references(() => subscriptions.id),
  amountCents: bigint('amount_cents', { mode: 'number' }).notNull(),
  outcome: ledgerOutcomeEnum('outcome').notNull(),
  idempotencyKey: varchar('idempotency_key', { length: FIELD_LIMITS.IDEMPOTENCY_KEY }).notNull(),
  billedDate: date('billed_date', { mode: 'string' }).notNull(),
  reference: varchar('reference', { length: FIELD_LIMITS.CHARGE_REFERENCE }),
  failureReason: varchar('failure_reason', { length: FIELD_LIMITS.FAILURE_REASON }),
  processedAt: timestamp('processed_at', { withTimezone: true }).notNull(),
}, (table) => ({
  idxLedgerSubscription: index('idx_ledger_subscription').on(table.subscriptionId, table.id.desc()),
  uniqLedgerSuccessKey: uniqueIndex('uniq_ledger_success_key')
    .on(table.idempotencyKey)
    .where(sql`${table.outcome} = 'success'`),
}));
