/**
 * PostgreSQL Ledger (append-only)
 *
 * The partial unique index on idempotency_key WHERE outcome = 'success'
 * turns a second successful charge for the same key into a ConflictError.
 */

import { and, desc, eq, lt } from 'drizzle-orm';
import type { Database } from '../db';
import { ledgerEntries } from '../schema';
import { ConflictError } from '../billing/errors';
import { PagedLedgerHistory } from '../billing/ledger-history';
import type { Ledger, LedgerEntry, LedgerHistory, NewLedgerEntry } from '../billing/types';
import { isUniqueViolation, withStorage } from './pg-errors';

type LedgerRow = typeof ledgerEntries.$inferSelect;

function toLedgerEntry(row: LedgerRow): LedgerEntry {
  return {
    id: row.id,
    subscriptionId: row.subscriptionId,
    amountCents: row.amountCents,
    outcome: row.outcome,
    idempotencyKey: row.idempotencyKey,
    billedDate: row.billedDate,
    reference: row.reference,
    failureReason: row.failureReason,
    processedAt: row.processedAt,
  };
}

export class DrizzleLedger implements Ledger {
  constructor(private readonly db: Database) {}

  async append(entry: NewLedgerEntry): Promise<LedgerEntry> {
    return withStorage('appendLedgerEntry', async () => {
      try {
        const [row] = await this.db.insert(ledgerEntries).values(entry).returning();
        return toLedgerEntry(row);
      } catch (error) {
        if (isUniqueViolation(error)) {
          throw new ConflictError(`A successful charge is already recorded for ${entry.idempotencyKey}`);
        }
        throw error;
      }
    });
  }

  history(subscriptionId: string, limit: number): LedgerHistory {
    return new PagedLedgerHistory(
      (beforeId, size) =>
        withStorage('ledgerHistory', async () => {
          const rows = await this.db
            .select()
            .from(ledgerEntries)
            .where(and(
              eq(ledgerEntries.subscriptionId, subscriptionId),
              beforeId === null ? undefined : lt(ledgerEntries.id, beforeId)
            ))
            .orderBy(desc(ledgerEntries.id))
            .limit(size);
          return rows.map(toLedgerEntry);
        }),
      limit
    );
  }
}
