/**
 * In-memory append-only Ledger
 */

import { ConflictError } from '../billing/errors';
import { PagedLedgerHistory } from '../billing/ledger-history';
import type { Ledger, LedgerEntry, LedgerHistory, NewLedgerEntry } from '../billing/types';

export class MemoryLedger implements Ledger {
  private readonly entries: LedgerEntry[] = [];
  private readonly successKeys = new Set<string>();
  private nextId = 1;

  async append(entry: NewLedgerEntry): Promise<LedgerEntry> {
    if (entry.outcome === 'success') {
      if (this.successKeys.has(entry.idempotencyKey)) {
        throw new ConflictError(`A successful charge is already recorded for ${entry.idempotencyKey}`);
      }
      this.successKeys.add(entry.idempotencyKey);
    }
    const stored: LedgerEntry = { ...entry, id: this.nextId++, processedAt: new Date(entry.processedAt) };
    this.entries.push(stored);
    return { ...stored };
  }

  history(subscriptionId: string, limit: number): LedgerHistory {
    return new PagedLedgerHistory(async (beforeId, size) => {
      const page: LedgerEntry[] = [];
      for (let i = this.entries.length - 1; i >= 0 && page.length < size; i--) {
        const entry = this.entries[i];
        if (entry.subscriptionId === subscriptionId && (beforeId === null || entry.id < beforeId)) {
          page.push({ ...entry });
        }
      }
      return page;
    }, limit);
  }

  /** Every entry in append order (test inspection) */
  all(): LedgerEntry[] {
    return this.entries.map((entry) => ({ ...entry }));
  }
}
