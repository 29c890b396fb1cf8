/**
 * Paged ledger history
 *
 * Shared by the Postgres and in-memory ledgers. Pages are fetched on demand
 * with a keyset (id < last seen id), so iteration can stop early without
 * reading the rest of the history, and every new iteration starts again from
 * the newest entry.
 */

import { BILLING_DEFAULTS } from '@renewly/shared/constants';
import type { LedgerEntry, LedgerHistory } from './types';

/** Entries older than `beforeId` (newest first), or the newest when null */
export type LedgerPageFetcher = (beforeId: number | null, size: number) => Promise<LedgerEntry[]>;

export class PagedLedgerHistory implements LedgerHistory {
  constructor(
    private readonly fetchPage: LedgerPageFetcher,
    private readonly limit: number,
    private readonly pageSize: number = BILLING_DEFAULTS.HISTORY_PAGE_SIZE
  ) {}

  async *[Symbol.asyncIterator](): AsyncGenerator<LedgerEntry> {
    let remaining = this.limit;
    let beforeId: number | null = null;

    while (remaining > 0) {
      const size = Math.min(this.pageSize, remaining);
      const page = await this.fetchPage(beforeId, size);
      for (const entry of page) {
        yield entry;
        remaining--;
      }
      if (page.length < size) {
        return;
      }
      beforeId = page[page.length - 1].id;
    }
  }

  async toArray(): Promise<LedgerEntry[]> {
    const entries: LedgerEntry[] = [];
    for await (const entry of this) {
      entries.push(entry);
    }
    return entries;
  }
}
