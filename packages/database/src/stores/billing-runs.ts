import { eq } from 'drizzle-orm';
import type { BillingRunTrigger } from '@renewly/shared/constants';
import type { Database } from '../db';
import { billingRuns } from '../schema';
import { NotFoundError } from '../billing/errors';
import type { BillingRun, BillingRunJournal, BillingRunResult } from '../billing/types';
import { withStorage } from './pg-errors';

export class DrizzleBillingRunJournal implements BillingRunJournal {
  constructor(private readonly db: Database) {}

  async start(trigger: BillingRunTrigger, startedAt: Date): Promise<BillingRun> {
    return withStorage('startBillingRun', async () => {
      const [row] = await this.db.insert(billingRuns).values({ trigger, status: 'running', startedAt }).returning();
      return row;
    });
  }

  async finish(id: string, result: BillingRunResult): Promise<BillingRun> {
    return withStorage('finishBillingRun', async () => {
      const [row] = await this.db.update(billingRuns).set(result).where(eq(billingRuns.id, id)).returning();
      if (!row) {
        throw new NotFoundError('Billing run', id);
      }
      return row;
    });
  }

  async get(id: string): Promise<BillingRun | null> {
    return withStorage('getBillingRun', async () => {
      const [row] = await this.db.select().from(billingRuns).where(eq(billingRuns.id, id)).limit(1);
      return row ?? null;
    });
  }
}
