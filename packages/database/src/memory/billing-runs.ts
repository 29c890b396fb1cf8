import { randomUUID } from 'crypto';
import type { BillingRunTrigger } from '@renewly/shared/constants';
import { NotFoundError } from '../billing/errors';
import type { BillingRun, BillingRunJournal, BillingRunResult } from '../billing/types';

export class MemoryBillingRunJournal implements BillingRunJournal {
  private readonly runs = new Map<string, BillingRun>();

  async start(trigger: BillingRunTrigger, startedAt: Date): Promise<BillingRun> {
    const run: BillingRun = {
      id: randomUUID(),
      trigger,
      status: 'running',
      considered: 0,
      processed: 0,
      failed: 0,
      escalatedToCancelled: 0,
      indeterminate: 0,
      conflicts: 0,
      errors: 0,
      deferred: 0,
      error: null,
      startedAt: new Date(startedAt),
      completedAt: null,
    };
    this.runs.set(run.id, run);
    return { ...run };
  }

  async finish(id: string, result: BillingRunResult): Promise<BillingRun> {
    const run = this.runs.get(id);
    if (!run) {
      throw new NotFoundError('Billing run', id);
    }
    Object.assign(run, result, { completedAt: new Date(result.completedAt) });
    return { ...run };
  }

  async get(id: string): Promise<BillingRun | null> {
    const run = this.runs.get(id);
    return run ? { ...run } : null;
  }
}
