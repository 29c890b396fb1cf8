/**
 * Billing Run Queue
 *
 * In-memory queue with "at most 2" deduplication for billing runs:
 * - If not processing: start a run immediately
 * - If processing and no pending: mark one run pending
 * - If processing and already pending: deduplicate (share the pending run)
 *
 * The pending run picks up anything that became due while the current one
 * was processing. Every caller is answered by a run that started no earlier
 * than its request.
 *
 * Await mode:
 * - queueBillingRunAwait() resolves with the summary of the run that covers
 *   the request, or rejects when that run failed to start or select.
 */

import type { BillingLogger, BillingRunSummary, CycleProcessor } from '@renewly/database';
import { describeError } from '@renewly/database/billing';
import type { BillingRunTrigger } from '@renewly/shared/constants';

type RunSettlement =
  | { ok: true; summary: BillingRunSummary }
  | { ok: false; error: unknown };

interface PendingRun {
  trigger: BillingRunTrigger;
  settlement: Promise<RunSettlement>;
  resolve: (value: RunSettlement | PromiseLike<RunSettlement>) => void;
}

export interface QueueStats {
  processing: boolean;
  pending: boolean;
  lastProcessedAt: Date | null;
  totalProcessed: number;
  totalFailed: number;
  deduplicated: number;
}

export class BillingQueue {
  private current: Promise<RunSettlement> | null = null;
  private pending: PendingRun | null = null;
  private periodicInterval: ReturnType<typeof setInterval> | null = null;
  private readonly shutdownController = new AbortController();

  private lastProcessedAt: Date | null = null;
  private totalProcessed = 0;
  private totalFailed = 0;
  private deduplicated = 0;

  constructor(
    private readonly processor: Pick<CycleProcessor, 'run'>,
    private readonly logger: BillingLogger
  ) {}

  /**
   * Queue a billing run with "at most 2" deduplication
   * Returns the settlement of the run that will serve this request.
   */
  private enqueue(trigger: BillingRunTrigger): Promise<RunSettlement> {
    if (!this.current) {
      this.logger.info(`[QUEUE] Processing billing run (trigger: ${trigger})`);
      const run = this.process(trigger);
      this.current = run;
      return run;
    }

    if (!this.pending) {
      let resolve: PendingRun['resolve'] = () => {};
      const settlement = new Promise<RunSettlement>((r) => {
        resolve = r;
      });
      this.pending = { trigger, settlement, resolve };
      this.logger.info(`[QUEUE] Queued pending billing run (trigger: ${trigger})`);
      return settlement;
    }

    this.deduplicated++;
    this.logger.info(`[QUEUE] Deduplicated billing run (trigger: ${trigger}, already pending)`);
    return this.pending.settlement;
  }

  /**
   * Fire-and-forget variant used by the scheduler
   * Failures are logged by the queue and counted in stats.
   */
  queueBillingRun(trigger: BillingRunTrigger = 'scheduler'): void {
    void this.enqueue(trigger);
  }

  /**
   * Queue a billing run and wait for the run that covers it
   *
   * While a run is processing, the request is served by the pending
   * follow-up, so the caller waits for the current run and then that one:
   * up to two run timeouts.
   */
  async queueBillingRunAwait(trigger: BillingRunTrigger = 'api'): Promise<BillingRunSummary> {
    const settlement = await this.enqueue(trigger);
    if (!settlement.ok) {
      throw settlement.error;
    }
    return settlement.summary;
  }

  getStats(): QueueStats {
    return {
      processing: this.current !== null,
      pending: this.pending !== null,
      lastProcessedAt: this.lastProcessedAt,
      totalProcessed: this.totalProcessed,
      totalFailed: this.totalFailed,
      deduplicated: this.deduplicated,
    };
  }

  private async process(trigger: BillingRunTrigger): Promise<RunSettlement> {
    let settlement: RunSettlement;
    try {
      const summary = await this.processor.run({ trigger, signal: this.shutdownController.signal });
      this.totalProcessed++;
      this.lastProcessedAt = summary.completedAt;
      this.logger.info(`[QUEUE] Completed billing run ${summary.runId} in ${summary.durationMs}ms`, {
        status: summary.status,
        considered: summary.considered,
      });
      settlement = { ok: true, summary };
    } catch (error) {
      this.totalFailed++;
      this.logger.error(`[QUEUE] Billing run (trigger: ${trigger}) failed`, { error: describeError(error) });
      settlement = { ok: false, error };
    }

    const next = this.pending;
    this.pending = null;
    if (next) {
      this.logger.info(`[QUEUE] Running pending billing run (trigger: ${next.trigger})`);
      const follow = this.process(next.trigger);
      this.current = follow;
      next.resolve(follow);
    } else {
      this.current = null;
    }
    return settlement;
  }

  // ==========================================================================
  // Periodic Processing
  // ==========================================================================

  /**
   * Start periodic billing runs
   * @param intervalMs - Interval between runs; 0 disables the scheduler
   */
  startPeriodicBilling(intervalMs: number): void {
    if (intervalMs <= 0) {
      this.logger.info('[QUEUE] Periodic billing disabled');
      return;
    }
    if (this.periodicInterval) {
      this.logger.info('[QUEUE] Periodic billing already running');
      return;
    }

    this.logger.info(`[QUEUE] Starting periodic billing every ${intervalMs / 1000}s`);

    // Queue initial run
    this.queueBillingRun('scheduler');

    this.periodicInterval = setInterval(() => {
      this.queueBillingRun('scheduler');
    }, intervalMs);
  }

  stopPeriodicBilling(): void {
    if (this.periodicInterval) {
      clearInterval(this.periodicInterval);
      this.periodicInterval = null;
      this.logger.info('[QUEUE] Stopped periodic billing');
    }
  }

  /**
   * Stop the scheduler, stop dispatching in the active run and wait for it
   * (and a pending follow-up, which finds the signal already aborted) to end
   */
  async shutdown(): Promise<void> {
    this.stopPeriodicBilling();
    this.shutdownController.abort(new Error('Server shutting down'));
    while (this.current) {
      await this.current;
    }
  }
}
