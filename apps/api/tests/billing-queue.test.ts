/**
 * Billing queue: "at most 2" deduplication, await mode, periodic scheduling
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import { silentBillingLogger, type BillingRunSummary, type RunOptions } from '@renewly/database';
import { BillingQueue } from '../src/lib/billing-queue';

function summary(runId: string, processed = 0): BillingRunSummary {
  const at = new Date('2024-02-16T10:00:00Z');
  return {
    runId,
    status: 'completed',
    considered: processed,
    processed,
    failed: 0,
    escalatedToCancelled: 0,
    indeterminate: 0,
    conflicts: 0,
    errors: 0,
    deferred: 0,
    startedAt: at,
    completedAt: at,
    durationMs: 0,
  };
}

/** Processor whose runs stay open until the test settles them */
function createControlledProcessor() {
  const calls: RunOptions[] = [];
  const settlers: Array<{ resolve: (s: BillingRunSummary) => void; reject: (e: Error) => void }> = [];
  return {
    calls,
    settlers,
    run(options: RunOptions = {}): Promise<BillingRunSummary> {
      calls.push(options);
      return new Promise<BillingRunSummary>((resolve, reject) => {
        settlers.push({ resolve, reject });
      });
    },
  };
}

describe('BillingQueue', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('should run at most one pending follow-up while a run is processing', async () => {
    const processor = createControlledProcessor();
    const queue = new BillingQueue(processor, silentBillingLogger);

    const first = queue.queueBillingRunAwait('api');
    const second = queue.queueBillingRunAwait('api');
    const third = queue.queueBillingRunAwait('manual');

    expect(processor.calls).toHaveLength(1);
    expect(queue.getStats()).toMatchObject({ processing: true, pending: true, deduplicated: 1 });

    processor.settlers[0].resolve(summary('run-1', 1));
    await vi.waitFor(() => expect(processor.calls).toHaveLength(2));
    // The follow-up runs with the trigger of the request that queued it
    expect(processor.calls[1].trigger).toBe('api');
    processor.settlers[1].resolve(summary('run-2'));

    expect((await first).runId).toBe('run-1');
    expect((await second).runId).toBe('run-2');
    expect((await third).runId).toBe('run-2');
    expect(queue.getStats()).toMatchObject({ processing: false, pending: false, totalProcessed: 2 });
  });

  it('should answer a mid-run request only after the follow-up run finishes', async () => {
    const processor = createControlledProcessor();
    const queue = new BillingQueue(processor, silentBillingLogger);
    let answered = false;

    const first = queue.queueBillingRunAwait('api');
    const late = queue.queueBillingRunAwait('api').then((result) => {
      answered = true;
      return result;
    });

    processor.settlers[0].resolve(summary('run-1'));
    await vi.waitFor(() => expect(processor.calls).toHaveLength(2));
    expect(answered).toBe(false);

    processor.settlers[1].resolve(summary('run-2'));
    expect((await first).runId).toBe('run-1');
    expect((await late).runId).toBe('run-2');
  });

  it('should start a fresh run once the queue is idle', async () => {
    const processor = createControlledProcessor();
    const queue = new BillingQueue(processor, silentBillingLogger);

    const first = queue.queueBillingRunAwait();
    processor.settlers[0].resolve(summary('run-1'));
    await first;
    const second = queue.queueBillingRunAwait();
    processor.settlers[1].resolve(summary('run-2'));

    expect((await second).runId).toBe('run-2');
    expect(processor.calls).toHaveLength(2);
  });

  it('should reject the waiting caller when a run fails and keep serving', async () => {
    const processor = createControlledProcessor();
    const queue = new BillingQueue(processor, silentBillingLogger);

    const failing = queue.queueBillingRunAwait();
    processor.settlers[0].reject(new Error('connection refused'));

    await expect(failing).rejects.toThrow('connection refused');
    expect(queue.getStats()).toMatchObject({ processing: false, totalFailed: 1 });

    const next = queue.queueBillingRunAwait();
    processor.settlers[1].resolve(summary('run-2'));
    expect((await next).runId).toBe('run-2');
  });

  it('should queue scheduler runs on an interval until stopped', async () => {
    vi.useFakeTimers();
    const processor = {
      calls: 0,
      async run(): Promise<BillingRunSummary> {
        this.calls++;
        return summary(`run-${this.calls}`);
      },
    };
    const queue = new BillingQueue(processor, silentBillingLogger);

    queue.startPeriodicBilling(1000);
    expect(processor.calls).toBe(1);

    await vi.advanceTimersByTimeAsync(2000);
    expect(processor.calls).toBe(3);

    queue.stopPeriodicBilling();
    await vi.advanceTimersByTimeAsync(5000);
    expect(processor.calls).toBe(3);
  });

  it('should not schedule anything when the interval is 0', () => {
    const processor = createControlledProcessor();
    const queue = new BillingQueue(processor, silentBillingLogger);

    queue.startPeriodicBilling(0);

    expect(processor.calls).toHaveLength(0);
  });

  it('should abort the active run on shutdown and wait for it', async () => {
    const processor = createControlledProcessor();
    const queue = new BillingQueue(processor, silentBillingLogger);

    const running = queue.queueBillingRunAwait();
    const signal = processor.calls[0].signal;
    expect(signal?.aborted).toBe(false);

    const stopped = queue.shutdown();
    expect(signal?.aborted).toBe(true);
    processor.settlers[0].resolve({ ...summary('run-1'), status: 'aborted' });

    await stopped;
    expect((await running).status).toBe('aborted');
    expect(queue.getStats().processing).toBe(false);
  });
});
