/**
 * Cycle Processor Tests
 *
 * Runs the processor against in-memory stores, a MockDBClock and the mock
 * charge executor. Covers period advancement, declines and escalation,
 * unknown charge outcomes, storage failures, cancellation races, batching
 * and run cancellation.
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import type { ChargeExecutor } from '@renewly/shared/charge-executor';
import { createTestBilling, type TestBilling } from './test-helpers';
import { createSubscription } from './subscriptions';
import { StorageError, ValidationError } from './errors';
import type { Plan } from './types';

const sleep = (ms: number) => new Promise((resolve) => setTimeout(resolve, ms));

describe('CycleProcessor', () => {
  let t: TestBilling;
  let plan: Plan;

  beforeEach(() => {
    t = createTestBilling({ now: '2024-01-15T10:00:00Z' });
    plan = t.addPlan({ name: 'Basic', priceCents: 999, billingCycle: 'monthly' });
  });

  describe('successful charges', () => {
    it('should advance from the previous due date, not the run date', async () => {
      const { subscription } = await createSubscription(t.deps, { userId: 1, planId: plan.id });
      expect(subscription.nextBillingDate).toBe('2024-02-15');

      // Run is one day late
      t.clock.setTime('2024-02-16T08:00:00Z');
      const summary = await t.processor.run();

      expect(summary).toMatchObject({ status: 'completed', considered: 1, processed: 1 });
      const after = await t.subscriptions.get(subscription.id);
      expect(after).toMatchObject({ status: 'active', nextBillingDate: '2024-03-15' });

      const charges = t.ledger.all();
      expect(charges.map((entry) => [entry.outcome, entry.billedDate, entry.amountCents])).toEqual([
        ['success', '2024-01-15', 999],
        ['success', '2024-02-15', 999],
      ]);
      expect(charges[1].idempotencyKey).toBe(`${subscription.id}:2024-02-15`);
      expect(charges[1].reference).toBe('ch_mock_2');
    });

    it('should do nothing on a second run the same day', async () => {
      const seeded = t.seedSubscription({ planId: plan.id, nextBillingDate: '2024-01-15' });

      await t.processor.run();
      const second = await t.processor.run();

      expect(second).toMatchObject({ considered: 0, processed: 0 });
      expect(t.ledger.all()).toHaveLength(1);
      expect(t.executor.chargesFor(`${seeded.id}:2024-01-15`)).toBe(1);
    });

    it('should bill a subscription several periods behind once per run', async () => {
      const seeded = t.seedSubscription({ planId: plan.id, nextBillingDate: '2023-11-15' });

      const first = await t.processor.run();
      expect(first).toMatchObject({ considered: 1, processed: 1 });
      expect((await t.subscriptions.get(seeded.id))?.nextBillingDate).toBe('2023-12-15');

      await t.processor.run();
      await t.processor.run();
      expect((await t.subscriptions.get(seeded.id))?.nextBillingDate).toBe('2024-02-15');
      expect(t.ledger.all().map((entry) => entry.billedDate)).toEqual(['2023-11-15', '2023-12-15', '2024-01-15']);
    });

    it('should re-anchor a month-end subscription after February', async () => {
      t.clock.setTime('2024-04-01T00:00:00Z');
      const seeded = t.seedSubscription({
        planId: plan.id,
        nextBillingDate: '2024-02-29',
        createdAt: new Date('2024-01-31T12:00:00Z'),
      });

      await t.processor.run();
      expect((await t.subscriptions.get(seeded.id))?.nextBillingDate).toBe('2024-03-31');
      await t.processor.run();
      expect((await t.subscriptions.get(seeded.id))?.nextBillingDate).toBe('2024-04-30');
    });

    it('should recover a past_due subscription when the retry succeeds', async () => {
      const seeded = t.seedSubscription({ planId: plan.id, nextBillingDate: '2024-01-15', status: 'past_due' });

      const summary = await t.processor.run();

      expect(summary.processed).toBe(1);
      expect(await t.subscriptions.get(seeded.id)).toMatchObject({ status: 'active', nextBillingDate: '2024-02-15' });
    });

    it('should not select cancelled or future subscriptions', async () => {
      t.seedSubscription({ planId: plan.id, nextBillingDate: '2024-01-10', status: 'cancelled' });
      t.seedSubscription({ planId: plan.id, nextBillingDate: '2024-01-16' });

      const summary = await t.processor.run();

      expect(summary.considered).toBe(0);
      expect(t.executor.getCalls()).toHaveLength(0);
    });
  });

  describe('declines and escalation', () => {
    it('should move to past_due and keep the due date on a decline', async () => {
      const seeded = t.seedSubscription({ planId: plan.id, nextBillingDate: '2024-01-15' });
      t.executor.config.setConfig({ forceDecline: true, forceDeclineMessage: 'Insufficient funds' });

      const summary = await t.processor.run();

      expect(summary).toMatchObject({ considered: 1, failed: 1, processed: 0 });
      expect(await t.subscriptions.get(seeded.id)).toMatchObject({ status: 'past_due', nextBillingDate: '2024-01-15' });
      expect(t.ledger.all()[0]).toMatchObject({ outcome: 'failed', failureReason: 'Insufficient funds' });
    });

    it('should cancel after three consecutive failures and never select it again', async () => {
      const seeded = t.seedSubscription({ planId: plan.id, nextBillingDate: '2024-01-15' });
      t.executor.config.setConfig({ forceDecline: true });

      expect((await t.processor.run()).failed).toBe(1);
      t.clock.advanceDays(1);
      expect((await t.processor.run()).failed).toBe(1);
      expect((await t.subscriptions.get(seeded.id))?.status).toBe('past_due');

      t.clock.advanceDays(1);
      const third = await t.processor.run();
      expect(third).toMatchObject({ considered: 1, failed: 0, escalatedToCancelled: 1 });

      const cancelled = await t.subscriptions.get(seeded.id);
      expect(cancelled).toMatchObject({ status: 'cancelled', nextBillingDate: '2024-01-15' });
      expect(cancelled?.cancelledAt?.toISOString()).toBe('2024-01-17T10:00:00.000Z');

      t.clock.advanceDays(1);
      expect(await t.subscriptions.findDue({ asOf: '2024-01-18', limit: 10, now: t.clock.now() })).toEqual([]);
      expect((await t.processor.run()).considered).toBe(0);
    });

    it('should not count failures from before the last success', async () => {
      const seeded = t.seedSubscription({ planId: plan.id, nextBillingDate: '2024-01-15' });
      t.executor.config.script(seeded.id, ['decline', 'decline', 'succeed', 'decline', 'decline']);

      // 01-15 decline, 01-16 decline, 01-17 success (advances to 02-15)
      for (let day = 0; day < 3; day++) {
        await t.processor.run();
        t.clock.advanceDays(1);
      }
      expect(await t.subscriptions.get(seeded.id)).toMatchObject({ status: 'active', nextBillingDate: '2024-02-15' });

      t.clock.setTime('2024-02-15T10:00:00Z');
      await t.processor.run();
      t.clock.advanceDays(1);
      const summary = await t.processor.run();

      expect(summary.failed).toBe(1);
      expect((await t.subscriptions.get(seeded.id))?.status).toBe('past_due');
      expect(t.ledger.all().map((entry) => entry.outcome)).toEqual(['failed', 'failed', 'success', 'failed', 'failed']);
    });

    it('should never escalate when the threshold is 0', async () => {
      const processor = t.newProcessor({ escalationThreshold: 0 });
      const seeded = t.seedSubscription({ planId: plan.id, nextBillingDate: '2024-01-15' });
      t.executor.config.setConfig({ forceDecline: true });

      for (let i = 0; i < 5; i++) {
        await processor.run();
      }

      expect((await t.subscriptions.get(seeded.id))?.status).toBe('past_due');
      expect(t.ledger.all()).toHaveLength(5);
    });
  });

  describe('unknown charge outcomes', () => {
    it('should record a pending entry and leave the subscription alone when the executor throws', async () => {
      const seeded = t.seedSubscription({ planId: plan.id, nextBillingDate: '2024-01-15' });
      t.executor.config.setConfig({ forceError: true });

      const summary = await t.processor.run();

      expect(summary).toMatchObject({ considered: 1, indeterminate: 1, failed: 0 });
      expect(await t.subscriptions.get(seeded.id)).toMatchObject({ status: 'active', nextBillingDate: '2024-01-15' });
      expect(t.ledger.all()).toEqual([
        expect.objectContaining({ outcome: 'pending', failureReason: 'Mock gateway unavailable', reference: null }),
      ]);
    });

    it('should treat a charge that outlives the timeout as pending and retry with the same key', async () => {
      const processor = t.newProcessor({ chargeTimeoutMs: 50 });
      const seeded = t.seedSubscription({ planId: plan.id, nextBillingDate: '2024-01-15' });
      const key = `${seeded.id}:2024-01-15`;
      t.executor.config.setConfig({ forceHang: true });

      const first = await processor.run();
      expect(first.indeterminate).toBe(1);
      expect(t.ledger.all()[0]).toMatchObject({ outcome: 'pending', failureReason: 'Charge timed out after 50ms' });
      t.executor.releaseHung();

      t.executor.config.clearConfig();
      const second = await processor.run();
      expect(second.processed).toBe(1);
      expect(t.executor.getCalls().map((call) => call.params.idempotencyKey)).toEqual([key, key]);
      // The late settlement was the one real charge; the retry replays it
      expect(t.executor.getCalls().map((call) => call.result)).toEqual(['succeeded', 'replayed']);
      expect(t.executor.chargesFor(key)).toBe(1);
      expect(t.ledger.all().map((entry) => [entry.outcome, entry.reference])).toEqual([
        ['pending', null],
        ['success', 'ch_mock_1'],
      ]);
    });

    it('should log an unknown outcome as an indeterminate charge', async () => {
      const warn = vi.fn();
      const processor = t.newProcessor({ logger: { info: vi.fn(), warn, error: vi.fn() } });
      const seeded = t.seedSubscription({ planId: plan.id, nextBillingDate: '2024-01-15' });
      t.executor.config.setConfig({ forceError: true });

      await processor.run();

      expect(warn).toHaveBeenCalledWith(`Charge outcome unknown for ${seeded.id}:2024-01-15`, {
        subscriptionId: seeded.id,
        ledgerEntryId: 1,
        code: 'CHARGE_INDETERMINATE',
        reason: 'Mock gateway unavailable',
      });
      expect((await t.subscriptions.get(seeded.id))?.claimedUntil).toBeNull();
    });

    it('should not count pending entries toward escalation', async () => {
      const seeded = t.seedSubscription({ planId: plan.id, nextBillingDate: '2024-01-15' });
      t.executor.config.script(seeded.id, ['decline', 'error', 'decline', 'error', 'decline']);

      for (let i = 0; i < 4; i++) {
        await t.processor.run();
      }
      expect((await t.subscriptions.get(seeded.id))?.status).toBe('past_due');

      const fifth = await t.processor.run();
      expect(fifth.escalatedToCancelled).toBe(1);
    });
  });

  describe('storage failures', () => {
    it('should leave the subscription unchanged when the ledger write fails, then recover', async () => {
      const seeded = t.seedSubscription({ planId: plan.id, nextBillingDate: '2024-01-15' });
      vi.spyOn(t.ledger, 'append').mockRejectedValueOnce(new StorageError('disk full'));

      const first = await t.processor.run();
      expect(first).toMatchObject({ considered: 1, errors: 1, processed: 0 });
      expect(await t.subscriptions.get(seeded.id)).toMatchObject({ status: 'active', nextBillingDate: '2024-01-15' });

      // Executor replays the cached success for the same key
      const second = await t.processor.run();
      expect(second.processed).toBe(1);
      expect(t.executor.chargesFor(`${seeded.id}:2024-01-15`)).toBe(1);
      expect(t.ledger.all().filter((entry) => entry.outcome === 'success')).toHaveLength(1);
    });

    it('should finish a success whose final update was lost', async () => {
      const seeded = t.seedSubscription({ planId: plan.id, nextBillingDate: '2024-01-15' });
      vi.spyOn(t.subscriptions, 'updateAfterAttempt').mockRejectedValueOnce(new StorageError('connection reset'));

      const first = await t.processor.run();
      expect(first.errors).toBe(1);
      expect((await t.subscriptions.get(seeded.id))?.nextBillingDate).toBe('2024-01-15');

      const second = await t.processor.run();
      expect(second.processed).toBe(1);
      expect((await t.subscriptions.get(seeded.id))?.nextBillingDate).toBe('2024-02-15');
      expect(t.ledger.all()).toHaveLength(1);
    });

    it('should keep going after one subscription fails', async () => {
      const broken = t.seedSubscription({ planId: 999, nextBillingDate: '2024-01-14' });
      const healthy = t.seedSubscription({ planId: plan.id, nextBillingDate: '2024-01-15' });

      const summary = await t.processor.run();

      expect(summary).toMatchObject({ considered: 2, processed: 1, errors: 1 });
      expect((await t.subscriptions.get(broken.id))?.nextBillingDate).toBe('2024-01-14');
      expect((await t.subscriptions.get(healthy.id))?.nextBillingDate).toBe('2024-02-15');
    });

    it('should mark the run failed and rethrow when selecting due subscriptions fails', async () => {
      t.seedSubscription({ planId: plan.id, nextBillingDate: '2024-01-15' });
      vi.spyOn(t.subscriptions, 'findDue').mockRejectedValueOnce(new StorageError('connection lost'));
      const finish = vi.spyOn(t.runs, 'finish');

      await expect(t.processor.run()).rejects.toThrow('connection lost');

      expect(finish).toHaveBeenCalledWith(
        expect.any(String),
        expect.objectContaining({ status: 'failed', error: 'connection lost', considered: 0 })
      );
      expect(t.executor.getCalls()).toHaveLength(0);
    });
  });

  describe('cancellation races', () => {
    it('should keep the ledger entry and not resurrect a subscription cancelled mid-charge', async () => {
      const seeded = t.seedSubscription({ planId: plan.id, nextBillingDate: '2024-01-15' });
      const cancellingExecutor: ChargeExecutor = {
        charge: async () => {
          await t.subscriptions.cancel(seeded.id, t.clock.now());
          return { status: 'succeeded', reference: 'ch_race' };
        },
      };

      const summary = await t.newProcessor({ executor: cancellingExecutor }).run();

      expect(summary).toMatchObject({ considered: 1, conflicts: 1, processed: 0 });
      expect(await t.subscriptions.get(seeded.id)).toMatchObject({ status: 'cancelled', nextBillingDate: '2024-01-15' });
      expect(t.ledger.all()).toEqual([expect.objectContaining({ outcome: 'success', reference: 'ch_race' })]);
    });
  });

  describe('batching and run control', () => {
    it('should page through due subscriptions in batches without starving failed ones', async () => {
      const processor = t.newProcessor({ batchSize: 2 });
      for (let day = 10; day <= 14; day++) {
        t.seedSubscription({ planId: plan.id, nextBillingDate: `2024-01-${day}` });
      }
      t.executor.config.setConfig({ forceDecline: true });

      const summary = await processor.run();

      expect(summary).toMatchObject({ considered: 5, failed: 5 });
      expect(t.executor.getCalls()).toHaveLength(5);
    });

    it('should bound concurrent charges', async () => {
      let inFlight = 0;
      let peak = 0;
      const slowExecutor: ChargeExecutor = {
        charge: async (params) => {
          inFlight++;
          peak = Math.max(peak, inFlight);
          await sleep(5);
          inFlight--;
          return { status: 'succeeded', reference: `ch_${params.subscriptionId}` };
        },
      };
      for (let i = 0; i < 10; i++) {
        t.seedSubscription({ planId: plan.id, nextBillingDate: '2024-01-15' });
      }

      const summary = await t.newProcessor({ executor: slowExecutor, concurrency: 3 }).run();

      expect(summary.processed).toBe(10);
      expect(peak).toBe(3);
    });

    it('should defer undispatched work when the caller aborts', async () => {
      const controller = new AbortController();
      const abortingExecutor: ChargeExecutor = {
        charge: async (params) => {
          controller.abort();
          return { status: 'succeeded', reference: `ch_${params.subscriptionId}` };
        },
      };
      for (let i = 0; i < 3; i++) {
        t.seedSubscription({ planId: plan.id, nextBillingDate: '2024-01-15' });
      }

      const summary = await t.newProcessor({ executor: abortingExecutor, concurrency: 1 }).run({
        signal: controller.signal,
      });

      expect(summary).toMatchObject({ status: 'aborted', considered: 3, processed: 1, deferred: 2 });
      expect(await t.runs.get(summary.runId)).toMatchObject({ status: 'aborted', deferred: 2 });
    });

    it('should stop dispatching when the run timeout elapses but finish attempts in flight', async () => {
      const slowExecutor: ChargeExecutor = {
        charge: async (params) => {
          await sleep(150);
          return { status: 'succeeded', reference: `ch_${params.subscriptionId}` };
        },
      };
      for (let i = 0; i < 3; i++) {
        t.seedSubscription({ planId: plan.id, nextBillingDate: '2024-01-15' });
      }

      const summary = await t.newProcessor({ executor: slowExecutor, concurrency: 1, runTimeoutMs: 40 }).run();

      expect(summary).toMatchObject({ status: 'aborted', considered: 3, processed: 1, deferred: 2 });
    });

    it('should record the run in the journal', async () => {
      t.seedSubscription({ planId: plan.id, nextBillingDate: '2024-01-15' });

      const summary = await t.processor.run({ trigger: 'scheduler' });

      expect(await t.runs.get(summary.runId)).toMatchObject({
        trigger: 'scheduler',
        status: 'completed',
        considered: 1,
        processed: 1,
        error: null,
      });
    });

    it('should reject invalid settings', () => {
      expect(() => t.newProcessor({ concurrency: 0 })).toThrow(ValidationError);
      expect(() => t.newProcessor({ escalationThreshold: -1 })).toThrow(ValidationError);
    });
  });
});
