/**
 * Mock Charge Executor
 *
 * In-memory ChargeExecutor for tests and local development.
 *
 * Idempotency: one key produces at most one real charge.
 * - A key that already succeeded returns the cached success.
 * - A call for a key that is still in flight waits for that call's result
 *   instead of charging again.
 * - A hung call released later caches its success like any other.
 * Declines are not cached, so a later retry with the same key can succeed
 * (a customer who fixed their card).
 */

import type { ChargeExecutor, ChargeParams, ChargeResult } from '@renewly/shared/charge-executor';
import { ChargeMockConfigManager } from './mock-config';

export interface RecordedCharge {
  params: ChargeParams;
  /**
   * What the call did. 'replayed' was answered from the idempotency cache,
   * 'joined' waited on an in-flight call for the same key. A 'hang' becomes
   * 'succeeded' once released.
   */
  result: 'succeeded' | 'declined' | 'error' | 'hang' | 'replayed' | 'joined';
}

interface HungCharge {
  record: RecordedCharge;
  resolve: (result: ChargeResult) => void;
}

export class MockChargeExecutor implements ChargeExecutor {
  readonly config = new ChargeMockConfigManager();
  private readonly succeeded = new Map<string, ChargeResult>();
  private readonly inFlight = new Map<string, Promise<ChargeResult>>();
  private readonly calls: RecordedCharge[] = [];
  private readonly hung: HungCharge[] = [];
  private nextReference = 1;

  async charge(params: ChargeParams): Promise<ChargeResult> {
    const key = params.idempotencyKey;
    const cached = this.succeeded.get(key);
    if (cached) {
      this.calls.push({ params, result: 'replayed' });
      return cached;
    }

    const running = this.inFlight.get(key);
    if (running) {
      this.calls.push({ params, result: 'joined' });
      return running;
    }

    const attempt = this.execute(params);
    this.inFlight.set(key, attempt);
    try {
      return await attempt;
    } finally {
      if (this.inFlight.get(key) === attempt) {
        this.inFlight.delete(key);
      }
    }
  }

  /** Settle every call that is hanging, as a success */
  releaseHung(): void {
    for (const { record, resolve } of this.hung.splice(0)) {
      record.result = 'succeeded';
      resolve(this.succeed(record.params));
    }
  }

  getCalls(): RecordedCharge[] {
    return this.calls.map((call) => ({ ...call }));
  }

  /** Real-world charges made for a key (replays and joins excluded) */
  chargesFor(idempotencyKey: string): number {
    return this.calls.filter((call) => call.params.idempotencyKey === idempotencyKey && call.result === 'succeeded')
      .length;
  }

  reset(): void {
    this.config.clearConfig();
    this.succeeded.clear();
    this.inFlight.clear();
    this.calls.length = 0;
    this.hung.length = 0;
  }

  private async execute(params: ChargeParams): Promise<ChargeResult> {
    await this.config.applyDelay();

    const outcome = this.config.nextOutcome(params.subscriptionId);
    switch (outcome) {
      case 'hang': {
        const record: RecordedCharge = { params, result: 'hang' };
        this.calls.push(record);
        return new Promise<ChargeResult>((resolve) => {
          this.hung.push({ record, resolve });
        });
      }
      case 'error':
        this.calls.push({ params, result: 'error' });
        throw new Error('Mock gateway unavailable');
      case 'decline':
        this.calls.push({ params, result: 'declined' });
        return { status: 'declined', reason: this.config.declineMessage() };
      case 'succeed':
        this.calls.push({ params, result: 'succeeded' });
        return this.succeed(params);
    }
  }

  private succeed(params: ChargeParams): ChargeResult {
    const result: ChargeResult = { status: 'succeeded', reference: `ch_mock_${this.nextReference++}` };
    this.succeeded.set(params.idempotencyKey, result);
    return result;
  }
}
