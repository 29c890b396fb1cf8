/**
 * Test Helpers for Billing Module
 *
 * These exports are ONLY for use in test files.
 * DO NOT import from this module in production code.
 *
 * Wires a CycleProcessor to in-memory stores, a MockDBClock and a
 * MockChargeExecutor, and seeds users, plans and subscriptions.
 */

import { randomUUID } from 'crypto';
import { MockDBClock } from '@renewly/shared/db-clock';
import type { BillingCycle, SubscriptionStatus } from '@renewly/shared/constants';
import type { BillingDate } from '@renewly/shared/billing';
import {
  MemoryBillingRunJournal,
  MemoryLedger,
  MemoryPlanCatalog,
  MemorySubscriptionStore,
  MemoryUserDirectory,
} from '../memory';
import { MockChargeExecutor } from '../charge-mock';
import { silentBillingLogger } from './logger';
import { CycleProcessor, defaultProcessorSettings } from './processor';
import type { SubscriptionServiceDeps } from './subscriptions';
import type { CycleProcessorConfig, Plan, Subscription } from './types';

export interface TestBilling {
  clock: MockDBClock;
  subscriptions: MemorySubscriptionStore;
  ledger: MemoryLedger;
  plans: MemoryPlanCatalog;
  users: MemoryUserDirectory;
  runs: MemoryBillingRunJournal;
  executor: MockChargeExecutor;
  processor: CycleProcessor;
  deps: SubscriptionServiceDeps;
  /** A second processor over the same stores (concurrent-run tests) */
  newProcessor(overrides?: Partial<CycleProcessorConfig>): CycleProcessor;
  addPlan(plan?: Partial<Plan>): Plan;
  seedSubscription(fields: SeedSubscription): Subscription;
}

export interface SeedSubscription {
  planId: number;
  nextBillingDate: BillingDate;
  status?: SubscriptionStatus;
  userId?: number;
  createdAt?: Date;
}

export const TEST_USER_ID = 1;

export function createTestBilling(
  options: { now?: string; overrides?: Partial<CycleProcessorConfig> } = {}
): TestBilling {
  const clock = new MockDBClock({ currentTime: new Date(options.now ?? '2024-01-15T09:00:00Z') });
  const subscriptions = new MemorySubscriptionStore();
  const ledger = new MemoryLedger();
  const plans = new MemoryPlanCatalog();
  const users = new MemoryUserDirectory();
  const runs = new MemoryBillingRunJournal();
  const executor = new MockChargeExecutor();

  users.add({ id: TEST_USER_ID, email: 'user1@example.com', name: 'Test User', isActive: true });

  const newProcessor = (overrides: Partial<CycleProcessorConfig> = {}): CycleProcessor =>
    new CycleProcessor({
      subscriptions,
      ledger,
      plans,
      runs,
      executor,
      clock,
      ...defaultProcessorSettings(),
      logger: silentBillingLogger,
      ...options.overrides,
      ...overrides,
    });

  const processor = newProcessor();
  let nextPlanId = 1;

  return {
    clock,
    subscriptions,
    ledger,
    plans,
    users,
    runs,
    executor,
    processor,
    deps: { subscriptions, ledger, plans, users, processor, clock },
    newProcessor,
    addPlan(plan: Partial<Plan> = {}): Plan {
      const billingCycle: BillingCycle = plan.billingCycle ?? 'monthly';
      return plans.add({
        id: plan.id ?? nextPlanId++,
        name: plan.name ?? 'Basic',
        priceCents: plan.priceCents ?? 999,
        billingCycle,
        trialDays: plan.trialDays ?? 0,
        isActive: plan.isActive ?? true,
      });
    },
    seedSubscription(fields: SeedSubscription): Subscription {
      const createdAt = fields.createdAt ?? new Date(`${fields.nextBillingDate}T00:00:00Z`);
      const subscription: Subscription = {
        id: randomUUID(),
        userId: fields.userId ?? TEST_USER_ID,
        planId: fields.planId,
        status: fields.status ?? 'active',
        nextBillingDate: fields.nextBillingDate,
        version: 0,
        trialEndsAt: null,
        claimedUntil: null,
        createdAt,
        updatedAt: createdAt,
        cancelledAt: fields.status === 'cancelled' ? createdAt : null,
      };
      subscriptions.insert(subscription);
      return subscription;
    },
  };
}
