/**
 * Billing engine wiring
 *
 * Builds the stores, the cycle processor and the subscription service
 * dependencies for one server instance. Nothing here is a module-level
 * singleton; the server and the tests each assemble their own engine.
 */

import type { FastifyBaseLogger } from 'fastify';
import {
  CycleProcessor,
  createDatabase,
  createDrizzleStores,
  type BillingLogger,
  type BillingRunJournal,
  type Ledger,
  type PlanCatalog,
  type SubscriptionServiceDeps,
  type SubscriptionStore,
  type UserDirectory,
} from '@renewly/database';
import {
  MemoryBillingRunJournal,
  MemoryLedger,
  MemoryPlanCatalog,
  MemorySubscriptionStore,
  MemoryUserDirectory,
} from '@renewly/database/memory';
import { MockChargeExecutor } from '@renewly/database/charge-mock';
import type { ChargeExecutor } from '@renewly/shared/charge-executor';
import { realDBClock, type DBClock } from '@renewly/shared/db-clock';
import type { Config } from './config';

export interface EngineStores {
  subscriptions: SubscriptionStore;
  ledger: Ledger;
  plans: PlanCatalog;
  users: UserDirectory;
  runs: BillingRunJournal;
}

export interface BillingEngine {
  processor: CycleProcessor;
  services: SubscriptionServiceDeps;
  runs: BillingRunJournal;
  /** Release connections held by the stores */
  close(): Promise<void>;
}

export interface EngineOptions {
  executor: ChargeExecutor;
  clock: DBClock;
  logger: BillingLogger;
  close?: () => Promise<void>;
}

/**
 * Route engine log lines into a pino logger (fastify's)
 */
export function pinoBillingLogger(log: FastifyBaseLogger): BillingLogger {
  const billing = log.child({ module: 'billing' });
  return {
    info: (message, details) => billing.info(details ?? {}, message),
    warn: (message, details) => billing.warn(details ?? {}, message),
    error: (message, details) => billing.error(details ?? {}, message),
  };
}

export function assembleEngine(stores: EngineStores, config: Config, options: EngineOptions): BillingEngine {
  const processor = new CycleProcessor({
    subscriptions: stores.subscriptions,
    ledger: stores.ledger,
    plans: stores.plans,
    runs: stores.runs,
    executor: options.executor,
    clock: options.clock,
    batchSize: config.BILLING_BATCH_SIZE,
    concurrency: config.BILLING_CONCURRENCY,
    chargeTimeoutMs: config.CHARGE_TIMEOUT_MS,
    runTimeoutMs: config.BILLING_RUN_TIMEOUT_MS,
    escalationThreshold: config.ESCALATION_THRESHOLD,
    logger: options.logger,
  });

  return {
    processor,
    services: {
      subscriptions: stores.subscriptions,
      ledger: stores.ledger,
      plans: stores.plans,
      users: stores.users,
      processor,
      clock: options.clock,
    },
    runs: stores.runs,
    close: options.close ?? (async () => {}),
  };
}

/**
 * Demo catalog for STORAGE_DRIVER=memory, so a fresh dev server can bill
 */
export function seedMemoryCatalog(plans: MemoryPlanCatalog, users: MemoryUserDirectory): void {
  users.add({ id: 1, email: 'demo@example.com', name: 'Demo User', isActive: true });
  plans.add({ id: 1, name: 'Basic', priceCents: 999, billingCycle: 'monthly', trialDays: 0, isActive: true });
  plans.add({ id: 2, name: 'Pro', priceCents: 9900, billingCycle: 'yearly', trialDays: 0, isActive: true });
  plans.add({ id: 3, name: 'Weekly Box', priceCents: 1500, billingCycle: 'weekly', trialDays: 0, isActive: true });
  plans.add({ id: 4, name: 'Basic Trial', priceCents: 999, billingCycle: 'monthly', trialDays: 14, isActive: true });
}

/**
 * Build the engine the server runs with
 *
 * Payment gateways are out of scope: every configuration charges through
 * MockChargeExecutor.
 */
export function createEngine(config: Config, logger: BillingLogger): BillingEngine {
  const options = { executor: new MockChargeExecutor(), clock: realDBClock, logger };

  if (config.STORAGE_DRIVER === 'memory') {
    const plans = new MemoryPlanCatalog();
    const users = new MemoryUserDirectory();
    seedMemoryCatalog(plans, users);
    const stores: EngineStores = {
      subscriptions: new MemorySubscriptionStore(),
      ledger: new MemoryLedger(),
      plans,
      users,
      runs: new MemoryBillingRunJournal(),
    };
    return assembleEngine(stores, config, options);
  }

  const handle = createDatabase(config.DATABASE_URL);
  return assembleEngine(createDrizzleStores(handle.db), config, { ...options, close: handle.close });
}
