import { pgEnum } from 'drizzle-orm/pg-core';
import {
  SUBSCRIPTION_STATUSES,
  LEDGER_OUTCOMES,
  BILLING_CYCLES,
  BILLING_RUN_STATUSES,
  BILLING_RUN_TRIGGERS,
} from '@renewly/shared/constants';

/**
 * Database Enumerations
 *
 * Values come from @renewly/shared/constants so PostgreSQL ENUM types,
 * zod schemas and TypeScript unions never disagree.
 *
 * IMPORTANT: When adding new values to existing enums in production:
 * - Use: ALTER TYPE enum_name ADD VALUE 'new_value';
 * - Values can only be added (not removed or reordered) without recreating the type
 */

export const subscriptionStatusEnum = pgEnum('subscription_status', SUBSCRIPTION_STATUSES);

export const ledgerOutcomeEnum = pgEnum('ledger_outcome', LEDGER_OUTCOMES);

export const billingCycleEnum = pgEnum('billing_cycle', BILLING_CYCLES);

export const billingRunStatusEnum = pgEnum('billing_run_status', BILLING_RUN_STATUSES);

export const billingRunTriggerEnum = pgEnum('billing_run_trigger', BILLING_RUN_TRIGGERS);
