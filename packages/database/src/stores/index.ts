/**
 * PostgreSQL store implementations (Drizzle)
 */

import type { Database } from '../db';
import { DrizzleBillingRunJournal } from './billing-runs';
import { DrizzlePlanCatalog, DrizzleUserDirectory } from './catalog';
import { DrizzleLedger } from './ledger';
import { DrizzleSubscriptionStore } from './subscription-store';

export { DrizzleSubscriptionStore, DrizzleLedger, DrizzlePlanCatalog, DrizzleUserDirectory, DrizzleBillingRunJournal };
export { withStorage, isUniqueViolation } from './pg-errors';

export function createDrizzleStores(db: Database) {
  return {
    subscriptions: new DrizzleSubscriptionStore(db),
    ledger: new DrizzleLedger(db),
    plans: new DrizzlePlanCatalog(db),
    users: new DrizzleUserDirectory(db),
    runs: new DrizzleBillingRunJournal(db),
  };
}
