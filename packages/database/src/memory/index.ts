/**
 * In-memory store implementations
 *
 * Used by the unit tests and by the API server when STORAGE_DRIVER=memory.
 * State lives in the instances; nothing is shared between them.
 */

export { MemorySubscriptionStore } from './subscription-store';
export { MemoryLedger } from './ledger';
export { MemoryPlanCatalog, MemoryUserDirectory } from './catalog';
export { MemoryBillingRunJournal } from './billing-runs';
