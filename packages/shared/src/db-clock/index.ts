/**
 * Database clock module exports
 *
 * Provides timestamp abstraction for persisted billing dates,
 * enabling deterministic testing of date-based business logic.
 */

export type { DBClock, MockDBClockConfig } from './types';

export { RealDBClock, realDBClock } from './real-clock';
export { MockDBClock } from './mock-clock';
export { startOfUtcDay } from './utc';
