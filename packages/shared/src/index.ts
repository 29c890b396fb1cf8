/**
 * Main export for @renewly/shared
 * Provides constants, validation schemas and billing primitives
 */

export * from './constants';
export * from './schemas';
export * from './billing';
export * from './money';
export type { ChargeExecutor, ChargeParams, ChargeResult } from './charge-executor';
export type { DBClock, MockDBClockConfig } from './db-clock';
export { RealDBClock, MockDBClock, realDBClock } from './db-clock';
