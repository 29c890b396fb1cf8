/**
 * Charge executor test double
 *
 * Usage:
 *   import { MockChargeExecutor } from '@renewly/database/charge-mock';
 *   const executor = new MockChargeExecutor();
 *   executor.config.setConfig({ forceDecline: true });
 */

export { MockChargeExecutor } from './mock';
export type { RecordedCharge } from './mock';
export { ChargeMockConfigManager } from './mock-config';
export type { ChargeMockConfig, ScriptedOutcome } from './mock-config';
