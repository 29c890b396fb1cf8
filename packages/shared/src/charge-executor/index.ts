export type { ChargeExecutor, ChargeParams, ChargeResult } from './types';
