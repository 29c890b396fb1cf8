/**
 * Real database clock using system time
 */

import type { DBClock } from './types';
import { startOfUtcDay } from './utc';

export class RealDBClock implements DBClock {
  now(): Date {
    return new Date();
  }

  today(): Date {
    return startOfUtcDay(this.now());
  }
}

export const realDBClock = new RealDBClock();
