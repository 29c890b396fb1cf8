/**
 * Mock database clock for testing
 *
 * Allows precise control over timestamps for deterministic testing
 * of due-date selection and next-billing-date arithmetic.
 */

import type { DBClock, MockDBClockConfig } from './types';
import { startOfUtcDay } from './utc';

const MS_PER_MINUTE = 60 * 1000;
const MS_PER_HOUR = 60 * MS_PER_MINUTE;
const MS_PER_DAY = 24 * MS_PER_HOUR;

export class MockDBClock implements DBClock {
  private mockedTime: Date;
  private autoAdvance: boolean;
  private timeScale: number;
  private startRealTime: number;
  private startMockedTime: number;

  constructor(config: MockDBClockConfig = {}) {
    this.mockedTime = config.currentTime ? new Date(config.currentTime) : new Date();
    this.autoAdvance = config.autoAdvance ?? false;
    this.timeScale = config.timeScale ?? 1.0;
    this.startRealTime = Date.now();
    this.startMockedTime = this.mockedTime.getTime();
  }

  now(): Date {
    if (this.autoAdvance) {
      const realElapsed = Date.now() - this.startRealTime;
      return new Date(this.startMockedTime + realElapsed * this.timeScale);
    }
    return new Date(this.mockedTime);
  }

  today(): Date {
    return startOfUtcDay(this.now());
  }

  /**
   * Set the mocked time
   */
  setTime(time: Date | string): void {
    this.mockedTime = new Date(time);
    this.startRealTime = Date.now();
    this.startMockedTime = this.mockedTime.getTime();
  }

  advance(ms: number): void {
    this.setTime(new Date(this.now().getTime() + ms));
  }

  advanceDays(days: number): void {
    this.advance(days * MS_PER_DAY);
  }

  advanceHours(hours: number): void {
    this.advance(hours * MS_PER_HOUR);
  }

  advanceMinutes(minutes: number): void {
    this.advance(minutes * MS_PER_MINUTE);
  }

  getConfig(): Required<MockDBClockConfig> {
    return {
      currentTime: this.now(),
      autoAdvance: this.autoAdvance,
      timeScale: this.timeScale,
    };
  }

  setConfig(config: Partial<MockDBClockConfig>): void {
    if (config.currentTime !== undefined) {
      this.setTime(config.currentTime);
    }
    if (config.autoAdvance !== undefined) {
      // Re-base so toggling auto-advance does not jump time
      this.setTime(this.now());
      this.autoAdvance = config.autoAdvance;
    }
    if (config.timeScale !== undefined) {
      this.setTime(this.now());
      this.timeScale = config.timeScale;
    }
  }
}
