/**
 * Tests for billing period calculations
 */

import { describe, it, expect } from 'vitest';
import {
  addBillingPeriod,
  anchorDayOf,
  compareBillingDates,
  daysInMonth,
  initialNextBillingDate,
  isBillingDate,
  parseBillingDate,
  toBillingDate,
  trialEndsAt,
} from './periods';

describe('Billing Period Calculations', () => {
  describe('addBillingPeriod', () => {
    it('should add one calendar month', () => {
      expect(addBillingPeriod('2024-02-15', 'monthly')).toBe('2024-03-15');
    });

    it('should roll over the year in December', () => {
      expect(addBillingPeriod('2024-12-10', 'monthly')).toBe('2025-01-10');
    });

    it('should clamp to the last day of a short month', () => {
      expect(addBillingPeriod('2024-01-31', 'monthly')).toBe('2024-02-29');
      expect(addBillingPeriod('2023-01-31', 'monthly')).toBe('2023-02-28');
    });

    it('should re-anchor after a clamped month', () => {
      expect(addBillingPeriod('2024-02-29', 'monthly', 31)).toBe('2024-03-31');
      expect(addBillingPeriod('2024-03-31', 'monthly', 31)).toBe('2024-04-30');
      expect(addBillingPeriod('2024-04-30', 'monthly', 31)).toBe('2024-05-31');
    });

    it('should add one year and handle leap day', () => {
      expect(addBillingPeriod('2024-06-01', 'yearly')).toBe('2025-06-01');
      expect(addBillingPeriod('2024-02-29', 'yearly')).toBe('2025-02-28');
      expect(addBillingPeriod('2027-02-28', 'yearly', 29)).toBe('2028-02-29');
    });

    it('should add seven days for weekly plans', () => {
      expect(addBillingPeriod('2024-12-29', 'weekly')).toBe('2025-01-05');
      expect(addBillingPeriod('2024-02-26', 'weekly', 31)).toBe('2024-03-04');
    });

    it('should reject malformed dates', () => {
      expect(() => addBillingPeriod('2024-13-01', 'monthly')).toThrow(RangeError);
      expect(() => addBillingPeriod('2023-02-29', 'monthly')).toThrow(RangeError);
      expect(() => addBillingPeriod('15/01/2024', 'monthly')).toThrow(RangeError);
    });
  });

  describe('initialNextBillingDate', () => {
    it('should be one period after the creation date', () => {
      const createdAt = new Date('2024-01-15T09:30:00Z');
      expect(initialNextBillingDate(createdAt, 'monthly')).toBe('2024-02-15');
      expect(initialNextBillingDate(createdAt, 'yearly')).toBe('2025-01-15');
      expect(initialNextBillingDate(createdAt, 'weekly')).toBe('2024-01-22');
    });

    it('should use the UTC calendar day of creation', () => {
      const createdAt = new Date('2024-01-31T23:30:00Z');
      expect(anchorDayOf(createdAt)).toBe(31);
      expect(initialNextBillingDate(createdAt, 'monthly')).toBe('2024-02-29');
    });
  });

  describe('date conversions', () => {
    it('should round-trip a billing date through midnight UTC', () => {
      expect(parseBillingDate('2024-03-15').toISOString()).toBe('2024-03-15T00:00:00.000Z');
      expect(toBillingDate(new Date('2024-03-15T18:45:00Z'))).toBe('2024-03-15');
    });

    it('should validate billing dates', () => {
      expect(isBillingDate('2024-02-29')).toBe(true);
      expect(isBillingDate('2023-02-29')).toBe(false);
      expect(isBillingDate('2024-2-1')).toBe(false);
    });

    it('should count days in month', () => {
      expect(daysInMonth(2024, 2)).toBe(29);
      expect(daysInMonth(2100, 2)).toBe(28);
      expect(daysInMonth(2024, 12)).toBe(31);
    });

    it('should order billing dates chronologically', () => {
      expect(compareBillingDates('2024-02-15', '2024-03-15')).toBe(-1);
      expect(compareBillingDates('2024-03-15', '2024-03-15')).toBe(0);
      expect(compareBillingDates('2025-01-01', '2024-12-31')).toBe(1);
    });
  });

  describe('trialEndsAt', () => {
    it('should add whole days to the creation timestamp', () => {
      const createdAt = new Date('2024-02-20T09:30:00Z');
      expect(trialEndsAt(createdAt, 14).toISOString()).toBe('2024-03-05T09:30:00.000Z');
      expect(trialEndsAt(createdAt, 1).toISOString()).toBe('2024-02-21T09:30:00.000Z');
    });

    it('should reject empty and fractional trials', () => {
      expect(() => trialEndsAt(new Date(), 0)).toThrow(RangeError);
      expect(() => trialEndsAt(new Date(), 1.5)).toThrow(RangeError);
    });
  });
});
