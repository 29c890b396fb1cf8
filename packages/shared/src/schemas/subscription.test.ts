import { describe, it, expect } from 'vitest';
import { createSubscriptionSchema, listSubscriptionsQuerySchema, listSubscriptionsSchema } from './subscription';
import { runBillingCycleSchema } from './billing';

describe('subscription schemas', () => {
  it('should accept a valid create payload', () => {
    expect(createSubscriptionSchema.parse({ userId: 1, planId: 2 })).toEqual({ userId: 1, planId: 2 });
  });

  it('should reject non-positive and non-integer ids', () => {
    expect(createSubscriptionSchema.safeParse({ userId: 0, planId: 2 }).success).toBe(false);
    expect(createSubscriptionSchema.safeParse({ userId: 1, planId: 2.5 }).success).toBe(false);
    expect(createSubscriptionSchema.safeParse({ userId: '1', planId: 2 }).success).toBe(false);
  });

  it('should accept an optional trial length override', () => {
    expect(createSubscriptionSchema.parse({ userId: 1, planId: 2, trialDays: 14 })).toEqual({
      userId: 1,
      planId: 2,
      trialDays: 14,
    });
    expect(createSubscriptionSchema.parse({ userId: 1, planId: 2, trialDays: 0 }).trialDays).toBe(0);
    expect(createSubscriptionSchema.safeParse({ userId: 1, planId: 2, trialDays: -1 }).success).toBe(false);
    expect(createSubscriptionSchema.safeParse({ userId: 1, planId: 2, trialDays: 366 }).success).toBe(false);
  });

  it('should default the list limit', () => {
    expect(listSubscriptionsSchema.parse({})).toEqual({ limit: 50 });
  });

  it('should coerce query-string filters', () => {
    expect(listSubscriptionsQuerySchema.parse({ user_id: '42', limit: '10' })).toEqual({ user_id: 42, limit: 10 });
    expect(listSubscriptionsQuerySchema.safeParse({ user_id: 'abc' }).success).toBe(false);
    expect(listSubscriptionsQuerySchema.safeParse({ status: 'paused' }).success).toBe(false);
  });

  it('should default the billing run trigger', () => {
    expect(runBillingCycleSchema.parse(undefined)).toEqual({ trigger: 'api' });
    expect(runBillingCycleSchema.parse({ trigger: 'manual' })).toEqual({ trigger: 'manual' });
  });
});
