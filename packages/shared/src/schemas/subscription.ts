import { z } from 'zod';
import { SUBSCRIPTION_STATUSES } from '../constants';

/**
 * Subscription input validation schemas
 *
 * Shared by the REST routes and the tRPC routers so both surfaces reject
 * the same inputs before any state changes.
 */

export const userIdSchema = z.number().int().positive();
export const planIdSchema = z.number().int().positive();
export const subscriptionIdSchema = z.string().uuid('Invalid subscription id');
export const subscriptionStatusSchema = z.enum(SUBSCRIPTION_STATUSES);

export const trialDaysSchema = z.number().int().min(0).max(365);

export const createSubscriptionSchema = z.object({
  userId: userIdSchema,
  planId: planIdSchema,
  // Overrides the plan's trial length; 0 charges at creation
  trialDays: trialDaysSchema.optional(),
});

export const listSubscriptionsSchema = z.object({
  userId: userIdSchema.optional(),
  status: subscriptionStatusSchema.optional(),
  limit: z.number().int().min(1).max(100).default(50),
});

// Query-string form of listSubscriptionsSchema (GET /subscriptions?user_id=)
export const listSubscriptionsQuerySchema = z.object({
  user_id: z.string().regex(/^\d+$/, 'user_id must be a positive integer').transform(Number).optional(),
  status: subscriptionStatusSchema.optional(),
  limit: z.string().regex(/^\d+$/).transform(Number).pipe(z.number().int().min(1).max(100)).optional(),
});

export const subscriptionIdParamSchema = z.object({
  id: subscriptionIdSchema,
});

export type CreateSubscriptionInput = z.infer<typeof createSubscriptionSchema>;
export type ListSubscriptionsInput = z.input<typeof listSubscriptionsSchema>;
