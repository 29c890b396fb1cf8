/**
 * Subscriptions tRPC router
 * Create (with the first charge), list with recent charges, cancel
 */

import { z } from 'zod';
import { cancelSubscription, createSubscription, listSubscriptions } from '@renewly/database/billing';
import {
  createSubscriptionSchema,
  listSubscriptionsSchema,
  subscriptionIdSchema,
} from '@renewly/shared/schemas';
import { router, publicProcedure } from '../lib/trpc';
import { toSubscriptionView, toSubscriptionWithHistoryView } from '../lib/views';

export const subscriptionsRouter = router({
  /**
   * Create a subscription and attempt its first charge
   * Returns the post-attempt state (active, past_due on decline); during a
   * trial nothing is charged and initialCharge is 'trial'.
   */
  create: publicProcedure
    .input(createSubscriptionSchema)
    .mutation(async ({ ctx, input }) => {
      const created = await createSubscription(ctx.engine.services, input);
      return {
        ...toSubscriptionView(created.subscription),
        initialCharge: created.initialCharge,
      };
    }),

  list: publicProcedure
    .input(listSubscriptionsSchema)
    .query(async ({ ctx, input }) => {
      const rows = await listSubscriptions(ctx.engine.services, input);
      return rows.map(toSubscriptionWithHistoryView);
    }),

  cancel: publicProcedure
    .input(z.object({ id: subscriptionIdSchema }))
    .mutation(async ({ ctx, input }) => {
      const cancelled = await cancelSubscription(ctx.engine.services, input.id);
      return toSubscriptionView(cancelled);
    }),
});
