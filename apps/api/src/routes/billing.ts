/**
 * Billing tRPC router
 * Triggers billing cycle runs and reads the run journal
 */

import { NotFoundError } from '@renewly/database/billing';
import { billingRunIdParamSchema, runBillingCycleSchema } from '@renewly/shared/schemas';
import { router, publicProcedure } from '../lib/trpc';
import { toRunSummaryView, toRunView } from '../lib/views';

export const billingRouter = router({
  /**
   * Run a billing cycle through the queue and wait for its summary
   * Returns once the run finishes or its run timeout stops dispatching. A
   * request that lands mid-run waits for that run and the follow-up that
   * serves it (up to two run timeouts).
   */
  runCycle: publicProcedure
    .input(runBillingCycleSchema)
    .mutation(async ({ ctx, input }) => {
      const summary = await ctx.queue.queueBillingRunAwait(input.trigger);
      return toRunSummaryView(summary);
    }),

  getRun: publicProcedure
    .input(billingRunIdParamSchema)
    .query(async ({ ctx, input }) => {
      const run = await ctx.engine.runs.get(input.id);
      if (!run) {
        throw new NotFoundError('Billing run', input.id);
      }
      return toRunView(run);
    }),

  queueStats: publicProcedure.query(({ ctx }) => {
    const stats = ctx.queue.getStats();
    return { ...stats, lastProcessedAt: stats.lastProcessedAt?.toISOString() ?? null };
  }),
});
