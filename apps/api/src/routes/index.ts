/**
 * Root tRPC router
 * Combines all route modules
 *
 * REST equivalents live in rest.ts.
 */

import { router } from '../lib/trpc';
import { subscriptionsRouter } from './subscriptions';
import { billingRouter } from './billing';

export const appRouter = router({
  subscriptions: subscriptionsRouter,
  billing: billingRouter,
});

export type AppRouter = typeof appRouter;
