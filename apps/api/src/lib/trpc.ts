/**
 * tRPC initialization and context
 * Provides type-safe API with automatic validation
 */

import { initTRPC, TRPCError } from '@trpc/server';
import type { CreateFastifyContextOptions } from '@trpc/server/adapters/fastify';
import { BillingError } from '@renewly/database/billing';
import type { BillingQueue } from './billing-queue';
import type { BillingEngine } from './engine';
import { mapDomainError } from './errors';

/**
 * Context passed to all tRPC procedures
 * The engine and queue belong to the server instance, not to a request.
 */
export interface Context {
  engine: BillingEngine;
  queue: BillingQueue;
}

export function createContextFactory(services: Context) {
  return async (_opts: CreateFastifyContextOptions): Promise<Context> => ({ ...services });
}

/**
 * Initialize tRPC with context
 */
const t = initTRPC.context<Context>().create();

/**
 * Translate engine errors into tRPC codes
 * Anything that is not a BillingError keeps the code tRPC assigned.
 */
const mapBillingErrors = t.middleware(async ({ next }) => {
  const result = await next();
  if (!result.ok && result.error.cause instanceof BillingError) {
    const mapped = mapDomainError(result.error.cause);
    throw new TRPCError({ code: mapped.trpcCode, message: mapped.message, cause: result.error.cause });
  }
  return result;
});

/**
 * Export tRPC utilities
 */
export const router = t.router;
export const createCallerFactory = t.createCallerFactory;
export const publicProcedure = t.procedure.use(mapBillingErrors);
