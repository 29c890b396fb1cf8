/**
 * REST routes
 *
 * Plain JSON endpoints over the same operations the tRPC routers expose.
 * Registered as an encapsulated plugin so the error handler below only
 * applies to these routes (tRPC formats its own errors).
 */

import type { FastifyError, FastifyInstance } from 'fastify';
import { ZodError } from 'zod';
import {
  BillingError,
  NotFoundError,
  cancelSubscription,
  createSubscription,
  listSubscriptions,
} from '@renewly/database/billing';
import {
  billingRunIdParamSchema,
  createSubscriptionSchema,
  listSubscriptionsQuerySchema,
  runBillingCycleSchema,
  subscriptionIdParamSchema,
} from '@renewly/shared/schemas';
import { mapDomainError } from '../lib/errors';
import type { Context } from '../lib/trpc';
import {
  toRunSummaryView,
  toRunView,
  toSubscriptionView,
  toSubscriptionWithHistoryView,
} from '../lib/views';

const DEFAULT_LIST_LIMIT = 50;

export async function registerRestRoutes(server: FastifyInstance, services: Context) {
  const { engine, queue } = services;

  await server.register(async function restPlugin(instance) {
    instance.setErrorHandler<FastifyError>((error, request, reply) => {
      const status = error.statusCode;
      // Fastify's own 4xx (malformed JSON, rate limit) pass through unchanged
      if (status !== undefined && status < 500 && !(error instanceof BillingError) && !(error instanceof ZodError)) {
        return reply.status(status).send({ error: error.code, message: error.message });
      }

      const mapped = mapDomainError(error);
      if (mapped.statusCode === 500) {
        request.log.error({ err: error }, 'Request failed');
      }
      return reply.status(mapped.statusCode).send({ error: mapped.code, message: mapped.message });
    });

    // Create a subscription; the first period is charged before responding
    instance.post('/subscription', async (request, reply) => {
      const input = createSubscriptionSchema.parse(request.body);
      const created = await createSubscription(engine.services, input);
      return reply.status(201).send({
        ...toSubscriptionView(created.subscription),
        initialCharge: created.initialCharge,
      });
    });

    // Answered by a run started after the request; mid-run that is the
    // queued follow-up, so the wait can span two run timeouts
    instance.post('/billing-cycle/run', async (request) => {
      const input = runBillingCycleSchema.parse(request.body ?? undefined);
      const summary = await queue.queueBillingRunAwait(input.trigger);
      return toRunSummaryView(summary);
    });

    instance.get('/subscriptions', async (request) => {
      const query = listSubscriptionsQuerySchema.parse(request.query);
      const rows = await listSubscriptions(engine.services, {
        userId: query.user_id,
        status: query.status,
        limit: query.limit ?? DEFAULT_LIST_LIMIT,
      });
      return { subscriptions: rows.map(toSubscriptionWithHistoryView) };
    });

    // Idempotent: cancelling twice returns the same cancelledAt
    instance.post('/subscription/:id/cancel', async (request) => {
      const { id } = subscriptionIdParamSchema.parse(request.params);
      const cancelled = await cancelSubscription(engine.services, id);
      return toSubscriptionView(cancelled);
    });

    instance.get('/billing-runs/:id', async (request) => {
      const { id } = billingRunIdParamSchema.parse(request.params);
      const run = await engine.runs.get(id);
      if (!run) {
        throw new NotFoundError('Billing run', id);
      }
      return toRunView(run);
    });
  });
}
