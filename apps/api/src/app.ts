/**
 * Fastify server assembly
 *
 * Builds a server instance with its own engine and billing queue. server.ts
 * listens on it; the API tests drive it with inject().
 */

import Fastify, { type FastifyInstance } from 'fastify';
import rateLimit from '@fastify/rate-limit';
import helmet from '@fastify/helmet';
import { fastifyTRPCPlugin, type FastifyTRPCPluginOptions } from '@trpc/server/adapters/fastify';
import type { BillingLogger } from '@renewly/database';
import { BillingQueue } from './lib/billing-queue';
import type { Config } from './lib/config';
import { createEngine, pinoBillingLogger, type BillingEngine } from './lib/engine';
import { createContextFactory } from './lib/trpc';
import { appRouter, type AppRouter } from './routes';
import { registerRestRoutes } from './routes/rest';

export interface BuildServerOptions {
  config: Config;
  /** Fastify (pino) logging; off in tests */
  logger?: boolean;
  /** Engine factory; defaults to the STORAGE_DRIVER from config */
  engine?: (logger: BillingLogger) => BillingEngine;
}

export interface AppServer {
  server: FastifyInstance;
  engine: BillingEngine;
  queue: BillingQueue;
}

export async function buildServer(options: BuildServerOptions): Promise<AppServer> {
  const { config } = options;

  const server = Fastify({
    logger: options.logger === false
      ? false
      : { level: config.NODE_ENV === 'production' ? 'info' : 'debug' },
  });

  const billingLogger = pinoBillingLogger(server.log);
  const engine = options.engine ? options.engine(billingLogger) : createEngine(config, billingLogger);
  const queue = new BillingQueue(engine.processor, billingLogger);

  // Stop the scheduler and drain the active run before closing connections
  server.addHook('onClose', async () => {
    await queue.shutdown();
    await engine.close();
  });

  // Security headers (helmet)
  await server.register(helmet, {
    contentSecurityPolicy: config.NODE_ENV === 'production' ? undefined : false,
  });

  // Rate limiting (prevent abuse)
  // Skip rate limiting for localhost to allow tests to run freely
  await server.register(rateLimit, {
    max: config.RATE_LIMIT_MAX,
    timeWindow: '1 minute',
    allowList: ['127.0.0.1', '::1'], // Exempt localhost (IPv4 and IPv6)
    errorResponseBuilder: (_request, context) => ({
      statusCode: context.statusCode,
      error: 'Rate limit exceeded',
      message: `Maximum ${config.RATE_LIMIT_MAX} requests per minute`,
    }),
  });

  await registerRestRoutes(server, { engine, queue });

  // tRPC API routes (internal endpoints)
  await server.register(fastifyTRPCPlugin, {
    prefix: '/i/api',
    trpcOptions: {
      router: appRouter,
      createContext: createContextFactory({ engine, queue }),
      onError({ path, error }) {
        if (error.code === 'INTERNAL_SERVER_ERROR') {
          server.log.error({ err: error.cause ?? error }, `[tRPC Error] ${path ?? '<unknown>'}`);
        }
      },
    } satisfies FastifyTRPCPluginOptions<AppRouter>['trpcOptions'],
  });

  // Health check endpoint (no rate limit)
  server.get('/health', {
    config: { rateLimit: false },
  }, async () => {
    return {
      status: 'ok',
      timestamp: new Date().toISOString(),
      environment: config.NODE_ENV,
      storage: config.STORAGE_DRIVER,
      version: '0.1.0',
    };
  });

  return { server, engine, queue };
}
