/**
 * API server entry point
 */

import { buildServer } from './app';
import { config, logConfig } from './lib/config';

const { server, queue } = await buildServer({ config });

async function shutdown(signal: string) {
  console.log(`\n📴 ${signal} received, shutting down gracefully...`);
  await server.close();
  process.exit(0);
}

process.on('SIGTERM', () => void shutdown('SIGTERM'));
process.on('SIGINT', () => void shutdown('SIGINT'));

// Start server
async function start() {
  try {
    await server.listen({ port: config.PORT, host: config.HOST });

    console.log('\n🚀 Renewly Billing API Server');
    console.log('='.repeat(50));
    logConfig();
    console.log('Endpoints:');
    console.log(`  📡 tRPC API: http://${config.HOST}:${config.PORT}/i/api`);
    console.log(`  🧾 Subscriptions: POST http://${config.HOST}:${config.PORT}/subscription`);
    console.log(`  🔁 Billing cycle: POST http://${config.HOST}:${config.PORT}/billing-cycle/run`);
    console.log(`  🔧 Health: http://${config.HOST}:${config.PORT}/health`);
    console.log('='.repeat(50));
    console.log('');

    queue.startPeriodicBilling(config.BILLING_INTERVAL_MS);
  } catch (err) {
    server.log.error(err);
    process.exit(1);
  }
}

await start();
