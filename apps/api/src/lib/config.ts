/**
 * Environment configuration
 * Centralized config with validation
 *
 * Every billing knob falls back to BILLING_DEFAULTS, so an empty environment
 * gives a working development server.
 */

import { z } from 'zod';
import { BILLING_DEFAULTS } from '@renewly/shared/constants';

// Non-negative integer read from an environment string
const envInt = (fallback: number) =>
  z
    .string()
    .regex(/^\d+$/, 'must be a non-negative integer')
    .transform(Number)
    .default(String(fallback));

const envSchema = z.object({
  // Server
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: envInt(3000),
  HOST: z.string().default('0.0.0.0'),

  // Storage
  DATABASE_URL: z.string().default('postgresql://localhost/renewly_dev'),
  STORAGE_DRIVER: z.enum(['postgres', 'memory']).default('postgres'),

  // Rate limiting
  RATE_LIMIT_MAX: envInt(100), // requests per minute

  // Billing cycle processor
  BILLING_BATCH_SIZE: envInt(BILLING_DEFAULTS.BATCH_SIZE).pipe(z.number().min(1)),
  BILLING_CONCURRENCY: envInt(BILLING_DEFAULTS.CONCURRENCY).pipe(z.number().min(1)),
  BILLING_RUN_TIMEOUT_MS: envInt(BILLING_DEFAULTS.RUN_TIMEOUT_MS).pipe(z.number().min(1)),
  CHARGE_TIMEOUT_MS: envInt(BILLING_DEFAULTS.CHARGE_TIMEOUT_MS).pipe(z.number().min(1)),
  ESCALATION_THRESHOLD: envInt(BILLING_DEFAULTS.ESCALATION_THRESHOLD), // 0 disables

  // Periodic billing (0 disables the scheduler)
  BILLING_INTERVAL_MS: envInt(0),
});

export type Config = z.infer<typeof envSchema>;

/**
 * Parse and validate an environment map
 * Throws ZodError listing every invalid variable.
 */
export function loadConfig(env: Record<string, string | undefined>): Config {
  return envSchema.parse(env);
}

export const config = loadConfig(process.env);

/**
 * Mask credentials in a connection string for logging
 */
export function describeDatabaseUrl(url: string): string {
  return url.split('@')[1] ?? 'local';
}

// Log configuration on startup (mask secrets)
export function logConfig(current: Config = config) {
  console.log('\n📋 Configuration:');
  console.log(`  Environment: ${current.NODE_ENV}`);
  console.log(`  Port: ${current.PORT}`);
  console.log(`  Host: ${current.HOST}`);
  console.log(`  Storage: ${current.STORAGE_DRIVER}`);
  if (current.STORAGE_DRIVER === 'postgres') {
    console.log(`  Database: ${describeDatabaseUrl(current.DATABASE_URL)}`);
  }
  console.log(`  Rate Limit: ${current.RATE_LIMIT_MAX}/min`);
  console.log(`  Billing batch size: ${current.BILLING_BATCH_SIZE}`);
  console.log(`  Billing concurrency: ${current.BILLING_CONCURRENCY}`);
  console.log(`  Charge timeout: ${current.CHARGE_TIMEOUT_MS}ms`);
  console.log(`  Run timeout: ${current.BILLING_RUN_TIMEOUT_MS}ms`);
  console.log(
    `  Escalation: ${current.ESCALATION_THRESHOLD === 0 ? 'DISABLED' : `after ${current.ESCALATION_THRESHOLD} failures`}`
  );
  console.log(
    `  Periodic billing: ${current.BILLING_INTERVAL_MS === 0 ? 'DISABLED' : `every ${current.BILLING_INTERVAL_MS / 1000}s`}`
  );
  console.log('');
}
