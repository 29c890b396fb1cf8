import type { BillingLogger } from './types';

function format(message: string, details?: Record<string, unknown>): string {
  return details ? `[BILLING] ${message} ${JSON.stringify(details)}` : `[BILLING] ${message}`;
}

/**
 * Default logger when none is injected (tagged console output)
 */
export const consoleBillingLogger: BillingLogger = {
  info: (message, details) => console.log(format(message, details)),
  warn: (message, details) => console.warn(format(message, details)),
  error: (message, details) => console.error(format(message, details)),
};

/** Discards everything; for tests that assert on return values only */
export const silentBillingLogger: BillingLogger = {
  info: () => {},
  warn: () => {},
  error: () => {},
};
