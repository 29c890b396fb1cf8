/**
 * Fixed-point money helpers
 *
 * Amounts are integer minor units (cents) everywhere in the engine. The
 * decimal string form ("9.99") only exists in API responses and log lines.
 * No floating-point arithmetic touches an amount.
 */

/**
 * Assert that a value is a valid non-negative amount in cents
 */
export function assertCents(value: number): number {
  if (!Number.isSafeInteger(value) || value < 0) {
    throw new RangeError(`Invalid amount in cents: ${value}`);
  }
  return value;
}

/**
 * Format cents as a fixed two-decimal string (999 → "9.99")
 */
export function formatCents(cents: number): string {
  assertCents(cents);
  const whole = Math.trunc(cents / 100);
  const fraction = cents % 100;
  return `${whole}.${String(fraction).padStart(2, '0')}`;
}
