/**
 * Billing Error Classes
 *
 * Typed errors so callers branch with instanceof instead of matching
 * message strings. The cycle processor uses them to pick the summary
 * bucket for an abandoned attempt; the API layer maps them to HTTP and
 * tRPC error codes.
 */

/**
 * Base class for every error the billing engine throws on purpose
 */
export class BillingError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'BillingError';
  }
}

/**
 * Validation error - bad input, rejected before any state change
 *
 * - Unknown or inactive user/plan
 * - A next billing date that would move backwards
 */
export class ValidationError extends BillingError {
  constructor(
    message: string,
    code: string = 'VALIDATION_FAILED',
    public readonly details?: Record<string, unknown>
  ) {
    super(message, code);
    this.name = 'ValidationError';
  }
}

export class NotFoundError extends BillingError {
  constructor(entity: string, id: string | number) {
    super(`${entity} ${id} not found`, 'NOT_FOUND');
    this.name = 'NotFoundError';
  }
}

/**
 * Concurrent modification detected
 *
 * The attempt is abandoned for this run and is not counted as a failure.
 */
export class ConflictError extends BillingError {
  constructor(message: string) {
    super(message, 'CONFLICT');
    this.name = 'ConflictError';
  }
}

/**
 * Store or ledger failure - transient infrastructure issue
 *
 * Fatal to the attempt that hit it. The subscription is left unchanged and
 * becomes eligible again on the next run.
 */
export class StorageError extends BillingError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'STORAGE_ERROR', options);
    this.name = 'StorageError';
  }
}

/**
 * Charge outcome unknown (timeout, executor threw)
 *
 * Recorded as a 'pending' ledger entry. Never treated as success or decline.
 */
export class IndeterminateChargeError extends BillingError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'CHARGE_INDETERMINATE', options);
    this.name = 'IndeterminateChargeError';
  }
}

/**
 * Render any thrown value as a log-friendly message
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
