/**
 * PostgreSQL error classification
 *
 * Every store call goes through withStorage(): billing errors pass through,
 * a unique violation becomes a ConflictError, anything else thrown by the
 * driver becomes a StorageError.
 */

import { BillingError, ConflictError, StorageError, describeError } from '../billing/errors';

const PG_UNIQUE_VIOLATION = '23505';

function pgErrorCode(error: unknown): string | undefined {
  if (!error || typeof error !== 'object') {
    return undefined;
  }
  if ('code' in error && typeof error.code === 'string') {
    return error.code;
  }
  // Some drizzle releases wrap the driver error
  if ('cause' in error) {
    return pgErrorCode(error.cause);
  }
  return undefined;
}

export function isUniqueViolation(error: unknown): boolean {
  return pgErrorCode(error) === PG_UNIQUE_VIOLATION;
}

export async function withStorage<T>(operation: string, fn: () => Promise<T>): Promise<T> {
  try {
    return await fn();
  } catch (error) {
    if (error instanceof BillingError) {
      throw error;
    }
    if (isUniqueViolation(error)) {
      throw new ConflictError(`${operation}: ${describeError(error)}`);
    }
    throw new StorageError(`${operation} failed: ${describeError(error)}`, { cause: error });
  }
}
