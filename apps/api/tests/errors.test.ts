/**
 * Domain error to HTTP / tRPC mapping
 */

import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import {
  ConflictError,
  IndeterminateChargeError,
  NotFoundError,
  StorageError,
  ValidationError,
} from '@renewly/database/billing';
import { mapDomainError } from '../src/lib/errors';

describe('mapDomainError', () => {
  it('should map validation failures to 400', () => {
    expect(mapDomainError(new ValidationError('Unknown or inactive plan 7', 'UNKNOWN_PLAN'))).toEqual({
      statusCode: 400,
      trpcCode: 'BAD_REQUEST',
      code: 'UNKNOWN_PLAN',
      message: 'Unknown or inactive plan 7',
    });
  });

  it('should join zod issues with their paths', () => {
    const result = z.object({ userId: z.number(), planId: z.number() }).safeParse({ userId: 'x' });
    expect(result.success).toBe(false);
    if (result.success) return;

    expect(mapDomainError(result.error)).toMatchObject({
      statusCode: 400,
      code: 'VALIDATION_FAILED',
      message: 'userId: Expected number, received string; planId: Required',
    });
  });

  it('should map not found and conflict', () => {
    expect(mapDomainError(new NotFoundError('Subscription', 'abc'))).toMatchObject({
      statusCode: 404,
      trpcCode: 'NOT_FOUND',
      message: 'Subscription abc not found',
    });
    expect(mapDomainError(new ConflictError('version moved'))).toMatchObject({
      statusCode: 409,
      trpcCode: 'CONFLICT',
      code: 'CONFLICT',
    });
  });

  it('should hide storage and unexpected errors behind 500', () => {
    const storage = new StorageError('connection refused', { cause: new Error('ECONNREFUSED') });

    expect(mapDomainError(storage)).toEqual({
      statusCode: 500,
      trpcCode: 'INTERNAL_SERVER_ERROR',
      code: 'STORAGE_ERROR',
      message: 'Internal server error',
    });
    expect(mapDomainError(new IndeterminateChargeError('timeout')).code).toBe('CHARGE_INDETERMINATE');
    expect(mapDomainError(new Error('boom')).code).toBe('INTERNAL_ERROR');
  });
});
