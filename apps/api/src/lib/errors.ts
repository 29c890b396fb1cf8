/**
 * Domain error mapping
 *
 * One table shared by the REST error handler and the tRPC middleware, so
 * both surfaces answer the same failure with the same status.
 */

import { ZodError } from 'zod';
import {
  BillingError,
  ConflictError,
  NotFoundError,
  ValidationError,
} from '@renewly/database/billing';

export type TrpcErrorCode = 'BAD_REQUEST' | 'NOT_FOUND' | 'CONFLICT' | 'INTERNAL_SERVER_ERROR';

export interface MappedError {
  statusCode: 400 | 404 | 409 | 500;
  trpcCode: TrpcErrorCode;
  code: string;
  message: string;
}

export function mapDomainError(error: unknown): MappedError {
  if (error instanceof ValidationError) {
    return { statusCode: 400, trpcCode: 'BAD_REQUEST', code: error.code, message: error.message };
  }
  if (error instanceof ZodError) {
    const message = error.issues
      .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
      .join('; ');
    return { statusCode: 400, trpcCode: 'BAD_REQUEST', code: 'VALIDATION_FAILED', message };
  }
  if (error instanceof NotFoundError) {
    return { statusCode: 404, trpcCode: 'NOT_FOUND', code: error.code, message: error.message };
  }
  if (error instanceof ConflictError) {
    return { statusCode: 409, trpcCode: 'CONFLICT', code: error.code, message: error.message };
  }
  // Storage and other engine failures keep their code; the driver message stays in the logs
  return {
    statusCode: 500,
    trpcCode: 'INTERNAL_SERVER_ERROR',
    code: error instanceof BillingError ? error.code : 'INTERNAL_ERROR',
    message: 'Internal server error',
  };
}
