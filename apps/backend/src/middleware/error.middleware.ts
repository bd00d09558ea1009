import type { Request, Response, NextFunction } from 'express';
import type { ApiErrorCode, ApiResponse } from '@sensor-registry/shared-types';
import { createLogger } from '@sensor-registry/shared-utils';
import { AppError } from '../lib/errors';

const logger = createLogger('ErrorHandler');

const ERROR_STATUS_MAP: Record<ApiErrorCode, number> = {
  UNAUTHORIZED: 401,
  NOT_FOUND: 404,
  VALIDATION_ERROR: 400,
  INVALID_CREDENTIALS: 401,
  TOKEN_EXPIRED: 401,
  TOKEN_INVALID_SIGNATURE: 401,
  DUPLICATE_DEVICE: 409,
  CONFLICT: 409,
  INVALID_TRANSITION: 409,
  POOL_EXHAUSTED: 503,
  SERVICE_UNAVAILABLE: 503,
  INTERNAL_ERROR: 500,
};

// Codes whose detail must not reach the client
const MASKED_CODES: Partial<Record<ApiErrorCode, { code: ApiErrorCode; message: string }>> = {
  TOKEN_EXPIRED: { code: 'UNAUTHORIZED', message: 'Invalid or expired token' },
  TOKEN_INVALID_SIGNATURE: { code: 'UNAUTHORIZED', message: 'Invalid or expired token' },
  POOL_EXHAUSTED: { code: 'SERVICE_UNAVAILABLE', message: 'Service temporarily unavailable' },
};

interface HttpError extends Error {
  status: number;
  type?: string;
}

// body-parser errors carry an HTTP status and a type
function failure(code: ApiErrorCode, message: string, details?: unknown): ApiResponse<never> {
  return {
    success: false,
    error: { code, message, ...(details === undefined ? {} : { details }) },
  };
}

function isHttpError(error: unknown): error is HttpError {
  return error instanceof Error && 'status' in error && typeof error.status === 'number';
}

export function errorMiddleware(
  error: unknown,
  req: Request,
  res: Response,
  // Express recognises error handlers by arity
  _next: NextFunction
): void {
  if (error instanceof AppError) {
    const statusCode = ERROR_STATUS_MAP[error.code];
    const masked = MASKED_CODES[error.code];
    if (statusCode >= 500) {
      logger.error('Request failed', { method: req.method, path: req.path, code: error.code, error: error.message });
    } else {
      logger.debug('Request rejected', { method: req.method, path: req.path, code: error.code });
    }

    res
      .status(statusCode)
      .json(masked ? failure(masked.code, masked.message) : failure(error.code, error.message, error.details));
    return;
  }

  if (isHttpError(error) && error.status >= 400 && error.status < 500) {
    res
      .status(error.status)
      .json(failure('VALIDATION_ERROR', error.type === 'entity.parse.failed' ? 'Malformed JSON body' : error.message));
    return;
  }

  logger.error('Unhandled request error', { method: req.method, path: req.path }, error);

  res.status(500).json(failure('INTERNAL_ERROR', 'An unexpected error occurred'));
}

export function notFoundMiddleware(req: Request, res: Response): void {
  res.status(404).json(failure('NOT_FOUND', `Route ${req.method} ${req.path} not found`));
}
