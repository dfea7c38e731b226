import { Request, Response, NextFunction } from 'express';
import { ClaimError, ClaimErrorKind } from '../../claims/types';

export interface ApiError extends Error {
  statusCode?: number;
  code?: string;
}

const CLAIM_ERROR_RESPONSES: Record<ClaimErrorKind, { statusCode: number; code: string }> = {
  InvalidProof: { statusCode: 422, code: 'INVALID_PROOF' },
  AlreadyClaimed: { statusCode: 409, code: 'ALREADY_CLAIMED' },
  ClaimsPaused: { statusCode: 503, code: 'CLAIMS_PAUSED' },
  Unauthorized: { statusCode: 403, code: 'UNAUTHORIZED' },
  TransferFailed: { statusCode: 502, code: 'TRANSFER_FAILED' },
  InvalidRequest: { statusCode: 400, code: 'INVALID_REQUEST' },
};

/**
 * Global error handler middleware
 * Provides consistent error responses across all endpoints
 */
export function errorHandler(
  err: ApiError,
  _req: Request,
  res: Response,
  _next: NextFunction
): void {
  const statusCode = err.statusCode || 500;
  const message = err.message || 'Internal server error';

  if (statusCode >= 500) {
    console.error(`[API Error] ${statusCode}: ${message}`, err.stack);
  } else {
    console.log(`[API] ${statusCode} ${err.code || 'ERROR'}: ${message}`);
  }

  res.status(statusCode).json({
    error: message,
    code: err.code || 'INTERNAL_ERROR',
    timestamp: new Date().toISOString(),
  });
}

/**
 * Create an API error with a status code
 */
export function createError(message: string, statusCode: number, code?: string): ApiError {
  const error: ApiError = new Error(message);
  error.statusCode = statusCode;
  error.code = code;
  return error;
}

/**
 * Translate a ledger failure into its HTTP response
 */
export function fromClaimError(error: ClaimError): ApiError {
  const { statusCode, code } = CLAIM_ERROR_RESPONSES[error.kind];
  return createError(error.message, statusCode, code);
}

/**
 * Async handler wrapper to catch errors in async route handlers
 */
export function asyncHandler(
  fn: (req: Request, res: Response, next: NextFunction) => Promise<void>
) {
  return (req: Request, res: Response, next: NextFunction) => {
    Promise.resolve(fn(req, res, next)).catch(next);
  };
}
