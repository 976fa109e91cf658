import type { Request, Response, NextFunction } from 'express';
import { ErrorCode, type AppError } from '../../domain/errors.js';
import { logger } from '../../infrastructure/logger.js';

export interface ApiResponse<T> {
  success: boolean;
  data: T | null;
  error: { code: string; message: string; details?: string; retryable?: boolean } | null;
}

export function successResponse<T>(data: T): ApiResponse<T> {
  return { success: true, data, error: null };
}

export function errorResponse(code: string, message: string, details?: string, retryable?: boolean): ApiResponse<null> {
  return { success: false, data: null, error: { code, message, details, retryable } };
}

function isAppError(value: unknown): value is AppError {
  return (
    typeof value === 'object' &&
    value !== null &&
    'code' in value &&
    'message' in value &&
    'retryable' in value
  );
}

export function mapErrorCodeToStatus(code: string): number {
  switch (code) {
    case ErrorCode.LLM_AUTH_ERROR:
      return 400;

    case ErrorCode.RUN_NOT_FOUND:
      return 404;

    case ErrorCode.RUN_CANCELLED:
    case ErrorCode.RUN_ALREADY_EXISTS:
      return 409;

    case ErrorCode.VALIDATION_ERROR:
      return 422;

    case ErrorCode.LLM_API_ERROR:
    case ErrorCode.LLM_RATE_LIMITED:
    case ErrorCode.DB_CONNECTION_ERROR:
    case ErrorCode.LANGFUSE_UNAVAILABLE:
      return 503;

    case ErrorCode.WORKER_TIMEOUT:
    case ErrorCode.JUDGE_TIMEOUT:
      return 504;

    default:
      return 500;
  }
}

export function sendAppError(res: Response, appError: AppError): void {
  const status = mapErrorCodeToStatus(appError.code);
  res.status(status).json(errorResponse(appError.code, appError.message, appError.details, appError.retryable));
}

export function errorHandler(err: unknown, _req: Request, res: Response, _next: NextFunction): void {
  if (isAppError(err)) {
    sendAppError(res, err);
    return;
  }

  if (err instanceof SyntaxError) {
    res.status(400).json(errorResponse(ErrorCode.VALIDATION_ERROR, 'Request body is not valid JSON', err.message, false));
    return;
  }

  logger.error({ err: err instanceof Error ? err.message : String(err) }, 'Unhandled error');
  res.status(500).json(errorResponse('INTERNAL_ERROR', 'An unexpected error occurred', undefined, false));
}
