export const ErrorCode = {
  // LLM provider
  LLM_API_ERROR: 'LLM_API_ERROR',
  LLM_RATE_LIMITED: 'LLM_RATE_LIMITED',
  LLM_MALFORMED_RESPONSE: 'LLM_MALFORMED_RESPONSE',
  LLM_AUTH_ERROR: 'LLM_AUTH_ERROR',

  // Worker
  WORKER_FAILED: 'WORKER_FAILED',
  WORKER_TIMEOUT: 'WORKER_TIMEOUT',

  // Judge
  JUDGE_CALL_FAILED: 'JUDGE_CALL_FAILED',
  JUDGE_TIMEOUT: 'JUDGE_TIMEOUT',
  JUDGE_PARSE_FAILED: 'JUDGE_PARSE_FAILED',

  // Rubric
  RUBRIC_NOT_FOUND: 'RUBRIC_NOT_FOUND',
  RUBRIC_INVALID: 'RUBRIC_INVALID',

  // Step / run resolution
  STEP_NO_USABLE_OUTPUT: 'STEP_NO_USABLE_OUTPUT',
  RUN_CANCELLED: 'RUN_CANCELLED',
  RUN_NOT_FOUND: 'RUN_NOT_FOUND',
  RUN_ALREADY_EXISTS: 'RUN_ALREADY_EXISTS',

  // Input / configuration
  CONFIG_INVALID: 'CONFIG_INVALID',
  VALIDATION_ERROR: 'VALIDATION_ERROR',

  // Infrastructure
  DB_CONNECTION_ERROR: 'DB_CONNECTION_ERROR',
  LANGFUSE_UNAVAILABLE: 'LANGFUSE_UNAVAILABLE',
} as const;

export type ErrorCode = (typeof ErrorCode)[keyof typeof ErrorCode];

export interface AppError {
  code: ErrorCode;
  message: string;
  details?: string;
  retryable: boolean;
}

export function createAppError(
  code: ErrorCode,
  message: string,
  retryable: boolean,
  details?: string,
): AppError {
  return { code, message, retryable, details };
}

export function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}
