import type { Result } from '../../domain/result.js';
import type { AppError } from '../../domain/errors.js';

export interface LlmWorkerOptions<T> {
  stepKind: string;
  /** Langfuse prompt name; defaults to `step-<stepKind>`. */
  promptName?: string;
  /** Template used when Langfuse is not configured or cannot serve the prompt. */
  fallbackPrompt?: string;
  temperature?: number;
  parseOutput(payload: Record<string, unknown>): Result<T, AppError>;
}

export interface ResolvedTemplate {
  name: string;
  prompt: string;
  version?: number;
}
