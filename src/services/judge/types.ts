import type { Result } from '../../domain/result.js';
import type { AppError } from '../../domain/errors.js';
import type { DecisionThresholds, EscalationPolicy, JudgeVerdict } from '../../domain/types.js';

export interface JudgePrompt {
  system: string;
  user: string;
}

export interface JudgeCallOptions {
  runId?: string;
  stepKind: string;
  attempt: number;
  signal?: AbortSignal;
}

/** Raw judge transport: sends a prompt, answers with the judge's unparsed text. */
export interface JudgeCall {
  call(prompt: JudgePrompt, options: JudgeCallOptions): Promise<Result<string, AppError>>;
}

/** What the judge gets to see of a step attempt. */
export interface EvaluationContext {
  goal?: string;
  input?: unknown;
  output: unknown;
  notes?: Record<string, unknown>;
}

export interface EvaluationRequest {
  runId?: string;
  stepKind: string;
  context: EvaluationContext;
  feedback: readonly string[];
  attempt: number;
  maxAttempts: number;
  signal?: AbortSignal;
}

/** The part of the evaluator the retry loop depends on. */
export interface StepEvaluator {
  evaluate(request: EvaluationRequest): Promise<Result<JudgeVerdict, AppError>>;
  thresholdsFor(stepKind: string): DecisionThresholds;
  escalationPolicyFor(stepKind: string): EscalationPolicy | undefined;
  goalFor(stepKind: string): string | undefined;
}

export interface RubricEvaluatorOptions {
  thresholds: DecisionThresholds;
  scorePrecision?: number;
  maxExcerptChars?: number;
}
