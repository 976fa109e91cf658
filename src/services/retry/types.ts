import type { Result } from '../../domain/result.js';
import type { AppError } from '../../domain/errors.js';
import type { ConfidenceWeights, EscalationPolicy, JudgeVerdict, SignalReading, StepState } from '../../domain/types.js';
import type { Logger } from '../../infrastructure/logger.js';
import type { LLMProvider } from '../../infrastructure/llm/index.js';
import type { LangfuseService } from '../../infrastructure/langfuse.js';
import type { ExecutionHistory } from '../history/index.js';
import type { StepEvaluator } from '../judge/types.js';

/** Collaborators handed to workers through the step context, scoped to one run. */
export interface PipelineServices {
  llm?: LLMProvider;
  langfuse?: LangfuseService;
  promptLabel?: string;
}

export interface StepContext<TInput = unknown> {
  runId: string;
  stepKind: string;
  goal: string;
  input: TInput;
  /** Accepted or flagged outputs of earlier steps, keyed by step-kind. */
  priorOutputs: Readonly<Record<string, unknown>>;
  attempt: number;
  maxAttempts: number;
  feedback: readonly string[];
  /** Last usable output of this step, if any. */
  previousOutput: unknown;
  /** Verdict on the most recent judged attempt of this step; null on the first attempt. */
  previousVerdict: JudgeVerdict | null;
  services: PipelineServices;
  log: Logger;
  signal: AbortSignal;
}

export interface WorkerOutput<T> {
  output: T;
  /** Self-reported per-field confidence in [0,1]. */
  fieldConfidence?: Record<string, number>;
}

export interface StepWorker<T = unknown, TInput = unknown> {
  readonly stepKind: string;
  invoke(context: StepContext<TInput>): Promise<Result<WorkerOutput<T>, AppError>>;
}

/**
 * Optional confidence sources computed from an output. Returning null marks the
 * source unavailable; a reading also records the measurements behind the score.
 */
export interface StepSignals<T> {
  structural?(output: T, result: WorkerOutput<T>): number | SignalReading | null;
  validation?(output: T): number | SignalReading | null;
}

export interface ResolveStepRequest<T, TInput = unknown> {
  worker: StepWorker<T, TInput>;
  input: TInput;
  /** Hard ceiling on attempts for this step, first attempt included. */
  maxRetries: number;
  goal?: string;
  priorOutputs?: Readonly<Record<string, unknown>>;
  escalationPolicy?: EscalationPolicy;
  isUsable?(output: T): boolean;
  signals?: StepSignals<T>;
  /** Extra material shown to the judge next to the output. */
  notes?(output: T): Record<string, unknown>;
  signal?: AbortSignal;
}

export interface RetryControllerOptions {
  runId: string;
  evaluator: StepEvaluator;
  history?: ExecutionHistory;
  services?: PipelineServices;
  feedbackMaxItems?: number;
  noProgressLimit?: number;
  weights?: ConfidenceWeights;
  reviewThreshold?: number;
  attemptTimeoutMs?: number;
  escalationPolicy?: EscalationPolicy;
  now?: () => Date;
}

export const VALID_TRANSITIONS: Record<StepState, Set<StepState>> = {
  PENDING: new Set(['EXECUTING', 'FAILED']),
  EXECUTING: new Set(['EVALUATING', 'RETRYING', 'ESCALATED_CONTINUE', 'FAILED']),
  EVALUATING: new Set(['ACCEPTED', 'RETRYING', 'ESCALATED_CONTINUE', 'ESCALATED_STOP', 'FAILED']),
  RETRYING: new Set(['EXECUTING', 'FAILED']),
  ACCEPTED: new Set(),
  ESCALATED_CONTINUE: new Set(),
  ESCALATED_STOP: new Set(),
  FAILED: new Set(),
};

export function isTerminalState(state: StepState): boolean {
  return VALID_TRANSITIONS[state].size === 0;
}
