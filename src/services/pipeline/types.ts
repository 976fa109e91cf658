import type { ConfidenceWeights, EscalationPolicy } from '../../domain/types.js';
import type { StepEvaluator } from '../judge/types.js';
import type { PipelineServices, StepSignals, StepWorker } from '../retry/types.js';

/** One stage of the pipeline. Its output becomes the next stage's input. */
export interface PipelineStep<T = unknown> {
  worker: StepWorker<T, unknown>;
  goal?: string;
  /** Attempt ceiling for this step; falls back to the pipeline default. */
  maxRetries?: number;
  escalationPolicy?: EscalationPolicy;
  isUsable?(output: T): boolean;
  signals?: StepSignals<T>;
  notes?(output: T): Record<string, unknown>;
}

export interface PipelineSettings {
  maxStepRetries: number;
  maxGlobalRetries: number;
  feedbackMaxItems: number;
  noProgressLimit: number;
  reviewThreshold: number;
  weights: ConfidenceWeights;
  attemptTimeoutMs?: number;
  escalationPolicy: EscalationPolicy;
}

export interface PipelineOptions {
  steps: PipelineStep[];
  evaluator: StepEvaluator;
  settings: PipelineSettings;
  services?: PipelineServices;
  now?: () => Date;
  createRunId?: () => string;
}

export interface RunOptions {
  runId?: string;
  signal?: AbortSignal;
}
