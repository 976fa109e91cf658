import type { AppError, ErrorCode } from './errors.js';

export const DECISIONS = ['ACCEPT', 'RETRY', 'ESCALATE'] as const;

export type Decision = (typeof DECISIONS)[number];

export const STEP_STATES = [
  'PENDING',
  'EXECUTING',
  'EVALUATING',
  'RETRYING',
  'ACCEPTED',
  'ESCALATED_CONTINUE',
  'ESCALATED_STOP',
  'FAILED',
] as const;

export type StepState = (typeof STEP_STATES)[number];

export type TerminalStepState = Extract<StepState, 'ACCEPTED' | 'ESCALATED_CONTINUE' | 'ESCALATED_STOP' | 'FAILED'>;

/**
 * What an ESCALATE verdict does to the step:
 * - `retry`: loop like RETRY while budget remains
 * - `continue`: stop retrying, keep the flagged output, pipeline moves on
 * - `stop`: stop retrying, keep the flagged output, pipeline halts after this step
 */
export const ESCALATION_POLICIES = ['retry', 'continue', 'stop'] as const;

export type EscalationPolicy = (typeof ESCALATION_POLICIES)[number];

export const RUN_STATUSES = ['completed', 'halted', 'failed', 'cancelled'] as const;

export type RunStatus = (typeof RUN_STATUSES)[number];

export interface DecisionThresholds {
  acceptThreshold: number;
  reviseMin: number;
}

export interface RubricCriterion {
  description?: string;
  checks: string[];
}

export interface RubricNode {
  description: string;
  criteria: Record<string, RubricCriterion>;
  acceptThreshold?: number;
  reviseMin?: number;
  escalationPolicy?: EscalationPolicy;
}

export interface Rubric {
  defaultPrompt: string;
  nodes: Record<string, RubricNode>;
}

export interface JudgeVerdict {
  score: number;
  decision: Decision;
  critique: string;
  issues: string[];
  improvementOps: string[];
  /** True when the judge response could not be recovered into a verdict. */
  parseFailed: boolean;
  /** Free-text decision the judge emitted, kept for logs only. */
  rawDecision?: string;
}

export interface AttemptFailure {
  stage: 'worker' | 'judge';
  code: ErrorCode;
  message: string;
}

export interface StepExecutionRecord {
  readonly runId: string;
  readonly stepKind: string;
  readonly attempt: number;
  readonly output: unknown;
  readonly verdict: JudgeVerdict | null;
  /** State the step moved to once this attempt was evaluated. */
  readonly state: StepState;
  readonly feedbackProvided: readonly string[];
  readonly failure: AttemptFailure | null;
  readonly startedAt: string;
  readonly completedAt: string;
}

export interface RetryState {
  stepKind: string;
  attemptCount: number;
  lastScore: number | null;
  consecutiveNoProgressCount: number;
  accumulatedFeedback: readonly string[];
}

export type ConfidenceSources = Record<string, number | null | undefined>;

export type ConfidenceWeights = Record<string, number>;

export type SignalDetails = Record<string, number | null>;

/** A source score together with the measurements it was derived from. */
export interface SignalReading {
  score: number;
  details: SignalDetails;
}

export interface ConfidenceBreakdown {
  components: Record<string, number | null>;
  /** Weights renormalized over the available components. */
  weights: Record<string, number>;
  overall: number;
  needsHumanReview: boolean;
  reviewThreshold: number;
  /** Measurements behind each source score, keyed by source. */
  details?: Record<string, SignalDetails>;
}

export type FlagReason = 'escalated' | 'stagnation' | 'retries_exhausted';

interface ResolutionBase {
  stepKind: string;
  attempts: number;
  confidence: ConfidenceBreakdown;
  history: readonly StepExecutionRecord[];
}

export interface AcceptedResolution<T> extends ResolutionBase {
  status: 'accepted';
  terminalState: 'ACCEPTED';
  output: T;
  verdict: JudgeVerdict;
  needsHumanReview: boolean;
}

export interface FlaggedResolution<T> extends ResolutionBase {
  status: 'flagged';
  terminalState: 'ESCALATED_CONTINUE' | 'ESCALATED_STOP';
  reason: FlagReason;
  output: T;
  verdict: JudgeVerdict | null;
  needsHumanReview: true;
}

export interface FailedResolution extends ResolutionBase {
  status: 'failed';
  terminalState: 'FAILED';
  error: AppError;
  needsHumanReview: true;
}

export type StepResolution<T = unknown> =
  | AcceptedResolution<T>
  | FlaggedResolution<T>
  | FailedResolution;

export interface ExtractedField {
  name: string;
  value: unknown;
  evidence?: string | null;
  confidence?: number | null;
}

export interface StepSummary {
  stepKind: string;
  attempts: number;
  retries: number;
  failedAttempts: number;
  finalScore: number | null;
  terminalState: TerminalStepState;
}

export interface TimelineEntry {
  stepKind: string;
  attempt: number;
  state: StepState;
  score: number | null;
  startedAt: string;
  durationMs: number;
}

export interface ExecutionSummary {
  steps: StepSummary[];
  globalRetriesUsed: number;
  maxGlobalRetries: number;
  totalAttempts: number;
  timeline: TimelineEntry[];
}

export interface PipelineRun {
  runId: string;
  status: RunStatus;
  steps: StepResolution[];
  history: readonly StepExecutionRecord[];
  confidence: ConfidenceBreakdown;
  needsHumanReview: boolean;
  summary: ExecutionSummary;
  failure: AppError | null;
  startedAt: string;
  completedAt: string;
}
