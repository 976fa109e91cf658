import type { Result } from '../../domain/result.js';
import { createAppError, describeCause, ErrorCode, type AppError } from '../../domain/errors.js';
import type {
  AttemptFailure,
  ConfidenceBreakdown,
  ConfidenceWeights,
  EscalationPolicy,
  FlagReason,
  JudgeVerdict,
  RetryState,
  SignalDetails,
  SignalReading,
  StepExecutionRecord,
  StepResolution,
  StepState,
} from '../../domain/types.js';
import { createRunLogger, type Logger } from '../../infrastructure/logger.js';
import { aggregateConfidence, DEFAULT_CONFIDENCE_WEIGHTS, DEFAULT_REVIEW_THRESHOLD } from '../confidence/index.js';
import { FeedbackMemory, StagnationDetector } from '../feedback/index.js';
import { ExecutionHistory } from '../history/index.js';
import { deriveDecision } from '../judge/decision.js';
import type { StepEvaluator } from '../judge/types.js';
import { runWithDeadline } from './deadline.js';
import { StepStateMachine } from './state-machine.js';
import type {
  PipelineServices,
  ResolveStepRequest,
  RetryControllerOptions,
  WorkerOutput,
} from './types.js';

export type {
  PipelineServices,
  ResolveStepRequest,
  RetryControllerOptions,
  StepContext,
  StepSignals,
  StepWorker,
  WorkerOutput,
} from './types.js';
export { VALID_TRANSITIONS, isTerminalState } from './types.js';
export { StepStateMachine } from './state-machine.js';
export { runWithDeadline } from './deadline.js';

interface Candidate<T> {
  output: T;
  result: WorkerOutput<T>;
  verdict: JudgeVerdict | null;
}

type AttemptOutcome<T> =
  | { kind: 'retry' }
  | { kind: 'accept'; candidate: Candidate<T>; verdict: JudgeVerdict }
  | {
      kind: 'flag';
      reason: FlagReason;
      terminalState: 'ESCALATED_CONTINUE' | 'ESCALATED_STOP';
      candidate: Candidate<T>;
    }
  | { kind: 'fail'; error: AppError };

function stateFor<T>(outcome: AttemptOutcome<T>): StepState {
  switch (outcome.kind) {
    case 'retry':
      return 'RETRYING';
    case 'accept':
      return 'ACCEPTED';
    case 'flag':
      return outcome.terminalState;
    case 'fail':
      return 'FAILED';
  }
}

function cancelledError(stepKind: string): AppError {
  return createAppError(ErrorCode.RUN_CANCELLED, `Run cancelled while resolving step '${stepKind}'`, false);
}

/**
 * Drives one step at a time through execute → evaluate → accept/retry/escalate.
 *
 * Signals are ranked: the attempt ceiling always holds, stagnation ends the
 * loop early, then the score-derived decision applies, and only once the
 * budget is spent does the last usable output become a flagged fallback.
 * Per-step retry state lives only while the step is unresolved.
 */
export class RetryController {
  readonly runId: string;
  readonly history: ExecutionHistory;

  private readonly evaluator: StepEvaluator;
  private readonly services: PipelineServices;
  private readonly feedback: FeedbackMemory;
  private readonly stagnation: StagnationDetector;
  private readonly weights: ConfidenceWeights;
  private readonly reviewThreshold: number;
  private readonly attemptTimeoutMs: number | undefined;
  private readonly escalationPolicy: EscalationPolicy;
  private readonly now: () => Date;
  private readonly states = new Map<string, RetryState>();

  constructor(options: RetryControllerOptions) {
    this.runId = options.runId;
    this.evaluator = options.evaluator;
    this.history = options.history ?? new ExecutionHistory();
    this.services = options.services ?? {};
    this.feedback = new FeedbackMemory({ maxItems: options.feedbackMaxItems });
    this.stagnation = new StagnationDetector({ noProgressLimit: options.noProgressLimit });
    this.weights = options.weights ?? DEFAULT_CONFIDENCE_WEIGHTS;
    this.reviewThreshold = options.reviewThreshold ?? DEFAULT_REVIEW_THRESHOLD;
    this.attemptTimeoutMs = options.attemptTimeoutMs;
    this.escalationPolicy = options.escalationPolicy ?? 'retry';
    this.now = options.now ?? (() => new Date());
  }

  /** Snapshot of a step's retry state, or null when the step is not in flight. */
  getRetryState(stepKind: string): RetryState | null {
    const state = this.states.get(stepKind);
    return state ? { ...state, accumulatedFeedback: [...state.accumulatedFeedback] } : null;
  }

  async resolve<T, TInput = unknown>(request: ResolveStepRequest<T, TInput>): Promise<StepResolution<T>> {
    const stepKind = request.worker.stepKind;
    const log = createRunLogger(this.runId, stepKind);
    const maxAttempts = Math.floor(request.maxRetries);
    const policy = request.escalationPolicy ?? this.evaluator.escalationPolicyFor(stepKind) ?? this.escalationPolicy;
    const thresholds = this.evaluator.thresholdsFor(stepKind);
    const goal = request.goal ?? this.evaluator.goalFor(stepKind) ?? stepKind;
    const machine = new StepStateMachine();
    const records: StepExecutionRecord[] = [];

    if (!Number.isFinite(maxAttempts) || maxAttempts < 1) {
      machine.transition('FAILED');
      const error = createAppError(
        ErrorCode.CONFIG_INVALID,
        `Step '${stepKind}' needs at least one attempt, got ${request.maxRetries}`,
        false,
      );
      log.error({ errorCode: error.code, maxRetries: request.maxRetries }, 'Step not attempted');
      return this.conclude(stepKind, { kind: 'fail', error }, records, request, log);
    }

    const retryState = this.openState(stepKind);
    let candidate: Candidate<T> | null = null;
    let lastVerdict: JudgeVerdict | null = null;

    log.info({ maxAttempts, policy, ...thresholds }, 'Resolving step');

    for (;;) {
      if (request.signal?.aborted) {
        machine.transition('FAILED');
        return this.conclude(stepKind, { kind: 'fail', error: cancelledError(stepKind) }, records, request, log);
      }

      machine.transition('EXECUTING');
      retryState.attemptCount += 1;
      const attempt = retryState.attemptCount;
      const startedAt = this.now();
      const feedback = this.feedback.get(stepKind);

      const work = await runWithDeadline(
        (signal) =>
          request.worker.invoke({
            runId: this.runId,
            stepKind,
            goal,
            input: request.input,
            priorOutputs: request.priorOutputs ?? {},
            attempt,
            maxAttempts,
            feedback,
            previousOutput: candidate?.output,
            previousVerdict: lastVerdict,
            services: this.services,
            log,
            signal,
          }),
        {
          label: `Worker for step '${stepKind}'`,
          timeoutMs: this.attemptTimeoutMs,
          parent: request.signal,
          timeoutCode: ErrorCode.WORKER_TIMEOUT,
          failureCode: ErrorCode.WORKER_FAILED,
        },
      );

      let output: unknown = undefined;
      let current: Candidate<T> | null = null;
      let verdict: JudgeVerdict | null = null;
      let failure: AttemptFailure | null = null;

      if (!work.ok) {
        failure = { stage: 'worker', code: work.error.code, message: work.error.message };
        log.warn({ attempt, errorCode: work.error.code, details: work.error.details }, 'Worker attempt failed');
      } else {
        output = work.value.output;
        if (this.isUsable(request, work.value.output, log)) {
          current = { output: work.value.output, result: work.value, verdict: null };
          candidate = current;
        }

        machine.transition('EVALUATING');
        const judged = await this.evaluate(request, work.value.output, goal, feedback, attempt, maxAttempts);
        if (!judged.ok) {
          failure = { stage: 'judge', code: judged.error.code, message: judged.error.message };
        } else {
          verdict = { ...judged.value, decision: deriveDecision(judged.value.score, thresholds) };
          lastVerdict = verdict;
          if (current) current.verdict = verdict;
        }
      }

      const outcome = this.decide<T>({
        stepKind,
        attempt,
        maxAttempts,
        policy,
        verdict,
        current,
        candidate,
        cancelled: request.signal?.aborted === true,
      });

      if (verdict && !verdict.parseFailed) {
        retryState.lastScore = verdict.score;
        retryState.consecutiveNoProgressCount = this.stagnation.consecutiveRepeats(stepKind);
      }

      const state = stateFor(outcome);
      machine.transition(state);
      records.push(
        this.history.append({
          runId: this.runId,
          stepKind,
          attempt,
          output,
          verdict,
          state,
          feedbackProvided: feedback,
          failure,
          startedAt: startedAt.toISOString(),
          completedAt: this.now().toISOString(),
        }),
      );

      log.info(
        { attempt, score: verdict?.score ?? null, decision: verdict?.decision ?? null, state },
        'Attempt recorded',
      );

      if (outcome.kind !== 'retry') {
        return this.conclude(stepKind, outcome, records, request, log);
      }

      if (verdict) {
        const added = this.feedback.add(stepKind, verdict.improvementOps);
        retryState.accumulatedFeedback = this.feedback.get(stepKind);
        log.debug({ attempt, added: added.length, stored: retryState.accumulatedFeedback.length }, 'Feedback stored');
      }
    }
  }

  private openState(stepKind: string): RetryState {
    const existing = this.states.get(stepKind);
    if (existing) return existing;

    const state: RetryState = {
      stepKind,
      attemptCount: 0,
      lastScore: null,
      consecutiveNoProgressCount: 0,
      accumulatedFeedback: [],
    };
    this.states.set(stepKind, state);
    return state;
  }

  private discardState(stepKind: string): void {
    this.states.delete(stepKind);
    this.feedback.clear(stepKind);
    this.stagnation.reset(stepKind);
  }

  private isUsable<T>(request: ResolveStepRequest<T, unknown>, output: T, log: Logger): boolean {
    if (!request.isUsable) return output !== null && output !== undefined;
    try {
      return request.isUsable(output);
    } catch (cause) {
      log.warn({ details: describeCause(cause) }, 'Usability check threw');
      return false;
    }
  }

  private evaluate<T, TInput>(
    request: ResolveStepRequest<T, TInput>,
    output: T,
    goal: string,
    feedback: readonly string[],
    attempt: number,
    maxAttempts: number,
  ): Promise<Result<JudgeVerdict, AppError>> {
    const stepKind = request.worker.stepKind;
    return runWithDeadline(
      (signal) =>
        this.evaluator.evaluate({
          runId: this.runId,
          stepKind,
          context: {
            goal,
            input: request.input,
            output,
            ...(request.notes && { notes: request.notes(output) }),
          },
          feedback,
          attempt,
          maxAttempts,
          signal,
        }),
      {
        label: `Judge for step '${stepKind}'`,
        timeoutMs: this.attemptTimeoutMs,
        parent: request.signal,
        timeoutCode: ErrorCode.JUDGE_TIMEOUT,
        failureCode: ErrorCode.JUDGE_CALL_FAILED,
      },
    );
  }

  private decide<T>(facts: {
    stepKind: string;
    attempt: number;
    maxAttempts: number;
    policy: EscalationPolicy;
    verdict: JudgeVerdict | null;
    current: Candidate<T> | null;
    candidate: Candidate<T> | null;
    cancelled: boolean;
  }): AttemptOutcome<T> {
    const { stepKind, verdict, current, candidate } = facts;

    if (facts.cancelled) {
      return { kind: 'fail', error: cancelledError(stepKind) };
    }

    if (verdict && current) {
      if (verdict.decision === 'ACCEPT') {
        return { kind: 'accept', candidate: current, verdict };
      }
      if (verdict.decision === 'ESCALATE' && facts.policy !== 'retry') {
        return {
          kind: 'flag',
          reason: 'escalated',
          terminalState: facts.policy === 'stop' ? 'ESCALATED_STOP' : 'ESCALATED_CONTINUE',
          candidate: current,
        };
      }
    }

    if (verdict && !verdict.parseFailed && this.stagnation.observe(stepKind, verdict.score)) {
      return candidate
        ? { kind: 'flag', reason: 'stagnation', terminalState: 'ESCALATED_CONTINUE', candidate }
        : { kind: 'fail', error: this.noUsableOutput(stepKind, facts.attempt) };
    }

    if (facts.attempt >= facts.maxAttempts) {
      return candidate
        ? { kind: 'flag', reason: 'retries_exhausted', terminalState: 'ESCALATED_CONTINUE', candidate }
        : { kind: 'fail', error: this.noUsableOutput(stepKind, facts.attempt) };
    }

    return { kind: 'retry' };
  }

  private noUsableOutput(stepKind: string, attempts: number): AppError {
    return createAppError(
      ErrorCode.STEP_NO_USABLE_OUTPUT,
      `Step '${stepKind}' produced no usable output in ${attempts} attempt(s)`,
      false,
    );
  }

  private conclude<T>(
    stepKind: string,
    outcome: Exclude<AttemptOutcome<T>, { kind: 'retry' }>,
    records: StepExecutionRecord[],
    request: ResolveStepRequest<T, unknown>,
    log: Logger,
  ): StepResolution<T> {
    this.discardState(stepKind);
    const attempts = records.length;
    const history: readonly StepExecutionRecord[] = Object.freeze([...records]);

    if (outcome.kind === 'fail') {
      log.error({ attempts, errorCode: outcome.error.code }, 'Step failed');
      return {
        status: 'failed',
        terminalState: 'FAILED',
        stepKind,
        attempts,
        error: outcome.error,
        confidence: aggregateConfidence(
          { judge: null, structural: null, validation: null },
          this.weights,
          this.reviewThreshold,
        ),
        needsHumanReview: true,
        history,
      };
    }

    const confidence = this.scoreOutput(request, outcome.candidate, log);

    if (outcome.kind === 'accept') {
      log.info({ attempts, score: outcome.verdict.score, overall: confidence.overall }, 'Step accepted');
      return {
        status: 'accepted',
        terminalState: 'ACCEPTED',
        stepKind,
        attempts,
        output: outcome.candidate.output,
        verdict: outcome.verdict,
        confidence,
        needsHumanReview: confidence.needsHumanReview,
        history,
      };
    }

    log.warn(
      { attempts, reason: outcome.reason, terminalState: outcome.terminalState, overall: confidence.overall },
      'Step flagged for human review',
    );
    return {
      status: 'flagged',
      terminalState: outcome.terminalState,
      reason: outcome.reason,
      stepKind,
      attempts,
      output: outcome.candidate.output,
      verdict: outcome.candidate.verdict,
      confidence,
      needsHumanReview: true,
      history,
    };
  }

  private scoreOutput<T>(
    request: ResolveStepRequest<T, unknown>,
    candidate: Candidate<T>,
    log: Logger,
  ): ConfidenceBreakdown {
    const details: Record<string, SignalDetails> = {};
    const read = (source: string, compute: () => number | SignalReading | null | undefined): number | null => {
      try {
        const value = compute();
        if (value === null || value === undefined || typeof value === 'number') return value ?? null;
        details[source] = value.details;
        return value.score;
      } catch (cause) {
        log.warn({ source, details: describeCause(cause) }, 'Confidence source threw');
        return null;
      }
    };

    const breakdown = aggregateConfidence(
      {
        judge: candidate.verdict ? candidate.verdict.score : null,
        structural: read('structural', () => request.signals?.structural?.(candidate.output, candidate.result)),
        validation: read('validation', () => request.signals?.validation?.(candidate.output)),
      },
      this.weights,
      this.reviewThreshold,
    );
    return Object.keys(details).length > 0 ? { ...breakdown, details } : breakdown;
  }
}

/** One-shot step resolution with a fresh controller and history. */
export function resolveStep<T, TInput = unknown>(
  options: RetryControllerOptions,
  request: ResolveStepRequest<T, TInput>,
): Promise<StepResolution<T>> {
  return new RetryController(options).resolve(request);
}

