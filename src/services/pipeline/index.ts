import { randomUUID } from 'node:crypto';
import { createAppError, ErrorCode, type AppError } from '../../domain/errors.js';
import type { PipelineRun, RunStatus, StepResolution } from '../../domain/types.js';
import { createRunLogger } from '../../infrastructure/logger.js';
import { aggregateRunConfidence } from '../confidence/index.js';
import { ExecutionHistory } from '../history/index.js';
import { RetryController } from '../retry/index.js';
import { summarizeExecution } from './summary.js';
import type { PipelineOptions, PipelineStep, RunOptions } from './types.js';

export type { PipelineOptions, PipelineSettings, PipelineStep, RunOptions } from './types.js';
export { summarizeExecution } from './summary.js';
export { createDefaultSteps, DEFAULT_STEP_KINDS, type DefaultStepsOptions } from './default-pipeline.js';

/**
 * Runs a document through the configured steps in order. Every run gets its
 * own history and retry controller, so concurrent runs share nothing mutable.
 */
export class Pipeline {
  private readonly options: PipelineOptions;
  private readonly now: () => Date;
  private readonly createRunId: () => string;

  constructor(options: PipelineOptions) {
    this.options = options;
    this.now = options.now ?? (() => new Date());
    this.createRunId = options.createRunId ?? randomUUID;
  }

  get stepKinds(): string[] {
    return this.options.steps.map((step) => step.worker.stepKind);
  }

  async run(document: unknown, runOptions: RunOptions = {}): Promise<PipelineRun> {
    const { settings, evaluator } = this.options;
    const runId = runOptions.runId ?? this.createRunId();
    const log = createRunLogger(runId);
    const startedAt = this.now();
    const history = new ExecutionHistory();
    const controller = new RetryController({
      runId,
      evaluator,
      history,
      services: this.options.services,
      feedbackMaxItems: settings.feedbackMaxItems,
      noProgressLimit: settings.noProgressLimit,
      weights: settings.weights,
      reviewThreshold: settings.reviewThreshold,
      attemptTimeoutMs: settings.attemptTimeoutMs,
      escalationPolicy: settings.escalationPolicy,
      now: this.now,
    });

    const resolutions: StepResolution[] = [];
    const priorOutputs: Record<string, unknown> = {};
    let input: unknown = document;
    let globalRetriesUsed = 0;
    let status: RunStatus = 'completed';
    let failure: AppError | null = null;

    log.info({ steps: this.stepKinds, maxGlobalRetries: settings.maxGlobalRetries }, 'Pipeline run started');

    for (const step of this.options.steps) {
      if (runOptions.signal?.aborted) {
        status = 'cancelled';
        failure = createAppError(ErrorCode.RUN_CANCELLED, 'Run cancelled before all steps were resolved', false);
        break;
      }

      const remaining = Math.max(0, settings.maxGlobalRetries - globalRetriesUsed);
      const maxRetries = Math.min(step.maxRetries ?? settings.maxStepRetries, 1 + remaining);

      const resolution = await this.resolve(controller, step, input, maxRetries, priorOutputs, runOptions.signal);
      resolutions.push(resolution);
      globalRetriesUsed += Math.max(0, resolution.attempts - 1);

      if (resolution.status === 'failed') {
        failure = resolution.error;
        status = resolution.error.code === ErrorCode.RUN_CANCELLED ? 'cancelled' : 'failed';
        log.error({ stepKind: resolution.stepKind, errorCode: resolution.error.code }, 'Step failed, stopping run');
        break;
      }

      priorOutputs[resolution.stepKind] = resolution.output;
      input = resolution.output;

      if (resolution.terminalState === 'ESCALATED_STOP') {
        status = 'halted';
        log.warn({ stepKind: resolution.stepKind }, 'Step escalated with stop policy, halting run');
        break;
      }
    }

    const confidence = aggregateRunConfidence(
      resolutions.map((resolution) => resolution.confidence),
      settings.weights,
      settings.reviewThreshold,
    );
    const records = history.all();
    const needsHumanReview =
      status !== 'completed' || confidence.needsHumanReview || resolutions.some((r) => r.needsHumanReview);

    log.info(
      { status, globalRetriesUsed, overall: confidence.overall, needsHumanReview },
      'Pipeline run finished',
    );

    return {
      runId,
      status,
      steps: resolutions,
      history: records,
      confidence,
      needsHumanReview,
      summary: summarizeExecution(records, resolutions, globalRetriesUsed, settings.maxGlobalRetries),
      failure,
      startedAt: startedAt.toISOString(),
      completedAt: this.now().toISOString(),
    };
  }

  private resolve(
    controller: RetryController,
    step: PipelineStep,
    input: unknown,
    maxRetries: number,
    priorOutputs: Record<string, unknown>,
    signal: AbortSignal | undefined,
  ): Promise<StepResolution> {
    return controller.resolve({
      worker: step.worker,
      input,
      maxRetries,
      goal: step.goal,
      priorOutputs: { ...priorOutputs },
      escalationPolicy: step.escalationPolicy,
      isUsable: step.isUsable,
      signals: step.signals,
      notes: step.notes,
      signal,
    });
  }
}
