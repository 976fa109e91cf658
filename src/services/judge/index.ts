import { ok, err, type Result } from '../../domain/result.js';
import { createAppError, describeCause, ErrorCode, type AppError } from '../../domain/errors.js';
import { judgeResponseSchema } from '../../domain/schemas.js';
import type {
  DecisionThresholds,
  EscalationPolicy,
  JudgeVerdict,
  Rubric,
} from '../../domain/types.js';
import { logger } from '../../infrastructure/logger.js';
import { deriveDecision, normalizeScore, resolveThresholds } from './decision.js';
import { recoverJsonObject } from './json-recovery.js';
import { buildJudgePrompt } from './prompt.js';
import type {
  EvaluationRequest,
  JudgeCall,
  RubricEvaluatorOptions,
  StepEvaluator,
} from './types.js';

export type {
  EvaluationContext,
  EvaluationRequest,
  JudgeCall,
  JudgeCallOptions,
  JudgePrompt,
  RubricEvaluatorOptions,
  StepEvaluator,
} from './types.js';
export { deriveDecision, normalizeScore, resolveThresholds } from './decision.js';
export { recoverJsonObject } from './json-recovery.js';
export { buildJudgePrompt } from './prompt.js';
export { LlmJudgeCall } from './llm-judge-call.js';

const log = logger.child({ module: 'judge' });

const DEFAULT_SCORE_PRECISION = 2;

function mergeOps(...lists: string[][]): string[] {
  const merged: string[] = [];
  for (const op of lists.flat()) {
    const trimmed = op.trim();
    if (trimmed && !merged.includes(trimmed)) merged.push(trimmed);
  }
  return merged;
}

export function parseFailureVerdict(detail: string): JudgeVerdict {
  return {
    score: 0,
    decision: 'ESCALATE',
    critique: `Judge response could not be parsed: ${detail}`,
    issues: ['Judge response could not be parsed'],
    improvementOps: [],
    parseFailed: true,
  };
}

/**
 * Turns raw judge text into a verdict. Never fails: text that cannot be
 * recovered, or that lacks a usable score, becomes an ESCALATE verdict with
 * score 0 and `parseFailed` set.
 */
export function interpretJudgeResponse(
  raw: string,
  thresholds: DecisionThresholds,
  scorePrecision = DEFAULT_SCORE_PRECISION,
): JudgeVerdict {
  const recovered = recoverJsonObject(raw);
  if (!recovered) {
    return parseFailureVerdict('no JSON object found');
  }

  const parsed = judgeResponseSchema.safeParse(recovered.value);
  if (!parsed.success) {
    return parseFailureVerdict(parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; '));
  }

  const body = parsed.data;
  if (!Number.isFinite(body.score)) {
    return parseFailureVerdict('score is not a finite number');
  }

  const score = normalizeScore(body.score, scorePrecision);
  return {
    score,
    decision: deriveDecision(score, thresholds),
    critique: body.critique,
    issues: body.issues,
    improvementOps: mergeOps(body.improvement_ops, body.suggestions),
    parseFailed: false,
    ...(body.decision !== undefined && { rawDecision: body.decision }),
  };
}

export class RubricEvaluator implements StepEvaluator {
  private readonly rubric: Rubric;
  private readonly judge: JudgeCall;
  private readonly defaults: DecisionThresholds;
  private readonly scorePrecision: number;
  private readonly maxExcerptChars: number | undefined;

  constructor(rubric: Rubric, judge: JudgeCall, options: RubricEvaluatorOptions) {
    this.rubric = rubric;
    this.judge = judge;
    this.defaults = options.thresholds;
    this.scorePrecision = options.scorePrecision ?? DEFAULT_SCORE_PRECISION;
    this.maxExcerptChars = options.maxExcerptChars;
  }

  thresholdsFor(stepKind: string): DecisionThresholds {
    return resolveThresholds(this.rubric.nodes[stepKind], this.defaults);
  }

  escalationPolicyFor(stepKind: string): EscalationPolicy | undefined {
    return this.rubric.nodes[stepKind]?.escalationPolicy;
  }

  goalFor(stepKind: string): string | undefined {
    return this.rubric.nodes[stepKind]?.description;
  }

  async evaluate(request: EvaluationRequest): Promise<Result<JudgeVerdict, AppError>> {
    const { runId, stepKind, attempt } = request;
    const ctx = { runId, stepKind, attempt };
    const node = this.rubric.nodes[stepKind];

    if (!node) {
      log.warn({ ...ctx, errorCode: ErrorCode.RUBRIC_NOT_FOUND }, 'No rubric for step, escalating');
      return ok({
        score: 0,
        decision: 'ESCALATE',
        critique: `No rubric is configured for step '${stepKind}'`,
        issues: [`Missing rubric for step '${stepKind}'`],
        improvementOps: [],
        parseFailed: false,
      });
    }

    const prompt = buildJudgePrompt({
      systemPrompt: this.rubric.defaultPrompt,
      stepKind,
      node,
      context: request.context,
      feedback: request.feedback,
      attempt,
      maxAttempts: request.maxAttempts,
      maxExcerptChars: this.maxExcerptChars,
    });

    let raw: Result<string, AppError>;
    try {
      raw = await this.judge.call(prompt, { runId, stepKind, attempt, signal: request.signal });
    } catch (cause) {
      raw = err(createAppError(ErrorCode.JUDGE_CALL_FAILED, 'Judge call threw', true, describeCause(cause)));
    }

    if (!raw.ok) {
      log.warn(
        { ...ctx, errorCode: raw.error.code, retryable: raw.error.retryable, details: raw.error.details },
        'Judge call failed',
      );
      return err(
        raw.error.code === ErrorCode.JUDGE_CALL_FAILED || raw.error.code === ErrorCode.JUDGE_TIMEOUT
          ? raw.error
          : createAppError(
              ErrorCode.JUDGE_CALL_FAILED,
              `Judge call failed: ${raw.error.message}`,
              raw.error.retryable,
              raw.error.details ?? raw.error.code,
            ),
      );
    }

    const verdict = interpretJudgeResponse(raw.value, this.thresholdsFor(stepKind), this.scorePrecision);

    if (verdict.parseFailed) {
      log.warn({ ...ctx, errorCode: ErrorCode.JUDGE_PARSE_FAILED, critique: verdict.critique }, 'Judge response unparseable');
    } else if (verdict.rawDecision !== undefined && verdict.rawDecision.trim().toUpperCase() !== verdict.decision) {
      log.debug({ ...ctx, rawDecision: verdict.rawDecision, decision: verdict.decision }, 'Judge decision text ignored');
    }

    log.info({ ...ctx, score: verdict.score, decision: verdict.decision }, 'Step attempt evaluated');
    return ok(verdict);
  }
}
