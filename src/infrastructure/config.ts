import { z } from 'zod';
import { ok, err, type Result } from '../domain/result.js';
import { createAppError, ErrorCode, type AppError } from '../domain/errors.js';
import { escalationPolicySchema } from '../domain/schemas.js';
import type { ConfidenceWeights, DecisionThresholds, EscalationPolicy } from '../domain/types.js';
import { logger } from './logger.js';

const log = logger.child({ module: 'config' });

export interface EngineConfig {
  maxStepRetries: number;
  maxGlobalRetries: number;
  feedbackMaxItems: number;
  noProgressLimit: number;
  reviewThreshold: number;
  weights: ConfidenceWeights;
  thresholds: DecisionThresholds;
  scorePrecision: number;
  attemptTimeoutMs?: number;
  escalationPolicy: EscalationPolicy;
  rubricPath: string;
  requiredFields: readonly string[];
  promptLabel: string;
}

const ratio = z.coerce.number().min(0).max(1);

const envSchema = z
  .object({
    MAX_STEP_RETRIES: z.coerce.number().int().min(1).default(3),
    MAX_GLOBAL_RETRIES: z.coerce.number().int().min(0).default(10),
    FEEDBACK_MAX_ITEMS: z.coerce.number().int().min(1).default(10),
    NO_PROGRESS_LIMIT: z.coerce.number().int().min(1).default(2),
    REVIEW_THRESHOLD: ratio.default(0.75),
    CONFIDENCE_WEIGHT_JUDGE: z.coerce.number().nonnegative().default(0.5),
    CONFIDENCE_WEIGHT_STRUCTURAL: z.coerce.number().nonnegative().default(0.3),
    CONFIDENCE_WEIGHT_VALIDATION: z.coerce.number().nonnegative().default(0.2),
    ACCEPT_THRESHOLD: ratio.default(0.8),
    REVISE_MIN: ratio.default(0.5),
    SCORE_PRECISION: z.coerce.number().int().min(0).max(6).default(2),
    ATTEMPT_TIMEOUT_MS: z.coerce.number().int().positive().optional(),
    ESCALATION_POLICY: escalationPolicySchema.default('retry'),
    RUBRIC_PATH: z.string().min(1).default('config/rubric.yaml'),
    REQUIRED_FIELDS: z
      .string()
      .default('')
      .transform((list) => list.split(',').map((f) => f.trim()).filter((f) => f.length > 0)),
    PROMPT_LABEL: z.string().min(1).default('production'),
  })
  .refine((env) => env.REVISE_MIN <= env.ACCEPT_THRESHOLD, {
    message: 'REVISE_MIN must not exceed ACCEPT_THRESHOLD',
    path: ['REVISE_MIN'],
  });

/** Blank variables count as unset so `.env` templates with empty values fall back to defaults. */
function withoutBlanks(env: NodeJS.ProcessEnv): Record<string, string> {
  const cleaned: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== '') {
      cleaned[key] = value;
    }
  }
  return cleaned;
}

export function loadEngineConfig(env: NodeJS.ProcessEnv = process.env): Result<EngineConfig, AppError> {
  const parsed = envSchema.safeParse(withoutBlanks(env));

  if (!parsed.success) {
    const details = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    log.error({ errorCode: ErrorCode.CONFIG_INVALID, retryable: false, details }, 'Invalid engine configuration');
    return err(createAppError(ErrorCode.CONFIG_INVALID, 'Invalid engine configuration', false, details));
  }

  const e = parsed.data;
  const config: EngineConfig = {
    maxStepRetries: e.MAX_STEP_RETRIES,
    maxGlobalRetries: e.MAX_GLOBAL_RETRIES,
    feedbackMaxItems: e.FEEDBACK_MAX_ITEMS,
    noProgressLimit: e.NO_PROGRESS_LIMIT,
    reviewThreshold: e.REVIEW_THRESHOLD,
    weights: Object.freeze({
      judge: e.CONFIDENCE_WEIGHT_JUDGE,
      structural: e.CONFIDENCE_WEIGHT_STRUCTURAL,
      validation: e.CONFIDENCE_WEIGHT_VALIDATION,
    }),
    thresholds: Object.freeze({ acceptThreshold: e.ACCEPT_THRESHOLD, reviseMin: e.REVISE_MIN }),
    scorePrecision: e.SCORE_PRECISION,
    ...(e.ATTEMPT_TIMEOUT_MS !== undefined && { attemptTimeoutMs: e.ATTEMPT_TIMEOUT_MS }),
    escalationPolicy: e.ESCALATION_POLICY,
    rubricPath: e.RUBRIC_PATH,
    requiredFields: Object.freeze(e.REQUIRED_FIELDS),
    promptLabel: e.PROMPT_LABEL,
  };

  return ok(Object.freeze(config));
}
