import { z } from 'zod';
import { ESCALATION_POLICIES, type Rubric, type RubricNode } from './types.js';

export const DEFAULT_JUDGE_SYSTEM_PROMPT =
  'You are an impartial reviewer of extraction output. You score it against the rubric and answer with a JSON verdict.';

export const escalationPolicySchema = z.enum(ESCALATION_POLICIES);

const thresholdValue = z.number().min(0).max(1);

export const rubricCriterionSchema = z.object({
  description: z.string().optional(),
  checks: z.array(z.string()).default([]),
});

export const rubricNodeSchema = z
  .object({
    description: z.string().min(1, 'Step goal description is required'),
    criteria: z.record(z.string(), rubricCriterionSchema).default({}),
    accept_threshold: thresholdValue.optional(),
    revise_min: thresholdValue.optional(),
    escalation_policy: escalationPolicySchema.optional(),
  })
  .refine(
    (node) =>
      node.accept_threshold === undefined ||
      node.revise_min === undefined ||
      node.revise_min <= node.accept_threshold,
    { message: 'revise_min must not exceed accept_threshold' },
  )
  .transform((node): RubricNode => ({
    description: node.description,
    criteria: node.criteria,
    acceptThreshold: node.accept_threshold,
    reviseMin: node.revise_min,
    escalationPolicy: node.escalation_policy,
  }));

export const rubricSchema = z
  .object({
    default_prompt: z.string().min(1).default(DEFAULT_JUDGE_SYSTEM_PROMPT),
    nodes: z.record(z.string(), rubricNodeSchema),
  })
  .transform((rubric): Rubric => ({
    defaultPrompt: rubric.default_prompt,
    nodes: rubric.nodes,
  }));

const scoreValue = z.union([
  z.number(),
  z
    .string()
    .trim()
    .regex(/^-?\d+(\.\d+)?$/, 'score must be numeric')
    .transform(Number),
]);

/** Shape of a judge answer once recovered from raw text. Malformed lists degrade to empty. */
export const judgeResponseSchema = z.object({
  score: scoreValue,
  critique: z.string().catch(''),
  issues: z.array(z.string()).catch([]),
  improvement_ops: z.array(z.string()).catch([]),
  suggestions: z.array(z.string()).catch([]),
  decision: z.string().optional().catch(undefined),
});

export type JudgeResponse = z.infer<typeof judgeResponseSchema>;

export const runRequestInput = z.object({
  documentText: z.string().min(1, 'Document text is required'),
  runId: z.string().min(1).optional(),
});

export const confidenceRequestInput = z.object({
  sources: z.record(z.string(), z.number().min(0).max(1).nullable()),
  weights: z.record(z.string(), z.number().nonnegative()).optional(),
  reviewThreshold: thresholdValue.optional(),
});

export type RunRequestInput = z.infer<typeof runRequestInput>;
export type ConfidenceRequestInput = z.infer<typeof confidenceRequestInput>;
