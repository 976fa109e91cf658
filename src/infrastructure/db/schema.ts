import {
  pgTable,
  uuid,
  text,
  boolean,
  timestamp,
  jsonb,
  integer,
  numeric,
  index,
  uniqueIndex,
  check,
} from 'drizzle-orm/pg-core';
import { sql } from 'drizzle-orm';
import type { AppError } from '../../domain/errors.js';
import type {
  AttemptFailure,
  ConfidenceBreakdown,
  ExecutionSummary,
  JudgeVerdict,
  PipelineRun,
} from '../../domain/types.js';

export const pipelineRuns = pgTable(
  'pipeline_runs',
  {
    id: text('id').primaryKey(),
    status: text('status').notNull(),
    needsHumanReview: boolean('needs_human_review').notNull(),
    overallConfidence: numeric('overall_confidence', { precision: 5, scale: 4 }).notNull(),
    confidence: jsonb('confidence').$type<ConfidenceBreakdown>().notNull(),
    summary: jsonb('summary').$type<ExecutionSummary>().notNull(),
    steps: jsonb('steps').$type<PipelineRun['steps']>().notNull(),
    failure: jsonb('failure').$type<AppError>(),
    startedAt: timestamp('started_at', { withTimezone: true }).notNull(),
    completedAt: timestamp('completed_at', { withTimezone: true }).notNull(),
    createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => [
    index('idx_pipeline_runs_review').on(table.needsHumanReview),
    check('chk_pipeline_runs_status', sql`${table.status} IN ('completed', 'halted', 'failed', 'cancelled')`),
  ],
);

export const stepExecutions = pgTable(
  'step_executions',
  {
    id: uuid('id').primaryKey().defaultRandom(),
    runId: text('run_id')
      .notNull()
      .references(() => pipelineRuns.id, { onDelete: 'cascade' }),
    sequence: integer('sequence').notNull(),
    stepKind: text('step_kind').notNull(),
    attempt: integer('attempt').notNull(),
    state: text('state').notNull(),
    score: numeric('score', { precision: 5, scale: 4 }),
    decision: text('decision'),
    output: jsonb('output').$type<unknown>(),
    verdict: jsonb('verdict').$type<JudgeVerdict>(),
    failure: jsonb('failure').$type<AttemptFailure>(),
    feedbackProvided: text('feedback_provided').array().notNull(),
    startedAt: timestamp('started_at', { withTimezone: true }).notNull(),
    completedAt: timestamp('completed_at', { withTimezone: true }).notNull(),
  },
  (table) => [
    uniqueIndex('idx_step_executions_run_sequence').on(table.runId, table.sequence),
    index('idx_step_executions_step').on(table.runId, table.stepKind),
  ],
);
