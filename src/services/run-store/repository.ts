import { asc, eq } from 'drizzle-orm';
import type { Database } from '../../infrastructure/db/client.js';
import { pipelineRuns, stepExecutions } from '../../infrastructure/db/schema.js';
import {
  RUN_STATUSES,
  STEP_STATES,
  type PipelineRun,
  type StepExecutionRecord,
} from '../../domain/types.js';

function toRecord(row: typeof stepExecutions.$inferSelect): StepExecutionRecord {
  return {
    runId: row.runId,
    stepKind: row.stepKind,
    attempt: row.attempt,
    output: row.output,
    verdict: row.verdict ?? null,
    state: STEP_STATES.find((state) => state === row.state) ?? 'FAILED',
    feedbackProvided: row.feedbackProvided,
    failure: row.failure ?? null,
    startedAt: row.startedAt.toISOString(),
    completedAt: row.completedAt.toISOString(),
  };
}

function toRun(
  row: typeof pipelineRuns.$inferSelect,
  history: StepExecutionRecord[],
): PipelineRun {
  return {
    runId: row.id,
    status: RUN_STATUSES.find((status) => status === row.status) ?? 'failed',
    steps: row.steps,
    history,
    confidence: row.confidence,
    needsHumanReview: row.needsHumanReview,
    summary: row.summary,
    failure: row.failure ?? null,
    startedAt: row.startedAt.toISOString(),
    completedAt: row.completedAt.toISOString(),
  };
}

/** Writes the run row and its attempt history in one batch, so neither lands without the other. */
export async function insertRun(db: Database, run: PipelineRun): Promise<void> {
  const runInsert = db.insert(pipelineRuns).values({
    id: run.runId,
    status: run.status,
    needsHumanReview: run.needsHumanReview,
    overallConfidence: String(run.confidence.overall),
    confidence: run.confidence,
    summary: run.summary,
    steps: run.steps,
    failure: run.failure,
    startedAt: new Date(run.startedAt),
    completedAt: new Date(run.completedAt),
  });

  if (run.history.length === 0) {
    await db.batch([runInsert]);
    return;
  }

  const historyInsert = db.insert(stepExecutions).values(
    run.history.map((record, sequence) => ({
      runId: run.runId,
      sequence,
      stepKind: record.stepKind,
      attempt: record.attempt,
      state: record.state,
      score: record.verdict ? String(record.verdict.score) : null,
      decision: record.verdict?.decision ?? null,
      output: record.output,
      verdict: record.verdict,
      failure: record.failure,
      feedbackProvided: [...record.feedbackProvided],
      startedAt: new Date(record.startedAt),
      completedAt: new Date(record.completedAt),
    })),
  );

  await db.batch([runInsert, historyInsert]);
}

export async function findRunById(db: Database, runId: string): Promise<PipelineRun | null> {
  const rows = await db.select().from(pipelineRuns).where(eq(pipelineRuns.id, runId));
  if (rows.length === 0) return null;

  const steps = await db
    .select()
    .from(stepExecutions)
    .where(eq(stepExecutions.runId, runId))
    .orderBy(asc(stepExecutions.sequence));

  return toRun(rows[0], steps.map(toRecord));
}
