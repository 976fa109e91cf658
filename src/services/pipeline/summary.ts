import type {
  ExecutionSummary,
  StepExecutionRecord,
  StepResolution,
  StepSummary,
  TimelineEntry,
} from '../../domain/types.js';

function finalScore(resolution: StepResolution): number | null {
  if (resolution.status === 'failed') return null;
  return resolution.verdict?.score ?? null;
}

export function summarizeExecution(
  history: readonly StepExecutionRecord[],
  resolutions: readonly StepResolution[],
  globalRetriesUsed: number,
  maxGlobalRetries: number,
): ExecutionSummary {
  const steps: StepSummary[] = resolutions.map((resolution) => ({
    stepKind: resolution.stepKind,
    attempts: resolution.attempts,
    retries: Math.max(0, resolution.attempts - 1),
    failedAttempts: resolution.history.filter((record) => record.failure !== null).length,
    finalScore: finalScore(resolution),
    terminalState: resolution.terminalState,
  }));

  const timeline: TimelineEntry[] = history.map((record) => ({
    stepKind: record.stepKind,
    attempt: record.attempt,
    state: record.state,
    score: record.verdict?.score ?? null,
    startedAt: record.startedAt,
    durationMs: Math.max(0, Date.parse(record.completedAt) - Date.parse(record.startedAt)),
  }));

  return {
    steps,
    globalRetriesUsed,
    maxGlobalRetries,
    totalAttempts: history.length,
    timeline,
  };
}
