import type { JudgeVerdict, StepExecutionRecord } from '../../domain/types.js';

function freezeVerdict(verdict: JudgeVerdict | null): JudgeVerdict | null {
  if (!verdict) return null;
  const copy: JudgeVerdict = { ...verdict, issues: [...verdict.issues], improvementOps: [...verdict.improvementOps] };
  Object.freeze(copy.issues);
  Object.freeze(copy.improvementOps);
  return Object.freeze(copy);
}

/**
 * Append-only log of step attempts for one document run.
 * Records are frozen on append; readers get read-only views.
 */
export class ExecutionHistory {
  private readonly records: StepExecutionRecord[] = [];

  append(record: StepExecutionRecord): StepExecutionRecord {
    const frozen: StepExecutionRecord = Object.freeze({
      ...record,
      verdict: freezeVerdict(record.verdict),
      feedbackProvided: Object.freeze([...record.feedbackProvided]),
      failure: record.failure ? Object.freeze({ ...record.failure }) : null,
    });
    this.records.push(frozen);
    return frozen;
  }

  all(): readonly StepExecutionRecord[] {
    return [...this.records];
  }

  forStep(stepKind: string): readonly StepExecutionRecord[] {
    return this.records.filter((record) => record.stepKind === stepKind);
  }

  get size(): number {
    return this.records.length;
  }
}
