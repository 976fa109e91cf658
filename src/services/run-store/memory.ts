import { ok, err, type Result } from '../../domain/result.js';
import { createAppError, ErrorCode, type AppError } from '../../domain/errors.js';
import type { PipelineRun } from '../../domain/types.js';
import type { RunStore } from './types.js';

/** Process-local store. Runs are copied on the way in and out and never overwritten. */
export class InMemoryRunStore implements RunStore {
  private readonly runs = new Map<string, PipelineRun>();

  async save(run: PipelineRun): Promise<Result<void, AppError>> {
    if (this.runs.has(run.runId)) {
      return err(createAppError(ErrorCode.RUN_ALREADY_EXISTS, `Run '${run.runId}' already exists`, false));
    }
    this.runs.set(run.runId, structuredClone(run));
    return ok(undefined);
  }

  async find(runId: string): Promise<Result<PipelineRun | null, AppError>> {
    const run = this.runs.get(runId);
    return ok(run ? structuredClone(run) : null);
  }

  get size(): number {
    return this.runs.size;
  }
}
