import type { Result } from '../../domain/result.js';
import type { AppError } from '../../domain/errors.js';
import type { PipelineRun } from '../../domain/types.js';

export interface RunStore {
  save(run: PipelineRun): Promise<Result<void, AppError>>;
  find(runId: string): Promise<Result<PipelineRun | null, AppError>>;
}
