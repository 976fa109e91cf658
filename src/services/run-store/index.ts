import { ok, err, type Result } from '../../domain/result.js';
import { createAppError, describeCause, ErrorCode, type AppError } from '../../domain/errors.js';
import type { PipelineRun } from '../../domain/types.js';
import type { Database } from '../../infrastructure/db/client.js';
import { logger } from '../../infrastructure/logger.js';
import { findRunById, insertRun } from './repository.js';
import type { RunStore } from './types.js';

export type { RunStore } from './types.js';
export { InMemoryRunStore } from './memory.js';

const log = logger.child({ module: 'run-store' });

const UNIQUE_VIOLATION = '23505';

/** Postgres reports duplicate keys with SQLSTATE 23505, possibly on a wrapped cause. */
function isUniqueViolation(cause: unknown): boolean {
  if (cause === null || typeof cause !== 'object') return false;
  if ('code' in cause && cause.code === UNIQUE_VIOLATION) return true;
  return 'cause' in cause && cause.cause !== cause && isUniqueViolation(cause.cause);
}

export class DrizzleRunStore implements RunStore {
  private readonly db: Database;

  constructor(db: Database) {
    this.db = db;
  }

  async save(run: PipelineRun): Promise<Result<void, AppError>> {
    try {
      await insertRun(this.db, run);
      log.info({ runId: run.runId, status: run.status, records: run.history.length }, 'Run persisted');
      return ok(undefined);
    } catch (cause) {
      const details = describeCause(cause);
      if (isUniqueViolation(cause)) {
        log.warn({ runId: run.runId, errorCode: ErrorCode.RUN_ALREADY_EXISTS, retryable: false, details }, 'Run already persisted');
        return err(createAppError(ErrorCode.RUN_ALREADY_EXISTS, `Run '${run.runId}' already exists`, false, details));
      }
      log.error({ runId: run.runId, errorCode: ErrorCode.DB_CONNECTION_ERROR, details }, 'Failed to persist run');
      return err(createAppError(ErrorCode.DB_CONNECTION_ERROR, 'Failed to persist run', true, details));
    }
  }

  async find(runId: string): Promise<Result<PipelineRun | null, AppError>> {
    try {
      return ok(await findRunById(this.db, runId));
    } catch (cause) {
      const details = describeCause(cause);
      log.error({ runId, errorCode: ErrorCode.DB_CONNECTION_ERROR, details }, 'Failed to fetch run');
      return err(createAppError(ErrorCode.DB_CONNECTION_ERROR, 'Failed to fetch run', true, details));
    }
  }
}
