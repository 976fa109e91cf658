import { err, type Result } from '../../domain/result.js';
import { createAppError, describeCause, ErrorCode, type AppError } from '../../domain/errors.js';

export interface DeadlineOptions {
  label: string;
  timeoutMs?: number;
  /** Run-level signal; aborting it ends the call with RUN_CANCELLED. */
  parent?: AbortSignal;
  timeoutCode: ErrorCode;
  failureCode: ErrorCode;
}

/**
 * Runs one collaborator call under its own AbortSignal. Throws and rejections
 * become `failureCode`, an elapsed timeout becomes `timeoutCode`. The task's
 * signal is aborted on timeout or cancellation; a late result is ignored.
 */
export function runWithDeadline<T>(
  task: (signal: AbortSignal) => Promise<Result<T, AppError>>,
  options: DeadlineOptions,
): Promise<Result<T, AppError>> {
  const { label, timeoutMs, parent } = options;
  const controller = new AbortController();

  return new Promise((resolve) => {
    let settled = false;
    let timer: ReturnType<typeof setTimeout> | undefined;

    const onParentAbort = (): void => {
      controller.abort(parent?.reason);
      finish(err(createAppError(ErrorCode.RUN_CANCELLED, `${label} cancelled`, false)));
    };

    const finish = (result: Result<T, AppError>): void => {
      if (settled) return;
      settled = true;
      if (timer !== undefined) clearTimeout(timer);
      parent?.removeEventListener('abort', onParentAbort);
      resolve(result);
    };

    const fail = (cause: unknown): void => {
      finish(err(createAppError(options.failureCode, `${label} threw`, true, describeCause(cause))));
    };

    if (parent?.aborted) {
      onParentAbort();
      return;
    }
    parent?.addEventListener('abort', onParentAbort, { once: true });

    if (timeoutMs !== undefined) {
      timer = setTimeout(() => {
        controller.abort(new Error(`${label} timed out`));
        finish(err(createAppError(options.timeoutCode, `${label} timed out after ${timeoutMs}ms`, true)));
      }, timeoutMs);
    }

    let pending: Promise<Result<T, AppError>>;
    try {
      pending = task(controller.signal);
    } catch (cause) {
      fail(cause);
      return;
    }
    void pending.then(finish, fail);
  });
}
