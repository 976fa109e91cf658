import { describe, it, expect } from 'vitest';
import { ok, err, type Result } from '../../src/domain/result.js';
import { createAppError, ErrorCode, type AppError } from '../../src/domain/errors.js';
import { runWithDeadline } from '../../src/services/retry/index.js';

const options = {
  label: "Worker for step 'parse'",
  timeoutCode: ErrorCode.WORKER_TIMEOUT,
  failureCode: ErrorCode.WORKER_FAILED,
};

describe('runWithDeadline', () => {
  it('passes a result through', async () => {
    expect(await runWithDeadline(async () => ok(42), options)).toEqual(ok(42));
  });

  it('passes an error result through', async () => {
    const failure = createAppError(ErrorCode.LLM_API_ERROR, 'Groq API call failed', true);
    expect(await runWithDeadline(async () => err(failure), options)).toEqual(err(failure));
  });

  it('turns a synchronous throw into the failure code', async () => {
    const result = await runWithDeadline(() => {
      throw new Error('not ready');
    }, options);

    expect(result).toEqual(
      err(createAppError(ErrorCode.WORKER_FAILED, "Worker for step 'parse' threw", true, 'not ready')),
    );
  });

  it('turns a rejection into the failure code', async () => {
    const result = await runWithDeadline(() => Promise.reject(new Error('socket closed')), options);

    expect(result).toEqual(
      err(createAppError(ErrorCode.WORKER_FAILED, "Worker for step 'parse' threw", true, 'socket closed')),
    );
  });

  it('times out and aborts the task signal', async () => {
    let taskSignal: AbortSignal | undefined;
    const result = await runWithDeadline(
      (signal) => {
        taskSignal = signal;
        return new Promise<Result<number, AppError>>(() => undefined);
      },
      { ...options, timeoutMs: 10 },
    );

    expect(result).toEqual(
      err(createAppError(ErrorCode.WORKER_TIMEOUT, "Worker for step 'parse' timed out after 10ms", true)),
    );
    expect(taskSignal?.aborted).toBe(true);
  });

  it('cancels when the parent signal aborts', async () => {
    const parent = new AbortController();
    const pending = runWithDeadline(() => new Promise<Result<number, AppError>>(() => undefined), { ...options, parent: parent.signal });

    parent.abort();

    expect(await pending).toEqual(
      err(createAppError(ErrorCode.RUN_CANCELLED, "Worker for step 'parse' cancelled", false)),
    );
  });

  it('does not start the task under an already aborted parent', async () => {
    const parent = new AbortController();
    parent.abort();
    let started = false;

    const result = await runWithDeadline(
      async () => {
        started = true;
        return ok(1);
      },
      { ...options, parent: parent.signal },
    );

    expect(started).toBe(false);
    expect(result.ok).toBe(false);
  });
});
