import { Router, type Request, type Response } from 'express';
import { createAppError, ErrorCode } from '../../domain/errors.js';
import { runRequestInput } from '../../domain/schemas.js';
import type { PipelineRun } from '../../domain/types.js';
import type { RunOptions } from '../../services/pipeline/index.js';
import type { RunStore } from '../../services/run-store/index.js';
import { logger } from '../../infrastructure/logger.js';
import { successResponse, errorResponse, sendAppError } from '../middleware/error-handler.js';

export interface RunExecutor {
  run(document: unknown, options?: RunOptions): Promise<PipelineRun>;
}

export interface RunsRouterDeps {
  pipeline: RunExecutor;
  runStore: RunStore;
}

function paramString(val: string | string[] | undefined): string {
  return Array.isArray(val) ? val[0] ?? '' : val ?? '';
}

export function createRunsRouter(deps: RunsRouterDeps): Router {
  const router = Router();

  router.post('/runs', async (req: Request, res: Response) => {
    const parsed = runRequestInput.safeParse(req.body);
    if (!parsed.success) {
      const details = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
      res.status(422).json(errorResponse('VALIDATION_ERROR', 'Invalid request body', details));
      return;
    }

    const { documentText, runId } = parsed.data;

    if (runId !== undefined) {
      const existing = await deps.runStore.find(runId);
      if (!existing.ok) return sendAppError(res, existing.error);
      if (existing.value) {
        return sendAppError(res, createAppError(ErrorCode.RUN_ALREADY_EXISTS, `Run '${runId}' already exists`, false));
      }
    }

    const controller = new AbortController();
    res.on('close', () => {
      if (!res.writableEnded) controller.abort();
    });

    const run = await deps.pipeline.run(documentText, { runId, signal: controller.signal });

    const saved = await deps.runStore.save(run);
    if (!saved.ok) {
      logger.warn({ runId: run.runId, errorCode: saved.error.code }, 'Run finished but was not persisted');
      return sendAppError(res, saved.error);
    }

    res.status(201).json(successResponse(run));
  });

  router.get('/runs/:id', async (req: Request, res: Response) => {
    const runId = paramString(req.params.id);

    const found = await deps.runStore.find(runId);
    if (!found.ok) return sendAppError(res, found.error);

    if (!found.value) {
      return sendAppError(res, createAppError(ErrorCode.RUN_NOT_FOUND, `Run '${runId}' not found`, false));
    }

    res.json(successResponse(found.value));
  });

  return router;
}
