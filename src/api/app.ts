import express from 'express';
import { setupOpenAPI } from './openapi/index.js';
import { createConfidenceRouter, type ConfidenceDefaults } from './routes/confidence.js';
import { createRunsRouter, type RunExecutor } from './routes/runs.js';
import { requestLogger } from './middleware/request-logger.js';
import { errorHandler } from './middleware/error-handler.js';
import type { RunStore } from '../services/run-store/index.js';

export interface AppDeps {
  pipeline: RunExecutor;
  runStore: RunStore;
  confidence: ConfidenceDefaults;
}

export function createApp(deps: AppDeps): express.Express {
  const app = express();

  app.use(express.json({ limit: '10mb' }));
  app.use(requestLogger);

  setupOpenAPI(app);

  app.get('/health', (_req, res) => {
    res.json({ status: 'ok', timestamp: new Date().toISOString() });
  });

  app.use(createConfidenceRouter(deps.confidence));
  app.use(createRunsRouter({ pipeline: deps.pipeline, runStore: deps.runStore }));

  app.use(errorHandler);

  return app;
}
