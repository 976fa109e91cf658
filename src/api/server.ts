import 'dotenv/config';
import { createApp } from './app.js';
import { createEngine } from '../bootstrap.js';
import { logger } from '../infrastructure/logger.js';

const PORT = parseInt(process.env.PORT ?? '3000', 10);

async function main(): Promise<void> {
  const engine = await createEngine();
  if (!engine.ok) {
    logger.fatal({ errorCode: engine.error.code, details: engine.error.details }, engine.error.message);
    process.exit(1);
  }

  const { config, pipeline, runStore } = engine.value;
  const app = createApp({
    pipeline,
    runStore,
    confidence: { weights: config.weights, reviewThreshold: config.reviewThreshold },
  });

  app.listen(PORT, () => {
    logger.info({ port: PORT, steps: pipeline.stepKinds }, 'Reflective extraction API started');
  });
}

main().catch((err) => {
  logger.fatal({ err: err instanceof Error ? err.message : String(err) }, 'Failed to start server');
  process.exit(1);
});
