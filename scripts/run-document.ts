import 'dotenv/config';
import { readFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import { createEngine } from '../src/bootstrap.js';
import { logger } from '../src/infrastructure/logger.js';

const log = logger.child({ module: 'run-document' });

function printUsage(): never {
  console.error('Usage: npm run run:document -- <text-file> [run-id]');
  console.error('Example: npm run run:document -- ./samples/paper.txt paper-001');
  process.exit(1);
}

async function main(): Promise<void> {
  const [textPath, runId] = process.argv.slice(2);
  if (!textPath) printUsage();

  const documentText = await readFile(resolve(textPath), 'utf-8');
  if (documentText.trim() === '') {
    console.error(`File is empty: ${textPath}`);
    process.exit(1);
  }

  const engine = await createEngine();
  if (!engine.ok) {
    log.error({ errorCode: engine.error.code, details: engine.error.details }, engine.error.message);
    process.exit(1);
  }

  const { pipeline, runStore } = engine.value;

  const controller = new AbortController();
  process.once('SIGINT', () => {
    log.warn('Interrupted, cancelling run');
    controller.abort();
  });

  const run = await pipeline.run(documentText, { runId, signal: controller.signal });

  const saved = await runStore.save(run);
  if (!saved.ok) {
    log.warn({ runId: run.runId, errorCode: saved.error.code }, 'Run could not be persisted');
  }

  console.log(
    JSON.stringify(
      {
        runId: run.runId,
        status: run.status,
        needsHumanReview: run.needsHumanReview,
        confidence: run.confidence,
        summary: run.summary,
        outputs: Object.fromEntries(
          run.steps.map((step) => [step.stepKind, step.status === 'failed' ? null : step.output]),
        ),
        failure: run.failure,
      },
      null,
      2,
    ),
  );

  process.exit(run.status === 'completed' || run.status === 'halted' ? 0 : 2);
}

main().catch((error: unknown) => {
  log.error({ error: error instanceof Error ? error.message : String(error) }, 'Unhandled error');
  process.exit(1);
});
