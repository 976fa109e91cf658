import { ok, type Result } from './domain/result.js';
import type { AppError } from './domain/errors.js';
import { loadEngineConfig, type EngineConfig } from './infrastructure/config.js';
import { connectDatabase } from './infrastructure/db/client.js';
import { createLangfuseClientFromEnv, LangfuseService } from './infrastructure/langfuse.js';
import { createLLMProviderFromEnv } from './infrastructure/llm/index.js';
import { logger } from './infrastructure/logger.js';
import { loadRubric } from './infrastructure/rubric-loader.js';
import { LlmJudgeCall, RubricEvaluator } from './services/judge/index.js';
import { createDefaultSteps, DEFAULT_STEP_KINDS, Pipeline } from './services/pipeline/index.js';
import { DrizzleRunStore, InMemoryRunStore, type RunStore } from './services/run-store/index.js';

const log = logger.child({ module: 'bootstrap' });

export interface Engine {
  config: EngineConfig;
  pipeline: Pipeline;
  runStore: RunStore;
}

async function createRunStore(env: NodeJS.ProcessEnv): Promise<Result<RunStore, AppError>> {
  const url = env.DATABASE_URL;
  if (!url) {
    log.warn('DATABASE_URL not set, runs are kept in memory');
    return ok(new InMemoryRunStore());
  }

  const db = await connectDatabase(url);
  if (!db.ok) return db;
  return ok(new DrizzleRunStore(db.value));
}

/** Wires configuration, rubric, LLM, Langfuse and storage into a ready pipeline. */
export async function createEngine(env: NodeJS.ProcessEnv = process.env): Promise<Result<Engine, AppError>> {
  const config = loadEngineConfig(env);
  if (!config.ok) return config;

  const rubric = await loadRubric(config.value.rubricPath);
  if (!rubric.ok) return rubric;

  const llm = createLLMProviderFromEnv(env);
  if (!llm.ok) return llm;

  const langfuseClient = createLangfuseClientFromEnv(env);
  let langfuse: LangfuseService | undefined;
  if (langfuseClient.ok) {
    langfuse = new LangfuseService(langfuseClient.value);
    await langfuse.warmCache(DEFAULT_STEP_KINDS.map((kind) => `step-${kind}`), config.value.promptLabel);
  } else {
    log.warn({ details: langfuseClient.error.message }, 'Langfuse not configured, using built-in prompts without tracing');
  }

  const runStore = await createRunStore(env);
  if (!runStore.ok) return runStore;

  const evaluator = new RubricEvaluator(rubric.value, new LlmJudgeCall(llm.value, { langfuse }), {
    thresholds: config.value.thresholds,
    scorePrecision: config.value.scorePrecision,
  });

  const pipeline = new Pipeline({
    steps: createDefaultSteps({ requiredFields: config.value.requiredFields }),
    evaluator,
    settings: config.value,
    services: { llm: llm.value, langfuse, promptLabel: config.value.promptLabel },
  });

  return ok({ config: config.value, pipeline, runStore: runStore.value });
}
