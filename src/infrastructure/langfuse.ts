import { Langfuse } from 'langfuse';
import { ok, err, type Result } from '../domain/result.js';
import { createAppError, describeCause, ErrorCode, type AppError } from '../domain/errors.js';
import { logger } from './logger.js';

export interface PromptTemplate {
  name: string;
  prompt: string;
  version?: number;
  config: Record<string, unknown>;
}

export interface TraceGenerationParams {
  traceId: string;
  name: string;
  model: string;
  input: string;
  output: string;
  promptName?: string;
  promptVersion?: number;
  startTime: Date;
  endTime: Date;
  metadata?: Record<string, unknown>;
}

interface TraceObject {
  generation(params: {
    name: string;
    model: string;
    input: string;
    output: string;
    startTime: Date;
    endTime: Date;
    metadata?: Record<string, unknown>;
  }): unknown;
}

export interface LangfuseClient {
  getPrompt(
    name: string,
    version?: number,
    options?: { label?: string; type?: 'text' },
  ): Promise<{ name: string; prompt: string; version?: number; config?: unknown }>;
  trace(params: { id: string; name: string; metadata?: Record<string, unknown> }): TraceObject;
}

interface CacheEntry {
  prompt: PromptTemplate;
  fetchedAt: number;
}

const CACHE_TTL_MS = 5 * 60 * 1000;
const log = logger.child({ module: 'langfuse' });

/** Replaces `{{name}}` placeholders; unknown placeholders are left as they are. */
export function renderPrompt(template: string, variables: Record<string, string>): string {
  return template.replace(/\{\{\s*([\w.-]+)\s*\}\}/g, (placeholder, key: string) =>
    Object.prototype.hasOwnProperty.call(variables, key) ? variables[key] ?? '' : placeholder,
  );
}

export class LangfuseService {
  private readonly client: LangfuseClient;
  private readonly cache = new Map<string, CacheEntry>();

  constructor(client: LangfuseClient) {
    this.client = client;
  }

  async getPrompt(
    name: string,
    label?: string,
    runId?: string,
  ): Promise<Result<PromptTemplate, AppError>> {
    const ctx = { promptName: name, label, runId };
    const key = label ? `${name}:${label}` : name;
    const cached = this.cache.get(key);

    if (cached && Date.now() - cached.fetchedAt < CACHE_TTL_MS) {
      log.debug({ ...ctx, cacheAgeMs: Date.now() - cached.fetchedAt }, 'Returning cached prompt');
      return ok(cached.prompt);
    }

    try {
      const fetched = await this.client.getPrompt(name, undefined, { label, type: 'text' });

      const template: PromptTemplate = {
        name: fetched.name,
        prompt: fetched.prompt,
        ...(fetched.version !== undefined && { version: fetched.version }),
        config: isRecord(fetched.config) ? fetched.config : {},
      };

      this.cache.set(key, { prompt: template, fetchedAt: Date.now() });
      log.info(ctx, 'Fetched prompt from Langfuse');
      return ok(template);
    } catch (cause) {
      const details = describeCause(cause);

      if (cached) {
        log.warn(
          { ...ctx, staleForMs: Date.now() - cached.fetchedAt, details },
          'Langfuse unavailable, returning stale cached prompt',
        );
        return ok(cached.prompt);
      }

      log.error(
        { ...ctx, errorCode: ErrorCode.LANGFUSE_UNAVAILABLE, retryable: true, details },
        'Langfuse unavailable and no cached prompt',
      );
      return err(
        createAppError(
          ErrorCode.LANGFUSE_UNAVAILABLE,
          'Cannot fetch prompt from Langfuse and no cached version available',
          true,
          details,
        ),
      );
    }
  }

  /** Fire-and-forget: tracing failures are logged and never reach the caller */
  traceGeneration(params: TraceGenerationParams): void {
    try {
      const trace = this.client.trace({
        id: params.traceId,
        name: params.name,
        metadata: params.metadata,
      });

      trace.generation({
        name: params.name,
        model: params.model,
        input: params.input,
        output: params.output,
        startTime: params.startTime,
        endTime: params.endTime,
        metadata: {
          promptName: params.promptName,
          promptVersion: params.promptVersion,
          ...params.metadata,
        },
      });

      log.debug({ traceId: params.traceId, name: params.name }, 'Traced LLM generation');
    } catch (cause) {
      log.warn({ traceId: params.traceId, details: describeCause(cause) }, 'Failed to trace generation (non-blocking)');
    }
  }

  async warmCache(promptNames: string[], label?: string): Promise<void> {
    const results = await Promise.allSettled(promptNames.map((name) => this.getPrompt(name, label)));
    const succeeded = results.filter((r) => r.status === 'fulfilled' && r.value.ok).length;

    log.info({ succeeded, failed: results.length - succeeded, total: results.length }, 'Prompt cache warm-up complete');
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function createLangfuseClientFromEnv(env: NodeJS.ProcessEnv = process.env): Result<LangfuseClient, AppError> {
  const publicKey = env.LANGFUSE_PUBLIC_KEY;
  const secretKey = env.LANGFUSE_SECRET_KEY;
  if (!publicKey || !secretKey) {
    return err(
      createAppError(ErrorCode.CONFIG_INVALID, 'LANGFUSE_PUBLIC_KEY and LANGFUSE_SECRET_KEY must be set', false),
    );
  }
  return ok(
    new Langfuse({
      publicKey,
      secretKey,
      baseUrl: env.LANGFUSE_BASE_URL ?? 'https://cloud.langfuse.com',
    }),
  );
}
