import { ok, err, type Result } from '../../domain/result.js';
import { createAppError, ErrorCode, type AppError } from '../../domain/errors.js';
import { logger } from '../../infrastructure/logger.js';
import { renderPrompt, type LangfuseService } from '../../infrastructure/langfuse.js';
import { recoverJsonObject } from '../judge/json-recovery.js';
import { formatExcerpt } from '../judge/prompt.js';
import type { JudgeVerdict } from '../../domain/types.js';
import type { StepContext, StepWorker, WorkerOutput } from '../retry/types.js';
import { extractFieldConfidence } from './parsers.js';
import type { LlmWorkerOptions, ResolvedTemplate } from './types.js';

export type { LlmWorkerOptions } from './types.js';
export { parseFieldListOutput, parseRecordOutput, extractFieldConfidence } from './parsers.js';
export { FALLBACK_STEP_PROMPTS } from './prompts.js';

const log = logger.child({ module: 'extraction' });
const DEFAULT_PROMPT_LABEL = 'production';

function formatList(items: readonly string[]): string {
  return items.length > 0 ? items.map((item) => `- ${item}`).join('\n') : '- None';
}

function reviewVariables(verdict: JudgeVerdict | null): Record<string, string> {
  return {
    previous_score: verdict ? String(verdict.score) : 'none',
    critique: verdict?.critique.trim() || 'None',
    issues: formatList(verdict?.issues ?? []),
  };
}

/**
 * Step worker backed by the LLM provider. The system prompt comes from
 * Langfuse (`step-<kind>` by default) and is filled with the goal, the
 * feedback gathered so far and the last review of this step; the step input
 * is the user message.
 */
export class LlmExtractionWorker<T> implements StepWorker<T, unknown> {
  readonly stepKind: string;
  private readonly promptName: string;
  private readonly fallbackPrompt: string | undefined;
  private readonly temperature: number;
  private readonly parseOutput: (payload: Record<string, unknown>) => Result<T, AppError>;

  constructor(options: LlmWorkerOptions<T>) {
    this.stepKind = options.stepKind;
    this.promptName = options.promptName ?? `step-${options.stepKind}`;
    this.fallbackPrompt = options.fallbackPrompt;
    this.temperature = options.temperature ?? 0.1;
    this.parseOutput = (payload) => options.parseOutput(payload);
  }

  async invoke(context: StepContext): Promise<Result<WorkerOutput<T>, AppError>> {
    const { llm, langfuse, promptLabel } = context.services;
    const ctx = { runId: context.runId, stepKind: this.stepKind, attempt: context.attempt };

    if (!llm) {
      return err(createAppError(ErrorCode.CONFIG_INVALID, 'No LLM provider configured for step workers', false));
    }

    const template = await this.loadTemplate(langfuse, promptLabel ?? DEFAULT_PROMPT_LABEL, context.runId);
    if (!template.ok) return template;

    const systemPrompt = renderPrompt(template.value.prompt, {
      goal: context.goal,
      step_kind: this.stepKind,
      attempt: String(context.attempt),
      max_attempts: String(context.maxAttempts),
      feedback: formatList(context.feedback),
      prior_outputs: formatExcerpt(context.priorOutputs),
      ...reviewVariables(context.previousVerdict),
    });
    const userMessage = formatExcerpt(context.input);

    log.info(ctx, 'Invoking step worker');
    const startTime = new Date();

    const chat = await llm.chat(systemPrompt, userMessage, {
      responseFormat: 'json',
      temperature: this.temperature,
      signal: context.signal,
    });
    if (!chat.ok) return chat;

    const recovered = recoverJsonObject(chat.value.content);
    if (!recovered) {
      log.warn({ ...ctx, errorCode: ErrorCode.LLM_MALFORMED_RESPONSE }, 'Worker response is not a JSON object');
      return err(
        createAppError(
          ErrorCode.LLM_MALFORMED_RESPONSE,
          'Worker response is not a JSON object',
          true,
          chat.value.content.slice(0, 500),
        ),
      );
    }

    const output = this.parseOutput(recovered.value);
    if (!output.ok) {
      log.warn({ ...ctx, errorCode: output.error.code, details: output.error.details }, 'Worker output rejected');
      return output;
    }

    langfuse?.traceGeneration({
      traceId: context.runId,
      name: `worker-${this.stepKind}`,
      model: chat.value.model,
      input: systemPrompt,
      output: chat.value.content,
      promptName: template.value.name,
      promptVersion: template.value.version,
      startTime,
      endTime: new Date(),
      metadata: { stepKind: this.stepKind, attempt: context.attempt, recovery: recovered.strategy },
    });

    log.info(
      { ...ctx, model: chat.value.model, latencyMs: chat.value.latencyMs, recovery: recovered.strategy },
      'Step worker completed',
    );

    const fieldConfidence = extractFieldConfidence(recovered.value);
    return ok({ output: output.value, ...(fieldConfidence && { fieldConfidence }) });
  }

  private async loadTemplate(
    langfuse: LangfuseService | undefined,
    label: string,
    runId: string,
  ): Promise<Result<ResolvedTemplate, AppError>> {
    if (langfuse) {
      const fetched = await langfuse.getPrompt(this.promptName, label, runId);
      if (fetched.ok) return fetched;
      if (this.fallbackPrompt === undefined) return fetched;

      log.warn({ runId, promptName: this.promptName, errorCode: fetched.error.code }, 'Using built-in prompt');
    }

    if (this.fallbackPrompt === undefined) {
      return err(
        createAppError(ErrorCode.CONFIG_INVALID, `No prompt available for step '${this.stepKind}'`, false),
      );
    }
    return ok({ name: `${this.promptName}-builtin`, prompt: this.fallbackPrompt });
  }
}
