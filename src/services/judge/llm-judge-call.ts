import { ok, type Result } from '../../domain/result.js';
import type { AppError } from '../../domain/errors.js';
import type { LLMProvider } from '../../infrastructure/llm/index.js';
import type { LangfuseService } from '../../infrastructure/langfuse.js';
import type { JudgeCall, JudgeCallOptions, JudgePrompt } from './types.js';

export interface LlmJudgeCallOptions {
  langfuse?: LangfuseService;
  temperature?: number;
}

/** Judge transport over the shared LLM provider. Generations are traced when Langfuse is configured. */
export class LlmJudgeCall implements JudgeCall {
  private readonly llm: LLMProvider;
  private readonly langfuse: LangfuseService | undefined;
  private readonly temperature: number;

  constructor(llm: LLMProvider, options: LlmJudgeCallOptions = {}) {
    this.llm = llm;
    this.langfuse = options.langfuse;
    this.temperature = options.temperature ?? 0;
  }

  async call(prompt: JudgePrompt, options: JudgeCallOptions): Promise<Result<string, AppError>> {
    const startTime = new Date();
    const response = await this.llm.chat(prompt.system, prompt.user, {
      temperature: this.temperature,
      responseFormat: 'text',
      signal: options.signal,
    });
    if (!response.ok) return response;

    this.langfuse?.traceGeneration({
      traceId: options.runId ?? `judge-${options.stepKind}`,
      name: `judge-${options.stepKind}`,
      model: response.value.model,
      input: prompt.user,
      output: response.value.content,
      startTime,
      endTime: new Date(),
      metadata: { stepKind: options.stepKind, attempt: options.attempt, latencyMs: response.value.latencyMs },
    });

    return ok(response.value.content);
  }
}
