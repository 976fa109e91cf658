import { describe, it, expect, vi } from 'vitest';
import { ok, err } from '../../src/domain/result.js';
import { createAppError, ErrorCode } from '../../src/domain/errors.js';
import { logger } from '../../src/infrastructure/logger.js';
import { LangfuseService, type LangfuseClient } from '../../src/infrastructure/langfuse.js';
import type { LLMProvider, LLMResponse } from '../../src/infrastructure/llm/types.js';
import {
  FALLBACK_STEP_PROMPTS,
  LlmExtractionWorker,
  parseFieldListOutput,
  parseRecordOutput,
} from '../../src/services/extraction/index.js';
import type { PipelineServices, StepContext } from '../../src/services/retry/index.js';

function makeLlmResponse(content: string): LLMResponse {
  return {
    content,
    model: 'llama-3.3-70b-versatile',
    usage: { promptTokens: 100, completionTokens: 50, totalTokens: 150 },
    latencyMs: 200,
  };
}

function fakeLlm(content: string) {
  const chat = vi.fn<LLMProvider['chat']>().mockResolvedValue(ok(makeLlmResponse(content)));
  const llm: LLMProvider = { chat };
  return { llm, chat };
}

function fakeLangfuseClient(getPrompt: LangfuseClient['getPrompt']) {
  const generation = vi.fn();
  const trace = vi.fn<LangfuseClient['trace']>().mockReturnValue({ generation });
  const client: LangfuseClient = { getPrompt: vi.fn(getPrompt), trace };
  return { client, trace, generation };
}

const abort = new AbortController();

function context(services: PipelineServices, overrides: Partial<StepContext> = {}): StepContext {
  return {
    runId: 'run-1',
    stepKind: 'generate',
    goal: 'Produce the metadata fields',
    input: { title: 'Soil survey' },
    priorOutputs: {},
    attempt: 2,
    maxAttempts: 3,
    feedback: ['Quote the evidence'],
    previousOutput: undefined,
    previousVerdict: null,
    services,
    log: logger,
    signal: abort.signal,
    ...overrides,
  };
}

const fieldsResponse = JSON.stringify({
  fields: [{ name: 'site', value: 'North Marsh', evidence: 'Site: North Marsh', confidence: 0.9 }],
  field_confidence: { site: 0.8 },
});

function generateWorker(withFallback = true) {
  return new LlmExtractionWorker({
    stepKind: 'generate',
    fallbackPrompt: withFallback ? FALLBACK_STEP_PROMPTS.generate : undefined,
    parseOutput: parseFieldListOutput,
  });
}

describe('LlmExtractionWorker', () => {
  it('fails without an LLM provider', async () => {
    const result = await generateWorker().invoke(context({}));

    expect(result).toEqual(
      err(createAppError(ErrorCode.CONFIG_INVALID, 'No LLM provider configured for step workers', false)),
    );
  });

  it('uses the built-in prompt without Langfuse and parses the field list', async () => {
    const { llm, chat } = fakeLlm(fieldsResponse);

    const result = await generateWorker().invoke(context({ llm }));

    expect(result).toEqual(
      ok({
        output: [{ name: 'site', value: 'North Marsh', evidence: 'Site: North Marsh', confidence: 0.9 }],
        fieldConfidence: { site: 0.8 },
      }),
    );

    const [system, user, options] = chat.mock.calls[0];
    expect(system).toContain('Goal: Produce the metadata fields');
    expect(system.endsWith('Feedback from earlier attempts, apply every item:\n- Quote the evidence')).toBe(true);
    expect(user).toBe('{\n  "title": "Soil survey"\n}');
    expect(options).toEqual({ responseFormat: 'json', temperature: 0.1, signal: abort.signal });
  });

  it('renders the Langfuse prompt under the configured label and traces the call', async () => {
    const { llm, chat } = fakeLlm(fieldsResponse);
    const { client, trace } = fakeLangfuseClient(async () => ({
      name: 'step-generate',
      prompt: 'Goal={{goal}} attempt {{attempt}}/{{max_attempts}} kind {{step_kind}}\n{{feedback}}',
      version: 3,
    }));

    const result = await generateWorker().invoke(
      context({ llm, langfuse: new LangfuseService(client), promptLabel: 'staging' }),
    );

    expect(result.ok).toBe(true);
    expect(client.getPrompt).toHaveBeenCalledWith('step-generate', undefined, { label: 'staging', type: 'text' });
    expect(chat.mock.calls[0][0]).toBe('Goal=Produce the metadata fields attempt 2/3 kind generate\n- Quote the evidence');
    expect(trace).toHaveBeenCalledWith({
      id: 'run-1',
      name: 'worker-generate',
      metadata: { stepKind: 'generate', attempt: 2, recovery: 'direct' },
    });
  });

  it('falls back to the built-in prompt when Langfuse is down', async () => {
    const { llm, chat } = fakeLlm(fieldsResponse);
    const { client } = fakeLangfuseClient(async () => {
      throw new Error('ECONNREFUSED');
    });

    const result = await generateWorker().invoke(context({ llm, langfuse: new LangfuseService(client) }));

    expect(result.ok).toBe(true);
    expect(chat.mock.calls[0][0]).toContain('Goal: Produce the metadata fields');
  });

  it('reports Langfuse errors when there is no built-in prompt', async () => {
    const { llm, chat } = fakeLlm(fieldsResponse);
    const { client } = fakeLangfuseClient(async () => {
      throw new Error('ECONNREFUSED');
    });

    const result = await generateWorker(false).invoke(context({ llm, langfuse: new LangfuseService(client) }));

    expect(result.ok).toBe(false);
    expect(!result.ok && result.error.code).toBe(ErrorCode.LANGFUSE_UNAVAILABLE);
    expect(chat).not.toHaveBeenCalled();
  });

  it('fails without any prompt source', async () => {
    const { llm } = fakeLlm(fieldsResponse);

    const result = await generateWorker(false).invoke(context({ llm }));

    expect(result).toEqual(
      err(createAppError(ErrorCode.CONFIG_INVALID, "No prompt available for step 'generate'", false)),
    );
  });

  it('lists no feedback on a first attempt', async () => {
    const { llm, chat } = fakeLlm(fieldsResponse);

    await generateWorker().invoke(context({ llm }, { attempt: 1, feedback: [] }));

    expect(chat.mock.calls[0][0].endsWith('apply every item:\n- None')).toBe(true);
    expect(chat.mock.calls[0][0]).toContain('Review of your previous answer (score none): None\nIssues raised:\n- None\n');
  });

  it('shows the last review to a retried attempt', async () => {
    const { llm, chat } = fakeLlm(fieldsResponse);
    const previousVerdict = {
      score: 0.45,
      decision: 'RETRY' as const,
      critique: 'Depth is missing its unit. ',
      issues: ['depth has no unit', 'site evidence is paraphrased'],
      improvementOps: ['Add units'],
      parseFailed: false,
    };

    await generateWorker().invoke(context({ llm }, { previousVerdict }));

    expect(chat.mock.calls[0][0]).toContain(
      'Review of your previous answer (score 0.45): Depth is missing its unit.\n' +
        'Issues raised:\n- depth has no unit\n- site evidence is paraphrased\n' +
        'Feedback from earlier attempts, apply every item:\n- Quote the evidence',
    );
  });

  it('rejects a response without a JSON object', async () => {
    const { llm } = fakeLlm('I could not find any fields.');

    const result = await generateWorker().invoke(context({ llm }));

    expect(result).toEqual(
      err(
        createAppError(
          ErrorCode.LLM_MALFORMED_RESPONSE,
          'Worker response is not a JSON object',
          true,
          'I could not find any fields.',
        ),
      ),
    );
  });

  it('returns the parser error for a malformed payload', async () => {
    const { llm } = fakeLlm('{"fields": "none"}');

    const result = await generateWorker().invoke(context({ llm }));

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.code).toBe(ErrorCode.LLM_MALFORMED_RESPONSE);
    expect(result.error.message).toBe('Response does not contain a valid fields list');
    expect(result.error.retryable).toBe(true);
  });

  it('passes provider errors through', async () => {
    const failure = createAppError(ErrorCode.LLM_RATE_LIMITED, 'Groq API rate limited', true);
    const chat = vi.fn<LLMProvider['chat']>().mockResolvedValue(err(failure));

    const result = await generateWorker().invoke(context({ llm: { chat } }));

    expect(result).toEqual(err(failure));
  });

  it('recovers a fenced record and drops the confidence map from it', async () => {
    const { llm } = fakeLlm('```json\n{"title": "Soil survey", "field_confidence": {"title": 1.2}}\n```');
    const worker = new LlmExtractionWorker({
      stepKind: 'parse',
      fallbackPrompt: FALLBACK_STEP_PROMPTS.parse,
      parseOutput: parseRecordOutput,
    });

    const result = await worker.invoke(context({ llm }, { stepKind: 'parse' }));

    expect(result).toEqual(ok({ output: { title: 'Soil survey' }, fieldConfidence: { title: 1 } }));
  });
});
