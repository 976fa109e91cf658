export type { LLMProvider, LLMResponse, LLMRequestOptions, LLMProviderConfig } from './types.js';
export { GroqProvider, createGroqClient } from './groq.js';
export type { GroqClient, GroqChatParams } from './groq.js';

import { ok, err, type Result } from '../../domain/result.js';
import { createAppError, ErrorCode, type AppError } from '../../domain/errors.js';
import { GroqProvider, createGroqClient } from './groq.js';
import type { LLMProvider, LLMProviderConfig } from './types.js';

export function createLLMProvider(config: LLMProviderConfig): LLMProvider {
  return new GroqProvider(createGroqClient(config.apiKey), config.model);
}

/** Builds a provider per caller; there is no shared module-level instance. */
export function createLLMProviderFromEnv(env: NodeJS.ProcessEnv = process.env): Result<LLMProvider, AppError> {
  const provider = env.LLM_PROVIDER ?? 'groq';
  if (provider !== 'groq') {
    return err(createAppError(ErrorCode.CONFIG_INVALID, `Unsupported LLM provider: ${provider}`, false));
  }

  const apiKey = env.GROQ_API_KEY;
  if (!apiKey) {
    return err(createAppError(ErrorCode.CONFIG_INVALID, 'GROQ_API_KEY environment variable is not set', false));
  }

  return ok(createLLMProvider({ provider: 'groq', apiKey, model: env.LLM_MODEL }));
}
