import type { ExtractedField } from '../../domain/types.js';
import { structuralReading } from '../confidence/index.js';
import {
  FALLBACK_STEP_PROMPTS,
  LlmExtractionWorker,
  parseFieldListOutput,
  parseRecordOutput,
} from '../extraction/index.js';
import { createValidationSource, type ValidationRules } from '../validation/index.js';
import type { PipelineStep } from './types.js';

export const DEFAULT_STEP_KINDS = ['parse', 'retrieve', 'generate'] as const;

export interface DefaultStepsOptions {
  /** Fields the final output must populate. */
  requiredFields?: readonly string[];
  rules?: ValidationRules;
  promptNames?: Partial<Record<(typeof DEFAULT_STEP_KINDS)[number], string>>;
}

function hasKeys(output: Record<string, unknown>): boolean {
  return Object.keys(output).length > 0;
}

/**
 * parse → retrieve → generate. Only the final field list carries structural
 * and validation signals; earlier steps are scored by the judge alone.
 */
export function createDefaultSteps(options: DefaultStepsOptions = {}): PipelineStep[] {
  const validation = createValidationSource({
    requiredFields: options.requiredFields ?? [],
    rules: options.rules,
    requireEvidence: true,
  });

  const parse: PipelineStep<Record<string, unknown>> = {
    worker: new LlmExtractionWorker({
      stepKind: 'parse',
      promptName: options.promptNames?.parse,
      fallbackPrompt: FALLBACK_STEP_PROMPTS.parse,
      parseOutput: parseRecordOutput,
    }),
    isUsable: hasKeys,
  };

  const retrieve: PipelineStep<Record<string, unknown>> = {
    worker: new LlmExtractionWorker({
      stepKind: 'retrieve',
      promptName: options.promptNames?.retrieve,
      fallbackPrompt: FALLBACK_STEP_PROMPTS.retrieve,
      parseOutput: parseRecordOutput,
    }),
    isUsable: hasKeys,
  };

  const generate: PipelineStep<ExtractedField[]> = {
    worker: new LlmExtractionWorker({
      stepKind: 'generate',
      promptName: options.promptNames?.generate,
      fallbackPrompt: FALLBACK_STEP_PROMPTS.generate,
      parseOutput: parseFieldListOutput,
    }),
    isUsable: (fields) => fields.length > 0,
    signals: {
      structural: (fields, result) => structuralReading(fields, result.fieldConfidence),
      validation: (fields) => validation(fields),
    },
    notes: (fields) => ({ fieldCount: fields.length }),
  };

  return [parse, retrieve, generate];
}
