import { z } from 'zod';
import { ok, err, type Result } from '../../domain/result.js';
import { createAppError, ErrorCode, type AppError } from '../../domain/errors.js';
import type { ExtractedField } from '../../domain/types.js';

const fieldSchema = z.object({
  name: z.string().trim().min(1),
  value: z.unknown(),
  evidence: z.string().nullable().optional(),
  confidence: z.coerce.number().min(0).max(1).nullable().optional().catch(null),
});

const fieldListSchema = z.object({
  fields: z.array(fieldSchema),
});

const METADATA_KEYS = new Set(['field_confidence']);

/** Keeps the payload as a record, minus worker metadata keys. */
export function parseRecordOutput(payload: Record<string, unknown>): Result<Record<string, unknown>, AppError> {
  const record: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(payload)) {
    if (!METADATA_KEYS.has(key)) record[key] = value;
  }
  return ok(record);
}

export function parseFieldListOutput(payload: Record<string, unknown>): Result<ExtractedField[], AppError> {
  const parsed = fieldListSchema.safeParse(payload);
  if (!parsed.success) {
    const details = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    return err(
      createAppError(ErrorCode.LLM_MALFORMED_RESPONSE, 'Response does not contain a valid fields list', true, details),
    );
  }

  return ok(
    parsed.data.fields.map((field) => ({
      name: field.name,
      value: field.value ?? null,
      evidence: field.evidence ?? null,
      confidence: field.confidence ?? null,
    })),
  );
}

/** Reads the optional `field_confidence` map, keeping finite values clamped to [0,1]. */
export function extractFieldConfidence(payload: Record<string, unknown>): Record<string, number> | undefined {
  const raw = payload.field_confidence;
  if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) return undefined;

  const confidences: Record<string, number> = {};
  for (const [name, value] of Object.entries(raw)) {
    if (typeof value === 'number' && Number.isFinite(value)) {
      confidences[name] = Math.min(1, Math.max(0, value));
    }
  }
  return Object.keys(confidences).length > 0 ? confidences : undefined;
}
