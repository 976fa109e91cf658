import type { ExtractedField, SignalReading } from '../../domain/types.js';
import type { StructuralMetrics, ValidationCounts } from './types.js';

export const DEFAULT_VALIDATION_PASS_TARGET = 0.8;

const WARNING_PENALTY = 0.05;
const ERROR_PENALTY = 0.2;

function isPopulated(field: ExtractedField): boolean {
  const { value } = field;
  if (value === null || value === undefined) return false;
  if (typeof value === 'string') {
    const trimmed = value.trim();
    return trimmed !== '' && trimmed !== field.name;
  }
  if (Array.isArray(value)) return value.length > 0;
  return true;
}

function hasEvidence(field: ExtractedField): boolean {
  return typeof field.evidence === 'string' && field.evidence.trim() !== '';
}

/**
 * A field counts as complete when it has a non-empty value that is not just
 * its own name echoed back. Self-reported confidences override the field's
 * own `confidence` when given.
 */
export function computeStructuralMetrics(
  fields: readonly ExtractedField[],
  fieldConfidence: Record<string, number> = {},
): StructuralMetrics {
  if (fields.length === 0) {
    return { fieldCount: 0, fieldCompletionRatio: 0, evidenceCoverageRatio: 0, avgFieldConfidence: null };
  }

  const confidences: number[] = [];
  for (const field of fields) {
    const reported = fieldConfidence[field.name] ?? field.confidence;
    if (typeof reported === 'number' && Number.isFinite(reported)) {
      confidences.push(Math.min(1, Math.max(0, reported)));
    }
  }

  return {
    fieldCount: fields.length,
    fieldCompletionRatio: fields.filter(isPopulated).length / fields.length,
    evidenceCoverageRatio: fields.filter(hasEvidence).length / fields.length,
    avgFieldConfidence:
      confidences.length > 0 ? confidences.reduce((sum, c) => sum + c, 0) / confidences.length : null,
  };
}

/** Mean of the available structural ratios. */
export function structuralScore(metrics: StructuralMetrics): number {
  const parts = [metrics.fieldCompletionRatio, metrics.evidenceCoverageRatio];
  if (metrics.avgFieldConfidence !== null) parts.push(metrics.avgFieldConfidence);
  return parts.reduce((sum, p) => sum + p, 0) / parts.length;
}

export function structuralReading(
  fields: readonly ExtractedField[],
  fieldConfidence?: Record<string, number>,
): SignalReading {
  const metrics = computeStructuralMetrics(fields, fieldConfidence);
  return {
    score: structuralScore(metrics),
    details: {
      fieldCount: metrics.fieldCount,
      fieldCompletionRatio: metrics.fieldCompletionRatio,
      evidenceCoverageRatio: metrics.evidenceCoverageRatio,
      avgFieldConfidence: metrics.avgFieldConfidence,
    },
  };
}

export function validationPassRate(
  counts: ValidationCounts,
  passTarget: number = DEFAULT_VALIDATION_PASS_TARGET,
): number {
  let rate: number;
  if (counts.errors > 0) {
    rate = passTarget - ERROR_PENALTY * counts.errors;
  } else if (counts.warnings > 0) {
    rate = 1 - WARNING_PENALTY * counts.warnings;
  } else {
    rate = 1;
  }
  return Math.min(1, Math.max(0, rate));
}
